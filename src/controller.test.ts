import { describe, expect, it, vi } from 'vitest';
import { Commands } from './command.js';
import { App, LOGIN_REJECTED_PROMPT } from './controller.js';
import type { DebugLogEntry } from './debug-log.js';
import type { KeyPress } from './keymap.js';
import type { MusicApi } from './music-api.js';
import { Mutex } from './mutex.js';
import type { Player } from './player.js';
import { enqueueCommand } from './state.js';
import { FakeMusicApi, FakePlayer, likedSongs, RecordingFrame } from './test-helpers.js';
import { CommandLine } from './tui/command-line.js';
import { PlaybackGauge } from './tui/playback-gauge.js';

function press(name: string): KeyPress {
  return { name, kind: 'press' };
}

async function setup(options: { loggedIn?: boolean } = {}) {
  const api = new FakeMusicApi({ loggedInAs: options.loggedIn === false ? null : 'ana' });
  const player = new FakePlayer();
  const frame = new RecordingFrame(80, 24);
  const commandLine = new CommandLine();
  const gauge = new PlaybackGauge();
  const log = vi.fn<(entry: DebugLogEntry) => void>();

  const app = new App({
    api: new Mutex<MusicApi>(api),
    player: new Mutex<Player>(player),
    frame,
    commandLine,
    gauge,
    log,
  });
  await app.start();

  return { app, api, player, frame, commandLine, gauge, log };
}

async function typeKeys(app: App, keys: string[]): Promise<void> {
  for (const key of keys) {
    await app.tick(press(key));
  }
}

describe('App', () => {
  describe('start', () => {
    it('should open the main screen with favorites when logged in', async () => {
      const { app, frame } = await setup();

      expect(app.state.currentScreen).toBe('main');
      expect(app.state.dirty).toBe(true);
      expect(frame.textAt(1, 1)?.trimEnd()).toBe('Liked songs  ·  Nothing playing');
    });

    it('should open the login screen when logged out', async () => {
      const { app, frame } = await setup({ loggedIn: false });

      expect(app.state.currentScreen).toBe('login');
      expect(frame.plainText()).toContain('Ana');
    });
  });

  describe('command queue', () => {
    it('should dispatch one command per tick in FIFO order', async () => {
      const { app } = await setup();
      enqueueCommand(app.state, Commands.gotoScreen('help'));
      enqueueCommand(app.state, Commands.gotoScreen('main'));

      await app.tick(null);
      expect(app.state.currentScreen).toBe('help');
      expect(app.state.commandQueue).toEqual([Commands.gotoScreen('main')]);

      await app.tick(null);
      expect(app.state.currentScreen).toBe('main');
      expect(app.state.commandQueue).toEqual([]);
    });

    it('should enqueue exactly one nop for an unmapped key', async () => {
      const { app } = await setup();
      enqueueCommand(app.state, Commands.up);

      await app.handleEvent(press('z'));

      expect(app.state.commandQueue).toEqual([Commands.nop]);
    });

    it('should ignore key releases', async () => {
      const { app } = await setup();

      const outcome = await app.handleEvent({ name: 'q', kind: 'release' });

      expect(outcome).toEqual({ running: true, redraw: false });
      expect(app.state.commandQueue).toEqual([]);
    });

    it('should stop on quit and leave later commands queued', async () => {
      const { app } = await setup();
      enqueueCommand(app.state, Commands.quit);
      enqueueCommand(app.state, Commands.gotoScreen('help'));

      expect(await app.tick(null)).toBe(false);
      expect(app.state.commandQueue).toEqual([Commands.gotoScreen('help')]);
    });

    it('should quit on q', async () => {
      const { app } = await setup();

      expect(await app.tick(press('q'))).toBe(false);
    });

    it('should treat unimplemented commands as no-ops', async () => {
      const { app, player } = await setup();

      for (const key of [' ', ',', '.', 'r', 's', 'g', 'G', 'n', 'p', 'x']) {
        expect(await app.tick(press(key))).toBe(true);
      }

      expect(app.state.currentScreen).toBe('main');
      expect(player.played).toEqual([]);
    });
  });

  describe('screen transitions', () => {
    it('should refuse the login screen while logged in', async () => {
      const { app, commandLine } = await setup();
      enqueueCommand(app.state, Commands.gotoScreen('login'));

      await app.tick(null);

      expect(app.state.currentScreen).toBe('main');
      expect(commandLine.getContents()).toBe(LOGIN_REJECTED_PROMPT);
    });

    it('should allow the login screen after logout', async () => {
      const { app, api } = await setup();

      await app.tick(press(':'));
      await typeKeys(app, [...'logout', 'ENTER']);
      expect(api.isLogin()).toBe(false);
      expect(app.state.currentScreen).toBe('main');

      enqueueCommand(app.state, Commands.gotoScreen('login'));
      await app.tick(null);
      expect(app.state.currentScreen).toBe('login');
    });

    it('should log transitions', async () => {
      const { app, log } = await setup();

      await app.tick(press('0'));

      expect(log).toHaveBeenCalledWith({ type: 'command', text: 'screen help' });
      expect(log).toHaveBeenCalledWith({ type: 'screen', text: 'main -> help' });
    });
  });

  describe('dirty tracking', () => {
    it('should redraw after a transition', async () => {
      const { app, frame } = await setup();
      frame.clear();

      await app.tick(press('F1'));

      expect(app.state.dirty).toBe(true);
      expect(frame.fills).toContainEqual({ x: 1, y: 1, width: 80, height: 20 });
    });

    it('should never report the help screen stale', async () => {
      const { app, player } = await setup();
      await app.tick(press('0'));

      player.play(likedSongs.tracks[0]);

      expect(await app.updateModel()).toBe(false);
      await app.tick(null);
      expect(app.state.dirty).toBe(false);
    });

    it('should redraw the main screen when the playing track changes', async () => {
      const { app, player } = await setup();
      await app.tick(null);
      expect(app.state.dirty).toBe(false);

      player.play(likedSongs.tracks[1]);
      await app.tick(null);
      expect(app.state.dirty).toBe(true);

      await app.tick(null);
      expect(app.state.dirty).toBe(false);
    });

    it('should only redraw the gauge and command line when clean', async () => {
      const { app, frame } = await setup();
      frame.clear();

      await app.tick(null);

      expect(frame.writes.length).toBeGreaterThan(0);
      expect(frame.writes.every((w) => w.y >= 21)).toBe(true);
      expect(frame.fills.every((r) => r.y >= 21)).toBe(true);
    });

    it('should redraw after invalidate', async () => {
      const { app } = await setup();
      await app.tick(null);

      app.invalidate();
      await app.tick(null);
      expect(app.state.dirty).toBe(true);

      await app.tick(null);
      expect(app.state.dirty).toBe(false);
    });

    it('should update the gauge every tick', async () => {
      const { app, player, gauge } = await setup();
      player.play(likedSongs.tracks[0]);
      player.positionMs = 30_000;

      await app.tick(null);

      expect(gauge.getLabel()).toBe('00:30/03:00');
    });
  });

  describe('command entry', () => {
    it('should switch modes on colon and show the prompt', async () => {
      const { app, commandLine } = await setup();

      await app.tick(press(':'));

      expect(app.state.currentMode).toBe('command-entry');
      expect(commandLine.getPrompt()).toBe(':');
      expect(commandLine.isCursorVisible()).toBe(true);
    });

    it('should edit text instead of running shortcuts', async () => {
      const { app, commandLine } = await setup();
      await app.tick(press(':'));

      const results: boolean[] = [];
      for (const key of [...'quit']) {
        results.push(await app.tick(press(key)));
      }

      expect(results).toEqual([true, true, true, true]);
      expect(commandLine.getContents()).toBe('quit');
      expect(app.state.commandQueue).toEqual([]);
    });

    it('should run the typed command on enter', async () => {
      const { app, commandLine } = await setup();
      await app.tick(press(':'));

      await typeKeys(app, [...'help', 'ENTER']);

      expect(app.state.currentScreen).toBe('help');
      expect(app.state.currentMode).toBe('normal');
      expect(commandLine.getContents()).toBe('');
      expect(commandLine.getPrompt()).toBe('');
      expect(commandLine.isCursorVisible()).toBe(false);
    });

    it('should quit from the command line', async () => {
      const { app } = await setup();
      await app.tick(press(':'));
      await typeKeys(app, [...'q']);

      expect(await app.tick(press('ENTER'))).toBe(false);
    });

    it('should discard the text on escape', async () => {
      const { app, commandLine } = await setup();
      await app.tick(press(':'));
      await typeKeys(app, [...'scr']);

      await app.tick(press('ESCAPE'));

      expect(app.state.currentMode).toBe('normal');
      expect(app.state.currentScreen).toBe('main');
      expect(commandLine.getContents()).toBe('');
      expect(app.state.commandQueue).toEqual([]);
    });

    it('should show parse errors in the command line', async () => {
      const { app, commandLine } = await setup();
      await app.tick(press(':'));

      await typeKeys(app, [...'logot', 'ENTER']);

      expect(app.state.currentMode).toBe('normal');
      expect(commandLine.getContents()).toBe('unknown command "logot", did you mean "logout"?');
      expect(app.state.commandQueue).toEqual([]);
    });

    it('should show the login refusal when typed', async () => {
      const { app, commandLine } = await setup();
      await app.tick(press(':'));

      await typeKeys(app, [...'screen login', 'ENTER']);

      expect(app.state.currentScreen).toBe('main');
      expect(commandLine.getContents()).toBe(LOGIN_REJECTED_PROMPT);
    });

    it('should do nothing for an empty command', async () => {
      const { app } = await setup();
      await app.tick(press(':'));

      expect(await app.tick(press('ENTER'))).toBe(true);
      expect(app.state.currentMode).toBe('normal');
      expect(app.state.currentScreen).toBe('main');
    });
  });

  describe('main screen', () => {
    it('should move down on j and play the selection on enter', async () => {
      const { app, player } = await setup();

      await app.tick(press('j'));
      expect(app.state.dirty).toBe(true);

      await app.tick(press('ENTER'));
      expect(player.played.map((t) => t.id)).toEqual(['b']);
    });
  });

  describe('login', () => {
    it('should rebuild the main screen after logging in', async () => {
      const { app, api, frame } = await setup({ loggedIn: false });
      frame.clear();

      await app.tick(press('ENTER'));

      expect(api.currentProfile()?.id).toBe('ana');
      expect(app.state.currentScreen).toBe('main');
      expect(app.state.dirty).toBe(true);
      expect(frame.textAt(1, 1)?.trimEnd()).toBe('Liked songs  ·  Nothing playing');
    });

    it('should show an empty main screen for a profile without favorites', async () => {
      const { app, frame } = await setup({ loggedIn: false });

      await app.tick(press('j'));
      frame.clear();
      await app.tick(press('ENTER'));

      expect(app.state.currentScreen).toBe('main');
      expect(frame.textAt(1, 1)?.trimEnd()).toBe('No playlist  ·  Nothing playing');
    });

    it('should propagate collaborator failures', async () => {
      const { app, api } = await setup({ loggedIn: false });
      vi.spyOn(api, 'login').mockRejectedValue(new Error('service unavailable'));

      await expect(app.tick(press('ENTER'))).rejects.toThrow('service unavailable');
    });
  });
});
