#!/usr/bin/env node

// Entry point for tuneterm
// Loads config and library, wires the controller to the terminal, and runs the tick loop

import fs from 'node:fs';
import termKit from 'terminal-kit';
import { z } from 'zod';
import { loadConfigFile, parseArgs, resolveConfig } from './config.js';
import { App } from './controller.js';
import { createDebugLogger, type DebugLogger, silentLogger, startDebugLog } from './debug-log.js';
import { loadLibrary } from './library.js';
import { createFileSessionStore, LocalMusicApi, type MusicApi } from './music-api.js';
import { Mutex } from './mutex.js';
import { type Player, SoundPlayer } from './player.js';
import { TerminalFrame } from './tui/frame.js';
import { KeyReader } from './tui/input.js';
import { restoreTerminal, setupTerminal } from './tui/terminal-cleanup.js';

const term = termKit.terminal;

const PackageJsonSchema = z.object({ version: z.string() });

/**
 * Get package.json version
 */
function getVersion(): string {
  const pkgPath = new URL('../package.json', import.meta.url);
  return PackageJsonSchema.parse(JSON.parse(fs.readFileSync(pkgPath, 'utf-8'))).version;
}

/**
 * Print help message
 */
function printHelp(): void {
  console.log(`
tuneterm - keyboard-driven music player for the terminal

  Browse your favorite playlist, play tracks, and jump between
  screens with vim-style keys or ":" commands.

USAGE
  tuneterm [options] [library-file]

OPTIONS
  -h, --help       Show this help message
  -v, --version    Show version number
  --tick <ms>      Redraw interval when idle (20-5000, default 200)

FILES
  ~/.tuneterm/config.json       Optional settings (libraryPath, tickMs, logPath)
  ~/.tuneterm/library.json      Default library
  ~/.tuneterm/session.json      Saved login

EXAMPLES
  tuneterm                          Use the default library
  tuneterm ./library.json           Use another library file
  tuneterm --tick 100 ./lib.json    Smoother playback gauge
`);
}

/**
 * Main application entry point
 */
async function main(): Promise<void> {
  let player: SoundPlayer | null = null;
  let keys: KeyReader | null = null;
  let terminalActive = false;
  let log: DebugLogger = silentLogger;
  let isShuttingDown = false;

  /**
   * Stops playback, restores the terminal, and exits
   */
  function shutdown(exitCode: number = 0): void {
    if (isShuttingDown) return;
    isShuttingDown = true;

    keys?.close();
    player?.stop();
    if (terminalActive) {
      restoreTerminal();
    }
    log({ type: 'system', text: 'Shutdown', details: { exitCode } });

    process.exit(exitCode);
  }

  // CTRL_C arrives as a key while input is grabbed; SIGTERM comes from outside
  process.on('SIGTERM', () => {
    shutdown(0);
  });

  try {
    const cli = parseArgs(process.argv.slice(2));

    if (cli.help) {
      printHelp();
      process.exit(0);
    }

    if (cli.version) {
      console.log(getVersion());
      process.exit(0);
    }

    const config = resolveConfig(cli, loadConfigFile());

    startDebugLog(config.logPath);
    log = createDebugLogger(config.logPath);
    const logger = log;
    logger({ type: 'system', text: 'Starting', details: config });

    const library = loadLibrary(config.libraryPath);

    player = new SoundPlayer({
      onError: (track, error) => {
        logger({
          type: 'player',
          text: `Playback failed: ${track.title}`,
          details: { file: track.file, error: error instanceof Error ? error.message : String(error) },
        });
      },
    });

    const app = new App({
      api: new Mutex<MusicApi>(new LocalMusicApi(library, createFileSessionStore())),
      player: new Mutex<Player>(player),
      frame: new TerminalFrame(),
      log: logger,
    });

    const reader = new KeyReader();
    keys = reader;

    setupTerminal();
    terminalActive = true;

    term.on('key', (name: string) => {
      if (name === 'CTRL_C') {
        shutdown(0);
        return;
      }
      reader.push(name);
    });

    term.on('resize', () => {
      term.clear();
      app.invalidate();
      reader.wake();
    });

    await app.start();

    let running = true;
    while (running) {
      const key = await reader.next(config.tickMs);
      running = await app.tick(key);
    }

    shutdown(0);
  } catch (error) {
    player?.stop();
    if (terminalActive) {
      restoreTerminal();
    }

    const message = error instanceof Error ? error.message : String(error);
    log({ type: 'error', text: message, details: error instanceof Error ? error.stack : undefined });
    process.stderr.write(`Error: ${message}\n`);

    process.exit(1);
  }
}

// Self-executing entry point
void main();
