/**
 * Application controller
 *
 * Owns AppState and drives one tick at a time:
 *   read key → translate → dispatch one queued command → update model → render
 *
 * The shared API client and player are injected behind Mutex guards. Every
 * guard is held for one logical operation and released before the tick moves on.
 */

import { parseCommand, formatCommandError } from './command-parser.js';
import {
  type Command,
  describeCommand,
  isScreenCommand,
  type ScreenName,
} from './command.js';
import { type DebugLogger, silentLogger } from './debug-log.js';
import { commandForKey, isActionable, type KeyPress } from './keymap.js';
import type { Playlist } from './library.js';
import type { MusicApi } from './music-api.js';
import type { Mutex } from './mutex.js';
import type { Player } from './player.js';
import {
  type AppMode,
  type AppState,
  createInitialState,
  dequeueCommand,
  enqueueCommand,
  setMode,
  setScreen,
} from './state.js';
import { CommandLine } from './tui/command-line.js';
import { computeFrameLayout } from './tui/layout.js';
import { PlaybackGauge } from './tui/playback-gauge.js';
import { HelpScreen, LoginScreen, MainScreen, type Screen } from './tui/screens/index.js';
import { normalStyle } from './tui/style.js';
import type { Frame, Style } from './tui/types.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Main screen as the controller sees it: a screen that can be loaded with a playlist
 */
export interface PlaylistScreen extends Screen {
  updatePlaylistModel(name: string, playlist: Playlist): void;
}

/**
 * Builds screen instances. Main and Login are rebuilt on login/logout.
 */
export interface ScreenFactory {
  main(): PlaylistScreen;
  login(): Screen;
  help(): Screen;
}

export interface AppDeps {
  api: Mutex<MusicApi>;
  player: Mutex<Player>;
  frame: Frame;
  screens?: ScreenFactory;
  commandLine?: CommandLine;
  gauge?: PlaybackGauge;
  style?: Style;
  log?: DebugLogger;
}

/**
 * Result of the input/dispatch half of a tick
 */
export interface EventOutcome {
  /** false once Quit has been dispatched */
  running: boolean;
  /** The dispatched command asks for the active screen to be redrawn */
  redraw: boolean;
}

export const LOGIN_REJECTED_PROMPT = 'you have to logout from current account first!';

const CONTINUE: EventOutcome = { running: true, redraw: false };

export function createScreenFactory(
  api: Mutex<MusicApi>,
  player: Mutex<Player>,
  style: Style = normalStyle,
): ScreenFactory {
  return {
    main: () => new MainScreen(player),
    login: () => new LoginScreen(api),
    help: () => new HelpScreen(style),
  };
}

// ============================================================================
// App
// ============================================================================

export class App {
  readonly state: AppState = createInitialState();

  private readonly api: Mutex<MusicApi>;
  private readonly player: Mutex<Player>;
  private readonly frame: Frame;
  private readonly screens: ScreenFactory;
  private readonly commandLine: CommandLine;
  private readonly gauge: PlaybackGauge;
  private readonly style: Style;
  private readonly log: DebugLogger;

  private mainScreen: PlaylistScreen;
  private loginScreen: Screen;
  private readonly helpScreen: Screen;

  // Set by invalidate() (terminal resized), consumed by the next tick
  private redrawRequested = false;

  constructor(deps: AppDeps) {
    this.api = deps.api;
    this.player = deps.player;
    this.frame = deps.frame;
    this.style = deps.style ?? normalStyle;
    this.screens = deps.screens ?? createScreenFactory(deps.api, deps.player, this.style);
    this.commandLine = deps.commandLine ?? new CommandLine();
    this.gauge = deps.gauge ?? new PlaybackGauge();
    this.log = deps.log ?? silentLogger;

    this.mainScreen = this.screens.main();
    this.loginScreen = this.screens.login();
    this.helpScreen = this.screens.help();
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  /**
   * Pick the first screen and draw the first frame
   */
  async start(): Promise<void> {
    const loggedIn = await this.api.runExclusive((api) => api.isLogin());
    if (loggedIn) {
      await this.initAfterLogin();
    } else {
      await this.switchScreen('login');
    }

    await this.updateModel();
    this.state.dirty = true;
    this.draw();
  }

  /**
   * Called after any login: rebuild the main screen from the user's favorites
   */
  async initAfterLogin(): Promise<void> {
    const favorites = await this.api.runExclusive((api) => api.userFavoriteSonglist());

    this.mainScreen = this.screens.main();
    if (favorites) {
      const [name, playlist] = favorites;
      this.mainScreen.updatePlaylistModel(name, playlist);
    }
    this.log({
      type: 'api',
      text: 'Logged in',
      details: { favorites: favorites ? favorites[0] : null },
    });

    await this.switchScreen('main');
  }

  /**
   * Force the next tick to redraw the active screen (terminal resized)
   */
  invalidate(): void {
    this.redrawRequested = true;
  }

  /**
   * Run one full iteration. Returns false when the app should quit.
   */
  async tick(key: KeyPress | null): Promise<boolean> {
    const outcome = await this.handleEvent(key);
    if (!outcome.running) {
      return false;
    }

    const modelDirty = await this.updateModel();
    this.state.dirty = modelDirty || outcome.redraw || this.redrawRequested;
    this.redrawRequested = false;

    this.draw();
    return true;
  }

  // ==========================================================================
  // Controller
  // ==========================================================================

  /**
   * Refresh the active screen's model and the playback gauge.
   * Returns whether the active screen needs to be redrawn.
   */
  async updateModel(): Promise<boolean> {
    const needRedraw = await this.updateScreenModel();

    // The gauge is drawn every tick, so this never affects needRedraw
    const [position, duration] = await this.player.runExclusive(
      (player) => [player.position(), player.duration()] as const,
    );
    this.gauge.setProgress(position, duration);

    return needRedraw;
  }

  /**
   * Translate one key (if any) and dispatch at most one queued command
   */
  async handleEvent(key: KeyPress | null): Promise<EventOutcome> {
    if (key && isActionable(key)) {
      this.translateKey(key.name);
    }

    const command = dequeueCommand(this.state);
    if (!command) {
      return CONTINUE;
    }
    return this.dispatch(command);
  }

  /**
   * Refresh view state: the active screen only when dirty, the command line always
   */
  updateView(): void {
    if (this.state.dirty) {
      switch (this.state.currentScreen) {
        case 'help':
          break;
        case 'login':
          this.loginScreen.updateView(this.style);
          break;
        case 'main':
          this.mainScreen.updateView(this.style);
          break;
      }
    }

    this.commandLine.setCursorVisibility(this.state.currentMode === 'command-entry');
    this.commandLine.updateView(this.style);
  }

  draw(): void {
    this.updateView();

    const { width, height } = this.frame.size();
    const layout = computeFrameLayout(width, height);

    if (this.state.dirty) {
      this.activeScreen().draw(this.frame, layout.screen);
    }
    this.gauge.draw(this.frame, layout.gauge, this.style);
    this.commandLine.draw(this.frame, layout.commandLine);
  }

  // ==========================================================================
  // Private
  // ==========================================================================

  private translateKey(keyName: string): void {
    if (this.state.currentMode === 'normal') {
      enqueueCommand(this.state, commandForKey(keyName));
      return;
    }

    switch (keyName) {
      case 'ENTER':
        this.parseCommandLine();
        this.changeMode('normal');
        break;
      case 'ESCAPE':
        this.commandLine.reset();
        this.changeMode('normal');
        break;
      default:
        this.commandLine.input(keyName);
        break;
    }
  }

  private parseCommandLine(): void {
    const text = this.commandLine.getContents();
    this.commandLine.reset();

    const result = parseCommand(text);
    if (result.ok) {
      enqueueCommand(this.state, result.command);
    } else {
      this.log({ type: 'command', text: `Rejected "${text}"`, details: result.error });
      this.showPrompt(formatCommandError(result.error));
    }
  }

  private async dispatch(command: Command): Promise<EventOutcome> {
    if (command.type !== 'nop') {
      this.log({ type: 'command', text: describeCommand(command) });
    }

    switch (command.type) {
      case 'quit':
        return { running: false, redraw: false };

      case 'goto-screen':
        return { running: true, redraw: await this.switchScreen(command.screen) };

      case 'enter-command':
        this.changeMode('command-entry');
        this.commandLine.reset();
        this.commandLine.setPrompt(':');
        return CONTINUE;

      case 'logout':
        this.loginScreen = this.screens.login();
        await this.api.runExclusive((api) => api.logout());
        this.log({ type: 'api', text: 'Logged out' });
        return CONTINUE;

      default:
        if (isScreenCommand(command)) {
          const redraw = await this.activeScreen().handleEvent(command);
          return { running: true, redraw };
        }
        return CONTINUE;
    }
  }

  /**
   * Returns whether the transition happened (and so the screen must be redrawn)
   */
  private async switchScreen(to: ScreenName): Promise<boolean> {
    if (to === 'login') {
      const loggedIn = await this.api.runExclusive((api) => api.isLogin());
      if (loggedIn) {
        this.showPrompt(LOGIN_REJECTED_PROMPT);
        this.log({ type: 'screen', text: 'Login screen rejected: already logged in' });
        return false;
      }
    }

    this.log({ type: 'screen', text: `${this.state.currentScreen} -> ${to}` });
    setScreen(this.state, to);
    return true;
  }

  private async updateScreenModel(): Promise<boolean> {
    switch (this.state.currentScreen) {
      case 'help':
        return false;
      case 'login':
        return this.updateLoginModel();
      case 'main':
        return this.mainScreen.updateModel();
    }
  }

  private async updateLoginModel(): Promise<boolean> {
    const needRedraw = await this.loginScreen.updateModel();

    const loggedIn = await this.api.runExclusive((api) => api.isLogin());
    if (loggedIn) {
      await this.initAfterLogin();
      return true;
    }
    return needRedraw;
  }

  private activeScreen(): Screen {
    switch (this.state.currentScreen) {
      case 'help':
        return this.helpScreen;
      case 'login':
        return this.loginScreen;
      case 'main':
        return this.mainScreen;
    }
  }

  private changeMode(mode: AppMode): void {
    if (this.state.currentMode === mode) return;
    this.log({ type: 'mode', text: `${this.state.currentMode} -> ${mode}` });
    setMode(this.state, mode);
  }

  /**
   * Replace the command line contents with a message
   */
  private showPrompt(text: string): void {
    this.commandLine.reset();
    this.commandLine.insertStr(text);
  }
}
