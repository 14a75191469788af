// Semantic commands produced by the keymap and the command line
// Every user action flows through the controller as one of these values

/**
 * Screens the controller can switch between
 */
export type ScreenName = 'main' | 'login' | 'help';

export const SCREEN_NAMES: readonly ScreenName[] = ['main', 'login', 'help'];

/**
 * Closed set of commands understood by the controller
 */
export type Command =
  | { readonly type: 'up' }
  | { readonly type: 'down' }
  | { readonly type: 'next-panel' }
  | { readonly type: 'prev-panel' }
  | { readonly type: 'toggle-play' }
  | { readonly type: 'prev-track' }
  | { readonly type: 'next-track' }
  | { readonly type: 'play' }
  | { readonly type: 'esc' }
  | { readonly type: 'toggle-repeat' }
  | { readonly type: 'toggle-shuffle' }
  | { readonly type: 'goto-top' }
  | { readonly type: 'goto-bottom' }
  | { readonly type: 'goto-screen'; readonly screen: ScreenName }
  | { readonly type: 'new-playlist'; readonly name: string | null }
  | { readonly type: 'playlist-add' }
  | { readonly type: 'select-playlist' }
  | { readonly type: 'quit' }
  | { readonly type: 'enter-command' }
  | { readonly type: 'logout' }
  | { readonly type: 'nop' };

export type CommandType = Command['type'];

/**
 * Commands without a payload, keyed by type
 */
type SimpleCommandType = Exclude<CommandType, 'goto-screen' | 'new-playlist'>;

function simple<T extends SimpleCommandType>(type: T): Readonly<{ type: T }> {
  return Object.freeze({ type });
}

/**
 * Command constructors. Every value is frozen so queueing can never alter it.
 */
export const Commands = {
  up: simple('up'),
  down: simple('down'),
  nextPanel: simple('next-panel'),
  prevPanel: simple('prev-panel'),
  togglePlay: simple('toggle-play'),
  prevTrack: simple('prev-track'),
  nextTrack: simple('next-track'),
  play: simple('play'),
  esc: simple('esc'),
  toggleRepeat: simple('toggle-repeat'),
  toggleShuffle: simple('toggle-shuffle'),
  gotoTop: simple('goto-top'),
  gotoBottom: simple('goto-bottom'),
  playlistAdd: simple('playlist-add'),
  selectPlaylist: simple('select-playlist'),
  quit: simple('quit'),
  enterCommand: simple('enter-command'),
  logout: simple('logout'),
  nop: simple('nop'),
  gotoScreen(screen: ScreenName): Command {
    return Object.freeze({ type: 'goto-screen', screen });
  },
  newPlaylist(name: string | null = null): Command {
    return Object.freeze({ type: 'new-playlist', name });
  },
} as const;

/**
 * Commands the controller forwards to the active screen instead of handling itself
 */
export type ScreenCommand = Extract<
  Command,
  { type: 'up' | 'down' | 'next-panel' | 'prev-panel' | 'esc' | 'play' }
>;

const SCREEN_COMMAND_TYPES: ReadonlySet<CommandType> = new Set<CommandType>([
  'up',
  'down',
  'next-panel',
  'prev-panel',
  'esc',
  'play',
]);

export function isScreenCommand(command: Command): command is ScreenCommand {
  return SCREEN_COMMAND_TYPES.has(command.type);
}

/**
 * Renders a command the way it would be typed on the command line
 */
export function describeCommand(command: Command): string {
  switch (command.type) {
    case 'goto-screen':
      return `screen ${command.screen}`;
    case 'new-playlist':
      return command.name === null ? 'new' : `new ${command.name}`;
    default:
      return command.type;
  }
}
