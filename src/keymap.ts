// Normal-mode keymap
// Maps terminal-kit key names to commands

import { type Command, Commands } from './command.js';

/**
 * terminal-kit only reports presses, but repeat and release are modelled so
 * other key sources can feed the translator
 */
export type KeyEventKind = 'press' | 'repeat' | 'release';

/**
 * A single key event, named the way terminal-kit names keys
 * (printable characters are the character itself: 'j', 'G', ' ', ':')
 */
export interface KeyPress {
  name: string;
  kind: KeyEventKind;
}

export interface KeyBinding {
  keys: readonly string[];
  command: Command;
  /** Shown on the help screen */
  label: string;
}

/**
 * Fixed Normal-mode bindings, in help-screen order
 */
export const KEY_BINDINGS: readonly KeyBinding[] = [
  { keys: ['k', 'UP'], command: Commands.up, label: 'move up' },
  { keys: ['j', 'DOWN'], command: Commands.down, label: 'move down' },
  { keys: ['RIGHT', 'TAB'], command: Commands.nextPanel, label: 'next panel' },
  { keys: ['LEFT', 'SHIFT_TAB'], command: Commands.prevPanel, label: 'previous panel' },
  { keys: [' '], command: Commands.togglePlay, label: 'play / pause' },
  { keys: [','], command: Commands.prevTrack, label: 'previous track' },
  { keys: ['.'], command: Commands.nextTrack, label: 'next track' },
  { keys: ['ENTER'], command: Commands.play, label: 'play selection' },
  { keys: ['ESCAPE'], command: Commands.esc, label: 'back' },
  { keys: ['r'], command: Commands.toggleRepeat, label: 'toggle repeat' },
  { keys: ['s'], command: Commands.toggleShuffle, label: 'toggle shuffle' },
  { keys: ['g'], command: Commands.gotoTop, label: 'go to top' },
  { keys: ['G'], command: Commands.gotoBottom, label: 'go to bottom' },
  { keys: ['1'], command: Commands.gotoScreen('main'), label: 'main screen' },
  { keys: ['0', 'F1'], command: Commands.gotoScreen('help'), label: 'help screen' },
  { keys: ['n'], command: Commands.newPlaylist(null), label: 'new playlist' },
  { keys: ['p'], command: Commands.playlistAdd, label: 'add to playlist' },
  { keys: ['x'], command: Commands.selectPlaylist, label: 'select playlist' },
  { keys: ['q'], command: Commands.quit, label: 'quit' },
  { keys: [':'], command: Commands.enterCommand, label: 'command line' },
];

const KEY_TO_COMMAND: ReadonlyMap<string, Command> = new Map(
  KEY_BINDINGS.flatMap((binding) => binding.keys.map((key) => [key, binding.command] as const)),
);

/**
 * Whether the translator should look at this event at all
 */
export function isActionable(key: KeyPress): boolean {
  return key.kind === 'press' || key.kind === 'repeat';
}

/**
 * Translates a Normal-mode key name into a command.
 * Unmapped keys become nop so the dispatcher can tell "nothing bound" from "queue empty".
 */
export function commandForKey(keyName: string): Command {
  return KEY_TO_COMMAND.get(keyName) ?? Commands.nop;
}

/**
 * Human-readable key name for the help screen
 */
export function displayKey(keyName: string): string {
  switch (keyName) {
    case ' ':
      return 'Space';
    case 'SHIFT_TAB':
      return 'S-Tab';
    case 'ESCAPE':
      return 'Esc';
    case 'ENTER':
      return 'Enter';
    case 'UP':
      return '↑';
    case 'DOWN':
      return '↓';
    case 'LEFT':
      return '←';
    case 'RIGHT':
      return '→';
    case 'TAB':
      return 'Tab';
    default:
      return keyName;
  }
}
