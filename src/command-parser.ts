/**
 * Command line parser
 *
 * Turns the text typed after ':' into a Command from the same closed vocabulary
 * as the keymap. Failures come back as structured errors; formatting them for
 * display is left to formatCommandError so parsing stays independent of the UI.
 */

import { Fzf } from 'fzf';
import { type Command, Commands, SCREEN_NAMES, type ScreenName } from './command.js';

// ============================================================================
// Types
// ============================================================================

export type CommandParseError =
  | { kind: 'unknown-command'; name: string; suggestion: string | null }
  | { kind: 'unexpected-argument'; name: string; argument: string }
  | { kind: 'missing-argument'; name: string; expected: string }
  | { kind: 'invalid-argument'; name: string; argument: string; expected: string };

export type ParseResult =
  | { ok: true; command: Command }
  | { ok: false; error: CommandParseError };

type Builder = (name: string, args: string[]) => ParseResult;

// ============================================================================
// Grammar
// ============================================================================

function noArgs(command: Command): Builder {
  return (name, args) => {
    if (args.length > 0) {
      return { ok: false, error: { kind: 'unexpected-argument', name, argument: args[0] } };
    }
    return { ok: true, command };
  };
}

function isScreenName(value: string): value is ScreenName {
  return (SCREEN_NAMES as readonly string[]).includes(value);
}

const gotoScreen: Builder = (name, args) => {
  if (args.length === 0) {
    return { ok: false, error: { kind: 'missing-argument', name, expected: SCREEN_NAMES.join('|') } };
  }
  if (args.length > 1) {
    return { ok: false, error: { kind: 'unexpected-argument', name, argument: args[1] } };
  }
  const screen = args[0].toLowerCase();
  if (!isScreenName(screen)) {
    return {
      ok: false,
      error: { kind: 'invalid-argument', name, argument: args[0], expected: SCREEN_NAMES.join('|') },
    };
  }
  return { ok: true, command: Commands.gotoScreen(screen) };
};

// Multi-word names are rejoined with single spaces
const newPlaylist: Builder = (_name, args) => ({
  ok: true,
  command: Commands.newPlaylist(args.length > 0 ? args.join(' ') : null),
});

/**
 * Command words, canonical name first in each group
 */
const GRAMMAR: ReadonlyMap<string, Builder> = new Map<string, Builder>([
  ['quit', noArgs(Commands.quit)],
  ['q', noArgs(Commands.quit)],
  ['up', noArgs(Commands.up)],
  ['down', noArgs(Commands.down)],
  ['next-panel', noArgs(Commands.nextPanel)],
  ['prev-panel', noArgs(Commands.prevPanel)],
  ['play', noArgs(Commands.play)],
  ['toggle-play', noArgs(Commands.togglePlay)],
  ['toggle', noArgs(Commands.togglePlay)],
  ['pause', noArgs(Commands.togglePlay)],
  ['prev-track', noArgs(Commands.prevTrack)],
  ['prev', noArgs(Commands.prevTrack)],
  ['next-track', noArgs(Commands.nextTrack)],
  ['next', noArgs(Commands.nextTrack)],
  ['esc', noArgs(Commands.esc)],
  ['toggle-repeat', noArgs(Commands.toggleRepeat)],
  ['repeat', noArgs(Commands.toggleRepeat)],
  ['toggle-shuffle', noArgs(Commands.toggleShuffle)],
  ['shuffle', noArgs(Commands.toggleShuffle)],
  ['goto-top', noArgs(Commands.gotoTop)],
  ['top', noArgs(Commands.gotoTop)],
  ['goto-bottom', noArgs(Commands.gotoBottom)],
  ['bottom', noArgs(Commands.gotoBottom)],
  ['screen', gotoScreen],
  ['main', noArgs(Commands.gotoScreen('main'))],
  ['help', noArgs(Commands.gotoScreen('help'))],
  ['login', noArgs(Commands.gotoScreen('login'))],
  ['new', newPlaylist],
  ['newplaylist', newPlaylist],
  ['playlist-add', noArgs(Commands.playlistAdd)],
  ['add', noArgs(Commands.playlistAdd)],
  ['select-playlist', noArgs(Commands.selectPlaylist)],
  ['select', noArgs(Commands.selectPlaylist)],
  ['enter-command', noArgs(Commands.enterCommand)],
  ['logout', noArgs(Commands.logout)],
  ['nop', noArgs(Commands.nop)],
]);

/** Words accepted as the first token */
export const COMMAND_WORDS: readonly string[] = [...GRAMMAR.keys()];

// ============================================================================
// Parsing
// ============================================================================

/**
 * Split input into whitespace-separated tokens, dropping one leading ':'
 */
export function tokenize(input: string): string[] {
  let text = input.trim();
  if (text.startsWith(':')) {
    text = text.slice(1).trim();
  }
  return text.length === 0 ? [] : text.split(/\s+/);
}

/**
 * Best fuzzy match for an unknown command word, using the fzf algorithm
 */
export function suggestCommand(word: string): string | null {
  const fzf = new Fzf(COMMAND_WORDS);
  const [best] = fzf.find(word);
  return best ? best.item : null;
}

/**
 * Parse command line text into a Command.
 * Empty input parses to nop.
 */
export function parseCommand(input: string): ParseResult {
  const tokens = tokenize(input);
  if (tokens.length === 0) {
    return { ok: true, command: Commands.nop };
  }

  const [first, ...args] = tokens;
  const name = first.toLowerCase();
  const build = GRAMMAR.get(name);
  if (!build) {
    return {
      ok: false,
      error: { kind: 'unknown-command', name: first, suggestion: suggestCommand(name) },
    };
  }
  return build(name, args);
}

/**
 * Human-readable message for the command line prompt
 */
export function formatCommandError(error: CommandParseError): string {
  switch (error.kind) {
    case 'unknown-command':
      return error.suggestion
        ? `unknown command "${error.name}", did you mean "${error.suggestion}"?`
        : `unknown command "${error.name}"`;
    case 'unexpected-argument':
      return `${error.name}: unexpected argument "${error.argument}"`;
    case 'missing-argument':
      return `${error.name}: missing argument <${error.expected}>`;
    case 'invalid-argument':
      return `${error.name}: invalid argument "${error.argument}", expected <${error.expected}>`;
  }
}
