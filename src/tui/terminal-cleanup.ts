/**
 * Terminal setup and teardown
 *
 * The player takes over the terminal with terminal-kit (alternate screen,
 * raw input, hidden cursor). restoreTerminal must run on every exit path,
 * including errors, so the shell is left usable.
 */

import termKit from 'terminal-kit';

const term = termKit.terminal;

/**
 * Enter the alternate screen and start reading raw keys
 */
export function setupTerminal(): void {
  term.fullscreen(true);
  term.hideCursor();
  term.grabInput(true);
  term.clear();
}

/**
 * Leave the alternate screen and give input back to the shell
 */
export function restoreTerminal(): void {
  term.clear();

  term.grabInput(false);
  term.fullscreen(false);
  term.styleReset();

  // terminal-kit leaves raw mode on after grabInput(false) on some terminals
  if (process.stdin.isTTY && process.stdin.setRawMode) {
    process.stdin.setRawMode(false);
  }

  process.stdout.write('\x1b[?25h'); // Show cursor
  process.stdout.write('\x1b[2J'); // Clear entire screen
  process.stdout.write('\x1b[H'); // Cursor home
}
