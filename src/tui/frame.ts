/**
 * Terminal-Kit backed drawing surface
 */

import termKit from 'terminal-kit';
import { DEFAULT_HEIGHT, DEFAULT_WIDTH } from './constants.js';
import type { Frame, Rect } from './types.js';

const term = termKit.terminal;

export class TerminalFrame implements Frame {
  size(): { width: number; height: number } {
    let width = DEFAULT_WIDTH;
    let height = DEFAULT_HEIGHT;

    if (typeof term.width === 'number' && Number.isFinite(term.width) && term.width > 0) {
      width = term.width;
    }
    if (typeof term.height === 'number' && Number.isFinite(term.height) && term.height > 0) {
      height = term.height;
    }

    return { width, height };
  }

  write(x: number, y: number, text: string): void {
    term.moveTo(x, y);
    process.stdout.write(text);
  }

  fill(rect: Rect): void {
    const blank = ' '.repeat(Math.max(0, rect.width));
    for (let row = 0; row < rect.height; row++) {
      term.moveTo(rect.x, rect.y + row);
      process.stdout.write(blank);
    }
  }
}
