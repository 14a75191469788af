/**
 * Help Screen
 *
 * Static reference of the key bindings and command-line words.
 * Up/Down scroll when the list does not fit.
 */

import type { ScreenCommand } from '../../command.js';
import { COMMAND_WORDS } from '../../command-parser.js';
import { displayKey, KEY_BINDINGS } from '../../keymap.js';
import { BOLD, RESET } from '../constants.js';
import { fitText } from '../draw.js';
import type { Frame, Rect, Style } from '../types.js';
import type { Screen } from './types.js';

const KEY_COLUMN_WIDTH = 16;

/**
 * Text lines of the help page
 */
export function buildHelpLines(): string[] {
  const lines = ['Keys', ''];
  for (const binding of KEY_BINDINGS) {
    const keys = binding.keys.map(displayKey).join(' / ');
    lines.push(`  ${keys.padEnd(KEY_COLUMN_WIDTH)}${binding.label}`);
  }
  lines.push('', 'Commands (type after :)', '');
  lines.push(`  ${COMMAND_WORDS.join('  ')}`);
  lines.push(`  screen <main|help|login>    new [playlist name]`);
  return lines;
}

export class HelpScreen implements Screen {
  private readonly lines = buildHelpLines();
  private style: Style;
  private offset = 0;
  private visibleRows = 0;

  constructor(style: Style) {
    this.style = style;
  }

  getOffset(): number {
    return this.offset;
  }

  // Nothing here changes on its own
  async updateModel(): Promise<boolean> {
    return false;
  }

  async handleEvent(command: ScreenCommand): Promise<boolean> {
    const maxOffset = Math.max(0, this.lines.length - this.visibleRows);
    switch (command.type) {
      case 'up':
        this.offset = Math.max(0, this.offset - 1);
        return true;
      case 'down':
        this.offset = Math.min(maxOffset, this.offset + 1);
        return true;
      case 'esc':
        this.offset = 0;
        return true;
      default:
        return true;
    }
  }

  updateView(style: Style): void {
    this.style = style;
  }

  draw(frame: Frame, rect: Rect): void {
    frame.fill(rect);
    this.visibleRows = rect.height;

    const visible = this.lines.slice(this.offset, this.offset + rect.height);
    visible.forEach((line, row) => {
      const color = line.startsWith('  ') || line === '' ? this.style.text : BOLD;
      frame.write(rect.x, rect.y + row, `${color}${fitText(line, rect.width)}${RESET}`);
    });
  }
}
