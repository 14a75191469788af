/**
 * Small drawing helpers shared by widgets and screens
 */

import { RESET } from './constants.js';
import type { Frame, Rect } from './types.js';

/**
 * Pad or cut plain text to exactly `width` columns
 */
export function fitText(text: string, width: number): string {
  if (width <= 0) return '';
  if (text.length > width) {
    return width === 1 ? text.slice(0, 1) : `${text.slice(0, width - 1)}…`;
  }
  return text.padEnd(width);
}

/**
 * Area inside a one-cell border
 */
export function innerRect(rect: Rect): Rect {
  return {
    x: rect.x + 1,
    y: rect.y + 1,
    width: Math.max(0, rect.width - 2),
    height: Math.max(0, rect.height - 2),
  };
}

/**
 * Draw a single-line box with an optional title on the top edge
 */
export function drawBox(frame: Frame, rect: Rect, color: string, title = ''): void {
  if (rect.width < 2 || rect.height < 2) return;

  const inner = rect.width - 2;
  const label = title ? fitText(` ${title} `, Math.min(title.length + 2, inner)) : '';
  const top = `┌${label}${'─'.repeat(inner - label.length)}┐`;
  const bottom = `└${'─'.repeat(inner)}┘`;

  frame.write(rect.x, rect.y, `${color}${top}${RESET}`);
  for (let row = 1; row < rect.height - 1; row++) {
    frame.write(rect.x, rect.y + row, `${color}│${RESET}`);
    frame.write(rect.x + rect.width - 1, rect.y + row, `${color}│${RESET}`);
  }
  frame.write(rect.x, rect.y + rect.height - 1, `${color}${bottom}${RESET}`);
}

/**
 * First visible index so that `selected` stays inside a window of `height` rows
 */
export function scrollOffsetFor(selected: number, height: number, previous: number): number {
  if (height <= 0) return 0;
  if (selected < previous) return selected;
  if (selected >= previous + height) return selected - height + 1;
  return previous;
}
