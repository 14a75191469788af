/**
 * Command line widget
 *
 * Single-row text input at the bottom of the frame. Holds the prompt glyph,
 * the text typed in command-entry mode and transient messages shown in place
 * of that text.
 */

import { INVERSE, RESET } from './constants.js';
import type { Frame, Rect, Style } from './types.js';
import { normalStyle } from './style.js';

/**
 * Whether a terminal-kit key name is a printable character
 */
function isPrintable(key: string): boolean {
  const chars = [...key];
  if (chars.length !== 1) return false;
  const code = key.codePointAt(0) ?? 0;
  return code >= 32 && code !== 127;
}

export class CommandLine {
  private prompt = '';
  private buffer = '';
  private cursorPos = 0; // Index into buffer
  private cursorVisible = false;
  private style: Style = normalStyle;

  /**
   * Clear prompt, text and cursor
   */
  reset(): void {
    this.prompt = '';
    this.buffer = '';
    this.cursorPos = 0;
  }

  setPrompt(text: string): void {
    this.prompt = text;
  }

  getPrompt(): string {
    return this.prompt;
  }

  setCursorVisibility(visible: boolean): void {
    this.cursorVisible = visible;
  }

  isCursorVisible(): boolean {
    return this.cursorVisible;
  }

  getContents(): string {
    return this.buffer;
  }

  getCursorPos(): number {
    return this.cursorPos;
  }

  /**
   * Insert text at the cursor
   */
  insertStr(text: string): void {
    this.buffer = this.buffer.slice(0, this.cursorPos) + text + this.buffer.slice(this.cursorPos);
    this.cursorPos += text.length;
  }

  /**
   * Apply one key to the text. Returns whether the key was consumed.
   */
  input(key: string): boolean {
    switch (key) {
      case 'BACKSPACE':
        if (this.cursorPos > 0) {
          // Delete character before cursor
          this.buffer = this.buffer.slice(0, this.cursorPos - 1) + this.buffer.slice(this.cursorPos);
          this.cursorPos--;
        }
        return true;

      case 'DELETE':
        if (this.cursorPos < this.buffer.length) {
          // Delete character at cursor
          this.buffer = this.buffer.slice(0, this.cursorPos) + this.buffer.slice(this.cursorPos + 1);
        }
        return true;

      case 'LEFT':
        this.cursorPos = Math.max(0, this.cursorPos - 1);
        return true;

      case 'RIGHT':
        this.cursorPos = Math.min(this.buffer.length, this.cursorPos + 1);
        return true;

      case 'HOME':
      case 'CTRL_A':
        this.cursorPos = 0;
        return true;

      case 'END':
      case 'CTRL_E':
        this.cursorPos = this.buffer.length;
        return true;

      case 'CTRL_U':
        // Delete everything before the cursor
        this.buffer = this.buffer.slice(this.cursorPos);
        this.cursorPos = 0;
        return true;

      default:
        if (isPrintable(key)) {
          this.insertStr(key);
          return true;
        }
        return false;
    }
  }

  updateView(style: Style): void {
    this.style = style;
  }

  draw(frame: Frame, rect: Rect): void {
    frame.fill(rect);
    if (rect.width <= 0 || rect.height <= 0) return;

    const text = this.prompt + this.buffer;
    const cursorCol = this.prompt.length + this.cursorPos;

    // Scroll horizontally so the cursor cell stays on screen
    const start = Math.max(0, cursorCol - rect.width + 1);
    const visible = text.slice(start, start + rect.width);

    frame.write(rect.x, rect.y, `${this.style.text}${visible}${RESET}`);

    if (this.cursorVisible) {
      const under = text[cursorCol] ?? ' ';
      frame.write(rect.x + cursorCol - start, rect.y, `${INVERSE}${under}${RESET}`);
    }
  }
}
