/**
 * Shared types for the TUI components
 */

/**
 * A rectangle in terminal coordinates (1-indexed, like terminal-kit's moveTo)
 */
export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

/**
 * ANSI prefixes a widget renders with
 */
export interface Style {
  /** Regular text */
  text: string;
  /** Selected row in the focused panel */
  highlight: string;
  /** Selected row in an unfocused panel */
  muted: string;
  /** Panel borders and titles */
  border: string;
  /** Borders of the focused panel */
  focusBorder: string;
}

/**
 * Drawing surface handed to widgets.
 * Text written past the end of a rect is the caller's problem; widgets clip first.
 */
export interface Frame {
  /** Terminal size in columns/rows */
  size(): { width: number; height: number };
  /** Write already-styled text at x,y */
  write(x: number, y: number, text: string): void;
  /** Blank out a rect */
  fill(rect: Rect): void;
}
