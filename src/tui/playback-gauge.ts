/**
 * Playback gauge: a bordered progress bar with an elapsed/total label
 */

import { RESET } from './constants.js';
import { drawBox, innerRect } from './draw.js';
import type { Frame, Rect, Style } from './types.js';

export const EMPTY_PLAYBACK_LABEL = '--:--/--:--';

function formatTime(ms: number): string {
  const totalSeconds = Math.floor(ms / 1000);
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  return `${String(minutes).padStart(2, '0')}:${String(seconds).padStart(2, '0')}`;
}

/**
 * "MM:SS/MM:SS" for a position and duration in ms
 */
export function formatPlaybackLabel(positionMs: number, durationMs: number): string {
  return `${formatTime(positionMs)}/${formatTime(durationMs)}`;
}

export class PlaybackGauge {
  private label = EMPTY_PLAYBACK_LABEL;
  private ratio = 0;

  getLabel(): string {
    return this.label;
  }

  getRatio(): number {
    return this.ratio;
  }

  /**
   * Update label and ratio from the player. Leaves both untouched when either
   * value is missing (nothing playing).
   */
  setProgress(positionMs: number | null, durationMs: number | null): void {
    if (positionMs === null || durationMs === null) return;
    this.label = formatPlaybackLabel(positionMs, durationMs);
    this.ratio = durationMs > 0 ? Math.min(1, Math.max(0, positionMs / durationMs)) : 0;
  }

  draw(frame: Frame, rect: Rect, style: Style): void {
    frame.fill(rect);
    drawBox(frame, rect, style.border);

    const inner = innerRect(rect);
    if (inner.width <= 0 || inner.height <= 0) return;

    // Label centered over the bar; filled cells are drawn inverse
    const filled = Math.round(inner.width * this.ratio);
    const labelStart = Math.max(0, Math.floor((inner.width - this.label.length) / 2));
    const cells = ' '.repeat(inner.width).split('');
    for (let i = 0; i < this.label.length && labelStart + i < inner.width; i++) {
      cells[labelStart + i] = this.label[i];
    }

    const bar = cells.slice(0, filled).join('');
    const rest = cells.slice(filled).join('');
    frame.write(inner.x, inner.y, `${style.highlight}${bar}${RESET}${style.text}${rest}${RESET}`);
  }
}
