/**
 * Frame layout
 *
 * ┌──────────────────────────────┐
 * │ screen (flexible, >= 3 rows) │
 * ├────────────┬─────────────────┤
 * │ info (26)  │ playback gauge  │  3 rows
 * ├────────────┴─────────────────┤
 * │ command line                 │  1 row
 * └──────────────────────────────┘
 */

import {
  COMMAND_LINE_HEIGHT,
  INFO_WIDTH,
  PLAYBACK_HEIGHT,
  SCREEN_MIN_HEIGHT,
} from './constants.js';
import type { Rect } from './types.js';

export interface FrameLayout {
  screen: Rect;
  /** Reserved strip left of the gauge; nothing draws here yet */
  info: Rect;
  gauge: Rect;
  commandLine: Rect;
}

export function computeFrameLayout(width: number, height: number): FrameLayout {
  const screenHeight = Math.max(SCREEN_MIN_HEIGHT, height - PLAYBACK_HEIGHT - COMMAND_LINE_HEIGHT);
  const playbackY = 1 + screenHeight;
  const commandLineY = playbackY + PLAYBACK_HEIGHT;

  const infoWidth = Math.min(INFO_WIDTH, width);

  return {
    screen: { x: 1, y: 1, width, height: screenHeight },
    info: { x: 1, y: playbackY, width: infoWidth, height: PLAYBACK_HEIGHT },
    gauge: {
      x: 1 + infoWidth,
      y: playbackY,
      width: Math.max(0, width - infoWidth),
      height: PLAYBACK_HEIGHT,
    },
    commandLine: { x: 1, y: commandLineY, width, height: COMMAND_LINE_HEIGHT },
  };
}
