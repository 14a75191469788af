import type { ScreenCommand } from '../../command.js';
import type { Frame, Rect, Style } from '../types.js';

/**
 * Contract every screen implements. The controller decides when each runs:
 * - updateModel: once per tick while active; true means the view is stale
 * - handleEvent: for commands forwarded to the active screen; true means redraw
 * - updateView: rebuild view state from the model (only on dirty ticks)
 * - draw: paint into the screen region (only on dirty ticks)
 */
export interface Screen {
  updateModel(): Promise<boolean>;
  handleEvent(command: ScreenCommand): Promise<boolean>;
  updateView(style: Style): void;
  draw(frame: Frame, rect: Rect): void;
}
