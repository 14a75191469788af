import { BOLD, CYAN, DIM, INVERSE, RESET } from './constants.js';
import type { Style } from './types.js';

/**
 * The one style the app renders with
 */
export const normalStyle: Style = {
  text: RESET,
  highlight: `${INVERSE}${BOLD}`,
  muted: INVERSE,
  border: DIM,
  focusBorder: CYAN,
};
