/**
 * Screen components re-export
 */

export { HelpScreen, buildHelpLines } from './help-screen.js';
export { LOGIN_HINT, LoginScreen } from './login-screen.js';
export { MainScreen, type MainPanel } from './main-screen.js';
export type { Screen } from './types.js';
