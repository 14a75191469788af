/**
 * Shared constants for the TUI module
 */

import * as os from 'node:os';
import * as path from 'node:path';

// ============================================================================
// File Paths
// ============================================================================

/** Per-user data directory (config, library, session, debug log) */
export const DATA_DIR = path.join(os.homedir(), '.tuneterm');

/** Debug log file path (temporary, cleared each session) */
export const DEBUG_LOG_PATH = path.join(DATA_DIR, 'tuneterm.tmp.log');

/** Optional user configuration */
export const CONFIG_PATH = path.join(DATA_DIR, 'config.json');

/** Default music library */
export const DEFAULT_LIBRARY_PATH = path.join(DATA_DIR, 'library.json');

// ============================================================================
// Layout
// ============================================================================

/** Minimum height of the screen region */
export const SCREEN_MIN_HEIGHT = 3;

/** Height of the playback region (bordered gauge) */
export const PLAYBACK_HEIGHT = 3;

/** Width of the reserved strip left of the playback gauge */
export const INFO_WIDTH = 26;

/** Height of the command line */
export const COMMAND_LINE_HEIGHT = 1;

/** Fallback terminal size when the terminal does not report one */
export const DEFAULT_WIDTH = 100;
export const DEFAULT_HEIGHT = 30;

// ============================================================================
// ANSI Escape Codes
// ============================================================================

export const RESET = '\x1b[0m';

// Text styles
export const BOLD = '\x1b[1m';
export const DIM = '\x1b[2m';
export const INVERSE = '\x1b[7m';

// Colors
export const CYAN = '\x1b[36m';
