/**
 * Debug log
 *
 * Plain-text session log written next to the user's data. The file is
 * truncated at startup and appended to for every controller event.
 * Logging is best-effort: write failures never reach the UI.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { DEBUG_LOG_PATH } from './tui/constants.js';

export type DebugLogType = 'command' | 'screen' | 'mode' | 'api' | 'player' | 'system' | 'error';

export type DebugLogEntry = {
  type: DebugLogType;
  text: string;
  details?: unknown;
};

export type DebugLogger = (entry: DebugLogEntry) => void;

/** Logger that drops everything */
export const silentLogger: DebugLogger = () => undefined;

/**
 * Format one entry as it appears in the log file
 */
export function formatDebugLogEntry(entry: DebugLogEntry, now: Date = new Date()): string {
  let logLine = `[${now.toISOString()}] [${entry.type.toUpperCase()}] ${entry.text}`;

  // Add full details as JSON if present
  if (entry.details !== undefined) {
    logLine += `\n    DETAILS: ${JSON.stringify(entry.details, null, 2).split('\n').join('\n    ')}`;
  }

  return `${logLine}\n`;
}

function ensureDir(logPath: string): void {
  const dir = path.dirname(logPath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
}

/**
 * Truncate the log and write the session header
 */
export function startDebugLog(logPath: string = DEBUG_LOG_PATH): void {
  try {
    ensureDir(logPath);
    fs.writeFileSync(logPath, `=== tuneterm session ${new Date().toISOString()} ===\n\n`);
  } catch {
    // Logging is optional
  }
}

/**
 * Creates a logger appending to the given file
 */
export function createDebugLogger(logPath: string = DEBUG_LOG_PATH): DebugLogger {
  return (entry) => {
    try {
      ensureDir(logPath);
      fs.appendFileSync(logPath, formatDebugLogEntry(entry));
    } catch {
      // Silently ignore write errors
    }
  };
}
