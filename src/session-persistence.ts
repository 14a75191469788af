import * as fs from 'node:fs';
import * as path from 'node:path';
import { DATA_DIR } from './tui/constants.js';

export interface PersistedSession {
  profileId: string;
  savedAt: string; // ISO timestamp
}

const SESSION_FILE = 'session.json';

/** Logins older than this are treated as logged out */
export const SESSION_MAX_AGE_MS = 30 * 24 * 60 * 60 * 1000;

export function getSessionFilePath(): string {
  return path.join(DATA_DIR, SESSION_FILE);
}

export function saveSession(profileId: string, filePath: string = getSessionFilePath()): void {
  try {
    const sessionData: PersistedSession = {
      profileId,
      savedAt: new Date().toISOString(),
    };

    const dirPath = path.dirname(filePath);

    // Create data directory if it doesn't exist
    if (!fs.existsSync(dirPath)) {
      fs.mkdirSync(dirPath, { recursive: true });
    }

    fs.writeFileSync(filePath, JSON.stringify(sessionData, null, 2), 'utf-8');
  } catch {
    // Best-effort save: the login still holds for this run
  }
}

function isPersistedSession(value: unknown): value is PersistedSession {
  if (typeof value !== 'object' || value === null) return false;
  return (
    'profileId' in value &&
    typeof value.profileId === 'string' &&
    'savedAt' in value &&
    typeof value.savedAt === 'string'
  );
}

export function loadSession(filePath: string = getSessionFilePath()): PersistedSession | null {
  try {
    // Return null if file doesn't exist
    if (!fs.existsSync(filePath)) {
      return null;
    }

    const content = fs.readFileSync(filePath, 'utf-8');
    const session: unknown = JSON.parse(content);

    if (!isPersistedSession(session)) {
      return null;
    }

    const savedTime = new Date(session.savedAt).getTime();
    if (Number.isNaN(savedTime) || Date.now() - savedTime > SESSION_MAX_AGE_MS) {
      return null;
    }

    return session;
  } catch {
    // Unreadable or invalid JSON counts as logged out
    return null;
  }
}

export function clearSession(filePath: string = getSessionFilePath()): void {
  try {
    if (fs.existsSync(filePath)) {
      fs.unlinkSync(filePath);
    }
  } catch {
    // Silent on errors
  }
}
