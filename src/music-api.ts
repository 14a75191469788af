// Music API client
// The controller only sees the MusicApi contract; LocalMusicApi serves a local library

import type { Library, Playlist, Profile } from './library.js';
import { clearSession, loadSession, saveSession } from './session-persistence.js';

/**
 * Contract consumed by the controller and the login screen
 */
export interface MusicApi {
  isLogin(): boolean;
  logout(): Promise<void>;
  /** Name and contents of the logged-in user's favorite playlist */
  userFavoriteSonglist(): [string, Playlist] | null;
  profiles(): readonly Profile[];
  login(profileId: string): Promise<void>;
  currentProfile(): Profile | null;
}

/**
 * Where the login survives between runs
 */
export interface SessionStore {
  load(): string | null;
  save(profileId: string): void;
  clear(): void;
}

/**
 * Session store backed by session-persistence
 */
export function createFileSessionStore(filePath?: string): SessionStore {
  return {
    load: () => loadSession(filePath)?.profileId ?? null,
    save: (profileId) => saveSession(profileId, filePath),
    clear: () => clearSession(filePath),
  };
}

export class LocalMusicApi implements MusicApi {
  private readonly library: Library;
  private readonly sessions: SessionStore;
  private profile: Profile | null = null;

  constructor(library: Library, sessions: SessionStore) {
    this.library = library;
    this.sessions = sessions;

    // Resume a saved login if the profile still exists
    const savedId = sessions.load();
    if (savedId !== null) {
      this.profile = this.findProfile(savedId);
    }
  }

  isLogin(): boolean {
    return this.profile !== null;
  }

  async login(profileId: string): Promise<void> {
    const profile = this.findProfile(profileId);
    if (!profile) {
      throw new Error(`Unknown profile: ${profileId}`);
    }
    this.profile = profile;
    this.sessions.save(profile.id);
  }

  async logout(): Promise<void> {
    this.profile = null;
    this.sessions.clear();
  }

  currentProfile(): Profile | null {
    return this.profile;
  }

  profiles(): readonly Profile[] {
    return this.library.profiles;
  }

  userFavoriteSonglist(): [string, Playlist] | null {
    if (!this.profile || this.profile.favorites === null) return null;
    const favoritesId = this.profile.favorites;
    const playlist = this.library.playlists.find((p) => p.id === favoritesId);
    return playlist ? [playlist.name, playlist] : null;
  }

  private findProfile(profileId: string): Profile | null {
    return this.library.profiles.find((p) => p.id === profileId) ?? null;
  }
}
