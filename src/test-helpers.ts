// In-process stand-ins shared by the test suites

import type { Playlist, Profile, Track } from './library.js';
import type { MusicApi } from './music-api.js';
import type { Player } from './player.js';
import type { Frame, Rect } from './tui/types.js';

// ============================================================================
// Fixtures
// ============================================================================

export function makeTrack(id: string, overrides: Partial<Track> = {}): Track {
  return {
    id,
    title: `Song ${id}`,
    artist: `Artist ${id}`,
    album: '',
    durationMs: 180_000,
    file: `/music/${id}.mp3`,
    ...overrides,
  };
}

export const likedSongs: Playlist = {
  id: 'liked',
  name: 'Liked songs',
  tracks: [makeTrack('a'), makeTrack('b'), makeTrack('c')],
};

export const ana: Profile = { id: 'ana', name: 'Ana', favorites: 'liked' };
export const ben: Profile = { id: 'ben', name: 'Ben', favorites: null };

// ============================================================================
// Collaborators
// ============================================================================

export class FakeMusicApi implements MusicApi {
  private readonly profileList: Profile[];
  private readonly playlists: Playlist[];
  private profile: Profile | null;

  constructor(options: { profiles?: Profile[]; playlists?: Playlist[]; loggedInAs?: string | null } = {}) {
    this.profileList = options.profiles ?? [ana, ben];
    this.playlists = options.playlists ?? [likedSongs];
    this.profile = this.profileList.find((p) => p.id === options.loggedInAs) ?? null;
  }

  isLogin(): boolean {
    return this.profile !== null;
  }

  async login(profileId: string): Promise<void> {
    const profile = this.profileList.find((p) => p.id === profileId);
    if (!profile) throw new Error(`Unknown profile: ${profileId}`);
    this.profile = profile;
  }

  async logout(): Promise<void> {
    this.profile = null;
  }

  currentProfile(): Profile | null {
    return this.profile;
  }

  profiles(): readonly Profile[] {
    return this.profileList;
  }

  userFavoriteSonglist(): [string, Playlist] | null {
    const favorites = this.profile?.favorites;
    const playlist = this.playlists.find((p) => p.id === favorites);
    return playlist ? [playlist.name, playlist] : null;
  }
}

export class FakePlayer implements Player {
  track: Track | null = null;
  positionMs = 0;
  readonly played: Track[] = [];

  position(): number | null {
    return this.track ? this.positionMs : null;
  }

  duration(): number | null {
    return this.track ? this.track.durationMs : null;
  }

  currentTrack(): Track | null {
    return this.track;
  }

  play(track: Track): void {
    this.track = track;
    this.positionMs = 0;
    this.played.push(track);
  }

  stop(): void {
    this.track = null;
  }
}

// ============================================================================
// Frame
// ============================================================================

export function stripAnsi(text: string): string {
  return text.replace(/\x1b\[[0-9;]*m/g, '');
}

/**
 * Frame that records every call instead of drawing
 */
export class RecordingFrame implements Frame {
  readonly writes: Array<{ x: number; y: number; text: string }> = [];
  readonly fills: Rect[] = [];
  private readonly width: number;
  private readonly height: number;

  constructor(width = 80, height = 24) {
    this.width = width;
    this.height = height;
  }

  size(): { width: number; height: number } {
    return { width: this.width, height: this.height };
  }

  write(x: number, y: number, text: string): void {
    this.writes.push({ x, y, text });
  }

  fill(rect: Rect): void {
    this.fills.push({ ...rect });
  }

  /** Plain text of the last write that started at x,y */
  textAt(x: number, y: number): string | null {
    const found = this.writes.filter((w) => w.x === x && w.y === y).pop();
    return found ? stripAnsi(found.text) : null;
  }

  /** Every write, ANSI stripped, one per line */
  plainText(): string {
    return this.writes.map((w) => stripAnsi(w.text)).join('\n');
  }

  clear(): void {
    this.writes.length = 0;
    this.fills.length = 0;
  }
}
