import * as fs from 'node:fs';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import { LibrarySchema, loadLibrary, parseLibrary } from './library.js';

vi.mock('node:fs');

const rawLibrary = {
  profiles: [
    { id: 'ana', name: 'Ana', favorites: 'liked' },
    { id: 'ben', name: 'Ben' },
  ],
  playlists: [
    {
      id: 'liked',
      name: 'Liked songs',
      tracks: [
        { id: 't1', title: 'First', artist: 'Someone', durationMs: 200_000, file: 'audio/first.mp3' },
        { id: 't2', title: 'Second', durationMs: 90_000, file: '/abs/second.ogg' },
      ],
    },
  ],
};

describe('library', () => {
  beforeEach(() => {
    vi.resetAllMocks();
  });

  describe('parseLibrary', () => {
    it('should resolve track files against the base directory', () => {
      const library = parseLibrary(rawLibrary, '/music');

      expect(library.playlists[0].tracks.map((t) => t.file)).toEqual([
        '/music/audio/first.mp3',
        '/abs/second.ogg',
      ]);
    });

    it('should fill optional fields with defaults', () => {
      const library = parseLibrary(rawLibrary, '/music');

      expect(library.playlists[0].tracks[1].artist).toBe('Unknown artist');
      expect(library.playlists[0].tracks[1].album).toBe('');
      expect(library.profiles[1].favorites).toBeNull();
    });

    it('should reject non-positive durations', () => {
      const bad = {
        profiles: [],
        playlists: [
          { id: 'p', name: 'P', tracks: [{ id: 't', title: 'T', durationMs: 0, file: 'a.mp3' }] },
        ],
      };

      expect(() => parseLibrary(bad, '/music')).toThrow();
    });
  });

  describe('LibrarySchema', () => {
    it('should reject favorites that name a missing playlist', () => {
      const result = LibrarySchema.safeParse({
        profiles: [{ id: 'ana', name: 'Ana', favorites: 'missing' }],
        playlists: [],
      });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.issues[0].message).toBe('unknown playlist "missing"');
        expect(result.error.issues[0].path).toEqual(['profiles', 0, 'favorites']);
      }
    });
  });

  describe('loadLibrary', () => {
    it('should resolve files relative to the library file', () => {
      vi.mocked(fs.readFileSync).mockReturnValue(JSON.stringify(rawLibrary));

      const library = loadLibrary('/home/listener/lib/library.json');

      expect(fs.readFileSync).toHaveBeenCalledWith('/home/listener/lib/library.json', 'utf-8');
      expect(library.playlists[0].tracks[0].file).toBe('/home/listener/lib/audio/first.mp3');
    });

    it('should throw on invalid JSON', () => {
      vi.mocked(fs.readFileSync).mockReturnValue('{');

      expect(() => loadLibrary('/home/listener/lib/library.json')).toThrow(SyntaxError);
    });
  });
});
