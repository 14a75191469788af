// Local music library
// Loads and validates the JSON library file that backs the music API

import * as fs from 'node:fs';
import * as path from 'node:path';
import { z } from 'zod';

export const TrackSchema = z.object({
  id: z.string().min(1),
  title: z.string(),
  artist: z.string().default('Unknown artist'),
  album: z.string().default(''),
  durationMs: z.number().int().positive(),
  /** Audio file, relative to the library file or absolute */
  file: z.string().min(1),
});

export const PlaylistSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  tracks: z.array(TrackSchema),
});

export const ProfileSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  /** Playlist shown on the main screen after login */
  favorites: z.string().nullable().default(null),
});

export const LibrarySchema = z
  .object({
    profiles: z.array(ProfileSchema),
    playlists: z.array(PlaylistSchema),
  })
  .superRefine((library, ctx) => {
    const playlistIds = new Set(library.playlists.map((p) => p.id));
    library.profiles.forEach((profile, index) => {
      if (profile.favorites !== null && !playlistIds.has(profile.favorites)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['profiles', index, 'favorites'],
          message: `unknown playlist "${profile.favorites}"`,
        });
      }
    });
  });

export type Track = z.infer<typeof TrackSchema>;
export type Playlist = z.infer<typeof PlaylistSchema>;
export type Profile = z.infer<typeof ProfileSchema>;
export type Library = z.infer<typeof LibrarySchema>;

/**
 * Validate raw library data, resolving track files against baseDir
 */
export function parseLibrary(data: unknown, baseDir: string): Library {
  const library = LibrarySchema.parse(data);
  return {
    profiles: library.profiles,
    playlists: library.playlists.map((playlist) => ({
      ...playlist,
      tracks: playlist.tracks.map((track) => ({
        ...track,
        file: path.resolve(baseDir, track.file),
      })),
    })),
  };
}

/**
 * Read a library file from disk.
 * Throws on missing files, invalid JSON and schema violations.
 */
export function loadLibrary(filePath: string): Library {
  const content = fs.readFileSync(filePath, 'utf-8');
  return parseLibrary(JSON.parse(content), path.dirname(filePath));
}
