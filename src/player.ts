/**
 * Audio player
 *
 * Plays track files through the play-sound package, which shells out to
 * whatever player the platform has:
 * - Mac: afplay
 * - Linux: aplay, mpg123, mpg321, play, mplayer, etc.
 * - Windows: powershell, cmdmp3
 *
 * Position is derived from wall-clock time since the process started.
 */

import type { ChildProcess } from 'node:child_process';
import playSound from 'play-sound';
import type { Track } from './library.js';

/**
 * Contract consumed by the controller and the main screen.
 * Times are in milliseconds.
 */
export interface Player {
  position(): number | null;
  duration(): number | null;
  currentTrack(): Track | null;
  play(track: Track): void;
  stop(): void;
}

export interface SoundPlayerOptions {
  /** Clock used for position tracking */
  now?: () => number;
  /** Called when a track process fails (missing file, no audio player found) */
  onError?: (track: Track, error: unknown) => void;
}

export class SoundPlayer implements Player {
  private readonly backend = playSound();
  private readonly now: () => number;
  private readonly onError: (track: Track, error: unknown) => void;

  private track: Track | null = null;
  private startedAt = 0;
  private process: ChildProcess | null = null;
  // Bumped on every play/stop so a late exit callback from an old process is ignored
  private generation = 0;

  constructor(options: SoundPlayerOptions = {}) {
    this.now = options.now ?? Date.now;
    this.onError = options.onError ?? (() => undefined);
  }

  play(track: Track): void {
    this.stop();

    const generation = this.generation;
    this.track = track;
    this.startedAt = this.now();
    this.process = this.backend.play(track.file, (err) => {
      if (generation !== this.generation) return;
      if (err) {
        this.onError(track, err);
      }
      this.track = null;
      this.process = null;
    }) as ChildProcess;
  }

  stop(): void {
    this.generation++;
    if (this.process) {
      this.process.kill();
      this.process = null;
    }
    this.track = null;
  }

  currentTrack(): Track | null {
    return this.track;
  }

  position(): number | null {
    if (!this.track) return null;
    const elapsed = this.now() - this.startedAt;
    return Math.min(Math.max(0, elapsed), this.track.durationMs);
  }

  duration(): number | null {
    return this.track ? this.track.durationMs : null;
  }
}
