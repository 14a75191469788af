/**
 * Main Screen
 *
 * Two panels: the tracks of the loaded playlist and the tracks played this
 * session. Enter plays the selection of the focused panel.
 */

import type { ScreenCommand } from '../../command.js';
import type { Playlist, Track } from '../../library.js';
import type { Mutex } from '../../mutex.js';
import type { Player } from '../../player.js';
import { BOLD, RESET } from '../constants.js';
import { fitText } from '../draw.js';
import { ListPanel } from '../list-panel.js';
import { normalStyle } from '../style.js';
import type { Frame, Rect, Style } from '../types.js';
import type { Screen } from './types.js';

export type MainPanel = 'tracks' | 'history';

const PANELS: readonly MainPanel[] = ['tracks', 'history'];

/** Share of the width given to the tracks panel */
const TRACKS_WIDTH_RATIO = 0.6;

function formatDuration(ms: number): string {
  const totalSeconds = Math.floor(ms / 1000);
  return `${Math.floor(totalSeconds / 60)}:${String(totalSeconds % 60).padStart(2, '0')}`;
}

export class MainScreen implements Screen {
  private readonly player: Mutex<Player>;

  // Model
  private playlistName: string | null = null;
  private readonly tracks = new ListPanel<Track>();
  private readonly history = new ListPanel<Track>();
  private focus: MainPanel = 'tracks';
  private nowPlaying: Track | null = null;

  // View
  private style: Style = normalStyle;
  private header = '';

  constructor(player: Mutex<Player>) {
    this.player = player;
  }

  updatePlaylistModel(name: string, playlist: Playlist): void {
    this.playlistName = name;
    this.tracks.setItems(playlist.tracks);
    this.tracks.selectFirst();
  }

  getPlaylistName(): string | null {
    return this.playlistName;
  }

  getFocus(): MainPanel {
    return this.focus;
  }

  getHistory(): readonly Track[] {
    return this.history.getItems();
  }

  getNowPlaying(): Track | null {
    return this.nowPlaying;
  }

  selectedTrack(): Track | null {
    return this.focusedList().selected();
  }

  /**
   * Stale when the player moved to another track (or stopped) since the last tick
   */
  async updateModel(): Promise<boolean> {
    const current = await this.player.runExclusive((player) => player.currentTrack());
    if ((current?.id ?? null) === (this.nowPlaying?.id ?? null)) {
      return false;
    }
    this.nowPlaying = current;
    return true;
  }

  // Every handled command redraws, even when nothing visibly changed
  async handleEvent(command: ScreenCommand): Promise<boolean> {
    switch (command.type) {
      case 'up':
        this.focusedList().selectPrevious();
        return true;

      case 'down':
        this.focusedList().selectNext();
        return true;

      case 'next-panel':
        this.focus = PANELS[(PANELS.indexOf(this.focus) + 1) % PANELS.length];
        return true;

      case 'prev-panel':
        this.focus = PANELS[(PANELS.indexOf(this.focus) + PANELS.length - 1) % PANELS.length];
        return true;

      case 'esc':
        this.focus = 'tracks';
        return true;

      case 'play': {
        const track = this.focusedList().selected();
        if (!track) return true;
        await this.player.runExclusive((player) => player.play(track));
        this.addToHistory(track);
        return true;
      }
    }
  }

  updateView(style: Style): void {
    this.style = style;
    const playing = this.nowPlaying
      ? `▶ ${this.nowPlaying.title} · ${this.nowPlaying.artist}`
      : 'Nothing playing';
    this.header = `${this.playlistName ?? 'No playlist'}  ·  ${playing}`;
  }

  draw(frame: Frame, rect: Rect): void {
    frame.fill(rect);
    if (rect.height < 1) return;

    frame.write(rect.x, rect.y, `${BOLD}${fitText(this.header, rect.width)}${RESET}`);

    const body: Rect = { x: rect.x, y: rect.y + 1, width: rect.width, height: rect.height - 1 };
    const tracksWidth = Math.floor(body.width * TRACKS_WIDTH_RATIO);
    const nowPlayingId = this.nowPlaying?.id ?? null;

    this.tracks.draw(frame, { ...body, width: tracksWidth }, {
      title: 'Tracks',
      focused: this.focus === 'tracks',
      style: this.style,
      empty: 'Playlist is empty',
      render: (track) =>
        `${track.id === nowPlayingId ? '▶' : ' '} ${track.title} - ${track.artist}  ${formatDuration(track.durationMs)}`,
    });

    this.history.draw(
      frame,
      { ...body, x: body.x + tracksWidth, width: body.width - tracksWidth },
      {
        title: 'Recently played',
        focused: this.focus === 'history',
        style: this.style,
        empty: 'Nothing played yet',
        render: (track) => `${track.title} - ${track.artist}`,
      },
    );
  }

  private focusedList(): ListPanel<Track> {
    return this.focus === 'tracks' ? this.tracks : this.history;
  }

  // Most recent first, each track listed once
  private addToHistory(track: Track): void {
    const rest = this.history.getItems().filter((t) => t.id !== track.id);
    this.history.setItems([track, ...rest]);
  }
}
