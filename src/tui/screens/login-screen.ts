/**
 * Login Screen
 *
 * Lists the profiles the music API knows about. Enter logs the selected
 * profile in; the controller notices the new session on its next model update.
 */

import type { ScreenCommand } from '../../command.js';
import type { Profile } from '../../library.js';
import type { MusicApi } from '../../music-api.js';
import type { Mutex } from '../../mutex.js';
import { DIM, RESET } from '../constants.js';
import { fitText } from '../draw.js';
import { ListPanel } from '../list-panel.js';
import { normalStyle } from '../style.js';
import type { Frame, Rect, Style } from '../types.js';
import type { Screen } from './types.js';

export const LOGIN_HINT = 'Select a profile and press Enter to log in';

export class LoginScreen implements Screen {
  private readonly api: Mutex<MusicApi>;

  // Model
  private readonly profiles = new ListPanel<Profile>();
  private loaded = false;
  private status = LOGIN_HINT;
  private shownStatus = '';

  // View
  private style: Style = normalStyle;
  private statusLine = '';

  constructor(api: Mutex<MusicApi>) {
    this.api = api;
  }

  getStatus(): string {
    return this.status;
  }

  getProfiles(): readonly Profile[] {
    return this.profiles.getItems();
  }

  /**
   * Loads the profile list once; afterwards stale only when the status text changed
   */
  async updateModel(): Promise<boolean> {
    if (!this.loaded) {
      const profiles = await this.api.runExclusive((api) => api.profiles());
      this.profiles.setItems(profiles);
      this.loaded = true;
      if (profiles.length === 0) {
        this.status = 'No profiles in the library';
      }
      this.shownStatus = this.status;
      return true;
    }

    if (this.status !== this.shownStatus) {
      this.shownStatus = this.status;
      return true;
    }
    return false;
  }

  async handleEvent(command: ScreenCommand): Promise<boolean> {
    switch (command.type) {
      case 'up':
        this.profiles.selectPrevious();
        return true;

      case 'down':
        this.profiles.selectNext();
        return true;

      case 'esc':
        this.status = LOGIN_HINT;
        return true;

      case 'play': {
        const profile = this.profiles.selected();
        if (!profile) return true;
        this.status = `Logging in as ${profile.name}...`;
        await this.api.runExclusive((api) => api.login(profile.id));
        this.status = `Logged in as ${profile.name}`;
        return true;
      }

      case 'next-panel':
      case 'prev-panel':
        return true;
    }
  }

  updateView(style: Style): void {
    this.style = style;
    this.statusLine = this.status;
  }

  draw(frame: Frame, rect: Rect): void {
    frame.fill(rect);
    if (rect.height < 3) return;

    const width = Math.min(rect.width, 48);
    const x = rect.x + Math.max(0, Math.floor((rect.width - width) / 2));
    const listHeight = Math.max(3, Math.min(rect.height - 2, this.profiles.getItems().length + 2));

    frame.write(x, rect.y, `${this.style.text}${fitText('Log in', width)}${RESET}`);
    this.profiles.draw(frame, { x, y: rect.y + 1, width, height: listHeight }, {
      title: 'Profiles',
      focused: true,
      style: this.style,
      empty: 'No profiles',
      render: (profile) => profile.name,
    });

    const statusY = rect.y + 1 + listHeight;
    if (statusY < rect.y + rect.height) {
      frame.write(x, statusY, `${DIM}${fitText(this.statusLine, width)}${RESET}`);
    }
  }
}
