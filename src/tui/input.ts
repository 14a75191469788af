/**
 * Key reader
 *
 * terminal-kit pushes key events as they arrive; the event loop pulls them one
 * per tick. next() waits at most one tick for a key so the playback gauge keeps
 * moving while the user is idle.
 */

import type { KeyPress } from '../keymap.js';

type Waiter = (key: KeyPress | null) => void;

export class KeyReader {
  private readonly pending: KeyPress[] = [];
  private waiter: Waiter | null = null;
  private timer: NodeJS.Timeout | null = null;
  private closed = false;

  /**
   * Queue a key event (terminal-kit names keys by their printable character or 'ENTER', 'UP', ...)
   */
  push(name: string): void {
    if (this.closed) return;
    const key: KeyPress = { name, kind: 'press' };
    if (this.waiter) {
      this.settle(key);
      return;
    }
    this.pending.push(key);
  }

  /**
   * Oldest queued key, or the next one to arrive within timeoutMs; null on timeout
   */
  next(timeoutMs: number): Promise<KeyPress | null> {
    const queued = this.pending.shift();
    if (queued) return Promise.resolve(queued);
    if (this.closed) return Promise.resolve(null);

    // Only the event loop reads, so a previous wait is always settled by now
    this.settle(null);
    return new Promise((resolve) => {
      this.waiter = resolve;
      this.timer = setTimeout(() => this.settle(null), timeoutMs);
    });
  }

  /**
   * End a pending wait early without a key (terminal resized)
   */
  wake(): void {
    this.settle(null);
  }

  size(): number {
    return this.pending.length;
  }

  close(): void {
    this.closed = true;
    this.pending.length = 0;
    this.settle(null);
  }

  private settle(key: KeyPress | null): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    const waiter = this.waiter;
    this.waiter = null;
    waiter?.(key);
  }
}
