/**
 * Exclusive-access guard for shared collaborators
 *
 * The API client and the player are shared with background work outside the
 * controller. Each lives behind a Mutex; callers lock it for one logical
 * operation and release before doing anything else.
 */

export interface MutexGuard<T> {
  readonly value: T;
  /** Releases the lock. Calling it more than once has no effect. */
  release(): void;
}

export class Mutex<T> {
  private readonly value: T;
  private locked = false;
  private readonly waiters: Array<() => void> = [];

  constructor(value: T) {
    this.value = value;
  }

  /**
   * Wait for exclusive access. Waiters are served in arrival order.
   */
  lock(): Promise<MutexGuard<T>> {
    return new Promise((resolve) => {
      const grant = () => {
        this.locked = true;
        resolve(this.createGuard());
      };

      if (this.locked) {
        this.waiters.push(grant);
      } else {
        grant();
      }
    });
  }

  /**
   * Run one operation with the lock held, releasing it even when the operation throws
   */
  async runExclusive<R>(fn: (value: T) => R | Promise<R>): Promise<R> {
    const guard = await this.lock();
    try {
      return await fn(guard.value);
    } finally {
      guard.release();
    }
  }

  isLocked(): boolean {
    return this.locked;
  }

  private createGuard(): MutexGuard<T> {
    let released = false;
    return {
      value: this.value,
      release: () => {
        if (released) return;
        released = true;
        const next = this.waiters.shift();
        if (next) {
          next();
        } else {
          this.locked = false;
        }
      },
    };
  }
}
