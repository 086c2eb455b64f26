/**
 * Promise-based mutual exclusion lock.
 * Waiters are granted the lock in the order they called `acquire()`.
 */
export class Mutex {
  private locked = false;
  private waiters: Array<() => void> = [];

  /**
   * Waits for the lock and resolves with its release function.
   */
  acquire(): Promise<() => void> {
    return new Promise(resolve => {
      const grant = (): void => {
        this.locked = true;
        let released = false;
        resolve(() => {
          if (!released) {
            released = true;
            this.release();
          }
        });
      };

      if (this.locked) {
        this.waiters.push(grant);
      } else {
        grant();
      }
    });
  }

  /**
   * Runs `fn` while holding the lock.
   */
  async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  isLocked(): boolean {
    return this.locked;
  }

  private release(): void {
    const next = this.waiters.shift();
    if (next) {
      next();
    } else {
      this.locked = false;
    }
  }
}
