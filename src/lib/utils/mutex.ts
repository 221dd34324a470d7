/**
 * Async mutual exclusion, one queue per key
 */

type Release = () => void;

class Mutex {
  private locked = false;
  private readonly queue: Array<() => void> = [];

  acquire(): Promise<Release> {
    return new Promise((resolve) => {
      const release = () => {
        const next = this.queue.shift();
        if (next) {
          next();
          return;
        }
        this.locked = false;
      };

      if (!this.locked) {
        this.locked = true;
        resolve(release);
        return;
      }

      this.queue.push(() => resolve(release));
    });
  }

  get idle(): boolean {
    return !this.locked && this.queue.length === 0;
  }
}

export class KeyedMutex {
  private readonly locks = new Map<string, Mutex>();

  /**
   * Run fn while holding the lock for key; callers on other keys are not blocked
   */
  async runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
    let mutex = this.locks.get(key);
    if (!mutex) {
      mutex = new Mutex();
      this.locks.set(key, mutex);
    }

    const release = await mutex.acquire();
    try {
      return await fn();
    } finally {
      release();
      if (mutex.idle) {
        this.locks.delete(key);
      }
    }
  }

  get size(): number {
    return this.locks.size;
  }
}
