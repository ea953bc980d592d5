/**
 * One FIFO async mutex per key. Holders of different keys never wait on
 * each other; the map entry for a key is dropped once its queue drains.
 */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  async acquire(key: string): Promise<() => void> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let unlock: () => void = () => {};
    const current = new Promise<void>((resolve) => {
      unlock = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;

    let released = false;
    return () => {
      if (released) return;
      released = true;
      unlock();
      if (this.tails.get(key) === tail) this.tails.delete(key);
    };
  }

  async runExclusive<T>(key: string, fn: () => Promise<T> | T): Promise<T> {
    const release = await this.acquire(key);
    try {
      return await fn();
    } finally {
      release();
    }
  }

  /** True while someone holds or waits for `key`. */
  isLocked(key: string): boolean {
    return this.tails.has(key);
  }
}
