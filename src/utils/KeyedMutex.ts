/**
 * FIFO mutual exclusion per key. Holders of different keys never wait on each other.
 */
export class KeyedMutex<K> {
  private tails = new Map<K, Promise<void>>();

  /**
   * Wait for the key and return its release function (idempotent)
   */
  acquire(key: K): Promise<() => void> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let releaseCurrent: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      releaseCurrent = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    return previous.then(() => {
      let released = false;
      return () => {
        if (released) return;
        released = true;
        releaseCurrent();
        if (this.tails.get(key) === tail) {
          this.tails.delete(key);
        }
      };
    });
  }

  async runExclusive<T>(key: K, fn: () => Promise<T>): Promise<T> {
    const release = await this.acquire(key);
    try {
      return await fn();
    } finally {
      release();
    }
  }

  isLocked(key: K): boolean {
    return this.tails.has(key);
  }
}
