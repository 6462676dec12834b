//shardcore/core/KeyedMutex.ts

/**
 * One-writer-at-a-time per key. Callers for the same key run in arrival
 * order; different keys never wait on each other.
 */
export class KeyedMutex<K> {
  private readonly tails = new Map<K, Promise<void>>();

  isLocked(key: K): boolean {
    return this.tails.has(key);
  }

  async runExclusive<T>(key: K, fn: () => Promise<T> | T): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });

    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    try {
      await previous;
      return await fn();
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }
}
