/**
 * Per-key mutual exclusion. Callers on the same key run one at a time in
 * arrival order; different keys never wait on each other.
 *
 * @example
 * ```typescript
 * const locks = new KeyedLock();
 * await locks.runExclusive('transactions:42', () => commit());
 * ```
 */
export class KeyedLock {
  /** Tail of the wait chain per key; absent when the key is free */
  private readonly tails = new Map<string, Promise<void>>();

  async runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const held = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => held);
    this.tails.set(key, tail);

    await previous;
    try {
      return await fn();
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  isLocked(key: string): boolean {
    return this.tails.has(key);
  }

  get size(): number {
    return this.tails.size;
  }
}
