/**
 * In-process mutual exclusion keyed by resource name.
 *
 * Callers for the same key run one at a time in arrival order; different keys
 * never wait on each other.
 */
export class KeyedLock {
  private tails = new Map<string, Promise<void>>();

  /**
   * Run `fn` once every earlier holder of `key` has finished
   */
  async runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const current = previous.then(fn);
    const tail = current.then(
      () => undefined,
      () => undefined
    );
    this.tails.set(key, tail);

    try {
      return await current;
    } finally {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }
}
