/**
 * Keyed Mutex
 *
 * Per-key mutual exclusion for async critical sections. Each key holds the
 * tail of a promise chain; a new holder waits on the tail, then becomes it.
 * Not re-entrant: a holder that calls runExclusive on its own key deadlocks.
 */

export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  /**
   * Run `fn` once every earlier holder of `key` has finished. The result or
   * error of `fn` is passed through; the lock is released either way.
   */
  public async runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await fn();
    } finally {
      release();
      // Drop the entry once nobody is queued behind us
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  /**
   * True while some caller holds or waits for `key`.
   */
  public isLocked(key: string): boolean {
    return this.tails.has(key);
  }
}
