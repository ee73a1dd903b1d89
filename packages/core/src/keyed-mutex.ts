/**
 * Per-key mutual exclusion.
 *
 * Work submitted for one key runs strictly one at a time, in submission
 * order. Work for different keys never waits on each other. The chain for a
 * key is dropped as soon as it drains, so the map only holds busy keys.
 */
export class KeyedMutex {
  private tails = new Map<string, Promise<void>>();

  run<T>(key: string, fn: () => Promise<T> | T): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(() => fn());
    const tail = result.then(
      () => undefined,
      () => undefined,
    );
    this.tails.set(key, tail);
    void tail.then(() => {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    });
    return result;
  }

  isLocked(key: string): boolean {
    return this.tails.has(key);
  }

  /** Number of keys with queued or running work. */
  get size(): number {
    return this.tails.size;
  }
}
