/**
 * Serializes async tasks per key. Tasks queued under the same key run one
 * after another in call order; different keys run independently.
 */
export class KeyedLock {
  private readonly tails = new Map<string, Promise<void>>();

  run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(task);
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
}

/** Shared by every CacheManager in the process unless one is injected */
export const artifactLock = new KeyedLock();
