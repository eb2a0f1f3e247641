/**
 * Per-key async critical sections. Tasks for one key run strictly one after
 * another in arrival order; tasks for different keys never wait on each other.
 *
 * @example
 * ```typescript
 * const locks = new KeyedLock()
 * await locks.run('video_123', async () => cache.put(...))
 * ```
 */
export class KeyedLock {
  private tails = new Map<string, Promise<void>>();

  run = <T>(key: string, task: () => Promise<T>): Promise<T> => {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(task);
    // the chain continues whether or not this task fails
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
  };

  activeKeys = (): number => this.tails.size;
}
