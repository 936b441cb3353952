/**
 * @title KeyedMutex
 * @notice Serializes async tasks that share a key while letting different keys run concurrently
 * @dev Tasks for one key run in submission order. A failing task releases the key for the next one.
 */
export class KeyedMutex<K> {
  private tails = new Map<K, Promise<void>>();

  /**
   * @notice Runs `task` once every earlier task submitted for `key` has settled
   * @returns Whatever `task` resolves to; its rejection is passed through
   */
  async runExclusive<T>(key: K, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let release: () => void = () => {};
    const current = new Promise<void>(resolve => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await task();
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }
}
