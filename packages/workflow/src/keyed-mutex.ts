/**
 * Keyed Mutex
 *
 * Serializes async work per key. Work on different keys runs freely;
 * work on the same key runs one at a time, in arrival order.
 * Idle keys are dropped so the map does not grow with history.
 */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  async run<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => {};
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
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  /** Keys with work queued or running */
  get activeKeys(): number {
    return this.tails.size;
  }
}
