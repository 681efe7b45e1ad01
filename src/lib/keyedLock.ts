// ============================================
// Keyed lock — serializes async work per key within this process
// ============================================

export class KeyedLock {
  private readonly tails = new Map<string, Promise<void>>();

  /**
   * Run `task` after every earlier task for the same key has settled.
   * A failing task does not block the ones queued behind it.
   */
  async run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => {};
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    try {
      await previous;
      return await task();
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  /** Keys with queued or running work */
  get activeKeys(): number {
    return this.tails.size;
  }
}
