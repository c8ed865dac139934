/**
 * Per-user request queue: at most one in-flight operation per user, later
 * requests from the same user wait their turn in arrival order.
 * Different users never wait on each other.
 */
export class UserRequestLock {
  private readonly tails = new Map<string, Promise<void>>();

  /**
   * Run fn once every earlier operation for this key has settled.
   * The queue advances whether fn resolves or rejects.
   */
  async runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
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

  isBusy(key: string): boolean {
    return this.tails.has(key);
  }
}
