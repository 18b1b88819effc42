// ── Per-thread serialization ─────────────────────────────
// Turns on the same thread run one after another; other threads are unaffected.

export class ThreadLock {
  private tails = new Map<string, Promise<void>>();

  async run<T>(threadId: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(threadId) ?? Promise.resolve();
    let release: () => void = () => {};
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(threadId, tail);

    await previous;
    try {
      return await fn();
    } finally {
      release();
      if (this.tails.get(threadId) === tail) {
        this.tails.delete(threadId);
      }
    }
  }

  /** Threads with a turn running or queued. */
  get activeThreads(): number {
    return this.tails.size;
  }
}
