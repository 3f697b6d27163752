/** Promise-chain mutex; waiters run in arrival order. */
export class AsyncMutex {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  /** True when nobody holds or waits for the lock. */
  get isIdle(): boolean {
    return this.pending === 0;
  }

  async runExclusive<T>(operation: () => Promise<T> | T): Promise<T> {
    this.pending += 1;
    const { wait, release } = this.enqueue();
    try {
      await wait;
      return await operation();
    } finally {
      this.pending -= 1;
      release();
    }
  }

  private enqueue(): { wait: Promise<void>; release: () => void } {
    let release: () => void = () => undefined;
    const next = new Promise<void>((resolve) => {
      release = resolve;
    });
    const previous = this.tail;
    this.tail = previous.then(() => next);
    return { wait: previous, release };
  }
}
