/**
 * FIFO mutual exclusion for async callers on one event loop. Critical
 * sections run one after another in the order `runExclusive` was called.
 */
export class AsyncLock {
  private tail: Promise<void> = Promise.resolve();
  private held = false;

  get locked(): boolean {
    return this.held;
  }

  runExclusive<T>(critical: () => T | Promise<T>): Promise<T> {
    const run = this.tail.then(async () => {
      this.held = true;
      try {
        return await critical();
      } finally {
        this.held = false;
      }
    });
    this.tail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }
}
