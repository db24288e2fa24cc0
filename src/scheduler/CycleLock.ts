/**
 * Single-writer lock for learning cycles. Callers queue in arrival order;
 * a rejected task does not poison the queue.
 */
export class CycleLock {
  private tail: Promise<void> = Promise.resolve();
  private held = false;

  runExclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.tail.then(async () => {
      this.held = true;
      try {
        return await task();
      } finally {
        this.held = false;
      }
    });
    this.tail = run.then(() => undefined, () => undefined);
    return run;
  }

  isHeld(): boolean {
    return this.held;
  }

  /**
   * Resolves once every task queued so far has settled
   */
  idle(): Promise<void> {
    return this.tail;
  }
}
