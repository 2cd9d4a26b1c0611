/**
 * Async mutual exclusion built on a promise chain.
 *
 * Callers queue in FIFO order; a task's rejection is returned to its own
 * caller and does not poison the queue for the next one.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  get isLocked(): boolean {
    return this.pending > 0;
  }

  runExclusive<T>(task: () => Promise<T> | T): Promise<T> {
    this.pending++;
    const result = this.tail.then(() => task());
    this.tail = result.then(
      () => {
        this.pending--;
      },
      () => {
        this.pending--;
      },
    );
    return result;
  }
}
