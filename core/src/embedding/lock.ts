/**
 * FIFO mutex: at most one task runs at a time, in submission order.
 * A failed task does not block the ones queued behind it.
 */
export class InferenceLock {
  private tail: Promise<void> = Promise.resolve();

  run<T>(task: () => Promise<T>): Promise<T> {
    const result = this.tail.then(task);
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }
}
