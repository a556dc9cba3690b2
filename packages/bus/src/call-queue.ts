/**
 * Runs tasks one at a time in the order they were queued. A failed task
 * does not stop the ones behind it.
 */
export class CallQueue {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  get length(): number {
    return this.pending;
  }

  run<T>(task: () => Promise<T>): Promise<T> {
    this.pending++;
    const result = this.tail.then(task).finally(() => {
      this.pending--;
    });
    this.tail = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }
}
