/**
 * Promise-chain mutex: callers of `run` execute one at a time, in call order.
 * A rejected task releases the lock like a resolved one.
 */
export class AsyncLock {
  private tail: Promise<void> = Promise.resolve();

  run<T>(task: () => Promise<T>): Promise<T> {
    const result = this.tail.then(task);
    this.tail = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }
}
