/**
 * Promise-chain mutex: callers run one at a time, in arrival order.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();

  /**
   * Run `fn` once every earlier caller has settled. A rejection from `fn`
   * reaches this caller only; the lock is released either way.
   */
  withLock<T>(fn: () => Promise<T> | T): Promise<T> {
    const run = this.tail.then(fn);
    this.tail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }
}
