/**
 * Per-device lock. Tasks are chained onto the previous one, so calls on the
 * same device run one at a time in arrival order while different devices
 * proceed independently. A failed task does not hold the lock.
 */
export class AsyncMutex {
  private tail: Promise<unknown> = Promise.resolve();

  runExclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.tail.then(() => task());
    this.tail = run.catch(() => undefined);
    return run;
  }
}
