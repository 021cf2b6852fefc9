/**
 * @file src/wallet/lock.ts
 * Promise-chain mutex. Callers queue behind whatever is running; a failed
 * critical section releases the lock like a successful one.
 */

export class Mutex {
  private tail: Promise<void> = Promise.resolve();

  runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    const result = this.tail.then(fn);
    this.tail = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }
}
