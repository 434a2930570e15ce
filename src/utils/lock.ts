/**
 * Minimal async mutex. Callers queue in arrival order and each critical
 * section runs to completion before the next one starts.
 */
export class Lock {
  private tail: Promise<void> = Promise.resolve();

  run<T>(section: () => T | Promise<T>): Promise<T> {
    const result = this.tail.then(section);
    // the queue must keep moving even when a section throws
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }
}
