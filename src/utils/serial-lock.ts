/**
 * In-process mutual exclusion: tasks passed to `run` execute one at a time in
 * call order. A failing task does not block the ones queued behind it.
 */
export class SerialLock {
  private tail: Promise<void> = Promise.resolve();

  run<T>(fn: () => T | Promise<T>): Promise<T> {
    const result = this.tail.then(fn);
    this.tail = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }
}
