/**
 * Promise-chain mutex. Tasks run one at a time in submission order.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  runExclusive<T>(task: () => Promise<T> | T): Promise<T> {
    this.pending++;
    const result = this.tail.then(task);
    // The chain only tracks completion; failures reach the caller through `result`.
    this.tail = result.then(
      () => {
        this.pending--;
      },
      () => {
        this.pending--;
      }
    );
    return result;
  }

  isLocked(): boolean {
    return this.pending > 0;
  }
}
