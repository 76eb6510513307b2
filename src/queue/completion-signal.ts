/**
 * Single-use notification from one producer to its waiters.
 * The first complete() wins; later calls are ignored and return false.
 */
export class CompletionSignal<T> {
  private settled = false;
  private resolveValue: (value: T) => void = () => {};
  private readonly promise: Promise<T>;

  constructor() {
    this.promise = new Promise<T>((resolve) => {
      this.resolveValue = resolve;
    });
  }

  get isComplete(): boolean {
    return this.settled;
  }

  complete(value: T): boolean {
    if (this.settled) return false;
    this.settled = true;
    this.resolveValue(value);
    return true;
  }

  wait(): Promise<T> {
    return this.promise;
  }
}
