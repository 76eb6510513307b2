/** Counting semaphore bounding how many transfers run at once */
export class WorkerSlots {
  readonly size: number;
  private busy = 0;
  private readonly waiting: Array<() => void> = [];

  constructor(size: number) {
    if (!Number.isInteger(size) || size < 1) {
      throw new RangeError(`Worker count must be a positive integer, received: ${size}`);
    }
    this.size = size;
  }

  acquire(): Promise<void> {
    if (this.busy < this.size) {
      this.busy++;
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.waiting.push(() => resolve());
    });
  }

  release(): void {
    const next = this.waiting.shift();
    if (next) {
      // Slot passes straight to the next waiter; busy count is unchanged.
      next();
      return;
    }
    this.busy = Math.max(0, this.busy - 1);
  }

  inUse(): number {
    return this.busy;
  }
}
