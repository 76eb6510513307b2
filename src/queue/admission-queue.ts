/**
 * Fixed-capacity FIFO buffer between request handlers and the dispatcher
 *
 * tryEnqueue() never waits: it either takes the item or refuses it. When a
 * consumer is already parked in dequeue(), the item is handed straight to it and
 * does not occupy a slot.
 */
export class AdmissionQueue<T extends object> {
  readonly capacity: number;
  private readonly items: T[] = [];
  private readonly consumers: Array<(item: T | undefined) => void> = [];
  private closed = false;

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Queue capacity must be a positive integer, received: ${capacity}`);
    }
    this.capacity = capacity;
  }

  tryEnqueue(item: T): boolean {
    if (this.closed) return false;

    const consumer = this.consumers.shift();
    if (consumer) {
      consumer(item);
      return true;
    }

    if (this.items.length >= this.capacity) return false;
    this.items.push(item);
    return true;
  }

  /**
   * Next item in arrival order, waiting for one if the buffer is empty.
   * Resolves to undefined once the queue is closed and drained.
   */
  dequeue(): Promise<T | undefined> {
    const item = this.items.shift();
    if (item !== undefined || this.closed) return Promise.resolve(item);

    return new Promise((resolve) => {
      this.consumers.push(resolve);
    });
  }

  depth(): number {
    return this.items.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Refuse further items. Buffered items can still be dequeued. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const consumer of this.consumers.splice(0)) consumer(undefined);
  }
}
