/**
 * Bounded FIFO between the hub and a connection's writer pump.
 *
 * Producers never wait: `offer` either accepts the item or refuses it when the
 * queue is full or closed. The single consumer awaits `next`, which resolves
 * with `undefined` once the queue is closed and drained.
 */
export class OutboundQueue<T> {
  private readonly items: T[] = [];
  private waiter: ((item: T | undefined) => void) | null = null;
  private isClosed = false;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Queue capacity must be a positive integer, got ${capacity}`);
    }
  }

  get size(): number {
    return this.items.length;
  }

  get closed(): boolean {
    return this.isClosed;
  }

  /**
   * Enqueue without blocking.
   * @returns false if the queue is full or closed
   */
  offer(item: T): boolean {
    if (this.isClosed) return false;

    // Hand straight to a parked consumer; the buffer is empty in that case
    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve(item);
      return true;
    }

    if (this.items.length >= this.capacity) return false;
    this.items.push(item);
    return true;
  }

  /**
   * Next item, waiting if the queue is empty.
   * Items buffered before `close` are still handed out.
   */
  next(): Promise<T | undefined> {
    if (this.items.length > 0) {
      return Promise.resolve(this.items.shift());
    }
    if (this.isClosed) {
      return Promise.resolve(undefined);
    }
    if (this.waiter) {
      return Promise.reject(new Error("OutboundQueue supports a single consumer"));
    }
    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }

  /** Drop buffered items without closing */
  clear(): void {
    this.items.length = 0;
  }

  /**
   * Close the queue. Idempotent.
   * @returns true only for the call that actually closed it
   */
  close(): boolean {
    if (this.isClosed) return false;
    this.isClosed = true;

    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve(undefined);
    }
    return true;
  }
}
