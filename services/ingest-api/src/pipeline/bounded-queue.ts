/**
 * Fixed-capacity FIFO backed by a ring buffer.
 *
 * `push` never waits: a full queue answers `false` and the caller decides what
 * to do with the record (drop it, or tell the producer to back off).
 */
export class BoundedQueue<T> {
  private readonly slots: Array<T | undefined>;
  private head = 0;
  private count = 0;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new RangeError(`queue capacity must be a positive integer, got ${capacity}`);
    }
    this.slots = new Array<T | undefined>(capacity);
  }

  get size(): number {
    return this.count;
  }

  isEmpty(): boolean {
    return this.count === 0;
  }

  isFull(): boolean {
    return this.count === this.capacity;
  }

  push(item: T): boolean {
    if (this.count === this.capacity) return false;
    this.slots[(this.head + this.count) % this.capacity] = item;
    this.count++;
    return true;
  }

  shift(): T | undefined {
    if (this.count === 0) return undefined;
    const item = this.slots[this.head];
    this.slots[this.head] = undefined;
    this.head = (this.head + 1) % this.capacity;
    this.count--;
    return item;
  }

  /** Removes and returns up to `n` oldest entries (fewer if the queue runs dry). */
  drainUpTo(n: number): T[] {
    const take = Math.max(0, Math.min(Math.floor(n), this.count));
    const out: T[] = [];
    for (let i = 0; i < take; i++) {
      const item = this.shift();
      if (item !== undefined) out.push(item);
    }
    return out;
  }
}
