/**
 * Fixed-capacity circular buffer. Pushing onto a full buffer evicts the
 * oldest entry; iteration runs oldest to newest.
 */
export class RingBuffer<T> implements Iterable<T> {
  private readonly items: Array<T | undefined>;
  private head = 0;
  private count = 0;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`Invalid capacity: must be a positive integer (got ${capacity})`);
    }
    this.items = new Array<T | undefined>(capacity);
  }

  /**
   * Rebuild from a persisted array, keeping only the newest `capacity` entries.
   */
  static from<T>(values: readonly T[], capacity: number): RingBuffer<T> {
    const buffer = new RingBuffer<T>(capacity);
    for (const value of values.slice(-capacity)) {
      buffer.push(value);
    }
    return buffer;
  }

  get size(): number {
    return this.count;
  }

  /**
   * @returns the evicted entry, if the buffer was full
   */
  push(value: T): T | undefined {
    const index = (this.head + this.count) % this.capacity;
    if (this.count < this.capacity) {
      this.items[index] = value;
      this.count++;
      return undefined;
    }
    const evicted = this.items[this.head];
    this.items[this.head] = value;
    this.head = (this.head + 1) % this.capacity;
    return evicted;
  }

  /** Newest entry, or undefined when empty */
  last(): T | undefined {
    if (this.count === 0) return undefined;
    return this.items[(this.head + this.count - 1) % this.capacity];
  }

  /** The newest `n` entries, oldest first */
  recent(n: number): T[] {
    const all = this.toArray();
    return n >= all.length ? all : all.slice(all.length - n);
  }

  clear(): void {
    this.items.fill(undefined);
    this.head = 0;
    this.count = 0;
  }

  toArray(): T[] {
    return [...this];
  }

  *[Symbol.iterator](): Iterator<T> {
    for (let i = 0; i < this.count; i++) {
      const item = this.items[(this.head + i) % this.capacity];
      if (item !== undefined) {
        yield item;
      }
    }
  }
}
