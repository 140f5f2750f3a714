/**
 * Fixed-capacity circular store that overwrites the oldest element once full.
 *
 * Index 0 always denotes the oldest element currently held, whatever its
 * physical slot. Every operation runs to completion on the event loop, so
 * readers never see a half-applied push.
 */
export class RingBuffer<T> {
  private readonly slots: Array<T | undefined>;
  private readonly _capacity: number;

  /** Next write position */
  private head = 0;
  private count = 0;

  constructor(capacity: number) {
    if (capacity <= 0 || !Number.isInteger(capacity)) {
      throw new RangeError(`RingBuffer capacity must be a positive integer, got ${capacity}`);
    }
    this._capacity = capacity;
    this.slots = new Array<T | undefined>(capacity);
  }

  get capacity(): number {
    return this._capacity;
  }

  get length(): number {
    return this.count;
  }

  push(item: T): void {
    this.slots[this.head] = item;
    this.head = (this.head + 1) % this._capacity;
    if (this.count < this._capacity) {
      this.count++;
    }
  }

  /** Element at `index` counting from the oldest, or undefined when out of range. */
  get(index: number): T | undefined {
    if (!Number.isInteger(index) || index < 0 || index >= this.count) {
      return undefined;
    }
    return this.slots[this.physical(this.oldest(), index)];
  }

  getLast(): T | undefined {
    if (this.count === 0) return undefined;
    return this.slots[(this.head - 1 + this._capacity) % this._capacity];
  }

  /** Elements from `start` to `end` inclusive, oldest first. `end` is clamped. */
  getRange(start: number, end: number): T[] {
    const from = Math.max(start, 0);
    const to = Math.min(end, this.count - 1);
    if (this.count === 0 || from > to) {
      return [];
    }
    return this.collect(this.oldest(), from, to - from + 1);
  }

  /** The most recent `n` elements, oldest first. */
  getLastN(n: number): T[] {
    const take = Math.min(n, this.count);
    if (take <= 0) return [];
    return this.collect((this.head - take + this._capacity) % this._capacity, 0, take);
  }

  all(): T[] {
    return this.collect(this.oldest(), 0, this.count);
  }

  /** Forget every element. Storage and capacity are kept for reuse. */
  clear(): void {
    this.head = 0;
    this.count = 0;
  }

  private oldest(): number {
    return (this.head - this.count + this._capacity) % this._capacity;
  }

  private physical(base: number, offset: number): number {
    return (base + offset) % this._capacity;
  }

  private collect(base: number, offset: number, n: number): T[] {
    const result: T[] = [];
    for (let i = 0; i < n; i++) {
      const item = this.slots[this.physical(base, offset + i)];
      if (item !== undefined) result.push(item);
    }
    return result;
  }
}
