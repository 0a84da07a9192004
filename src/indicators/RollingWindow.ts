import { requireInteger } from '../errors.js';

/**
 * Fixed-capacity FIFO buffer. Index 0 is the oldest sample.
 */
export class RollingWindow<T> {
  readonly capacity: number;
  private readonly items: T[] = [];

  constructor(capacity: number) {
    this.capacity = requireInteger('capacity', capacity, 1);
  }

  /**
   * Append a value, evicting the oldest when full
   */
  push(value: T): void {
    this.items.push(value);
    if (this.items.length > this.capacity) {
      this.items.shift();
    }
  }

  get size(): number {
    return this.items.length;
  }

  isFull(): boolean {
    return this.items.length === this.capacity;
  }

  values(): readonly T[] {
    return this.items;
  }

  clear(): void {
    this.items.length = 0;
  }
}
