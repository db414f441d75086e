/**
 * Array-backed FIFO queue with O(1) `shift`. Consumed slots are released
 * lazily; the backing array is compacted once more than half of it is dead.
 */
export class FastShiftArray<T> {
  private items: (T | undefined)[];
  private headIndex = 0;

  constructor(...items: T[]) {
    this.items = items;
  }

  shift(): T | undefined {
    if (this.headIndex >= this.items.length) {
      return undefined;
    }
    const value = this.items[this.headIndex];
    this.items[this.headIndex] = undefined;
    this.headIndex += 1;
    if (this.headIndex > 32 && this.headIndex * 2 > this.items.length) {
      this.items = this.items.slice(this.headIndex);
      this.headIndex = 0;
    }
    return value;
  }

  push(...items: T[]): number {
    this.items.push(...items);
    return this.length;
  }

  get length(): number {
    return this.items.length - this.headIndex;
  }

  isEmpty(): boolean {
    return this.length === 0;
  }

  at(index: number): T | undefined {
    const offset = index < 0 ? this.length + index : index;
    if (offset < 0 || offset >= this.length) {
      return undefined;
    }
    return this.items[this.headIndex + offset];
  }

  toArray(): T[] {
    const out: T[] = [];
    for (let index = this.headIndex; index < this.items.length; index++) {
      const value = this.items[index];
      if (value !== undefined) out.push(value);
    }
    return out;
  }
}
