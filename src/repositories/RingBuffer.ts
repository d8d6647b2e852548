/**
 * Fixed-capacity insertion-ordered store keyed by id.
 * Pushing past capacity evicts the oldest entry.
 */

export class RingBuffer<T extends { id: string }> {
  private readonly items: T[] = [];

  constructor(readonly capacity: number) {
    if (capacity < 1) throw new RangeError('RingBuffer capacity must be at least 1');
  }

  push(item: T): T | null {
    this.items.push(item);
    if (this.items.length > this.capacity) {
      return this.items.shift() ?? null;
    }
    return null;
  }

  find(id: string): T | null {
    return this.items.find((item) => item.id === id) ?? null;
  }

  replace(id: string, next: T): boolean {
    const index = this.items.findIndex((item) => item.id === id);
    if (index < 0) return false;
    this.items[index] = next;
    return true;
  }

  filter(predicate: (item: T) => boolean): T[] {
    return this.items.filter(predicate);
  }

  get size(): number {
    return this.items.length;
  }
}
