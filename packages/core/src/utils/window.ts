/**
 * Bounded history that evicts its oldest items first.
 */
export class RollingWindow<T> {
  private items: T[] = [];
  readonly capacity: number;

  constructor(capacity: number) {
    this.capacity = Math.max(1, Math.floor(capacity));
  }

  push(item: T): void {
    this.items.push(item);
    if (this.items.length > this.capacity) {
      this.items = this.items.slice(this.items.length - this.capacity);
    }
  }

  get size(): number {
    return this.items.length;
  }

  /**
   * Copy of the retained items, oldest first.
   */
  toArray(): T[] {
    return [...this.items];
  }
}
