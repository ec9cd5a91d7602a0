/**
 * Fixed-capacity ring of log entries; once full, each push evicts the oldest entry.
 */
export class EventRing<T> {
  private readonly items: (T | undefined)[];
  private head = 0;
  private count = 0;

  public constructor(private readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Ring capacity must be a positive integer, got ${capacity}.`);
    }
    this.items = new Array<T | undefined>(capacity).fill(undefined);
  }

  public get size(): number {
    return this.count;
  }

  public push(item: T): void {
    const index = (this.head + this.count) % this.capacity;
    this.items[index] = item;

    if (this.count < this.capacity) {
      this.count += 1;
      return;
    }

    this.head = (this.head + 1) % this.capacity;
  }

  /**
   * Most recent `limit` entries, oldest first.
   */
  public recent(limit = this.capacity): T[] {
    const take = Math.max(0, Math.min(Math.floor(limit), this.count));
    const result: T[] = [];

    for (let offset = this.count - take; offset < this.count; offset += 1) {
      const item = this.items[(this.head + offset) % this.capacity];
      if (item !== undefined) {
        result.push(item);
      }
    }

    return result;
  }

  public clear(): void {
    this.items.fill(undefined);
    this.head = 0;
    this.count = 0;
  }
}
