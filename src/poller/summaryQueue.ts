/**
 * Hand-off between the polling worker and whatever presents summaries.
 * Values are frozen on the way in, so nothing mutable crosses over.
 */
export class SummaryQueue<T extends object> {
  private items: Readonly<T>[] = [];

  push(item: T): void {
    this.items.push(Object.freeze({ ...item }));
  }

  /** Remove and return up to `max` items, oldest first. */
  drain(max: number = Infinity): Readonly<T>[] {
    return this.items.splice(0, Math.min(max, this.items.length));
  }

  get size(): number {
    return this.items.length;
  }
}
