/**
 * Sliding de-duplication window for ids. An id is remembered for `windowMs`;
 * past `maxEntries` the oldest ids are forgotten first.
 */
export class RecentIds {
  // Insertion order doubles as age order.
  private readonly seen = new Map<string, number>();

  constructor(
    private readonly windowMs: number,
    private readonly maxEntries: number
  ) {}

  has(id: string, now: number): boolean {
    this.prune(now);
    return this.seen.has(id);
  }

  add(id: string, now: number): void {
    this.seen.delete(id);
    this.seen.set(id, now);
    this.prune(now);
  }

  size(): number {
    return this.seen.size;
  }

  private prune(now: number): void {
    for (const [id, at] of this.seen) {
      if (now - at < this.windowMs && this.seen.size <= this.maxEntries) break;
      this.seen.delete(id);
    }
  }
}
