/**
 * Bounded set of recently seen event ids. Oldest ids are evicted first.
 */
export class RecentIdCache {
  // Set iteration order is insertion order
  private readonly ids = new Set<string>();

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Dedup cache capacity must be a positive integer, got ${capacity}`);
    }
  }

  /** Check-and-insert in one step; false when the id was already present. */
  addIfAbsent(id: string): boolean {
    if (this.ids.has(id)) return false;

    this.ids.add(id);
    while (this.ids.size > this.capacity) {
      const oldest = this.ids.values().next();
      if (oldest.done) break;
      this.ids.delete(oldest.value);
    }
    return true;
  }

  has(id: string): boolean {
    return this.ids.has(id);
  }

  get size(): number {
    return this.ids.size;
  }
}
