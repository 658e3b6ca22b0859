/**
 * Dedup keys seen by one listener for the life of the process.
 *
 * Unbounded unless a capacity is given; with one, the oldest keys are
 * evicted first. Nothing is persisted, so a restart forgets everything.
 */
export class SeenIdSet {
  private ids = new Set<string>();

  constructor(private readonly capacity?: number) {}

  /** Returns false if the id was already present. */
  add(id: string): boolean {
    if (this.ids.has(id)) return false;

    this.ids.add(id);
    if (this.capacity !== undefined && this.ids.size > this.capacity) {
      const oldest = this.ids.values().next();
      if (!oldest.done) this.ids.delete(oldest.value);
    }
    return true;
  }
}
