/** Remembers the last `capacity` ids; older ones are forgotten first. */
export class RecentIds {
  private readonly seen = new Set<number>()

  constructor(private readonly capacity = 1000) {}

  /** True the first time an id is seen, false for a repeat. */
  add(id: number): boolean {
    if (this.seen.has(id)) return false
    this.seen.add(id)
    if (this.seen.size > this.capacity) {
      const oldest = this.seen.values().next()
      if (!oldest.done) this.seen.delete(oldest.value)
    }
    return true
  }
}
