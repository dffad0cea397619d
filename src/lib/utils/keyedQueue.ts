/**
 * Runs tasks one at a time per key, in the order they were queued. Different keys
 * run concurrently. A failed task does not block the ones behind it.
 */
export class KeyedQueue {
  private readonly tails = new Map<string, Promise<void>>()

  run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve()
    const result = previous.then(task)
    const tail: Promise<void> = result.then(
      () => this.release(key, tail),
      () => this.release(key, tail)
    )
    this.tails.set(key, tail)
    return result
  }

  /** Keys with queued or running work. */
  get size(): number {
    return this.tails.size
  }

  private release(key: string, tail: Promise<void>): void {
    if (this.tails.get(key) === tail) this.tails.delete(key)
  }
}
