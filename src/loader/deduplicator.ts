/**
 * Deduplicator keeps a single fetch in flight per key. Concurrent callers
 * for the same key share the first caller's promise.
 */
export class Deduplicator<T> {
  private pending = new Map<string, Promise<T>>()

  async run(key: string, fn: () => Promise<T>): Promise<T> {
    // If already fetching this key, return existing promise
    const existing = this.pending.get(key)
    if (existing) {
      return existing
    }

    // Start new fetch
    const promise = fn().finally(() => {
      this.pending.delete(key)
    })

    this.pending.set(key, promise)
    return promise
  }

  /**
   * Forget all pending fetches. Callers already waiting keep their promise.
   */
  clear(): void {
    this.pending.clear()
  }

  /**
   * Get number of pending fetches
   */
  get size(): number {
    return this.pending.size
  }
}
