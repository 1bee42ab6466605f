/**
 * Append-only async memoization.
 *
 * Entries are never evicted or invalidated. Concurrent lookups of a key that is
 * still being computed share the in-flight promise, so each key is computed at
 * most once. A rejected computation is removed so the next lookup retries.
 */
export class MemoCache<K, V> {
  private readonly entries = new Map<string, Promise<V>>();

  constructor(private readonly keyOf: (key: K) => string) {}

  get size(): number {
    return this.entries.size;
  }

  has(key: K): boolean {
    return this.entries.has(this.keyOf(key));
  }

  getOrCompute(key: K, compute: (key: K) => Promise<V>): Promise<V> {
    const cacheKey = this.keyOf(key);
    const existing = this.entries.get(cacheKey);
    if (existing) {
      return existing;
    }

    const pending: Promise<V> = compute(key).catch((error: unknown) => {
      if (this.entries.get(cacheKey) === pending) {
        this.entries.delete(cacheKey);
      }
      throw error;
    });
    this.entries.set(cacheKey, pending);
    return pending;
  }
}
