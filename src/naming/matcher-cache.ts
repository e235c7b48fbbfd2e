/**
 * Bounded cache of compiled path matchers, keyed by pattern.
 * Uses Map insertion order: a hit moves the entry to the end, and the
 * entry at the front is evicted once capacity is exceeded.
 */
export class MatcherCache<V> {
  private entries = new Map<string, V>();
  private readonly capacity: number;
  private hitCount = 0;
  private missCount = 0;

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Matcher cache capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
  }

  /**
   * Return the cached value for `key`, building and storing it on a miss.
   */
  getOrCreate(key: string, build: (key: string) => V): V {
    const cached = this.entries.get(key);
    if (cached !== undefined) {
      this.hitCount++;
      this.entries.delete(key);
      this.entries.set(key, cached);
      return cached;
    }

    this.missCount++;
    const value = build(key);
    this.entries.set(key, value);
    for (const oldest of this.entries.keys()) {
      if (this.entries.size <= this.capacity) break;
      this.entries.delete(oldest);
    }
    return value;
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  clear(): void {
    this.entries.clear();
    this.hitCount = 0;
    this.missCount = 0;
  }

  get size(): number {
    return this.entries.size;
  }

  get stats(): { hits: number; misses: number } {
    return { hits: this.hitCount, misses: this.missCount };
  }
}
