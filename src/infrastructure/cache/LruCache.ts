/**
 * @lumberline/core - LRU Cache
 *
 * Bounded map that evicts the least recently used entry. Backs call-site
 * interning, where the key space (event messages) is unbounded.
 */

/**
 * Cache statistics
 */
export interface CacheStats {
  hits: number;
  misses: number;
  size: number;
  capacity: number;
  hitRate: number;
}

/**
 * LruCache - Map ordered by recency of use
 *
 * @template K - Key type
 * @template V - Value type
 *
 * @example
 * ```typescript
 * const cache = new LruCache<string, Metadata>(2);
 * cache.set('a', siteA);
 * cache.set('b', siteB);
 * cache.get('a');
 * cache.set('c', siteC); // evicts 'b'
 * ```
 */
export class LruCache<K, V> {
  private readonly entries = new Map<K, V>();
  private hits = 0;
  private misses = 0;

  constructor(readonly capacity: number = 1000) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`LruCache capacity must be a positive integer, got ${capacity}`);
    }
  }

  get(key: K): V | undefined {
    const value = this.entries.get(key);
    if (value === undefined) {
      this.misses++;
      return undefined;
    }

    // Move to end (most recently used)
    this.entries.delete(key);
    this.entries.set(key, value);
    this.hits++;
    return value;
  }

  set(key: K, value: V): void {
    this.entries.delete(key);

    if (this.entries.size >= this.capacity) {
      const oldest = this.entries.keys().next();
      if (!oldest.done) {
        this.entries.delete(oldest.value);
      }
    }

    this.entries.set(key, value);
  }

  /**
   * Return the cached value, creating and storing it on a miss.
   */
  getOrSet(key: K, create: () => V): V {
    const cached = this.get(key);
    if (cached !== undefined) return cached;

    const value = create();
    this.set(key, value);
    return value;
  }

  has(key: K): boolean {
    return this.entries.has(key);
  }

  delete(key: K): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
    this.hits = 0;
    this.misses = 0;
  }

  get size(): number {
    return this.entries.size;
  }

  stats(): CacheStats {
    const total = this.hits + this.misses;
    return {
      hits: this.hits,
      misses: this.misses,
      size: this.entries.size,
      capacity: this.capacity,
      hitRate: total > 0 ? this.hits / total : 0,
    };
  }
}
