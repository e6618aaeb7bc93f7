/**
 * Bounded least-recently-used cache.
 *
 * Backed by a Map, whose iteration order is insertion order: a hit re-inserts
 * the entry at the end, so the first key is always the least recently used.
 * @module cache
 */

/**
 * Cache counters.
 */
export interface CacheStats {
  hits: number;
  misses: number;
  evictions: number;
  size: number;
  capacity: number;
}

/**
 * Fixed-capacity LRU cache. `undefined` is not a storable value.
 *
 * @example
 * ```typescript
 * const cache = new LruCache<string, number>(2);
 * cache.set('a', 1);
 * cache.set('b', 2);
 * cache.get('a');    // 'a' is now the most recently used
 * cache.set('c', 3); // evicts 'b'
 * ```
 */
export class LruCache<K, V> {
  private readonly entries = new Map<K, V>();
  private readonly capacity: number;
  private hits = 0;
  private misses = 0;
  private evictions = 0;

  /**
   * @param capacity - Maximum number of entries; 0 stores nothing
   */
  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 0) {
      throw new RangeError(`cache capacity must be a non-negative integer, got ${capacity}`);
    }
    this.capacity = capacity;
  }

  /**
   * Looks up an entry, marking it as most recently used.
   */
  get(key: K): V | undefined {
    const value = this.entries.get(key);
    if (value === undefined) {
      this.misses++;
      return undefined;
    }
    this.entries.delete(key);
    this.entries.set(key, value);
    this.hits++;
    return value;
  }

  /**
   * Stores an entry, evicting the least recently used ones beyond capacity.
   *
   * Storing an existing key replaces its value.
   */
  set(key: K, value: V): void {
    if (this.capacity === 0) {
      return;
    }
    this.entries.delete(key);
    this.entries.set(key, value);
    while (this.entries.size > this.capacity) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
      this.evictions++;
    }
  }

  /**
   * Returns the cached value for `key`, computing and storing it on a miss.
   *
   * Errors thrown by `compute` propagate and nothing is stored.
   */
  getOrCompute(key: K, compute: (key: K) => V): V {
    const cached = this.get(key);
    if (cached !== undefined) {
      return cached;
    }
    const value = compute(key);
    this.set(key, value);
    return value;
  }

  /**
   * Checks for an entry without touching recency or counters.
   */
  has(key: K): boolean {
    return this.entries.has(key);
  }

  delete(key: K): boolean {
    return this.entries.delete(key);
  }

  /**
   * Removes every entry. Counters are kept; see resetStats().
   */
  clear(): void {
    this.entries.clear();
  }

  resetStats(): void {
    this.hits = 0;
    this.misses = 0;
    this.evictions = 0;
  }

  get size(): number {
    return this.entries.size;
  }

  stats(): CacheStats {
    return {
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
      size: this.entries.size,
      capacity: this.capacity,
    };
  }

  /**
   * Keys from least to most recently used.
   */
  keys(): K[] {
    return Array.from(this.entries.keys());
  }
}
