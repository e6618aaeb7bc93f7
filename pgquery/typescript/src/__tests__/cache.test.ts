/**
 * Tests for the LRU cache.
 */

import { LruCache } from '../index.js';

describe('LruCache', () => {
  let cache: LruCache<string, number>;

  beforeEach(() => {
    cache = new LruCache(2);
  });

  describe('basic operations', () => {
    it('should store and retrieve entries', () => {
      cache.set('a', 1);

      expect(cache.get('a')).toBe(1);
      expect(cache.size).toBe(1);
    });

    it('should return undefined for missing keys', () => {
      expect(cache.get('missing')).toBeUndefined();
    });

    it('should replace the value of an existing key', () => {
      cache.set('a', 1);
      cache.set('a', 2);

      expect(cache.get('a')).toBe(2);
      expect(cache.size).toBe(1);
    });

    it('should delete and clear entries', () => {
      cache.set('a', 1);
      cache.set('b', 2);

      expect(cache.delete('a')).toBe(true);
      expect(cache.delete('a')).toBe(false);
      cache.clear();
      expect(cache.size).toBe(0);
    });
  });

  describe('eviction', () => {
    it('should evict the least recently stored entry', () => {
      cache.set('a', 1);
      cache.set('b', 2);
      cache.set('c', 3);

      expect(cache.has('a')).toBe(false);
      expect(cache.keys()).toEqual(['b', 'c']);
      expect(cache.stats().evictions).toBe(1);
    });

    it('should keep recently read entries', () => {
      cache.set('a', 1);
      cache.set('b', 2);
      cache.get('a');
      cache.set('c', 3);

      expect(cache.keys()).toEqual(['a', 'c']);
    });

    it('should not change recency on has()', () => {
      cache.set('a', 1);
      cache.set('b', 2);
      cache.has('a');
      cache.set('c', 3);

      expect(cache.keys()).toEqual(['b', 'c']);
    });

    it('should store nothing with capacity 0', () => {
      const disabled = new LruCache<string, number>(0);
      disabled.set('a', 1);

      expect(disabled.size).toBe(0);
      expect(disabled.get('a')).toBeUndefined();
    });

    it('should reject invalid capacities', () => {
      expect(() => new LruCache(-1)).toThrow(RangeError);
      expect(() => new LruCache(1.5)).toThrow('cache capacity must be a non-negative integer, got 1.5');
    });
  });

  describe('getOrCompute', () => {
    it('should compute once and then hit', () => {
      const compute = vi.fn((key: string) => key.length);

      expect(cache.getOrCompute('abc', compute)).toBe(3);
      expect(cache.getOrCompute('abc', compute)).toBe(3);
      expect(compute).toHaveBeenCalledTimes(1);
    });

    it('should store nothing when compute throws', () => {
      expect(() =>
        cache.getOrCompute('bad', () => {
          throw new Error('boom');
        })
      ).toThrow('boom');
      expect(cache.has('bad')).toBe(false);
    });
  });

  describe('stats', () => {
    it('should count hits and misses', () => {
      cache.set('a', 1);
      cache.get('a');
      cache.get('a');
      cache.get('b');

      expect(cache.stats()).toEqual({ hits: 2, misses: 1, evictions: 0, size: 1, capacity: 2 });
    });

    it('should keep counters on clear and reset them on resetStats', () => {
      cache.set('a', 1);
      cache.get('a');
      cache.clear();

      expect(cache.stats().hits).toBe(1);
      cache.resetStats();
      expect(cache.stats()).toEqual({ hits: 0, misses: 0, evictions: 0, size: 0, capacity: 2 });
    });
  });
});
