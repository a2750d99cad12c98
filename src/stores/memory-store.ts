import type { CacheStore, CacheEntry, MemoryStoreOptions } from '../types.js';
import { globToRegExp } from './glob.js';

/**
 * Creates an in-memory cache store with LRU eviction.
 *
 * The Map's insertion order doubles as the recency list: reads move a key to
 * the end, eviction takes the first key.
 */
export function createMemoryStore<T>(
  options: MemoryStoreOptions<T> = {}
): CacheStore<T> {
  const { maxSize, onEvictCallback } = options;

  if (maxSize !== undefined && (typeof maxSize !== 'number' || maxSize <= 0 || !Number.isInteger(maxSize))) {
    throw new Error('maxSize must be a positive integer');
  }

  const effectiveMaxSize = maxSize ?? 1000; // Default max size

  const cache = new Map<string, CacheEntry<T>>();

  function touch(key: string, entry: CacheEntry<T>): void {
    cache.delete(key);
    cache.set(key, entry);
  }

  function evictLeastRecentlyUsed(): void {
    const iterator = cache.entries().next();
    if (iterator.done) return;

    const [lruKey, evictedEntry] = iterator.value;
    cache.delete(lruKey);

    if (onEvictCallback) {
      onEvictCallback(lruKey, evictedEntry);
    }
  }

  function matchingKeys(pattern: string): string[] {
    const matcher = globToRegExp(pattern);
    return Array.from(cache.keys()).filter((key) => matcher.test(key));
  }

  return {
    async get(key: string): Promise<CacheEntry<T> | undefined> {
      const entry = cache.get(key);
      if (entry) {
        touch(key, entry);
      }
      return entry;
    },

    async set(key: string, entry: CacheEntry<T>): Promise<void> {
      // If key already exists, just update
      if (cache.has(key)) {
        touch(key, entry);
        return;
      }

      // Evict if at capacity
      while (cache.size >= effectiveMaxSize) {
        evictLeastRecentlyUsed();
      }

      cache.set(key, entry);
    },

    async delete(key: string, ifExpiresAt?: number): Promise<boolean> {
      if (ifExpiresAt !== undefined) {
        const current = cache.get(key);
        if (!current || current.expiresAt !== ifExpiresAt) {
          return false;
        }
      }
      return cache.delete(key);
    },

    async clear(pattern?: string): Promise<number> {
      if (pattern === undefined) {
        const removed = cache.size;
        cache.clear();
        return removed;
      }
      const keys = matchingKeys(pattern);
      for (const key of keys) {
        cache.delete(key);
      }
      return keys.length;
    },

    async has(key: string): Promise<boolean> {
      return cache.has(key);
    },

    async prune(now: number): Promise<number> {
      let removed = 0;
      for (const [key, entry] of cache) {
        if (now >= entry.expiresAt) {
          cache.delete(key);
          removed++;
        }
      }
      return removed;
    },

    size(): number {
      return cache.size;
    },
  };
}
