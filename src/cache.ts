import type { CacheStore, CacheEntry, CacheStats, MemoryStoreOptions } from './types.js';
import { createMemoryStore } from './stores/memory-store.js';
import { escapeGlob } from './stores/glob.js';
import { type Logger, silentLogger, describeError } from './logger.js';

/**
 * Check if a cache entry has expired.
 * An entry is visible strictly before its expiresAt instant.
 */
export function isExpired<T>(entry: CacheEntry<T>, now = Date.now()): boolean {
  return now >= entry.expiresAt;
}

/**
 * Create a cache entry with time to live.
 */
export function createEntry<T>(value: T, timeToLive: number): CacheEntry<T> {
  const now = Date.now();
  return {
    value,
    createdAt: now,
    expiresAt: now + timeToLive,
  };
}

/**
 * Validates that a timeToLive value is a positive finite number.
 * @throws {Error} If the value is invalid
 */
export function validateTimeToLive(value: number, context = 'timeToLive'): void {
  if (typeof value !== 'number' || value <= 0 || !Number.isFinite(value)) {
    throw new Error(`${context} must be a positive finite number`);
  }
}

/**
 * Options for createCache().
 *
 * @template T - The type of the cached values
 */
export interface CacheOptions<T> {
  /** Name of the cache; every key is stored under `<namespace>:` */
  namespace: string;

  /** Default time to live in milliseconds */
  timeToLive: number;

  /** Custom cache store. Defaults to in-memory Map */
  store?: CacheStore<T>;

  /** Options for the default memory store (ignored if store is provided) */
  memoryStoreOptions?: MemoryStoreOptions<T>;

  logger?: Logger;

  /** Called on cache hit */
  onHitCallback?: (key: string) => void;

  /** Called on cache miss */
  onMissCallback?: (key: string) => void;
}

/**
 * A namespaced TTL cache. Backend failures never escape: reads fail open as
 * misses, writes and deletes are logged and dropped.
 */
export interface Cache<T> {
  readonly namespace: string;
  get(key: string): Promise<T | undefined>;
  /** Stores `value` for `timeToLive` ms (the cache default when omitted). Null and undefined are skipped */
  set(key: string, value: T | null | undefined, timeToLive?: number): Promise<void>;
  /** Removes every entry of this namespace and resets the counters */
  clear(): Promise<void>;
  stats(): CacheStats;
  /** Removes expired entries, returning how many went. 0 for stores with native expiry */
  prune(): Promise<number>;
  /** Removes entries whose key matches a glob pattern, returning how many went */
  invalidate(pattern: string): Promise<number>;
}

/**
 * Creates a cache over a pluggable store.
 *
 * @example
 * ```typescript
 * const cache = createCache<string[]>({ namespace: 'search', timeToLive: 600_000 });
 * await cache.set('search:group:ПИ', ['ПИ19-1', 'ПИ19-2']);
 * await cache.get('search:group:ПИ'); // ['ПИ19-1', 'ПИ19-2']
 * cache.stats(); // { namespace: 'search', hits: 1, misses: 0, hitRate: 1, entries: 1 }
 * ```
 */
export function createCache<T>(options: CacheOptions<T>): Cache<T> {
  const {
    namespace,
    timeToLive: defaultTimeToLive,
    store: providedStore,
    memoryStoreOptions,
    logger = silentLogger,
    onHitCallback,
    onMissCallback,
  } = options;

  validateTimeToLive(defaultTimeToLive);
  if (!namespace || namespace.includes(':')) {
    throw new Error('namespace must be a non-empty string without ":"');
  }

  const store: CacheStore<T> = providedStore ?? createMemoryStore<T>(memoryStoreOptions);
  const prefix = `${namespace}:`;
  const globPrefix = escapeGlob(prefix);

  let hits = 0;
  let misses = 0;

  function recordMiss(key: string): undefined {
    misses++;
    if (onMissCallback) {
      onMissCallback(key);
    }
    return undefined;
  }

  return {
    namespace,

    async get(key: string): Promise<T | undefined> {
      let entry: CacheEntry<T> | undefined;
      try {
        entry = await store.get(prefix + key);
      } catch (error) {
        logger.warn(`Cache ${namespace}: read of ${key} failed, treating as miss: ${describeError(error)}`);
        return recordMiss(key);
      }

      if (!entry) return recordMiss(key);

      if (isExpired(entry)) {
        try {
          await store.delete(prefix + key, entry.expiresAt);
        } catch (error) {
          logger.warn(`Cache ${namespace}: removing expired ${key} failed: ${describeError(error)}`);
        }
        return recordMiss(key);
      }

      hits++;
      if (onHitCallback) {
        onHitCallback(key);
      }
      return entry.value;
    },

    async set(key: string, value: T | null | undefined, timeToLive?: number): Promise<void> {
      // Validate per-entry TTL if provided
      if (timeToLive !== undefined) {
        validateTimeToLive(timeToLive);
      }

      if (value === null || value === undefined) {
        logger.warn(`Cache ${namespace}: refusing to store empty value for ${key}`);
        return;
      }

      try {
        await store.set(prefix + key, createEntry(value, timeToLive ?? defaultTimeToLive));
      } catch (error) {
        logger.warn(`Cache ${namespace}: write of ${key} failed: ${describeError(error)}`);
      }
    },

    async clear(): Promise<void> {
      hits = 0;
      misses = 0;
      try {
        await store.clear(`${globPrefix}*`);
      } catch (error) {
        logger.warn(`Cache ${namespace}: clear failed: ${describeError(error)}`);
      }
    },

    stats(): CacheStats {
      const lookups = hits + misses;
      const stats: CacheStats = {
        namespace,
        hits,
        misses,
        hitRate: lookups > 0 ? hits / lookups : 0,
      };
      const entries = store.size();
      if (entries !== undefined) {
        stats.entries = entries;
      }
      return stats;
    },

    async prune(): Promise<number> {
      try {
        return await store.prune(Date.now());
      } catch (error) {
        logger.warn(`Cache ${namespace}: prune failed: ${describeError(error)}`);
        return 0;
      }
    },

    async invalidate(pattern: string): Promise<number> {
      try {
        return await store.clear(globPrefix + pattern);
      } catch (error) {
        logger.warn(`Cache ${namespace}: invalidation of ${pattern} failed: ${describeError(error)}`);
        return 0;
      }
    },
  };
}
