/**
 * A cached entry stored in the cache store.
 */
export interface CacheEntry<T> {
  /** The cached value */
  value: T;
  /** Unix timestamp (ms) when entry was created */
  createdAt: number;
  /** Unix timestamp (ms) when entry expires */
  expiresAt: number;
}

/**
 * Cache storage interface.
 * Implement this to provide custom storage backends (Redis, databases, etc.).
 *
 * Keys passed to a store are already namespaced by the cache that owns them.
 */
export interface CacheStore<T> {
  /** Retrieve an entry by key (returns undefined if not found) */
  get(key: string): Promise<CacheEntry<T> | undefined>;
  /** Store an entry, replacing any previous one */
  set(key: string, entry: CacheEntry<T>): Promise<void>;
  /**
   * Remove an entry by key.
   * With `ifExpiresAt`, only removes the entry if it is still the one that
   * expires at that instant, so a newer entry written in between survives.
   */
  delete(key: string, ifExpiresAt?: number): Promise<boolean>;
  /** Remove all entries, or only those matching a glob pattern (`*` and `?`). Returns the count removed */
  clear(pattern?: string): Promise<number>;
  /** Check if key exists (does not check expiration) */
  has(key: string): Promise<boolean>;
  /** Remove entries expired at `now`. Stores with native expiry return 0 */
  prune(now: number): Promise<number>;
  /** Number of stored entries, when the store can tell cheaply */
  size(): number | undefined;
}

/**
 * Options for the in-memory store.
 */
export interface MemoryStoreOptions<T> {
  /** Maximum number of entries (LRU eviction when exceeded) */
  maxSize?: number;

  /** Called when an entry is evicted */
  onEvictCallback?: (key: string, entry: CacheEntry<T>) => void;
}

/**
 * Hit/miss counters of one cache.
 */
export interface CacheStats {
  namespace: string;
  hits: number;
  misses: number;
  /** hits / (hits + misses), 0 before the first lookup */
  hitRate: number;
  /** Stored entries (expired ones included until pruned), when known */
  entries?: number;
}
