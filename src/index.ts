// Cache
export { createCache, isExpired, createEntry, validateTimeToLive } from './cache.js';
export type { Cache, CacheOptions } from './cache.js';

// Stores
export { createMemoryStore } from './stores/memory-store.js';
export { createRedisStore } from './stores/redis-store.js';
export { createNoopStore } from './stores/noop-store.js';
export type { RedisClient, RedisStoreOptions } from './stores/redis-store.js';

// Keys, ids and invalidation
export {
  CACHE_KEY_VERSION,
  scheduleKey,
  filterOptionsKey,
  lessonsKey,
  searchKey,
  searchResultsKey,
  selectorPattern,
  groupPattern,
  selectorToken,
  filterToken,
} from './cache-keys.js';
export type { Selector, LessonFilters } from './cache-keys.js';
export { stableId, STABLE_ID_MODULUS } from './stable-id.js';
export { createInvalidationController } from './invalidation.js';
export type { InvalidationController } from './invalidation.js';
export { startPruner } from './pruner.js';
export type { Pruner } from './pruner.js';

// Schedule queries
export { createRuzClient } from './ruz-client.js';
export type { RuzClient, RuzClientOptions } from './ruz-client.js';
export { createScheduleFetcher } from './schedule-fetcher.js';
export type { ScheduleFetcher, FetchResult } from './schedule-fetcher.js';
export { buildFilterOptions, buildLessons, shortName } from './query-processor.js';
export { createSearchService } from './search.js';
export type { SearchService, SearchResponse } from './search.js';
export { createScheduleService } from './schedule-service.js';
export type { ScheduleService } from './schedule-service.js';

// Application
export { createAppContext, resolveBackend } from './context.js';
export type { AppContext, StoreBackend } from './context.js';
export { createApp } from './http.js';
export { loadConfig, ConfigError } from './config.js';
export type { AppConfig } from './config.js';
export * from './errors.js';

// Types (re-export for consumers)
export type { CacheEntry, CacheStore, CacheStats, MemoryStoreOptions } from './types.js';
export type { ScheduleEntry, Lesson, FilterOptions, SearchResult, SearchType } from './schemas.js';
export type { Logger, LogLevel } from './logger.js';
