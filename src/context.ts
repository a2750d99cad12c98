import { Redis } from '@upstash/redis';
import type { z } from 'zod';
import { type Cache, createCache } from './cache.js';
import type { AppConfig } from './config.js';
import { type InvalidationController, createInvalidationController } from './invalidation.js';
import { type Logger, silentLogger, describeError } from './logger.js';
import { type Pruner, startPruner } from './pruner.js';
import { type RuzClient, createRuzClient } from './ruz-client.js';
import { type ScheduleFetcher, createScheduleFetcher } from './schedule-fetcher.js';
import { type ScheduleService, createScheduleService } from './schedule-service.js';
import {
  type FilterOptions,
  type Lesson,
  type ScheduleEntry,
  type SearchResult,
  filterOptionsSchema,
  lessonsSchema,
  scheduleEntriesSchema,
  searchResultsSchema,
} from './schemas.js';
import { type SearchService, createSearchService } from './search.js';
import { createMemoryStore } from './stores/memory-store.js';
import { createNoopStore } from './stores/noop-store.js';
import { type RedisClient, createRedisStore } from './stores/redis-store.js';
import type { CacheStore } from './types.js';

/**
 * Where cached values live. `disabled` is the degraded mode used when the
 * configured backend could not be reached at startup.
 */
export type StoreBackend = { kind: 'memory' } | { kind: 'redis'; redis: RedisClient } | { kind: 'disabled' };

/**
 * Pick the cache backend. An unreachable Redis is reported loudly, and the
 * service then runs with caching disabled rather than not at all.
 */
export async function resolveBackend(config: AppConfig, logger: Logger): Promise<StoreBackend> {
  if (config.cache.backend === 'memory') {
    return { kind: 'memory' };
  }

  const { redis: credentials } = config.cache;
  if (!credentials) {
    logger.error('Redis backend selected without credentials; caching disabled');
    return { kind: 'disabled' };
  }

  const redis = new Redis({ url: credentials.url, token: credentials.token });
  try {
    await redis.ping();
    return { kind: 'redis', redis };
  } catch (error) {
    logger.error(`Redis at ${credentials.url} is unreachable, caching disabled: ${describeError(error)}`);
    return { kind: 'disabled' };
  }
}

export interface AppContextOptions {
  config: AppConfig;
  backend: StoreBackend;
  logger?: Logger;
  /** Replaces the global fetch for upstream calls */
  fetch?: typeof fetch;
  /** Start the periodic prune timer (memory backend only). Defaults to true */
  startPruning?: boolean;
}

export interface AppContext {
  readonly caches: {
    schedule: Cache<ScheduleEntry[]>;
    filters: Cache<FilterOptions>;
    lessons: Cache<Lesson[]>;
    search: Cache<SearchResult[]>;
  };
  readonly client: RuzClient;
  readonly fetcher: ScheduleFetcher;
  readonly searchService: SearchService;
  readonly invalidation: InvalidationController;
  readonly service: ScheduleService;
  readonly pruner?: Pruner;
  /** Stop background work. Cached data is left in place */
  close(): void;
}

/**
 * Build every long-lived object of the service, explicitly and once.
 */
export function createAppContext(options: AppContextOptions): AppContext {
  const { config, backend, logger = silentLogger, fetch: fetchImpl, startPruning = true } = options;

  function storeFor<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>): CacheStore<T> {
    switch (backend.kind) {
      case 'memory':
        return createMemoryStore<T>({ maxSize: config.cache.maxEntries });
      case 'redis':
        return createRedisStore<T>({ redis: backend.redis, schema, prefix: config.cache.keyPrefix });
      case 'disabled':
        return createNoopStore<T>();
    }
  }

  function cacheFor<T>(namespace: string, timeToLive: number, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Cache<T> {
    return createCache<T>({
      namespace,
      timeToLive,
      store: storeFor(schema),
      logger,
      onHitCallback: (key) => logger.debug(`Cache hit: ${namespace}:${key}`),
      onMissCallback: (key) => logger.debug(`Cache miss: ${namespace}:${key}`),
    });
  }

  const caches = {
    schedule: cacheFor('schedule', config.cache.ttl.schedule, scheduleEntriesSchema),
    filters: cacheFor('filters', config.cache.ttl.filters, filterOptionsSchema),
    lessons: cacheFor('lessons', config.cache.ttl.lessons, lessonsSchema),
    search: cacheFor('search', config.cache.ttl.search, searchResultsSchema),
  };
  const allCaches: Cache<unknown>[] = [caches.schedule, caches.filters, caches.lessons, caches.search];

  const client = createRuzClient({
    baseUrl: config.upstream.baseUrl,
    language: config.upstream.language,
    timeout: config.upstream.timeout,
    maxAttempts: config.upstream.maxAttempts,
    backoff: config.upstream.backoff,
    fetch: fetchImpl,
    logger,
  });

  const fetcher = createScheduleFetcher({
    client,
    cache: caches.schedule,
    defaultGroupId: config.upstream.defaultGroupId,
    logger,
  });

  const searchService = createSearchService({
    client,
    cache: caches.search,
    branchTimeout: config.upstream.timeout * config.upstream.maxAttempts,
    logger,
  });

  const invalidation = createInvalidationController({
    caches: allCaches,
    defaultGroupId: config.upstream.defaultGroupId,
    logger,
  });

  const service = createScheduleService({
    fetcher,
    filterCache: caches.filters,
    lessonCache: caches.lessons,
    searchService,
    invalidation,
    caches: allCaches,
    language: config.upstream.language,
    logger,
  });

  const pruner =
    startPruning && backend.kind === 'memory'
      ? startPruner({ caches: allCaches, interval: config.cache.pruneInterval, logger })
      : undefined;

  return {
    caches,
    client,
    fetcher,
    searchService,
    invalidation,
    service,
    pruner,
    close(): void {
      pruner?.stop();
    },
  };
}
