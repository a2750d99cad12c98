import type { Cache } from './cache.js';
import { type Selector, scheduleKey } from './cache-keys.js';
import type { DateRange } from './dates.js';
import { type Logger, silentLogger, describeError } from './logger.js';
import type { RuzClient, ScheduleTarget } from './ruz-client.js';
import type { ScheduleEntry } from './schemas.js';

export type FetchSource = 'cache' | 'upstream' | 'error';

export interface FetchResult {
  entries: ScheduleEntry[];
  /** Where the entries came from; `error` means the upstream failed and `entries` is empty */
  source: FetchSource;
}

export interface ScheduleFetcherOptions {
  client: RuzClient;
  cache: Cache<ScheduleEntry[]>;
  /** Group queried when a selector names neither a group nor a person */
  defaultGroupId: number;
  /** Override the cache's default TTL for schedules */
  timeToLive?: number;
  /** Determine if a fetched schedule should be cached */
  shouldCache?: (entries: ScheduleEntry[]) => boolean;
  logger?: Logger;
}

export interface ScheduleFetcher {
  /** Entries for the range, or `[]` when the upstream is unavailable */
  fetch(range: DateRange, selector: Selector): Promise<ScheduleEntry[]>;
  fetchWithStatus(range: DateRange, selector: Selector): Promise<FetchResult>;
}

/**
 * Creates a schedule fetcher that checks the cache before calling upstream.
 * Concurrent requests for the same key share one upstream call, and failed
 * calls are never cached.
 */
export function createScheduleFetcher(options: ScheduleFetcherOptions): ScheduleFetcher {
  const { client, cache, defaultGroupId, timeToLive, shouldCache, logger = silentLogger } = options;

  // Map to track in-flight requests for deduplication
  const inFlightRequests = new Map<string, Promise<FetchResult>>();

  function targetOf(selector: Selector): ScheduleTarget {
    switch (selector.kind) {
      case 'person':
        return selector;
      case 'group':
        return selector;
      case 'default':
        return { kind: 'group', groupId: defaultGroupId };
    }
  }

  async function fetchWithStatus(range: DateRange, selector: Selector): Promise<FetchResult> {
    const key = scheduleKey(range, selector, client.language);

    const cached = await cache.get(key);
    if (cached !== undefined) {
      logger.debug(`Cache hit for schedule data: ${key}`);
      return { entries: cached, source: 'cache' };
    }

    // Check if there's already an in-flight request for this key
    const inFlightPromise = inFlightRequests.get(key);
    if (inFlightPromise) {
      return inFlightPromise;
    }

    logger.debug(`Cache miss for schedule data: ${key}`);

    const fetchPromise = (async (): Promise<FetchResult> => {
      try {
        const entries = await client.getSchedule(range, targetOf(selector));

        // Check if result should be cached
        const shouldCacheResult = shouldCache ? shouldCache(entries) : true;
        if (shouldCacheResult) {
          await cache.set(key, entries, timeToLive);
        }

        return { entries, source: 'upstream' };
      } catch (error) {
        logger.warn(`Error fetching schedule data for ${key}: ${describeError(error)}`);
        return { entries: [], source: 'error' };
      } finally {
        // Clean up in-flight map entry after completion (success or failure)
        inFlightRequests.delete(key);
      }
    })();

    // Store the promise in the in-flight map
    inFlightRequests.set(key, fetchPromise);

    return fetchPromise;
  }

  return {
    fetchWithStatus,

    async fetch(range: DateRange, selector: Selector): Promise<ScheduleEntry[]> {
      const result = await fetchWithStatus(range, selector);
      return result.entries;
    },
  };
}
