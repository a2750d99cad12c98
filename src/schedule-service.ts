import { z } from 'zod';
import type { Cache } from './cache.js';
import { type LessonFilters, type Selector, filterOptionsKey, lessonsKey } from './cache-keys.js';
import { type DateRange, orderRange, padRange, parseIsoDate } from './dates.js';
import { InvalidQueryError } from './errors.js';
import type { InvalidationController } from './invalidation.js';
import { type Logger, silentLogger } from './logger.js';
import { buildFilterOptions, buildLessons } from './query-processor.js';
import type { ScheduleFetcher } from './schedule-fetcher.js';
import type { FilterOptions, Lesson } from './schemas.js';
import type { SearchResponse, SearchService } from './search.js';
import type { CacheStats } from './types.js';

export const DEFAULT_DATE_FROM = '2025-09-01T00:00:00Z';
export const DEFAULT_DATE_TO = '2025-09-30T23:59:59Z';

/** Days added on each side of a lesson query to absorb timezone differences */
const LESSON_RANGE_PADDING_DAYS = 1;

const idSchema = z
  .union([z.number(), z.string().trim().regex(/^\d+$/, 'must be a numeric id').transform(Number)])
  .refine((value) => Number.isSafeInteger(value) && value >= 0, 'must be a non-negative integer');

const idListSchema = z.array(idSchema).nullish();

const rangeFields = {
  dateFrom: z.string().default(DEFAULT_DATE_FROM),
  dateTo: z.string().default(DEFAULT_DATE_TO),
  group: idSchema.nullish(),
  lecturer: idSchema.nullish(),
};

const filterOptionsQuerySchema = z.object(rangeFields);

const lessonsQuerySchema = z.object({
  ...rangeFields,
  filters: z
    .object({
      disciplineIds: idListSchema,
      locationIds: idListSchema,
      lecturerIds: idListSchema,
    })
    .default({}),
});

const searchQuerySchema = z.object({
  searchString: z.string().default(''),
  type: idSchema
    .nullish()
    .refine((value) => value === null || value === undefined || value === 1 || value === 2, 'must be 1 or 2'),
});

const clearCacheQuerySchema = z.object({
  group: idSchema.nullish(),
  lecturer: idSchema.nullish(),
});

function parseQuery<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown): T {
  const parsed = schema.safeParse(input ?? {});
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue.path.join('.');
    throw new InvalidQueryError(field ? `${field}: ${issue.message}` : issue.message, field || undefined);
  }
  return parsed.data;
}

function selectorOf(query: { group?: number | null; lecturer?: number | null }): Selector {
  // A lecturer takes precedence over a group, as upstream does
  if (query.lecturer !== null && query.lecturer !== undefined) {
    return { kind: 'person', personId: query.lecturer };
  }
  if (query.group !== null && query.group !== undefined) {
    return { kind: 'group', groupId: query.group };
  }
  return { kind: 'default' };
}

function rangeOf(query: { dateFrom: string; dateTo: string }): DateRange {
  return orderRange(parseIsoDate(query.dateFrom, 'dateFrom'), parseIsoDate(query.dateTo, 'dateTo'));
}

export interface ScheduleServiceOptions {
  fetcher: ScheduleFetcher;
  filterCache: Cache<FilterOptions>;
  lessonCache: Cache<Lesson[]>;
  searchService: SearchService;
  invalidation: InvalidationController;
  /** Every cache reported by `cacheStats()` */
  caches: readonly Cache<unknown>[];
  /** Upstream language code, part of the filter-options and lessons keys */
  language: number;
  logger?: Logger;
}

export interface ClearCacheResult {
  status: 'success';
  message: string;
  removed?: number;
}

/**
 * The operations the HTTP layer exposes. Inputs are untrusted request data
 * and are validated here; invalid input raises InvalidQueryError.
 */
export interface ScheduleService {
  getFilterOptions(input: unknown): Promise<FilterOptions>;
  getLessons(input: unknown): Promise<{ lessons: Lesson[] }>;
  search(input: unknown): Promise<SearchResponse>;
  clearCache(input: unknown): Promise<ClearCacheResult>;
  cacheStats(): Record<string, CacheStats>;
}

export function createScheduleService(options: ScheduleServiceOptions): ScheduleService {
  const {
    fetcher,
    filterCache,
    lessonCache,
    searchService,
    invalidation,
    caches,
    language,
    logger = silentLogger,
  } = options;

  return {
    async getFilterOptions(input: unknown): Promise<FilterOptions> {
      const query = parseQuery(filterOptionsQuerySchema, input);
      const range = rangeOf(query);
      const selector = selectorOf(query);

      const key = filterOptionsKey(range, selector, language);
      const cached = await filterCache.get(key);
      if (cached !== undefined) {
        logger.debug(`Cache hit for filter options: ${key}`);
        return cached;
      }

      const { entries, source } = await fetcher.fetchWithStatus(range, selector);
      const personId = selector.kind === 'person' ? selector.personId : undefined;
      const filterOptions = buildFilterOptions(entries, { personId });

      if (source !== 'error') {
        await filterCache.set(key, filterOptions);
      }
      return filterOptions;
    },

    async getLessons(input: unknown): Promise<{ lessons: Lesson[] }> {
      const query = parseQuery(lessonsQuerySchema, input);
      const range = padRange(rangeOf(query), LESSON_RANGE_PADDING_DAYS);
      const selector = selectorOf(query);
      const filters: LessonFilters = query.filters;

      const key = lessonsKey(range, selector, language, filters);
      const cached = await lessonCache.get(key);
      if (cached !== undefined) {
        logger.debug(`Cache hit for lessons: ${key}`);
        return { lessons: cached };
      }

      const { entries, source } = await fetcher.fetchWithStatus(range, selector);
      const lessons = buildLessons(entries, filters);
      logger.debug(`Built ${lessons.length} of ${entries.length} schedule entries for ${key}`);

      if (source !== 'error') {
        await lessonCache.set(key, lessons);
      }
      return { lessons };
    },

    async search(input: unknown): Promise<SearchResponse> {
      const query = parseQuery(searchQuerySchema, input);
      const type = query.type === 1 || query.type === 2 ? query.type : undefined;
      return searchService.search(query.searchString, type);
    },

    async clearCache(input: unknown): Promise<ClearCacheResult> {
      const query = parseQuery(clearCacheQuerySchema, input);

      if (query.group !== null && query.group !== undefined) {
        const removed = await invalidation.clearByGroup(query.group);
        return { status: 'success', message: `Cleared cache entries for group ${query.group}`, removed };
      }
      if (query.lecturer !== null && query.lecturer !== undefined) {
        const removed = await invalidation.clearByLecturer(query.lecturer);
        return { status: 'success', message: `Cleared cache entries for lecturer ${query.lecturer}`, removed };
      }

      await invalidation.clearAll();
      return { status: 'success', message: 'All caches cleared' };
    },

    cacheStats(): Record<string, CacheStats> {
      const stats: Record<string, CacheStats> = {};
      for (const cache of caches) {
        stats[cache.namespace] = cache.stats();
      }
      return stats;
    },
  };
}
