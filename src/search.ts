import type { Cache } from './cache.js';
import { searchKey, searchResultsKey } from './cache-keys.js';
import { type Logger, silentLogger, describeError } from './logger.js';
import type { RuzClient } from './ruz-client.js';
import type { SearchResult, SearchType, UpstreamSearchItem } from './schemas.js';

export const SEARCH_TYPES: readonly SearchType[] = [1, 2];

export const MIN_SEARCH_LENGTH = 2;

export interface SearchResponse {
  result: SearchResult[];
  error?: string;
  /** Types whose upstream search failed or timed out; their results are missing */
  failedTypes?: SearchType[];
}

export interface SearchServiceOptions {
  client: RuzClient;
  /** Holds both per-type upstream results and combined results */
  cache: Cache<SearchResult[]>;
  /** Longest wait for one type's upstream search, in milliseconds */
  branchTimeout?: number;
  logger?: Logger;
}

export interface SearchService {
  search(searchString: string, type?: SearchType): Promise<SearchResponse>;
}

class BranchTimeoutError extends Error {
  constructor(ms: number) {
    super(`timed out after ${ms}ms`);
    this.name = 'BranchTimeoutError';
  }
}

function withTimeout<T>(promise: Promise<T>, ms: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new BranchTimeoutError(ms)), ms);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

function toSearchResult(type: SearchType, item: UpstreamSearchItem): SearchResult {
  return {
    type,
    id: item.id === null || item.id === undefined ? '' : String(item.id),
    name: item.label ?? '',
    description: item.description ?? '',
  };
}

/**
 * Group and lecturer search. Each type is queried concurrently; a type that
 * fails or exceeds the branch timeout is left out and reported in
 * `failedTypes` instead of failing the whole search.
 */
export function createSearchService(options: SearchServiceOptions): SearchService {
  const { client, cache, branchTimeout = 15_000, logger = silentLogger } = options;

  async function searchType(term: string, type: SearchType): Promise<SearchResult[]> {
    const key = searchKey(type, term);
    const cached = await cache.get(key);
    if (cached !== undefined) return cached;

    const items = await client.search(term, type);
    const results = items.map((item) => toSearchResult(type, item));
    await cache.set(key, results);
    return results;
  }

  return {
    async search(searchString: string, type?: SearchType): Promise<SearchResponse> {
      // Code points, not UTF-16 units
      if ([...searchString].length < MIN_SEARCH_LENGTH) {
        return { result: [], error: `Search string too short, minimum ${MIN_SEARCH_LENGTH} characters` };
      }

      const key = searchResultsKey(searchString, type);
      const cached = await cache.get(key);
      if (cached !== undefined) {
        return { result: cached };
      }

      const types = type === undefined ? SEARCH_TYPES : [type];
      const settled = await Promise.allSettled(
        types.map((searchedType) => withTimeout(searchType(searchString, searchedType), branchTimeout))
      );

      const result: SearchResult[] = [];
      const failedTypes: SearchType[] = [];
      settled.forEach((outcome, index) => {
        const searchedType = types[index];
        if (outcome.status === 'fulfilled') {
          result.push(...outcome.value);
        } else {
          failedTypes.push(searchedType);
          logger.warn(`Search for type ${searchedType} failed: ${describeError(outcome.reason)}`);
        }
      });

      if (failedTypes.length > 0) {
        return { result, failedTypes };
      }

      await cache.set(key, result);
      return { result };
    },
  };
}
