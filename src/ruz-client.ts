import type { DateRange } from './dates.js';
import { formatApiDate } from './dates.js';
import { MalformedUpstreamResponseError, UpstreamUnavailableError } from './errors.js';
import { type Logger, silentLogger, describeError } from './logger.js';
import {
  type ScheduleEntry,
  type SearchType,
  type UpstreamSearchItem,
  scheduleEntrySchema,
  upstreamSearchItemSchema,
} from './schemas.js';

/** An explicit upstream schedule: the default group is resolved by the caller */
export type ScheduleTarget = { kind: 'group'; groupId: number } | { kind: 'person'; personId: number };

export interface RuzClientOptions {
  /** e.g. `https://ruz.fa.ru/api` */
  baseUrl: string;
  /** Upstream language code (1 = RU, 3 = EN) */
  language?: number;
  /** Per-attempt timeout in milliseconds */
  timeout?: number;
  /** Total attempts, including the first one */
  maxAttempts?: number;
  /** Delay before the second attempt in milliseconds; doubles after each retry */
  backoff?: number;
  fetch?: typeof fetch;
  logger?: Logger;
}

export interface RuzClient {
  readonly language: number;
  getSchedule(range: DateRange, target: ScheduleTarget): Promise<ScheduleEntry[]>;
  search(term: string, type: SearchType): Promise<UpstreamSearchItem[]>;
}

const SEARCH_TYPE_NAMES: Record<SearchType, string> = {
  1: 'group',
  2: 'lecturer',
};

/**
 * Client for the RUZ schedule API. Transient failures are retried with
 * exponential backoff; everything else surfaces as UpstreamUnavailableError
 * or MalformedUpstreamResponseError.
 */
export function createRuzClient(options: RuzClientOptions): RuzClient {
  const {
    baseUrl,
    language = 3,
    timeout = 10_000,
    maxAttempts = 3,
    backoff = 100,
    fetch: fetchImpl = fetch,
    logger = silentLogger,
  } = options;

  if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
    throw new Error('maxAttempts must be a positive integer');
  }

  const root = baseUrl.replace(/\/+$/, '');

  async function requestOnce(url: string): Promise<unknown> {
    let response: Response;
    try {
      response = await fetchImpl(url, {
        signal: AbortSignal.timeout(timeout),
        headers: { Accept: 'application/json' },
      });
    } catch (error) {
      throw new UpstreamUnavailableError(`Request to ${url} failed: ${describeError(error)}`, undefined, {
        cause: error,
      });
    }

    if (!response.ok) {
      throw new UpstreamUnavailableError(`HTTP ${response.status}: ${response.statusText}`, response.status);
    }

    let body: string;
    try {
      body = await response.text();
    } catch (error) {
      throw new UpstreamUnavailableError(`Reading body of ${url} failed: ${describeError(error)}`, undefined, {
        cause: error,
      });
    }

    try {
      return JSON.parse(body);
    } catch (error) {
      throw new MalformedUpstreamResponseError(`Response of ${url} is not valid JSON`, { cause: error });
    }
  }

  async function requestJson(url: string): Promise<unknown> {
    let lastError: unknown;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      try {
        return await requestOnce(url);
      } catch (error) {
        lastError = error;
        const retryable = error instanceof UpstreamUnavailableError && error.retryable;
        if (!retryable || attempt === maxAttempts) break;

        const delay = backoff * Math.pow(2, attempt - 1);
        logger.debug(`Attempt ${attempt} for ${url} failed (${describeError(error)}), retrying in ${delay}ms`);
        await new Promise((resolve) => setTimeout(resolve, delay));
      }
    }

    throw lastError;
  }

  function expectArray(data: unknown, url: string): unknown[] {
    if (!Array.isArray(data)) {
      throw new MalformedUpstreamResponseError(`Expected a JSON array from ${url}`);
    }
    return data;
  }

  return {
    language,

    async getSchedule(range: DateRange, target: ScheduleTarget): Promise<ScheduleEntry[]> {
      const path =
        target.kind === 'person' ? `schedule/person/${target.personId}` : `schedule/group/${target.groupId}`;
      const params = new URLSearchParams({
        start: formatApiDate(range.start),
        finish: formatApiDate(range.end),
        lng: String(language),
      });
      const url = `${root}/${path}?${params.toString()}`;

      const rows = expectArray(await requestJson(url), url);
      const entries: ScheduleEntry[] = [];
      for (const row of rows) {
        const parsed = scheduleEntrySchema.safeParse(row);
        if (parsed.success) {
          entries.push(parsed.data);
        }
      }
      if (entries.length < rows.length) {
        logger.warn(`Skipped ${rows.length - entries.length} malformed schedule rows from ${url}`);
      }
      return entries;
    },

    async search(term: string, type: SearchType): Promise<UpstreamSearchItem[]> {
      const params = new URLSearchParams({ term, type: SEARCH_TYPE_NAMES[type] });
      const url = `${root}/search?${params.toString()}`;

      const items = expectArray(await requestJson(url), url);
      const results: UpstreamSearchItem[] = [];
      for (const item of items) {
        const parsed = upstreamSearchItemSchema.safeParse(item);
        if (parsed.success) {
          results.push(parsed.data);
        } else {
          logger.debug(`Skipping non-object search item from ${url}`);
        }
      }
      return results;
    },
  };
}
