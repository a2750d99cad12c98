/**
 * Cache key derivation.
 *
 * Range-scoped keys look like
 *
 *     v1:<namespace>:<start>:<end>:<selector>:lng<language>[:<filters>]
 *
 * with `:` never appearing inside a segment. The selector is always the fifth
 * segment and is followed by another one, which is what lets invalidation find
 * every key of a group with a plain glob.
 *
 * Bump CACHE_KEY_VERSION whenever the layout changes, so entries written by an
 * older build are never read back.
 */

import { type DateRange, formatApiDate } from './dates.js';
import type { SearchType } from './schemas.js';

export const CACHE_KEY_VERSION = 1;

/** Which upstream schedule a query targets */
export type Selector =
  | { kind: 'default' }
  | { kind: 'group'; groupId: number }
  | { kind: 'person'; personId: number };

/** Id allow-lists. `null` or absent means no restriction on that field */
export interface LessonFilters {
  disciplineIds?: readonly number[] | null;
  locationIds?: readonly number[] | null;
  lecturerIds?: readonly number[] | null;
}

function versioned(namespace: string, ...segments: string[]): string {
  return [`v${CACHE_KEY_VERSION}`, namespace, ...segments].join(':');
}

function assertId(value: number, what: string): void {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new Error(`${what} must be a non-negative integer, got ${value}`);
  }
}

export function selectorToken(selector: Selector): string {
  switch (selector.kind) {
    case 'default':
      return 'default';
    case 'group':
      assertId(selector.groupId, 'groupId');
      return `g${selector.groupId}`;
    case 'person':
      assertId(selector.personId, 'personId');
      return `p${selector.personId}`;
  }
}

function idList(ids: readonly number[] | null | undefined): string {
  if (ids === null || ids === undefined) return '*';
  for (const id of ids) assertId(id, 'filter id');
  return Array.from(new Set(ids))
    .sort((a, b) => a - b)
    .join(',');
}

/**
 * Order-independent encoding of a filter set, e.g. `d=3,17|l=*|p=`.
 * `*` is "any", an empty list is "none".
 */
export function filterToken(filters: LessonFilters): string {
  return `d=${idList(filters.disciplineIds)}|l=${idList(filters.locationIds)}|p=${idList(filters.lecturerIds)}`;
}

function rangeSegments(range: DateRange): [string, string] {
  return [formatApiDate(range.start), formatApiDate(range.end)];
}

/** Raw upstream schedule for one selector */
export function scheduleKey(range: DateRange, selector: Selector, language: number): string {
  return versioned('schedule', ...rangeSegments(range), selectorToken(selector), `lng${language}`);
}

/** Filter options derived from one selector's schedule */
export function filterOptionsKey(range: DateRange, selector: Selector, language: number): string {
  return versioned('filters', ...rangeSegments(range), selectorToken(selector), `lng${language}`);
}

/** Lessons of one selector's schedule after applying a filter set */
export function lessonsKey(range: DateRange, selector: Selector, language: number, filters: LessonFilters): string {
  return versioned('lessons', ...rangeSegments(range), selectorToken(selector), `lng${language}`, filterToken(filters));
}

/** Upstream search results of one type */
export function searchKey(type: SearchType, term: string): string {
  return versioned('search', String(type), encodeURIComponent(term));
}

/** Combined search results, optionally restricted to one type */
export function searchResultsKey(term: string, type?: SearchType): string {
  return versioned('search-results', type === undefined ? 'all' : String(type), encodeURIComponent(term));
}

/**
 * Glob matching every range-scoped key built for `selector`, in any namespace.
 * Search terms are URI-encoded, so no search key can contain the token.
 */
export function selectorPattern(selector: Selector): string {
  return versioned('*', `${selectorToken(selector)}:*`);
}

/** Glob matching every key of any namespace whose selector is `g<groupId>` */
export function groupPattern(groupId: number): string {
  return selectorPattern({ kind: 'group', groupId });
}
