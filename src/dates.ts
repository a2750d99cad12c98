import { InvalidQueryError } from './errors.js';

export interface DateRange {
  start: Date;
  end: Date;
}

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Format a date the way the schedule API expects it: `YYYY.MM.DD` from its UTC fields.
 */
export function formatApiDate(date: Date): string {
  if (Number.isNaN(date.getTime())) {
    throw new InvalidQueryError('Invalid date');
  }
  const year = date.getUTCFullYear().toString().padStart(4, '0');
  const month = (date.getUTCMonth() + 1).toString().padStart(2, '0');
  const day = date.getUTCDate().toString().padStart(2, '0');
  return `${year}.${month}.${day}`;
}

const INVALID_DATE_FORMAT = 'Invalid date format. Use ISO format (YYYY-MM-DDTHH:MM:SSZ)';

const ISO_TIMESTAMP =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d+))?)?(?:Z|[+-]\d{2}:?\d{2})?)?$/;

/**
 * Parse an ISO-8601 timestamp, keeping the calendar date and time as written.
 * A trailing offset is accepted and ignored, so neither it nor the host
 * timezone can move the day. Fields are stored in the UTC slots of the Date,
 * which is where formatApiDate reads them back.
 */
export function parseIsoDate(value: string, field: string): Date {
  const match = ISO_TIMESTAMP.exec(value);
  if (!match) {
    throw new InvalidQueryError(INVALID_DATE_FORMAT, field);
  }

  const [, year, month, day, hours = '0', minutes = '0', seconds = '0', fraction = ''] = match;
  const parts = [year, month, day, hours, minutes, seconds].map(Number);
  const millis = Number(fraction.slice(0, 3).padEnd(3, '0'));

  const date = new Date(0);
  date.setUTCFullYear(parts[0], parts[1] - 1, parts[2]);
  date.setUTCHours(parts[3], parts[4], parts[5], millis);

  // Date rolls impossible fields over (Feb 30 -> Mar 2), so compare them back
  const roundTrip = [
    date.getUTCFullYear(),
    date.getUTCMonth() + 1,
    date.getUTCDate(),
    date.getUTCHours(),
    date.getUTCMinutes(),
    date.getUTCSeconds(),
  ];
  if (roundTrip.some((part, index) => part !== parts[index])) {
    throw new InvalidQueryError(INVALID_DATE_FORMAT, field);
  }
  return date;
}

/**
 * Order a range so that start <= end.
 */
export function orderRange(start: Date, end: Date): DateRange {
  return end < start ? { start: end, end: start } : { start, end };
}

/**
 * Widen a range by whole days on each side.
 */
export function padRange(range: DateRange, days: number): DateRange {
  return {
    start: new Date(range.start.getTime() - days * DAY_MS),
    end: new Date(range.end.getTime() + days * DAY_MS),
  };
}
