import { format, isValid, parseISO } from 'date-fns';
import { formatInTimeZone } from 'date-fns-tz';
import type { DateRange } from '../types/index.js';

export const DEFAULT_START_DAYS_AGO = 30;

const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Format a date as YYYY-MM-DD in UTC.
 */
export function toUtcDateString(date: Date): string {
  return formatInTimeZone(date, 'UTC', 'yyyy-MM-dd');
}

/**
 * The UTC calendar date `days` days from `now`. Shifting the UTC fields
 * directly keeps host daylight-saving changes out of the result.
 */
function shiftUtcDate(now: Date, days: number): string {
  return toUtcDateString(
    new Date(Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate() + days))
  );
}

/**
 * Fill in missing ends of a date range.
 *
 * A missing start defaults to `defaultStartDaysAgo` days before today (UTC).
 * A missing end defaults to tomorrow rather than today: the caller's "today"
 * may already be tomorrow in UTC, and the upstream filter is inclusive by
 * date, so ending today would drop records logged late in the caller's day.
 *
 * Supplied values are returned untouched.
 */
export function resolveDateRange(
  start?: string,
  end?: string,
  defaultStartDaysAgo: number = DEFAULT_START_DAYS_AGO,
  now: Date = new Date()
): DateRange {
  return {
    start: start || shiftUtcDate(now, -defaultStartDaysAgo),
    end: end || shiftUtcDate(now, 1),
  };
}

/**
 * Check that a string is a real calendar date in YYYY-MM-DD form.
 * Rejects dates that parse but roll over, such as 2024-02-30.
 */
export function isValidDate(value: string): boolean {
  if (!ISO_DATE_PATTERN.test(value)) {
    return false;
  }
  const parsed = parseISO(value);
  // parseISO reads a bare date as local midnight, so format back in local time
  return isValid(parsed) && format(parsed, 'yyyy-MM-dd') === value;
}
