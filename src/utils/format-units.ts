/**
 * Unit formatting utilities for human-readable output.
 * All units are metric, and all times are rendered in UTC so output does not
 * depend on the host's locale or timezone.
 */

import { isValid } from 'date-fns';
import { formatInTimeZone, toDate } from 'date-fns-tz';

export const NOT_AVAILABLE = 'N/A';

/**
 * Format an ISO timestamp as "YYYY-MM-DD HH:mm:ss" (UTC).
 * Timestamps without an offset are read as UTC. Strings that don't parse are
 * returned unchanged.
 */
export function formatDateTime(value: unknown): string {
  if (value === null || value === undefined) {
    return NOT_AVAILABLE;
  }
  if (typeof value !== 'string') {
    return String(value);
  }
  const parsed = toDate(value, { timeZone: 'UTC' });
  if (!isValid(parsed)) {
    return value;
  }
  return formatInTimeZone(parsed, 'UTC', 'yyyy-MM-dd HH:mm:ss');
}

/**
 * Format duration in seconds, dropping leading zero units.
 * @returns e.g. "1h 0m 0s", "2m 5s" or "45s"
 */
export function formatDuration(seconds: unknown): string {
  if (typeof seconds !== 'number' || !Number.isFinite(seconds)) {
    return NOT_AVAILABLE;
  }
  const h = Math.floor(seconds / 3600);
  const m = Math.floor((seconds % 3600) / 60);
  const s = Math.floor(seconds % 60);

  if (h > 0) {
    return `${h}h ${m}m ${s}s`;
  }
  if (m > 0) {
    return `${m}m ${s}s`;
  }
  return `${s}s`;
}

/**
 * Format a distance in meters.
 * @returns "25.00 km" from a kilometer up, "850 m" below
 */
export function formatDistance(meters: unknown): string {
  if (typeof meters !== 'number' || !Number.isFinite(meters)) {
    return NOT_AVAILABLE;
  }
  if (meters >= 1000) {
    return `${(meters / 1000).toFixed(2)} km`;
  }
  return `${meters.toFixed(0)} m`;
}
