import type { PageRequest } from '../types/index.js';

export const DEFAULT_LIMIT = 50;
export const MIN_LIMIT = 1;
export const MAX_LIMIT = 250;

/**
 * Clamp caller-supplied pagination into the range the API accepts.
 * Out-of-range values are pulled to the nearest bound, never rejected.
 */
export function clampPage(limit: number = DEFAULT_LIMIT, offset: number = 0): PageRequest {
  return {
    limit: Math.min(Math.max(toInteger(limit, DEFAULT_LIMIT), MIN_LIMIT), MAX_LIMIT),
    offset: Math.max(toInteger(offset, 0), 0),
  };
}

function toInteger(value: number, fallback: number): number {
  return Number.isNaN(value) ? fallback : Math.trunc(value);
}
