/**
 * Response builder for MCP tools.
 * Unwraps list payloads and turns entities into the plain-text tool results
 * the assistant reads.
 */

import type { Collection, JsonObject } from '../types/index.js';

/**
 * MCP tool result carrying a single text block.
 */
export interface ToolResponse {
  content: Array<{ type: 'text'; text: string }>;
  [key: string]: unknown;
}

/**
 * Failures are reported in the text itself rather than through `isError`,
 * so clients show the same "Error fetching ..." line whatever went wrong.
 */
export function buildToolResponse(text: string): ToolResponse {
  return { content: [{ type: 'text', text }] };
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Pull the item list out of a list endpoint response.
 *
 * The API normally answers `{ <field>: [...], total }`, but may degrade to a
 * bare array; both are accepted. Any other shape yields an empty collection.
 */
export function unwrapCollection(payload: unknown, field: string): Collection {
  if (isJsonObject(payload)) {
    const candidate = payload[field];
    const items = Array.isArray(candidate) ? candidate : [];
    const total = typeof payload.total === 'number' ? payload.total : items.length;
    return { items, total };
  }

  if (Array.isArray(payload)) {
    return { items: payload, total: payload.length };
  }

  return { items: [], total: 0 };
}

export interface ListLabels {
  /** Heading, e.g. "Workouts" renders as "Workouts (2 of 10 total):" */
  title: string;
  /** Returned when the collection is empty */
  emptyMessage: string;
  /** Noun for malformed items, e.g. "workout" renders as "Invalid workout format: ..." */
  itemLabel: string;
}

/**
 * Render a collection as text. Items that aren't objects are reported on
 * their own line instead of being dropped, and the rest still render.
 */
export function buildListText(
  collection: Collection,
  labels: ListLabels,
  formatItem: (item: JsonObject) => string
): string {
  if (collection.items.length === 0) {
    return labels.emptyMessage;
  }

  const blocks = collection.items.map((item) =>
    isJsonObject(item)
      ? formatItem(item)
      : `Invalid ${labels.itemLabel} format: ${describeValue(item)}`
  );

  return `${labels.title} (${collection.items.length} of ${collection.total} total):\n\n${blocks.join('\n\n')}`;
}

/**
 * Short printable form of a decoded JSON value.
 */
export function describeValue(value: unknown): string {
  return value === undefined ? 'undefined' : JSON.stringify(value);
}
