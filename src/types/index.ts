import type { TempoApiError } from '../errors/index.js';

/**
 * Configuration for the Tempo AI request gateway.
 */
export interface TempoConfig {
  apiKey: string;
  baseUrl: string;
  userAgent: string;
  timeoutMs: number;
}

/**
 * Outcome of a single gateway request. Failures are values, not exceptions.
 */
export type ApiResult<T = unknown> =
  | { ok: true; data: T }
  | { ok: false; error: TempoApiError };

export type QueryParams = Record<string, string | number | undefined>;

export interface RequestOptions {
  /** Overrides the configured API key for this call when non-empty */
  apiKey?: string;
  params?: QueryParams;
  /** Aborts the in-flight request, e.g. when the MCP client cancels the tool call */
  signal?: AbortSignal;
}

/**
 * The request contract tool handlers depend on. `TempoClient` implements it;
 * tests substitute fakes.
 */
export interface TempoGateway {
  request(path: string, options?: RequestOptions): Promise<ApiResult>;
}

// Concrete YYYY-MM-DD pair, defaults already applied
export interface DateRange {
  start: string;
  end: string;
}

export interface PageRequest {
  limit: number;
  offset: number;
}

/**
 * Any JSON object returned by the API. Fields are read defensively, since
 * the upstream schema is not under our control.
 */
export type JsonObject = Record<string, unknown>;

/**
 * Items and total unwrapped from a list endpoint. Items are left unknown so
 * malformed entries can be reported individually.
 */
export interface Collection {
  items: unknown[];
  total: number;
}
