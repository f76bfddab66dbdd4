import type {
  ApiResult,
  QueryParams,
  RequestOptions,
  TempoConfig,
  TempoGateway,
} from '../types/index.js';
import { TempoApiError, type ErrorContext } from '../errors/index.js';

export const TEMPO_API_BASE = 'https://api.jointempo.ai/api/v1';
export const DEFAULT_TIMEOUT_MS = 30_000;

// Upstream bodies can be whole HTML error pages; keep messages to one line
const MAX_UPSTREAM_MESSAGE_LENGTH = 200;

/**
 * Read-only client for the Tempo AI API.
 *
 * One instance is created at startup and shared by every tool call. It keeps
 * no per-call state, so concurrent calls are safe; connection reuse is left to
 * the keep-alive pool behind Node's global fetch.
 */
export class TempoClient implements TempoGateway {
  private readonly baseUrl: string;

  constructor(private readonly config: TempoConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
  }

  /**
   * Issue a GET request. Every failure is returned as a TempoApiError value;
   * this method does not throw.
   */
  async request(path: string, options: RequestOptions = {}): Promise<ApiResult> {
    const context: ErrorContext = {
      operation: `GET ${path}`,
      resource: path,
    };

    const apiKey = this.resolveApiKey(options.apiKey);
    if (!apiKey) {
      return { ok: false, error: TempoApiError.authMissing(context) };
    }

    const url = this.buildUrl(path, options.params);
    const timeoutSignal = AbortSignal.timeout(this.config.timeoutMs);
    const signal = options.signal
      ? AbortSignal.any([timeoutSignal, options.signal])
      : timeoutSignal;

    const startedAt = Date.now();
    let response: Response;
    let body: string;
    try {
      response = await fetch(url, {
        method: 'GET',
        headers: {
          Authorization: `Bearer ${apiKey}`,
          Accept: 'application/json',
          'User-Agent': this.config.userAgent,
        },
        signal,
      });
      body = await response.text();
    } catch (error) {
      const failure = options.signal?.aborted
        ? TempoApiError.cancelled(context)
        : timeoutSignal.aborted
          ? TempoApiError.timeout(context, this.config.timeoutMs)
          : TempoApiError.networkError(context, error);
      console.error(`[Tempo] GET ${path} failed after ${Date.now() - startedAt}ms: ${failure.message}`);
      return { ok: false, error: failure };
    }

    console.error(`[Tempo] GET ${path} ${response.status} (${Date.now() - startedAt}ms)`);

    if (!response.ok) {
      const upstreamMessage = extractUpstreamMessage(body) ?? response.statusText;
      return {
        ok: false,
        error: TempoApiError.fromHttpStatus(response.status, context, upstreamMessage),
      };
    }

    // 204 and other empty successes carry no entity
    if (body.trim() === '') {
      return { ok: true, data: null };
    }

    try {
      const data: unknown = JSON.parse(body);
      return { ok: true, data };
    } catch (error) {
      return { ok: false, error: TempoApiError.decodeError(context, error) };
    }
  }

  private resolveApiKey(override?: string): string | undefined {
    const trimmed = override?.trim();
    if (trimmed) {
      return trimmed;
    }
    return this.config.apiKey || undefined;
  }

  private buildUrl(path: string, params?: QueryParams): string {
    const url = new URL(`${this.baseUrl}${path}`);
    if (params) {
      Object.entries(params).forEach(([key, value]) => {
        if (value !== undefined) {
          url.searchParams.set(key, String(value));
        }
      });
    }
    return url.toString();
  }
}

/**
 * Find a human-readable message in an error response body. JSON bodies are
 * searched for the usual fields; anything else is used as plain text.
 */
export function extractUpstreamMessage(body: string): string | undefined {
  const trimmed = body.trim();
  if (!trimmed) {
    return undefined;
  }

  try {
    const parsed: unknown = JSON.parse(trimmed);
    if (typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)) {
      for (const field of ['message', 'detail', 'error']) {
        const value: unknown = Reflect.get(parsed, field);
        if (typeof value === 'string' && value) {
          return value;
        }
      }
    }
  } catch {
    // Not JSON; fall through to the raw text
  }

  const singleLine = trimmed.replace(/\s+/g, ' ');
  return singleLine.length > MAX_UPSTREAM_MESSAGE_LENGTH
    ? `${singleLine.slice(0, MAX_UPSTREAM_MESSAGE_LENGTH)}...`
    : singleLine;
}
