/**
 * Error model for the Tempo AI MCP server.
 * Errors are returned as values from the gateway, never thrown past it, and
 * every message is written to be shown to the end user as-is.
 */

/**
 * Kinds of failure the request path can produce.
 */
export type ErrorKind =
  | 'auth_missing'  // No API key configured and none passed with the call
  | 'http_status'   // Upstream answered with a non-2xx status
  | 'network'       // Connection, TLS, timeout or cancellation
  | 'decode'        // Response body is not valid JSON
  | 'invalid_shape' // Valid JSON, wrong structure for the entity
  | 'validation';   // Caller input rejected before any request was made

/**
 * Context information about what operation was being performed when the error occurred.
 */
export interface ErrorContext {
  /** What operation was being attempted (e.g., "fetch workouts") */
  operation: string;
  /** The specific resource involved (e.g., "/mcp/workouts/123") */
  resource?: string;
  /** The input parameters that were provided */
  parameters?: Record<string, unknown>;
}

/**
 * Base error class for all request and tool errors.
 */
export class ApiError extends Error {
  public override readonly name: string = 'ApiError';

  constructor(
    message: string,
    public readonly kind: ErrorKind,
    public readonly isRetryable: boolean,
    public readonly context: ErrorContext,
    public readonly statusCode?: number
  ) {
    super(message);
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ApiError);
    }
  }
}

/**
 * Error produced by the Tempo AI request gateway.
 */
export class TempoApiError extends ApiError {
  public override readonly name = 'TempoApiError';

  constructor(
    message: string,
    kind: ErrorKind,
    isRetryable: boolean,
    context: ErrorContext,
    statusCode?: number
  ) {
    super(message, kind, isRetryable, context, statusCode);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, TempoApiError);
    }
  }

  static authMissing(context: ErrorContext): TempoApiError {
    return new TempoApiError(
      'No API key available. Set API_KEY in the environment or pass api_key with the request.',
      'auth_missing',
      false,
      context
    );
  }

  /**
   * Create an error from an HTTP response status code and whatever message
   * the upstream API put in the body.
   */
  static fromHttpStatus(
    statusCode: number,
    context: ErrorContext,
    upstreamMessage?: string
  ): TempoApiError {
    const detail = upstreamMessage ? `: ${upstreamMessage}` : '';
    const isRetryable = statusCode === 429 || statusCode >= 500;
    return new TempoApiError(
      `Tempo AI API error (${statusCode})${detail}`,
      'http_status',
      isRetryable,
      context,
      statusCode
    );
  }

  /**
   * Create an error for network/connection issues.
   */
  static networkError(context: ErrorContext, originalError?: unknown): TempoApiError {
    const cause = describeCause(originalError);
    const errorDetail = cause ? `: ${cause}` : '';
    return new TempoApiError(
      `Unable to reach Tempo AI${errorDetail}`,
      'network',
      true,
      context
    );
  }

  static timeout(context: ErrorContext, timeoutMs: number): TempoApiError {
    return new TempoApiError(
      `Request to Tempo AI timed out after ${timeoutMs}ms`,
      'network',
      true,
      context
    );
  }

  static cancelled(context: ErrorContext): TempoApiError {
    return new TempoApiError('Request to Tempo AI was cancelled', 'network', false, context);
  }

  static decodeError(context: ErrorContext, originalError?: unknown): TempoApiError {
    const cause = describeCause(originalError);
    const errorDetail = cause ? ` (${cause})` : '';
    return new TempoApiError(
      `Tempo AI returned a response that is not valid JSON${errorDetail}`,
      'decode',
      false,
      context
    );
  }

  static invalidShape(context: ErrorContext, expected: string): TempoApiError {
    return new TempoApiError(
      `Tempo AI returned data that is not a valid ${expected}`,
      'invalid_shape',
      false,
      context
    );
  }

  static invalidDate(context: ErrorContext, parameterName: string, input: string): TempoApiError {
    return new TempoApiError(
      `Invalid date format for ${parameterName}: '${input}'. Please use YYYY-MM-DD.`,
      'validation',
      false,
      { ...context, parameters: { [parameterName]: input } }
    );
  }
}

/**
 * Pull the most useful message out of a thrown value. Node's fetch wraps
 * socket errors in a TypeError("fetch failed") whose `cause` has the detail.
 */
function describeCause(error: unknown): string | undefined {
  if (!(error instanceof Error)) {
    return typeof error === 'string' && error ? error : undefined;
  }
  if (error.cause instanceof Error && error.cause.message) {
    return `${error.message} (${error.cause.message})`;
  }
  return error.message || undefined;
}
