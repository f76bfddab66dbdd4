import type { ApiResult, JsonObject, QueryParams } from '../types/index.js';
import { TempoApiError } from '../errors/index.js';
import { isValidDate, resolveDateRange } from '../utils/date-range.js';
import { clampPage } from '../utils/pagination.js';
import { isJsonObject } from '../utils/response-builder.js';
import type { ListToolInput } from './types.js';

/**
 * Turn list tool input into API query parameters: reject malformed dates,
 * fill in the default range, and clamp pagination when the endpoint has it.
 */
export function buildListQuery(
  input: ListToolInput,
  operation: string,
  options: { paginated: boolean }
): ApiResult<QueryParams> {
  for (const name of ['start_date', 'end_date'] as const) {
    const value = input[name];
    if (value && !isValidDate(value)) {
      return { ok: false, error: TempoApiError.invalidDate({ operation }, name, value) };
    }
  }

  const range = resolveDateRange(input.start_date, input.end_date);
  const params: QueryParams = {
    start_date: range.start,
    end_date: range.end,
  };

  if (options.paginated) {
    const page = clampPage(input.limit, input.offset);
    params.limit = page.limit;
    params.offset = page.offset;
  }

  return { ok: true, data: params };
}

/**
 * Classify a detail endpoint payload. Empty payloads resolve to null ("no
 * details"); anything other than an object is an invalid_shape error.
 */
export function readDetail(
  payload: unknown,
  entity: string,
  resource: string
): ApiResult<JsonObject | null> {
  if (!payload || (isJsonObject(payload) && Object.keys(payload).length === 0)) {
    return { ok: true, data: null };
  }
  if (!isJsonObject(payload)) {
    const error = TempoApiError.invalidShape({ operation: `read ${entity}`, resource }, entity);
    console.error(`[Tempo] ${error.message} at ${resource}`);
    return { ok: false, error };
  }
  return { ok: true, data: payload };
}
