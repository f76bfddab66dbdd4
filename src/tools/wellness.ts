import type { TempoGateway } from '../types/index.js';
import { formatWellnessEntry } from '../utils/formatting.js';
import { buildListText, unwrapCollection } from '../utils/response-builder.js';
import { buildListQuery } from './shared.js';
import type { GetWellnessInput } from './types.js';

export class WellnessTools {
  constructor(private tempo: TempoGateway) {}

  /**
   * Daily wellness entries (body composition, sleep, HRV, readiness) in a
   * date range. The endpoint is not paginated.
   */
  async getWellness(params: GetWellnessInput, signal?: AbortSignal): Promise<string> {
    const query = buildListQuery(params, 'fetch wellness data', { paginated: false });
    if (!query.ok) {
      return `Error fetching wellness data: ${query.error.message}`;
    }

    const result = await this.tempo.request('/mcp/wellness', {
      apiKey: params.api_key,
      params: query.data,
      signal,
    });
    if (!result.ok) {
      return `Error fetching wellness data: ${result.error.message}`;
    }

    return buildListText(
      unwrapCollection(result.data, 'wellness'),
      {
        title: 'Wellness Data',
        emptyMessage: 'No wellness data found in the specified date range.',
        itemLabel: 'wellness entry',
      },
      formatWellnessEntry
    );
  }
}
