import type { TempoGateway } from '../types/index.js';
import { formatEventDetails, formatEventSummary } from '../utils/formatting.js';
import { buildListText, unwrapCollection } from '../utils/response-builder.js';
import { buildListQuery, readDetail } from './shared.js';
import type { GetEventDetailsInput, GetEventsInput } from './types.js';

export class EventTools {
  constructor(private tempo: TempoGateway) {}

  /**
   * List calendar events (races, goals, planned sessions) in a date range.
   */
  async getEvents(params: GetEventsInput, signal?: AbortSignal): Promise<string> {
    const query = buildListQuery(params, 'fetch events', { paginated: true });
    if (!query.ok) {
      return `Error fetching events: ${query.error.message}`;
    }

    const result = await this.tempo.request('/mcp/events', {
      apiKey: params.api_key,
      params: query.data,
      signal,
    });
    if (!result.ok) {
      return `Error fetching events: ${result.error.message}`;
    }

    return buildListText(
      unwrapCollection(result.data, 'events'),
      {
        title: 'Events',
        emptyMessage: 'No events found in the specified date range.',
        itemLabel: 'event',
      },
      formatEventSummary
    );
  }

  async getEventDetails(params: GetEventDetailsInput, signal?: AbortSignal): Promise<string> {
    const id = params.event_id;
    const path = `/mcp/events/${id}`;

    const result = await this.tempo.request(path, { apiKey: params.api_key, signal });
    if (!result.ok) {
      return `Error fetching event details: ${result.error.message}`;
    }

    const detail = readDetail(result.data, 'event', path);
    if (!detail.ok) {
      return `Invalid event format for event ${id}.`;
    }
    if (!detail.data) {
      return `No details found for event ${id}.`;
    }
    return formatEventDetails(detail.data);
  }
}
