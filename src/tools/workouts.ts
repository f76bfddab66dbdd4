import type { TempoGateway } from '../types/index.js';
import { formatWorkoutDetails, formatWorkoutSummary } from '../utils/formatting.js';
import { buildListText, unwrapCollection } from '../utils/response-builder.js';
import { buildListQuery, readDetail } from './shared.js';
import type { GetWorkoutDetailsInput, GetWorkoutsInput } from './types.js';

export class WorkoutTools {
  constructor(private tempo: TempoGateway) {}

  /**
   * List workouts in a date range, paginated.
   */
  async getWorkouts(params: GetWorkoutsInput, signal?: AbortSignal): Promise<string> {
    const query = buildListQuery(params, 'fetch workouts', { paginated: true });
    if (!query.ok) {
      return `Error fetching workouts: ${query.error.message}`;
    }

    const result = await this.tempo.request('/mcp/workouts', {
      apiKey: params.api_key,
      params: query.data,
      signal,
    });
    if (!result.ok) {
      return `Error fetching workouts: ${result.error.message}`;
    }

    return buildListText(
      unwrapCollection(result.data, 'workouts'),
      {
        title: 'Workouts',
        emptyMessage: 'No workouts found in the specified date range.',
        itemLabel: 'workout',
      },
      formatWorkoutSummary
    );
  }

  /**
   * Get the full record for a single workout.
   */
  async getWorkoutDetails(params: GetWorkoutDetailsInput, signal?: AbortSignal): Promise<string> {
    const id = params.workout_id;
    const path = `/mcp/workouts/${id}`;

    const result = await this.tempo.request(path, { apiKey: params.api_key, signal });
    if (!result.ok) {
      return `Error fetching workout details: ${result.error.message}`;
    }

    const detail = readDetail(result.data, 'workout', path);
    if (!detail.ok) {
      return `Invalid workout format for workout ${id}.`;
    }
    if (!detail.data) {
      return `No details found for workout ${id}.`;
    }
    return formatWorkoutDetails(detail.data);
  }
}
