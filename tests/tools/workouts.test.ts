import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { WorkoutTools } from '../../src/tools/workouts.js';
import { TempoApiError } from '../../src/errors/index.js';
import type { TempoGateway } from '../../src/types/index.js';
import { SAMPLE_WORKOUT } from '../fixtures/sample-data.js';

const SAMPLE_SUMMARY = [
  'Workout: Morning Ride',
  '  Type: cycling',
  '  Date: 2024-01-01 08:00:00',
  '  Duration: 1h 0m 0s',
  '  Distance: 25.00 km',
  '  Norm Power: 210 W',
  '  Load: 75',
  '  Intensity: 0.85',
].join('\n');

describe('WorkoutTools', () => {
  const request = vi.fn<TempoGateway['request']>();
  let tools: WorkoutTools;

  beforeEach(() => {
    request.mockReset();
    vi.spyOn(console, 'error').mockImplementation(() => {});
    tools = new WorkoutTools({ request });
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  describe('getWorkouts', () => {
    it('should list workouts with a header', async () => {
      request.mockResolvedValueOnce({ ok: true, data: { workouts: [SAMPLE_WORKOUT], total: 1 } });

      const text = await tools.getWorkouts({ start_date: '2024-01-01', end_date: '2024-01-31' });

      expect(text).toBe(`Workouts (1 of 1 total):\n\n${SAMPLE_SUMMARY}`);
      expect(request).toHaveBeenCalledWith('/mcp/workouts', {
        apiKey: undefined,
        params: { start_date: '2024-01-01', end_date: '2024-01-31', limit: 50, offset: 0 },
        signal: undefined,
      });
    });

    it('should report the overall total when paginated', async () => {
      request.mockResolvedValueOnce({ ok: true, data: { workouts: [SAMPLE_WORKOUT], total: 12 } });

      const text = await tools.getWorkouts({ limit: 1 });

      expect(text.split('\n')[0]).toBe('Workouts (1 of 12 total):');
    });

    it('should say so when there are no workouts', async () => {
      request.mockResolvedValueOnce({ ok: true, data: { workouts: [], total: 0 } });

      expect(await tools.getWorkouts({})).toBe('No workouts found in the specified date range.');
    });

    it('should accept a bare array response', async () => {
      request.mockResolvedValueOnce({ ok: true, data: [SAMPLE_WORKOUT] });

      expect(await tools.getWorkouts({})).toBe(`Workouts (1 of 1 total):\n\n${SAMPLE_SUMMARY}`);
    });

    it('should report malformed items and keep the rest', async () => {
      request.mockResolvedValueOnce({ ok: true, data: { workouts: [SAMPLE_WORKOUT, 'oops'], total: 2 } });

      expect(await tools.getWorkouts({})).toBe(
        `Workouts (2 of 2 total):\n\n${SAMPLE_SUMMARY}\n\nInvalid workout format: "oops"`
      );
    });

    it('should clamp pagination before calling the API', async () => {
      request.mockResolvedValueOnce({ ok: true, data: { workouts: [] } });

      await tools.getWorkouts({ start_date: '2024-01-01', end_date: '2024-01-31', limit: 1000, offset: -5 });

      expect(request.mock.calls[0][1]?.params).toEqual({
        start_date: '2024-01-01',
        end_date: '2024-01-31',
        limit: 250,
        offset: 0,
      });
    });

    it('should default the date range to the last 30 days through tomorrow', async () => {
      vi.useFakeTimers();
      vi.setSystemTime(new Date('2024-03-15T12:00:00Z'));
      request.mockResolvedValueOnce({ ok: true, data: { workouts: [] } });

      await tools.getWorkouts({});

      expect(request.mock.calls[0][1]?.params).toMatchObject({
        start_date: '2024-02-14',
        end_date: '2024-03-16',
      });
    });

    it('should pass the API key override and cancellation signal through', async () => {
      const controller = new AbortController();
      request.mockResolvedValueOnce({ ok: true, data: { workouts: [] } });

      await tools.getWorkouts({ api_key: 'test-override-key' }, controller.signal);

      expect(request.mock.calls[0][1]).toMatchObject({
        apiKey: 'test-override-key',
        signal: controller.signal,
      });
    });

    it('should reject malformed dates without calling the API', async () => {
      const text = await tools.getWorkouts({ start_date: '2024/01/01' });

      expect(text).toBe(
        "Error fetching workouts: Invalid date format for start_date: '2024/01/01'. Please use YYYY-MM-DD."
      );
      expect(request).not.toHaveBeenCalled();
    });

    it('should report gateway errors', async () => {
      request.mockResolvedValueOnce({
        ok: false,
        error: TempoApiError.fromHttpStatus(500, { operation: 'GET /mcp/workouts' }, 'Internal Server Error'),
      });

      expect(await tools.getWorkouts({})).toBe(
        'Error fetching workouts: Tempo AI API error (500): Internal Server Error'
      );
    });
  });

  describe('getWorkoutDetails', () => {
    it('should format the workout', async () => {
      request.mockResolvedValueOnce({ ok: true, data: SAMPLE_WORKOUT });

      const text = await tools.getWorkoutDetails({ workout_id: 123 });

      expect(text.split('\n').slice(0, 5)).toEqual([
        'Workout Details:',
        '',
        'General Information:',
        '  ID: 123',
        '  Name: Morning Ride',
      ]);
      expect(request).toHaveBeenCalledWith('/mcp/workouts/123', { apiKey: undefined, signal: undefined });
    });

    it('should say so when the workout has no details', async () => {
      request.mockResolvedValueOnce({ ok: true, data: null });
      expect(await tools.getWorkoutDetails({ workout_id: 123 })).toBe('No details found for workout 123.');

      request.mockResolvedValueOnce({ ok: true, data: {} });
      expect(await tools.getWorkoutDetails({ workout_id: 123 })).toBe('No details found for workout 123.');
    });

    it('should reject payloads that are not objects', async () => {
      request.mockResolvedValueOnce({ ok: true, data: ['not', 'a', 'workout'] });

      expect(await tools.getWorkoutDetails({ workout_id: 123 })).toBe('Invalid workout format for workout 123.');
    });

    it('should report gateway errors', async () => {
      request.mockResolvedValueOnce({
        ok: false,
        error: TempoApiError.fromHttpStatus(404, { operation: 'GET /mcp/workouts/999' }, 'Workout not found'),
      });

      expect(await tools.getWorkoutDetails({ workout_id: 999 })).toBe(
        'Error fetching workout details: Tempo AI API error (404): Workout not found'
      );
    });
  });
});
