import { z } from 'zod';

// Schema for date parameters; format is checked by the handlers so a bad
// date comes back as an error line rather than a protocol error
export const DateParamSchema = z.string().describe('Date in YYYY-MM-DD format');

export const ApiKeyParamSchema = z
  .string()
  .optional()
  .describe('Tempo AI API key. Optional; defaults to the API_KEY the server was started with');

// No min/max here: out-of-range values are clamped by the handler, not rejected
const limitParam = (noun: string) =>
  z
    .number()
    .int()
    .optional()
    .describe(`Maximum number of ${noun} to return (1-250, defaults to 50)`);

const offsetParam = (noun: string) =>
  z
    .number()
    .int()
    .optional()
    .describe(`Number of ${noun} to skip for pagination (defaults to 0)`);

const dateRangeParams = {
  start_date: DateParamSchema.optional().describe('Start date in YYYY-MM-DD format (defaults to 30 days ago)'),
  end_date: DateParamSchema.optional().describe('End date in YYYY-MM-DD format (defaults to tomorrow)'),
};

// Tool parameter schemas
export const GetWorkoutsParams = z.object({
  ...dateRangeParams,
  limit: limitParam('workouts'),
  offset: offsetParam('workouts'),
  api_key: ApiKeyParamSchema,
});

export const GetWorkoutDetailsParams = z.object({
  workout_id: z.number().int().describe('The Tempo AI workout ID'),
  api_key: ApiKeyParamSchema,
});

export const GetEventsParams = z.object({
  ...dateRangeParams,
  limit: limitParam('events'),
  offset: offsetParam('events'),
  api_key: ApiKeyParamSchema,
});

export const GetEventDetailsParams = z.object({
  event_id: z.number().int().describe('The Tempo AI event ID'),
  api_key: ApiKeyParamSchema,
});

export const GetWellnessParams = z.object({
  ...dateRangeParams,
  api_key: ApiKeyParamSchema,
});

// Type exports
export type GetWorkoutsInput = z.infer<typeof GetWorkoutsParams>;
export type GetWorkoutDetailsInput = z.infer<typeof GetWorkoutDetailsParams>;
export type GetEventsInput = z.infer<typeof GetEventsParams>;
export type GetEventDetailsInput = z.infer<typeof GetEventDetailsParams>;
export type GetWellnessInput = z.infer<typeof GetWellnessParams>;

/**
 * Inputs shared by every date-filtered list tool.
 */
export interface ListToolInput {
  start_date?: string;
  end_date?: string;
  limit?: number;
  offset?: number;
}
