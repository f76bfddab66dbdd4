import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { TempoGateway } from '../types/index.js';
import { WorkoutTools } from './workouts.js';
import { EventTools } from './events.js';
import { WellnessTools } from './wellness.js';
import {
  GetEventDetailsParams,
  GetEventsParams,
  GetWellnessParams,
  GetWorkoutDetailsParams,
  GetWorkoutsParams,
} from './types.js';
import { buildToolResponse, type ToolResponse } from '../utils/response-builder.js';

/**
 * A tool as handed to the MCP server: schema shape for the protocol, and a
 * handler that validates its own arguments.
 */
export interface ToolDefinition {
  name: string;
  description: string;
  inputSchema: z.ZodRawShape;
  handler: (args: unknown, signal?: AbortSignal) => Promise<ToolResponse>;
}

interface ToolSpec<T extends z.AnyZodObject> {
  name: string;
  description: string;
  schema: T;
  /** Noun used in "Error fetching <noun>: ..." if the handler throws */
  errorLabel: string;
  handler: (args: z.infer<T>, signal?: AbortSignal) => Promise<string>;
}

/**
 * Wraps a tool handler with argument parsing, logging and a last-resort
 * catch that turns anything the handler throws into an "Error fetching ..."
 * line. Over MCP the server has already checked arguments against the shape.
 */
function defineTool<T extends z.AnyZodObject>(spec: ToolSpec<T>): ToolDefinition {
  return {
    name: spec.name,
    description: spec.description,
    inputSchema: spec.schema.shape,
    handler: async (args, signal) => {
      // stdout belongs to the stdio transport, so log to stderr
      console.error(`[Tool] Calling tool: ${spec.name}`);
      try {
        const text = await spec.handler(spec.schema.parse(args), signal);
        return buildToolResponse(text);
      } catch (error) {
        const message = error instanceof Error ? error.message : 'An unknown error occurred';
        console.error(`[Tool] ${spec.name} failed:`, error);
        return buildToolResponse(`Error fetching ${spec.errorLabel}: ${message}`);
      }
    },
  };
}

export class ToolRegistry {
  private workoutTools: WorkoutTools;
  private eventTools: EventTools;
  private wellnessTools: WellnessTools;
  private definitions: ToolDefinition[];

  constructor(tempo: TempoGateway) {
    this.workoutTools = new WorkoutTools(tempo);
    this.eventTools = new EventTools(tempo);
    this.wellnessTools = new WellnessTools(tempo);
    this.definitions = this.buildDefinitions();
  }

  /**
   * The full tool table, built once per registry.
   */
  getToolDefinitions(): ToolDefinition[] {
    return this.definitions;
  }

  /**
   * Register all tools with the MCP server
   */
  registerTools(server: Pick<McpServer, 'tool'>): void {
    for (const tool of this.definitions) {
      server.tool(tool.name, tool.description, tool.inputSchema, async (args, extra) =>
        tool.handler(args, extra.signal)
      );
    }
  }

  private buildDefinitions(): ToolDefinition[] {
    return [
      defineTool({
        name: 'get_workouts',
        description: `Lists the user's completed workouts from Tempo AI, most useful for reviewing recent training.

<use-cases>
- Reviewing what the user has done over a period of time.
- Finding a workout ID to pass to get_workout_details.
- Summarizing training load and volume across several sessions.
</use-cases>

<notes>
- Dates default to the last 30 days, up to and including tomorrow (UTC).
- Use limit and offset to page through long histories; limit is capped at 250.
</notes>`,
        schema: GetWorkoutsParams,
        errorLabel: 'workouts',
        handler: (args, signal) => this.workoutTools.getWorkouts(args, signal),
      }),

      defineTool({
        name: 'get_workout_details',
        description: `Fetches everything Tempo AI knows about a single workout: duration, distance and elevation, speed, power, heart rate, training load, energy and subjective feedback.

<instructions>
- Get the workout_id from get_workouts first.
</instructions>`,
        schema: GetWorkoutDetailsParams,
        errorLabel: 'workout details',
        handler: (args, signal) => this.workoutTools.getWorkoutDetails(args, signal),
      }),

      defineTool({
        name: 'get_events',
        description: `Lists events on the user's Tempo AI calendar, such as races and goal events.

<use-cases>
- Finding upcoming races to plan training around.
- Looking up an event ID to pass to get_event_details.
</use-cases>

<notes>
- Dates default to the last 30 days, up to and including tomorrow (UTC). Pass an end_date in the future to see upcoming events.
</notes>`,
        schema: GetEventsParams,
        errorLabel: 'events',
        handler: (args, signal) => this.eventTools.getEvents(args, signal),
      }),

      defineTool({
        name: 'get_event_details',
        description: `Fetches a single calendar event with course details, targets, settings and links.`,
        schema: GetEventDetailsParams,
        errorLabel: 'event details',
        handler: (args, signal) => this.eventTools.getEventDetails(args, signal),
      }),

      defineTool({
        name: 'get_wellness',
        description: `Returns daily wellness entries: weight and body composition, sleep, resting heart rate, HRV, readiness and VO2max, with 7-day baselines where available.

<use-cases>
- Assessing recovery and readiness trends.
- Correlating sleep or HRV with recent training.
</use-cases>

<notes>
- Dates default to the last 30 days, up to and including tomorrow (UTC).
</notes>`,
        schema: GetWellnessParams,
        errorLabel: 'wellness data',
        handler: (args, signal) => this.wellnessTools.getWellness(args, signal),
      }),
    ];
  }
}
