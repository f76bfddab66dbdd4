/**
 * Text renderers for Tempo AI entities. Each takes a decoded JSON object and
 * returns plain text for the assistant; missing fields render as "N/A" or
 * are left out, depending on whether the section is always shown.
 */

import type { JsonObject } from '../types/index.js';
import {
  NOT_AVAILABLE,
  formatDateTime,
  formatDistance,
  formatDuration,
} from './format-units.js';

const EVENT_SUMMARY_DESCRIPTION_LENGTH = 100;

function isPresent(value: unknown): boolean {
  return value !== null && value !== undefined;
}

// Truthiness mirrors how the API marks optional metrics: 0 and '' mean unset
function isSet(value: unknown): boolean {
  return Boolean(value);
}

function text(data: JsonObject, key: string, fallback: string = NOT_AVAILABLE): string {
  const value = data[key];
  return isPresent(value) ? String(value) : fallback;
}

function fixed(value: unknown, digits: number): string {
  return typeof value === 'number' ? value.toFixed(digits) : String(value);
}

function yesNo(value: unknown): string {
  return value ? 'Yes' : 'No';
}

/**
 * Append a titled section followed by a blank line, or nothing when empty.
 */
function pushSection(lines: string[], title: string, entries: string[]): void {
  if (entries.length === 0) {
    return;
  }
  lines.push(`${title}:`, ...entries, '');
}

// ============================================================================
// Workouts
// ============================================================================

export function formatWorkoutSummary(workout: JsonObject): string {
  const lines = [
    `Workout: ${text(workout, 'name', 'Unnamed')}`,
    `  Type: ${text(workout, 'workout_type', 'Unknown')}`,
    `  Date: ${formatDateTime(workout.start_time)}`,
    `  Duration: ${formatDuration(workout.duration_total_seconds)}`,
    `  Distance: ${formatDistance(workout.distance_meters)}`,
  ];

  if (isSet(workout.power_normalized)) {
    lines.push(`  Norm Power: ${text(workout, 'power_normalized')} W`);
  }
  if (isSet(workout.training_stress_score)) {
    lines.push(`  Load: ${text(workout, 'training_stress_score')}`);
  }
  if (isSet(workout.intensity_factor)) {
    lines.push(`  Intensity: ${fixed(workout.intensity_factor, 2)}`);
  }

  return lines.join('\n');
}

export function formatWorkoutDetails(workout: JsonObject): string {
  const lines = ['Workout Details:', ''];

  const general = [
    `  ID: ${text(workout, 'id')}`,
    `  Name: ${text(workout, 'name', 'Unnamed')}`,
    `  Type: ${text(workout, 'workout_type', 'Unknown')}`,
    `  Status: ${text(workout, 'status')}`,
    `  Start Time: ${formatDateTime(workout.start_time)}`,
    `  End Time: ${formatDateTime(workout.end_time)}`,
  ];
  if (isSet(workout.description)) {
    general.push(`  Description: ${text(workout, 'description')}`);
  }
  pushSection(lines, 'General Information', general);

  pushSection(lines, 'Duration', [
    `  Total: ${formatDuration(workout.duration_total_seconds)}`,
    `  Active: ${formatDuration(workout.duration_active_seconds)}`,
    `  Paused: ${formatDuration(workout.duration_paused_seconds)}`,
  ]);

  pushSection(lines, 'Distance & Elevation', [
    `  Distance: ${formatDistance(workout.distance_meters)}`,
    `  Elevation Gain: ${text(workout, 'elevation_gain')} m`,
    `  Elevation Loss: ${text(workout, 'elevation_loss')} m`,
  ]);

  pushSection(lines, 'Speed', [
    `  Average Speed: ${text(workout, 'speed_average')} m/s`,
    `  Max Speed: ${text(workout, 'speed_max')} m/s`,
  ]);

  pushSection(lines, 'Power', [
    `  Average Power: ${text(workout, 'power_average')} W`,
    `  Max Power: ${text(workout, 'power_max')} W`,
    `  Norm Power: ${text(workout, 'power_normalized')} W`,
    `  5-min Max Power: ${text(workout, 'power_5min_max')} W`,
    `  Estimated FTP: ${text(workout, 'estimated_ftp')} W`,
    `  Intensity: ${text(workout, 'intensity_factor')}`,
    `  L/R Balance: ${text(workout, 'left_right_balance')}`,
  ]);

  pushSection(lines, 'Heart Rate', [
    `  Average HR: ${text(workout, 'heart_rate_average')} bpm`,
    `  Max HR: ${text(workout, 'heart_rate_max')} bpm`,
    `  HR Recovery: ${text(workout, 'best_vagal_rebound')}`,
  ]);

  pushSection(lines, 'Training Metrics', [
    `  Load: ${text(workout, 'training_stress_score')}`,
    `  Efficiency Factor: ${text(workout, 'efficiency_factor')}`,
    `  Estimated VO2max: ${text(workout, 'estimated_vo2max')}`,
    `  Power:HR Ratio: ${text(workout, 'power_hr_ratio')}`,
    `  Cadence: ${text(workout, 'cadence_average')} rpm`,
  ]);

  pushSection(lines, 'Energy', [
    `  Calories: ${text(workout, 'calories')}`,
    `  Work (Joules): ${text(workout, 'work_joules')}`,
    `  Carb Intake: ${text(workout, 'carbohydrate_intake')} g`,
    `  Carb Used: ${text(workout, 'carbohydrate_used')} g`,
  ]);

  const subjective: string[] = [];
  if (isSet(workout.feel)) {
    subjective.push(`  Feel: ${text(workout, 'feel')}`);
  }
  if (isSet(workout.perceived_exertion)) {
    subjective.push(`  RPE: ${text(workout, 'perceived_exertion')}/10`);
  }
  pushSection(lines, 'Subjective', subjective);

  lines.push(
    'Source:',
    `  Source: ${text(workout, 'source')}`,
    `  Created: ${formatDateTime(workout.created_at)}`,
    `  Updated: ${formatDateTime(workout.updated_at)}`
  );

  return lines.join('\n');
}

// ============================================================================
// Events
// ============================================================================

export function formatEventSummary(event: JsonObject): string {
  const lines = [
    `Event: ${text(event, 'name', 'Unnamed')}`,
    `  ID: ${text(event, 'id')}`,
    `  Date: ${formatDateTime(event.event_date)}`,
    `  Type: ${text(event, 'event_type', 'Unknown')}`,
    `  Status: ${text(event, 'status')}`,
  ];

  if (isSet(event.location)) {
    lines.push(`  Location: ${text(event, 'location')}`);
  }
  if (isSet(event.distance_km)) {
    lines.push(`  Distance: ${text(event, 'distance_km')} km`);
  }
  if (isSet(event.description)) {
    const description = text(event, 'description');
    const shortened = description.length > EVENT_SUMMARY_DESCRIPTION_LENGTH
      ? `${description.slice(0, EVENT_SUMMARY_DESCRIPTION_LENGTH)}...`
      : description;
    lines.push(`  Description: ${shortened}`);
  }

  return lines.join('\n');
}

export function formatEventDetails(event: JsonObject): string {
  const lines = ['Event Details:', ''];

  const general = [
    `  Name: ${text(event, 'name', 'Unnamed')}`,
    `  ID: ${text(event, 'id')}`,
    `  Date: ${formatDateTime(event.event_date)}`,
    `  Type: ${text(event, 'event_type', 'Unknown')}`,
    `  Category: ${text(event, 'category')}`,
    `  Status: ${text(event, 'status')}`,
  ];
  if (isSet(event.location)) {
    general.push(`  Location: ${text(event, 'location')}`);
  }
  if (isSet(event.description)) {
    general.push(`  Description: ${text(event, 'description')}`);
  }
  pushSection(lines, 'General Information', general);

  const course: string[] = [];
  if (isSet(event.distance_km)) {
    course.push(`  Distance: ${text(event, 'distance_km')} km`);
  }
  if (isSet(event.elevation_gain_m)) {
    course.push(`  Elevation Gain: ${text(event, 'elevation_gain_m')} m`);
  }
  if (isSet(event.duration_minutes)) {
    course.push(`  Duration: ${text(event, 'duration_minutes')} min`);
  }
  pushSection(lines, 'Course Details', course);

  const targets: string[] = [];
  if (isSet(event.target_tss)) {
    targets.push(`  Target TSS: ${text(event, 'target_tss')}`);
  }
  if (isSet(event.target_intensity_factor)) {
    targets.push(`  Target IF: ${fixed(event.target_intensity_factor, 2)}`);
  }
  if (isSet(event.target_power_watts)) {
    targets.push(`  Target Power: ${text(event, 'target_power_watts')} W`);
  }
  if (isSet(event.estimated_calories)) {
    targets.push(`  Est. Calories: ${text(event, 'estimated_calories')}`);
  }
  if (isSet(event.estimated_carbs)) {
    targets.push(`  Est. Carbs: ${text(event, 'estimated_carbs')} g`);
  }
  pushSection(lines, 'Targets & Estimates', targets);

  const settings: string[] = [];
  if (isPresent(event.auto_calculate_intensity)) {
    settings.push(`  Auto Calculate Intensity: ${yesNo(event.auto_calculate_intensity)}`);
  }
  if (isPresent(event.include_drafting)) {
    settings.push(`  Include Drafting: ${yesNo(event.include_drafting)}`);
  }
  pushSection(lines, 'Settings', settings);

  const links: string[] = [];
  if (isSet(event.event_website)) {
    links.push(`  Website: ${text(event, 'event_website')}`);
  }
  if (isSet(event.registration_url)) {
    links.push(`  Registration: ${text(event, 'registration_url')}`);
  }
  if (isSet(event.results_url)) {
    links.push(`  Results: ${text(event, 'results_url')}`);
  }
  pushSection(lines, 'Links', links);

  if (isSet(event.notes)) {
    lines.push(`Notes: ${text(event, 'notes')}`, '');
  }

  lines.push('Metadata:');
  if (isSet(event.workout_id)) {
    lines.push(`  Linked Workout ID: ${text(event, 'workout_id')}`);
  }
  lines.push(
    `  Created: ${formatDateTime(event.created_at)}`,
    `  Updated: ${formatDateTime(event.updated_at)}`
  );

  return lines.join('\n');
}

// ============================================================================
// Wellness
// ============================================================================

export function formatWellnessEntry(entry: JsonObject): string {
  const date = isPresent(entry.date) ? text(entry, 'date') : text(entry, 'id');
  const lines = ['Wellness Entry:', `  Date: ${date}`, `  ID: ${text(entry, 'id')}`, ''];

  const body: string[] = [];
  if (isPresent(entry.weight_kg)) {
    body.push(`  Weight: ${fixed(entry.weight_kg, 1)} kg`);
  }
  if (isPresent(entry.body_fat_percentage)) {
    body.push(`  Body Fat: ${fixed(entry.body_fat_percentage, 1)}%`);
  }
  if (isPresent(entry.hydration_kg)) {
    body.push(`  Hydration: ${fixed(entry.hydration_kg, 1)} kg`);
  }
  pushSection(lines, 'Body Metrics', body);

  const recovery: string[] = [];
  if (isPresent(entry.sleep_hours)) {
    recovery.push(`  Sleep: ${fixed(entry.sleep_hours, 1)} hours`);
  }
  if (isPresent(entry.resting_hr)) {
    recovery.push(`  Resting HR: ${text(entry, 'resting_hr')} bpm`);
  }
  if (isPresent(entry.hrv_rmssd)) {
    recovery.push(`  HRV (RMSSD): ${text(entry, 'hrv_rmssd')}`);
  }
  if (isPresent(entry.readiness_score)) {
    recovery.push(`  Readiness Score: ${text(entry, 'readiness_score')}`);
  }
  if (isPresent(entry.vo2max)) {
    recovery.push(`  VO2max: ${fixed(entry.vo2max, 1)} ml/kg/min`);
  }
  pushSection(lines, 'Recovery Metrics', recovery);

  // Baselines are 7-day rolling averages computed upstream
  const baselines: string[] = [];
  if (isPresent(entry.hrv_rmssd_baseline)) {
    baselines.push(`  HRV Baseline: ${fixed(entry.hrv_rmssd_baseline, 1)}`);
  }
  if (isPresent(entry.resting_hr_baseline)) {
    baselines.push(`  Resting HR Baseline: ${fixed(entry.resting_hr_baseline, 1)} bpm`);
  }
  if (isPresent(entry.sleep_baseline)) {
    baselines.push(`  Sleep Baseline: ${fixed(entry.sleep_baseline, 1)} hours`);
  }
  if (isPresent(entry.hydration_baseline)) {
    baselines.push(`  Hydration Baseline: ${fixed(entry.hydration_baseline, 1)}%`);
  }
  if (isPresent(entry.vo2max_baseline)) {
    baselines.push(`  VO2max Baseline: ${fixed(entry.vo2max_baseline, 1)} ml/kg/min`);
  }
  pushSection(lines, '7-Day Baselines', baselines);

  return lines.join('\n').trimEnd();
}
