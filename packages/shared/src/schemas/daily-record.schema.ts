import { z } from 'zod';
import { dateStringSchema } from './common.schema.js';

/**
 * Daily Record Schemas
 *
 * Used to validate records read back from disk. A record that fails these
 * is treated as malformed persisted state.
 */

const nullableNumber = z.number().nullable();
const nullableString = z.string().nullable();

export const metricValueSchema = z.union([
  z.number(),
  z.string(),
  z.array(z.string()),
  z.null(),
]);

export const metricSummarySchema = z.record(metricValueSchema);

export const detailedSleepSchema = z.object({
  bedtime_start: nullableString,
  bedtime_end: nullableString,
  time_in_bed_minutes: nullableNumber,
  total_sleep_minutes: nullableNumber,
  awake_minutes: nullableNumber,
  latency_minutes: nullableNumber,
  deep_sleep_minutes: nullableNumber,
  light_sleep_minutes: nullableNumber,
  rem_sleep_minutes: nullableNumber,
  efficiency: nullableNumber,
  restless_periods: nullableNumber,
  average_hr: nullableNumber,
  lowest_hr: nullableNumber,
  average_hrv: nullableNumber,
  average_breath: nullableNumber,

  hr_min: z.number().optional(),
  hr_max: z.number().optional(),
  hr_range: z.number().optional(),
  hr_first_third_avg: z.number().optional(),
  hr_last_third_avg: z.number().optional(),

  hrv_min: z.number().optional(),
  hrv_max: z.number().optional(),
  hrv_range: z.number().optional(),
  hrv_first_third_avg: z.number().optional(),
  hrv_last_third_avg: z.number().optional(),

  deep_sleep_pct: z.number().optional(),
  light_sleep_pct: z.number().optional(),
  rem_sleep_pct: z.number().optional(),
  awake_pct: z.number().optional(),
  phase_transitions: z.number().int().optional(),

  readiness_score: nullableNumber.optional(),
  temperature_deviation: nullableNumber.optional(),
  temperature_trend: nullableNumber.optional(),
  contributor_activity_balance: nullableNumber.optional(),
  contributor_body_temperature: nullableNumber.optional(),
  contributor_hrv_balance: nullableNumber.optional(),
  contributor_previous_day_activity: nullableNumber.optional(),
  contributor_previous_night: nullableNumber.optional(),
  contributor_recovery_index: nullableNumber.optional(),
  contributor_resting_heart_rate: nullableNumber.optional(),
  contributor_sleep_balance: nullableNumber.optional(),
});

export const emptyDetailedSleepSchema = z.record(z.never());

export const detailedWorkoutSchema = z.object({
  activity: nullableString,
  label: nullableString,
  intensity: nullableString,
  start_time: nullableString,
  end_time: nullableString,
  duration_minutes: z.number(),
  calories: nullableNumber,
  distance_meters: nullableNumber,
  source: nullableString,
});

export const dailyRecordSchema = z.object({
  date: dateStringSchema,
  summary: metricSummarySchema.default({}),
  detailed_sleep: z
    .union([detailedSleepSchema, emptyDetailedSleepSchema])
    .default({}),
  detailed_workouts: z.array(detailedWorkoutSchema).default([]),
});

export type DailyRecordDocument = z.infer<typeof dailyRecordSchema>;
