/**
 * A single summary value. Most metrics are numeric; a few carry labels
 * (`stress_day_summary`) or lists (`workout_activities`). `null` means the
 * source was present but the field was missing.
 */
export type MetricValue = number | string | string[] | null;

export type MetricSummary = Record<string, MetricValue>;

/**
 * Detailed view of the main sleep session that ended on the record's date.
 * Series-derived fields are only present when the series had data.
 */
export interface DetailedSleep {
  bedtime_start: string | null;
  bedtime_end: string | null;
  time_in_bed_minutes: number | null;
  total_sleep_minutes: number | null;
  awake_minutes: number | null;
  latency_minutes: number | null;
  deep_sleep_minutes: number | null;
  light_sleep_minutes: number | null;
  rem_sleep_minutes: number | null;
  efficiency: number | null;
  restless_periods: number | null;
  average_hr: number | null;
  lowest_hr: number | null;
  average_hrv: number | null;
  average_breath: number | null;

  hr_min?: number;
  hr_max?: number;
  hr_range?: number;
  hr_first_third_avg?: number;
  hr_last_third_avg?: number;

  hrv_min?: number;
  hrv_max?: number;
  hrv_range?: number;
  hrv_first_third_avg?: number;
  hrv_last_third_avg?: number;

  deep_sleep_pct?: number;
  light_sleep_pct?: number;
  rem_sleep_pct?: number;
  awake_pct?: number;
  phase_transitions?: number;

  readiness_score?: number | null;
  temperature_deviation?: number | null;
  temperature_trend?: number | null;
  contributor_activity_balance?: number | null;
  contributor_body_temperature?: number | null;
  contributor_hrv_balance?: number | null;
  contributor_previous_day_activity?: number | null;
  contributor_previous_night?: number | null;
  contributor_recovery_index?: number | null;
  contributor_resting_heart_rate?: number | null;
  contributor_sleep_balance?: number | null;
}

/** Persisted in place of {@link DetailedSleep} when no main sleep session qualified. */
export type EmptyDetailedSleep = Record<string, never>;

export interface DetailedWorkout {
  activity: string | null;
  label: string | null;
  intensity: string | null;
  start_time: string | null;
  end_time: string | null;
  duration_minutes: number;
  calories: number | null;
  distance_meters: number | null;
  source: string | null;
}

export interface DailyRecord {
  date: string;
  summary: MetricSummary;
  detailed_sleep: DetailedSleep | EmptyDetailedSleep;
  detailed_workouts: DetailedWorkout[];
}

export interface DailyRecordWrite {
  summary?: MetricSummary | null;
  detailed_sleep?: DetailedSleep | EmptyDetailedSleep | null;
  detailed_workouts?: DetailedWorkout[] | null;
}

export function hasDetailedSleep(
  value: DetailedSleep | EmptyDetailedSleep
): value is DetailedSleep {
  return Object.keys(value).length > 0;
}
