/**
 * Metric Extraction Service
 *
 * Turns raw wearable API payloads into the flat daily `summary` and the
 * detailed sleep and workout structures. Pure functions, no I/O.
 *
 * A source that is absent or empty contributes no keys. A source that is
 * present but missing a field contributes that key as `null`.
 */

import type {
  DetailedSleep,
  DetailedWorkout,
  DeviceSource,
  EmptyDetailedSleep,
  MetricSummary,
  RawDeviceRecord,
} from '../shared.js';
import { DEVICE_SOURCES } from '../shared.js';
import { ValidationError } from '../types/errors.js';
import {
  isRecord,
  readNumber,
  readNumberSeries,
  readRecord,
  readString,
} from '../utils/type-guards.js';

export const MAIN_SLEEP_TYPE = 'long_sleep';

type SourceMap = Record<DeviceSource, RawDeviceRecord[]>;

export interface ExtractionOptions {
  /**
   * When set, the `sleep` source is treated as unfiltered and the main
   * session ending on this date is selected. When omitted the first
   * session is assumed to be already selected.
   */
  wakeDate?: string;
}

const PHASE_CODES: Record<string, 'deep' | 'light' | 'rem' | 'awake'> = {
  '1': 'deep',
  '2': 'light',
  '3': 'rem',
  '4': 'awake',
};

const READINESS_CONTRIBUTORS = {
  activity_balance: 'contributor_activity_balance',
  body_temperature: 'contributor_body_temperature',
  hrv_balance: 'contributor_hrv_balance',
  previous_day_activity: 'contributor_previous_day_activity',
  previous_night: 'contributor_previous_night',
  recovery_index: 'contributor_recovery_index',
  resting_heart_rate: 'contributor_resting_heart_rate',
  sleep_balance: 'contributor_sleep_balance',
} as const satisfies Record<string, keyof DetailedSleep>;

function roundToTenth(value: number): number {
  return Math.round(value * 10) / 10;
}

/** Floor division to whole minutes, matching the device app's own display. */
export function secondsToMinutes(seconds: number | null): number | null {
  if (seconds === null) {
    return null;
  }
  return Math.floor(seconds / 60);
}

/**
 * Normalize an arbitrary payload into a list per known source.
 * Throws when the payload itself is not an object.
 */
function toSourceMap(data: unknown): SourceMap {
  if (!isRecord(data)) {
    throw new ValidationError('Device data must be an object keyed by source name');
  }

  const sources: Partial<SourceMap> = {};
  for (const source of DEVICE_SOURCES) {
    const value = data[source];
    sources[source] = Array.isArray(value) ? value.filter(isRecord) : [];
  }

  return {
    daily_sleep: sources.daily_sleep ?? [],
    sleep: sources.sleep ?? [],
    daily_readiness: sources.daily_readiness ?? [],
    daily_activity: sources.daily_activity ?? [],
    daily_stress: sources.daily_stress ?? [],
    workouts: sources.workouts ?? [],
    daytime_hr: sources.daytime_hr ?? [],
  };
}

/**
 * Pick the main sleep session that ended on `wakeDate`.
 *
 * Only `long_sleep` sessions qualify; naps, rest periods and fragments are
 * never used. When several qualify the one ending latest wins. Returns null
 * rather than falling back to a session of another type or date.
 */
export function selectMainSleepSession(
  sessions: RawDeviceRecord[],
  wakeDate: string
): RawDeviceRecord | null {
  let selected: RawDeviceRecord | null = null;
  let selectedEnd = '';

  for (const session of sessions) {
    if (readString(session, 'type') !== MAIN_SLEEP_TYPE) {
      continue;
    }
    const bedtimeEnd = readString(session, 'bedtime_end');
    if (bedtimeEnd === null || bedtimeEnd.slice(0, 10) !== wakeDate) {
      continue;
    }
    if (selected === null || Date.parse(bedtimeEnd) >= Date.parse(selectedEnd)) {
      selected = session;
      selectedEnd = bedtimeEnd;
    }
  }

  return selected;
}

function resolveSleepSession(
  sources: SourceMap,
  options: ExtractionOptions
): RawDeviceRecord | null {
  if (options.wakeDate !== undefined) {
    return selectMainSleepSession(sources.sleep, options.wakeDate);
  }
  return sources.sleep[0] ?? null;
}

/** Whole minutes between two ISO timestamps; 0 when either is missing or invalid. */
export function workoutDurationMinutes(
  start: string | null,
  end: string | null
): number {
  if (!start || !end) {
    return 0;
  }
  const startMs = Date.parse(start);
  const endMs = Date.parse(end);
  if (Number.isNaN(startMs) || Number.isNaN(endMs)) {
    return 0;
  }
  return Math.trunc((endMs - startMs) / 60000);
}

// ============ Summary sections ============

function sleepScoreSection(sources: SourceMap): MetricSummary {
  const dailySleep = sources.daily_sleep[0];
  if (!dailySleep) {
    return {};
  }
  return { sleep_score: readNumber(dailySleep, 'score') };
}

function sleepSessionSection(session: RawDeviceRecord | null): MetricSummary {
  if (!session) {
    return {};
  }
  return {
    deep_sleep_minutes: secondsToMinutes(readNumber(session, 'deep_sleep_duration')),
    light_sleep_minutes: secondsToMinutes(readNumber(session, 'light_sleep_duration')),
    rem_sleep_minutes: secondsToMinutes(readNumber(session, 'rem_sleep_duration')),
    total_sleep_minutes: secondsToMinutes(readNumber(session, 'total_sleep_duration')),
    sleep_efficiency: readNumber(session, 'efficiency'),
    hrv: readNumber(session, 'average_hrv'),
    avg_hr: readNumber(session, 'average_heart_rate'),
    avg_breath: readNumber(session, 'average_breath'),
    latency_minutes: secondsToMinutes(readNumber(session, 'latency')),
    restless_periods: readNumber(session, 'restless_periods'),
    resting_hr: readNumber(session, 'lowest_heart_rate'),
  };
}

function readinessSection(sources: SourceMap): MetricSummary {
  const readiness = sources.daily_readiness[0];
  if (!readiness) {
    return {};
  }
  return {
    readiness: readNumber(readiness, 'score'),
    temperature_deviation: readNumber(readiness, 'temperature_deviation'),
  };
}

function activitySection(sources: SourceMap): MetricSummary {
  const activity = sources.daily_activity[0];
  if (!activity) {
    return {};
  }
  return {
    activity_score: readNumber(activity, 'score'),
    steps: readNumber(activity, 'steps'),
  };
}

function stressSection(sources: SourceMap): MetricSummary {
  const stress = sources.daily_stress[0];
  if (!stress) {
    return {};
  }
  return {
    stress_high: secondsToMinutes(readNumber(stress, 'stress_high')),
    recovery_high: secondsToMinutes(readNumber(stress, 'recovery_high')),
    stress_day_summary: readString(stress, 'day_summary'),
  };
}

function workoutSection(sources: SourceMap): MetricSummary {
  const workouts = sources.workouts;
  if (workouts.length === 0) {
    return {};
  }

  let calories = 0;
  let minutes = 0;
  const activities: string[] = [];

  for (const workout of workouts) {
    calories += readNumber(workout, 'calories') ?? 0;
    minutes += workoutDurationMinutes(
      readString(workout, 'start_datetime'),
      readString(workout, 'end_datetime')
    );
    const activity = readString(workout, 'activity');
    if (activity) {
      activities.push(activity);
    }
  }

  return {
    workout_count: workouts.length,
    workout_calories: calories,
    workout_minutes: minutes,
    workout_activities: activities,
  };
}

function daytimeHeartRateSection(sources: SourceMap): MetricSummary {
  const bpms: number[] = [];
  for (const reading of sources.daytime_hr) {
    const bpm = readNumber(reading, 'bpm');
    if (bpm !== null && bpm > 0) {
      bpms.push(bpm);
    }
  }

  if (bpms.length === 0) {
    return {};
  }

  const total = bpms.reduce((sum, bpm) => sum + bpm, 0);
  return {
    daytime_hr_avg: roundToTenth(total / bpms.length),
    daytime_hr_min: Math.min(...bpms),
    daytime_hr_max: Math.max(...bpms),
    daytime_hr_samples: bpms.length,
  };
}

// ============ Public extractors ============

/**
 * Sleep and readiness metrics, keyed by wake-date.
 */
export function extractSleepMetrics(
  data: unknown,
  options: ExtractionOptions = {}
): MetricSummary {
  const sources = toSourceMap(data);
  return {
    ...sleepScoreSection(sources),
    ...sleepSessionSection(resolveSleepSession(sources, options)),
    ...readinessSection(sources),
  };
}

/**
 * Activity, stress, workout and daytime heart-rate metrics, keyed by
 * calendar date.
 */
export function extractActivityMetrics(data: unknown): MetricSummary {
  const sources = toSourceMap(data);
  return {
    ...activitySection(sources),
    ...stressSection(sources),
    ...workoutSection(sources),
    ...daytimeHeartRateSection(sources),
  };
}

/**
 * Every summary metric the payload supports.
 */
export function extractMetrics(
  data: unknown,
  options: ExtractionOptions = {}
): MetricSummary {
  return {
    ...extractSleepMetrics(data, options),
    ...extractActivityMetrics(data),
  };
}

interface SeriesStats {
  min: number;
  max: number;
  range: number;
  /** Absent when the series is too short to split into thirds. */
  thirds?: { firstAvg: number; lastAvg: number };
}

/**
 * Min/max/range plus the mean of the first and last thirds of the night.
 * A later third well above the first suggests fragmented sleep.
 */
export function summarizeSeries(values: number[]): SeriesStats | null {
  if (values.length === 0) {
    return null;
  }

  const min = Math.min(...values);
  const max = Math.max(...values);
  const stats: SeriesStats = { min, max, range: max - min };

  const third = Math.floor(values.length / 3);
  if (third > 0) {
    const first = values.slice(0, third);
    const last = values.slice(-third);
    stats.thirds = {
      firstAvg: roundToTenth(first.reduce((a, b) => a + b, 0) / third),
      lastAvg: roundToTenth(last.reduce((a, b) => a + b, 0) / third),
    };
  }

  return stats;
}

interface PhaseBreakdown {
  deep_sleep_pct?: number;
  light_sleep_pct?: number;
  rem_sleep_pct?: number;
  awake_pct?: number;
  phase_transitions: number;
}

/**
 * Decode the packed 5-minute phase string (1 deep, 2 light, 3 rem, 4 awake).
 * Percentages use every classified interval, awake included, as denominator.
 */
export function summarizePhases(phases: string): PhaseBreakdown {
  const counts = { deep: 0, light: 0, rem: 0, awake: 0 };
  for (const code of phases) {
    const phase = PHASE_CODES[code];
    if (phase) {
      counts[phase] += 1;
    }
  }

  let transitions = 0;
  for (let i = 1; i < phases.length; i++) {
    if (phases[i] !== phases[i - 1]) {
      transitions += 1;
    }
  }

  const total = counts.deep + counts.light + counts.rem + counts.awake;
  if (total === 0) {
    return { phase_transitions: transitions };
  }

  return {
    deep_sleep_pct: roundToTenth((100 * counts.deep) / total),
    light_sleep_pct: roundToTenth((100 * counts.light) / total),
    rem_sleep_pct: roundToTenth((100 * counts.rem) / total),
    awake_pct: roundToTenth((100 * counts.awake) / total),
    phase_transitions: transitions,
  };
}

function readinessContributors(readiness: Record<string, unknown>): Partial<DetailedSleep> {
  const contributors = readRecord(readiness, 'contributors') ?? {};
  const detail: Partial<DetailedSleep> = {
    readiness_score: readNumber(readiness, 'score'),
    temperature_deviation: readNumber(readiness, 'temperature_deviation'),
    temperature_trend: readNumber(readiness, 'temperature_trend_deviation'),
  };
  for (const [name, field] of Object.entries(READINESS_CONTRIBUTORS)) {
    detail[field] = readNumber(contributors, name);
  }
  return detail;
}

/**
 * Detailed view of last night's main sleep session, or `{}` when no
 * qualifying session exists.
 */
export function extractDetailedSleep(
  data: unknown,
  options: ExtractionOptions = {}
): DetailedSleep | EmptyDetailedSleep {
  const sources = toSourceMap(data);
  const session = resolveSleepSession(sources, options);
  if (!session) {
    return {};
  }

  const detailed: DetailedSleep = {
    bedtime_start: readString(session, 'bedtime_start'),
    bedtime_end: readString(session, 'bedtime_end'),
    time_in_bed_minutes: secondsToMinutes(readNumber(session, 'time_in_bed')),
    total_sleep_minutes: secondsToMinutes(readNumber(session, 'total_sleep_duration')),
    awake_minutes: secondsToMinutes(readNumber(session, 'awake_time')),
    latency_minutes: secondsToMinutes(readNumber(session, 'latency')),
    deep_sleep_minutes: secondsToMinutes(readNumber(session, 'deep_sleep_duration')),
    light_sleep_minutes: secondsToMinutes(readNumber(session, 'light_sleep_duration')),
    rem_sleep_minutes: secondsToMinutes(readNumber(session, 'rem_sleep_duration')),
    efficiency: readNumber(session, 'efficiency'),
    restless_periods: readNumber(session, 'restless_periods'),
    average_hr: readNumber(session, 'average_heart_rate'),
    lowest_hr: readNumber(session, 'lowest_heart_rate'),
    average_hrv: readNumber(session, 'average_hrv'),
    average_breath: readNumber(session, 'average_breath'),
  };

  const hr = summarizeSeries(readNumberSeries(readRecord(session, 'heart_rate') ?? {}, 'items'));
  if (hr) {
    detailed.hr_min = hr.min;
    detailed.hr_max = hr.max;
    detailed.hr_range = hr.range;
    if (hr.thirds) {
      detailed.hr_first_third_avg = hr.thirds.firstAvg;
      detailed.hr_last_third_avg = hr.thirds.lastAvg;
    }
  }

  const hrv = summarizeSeries(readNumberSeries(readRecord(session, 'hrv') ?? {}, 'items'));
  if (hrv) {
    detailed.hrv_min = hrv.min;
    detailed.hrv_max = hrv.max;
    detailed.hrv_range = hrv.range;
    if (hrv.thirds) {
      detailed.hrv_first_third_avg = hrv.thirds.firstAvg;
      detailed.hrv_last_third_avg = hrv.thirds.lastAvg;
    }
  }

  const phases = readString(session, 'sleep_phase_5_min');
  if (phases) {
    Object.assign(detailed, summarizePhases(phases));
  }

  const readiness = readRecord(session, 'readiness');
  if (readiness) {
    Object.assign(detailed, readinessContributors(readiness));
  }

  return detailed;
}

/**
 * One entry per workout in the payload, in payload order.
 */
export function extractDetailedWorkouts(data: unknown): DetailedWorkout[] {
  const sources = toSourceMap(data);

  return sources.workouts.map((workout) => {
    const start = readString(workout, 'start_datetime');
    const end = readString(workout, 'end_datetime');
    return {
      activity: readString(workout, 'activity'),
      label: readString(workout, 'label'),
      intensity: readString(workout, 'intensity'),
      start_time: start,
      end_time: end,
      duration_minutes: workoutDurationMinutes(start, end),
      calories: readNumber(workout, 'calories'),
      distance_meters: readNumber(workout, 'distance'),
      source: readString(workout, 'source'),
    };
  });
}
