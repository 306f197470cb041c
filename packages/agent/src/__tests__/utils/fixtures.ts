/**
 * Device payload and record factories for tests.
 *
 * Values mirror a plausible single night: in bed 23:30 to 07:15, about
 * seven hours asleep.
 */

import type {
  BaselineSet,
  DailyRecord,
  DetailedWorkout,
  RawDeviceRecord,
} from '../../shared.js';

export function createSleepSession(overrides: RawDeviceRecord = {}): RawDeviceRecord {
  return {
    id: 'sleep-1',
    type: 'long_sleep',
    day: '2026-01-14',
    bedtime_start: '2026-01-14T23:30:00-05:00',
    bedtime_end: '2026-01-15T07:15:00-05:00',
    time_in_bed: 27900,
    total_sleep_duration: 25200,
    awake_time: 2700,
    latency: 600,
    deep_sleep_duration: 4200,
    light_sleep_duration: 14400,
    rem_sleep_duration: 6600,
    efficiency: 90,
    restless_periods: 12,
    average_heart_rate: 55,
    lowest_heart_rate: 48,
    average_hrv: 52,
    average_breath: 14.5,
    heart_rate: {
      interval: 300,
      items: [55, 54, 52, 50, 48, 49, 51, 53, 55, 56, 57, 58],
    },
    hrv: {
      interval: 300,
      items: [45, 48, 52, 55, 58, 54, 50, 48, 52, 55, 50, 48],
    },
    sleep_phase_5_min: '1122233322114422331122',
    readiness: {
      score: 78,
      temperature_deviation: 0.15,
      temperature_trend_deviation: 0.05,
      contributors: {
        activity_balance: 85,
        body_temperature: 90,
        hrv_balance: 72,
        previous_day_activity: 80,
        previous_night: 88,
        recovery_index: 75,
        resting_heart_rate: 92,
        sleep_balance: 81,
      },
    },
    ...overrides,
  };
}

export function createSleepSources(overrides: Partial<Record<string, RawDeviceRecord[]>> = {}): {
  daily_sleep: RawDeviceRecord[];
  daily_readiness: RawDeviceRecord[];
  sleep: RawDeviceRecord[];
} {
  return {
    daily_sleep: overrides['daily_sleep'] ?? [{ day: '2026-01-15', score: 82 }],
    daily_readiness: overrides['daily_readiness'] ?? [
      { day: '2026-01-15', score: 78, temperature_deviation: 0.15 },
    ],
    sleep: overrides['sleep'] ?? [createSleepSession()],
  };
}

export function createActivitySources(overrides: Partial<Record<string, RawDeviceRecord[]>> = {}): {
  daily_activity: RawDeviceRecord[];
  daily_stress: RawDeviceRecord[];
  workouts: RawDeviceRecord[];
  daytime_hr: RawDeviceRecord[];
} {
  return {
    daily_activity: overrides['daily_activity'] ?? [{ day: '2026-01-14', score: 74, steps: 8432 }],
    daily_stress: overrides['daily_stress'] ?? [
      { day: '2026-01-14', stress_high: 3600, recovery_high: 7260, day_summary: 'normal' },
    ],
    workouts: overrides['workouts'] ?? [
      {
        activity: 'walking',
        label: null,
        intensity: 'easy',
        start_datetime: '2026-01-14T12:00:00-05:00',
        end_datetime: '2026-01-14T12:45:30-05:00',
        calories: 180,
        distance: 3500,
        source: 'autodetected',
      },
    ],
    daytime_hr: overrides['daytime_hr'] ?? [
      { bpm: 70, source: 'awake', timestamp: '2026-01-14T10:00:00-05:00' },
      { bpm: 75, source: 'awake', timestamp: '2026-01-14T10:05:00-05:00' },
      { bpm: 80, source: 'workout', timestamp: '2026-01-14T12:10:00-05:00' },
    ],
  };
}

export function createDetailedWorkout(overrides: Partial<DetailedWorkout> = {}): DetailedWorkout {
  return {
    activity: 'cycling',
    label: null,
    intensity: 'moderate',
    start_time: '2026-01-14T17:00:00-05:00',
    end_time: '2026-01-14T18:00:00-05:00',
    duration_minutes: 60,
    calories: 450,
    distance_meters: 20000,
    source: 'manual',
    ...overrides,
  };
}

export function createDailyRecord(overrides: Partial<DailyRecord> = {}): DailyRecord {
  return {
    date: '2026-01-15',
    summary: { sleep_score: 82, hrv: 52 },
    detailed_sleep: {},
    detailed_workouts: [],
    ...overrides,
  };
}

export function createBaselineSet(overrides: Partial<BaselineSet> = {}): BaselineSet {
  return {
    last_updated: '2026-01-14T10:00:00-05:00',
    dates: ['2026-01-13', '2026-01-14'],
    data_points: 2,
    window_days: 60,
    metrics: {
      sleep_score: { mean: 80, std: 2.8, values: [78, 82] },
      hrv: { mean: 50, std: 2.8, values: [48, 52] },
    },
    ...overrides,
  };
}
