import { describe, it, expect } from 'vitest';
import {
  extractActivityMetrics,
  extractDetailedSleep,
  extractDetailedWorkouts,
  extractMetrics,
  extractSleepMetrics,
  secondsToMinutes,
  selectMainSleepSession,
  summarizePhases,
  summarizeSeries,
  workoutDurationMinutes,
} from './metric-extraction.service.js';
import { ValidationError } from '../types/errors.js';
import {
  createActivitySources,
  createSleepSession,
  createSleepSources,
} from '../__tests__/utils/index.js';

describe('Metric Extraction Service', () => {
  describe('secondsToMinutes', () => {
    it('should floor rather than round', () => {
      expect(secondsToMinutes(125)).toBe(2);
      expect(secondsToMinutes(179)).toBe(2);
    });

    it('should keep zero and null distinct', () => {
      expect(secondsToMinutes(0)).toBe(0);
      expect(secondsToMinutes(null)).toBeNull();
    });
  });

  describe('extractSleepMetrics', () => {
    it('should extract the full sleep and readiness summary', () => {
      const metrics = extractSleepMetrics(createSleepSources(), { wakeDate: '2026-01-15' });

      expect(metrics).toEqual({
        sleep_score: 82,
        deep_sleep_minutes: 70,
        light_sleep_minutes: 240,
        rem_sleep_minutes: 110,
        total_sleep_minutes: 420,
        sleep_efficiency: 90,
        hrv: 52,
        avg_hr: 55,
        avg_breath: 14.5,
        latency_minutes: 10,
        restless_periods: 12,
        resting_hr: 48,
        readiness: 78,
        temperature_deviation: 0.15,
      });
    });

    it('should truncate a 125 second duration to 2 minutes', () => {
      const data = createSleepSources({
        sleep: [createSleepSession({ deep_sleep_duration: 125 })],
      });

      expect(extractSleepMetrics(data).deep_sleep_minutes).toBe(2);
    });

    it('should omit readiness keys entirely when the readiness source is empty', () => {
      const metrics = extractSleepMetrics(createSleepSources({ daily_readiness: [] }));

      expect(metrics).not.toHaveProperty('readiness');
      expect(metrics).not.toHaveProperty('temperature_deviation');
    });

    it('should set an explicit null for a field missing from a present source', () => {
      const metrics = extractSleepMetrics(
        createSleepSources({ daily_readiness: [{ day: '2026-01-15', score: 78 }] })
      );

      expect(metrics).toHaveProperty('temperature_deviation', null);
      expect(metrics.readiness).toBe(78);
    });

    it('should null a session duration that is missing', () => {
      const session = createSleepSession();
      delete session['latency'];

      const metrics = extractSleepMetrics(createSleepSources({ sleep: [session] }));

      expect(metrics.latency_minutes).toBeNull();
    });

    it('should contribute no session keys when no main sleep ended on the wake date', () => {
      const metrics = extractSleepMetrics(
        createSleepSources({ sleep: [createSleepSession({ type: 'rest' })] }),
        { wakeDate: '2026-01-15' }
      );

      expect(metrics).not.toHaveProperty('deep_sleep_minutes');
      expect(metrics.sleep_score).toBe(82);
    });

    it('should reject a payload that is not an object', () => {
      expect(() => extractSleepMetrics([])).toThrow(ValidationError);
      expect(() => extractSleepMetrics(null)).toThrow(ValidationError);
    });
  });

  describe('extractActivityMetrics', () => {
    it('should extract activity, stress, workouts and daytime heart rate', () => {
      expect(extractActivityMetrics(createActivitySources())).toEqual({
        activity_score: 74,
        steps: 8432,
        stress_high: 60,
        recovery_high: 121,
        stress_day_summary: 'normal',
        workout_count: 1,
        workout_calories: 180,
        workout_minutes: 45,
        workout_activities: ['walking'],
        daytime_hr_avg: 75,
        daytime_hr_min: 70,
        daytime_hr_max: 80,
        daytime_hr_samples: 3,
      });
    });

    it('should sum workouts and treat missing calories as zero', () => {
      const metrics = extractActivityMetrics(
        createActivitySources({
          workouts: [
            {
              activity: 'running',
              start_datetime: '2026-01-14T07:00:00-05:00',
              end_datetime: '2026-01-14T07:30:00-05:00',
              calories: 300,
            },
            {
              activity: 'yoga',
              start_datetime: '2026-01-14T18:00:00-05:00',
              end_datetime: '2026-01-14T18:20:00-05:00',
              calories: null,
            },
            { activity: null },
          ],
        })
      );

      expect(metrics.workout_count).toBe(3);
      expect(metrics.workout_calories).toBe(300);
      expect(metrics.workout_minutes).toBe(50);
      expect(metrics.workout_activities).toEqual(['running', 'yoga']);
    });

    it('should round the daytime heart-rate average to one decimal', () => {
      const metrics = extractActivityMetrics(
        createActivitySources({
          daytime_hr: [{ bpm: 70 }, { bpm: 71 }, { bpm: 71 }],
        })
      );

      expect(metrics.daytime_hr_avg).toBe(70.7);
    });

    it('should emit no heart-rate keys when no sample is valid', () => {
      const metrics = extractActivityMetrics(
        createActivitySources({ daytime_hr: [{ bpm: null }, { bpm: 0 }, { source: 'awake' }] })
      );

      expect(metrics).not.toHaveProperty('daytime_hr_avg');
      expect(metrics).not.toHaveProperty('daytime_hr_samples');
    });

    it('should floor stress seconds and keep a missing summary null', () => {
      const metrics = extractActivityMetrics(
        createActivitySources({ daily_stress: [{ stress_high: 5399 }] })
      );

      expect(metrics.stress_high).toBe(89);
      expect(metrics.recovery_high).toBeNull();
      expect(metrics.stress_day_summary).toBeNull();
    });

    it('should return nothing for an all-empty payload', () => {
      expect(extractActivityMetrics({})).toEqual({});
    });
  });

  describe('extractMetrics', () => {
    it('should combine sleep and activity sections', () => {
      const metrics = extractMetrics(
        { ...createSleepSources(), ...createActivitySources() },
        { wakeDate: '2026-01-15' }
      );

      expect(metrics.sleep_score).toBe(82);
      expect(metrics.steps).toBe(8432);
      expect(Object.keys(metrics)).toHaveLength(27);
    });
  });

  describe('selectMainSleepSession', () => {
    it('should pick only the long_sleep session among rest, sleep and long_sleep', () => {
      const sessions = [
        createSleepSession({ id: 'rest', type: 'rest', bedtime_end: '2026-01-08T13:00:00-05:00' }),
        createSleepSession({ id: 'nap', type: 'sleep', bedtime_end: '2026-01-08T16:00:00-05:00' }),
        createSleepSession({ id: 'main', type: 'long_sleep', bedtime_end: '2026-01-08T07:00:00-05:00' }),
      ];

      expect(selectMainSleepSession(sessions, '2026-01-08')?.['id']).toBe('main');
    });

    it('should return null rather than fall back to another type', () => {
      const sessions = [
        createSleepSession({ type: 'rest', bedtime_end: '2026-01-08T13:00:00-05:00' }),
        createSleepSession({ type: 'late_nap', bedtime_end: '2026-01-08T20:00:00-05:00' }),
      ];

      expect(selectMainSleepSession(sessions, '2026-01-08')).toBeNull();
    });

    it('should ignore a main session that ended on a different date', () => {
      const sessions = [createSleepSession({ bedtime_end: '2026-01-07T07:00:00-05:00' })];

      expect(selectMainSleepSession(sessions, '2026-01-08')).toBeNull();
    });

    it('should prefer the latest qualifying session', () => {
      const sessions = [
        createSleepSession({ id: 'late', bedtime_end: '2026-01-08T09:30:00-05:00' }),
        createSleepSession({ id: 'early', bedtime_end: '2026-01-08T05:00:00-05:00' }),
      ];

      expect(selectMainSleepSession(sessions, '2026-01-08')?.['id']).toBe('late');
    });
  });

  describe('summarizeSeries', () => {
    it('should compute range and first/last third averages', () => {
      expect(summarizeSeries([55, 54, 52, 50, 48, 49, 51, 53, 55, 56, 57, 58])).toEqual({
        min: 48,
        max: 58,
        range: 10,
        thirds: { firstAvg: 52.8, lastAvg: 56.5 },
      });
    });

    it('should skip thirds for series shorter than three', () => {
      expect(summarizeSeries([60, 62])).toEqual({ min: 60, max: 62, range: 2 });
    });

    it('should return null for an empty series', () => {
      expect(summarizeSeries([])).toBeNull();
    });
  });

  describe('summarizePhases', () => {
    it('should decode stage shares and count transitions', () => {
      const breakdown = summarizePhases('1122233322114422331122');

      expect(breakdown).toEqual({
        deep_sleep_pct: 27.3,
        light_sleep_pct: 40.9,
        rem_sleep_pct: 22.7,
        awake_pct: 9.1,
        phase_transitions: 9,
      });
    });

    it('should produce shares that sum to about one hundred', () => {
      const breakdown = summarizePhases('1234123412341');
      const total =
        (breakdown.deep_sleep_pct ?? 0) +
        (breakdown.light_sleep_pct ?? 0) +
        (breakdown.rem_sleep_pct ?? 0) +
        (breakdown.awake_pct ?? 0);

      expect(total).toBeCloseTo(100, 0);
    });

    it('should leave out shares when no interval is classified', () => {
      expect(summarizePhases('0000')).toEqual({ phase_transitions: 0 });
    });
  });

  describe('extractDetailedSleep', () => {
    it('should build the detailed structure for the selected session', () => {
      const detailed = extractDetailedSleep(createSleepSources(), { wakeDate: '2026-01-15' });

      expect(detailed).toEqual({
        bedtime_start: '2026-01-14T23:30:00-05:00',
        bedtime_end: '2026-01-15T07:15:00-05:00',
        time_in_bed_minutes: 465,
        total_sleep_minutes: 420,
        awake_minutes: 45,
        latency_minutes: 10,
        deep_sleep_minutes: 70,
        light_sleep_minutes: 240,
        rem_sleep_minutes: 110,
        efficiency: 90,
        restless_periods: 12,
        average_hr: 55,
        lowest_hr: 48,
        average_hrv: 52,
        average_breath: 14.5,
        hr_min: 48,
        hr_max: 58,
        hr_range: 10,
        hr_first_third_avg: 52.8,
        hr_last_third_avg: 56.5,
        hrv_min: 45,
        hrv_max: 58,
        hrv_range: 13,
        hrv_first_third_avg: 50,
        hrv_last_third_avg: 51.3,
        deep_sleep_pct: 27.3,
        light_sleep_pct: 40.9,
        rem_sleep_pct: 22.7,
        awake_pct: 9.1,
        phase_transitions: 9,
        readiness_score: 78,
        temperature_deviation: 0.15,
        temperature_trend: 0.05,
        contributor_activity_balance: 85,
        contributor_body_temperature: 90,
        contributor_hrv_balance: 72,
        contributor_previous_day_activity: 80,
        contributor_previous_night: 88,
        contributor_recovery_index: 75,
        contributor_resting_heart_rate: 92,
        contributor_sleep_balance: 81,
      });
    });

    it('should return an empty structure when the sleep source is empty', () => {
      expect(extractDetailedSleep(createSleepSources({ sleep: [] }))).toEqual({});
    });

    it('should return an empty structure when no long_sleep matches the wake date', () => {
      const data = createSleepSources({
        sleep: [
          createSleepSession({ type: 'rest' }),
          createSleepSession({ type: 'sleep' }),
        ],
      });

      expect(extractDetailedSleep(data, { wakeDate: '2026-01-15' })).toEqual({});
    });

    it('should skip series statistics when the series is missing', () => {
      const session = createSleepSession({ heart_rate: null, sleep_phase_5_min: '' });
      delete session['readiness'];

      const detailed = extractDetailedSleep({ sleep: [session] });

      expect(detailed).not.toHaveProperty('hr_min');
      expect(detailed).not.toHaveProperty('phase_transitions');
      expect(detailed).not.toHaveProperty('readiness_score');
      expect(detailed).toHaveProperty('hrv_min', 45);
    });

    it('should null contributors missing from the embedded readiness', () => {
      const detailed = extractDetailedSleep({
        sleep: [createSleepSession({ readiness: { score: 70 } })],
      });

      expect(detailed).toHaveProperty('readiness_score', 70);
      expect(detailed).toHaveProperty('contributor_sleep_balance', null);
      expect(detailed).toHaveProperty('temperature_trend', null);
    });
  });

  describe('extractDetailedWorkouts', () => {
    it('should describe each workout in order', () => {
      expect(extractDetailedWorkouts(createActivitySources())).toEqual([
        {
          activity: 'walking',
          label: null,
          intensity: 'easy',
          start_time: '2026-01-14T12:00:00-05:00',
          end_time: '2026-01-14T12:45:30-05:00',
          duration_minutes: 45,
          calories: 180,
          distance_meters: 3500,
          source: 'autodetected',
        },
      ]);
    });

    it('should return an empty list without workouts', () => {
      expect(extractDetailedWorkouts({ workouts: [] })).toEqual([]);
    });
  });

  describe('workoutDurationMinutes', () => {
    it('should handle differing offsets', () => {
      expect(
        workoutDurationMinutes('2026-01-14T12:00:00-05:00', '2026-01-14T17:30:00Z')
      ).toBe(30);
    });

    it('should return zero for missing or invalid timestamps', () => {
      expect(workoutDurationMinutes(null, '2026-01-14T12:00:00Z')).toBe(0);
      expect(workoutDurationMinutes('not a date', '2026-01-14T12:00:00Z')).toBe(0);
    });
  });
});
