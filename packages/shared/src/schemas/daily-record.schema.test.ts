import { describe, expect, it } from 'vitest';
import { dailyRecordSchema, detailedWorkoutSchema } from './daily-record.schema.js';

describe('daily record schemas', () => {
  describe('dailyRecordSchema', () => {
    it('fills empty defaults for missing sections', () => {
      const result = dailyRecordSchema.parse({ date: '2026-01-15' });

      expect(result).toEqual({
        date: '2026-01-15',
        summary: {},
        detailed_sleep: {},
        detailed_workouts: [],
      });
    });

    it('accepts mixed summary values including nulls and activity lists', () => {
      const result = dailyRecordSchema.safeParse({
        date: '2026-01-15',
        summary: {
          sleep_score: 82,
          hrv: null,
          stress_day_summary: 'restored',
          workout_activities: ['walking'],
        },
      });

      expect(result.success).toBe(true);
    });

    it('rejects a detailed sleep object that is neither complete nor empty', () => {
      const result = dailyRecordSchema.safeParse({
        date: '2026-01-15',
        detailed_sleep: { bedtime_start: 42 },
      });

      expect(result.success).toBe(false);
    });

    it('rejects a date in the wrong format', () => {
      const result = dailyRecordSchema.safeParse({ date: '01/15/2026' });

      expect(result.success).toBe(false);
    });
  });

  describe('detailedWorkoutSchema', () => {
    it('requires a numeric duration', () => {
      const result = detailedWorkoutSchema.safeParse({
        activity: 'cycling',
        label: null,
        intensity: 'moderate',
        start_time: null,
        end_time: null,
        duration_minutes: null,
        calories: 250,
        distance_meters: null,
        source: 'manual',
      });

      expect(result.success).toBe(false);
    });
  });
});
