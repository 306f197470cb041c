import { z } from 'zod';
import { dateStringSchema } from './common.schema.js';

export const metricBaselineSchema = z.object({
  mean: z.number(),
  std: z.number().min(0),
  values: z.array(z.number()).default([]),
});

/**
 * Shape of the persisted baselines file. Missing collections default to
 * empty so that files written before a field existed still load; the
 * `window_days` fallback is supplied by the caller.
 */
export const baselineSetSchema = z.object({
  last_updated: z.string().nullable().default(null),
  dates: z.array(dateStringSchema).default([]),
  data_points: z.number().int().min(0).default(0),
  window_days: z.number().int().positive().optional(),
  metrics: z.record(metricBaselineSchema).default({}),
});

export type BaselineSetDocument = z.infer<typeof baselineSetSchema>;
