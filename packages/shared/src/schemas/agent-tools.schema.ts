import { z } from 'zod';
import { dateStringSchema } from './common.schema.js';

/**
 * Agent Tool Schemas
 *
 * Inputs the conversational agent may pass to each tool.
 */

export const AGENT_TOOL_NAMES = [
  'get_metrics',
  'get_detailed_sleep',
  'get_interventions',
  'get_baselines',
  'log_intervention',
  'get_today_interventions',
  'get_recent_briefs',
] as const;

export type AgentToolName = (typeof AGENT_TOOL_NAMES)[number];

export const MAX_RECENT_BRIEF_DAYS = 7;

export const dateRangeSchema = z
  .object({
    start_date: dateStringSchema,
    end_date: dateStringSchema,
  })
  .refine((range) => range.start_date <= range.end_date, {
    message: 'start_date must not be after end_date',
    path: ['end_date'],
  });

export const getDetailedSleepSchema = z.object({
  date: dateStringSchema,
});

export const logInterventionToolSchema = z.object({
  raw_text: z.string().min(1),
  normalized: z.string().min(1),
});

export const getRecentBriefsSchema = z.object({
  days: z.number().int().min(1).default(3).transform((days) => Math.min(days, MAX_RECENT_BRIEF_DAYS)),
});

export const emptyToolInputSchema = z.object({}).passthrough();

export type DateRangeInput = z.infer<typeof dateRangeSchema>;
export type LogInterventionToolInput = z.infer<typeof logInterventionToolSchema>;
