import { z } from 'zod';

export const interventionEntrySchema = z.object({
  time: z.string(),
  raw: z.string(),
  cleaned: z.string(),
});

/** The single-document day format: `{ date, entries }`. */
export const interventionDayDocumentSchema = z.object({
  date: z.string().optional(),
  entries: z.array(interventionEntrySchema),
});

/** The oldest day format, before raw/cleaned text existed. */
export const legacyInterventionDocumentSchema = z.object({
  interventions: z.array(
    z.object({
      timestamp: z.string().optional(),
      name: z.string().optional(),
      details: z.string().nullable().optional(),
    })
  ),
});

export const logInterventionSchema = z.object({
  raw: z.string().trim().min(1, 'Intervention text is required').max(2000),
  cleaned: z.string().trim().min(1).max(2000).optional(),
});

export type LogInterventionInput = z.infer<typeof logInterventionSchema>;
