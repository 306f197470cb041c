import { z } from 'zod';

export const DEFAULT_BACKFILL_DAYS = 90;
export const MAX_BACKFILL_DAYS = 365;

export const backfillRequestSchema = z.object({
  days: z.coerce.number().int().min(1).max(MAX_BACKFILL_DAYS).default(DEFAULT_BACKFILL_DAYS),
});

export type BackfillRequest = z.infer<typeof backfillRequestSchema>;
