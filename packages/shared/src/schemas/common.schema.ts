import { z } from 'zod';

const datePattern = /^\d{4}-\d{2}-\d{2}$/;

export const dateStringSchema = z
  .string()
  .regex(datePattern, 'Date must be in YYYY-MM-DD format');

export const daysQuerySchema = z.object({
  days: z.coerce.number().int().min(1).max(3650).optional(),
});

export const dateParamSchema = z.object({
  date: dateStringSchema,
});

export type DaysQueryInput = z.infer<typeof daysQuerySchema>;
