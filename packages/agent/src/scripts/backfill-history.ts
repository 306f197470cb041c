#!/usr/bin/env tsx
/**
 * Rebuild records and baselines from device history.
 *
 * Usage: npm run backfill -- [days]
 */

import { info, error as logError } from 'firebase-functions/logger';
import { backfillRequestSchema } from '../shared.js';
import { backfillHistory } from '../services/morning-brief.service.js';
import { createOuraClient } from '../services/oura.service.js';

async function main(): Promise<void> {
  const { days } = backfillRequestSchema.parse({ days: process.argv[2] });
  const result = await backfillHistory(createOuraClient(), days);

  info('[Backfill] Complete', {
    days_requested: result.daysRequested,
    days_with_sleep: result.daysWithSleep,
    data_points: result.dataPoints,
  });
}

main().catch((err: unknown) => {
  logError('[Backfill] Failed', {
    error_message: err instanceof Error ? err.message : String(err),
  });
  process.exitCode = 1;
});
