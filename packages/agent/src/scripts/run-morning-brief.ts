#!/usr/bin/env tsx
/**
 * Run today's morning brief once and print the result.
 */

import { info, error as logError } from 'firebase-functions/logger';
import { createBriefGenerator } from '../services/brief-generator.service.js';
import { runMorningBrief } from '../services/morning-brief.service.js';
import { createOuraClient } from '../services/oura.service.js';

async function main(): Promise<void> {
  const outcome = await runMorningBrief({
    source: createOuraClient(),
    generator: createBriefGenerator(),
  });

  info('[MorningBrief] Run complete', { date: outcome.date, status: outcome.status });
  process.stdout.write(`${outcome.status === 'success' ? outcome.brief : outcome.message}\n`);
}

main().catch((err: unknown) => {
  logError('[MorningBrief] Run failed', {
    error_message: err instanceof Error ? err.message : String(err),
  });
  process.exitCode = 1;
});
