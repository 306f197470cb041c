#!/usr/bin/env tsx
/**
 * Replace stored baselines with the defaults.
 */

import { info, error as logError } from 'firebase-functions/logger';
import { resetBaselines } from '../services/baseline.service.js';

try {
  const baselines = resetBaselines();
  info('[Baselines] Reset complete', { metrics: Object.keys(baselines.metrics).length });
} catch (err) {
  logError('[Baselines] Reset failed', {
    error_message: err instanceof Error ? err.message : String(err),
  });
  process.exitCode = 1;
}
