/**
 * Retention Service
 *
 * Only raw device snapshots expire. Daily records, briefs and intervention
 * logs are kept indefinitely.
 */

import { info } from 'firebase-functions/logger';
import type { PruneResult } from '../shared.js';
import { getConfig } from '../config.js';
import { getRawSnapshotRepository } from '../repositories/index.js';
import { localToday, shiftDate } from '../utils/dates.js';

const TAG = '[Retention]';

/** Delete raw snapshots dated before today minus the raw window. */
export function pruneRawSnapshots(now: Date = new Date()): PruneResult {
  const config = getConfig();
  const cutoff = shiftDate(localToday(config.timezone, now), -config.rawWindowDays);
  const repository = getRawSnapshotRepository();

  let pruned = 0;
  for (const date of repository.listDates()) {
    if (date < cutoff && repository.delete(date)) {
      pruned += 1;
    }
  }

  if (pruned > 0) {
    info(`${TAG} Pruned raw snapshots`, { pruned, cutoff });
  }
  return { cutoff, pruned };
}
