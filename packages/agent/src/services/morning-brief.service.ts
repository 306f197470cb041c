/**
 * Morning Brief Service
 *
 * The ingestion jobs. A morning run stores last night's sleep and
 * yesterday's activity under today's record, writes a brief, and folds
 * today into the baselines. Expected shortfalls come back as an outcome,
 * never as a thrown error; malformed persisted state still throws.
 */

import { info, warn, error as logError } from 'firebase-functions/logger';
import type {
  BackfillResult,
  DeviceData,
  MetricSummary,
  MorningBriefOutcome,
} from '../shared.js';
import { hasDetailedSleep } from '../shared.js';
import { getConfig } from '../config.js';
import {
  getBriefRepository,
  getDailyRecordRepository,
  getRawSnapshotRepository,
} from '../repositories/index.js';
import { lastNDates, localToday } from '../utils/dates.js';
import {
  computeDeviations,
  getDefaultBaselines,
  loadBaselines,
  saveBaselines,
  toBaselineSnapshot,
  updateBaselines,
} from './baseline.service.js';
import type { BriefContext, BriefGenerator } from './brief-generator.service.js';
import { resolveBriefDates } from './date-convention.service.js';
import {
  loadHistoricalInterventions,
  loadHistoricalRecords,
  loadRecentBriefs,
} from './history.service.js';
import {
  extractActivityMetrics,
  extractDetailedSleep,
  extractDetailedWorkouts,
  extractSleepMetrics,
} from './metric-extraction.service.js';
import type { DeviceDataSource } from './oura.service.js';
import { pruneRawSnapshots } from './retention.service.js';

const TAG = '[MorningBrief]';

export interface MorningBriefDeps {
  source: DeviceDataSource;
  generator: BriefGenerator;
  now?: Date;
}

export function buildPartialMessage(reason: string): string {
  return `Could not generate a complete brief because ${reason}. The data it did get is still saved.`;
}

export function buildDelayedMessage(date: string): string {
  return `Sleep data for ${date} is not available yet. Sync the ring, then run the brief again.`;
}

interface IngestedDay {
  metrics: MetricSummary;
  hasSleep: boolean;
}

/**
 * Fetch and store one record date: sleep by wake-date, activity by the day
 * before, both merged into the record for `date`. With `requireSleep` the
 * day is left untouched when no main sleep session is available.
 */
async function ingestDay(
  source: DeviceDataSource,
  date: string,
  requireSleep: boolean
): Promise<IngestedDay | null> {
  const dates = resolveBriefDates(date);
  const records = getDailyRecordRepository();

  const sleepData = await source.fetchSleepSources(dates.wakeDate);
  const detailedSleep = extractDetailedSleep(sleepData);
  const hasSleep = sleepData.sleep.length > 0 && hasDetailedSleep(detailedSleep);
  if (requireSleep && !hasSleep) {
    return null;
  }

  // Empty detail from a degraded source is left out so the merge keeps what is stored.
  const sleepMetrics = extractSleepMetrics(sleepData);
  records.write(
    dates.recordDate,
    hasSleep ? { summary: sleepMetrics, detailed_sleep: detailedSleep } : { summary: sleepMetrics },
    true
  );

  const activityData = await source.fetchActivitySources(dates.calendarDate);
  const activityMetrics = extractActivityMetrics(activityData);
  records.write(
    dates.recordDate,
    activityData.workouts.length > 0
      ? { summary: activityMetrics, detailed_workouts: extractDetailedWorkouts(activityData) }
      : { summary: activityMetrics },
    true
  );

  const raw: DeviceData = { ...sleepData, ...activityData };
  getRawSnapshotRepository().save(dates.recordDate, raw);

  return { metrics: { ...sleepMetrics, ...activityMetrics }, hasSleep };
}

/**
 * Run today's brief.
 *
 * Returns `delayed` without writing anything when last night's sleep has
 * not synced. A generator failure returns `partial`; the record and the
 * baselines are updated either way.
 */
export async function runMorningBrief(deps: MorningBriefDeps): Promise<MorningBriefOutcome> {
  const config = getConfig();
  const now = deps.now ?? new Date();
  const today = localToday(config.timezone, now);

  info(`${TAG} Starting morning brief`, { date: today });

  const ingested = await ingestDay(deps.source, today, true);
  if (!ingested) {
    warn(`${TAG} Sleep data not available`, { date: today });
    return {
      status: 'delayed',
      date: today,
      reason: 'sleep_data_not_available',
      message: buildDelayedMessage(today),
    };
  }

  const { metrics } = ingested;
  const record = getDailyRecordRepository().findByDate(today);
  const baselines = loadBaselines();

  // Only the generator call is caught; malformed stored state propagates.
  const context: BriefContext = {
    date: today,
    metrics,
    detailedSleep: record?.detailed_sleep ?? {},
    detailedWorkouts: record?.detailed_workouts ?? [],
    baselines: toBaselineSnapshot(baselines),
    deviations: computeDeviations(metrics, baselines),
    history: loadHistoricalRecords(config.briefHistoryDays, now),
    interventions: loadHistoricalInterventions(config.briefHistoryDays, now),
    recentBriefs: loadRecentBriefs(config.recentBriefsDays, now),
  };

  let outcome: MorningBriefOutcome;
  try {
    const brief = await deps.generator.generate(context);
    getBriefRepository().save(today, brief);
    outcome = { status: 'success', date: today, brief, metrics };
  } catch (err) {
    const reason = err instanceof Error ? err.message : 'brief generation failed';
    logError(`${TAG} Brief generation failed`, { date: today, error_message: reason });
    outcome = {
      status: 'partial',
      date: today,
      reason,
      message: buildPartialMessage(reason),
      metrics,
    };
  }

  saveBaselines(
    updateBaselines(baselines, metrics, today, { timezone: config.timezone, now })
  );
  pruneRawSnapshots(now);

  info(`${TAG} Morning brief finished`, { date: today, status: outcome.status });
  return outcome;
}

/**
 * Rebuild records and baselines for the last `days` record dates.
 *
 * Days are ingested oldest first and folded into fresh default baselines;
 * only days with a main sleep session contribute. Baselines are persisted
 * once at the end.
 */
export async function backfillHistory(
  source: DeviceDataSource,
  days: number,
  now: Date = new Date()
): Promise<BackfillResult> {
  const config = getConfig();
  const dates = lastNDates(config.timezone, days, now).reverse();

  info(`${TAG} Starting backfill`, { days, from: dates[0], to: dates[dates.length - 1] });

  let baselines = getDefaultBaselines(config.baselineWindowDays);
  let daysWithSleep = 0;

  for (const date of dates) {
    const ingested = await ingestDay(source, date, false);
    if (!ingested?.hasSleep) {
      continue;
    }
    daysWithSleep += 1;
    baselines = updateBaselines(baselines, ingested.metrics, date, {
      timezone: config.timezone,
      now,
    });
  }

  saveBaselines(baselines);
  pruneRawSnapshots(now);

  info(`${TAG} Backfill finished`, { days, days_with_sleep: daysWithSleep });
  return {
    daysRequested: days,
    daysWithSleep,
    dataPoints: baselines.data_points,
  };
}
