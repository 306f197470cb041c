/**
 * Baseline Service
 *
 * Rolling per-metric statistics over the most recent contributing days.
 *
 * `dates` records the days that contributed to the window. Each metric's
 * `values` holds that metric's own last observations and can be shorter
 * than `dates`: a metric missing on a day adds no placeholder.
 */

import { info } from 'firebase-functions/logger';
import type {
  BaselineSet,
  BaselineSetDocument,
  BaselineSnapshot,
  MetricBaseline,
  MetricDeviation,
  MetricSummary,
} from '../shared.js';
import { getConfig } from '../config.js';
import { getBaselineRepository } from '../repositories/index.js';
import { localTimestamp } from '../utils/dates.js';

const TAG = '[Baselines]';

export const DEFAULT_WINDOW_DAYS = 60;
export const DEVIATION_THRESHOLD = 1.5;

/** Population defaults used until a metric has its own history. */
export const DEFAULT_BASELINE_STATS: Readonly<Record<string, { mean: number; std: number }>> = {
  // Sleep
  sleep_score: { mean: 75, std: 10 },
  hrv: { mean: 45, std: 10 },
  deep_sleep_minutes: { mean: 70, std: 15 },
  light_sleep_minutes: { mean: 200, std: 30 },
  rem_sleep_minutes: { mean: 90, std: 20 },
  sleep_efficiency: { mean: 85, std: 5 },
  latency_minutes: { mean: 15, std: 10 },
  total_sleep_minutes: { mean: 420, std: 45 },
  // Vitals
  resting_hr: { mean: 55, std: 5 },
  daytime_hr_avg: { mean: 70, std: 8 },
  // Recovery
  readiness: { mean: 75, std: 10 },
  stress_high: { mean: 60, std: 30 },
  recovery_high: { mean: 120, std: 45 },
  // Activity
  workout_minutes: { mean: 30, std: 20 },
  workout_calories: { mean: 200, std: 150 },
};

export interface UpdateBaselinesOptions {
  window?: number;
  timezone?: string;
  now?: Date;
}

/**
 * Round to `decimals` places, ties to even, judged on the exact binary value:
 * 70.25 becomes 70.2, while 70.35 (stored as 70.3499...) becomes 70.3.
 */
export function roundHalfEven(value: number, decimals: number): number {
  if (!Number.isFinite(value)) {
    return value;
  }

  const [whole = '0', fraction = ''] = Math.abs(value).toFixed(100).split('.');
  const units = Number(`${whole}${fraction.slice(0, decimals)}`);
  const rest = fraction.slice(decimals);
  const next = rest.charAt(0);
  const beyondHalf = next > '5' || (next === '5' && /[1-9]/.test(rest.slice(1)));
  const isTie = next === '5' && !beyondHalf;
  const rounded = beyondHalf || (isTie && units % 2 === 1) ? units + 1 : units;

  if (rounded === 0) {
    return 0;
  }
  return (Math.sign(value) * rounded) / Math.pow(10, decimals);
}

function defaultMetric(name: string): MetricBaseline {
  const stats = DEFAULT_BASELINE_STATS[name] ?? { mean: 0, std: 0 };
  return { mean: stats.mean, std: stats.std, values: [] };
}

export function getDefaultBaselines(windowDays: number = DEFAULT_WINDOW_DAYS): BaselineSet {
  const metrics: Record<string, MetricBaseline> = {};
  for (const name of Object.keys(DEFAULT_BASELINE_STATS)) {
    metrics[name] = defaultMetric(name);
  }

  return {
    last_updated: null,
    dates: [],
    data_points: 0,
    window_days: windowDays,
    metrics,
  };
}

/**
 * Bring a persisted set up to the current metric schema.
 *
 * Returns defaults when nothing is persisted. Otherwise adds any default
 * metric the file lacks; existing metrics are never altered.
 */
export function migrateBaselines(
  persisted: BaselineSetDocument | null,
  windowDays: number = DEFAULT_WINDOW_DAYS
): BaselineSet {
  if (!persisted) {
    return getDefaultBaselines(windowDays);
  }

  const metrics: Record<string, MetricBaseline> = { ...persisted.metrics };
  for (const name of Object.keys(DEFAULT_BASELINE_STATS)) {
    if (!(name in metrics)) {
      info(`${TAG} Adding new baseline metric: ${name}`);
      metrics[name] = defaultMetric(name);
    }
  }

  return {
    last_updated: persisted.last_updated,
    dates: [...persisted.dates],
    data_points: persisted.data_points,
    window_days: persisted.window_days ?? windowDays,
    metrics,
  };
}

export function mean(values: number[]): number {
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

/** Sample standard deviation (n - 1 denominator). Requires at least two values. */
export function sampleStdDev(values: number[]): number {
  const avg = mean(values);
  const squared = values.reduce((sum, value) => sum + (value - avg) ** 2, 0);
  return Math.sqrt(squared / (values.length - 1));
}

function cloneBaselines(baselines: BaselineSet): BaselineSet {
  const metrics: Record<string, MetricBaseline> = {};
  for (const [name, metric] of Object.entries(baselines.metrics)) {
    metrics[name] = { ...metric, values: [...metric.values] };
  }
  return { ...baselines, dates: [...baselines.dates], metrics };
}

/**
 * Fold one day's metrics into the rolling window and return the new set.
 * The input is left untouched.
 *
 * Re-ingesting a date already in the window is a correction: the value at
 * that date's position is removed from every metric before the new values
 * are appended, so the date contributes once.
 *
 * Only numeric values for metrics already in the schema are recorded;
 * unknown keys, nulls and labels are ignored.
 */
export function updateBaselines(
  baselines: BaselineSet,
  newMetrics: MetricSummary,
  date: string,
  options: UpdateBaselinesOptions = {}
): BaselineSet {
  const window = options.window ?? baselines.window_days;
  const timezone = options.timezone ?? getConfig().timezone;
  const next = cloneBaselines(baselines);

  const existingIndex = next.dates.indexOf(date);
  if (existingIndex !== -1) {
    info(`${TAG} Replacing baseline data for ${date}`, { index: existingIndex });
    for (const metric of Object.values(next.metrics)) {
      if (metric.values.length > existingIndex) {
        metric.values.splice(existingIndex, 1);
      }
    }
    next.dates.splice(existingIndex, 1);
  }

  next.dates.push(date);
  next.dates = next.dates.slice(-window);

  for (const [name, value] of Object.entries(newMetrics)) {
    const metric = next.metrics[name];
    if (!metric || typeof value !== 'number') {
      continue;
    }

    metric.values.push(value);
    metric.values = metric.values.slice(-window);

    if (metric.values.length >= 2) {
      metric.mean = roundHalfEven(mean(metric.values), 1);
      metric.std = roundHalfEven(sampleStdDev(metric.values), 1);
    } else {
      metric.mean = value;
      metric.std = 0;
    }
  }

  next.last_updated = localTimestamp(timezone, options.now);
  next.data_points = next.dates.length;

  return next;
}

/**
 * Standard scores for every numeric summary metric that has a baseline.
 * Metrics with zero spread are skipped.
 */
export function computeDeviations(
  summary: MetricSummary,
  baselines: BaselineSet,
  threshold: number = DEVIATION_THRESHOLD
): MetricDeviation[] {
  const deviations: MetricDeviation[] = [];

  for (const [name, value] of Object.entries(summary)) {
    const metric = baselines.metrics[name];
    if (!metric || typeof value !== 'number' || metric.std === 0) {
      continue;
    }

    const zScore = roundHalfEven((value - metric.mean) / metric.std, 2);
    deviations.push({
      metric: name,
      value,
      mean: metric.mean,
      std: metric.std,
      zScore,
      flagged: Math.abs(zScore) >= threshold,
    });
  }

  return deviations;
}

/** Mean and spread only, without the raw value history. */
export function toBaselineSnapshot(baselines: BaselineSet): BaselineSnapshot {
  const metrics: BaselineSnapshot['metrics'] = {};
  for (const [name, metric] of Object.entries(baselines.metrics)) {
    metrics[name] = { mean: metric.mean, std: metric.std };
  }
  return {
    metrics,
    data_points: baselines.data_points,
    last_updated: baselines.last_updated,
  };
}

// ============ Persistence ============

/**
 * Read the persisted set, migrating it to the current schema.
 * Throws MalformedPersistedStateError for an unreadable file.
 */
export function loadBaselines(): BaselineSet {
  const persisted = getBaselineRepository().read();
  return migrateBaselines(persisted, getConfig().baselineWindowDays);
}

export function saveBaselines(baselines: BaselineSet): void {
  getBaselineRepository().write(baselines);
}

/** Overwrite the persisted set with population defaults. */
export function resetBaselines(): BaselineSet {
  const defaults = getDefaultBaselines(getConfig().baselineWindowDays);
  saveBaselines(defaults);
  info(`${TAG} Baselines reset to defaults`);
  return defaults;
}
