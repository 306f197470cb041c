/**
 * History Service
 *
 * Bounded look-backs over stored records, interventions and briefs, used as
 * context for brief generation and by the agent tools. Each walks local
 * dates from today backward and silently skips days with nothing stored.
 */

import type { Brief, DailyRecord, InterventionsByDate } from '../shared.js';
import { getConfig } from '../config.js';
import {
  getBriefRepository,
  getDailyRecordRepository,
  getInterventionRepository,
} from '../repositories/index.js';
import { datesInRange, lastNDates } from '../utils/dates.js';

/** Records for the last `days` local dates, newest first. */
export function loadHistoricalRecords(days: number, now: Date = new Date()): DailyRecord[] {
  const dates = lastNDates(getConfig().timezone, days, now);
  return getDailyRecordRepository().findByDates(dates);
}

/** Records between two dates inclusive, oldest first. */
export function loadRecordsInRange(startDate: string, endDate: string): DailyRecord[] {
  return getDailyRecordRepository().findByDates(datesInRange(startDate, endDate));
}

function collectInterventions(dates: string[]): InterventionsByDate {
  const repository = getInterventionRepository();
  const byDate: InterventionsByDate = {};
  for (const date of dates) {
    const entries = repository.findByDate(date);
    if (entries.length > 0) {
      byDate[date] = entries;
    }
  }
  return byDate;
}

/** Non-empty intervention days among the last `days` local dates. */
export function loadHistoricalInterventions(
  days: number,
  now: Date = new Date()
): InterventionsByDate {
  return collectInterventions(lastNDates(getConfig().timezone, days, now));
}

export function loadInterventionsInRange(startDate: string, endDate: string): InterventionsByDate {
  return collectInterventions(datesInRange(startDate, endDate));
}

/** Morning briefs for the last `days` local dates, newest first. */
export function loadRecentBriefs(days: number, now: Date = new Date()): Brief[] {
  const repository = getBriefRepository();
  const briefs: Brief[] = [];
  for (const date of lastNDates(getConfig().timezone, days, now)) {
    const brief = repository.findByDate(date);
    if (brief) {
      briefs.push(brief);
    }
  }
  return briefs;
}

export function getLatestBrief(): Brief | null {
  return getBriefRepository().findLatest();
}
