/**
 * Intervention Service
 *
 * Logging and lookup of today's interventions in local time.
 */

import { info } from 'firebase-functions/logger';
import type { InterventionEntry } from '../shared.js';
import { getConfig } from '../config.js';
import { getInterventionRepository } from '../repositories/index.js';
import { localClockTime, localToday } from '../utils/dates.js';

const TAG = '[Interventions]';

export interface LoggedIntervention {
  date: string;
  entry: InterventionEntry;
}

/**
 * Append an intervention to today's log. `cleaned` defaults to the raw text.
 */
export function logIntervention(
  raw: string,
  cleaned?: string,
  now: Date = new Date()
): LoggedIntervention {
  const { timezone } = getConfig();
  const date = localToday(timezone, now);
  const entry: InterventionEntry = {
    time: localClockTime(timezone, now),
    raw,
    cleaned: cleaned ?? raw,
  };

  getInterventionRepository().append(date, entry);
  info(`${TAG} Logged intervention`, { date, time: entry.time });
  return { date, entry };
}

export function getInterventions(date: string): InterventionEntry[] {
  return getInterventionRepository().findByDate(date);
}

export function getTodayInterventions(now: Date = new Date()): InterventionEntry[] {
  return getInterventions(localToday(getConfig().timezone, now));
}

/** Remove everything logged today. Returns false when there was nothing. */
export function clearTodayInterventions(now: Date = new Date()): boolean {
  const date = localToday(getConfig().timezone, now);
  const cleared = getInterventionRepository().deleteByDate(date);
  if (cleared) {
    info(`${TAG} Cleared interventions`, { date });
  }
  return cleared;
}
