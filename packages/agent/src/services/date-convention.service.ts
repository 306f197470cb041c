/**
 * Date Convention Service
 *
 * The wearable API uses two meanings of "day":
 * - wake-date: the morning a sleep session ended (sleep, readiness)
 * - calendar-date: the literal day (activity, stress, workouts, heart rate)
 *
 * A morning brief covers last night's sleep (wake-date = today) and
 * yesterday's completed activity (calendar-date = today - 1). The daily
 * record for the brief is always keyed by the wake-date.
 */

import type { DeviceSource } from '../shared.js';
import { shiftDate } from '../utils/dates.js';

export type DayConvention = 'wake' | 'calendar';

export const SOURCE_CONVENTIONS: Readonly<Record<DeviceSource, DayConvention>> = {
  daily_sleep: 'wake',
  daily_readiness: 'wake',
  sleep: 'wake',
  daily_activity: 'calendar',
  daily_stress: 'calendar',
  workouts: 'calendar',
  daytime_hr: 'calendar',
};

export interface BriefDates {
  /** Key of the daily record the brief writes to. */
  recordDate: string;
  /** Date to request sleep and readiness for. */
  wakeDate: string;
  /** Date to request activity, stress, workouts and heart rate for. */
  calendarDate: string;
}

export interface DateRange {
  start: string;
  end: string;
}

export function resolveBriefDates(today: string): BriefDates {
  return {
    recordDate: today,
    wakeDate: today,
    calendarDate: shiftDate(today, -1),
  };
}

/** The date a source should be queried for, given the brief's dates. */
export function dateForSource(source: DeviceSource, dates: BriefDates): string {
  return SOURCE_CONVENTIONS[source] === 'wake' ? dates.wakeDate : dates.calendarDate;
}

/**
 * Sleep sessions are listed by the night they started, so a session ending
 * on the wake-date may be filed under the day before. Query a day either side.
 */
export function sleepSessionRange(wakeDate: string): DateRange {
  return { start: shiftDate(wakeDate, -1), end: shiftDate(wakeDate, 1) };
}

/** The workout endpoint's end date is exclusive. */
export function workoutRange(calendarDate: string): DateRange {
  return { start: calendarDate, end: shiftDate(calendarDate, 1) };
}
