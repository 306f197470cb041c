import { addDays, differenceInCalendarDays, format, parseISO } from 'date-fns';
import { formatInTimeZone, fromZonedTime } from 'date-fns-tz';

const DATE_FORMAT = 'yyyy-MM-dd';

/** Today's calendar date in the given zone, `YYYY-MM-DD`. */
export function localToday(timezone: string, now: Date = new Date()): string {
  return formatInTimeZone(now, timezone, DATE_FORMAT);
}

/** Local wall-clock time, `HH:MM`. */
export function localClockTime(timezone: string, now: Date = new Date()): string {
  return formatInTimeZone(now, timezone, 'HH:mm');
}

/** ISO-8601 timestamp with the zone's offset, e.g. `2026-01-15T10:00:00-05:00`. */
export function localTimestamp(timezone: string, now: Date = new Date()): string {
  return formatInTimeZone(now, timezone, "yyyy-MM-dd'T'HH:mm:ssXXX");
}

/** Calendar arithmetic on a `YYYY-MM-DD` string; independent of any zone. */
export function shiftDate(date: string, days: number): string {
  return format(addDays(parseISO(date), days), DATE_FORMAT);
}

/** The last `days` local dates, today first. */
export function lastNDates(timezone: string, days: number, now: Date = new Date()): string[] {
  const today = localToday(timezone, now);
  const dates: string[] = [];
  for (let i = 0; i < days; i++) {
    dates.push(shiftDate(today, -i));
  }
  return dates;
}

/** Every date from `start` to `end`, inclusive, oldest first. */
export function datesInRange(start: string, end: string): string[] {
  const span = differenceInCalendarDays(parseISO(end), parseISO(start));
  const dates: string[] = [];
  for (let i = 0; i <= span; i++) {
    dates.push(shiftDate(start, i));
  }
  return dates;
}

/** First and last second of a local day as offset timestamps. */
export function localDayBounds(
  date: string,
  timezone: string
): { start: string; end: string } {
  const start = fromZonedTime(`${date}T00:00:00`, timezone);
  const end = fromZonedTime(`${date}T23:59:59`, timezone);
  return {
    start: localTimestamp(timezone, start),
    end: localTimestamp(timezone, end),
  };
}

export function isDateString(value: string): boolean {
  return /^\d{4}-\d{2}-\d{2}$/.test(value);
}
