import { addDays as addCalendarDays, format, getDay, parseISO } from 'date-fns';
import { formatInTimeZone, fromZonedTime } from 'date-fns-tz';

/** Wall-clock helpers for an exchange timezone. Dates are `YYYY-MM-DD` strings. */

export interface ZonedParts {
  /** YYYY-MM-DD in the zone. */
  date: string;
  /** Minutes since local midnight. */
  minuteOfDay: number;
}

const pad = (n: number): string => String(n).padStart(2, '0');

export const parseHhMm = (value: string): number => {
  const [h, m] = value.split(':').map((p) => parseInt(p, 10));
  return (h ?? 0) * 60 + (m ?? 0);
};

export const zonedParts = (ts: number, timeZone: string): ZonedParts => {
  const [date = '', clock = '00:00'] = formatInTimeZone(ts, timeZone, 'yyyy-MM-dd HH:mm').split(' ');
  return { date, minuteOfDay: parseHhMm(clock) };
};

/** Instant at which the zone's wall clock reads `date` + `minuteOfDay`. */
export const zonedToUtc = (date: string, minuteOfDay: number, timeZone: string): number =>
  fromZonedTime(`${date}T${pad(Math.floor(minuteOfDay / 60))}:${pad(minuteOfDay % 60)}:00`, timeZone).getTime();

export const addDays = (date: string, days: number): string => format(addCalendarDays(parseISO(date), days), 'yyyy-MM-dd');

/** 0 = Sunday … 6 = Saturday. */
export const weekdayOf = (date: string): number => getDay(parseISO(date));
