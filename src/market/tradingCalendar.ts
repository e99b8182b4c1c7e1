import fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { ClockUnavailableError, errorMessage } from '../core/errors.js';
import { parseHhMm } from './zonedTime.js';

const dateString = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD');
const hhmm = z.string().regex(/^([01]\d|2[0-3]):[0-5]\d$/, 'expected HH:MM');

const calendarFileSchema = z
  .object({
    exchange: z.string().default('XNYS'),
    timezone: z.string().min(1),
    session: z.object({ open: hhmm, close: hhmm }),
    coverage: z.object({ from: dateString, to: dateString }),
    holidays: z.array(dateString).default([]),
    earlyCloses: z.record(dateString, hhmm).default({})
  })
  .refine((c) => parseHhMm(c.session.open) < parseHhMm(c.session.close), {
    message: 'session open must precede close'
  })
  .refine((c) => c.coverage.from <= c.coverage.to, { message: 'coverage range is inverted' });

export interface TradingCalendar {
  exchange: string;
  timezone: string;
  /** Minutes after local midnight. */
  openMinute: number;
  closeMinute: number;
  coverage: { from: string; to: string };
  holidays: ReadonlySet<string>;
  earlyCloses: ReadonlyMap<string, number>;
}

export const DEFAULT_CALENDAR_PATH = fileURLToPath(new URL('../../config/market-calendar.json', import.meta.url));

export const buildTradingCalendar = (raw: unknown): TradingCalendar => {
  const parsed = calendarFileSchema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ClockUnavailableError(`invalid trading calendar: ${details}`);
  }
  const c = parsed.data;
  return {
    exchange: c.exchange,
    timezone: c.timezone,
    openMinute: parseHhMm(c.session.open),
    closeMinute: parseHhMm(c.session.close),
    coverage: c.coverage,
    holidays: new Set(c.holidays),
    earlyCloses: new Map(Object.entries(c.earlyCloses).map(([d, t]) => [d, parseHhMm(t)]))
  };
};

export const loadTradingCalendar = (path: string = DEFAULT_CALENDAR_PATH): TradingCalendar => {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(path, 'utf8'));
  } catch (err) {
    throw new ClockUnavailableError(`trading calendar unreadable: ${errorMessage(err)}`, { path });
  }
  return buildTradingCalendar(raw);
};
