import { ClockUnavailableError, errorMessage } from '../core/errors.js';
import type { Logger } from '../core/logger.js';
import type { TradingCalendar } from './tradingCalendar.js';
import { addDays, weekdayOf, zonedParts, zonedToUtc } from './zonedTime.js';

export interface MarketClock {
  isOpen(now: number): boolean;
  /** Next open if closed, next close if open. Epoch ms. */
  nextTransition(now: number): number;
}

interface Session {
  open: number;
  close: number;
}

// Longest run of closed days the search will walk (long weekend + holidays).
const MAX_CLOSED_RUN_DAYS = 10;

/** Pure function of the calendar; throws ClockUnavailableError outside coverage. */
export class CalendarMarketClock implements MarketClock {
  constructor(private readonly calendar: TradingCalendar) {}

  isOpen(now: number): boolean {
    const { date } = zonedParts(now, this.calendar.timezone);
    const session = this.sessionOn(date);
    return session !== null && now >= session.open && now < session.close;
  }

  nextTransition(now: number): number {
    let date = zonedParts(now, this.calendar.timezone).date;
    for (let i = 0; i <= MAX_CLOSED_RUN_DAYS; i += 1) {
      const session = this.sessionOn(date);
      if (session) {
        if (now < session.open) return session.open;
        if (now < session.close) return session.close;
      }
      date = addDays(date, 1);
    }
    throw new ClockUnavailableError('no trading session found ahead', { from: now });
  }

  private sessionOn(date: string): Session | null {
    const { coverage, timezone } = this.calendar;
    if (date < coverage.from || date > coverage.to) {
      throw new ClockUnavailableError(`calendar has no data for ${date}`, { coverage });
    }
    const weekday = weekdayOf(date);
    if (weekday === 0 || weekday === 6) return null;
    if (this.calendar.holidays.has(date)) return null;
    const closeMinute = this.calendar.earlyCloses.get(date) ?? this.calendar.closeMinute;
    return {
      open: zonedToUtc(date, this.calendar.openMinute, timezone),
      close: zonedToUtc(date, closeMinute, timezone)
    };
  }
}

/** Stand-in when no calendar could be loaded; every reading fails safe to closed. */
export class UnavailableMarketClock implements MarketClock {
  constructor(private readonly reason: string) {}

  isOpen(_now: number): boolean {
    throw new ClockUnavailableError(this.reason);
  }

  nextTransition(_now: number): number {
    throw new ClockUnavailableError(this.reason);
  }
}

export interface MarketStatus {
  open: boolean;
  /** When to look again. */
  nextCheckAt: number;
  /** False when the clock failed and the market is assumed closed. */
  reliable: boolean;
}

/** Clock reading that assumes a closed market when the calendar cannot answer. */
export const readMarketStatus = (
  clock: MarketClock,
  now: number,
  recheckMs: number,
  logger: Logger
): MarketStatus => {
  try {
    const open = clock.isOpen(now);
    return { open, nextCheckAt: clock.nextTransition(now), reliable: true };
  } catch (err) {
    if (!(err instanceof ClockUnavailableError)) throw err;
    logger.warn('market clock unavailable, assuming closed', { err: errorMessage(err), recheckMs });
    return { open: false, nextCheckAt: now + recheckMs, reliable: false };
  }
};
