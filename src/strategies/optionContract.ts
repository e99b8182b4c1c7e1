import type { Direction, OptionType } from '../core/types.js';
import { addDays, weekdayOf, zonedParts } from '../market/zonedTime.js';

const FRIDAY = 5;

export const optionTypeFor = (direction: Direction): OptionType => (direction === 'long' ? 'call' : 'put');

/**
 * The Friday after the exchange-local date of `now`. On a Friday this is the
 * following week's contract.
 */
export const nextWeeklyExpiry = (now: number, timeZone: string): string => {
  const { date } = zonedParts(now, timeZone);
  let daysAhead = FRIDAY - weekdayOf(date);
  if (daysAhead <= 0) daysAhead += 7;
  return addDays(date, daysAhead);
};
