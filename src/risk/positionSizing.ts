import type { Box, Direction, RiskConfig } from '../core/types.js';

/**
 * Stop just beyond the box boundary that invalidates the trade:
 * below the bottom for longs, above the top for shorts.
 */
export const computeStop = (box: Pick<Box, 'top' | 'bottom'>, direction: Direction, stopBufferPct: number): number =>
  direction === 'long' ? box.bottom * (1 - stopBufferPct) : box.top * (1 + stopBufferPct);

/** One target per reward ratio, measured in multiples of the stop distance. */
export const computeTargets = (entry: number, stopDistance: number, direction: Direction, rewardRatios: number[]): number[] =>
  rewardRatios.map((ratio) => (direction === 'long' ? entry + stopDistance * ratio : entry - stopDistance * ratio));

/**
 * Fixed-dollar risk sizing: a stop-out loses exactly riskPerTrade.
 * Examples (riskPerTrade=25):
 *   stop distance 1.85 → 13.51 units
 *   stop distance 0.50 → 50 units
 */
export const computeQuantity = (riskPerTrade: number, stopDistance: number): number => {
  if (!(stopDistance > 0)) return 0;
  return riskPerTrade / stopDistance;
};

export interface TradePlan {
  entry: number;
  stop: number;
  stopDistance: number;
  targets: number[];
  quantity: number;
  riskAmount: number;
}

export const planTrade = (box: Pick<Box, 'top' | 'bottom'>, direction: Direction, entry: number, risk: RiskConfig): TradePlan | null => {
  const stop = computeStop(box, direction, risk.stopBufferPct);
  const stopDistance = direction === 'long' ? entry - stop : stop - entry;
  if (!(stopDistance > 0)) return null;
  return {
    entry,
    stop,
    stopDistance,
    targets: computeTargets(entry, stopDistance, direction, risk.rewardRatios),
    quantity: computeQuantity(risk.riskPerTrade, stopDistance),
    riskAmount: risk.riskPerTrade
  };
};
