/**
 * Box Detector: per (symbol, timeframe) consolidation-range recognizer.
 *
 * FORMING: candles accumulate in a rolling window. The window becomes a box
 * when its high/low range is tight enough, it is long enough, and its average
 * volume clears a multiple of the baseline volume (SMA of the candles that
 * preceded the window).
 *
 * CONFIRMED: each candle is checked against the boundaries.
 *   retest   = touches a boundary band and closes back inside → RETESTED
 *   breakout = closes or trades decisively outside            → INVALIDATED
 * Both on the same candle are settled by `conflictPolicy`.
 *
 * RETESTED: a breakout resolves the box (the setup played out). Either way
 * the box is evicted and a new FORMING cycle starts with fresh candles.
 */

import { SMA } from 'technicalindicators';
import { DataFormatError } from '../core/errors.js';
import type { Logger } from '../core/logger.js';
import type { Box, BoxState, Candle, Timeframe } from '../core/types.js';

export type ConflictPolicy = 'breakout' | 'retest';

export interface BoxDetectorOptions {
  /** Max (high - low) / low of the window. Default: 0.02 */
  boxSizeThreshold: number;
  /** Default: 5 */
  minConsolidationCandles: number;
  /** Window length; never below minConsolidationCandles. Default: 5 */
  lookbackCandles: number;
  /** Window avg volume must be >= this × baseline. Default: 1.3 */
  volumeThresholdMultiplier: number;
  /** Fraction of the boundary price. Default: 0.005 */
  retestTolerance: number;
  /** Candles kept for the baseline volume average. Default: 20 */
  baselineLookback: number;
  /** Candles a box may live without resolving. Default: 30 */
  maxBoxAgeCandles: number;
  conflictPolicy: ConflictPolicy;
}

export const DEFAULT_BOX_OPTIONS: BoxDetectorOptions = {
  boxSizeThreshold: 0.02,
  minConsolidationCandles: 5,
  lookbackCandles: 5,
  volumeThresholdMultiplier: 1.3,
  retestTolerance: 0.005,
  baselineLookback: 20,
  maxBoxAgeCandles: 30,
  conflictPolicy: 'breakout'
};

export interface BoxTransition {
  boxId: string;
  from: BoxState;
  to: BoxState;
  reason: string;
  at: number;
}

export interface BoxUpdate {
  symbol: string;
  timeframe: Timeframe;
  state: BoxState;
  /** Active box after this candle, if any. */
  box: Box | null;
  transition: BoxTransition | null;
  /** Box that left the tracker on this candle (invalidated, resolved or expired). */
  evicted: Box | null;
  /** True when the candle repeated the last seen timestamp and was ignored. */
  duplicate: boolean;
}

interface Tracker {
  symbol: string;
  timeframe: Timeframe;
  window: Candle[];
  baselineVolumes: number[];
  box: Box | null;
  boxAge: number;
  lastTime: number | null;
}

const average = (values: number[]): number | null => {
  if (values.length === 0) return null;
  const sma = SMA.calculate({ period: values.length, values });
  return sma[sma.length - 1] ?? null;
};

const snapshot = (box: Box): Box => Object.freeze({ ...box });

export const trackerKey = (symbol: string, timeframe: Timeframe): string => `${symbol}|${timeframe}`;

export class BoxDetector {
  private readonly options: BoxDetectorOptions;
  private readonly trackers = new Map<string, Tracker>();

  constructor(
    private readonly logger: Logger,
    options: Partial<BoxDetectorOptions> = {}
  ) {
    const merged = { ...DEFAULT_BOX_OPTIONS, ...options };
    this.options = {
      ...merged,
      lookbackCandles: Math.max(merged.lookbackCandles, merged.minConsolidationCandles)
    };
  }

  /** Seeds baseline volume from history without forming boxes. */
  warmUp(candles: Candle[]): void {
    const ordered = [...candles].sort((a, b) => a.time - b.time);
    for (const candle of ordered) {
      const t = this.tracker(candle.symbol, candle.timeframe);
      if (t.lastTime !== null && candle.time <= t.lastTime) continue;
      t.lastTime = candle.time;
      this.pushBaseline(t, candle.volume);
    }
  }

  onCandle(candle: Candle): BoxUpdate {
    const t = this.tracker(candle.symbol, candle.timeframe);
    if (t.lastTime !== null && candle.time === t.lastTime) {
      this.logger.debug('duplicate candle ignored', { symbol: t.symbol, timeframe: t.timeframe, time: candle.time });
      return this.update(t, null, null, true);
    }
    if (t.lastTime !== null && candle.time < t.lastTime) {
      throw new DataFormatError('candle out of order', {
        symbol: t.symbol,
        timeframe: t.timeframe,
        time: candle.time,
        lastTime: t.lastTime
      });
    }
    t.lastTime = candle.time;

    return t.box ? this.trackBox(t, t.box, candle) : this.form(t, candle);
  }

  getState(symbol: string, timeframe: Timeframe): BoxState {
    return this.trackers.get(trackerKey(symbol, timeframe))?.box?.state ?? 'FORMING';
  }

  getActiveBox(symbol: string, timeframe: Timeframe): Box | null {
    const box = this.trackers.get(trackerKey(symbol, timeframe))?.box;
    return box ? snapshot(box) : null;
  }

  /** Active boxes, optionally limited to one symbol. */
  activeBoxes(symbol?: string): Box[] {
    const out: Box[] = [];
    for (const t of this.trackers.values()) {
      if (t.box && (symbol === undefined || t.symbol === symbol)) out.push(snapshot(t.box));
    }
    return out;
  }

  baselineVolume(symbol: string, timeframe: Timeframe): number | null {
    const t = this.trackers.get(trackerKey(symbol, timeframe));
    return t ? average(t.baselineVolumes) : null;
  }

  private form(t: Tracker, candle: Candle): BoxUpdate {
    this.appendToWindow(t, candle);
    const opts = this.options;
    if (t.window.length < opts.minConsolidationCandles) return this.update(t, null, null);

    const high = Math.max(...t.window.map((c) => c.high));
    const low = Math.min(...t.window.map((c) => c.low));
    const rangePct = (high - low) / low;
    if (rangePct > opts.boxSizeThreshold) return this.update(t, null, null);

    const baseline = average(t.baselineVolumes);
    if (baseline === null || baseline <= 0) {
      this.logger.debug('tight range but no baseline volume yet', { symbol: t.symbol, timeframe: t.timeframe });
      return this.update(t, null, null);
    }
    const avgVolume = average(t.window.map((c) => c.volume)) ?? 0;
    if (avgVolume < opts.volumeThresholdMultiplier * baseline) return this.update(t, null, null);

    const box: Box = {
      id: `${t.symbol}:${t.timeframe}:${candle.time}`,
      symbol: t.symbol,
      timeframe: t.timeframe,
      top: high,
      bottom: low,
      formedAt: candle.time,
      candleCount: t.window.length,
      volumeRatio: Math.round((avgVolume / baseline) * 10_000) / 10_000,
      state: 'CONFIRMED',
      lastClose: candle.close
    };
    // Window candles belong to the box now; they cannot seed another one.
    for (const c of t.window) this.pushBaseline(t, c.volume);
    t.window = [];
    t.box = box;
    t.boxAge = 0;

    this.logger.info('box confirmed', {
      boxId: box.id,
      top: box.top,
      bottom: box.bottom,
      rangePct: Math.round(rangePct * 10_000) / 100,
      volumeRatio: box.volumeRatio
    });
    return this.update(t, { boxId: box.id, from: 'FORMING', to: 'CONFIRMED', reason: 'consolidation', at: candle.time }, null);
  }

  private trackBox(t: Tracker, box: Box, candle: Candle): BoxUpdate {
    const tol = this.options.retestTolerance;
    t.boxAge += 1;
    box.lastClose = candle.close;

    const upper = box.top * (1 + tol);
    const lower = box.bottom * (1 - tol);
    const breakout = candle.close > upper || candle.close < lower || candle.high > upper || candle.low < lower;
    const touched = candle.high >= box.top * (1 - tol) || candle.low <= box.bottom * (1 + tol);
    const closesInside = candle.close >= box.bottom && candle.close <= box.top;
    const retest = touched && closesInside;
    const breakoutWins = breakout && !(retest && this.options.conflictPolicy === 'retest');

    if (box.state === 'CONFIRMED') {
      if (breakoutWins) return this.invalidate(t, box, candle, retest ? 'breakout on retest candle' : 'breakout without retest');
      if (retest) {
        box.state = 'RETESTED';
        box.retestedAt = candle.time;
        this.logger.info('box retested', { boxId: box.id, close: candle.close });
        return this.update(t, { boxId: box.id, from: 'CONFIRMED', to: 'RETESTED', reason: 'retest', at: candle.time }, null);
      }
      if (t.boxAge >= this.options.maxBoxAgeCandles) return this.invalidate(t, box, candle, 'expired');
      return this.update(t, null, null);
    }

    if (breakoutWins || t.boxAge >= this.options.maxBoxAgeCandles) {
      box.resolvedAt = candle.time;
      const evicted = snapshot(box);
      this.logger.info('box resolved', { boxId: box.id, reason: breakoutWins ? 'breakout' : 'expired', close: candle.close });
      this.reset(t, candle);
      return this.update(t, null, evicted);
    }
    return this.update(t, null, null);
  }

  private invalidate(t: Tracker, box: Box, candle: Candle, reason: string): BoxUpdate {
    box.state = 'INVALIDATED';
    box.resolvedAt = candle.time;
    const evicted = snapshot(box);
    this.logger.info('box invalidated', { boxId: box.id, reason, close: candle.close });
    this.reset(t, candle);
    return this.update(t, { boxId: box.id, from: 'CONFIRMED', to: 'INVALIDATED', reason, at: candle.time }, evicted);
  }

  private reset(t: Tracker, candle: Candle): void {
    t.box = null;
    t.boxAge = 0;
    t.window = [];
    this.appendToWindow(t, candle);
  }

  private appendToWindow(t: Tracker, candle: Candle): void {
    t.window.push(candle);
    while (t.window.length > this.options.lookbackCandles) {
      const evicted = t.window.shift();
      if (evicted) this.pushBaseline(t, evicted.volume);
    }
  }

  private pushBaseline(t: Tracker, volume: number): void {
    t.baselineVolumes.push(volume);
    if (t.baselineVolumes.length > this.options.baselineLookback) t.baselineVolumes.shift();
  }

  private tracker(symbol: string, timeframe: Timeframe): Tracker {
    const key = trackerKey(symbol, timeframe);
    let t = this.trackers.get(key);
    if (!t) {
      t = { symbol, timeframe, window: [], baselineVolumes: [], box: null, boxAge: 0, lastTime: null };
      this.trackers.set(key, t);
    }
    return t;
  }

  private update(t: Tracker, transition: BoxTransition | null, evicted: Box | null, duplicate = false): BoxUpdate {
    return {
      symbol: t.symbol,
      timeframe: t.timeframe,
      state: t.box?.state ?? 'FORMING',
      box: t.box ? snapshot(t.box) : null,
      transition,
      evicted,
      duplicate
    };
  }
}
