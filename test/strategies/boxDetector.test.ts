import { describe, it, expect } from 'vitest';
import { DataFormatError } from '../../src/core/errors.js';
import type { Candle } from '../../src/core/types.js';
import { BoxDetector, type BoxDetectorOptions, type BoxUpdate } from '../../src/strategies/boxDetector.js';
import { FIVE_MIN, T0, createMockLogger, makeCandle, makeCandleSeries } from '../helpers.js';

const HISTORY_START = T0 - 20 * FIVE_MIN;

/** Detector with 20 candles of baseline volume 1000 already seen. */
const warmDetector = (options: Partial<BoxDetectorOptions> = {}): BoxDetector => {
  const detector = new BoxDetector(createMockLogger(), options);
  detector.warmUp(makeCandleSeries(20, HISTORY_START, { volume: 1000 }));
  return detector;
};

const feed = (detector: BoxDetector, candles: Candle[]): BoxUpdate[] => candles.map((c) => detector.onCandle(c));

/** Five tight, high-volume candles spanning [100, 102] that confirm a box at T0 + 4 bars. */
const boxCandles = (): Candle[] =>
  makeCandleSeries(5, T0, { open: 100.5, high: 102, low: 100, close: 101, volume: 1500 });

const confirmedDetector = (options: Partial<BoxDetectorOptions> = {}): BoxDetector => {
  const detector = warmDetector(options);
  feed(detector, boxCandles());
  return detector;
};

const next = (i: number, shape: Partial<Candle>): Candle => makeCandle({ ...shape, time: T0 + (4 + i) * FIVE_MIN });

describe('BoxDetector formation', () => {
  it('confirms a tight high-volume range after the fifth candle, once, before any retest', () => {
    const detector = warmDetector();
    const candles = makeCandleSeries(6, T0, { open: 100.5, high: 101.5, low: 100, close: 101, volume: 1500 });
    const updates = feed(detector, candles);

    expect(updates.slice(0, 4).map((u) => u.state)).toEqual(['FORMING', 'FORMING', 'FORMING', 'FORMING']);
    expect(updates[4]?.transition).toEqual({
      boxId: `QQQ:5m:${T0 + 4 * FIVE_MIN}`,
      from: 'FORMING',
      to: 'CONFIRMED',
      reason: 'consolidation',
      at: T0 + 4 * FIVE_MIN,
    });
    expect(updates[4]?.box).toMatchObject({ top: 101.5, bottom: 100, candleCount: 5, volumeRatio: 1.5, state: 'CONFIRMED' });
    expect(updates.filter((u) => u.transition?.to === 'CONFIRMED')).toHaveLength(1);
    // The sixth candle trades into the top band and closes inside.
    expect(updates[5]?.transition?.to).toBe('RETESTED');
  });

  it('does not confirm without baseline volume', () => {
    const detector = new BoxDetector(createMockLogger());
    const updates = feed(detector, boxCandles());
    expect(updates.map((u) => u.state)).toEqual(['FORMING', 'FORMING', 'FORMING', 'FORMING', 'FORMING']);
    expect(detector.baselineVolume('QQQ', '5m')).toBeNull();
  });

  it('does not confirm when volume stays near the baseline', () => {
    const detector = warmDetector();
    const updates = feed(detector, makeCandleSeries(5, T0, { high: 101, low: 100, volume: 1200 }));
    expect(updates[4]?.state).toBe('FORMING');
  });

  it('does not confirm a range wider than the threshold', () => {
    const detector = warmDetector();
    const updates = feed(detector, makeCandleSeries(5, T0, { high: 103, low: 100, close: 101, volume: 1500 }));
    expect(updates[4]?.state).toBe('FORMING');
  });

  it('never shrinks the window below the minimum consolidation length', () => {
    const detector = warmDetector({ lookbackCandles: 2 });
    const updates = feed(detector, boxCandles());
    expect(updates[4]?.state).toBe('CONFIRMED');
  });

  it('never jumps from FORMING to RETESTED on a boundary touch', () => {
    const detector = warmDetector();
    const updates = feed(detector, makeCandleSeries(3, T0, { high: 101.9, low: 100, close: 101.5, volume: 1500 }));
    expect(updates.every((u) => u.state === 'FORMING' && u.transition === null)).toBe(true);
  });
});

describe('BoxDetector while a box is active', () => {
  it('marks a candle that touches the top band and closes inside as RETESTED', () => {
    const detector = confirmedDetector();
    const update = detector.onCandle(next(1, { open: 101.6, high: 101.9, low: 101.2, close: 101.5 }));

    expect(update.transition).toMatchObject({ from: 'CONFIRMED', to: 'RETESTED', reason: 'retest' });
    expect(update.box?.retestedAt).toBe(T0 + 5 * FIVE_MIN);
    expect(detector.getState('QQQ', '5m')).toBe('RETESTED');
  });

  it('invalidates and evicts the box on a close beyond the boundary', () => {
    const detector = confirmedDetector();
    const update = detector.onCandle(next(1, { open: 102, high: 104.2, low: 101.8, close: 104 }));

    expect(update.transition).toMatchObject({ from: 'CONFIRMED', to: 'INVALIDATED', reason: 'breakout without retest' });
    expect(update.evicted?.state).toBe('INVALIDATED');
    expect(update.state).toBe('FORMING');
    expect(detector.getActiveBox('QQQ', '5m')).toBeNull();
  });

  it('lets the breakout win when one candle both retests and breaks out', () => {
    const detector = confirmedDetector();
    const update = detector.onCandle(next(1, { open: 101.6, high: 102.8, low: 101.2, close: 101.5 }));
    expect(update.transition?.to).toBe('INVALIDATED');
    expect(update.transition?.reason).toBe('breakout on retest candle');
  });

  it('lets the retest win under the retest conflict policy', () => {
    const detector = confirmedDetector({ conflictPolicy: 'retest' });
    const update = detector.onCandle(next(1, { open: 101.6, high: 102.8, low: 101.2, close: 101.5 }));
    expect(update.transition?.to).toBe('RETESTED');
  });

  it('resolves a retested box on breakout without a further state change', () => {
    const detector = confirmedDetector();
    detector.onCandle(next(1, { open: 101.6, high: 101.9, low: 101.2, close: 101.5 }));
    const update = detector.onCandle(next(2, { open: 101.8, high: 104.2, low: 101.7, close: 104 }));

    expect(update.transition).toBeNull();
    expect(update.evicted).toMatchObject({ state: 'RETESTED', resolvedAt: T0 + 6 * FIVE_MIN });
    expect(update.state).toBe('FORMING');
  });

  it('expires a box that never resolves', () => {
    const detector = confirmedDetector({ maxBoxAgeCandles: 3 });
    const quiet = { open: 100.9, high: 101, low: 100.8, close: 100.9 };
    const updates = [1, 2, 3].map((i) => detector.onCandle(next(i, quiet)));

    expect(updates[0]?.state).toBe('CONFIRMED');
    expect(updates[1]?.state).toBe('CONFIRMED');
    expect(updates[2]?.transition).toMatchObject({ to: 'INVALIDATED', reason: 'expired' });
  });

  it('hands callers frozen snapshots', () => {
    const detector = confirmedDetector();
    const box = detector.getActiveBox('QQQ', '5m');
    expect(Object.isFrozen(box)).toBe(true);
    expect(detector.activeBoxes('QQQ')).toHaveLength(1);
    expect(detector.activeBoxes('SPY')).toHaveLength(0);
  });
});

describe('BoxDetector ordering', () => {
  it('ignores a repeated timestamp', () => {
    const detector = warmDetector();
    detector.onCandle(makeCandle({ time: T0 }));
    expect(detector.onCandle(makeCandle({ time: T0 })).duplicate).toBe(true);
  });

  it('rejects an older candle', () => {
    const detector = warmDetector();
    detector.onCandle(makeCandle({ time: T0 }));
    expect(() => detector.onCandle(makeCandle({ time: T0 - FIVE_MIN }))).toThrow(DataFormatError);
  });

  it('tracks symbols independently', () => {
    const detector = warmDetector();
    detector.warmUp(makeCandleSeries(20, HISTORY_START, { symbol: 'SPY', volume: 1000 }));
    feed(detector, boxCandles());
    expect(detector.getState('QQQ', '5m')).toBe('CONFIRMED');
    expect(detector.getState('SPY', '5m')).toBe('FORMING');
  });
});
