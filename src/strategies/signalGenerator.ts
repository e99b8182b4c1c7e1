import type { Logger } from '../core/logger.js';
import type { Metrics } from '../core/metrics.js';
import type { Box, Direction, RiskConfig, SentimentReading, Signal } from '../core/types.js';
import { planTrade } from '../risk/positionSizing.js';
import type { IndicatorReading } from './indicators.js';
import { nextWeeklyExpiry, optionTypeFor } from './optionContract.js';

export interface SignalSnapshot {
  box: Box;
  sentiment: SentimentReading | null;
  /** Latest close for the box's symbol/timeframe. */
  price: number;
  now: number;
  /** Absent until enough closes exist; no confirmation is applied then. */
  indicators?: IndicatorReading | null;
}

export interface SignalRules {
  /** Sentiment confidence must exceed this. Default: 0.5 */
  minSentimentConfidence: number;
  /** |score| must exceed this to count as directional. Default: 0.05 */
  sentimentDeadband: number;
  /** Fresh articles required behind the sentiment. Default: 2 */
  minArticleCount: number;
  /** Longs are refused at or above this RSI. Default: 70 */
  rsiOverbought: number;
  /** Shorts are refused at or below this RSI. Default: 30 */
  rsiOversold: number;
  /** Default: 1-10 days */
  holdingPeriod: string;
  /** Zone whose calendar sets the weekly expiry. Default: America/New_York */
  expiryTimeZone: string;
}

export const DEFAULT_SIGNAL_RULES: SignalRules = {
  minSentimentConfidence: 0.5,
  sentimentDeadband: 0.05,
  minArticleCount: 2,
  rsiOverbought: 70,
  rsiOversold: 30,
  holdingPeriod: '1-10 days',
  expiryTimeZone: 'America/New_York'
};

export type SignalEvaluation = { ok: true; signal: Signal } | { ok: false; reason: string };

const TECHNICAL_WEIGHT = 0.6;
const SENTIMENT_WEIGHT = 0.4;
const TECHNICAL_STRENGTH: Record<'CONFIRMED' | 'RETESTED', number> = { CONFIRMED: 0.6, RETESTED: 0.8 };

/** Upper half of the box leans bullish, lower half bearish. */
export const boxBias = (box: Pick<Box, 'top' | 'bottom'>, price: number): Direction =>
  price >= (box.top + box.bottom) / 2 ? 'long' : 'short';

/** RSI stretched against the trade, or MACD momentum pointing the other way. */
const indicatorConflict = (direction: Direction, indicators: IndicatorReading, rules: SignalRules): boolean =>
  direction === 'long'
    ? indicators.rsi >= rules.rsiOverbought || indicators.macdHistogram < 0
    : indicators.rsi <= rules.rsiOversold || indicators.macdHistogram > 0;

/** Pure: the same snapshot always yields the same result. */
export const evaluateSignal = (snapshot: SignalSnapshot, risk: RiskConfig, rules: SignalRules = DEFAULT_SIGNAL_RULES): SignalEvaluation => {
  const { box, sentiment, price, now, indicators } = snapshot;
  if (box.state !== 'CONFIRMED' && box.state !== 'RETESTED') {
    return { ok: false, reason: `box state ${box.state}` };
  }
  if (!sentiment) return { ok: false, reason: 'no fresh sentiment' };
  if (sentiment.articleCount < rules.minArticleCount) {
    return { ok: false, reason: `insufficient news coverage: ${sentiment.articleCount} articles` };
  }
  if (!(sentiment.confidence > rules.minSentimentConfidence)) {
    return { ok: false, reason: `sentiment confidence ${sentiment.confidence} at or below ${rules.minSentimentConfidence}` };
  }

  const direction = boxBias(box, price);
  const compatible = direction === 'long' ? sentiment.score > rules.sentimentDeadband : sentiment.score < -rules.sentimentDeadband;
  if (!compatible) {
    return { ok: false, reason: `sentiment ${sentiment.score} does not agree with ${direction} geometry` };
  }
  if (indicators && indicatorConflict(direction, indicators, rules)) {
    return {
      ok: false,
      reason: `indicators disagree with ${direction}: RSI ${indicators.rsi.toFixed(1)}, MACD histogram ${indicators.macdHistogram.toFixed(3)}`
    };
  }

  const plan = planTrade(box, direction, price, risk);
  if (!plan) return { ok: false, reason: 'price already beyond stop' };

  const technical = TECHNICAL_STRENGTH[box.state];
  const confidence = TECHNICAL_WEIGHT * technical + SENTIMENT_WEIGHT * sentiment.confidence * Math.abs(sentiment.score);

  const signal: Signal = Object.freeze({
    id: `${box.id}:signal`,
    symbol: box.symbol,
    timeframe: box.timeframe,
    direction,
    entry: plan.entry,
    stop: plan.stop,
    stopDistance: plan.stopDistance,
    targets: Object.freeze([...plan.targets]),
    riskAmount: plan.riskAmount,
    quantity: plan.quantity,
    confidence: Math.round(confidence * 10_000) / 10_000,
    sentimentScore: sentiment.score,
    boxState: box.state,
    generatedAt: now,
    sourceBoxId: box.id,
    optionType: optionTypeFor(direction),
    expiration: nextWeeklyExpiry(now, rules.expiryTimeZone),
    holdingPeriod: rules.holdingPeriod
  });
  return { ok: true, signal };
};

/**
 * Wraps evaluateSignal with a per-box ledger so each box lifecycle emits at
 * most one signal. The processor releases a box's entry once it is evicted.
 */
export class SignalGenerator {
  private readonly emitted = new Set<string>();

  constructor(
    private readonly risk: RiskConfig,
    private readonly rules: SignalRules,
    private readonly logger: Logger,
    private readonly metrics: Metrics
  ) {}

  evaluate(snapshot: SignalSnapshot): Signal | null {
    if (this.emitted.has(snapshot.box.id)) return null;
    const result = evaluateSignal(snapshot, this.risk, this.rules);
    if (!result.ok) {
      this.logger.debug('signal not qualified', { boxId: snapshot.box.id, reason: result.reason });
      this.metrics.increment('signals.not_qualified');
      return null;
    }
    this.emitted.add(snapshot.box.id);
    this.metrics.increment('signals.emitted');
    this.logger.info('signal generated', {
      signalId: result.signal.id,
      direction: result.signal.direction,
      entry: result.signal.entry,
      stop: result.signal.stop,
      confidence: result.signal.confidence
    });
    return result.signal;
  }

  hasEmitted(boxId: string): boolean {
    return this.emitted.has(boxId);
  }

  release(boxId: string): void {
    this.emitted.delete(boxId);
  }
}
