import { DataFormatError, errorMessage } from '../core/errors.js';
import type { EventBus } from '../core/eventBus.js';
import { describeEvent, type NewsEvent, type PipelineEvent, type PriceEvent } from '../core/events.js';
import type { Logger } from '../core/logger.js';
import type { Metrics } from '../core/metrics.js';
import type { TimeSource } from '../core/time.js';
import { MARKET_TOPIC, type Box, type Candle, type Signal, type Timeframe } from '../core/types.js';
import type { SentimentBook } from '../data/sentimentBook.js';
import { trackerKey, type BoxDetector } from '../strategies/boxDetector.js';
import { computeIndicators } from '../strategies/indicators.js';
import type { SignalGenerator } from '../strategies/signalGenerator.js';

const CLOSE_HISTORY = 100;

/** Downstream of the processor: the trading agent in production. */
export interface SignalSink {
  handle(signal: Signal): Promise<unknown>;
  warn(source: string, message: string, subject?: string): Promise<void>;
}

export interface EventProcessorDeps {
  bus: EventBus;
  detector: BoxDetector;
  generator: SignalGenerator;
  book: SentimentBook;
  sink: SignalSink;
  time: TimeSource;
  logger: Logger;
  metrics: Metrics;
}

export interface ProcessorStats {
  processed: number;
  dropped: number;
  errors: number;
  lastSeq: number;
}

/**
 * The bus's only consumer and the only writer of box and sentiment state.
 * Events are handled one at a time; a failing event is logged and counted
 * and the loop moves on.
 */
export class EventProcessor {
  private readonly closes = new Map<string, number[]>();
  private readonly staleReported = new Set<string>();
  private readonly producerSeqs = new Map<string, number>();
  private readonly stats: ProcessorStats = { processed: 0, dropped: 0, errors: 0, lastSeq: 0 };
  private readonly logger: Logger;

  constructor(private readonly deps: EventProcessorDeps) {
    this.logger = deps.logger.child({ component: 'event-processor' });
  }

  /** Seeds baseline volume and last closes from history. */
  warmUp(candles: Candle[]): void {
    this.deps.detector.warmUp(candles);
    for (const c of [...candles].sort((a, b) => a.time - b.time)) this.recordClose(c);
    this.logger.info('detector warmed up', { candles: candles.length });
  }

  /** Consumes until the bus is closed and drained. */
  async run(): Promise<void> {
    for (;;) {
      const event = await this.deps.bus.consume();
      if (!event) break;
      await this.process(event);
    }
    this.logger.info('event processor drained', { ...this.stats });
  }

  async process(event: PipelineEvent): Promise<void> {
    if (!this.admit(event)) return;
    this.deps.metrics.increment('processor.events');
    this.deps.metrics.increment(`processor.events.${event.kind}`);
    try {
      switch (event.kind) {
        case 'price':
          await this.onPrice(event);
          break;
        case 'news':
          await this.onNews(event);
          break;
        case 'signal':
          await this.deps.sink.handle(event.signal);
          break;
        case 'warning':
          await this.deps.sink.warn(event.source, event.message, event.symbol ?? event.topic);
          break;
      }
      this.stats.processed += 1;
    } catch (err) {
      this.stats.errors += 1;
      this.deps.metrics.increment('processor.errors');
      const context = { ...describeEvent(event), err: errorMessage(err) };
      if (err instanceof DataFormatError) this.logger.warn('event rejected', context);
      else this.logger.error('event handling failed', context);
    }
  }

  getStats(): ProcessorStats {
    return { ...this.stats };
  }

  lastClose(symbol: string, timeframe: Timeframe): number | undefined {
    const closes = this.closes.get(trackerKey(symbol, timeframe));
    return closes?.[closes.length - 1];
  }

  /** Warns once each time a topic's sentiment goes stale; a fresh score re-arms it. */
  async reportStaleSentiment(): Promise<void> {
    const stale = new Set(this.deps.book.staleTopics(this.deps.time.now()));
    for (const topic of this.staleReported) {
      if (!stale.has(topic)) this.staleReported.delete(topic);
    }
    for (const topic of stale) {
      if (this.staleReported.has(topic)) continue;
      this.staleReported.add(topic);
      this.deps.metrics.increment('processor.sentiment_stale');
      this.logger.warn('sentiment went stale', { topic });
      await this.deps.sink.warn('sentiment', 'no fresh sentiment, signals paused until news arrives', topic);
    }
  }

  private admit(event: PipelineEvent): boolean {
    if (event.seq <= this.stats.lastSeq) {
      this.stats.dropped += 1;
      this.deps.metrics.increment('processor.out_of_order');
      this.logger.warn('non-increasing sequence, event dropped', { seq: event.seq, lastSeq: this.stats.lastSeq });
      return false;
    }
    this.stats.lastSeq = event.seq;

    const last = this.producerSeqs.get(event.producer) ?? 0;
    if (event.producerSeq !== last + 1) {
      this.logger.warn('producer sequence gap', { producer: event.producer, expected: last + 1, got: event.producerSeq });
    }
    this.producerSeqs.set(event.producer, Math.max(last, event.producerSeq));
    return true;
  }

  private async onPrice(event: PriceEvent): Promise<void> {
    const { candle } = event;
    const update = this.deps.detector.onCandle(candle);
    if (update.duplicate) return;
    this.recordClose(candle);

    if (update.evicted) this.deps.generator.release(update.evicted.id);
    const to = update.transition?.to;
    if (update.box && (to === 'CONFIRMED' || to === 'RETESTED')) {
      await this.evaluate(update.box);
    }
  }

  private async onNews(event: NewsEvent): Promise<void> {
    const { sentiment } = event;
    if (!this.deps.book.update(sentiment)) {
      this.logger.debug('older sentiment ignored', { topic: sentiment.topic, asOf: sentiment.asOf });
      return;
    }
    const boxes = sentiment.topic === MARKET_TOPIC ? this.deps.detector.activeBoxes() : this.deps.detector.activeBoxes(sentiment.topic);
    for (const box of boxes) await this.evaluate(box);
  }

  private recordClose(candle: Candle): void {
    const key = trackerKey(candle.symbol, candle.timeframe);
    const closes = this.closes.get(key) ?? [];
    closes.push(candle.close);
    if (closes.length > CLOSE_HISTORY) closes.shift();
    this.closes.set(key, closes);
  }

  private async evaluate(box: Box): Promise<void> {
    const now = this.deps.time.now();
    const closes = this.closes.get(trackerKey(box.symbol, box.timeframe)) ?? [];
    const signal = this.deps.generator.evaluate({
      box,
      sentiment: this.deps.book.forSymbol(box.symbol, now),
      price: closes[closes.length - 1] ?? box.lastClose,
      now,
      indicators: computeIndicators(closes)
    });
    if (signal) await this.deps.sink.handle(signal);
  }
}
