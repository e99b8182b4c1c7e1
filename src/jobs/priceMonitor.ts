import { BusClosedError, DataFormatError, errorMessage } from '../core/errors.js';
import type { EventBus } from '../core/eventBus.js';
import type { Logger } from '../core/logger.js';
import type { Metrics } from '../core/metrics.js';
import type { RetryExecutor } from '../core/retry.js';
import type { TimeSource } from '../core/time.js';
import type { Candle, Timeframe } from '../core/types.js';
import type { MarketDataClient } from '../exchanges/adapter.js';
import { readMarketStatus, type MarketClock, type MarketStatus } from '../market/marketClock.js';

export type MonitorState = 'STOPPED' | 'RUNNING';

export const PRICE_PRODUCER = 'price-monitor';

export interface PriceMonitorOptions {
  symbols: string[];
  timeframe: Timeframe;
  pollIntervalMs: number;
  /** Recheck delay when the market clock cannot answer. */
  clockRecheckMs: number;
}

export interface PriceMonitorDeps {
  bus: EventBus;
  client: MarketDataClient;
  clock: MarketClock;
  retry: RetryExecutor;
  time: TimeSource;
  logger: Logger;
  metrics: Metrics;
}

export interface MarketSessionListener {
  marketOpened(nextClose: number): Promise<void>;
  marketClosed(nextOpen: number, reliable: boolean): Promise<void>;
}

/**
 * Polls the latest candle of every symbol while the market is open and
 * publishes the new ones. While closed it makes no data calls and sleeps
 * until the clock's next open.
 */
export class PriceMonitor {
  private state: MonitorState = 'STOPPED';
  private lastMarketOpen: boolean | null = null;
  private readonly lastPublished = new Map<string, number>();
  private readonly logger: Logger;

  constructor(
    private readonly deps: PriceMonitorDeps,
    private readonly options: PriceMonitorOptions,
    private readonly listener?: MarketSessionListener
  ) {
    this.logger = deps.logger.child({ component: PRICE_PRODUCER });
  }

  getState(): MonitorState {
    return this.state;
  }

  lastCandleTime(symbol: string): number | undefined {
    return this.lastPublished.get(symbol);
  }

  /** Seeds the last-published marks so warm-up history is not re-published. */
  markSeen(candles: Candle[]): void {
    for (const c of candles) {
      const last = this.lastPublished.get(c.symbol);
      if (last === undefined || c.time > last) this.lastPublished.set(c.symbol, c.time);
    }
  }

  async run(signal: AbortSignal): Promise<void> {
    const { time } = this.deps;
    try {
      while (!signal.aborted) {
        const now = time.now();
        const status = readMarketStatus(this.deps.clock, now, this.options.clockRecheckMs, this.logger);
        await this.onMarketStatus(status);

        if (!status.open) {
          this.transition('STOPPED', 'market closed');
          await time.sleep(Math.max(0, status.nextCheckAt - now), signal);
          continue;
        }

        this.transition('RUNNING', 'market open');
        await this.poll(signal);
        await time.sleep(Math.min(this.options.pollIntervalMs, Math.max(0, status.nextCheckAt - time.now())), signal);
      }
    } catch (err) {
      if (!(err instanceof BusClosedError)) throw err;
      this.logger.info('event bus closed, price monitor exiting');
    } finally {
      this.transition('STOPPED', 'shutdown');
    }
  }

  /** One pass over every symbol. */
  async poll(signal?: AbortSignal): Promise<void> {
    const { bus, client, retry, metrics } = this.deps;
    for (const symbol of this.options.symbols) {
      if (signal?.aborted) return;
      metrics.increment('monitor.price.fetches');
      const outcome = await retry.run(() => client.getQuote(symbol, this.options.timeframe), `quote ${symbol}`, signal);

      if (outcome.phase === 'aborted') return;
      if (outcome.phase !== 'succeeded') {
        metrics.increment('monitor.price.failures');
        if (outcome.error instanceof DataFormatError) {
          this.logger.warn('malformed candle skipped', { symbol, err: outcome.error.message });
          continue;
        }
        this.logger.error('price fetch failed', { symbol, phase: outcome.phase, attempts: outcome.attempts, err: errorMessage(outcome.error) });
        await bus.publish(PRICE_PRODUCER, {
          kind: 'warning',
          source: PRICE_PRODUCER,
          symbol,
          message: `price fetch ${outcome.phase} after ${outcome.attempts} attempt(s): ${errorMessage(outcome.error)}`
        });
        continue;
      }

      const candle = outcome.value;
      const last = this.lastPublished.get(symbol);
      if (last !== undefined && candle.time <= last) {
        metrics.increment('monitor.price.unchanged');
        continue;
      }
      await bus.publish(PRICE_PRODUCER, { kind: 'price', candle });
      this.lastPublished.set(symbol, candle.time);
      metrics.increment('monitor.price.published');
    }
  }

  private async onMarketStatus(status: MarketStatus): Promise<void> {
    if (status.open === this.lastMarketOpen) return;
    this.lastMarketOpen = status.open;
    if (!this.listener) return;
    if (status.open) await this.listener.marketOpened(status.nextCheckAt);
    else await this.listener.marketClosed(status.nextCheckAt, status.reliable);
  }

  private transition(next: MonitorState, reason: string): void {
    if (next === this.state) return;
    this.logger.info('price monitor state change', { from: this.state, to: next, reason });
    this.state = next;
    this.deps.metrics.gauge('monitor.price.running', next === 'RUNNING' ? 1 : 0);
  }
}
