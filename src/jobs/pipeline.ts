import { ConsoleNotifier } from '../alerts/console.js';
import { DiscordNotifier } from '../alerts/discord.js';
import type { Notifier } from '../alerts/interface.js';
import { NotificationRouter, type RoutedChannel } from '../alerts/notificationRouter.js';
import type { AppConfig } from '../config/types.js';
import { errorMessage } from '../core/errors.js';
import { EventBus } from '../core/eventBus.js';
import type { Logger } from '../core/logger.js';
import { InMemoryMetrics } from '../core/metrics.js';
import { RetryExecutor } from '../core/retry.js';
import { systemTime, type TimeSource } from '../core/time.js';
import { MARKET_TOPIC, type Candle } from '../core/types.js';
import { NewsApiClient, type NewsClient } from '../data/newsClient.js';
import { SentimentBook } from '../data/sentimentBook.js';
import { LexiconSentimentScorer, loadLexicon, type SentimentScorer } from '../data/sentimentScorer.js';
import type { MarketDataClient } from '../exchanges/adapter.js';
import { AlpacaAdapter } from '../exchanges/alpaca/adapter.js';
import { InMemoryPortfolio } from '../execution/portfolio.js';
import { TradingAgent } from '../execution/tradingAgent.js';
import { CalendarMarketClock, UnavailableMarketClock, type MarketClock } from '../market/marketClock.js';
import { loadTradingCalendar } from '../market/tradingCalendar.js';
import { BoxDetector } from '../strategies/boxDetector.js';
import { SignalGenerator } from '../strategies/signalGenerator.js';
import { EventProcessor } from './eventProcessor.js';
import { NewsMonitor, type NewsFeed } from './newsMonitor.js';
import { PriceMonitor } from './priceMonitor.js';
import { Scheduler } from './scheduler.js';

/** Collaborators that can be swapped, mostly for tests. */
export interface PipelineOverrides {
  time?: TimeSource;
  marketData?: MarketDataClient;
  news?: NewsClient;
  scorer?: SentimentScorer;
  notifier?: Notifier;
  clock?: MarketClock;
}

/** Covers a weekend plus a holiday, so the latest bars are in range before the open. */
export const HISTORY_LOOKBACK_MS = 7 * 24 * 60 * 60 * 1000;

export const newsFeeds = (symbols: string[], marketTopics: string[]): NewsFeed[] => [
  ...symbols.map((s) => ({ topic: s, query: s })),
  ...marketTopics.map((q) => ({ topic: MARKET_TOPIC, query: q }))
];

const buildNotifier = (config: AppConfig, logger: Logger, retry: RetryExecutor): Notifier => {
  const channels: RoutedChannel[] = [{ name: 'console', notifier: new ConsoleNotifier() }];
  const discord = config.alerts.discord;
  if (discord.enabled && discord.webhookUrl) {
    channels.push({
      name: 'discord',
      notifier: new DiscordNotifier(
        discord.webhookUrl,
        discord.signalsWebhookUrl ? { signals: discord.signalsWebhookUrl } : {},
        config.ioTimeoutMs
      ),
      minSeverity: discord.minSeverity
    });
  }
  return new NotificationRouter(channels, logger.child({ component: 'notifications' }), retry);
};

const buildClock = (config: AppConfig, logger: Logger): MarketClock => {
  try {
    return new CalendarMarketClock(loadTradingCalendar(config.market.calendarPath));
  } catch (err) {
    logger.error('trading calendar unavailable, market treated as closed', { err: errorMessage(err) });
    return new UnavailableMarketClock(errorMessage(err));
  }
};

/**
 * Owns every component and the shutdown signal.
 *
 * Shutdown order: abort producers, close the bus, let the processor drain
 * what was buffered, then announce.
 */
export class Pipeline {
  readonly metrics = new InMemoryMetrics();
  readonly bus: EventBus;
  readonly processor: EventProcessor;
  readonly agent: TradingAgent;
  readonly priceMonitor: PriceMonitor;
  readonly newsMonitor: NewsMonitor;

  private readonly marketData: MarketDataClient;
  private readonly retry: RetryExecutor;
  private readonly time: TimeSource;
  private readonly scheduler: Scheduler;
  private readonly controller = new AbortController();
  private running: Promise<void> | null = null;
  private stopping: Promise<void> | null = null;

  constructor(
    private readonly config: AppConfig,
    private readonly logger: Logger,
    overrides: PipelineOverrides = {}
  ) {
    const time = overrides.time ?? systemTime;
    this.time = time;
    const metrics = this.metrics;
    this.retry = new RetryExecutor(config.retry, time, logger.child({ component: 'retry' }), metrics);
    this.scheduler = new Scheduler(logger);
    this.bus = new EventBus(config.busCapacity, time, metrics);

    this.marketData =
      overrides.marketData ??
      new AlpacaAdapter({ ...config.alpaca, timeoutMs: config.ioTimeoutMs });
    const news = overrides.news ?? new NewsApiClient({ apiKey: config.newsApi.apiKey, baseUrl: config.newsApi.baseUrl, timeoutMs: config.ioTimeoutMs });
    const scorer = overrides.scorer ?? new LexiconSentimentScorer(loadLexicon(), () => time.now());
    const notifier = overrides.notifier ?? buildNotifier(config, logger, this.retry);
    const clock = overrides.clock ?? buildClock(config, logger);

    this.agent = new TradingAgent(
      new InMemoryPortfolio(config.agent.positionHoldMs),
      notifier,
      time,
      logger.child({ component: 'trading-agent' }),
      metrics,
      config.agent
    );

    this.processor = new EventProcessor({
      bus: this.bus,
      detector: new BoxDetector(logger.child({ component: 'box-detector' }), config.box),
      generator: new SignalGenerator(config.risk, config.signals, logger.child({ component: 'signal-generator' }), metrics),
      book: new SentimentBook(config.news.staleAfterMs),
      sink: this.agent,
      time,
      logger,
      metrics
    });

    const shared = { bus: this.bus, retry: this.retry, time, logger, metrics };
    this.priceMonitor = new PriceMonitor(
      { ...shared, client: this.marketData, clock },
      {
        symbols: config.symbols,
        timeframe: config.timeframe,
        pollIntervalMs: config.price.pollIntervalMs,
        clockRecheckMs: config.market.recheckMs
      },
      this.agent
    );
    this.newsMonitor = new NewsMonitor(
      { ...shared, news, scorer },
      {
        feeds: newsFeeds(config.symbols, config.news.marketTopics),
        pollIntervalMs: config.news.pollIntervalMs,
        dedupWindowMs: config.news.dedupWindowMs,
        dedupMaxEntries: config.news.dedupMaxEntries
      }
    );
  }

  async start(): Promise<void> {
    if (this.running) return;
    this.logger.info('pipeline starting', { symbols: this.config.symbols, timeframe: this.config.timeframe });
    await this.warmUp();
    await this.agent.announceStartup(this.config.symbols, this.config.timeframe);

    const signal = this.controller.signal;
    this.running = Promise.all([
      this.processor.run(),
      this.supervise('price-monitor', this.priceMonitor.run(signal)),
      this.supervise('news-monitor', this.newsMonitor.run(signal))
    ]).then(() => undefined);
    this.scheduler.add('status', this.config.statusIntervalMs, async () => {
      this.logStatus();
      await this.processor.reportStaleSentiment();
    });
  }

  /** Resolves once every loop has ended. */
  async wait(): Promise<void> {
    await this.running;
  }

  async stop(reason: string): Promise<void> {
    if (!this.stopping) this.stopping = this.shutdown(reason);
    await this.stopping;
  }

  logStatus(): void {
    const stats = this.processor.getStats();
    this.logger.info('pipeline status', {
      busDepth: this.bus.depth(),
      blockedPublishers: this.bus.blockedPublishers(),
      priceMonitor: this.priceMonitor.getState(),
      processed: stats.processed,
      processorErrors: stats.errors,
      lastSeq: stats.lastSeq,
      signals: this.metrics.counter('signals.emitted'),
      accepted: this.metrics.counter('agent.accepted'),
      rejected: this.metrics.counter('agent.rejected')
    });
  }

  private async shutdown(reason: string): Promise<void> {
    this.logger.info('pipeline stopping', { reason });
    this.scheduler.shutdown();
    this.controller.abort();
    this.bus.close();
    await this.running;
    this.logStatus();
    this.logger.info('final metrics', this.metrics.snapshot());
    await this.agent.announceShutdown(reason);
  }

  private async warmUp(): Promise<void> {
    const { symbols, timeframe, price } = this.config;
    if (price.warmupCandles === 0) return;
    const history: Candle[] = [];
    const range = { start: this.time.now() - HISTORY_LOOKBACK_MS, limit: price.warmupCandles };
    for (const symbol of symbols) {
      const outcome = await this.retry.run(
        () => this.marketData.getHistorical(symbol, timeframe, range),
        `history ${symbol}`,
        this.controller.signal
      );
      if (outcome.phase === 'succeeded') {
        history.push(...outcome.value);
      } else {
        this.logger.warn('history unavailable, detector starts cold', {
          symbol,
          phase: outcome.phase,
          err: outcome.phase === 'aborted' ? 'aborted' : errorMessage(outcome.error)
        });
      }
    }
    this.processor.warmUp(history);
    this.priceMonitor.markSeen(history);
  }

  private async supervise(name: string, task: Promise<void>): Promise<void> {
    try {
      await task;
    } catch (err) {
      this.metrics.increment('pipeline.producer_crashed');
      this.logger.error('producer loop crashed, stopping pipeline', { producer: name, err: errorMessage(err) });
      this.controller.abort();
      this.bus.close();
    }
  }
}
