import { BusClosedError, errorMessage } from '../core/errors.js';
import type { EventBus } from '../core/eventBus.js';
import type { Logger } from '../core/logger.js';
import type { Metrics } from '../core/metrics.js';
import { RecentIds } from '../core/recentIds.js';
import type { RetryExecutor } from '../core/retry.js';
import type { TimeSource } from '../core/time.js';
import type { Article, SentimentScore } from '../core/types.js';
import type { NewsClient } from '../data/newsClient.js';
import type { SentimentScorer } from '../data/sentimentScorer.js';

export const NEWS_PRODUCER = 'news-monitor';

export interface NewsFeed {
  /** Sentiment topic the articles are filed under. */
  topic: string;
  /** Search query sent to the news source. */
  query: string;
}

export interface NewsMonitorOptions {
  feeds: NewsFeed[];
  pollIntervalMs: number;
  dedupWindowMs: number;
  dedupMaxEntries: number;
}

export interface NewsMonitorDeps {
  bus: EventBus;
  news: NewsClient;
  scorer: SentimentScorer;
  retry: RetryExecutor;
  time: TimeSource;
  logger: Logger;
  metrics: Metrics;
}

type FeedOutcome = 'ok' | 'failed' | 'aborted';

/** Runs regardless of market hours: fetch, de-duplicate, score, publish. */
export class NewsMonitor {
  private readonly seen: RecentIds;
  private readonly logger: Logger;

  constructor(
    private readonly deps: NewsMonitorDeps,
    private readonly options: NewsMonitorOptions
  ) {
    this.seen = new RecentIds(options.dedupWindowMs, options.dedupMaxEntries);
    this.logger = deps.logger.child({ component: NEWS_PRODUCER });
  }

  async run(signal: AbortSignal): Promise<void> {
    try {
      while (!signal.aborted) {
        await this.cycle(signal);
        await this.deps.time.sleep(this.options.pollIntervalMs, signal);
      }
    } catch (err) {
      if (!(err instanceof BusClosedError)) throw err;
      this.logger.info('event bus closed, news monitor exiting');
    }
  }

  /** One pass over every feed. Returns the number of articles published. */
  async cycle(signal?: AbortSignal): Promise<number> {
    let published = 0;
    for (const feed of this.options.feeds) {
      if (signal?.aborted) break;
      const { outcome, count } = await this.pollFeed(feed, signal);
      published += count;
      if (outcome === 'aborted') break;
    }
    return published;
  }

  private async pollFeed(feed: NewsFeed, signal?: AbortSignal): Promise<{ outcome: FeedOutcome; count: number }> {
    const { bus, news, scorer, retry, time, metrics } = this.deps;
    const fetched = await retry.run(() => news.fetchRecent(feed.topic, feed.query), `news ${feed.topic}`, signal);
    if (fetched.phase === 'aborted') return { outcome: 'aborted', count: 0 };
    if (fetched.phase !== 'succeeded') {
      await this.reportFailure(feed, 'fetch', fetched.error);
      return { outcome: 'failed', count: 0 };
    }

    const fresh = this.freshArticles(fetched.value);
    let count = 0;
    for (const article of fresh) {
      if (signal?.aborted) return { outcome: 'aborted', count };
      const scored = await retry.run<SentimentScore>(() => scorer.score(article), `score ${article.id}`, signal);
      if (scored.phase === 'aborted') return { outcome: 'aborted', count };
      if (scored.phase !== 'succeeded') {
        await this.reportFailure(feed, 'scoring', scored.error);
        return { outcome: 'failed', count };
      }
      await bus.publish(NEWS_PRODUCER, { kind: 'news', article, sentiment: scored.value });
      this.seen.add(article.id, time.now());
      metrics.increment('monitor.news.published');
      count += 1;
    }
    if (count > 0) this.logger.debug('news published', { topic: feed.topic, count });
    return { outcome: 'ok', count };
  }

  private freshArticles(articles: Article[]): Article[] {
    const now = this.deps.time.now();
    const batch = new Set<string>();
    const fresh: Article[] = [];
    for (const article of articles) {
      if (this.seen.has(article.id, now) || batch.has(article.id)) {
        this.deps.metrics.increment('monitor.news.duplicates');
        continue;
      }
      batch.add(article.id);
      fresh.push(article);
    }
    // Oldest first, so the newest article is the one the sentiment book keeps.
    return fresh.sort((a, b) => a.publishedAt - b.publishedAt);
  }

  private async reportFailure(feed: NewsFeed, stage: 'fetch' | 'scoring', error: unknown): Promise<void> {
    this.deps.metrics.increment('monitor.news.failures');
    this.logger.error(`news ${stage} failed, topic skipped this cycle`, { topic: feed.topic, err: errorMessage(error) });
    await this.deps.bus.publish(NEWS_PRODUCER, {
      kind: 'warning',
      source: NEWS_PRODUCER,
      topic: feed.topic,
      message: `news ${stage} failed: ${errorMessage(error)}`
    });
  }
}
