import { MARKET_TOPIC, type SentimentReading, type SentimentScore } from '../core/types.js';
import { clamp } from '../core/validation.js';

const MAX_TRACKED_ARTICLES = 500;

interface TopicEntry {
  latest: SentimentScore;
  /** asOf of every article seen for the topic, oldest first. */
  articles: number[];
}

/**
 * Latest sentiment per topic plus how many articles back it. Written only by
 * the event processor. A score older than `staleAfterMs` is treated as absent,
 * and only articles inside that window count.
 */
export class SentimentBook {
  private readonly topics = new Map<string, TopicEntry>();

  constructor(private readonly staleAfterMs: number) {}

  /** Returns false when the incoming score is older than the stored one. */
  update(score: SentimentScore): boolean {
    const entry = this.topics.get(score.topic);
    const clamped = { ...score, score: clamp(score.score, -1, 1), confidence: clamp(score.confidence, 0, 1) };
    if (!entry) {
      this.topics.set(score.topic, { latest: clamped, articles: [score.asOf] });
      return true;
    }
    recordArticle(entry.articles, score.asOf);
    if (entry.latest.asOf > score.asOf) return false;
    entry.latest = clamped;
    return true;
  }

  current(topic: string, now: number): SentimentReading | null {
    const entry = this.topics.get(topic);
    if (!entry || this.isStale(entry.latest, now)) return null;
    const articleCount = entry.articles.filter((asOf) => now - asOf <= this.staleAfterMs).length;
    return { ...entry.latest, articleCount };
  }

  /** Symbol score, falling back to market-wide sentiment. */
  forSymbol(symbol: string, now: number): SentimentReading | null {
    return this.current(symbol, now) ?? this.current(MARKET_TOPIC, now);
  }

  staleTopics(now: number): string[] {
    return [...this.topics.values()].filter((e) => this.isStale(e.latest, now)).map((e) => e.latest.topic);
  }

  size(): number {
    return this.topics.size;
  }

  private isStale(score: SentimentScore, now: number): boolean {
    return now - score.asOf > this.staleAfterMs;
  }
}

const recordArticle = (articles: number[], asOf: number): void => {
  let i = articles.length;
  while (i > 0 && (articles[i - 1] ?? 0) > asOf) i -= 1;
  articles.splice(i, 0, asOf);
  if (articles.length > MAX_TRACKED_ARTICLES) articles.splice(0, articles.length - MAX_TRACKED_ARTICLES);
};
