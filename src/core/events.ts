import type { Article, Candle, SentimentScore, Signal } from './types.js';

export type EventPayload =
  | { kind: 'price'; candle: Candle }
  | { kind: 'news'; article: Article; sentiment: SentimentScore }
  | { kind: 'signal'; signal: Signal }
  | { kind: 'warning'; source: string; message: string; symbol?: string; topic?: string };

export interface EventMeta {
  /** Bus-wide, strictly increasing in delivery order. */
  seq: number;
  producer: string;
  /** Strictly increasing and contiguous per producer. */
  producerSeq: number;
  publishedAt: number;
}

export type PipelineEvent = EventPayload & EventMeta;
export type PriceEvent = Extract<EventPayload, { kind: 'price' }> & EventMeta;
export type NewsEvent = Extract<EventPayload, { kind: 'news' }> & EventMeta;

export const describeEvent = (event: PipelineEvent): Record<string, unknown> => {
  const base = { seq: event.seq, kind: event.kind, producer: event.producer };
  switch (event.kind) {
    case 'price':
      return { ...base, symbol: event.candle.symbol, time: event.candle.time };
    case 'news':
      return { ...base, topic: event.article.topic, articleId: event.article.id };
    case 'signal':
      return { ...base, signalId: event.signal.id };
    case 'warning':
      return { ...base, source: event.source };
  }
};
