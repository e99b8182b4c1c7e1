import { describe, it, expect } from 'vitest';
import { MARKET_TOPIC } from '../../src/core/types.js';
import { SentimentBook } from '../../src/data/sentimentBook.js';

const HOUR = 60 * 60 * 1000;

describe('SentimentBook', () => {
  it('keeps the latest score per topic', () => {
    const book = new SentimentBook(HOUR);
    expect(book.update({ topic: 'QQQ', score: 0.2, confidence: 0.5, asOf: 1000 })).toBe(true);
    expect(book.update({ topic: 'QQQ', score: 0.7, confidence: 0.9, asOf: 2000 })).toBe(true);
    expect(book.update({ topic: 'QQQ', score: -0.9, confidence: 0.9, asOf: 1500 })).toBe(false);
    expect(book.current('QQQ', 3000)?.score).toBe(0.7);
    expect(book.size()).toBe(1);
  });

  it('treats a stale score as absent', () => {
    const book = new SentimentBook(HOUR);
    book.update({ topic: 'QQQ', score: 0.4, confidence: 0.8, asOf: 0 });
    expect(book.current('QQQ', HOUR)).not.toBeNull();
    expect(book.current('QQQ', HOUR + 1)).toBeNull();
    expect(book.staleTopics(HOUR + 1)).toEqual(['QQQ']);
  });

  it('falls back to market-wide sentiment for a symbol without its own', () => {
    const book = new SentimentBook(HOUR);
    book.update({ topic: MARKET_TOPIC, score: -0.3, confidence: 0.6, asOf: 0 });
    expect(book.forSymbol('SPY', 10)?.topic).toBe(MARKET_TOPIC);

    book.update({ topic: 'SPY', score: 0.5, confidence: 0.7, asOf: 5 });
    expect(book.forSymbol('SPY', 10)?.score).toBe(0.5);
  });

  it('clamps out-of-range values', () => {
    const book = new SentimentBook(HOUR);
    book.update({ topic: 'QQQ', score: 3, confidence: -1, asOf: 0 });
    expect(book.current('QQQ', 0)).toEqual({ topic: 'QQQ', score: 1, confidence: 0, asOf: 0, articleCount: 1 });
  });

  it('counts the articles inside the staleness window', () => {
    const book = new SentimentBook(HOUR);
    book.update({ topic: 'QQQ', score: 0.2, confidence: 0.5, asOf: 0 });
    book.update({ topic: 'QQQ', score: 0.4, confidence: 0.5, asOf: HOUR / 2 });
    expect(book.update({ topic: 'QQQ', score: 0.1, confidence: 0.5, asOf: HOUR / 4 })).toBe(false);
    book.update({ topic: 'SPY', score: 0.3, confidence: 0.5, asOf: HOUR / 2 });

    expect(book.current('QQQ', HOUR / 2)?.articleCount).toBe(3);
    expect(book.current('QQQ', HOUR + 1)).toMatchObject({ score: 0.4, articleCount: 2 });
    expect(book.current('QQQ', HOUR + HOUR / 4 + 1)?.articleCount).toBe(1);
    expect(book.forSymbol('SPY', HOUR)?.articleCount).toBe(1);
  });
});
