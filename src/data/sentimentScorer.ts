import fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { DataFormatError, errorMessage } from '../core/errors.js';
import type { Article, SentimentScore } from '../core/types.js';

export interface SentimentScorer {
  score(article: Article): Promise<SentimentScore>;
}

const lexiconSchema = z.object({
  positive: z.array(z.string().min(1)),
  negative: z.array(z.string().min(1)),
  negators: z.array(z.string().min(1)).default([])
});

export interface Lexicon {
  positive: Set<string>;
  negative: Set<string>;
  negators: Set<string>;
}

export const DEFAULT_LEXICON_PATH = fileURLToPath(new URL('../../config/sentiment-lexicon.json', import.meta.url));

const lower = (words: string[]): Set<string> => new Set(words.map((w) => w.toLowerCase()));

export const buildLexicon = (raw: unknown): Lexicon => {
  const parsed = lexiconSchema.safeParse(raw);
  if (!parsed.success) {
    throw new DataFormatError(`invalid sentiment lexicon: ${parsed.error.issues.map((i) => i.message).join('; ')}`);
  }
  return {
    positive: lower(parsed.data.positive),
    negative: lower(parsed.data.negative),
    negators: lower(parsed.data.negators)
  };
};

export const loadLexicon = (path: string = DEFAULT_LEXICON_PATH): Lexicon => {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(path, 'utf8'));
  } catch (err) {
    throw new DataFormatError(`cannot read sentiment lexicon at ${path}: ${errorMessage(err)}`);
  }
  return buildLexicon(raw);
};

export const tokenize = (text: string): string[] => text.toLowerCase().split(/[^a-z']+/).filter(Boolean);

/** Hits needed for full confidence. */
const SATURATION_HITS = 4;

/**
 * Word-list scorer. A negator flips the polarity of the word right after it.
 * score = (pos - neg) / (pos + neg); confidence grows with the number of hits.
 */
export const scoreText = (text: string, lexicon: Lexicon): { score: number; confidence: number } => {
  let positive = 0;
  let negative = 0;
  let negate = false;
  for (const token of tokenize(text)) {
    if (lexicon.negators.has(token)) {
      negate = true;
      continue;
    }
    let polarity = lexicon.positive.has(token) ? 1 : lexicon.negative.has(token) ? -1 : 0;
    if (negate) polarity = -polarity;
    negate = false;
    if (polarity > 0) positive += 1;
    if (polarity < 0) negative += 1;
  }
  const hits = positive + negative;
  if (hits === 0) return { score: 0, confidence: 0 };
  return {
    score: (positive - negative) / hits,
    confidence: Math.min(1, hits / SATURATION_HITS)
  };
};

export class LexiconSentimentScorer implements SentimentScorer {
  constructor(
    private readonly lexicon: Lexicon,
    private readonly now: () => number = Date.now
  ) {}

  async score(article: Article): Promise<SentimentScore> {
    const text = [article.title, article.summary ?? ''].join(' ');
    const { score, confidence } = scoreText(text, this.lexicon);
    return { topic: article.topic, score, confidence, asOf: Math.min(article.publishedAt, this.now()) };
  }
}
