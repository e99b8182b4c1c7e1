export type Direction = 'long' | 'short';
export type OptionType = 'call' | 'put';
export type BoxState = 'FORMING' | 'CONFIRMED' | 'RETESTED' | 'INVALIDATED';
export type Timeframe = '1m' | '5m' | '15m' | '1h' | '1d';

export interface Candle {
  symbol: string;
  timeframe: Timeframe;
  /** Bucket start, epoch ms UTC. */
  time: number;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

export interface Box {
  id: string;
  symbol: string;
  timeframe: Timeframe;
  top: number;
  bottom: number;
  formedAt: number;
  candleCount: number;
  /** Average window volume divided by baseline volume at confirmation. */
  volumeRatio: number;
  state: BoxState;
  lastClose: number;
  retestedAt?: number;
  resolvedAt?: number;
}

export interface SentimentScore {
  /** Symbol, or MARKET_TOPIC for market-wide news. */
  topic: string;
  score: number;
  confidence: number;
  asOf: number;
}

export interface SentimentReading extends SentimentScore {
  /** Fresh articles scored for this topic. */
  articleCount: number;
}

export interface Article {
  id: string;
  topic: string;
  title: string;
  summary?: string;
  url?: string;
  source?: string;
  publishedAt: number;
}

export interface Signal {
  id: string;
  symbol: string;
  timeframe: Timeframe;
  direction: Direction;
  entry: number;
  stop: number;
  stopDistance: number;
  targets: readonly number[];
  riskAmount: number;
  /** Units sized so that a stop-out loses riskAmount. */
  quantity: number;
  confidence: number;
  sentimentScore: number;
  boxState: BoxState;
  generatedAt: number;
  sourceBoxId: string;
  /** call for long, put for short. */
  optionType: OptionType;
  /** Weekly contract expiry, YYYY-MM-DD in the exchange timezone. */
  expiration: string;
  holdingPeriod: string;
}

export interface RiskConfig {
  riskPerTrade: number;
  rewardRatios: number[];
  /** Fraction of the boundary price, e.g. 0.0035 for 0.35%. */
  stopBufferPct: number;
}

export const MARKET_TOPIC = 'MARKET';
