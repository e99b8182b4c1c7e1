import type { Candle, Timeframe } from '../core/types.js';

export interface HistoryRange {
  /** Epoch ms, inclusive. */
  start?: number;
  end?: number;
  /** Keeps the latest `limit` bars of the range, not the earliest. */
  limit?: number;
}

/** Market-data boundary. Implementations validate payloads and return epoch-ms UTC candles. */
export interface MarketDataClient {
  /** Latest completed candle. */
  getQuote(symbol: string, timeframe: Timeframe): Promise<Candle>;
  /** Candles in ascending time order. */
  getHistorical(symbol: string, timeframe: Timeframe, range?: HistoryRange): Promise<Candle[]>;
  isMarketOpen(): Promise<boolean>;
}
