import type { AxiosInstance } from 'axios';
import { DataFormatError } from '../../core/errors.js';
import { createHttpClient, getJson } from '../../core/http.js';
import type { Candle, Timeframe } from '../../core/types.js';
import { parseCandle, parseWith } from '../../core/validation.js';
import type { HistoryRange, MarketDataClient } from '../adapter.js';
import { ALPACA_DATA_URL, ALPACA_PAPER_TRADING_URL, alpacaEndpoints } from './endpoints.js';
import { alpacaBarsResponseSchema, alpacaClockSchema, type AlpacaBar } from './types.js';

const TIMEFRAME_MAP: Record<Timeframe, string> = {
  '1m': '1Min',
  '5m': '5Min',
  '15m': '15Min',
  '1h': '1Hour',
  '1d': '1Day'
};

export const toAlpacaTimeframe = (timeframe: Timeframe): string => TIMEFRAME_MAP[timeframe];

export interface AlpacaOptions {
  apiKey: string;
  apiSecret: string;
  /** Default: iex */
  feed?: 'iex' | 'sip';
  dataUrl?: string;
  tradingUrl?: string;
  /** Default: 10000 */
  timeoutMs?: number;
}

export const toCandle = (symbol: string, timeframe: Timeframe, bar: AlpacaBar): Candle =>
  parseCandle({
    symbol,
    timeframe,
    time: Date.parse(bar.t),
    open: bar.o,
    high: bar.h,
    low: bar.l,
    close: bar.c,
    volume: bar.v
  });

export class AlpacaAdapter implements MarketDataClient {
  private readonly data: AxiosInstance;
  private readonly trading: AxiosInstance;
  private readonly feed: 'iex' | 'sip';

  constructor(options: AlpacaOptions, clients: { data?: AxiosInstance; trading?: AxiosInstance } = {}) {
    const headers = {
      'APCA-API-KEY-ID': options.apiKey,
      'APCA-API-SECRET-KEY': options.apiSecret
    };
    const timeoutMs = options.timeoutMs ?? 10000;
    this.feed = options.feed ?? 'iex';
    this.data = clients.data ?? createHttpClient(options.dataUrl ?? ALPACA_DATA_URL, timeoutMs, headers);
    this.trading = clients.trading ?? createHttpClient(options.tradingUrl ?? ALPACA_PAPER_TRADING_URL, timeoutMs, headers);
  }

  async getQuote(symbol: string, timeframe: Timeframe): Promise<Candle> {
    const raw = await getJson(this.data, alpacaEndpoints.bars(symbol), `alpaca bars ${symbol}`, {
      timeframe: toAlpacaTimeframe(timeframe),
      limit: 1,
      sort: 'desc',
      feed: this.feed
    });
    const bar = parseWith(alpacaBarsResponseSchema, raw, 'alpaca bars').bars?.[0];
    if (!bar) throw new DataFormatError(`no bars returned for ${symbol}`, { symbol, timeframe });
    return toCandle(symbol, timeframe, bar);
  }

  async getHistorical(symbol: string, timeframe: Timeframe, range: HistoryRange = {}): Promise<Candle[]> {
    const raw = await getJson(this.data, alpacaEndpoints.bars(symbol), `alpaca history ${symbol}`, {
      timeframe: toAlpacaTimeframe(timeframe),
      start: range.start === undefined ? undefined : new Date(range.start).toISOString(),
      end: range.end === undefined ? undefined : new Date(range.end).toISOString(),
      limit: range.limit,
      // With a limit, newest-first keeps the most recent bars of the range.
      sort: range.limit === undefined ? 'asc' : 'desc',
      feed: this.feed
    });
    const bars = parseWith(alpacaBarsResponseSchema, raw, 'alpaca bars').bars ?? [];
    return bars.map((bar) => toCandle(symbol, timeframe, bar)).sort((a, b) => a.time - b.time);
  }

  async isMarketOpen(): Promise<boolean> {
    const raw = await getJson(this.trading, alpacaEndpoints.clock(), 'alpaca clock');
    return parseWith(alpacaClockSchema, raw, 'alpaca clock').is_open;
  }
}
