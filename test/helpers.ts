/**
 * Shared test helpers: mock factories and fixtures.
 */

import axios, { AxiosError, type AxiosInstance, type InternalAxiosRequestConfig } from 'axios';
import type { Notifier } from '../src/alerts/interface.js';
import type { AlertMessage, ChannelTag } from '../src/alerts/types.js';
import type { Logger } from '../src/core/logger.js';
import type { Metrics } from '../src/core/metrics.js';
import type { TimeSource } from '../src/core/time.js';
import type { Box, Candle, Signal } from '../src/core/types.js';

// ── Mock Logger ─────────────────────────────────────────────────────

export interface LogEntry {
  level: 'debug' | 'info' | 'warn' | 'error';
  message: string;
  context?: Record<string, unknown>;
}

export const createMockLogger = (entries: LogEntry[] = []): Logger & { entries: LogEntry[] } => {
  const logger: Logger & { entries: LogEntry[] } = {
    entries,
    debug: (message, context) => { entries.push({ level: 'debug', message, context }); },
    info: (message, context) => { entries.push({ level: 'info', message, context }); },
    warn: (message, context) => { entries.push({ level: 'warn', message, context }); },
    error: (message, context) => { entries.push({ level: 'error', message, context }); },
    child: () => logger,
  };
  return logger;
};

// ── Mock Metrics ────────────────────────────────────────────────────

export const createMockMetrics = (): Metrics & { counters: Map<string, number>; gauges: Map<string, number> } => {
  const counters = new Map<string, number>();
  const gauges = new Map<string, number>();
  return {
    counters,
    gauges,
    increment(name: string, value = 1) { counters.set(name, (counters.get(name) ?? 0) + value); },
    gauge(name: string, value: number) { gauges.set(name, value); },
  };
};

// ── Fake Time ───────────────────────────────────────────────────────

/**
 * Sleeping advances the clock instantly and yields one macrotask, so loops
 * driven by it make progress without real timers.
 */
export class FakeTime implements TimeSource {
  readonly sleeps: number[] = [];
  onSleep: ((ms: number) => void) | null = null;

  constructor(public current = Date.UTC(2026, 9, 19, 14, 0)) {}

  now(): number {
    return this.current;
  }

  async sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) return;
    this.sleeps.push(ms);
    this.current += ms;
    this.onSleep?.(ms);
    await new Promise<void>((resolve) => setImmediate(resolve));
  }
}

/** Aborts `controller` once `count` sleeps have happened. */
export const abortAfterSleeps = (time: FakeTime, controller: AbortController, count: number): void => {
  let seen = 0;
  time.onSleep = () => {
    seen += 1;
    if (seen >= count) controller.abort();
  };
};

// ── Mock Notifier ───────────────────────────────────────────────────

export const createMockNotifier = (): Notifier & { sent: Array<{ message: AlertMessage; tag: ChannelTag }> } => {
  const sent: Array<{ message: AlertMessage; tag: ChannelTag }> = [];
  return {
    sent,
    async send(message: AlertMessage, tag: ChannelTag) { sent.push({ message, tag }); },
  };
};

// ── Stub HTTP ───────────────────────────────────────────────────────

export interface StubReply {
  status: number;
  data: unknown;
}

/**
 * An axios instance whose adapter answers in process. Statuses of 400 and
 * above reject with an AxiosError, as the real adapters do.
 */
export const createStubHttp = (
  reply: (config: InternalAxiosRequestConfig) => StubReply,
): { client: AxiosInstance; requests: InternalAxiosRequestConfig[] } => {
  const requests: InternalAxiosRequestConfig[] = [];
  const client = axios.create({
    adapter: async (config) => {
      requests.push(config);
      const { status, data } = reply(config);
      const response = { data, status, statusText: String(status), headers: {}, config };
      if (status >= 400) {
        throw new AxiosError(`Request failed with status code ${status}`, 'ERR_BAD_RESPONSE', config, undefined, response);
      }
      return response;
    },
  });
  return { client, requests };
};

// ── Factories ───────────────────────────────────────────────────────

export const T0 = Date.UTC(2026, 9, 19, 13, 30);
export const FIVE_MIN = 5 * 60 * 1000;

export function makeCandle(overrides: Partial<Candle> = {}): Candle {
  return {
    symbol: 'QQQ',
    timeframe: '5m',
    time: T0,
    open: 100.5,
    high: 101,
    low: 100,
    close: 100.8,
    volume: 1000,
    ...overrides,
  };
}

/** `count` candles spaced five minutes apart starting at `start`. */
export function makeCandleSeries(count: number, start: number, shape: Partial<Candle> = {}): Candle[] {
  return Array.from({ length: count }, (_, i) => makeCandle({ ...shape, time: start + i * FIVE_MIN }));
}

export function makeBox(overrides: Partial<Box> = {}): Box {
  return {
    id: `QQQ:5m:${T0}`,
    symbol: 'QQQ',
    timeframe: '5m',
    top: 102,
    bottom: 100,
    formedAt: T0,
    candleCount: 5,
    volumeRatio: 1.5,
    state: 'CONFIRMED',
    lastClose: 101.5,
    ...overrides,
  };
}

export function makeSignal(overrides: Partial<Signal> = {}): Signal {
  return {
    id: `QQQ:5m:${T0}:signal`,
    symbol: 'QQQ',
    timeframe: '5m',
    direction: 'long',
    entry: 101.5,
    stop: 99.65,
    stopDistance: 1.85,
    targets: [105.2, 107.05, 108.9],
    riskAmount: 25,
    quantity: 25 / 1.85,
    confidence: 0.672,
    sentimentScore: 0.6,
    boxState: 'RETESTED',
    generatedAt: T0,
    sourceBoxId: `QQQ:5m:${T0}`,
    optionType: 'call',
    expiration: '2026-10-23',
    holdingPeriod: '1-10 days',
    ...overrides,
  };
}

export const TEST_ENV: NodeJS.ProcessEnv = {
  NODE_ENV: 'test',
  ALPACA_API_KEY: 'test-key',
  ALPACA_API_SECRET: 'test-secret',
  NEWS_API_KEY: 'test-key',
};
