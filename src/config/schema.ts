import { formatInTimeZone } from 'date-fns-tz';
import { z } from 'zod';
import { timeframeSchema } from '../core/validation.js';

const parseBoolean = (v: unknown, fallback: boolean): boolean => {
  if (typeof v !== 'string' || v.trim() === '') return fallback;
  return ['1', 'true', 'yes', 'on'].includes(v.toLowerCase());
};

const parseList = (v: string): string[] =>
  v
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean);

const symbolList = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform((v) => parseList(v).map((s) => s.toUpperCase()));

const ratioList = z
  .string()
  .default('2,3,4')
  .transform((v, ctx) => {
    const ratios = parseList(v).map(Number);
    if (ratios.length === 0 || ratios.some((r) => !Number.isFinite(r) || r <= 0)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'reward ratios must be a comma-separated list of positive numbers' });
      return z.NEVER;
    }
    return ratios;
  });

const isTimeZone = (tz: string): boolean => {
  try {
    formatInTimeZone(0, tz, 'yyyy');
    return true;
  } catch {
    return false;
  }
};

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);
const fraction = (fallback: number) => z.coerce.number().positive().max(1).default(fallback);
const unitInterval = (fallback: number) => z.coerce.number().min(0).max(1).default(fallback);

const rawSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),

  SYMBOLS: symbolList('QQQ,SPY'),
  TIMEFRAME: timeframeSchema.default('5m'),
  PRICE_POLL_INTERVAL_MS: positiveInt(60_000),
  NEWS_POLL_INTERVAL_MS: positiveInt(300_000),
  NEWS_MARKET_TOPICS: z.string().default('stock market'),
  NEWS_DEDUP_WINDOW_MS: positiveInt(24 * 60 * 60 * 1000),
  NEWS_DEDUP_MAX_ENTRIES: positiveInt(5000),
  SENTIMENT_STALE_AFTER_MS: positiveInt(2 * 60 * 60 * 1000),

  BUS_CAPACITY: positiveInt(256),
  IO_TIMEOUT_MS: positiveInt(10_000),
  STATUS_INTERVAL_MS: positiveInt(60_000),
  CLOCK_RECHECK_MS: positiveInt(15 * 60 * 1000),
  MARKET_CALENDAR_PATH: z.string().optional(),
  HISTORY_WARMUP_CANDLES: z.coerce.number().int().nonnegative().default(50),

  // Box detector
  BOX_SIZE_THRESHOLD: fraction(0.02),
  MIN_CONSOLIDATION_CANDLES: positiveInt(5),
  BOX_LOOKBACK_CANDLES: positiveInt(5),
  VOLUME_THRESHOLD_MULTIPLIER: z.coerce.number().positive().default(1.3),
  RETEST_TOLERANCE: fraction(0.005),
  BASELINE_LOOKBACK: positiveInt(20),
  MAX_BOX_AGE_CANDLES: positiveInt(30),
  BOX_CONFLICT_POLICY: z.enum(['breakout', 'retest']).default('breakout'),

  // Risk & signal rules
  RISK_PER_TRADE: z.coerce.number().positive().default(25),
  REWARD_RATIOS: ratioList,
  STOP_BUFFER_PCT: fraction(0.0035),
  MIN_SENTIMENT_CONFIDENCE: unitInterval(0.5),
  SENTIMENT_DEADBAND: unitInterval(0.05),
  MIN_ARTICLE_COUNT: positiveInt(2),
  RSI_OVERBOUGHT: z.coerce.number().min(50).max(100).default(70),
  RSI_OVERSOLD: z.coerce.number().min(0).max(50).default(30),
  HOLDING_PERIOD: z.string().min(1).default('1-10 days'),
  EXPIRY_TIMEZONE: z.string().refine(isTimeZone, 'must be an IANA timezone').default('America/New_York'),
  MIN_SIGNAL_CONFIDENCE: unitInterval(0.3),
  MAX_CONCURRENT_POSITIONS: positiveInt(2),
  POSITION_HOLD_MS: positiveInt(4 * 60 * 60 * 1000),

  // Retry
  RETRY_MAX_ATTEMPTS: positiveInt(3),
  RETRY_BASE_DELAY_MS: positiveInt(1000),
  RETRY_MAX_DELAY_MS: positiveInt(30_000),

  // Collaborators
  ALPACA_API_KEY: z.string().min(1, 'ALPACA_API_KEY is required'),
  ALPACA_API_SECRET: z.string().min(1, 'ALPACA_API_SECRET is required'),
  ALPACA_DATA_FEED: z.enum(['iex', 'sip']).default('iex'),
  ALPACA_DATA_URL: z.string().url().default('https://data.alpaca.markets'),
  ALPACA_TRADING_URL: z.string().url().default('https://paper-api.alpaca.markets'),
  NEWS_API_KEY: z.string().min(1, 'NEWS_API_KEY is required'),
  NEWS_API_URL: z.string().url().default('https://newsapi.org'),

  // Alerts
  ALERT_DISCORD_ENABLED: z.string().optional(),
  DISCORD_WEBHOOK_URL: z.string().url().optional(),
  DISCORD_SIGNALS_WEBHOOK_URL: z.string().url().optional(),
  DISCORD_MIN_SEVERITY: z.enum(['info', 'warn', 'critical']).default('info')
});

export const configSchema = rawSchema
  .superRefine((raw, ctx) => {
    if (raw.BOX_LOOKBACK_CANDLES < raw.MIN_CONSOLIDATION_CANDLES) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['BOX_LOOKBACK_CANDLES'],
        message: `must be at least MIN_CONSOLIDATION_CANDLES (${raw.MIN_CONSOLIDATION_CANDLES})`
      });
    }
    if (raw.RSI_OVERSOLD >= raw.RSI_OVERBOUGHT) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['RSI_OVERSOLD'],
        message: `must be below RSI_OVERBOUGHT (${raw.RSI_OVERBOUGHT})`
      });
    }
    if (raw.RETRY_MAX_DELAY_MS < raw.RETRY_BASE_DELAY_MS) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['RETRY_MAX_DELAY_MS'],
        message: 'must be at least RETRY_BASE_DELAY_MS'
      });
    }
    if (raw.SYMBOLS.length === 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['SYMBOLS'], message: 'at least one symbol is required' });
    }
    if (parseBoolean(raw.ALERT_DISCORD_ENABLED, false) && !raw.DISCORD_WEBHOOK_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['DISCORD_WEBHOOK_URL'],
        message: 'required when ALERT_DISCORD_ENABLED is set'
      });
    }
  })
  .transform((raw) => ({
    nodeEnv: raw.NODE_ENV,
    logLevel: raw.LOG_LEVEL,

    symbols: raw.SYMBOLS,
    timeframe: raw.TIMEFRAME,
    busCapacity: raw.BUS_CAPACITY,
    ioTimeoutMs: raw.IO_TIMEOUT_MS,
    statusIntervalMs: raw.STATUS_INTERVAL_MS,

    market: {
      calendarPath: raw.MARKET_CALENDAR_PATH,
      recheckMs: raw.CLOCK_RECHECK_MS
    },

    price: {
      pollIntervalMs: raw.PRICE_POLL_INTERVAL_MS,
      warmupCandles: raw.HISTORY_WARMUP_CANDLES
    },

    news: {
      pollIntervalMs: raw.NEWS_POLL_INTERVAL_MS,
      marketTopics: parseList(raw.NEWS_MARKET_TOPICS),
      dedupWindowMs: raw.NEWS_DEDUP_WINDOW_MS,
      dedupMaxEntries: raw.NEWS_DEDUP_MAX_ENTRIES,
      staleAfterMs: raw.SENTIMENT_STALE_AFTER_MS
    },

    box: {
      boxSizeThreshold: raw.BOX_SIZE_THRESHOLD,
      minConsolidationCandles: raw.MIN_CONSOLIDATION_CANDLES,
      lookbackCandles: raw.BOX_LOOKBACK_CANDLES,
      volumeThresholdMultiplier: raw.VOLUME_THRESHOLD_MULTIPLIER,
      retestTolerance: raw.RETEST_TOLERANCE,
      baselineLookback: raw.BASELINE_LOOKBACK,
      maxBoxAgeCandles: raw.MAX_BOX_AGE_CANDLES,
      conflictPolicy: raw.BOX_CONFLICT_POLICY
    },

    risk: {
      riskPerTrade: raw.RISK_PER_TRADE,
      rewardRatios: raw.REWARD_RATIOS,
      stopBufferPct: raw.STOP_BUFFER_PCT
    },

    signals: {
      minSentimentConfidence: raw.MIN_SENTIMENT_CONFIDENCE,
      sentimentDeadband: raw.SENTIMENT_DEADBAND,
      minArticleCount: raw.MIN_ARTICLE_COUNT,
      rsiOverbought: raw.RSI_OVERBOUGHT,
      rsiOversold: raw.RSI_OVERSOLD,
      holdingPeriod: raw.HOLDING_PERIOD,
      expiryTimeZone: raw.EXPIRY_TIMEZONE
    },

    agent: {
      minSignalConfidence: raw.MIN_SIGNAL_CONFIDENCE,
      maxConcurrentPositions: raw.MAX_CONCURRENT_POSITIONS,
      positionHoldMs: raw.POSITION_HOLD_MS
    },

    retry: {
      maxAttempts: raw.RETRY_MAX_ATTEMPTS,
      baseDelayMs: raw.RETRY_BASE_DELAY_MS,
      maxDelayMs: raw.RETRY_MAX_DELAY_MS
    },

    alpaca: {
      apiKey: raw.ALPACA_API_KEY,
      apiSecret: raw.ALPACA_API_SECRET,
      feed: raw.ALPACA_DATA_FEED,
      dataUrl: raw.ALPACA_DATA_URL,
      tradingUrl: raw.ALPACA_TRADING_URL
    },

    newsApi: {
      apiKey: raw.NEWS_API_KEY,
      baseUrl: raw.NEWS_API_URL
    },

    alerts: {
      discord: {
        enabled: parseBoolean(raw.ALERT_DISCORD_ENABLED, false),
        webhookUrl: raw.DISCORD_WEBHOOK_URL,
        signalsWebhookUrl: raw.DISCORD_SIGNALS_WEBHOOK_URL,
        minSeverity: raw.DISCORD_MIN_SEVERITY
      }
    }
  }));
