import { describe, it, expect } from 'vitest';
import { loadConfig } from '../../src/config/load.js';
import { ConfigError } from '../../src/core/errors.js';
import { TEST_ENV } from '../helpers.js';

const issuesOf = (env: NodeJS.ProcessEnv): string[] => {
  try {
    loadConfig(env);
  } catch (err) {
    if (err instanceof ConfigError) {
      const issues = err.details?.issues;
      return Array.isArray(issues) ? issues.map(String) : [];
    }
    throw err;
  }
  throw new Error('expected config validation to fail');
};

describe('loadConfig', () => {
  it('fills defaults around the required credentials', () => {
    const config = loadConfig(TEST_ENV);

    expect(config.symbols).toEqual(['QQQ', 'SPY']);
    expect(config.timeframe).toBe('5m');
    expect(config.busCapacity).toBe(256);
    expect(config.risk).toEqual({ riskPerTrade: 25, rewardRatios: [2, 3, 4], stopBufferPct: 0.0035 });
    expect(config.news.marketTopics).toEqual(['stock market']);
    expect(config.agent).toEqual({ minSignalConfidence: 0.3, maxConcurrentPositions: 2, positionHoldMs: 4 * 60 * 60 * 1000 });
    expect(config.alpaca.feed).toBe('iex');
    expect(config.alerts.discord.enabled).toBe(false);
  });

  it('normalises lists and coerces numbers', () => {
    const config = loadConfig({ ...TEST_ENV, SYMBOLS: ' qqq, iwm ,', REWARD_RATIOS: '1.5, 2', RISK_PER_TRADE: '50' });
    expect(config.symbols).toEqual(['QQQ', 'IWM']);
    expect(config.risk.rewardRatios).toEqual([1.5, 2]);
    expect(config.risk.riskPerTrade).toBe(50);
  });

  it('reads the signal gates and the option framing', () => {
    expect(loadConfig(TEST_ENV).signals).toEqual({
      minSentimentConfidence: 0.5,
      sentimentDeadband: 0.05,
      minArticleCount: 2,
      rsiOverbought: 70,
      rsiOversold: 30,
      holdingPeriod: '1-10 days',
      expiryTimeZone: 'America/New_York',
    });
    const tuned = loadConfig({ ...TEST_ENV, MIN_ARTICLE_COUNT: '3', HOLDING_PERIOD: '2-5 days', EXPIRY_TIMEZONE: 'America/Chicago' });
    expect(tuned.signals).toMatchObject({ minArticleCount: 3, holdingPeriod: '2-5 days', expiryTimeZone: 'America/Chicago' });
  });

  it('rejects an unknown expiry timezone and inverted RSI bands', () => {
    expect(issuesOf({ ...TEST_ENV, EXPIRY_TIMEZONE: 'Mars/Olympus' })).toEqual(['EXPIRY_TIMEZONE: must be an IANA timezone']);
    expect(issuesOf({ ...TEST_ENV, RSI_OVERBOUGHT: '50', RSI_OVERSOLD: '50' })).toEqual(['RSI_OVERSOLD: must be below RSI_OVERBOUGHT (50)']);
  });

  it('reports every missing credential at once', () => {
    const issues = issuesOf({ ...TEST_ENV, ALPACA_API_KEY: '', NEWS_API_KEY: '' });
    expect(issues).toEqual(['ALPACA_API_KEY: ALPACA_API_KEY is required', 'NEWS_API_KEY: NEWS_API_KEY is required']);
  });

  it('rejects reward ratios that are not positive', () => {
    expect(issuesOf({ ...TEST_ENV, REWARD_RATIOS: '2,-1' })).toEqual([
      'REWARD_RATIOS: reward ratios must be a comma-separated list of positive numbers',
    ]);
  });

  it('applies cross-field rules', () => {
    const issues = issuesOf({
      ...TEST_ENV,
      MIN_CONSOLIDATION_CANDLES: '6',
      BOX_LOOKBACK_CANDLES: '4',
      RETRY_BASE_DELAY_MS: '5000',
      RETRY_MAX_DELAY_MS: '1000',
      ALERT_DISCORD_ENABLED: 'true',
    });
    expect(issues).toEqual([
      'BOX_LOOKBACK_CANDLES: must be at least MIN_CONSOLIDATION_CANDLES (6)',
      'RETRY_MAX_DELAY_MS: must be at least RETRY_BASE_DELAY_MS',
      'DISCORD_WEBHOOK_URL: required when ALERT_DISCORD_ENABLED is set',
    ]);
  });

  it('routes Discord signals to their own webhook when given', () => {
    const config = loadConfig({
      ...TEST_ENV,
      ALERT_DISCORD_ENABLED: 'yes',
      DISCORD_WEBHOOK_URL: 'https://discord.test/default',
      DISCORD_SIGNALS_WEBHOOK_URL: 'https://discord.test/signals',
      DISCORD_MIN_SEVERITY: 'warn',
    });
    expect(config.alerts.discord).toEqual({
      enabled: true,
      webhookUrl: 'https://discord.test/default',
      signalsWebhookUrl: 'https://discord.test/signals',
      minSeverity: 'warn',
    });
  });

  it('rejects an unknown timeframe', () => {
    expect(issuesOf({ ...TEST_ENV, TIMEFRAME: '2m' })[0]).toMatch(/^TIMEFRAME: /);
  });
});
