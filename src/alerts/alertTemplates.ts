/**
 * Alert Templates: pre-formatted messages for pipeline events.
 *
 * Templates carry no timestamp; the sender stamps them on delivery.
 */

import type { Signal } from '../core/types.js';
import type { AlertMessage, AlertSeverity } from './types.js';

export type AlertTemplate = Omit<AlertMessage, 'timestamp'>;

const SEVERITY_EMOJI: Record<AlertSeverity, string> = {
  info: 'ℹ️',
  warn: '⚠️',
  critical: '🚨',
};

const usd = (n: number): string => `$${n.toFixed(2)}`;
const signed = (n: number): string => `${n >= 0 ? '+' : ''}${n.toFixed(2)}`;
const pct = (n: number): string => `${(n * 100).toFixed(1)}%`;

export const stamp = (template: AlertTemplate, timestamp: number): AlertMessage => ({ ...template, timestamp });

// ── Template Factories ──────────────────────────────────────────────

export const alertTemplates = {
  signal(signal: Signal): AlertTemplate {
    const long = signal.direction === 'long';
    const targets = signal.targets.map(usd).join(' / ');
    const option = signal.optionType.toUpperCase();
    return {
      title: `${long ? '🚀' : '🐻'} ${long ? 'LONG' : 'SHORT'} ${signal.symbol} ${option} (${signal.timeframe})`,
      body: [
        `Entry ${usd(signal.entry)} | Stop ${usd(signal.stop)}`,
        `Option ${option} exp ${signal.expiration} | Hold ${signal.holdingPeriod}`,
        `Targets: ${targets}`,
        `Qty ${signal.quantity.toFixed(2)} (risk ${usd(signal.riskAmount)})`,
        `Confidence ${pct(signal.confidence)} | Sentiment ${signed(signal.sentimentScore)} | Box ${signal.boxState}`,
      ].join('\n'),
      severity: 'info',
      color: long ? 0x2ecc71 : 0xe74c3c,
      fields: [
        { name: 'Entry', value: usd(signal.entry) },
        { name: 'Stop', value: usd(signal.stop) },
        { name: 'Targets', value: targets, inline: false },
        { name: 'Option', value: `${option} ${signal.expiration}` },
        { name: 'Hold', value: signal.holdingPeriod },
        { name: 'Confidence', value: pct(signal.confidence) },
        { name: 'Signal', value: signal.id, inline: false },
      ],
    };
  },

  marketOpen(nextClose: number): AlertTemplate {
    return {
      title: '🔔 Market Open',
      body: `Price monitoring resumed. Session closes ${new Date(nextClose).toISOString()}.`,
      severity: 'info',
    };
  },

  marketClosed(nextOpen: number, reliable: boolean): AlertTemplate {
    return {
      title: '🌙 Market Closed',
      body: reliable
        ? `Price monitoring paused until ${new Date(nextOpen).toISOString()}.`
        : `Market clock unavailable, assuming closed. Next check ${new Date(nextOpen).toISOString()}.`,
      severity: reliable ? 'info' : 'warn',
    };
  },

  degradedData(source: string, message: string, subject?: string): AlertTemplate {
    return {
      title: `${SEVERITY_EMOJI.warn} Degraded Data: ${source}`,
      body: subject ? `${subject}: ${message}` : message,
      severity: 'warn',
    };
  },

  systemStartup(symbols: string[], timeframe: string): AlertTemplate {
    return {
      title: '🚀 Signal Pipeline Started',
      body: `Symbols: ${symbols.join(', ')}\nTimeframe: ${timeframe}`,
      severity: 'info',
    };
  },

  systemShutdown(reason: string): AlertTemplate {
    return {
      title: '🛑 Signal Pipeline Stopped',
      body: `Reason: ${reason}`,
      severity: 'warn',
    };
  },
};
