import { alertTemplates, stamp, type AlertTemplate } from '../alerts/alertTemplates.js';
import type { Notifier } from '../alerts/interface.js';
import type { ChannelTag } from '../alerts/types.js';
import { errorMessage } from '../core/errors.js';
import type { Logger } from '../core/logger.js';
import type { Metrics } from '../core/metrics.js';
import { RecentIds } from '../core/recentIds.js';
import type { TimeSource } from '../core/time.js';
import type { Signal } from '../core/types.js';
import type { OpenPosition, PortfolioView } from './portfolio.js';

export interface TradingAgentConfig {
  /** Default: 0.3 */
  minSignalConfidence: number;
  /** Default: 2 */
  maxConcurrentPositions: number;
  /** How long a handled signal id is remembered. Default: 24h */
  handledWindowMs: number;
  /** Default: 10000 */
  handledMaxEntries: number;
}

export const DEFAULT_AGENT_CONFIG: TradingAgentConfig = {
  minSignalConfidence: 0.3,
  maxConcurrentPositions: 2,
  handledWindowMs: 24 * 60 * 60 * 1000,
  handledMaxEntries: 10_000
};

export type RejectReason = 'duplicate' | 'low_confidence' | 'position_open' | 'max_positions';

export type AgentDecision =
  | { accepted: true; signal: Signal; position: OpenPosition }
  | { accepted: false; signal: Signal; reason: RejectReason; detail: string };

/**
 * Final gate between generated signals and the outside world. Applies the
 * portfolio rules, records accepted signals as positions and announces them.
 * Notification failures are logged; they never reverse a decision. Retrying
 * a channel is the notifier's concern.
 */
export class TradingAgent {
  private readonly config: TradingAgentConfig;
  private readonly handled: RecentIds;

  constructor(
    private readonly portfolio: PortfolioView,
    private readonly notifier: Notifier,
    private readonly time: TimeSource,
    private readonly logger: Logger,
    private readonly metrics: Metrics,
    config: Partial<TradingAgentConfig> = {}
  ) {
    this.config = { ...DEFAULT_AGENT_CONFIG, ...config };
    this.handled = new RecentIds(this.config.handledWindowMs, this.config.handledMaxEntries);
  }

  async handle(signal: Signal): Promise<AgentDecision> {
    const decision = this.decide(signal);
    if (!decision.accepted) {
      this.metrics.increment('agent.rejected');
      this.metrics.increment(`agent.rejected.${decision.reason}`);
      this.logger.info('signal rejected', { signalId: signal.id, reason: decision.reason, detail: decision.detail });
      return decision;
    }

    this.metrics.increment('agent.accepted');
    this.logger.info('signal accepted', {
      signalId: signal.id,
      symbol: signal.symbol,
      direction: signal.direction,
      entry: signal.entry,
      quantity: signal.quantity,
      confidence: signal.confidence
    });
    await this.deliver(alertTemplates.signal(signal), 'signals');
    return decision;
  }

  async announceStartup(symbols: string[], timeframe: string): Promise<void> {
    await this.deliver(alertTemplates.systemStartup(symbols, timeframe), 'status');
  }

  async announceShutdown(reason: string): Promise<void> {
    await this.deliver(alertTemplates.systemShutdown(reason), 'status');
  }

  async marketOpened(nextClose: number): Promise<void> {
    await this.deliver(alertTemplates.marketOpen(nextClose), 'status');
  }

  async marketClosed(nextOpen: number, reliable: boolean): Promise<void> {
    await this.deliver(alertTemplates.marketClosed(nextOpen, reliable), 'status');
  }

  async warn(source: string, message: string, subject?: string): Promise<void> {
    this.metrics.increment('agent.warnings');
    await this.deliver(alertTemplates.degradedData(source, message, subject), 'warnings');
  }

  private decide(signal: Signal): AgentDecision {
    const now = this.time.now();
    if (this.handled.has(signal.id, now)) {
      return { accepted: false, signal, reason: 'duplicate', detail: 'signal already handled' };
    }
    this.handled.add(signal.id, now);

    if (signal.confidence < this.config.minSignalConfidence) {
      return {
        accepted: false,
        signal,
        reason: 'low_confidence',
        detail: `confidence ${signal.confidence} below ${this.config.minSignalConfidence}`
      };
    }
    if (this.portfolio.hasOpenPosition(signal.symbol, now)) {
      return { accepted: false, signal, reason: 'position_open', detail: `${signal.symbol} already has an open position` };
    }
    const open = this.portfolio.openPositions(now).length;
    if (open >= this.config.maxConcurrentPositions) {
      return {
        accepted: false,
        signal,
        reason: 'max_positions',
        detail: `${open} of ${this.config.maxConcurrentPositions} positions open`
      };
    }
    return { accepted: true, signal, position: this.portfolio.open(signal, now) };
  }

  private async deliver(template: AlertTemplate, tag: ChannelTag): Promise<void> {
    const message = stamp(template, this.time.now());
    try {
      await this.notifier.send(message, tag);
    } catch (err) {
      this.metrics.increment('agent.notify_failed');
      this.logger.error('notification not delivered', { channelTag: tag, title: message.title, err: errorMessage(err) });
    }
  }
}
