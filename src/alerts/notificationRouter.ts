/**
 * NotificationRouter fans each message out to every registered channel
 * whose minimum severity it meets. One failing channel never blocks the
 * others. With a RetryExecutor each channel retries on its own, so a channel
 * that succeeds never hides a transient failure on another. A failure is
 * rethrown only when no channel accepted the message.
 */

import { TransientIOError, errorMessage } from '../core/errors.js';
import type { Logger } from '../core/logger.js';
import type { RetryExecutor } from '../core/retry.js';
import type { Notifier } from './interface.js';
import { SEVERITY_RANK, type AlertMessage, type AlertSeverity, type ChannelTag } from './types.js';

export interface RoutedChannel {
  name: string;
  notifier: Notifier;
  /** Default: info */
  minSeverity?: AlertSeverity;
  /** Tags this channel receives. Default: all */
  tags?: ChannelTag[];
}

export class NotificationRouter implements Notifier {
  constructor(
    private readonly channels: RoutedChannel[],
    private readonly logger: Logger,
    private readonly retry?: RetryExecutor,
  ) {}

  async send(message: AlertMessage, channelTag: ChannelTag): Promise<void> {
    const targets = this.channels.filter((c) => this.shouldDeliver(c, message.severity, channelTag));
    if (targets.length === 0) return;

    const results = await Promise.allSettled(targets.map((c) => this.deliver(c, message, channelTag)));
    const failures: unknown[] = [];
    results.forEach((result, i) => {
      if (result.status === 'rejected') {
        failures.push(result.reason);
        this.logger.warn(`notification delivery failed for ${targets[i]?.name ?? 'unknown'}`, {
          channelTag,
          title: message.title,
          err: errorMessage(result.reason),
        });
      }
    });
    if (failures.length === targets.length) throw failures[0];
  }

  private async deliver(channel: RoutedChannel, message: AlertMessage, channelTag: ChannelTag): Promise<void> {
    if (!this.retry) return channel.notifier.send(message, channelTag);
    const outcome = await this.retry.run(() => channel.notifier.send(message, channelTag), `notify ${channel.name} ${channelTag}`);
    if (outcome.phase === 'succeeded') return;
    throw outcome.phase === 'aborted' ? new TransientIOError(`${channel.name} delivery aborted`) : outcome.error;
  }

  private shouldDeliver(channel: RoutedChannel, severity: AlertSeverity, tag: ChannelTag): boolean {
    if (channel.tags && !channel.tags.includes(tag)) return false;
    return SEVERITY_RANK[severity] >= SEVERITY_RANK[channel.minSeverity ?? 'info'];
  }
}
