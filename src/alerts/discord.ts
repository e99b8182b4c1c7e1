import axios from 'axios';
import { classifyHttpError } from '../core/http.js';
import type { Notifier } from './interface.js';
import type { AlertMessage, AlertSeverity, ChannelTag } from './types.js';

const SEVERITY_COLOR: Record<AlertSeverity, number> = {
  info: 0x3498db,
  warn: 0xf1c40f,
  critical: 0xe74c3c
};

export interface DiscordWebhookPayload {
  username: string;
  content: string;
  embeds: Array<{
    title: string;
    description: string;
    color: number;
    timestamp: string;
    fields: Array<{ name: string; value: string; inline: boolean }>;
  }>;
}

export const toDiscordPayload = (message: AlertMessage, username = 'boxwatch'): DiscordWebhookPayload => ({
  username,
  content: `**${message.title}**`,
  embeds: [
    {
      title: message.title,
      description: message.body,
      color: message.color ?? SEVERITY_COLOR[message.severity],
      timestamp: new Date(message.timestamp).toISOString(),
      fields: (message.fields ?? []).map((f) => ({ name: f.name, value: f.value, inline: f.inline ?? true }))
    }
  ]
});

export class DiscordNotifier implements Notifier {
  /**
   * @param webhooks per-tag webhook URLs; tags without one use `defaultWebhook`.
   */
  constructor(
    private readonly defaultWebhook: string,
    private readonly webhooks: Partial<Record<ChannelTag, string>> = {},
    private readonly timeoutMs = 10000
  ) {}

  async send(message: AlertMessage, channelTag: ChannelTag): Promise<void> {
    const url = this.webhooks[channelTag] ?? this.defaultWebhook;
    try {
      await axios.post(url, toDiscordPayload(message), { timeout: this.timeoutMs });
    } catch (err) {
      throw classifyHttpError(err, `discord ${channelTag}`);
    }
  }
}
