import type { AlertMessage, ChannelTag } from './types.js';

/** Outbound notification boundary. At-least-once delivery is acceptable. */
export interface Notifier {
  send(message: AlertMessage, channelTag: ChannelTag): Promise<void>;
}
