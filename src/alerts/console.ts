import type { Notifier } from './interface.js';
import type { AlertMessage, ChannelTag } from './types.js';

export class ConsoleNotifier implements Notifier {
  constructor(private readonly sink: (line: string) => void = (line) => process.stdout.write(line)) {}

  async send(message: AlertMessage, channelTag: ChannelTag): Promise<void> {
    const fields = Object.fromEntries((message.fields ?? []).map((f) => [f.name, f.value]));
    this.sink(
      `${JSON.stringify({
        ts: new Date(message.timestamp).toISOString(),
        alert: message.title,
        channel: channelTag,
        severity: message.severity,
        message: message.body,
        ...fields
      })}\n`
    );
  }
}
