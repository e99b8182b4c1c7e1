import { describe, it, expect } from 'vitest';
import type { Notifier } from '../../src/alerts/interface.js';
import { NotificationRouter } from '../../src/alerts/notificationRouter.js';
import type { AlertMessage } from '../../src/alerts/types.js';
import { TransientIOError } from '../../src/core/errors.js';
import { RetryExecutor } from '../../src/core/retry.js';
import { FakeTime, T0, createMockLogger, createMockMetrics, createMockNotifier } from '../helpers.js';

const message = (severity: AlertMessage['severity']): AlertMessage => ({ title: 'title', body: 'body', severity, timestamp: T0 });

const flaky = (failures: number) => {
  let attempts = 0;
  const notifier: Notifier = {
    async send() {
      attempts += 1;
      if (attempts <= failures) throw new TransientIOError('discord signals: HTTP 503');
    },
  };
  return { notifier, attempts: () => attempts };
};

const retryExecutor = (time = new FakeTime()) =>
  new RetryExecutor({ maxAttempts: 3, baseDelayMs: 100, maxDelayMs: 1000 }, time, createMockLogger(), createMockMetrics());

const failing = (reason: string): Notifier => ({
  async send() {
    throw new Error(reason);
  },
});

describe('NotificationRouter', () => {
  it('skips channels below their minimum severity', async () => {
    const all = createMockNotifier();
    const urgent = createMockNotifier();
    const router = new NotificationRouter(
      [
        { name: 'console', notifier: all },
        { name: 'discord', notifier: urgent, minSeverity: 'warn' },
      ],
      createMockLogger(),
    );

    await router.send(message('info'), 'status');
    await router.send(message('warn'), 'warnings');

    expect(all.sent).toHaveLength(2);
    expect(urgent.sent.map((s) => s.tag)).toEqual(['warnings']);
  });

  it('only delivers tags a channel subscribed to', async () => {
    const signalsOnly = createMockNotifier();
    const router = new NotificationRouter([{ name: 'desk', notifier: signalsOnly, tags: ['signals'] }], createMockLogger());

    await router.send(message('info'), 'status');
    await router.send(message('info'), 'signals');

    expect(signalsOnly.sent.map((s) => s.tag)).toEqual(['signals']);
  });

  it('tolerates a failing channel while another succeeds', async () => {
    const ok = createMockNotifier();
    const logger = createMockLogger();
    const router = new NotificationRouter(
      [
        { name: 'discord', notifier: failing('HTTP 500') },
        { name: 'console', notifier: ok },
      ],
      logger,
    );

    await router.send(message('info'), 'signals');

    expect(ok.sent).toHaveLength(1);
    expect(logger.entries.map((e) => e.message)).toEqual(['notification delivery failed for discord']);
  });

  it('rethrows when every targeted channel fails', async () => {
    const router = new NotificationRouter(
      [
        { name: 'a', notifier: failing('first') },
        { name: 'b', notifier: failing('second') },
      ],
      createMockLogger(),
    );
    await expect(router.send(message('info'), 'signals')).rejects.toThrow('first');
  });

  it('retries a transient channel failure even when another channel succeeded', async () => {
    const terminal = createMockNotifier();
    const discord = flaky(2);
    const time = new FakeTime();
    const router = new NotificationRouter(
      [
        { name: 'console', notifier: terminal },
        { name: 'discord', notifier: discord.notifier },
      ],
      createMockLogger(),
      retryExecutor(time),
    );

    await router.send(message('info'), 'signals');

    expect(terminal.sent).toHaveLength(1);
    expect(discord.attempts()).toBe(3);
    expect(time.sleeps).toEqual([100, 200]);
  });

  it('gives up on one channel after maxAttempts and logs it', async () => {
    const terminal = createMockNotifier();
    const discord = flaky(10);
    const logger = createMockLogger();
    const router = new NotificationRouter(
      [
        { name: 'console', notifier: terminal },
        { name: 'discord', notifier: discord.notifier },
      ],
      logger,
      retryExecutor(),
    );

    await router.send(message('info'), 'signals');

    expect(discord.attempts()).toBe(3);
    expect(terminal.sent).toHaveLength(1);
    expect(logger.entries.find((e) => e.message === 'notification delivery failed for discord')?.context).toMatchObject({
      err: 'discord signals: HTTP 503',
    });
  });

  it('does not retry a channel that failed for a non-transient reason', async () => {
    let attempts = 0;
    const rejected: Notifier = {
      async send() {
        attempts += 1;
        throw new Error('invalid webhook payload');
      },
    };
    const router = new NotificationRouter([{ name: 'discord', notifier: rejected }], createMockLogger(), retryExecutor());

    await expect(router.send(message('info'), 'signals')).rejects.toThrow('invalid webhook payload');
    expect(attempts).toBe(1);
  });
});
