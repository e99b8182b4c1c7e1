import { DataFormatError, TransientIOError, errorMessage } from './errors.js';
import type { Logger } from './logger.js';
import type { Metrics } from './metrics.js';
import type { TimeSource } from './time.js';

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export type RetryPhase = 'attempting' | 'waiting' | 'succeeded' | 'exhausted' | 'failed' | 'aborted';

export type RetryOutcome<T> =
  | { phase: 'succeeded'; value: T; attempts: number }
  | { phase: 'exhausted' | 'failed'; error: unknown; attempts: number }
  | { phase: 'aborted'; attempts: number };

const RETRYABLE_PATTERNS = ['timeout', 'etimedout', 'econnreset', 'econnrefused', 'rate limit', '429', '503', '502', 'network', 'socket hang up'];

/** Error classification for retry decisions. */
export const isRetryable = (error: unknown): boolean => {
  if (error instanceof TransientIOError) return true;
  if (error instanceof DataFormatError) return false;
  const msg = errorMessage(error).toLowerCase();
  return RETRYABLE_PATTERNS.some((p) => msg.includes(p));
};

export const backoffDelay = (policy: RetryPolicy, attempt: number): number =>
  Math.min(policy.maxDelayMs, policy.baseDelayMs * Math.pow(2, attempt - 1));

/**
 * Bounded-attempt retry with exponential backoff.
 *
 * attempting -> succeeded
 *            -> failed      (non-retryable error)
 *            -> waiting     (retryable, attempts left) -> attempting
 *            -> exhausted   (retryable, no attempts left)
 * waiting    -> aborted     (shutdown during backoff)
 */
export class RetryExecutor {
  constructor(
    private readonly policy: RetryPolicy,
    private readonly time: TimeSource,
    private readonly logger: Logger,
    private readonly metrics: Metrics
  ) {}

  async run<T>(fn: () => Promise<T>, label: string, signal?: AbortSignal): Promise<RetryOutcome<T>> {
    let phase: RetryPhase = 'attempting';
    let attempt = 0;
    let lastError: unknown;

    while (phase === 'attempting') {
      attempt += 1;
      try {
        const value = await fn();
        return { phase: 'succeeded', value, attempts: attempt };
      } catch (err) {
        lastError = err;
        const retriable = isRetryable(err);
        this.metrics.increment('retry.attempt_failed');
        this.logger.warn('retry attempt failed', {
          label,
          attempt,
          maxAttempts: this.policy.maxAttempts,
          retriable,
          err: errorMessage(err)
        });
        if (!retriable) {
          phase = 'failed';
        } else if (attempt >= this.policy.maxAttempts) {
          phase = 'exhausted';
        } else {
          phase = 'waiting';
        }
      }

      if (phase === 'waiting') {
        await this.time.sleep(backoffDelay(this.policy, attempt), signal);
        phase = signal?.aborted ? 'aborted' : 'attempting';
      }
    }

    if (phase === 'aborted') return { phase, attempts: attempt };
    if (phase === 'exhausted') this.metrics.increment('retry.exhausted');
    return { phase: phase === 'exhausted' ? 'exhausted' : 'failed', error: lastError, attempts: attempt };
  }
}
