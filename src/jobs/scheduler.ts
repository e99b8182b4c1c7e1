import { errorMessage } from '../core/errors.js';
import type { Logger } from '../core/logger.js';

/** Fixed-interval background tasks (status lines). Failures are logged, never thrown. */
export class Scheduler {
  private readonly timers = new Map<string, NodeJS.Timeout>();

  constructor(private readonly logger: Logger) {}

  add(name: string, everyMs: number, task: () => Promise<void> | void): void {
    this.cancel(name);
    const timer = setInterval(() => {
      void Promise.resolve()
        .then(task)
        .catch((err: unknown) => {
          this.logger.error('scheduled task failed', { name, err: errorMessage(err), stack: err instanceof Error ? err.stack : undefined });
        });
    }, everyMs);
    timer.unref();
    this.timers.set(name, timer);
    this.logger.debug('scheduled task registered', { name, everyMs });
  }

  cancel(name: string): boolean {
    const timer = this.timers.get(name);
    if (!timer) return false;
    clearInterval(timer);
    return this.timers.delete(name);
  }

  shutdown(): void {
    for (const timer of this.timers.values()) clearInterval(timer);
    this.timers.clear();
  }
}
