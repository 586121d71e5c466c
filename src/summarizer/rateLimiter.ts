import { Clock, Sleep, sleep } from './retry';

/**
 * Minimum spacing between outbound requests, measured from the completion
 * of the previous one. One instance is shared by every call site.
 */
export class RateLimiter {
  private lastCompletedAt?: number;

  constructor(
    private minDelayMs: number,
    private wait: Sleep = sleep,
    private now: Clock = Date.now
  ) {}

  async acquire(): Promise<void> {
    if (this.minDelayMs <= 0 || this.lastCompletedAt === undefined) return;
    const remaining = this.minDelayMs - (this.now() - this.lastCompletedAt);
    if (remaining > 0) {
      console.debug(`Sleeping ${remaining}ms to respect inter-request delay`);
      await this.wait(remaining);
    }
  }

  release(): void {
    this.lastCompletedAt = this.now();
  }

  async schedule<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }
}
