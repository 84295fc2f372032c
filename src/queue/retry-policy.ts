import type { RetryConfig } from './config.js';

export class RetryPolicy {
  constructor(private readonly config: RetryConfig) {
    if (!Number.isInteger(config.maxAttempts) || config.maxAttempts < 1) {
      throw new Error('maxAttempts must be a positive integer');
    }
    if (config.delayMs < 0 || config.maxDelayMs < 0) {
      throw new Error('retry delays must not be negative');
    }
  }

  get maxAttempts(): number {
    return this.config.maxAttempts;
  }

  canRetry(attemptCount: number): boolean {
    return attemptCount < this.config.maxAttempts;
  }

  /** Delay before the attempt following `attemptCount` failed attempts. */
  delayFor(attemptCount: number): number {
    if (this.config.backoff === 'fixed') {
      return this.config.delayMs;
    }
    const exponent = Math.max(0, attemptCount - 1);
    return Math.min(this.config.maxDelayMs, this.config.delayMs * 2 ** exponent);
  }
}
