/**
 * Retry Policy
 *
 * Bounded exponential backoff: delay before attempt n + 1 is
 * min(base * factor^(n - 1), max).
 */

import type { ExchangeError } from '../exchange/types.js';
import type { RetryPolicyConfig } from './types.js';

export const DEFAULT_RETRY_POLICY: RetryPolicyConfig = {
  maxAttempts: 3,
  backoffBaseMs: 500,
  backoffFactor: 2,
  backoffMaxMs: 5000,
};

export class RetryPolicy {
  private readonly config: RetryPolicyConfig;

  constructor(config: Partial<RetryPolicyConfig> = {}) {
    this.config = { ...DEFAULT_RETRY_POLICY, ...config };
  }

  get maxAttempts(): number {
    return this.config.maxAttempts;
  }

  /**
   * Delay to wait after the given (1-based) failed attempt
   */
  delayFor(attempt: number): number {
    const { backoffBaseMs, backoffFactor, backoffMaxMs } = this.config;
    return Math.min(backoffBaseMs * Math.pow(backoffFactor, attempt - 1), backoffMaxMs);
  }

  /**
   * Whether another attempt may follow the given failed attempt
   */
  shouldRetry(error: ExchangeError, attempt: number): boolean {
    return error.retriable && attempt < this.config.maxAttempts;
  }
}
