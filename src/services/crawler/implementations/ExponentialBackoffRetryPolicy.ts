import { IRetryPolicy } from '../interfaces/IRetryPolicy';
import { FetchErrorKind, RetryDecision } from '../interfaces/types';
import { DelayUtils } from '../utils/DelayUtils';

export interface RetryPolicyOptions {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  jitterMs: number;
  random?: () => number;
}

const RETRYABLE_KINDS: ReadonlySet<FetchErrorKind> = new Set([
  FetchErrorKind.TIMEOUT,
  FetchErrorKind.NETWORK,
  FetchErrorKind.SERVER_ERROR,
  FetchErrorKind.RATE_LIMITED,
  FetchErrorKind.CIRCUIT_OPEN
]);

/**
 * Bounded retries with capped exponential backoff and additive jitter.
 * The delay after attempt n is `min(cap, base * 2^(n-1)) + uniform(0, jitter)`.
 */
export class ExponentialBackoffRetryPolicy implements IRetryPolicy {
  readonly maxAttempts: number;
  private readonly random: () => number;

  constructor(private readonly options: RetryPolicyOptions) {
    this.maxAttempts = Math.max(1, options.maxAttempts);
    this.random = options.random ?? Math.random;
  }

  shouldRetry(attempt: number, kind: FetchErrorKind): RetryDecision {
    if (!this.isRetryable(kind)) {
      return { action: 'give_up', reason: 'terminal' };
    }
    if (attempt >= this.maxAttempts) {
      return { action: 'give_up', reason: 'exhausted' };
    }

    const delayMs = DelayUtils.exponentialBackoff(
      Math.max(0, attempt - 1),
      this.options.baseDelayMs,
      this.options.maxDelayMs,
      this.options.jitterMs,
      this.random
    );
    return { action: 'retry', delayMs };
  }

  isRetryable(kind: FetchErrorKind): boolean {
    return RETRYABLE_KINDS.has(kind);
  }
}
