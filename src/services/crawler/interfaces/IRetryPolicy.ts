import { FetchErrorKind, RetryDecision } from './types';

/**
 * Decides whether a failed fetch is attempted again, and after how long
 */
export interface IRetryPolicy {
  /**
   * @param attempt Number of attempts made so far (1-based)
   * @param kind Classification of the last failure
   */
  shouldRetry(attempt: number, kind: FetchErrorKind): RetryDecision;

  isRetryable(kind: FetchErrorKind): boolean;

  readonly maxAttempts: number;
}
