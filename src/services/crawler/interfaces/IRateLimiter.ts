import { AcquireResult, DomainState } from './types';

/**
 * Interface defining the contract for per-domain rate limiting with a
 * failure-triggered circuit breaker
 */
export interface IRateLimiter {
  /**
   * Wait until a request to the domain is permitted.
   * Fails fast, without waiting, while the domain's circuit is open.
   * @param domain The domain to acquire a slot for
   */
  acquire(domain: string): Promise<AcquireResult>;

  /**
   * Report a successful exchange with the domain
   */
  recordSuccess(domain: string): void;

  /**
   * Report a transient failure against the domain
   */
  recordFailure(domain: string): void;

  /**
   * Sets the minimum interval between requests for a specific domain
   * @param delayMs Interval in milliseconds
   */
  setDelay(domain: string, delayMs: number): void;

  getDelay(domain: string): number;

  /**
   * Snapshot of the domain's state, or null if the domain was never seen
   */
  getDomainState(domain: string): DomainState | null;

  /**
   * Resets all rate limiting information
   */
  reset(): void;

  getStats(): RateLimiterStats;
}

export interface RateLimiterStats {
  domains: number;
  openCircuits: string[];
  halfOpenCircuits: string[];
}
