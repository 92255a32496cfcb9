import { IRateLimiter, RateLimiterStats } from '../interfaces/IRateLimiter';
import { AcquireResult, DomainState } from '../interfaces/types';
import { LoggingUtils } from '../utils/LoggingUtils';
import { DelayUtils } from '../utils/DelayUtils';

export interface DomainRateLimiterOptions {
  /** Minimum interval between requests to one domain, in milliseconds */
  defaultDelayMs: number;
  /** Consecutive failures that open a domain's circuit */
  failureThreshold: number;
  /** How long a freshly opened circuit stays open */
  cooldownMs: number;
  /** Upper bound for the cooldown after repeated failed probes */
  maxCooldownMs: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Per-domain pacing plus a failure-triggered circuit breaker.
 *
 * Slots are reserved synchronously: each caller takes the next free slot for
 * its domain and then sleeps until it, so concurrent callers for one domain
 * are spaced by the domain's delay while other domains are never delayed.
 *
 * Circuit: closed -> open after `failureThreshold` consecutive failures ->
 * half-open once the cooldown elapses (one probe is let through) -> closed on
 * probe success, open again with a doubled cooldown on probe failure.
 */
export class DomainRateLimiter implements IRateLimiter {
  private readonly domains: Map<string, DomainState> = new Map();
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly logger = LoggingUtils.createTaggedLogger('rate-limiter');

  constructor(private readonly options: DomainRateLimiterOptions) {
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? DelayUtils.delay;
    this.logger.info(`Initialized with default delay of ${options.defaultDelayMs}ms`, {
      failureThreshold: options.failureThreshold,
      cooldownMs: options.cooldownMs
    });
  }

  async acquire(domain: string): Promise<AcquireResult> {
    const state = this.getState(domain);
    const rejected = this.checkCircuit(state, false);
    if (rejected) {
      return rejected;
    }
    const holdsProbe = state.circuitState === 'half-open';

    const now = this.now();
    const slot = Math.max(now, state.nextAllowedTime);
    state.nextAllowedTime = slot + state.delayMs;

    const waitedMs = slot - now;
    if (waitedMs > 0) {
      this.logger.debug(`Pacing ${domain}, waiting ${waitedMs}ms`);
      await this.sleep(waitedMs);

      // The circuit may have opened while this caller waited for its slot
      const rejectedAfterWait = this.checkCircuit(state, holdsProbe);
      if (rejectedAfterWait) {
        this.logger.debug(`Dropping paced request to ${domain}, circuit is ${state.circuitState}`);
        return rejectedAfterWait;
      }
    }

    return { granted: true, waitedMs };
  }

  recordSuccess(domain: string): void {
    const state = this.getState(domain);
    state.consecutiveFailures = 0;

    if (state.circuitState !== 'closed') {
      this.logger.info(`Circuit for ${domain} closed after successful probe`);
    }
    state.circuitState = 'closed';
    state.circuitOpenUntil = 0;
    state.cooldownMs = this.options.cooldownMs;
    state.probeInFlight = false;
  }

  recordFailure(domain: string): void {
    const state = this.getState(domain);
    state.consecutiveFailures += 1;

    if (state.circuitState === 'half-open') {
      state.cooldownMs = Math.min(state.cooldownMs * 2, this.options.maxCooldownMs);
      this.open(state, 'probe failed');
      return;
    }

    if (state.circuitState === 'closed' && state.consecutiveFailures >= this.options.failureThreshold) {
      this.open(state, `${state.consecutiveFailures} consecutive failures`);
    }
  }

  setDelay(domain: string, delayMs: number): void {
    const state = this.getState(domain);
    if (state.delayMs !== delayMs) {
      this.logger.info(`Updating delay for ${domain} from ${state.delayMs}ms to ${delayMs}ms`);
      state.delayMs = delayMs;
    }
  }

  getDelay(domain: string): number {
    return this.domains.get(domain)?.delayMs ?? this.options.defaultDelayMs;
  }

  getDomainState(domain: string): DomainState | null {
    const state = this.domains.get(domain);
    return state ? { ...state } : null;
  }

  reset(): void {
    this.domains.clear();
    this.logger.info('Rate limiter reset');
  }

  getStats(): RateLimiterStats {
    const openCircuits: string[] = [];
    const halfOpenCircuits: string[] = [];

    this.domains.forEach((state, domain) => {
      if (state.circuitState === 'open') {
        openCircuits.push(domain);
      } else if (state.circuitState === 'half-open') {
        halfOpenCircuits.push(domain);
      }
    });

    return { domains: this.domains.size, openCircuits, halfOpenCircuits };
  }

  /**
   * Moves an expired open circuit to half-open and claims its single probe.
   * Returns the rejection when the caller may not go through.
   */
  private checkCircuit(state: DomainState, holdsProbe: boolean): AcquireResult | null {
    const now = this.now();

    if (state.circuitState === 'open') {
      if (now < state.circuitOpenUntil) {
        return { granted: false, reason: 'circuit_open', retryAfterMs: state.circuitOpenUntil - now };
      }
      state.circuitState = 'half-open';
      state.probeInFlight = false;
      this.logger.info(`Circuit for ${state.domain} half-open, allowing a probe`);
    }

    if (state.circuitState === 'half-open' && !holdsProbe) {
      if (state.probeInFlight) {
        return { granted: false, reason: 'circuit_open', retryAfterMs: state.delayMs };
      }
      state.probeInFlight = true;
    }

    return null;
  }

  private open(state: DomainState, why: string): void {
    state.circuitState = 'open';
    state.circuitOpenUntil = this.now() + state.cooldownMs;
    state.probeInFlight = false;
    this.logger.warn(`Circuit for ${state.domain} opened for ${state.cooldownMs}ms (${why})`);
  }

  private getState(domain: string): DomainState {
    let state = this.domains.get(domain);
    if (!state) {
      state = {
        domain,
        delayMs: this.options.defaultDelayMs,
        nextAllowedTime: 0,
        consecutiveFailures: 0,
        circuitState: 'closed',
        circuitOpenUntil: 0,
        cooldownMs: this.options.cooldownMs,
        probeInFlight: false
      };
      this.domains.set(domain, state);
      this.logger.debug(`Tracking new domain ${domain}`);
    }
    return state;
  }
}
