import { DomainRateLimiter, DomainRateLimiterOptions } from '../DomainRateLimiter';

describe('DomainRateLimiter', () => {
  let now: number;
  let sleeps: number[];

  function createLimiter(options: Partial<DomainRateLimiterOptions> = {}): DomainRateLimiter {
    return new DomainRateLimiter({
      defaultDelayMs: 1000,
      failureThreshold: 3,
      cooldownMs: 5000,
      maxCooldownMs: 12000,
      now: () => now,
      sleep: async (ms: number) => {
        sleeps.push(ms);
      },
      ...options
    });
  }

  beforeEach(() => {
    now = 100000;
    sleeps = [];
  });

  describe('acquire', () => {
    it('should grant the first request to a domain without waiting', async () => {
      const limiter = createLimiter();

      await expect(limiter.acquire('a.test')).resolves.toEqual({ granted: true, waitedMs: 0 });
      expect(sleeps).toEqual([]);
    });

    it('should space concurrent requests to one domain by the delay', async () => {
      const limiter = createLimiter();

      const results = await Promise.all([
        limiter.acquire('a.test'),
        limiter.acquire('a.test'),
        limiter.acquire('a.test')
      ]);

      expect(results).toEqual([
        { granted: true, waitedMs: 0 },
        { granted: true, waitedMs: 1000 },
        { granted: true, waitedMs: 2000 }
      ]);
      expect(sleeps).toEqual([1000, 2000]);
    });

    it('should not delay other domains', async () => {
      const limiter = createLimiter();

      await limiter.acquire('a.test');
      await expect(limiter.acquire('b.test')).resolves.toEqual({ granted: true, waitedMs: 0 });
    });

    it('should not wait once the interval has passed', async () => {
      const limiter = createLimiter();

      await limiter.acquire('a.test');
      now += 1500;
      await expect(limiter.acquire('a.test')).resolves.toEqual({ granted: true, waitedMs: 0 });
    });

    it('should use a per-domain delay when set', async () => {
      const limiter = createLimiter();
      limiter.setDelay('slow.test', 3000);

      await limiter.acquire('slow.test');
      await expect(limiter.acquire('slow.test')).resolves.toEqual({ granted: true, waitedMs: 3000 });
      expect(limiter.getDelay('slow.test')).toBe(3000);
      expect(limiter.getDelay('other.test')).toBe(1000);
    });
  });

  describe('circuit breaker', () => {
    it('should open after the failure threshold and fail fast', async () => {
      const limiter = createLimiter();

      limiter.recordFailure('a.test');
      limiter.recordFailure('a.test');
      expect(limiter.getDomainState('a.test')?.circuitState).toBe('closed');

      limiter.recordFailure('a.test');
      expect(limiter.getDomainState('a.test')?.circuitState).toBe('open');

      now += 1000;
      await expect(limiter.acquire('a.test')).resolves.toEqual({
        granted: false,
        reason: 'circuit_open',
        retryAfterMs: 4000
      });
      expect(limiter.getStats().openCircuits).toEqual(['a.test']);
    });

    it('should reset the failure count on success', () => {
      const limiter = createLimiter();

      limiter.recordFailure('a.test');
      limiter.recordFailure('a.test');
      limiter.recordSuccess('a.test');
      limiter.recordFailure('a.test');

      expect(limiter.getDomainState('a.test')).toMatchObject({ consecutiveFailures: 1, circuitState: 'closed' });
    });

    it('should let a single trial request through after the cooldown', async () => {
      const limiter = createLimiter({ defaultDelayMs: 0 });
      for (let i = 0; i < 3; i++) {
        limiter.recordFailure('a.test');
      }

      now += 5000;
      await expect(limiter.acquire('a.test')).resolves.toEqual({ granted: true, waitedMs: 0 });
      expect(limiter.getDomainState('a.test')?.circuitState).toBe('half-open');

      const second = await limiter.acquire('a.test');
      expect(second.granted).toBe(false);
    });

    it('should close the circuit when the trial request succeeds', async () => {
      const limiter = createLimiter();
      for (let i = 0; i < 3; i++) {
        limiter.recordFailure('a.test');
      }
      now += 5000;
      await limiter.acquire('a.test');

      limiter.recordSuccess('a.test');

      expect(limiter.getDomainState('a.test')).toMatchObject({
        circuitState: 'closed',
        consecutiveFailures: 0,
        cooldownMs: 5000
      });
    });

    it('should reopen with a doubled, capped cooldown when the trial request fails', async () => {
      const limiter = createLimiter();
      for (let i = 0; i < 3; i++) {
        limiter.recordFailure('a.test');
      }

      now += 5000;
      await limiter.acquire('a.test');
      limiter.recordFailure('a.test');
      expect(limiter.getDomainState('a.test')).toMatchObject({ circuitState: 'open', cooldownMs: 10000 });
      expect(limiter.getDomainState('a.test')?.circuitOpenUntil).toBe(now + 10000);

      now += 10000;
      await limiter.acquire('a.test');
      limiter.recordFailure('a.test');
      expect(limiter.getDomainState('a.test')).toMatchObject({ circuitState: 'open', cooldownMs: 12000 });
    });

    it('should reject paced requests when the circuit opens while they wait', async () => {
      const releases: Array<() => void> = [];
      const limiter = createLimiter({
        sleep: (ms: number) => new Promise<void>(resolve => {
          sleeps.push(ms);
          releases.push(resolve);
        })
      });

      await expect(limiter.acquire('a.test')).resolves.toEqual({ granted: true, waitedMs: 0 });
      const waiting = [limiter.acquire('a.test'), limiter.acquire('a.test')];
      expect(sleeps).toEqual([1000, 2000]);

      for (let i = 0; i < 3; i++) {
        limiter.recordFailure('a.test');
      }
      releases.forEach(release => release());

      await expect(Promise.all(waiting)).resolves.toEqual([
        { granted: false, reason: 'circuit_open', retryAfterMs: 5000 },
        { granted: false, reason: 'circuit_open', retryAfterMs: 5000 }
      ]);
    });

    it('should let the trial request through after its pacing wait', async () => {
      const limiter = createLimiter();
      limiter.setDelay('a.test', 8000);
      await limiter.acquire('a.test');
      for (let i = 0; i < 3; i++) {
        limiter.recordFailure('a.test');
      }

      now += 5000;
      const trial = await limiter.acquire('a.test');

      expect(trial).toEqual({ granted: true, waitedMs: 3000 });
      expect(sleeps).toEqual([3000]);
      expect(limiter.getDomainState('a.test')).toMatchObject({ circuitState: 'half-open', probeInFlight: true });
    });

    it('should keep other domains closed', async () => {
      const limiter = createLimiter();
      for (let i = 0; i < 3; i++) {
        limiter.recordFailure('bad.test');
      }

      await expect(limiter.acquire('good.test')).resolves.toEqual({ granted: true, waitedMs: 0 });
    });
  });

  describe('state', () => {
    it('should return copies of domain state', async () => {
      const limiter = createLimiter();
      await limiter.acquire('a.test');

      const state = limiter.getDomainState('a.test');
      if (state) {
        state.consecutiveFailures = 99;
      }
      expect(limiter.getDomainState('a.test')?.consecutiveFailures).toBe(0);
    });

    it('should forget all domains on reset', async () => {
      const limiter = createLimiter();
      await limiter.acquire('a.test');

      limiter.reset();
      expect(limiter.getDomainState('a.test')).toBeNull();
      expect(limiter.getStats().domains).toBe(0);
    });
  });
});
