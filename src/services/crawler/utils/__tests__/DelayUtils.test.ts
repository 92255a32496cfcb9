import { DelayUtils } from '../DelayUtils';

describe('DelayUtils', () => {
  describe('exponentialBackoff', () => {
    it('should double the delay per exponent', () => {
      const noJitter = () => 0;
      expect(DelayUtils.exponentialBackoff(0, 100, 10000, 0, noJitter)).toBe(100);
      expect(DelayUtils.exponentialBackoff(1, 100, 10000, 0, noJitter)).toBe(200);
      expect(DelayUtils.exponentialBackoff(3, 100, 10000, 0, noJitter)).toBe(800);
    });

    it('should cap the delay before adding jitter', () => {
      expect(DelayUtils.exponentialBackoff(10, 100, 1000, 500, () => 0.5)).toBe(1250);
    });

    it('should stay within the jitter window', () => {
      for (let i = 0; i < 50; i++) {
        const delay = DelayUtils.exponentialBackoff(2, 100, 10000, 100);
        expect(delay).toBeGreaterThanOrEqual(400);
        expect(delay).toBeLessThan(500);
      }
    });
  });

  describe('delay', () => {
    it('should resolve immediately for non-positive delays', async () => {
      await expect(DelayUtils.delay(0)).resolves.toBeUndefined();
      await expect(DelayUtils.delay(-5)).resolves.toBeUndefined();
    });
  });

  describe('withTimeout', () => {
    it('should resolve with the function result before the deadline', async () => {
      await expect(DelayUtils.withTimeout(async () => 'done', 1000)).resolves.toBe('done');
    });

    it('should reject with the timeout error and abort the signal', async () => {
      const seen: { signal?: AbortSignal } = {};
      const pending = DelayUtils.withTimeout(
        signal => {
          seen.signal = signal;
          return new Promise<string>(() => undefined);
        },
        10,
        () => new Error('too slow')
      );

      await expect(pending).rejects.toThrow('too slow');
      expect(seen.signal?.aborted).toBe(true);
    });
  });
});
