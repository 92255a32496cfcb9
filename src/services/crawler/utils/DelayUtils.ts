/**
 * Utilities for managing delays and timeouts in the crawler service
 */
export class DelayUtils {
  /**
   * Creates a promise that resolves after the specified delay
   * @param ms The number of milliseconds to delay
   */
  public static delay(ms: number): Promise<void> {
    if (ms <= 0) {
      return Promise.resolve();
    }
    return new Promise<void>(resolve => setTimeout(resolve, ms));
  }

  /**
   * Exponential backoff with additive jitter:
   * `min(cap, base * 2^exponent) + uniform(0, jitter)`
   * @param exponent Zero-based exponent (attempt index)
   * @param random Source of uniform values in [0, 1)
   */
  static exponentialBackoff(
    exponent: number,
    baseDelay = 1000,
    maxDelay = 30000,
    jitterWindow = 0,
    random: () => number = Math.random
  ): number {
    const delay = Math.min(maxDelay, baseDelay * Math.pow(2, exponent));
    const jitter = random() * jitterWindow;

    return delay + jitter;
  }

  /**
   * Executes a function with a deadline. The function receives an AbortSignal
   * that fires when the deadline passes, so the underlying work is cancelled
   * rather than left running.
   * @param onTimeout Builds the error to reject with at the deadline
   */
  static async withTimeout<T>(
    fn: (signal: AbortSignal) => Promise<T>,
    timeoutMs: number,
    onTimeout: () => Error = () => new Error('Operation timed out')
  ): Promise<T> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;

    const deadline = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(onTimeout());
      }, timeoutMs);
    });

    try {
      return await Promise.race([fn(controller.signal), deadline]);
    } finally {
      clearTimeout(timer);
    }
  }
}
