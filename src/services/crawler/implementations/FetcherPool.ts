import { FetcherPoolStats, IFetcher, IFetcherPool } from '../interfaces/IFetcher';
import { FetchResponse } from '../interfaces/types';
import { LoggingUtils } from '../utils/LoggingUtils';

/**
 * Fixed-size set of independent HTTP clients.
 * Each request goes to the least busy client; ties rotate round-robin so idle
 * clients share the load evenly.
 */
export class FetcherPool implements IFetcherPool {
  private readonly fetchers: IFetcher[];
  private readonly requestCounts: number[];
  private cursor = 0;
  private readonly logger = LoggingUtils.createTaggedLogger('fetcher');

  /**
   * @param size Number of clients to create
   * @param factory Builds the client for a given slot index
   */
  constructor(size: number, factory: (index: number) => IFetcher) {
    if (!Number.isInteger(size) || size < 1) {
      throw new RangeError(`Fetcher pool size must be a positive integer, got ${size}`);
    }
    this.fetchers = Array.from({ length: size }, (_, index) => factory(index));
    this.requestCounts = new Array<number>(size).fill(0);
    this.logger.info(`Initialized fetcher pool with ${size} clients`);
  }

  fetch(url: string, timeoutMs: number): Promise<FetchResponse> {
    const index = this.pick();
    this.requestCounts[index] += 1;
    return this.fetchers[index].fetch(url, timeoutMs);
  }

  size(): number {
    return this.fetchers.length;
  }

  async close(): Promise<void> {
    await Promise.all(this.fetchers.map(fetcher => fetcher.close()));
    this.logger.debug('Fetcher pool closed');
  }

  getStats(): FetcherPoolStats {
    return {
      clients: this.fetchers.length,
      active: this.fetchers.map(fetcher => fetcher.activeRequests()),
      requests: [...this.requestCounts]
    };
  }

  private pick(): number {
    const count = this.fetchers.length;
    let best = this.cursor;
    let bestLoad = Number.POSITIVE_INFINITY;

    for (let offset = 0; offset < count; offset++) {
      const index = (this.cursor + offset) % count;
      const load = this.fetchers[index].activeRequests();
      if (load < bestLoad) {
        best = index;
        bestLoad = load;
      }
    }

    this.cursor = (best + 1) % count;
    return best;
  }
}
