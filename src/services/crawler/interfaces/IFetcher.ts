import { FetchResponse } from './types';

/**
 * A single HTTP client instance with its own connection pool.
 * Rejects with a FetchError carrying a classified kind.
 */
export interface IFetcher {
  readonly id: number;

  fetch(url: string, timeoutMs: number): Promise<FetchResponse>;

  /** Number of requests currently running on this client */
  activeRequests(): number;

  close(): Promise<void>;
}

/**
 * A fixed-size set of fetchers shared by all workers
 */
export interface IFetcherPool {
  fetch(url: string, timeoutMs: number): Promise<FetchResponse>;

  size(): number;

  close(): Promise<void>;

  getStats(): FetcherPoolStats;
}

export interface FetcherPoolStats {
  clients: number;
  active: number[];
  requests: number[];
}
