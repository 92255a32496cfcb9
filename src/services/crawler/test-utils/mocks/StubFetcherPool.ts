import { FetcherPoolStats, IFetcherPool } from '../../interfaces/IFetcher';
import { FetchErrorKind, FetchResponse } from '../../interfaces/types';
import { FetchError } from '../../errors';

/**
 * What a stubbed URL answers with
 */
export type StubResponse =
  | { status?: number; body?: string; contentType?: string; headers?: Record<string, string> }
  | { error: FetchErrorKind };

/**
 * In-process stand-in for the fetcher pool.
 * A route given as an array answers with one element per call, repeating the
 * last one; unknown URLs answer 404.
 */
export class StubFetcherPool implements IFetcherPool {
  readonly calls: string[] = [];
  private readonly callCounts: Map<string, number> = new Map();
  private active = 0;
  private closed = false;

  constructor(private readonly routes: Record<string, StubResponse | StubResponse[]> = {}) {}

  route(url: string, response: StubResponse | StubResponse[]): this {
    this.routes[url] = response;
    return this;
  }

  async fetch(url: string, _timeoutMs: number): Promise<FetchResponse> {
    this.calls.push(url);
    const callIndex = this.callCounts.get(url) ?? 0;
    this.callCounts.set(url, callIndex + 1);

    this.active += 1;
    try {
      // Yield like a real request would
      await new Promise<void>(resolve => setImmediate(resolve));
      return this.respond(url, this.pick(url, callIndex));
    } finally {
      this.active -= 1;
    }
  }

  callsFor(url: string): number {
    return this.callCounts.get(url) ?? 0;
  }

  isClosed(): boolean {
    return this.closed;
  }

  size(): number {
    return 1;
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  getStats(): FetcherPoolStats {
    return { clients: 1, active: [this.active], requests: [this.calls.length] };
  }

  private pick(url: string, callIndex: number): StubResponse {
    const route = this.routes[url];
    if (!route) {
      return { status: 404, body: 'Not Found', contentType: 'text/plain' };
    }
    if (Array.isArray(route)) {
      return route[Math.min(callIndex, route.length - 1)];
    }
    return route;
  }

  private respond(url: string, response: StubResponse): FetchResponse {
    if ('error' in response) {
      throw new FetchError(url, response.error);
    }

    const status = response.status ?? 200;
    if (status < 200 || status > 299) {
      throw FetchError.fromStatus(url, status);
    }

    const contentType = response.contentType ?? 'text/html; charset=utf-8';
    return {
      url,
      finalUrl: url,
      status,
      headers: { 'content-type': contentType, ...response.headers },
      contentType,
      body: Buffer.from(response.body ?? ''),
      elapsedMs: 1
    };
  }
}

/**
 * Minimal HTML page linking to the given URLs
 */
export function htmlPage(title: string, links: string[] = []): StubResponse {
  const anchors = links.map(link => `<a href="${link}">${link}</a>`).join('\n');
  return {
    body: `<!DOCTYPE html><html><head><title>${title}</title></head><body><h1>${title}</h1>\n${anchors}</body></html>`
  };
}
