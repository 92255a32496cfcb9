import { ConcurrentCrawler } from '../ConcurrentCrawler';
import { InMemoryResultSink } from '../InMemoryResultSink';
import { CrawlerFactory } from '../../factories/CrawlerFactory';
import { StubFetcherPool, StubResponse, htmlPage } from '../../test-utils/mocks/StubFetcherPool';
import { SinkUnavailableError } from '../../errors';
import { CrawlOptions, CrawlerState, FetchErrorKind, PageRecord } from '../../interfaces/types';
import { ILineageTracker } from '../../interfaces/ILineageTracker';
import { IRateLimiter } from '../../interfaces/IRateLimiter';
import { IResultSink } from '../../interfaces/IResultSink';
import { mock } from 'jest-mock-extended';

interface TestCrawl {
  crawler: ConcurrentCrawler;
  sink: InMemoryResultSink;
  tracker: ILineageTracker;
  rateLimiter: IRateLimiter;
}

function createCrawl(
  pool: StubFetcherPool,
  options: Partial<CrawlOptions> = {},
  sink: InMemoryResultSink = new InMemoryResultSink()
): TestCrawl {
  const resolved = CrawlerFactory.resolveOptions({
    workerCount: 4,
    connectionCount: 1,
    rateLimitDelayMs: 0,
    backoffBaseMs: 1,
    backoffCapMs: 5,
    backoffJitterMs: 0,
    statsIntervalMs: 0,
    ...options
  });
  const components = CrawlerFactory.createComponents(resolved, { fetcherPool: pool, sink });
  return {
    crawler: new ConcurrentCrawler(components, resolved),
    sink,
    tracker: components.tracker,
    rateLimiter: components.rateLimiter
  };
}

function recordFor(sink: InMemoryResultSink, url: string): PageRecord {
  const [record] = sink.findByUrl(url);
  if (!record) {
    throw new Error(`no record for ${url}`);
  }
  return record;
}

describe('ConcurrentCrawler', () => {
  it('should follow same-domain links and drop cross-domain ones', async () => {
    const pool = new StubFetcherPool({
      'https://a.test/': htmlPage('Home', ['https://a.test/x', 'https://b.test/y']),
      'https://a.test/x': htmlPage('X', ['https://a.test/deeper'])
    });
    const { crawler, sink } = createCrawl(pool, { maxDepth: 1 });

    const summary = await crawler.crawl([{ url: 'https://a.test/' }]);

    expect(summary.state).toBe(CrawlerState.COMPLETED);
    expect(sink.getPages()).toHaveLength(2);
    const root = recordFor(sink, 'https://a.test/');
    const child = recordFor(sink, 'https://a.test/x');
    expect(root).toMatchObject({ parentId: null, depth: 0, status: 'success', title: 'Home' });
    expect(child).toMatchObject({ parentId: root.id, depth: 1, status: 'success', title: 'X' });
    expect(pool.calls).not.toContain('https://b.test/y');
    expect(pool.calls).not.toContain('https://a.test/deeper');
    expect(summary.stats).toMatchObject({ pagesFetched: 2, pagesSucceeded: 2, pagesFailed: 0, retries: 0 });
  });

  it('should follow links to other domains when cross-domain crawling is enabled', async () => {
    const pool = new StubFetcherPool({
      'https://a.test/': htmlPage('Home', ['https://b.test/y']),
      'https://b.test/y': htmlPage('Y')
    });
    const { crawler, sink } = createCrawl(pool, { maxDepth: 1, allowCrossDomain: true });

    await crawler.crawl([{ url: 'https://a.test/' }]);

    expect(recordFor(sink, 'https://b.test/y')).toMatchObject({
      parentId: recordFor(sink, 'https://a.test/').id,
      domain: 'b.test',
      depth: 1
    });
  });

  it('should record a link discovered by two pages exactly once', async () => {
    const pool = new StubFetcherPool({
      'https://a.test/p1': htmlPage('P1', ['https://a.test/z']),
      'https://a.test/p2': htmlPage('P2', ['https://a.test/z']),
      'https://a.test/z': htmlPage('Z')
    });
    const { crawler, sink, tracker } = createCrawl(pool);

    await crawler.crawl([{ url: 'https://a.test/p1' }, { url: 'https://a.test/p2' }]);

    const records = sink.findByUrl('https://a.test/z');
    expect(records).toHaveLength(1);
    const parentIds = [recordFor(sink, 'https://a.test/p1').id, recordFor(sink, 'https://a.test/p2').id];
    expect(parentIds).toContain(records[0].parentId);
    expect(tracker.getParent('https://a.test/z')).toBe(records[0].parentId);
    expect(pool.callsFor('https://a.test/z')).toBe(1);
  });

  it('should give up after the maximum number of timeouts', async () => {
    const pool = new StubFetcherPool({
      'https://c.test/': { error: FetchErrorKind.TIMEOUT }
    });
    const { crawler, sink } = createCrawl(pool, { maxAttempts: 3 });

    const summary = await crawler.crawl([{ url: 'https://c.test/' }]);

    expect(recordFor(sink, 'https://c.test/')).toMatchObject({
      status: 'failed',
      retryCount: 3,
      lastError: 'timeout',
      statusCode: null
    });
    expect(pool.callsFor('https://c.test/')).toBe(3);
    expect(summary.stats).toMatchObject({ retries: 2, pagesFailed: 1, pagesSucceeded: 0 });
  });

  it('should record a success after a transient failure', async () => {
    const pool = new StubFetcherPool({
      'https://a.test/': [{ error: FetchErrorKind.NETWORK }, { status: 503 }, htmlPage('Home')]
    });
    const { crawler, sink } = createCrawl(pool, { maxAttempts: 3 });

    await crawler.crawl([{ url: 'https://a.test/' }]);

    expect(recordFor(sink, 'https://a.test/')).toMatchObject({ status: 'success', retryCount: 3, lastError: null });
  });

  it('should not retry client errors', async () => {
    const pool = new StubFetcherPool({
      'https://a.test/': htmlPage('Home', ['https://a.test/missing'])
    });
    const { crawler, sink } = createCrawl(pool);

    await crawler.crawl([{ url: 'https://a.test/' }]);

    expect(recordFor(sink, 'https://a.test/missing')).toMatchObject({
      status: 'failed',
      statusCode: 404,
      retryCount: 1,
      lastError: 'client_error'
    });
    expect(pool.callsFor('https://a.test/missing')).toBe(1);
  });

  it('should record unparseable pages as successes without links', async () => {
    const pool = new StubFetcherPool({
      'https://a.test/': { body: '<html><a href="/x">x</a>\u0000</html>', contentType: 'text/html' }
    });
    const { crawler, sink } = createCrawl(pool);

    await crawler.crawl([{ url: 'https://a.test/' }]);

    expect(sink.getPages()).toHaveLength(1);
    expect(recordFor(sink, 'https://a.test/')).toMatchObject({ status: 'success', lastError: 'parse_error' });
  });

  it('should never record more than maxPages pages', async () => {
    const routes: Record<string, StubResponse> = {};
    const links = Array.from({ length: 10 }, (_, i) => `https://a.test/${i}`);
    routes['https://a.test/'] = htmlPage('Home', links);
    for (const link of links) {
      routes[link] = htmlPage(link, links.map(other => `${other}/sub`));
    }
    const pool = new StubFetcherPool(routes);
    const { crawler, sink } = createCrawl(pool, { maxPages: 5 });

    await crawler.crawl([{ url: 'https://a.test/' }]);

    expect(sink.getPages()).toHaveLength(5);
    expect(pool.calls).toHaveLength(5);
  });

  it('should keep lineage consistent across a larger site', async () => {
    const routes: Record<string, StubResponse> = {};
    const pageCount = 40;
    for (let i = 1; i <= pageCount; i++) {
      const children = [2 * i, 2 * i + 1, i + 1].filter(n => n <= pageCount);
      routes[`https://a.test/p${i}`] = htmlPage(`P${i}`, children.map(n => `https://a.test/p${n}`));
    }
    const pool = new StubFetcherPool(routes);
    const { crawler, sink } = createCrawl(pool, { maxDepth: 3, workerCount: 8 });

    await crawler.crawl([{ url: 'https://a.test/p1' }]);

    const pages = sink.getPages();
    const byId = new Map(pages.map(page => [page.id, page]));
    expect(new Set(pages.map(page => page.url)).size).toBe(pages.length);
    for (const page of pages) {
      expect(page.depth).toBeLessThanOrEqual(3);
      if (page.parentId === null) {
        expect(page.url).toBe('https://a.test/p1');
        continue;
      }
      const parent = byId.get(page.parentId);
      expect(parent).toBeDefined();
      expect(page.depth).toBe((parent?.depth ?? -1) + 1);
    }
  });

  it('should stop calling a domain once its circuit opens', async () => {
    const pool = new StubFetcherPool({
      'https://bad.test/1': { status: 503 },
      'https://bad.test/2': { status: 503 },
      'https://bad.test/3': { status: 503 },
      'https://good.test/': htmlPage('Good')
    });
    const { crawler, sink } = createCrawl(pool, {
      workerCount: 1,
      maxAttempts: 1,
      failureThreshold: 2,
      circuitCooldownMs: 60000
    });

    const summary = await crawler.crawl([
      { url: 'https://bad.test/1' },
      { url: 'https://bad.test/2' },
      { url: 'https://bad.test/3' },
      { url: 'https://good.test/' }
    ]);

    expect(pool.calls).toEqual(['https://bad.test/1', 'https://bad.test/2', 'https://good.test/']);
    expect(recordFor(sink, 'https://bad.test/2')).toMatchObject({ lastError: 'server_error', statusCode: 503 });
    expect(recordFor(sink, 'https://bad.test/3')).toMatchObject({
      status: 'failed',
      lastError: 'circuit_open',
      statusCode: null
    });
    expect(recordFor(sink, 'https://good.test/').status).toBe('success');
    expect(summary.stats.circuitRejections).toBe(1);
  });

  it('should reject paced requests whose domain circuit opened while they waited', async () => {
    const urls = [1, 2, 3, 4, 5, 6].map(n => `https://bad.test/${n}`);
    const routes: Record<string, StubResponse> = {};
    for (const url of urls) {
      routes[url] = { status: 503 };
    }
    const pool = new StubFetcherPool(routes);
    const { crawler, sink } = createCrawl(pool, {
      workerCount: 6,
      rateLimitDelayMs: 30,
      maxAttempts: 1,
      failureThreshold: 2,
      circuitCooldownMs: 60000
    });

    const summary = await crawler.crawl(urls.map(url => ({ url })));

    expect(pool.calls).toEqual(['https://bad.test/1', 'https://bad.test/2']);
    for (const url of urls.slice(2)) {
      expect(recordFor(sink, url)).toMatchObject({ status: 'failed', lastError: 'circuit_open' });
    }
    expect(summary.stats.circuitRejections).toBe(4);
    expect(summary.stats.domains['bad.test']).toEqual({
      pagesTotal: 6,
      pagesSucceeded: 0,
      pagesFailed: 6,
      circuitRejections: 4
    });
  });

  it('should send one trial request after the cooldown and close the circuit when it succeeds', async () => {
    const pool = new StubFetcherPool({
      'https://flaky.test/': [{ status: 503 }, htmlPage('Back')]
    });
    const { crawler, sink, rateLimiter } = createCrawl(pool, {
      workerCount: 1,
      maxAttempts: 5,
      failureThreshold: 1,
      circuitCooldownMs: 20,
      maxCircuitCooldownMs: 1000
    });

    const summary = await crawler.crawl([{ url: 'https://flaky.test/' }]);

    expect(pool.callsFor('https://flaky.test/')).toBe(2);
    expect(recordFor(sink, 'https://flaky.test/')).toMatchObject({ status: 'success', title: 'Back' });
    expect(summary.stats.circuitRejections).toBeGreaterThanOrEqual(1);
    expect(rateLimiter.getDomainState('flaky.test')).toMatchObject({
      circuitState: 'closed',
      cooldownMs: 20,
      consecutiveFailures: 0
    });
  });

  it('should reopen the circuit with a doubled cooldown when the trial request fails', async () => {
    const pool = new StubFetcherPool({ 'https://down.test/': { status: 503 } });
    const { crawler, sink, rateLimiter } = createCrawl(pool, {
      workerCount: 1,
      maxAttempts: 4,
      failureThreshold: 1,
      circuitCooldownMs: 20,
      maxCircuitCooldownMs: 1000
    });

    await crawler.crawl([{ url: 'https://down.test/' }]);

    expect(pool.callsFor('https://down.test/')).toBe(2);
    expect(recordFor(sink, 'https://down.test/')).toMatchObject({ status: 'failed', retryCount: 4 });
    expect(rateLimiter.getDomainState('down.test')).toMatchObject({
      circuitState: 'open',
      cooldownMs: 40
    });
  });

  it('should skip URLs disallowed by robots.txt when enabled', async () => {
    const pool = new StubFetcherPool({
      'https://a.test/robots.txt': { contentType: 'text/plain', body: 'User-agent: *\nDisallow: /private' },
      'https://a.test/': htmlPage('Home', ['https://a.test/private/page', 'https://a.test/public']),
      'https://a.test/public': htmlPage('Public'),
      'https://a.test/private/page': htmlPage('Private')
    });
    const { crawler, sink } = createCrawl(pool, { respectRobotsTxt: true });

    const summary = await crawler.crawl([{ url: 'https://a.test/' }]);

    expect(sink.getPages().map(page => page.url).sort()).toEqual(['https://a.test/', 'https://a.test/public']);
    expect(pool.calls).not.toContain('https://a.test/private/page');
    expect(summary.stats.policyRejections).toBe(1);
  });

  it('should abort when the sink cannot be initialized', async () => {
    const pool = new StubFetcherPool({ 'https://a.test/': htmlPage('Home') });
    const sink = mock<IResultSink>();
    sink.initialize.mockRejectedValue(new Error('read-only file system'));
    const options = CrawlerFactory.resolveOptions({ statsIntervalMs: 0 });
    const crawler = new ConcurrentCrawler(
      CrawlerFactory.createComponents(options, { fetcherPool: pool, sink }),
      options
    );

    await expect(crawler.crawl([{ url: 'https://a.test/' }])).rejects.toThrow(SinkUnavailableError);

    expect(pool.calls).toEqual([]);
    expect(pool.isClosed()).toBe(true);
    expect(sink.writePage).not.toHaveBeenCalled();
    expect(sink.close).toHaveBeenCalledTimes(1);
    expect(crawler.getSummary()).toMatchObject({ state: CrawlerState.ERROR });
    expect(crawler.getState()).toBe(CrawlerState.ERROR);
  });

  it('should count pages whose record cannot be written as failed and carry on', async () => {
    const pool = new StubFetcherPool({
      'https://a.test/': htmlPage('Home', ['https://a.test/x']),
      'https://a.test/x': htmlPage('X')
    });
    const sink = new InMemoryResultSink();
    const writePage = sink.writePage.bind(sink);
    jest.spyOn(sink, 'writePage').mockImplementation(async record => {
      if (record.url === 'https://a.test/x') {
        throw new Error('disk full');
      }
      await writePage(record);
    });
    const { crawler } = createCrawl(pool, {}, sink);

    const summary = await crawler.crawl([{ url: 'https://a.test/' }]);

    expect(summary.state).toBe(CrawlerState.COMPLETED);
    expect(summary.stats).toMatchObject({ pagesSucceeded: 1, pagesFailed: 1 });
    expect(sink.getPages().map(page => page.url)).toEqual(['https://a.test/']);
  });

  it('should finish the in-flight page and admit nothing after stop', async () => {
    const pool = new StubFetcherPool({
      'https://a.test/': htmlPage('Home', ['https://a.test/x']),
      'https://a.test/x': htmlPage('X')
    });
    const { crawler, sink } = createCrawl(pool);
    const fetch = pool.fetch.bind(pool);
    jest.spyOn(pool, 'fetch').mockImplementationOnce(async (url, timeoutMs) => {
      await crawler.stop();
      return fetch(url, timeoutMs);
    });

    const summary = await crawler.crawl([{ url: 'https://a.test/' }]);

    expect(summary.state).toBe(CrawlerState.COMPLETED);
    expect(sink.getPages().map(page => page.url)).toEqual(['https://a.test/']);
    expect(pool.calls).toEqual(['https://a.test/']);
  });

  it('should record a pending retry as failed when the crawl stops', async () => {
    const pool = new StubFetcherPool({
      'https://c.test/': { error: FetchErrorKind.TIMEOUT }
    });
    const { crawler, sink } = createCrawl(pool, { maxAttempts: 3, backoffBaseMs: 200, backoffCapMs: 1000 });
    setTimeout(async () => {
      await crawler.stop();
    }, 50);

    const summary = await crawler.crawl([{ url: 'https://c.test/' }]);

    expect(summary.state).toBe(CrawlerState.COMPLETED);
    expect(pool.calls).toEqual(['https://c.test/']);
    expect(recordFor(sink, 'https://c.test/')).toMatchObject({
      status: 'failed',
      retryCount: 1,
      lastError: 'timeout'
    });
    expect(summary.stats).toMatchObject({ pagesFailed: 1, retries: 1 });
    expect(crawler.getProgress().pendingUrls).toBe(0);
  });

  it('should hold workers while paused and continue after resume', async () => {
    const pool = new StubFetcherPool({
      'https://a.test/': htmlPage('Home', ['https://a.test/x']),
      'https://a.test/x': htmlPage('X')
    });
    const { crawler, sink } = createCrawl(pool, { workerCount: 1 });
    const whilePaused: { state?: CrawlerState; calls?: number } = {};
    const fetch = pool.fetch.bind(pool);
    jest.spyOn(pool, 'fetch').mockImplementationOnce(async (url, timeoutMs) => {
      await crawler.pause();
      setTimeout(async () => {
        whilePaused.state = crawler.getState();
        whilePaused.calls = pool.calls.length;
        await crawler.resume();
      }, 20);
      return fetch(url, timeoutMs);
    });

    const summary = await crawler.crawl([{ url: 'https://a.test/' }]);

    expect(whilePaused).toEqual({ state: CrawlerState.PAUSED, calls: 1 });
    expect(summary.state).toBe(CrawlerState.COMPLETED);
    expect(sink.getPages()).toHaveLength(2);
  });

  it('should hold workers already waiting for an entry while paused', async () => {
    const pool = new StubFetcherPool({
      'https://a.test/': htmlPage('Home', ['https://a.test/x']),
      'https://a.test/x': htmlPage('X')
    });
    const { crawler, sink } = createCrawl(pool, { workerCount: 2 });
    const whilePaused: { calls?: number } = {};
    const fetch = pool.fetch.bind(pool);
    jest.spyOn(pool, 'fetch').mockImplementationOnce(async (url, timeoutMs) => {
      await crawler.pause();
      setTimeout(async () => {
        whilePaused.calls = pool.calls.length;
        await crawler.resume();
      }, 20);
      return fetch(url, timeoutMs);
    });

    await crawler.crawl([{ url: 'https://a.test/' }]);

    expect(whilePaused).toEqual({ calls: 1 });
    expect(sink.getPages()).toHaveLength(2);
  });

  it('should skip links whose path keeps repeating a segment', async () => {
    const pool = new StubFetcherPool({
      'https://a.test/': htmlPage('Home', ['https://a.test/a/a/a', 'https://a.test/ok']),
      'https://a.test/ok': htmlPage('Ok')
    });
    const { crawler, sink } = createCrawl(pool);

    const summary = await crawler.crawl([{ url: 'https://a.test/' }]);

    expect(sink.getPages().map(page => page.url).sort()).toEqual(['https://a.test/', 'https://a.test/ok']);
    expect(pool.calls).not.toContain('https://a.test/a/a/a');
    expect(summary.stats.policyRejections).toBe(1);
    expect(summary.stats.domains).toEqual({
      'a.test': { pagesTotal: 2, pagesSucceeded: 2, pagesFailed: 0, circuitRejections: 0 }
    });
  });

  it('should report progress once the run is over', async () => {
    const pool = new StubFetcherPool({
      'https://a.test/': htmlPage('Home', ['https://a.test/missing'])
    });
    const { crawler } = createCrawl(pool);

    await crawler.crawl([{ url: 'https://a.test/' }]);

    expect(crawler.getProgress()).toEqual({
      crawledUrls: 1,
      failedUrls: 1,
      pendingUrls: 0,
      inFlight: 0,
      totalUrls: 2,
      percentage: 100
    });
  });

  it('should refuse to run twice', async () => {
    const pool = new StubFetcherPool({ 'https://a.test/': htmlPage('Home') });
    const { crawler } = createCrawl(pool);

    await crawler.crawl([{ url: 'https://a.test/' }]);

    await expect(crawler.crawl([{ url: 'https://a.test/' }])).rejects.toThrow('Cannot start a crawl');
  });
});
