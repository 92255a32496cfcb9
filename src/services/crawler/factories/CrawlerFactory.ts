import { CrawlerDependencies, ConcurrentCrawler } from '../implementations/ConcurrentCrawler';
import { InMemoryUrlFrontier } from '../implementations/InMemoryUrlFrontier';
import { DomainRateLimiter } from '../implementations/DomainRateLimiter';
import { ExponentialBackoffRetryPolicy } from '../implementations/ExponentialBackoffRetryPolicy';
import { FetcherPool } from '../implementations/FetcherPool';
import { AxiosFetcher } from '../implementations/AxiosFetcher';
import { CheerioParser } from '../implementations/CheerioParser';
import { InMemoryResultSink } from '../implementations/InMemoryResultSink';
import { LineageTracker } from '../implementations/LineageTracker';
import { RobotsTxtService } from '../implementations/RobotsTxtService';
import { IFetcherPool } from '../interfaces/IFetcher';
import { CrawlOptions, PerformanceMode } from '../interfaces/types';
import { getPerformanceSettings } from '../../../config/performance';
import { LoggingUtils } from '../utils/LoggingUtils';

/**
 * Collaborators that can be swapped out when building a crawler.
 * The frontier, tracker and robots service are always built here since they
 * are wired to each other.
 */
export type CrawlerComponentOverrides = Partial<
  Pick<CrawlerDependencies, 'rateLimiter' | 'retryPolicy' | 'fetcherPool' | 'parser' | 'sink'>
>;

/**
 * Factory wiring the crawl engine's services for one run.
 * Everything built here is fixed for the lifetime of the crawler.
 */
export class CrawlerFactory {
  private static readonly logger = LoggingUtils.createTaggedLogger('factory');

  /**
   * Fill in defaults for everything not given, using the performance mode's
   * preset for concurrency and pacing
   */
  static resolveOptions(options: Partial<CrawlOptions> = {}): CrawlOptions {
    const performanceMode = options.performanceMode ?? PerformanceMode.BALANCED;
    const performance = getPerformanceSettings(performanceMode, {
      workerCount: options.workerCount,
      connectionCount: options.connectionCount,
      rateLimitDelayMs: options.rateLimitDelayMs,
      requestTimeoutMs: options.requestTimeoutMs
    });

    return {
      maxDepth: 3,
      maxPages: 100,
      allowCrossDomain: false,
      maxAttempts: 3,
      backoffBaseMs: 1000,
      backoffCapMs: 30000,
      backoffJitterMs: 1000,
      failureThreshold: 5,
      circuitCooldownMs: 30000,
      maxCircuitCooldownMs: 300000,
      userAgent: 'LineageCrawler/1.0',
      respectRobotsTxt: false,
      stripTrailingSlash: true,
      loopPrevention: true,
      maxContentBytes: 10 * 1024 * 1024,
      statsIntervalMs: 30000,
      ...options,
      performanceMode,
      ...performance
    };
  }

  static createFetcherPool(options: CrawlOptions): IFetcherPool {
    return new FetcherPool(options.connectionCount, index => new AxiosFetcher(index, {
      userAgent: options.userAgent,
      maxContentBytes: options.maxContentBytes,
      // Spread the workers' sockets across the pool's clients
      maxSocketsPerHost: Math.max(1, Math.ceil(options.workerCount / options.connectionCount))
    }));
  }

  static createComponents(options: CrawlOptions, overrides: CrawlerComponentOverrides = {}): CrawlerDependencies {
    const frontier = new InMemoryUrlFrontier({
      maxDepth: options.maxDepth,
      maxPages: options.maxPages,
      allowCrossDomain: options.allowCrossDomain,
      stripTrailingSlash: options.stripTrailingSlash,
      loopPrevention: options.loopPrevention
    });

    const rateLimiter = overrides.rateLimiter ?? new DomainRateLimiter({
      defaultDelayMs: options.rateLimitDelayMs,
      failureThreshold: options.failureThreshold,
      cooldownMs: options.circuitCooldownMs,
      maxCooldownMs: options.maxCircuitCooldownMs
    });

    const retryPolicy = overrides.retryPolicy ?? new ExponentialBackoffRetryPolicy({
      maxAttempts: options.maxAttempts,
      baseDelayMs: options.backoffBaseMs,
      maxDelayMs: options.backoffCapMs,
      jitterMs: options.backoffJitterMs
    });

    const fetcherPool = overrides.fetcherPool ?? CrawlerFactory.createFetcherPool(options);
    const parser = overrides.parser ?? new CheerioParser();
    const sink = overrides.sink ?? new InMemoryResultSink();
    const tracker = new LineageTracker(frontier, sink, {
      maxDepth: options.maxDepth,
      stripTrailingSlash: options.stripTrailingSlash
    });

    const robotsTxtService = options.respectRobotsTxt
      ? new RobotsTxtService(fetcherPool, {
        userAgent: options.userAgent,
        timeoutMs: options.requestTimeoutMs,
        pacing: { rateLimiter, retryPolicy },
        onCrawlDelay: (domain, delayMs) => {
          rateLimiter.setDelay(domain, Math.max(delayMs, options.rateLimitDelayMs));
        }
      })
      : undefined;

    return { frontier, rateLimiter, retryPolicy, fetcherPool, parser, sink, tracker, robotsTxtService };
  }

  static createCrawler(options: Partial<CrawlOptions> = {}, overrides: CrawlerComponentOverrides = {}): ConcurrentCrawler {
    const resolved = CrawlerFactory.resolveOptions(options);
    CrawlerFactory.logger.debug('Creating crawler', {
      mode: resolved.performanceMode,
      workers: resolved.workerCount,
      connections: resolved.connectionCount
    });
    return new ConcurrentCrawler(CrawlerFactory.createComponents(resolved, overrides), resolved);
  }
}
