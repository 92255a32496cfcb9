import { randomUUID } from 'crypto';
import { BaseCrawler, createRunStats } from './BaseCrawler';
import { IUrlFrontier } from '../interfaces/IUrlFrontier';
import { IRateLimiter } from '../interfaces/IRateLimiter';
import { IRetryPolicy } from '../interfaces/IRetryPolicy';
import { IFetcherPool } from '../interfaces/IFetcher';
import { IContentParser } from '../interfaces/IContentParser';
import { IResultSink } from '../interfaces/IResultSink';
import { ILineageTracker } from '../interfaces/ILineageTracker';
import { IRobotsTxtService } from '../interfaces/IRobotsTxtService';
import {
  CrawlOptions,
  CrawlRunSummary,
  CrawlerState,
  DomainPageStats,
  FetchErrorKind,
  FetchResponse,
  FrontierEntry,
  ParsedPage,
  RejectionReason,
  SeedEntry
} from '../interfaces/types';
import { CrawlerError, FetchError, SinkUnavailableError, errorMessage } from '../errors';
import { UrlUtils } from '../utils/UrlUtils';

type StepOutcome = 'done' | 'deferred';

export interface CrawlerDependencies {
  frontier: IUrlFrontier;
  rateLimiter: IRateLimiter;
  retryPolicy: IRetryPolicy;
  fetcherPool: IFetcherPool;
  parser: IContentParser;
  sink: IResultSink;
  tracker: ILineageTracker;
  /** Only consulted when respectRobotsTxt is set */
  robotsTxtService?: IRobotsTxtService;
}

/**
 * Crawler running a fixed pool of workers over a shared frontier.
 *
 * Each worker loops: dequeue, pace through the domain's rate limiter, fetch,
 * parse, record and expand. Failed fetches are either deferred back into the
 * frontier for a later attempt or recorded as terminal failures. The run ends
 * when the frontier reaches its fixed point (nothing queued, in flight or
 * deferred) or when stop() closes it.
 */
export class ConcurrentCrawler extends BaseCrawler {
  private readonly rateLimiter: IRateLimiter;
  private readonly retryPolicy: IRetryPolicy;
  private readonly fetcherPool: IFetcherPool;
  private readonly parser: IContentParser;
  private readonly sink: IResultSink;
  private readonly tracker: ILineageTracker;
  private readonly robotsTxtService: IRobotsTxtService | null;
  private runError: Error | null = null;
  private statsTimer: NodeJS.Timeout | null = null;

  constructor(dependencies: CrawlerDependencies, options: CrawlOptions) {
    super(dependencies.frontier, options);
    this.rateLimiter = dependencies.rateLimiter;
    this.retryPolicy = dependencies.retryPolicy;
    this.fetcherPool = dependencies.fetcherPool;
    this.parser = dependencies.parser;
    this.sink = dependencies.sink;
    this.tracker = dependencies.tracker;
    this.robotsTxtService = options.respectRobotsTxt ? dependencies.robotsTxtService ?? null : null;
  }

  async crawl(seeds: SeedEntry[]): Promise<CrawlRunSummary> {
    if (this.state !== CrawlerState.IDLE) {
      throw new Error(`Cannot start a crawl in state: ${this.state}`);
    }

    const runId = randomUUID();
    const startedAt = new Date();
    this.state = CrawlerState.RUNNING;
    this.stats = createRunStats();
    this.runError = null;
    this.abandoned = [];

    this.logger.info(`Starting crawl ${runId} with ${seeds.length} seeds`, {
      workers: this.options.workerCount,
      connections: this.options.connectionCount,
      maxDepth: this.options.maxDepth,
      maxPages: this.options.maxPages,
      mode: this.options.performanceMode
    });

    try {
      await this.initializeSink();
      this.frontier.seed(seeds);
      this.startStatsReporter();

      const workers = Array.from({ length: Math.max(1, this.options.workerCount) }, (_, index) =>
        this.runWorker(index)
      );
      await Promise.all(workers);
      await this.recordAbandoned();
    } catch (error) {
      this.abort(error);
    } finally {
      this.stopStatsReporter();
      await this.shutdown();
    }

    const error = this.failure();
    this.state = error ? CrawlerState.ERROR : CrawlerState.COMPLETED;
    this.summary = {
      runId,
      state: this.state,
      startedAt,
      finishedAt: new Date(),
      stats: this.getStats(),
      error: error ? error.message : null
    };

    if (error) {
      this.logger.error(`Crawl ${runId} failed: ${error.message}`, { stats: this.summary.stats });
      throw error;
    }

    this.logger.info(`Crawl ${runId} completed`, { stats: this.summary.stats });
    return this.summary;
  }

  private async runWorker(workerId: number): Promise<void> {
    this.logger.debug(`Worker ${workerId} started`);

    while (!this.runError) {
      await this.waitWhilePaused();

      const entry = await this.frontier.dequeue();
      if (!entry) {
        break;
      }
      // A paused run may still hand out entries to workers already waiting on the frontier
      await this.waitWhilePaused();

      try {
        const outcome = await this.processEntry(entry);
        if (outcome === 'done') {
          this.frontier.complete(entry);
        }
      } catch (error) {
        this.abort(error);
      }
    }

    this.logger.debug(`Worker ${workerId} finished`);
  }

  /**
   * One worker step for one entry. Only fatal errors escape.
   */
  private async processEntry(entry: FrontierEntry): Promise<StepOutcome> {
    const attempt = entry.attempts + 1;
    const domain = UrlUtils.extractDomain(entry.url) ?? entry.url;

    if (this.robotsTxtService) {
      let allowed: boolean;
      try {
        allowed = await this.robotsTxtService.isAllowed(entry.url);
      } catch (error) {
        if (!(error instanceof FetchError) || error.kind !== FetchErrorKind.CIRCUIT_OPEN) {
          throw error;
        }
        this.countCircuitRejection(domain);
        return this.handleFailure(entry, attempt, new FetchError(entry.url, error.kind, error.message), 0);
      }
      if (!allowed) {
        this.stats.policyRejections += 1;
        this.logger.info(`URL ${entry.url} disallowed by robots.txt`);
        return 'done';
      }
    }

    const permit = await this.rateLimiter.acquire(domain);
    if (!permit.granted) {
      this.countCircuitRejection(domain);
      const error = new FetchError(entry.url, FetchErrorKind.CIRCUIT_OPEN, `Circuit open for ${domain}`);
      return this.handleFailure(entry, attempt, error, permit.retryAfterMs);
    }

    let response: FetchResponse;
    try {
      response = await this.fetcherPool.fetch(entry.url, this.options.requestTimeoutMs);
    } catch (error) {
      const fetchError = FetchError.from(error, entry.url);
      // Terminal answers still prove the domain is reachable
      if (this.retryPolicy.isRetryable(fetchError.kind)) {
        this.rateLimiter.recordFailure(domain);
      } else {
        this.rateLimiter.recordSuccess(domain);
      }
      this.logger.debug(`Attempt ${attempt} for ${entry.url} failed: ${fetchError.kind}`);
      return this.handleFailure(entry, attempt, fetchError, 0);
    }

    this.stats.pagesFetched += 1;
    this.rateLimiter.recordSuccess(domain);

    const parsed = this.parse(entry, response);
    try {
      const result = await this.tracker.recordSuccess(entry, response, parsed, attempt);
      this.stats.pagesSucceeded += 1;
      this.countPage(domain, 'succeeded');
      this.stats.bytesStored += result.bytesStored;
      this.stats.policyRejections += this.countPolicyRejections(result.rejected);
    } catch (error) {
      this.handleRecordError(entry, error);
    }
    return 'done';
  }

  private async handleFailure(
    entry: FrontierEntry,
    attempt: number,
    error: FetchError,
    minDelayMs: number
  ): Promise<StepOutcome> {
    const decision = this.retryPolicy.shouldRetry(attempt, error.kind);

    if (decision.action === 'retry' && !this.frontier.isClosed()) {
      const delayMs = Math.max(decision.delayMs, minDelayMs);
      this.stats.retries += 1;
      this.logger.debug(`Retrying ${entry.url} in ${delayMs}ms (attempt ${attempt} of ${this.retryPolicy.maxAttempts})`);
      this.frontier.defer({
        ...entry,
        attempts: attempt,
        lastFailure: { kind: error.kind, statusCode: error.statusCode }
      }, delayMs);
      return 'deferred';
    }

    this.logger.warn(`Giving up on ${entry.url} after ${attempt} attempts: ${error.kind}`);
    await this.recordFailure(entry, attempt, error);
    return 'done';
  }

  private async recordFailure(entry: FrontierEntry, attempts: number, error: FetchError): Promise<void> {
    try {
      await this.tracker.recordFailure(entry, attempts, error);
      this.stats.pagesFailed += 1;
      this.countPage(UrlUtils.extractDomain(entry.url) ?? entry.url, 'failed');
    } catch (recordError) {
      this.handleRecordError(entry, recordError);
    }
  }

  /**
   * Entries that stop() dropped while they waited for a retry end as failures
   * carrying their last error
   */
  private async recordAbandoned(): Promise<void> {
    const entries = this.abandoned;
    this.abandoned = [];

    for (const entry of entries) {
      if (this.failure()) {
        return;
      }
      const failure = entry.lastFailure ?? { kind: FetchErrorKind.NETWORK, statusCode: null };
      const error = new FetchError(
        entry.url,
        failure.kind,
        `Crawl stopped before retrying ${entry.url}`,
        failure.statusCode
      );
      this.logger.info(`Recording ${entry.url} as failed after ${entry.attempts} attempts: crawl stopped`);
      await this.recordFailure(entry, entry.attempts, error);
    }
  }

  /**
   * A page that could not be written counts as failed; the run goes on
   * unless the error is fatal.
   */
  private handleRecordError(entry: FrontierEntry, error: unknown): void {
    if (error instanceof CrawlerError && error.isFatal) {
      throw error;
    }
    this.stats.pagesFailed += 1;
    this.countPage(UrlUtils.extractDomain(entry.url) ?? entry.url, 'failed');
    this.logger.error(`Could not record ${entry.url}: ${errorMessage(error)}`);
  }

  private countPage(domain: string, outcome: 'succeeded' | 'failed'): void {
    const counts = this.domainStats(domain);
    counts.pagesTotal += 1;
    if (outcome === 'succeeded') {
      counts.pagesSucceeded += 1;
    } else {
      counts.pagesFailed += 1;
    }
  }

  private countCircuitRejection(domain: string): void {
    this.stats.circuitRejections += 1;
    this.domainStats(domain).circuitRejections += 1;
  }

  private domainStats(domain: string): DomainPageStats {
    let counts = this.stats.domains[domain];
    if (!counts) {
      counts = { pagesTotal: 0, pagesSucceeded: 0, pagesFailed: 0, circuitRejections: 0 };
      this.stats.domains[domain] = counts;
    }
    return counts;
  }

  private parse(entry: FrontierEntry, response: FetchResponse): ParsedPage | null {
    try {
      return this.parser.parse(response.body, response.contentType, response.finalUrl);
    } catch (error) {
      this.logger.warn(`Failed to parse ${entry.url}: ${errorMessage(error)}`);
      return null;
    }
  }

  private countPolicyRejections(rejected: Partial<Record<RejectionReason, number>>): number {
    return (rejected.depth ?? 0) + (rejected.domain ?? 0) + (rejected.max_pages ?? 0) + (rejected.loop ?? 0);
  }

  private async initializeSink(): Promise<void> {
    try {
      await this.sink.initialize();
    } catch (error) {
      if (error instanceof SinkUnavailableError) {
        throw error;
      }
      throw new SinkUnavailableError(`Result sink unavailable: ${errorMessage(error)}`);
    }
  }

  /**
   * The fatal error of the run, if any. Read through a method so callers are
   * not narrowed by the reset at the start of crawl().
   */
  private failure(): Error | null {
    return this.runError;
  }

  private abort(error: unknown): void {
    if (!this.runError) {
      this.runError = error instanceof Error ? error : new Error(String(error));
      this.logger.error(this.runError);
    }
    this.frontier.close();
  }

  private async shutdown(): Promise<void> {
    const closers: Array<[string, () => Promise<void>]> = [
      ['fetcher pool', () => this.fetcherPool.close()],
      ['result sink', () => this.sink.close()]
    ];

    for (const [name, close] of closers) {
      try {
        await close();
      } catch (error) {
        this.logger.error(`Failed to close ${name}: ${errorMessage(error)}`);
        this.runError = this.runError ?? (error instanceof Error ? error : new Error(String(error)));
      }
    }
  }

  private startStatsReporter(): void {
    if (this.options.statsIntervalMs <= 0) {
      return;
    }
    this.statsTimer = setInterval(() => {
      const progress = this.getProgress();
      this.logger.info(
        `Progress: ${progress.crawledUrls} ok, ${progress.failedUrls} failed, ` +
        `${progress.pendingUrls} pending, ${progress.inFlight} in flight`,
        { stats: this.getStats(), limiter: this.rateLimiter.getStats() }
      );
    }, this.options.statsIntervalMs);
    this.statsTimer.unref();
  }

  private stopStatsReporter(): void {
    if (this.statsTimer) {
      clearInterval(this.statsTimer);
      this.statsTimer = null;
    }
  }
}
