import { ICrawler } from '../interfaces/ICrawler';
import { IUrlFrontier } from '../interfaces/IUrlFrontier';
import {
  CrawlOptions,
  CrawlProgress,
  CrawlRunSummary,
  CrawlerState,
  FrontierEntry,
  RunStats,
  SeedEntry
} from '../interfaces/types';
import { LoggingUtils } from '../utils/LoggingUtils';

export function createRunStats(): RunStats {
  return {
    pagesFetched: 0,
    pagesSucceeded: 0,
    pagesFailed: 0,
    bytesStored: 0,
    retries: 0,
    circuitRejections: 0,
    policyRejections: 0,
    domains: {}
  };
}

/**
 * Abstract base class for crawler implementations
 * Provides run state, pause/stop control and progress reporting
 */
export abstract class BaseCrawler implements ICrawler {
  protected state: CrawlerState = CrawlerState.IDLE;
  protected stats: RunStats = createRunStats();
  protected summary: CrawlRunSummary | null = null;
  protected logger = LoggingUtils.createTaggedLogger('crawler');
  /** Attempted entries dropped from the frontier by stop(), still owed a record */
  protected abandoned: FrontierEntry[] = [];
  private pauseGate: Promise<void> | null = null;
  private releasePause: (() => void) | null = null;

  /**
   * @param frontier Frontier shared by all workers of the run
   * @param options Resolved options for the run
   */
  constructor(
    protected readonly frontier: IUrlFrontier,
    protected readonly options: CrawlOptions
  ) {}

  abstract crawl(seeds: SeedEntry[]): Promise<CrawlRunSummary>;

  /**
   * Stop the current crawl. Workers finish the item they hold and exit.
   * Cannot be resumed after stopping.
   */
  async stop(): Promise<void> {
    if (this.state === CrawlerState.RUNNING || this.state === CrawlerState.PAUSED) {
      this.logger.info('Stopping crawler');
      this.state = CrawlerState.STOPPING;
      this.abandoned.push(...this.frontier.close());
      this.openPauseGate();
    } else {
      this.logger.warn(`Cannot stop crawler in state: ${this.state}`);
    }
  }

  /**
   * Pause the current crawl. Workers hold before fetching their next entry.
   */
  async pause(): Promise<void> {
    if (this.state === CrawlerState.RUNNING) {
      this.logger.info('Pausing crawler');
      this.state = CrawlerState.PAUSED;
      this.pauseGate = new Promise<void>(resolve => {
        this.releasePause = resolve;
      });
    } else {
      this.logger.warn(`Cannot pause crawler in state: ${this.state}`);
    }
  }

  async resume(): Promise<void> {
    if (this.state === CrawlerState.PAUSED) {
      this.logger.info('Resuming crawler');
      this.state = CrawlerState.RUNNING;
      this.openPauseGate();
    } else {
      this.logger.warn(`Cannot resume crawler in state: ${this.state}`);
    }
  }

  /**
   * Get the current progress of the crawl
   *
   * @returns Progress information including completion percentage
   */
  getProgress(): CrawlProgress {
    const crawledUrls = this.stats.pagesSucceeded;
    const failedUrls = this.stats.pagesFailed;
    const totalUrls = this.frontier.visitedCount();
    const percentage = totalUrls > 0 ? ((crawledUrls + failedUrls) / totalUrls) * 100 : 0;

    return {
      crawledUrls,
      failedUrls,
      pendingUrls: this.frontier.size() + this.frontier.deferredCount(),
      inFlight: this.frontier.inFlight(),
      totalUrls,
      percentage: Math.min(percentage, 100)
    };
  }

  getState(): CrawlerState {
    return this.state;
  }

  /**
   * Snapshot of the run counters
   */
  getStats(): RunStats {
    const domains: RunStats['domains'] = {};
    for (const [domain, counts] of Object.entries(this.stats.domains)) {
      domains[domain] = { ...counts };
    }
    return { ...this.stats, domains };
  }

  /**
   * Summary of the last finished run, including runs that ended in a fatal error
   */
  getSummary(): CrawlRunSummary | null {
    return this.summary;
  }

  protected async waitWhilePaused(): Promise<void> {
    while (this.pauseGate) {
      await this.pauseGate;
    }
  }

  private openPauseGate(): void {
    const release = this.releasePause;
    this.pauseGate = null;
    this.releasePause = null;
    release?.();
  }
}
