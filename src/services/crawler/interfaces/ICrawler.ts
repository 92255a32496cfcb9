import { CrawlProgress, CrawlRunSummary, SeedEntry } from './types';

/**
 * Interface for crawler implementations that drive the whole pipeline.
 */
export interface ICrawler {
  /**
   * Run a crawl from the given seeds until the frontier drains or stop() is called
   */
  crawl(seeds: SeedEntry[]): Promise<CrawlRunSummary>;

  /**
   * Stop admitting work. In-flight items finish, then workers exit.
   */
  stop(): Promise<void>;

  /**
   * Hold workers before their next dequeue
   */
  pause(): Promise<void>;

  resume(): Promise<void>;

  getProgress(): CrawlProgress;
}
