import { EnqueueResult, FrontierCandidate, FrontierEntry, SeedEntry } from './types';

/**
 * Interface for the crawl frontier.
 * Implementations own the pending-work queue and the set of URLs ever admitted.
 * Admission and visited-set insertion form a single atomic step.
 */
export interface IUrlFrontier {
  /**
   * Register seed URLs: their domains become the allowed set and each is
   * admitted at depth 0 with no parent
   * @returns The admitted entries, in seed order
   */
  seed(seeds: SeedEntry[]): FrontierEntry[];

  /**
   * Admit a candidate if it passes dedup, depth, domain and volume policy
   */
  enqueue(candidate: FrontierCandidate): EnqueueResult;

  /**
   * Wait for the next entry. Resolves with null once the frontier is closed.
   */
  dequeue(): Promise<FrontierEntry | null>;

  /**
   * Mark a dequeued entry as finished. Closes the frontier when nothing is
   * queued, in flight or deferred.
   */
  complete(entry: FrontierEntry): void;

  /**
   * Put an in-flight entry back after a delay without touching the visited set.
   * The entry stops being in flight; it must not be completed afterwards.
   */
  defer(entry: FrontierEntry, delayMs: number): void;

  /**
   * Stop admitting work and release every waiting consumer.
   * Queued and deferred entries are dropped.
   * @returns Dropped entries that had already been attempted, so their
   * failures can still be recorded
   */
  close(): FrontierEntry[];

  isClosed(): boolean;

  isVisited(url: string): boolean;

  /** Number of queued entries */
  size(): number;

  /** Number of dequeued entries not yet completed */
  inFlight(): number;

  /** Number of entries waiting on a retry delay */
  deferredCount(): number;

  visitedCount(): number;
}
