import { randomUUID } from 'crypto';
import { IUrlFrontier } from '../interfaces/IUrlFrontier';
import {
  EnqueueResult,
  FrontierCandidate,
  FrontierEntry,
  RejectionReason,
  SeedEntry
} from '../interfaces/types';
import { FrontierCorruptionError } from '../errors';
import { UrlUtils } from '../utils/UrlUtils';
import { LoggingUtils } from '../utils/LoggingUtils';

export interface FrontierOptions {
  maxDepth: number;
  maxPages: number;
  allowCrossDomain: boolean;
  stripTrailingSlash?: boolean;
  /** Reject URLs whose path repeats a segment more than twice. Defaults to true. */
  loopPrevention?: boolean;
  /** Id generator for admitted entries */
  idFactory?: () => string;
}

type Waiter = (entry: FrontierEntry | null) => void;

/**
 * In-memory crawl frontier.
 *
 * Every state change happens synchronously between awaits, so the
 * check-then-insert on the visited set cannot interleave with another
 * worker's. The frontier closes itself once nothing is queued, in flight or
 * waiting on a retry delay.
 */
export class InMemoryUrlFrontier implements IUrlFrontier {
  private queue: FrontierEntry[] = [];
  private readonly visited: Set<string> = new Set();
  private readonly allowedDomains: Set<string> = new Set();
  private readonly active: Map<string, FrontierEntry> = new Map();
  private readonly deferred: Map<string, { entry: FrontierEntry; timer: NodeJS.Timeout }> = new Map();
  private waiters: Waiter[] = [];
  private admitted = 0;
  private closed = false;
  private readonly rejections: Record<RejectionReason, number> = {
    duplicate: 0,
    depth: 0,
    domain: 0,
    max_pages: 0,
    loop: 0,
    closed: 0,
    invalid: 0
  };
  private readonly idFactory: () => string;
  private readonly logger = LoggingUtils.createTaggedLogger('frontier');

  constructor(private readonly options: FrontierOptions) {
    this.idFactory = options.idFactory ?? randomUUID;
  }

  seed(seeds: SeedEntry[]): FrontierEntry[] {
    for (const seed of seeds) {
      const normalizedUrl = this.normalize(seed.url);
      const domain = normalizedUrl ? UrlUtils.extractDomain(normalizedUrl) : null;
      if (domain) {
        this.allowedDomains.add(domain);
      }
    }

    const entries: FrontierEntry[] = [];
    for (const seed of seeds) {
      const result = this.enqueue({ url: seed.url, parentId: null, depth: 0 });
      if (result.admitted) {
        entries.push(result.entry);
      } else {
        this.logger.warn(`Seed ${seed.url} not admitted: ${result.reason}`);
      }
    }

    this.logger.info(`Seeded frontier with ${entries.length} of ${seeds.length} URLs`, {
      allowedDomains: Array.from(this.allowedDomains)
    });
    return entries;
  }

  enqueue(candidate: FrontierCandidate): EnqueueResult {
    const reason = this.admissionCheck(candidate);
    if (reason) {
      this.rejections[reason] += 1;
      return { admitted: false, reason };
    }

    // admissionCheck has proven the URL normalizes
    const url = this.normalize(candidate.url) ?? candidate.url;
    this.visited.add(url);
    this.admitted += 1;

    const entry: FrontierEntry = {
      id: this.idFactory(),
      url,
      parentId: candidate.parentId,
      depth: candidate.depth,
      discoveredAt: new Date(),
      attempts: 0
    };

    this.push(entry);
    this.logger.debug(`Admitted ${url} (depth: ${entry.depth})`);
    return { admitted: true, entry };
  }

  dequeue(): Promise<FrontierEntry | null> {
    const next = this.queue.shift();
    if (next) {
      this.active.set(next.id, next);
      return Promise.resolve(next);
    }

    if (this.closed || this.isDrained()) {
      this.close();
      return Promise.resolve(null);
    }

    return new Promise<FrontierEntry | null>(resolve => {
      this.waiters.push(resolve);
    });
  }

  complete(entry: FrontierEntry): void {
    if (!this.active.delete(entry.id)) {
      throw new FrontierCorruptionError(`Completed entry ${entry.id} (${entry.url}) was not in flight`);
    }

    if (this.isDrained()) {
      this.logger.debug('Frontier drained');
      this.close();
    }
  }

  defer(entry: FrontierEntry, delayMs: number): void {
    if (!this.active.delete(entry.id)) {
      throw new FrontierCorruptionError(`Deferred entry ${entry.id} (${entry.url}) was not in flight`);
    }
    if (this.closed) {
      return;
    }

    const timer = setTimeout(() => {
      this.deferred.delete(entry.id);
      if (!this.closed) {
        this.push(entry);
      }
    }, Math.max(0, delayMs));
    this.deferred.set(entry.id, { entry, timer });
  }

  close(): FrontierEntry[] {
    if (this.closed) {
      return [];
    }
    this.closed = true;

    const dropped = [...this.queue];
    for (const { entry, timer } of this.deferred.values()) {
      clearTimeout(timer);
      dropped.push(entry);
    }
    if (dropped.length > 0) {
      this.logger.info(`Frontier closed with ${this.queue.length} queued and ${this.deferred.size} deferred entries dropped`);
    }
    this.deferred.clear();
    this.queue = [];

    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      waiter(null);
    }

    return dropped.filter(entry => entry.attempts > 0);
  }

  isClosed(): boolean {
    return this.closed;
  }

  isVisited(url: string): boolean {
    const normalizedUrl = this.normalize(url);
    return normalizedUrl !== null && this.visited.has(normalizedUrl);
  }

  size(): number {
    return this.queue.length;
  }

  inFlight(): number {
    return this.active.size;
  }

  deferredCount(): number {
    return this.deferred.size;
  }

  visitedCount(): number {
    return this.visited.size;
  }

  admittedCount(): number {
    return this.admitted;
  }

  getRejections(): Readonly<Record<RejectionReason, number>> {
    return { ...this.rejections };
  }

  getAllowedDomains(): string[] {
    return Array.from(this.allowedDomains);
  }

  private admissionCheck(candidate: FrontierCandidate): RejectionReason | null {
    if (this.closed) {
      return 'closed';
    }

    const normalizedUrl = this.normalize(candidate.url);
    const domain = normalizedUrl ? UrlUtils.extractDomain(normalizedUrl) : null;
    if (!normalizedUrl || !domain) {
      return 'invalid';
    }
    if (this.visited.has(normalizedUrl)) {
      return 'duplicate';
    }
    if (candidate.depth > this.options.maxDepth) {
      return 'depth';
    }
    if (!this.options.allowCrossDomain && !this.allowedDomains.has(domain)) {
      return 'domain';
    }
    if ((this.options.loopPrevention ?? true) && UrlUtils.hasPathLoop(normalizedUrl)) {
      return 'loop';
    }
    if (this.admitted >= this.options.maxPages) {
      return 'max_pages';
    }
    return null;
  }

  private push(entry: FrontierEntry): void {
    if (!this.visited.has(entry.url)) {
      throw new FrontierCorruptionError(`Entry ${entry.url} reached the queue without being marked visited`);
    }

    const waiter = this.waiters.shift();
    if (waiter) {
      this.active.set(entry.id, entry);
      waiter(entry);
      return;
    }
    this.queue.push(entry);
  }

  private isDrained(): boolean {
    return this.queue.length === 0 && this.active.size === 0 && this.deferred.size === 0;
  }

  private normalize(url: string): string | null {
    return UrlUtils.normalize(url, { stripTrailingSlash: this.options.stripTrailingSlash ?? true });
  }
}
