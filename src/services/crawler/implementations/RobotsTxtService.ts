import robotsParser from 'robots-parser';
import { IRobotsTxtService } from '../interfaces/IRobotsTxtService';
import { IFetcherPool } from '../interfaces/IFetcher';
import { IRateLimiter } from '../interfaces/IRateLimiter';
import { IRetryPolicy } from '../interfaces/IRetryPolicy';
import { FetchErrorKind } from '../interfaces/types';
import { FetchError, errorMessage } from '../errors';
import { UrlUtils } from '../utils/UrlUtils';
import { LoggingUtils } from '../utils/LoggingUtils';

type Robot = ReturnType<typeof robotsParser>;

interface HostRules {
  robot: Robot | null;
  crawlDelayMs: number | null;
}

export interface RobotsTxtServiceOptions {
  userAgent: string;
  timeoutMs: number;
  /** Called once per host when its robots.txt declares a crawl delay */
  onCrawlDelay?: (domain: string, delayMs: number) => void;
  /**
   * Pace robots.txt requests like page requests. The outcome feeds the
   * domain's circuit, and an open circuit rejects the load.
   */
  pacing?: {
    rateLimiter: IRateLimiter;
    retryPolicy: IRetryPolicy;
  };
}

/**
 * Per-host robots.txt rules, loaded lazily through the fetcher pool.
 * A missing or unreadable robots.txt allows everything. A load rejected by an
 * open circuit is not cached; isAllowed throws a circuit_open FetchError and
 * the next call tries again.
 */
export class RobotsTxtService implements IRobotsTxtService {
  private readonly hosts: Map<string, Promise<HostRules>> = new Map();
  private readonly delays: Map<string, number> = new Map();
  private readonly logger = LoggingUtils.createTaggedLogger('robots');

  constructor(
    private readonly fetcherPool: IFetcherPool,
    private readonly options: RobotsTxtServiceOptions
  ) {}

  async isAllowed(url: string): Promise<boolean> {
    const origin = UrlUtils.getRootUrl(url);
    const domain = UrlUtils.extractDomain(url);
    if (!origin || !domain) {
      return true;
    }

    let rules = this.hosts.get(domain);
    if (!rules) {
      rules = this.load(origin, domain);
      this.hosts.set(domain, rules);
    }

    let loaded: HostRules;
    try {
      loaded = await rules;
    } catch (error) {
      if (this.hosts.get(domain) === rules) {
        this.hosts.delete(domain);
      }
      throw error;
    }

    const { robot } = loaded;
    if (!robot) {
      return true;
    }
    return robot.isAllowed(url, this.options.userAgent) !== false;
  }

  getCrawlDelay(domain: string): number | null {
    return this.delays.get(domain) ?? null;
  }

  reset(): void {
    this.hosts.clear();
    this.delays.clear();
  }

  private async load(origin: string, domain: string): Promise<HostRules> {
    const robotsUrl = `${origin}/robots.txt`;
    const pacing = this.options.pacing;

    if (pacing) {
      const permit = await pacing.rateLimiter.acquire(domain);
      if (!permit.granted) {
        throw new FetchError(robotsUrl, FetchErrorKind.CIRCUIT_OPEN, `Circuit open for ${domain}, robots.txt not loaded`);
      }
    }

    this.logger.info(`Loading robots.txt from ${robotsUrl}`);
    let body: string;
    try {
      const response = await this.fetcherPool.fetch(robotsUrl, this.options.timeoutMs);
      pacing?.rateLimiter.recordSuccess(domain);
      body = response.body.toString('utf-8');
    } catch (error) {
      if (pacing) {
        const fetchError = FetchError.from(error, robotsUrl);
        if (pacing.retryPolicy.isRetryable(fetchError.kind)) {
          pacing.rateLimiter.recordFailure(domain);
        } else {
          pacing.rateLimiter.recordSuccess(domain);
        }
      }
      this.logger.warn(`No usable robots.txt at ${robotsUrl}, allowing all: ${errorMessage(error)}`);
      return { robot: null, crawlDelayMs: null };
    }

    const robot = robotsParser(robotsUrl, body);
    const crawlDelay = robot.getCrawlDelay(this.options.userAgent);
    const crawlDelayMs = typeof crawlDelay === 'number' ? crawlDelay * 1000 : null;

    if (crawlDelayMs !== null) {
      this.delays.set(domain, crawlDelayMs);
      this.options.onCrawlDelay?.(domain, crawlDelayMs);
      this.logger.info(`Found crawl delay for ${domain}: ${crawlDelayMs}ms`);
    }
    return { robot, crawlDelayMs };
  }
}
