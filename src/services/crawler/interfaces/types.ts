/**
 * Common types and enums for the crawl engine
 */

/**
 * Named presets bundling worker/connection counts and pacing defaults
 */
export enum PerformanceMode {
  CONSERVATIVE = 'conservative',
  BALANCED = 'balanced',
  AGGRESSIVE = 'aggressive',
  MAXIMUM = 'maximum'
}

/**
 * Classification of everything that can go wrong with a single fetch attempt.
 * The retry policy is a pure function of this tag.
 */
export enum FetchErrorKind {
  TIMEOUT = 'timeout',
  NETWORK = 'network',
  SERVER_ERROR = 'server_error',
  RATE_LIMITED = 'rate_limited',
  CLIENT_ERROR = 'client_error',
  MALFORMED = 'malformed',
  PARSE_ERROR = 'parse_error',
  CIRCUIT_OPEN = 'circuit_open'
}

/**
 * Kinds of stored artifacts per page
 */
export enum ArtifactKind {
  RAW = 'raw',
  BODY = 'body',
  HEADERS = 'headers',
  METADATA = 'metadata'
}

export type ArtifactPaths = Partial<Record<ArtifactKind, string>>;

/**
 * Seed handed to the crawler by an input source
 */
export interface SeedEntry {
  url: string;
  metadata?: Record<string, string>;
}

/**
 * A unit of pending work. The id is assigned at admission and becomes the id
 * of the page record written for this URL.
 */
export interface FrontierEntry {
  id: string;
  url: string;
  parentId: string | null;
  depth: number;
  discoveredAt: Date;
  /** Number of fetch attempts already made for this entry */
  attempts: number;
  /** Outcome of the latest failed attempt, set while the entry waits for a retry */
  lastFailure?: FetchFailure;
}

export interface FetchFailure {
  kind: FetchErrorKind;
  statusCode: number | null;
}

/**
 * Candidate handed to the frontier for admission
 */
export interface FrontierCandidate {
  url: string;
  parentId: string | null;
  depth: number;
}

export type RejectionReason = 'duplicate' | 'depth' | 'domain' | 'max_pages' | 'loop' | 'closed' | 'invalid';

export type EnqueueResult =
  | { admitted: true; entry: FrontierEntry }
  | { admitted: false; reason: RejectionReason };

export type PageStatus = 'success' | 'failed';

/**
 * Persisted outcome of a terminated fetch (success or final failure)
 */
export interface PageRecord {
  id: string;
  url: string;
  parentId: string | null;
  domain: string;
  status: PageStatus;
  statusCode: number | null;
  depth: number;
  contentHash: string | null;
  title: string | null;
  metaDescription: string | null;
  contentType: string | null;
  contentLength: number;
  retryCount: number;
  lastError: string | null;
  scrapedAt: Date;
  artifactPaths: ArtifactPaths;
}

export type CircuitState = 'closed' | 'open' | 'half-open';

/**
 * Per-domain pacing and circuit breaker state
 */
export interface DomainState {
  domain: string;
  delayMs: number;
  nextAllowedTime: number;
  consecutiveFailures: number;
  circuitState: CircuitState;
  circuitOpenUntil: number;
  cooldownMs: number;
  probeInFlight: boolean;
}

export type AcquireResult =
  | { granted: true; waitedMs: number }
  | { granted: false; reason: 'circuit_open'; retryAfterMs: number };

export type RetryDecision =
  | { action: 'retry'; delayMs: number }
  | { action: 'give_up'; reason: 'terminal' | 'exhausted' };

/**
 * Successful HTTP exchange (any 2xx status)
 */
export interface FetchResponse {
  url: string;
  finalUrl: string;
  status: number;
  headers: Record<string, string>;
  contentType: string | null;
  body: Buffer;
  elapsedMs: number;
}

/**
 * Structured data extracted from a fetched body
 */
export interface ParsedPage {
  title: string | null;
  meta: Record<string, string>;
  textPreview: string;
  bodyText: string;
  headHtml: string;
  outboundLinks: string[];
}

/**
 * Recorded pages for one domain
 */
export interface DomainPageStats {
  pagesTotal: number;
  pagesSucceeded: number;
  pagesFailed: number;
  circuitRejections: number;
}

/**
 * Aggregate run counters. Never decremented.
 */
export interface RunStats {
  pagesFetched: number;
  pagesSucceeded: number;
  pagesFailed: number;
  bytesStored: number;
  retries: number;
  circuitRejections: number;
  policyRejections: number;
  domains: Record<string, DomainPageStats>;
}

/**
 * Options for a crawl run, resolved once at start
 */
export interface CrawlOptions {
  maxDepth: number;
  maxPages: number;
  allowCrossDomain: boolean;
  performanceMode: PerformanceMode;
  workerCount: number;
  connectionCount: number;
  rateLimitDelayMs: number;
  requestTimeoutMs: number;
  maxAttempts: number;
  backoffBaseMs: number;
  backoffCapMs: number;
  backoffJitterMs: number;
  failureThreshold: number;
  circuitCooldownMs: number;
  maxCircuitCooldownMs: number;
  userAgent: string;
  respectRobotsTxt: boolean;
  stripTrailingSlash: boolean;
  /** Reject URLs whose path repeats one segment more than twice */
  loopPrevention: boolean;
  maxContentBytes: number;
  statsIntervalMs: number;
}

/**
 * Crawl progress information
 */
export interface CrawlProgress {
  crawledUrls: number;
  failedUrls: number;
  pendingUrls: number;
  inFlight: number;
  totalUrls: number;
  percentage: number;
}

/**
 * Crawler state enum
 */
export enum CrawlerState {
  IDLE = 'IDLE',
  RUNNING = 'RUNNING',
  PAUSED = 'PAUSED',
  STOPPING = 'STOPPING',
  COMPLETED = 'COMPLETED',
  ERROR = 'ERROR'
}

export interface CrawlRunSummary {
  runId: string;
  state: CrawlerState;
  startedAt: Date;
  finishedAt: Date;
  stats: RunStats;
  error: string | null;
}
