import * as dotenv from 'dotenv';
import { z } from 'zod';
import logger from '../utils/logger';
import { CrawlOptions, PerformanceMode } from '../services/crawler/interfaces/types';
import { ConfigurationError } from '../services/crawler/errors';
import { getPerformanceSettings } from './performance';

// Load environment variables always
const result = dotenv.config();
if (result.error) {
  logger.debug(`No .env file loaded: ${result.error.message}`);
} else {
  logger.debug('Environment variables loaded from .env file');
}

const envBoolean = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform(value => value === 'true' || value === '1' || value === 'yes');

const positiveInt = z.coerce.number().int().positive();
const nonNegativeInt = z.coerce.number().int().min(0);

export const CrawlerConfigSchema = z.object({
  CRAWL_MAX_DEPTH: nonNegativeInt.default(3),
  CRAWL_MAX_PAGES: positiveInt.default(100),
  CRAWL_ALLOW_CROSS_DOMAIN: envBoolean.default('false'),
  CRAWL_PERFORMANCE_MODE: z.nativeEnum(PerformanceMode).default(PerformanceMode.BALANCED),
  CRAWL_MAX_ATTEMPTS: positiveInt.default(3),
  CRAWL_BACKOFF_BASE_MS: nonNegativeInt.default(1000),
  CRAWL_BACKOFF_CAP_MS: nonNegativeInt.default(30000),
  CRAWL_BACKOFF_JITTER_MS: nonNegativeInt.default(1000),
  CRAWL_FAILURE_THRESHOLD: positiveInt.default(5),
  CRAWL_CIRCUIT_COOLDOWN_MS: nonNegativeInt.default(30000),
  CRAWL_MAX_CIRCUIT_COOLDOWN_MS: nonNegativeInt.default(300000),
  CRAWL_USER_AGENT: z.string().min(1).default('LineageCrawler/1.0'),
  CRAWL_RESPECT_ROBOTS_TXT: envBoolean.default('false'),
  CRAWL_STRIP_TRAILING_SLASH: envBoolean.default('true'),
  CRAWL_LOOP_PREVENTION: envBoolean.default('true'),
  CRAWL_MAX_CONTENT_BYTES: positiveInt.default(10 * 1024 * 1024),
  CRAWL_STATS_INTERVAL_MS: nonNegativeInt.default(30000),
  CRAWL_OUTPUT_DIR: z.string().min(1).default('./output'),
  MAX_WORKERS: positiveInt.optional(),
  FETCHER_POOL_SIZE: positiveInt.optional(),
  RATE_LIMIT_DELAY_MS: nonNegativeInt.optional(),
  REQUEST_TIMEOUT_MS: positiveInt.optional(),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info')
});

export interface CrawlerConfig extends CrawlOptions {
  outputDir: string;
  logLevel: string;
}

/**
 * Build the crawler configuration from environment variables.
 * Empty variables count as unset.
 *
 * @throws ConfigurationError listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): CrawlerConfig {
  const defined = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== '')
  );

  const parsed = CrawlerConfigSchema.safeParse(defined);
  if (!parsed.success) {
    const problems = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid crawler configuration: ${problems.join('; ')}`);
  }

  const vars = parsed.data;
  const performance = getPerformanceSettings(vars.CRAWL_PERFORMANCE_MODE, {
    workerCount: vars.MAX_WORKERS,
    connectionCount: vars.FETCHER_POOL_SIZE,
    rateLimitDelayMs: vars.RATE_LIMIT_DELAY_MS,
    requestTimeoutMs: vars.REQUEST_TIMEOUT_MS
  });

  return {
    maxDepth: vars.CRAWL_MAX_DEPTH,
    maxPages: vars.CRAWL_MAX_PAGES,
    allowCrossDomain: vars.CRAWL_ALLOW_CROSS_DOMAIN,
    performanceMode: vars.CRAWL_PERFORMANCE_MODE,
    ...performance,
    maxAttempts: vars.CRAWL_MAX_ATTEMPTS,
    backoffBaseMs: vars.CRAWL_BACKOFF_BASE_MS,
    backoffCapMs: vars.CRAWL_BACKOFF_CAP_MS,
    backoffJitterMs: vars.CRAWL_BACKOFF_JITTER_MS,
    failureThreshold: vars.CRAWL_FAILURE_THRESHOLD,
    circuitCooldownMs: vars.CRAWL_CIRCUIT_COOLDOWN_MS,
    maxCircuitCooldownMs: vars.CRAWL_MAX_CIRCUIT_COOLDOWN_MS,
    userAgent: vars.CRAWL_USER_AGENT,
    respectRobotsTxt: vars.CRAWL_RESPECT_ROBOTS_TXT,
    stripTrailingSlash: vars.CRAWL_STRIP_TRAILING_SLASH,
    loopPrevention: vars.CRAWL_LOOP_PREVENTION,
    maxContentBytes: vars.CRAWL_MAX_CONTENT_BYTES,
    statsIntervalMs: vars.CRAWL_STATS_INTERVAL_MS,
    outputDir: vars.CRAWL_OUTPUT_DIR,
    logLevel: vars.LOG_LEVEL
  };
}
