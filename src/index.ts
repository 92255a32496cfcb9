export * from './services/crawler/interfaces/types';
export * from './services/crawler/errors';
export type { ICrawler } from './services/crawler/interfaces/ICrawler';
export type { IUrlFrontier } from './services/crawler/interfaces/IUrlFrontier';
export type { IRateLimiter, RateLimiterStats } from './services/crawler/interfaces/IRateLimiter';
export type { IRetryPolicy } from './services/crawler/interfaces/IRetryPolicy';
export type { IFetcher, IFetcherPool, FetcherPoolStats } from './services/crawler/interfaces/IFetcher';
export type { IContentParser } from './services/crawler/interfaces/IContentParser';
export type { IResultSink } from './services/crawler/interfaces/IResultSink';
export type { ILineageTracker, ExpansionResult } from './services/crawler/interfaces/ILineageTracker';
export type { ISeedSource } from './services/crawler/interfaces/ISeedSource';
export type { IRobotsTxtService } from './services/crawler/interfaces/IRobotsTxtService';

export { BaseCrawler } from './services/crawler/implementations/BaseCrawler';
export { ConcurrentCrawler, CrawlerDependencies } from './services/crawler/implementations/ConcurrentCrawler';
export { InMemoryUrlFrontier, FrontierOptions } from './services/crawler/implementations/InMemoryUrlFrontier';
export { DomainRateLimiter, DomainRateLimiterOptions } from './services/crawler/implementations/DomainRateLimiter';
export { ExponentialBackoffRetryPolicy, RetryPolicyOptions } from './services/crawler/implementations/ExponentialBackoffRetryPolicy';
export { AxiosFetcher, AxiosFetcherOptions } from './services/crawler/implementations/AxiosFetcher';
export { FetcherPool } from './services/crawler/implementations/FetcherPool';
export { CheerioParser, CheerioParserOptions } from './services/crawler/implementations/CheerioParser';
export { LineageTracker, LineageTrackerOptions } from './services/crawler/implementations/LineageTracker';
export { InMemoryResultSink } from './services/crawler/implementations/InMemoryResultSink';
export { FileResultSink } from './services/crawler/implementations/FileResultSink';
export { TextFileSeedSource, StaticSeedSource } from './services/crawler/implementations/TextFileSeedSource';
export { RobotsTxtService, RobotsTxtServiceOptions } from './services/crawler/implementations/RobotsTxtService';
export { CrawlerFactory, CrawlerComponentOverrides } from './services/crawler/factories/CrawlerFactory';
export { UrlUtils } from './services/crawler/utils/UrlUtils';
export { LoggingUtils, LogLevel } from './services/crawler/utils/LoggingUtils';
export { loadConfig, CrawlerConfig, CrawlerConfigSchema } from './config';
export { getPerformanceSettings, PERFORMANCE_PRESETS, PerformanceSettings } from './config/performance';
