#!/usr/bin/env node
/**
 * Crawl CLI
 *
 * Crawls from a seed file and/or URLs given on the command line and writes
 * page records and artifacts to the output directory.
 *
 * @example
 * ```
 * npm run crawl -- https://example.com --max-depth 2 --max-pages 50 --mode conservative
 * npm run crawl -- --seeds seeds.txt --output ./output --cross-domain
 * ```
 */

import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import logger from '../utils/logger';
import { loadConfig } from '../config';
import { CrawlerFactory } from '../services/crawler/factories/CrawlerFactory';
import { FileResultSink } from '../services/crawler/implementations/FileResultSink';
import { StaticSeedSource, TextFileSeedSource } from '../services/crawler/implementations/TextFileSeedSource';
import { PerformanceMode, SeedEntry } from '../services/crawler/interfaces/types';
import { LogLevel, LoggingUtils } from '../services/crawler/utils/LoggingUtils';
import { checkCrawlLimits } from './crawlOptions';

function isPerformanceMode(value: string): value is PerformanceMode {
  return Object.values<string>(PerformanceMode).includes(value);
}

async function loadSeeds(seedFile: string | undefined, urls: string[]): Promise<SeedEntry[]> {
  const seeds: SeedEntry[] = [];
  if (seedFile) {
    seeds.push(...await new TextFileSeedSource(seedFile).load());
  }
  seeds.push(...await new StaticSeedSource(urls).load());
  return seeds;
}

/**
 * Main function to parse arguments and run the crawl
 */
async function main(): Promise<void> {
  const config = loadConfig();

  // Filter out the '--' argument that npm adds when running as 'npm run crawl -- --args'
  const filteredArgs = hideBin(process.argv).filter(arg => arg !== '--');

  const argv = yargs(filteredArgs)
    .usage('Usage: $0 [urls..] [options]')
    .option('seeds', {
      type: 'string',
      describe: 'File with one seed URL per line'
    })
    .option('max-depth', {
      type: 'number',
      default: config.maxDepth,
      describe: 'Maximum link depth from a seed'
    })
    .option('max-pages', {
      type: 'number',
      default: config.maxPages,
      describe: 'Maximum number of pages admitted to the crawl'
    })
    .option('mode', {
      type: 'string',
      choices: Object.values(PerformanceMode),
      default: config.performanceMode,
      describe: 'Performance mode fixing worker and connection counts'
    })
    .option('cross-domain', {
      type: 'boolean',
      default: config.allowCrossDomain,
      describe: 'Follow links to domains other than the seeds\''
    })
    .option('output', {
      type: 'string',
      default: config.outputDir,
      describe: 'Directory for page records and artifacts'
    })
    .option('respect-robots-txt', {
      type: 'boolean',
      default: config.respectRobotsTxt,
      describe: 'Whether to respect robots.txt rules'
    })
    .option('loop-prevention', {
      type: 'boolean',
      default: config.loopPrevention,
      describe: 'Skip URLs whose path repeats a segment more than twice'
    })
    .option('verbose', {
      type: 'boolean',
      alias: 'v',
      default: false,
      describe: 'Enable more detailed logging'
    })
    .check(args => {
      if (!args.seeds && args._.length === 0) {
        throw new Error('Provide seed URLs or a --seeds file.');
      }
      return checkCrawlLimits(args);
    })
    .help()
    .alias('help', 'h')
    .parseSync();

  if (argv.verbose) {
    logger.level = 'debug';
    LoggingUtils.setLogLevel(LogLevel.DEBUG);
    logger.debug('Verbose logging enabled');
  } else {
    LoggingUtils.setLogLevel(LogLevel.INFO);
  }

  const seeds = await loadSeeds(argv.seeds, argv._.map(String));
  if (seeds.length === 0) {
    console.error('No valid seed URLs found.');
    process.exit(1);
  }

  // Presets are resolved in loadConfig, so a mode flag means loading again
  const mode = isPerformanceMode(argv.mode) ? argv.mode : config.performanceMode;
  const resolved = mode === config.performanceMode
    ? config
    : loadConfig({ ...process.env, CRAWL_PERFORMANCE_MODE: mode });
  const { outputDir, logLevel, ...options } = resolved;
  logger.debug(`Using ${mode} mode, default output ${outputDir}, log level ${logLevel}`);

  const crawler = CrawlerFactory.createCrawler(
    {
      ...options,
      maxDepth: argv['max-depth'],
      maxPages: argv['max-pages'],
      allowCrossDomain: argv['cross-domain'],
      respectRobotsTxt: argv['respect-robots-txt'],
      loopPrevention: argv['loop-prevention']
    },
    { sink: new FileResultSink(argv.output) }
  );

  process.once('SIGINT', () => {
    logger.info('Interrupted, finishing in-flight pages');
    crawler.stop().catch(error => logger.error('Failed to stop crawler:', error));
  });

  const summary = await crawler.crawl(seeds);

  console.log(`\nCrawl ${summary.runId} ${summary.state}`);
  console.log(`  Pages succeeded: ${summary.stats.pagesSucceeded}`);
  console.log(`  Pages failed: ${summary.stats.pagesFailed}`);
  console.log(`  Retries: ${summary.stats.retries}`);
  console.log(`  Circuit rejections: ${summary.stats.circuitRejections}`);
  console.log(`  Bytes stored: ${summary.stats.bytesStored}`);
  console.log(`  Duration: ${summary.finishedAt.getTime() - summary.startedAt.getTime()}ms`);
  for (const [domain, counts] of Object.entries(summary.stats.domains)) {
    console.log(`  ${domain}: ${counts.pagesSucceeded} ok, ${counts.pagesFailed} failed, ` +
      `${counts.circuitRejections} circuit rejections`);
  }
  console.log(`  Output: ${argv.output}`);
}

// Execute the main function
main().catch(error => {
  logger.error('Unhandled error in crawl script:', error);
  console.error(`Fatal error: ${error instanceof Error ? error.message : 'Unknown error'}`);
  process.exit(1);
});
