export interface CrawlLimitArgs {
  'max-depth': number;
  'max-pages': number;
}

/**
 * yargs check for the numeric crawl limits. yargs turns a non-numeric value
 * into NaN, which would disable every limit comparison.
 *
 * @throws Error naming the first invalid flag
 */
export function checkCrawlLimits(args: CrawlLimitArgs): true {
  const depth = args['max-depth'];
  if (!Number.isInteger(depth) || depth < 0) {
    throw new Error(`--max-depth must be a non-negative integer, got ${depth}`);
  }

  const pages = args['max-pages'];
  if (!Number.isInteger(pages) || pages < 1) {
    throw new Error(`--max-pages must be a positive integer, got ${pages}`);
  }

  return true;
}
