/**
 * Interface for robots.txt handling.
 * Implementations load and enforce robots.txt rules per domain.
 */
export interface IRobotsTxtService {
  /**
   * Check if a URL is allowed by the robots.txt rules of its host.
   * Rules are loaded on first use for each host.
   * @returns True if the URL is allowed, false if disallowed
   */
  isAllowed(url: string): Promise<boolean>;

  /**
   * Get the crawl delay the host's robots.txt specified for our user agent
   * @returns The crawl delay in milliseconds, or null if not specified or not loaded
   */
  getCrawlDelay(domain: string): number | null;

  reset(): void;
}
