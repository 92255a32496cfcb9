import { URL } from 'url';

const DEFAULT_PORTS: Record<string, string> = {
  'http:': '80',
  'https:': '443'
};

export interface NormalizeOptions {
  stripTrailingSlash?: boolean;
}

/**
 * Utilities for handling URLs in the crawler service
 */
export class UrlUtils {
  /**
   * Normalizes a URL: lowercases scheme and host, drops the fragment and the
   * default port, and optionally strips trailing slashes from a non-root path
   * @returns The normalized URL, or null if it is not an absolute http(s) URL
   */
  static normalize(url: string, options: NormalizeOptions = {}): string | null {
    const { stripTrailingSlash = true } = options;

    let parsedUrl: URL;
    try {
      parsedUrl = new URL(url.trim());
    } catch {
      return null;
    }

    if (!(parsedUrl.protocol in DEFAULT_PORTS)) {
      return null;
    }

    // WHATWG URL already lowercases protocol and hostname
    parsedUrl.hash = '';
    if (parsedUrl.port === DEFAULT_PORTS[parsedUrl.protocol]) {
      parsedUrl.port = '';
    }

    if (stripTrailingSlash && parsedUrl.pathname.length > 1 && parsedUrl.pathname.endsWith('/')) {
      parsedUrl.pathname = parsedUrl.pathname.replace(/\/+$/, '') || '/';
    }

    return parsedUrl.toString();
  }

  /**
   * Extracts the domain (host, including a non-default port) from a URL
   * @returns The lowercased domain, or null if the URL is invalid
   */
  static extractDomain(url: string): string | null {
    try {
      const host = new URL(url).host;
      return host ? host.toLowerCase() : null;
    } catch {
      return null;
    }
  }

  /**
   * Validates if a string is an absolute http(s) URL
   */
  static isValid(url: string): boolean {
    try {
      return new URL(url).protocol in DEFAULT_PORTS;
    } catch {
      return false;
    }
  }

  /**
   * Resolves a relative URL against a base URL
   * @returns The resolved absolute URL, or null if it cannot be resolved
   */
  static resolveUrl(relativeUrl: string, baseUrl: string): string | null {
    try {
      return new URL(relativeUrl, baseUrl).toString();
    } catch {
      return null;
    }
  }

  /**
   * Checks if two URLs share a domain
   */
  static isSameDomain(url: string, baseUrl: string): boolean {
    const urlDomain = this.extractDomain(url);
    return urlDomain !== null && urlDomain === this.extractDomain(baseUrl);
  }

  /**
   * Gets the origin (protocol + host) of a URL
   */
  static getRootUrl(url: string): string | null {
    try {
      return new URL(url).origin;
    } catch {
      return null;
    }
  }

  /**
   * Detects crawler traps such as /a/b/a/b/a: a path in which one segment
   * occurs more than `maxRepeats` times
   */
  static hasPathLoop(url: string, maxRepeats = 2): boolean {
    let pathname: string;
    try {
      pathname = new URL(url).pathname;
    } catch {
      return false;
    }

    const counts = new Map<string, number>();
    for (const segment of pathname.split('/')) {
      if (!segment) {
        continue;
      }
      const count = (counts.get(segment) ?? 0) + 1;
      if (count > maxRepeats) {
        return true;
      }
      counts.set(segment, count);
    }
    return false;
  }
}
