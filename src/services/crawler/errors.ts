import { FetchErrorKind } from './interfaces/types';

export type CrawlerErrorCode =
  | 'FETCH_FAILED'
  | 'PARSE_FAILED'
  | 'SINK_UNAVAILABLE'
  | 'SINK_WRITE_FAILED'
  | 'FRONTIER_CORRUPTED'
  | 'INVALID_CONFIGURATION';

/**
 * Base error for the crawl engine.
 * Fatal errors abort the whole run; everything else is scoped to one URL.
 */
export class CrawlerError extends Error {
  readonly code: CrawlerErrorCode;
  readonly isFatal: boolean;

  constructor(message: string, code: CrawlerErrorCode, isFatal = false) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.isFatal = isFatal;

    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * A single fetch attempt failed
 */
export class FetchError extends CrawlerError {
  readonly kind: FetchErrorKind;
  readonly url: string;
  readonly statusCode: number | null;

  constructor(url: string, kind: FetchErrorKind, message?: string, statusCode: number | null = null) {
    super(message ?? `Error fetching ${url}: ${kind}`, 'FETCH_FAILED');
    this.url = url;
    this.kind = kind;
    this.statusCode = statusCode;
  }

  /**
   * Maps an HTTP status outside 2xx to its error kind
   */
  static kindForStatus(status: number): FetchErrorKind {
    if (status === 429) {
      return FetchErrorKind.RATE_LIMITED;
    }
    if (status >= 500 && status <= 599) {
      return FetchErrorKind.SERVER_ERROR;
    }
    if (status >= 400 && status <= 499) {
      return FetchErrorKind.CLIENT_ERROR;
    }
    return FetchErrorKind.MALFORMED;
  }

  static fromStatus(url: string, status: number): FetchError {
    return new FetchError(url, FetchError.kindForStatus(status), `HTTP ${status} from ${url}`, status);
  }

  /**
   * Wrap anything thrown by a fetcher. Unknown throwables become network errors.
   */
  static from(error: unknown, url: string): FetchError {
    if (error instanceof FetchError) {
      return error;
    }
    const message = error instanceof Error ? error.message : String(error);
    return new FetchError(url, FetchErrorKind.NETWORK, message);
  }
}

/**
 * The parser could not make sense of a fetched body
 */
export class ParseError extends CrawlerError {
  readonly url: string;

  constructor(url: string, message: string) {
    super(`Error parsing content from ${url}: ${message}`, 'PARSE_FAILED');
    this.url = url;
  }
}

export class SinkUnavailableError extends CrawlerError {
  constructor(message: string) {
    super(message, 'SINK_UNAVAILABLE', true);
  }
}

export class SinkWriteError extends CrawlerError {
  constructor(message: string) {
    super(message, 'SINK_WRITE_FAILED');
  }
}

export class FrontierCorruptionError extends CrawlerError {
  constructor(message: string) {
    super(message, 'FRONTIER_CORRUPTED', true);
  }
}

export class ConfigurationError extends CrawlerError {
  constructor(message: string) {
    super(message, 'INVALID_CONFIGURATION', true);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
