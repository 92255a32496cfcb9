import http from 'http';
import https from 'https';
import axios, { AxiosInstance } from 'axios';
import { IFetcher } from '../interfaces/IFetcher';
import { FetchErrorKind, FetchResponse } from '../interfaces/types';
import { FetchError } from '../errors';
import { DelayUtils } from '../utils/DelayUtils';
import { LoggingUtils } from '../utils/LoggingUtils';

export interface AxiosFetcherOptions {
  userAgent: string;
  maxContentBytes: number;
  maxRedirects?: number;
  maxSocketsPerHost?: number;
}

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT', 'ESOCKETTIMEDOUT']);
const MALFORMED_CODES = new Set(['ERR_FR_TOO_MANY_REDIRECTS', 'ERR_FR_MAX_BODY_LENGTH_EXCEEDED', 'ERR_BAD_RESPONSE']);

/**
 * HTTP client backed by its own axios instance and keep-alive agents.
 * Every request runs under a deadline; at the deadline the request is aborted
 * and the call rejects with a timeout FetchError.
 */
export class AxiosFetcher implements IFetcher {
  private readonly client: AxiosInstance;
  private readonly httpAgent: http.Agent;
  private readonly httpsAgent: https.Agent;
  private active = 0;
  private readonly logger = LoggingUtils.createTaggedLogger('fetcher');

  constructor(readonly id: number, private readonly options: AxiosFetcherOptions) {
    const maxSockets = options.maxSocketsPerHost ?? 10;
    this.httpAgent = new http.Agent({ keepAlive: true, maxSockets });
    this.httpsAgent = new https.Agent({ keepAlive: true, maxSockets });

    this.client = axios.create({
      headers: {
        'User-Agent': options.userAgent,
        'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
        'Accept-Language': 'en-US,en;q=0.9'
      },
      httpAgent: this.httpAgent,
      httpsAgent: this.httpsAgent,
      maxRedirects: options.maxRedirects ?? 5,
      maxContentLength: options.maxContentBytes,
      responseType: 'arraybuffer',
      decompress: true,
      // Status classification happens below
      validateStatus: () => true
    });
  }

  async fetch(url: string, timeoutMs: number): Promise<FetchResponse> {
    const startTime = Date.now();
    this.active += 1;

    try {
      const response = await DelayUtils.withTimeout(
        signal => this.client.get<ArrayBuffer>(url, { signal }),
        timeoutMs,
        () => new FetchError(url, FetchErrorKind.TIMEOUT, `Request to ${url} timed out after ${timeoutMs}ms`)
      );
      const elapsedMs = Date.now() - startTime;

      if (response.status < 200 || response.status > 299) {
        this.logger.debug(`HTTP ${response.status} from ${url} in ${elapsedMs}ms`);
        throw FetchError.fromStatus(url, response.status);
      }

      const headers = this.flattenHeaders(response.headers);
      const body = Buffer.from(response.data);
      const finalUrl = this.resolveFinalUrl(response.request, url);

      this.logger.debug(`Fetched ${url} (${response.status}, ${body.length} bytes) in ${elapsedMs}ms`);

      return {
        url,
        finalUrl,
        status: response.status,
        headers,
        contentType: headers['content-type'] ?? null,
        body,
        elapsedMs
      };
    } catch (error) {
      throw this.classify(error, url);
    } finally {
      this.active -= 1;
    }
  }

  activeRequests(): number {
    return this.active;
  }

  async close(): Promise<void> {
    this.httpAgent.destroy();
    this.httpsAgent.destroy();
  }

  private classify(error: unknown, url: string): FetchError {
    if (error instanceof FetchError) {
      return error;
    }
    if (axios.isAxiosError(error)) {
      const code = error.code ?? '';
      if (TIMEOUT_CODES.has(code)) {
        return new FetchError(url, FetchErrorKind.TIMEOUT, error.message);
      }
      if (MALFORMED_CODES.has(code)) {
        return new FetchError(url, FetchErrorKind.MALFORMED, error.message);
      }
      return new FetchError(url, FetchErrorKind.NETWORK, error.message);
    }
    return FetchError.from(error, url);
  }

  private flattenHeaders(headers: object): Record<string, string> {
    const flat: Record<string, string> = {};
    for (const [name, value] of Object.entries(headers)) {
      if (typeof value === 'string') {
        flat[name.toLowerCase()] = value;
      } else if (Array.isArray(value)) {
        flat[name.toLowerCase()] = value.join(', ');
      } else if (typeof value === 'number') {
        flat[name.toLowerCase()] = String(value);
      }
    }
    return flat;
  }

  private resolveFinalUrl(request: unknown, fallback: string): string {
    if (typeof request === 'object' && request !== null && 'res' in request) {
      const res = request.res;
      if (typeof res === 'object' && res !== null && 'responseUrl' in res && typeof res.responseUrl === 'string') {
        return res.responseUrl;
      }
    }
    return fallback;
  }
}
