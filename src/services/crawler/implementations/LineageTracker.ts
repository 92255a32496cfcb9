import { createHash } from 'crypto';
import { ExpansionResult, ILineageTracker } from '../interfaces/ILineageTracker';
import { IResultSink } from '../interfaces/IResultSink';
import { IUrlFrontier } from '../interfaces/IUrlFrontier';
import {
  ArtifactKind,
  ArtifactPaths,
  FetchResponse,
  FrontierEntry,
  PageRecord,
  ParsedPage,
  RejectionReason
} from '../interfaces/types';
import { FetchError, SinkWriteError, errorMessage } from '../errors';
import { UrlUtils } from '../utils/UrlUtils';
import { LoggingUtils } from '../utils/LoggingUtils';

export interface LineageTrackerOptions {
  maxDepth: number;
  stripTrailingSlash?: boolean;
}

/**
 * Turns fetch outcomes into page records and discovered links into frontier
 * entries.
 *
 * A page's record and artifacts are written before any of its links are
 * enqueued, so a stored child always points at a stored parent. Link expansion
 * runs in one synchronous pass over the frontier, which makes the first
 * discoverer of a URL its only parent.
 */
export class LineageTracker implements ILineageTracker {
  private readonly edges: Map<string, string> = new Map();
  private readonly logger = LoggingUtils.createTaggedLogger('lineage');

  constructor(
    private readonly frontier: IUrlFrontier,
    private readonly sink: IResultSink,
    private readonly options: LineageTrackerOptions
  ) {}

  async recordSuccess(
    entry: FrontierEntry,
    response: FetchResponse,
    parsed: ParsedPage | null,
    attempts: number
  ): Promise<ExpansionResult> {
    const contentHash = LineageTracker.hashContent(response.body);
    const { paths, bytesStored } = await this.storeArtifacts(entry, response, parsed, contentHash);

    const record: PageRecord = {
      ...this.baseRecord(entry, attempts),
      status: 'success',
      statusCode: response.status,
      contentHash,
      title: parsed?.title ?? null,
      metaDescription: parsed?.meta.description ?? null,
      contentType: response.contentType,
      contentLength: response.body.length,
      lastError: parsed ? null : 'parse_error',
      artifactPaths: paths
    };
    await this.persist(record);

    const { admitted, rejected } = parsed ? this.expand(entry, parsed.outboundLinks) : { admitted: [], rejected: {} };
    this.logger.debug(`Recorded ${entry.url}: ${admitted.length} new links`, { rejected });

    return { record, admitted, rejected, bytesStored };
  }

  async recordFailure(entry: FrontierEntry, attempts: number, error: FetchError): Promise<PageRecord> {
    const record: PageRecord = {
      ...this.baseRecord(entry, attempts),
      status: 'failed',
      statusCode: error.statusCode,
      contentHash: null,
      title: null,
      metaDescription: null,
      contentType: null,
      contentLength: 0,
      lastError: error.kind,
      artifactPaths: {}
    };
    await this.persist(record);

    this.logger.debug(`Recorded failure for ${entry.url} after ${attempts} attempts: ${error.kind}`);
    return record;
  }

  getParent(url: string): string | null {
    const normalizedUrl = UrlUtils.normalize(url, { stripTrailingSlash: this.options.stripTrailingSlash ?? true });
    return normalizedUrl ? this.edges.get(normalizedUrl) ?? null : null;
  }

  edgeCount(): number {
    return this.edges.size;
  }

  static hashContent(body: Buffer): string {
    return createHash('sha256').update(body).digest('hex');
  }

  /**
   * Enqueue every outbound link of a page as a child of it.
   * Must stay free of awaits: the whole pass is one atomic step.
   */
  private expand(
    entry: FrontierEntry,
    links: string[]
  ): { admitted: FrontierEntry[]; rejected: Partial<Record<RejectionReason, number>> } {
    const admitted: FrontierEntry[] = [];
    const rejected: Partial<Record<RejectionReason, number>> = {};

    if (entry.depth >= this.options.maxDepth) {
      return { admitted, rejected };
    }

    const seen = new Set<string>();
    for (const link of links) {
      const normalizedUrl = UrlUtils.normalize(link, { stripTrailingSlash: this.options.stripTrailingSlash ?? true });
      if (!normalizedUrl) {
        rejected.invalid = (rejected.invalid ?? 0) + 1;
        continue;
      }
      if (seen.has(normalizedUrl)) {
        continue;
      }
      seen.add(normalizedUrl);

      const result = this.frontier.enqueue({ url: normalizedUrl, parentId: entry.id, depth: entry.depth + 1 });
      if (result.admitted) {
        this.edges.set(result.entry.url, entry.id);
        admitted.push(result.entry);
      } else {
        rejected[result.reason] = (rejected[result.reason] ?? 0) + 1;
      }
    }

    return { admitted, rejected };
  }

  private async storeArtifacts(
    entry: FrontierEntry,
    response: FetchResponse,
    parsed: ParsedPage | null,
    contentHash: string
  ): Promise<{ paths: ArtifactPaths; bytesStored: number }> {
    const artifacts: Array<[ArtifactKind, Buffer | string]> = [
      [ArtifactKind.RAW, response.body],
      [ArtifactKind.HEADERS, this.formatHeaders(response, parsed)]
    ];
    if (parsed) {
      artifacts.push([ArtifactKind.BODY, parsed.bodyText]);
      artifacts.push([ArtifactKind.METADATA, this.formatMetadata(entry, response, parsed, contentHash)]);
    }

    const paths: ArtifactPaths = {};
    let bytesStored = 0;
    try {
      for (const [kind, data] of artifacts) {
        paths[kind] = await this.sink.writeArtifact(entry.id, kind, data);
        bytesStored += typeof data === 'string' ? Buffer.byteLength(data) : data.length;
      }
    } catch (error) {
      throw new SinkWriteError(`Failed to store artifacts for ${entry.url}: ${errorMessage(error)}`);
    }

    return { paths, bytesStored };
  }

  private async persist(record: PageRecord): Promise<void> {
    try {
      await this.sink.writePage(record);
    } catch (error) {
      throw new SinkWriteError(`Failed to write page record for ${record.url}: ${errorMessage(error)}`);
    }
  }

  private baseRecord(entry: FrontierEntry, attempts: number): Pick<PageRecord, 'id' | 'url' | 'parentId' | 'domain' | 'depth' | 'retryCount' | 'scrapedAt'> {
    return {
      id: entry.id,
      url: entry.url,
      parentId: entry.parentId,
      domain: UrlUtils.extractDomain(entry.url) ?? 'unknown',
      depth: entry.depth,
      retryCount: attempts,
      scrapedAt: new Date()
    };
  }

  private formatHeaders(response: FetchResponse, parsed: ParsedPage | null): string {
    const lines = Object.entries(response.headers).map(([name, value]) => `${name}: ${value}`);
    if (parsed?.headHtml) {
      lines.push('', parsed.headHtml);
    }
    return lines.join('\n');
  }

  private formatMetadata(entry: FrontierEntry, response: FetchResponse, parsed: ParsedPage, contentHash: string): string {
    const wordCount = parsed.bodyText.split(/\s+/).filter(Boolean).length;
    const lines = [
      `URL: ${entry.url}`,
      `Final URL: ${response.finalUrl}`,
      `Depth: ${entry.depth}`,
      `Title: ${parsed.title ?? ''}`,
      `Content Length: ${parsed.bodyText.length} characters`,
      `Word Count: ${wordCount} words`,
      `Links Found: ${parsed.outboundLinks.length}`,
      `Content Hash: ${contentHash}`
    ];
    return lines.join('\n');
  }
}
