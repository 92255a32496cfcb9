import { FetchError } from '../errors';
import { FetchResponse, FrontierEntry, PageRecord, ParsedPage, RejectionReason } from './types';

export interface ExpansionResult {
  record: PageRecord;
  admitted: FrontierEntry[];
  rejected: Partial<Record<RejectionReason, number>>;
  /** Bytes handed to the sink as artifacts */
  bytesStored: number;
}

/**
 * Interface for the single writer of parent-child edges.
 * Implementations turn fetch outcomes into page records and feed newly
 * discovered links back into the frontier.
 */
export interface ILineageTracker {
  /**
   * Record a fetched page and enqueue its unseen outbound links.
   * @param parsed Parser output, or null when parsing failed
   * @param attempts Number of fetch attempts it took
   */
  recordSuccess(
    entry: FrontierEntry,
    response: FetchResponse,
    parsed: ParsedPage | null,
    attempts: number
  ): Promise<ExpansionResult>;

  /**
   * Record a terminal failure for an entry
   */
  recordFailure(entry: FrontierEntry, attempts: number, error: FetchError): Promise<PageRecord>;

  /**
   * Id of the page that first discovered the URL, or null for seeds and unknown URLs
   */
  getParent(url: string): string | null;

  edgeCount(): number;
}
