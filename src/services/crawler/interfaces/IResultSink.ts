import { ArtifactKind, PageRecord } from './types';

/**
 * Interface for the persistence collaborator.
 * Implementations must accept concurrent calls from many workers.
 */
export interface IResultSink {
  /**
   * Verify the backend is usable. Failure here is fatal for the run.
   */
  initialize(): Promise<void>;

  /**
   * Persist a page record. Writing the same id twice overwrites.
   */
  writePage(record: PageRecord): Promise<void>;

  /**
   * Store a content artifact for a page
   * @returns The path (or key) the artifact was stored under
   */
  writeArtifact(id: string, kind: ArtifactKind, data: Buffer | string): Promise<string>;

  close(): Promise<void>;
}
