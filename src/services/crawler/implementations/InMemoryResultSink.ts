import { IResultSink } from '../interfaces/IResultSink';
import { ArtifactKind, PageRecord } from '../interfaces/types';

/**
 * Result sink that keeps everything in maps. Records are upserted by id.
 */
export class InMemoryResultSink implements IResultSink {
  private readonly pages: Map<string, PageRecord> = new Map();
  private readonly artifacts: Map<string, Buffer> = new Map();
  private writes = 0;

  async initialize(): Promise<void> {
    return Promise.resolve();
  }

  async writePage(record: PageRecord): Promise<void> {
    this.writes += 1;
    this.pages.set(record.id, { ...record, artifactPaths: { ...record.artifactPaths } });
  }

  async writeArtifact(id: string, kind: ArtifactKind, data: Buffer | string): Promise<string> {
    const key = `${id}/${kind}`;
    this.artifacts.set(key, typeof data === 'string' ? Buffer.from(data, 'utf-8') : Buffer.from(data));
    return key;
  }

  async close(): Promise<void> {
    return Promise.resolve();
  }

  getPages(): PageRecord[] {
    return Array.from(this.pages.values());
  }

  getPage(id: string): PageRecord | undefined {
    return this.pages.get(id);
  }

  findByUrl(url: string): PageRecord[] {
    return this.getPages().filter(page => page.url === url);
  }

  getArtifact(key: string): Buffer | undefined {
    return this.artifacts.get(key);
  }

  /** Total writePage calls, including overwrites */
  writeCount(): number {
    return this.writes;
  }
}
