import { constants as fsConstants, promises as fs } from 'fs';
import path from 'path';
import { z } from 'zod';
import { IResultSink } from '../interfaces/IResultSink';
import { ArtifactKind, PageRecord } from '../interfaces/types';
import { SinkUnavailableError } from '../errors';
import { LoggingUtils } from '../utils/LoggingUtils';

const ARTIFACT_FILES: Record<ArtifactKind, string> = {
  [ArtifactKind.RAW]: 'raw.html',
  [ArtifactKind.BODY]: 'body.txt',
  [ArtifactKind.HEADERS]: 'headers.txt',
  [ArtifactKind.METADATA]: 'metadata.txt'
};

const PageRecordSchema = z.object({
  id: z.string(),
  url: z.string(),
  parentId: z.string().nullable(),
  domain: z.string(),
  status: z.enum(['success', 'failed']),
  statusCode: z.number().int().nullable(),
  depth: z.number().int().nonnegative(),
  contentHash: z.string().nullable(),
  title: z.string().nullable(),
  metaDescription: z.string().nullable(),
  contentType: z.string().nullable(),
  contentLength: z.number().int().nonnegative(),
  retryCount: z.number().int().nonnegative(),
  lastError: z.string().nullable(),
  scrapedAt: z.coerce.date(),
  artifactPaths: z.object({
    raw: z.string().optional(),
    body: z.string().optional(),
    headers: z.string().optional(),
    metadata: z.string().optional()
  })
});

const PAGE_FILE = 'page.json';
const INDEX_FILE = 'pages.jsonl';

/**
 * File system result sink.
 *
 * Layout: `<baseDir>/<pageId>/{raw.html,body.txt,headers.txt,metadata.txt,page.json}`
 * plus a `pages.jsonl` index written on close. Every file is written to a
 * temporary name and renamed into place, so a reader never sees a partial
 * file and rewriting a page replaces it.
 */
export class FileResultSink implements IResultSink {
  private readonly pages: Map<string, PageRecord> = new Map();
  private tempCounter = 0;
  private readonly logger = LoggingUtils.createTaggedLogger('sink');

  constructor(private readonly baseDir: string) {}

  async initialize(): Promise<void> {
    try {
      await fs.mkdir(this.baseDir, { recursive: true });
      await fs.access(this.baseDir, fsConstants.W_OK);
    } catch (error) {
      throw new SinkUnavailableError(
        `Output directory ${this.baseDir} is not writable: ${error instanceof Error ? error.message : String(error)}`
      );
    }
    this.logger.info(`File storage ready at ${this.baseDir}`);
  }

  async writePage(record: PageRecord): Promise<void> {
    this.pages.set(record.id, record);
    const file = path.join(this.pageDir(record.id), PAGE_FILE);
    await this.writeAtomic(file, JSON.stringify(record, null, 2));
  }

  async writeArtifact(id: string, kind: ArtifactKind, data: Buffer | string): Promise<string> {
    const file = path.join(this.pageDir(id), ARTIFACT_FILES[kind]);
    await this.writeAtomic(file, data);
    return file;
  }

  async close(): Promise<void> {
    const lines = Array.from(this.pages.values()).map(record => JSON.stringify(record));
    await fs.mkdir(this.baseDir, { recursive: true });
    await this.writeAtomic(path.join(this.baseDir, INDEX_FILE), lines.length ? `${lines.join('\n')}\n` : '');
    this.logger.info(`Wrote index of ${lines.length} pages to ${path.join(this.baseDir, INDEX_FILE)}`);
  }

  /**
   * Read back a stored page record
   */
  async readPage(id: string): Promise<PageRecord | null> {
    try {
      const raw = await fs.readFile(path.join(this.pageDir(id), PAGE_FILE), 'utf-8');
      const parsed: unknown = JSON.parse(raw);
      return PageRecordSchema.parse(parsed);
    } catch (error) {
      // fs errors fail instanceof Error under Jest's module sandbox
      if (typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT') {
        return null;
      }
      throw error;
    }
  }

  getArtifactPath(id: string, kind: ArtifactKind): string {
    return path.join(this.pageDir(id), ARTIFACT_FILES[kind]);
  }

  private pageDir(id: string): string {
    if (!/^[A-Za-z0-9_-]+$/.test(id)) {
      throw new Error(`Invalid page id for file storage: ${id}`);
    }
    return path.join(this.baseDir, id);
  }

  private async writeAtomic(file: string, data: Buffer | string): Promise<void> {
    await fs.mkdir(path.dirname(file), { recursive: true });
    this.tempCounter += 1;
    const tempFile = `${file}.${process.pid}.${this.tempCounter}.tmp`;
    await fs.writeFile(tempFile, data);
    await fs.rename(tempFile, file);
  }
}
