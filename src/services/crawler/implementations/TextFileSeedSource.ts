import { promises as fs } from 'fs';
import { ISeedSource } from '../interfaces/ISeedSource';
import { SeedEntry } from '../interfaces/types';
import { UrlUtils } from '../utils/UrlUtils';
import { LoggingUtils } from '../utils/LoggingUtils';

/**
 * Reads seeds from a text file: one URL per line, blank lines and lines
 * starting with `#` ignored. Invalid URLs are skipped with a warning.
 */
export class TextFileSeedSource implements ISeedSource {
  private readonly logger = LoggingUtils.createTaggedLogger('seeds');

  constructor(private readonly filePath: string) {}

  async load(): Promise<SeedEntry[]> {
    const content = await fs.readFile(this.filePath, 'utf-8');
    const seeds: SeedEntry[] = [];

    content.split(/\r?\n/).forEach((rawLine, index) => {
      const line = rawLine.trim();
      if (!line || line.startsWith('#')) {
        return;
      }
      if (!UrlUtils.isValid(line)) {
        this.logger.warn(`Skipping invalid seed on line ${index + 1}: ${line}`);
        return;
      }
      seeds.push({ url: line, metadata: { source: this.filePath, line: String(index + 1) } });
    });

    this.logger.info(`Loaded ${seeds.length} seeds from ${this.filePath}`);
    return seeds;
  }
}

/**
 * Seeds given directly, e.g. on the command line
 */
export class StaticSeedSource implements ISeedSource {
  constructor(private readonly urls: string[]) {}

  async load(): Promise<SeedEntry[]> {
    return this.urls.map(url => ({ url }));
  }
}
