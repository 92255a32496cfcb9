import * as cheerio from 'cheerio';
import { IContentParser } from '../interfaces/IContentParser';
import { ParsedPage } from '../interfaces/types';
import { ParseError } from '../errors';
import { UrlUtils } from '../utils/UrlUtils';
import { LoggingUtils } from '../utils/LoggingUtils';

const EXCLUDED_EXTENSIONS = [
  '.jpg', '.jpeg', '.png', '.gif', '.bmp', '.webp', '.svg', '.ico',
  '.css', '.js', '.json', '.xml', '.csv', '.rss',
  '.pdf', '.doc', '.docx', '.xls', '.xlsx', '.ppt', '.pptx',
  '.zip', '.tar', '.gz', '.rar', '.7z',
  '.mp3', '.mp4', '.avi', '.mkv', '.mov', '.wav', '.ogg',
  '.exe', '.bin', '.iso', '.dmg'
];

const SKIPPED_SCHEMES = ['javascript:', 'mailto:', 'tel:', 'data:', 'ftp:'];

const HTML_TYPES = ['text/html', 'application/xhtml+xml'];

export interface CheerioParserOptions {
  /** Characters kept in textPreview */
  previewLength?: number;
}

/**
 * Content parser using Cheerio for static HTML.
 * Non-HTML text is passed through as body text with no links; binary
 * content yields an empty page.
 */
export class CheerioParser implements IContentParser {
  private readonly previewLength: number;
  private readonly logger = LoggingUtils.createTaggedLogger('parser');

  constructor(options: CheerioParserOptions = {}) {
    this.previewLength = options.previewLength ?? 200;
  }

  parse(body: Buffer, contentType: string | null, url: string): ParsedPage {
    const mimeType = (contentType ?? '').split(';')[0].trim().toLowerCase();
    const text = body.toString('utf-8');

    if (this.isHtml(mimeType, text)) {
      if (text.includes('\u0000')) {
        throw new ParseError(url, 'HTML body contains binary data');
      }
      return this.parseHtml(text, url);
    }

    if (mimeType.startsWith('text/')) {
      const bodyText = this.collapseWhitespace(text);
      return this.page(null, {}, bodyText, '', []);
    }

    this.logger.debug(`Skipping parse of ${url} with content type ${mimeType || 'unknown'}`);
    return this.page(null, {}, '', '', []);
  }

  private parseHtml(html: string, url: string): ParsedPage {
    let $: cheerio.CheerioAPI;
    try {
      $ = cheerio.load(html);
    } catch (error) {
      throw new ParseError(url, error instanceof Error ? error.message : String(error));
    }

    const title = $('title').first().text().trim() || null;
    const meta = this.extractMetadata($, url);
    const headHtml = $('head').html()?.trim() ?? '';
    const baseHref = $('base[href]').attr('href');
    const baseUrl = (baseHref && UrlUtils.resolveUrl(baseHref, url)) || url;
    const outboundLinks = this.extractLinks($, baseUrl);

    $('script, style, noscript, iframe, template').remove();
    const bodyText = this.collapseWhitespace($('body').length ? $('body').text() : $.root().text());

    return this.page(title, meta, bodyText, headHtml, outboundLinks);
  }

  private extractMetadata($: cheerio.CheerioAPI, url: string): Record<string, string> {
    const metadata: Record<string, string> = {};

    const description = $('meta[name="description"]').attr('content') ||
      $('meta[property="og:description"]').attr('content');
    if (description) {
      metadata.description = description.trim();
    }

    const keywords = $('meta[name="keywords"]').attr('content');
    if (keywords) {
      metadata.keywords = keywords.split(',').map(k => k.trim()).filter(Boolean).join(',');
    }

    const language = $('html').attr('lang') || $('meta[http-equiv="content-language"]').attr('content');
    if (language) {
      metadata.language = language.trim();
    }

    const canonical = $('link[rel="canonical"]').attr('href');
    const canonicalUrl = canonical ? UrlUtils.resolveUrl(canonical, url) : null;
    if (canonicalUrl) {
      metadata.canonicalUrl = canonicalUrl;
    }

    const author = $('meta[name="author"]').attr('content') ||
      $('meta[property="article:author"]').attr('content');
    if (author) {
      metadata.author = author.trim();
    }

    const robots = $('meta[name="robots"]').attr('content');
    if (robots) {
      metadata.robots = robots.trim().toLowerCase();
    }

    $('meta[property^="og:"]').each((_, element) => {
      const property = $(element).attr('property');
      const content = $(element).attr('content');
      if (property && content) {
        metadata[`og_${property.replace('og:', '')}`] = content.trim();
      }
    });

    return metadata;
  }

  private extractLinks($: cheerio.CheerioAPI, baseUrl: string): string[] {
    const links = new Set<string>();

    $('a[href], area[href]').each((_, element) => {
      const href = $(element).attr('href')?.trim();
      if (!href || href.startsWith('#') || SKIPPED_SCHEMES.some(scheme => href.toLowerCase().startsWith(scheme))) {
        return;
      }

      const absoluteUrl = UrlUtils.resolveUrl(href, baseUrl);
      if (absoluteUrl && UrlUtils.isValid(absoluteUrl) && !this.isExcludedUrl(absoluteUrl)) {
        links.add(absoluteUrl);
      }
    });

    return Array.from(links);
  }

  private isExcludedUrl(url: string): boolean {
    const pathname = new URL(url).pathname.toLowerCase();
    return EXCLUDED_EXTENSIONS.some(ext => pathname.endsWith(ext));
  }

  private isHtml(mimeType: string, text: string): boolean {
    if (HTML_TYPES.includes(mimeType)) {
      return true;
    }
    if (mimeType) {
      return false;
    }
    return /^\s*(<!doctype html|<html)/i.test(text);
  }

  private collapseWhitespace(text: string): string {
    return text.replace(/\s+/g, ' ').trim();
  }

  private page(
    title: string | null,
    meta: Record<string, string>,
    bodyText: string,
    headHtml: string,
    outboundLinks: string[]
  ): ParsedPage {
    return {
      title,
      meta,
      textPreview: bodyText.slice(0, this.previewLength),
      bodyText,
      headHtml,
      outboundLinks
    };
  }
}
