import { ParsedPage } from './types';

/**
 * Interface for content parsing.
 * Turns a fetched body into structured page data. Failures throw a ParseError.
 */
export interface IContentParser {
  /**
   * @param body Raw response bytes
   * @param contentType Response content type, if the server sent one
   * @param url URL the body was fetched from, used to resolve relative links
   */
  parse(body: Buffer, contentType: string | null, url: string): ParsedPage;
}
