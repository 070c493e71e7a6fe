/**
 * Finds the document links on a fetched page
 */
export interface ILinkExtractor {
  /**
   * Absolute URLs of the matching links, in document order, duplicates kept
   */
  extract(pageUrl: string, html: Buffer | string): string[];
}
