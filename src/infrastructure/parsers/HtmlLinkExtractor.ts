import * as cheerio from 'cheerio';
import { ILinkExtractor } from '../../domain/interfaces/ILinkExtractor';
import { PageUrl } from '../../domain/value-objects/PageUrl';
import { normalizeExtension } from '../../domain/entities/DownloaderConfig';
import { ILogger } from '../../shared/logging/Logger';

/**
 * Collects anchors whose target path ends with an allowed extension
 */
export class HtmlLinkExtractor implements ILinkExtractor {
  private readonly extensions: readonly string[];

  constructor(
    private readonly logger: ILogger,
    allowedExtensions: readonly string[]
  ) {
    this.extensions = allowedExtensions
      .map(normalizeExtension)
      .filter(extension => extension.length > 0);
  }

  public extract(pageUrl: string, html: Buffer | string): string[] {
    const page = new PageUrl(pageUrl);
    const $ = cheerio.load(typeof html === 'string' ? html : html.toString('utf8'));

    const anchors = $('a[href]').toArray();
    this.logger.info(`Found total of ${anchors.length} links on the page`);

    const links: string[] = [];
    for (const anchor of anchors) {
      const href = $(anchor).attr('href') ?? '';
      const link = this.toDocumentLink(page, href);

      if (link) {
        links.push(link);
        this.logger.info(`Found downloadable link: ${link}`);
      } else {
        this.logger.debug(`Skipping non-downloadable link: ${href}`);
      }
    }

    this.logger.info(`Found ${links.length} potential document links`);
    return links;
  }

  /**
   * Absolute URL of a document link, or null for anything else
   */
  public toDocumentLink(page: PageUrl, href: string): string | null {
    const reference = href.trim();
    if (!this.isCandidate(reference)) {
      return null;
    }

    const resolved = page.resolve(reference);
    if (!resolved || !PageUrl.isFetchable(resolved)) {
      return null;
    }

    // pathname carries neither query nor fragment
    const path = resolved.pathname.toLowerCase();
    if (!this.extensions.some(extension => path.endsWith(extension))) {
      return null;
    }

    return resolved.toString();
  }

  private isCandidate(reference: string): boolean {
    if (reference.length === 0 || reference.startsWith('#')) {
      return false;
    }
    return !reference.toLowerCase().startsWith('javascript:');
  }
}
