import { InvalidURLError } from '../../shared/errors/AppError';

const SUPPORTED_PROTOCOLS = ['http:', 'https:'];

/**
 * Value object representing the page documents are collected from
 */
export class PageUrl {
  private readonly url: URL;

  constructor(url: string) {
    const trimmed = url.trim();
    if (trimmed.length === 0) {
      throw new InvalidURLError(url, 'URL is empty');
    }

    try {
      this.url = new URL(trimmed);
    } catch {
      throw new InvalidURLError(url, 'not an absolute URL');
    }

    if (!SUPPORTED_PROTOCOLS.includes(this.url.protocol)) {
      throw new InvalidURLError(url, `unsupported protocol '${this.url.protocol}'`);
    }
  }

  /**
   * Get the normalized URL string
   */
  toString(): string {
    return this.url.toString();
  }

  /**
   * Get the hostname
   */
  get hostname(): string {
    return this.url.hostname;
  }

  /**
   * Resolve a reference found on this page to an absolute URL
   */
  resolve(reference: string): URL | null {
    try {
      return new URL(reference, this.url);
    } catch {
      return null;
    }
  }

  /**
   * Check whether a URL uses a protocol documents can be fetched over
   */
  static isFetchable(url: URL): boolean {
    return SUPPORTED_PROTOCOLS.includes(url.protocol);
  }
}
