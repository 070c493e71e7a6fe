import { Readable } from 'stream';

/**
 * Response of a successful (2xx) request
 */
export interface HttpResponse<T> {
  data: T;
  status: number;
  statusText: string;
  /** header names lower-cased */
  headers: Record<string, string>;
  url: string;
}

/**
 * Streamed response whose connection can be dropped before the body is read
 */
export interface StreamedResponse extends HttpResponse<Readable> {
  /**
   * Close the connection; a body still being read fails
   */
  abort(): void;
}

/**
 * Core interface for fetching pages and files
 */
export interface IHttpClient {
  /**
   * GET a resource and read its whole body
   */
  get(url: string): Promise<HttpResponse<Buffer>>;

  /**
   * GET a resource, leaving the body as an unread stream
   */
  stream(url: string): Promise<StreamedResponse>;
}
