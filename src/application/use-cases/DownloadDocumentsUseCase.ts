import {
  DownloadReport,
  DownloaderConfig,
  FileOutcome,
  Filename,
  IFileStorage,
  IHttpClient,
  ILinkExtractor,
  PageUrl,
  StreamedResponse
} from '../../domain';
import {
  DownloadError,
  ILogger,
  ValidationError,
  normalizeError
} from '../../shared';

/**
 * Clock used to stamp reports
 */
export type Clock = () => Date;

/**
 * Use case for downloading every linked document on one page
 */
export class DownloadDocumentsUseCase {
  constructor(
    private readonly httpClient: IHttpClient,
    private readonly storage: IFileStorage,
    private readonly linkExtractor: ILinkExtractor,
    private readonly config: DownloaderConfig,
    private readonly logger: ILogger,
    private readonly clock: Clock = () => new Date()
  ) {}

  /**
   * Fetch the page, then download its document links one after another.
   * Page-level failures reject with a DownloadError; per-file failures land in the report.
   */
  async execute(url: string): Promise<DownloadReport> {
    this.logger.info(`Starting download from: ${url}`);
    const report = new DownloadReport(this.clock());

    try {
      const page = new PageUrl(url);

      await this.storage.createDirectory();

      this.logger.info('Fetching webpage...');
      const response = await this.httpClient.get(page.toString());

      const links = this.linkExtractor.extract(page.toString(), response.data);

      for (const link of links) {
        report.record(await this.downloadDocument(link));
      }

      this.logger.info('Download finished', {
        succeeded: report.successCount,
        failed: report.failedCount,
        skipped: report.skippedCount,
        totalSize: report.totalSize
      });

      return report;

    } catch (error) {
      this.logger.error('Download failed', error);
      throw new DownloadError(
        `Failed to download from ${url}: ${normalizeError(error).message}`,
        { url },
        error
      );
    } finally {
      report.finish(this.clock());
    }
  }

  /**
   * Download one link; never throws
   */
  private async downloadDocument(url: string): Promise<FileOutcome> {
    const filename = Filename.fromUrl(url).toString();
    let response: StreamedResponse | undefined;

    try {
      if (await this.storage.exists(filename)) {
        this.logger.info(`Skipping existing file: ${filename}`);
        return { status: 'skipped', url, filename };
      }

      response = await this.httpClient.stream(url);
      const contentLength = parseContentLength(response.headers['content-length']);

      const { maxFileSize } = this.config;
      if (maxFileSize !== undefined && contentLength > maxFileSize) {
        response.abort();
        return this.failed(url, filename, new ValidationError(
          `${filename} announces ${contentLength} bytes, above the ${maxFileSize} byte limit`,
          { url, contentLength, maxFileSize }
        ));
      }

      const saved = await this.storage.save(filename, response.data);

      const sizeError = this.checkSize(filename, saved.bytesWritten);
      if (sizeError) {
        await this.storage.delete(filename);
        return this.failed(url, filename, sizeError);
      }

      return {
        status: 'succeeded',
        url,
        filename,
        bytesWritten: saved.bytesWritten,
        contentLength
      };

    } catch (error) {
      response?.abort();
      const appError = normalizeError(error);
      const cause = appError instanceof DownloadError
        ? appError
        : new DownloadError(appError.message, { url }, error);
      return this.failed(url, filename, cause);
    }
  }

  private checkSize(filename: string, size: number): ValidationError | undefined {
    const { minFileSize, maxFileSize } = this.config;

    if (minFileSize !== undefined && size < minFileSize) {
      return new ValidationError(
        `${filename} is ${size} bytes, below the ${minFileSize} byte minimum`,
        { size, minFileSize }
      );
    }
    if (maxFileSize !== undefined && size > maxFileSize) {
      return new ValidationError(
        `${filename} is ${size} bytes, above the ${maxFileSize} byte limit`,
        { size, maxFileSize }
      );
    }
    return undefined;
  }

  private failed(url: string, filename: string, error: DownloadError): FileOutcome {
    this.logger.error(`Failed to download ${url}: ${error.message}`);
    return { status: 'failed', url, filename, error };
  }
}

/**
 * content-length header as a byte count, 0 when absent or invalid
 */
export function parseContentLength(value: string | undefined): number {
  if (value === undefined || !/^\d+$/.test(value.trim())) {
    return 0;
  }
  return parseInt(value.trim(), 10);
}
