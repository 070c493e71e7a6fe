import chalk from 'chalk';
import { AppError, DownloadError, InternalError, NetworkError, errorCode, isErrorLike } from './AppError';
import { ILogger } from '../logging/Logger';

/**
 * Exit code for any failed invocation
 */
export const EXIT_FAILURE = 1;

/**
 * Turns thrown values into one user-facing line and an exit code
 */
export class ErrorHandler {
  constructor(
    private readonly logger: ILogger,
    private readonly write: (line: string) => void = line => console.error(line)
  ) {}

  /**
   * Handle error
   */
  handle(error: unknown): number {
    const appError = normalizeError(error);

    this.logError(appError);
    this.write(chalk.red(this.formatLine(appError)));

    return EXIT_FAILURE;
  }

  /**
   * Single-line message shown to the user
   */
  formatLine(error: AppError): string {
    if (error instanceof DownloadError) {
      return `Error: ${error.message}`;
    }
    return `Unexpected error: ${error.message}`;
  }

  private logError(error: AppError): void {
    if (error.isOperational) {
      this.logger.debug(`[${error.code}] ${error.message}`, error.details);
    } else {
      this.logger.debug('Non-operational error', { cause: error.cause, stack: error.stack });
    }
  }
}

/**
 * Normalize error to AppError
 */
export function normalizeError(error: unknown): AppError {
  if (error instanceof AppError) {
    return error;
  }

  if (isErrorLike(error)) {
    const code = errorCode(error);
    if (code === 'ECONNREFUSED' || code === 'ENOTFOUND' || code === 'ETIMEDOUT') {
      return new NetworkError(error.message, { code }, error);
    }
    return new InternalError(error.message, { originalError: error.name }, error);
  }

  return new InternalError(String(error));
}
