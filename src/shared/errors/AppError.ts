/**
 * Base application error class
 */
export abstract class AppError extends Error {
  public readonly code: string;
  public readonly isOperational: boolean;
  public readonly details?: Record<string, unknown>;
  public readonly timestamp: Date;

  constructor(
    message: string,
    code: string,
    isOperational: boolean = true,
    details?: Record<string, unknown>,
    cause?: unknown
  ) {
    super(message, cause === undefined ? undefined : { cause });
    Object.setPrototypeOf(this, new.target.prototype);

    this.name = this.constructor.name;
    this.code = code;
    this.isOperational = isOperational;
    this.details = details;
    this.timestamp = new Date();

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert error to JSON
   */
  toJSON(): ErrorResponse {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      timestamp: this.timestamp,
      details: this.details
    };
  }
}

/**
 * Error response interface
 */
export interface ErrorResponse {
  name: string;
  message: string;
  code: string;
  timestamp: Date;
  details?: Record<string, unknown>;
}

/**
 * Root of every error raised while downloading documents from a page
 */
export class DownloadError extends AppError {
  constructor(
    message: string,
    details?: Record<string, unknown>,
    cause?: unknown,
    code: string = 'DOWNLOAD_ERROR'
  ) {
    super(message, code, true, details, cause);
  }
}

/**
 * Target URL is malformed or not an http(s) address
 */
export class InvalidURLError extends DownloadError {
  constructor(url: string, reason: string) {
    super(`Invalid URL '${url}': ${reason}`, { url }, undefined, 'INVALID_URL');
  }
}

/**
 * Request failed on every allowed attempt
 */
export class NetworkError extends DownloadError {
  constructor(message: string, details?: Record<string, unknown>, cause?: unknown) {
    super(message, details, cause, 'NETWORK_ERROR');
  }
}

/**
 * Directory or file I/O failed
 */
export class FileSystemError extends DownloadError {
  constructor(message: string, details?: Record<string, unknown>, cause?: unknown) {
    super(message, details, cause, 'FILESYSTEM_ERROR');
  }
}

/**
 * Invalid option or configuration value, or a file outside the size bounds
 */
export class ValidationError extends DownloadError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, details, undefined, 'VALIDATION_ERROR');
  }
}

/**
 * Internal error
 */
export class InternalError extends AppError {
  constructor(message: string = 'Internal error', details?: Record<string, unknown>, cause?: unknown) {
    super(message, 'INTERNAL_ERROR', false, details, cause);
  }
}

/**
 * Error-shaped value; errors raised by Node's own modules fail `instanceof Error` under Jest's sandbox
 */
export function isErrorLike(error: unknown): error is Error {
  return typeof error === 'object' && error !== null &&
    'name' in error && typeof error.name === 'string' &&
    'message' in error && typeof error.message === 'string';
}

/**
 * Human-readable message of any thrown value
 */
export function errorMessage(error: unknown): string {
  if (isErrorLike(error)) {
    return error.message;
  }
  return String(error);
}

/**
 * System error code (ENOENT, ECONNREFUSED, ...) of a thrown value, if any
 */
export function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
