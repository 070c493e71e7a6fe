import { ValidationError } from '../../shared/errors/AppError';

/**
 * Settings for one downloader run, frozen once created
 */
export interface DownloaderConfig {
  readonly outputDir: string;
  readonly maxRetries: number;
  /** seconds */
  readonly timeout: number;
  /** bytes */
  readonly minFileSize?: number;
  /** bytes */
  readonly maxFileSize?: number;
  readonly allowedExtensions: readonly string[];
  readonly verifySsl: boolean;
  readonly userAgent: string;
}

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36';

export const DEFAULT_DOWNLOADER_CONFIG: DownloaderConfig = Object.freeze({
  outputDir: 'out',
  maxRetries: 3,
  timeout: 30,
  allowedExtensions: Object.freeze(['.pdf', '.doc', '.docx', '.xls', '.xlsx', '.ppt', '.pptx']),
  verifySsl: true,
  userAgent: DEFAULT_USER_AGENT
});

/**
 * Lower-case an extension and give it a leading dot: "PDF" -> ".pdf"
 */
export function normalizeExtension(extension: string): string {
  const trimmed = extension.trim().toLowerCase();
  if (trimmed.length === 0) {
    return '';
  }
  return trimmed.startsWith('.') ? trimmed : `.${trimmed}`;
}

/**
 * Split a comma-separated extension list: ".pdf, DOCX" -> [".pdf", ".docx"]
 */
export function parseExtensionList(list: string): string[] {
  return list
    .split(',')
    .map(normalizeExtension)
    .filter(extension => extension.length > 0);
}

/**
 * Build a validated, frozen configuration on top of the defaults
 */
export function createDownloaderConfig(overrides: Partial<DownloaderConfig> = {}): DownloaderConfig {
  const defaults = DEFAULT_DOWNLOADER_CONFIG;
  const merged: DownloaderConfig = {
    outputDir: overrides.outputDir ?? defaults.outputDir,
    maxRetries: overrides.maxRetries ?? defaults.maxRetries,
    timeout: overrides.timeout ?? defaults.timeout,
    minFileSize: overrides.minFileSize ?? defaults.minFileSize,
    maxFileSize: overrides.maxFileSize ?? defaults.maxFileSize,
    allowedExtensions: overrides.allowedExtensions ?? defaults.allowedExtensions,
    verifySsl: overrides.verifySsl ?? defaults.verifySsl,
    userAgent: overrides.userAgent ?? defaults.userAgent
  };

  requireInteger('maxRetries', merged.maxRetries, 1);
  requireInteger('timeout', merged.timeout, 1);
  if (merged.minFileSize !== undefined) {
    requireInteger('minFileSize', merged.minFileSize, 0);
  }
  if (merged.maxFileSize !== undefined) {
    requireInteger('maxFileSize', merged.maxFileSize, 0);
  }
  if (
    merged.minFileSize !== undefined &&
    merged.maxFileSize !== undefined &&
    merged.minFileSize > merged.maxFileSize
  ) {
    throw new ValidationError(
      `minFileSize (${merged.minFileSize}) must not exceed maxFileSize (${merged.maxFileSize})`,
      { minFileSize: merged.minFileSize, maxFileSize: merged.maxFileSize }
    );
  }

  const allowedExtensions = merged.allowedExtensions
    .map(normalizeExtension)
    .filter(extension => extension.length > 0);
  if (allowedExtensions.length === 0) {
    throw new ValidationError('At least one allowed extension is required');
  }

  if (merged.outputDir.trim().length === 0) {
    throw new ValidationError('Output directory cannot be empty');
  }

  return Object.freeze({
    ...merged,
    allowedExtensions: Object.freeze(allowedExtensions)
  });
}

function requireInteger(name: string, value: number, min: number): void {
  if (!Number.isInteger(value) || value < min) {
    throw new ValidationError(`${name} must be an integer >= ${min}, got ${value}`, { [name]: value });
  }
}
