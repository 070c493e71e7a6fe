/**
 * Value object representing a filename that is safe to create inside the output directory
 */
export class Filename {
  static readonly FALLBACK = 'document';
  /** bytes, the usual file name limit */
  private static readonly MAX_BYTES = 255;
  private static readonly RESERVED_CHARS = /[<>:"|?*\x00-\x1f]/g;
  private static readonly RESERVED_NAMES = [
    'CON', 'PRN', 'AUX', 'NUL',
    'COM1', 'COM2', 'COM3', 'COM4', 'COM5', 'COM6', 'COM7', 'COM8', 'COM9',
    'LPT1', 'LPT2', 'LPT3', 'LPT4', 'LPT5', 'LPT6', 'LPT7', 'LPT8', 'LPT9'
  ];

  private readonly value: string;

  constructor(filename: string) {
    this.value = Filename.sanitize(filename);
  }

  /**
   * Get the sanitized filename
   */
  toString(): string {
    return this.value;
  }

  /**
   * Get file extension (including dot)
   */
  getExtension(): string {
    return Filename.extensionOf(this.value);
  }

  /**
   * Check if two filenames are equal
   */
  equals(other: Filename): boolean {
    return this.value === other.value;
  }

  /**
   * Create filename from the last path segment of a URL
   */
  static fromUrl(url: string): Filename {
    let pathname: string;
    try {
      pathname = new URL(url).pathname;
    } catch {
      return new Filename(Filename.FALLBACK);
    }

    const lastSegment = pathname.split('/').pop() ?? '';
    return new Filename(Filename.decode(lastSegment));
  }

  /**
   * Sanitize filename for filesystem compatibility
   */
  static sanitize(filename: string): string {
    // Directory separators first, so a decoded "../x" cannot leave the directory
    let sanitized = filename.replace(/[/\\]/g, '_');

    sanitized = sanitized.replace(Filename.RESERVED_CHARS, '_');

    sanitized = sanitized.trim().replace(/^\.+|\.+$/g, '').trim();

    // Windows device names
    const nameWithoutExt = sanitized.substring(0, sanitized.length - Filename.extensionOf(sanitized).length);
    if (Filename.RESERVED_NAMES.includes(nameWithoutExt.toUpperCase())) {
      sanitized = '_' + sanitized;
    }

    sanitized = Filename.truncate(sanitized);

    if (sanitized.length === 0) {
      sanitized = Filename.FALLBACK;
    }

    return sanitized;
  }

  /**
   * Cut a name to MAX_BYTES of UTF-8 on code point boundaries, keeping the extension
   */
  private static truncate(filename: string): string {
    if (Buffer.byteLength(filename) <= Filename.MAX_BYTES) {
      return filename;
    }

    let extension = Filename.extensionOf(filename);
    if (Buffer.byteLength(extension) >= Filename.MAX_BYTES) {
      extension = '';
    }
    const budget = Filename.MAX_BYTES - Buffer.byteLength(extension);

    let basename = '';
    let used = 0;
    for (const char of filename.substring(0, filename.length - extension.length)) {
      const size = Buffer.byteLength(char);
      if (used + size > budget) {
        break;
      }
      basename += char;
      used += size;
    }

    return basename + extension;
  }

  private static extensionOf(filename: string): string {
    const lastDot = filename.lastIndexOf('.');
    return lastDot > 0 ? filename.substring(lastDot) : '';
  }

  private static decode(segment: string): string {
    try {
      return decodeURIComponent(segment);
    } catch {
      return segment;
    }
  }
}
