import { Readable } from 'stream';

/**
 * Core interface for file storage operations
 */
export interface IFileStorage {
  /**
   * Directory files are saved into
   */
  readonly baseDir: string;

  /**
   * Create the base directory, parents included
   */
  createDirectory(): Promise<void>;

  /**
   * Check if file exists
   */
  exists(filename: string): Promise<boolean>;

  /**
   * Write a stream to a new file; fails if the file already exists
   */
  save(filename: string, data: Readable): Promise<SavedFile>;

  /**
   * Delete file from storage
   */
  delete(filename: string): Promise<void>;
}

/**
 * File written by save()
 */
export interface SavedFile {
  filename: string;
  path: string;
  bytesWritten: number;
}
