import { DownloadError } from '../../shared/errors/AppError';

/**
 * Outcome of one candidate link
 */
export type FileOutcome = SucceededFile | SkippedFile | FailedFile;

export interface SucceededFile {
  status: 'succeeded';
  url: string;
  filename: string;
  bytesWritten: number;
  /** content-length announced by the server, 0 when absent */
  contentLength: number;
}

export interface SkippedFile {
  status: 'skipped';
  url: string;
  filename: string;
}

export interface FailedFile {
  status: 'failed';
  url: string;
  filename?: string;
  error: DownloadError;
}

/**
 * Running totals of one download operation
 */
export class DownloadReport {
  private _successCount = 0;
  private _failedCount = 0;
  private _skippedCount = 0;
  private _totalSize = 0;
  private _endTime?: Date;

  private readonly _successfulFiles: string[] = [];
  private readonly _failedFiles: Record<string, string> = {};
  private readonly _skippedFiles: string[] = [];

  constructor(public readonly startTime: Date = new Date()) {}

  get successCount(): number {
    return this._successCount;
  }

  get failedCount(): number {
    return this._failedCount;
  }

  get skippedCount(): number {
    return this._skippedCount;
  }

  /** bytes written by successful downloads */
  get totalSize(): number {
    return this._totalSize;
  }

  get successfulFiles(): readonly string[] {
    return this._successfulFiles;
  }

  /** failure message keyed by source URL */
  get failedFiles(): Readonly<Record<string, string>> {
    return this._failedFiles;
  }

  get skippedFiles(): readonly string[] {
    return this._skippedFiles;
  }

  get endTime(): Date | undefined {
    return this._endTime;
  }

  get processedCount(): number {
    return this._successCount + this._failedCount + this._skippedCount;
  }

  /**
   * Seconds between start and end, 0 until the report is finished
   */
  get duration(): number {
    if (this._endTime === undefined) {
      return 0;
    }
    return (this._endTime.getTime() - this.startTime.getTime()) / 1000;
  }

  get isFinished(): boolean {
    return this._endTime !== undefined;
  }

  /**
   * Add the outcome of one link
   */
  record(outcome: FileOutcome): void {
    switch (outcome.status) {
      case 'succeeded':
        this._successfulFiles.push(outcome.filename);
        this._successCount += 1;
        this._totalSize += outcome.bytesWritten;
        break;
      case 'skipped':
        this._skippedFiles.push(outcome.filename);
        this._skippedCount += 1;
        break;
      case 'failed':
        this._failedFiles[outcome.url] = outcome.error.message;
        this._failedCount += 1;
        break;
    }
  }

  /**
   * Stamp the end time; later calls keep the first stamp
   */
  finish(at: Date = new Date()): void {
    if (this._endTime === undefined) {
      this._endTime = at;
    }
  }
}
