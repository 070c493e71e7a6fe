import { describe, it, expect } from '@jest/globals';
import { DownloadReport } from './DownloadReport';
import { NetworkError } from '../../shared/errors/AppError';

describe('DownloadReport', () => {
  const start = new Date('2024-03-01T10:00:00.000Z');

  it('should start empty and unfinished', () => {
    const report = new DownloadReport(start);

    expect(report.successCount).toBe(0);
    expect(report.failedCount).toBe(0);
    expect(report.skippedCount).toBe(0);
    expect(report.totalSize).toBe(0);
    expect(report.isFinished).toBe(false);
    expect(report.endTime).toBeUndefined();
    expect(report.duration).toBe(0);
  });

  it('should tally every kind of outcome', () => {
    const report = new DownloadReport(start);

    report.record({ status: 'succeeded', url: 'https://a.test/a.pdf', filename: 'a.pdf', bytesWritten: 1500, contentLength: 1500 });
    report.record({ status: 'succeeded', url: 'https://a.test/b.pdf', filename: 'b.pdf', bytesWritten: 500, contentLength: 0 });
    report.record({ status: 'skipped', url: 'https://a.test/c.doc', filename: 'c.doc' });
    report.record({
      status: 'failed',
      url: 'https://a.test/d.docx',
      filename: 'd.docx',
      error: new NetworkError('Failed to fetch https://a.test/d.docx after 3 attempts: HTTP 404: Not Found')
    });

    expect(report.successCount).toBe(2);
    expect(report.skippedCount).toBe(1);
    expect(report.failedCount).toBe(1);
    expect(report.processedCount).toBe(4);
    expect(report.totalSize).toBe(2000);
    expect(report.successfulFiles).toEqual(['a.pdf', 'b.pdf']);
    expect(report.skippedFiles).toEqual(['c.doc']);
    expect(report.failedFiles).toEqual({
      'https://a.test/d.docx': 'Failed to fetch https://a.test/d.docx after 3 attempts: HTTP 404: Not Found'
    });
  });

  it('should measure duration in seconds once finished', () => {
    const report = new DownloadReport(start);

    report.finish(new Date('2024-03-01T10:00:02.500Z'));

    expect(report.isFinished).toBe(true);
    expect(report.duration).toBe(2.5);
  });

  it('should keep the first end time', () => {
    const report = new DownloadReport(start);
    const end = new Date('2024-03-01T10:00:01.000Z');

    report.finish(end);
    report.finish(new Date('2024-03-01T10:05:00.000Z'));

    expect(report.endTime).toBe(end);
    expect(report.duration).toBe(1);
  });
});
