import { describe, it, expect } from '@jest/globals';
import {
  DEFAULT_DOWNLOADER_CONFIG,
  DEFAULT_USER_AGENT,
  createDownloaderConfig,
  normalizeExtension,
  parseExtensionList
} from './DownloaderConfig';
import { ValidationError } from '../../shared/errors/AppError';

describe('DownloaderConfig', () => {
  describe('createDownloaderConfig', () => {
    it('should fill in the defaults', () => {
      const config = createDownloaderConfig();

      expect(config).toEqual({
        outputDir: 'out',
        maxRetries: 3,
        timeout: 30,
        minFileSize: undefined,
        maxFileSize: undefined,
        allowedExtensions: ['.pdf', '.doc', '.docx', '.xls', '.xlsx', '.ppt', '.pptx'],
        verifySsl: true,
        userAgent: DEFAULT_USER_AGENT
      });
    });

    it('should apply overrides', () => {
      const config = createDownloaderConfig({
        outputDir: 'papers',
        maxRetries: 5,
        timeout: 10,
        minFileSize: 1024,
        maxFileSize: 2048,
        allowedExtensions: ['PDF', 'txt'],
        verifySsl: false,
        userAgent: 'test-agent/1.0'
      });

      expect(config.outputDir).toBe('papers');
      expect(config.maxRetries).toBe(5);
      expect(config.timeout).toBe(10);
      expect(config.minFileSize).toBe(1024);
      expect(config.maxFileSize).toBe(2048);
      expect(config.allowedExtensions).toEqual(['.pdf', '.txt']);
      expect(config.verifySsl).toBe(false);
      expect(config.userAgent).toBe('test-agent/1.0');
    });

    it('should return a frozen object', () => {
      const config = createDownloaderConfig();

      expect(Object.isFrozen(config)).toBe(true);
      expect(Object.isFrozen(config.allowedExtensions)).toBe(true);
      expect(Object.isFrozen(DEFAULT_DOWNLOADER_CONFIG)).toBe(true);
    });

    it('should reject a retry count below one', () => {
      expect(() => createDownloaderConfig({ maxRetries: 0 }))
        .toThrow('maxRetries must be an integer >= 1, got 0');
    });

    it('should reject a fractional timeout', () => {
      expect(() => createDownloaderConfig({ timeout: 1.5 }))
        .toThrow('timeout must be an integer >= 1, got 1.5');
    });

    it('should reject negative size bounds', () => {
      expect(() => createDownloaderConfig({ minFileSize: -1 }))
        .toThrow('minFileSize must be an integer >= 0, got -1');
    });

    it('should reject a minimum above the maximum', () => {
      expect(() => createDownloaderConfig({ minFileSize: 10, maxFileSize: 5 }))
        .toThrow('minFileSize (10) must not exceed maxFileSize (5)');
    });

    it('should reject an empty extension list', () => {
      expect(() => createDownloaderConfig({ allowedExtensions: [' ', ''] })).toThrow(ValidationError);
      expect(() => createDownloaderConfig({ allowedExtensions: [] }))
        .toThrow('At least one allowed extension is required');
    });

    it('should reject an empty output directory', () => {
      expect(() => createDownloaderConfig({ outputDir: '  ' })).toThrow('Output directory cannot be empty');
    });
  });

  describe('normalizeExtension', () => {
    it('should lower-case and add a leading dot', () => {
      expect(normalizeExtension('PDF')).toBe('.pdf');
      expect(normalizeExtension(' .Docx ')).toBe('.docx');
      expect(normalizeExtension('')).toBe('');
    });
  });

  describe('parseExtensionList', () => {
    it('should split on commas and drop blanks', () => {
      expect(parseExtensionList('.pdf, DOCX,,xls ')).toEqual(['.pdf', '.docx', '.xls']);
    });
  });
});
