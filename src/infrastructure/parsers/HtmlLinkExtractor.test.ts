import { describe, it, expect } from '@jest/globals';
import { HtmlLinkExtractor } from './HtmlLinkExtractor';
import { PageUrl } from '../../domain/value-objects/PageUrl';
import { silentLogger } from '../../testing/helpers';

const PAGE = 'https://example.com/library/index.html';

function extractor(extensions: string[] = ['.pdf', '.doc', '.docx']): HtmlLinkExtractor {
  return new HtmlLinkExtractor(silentLogger(), extensions);
}

function page(body: string): string {
  return `<!doctype html><html><head><title>Library</title></head><body>${body}</body></html>`;
}

describe('HtmlLinkExtractor', () => {
  it('should resolve matching links in document order', () => {
    const html = page(`
      <a href="/a.pdf">A</a>
      <a href="b.docx">B</a>
      <a href="https://cdn.example.net/c.doc">C</a>
    `);

    expect(extractor().extract(PAGE, html)).toEqual([
      'https://example.com/a.pdf',
      'https://example.com/library/b.docx',
      'https://cdn.example.net/c.doc'
    ]);
  });

  it('should accept the page as bytes', () => {
    const html = Buffer.from(page('<a href="report.pdf">Report</a>'), 'utf8');

    expect(extractor().extract(PAGE, html)).toEqual(['https://example.com/library/report.pdf']);
  });

  it('should exclude empty, fragment and javascript links', () => {
    const html = page(`
      <a href="">empty</a>
      <a href="#section.pdf">fragment</a>
      <a href="javascript:void(0)">js</a>
      <a href="JavaScript:open('x.pdf')">js upper</a>
      <a>no href</a>
    `);

    expect(extractor().extract(PAGE, html)).toEqual([]);
  });

  it('should ignore the query string when matching the extension', () => {
    const html = page(`
      <a href="/files/report.pdf?version=2">versioned</a>
      <a href="/download?file=report.pdf">query only</a>
    `);

    expect(extractor().extract(PAGE, html)).toEqual(['https://example.com/files/report.pdf?version=2']);
  });

  it('should match extensions case-insensitively', () => {
    const html = page('<a href="/SCAN.PDF">scan</a><a href="/notes.Docx">notes</a>');

    expect(extractor(['PDF', '.docx']).extract(PAGE, html)).toEqual([
      'https://example.com/SCAN.PDF',
      'https://example.com/notes.Docx'
    ]);
  });

  it('should skip links with other extensions', () => {
    const html = page('<a href="/photo.jpg">photo</a><a href="/about.html">about</a><a href="/a.pdf.zip">zip</a>');

    expect(extractor().extract(PAGE, html)).toEqual([]);
  });

  it('should skip targets that cannot be fetched over http', () => {
    const html = page(`
      <a href="ftp://files.example.com/a.pdf">ftp</a>
      <a href="mailto:someone@example.com?subject=a.pdf">mail</a>
      <a href="file:///tmp/a.pdf">local</a>
    `);

    expect(extractor().extract(PAGE, html)).toEqual([]);
  });

  it('should keep duplicate links', () => {
    const html = page('<a href="/a.pdf">one</a><a href="https://example.com/a.pdf">two</a>');

    expect(extractor().extract(PAGE, html)).toEqual([
      'https://example.com/a.pdf',
      'https://example.com/a.pdf'
    ]);
  });

  it('should trim whitespace around the href', () => {
    const html = page('<a href="  /spaced.pdf  ">spaced</a>');

    expect(extractor().extract(PAGE, html)).toEqual(['https://example.com/spaced.pdf']);
  });

  it('should return nothing for a page without anchors', () => {
    expect(extractor().extract(PAGE, '<p>No links here</p>')).toEqual([]);
  });

  describe('toDocumentLink', () => {
    const base = new PageUrl(PAGE);

    it('should return the absolute URL of a document link', () => {
      expect(extractor().toDocumentLink(base, '../papers/x.doc')).toBe('https://example.com/papers/x.doc');
    });

    it('should return null for anything else', () => {
      expect(extractor().toDocumentLink(base, '#top')).toBeNull();
      expect(extractor().toDocumentLink(base, 'index.html')).toBeNull();
    });
  });
});
