import { describe, it, expect } from 'vitest';
import { createLogger } from '@bankstmt/types';
import { extractText, selectPages, tryExtractText, withDocument } from '@bankstmt/pdf-extract';
import { FakePdf, fakeLoader } from '../helpers/fake-pdf.js';

const quiet = createLogger('test', { level: 'silent' });

describe('selectPages', () => {
  it('should read every page by default', () => {
    expect(selectPages(3)).toEqual([0, 1, 2]);
  });

  it('should cap at maxPages', () => {
    expect(selectPages(5, { maxPages: 2 })).toEqual([0, 1]);
    expect(selectPages(1, { maxPages: 2 })).toEqual([0]);
    expect(selectPages(4, { maxPages: -1 })).toEqual([]);
  });

  it('should prefer explicit page indices and drop out-of-range ones', () => {
    expect(selectPages(3, { pageIndices: [2, 0, 7, -1], maxPages: 1 })).toEqual([2, 0]);
  });
});

describe('tryExtractText', () => {
  it('should join the selected pages with a blank line', async () => {
    const pdf = new FakePdf([['Page one', 'line two'], ['Page two'], ['Page three']]);
    const result = await tryExtractText('/docs/a.pdf', {
      maxPages: 2,
      loader: fakeLoader({ '/docs/a.pdf': pdf }),
      logger: quiet,
    });

    expect(result).toEqual({
      ok: true,
      text: 'Page one\nline two\n\nPage two',
      pageCount: 3,
      pagesRead: [0, 1],
    });
    expect(pdf.pageRequests).toEqual([1, 2]);
    expect(pdf.destroyCalls).toBe(1);
  });

  it('should count an unreadable page as blank', async () => {
    const pdf = new FakePdf([['first'], ['second'], ['third']], new Set([2]));
    const result = await tryExtractText('/docs/b.pdf', { loader: fakeLoader({ '/docs/b.pdf': pdf }), logger: quiet });

    expect(result.ok && result.text).toBe('first\n\n\n\nthird');
  });

  it('should report an unopenable document as a failure value', async () => {
    const lines: string[] = [];
    const logger = createLogger('pdf-extract', { level: 'warn', sink: (line) => lines.push(line) });

    const result = await tryExtractText('/docs/missing.pdf', { loader: fakeLoader({}), logger });

    expect(result).toEqual({
      ok: false,
      failure: {
        documentPath: '/docs/missing.pdf',
        message: "ENOENT: no such file or directory, open '/docs/missing.pdf'",
      },
    });
    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(/^\[WARN\] \[pdf-extract\] Text extraction failed /);
  });
});

describe('extractText', () => {
  it('should return null when the document cannot be read', async () => {
    expect(await extractText('/docs/missing.pdf', { loader: fakeLoader({}), logger: quiet })).toBeNull();
  });

  it('should return an empty string for a document without pages', async () => {
    const pdf = new FakePdf([]);
    expect(await extractText('/docs/empty.pdf', { loader: fakeLoader({ '/docs/empty.pdf': pdf }), logger: quiet })).toBe('');
  });
});

describe('StatementDocument', () => {
  it('should expose file name, page count and page lines', async () => {
    const pdf = new FakePdf([['alpha', 'beta'], ['gamma']]);

    const seen = await withDocument(
      '/docs/statement-03.pdf',
      async (document) => ({
        fileName: document.fileName,
        pageCount: document.pageCount,
        lines: await document.getPageLines(1),
        text: await document.getPageText(0),
      }),
      fakeLoader({ '/docs/statement-03.pdf': pdf })
    );

    expect(seen).toEqual({ fileName: 'statement-03.pdf', pageCount: 2, lines: ['gamma'], text: 'alpha\nbeta' });
    expect(pdf.destroyCalls).toBe(1);
  });

  it('should cache page lines', async () => {
    const pdf = new FakePdf([['alpha']]);
    await withDocument(
      '/docs/c.pdf',
      async (document) => {
        await document.getPageLines(0);
        await document.getPageLines(0);
      },
      fakeLoader({ '/docs/c.pdf': pdf })
    );

    expect(pdf.pageRequests).toEqual([1]);
  });

  it('should reject out-of-range pages', async () => {
    const pdf = new FakePdf([['alpha']]);
    await expect(
      withDocument('/docs/d.pdf', (document) => document.getPageLines(1), fakeLoader({ '/docs/d.pdf': pdf }))
    ).rejects.toThrow(RangeError);
    expect(pdf.destroyCalls).toBe(1);
  });

  it('should refuse reads after close and close only once', async () => {
    const pdf = new FakePdf([['alpha']]);
    const document = await withDocument('/docs/e.pdf', async (opened) => opened, fakeLoader({ '/docs/e.pdf': pdf }));

    expect(document.isClosed).toBe(true);
    await document.close();
    expect(pdf.destroyCalls).toBe(1);
    await expect(document.getPageLines(0)).rejects.toThrow('Document is closed: /docs/e.pdf');
  });
});
