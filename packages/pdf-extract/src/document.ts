/**
 * Statement document handle.
 *
 * Wraps an opened PDF and exposes only what statement processing needs:
 * the page count and the text of a page. Whoever opens a document closes
 * it; `withDocument` does both around a callback.
 */
import { readFile } from 'fs/promises';
import { basename } from 'path';
import { buildLinesFromItems, toTextItems } from './layout.js';

/** The parts of a pdfjs page the extractor reads. */
export interface PdfPageSource {
  getTextContent(): Promise<{ items: unknown[] }>;
}

/** The parts of a pdfjs document the extractor reads. */
export interface PdfSource {
  readonly numPages: number;
  getPage(pageNumber: number): Promise<PdfPageSource>;
  destroy(): Promise<void>;
}

export type DocumentLoader = (filePath: string) => Promise<PdfSource>;

/**
 * Open a PDF from disk with the pdfjs-dist legacy build (the one meant for
 * Node.js).
 */
export const loadPdfSource: DocumentLoader = async (filePath) => {
  const data = new Uint8Array(await readFile(filePath));
  // Dynamic import keeps pdfjs out of module load for callers that never open a file
  const pdfjs = await import('pdfjs-dist/legacy/build/pdf.mjs');
  const loadingTask = pdfjs.getDocument({
    data,
    useSystemFonts: true,
    isEvalSupported: false,
  });
  return loadingTask.promise;
};

export class StatementDocument {
  readonly path: string;
  readonly fileName: string;
  private readonly source: PdfSource;
  private readonly lineCache = new Map<number, string[]>();
  private closed = false;

  constructor(path: string, source: PdfSource) {
    this.path = path;
    this.fileName = basename(path);
    this.source = source;
  }

  get pageCount(): number {
    return this.source.numPages;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Reconstructed text lines of a page.
   *
   * @param index - zero-based page index
   */
  async getPageLines(index: number): Promise<string[]> {
    if (this.closed) {
      throw new Error(`Document is closed: ${this.path}`);
    }
    if (!Number.isInteger(index) || index < 0 || index >= this.pageCount) {
      throw new RangeError(`Page index ${index} is outside 0..${this.pageCount - 1}`);
    }

    const cached = this.lineCache.get(index);
    if (cached !== undefined) {
      return cached;
    }

    const page = await this.source.getPage(index + 1);
    const content = await page.getTextContent();
    const lines = buildLinesFromItems(toTextItems(content.items, index + 1));
    this.lineCache.set(index, lines);
    return lines;
  }

  async getPageText(index: number): Promise<string> {
    const lines = await this.getPageLines(index);
    return lines.join('\n');
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.lineCache.clear();
    await this.source.destroy();
  }
}

export async function openDocument(
  filePath: string,
  loader: DocumentLoader = loadPdfSource
): Promise<StatementDocument> {
  const source = await loader(filePath);
  return new StatementDocument(filePath, source);
}

/**
 * Open a document, hand it to `fn`, and close it however `fn` finishes.
 */
export async function withDocument<T>(
  filePath: string,
  fn: (document: StatementDocument) => Promise<T>,
  loader: DocumentLoader = loadPdfSource
): Promise<T> {
  const document = await openDocument(filePath, loader);
  try {
    return await fn(document);
  } finally {
    await document.close();
  }
}
