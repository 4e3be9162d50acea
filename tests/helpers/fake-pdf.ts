import type { DocumentLoader, PdfPageSource, PdfSource } from '@bankstmt/pdf-extract';

/**
 * In-memory stand-in for a pdfjs document. Each page is a list of lines;
 * every line becomes one text run, stacked top to bottom.
 */
export class FakePdf implements PdfSource {
  destroyCalls = 0;
  readonly pageRequests: number[] = [];

  constructor(
    private readonly pages: ReadonlyArray<readonly string[]>,
    private readonly brokenPages: ReadonlySet<number> = new Set()
  ) {}

  get numPages(): number {
    return this.pages.length;
  }

  async getPage(pageNumber: number): Promise<PdfPageSource> {
    this.pageRequests.push(pageNumber);
    if (this.brokenPages.has(pageNumber)) {
      throw new Error(`page ${pageNumber} is damaged`);
    }
    const lines = this.pages[pageNumber - 1] ?? [];
    return {
      getTextContent: async () => ({
        items: lines.map((str, index) => ({
          str,
          transform: [10, 0, 0, 10, 40, 780 - index * 14],
          width: str.length * 5,
          height: 10,
        })),
      }),
    };
  }

  async destroy(): Promise<void> {
    this.destroyCalls++;
  }
}

/**
 * Loader that serves FakePdf documents by path and fails like a missing
 * file for anything else.
 */
export function fakeLoader(documents: Record<string, FakePdf>): DocumentLoader {
  return async (filePath) => {
    const document = documents[filePath];
    if (document === undefined) {
      throw new Error(`ENOENT: no such file or directory, open '${filePath}'`);
    }
    return document;
  };
}
