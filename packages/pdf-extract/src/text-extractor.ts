import { createLogger, describeError, type ExtractionFailure, type Logger } from '@bankstmt/types';
import { loadPdfSource, withDocument, type DocumentLoader, type StatementDocument } from './document.js';

export interface ExtractTextOptions {
  /** Read only the first N pages. Ignored when pageIndices is given. */
  maxPages?: number;
  /** Zero-based page indices to read, in this order. Out-of-range indices are dropped. */
  pageIndices?: readonly number[];
  loader?: DocumentLoader;
  logger?: Logger;
}

export type TextExtractionResult =
  | { ok: true; text: string; pageCount: number; pagesRead: number[] }
  | { ok: false; failure: ExtractionFailure };

const defaultLogger = createLogger('pdf-extract');

/**
 * Work out which zero-based pages to read.
 */
export function selectPages(
  pageCount: number,
  options: Pick<ExtractTextOptions, 'maxPages' | 'pageIndices'> = {}
): number[] {
  if (options.pageIndices !== undefined) {
    return options.pageIndices.filter((index) => Number.isInteger(index) && index >= 0 && index < pageCount);
  }

  const limit = options.maxPages === undefined ? pageCount : Math.max(0, Math.min(options.maxPages, pageCount));
  return Array.from({ length: limit }, (_, index) => index);
}

async function readPages(document: StatementDocument, pages: number[], logger: Logger): Promise<string[]> {
  const texts: string[] = [];
  for (const index of pages) {
    try {
      texts.push(await document.getPageText(index));
    } catch (error) {
      // An unreadable page counts as blank
      logger.debug('Page has no extractable text', { path: document.path, page: index, reason: describeError(error) });
      texts.push('');
    }
  }
  return texts;
}

/**
 * Extract the text of selected pages, joined by a blank line.
 * Open and read failures come back as `{ ok: false }`; this never throws.
 */
export async function tryExtractText(
  documentPath: string,
  options: ExtractTextOptions = {}
): Promise<TextExtractionResult> {
  const logger = options.logger ?? defaultLogger;

  try {
    return await withDocument(
      documentPath,
      async (document) => {
        const pagesRead = selectPages(document.pageCount, options);
        const texts = await readPages(document, pagesRead, logger);
        return { ok: true as const, text: texts.join('\n\n'), pageCount: document.pageCount, pagesRead };
      },
      options.loader ?? loadPdfSource
    );
  } catch (error) {
    const failure: ExtractionFailure = { documentPath, message: describeError(error) };
    logger.warn('Text extraction failed', { path: documentPath, reason: failure.message });
    return { ok: false, failure };
  }
}

/**
 * Extract the text of selected pages; null when the document could not be
 * read (the cause is logged).
 */
export async function extractText(documentPath: string, options: ExtractTextOptions = {}): Promise<string | null> {
  const result = await tryExtractText(documentPath, options);
  return result.ok ? result.text : null;
}
