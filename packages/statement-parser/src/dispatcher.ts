/**
 * Parser dispatch.
 *
 * Opens a statement document, hands it to a bank parser and returns the
 * raw records. The document is closed on every path. Whatever goes wrong
 * inside the parser surfaces as PDFProcessingError; a parser object that
 * cannot parse at all is a wiring mistake and surfaces as
 * ParserConfigurationError instead.
 */
import { basename } from 'path';
import { loadPdfSource, openDocument } from '@bankstmt/pdf-extract';
import type { DocumentLoader, StatementDocument } from '@bankstmt/pdf-extract';
import {
  PDFProcessingError,
  ParserConfigurationError,
  RawTransactionRecordsSchema,
  createLogger,
  describeError,
} from '@bankstmt/types';
import type { Logger, RawTransactionRecord } from '@bankstmt/types';
import { isBankStatementParser, parserTypeName } from './parser.js';

export interface ProcessDocumentOptions {
  loader?: DocumentLoader;
  logger?: Logger;
}

/**
 * A composite result is a two-element array whose first element is itself
 * an array. A plain list of records never has an array as its first item.
 */
function recordsOf(output: unknown): unknown {
  if (Array.isArray(output) && output.length === 2 && Array.isArray(output[0])) {
    return output[0];
  }
  return output;
}

function checkRecords(
  output: unknown,
  documentPath: string,
  parserName: string,
  logger: Logger
): RawTransactionRecord[] {
  const result = RawTransactionRecordsSchema.safeParse(recordsOf(output));
  if (result.success) {
    return result.data;
  }

  const issue = result.error.issues[0];
  const where = issue !== undefined && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
  const reason = issue !== undefined ? issue.message : 'unexpected shape';
  logger.error('Parser returned malformed records', undefined, {
    path: documentPath,
    parser: parserName,
    issues: result.error.issues.length,
  });
  throw new PDFProcessingError(
    `Parser ${parserName} returned malformed records for ${basename(documentPath)}${where}: ${reason}`,
    documentPath
  );
}

async function release(document: StatementDocument, logger: Logger): Promise<void> {
  try {
    await document.close();
  } catch (error) {
    logger.warn('Failed to release statement document', {
      path: document.path,
      reason: describeError(error),
    });
  }
}

/**
 * Run `bankParser` against the document at `documentPath`.
 *
 * `bankParser` is checked at run time because parsers are often looked up
 * from configuration; anything without a callable `parse` is rejected with
 * ParserConfigurationError after the document has been released.
 */
export async function processDocument(
  documentPath: string,
  bankParser: object,
  options: ProcessDocumentOptions = {}
): Promise<RawTransactionRecord[]> {
  const loader = options.loader ?? loadPdfSource;
  const logger = options.logger ?? createLogger('dispatcher');
  const fileName = basename(documentPath);

  let document: StatementDocument;
  try {
    document = await openDocument(documentPath, loader);
  } catch (error) {
    logger.error('Could not open statement document', error, { path: documentPath });
    throw new PDFProcessingError(
      `Could not open ${fileName}: ${describeError(error)}`,
      documentPath
    );
  }

  try {
    if (!isBankStatementParser(bankParser)) {
      throw new ParserConfigurationError(parserTypeName(bankParser));
    }

    const parserName = parserTypeName(bankParser);
    let output: unknown;
    try {
      output = await bankParser.parse(document);
    } catch (error) {
      logger.error('Bank parser failed', error, { path: documentPath, parser: parserName });
      throw new PDFProcessingError(
        `Failed to parse ${fileName} with ${parserName}: ${describeError(error)}`,
        documentPath
      );
    }

    const records = checkRecords(output, documentPath, parserName, logger);
    logger.debug('Parsed statement', { path: documentPath, parser: parserName, records: records.length });
    return records;
  } finally {
    await release(document, logger);
  }
}
