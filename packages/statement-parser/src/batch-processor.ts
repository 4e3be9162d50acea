import { BankIdentifier } from '@bankstmt/bank-identifier';
import { ParserConfigurationError, UNKNOWN_BANK, createLogger } from '@bankstmt/types';
import type { CanonicalTransactionRecord } from '@bankstmt/types';
import type { PdfFileInfo } from './directory-scanner.js';
import { processStatement, type ProcessStatementOptions, type StatementResult } from './pipeline.js';
import { createDefaultRegistry } from './registry.js';

export type BatchFile = Pick<PdfFileInfo, 'filePath' | 'fileName'>;

export interface ParseError {
  filename: string;
  filePath: string;
  error: string;
  stack: string | undefined;
  timestamp: string;
}

export interface BatchProcessResult {
  results: StatementResult[];
  /** Records of every successful file, in file order */
  records: CanonicalTransactionRecord[];
  parseErrors: ParseError[];
  summary: {
    totalPdfsFound: number;
    pdfsSucceeded: number;
    pdfsFailed: number;
    totalRecords: number;
    /** Files whose bank could not be identified */
    unknownBank: number;
  };
}

export interface BatchProcessOptions extends ProcessStatementOptions {
  /** Files processed at the same time (default: 1) */
  concurrency?: number;
  /** Called as each file starts; `current` counts started files */
  onProgress?: (current: number, total: number, filename: string) => void;
  onError?: (error: ParseError) => void;
}

type FileOutcome = { ok: true; result: StatementResult } | { ok: false; error: ParseError };

/**
 * Process statement files and collect their records in file order.
 *
 * Up to `concurrency` files are in flight at once. A file that fails is
 * recorded in `parseErrors` and the batch moves on. A misconfigured parser
 * fails every file the same way, so it stops the batch instead: no new
 * file starts and the error is rethrown once running files settle.
 */
export async function processBatch(
  files: readonly BatchFile[],
  options: BatchProcessOptions = {}
): Promise<BatchProcessResult> {
  const { concurrency = 1, onProgress, onError, ...statementOptions } = options;
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new RangeError(`Batch concurrency must be a positive integer, got ${concurrency}`);
  }
  const logger = statementOptions.logger ?? createLogger('batch');
  // One identifier and registry for the whole batch
  const shared: ProcessStatementOptions = {
    ...statementOptions,
    logger,
    registry: statementOptions.registry ?? createDefaultRegistry(),
    identifier:
      statementOptions.identifier ??
      new BankIdentifier({ loader: statementOptions.loader, logger: logger.child('bank-identifier') }),
  };

  const outcomes: Array<FileOutcome | undefined> = new Array(files.length);
  let next = 0;
  const fatal: ParserConfigurationError[] = [];

  const worker = async (): Promise<void> => {
    while (fatal.length === 0 && next < files.length) {
      const index = next++;
      const file = files[index];
      if (file === undefined) continue;

      onProgress?.(index + 1, files.length, file.fileName);

      try {
        outcomes[index] = { ok: true, result: await processStatement(file.filePath, shared) };
      } catch (error) {
        if (error instanceof ParserConfigurationError) {
          fatal.push(error);
          return;
        }
        const parseError = createParseError(file, error);
        outcomes[index] = { ok: false, error: parseError };
        logger.warn('Skipping file', { file: file.fileName, reason: parseError.error });
        onError?.(parseError);
      }
    }
  };

  await Promise.all(Array.from({ length: Math.min(concurrency, files.length) }, () => worker()));
  const [configurationError] = fatal;
  if (configurationError !== undefined) {
    throw configurationError;
  }

  const results: StatementResult[] = [];
  const parseErrors: ParseError[] = [];
  for (const outcome of outcomes) {
    if (outcome === undefined) continue;
    if (outcome.ok) {
      results.push(outcome.result);
    } else {
      parseErrors.push(outcome.error);
    }
  }

  const records = results.flatMap((result) => result.records);

  return {
    results,
    records,
    parseErrors,
    summary: {
      totalPdfsFound: files.length,
      pdfsSucceeded: results.length,
      pdfsFailed: parseErrors.length,
      totalRecords: records.length,
      unknownBank: results.filter((result) => result.bank === UNKNOWN_BANK).length,
    },
  };
}

function createParseError(file: BatchFile, error: unknown): ParseError {
  const message = error instanceof Error ? error.message : String(error);
  const stack = error instanceof Error ? error.stack : undefined;

  return {
    filename: file.fileName,
    filePath: file.filePath,
    error: message,
    stack,
    timestamp: new Date().toISOString(),
  };
}
