/**
 * Single-statement pipeline: identify the bank, pick its parser, parse,
 * normalize and tag every record with the bank and source file.
 */
import { basename } from 'path';
import { BankIdentifier } from '@bankstmt/bank-identifier';
import type { BankIdentification, KeywordMapping } from '@bankstmt/bank-identifier';
import type { DocumentLoader } from '@bankstmt/pdf-extract';
import {
  BANK_FIELD,
  BankDetectionError,
  FILE_NAME_FIELD,
  createLogger,
} from '@bankstmt/types';
import type { CanonicalTransactionRecord, Logger } from '@bankstmt/types';
import { processDocument } from './dispatcher.js';
import { standardize } from './normalizer.js';
import { findQualityIssues, type QualityIssue } from './quality.js';
import { createDefaultRegistry, type ParserRegistry } from './registry.js';

export interface ProcessStatementOptions {
  /** Skip identification and use this bank */
  bank?: string;
  /** User keyword mapping, checked before the built-in table */
  bankMapping?: KeywordMapping;
  identifier?: BankIdentifier;
  registry?: ParserRegistry;
  loader?: DocumentLoader;
  logger?: Logger;
}

export interface StatementResult {
  documentPath: string;
  fileName: string;
  bank: string;
  /** null when the bank was given by the caller */
  identification: BankIdentification | null;
  records: CanonicalTransactionRecord[];
  /** Rows with a date, amount or description problem; empty when all rows look sound */
  issues: QualityIssue[];
}

const ISSUE_MESSAGES: Record<QualityIssue['kind'], string> = {
  date: 'Records with an unrecognized date',
  amount: 'Records without an amount',
  description: 'Records without a description',
};

export async function processStatement(
  documentPath: string,
  options: ProcessStatementOptions = {}
): Promise<StatementResult> {
  const logger = options.logger ?? createLogger('pipeline');
  const registry = options.registry ?? createDefaultRegistry();
  const fileName = basename(documentPath);

  let bank: string;
  let identification: BankIdentification | null = null;
  if (options.bank !== undefined) {
    bank = options.bank;
  } else {
    const identifier =
      options.identifier ??
      new BankIdentifier({ loader: options.loader, logger: logger.child('bank-identifier') });
    identification = await identifier.identify(documentPath, options.bankMapping);
    bank = identification.bank;
  }

  const parser = registry.resolve(bank);
  if (parser === undefined) {
    throw new BankDetectionError(bank, documentPath);
  }

  logger.info('Processing statement', { file: fileName, bank });
  const raw = await processDocument(documentPath, parser, {
    loader: options.loader,
    logger: logger.child('dispatcher'),
  });

  const records = standardize(raw).map(
    (record): CanonicalTransactionRecord => ({
      ...record,
      [BANK_FIELD]: bank,
      [FILE_NAME_FIELD]: fileName,
    })
  );

  const issues = findQualityIssues(raw, records);
  for (const issue of issues) {
    logger.warn(ISSUE_MESSAGES[issue.kind], { file: fileName, count: issue.rows.length, rows: issue.rows });
  }

  return { documentPath, fileName, bank, identification, records, issues };
}
