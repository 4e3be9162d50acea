// Parser contract and dispatch
export {
  isBankStatementParser,
  parserTypeName,
  type BankStatementParser,
  type ParserOutput,
} from './parser.js';
export { processDocument, type ProcessDocumentOptions } from './dispatcher.js';

// Normalization
export { standardize, normalizeRecord } from './normalizer.js';

export { findQualityIssues, type QualityIssue, type QualityIssueKind } from './quality.js';

// Registry and bundled parsers
export { ParserRegistry, createDefaultRegistry, type RegisteredParser } from './registry.js';
export { GenericStatementParser, parseGenericLine } from './parsers/generic-parser.js';
export {
  HsbcStatementParser,
  HSBC_BANK,
  HSBC_ACCOUNT_TYPES,
  matchTableHeader,
  splitHsbcRow,
  type HsbcAccountType,
  type HsbcParseResult,
  type HsbcParseSummary,
  type HsbcRow,
} from './parsers/hsbc-parser.js';

// Pipeline and batch
export {
  processStatement,
  type ProcessStatementOptions,
  type StatementResult,
} from './pipeline.js';
export {
  processBatch,
  type BatchFile,
  type BatchProcessOptions,
  type BatchProcessResult,
  type ParseError,
} from './batch-processor.js';
export {
  scanDirectoryForPdfs,
  validateDirectory,
  type DirectoryCheck,
  type PdfFileInfo,
  type ScanOptions,
  type ScanResult,
  type SkippedFile,
} from './directory-scanner.js';
