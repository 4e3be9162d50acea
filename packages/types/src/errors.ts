/**
 * Raised when a statement document cannot be turned into transaction
 * records: the document could not be opened, or the bank parser failed.
 * The message is meant for the person running the tool; the low-level
 * cause is logged where the error is raised.
 */
export class PDFProcessingError extends Error {
  readonly documentPath: string | undefined;

  constructor(message: string, documentPath?: string) {
    super(message);
    this.name = 'PDFProcessingError';
    this.documentPath = documentPath;
  }
}

/**
 * The issuing bank was identified (or given) but no parser handles it.
 */
export class BankDetectionError extends PDFProcessingError {
  readonly bank: string;

  constructor(bank: string, documentPath?: string) {
    super(`No parser is registered for bank "${bank}"`, documentPath);
    this.name = 'BankDetectionError';
    this.bank = bank;
  }
}

/**
 * A parser was wired in that does not satisfy BankStatementParser.
 * This is a caller defect, not bad input, so it is never folded into
 * PDFProcessingError.
 */
export class ParserConfigurationError extends Error {
  readonly parserType: string;

  constructor(parserType: string) {
    super(`Parser of type "${parserType}" does not provide a callable parse() method`);
    this.name = 'ParserConfigurationError';
    this.parserType = parserType;
  }
}

export class KeywordMappingError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid bank keyword mapping:\n${issues.map((issue) => `  - ${issue}`).join('\n')}`);
    this.name = 'KeywordMappingError';
    this.issues = issues;
  }
}

/**
 * Extraction failures are reported as values, not thrown.
 */
export interface ExtractionFailure {
  documentPath: string;
  message: string;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
