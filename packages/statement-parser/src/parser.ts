import type { StatementDocument } from '@bankstmt/pdf-extract';
import type { RawTransactionRecord } from '@bankstmt/types';

/**
 * What a bank parser may return: the records alone, or a pair whose first
 * element is the records and whose second is parser-specific metadata.
 * Only the records travel further.
 */
export type ParserOutput = RawTransactionRecord[] | readonly [RawTransactionRecord[], unknown];

/**
 * A bank-specific statement parser. It reads an already opened document
 * and must not close it.
 */
export interface BankStatementParser {
  readonly name?: string;
  parse(document: StatementDocument): ParserOutput | Promise<ParserOutput>;
}

export function isBankStatementParser(value: unknown): value is BankStatementParser {
  return (
    typeof value === 'object' &&
    value !== null &&
    'parse' in value &&
    typeof value.parse === 'function'
  );
}

/**
 * Human-readable type of a parser object, for error messages.
 */
export function parserTypeName(value: object): string {
  if ('name' in value && typeof value.name === 'string' && value.name.length > 0) {
    return value.name;
  }
  // Objects without a prototype have no constructor
  const ctor: unknown = value.constructor;
  if (typeof ctor === 'function' && ctor.name.length > 0) {
    return ctor.name;
  }
  return 'Object';
}
