/**
 * Fallback parser for banks without a dedicated one.
 *
 * Looks for single-line rows of the form
 *   <date> <description> <amount> [<balance>]
 * on every page and ignores everything else.
 */
import type { StatementDocument } from '@bankstmt/pdf-extract';
import {
  ACCOUNT_BALANCE_FIELD,
  DESCRIPTION_FIELD,
  TRANSACTION_AMOUNT_FIELD,
  TRANSACTION_DATE_FIELD,
} from '@bankstmt/types';
import type { RawTransactionRecord } from '@bankstmt/types';
import type { BankStatementParser } from '../parser.js';

const DATE = String.raw`\d{4}[-/.]\d{1,2}[-/.]\d{1,2}|\d{4}年\d{1,2}月\d{1,2}日|\d{1,2}[-/]\d{1,2}[-/]\d{4}`;
const AMOUNT = String.raw`-?[\d,]+\.\d{2}`;

const ROW_PATTERN = new RegExp(
  `^(?<date>${DATE})\\s+(?<description>.+?)\\s+(?<amount>${AMOUNT})(?:\\s+(?<balance>${AMOUNT}))?$`
);

export function parseGenericLine(line: string): RawTransactionRecord | null {
  const match = ROW_PATTERN.exec(line.trim());
  const groups = match?.groups;
  if (groups === undefined) return null;

  const date = groups['date'];
  const description = groups['description'];
  const amount = groups['amount'];
  if (date === undefined || description === undefined || amount === undefined) return null;

  const record: RawTransactionRecord = {
    [TRANSACTION_DATE_FIELD]: date,
    [DESCRIPTION_FIELD]: description.replace(/\s+/g, ' '),
    [TRANSACTION_AMOUNT_FIELD]: amount,
  };
  const balance = groups['balance'];
  if (balance !== undefined) {
    record[ACCOUNT_BALANCE_FIELD] = balance;
  }
  return record;
}

export class GenericStatementParser implements BankStatementParser {
  readonly name = 'GenericStatementParser';

  async parse(document: StatementDocument): Promise<RawTransactionRecord[]> {
    const records: RawTransactionRecord[] = [];
    for (let page = 0; page < document.pageCount; page++) {
      for (const line of await document.getPageLines(page)) {
        const record = parseGenericLine(line);
        if (record !== null) {
          records.push(record);
        }
      }
    }
    return records;
  }
}
