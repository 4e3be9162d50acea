/**
 * Excel workbook export, one worksheet per account type.
 */

import * as XLSX from 'xlsx';
import { ACCOUNT_TYPE_FIELD } from '@bankstmt/types';
import type { CanonicalTransactionRecord, RawFieldValue } from '@bankstmt/types';
import { collectColumns, groupRecords, type RecordGroup } from './grouping.js';

export interface XlsxExportOptions {
  /** Field whose values name the sheets; null writes a single sheet (default: account type) */
  groupBy?: string | null;
}

export const DEFAULT_SHEET = 'transactions';

// Excel limits
const SHEET_NAME_LENGTH = 31;
const SHEET_NAME_FORBIDDEN = /[[\]:*?\/\\]/g;

/**
 * A sheet name Excel accepts and that no earlier sheet uses. Excel
 * compares sheet names without regard to case.
 */
export function sheetName(group: string, taken: Set<string>): string {
  const cleaned = group.replace(SHEET_NAME_FORBIDDEN, '_').trim();
  const base = (cleaned.length > 0 ? cleaned : DEFAULT_SHEET).slice(0, SHEET_NAME_LENGTH);

  let name = base;
  for (let n = 2; taken.has(name.toLowerCase()); n++) {
    const suffix = ` (${n})`;
    name = base.slice(0, SHEET_NAME_LENGTH - suffix.length) + suffix;
  }
  taken.add(name.toLowerCase());
  return name;
}

function cellText(value: RawFieldValue | undefined): string {
  return value === null || value === undefined ? '' : String(value);
}

function buildSheet(columns: readonly string[], records: readonly CanonicalTransactionRecord[]): XLSX.WorkSheet {
  const rows = records.map((record) => columns.map((column) => record[column] ?? null));
  const sheet = XLSX.utils.aoa_to_sheet([[...columns], ...rows]);

  sheet['!cols'] = columns.map((column) => {
    const widest = records.reduce((max, record) => Math.max(max, cellText(record[column]).length), column.length);
    return { wch: widest + 2 };
  });
  return sheet;
}

export function buildWorkbook(
  records: readonly CanonicalTransactionRecord[],
  options: XlsxExportOptions = {}
): XLSX.WorkBook {
  const field = options.groupBy === undefined ? ACCOUNT_TYPE_FIELD : options.groupBy;
  const groups: RecordGroup[] =
    field === null || records.length === 0
      ? [{ group: DEFAULT_SHEET, records: [...records], columns: collectColumns(records) }]
      : groupRecords(records, field);

  const workbook = XLSX.utils.book_new();
  const taken = new Set<string>();
  for (const group of groups) {
    XLSX.utils.book_append_sheet(workbook, buildSheet(group.columns, group.records), sheetName(group.group, taken));
  }
  return workbook;
}

/**
 * Serialize records as an .xlsx file.
 */
export function exportXlsx(
  records: readonly CanonicalTransactionRecord[],
  options: XlsxExportOptions = {}
): Uint8Array {
  const output: unknown = XLSX.write(buildWorkbook(records, options), { type: 'buffer', bookType: 'xlsx' });
  if (!(output instanceof Uint8Array)) {
    throw new Error('Workbook writer did not return binary output');
  }
  return output;
}
