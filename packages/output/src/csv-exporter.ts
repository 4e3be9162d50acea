/**
 * CSV Exporter Module
 *
 * Writes canonical transaction records as CSV for spreadsheet import.
 * Records are free-form, so the header is the union of their field names.
 */

import { ACCOUNT_TYPE_FIELD } from '@bankstmt/types';
import type { CanonicalTransactionRecord, RawFieldValue } from '@bankstmt/types';
import { DEFAULT_GROUP, collectColumns, groupRecords } from './grouping.js';

/**
 * Options for CSV export
 */
export interface CsvExportOptions {
  /** Include header row (default: true) */
  includeHeader?: boolean;
  /** Field delimiter (default: ',') */
  delimiter?: string;
  /** Columns to write, in this order (default: every field, first-seen order) */
  columns?: readonly string[];
  /** Prefix a UTF-8 byte order mark so spreadsheet apps detect the encoding (default: false) */
  bom?: boolean;
}

export interface GroupedCsvOptions extends Omit<CsvExportOptions, 'columns'> {
  /** File name stem for suggested names (default: 'transactions') */
  baseName?: string;
}

/**
 * Result of split-by-group export
 */
export interface GroupedCsvResult {
  /** Value of the grouping field ('default' when records lack it) */
  group: string;
  /** Suggested filename (e.g., 'transactions_hkd_current.csv') */
  filename: string;
  recordCount: number;
  /** CSV content for this group */
  content: string;
}

const BOM = '\uFEFF';

/**
 * Escape a value for CSV (handles quotes and delimiters)
 */
function escapeCsvValue(value: RawFieldValue | undefined, delimiter: string): string {
  if (value === null || value === undefined) {
    return '';
  }

  const str = String(value);

  const needsQuoting =
    str.includes(delimiter) || str.includes('"') || str.includes('\n') || str.includes('\r');

  if (needsQuoting) {
    return `"${str.replace(/"/g, '""')}"`;
  }

  return str;
}

function rowToCsvLine(row: ReadonlyArray<RawFieldValue | undefined>, delimiter: string): string {
  return row.map((value) => escapeCsvValue(value, delimiter)).join(delimiter);
}

/**
 * Export records to CSV text. Missing fields and nulls are written as
 * empty cells; numbers are written as they are.
 */
export function exportCsv(
  records: readonly CanonicalTransactionRecord[],
  options: CsvExportOptions = {}
): string {
  const delimiter = options.delimiter ?? ',';
  const columns = options.columns ?? collectColumns(records);
  const lines: string[] = [];

  if (options.includeHeader ?? true) {
    lines.push(rowToCsvLine(columns, delimiter));
  }

  for (const record of records) {
    lines.push(rowToCsvLine(columns.map((column) => record[column]), delimiter));
  }

  const content = lines.join('\n');
  return options.bom === true ? BOM + content : content;
}

function fileSlug(group: string): string {
  const slug = group
    .toLowerCase()
    .replace(/[^\p{L}\p{N}]+/gu, '_')
    .replace(/^_+|_+$/g, '');
  return slug.length > 0 ? slug : DEFAULT_GROUP;
}

/**
 * Export one CSV per distinct value of `field`, groups in first-seen
 * order. The grouping column is left out of each file since every row
 * would repeat it.
 */
export function exportCsvByGroup(
  records: readonly CanonicalTransactionRecord[],
  field: string = ACCOUNT_TYPE_FIELD,
  options: GroupedCsvOptions = {}
): GroupedCsvResult[] {
  const { baseName = 'transactions', ...csvOptions } = options;
  return groupRecords(records, field).map(({ group, records: members, columns }) => ({
    group,
    filename: `${baseName}_${fileSlug(group)}.csv`,
    recordCount: members.length,
    content: exportCsv(members, { ...csvOptions, columns }),
  }));
}
