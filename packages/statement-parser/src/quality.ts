import {
  DESCRIPTION_FIELD,
  EXPENSE_AMOUNT_FIELD,
  INCOME_AMOUNT_FIELD,
  TRANSACTION_AMOUNT_FIELD,
  TRANSACTION_DATE_FIELD,
} from '@bankstmt/types';
import type { CanonicalTransactionRecord, RawTransactionRecord } from '@bankstmt/types';

export type QualityIssueKind = 'date' | 'amount' | 'description';

export interface QualityIssue {
  kind: QualityIssueKind;
  /** 1-based positions in the parser's output */
  rows: number[];
}

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;
const AMOUNT_FIELDS = [TRANSACTION_AMOUNT_FIELD, INCOME_AMOUNT_FIELD, EXPENSE_AMOUNT_FIELD] as const;

const CHECKS: ReadonlyArray<{
  kind: QualityIssueKind;
  failed: (raw: RawTransactionRecord, canonical: CanonicalTransactionRecord | undefined) => boolean;
}> = [
  {
    // Checked after normalization: a date still not in ISO form was not understood
    kind: 'date',
    failed: (_raw, canonical) => {
      const date = canonical?.[TRANSACTION_DATE_FIELD];
      return typeof date !== 'string' || !ISO_DATE.test(date);
    },
  },
  {
    // Normalization fills income and expense with 0, so look at what the parser gave
    kind: 'amount',
    failed: (raw) => AMOUNT_FIELDS.every((field) => raw[field] === null || raw[field] === undefined),
  },
  {
    kind: 'description',
    failed: (raw) => {
      const description = raw[DESCRIPTION_FIELD];
      return description === null || description === undefined || String(description).trim().length === 0;
    },
  },
];

/**
 * Rows whose date was not understood, that carry no amount, or that have
 * no description. `raw` and `canonical` are the same records before and
 * after normalization. Only kinds with at least one row are returned.
 */
export function findQualityIssues(
  raw: readonly RawTransactionRecord[],
  canonical: readonly CanonicalTransactionRecord[]
): QualityIssue[] {
  const issues: QualityIssue[] = [];
  for (const check of CHECKS) {
    const rows: number[] = [];
    raw.forEach((record, index) => {
      if (check.failed(record, canonical[index])) rows.push(index + 1);
    });
    if (rows.length > 0) issues.push({ kind: check.kind, rows });
  }
  return issues;
}
