import type { CanonicalTransactionRecord } from '@bankstmt/types';

/**
 * Serialize records as a JSON array, keeping each record's field order.
 */
export function exportJson(records: readonly CanonicalTransactionRecord[], pretty = false): string {
  return pretty ? JSON.stringify(records, null, 2) : JSON.stringify(records);
}
