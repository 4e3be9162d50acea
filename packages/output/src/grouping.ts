import type { CanonicalTransactionRecord, RawFieldValue } from '@bankstmt/types';

export const DEFAULT_GROUP = 'default';

export interface RecordGroup {
  /** Value of the grouping field ('default' when records lack it) */
  group: string;
  records: CanonicalTransactionRecord[];
  /** Fields of the group's records without the grouping field */
  columns: string[];
}

/**
 * Field names across all records, in the order they are first seen.
 */
export function collectColumns(records: readonly CanonicalTransactionRecord[]): string[] {
  const seen = new Set<string>();
  for (const record of records) {
    for (const name of Object.keys(record)) {
      seen.add(name);
    }
  }
  return [...seen];
}

function groupKey(value: RawFieldValue | undefined): string {
  if (value === null || value === undefined) return DEFAULT_GROUP;
  const key = String(value).trim();
  return key.length > 0 ? key : DEFAULT_GROUP;
}

/**
 * Split records by the value of `field`, groups in first-seen order.
 */
export function groupRecords(records: readonly CanonicalTransactionRecord[], field: string): RecordGroup[] {
  const groups = new Map<string, CanonicalTransactionRecord[]>();

  for (const record of records) {
    const key = groupKey(record[field]);
    const members = groups.get(key);
    if (members === undefined) {
      groups.set(key, [record]);
    } else {
      members.push(record);
    }
  }

  return [...groups].map(([group, members]) => ({
    group,
    records: members,
    columns: collectColumns(members).filter((column) => column !== field),
  }));
}
