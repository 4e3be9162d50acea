import { describe, it, expect } from 'vitest';
import { DEFAULT_GROUP, collectColumns, exportCsv, exportCsvByGroup } from '@bankstmt/output';
import type { CanonicalTransactionRecord } from '@bankstmt/types';

const records: CanonicalTransactionRecord[] = [
  {
    'account type': 'HKD current',
    'transaction date': '2024-03-05',
    description: 'SALARY ACME',
    'income amount': 5000,
    'expense amount': 0,
  },
  {
    'account type': 'HKD savings',
    'transaction date': '2024-03-02',
    description: 'INTEREST',
    'income amount': 1.25,
    'expense amount': 0,
  },
  {
    'account type': 'HKD current',
    'transaction date': '2024-03-06',
    description: 'COFFEE, "LARGE"',
    'income amount': 0,
    'expense amount': 45.5,
    'account balance': 5954.5,
  },
];

describe('collectColumns', () => {
  it('should return every field name in first-seen order', () => {
    expect(collectColumns(records)).toEqual([
      'account type',
      'transaction date',
      'description',
      'income amount',
      'expense amount',
      'account balance',
    ]);
  });
});

describe('exportCsv', () => {
  it('should write a header and one line per record', () => {
    const csv = exportCsv(records);

    expect(csv.split('\n')).toEqual([
      'account type,transaction date,description,income amount,expense amount,account balance',
      'HKD current,2024-03-05,SALARY ACME,5000,0,',
      'HKD savings,2024-03-02,INTEREST,1.25,0,',
      'HKD current,2024-03-06,"COFFEE, ""LARGE""",0,45.5,5954.5',
    ]);
  });

  it('should omit the header when asked', () => {
    const csv = exportCsv(records.slice(1, 2), { includeHeader: false });

    expect(csv).toBe('HKD savings,2024-03-02,INTEREST,1.25,0');
  });

  it('should honour the column list and delimiter', () => {
    const csv = exportCsv(records.slice(0, 1), { columns: ['description', 'currency'], delimiter: ';' });

    expect(csv).toBe('description;currency\nSALARY ACME;');
  });

  it('should write null as an empty cell', () => {
    expect(exportCsv([{ description: null }], { includeHeader: false })).toBe('');
  });

  it('should quote values with line breaks', () => {
    expect(exportCsv([{ description: 'two\nlines' }], { includeHeader: false })).toBe('"two\nlines"');
  });

  it('should prefix a byte order mark when asked', () => {
    const csv = exportCsv([{ description: 'x' }], { bom: true });

    expect(csv).toBe('\uFEFFdescription\nx');
  });

  it('should write only a header line for no records with columns', () => {
    expect(exportCsv([], { columns: ['a', 'b'] })).toBe('a,b');
  });
});

describe('exportCsvByGroup', () => {
  it('should split by account type and drop the grouping column', () => {
    const groups = exportCsvByGroup(records);

    expect(groups.map((g) => [g.group, g.filename, g.recordCount])).toEqual([
      ['HKD current', 'transactions_hkd_current.csv', 2],
      ['HKD savings', 'transactions_hkd_savings.csv', 1],
    ]);
    expect(groups[1]?.content).toBe(
      'transaction date,description,income amount,expense amount\n2024-03-02,INTEREST,1.25,0'
    );
  });

  it('should put records without the field into the default group', () => {
    const groups = exportCsvByGroup(
      [{ description: 'a' }, { description: 'b', currency: '  ' }, { description: 'c', currency: 'USD' }],
      'currency',
      { baseName: 'march' }
    );

    expect(groups.map((g) => [g.group, g.filename, g.recordCount])).toEqual([
      [DEFAULT_GROUP, 'march_default.csv', 2],
      ['USD', 'march_usd.csv', 1],
    ]);
    expect(groups[0]?.content).toBe('description\na\nb');
  });

  it('should slug non-ASCII group names', () => {
    const [group] = exportCsvByGroup([{ 'account type': '外币 储蓄', description: 'x' }]);

    expect(group?.filename).toBe('transactions_外币_储蓄.csv');
  });

  it('should pass the byte order mark to every file', () => {
    const groups = exportCsvByGroup(records, 'account type', { bom: true });

    expect(groups.every((g) => g.content.startsWith('\uFEFF'))).toBe(true);
  });
});
