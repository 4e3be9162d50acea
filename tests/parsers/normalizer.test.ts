import { describe, it, expect } from 'vitest';
import { normalizeRecord, standardize } from '@bankstmt/statement-parser';
import type { RawTransactionRecord } from '@bankstmt/types';

describe('standardize', () => {
  it('should split a positive transaction amount into income', () => {
    const [record] = standardize([
      { 'transaction date': '2023/05/01', description: 'Salary', 'transaction amount': '1,250.50' },
    ]);

    expect(record).toEqual({
      'transaction date': '2023-05-01',
      description: 'Salary',
      'transaction amount': 1250.5,
      'income amount': 1250.5,
      'expense amount': 0,
    });
  });

  it('should split a negative transaction amount into expense', () => {
    const [record] = standardize([{ 'transaction amount': '-300' }]);

    expect(record).toEqual({ 'transaction amount': -300, 'income amount': 0, 'expense amount': 300 });
  });

  it('should treat a zero amount as neither income nor expense', () => {
    const [record] = standardize([{ 'transaction amount': 0 }]);

    expect(record).toEqual({ 'transaction amount': 0, 'income amount': 0, 'expense amount': 0 });
  });

  it('should keep income and expense the parser already provided', () => {
    const [record] = standardize([
      { 'transaction amount': '-50', 'income amount': '10', 'expense amount': null },
    ]);

    expect(record).toEqual({ 'transaction amount': -50, 'income amount': 10, 'expense amount': 0 });
  });

  it('should not derive when only one of income or expense is present', () => {
    const [record] = standardize([{ 'transaction amount': '25', 'expense amount': '5' }]);

    expect(record).toEqual({ 'transaction amount': 25, 'expense amount': 5 });
  });

  it('should coerce bad amounts to 0', () => {
    const [record] = standardize([{ 'account balance': 'N/A', 'income amount': null, 'expense amount': 'abc' }]);

    expect(record).toEqual({ 'account balance': 0, 'income amount': 0, 'expense amount': 0 });
  });

  it('should convert Chinese dates and leave unknown layouts alone', () => {
    const records = standardize([
      { 'transaction date': '2023年05月01日' },
      { 'transaction date': '05/2023' },
      { 'transaction date': null },
    ]);

    expect(records).toEqual([
      { 'transaction date': '2023-05-01' },
      { 'transaction date': '05/2023' },
      { 'transaction date': null },
    ]);
  });

  it('should leave a date with surrounding whitespace as it was', () => {
    expect(standardize([{ 'transaction date': ' 2023-05-01 ' }])).toEqual([{ 'transaction date': ' 2023-05-01 ' }]);
  });

  it('should pass other fields through untouched', () => {
    const [record] = standardize([{ description: ' ATM  withdrawal ', reference: 42, memo: null }]);

    expect(record).toEqual({ description: ' ATM  withdrawal ', reference: 42, memo: null });
  });

  it('should keep field order and append derived fields', () => {
    const [record] = standardize([{ memo: 'x', 'transaction amount': '5', 'transaction date': '2024/01/02' }]);

    expect(Object.keys(record ?? {})).toEqual([
      'memo',
      'transaction amount',
      'transaction date',
      'income amount',
      'expense amount',
    ]);
  });

  it('should return one output record per input, in order', () => {
    const input: RawTransactionRecord[] = [{ description: 'a' }, {}, { description: 'c' }];

    const output = standardize(input);

    expect(output).toHaveLength(3);
    expect(output.map((record) => record['description'])).toEqual(['a', undefined, 'c']);
  });

  it('should return an empty list for empty input', () => {
    expect(standardize([])).toEqual([]);
  });

  it('should not modify its input', () => {
    const input: RawTransactionRecord = { 'transaction amount': '-12.00', 'transaction date': '2024/02/03' };
    const snapshot = { ...input };

    normalizeRecord(input);

    expect(input).toEqual(snapshot);
  });

  it('should be idempotent', () => {
    const once = standardize([
      { 'transaction date': '2024/02/03', 'transaction amount': '-12.00', 'account balance': '1,000' },
    ]);

    expect(standardize(once)).toEqual(once);
  });
});
