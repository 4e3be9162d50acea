import {
  EXPENSE_AMOUNT_FIELD,
  INCOME_AMOUNT_FIELD,
  TRANSACTION_AMOUNT_FIELD,
  classifyField,
  coerceAmount,
  normalizeDateString,
} from '@bankstmt/types';
import type {
  CanonicalTransactionRecord,
  MonetaryFieldName,
  RawFieldValue,
  RawTransactionRecord,
} from '@bankstmt/types';

function assertNever(value: never): never {
  throw new Error(`Unhandled field kind: ${JSON.stringify(value)}`);
}

/**
 * Dates that match a known layout become YYYY-MM-DD; anything else,
 * including non-string values, is kept as it was.
 */
function normalizeDateValue(value: RawFieldValue): RawFieldValue {
  if (typeof value !== 'string') return value;
  return normalizeDateString(value) ?? value;
}

/**
 * Normalize one record. Field order is kept; income and expense are
 * appended only when derived from a signed transaction amount.
 */
export function normalizeRecord(record: Readonly<RawTransactionRecord>): CanonicalTransactionRecord {
  const fields: Record<string, RawFieldValue> = {};
  const amounts: Partial<Record<MonetaryFieldName, number>> = {};

  for (const [name, value] of Object.entries(record)) {
    const field = classifyField(name);
    switch (field.kind) {
      case 'date':
        fields[name] = normalizeDateValue(value);
        break;
      case 'monetary': {
        const amount = coerceAmount(value);
        fields[name] = amount;
        amounts[field.name] = amount;
        break;
      }
      case 'passthrough':
        fields[name] = value;
        break;
      default:
        return assertNever(field);
    }
  }

  const signed = amounts[TRANSACTION_AMOUNT_FIELD];
  if (
    signed !== undefined &&
    !Object.hasOwn(record, INCOME_AMOUNT_FIELD) &&
    !Object.hasOwn(record, EXPENSE_AMOUNT_FIELD)
  ) {
    amounts[INCOME_AMOUNT_FIELD] = signed > 0 ? signed : 0;
    amounts[EXPENSE_AMOUNT_FIELD] = signed > 0 ? 0 : Math.abs(signed);
  }

  return Object.assign(fields, amounts);
}

/**
 * Bring raw parser records into canonical form: ISO dates, numeric
 * monetary fields, income and expense split from a signed amount.
 * Never throws; the input is not modified.
 */
export function standardize(
  records: readonly Readonly<RawTransactionRecord>[]
): CanonicalTransactionRecord[] {
  return records.map(normalizeRecord);
}
