/**
 * Field taxonomy for transaction records.
 *
 * Parsers emit free-form field names. Only the date field and the four
 * monetary fields have fixed names and representations; every other field
 * passes through normalization untouched.
 */

export const TRANSACTION_DATE_FIELD = 'transaction date';

export const TRANSACTION_AMOUNT_FIELD = 'transaction amount';
export const INCOME_AMOUNT_FIELD = 'income amount';
export const EXPENSE_AMOUNT_FIELD = 'expense amount';
export const ACCOUNT_BALANCE_FIELD = 'account balance';

export const MONETARY_FIELDS = [
  TRANSACTION_AMOUNT_FIELD,
  INCOME_AMOUNT_FIELD,
  EXPENSE_AMOUNT_FIELD,
  ACCOUNT_BALANCE_FIELD,
] as const;

// Passthrough fields the bundled parsers and the pipeline write
export const DESCRIPTION_FIELD = 'description';
export const CURRENCY_FIELD = 'currency';
export const ACCOUNT_TYPE_FIELD = 'account type';
export const BANK_FIELD = 'bank';
export const FILE_NAME_FIELD = 'file name';

export type DateFieldName = typeof TRANSACTION_DATE_FIELD;
export type MonetaryFieldName = typeof MONETARY_FIELDS[number];

export type RawFieldValue = string | number | null;

/** A record as a bank parser produced it: field name to raw value. */
export type RawTransactionRecord = Record<string, RawFieldValue>;

/**
 * A normalized record. Same field set as its raw record; every monetary
 * field it carries holds a number.
 */
export type CanonicalTransactionRecord = Readonly<Record<string, RawFieldValue>> &
  Readonly<Partial<Record<MonetaryFieldName, number>>>;

export type TransactionField =
  | { kind: 'date'; name: DateFieldName }
  | { kind: 'monetary'; name: MonetaryFieldName }
  | { kind: 'passthrough'; name: string };

export function isMonetaryField(name: string): name is MonetaryFieldName {
  return (MONETARY_FIELDS as readonly string[]).includes(name);
}

export function classifyField(name: string): TransactionField {
  if (name === TRANSACTION_DATE_FIELD) {
    return { kind: 'date', name };
  }
  if (isMonetaryField(name)) {
    return { kind: 'monetary', name };
  }
  return { kind: 'passthrough', name };
}
