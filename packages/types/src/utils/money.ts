import type { RawFieldValue } from '../fields.js';

const STRICT_DECIMAL = /^-?(?:\d+\.?\d*|\.\d+)$/;

/**
 * Coerce a raw monetary value to a number.
 *
 * Strings keep only digits, `.` and `-` before parsing, so currency
 * symbols, thousands separators and labels fall away. Whatever is left must
 * be a plain decimal; anything else, including null and non-finite
 * numbers, becomes 0.
 */
export function coerceAmount(value: RawFieldValue | undefined): number {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : 0;
  }
  if (typeof value !== 'string') {
    return 0;
  }

  const cleaned = value.replace(/[^0-9.\-]/g, '');
  if (!STRICT_DECIMAL.test(cleaned)) {
    return 0;
  }

  const num = Number(cleaned);
  return Number.isFinite(num) ? num : 0;
}

export function roundToTwoDecimals(num: number): number {
  return Math.round(num * 100) / 100;
}
