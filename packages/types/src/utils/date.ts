interface DatePattern {
  label: string;
  regex: RegExp;
  order: 'ymd' | 'dmy';
}

/**
 * Statement date layouts, tried in order. Month and day take one or two
 * digits; the year always takes four.
 */
export const DATE_PATTERNS: readonly DatePattern[] = [
  { label: 'YYYY-MM-DD', regex: /^(\d{4})-(\d{1,2})-(\d{1,2})$/, order: 'ymd' },
  { label: 'YYYY/MM/DD', regex: /^(\d{4})\/(\d{1,2})\/(\d{1,2})$/, order: 'ymd' },
  { label: 'YYYY年MM月DD日', regex: /^(\d{4})年(\d{1,2})月(\d{1,2})日$/, order: 'ymd' },
  { label: 'YYYY.MM.DD', regex: /^(\d{4})\.(\d{1,2})\.(\d{1,2})$/, order: 'ymd' },
  { label: 'DD-MM-YYYY', regex: /^(\d{1,2})-(\d{1,2})-(\d{4})$/, order: 'dmy' },
  { label: 'DD/MM/YYYY', regex: /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/, order: 'dmy' },
];

function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

function toISODate(year: number, month: number, day: number): string | null {
  if (year < 1 || month < 1 || month > 12 || day < 1) return null;
  if (day > daysInMonth(year, month)) return null;
  return `${year.toString().padStart(4, '0')}-${month.toString().padStart(2, '0')}-${day
    .toString()
    .padStart(2, '0')}`;
}

/**
 * Convert a statement date string to YYYY-MM-DD.
 * Returns null when no pattern matches the whole string, surrounding
 * whitespace included, or the date does not exist.
 */
export function normalizeDateString(dateStr: string): string | null {
  for (const pattern of DATE_PATTERNS) {
    const match = pattern.regex.exec(dateStr);
    if (match === null) continue;

    const [, first, second, third] = match;
    if (first === undefined || second === undefined || third === undefined) continue;

    const [year, month, day] =
      pattern.order === 'ymd'
        ? [Number(first), Number(second), Number(third)]
        : [Number(third), Number(second), Number(first)];

    const iso = toISODate(year, month, day);
    if (iso !== null) return iso;
  }

  return null;
}
