/**
 * HSBC integrated-account statement parser.
 *
 * An HSBC statement holds up to three transaction tables: HKD current,
 * HKD savings and foreign currency savings. Each table starts at a header
 * row (日期 进支详情 存入 提取 结余, with 货币 in front for the foreign
 * currency table, or the English equivalents) and ends at a page footer or
 * a total line. Table rows are reconstructed from page text:
 *
 * - a row may omit its date or currency, which carry over from the row above
 * - description lines without amounts belong to the next row that has amounts
 * - a movement with no separate deposit/withdrawal column is classified by
 *   the change in balance
 */
import type { StatementDocument } from '@bankstmt/pdf-extract';
import {
  ACCOUNT_BALANCE_FIELD,
  ACCOUNT_TYPE_FIELD,
  CURRENCY_FIELD,
  DESCRIPTION_FIELD,
  EXPENSE_AMOUNT_FIELD,
  INCOME_AMOUNT_FIELD,
  TRANSACTION_DATE_FIELD,
  coerceAmount,
  normalizeDateString,
  roundToTwoDecimals,
} from '@bankstmt/types';
import type { RawTransactionRecord } from '@bankstmt/types';
import type { BankStatementParser } from '../parser.js';

export const HSBC_BANK = 'HSBC';

export const HSBC_ACCOUNT_TYPES = {
  current: 'HKD current',
  savings: 'HKD savings',
  foreign: 'foreign currency savings',
} as const;

export type HsbcAccountType = typeof HSBC_ACCOUNT_TYPES[keyof typeof HSBC_ACCOUNT_TYPES];

export interface HsbcParseSummary {
  /** Records emitted per account type, in table order */
  accounts: Partial<Record<HsbcAccountType, number>>;
  tables: number;
}

export type HsbcParseResult = readonly [RawTransactionRecord[], HsbcParseSummary];

const SECTION_TITLES: ReadonlyArray<{ accountType: HsbcAccountType; markers: readonly string[] }> = [
  { accountType: HSBC_ACCOUNT_TYPES.foreign, markers: ['外币储蓄', 'foreign currency savings'] },
  { accountType: HSBC_ACCOUNT_TYPES.current, markers: ['港币往来', 'hkd current'] },
  { accountType: HSBC_ACCOUNT_TYPES.savings, markers: ['港币储蓄', 'hkd savings'] },
];

// Each column accepts the Chinese or the English heading
const LOCAL_COLUMNS: ReadonlyArray<readonly string[]> = [
  ['日期', 'date'],
  ['进支详情', 'details'],
  ['存入', 'deposit'],
  ['提取', 'withdrawal'],
  ['结余', 'balance'],
];
const CURRENCY_COLUMN: readonly string[] = ['货币', 'currency', 'ccy'];

// A table ends only at a line that is wholly a page footer or a total
const PAGE_FOOTER = /^(?:page\s+\d+(?:\s*(?:of|\/)\s*\d+)?|第\s*\d+\s*页(?:\s*[,，]?\s*共\s*\d+\s*页)?)$/i;
const TOTAL_LINE = /^(?:total|总计|合计)(?:[\s:：]+-?[\d,]+\.\d{2})*$/i;
const AMOUNT_TOKEN = /^-?(?:\d{1,3}(?:,\d{3})+|\d+)\.\d{2}$/;
const CURRENCY_TOKEN = /^[A-Z]{3}$/;
const BALANCE_ROW = /\b(?:B\/F|C\/F|balance)\b|承前|结余|余额/i;
const CREDIT_HINT = /\b(?:deposit|credit|salary|interest)\b|存入|利息|入账/i;

type HeaderKind = 'local' | 'foreign';

export function matchTableHeader(line: string): HeaderKind | null {
  const lower = line.toLowerCase();
  const hasAll = LOCAL_COLUMNS.every((names) => names.some((name) => lower.includes(name)));
  if (!hasAll) return null;
  return CURRENCY_COLUMN.some((name) => lower.includes(name)) ? 'foreign' : 'local';
}

/** A section title opens the line; inside a description it means nothing. */
function matchSectionTitle(line: string): HsbcAccountType | null {
  const lower = line.trim().toLowerCase();
  for (const section of SECTION_TITLES) {
    if (section.markers.some((marker) => lower.startsWith(marker))) {
      return section.accountType;
    }
  }
  return null;
}

export interface HsbcRow {
  currency: string | null;
  date: string | null;
  details: string;
  amounts: string[];
}

function words(text: string): string[] {
  return text.trim().split(/\s+/).filter((word) => word.length > 0);
}

/**
 * Cells of a table line. Page layout puts a tab between columns; a line
 * without tabs has one cell per word.
 */
function lineCells(line: string): string[][] {
  const cells = line.includes('\t') ? line.split('\t').map(words) : words(line).map((word) => [word]);
  return cells.filter((cell) => cell.length > 0);
}

/**
 * Split a table line into its cells: optional currency and date up front,
 * up to three amounts at the end, and the details in between merged back
 * into one cell. Amounts come only from cells that hold nothing else, so a
 * number inside the details column stays part of the details.
 */
export function splitHsbcRow(line: string, withCurrency: boolean): HsbcRow | null {
  const cells = lineCells(line);
  if (cells.length === 0) return null;

  const takeLeading = (accept: (word: string) => boolean): string | null => {
    const head = cells[0];
    const word = head?.[0];
    if (head === undefined || word === undefined || !accept(word)) return null;
    head.shift();
    if (head.length === 0) cells.shift();
    return word;
  };

  const currency = withCurrency ? takeLeading((word) => CURRENCY_TOKEN.test(word)) : null;
  const date = takeLeading((word) => normalizeDateString(word) !== null);

  const amounts: string[] = [];
  while (amounts.length < 3) {
    const cell = cells[cells.length - 1];
    if (cell === undefined || !cell.every((word) => AMOUNT_TOKEN.test(word))) break;
    amounts.unshift(...cell.splice(Math.max(0, cell.length - (3 - amounts.length))));
    if (cell.length === 0) cells.pop();
  }

  return {
    currency,
    date,
    details: cells.flat().join(' '),
    amounts,
  };
}

interface TableState {
  accountType: HsbcAccountType;
  withCurrency: boolean;
  date: string | null;
  currency: string | null;
  balance: number | null;
  pendingDetails: string[];
}

interface Movement {
  deposit: string | null;
  withdrawal: string | null;
  balance: string | null;
}

function classifyMovement(amounts: readonly string[], details: string, state: TableState): Movement {
  const [first, second, third] = amounts;

  if (third !== undefined && first !== undefined && second !== undefined) {
    return { deposit: first, withdrawal: second, balance: third };
  }

  if (second !== undefined && first !== undefined) {
    const previous = state.balance;
    const credit =
      previous !== null ? coerceAmount(second) >= previous : CREDIT_HINT.test(details);
    return credit
      ? { deposit: first, withdrawal: null, balance: second }
      : { deposit: null, withdrawal: first, balance: second };
  }

  if (first !== undefined && BALANCE_ROW.test(details)) {
    return { deposit: null, withdrawal: null, balance: first };
  }

  const credit = CREDIT_HINT.test(details);
  return credit
    ? { deposit: first ?? null, withdrawal: null, balance: null }
    : { deposit: null, withdrawal: first ?? null, balance: null };
}

function trackBalance(state: TableState, movement: Movement): void {
  if (movement.balance !== null) {
    state.balance = coerceAmount(movement.balance);
    return;
  }
  if (state.balance === null) return;
  const delta = coerceAmount(movement.deposit) - coerceAmount(movement.withdrawal);
  state.balance = roundToTwoDecimals(state.balance + delta);
}

export class HsbcStatementParser implements BankStatementParser {
  readonly name = 'HsbcStatementParser';

  async parse(document: StatementDocument): Promise<HsbcParseResult> {
    const lines: string[] = [];
    for (let page = 0; page < document.pageCount; page++) {
      lines.push(...(await document.getPageLines(page)));
    }
    return this.parseLines(lines);
  }

  parseLines(lines: readonly string[]): HsbcParseResult {
    const records: RawTransactionRecord[] = [];
    const summary: HsbcParseSummary = { accounts: {}, tables: 0 };
    let section: HsbcAccountType | null = null;
    let localTables = 0;
    let table: TableState | null = null;

    for (const line of lines) {
      const header = matchTableHeader(line);
      if (header !== null) {
        let accountType: HsbcAccountType;
        if (header === 'foreign') {
          accountType = HSBC_ACCOUNT_TYPES.foreign;
        } else if (section !== null && section !== HSBC_ACCOUNT_TYPES.foreign) {
          accountType = section;
        } else {
          accountType = localTables === 0 ? HSBC_ACCOUNT_TYPES.current : HSBC_ACCOUNT_TYPES.savings;
        }
        if (header === 'local') localTables++;
        summary.tables++;

        table = {
          accountType,
          withCurrency: header === 'foreign',
          date: null,
          currency: null,
          balance: null,
          pendingDetails: [],
        };
        continue;
      }

      const title = matchSectionTitle(line);
      if (title !== null) {
        section = title;
        table = null;
        continue;
      }

      if (table === null) continue;

      const trimmed = line.trim();
      if (PAGE_FOOTER.test(trimmed) || TOTAL_LINE.test(trimmed)) {
        table = null;
        continue;
      }

      const row = splitHsbcRow(line, table.withCurrency);
      if (row === null) continue;

      if (row.currency !== null) table.currency = row.currency;
      if (row.date !== null) table.date = row.date;

      if (row.amounts.length === 0) {
        if (row.details.length > 0) table.pendingDetails.push(row.details);
        continue;
      }

      const description = [...table.pendingDetails, row.details]
        .filter((part) => part.length > 0)
        .join(' ');
      table.pendingDetails = [];
      if (description.length === 0) continue;

      const movement = classifyMovement(row.amounts, description, table);
      trackBalance(table, movement);

      const record: RawTransactionRecord = {
        [ACCOUNT_TYPE_FIELD]: table.accountType,
        [TRANSACTION_DATE_FIELD]: table.date,
        [DESCRIPTION_FIELD]: description,
        [CURRENCY_FIELD]: table.withCurrency ? table.currency : 'HKD',
        [INCOME_AMOUNT_FIELD]: movement.deposit,
        [EXPENSE_AMOUNT_FIELD]: movement.withdrawal,
      };
      if (movement.balance !== null) {
        record[ACCOUNT_BALANCE_FIELD] = movement.balance;
      }
      records.push(record);
      summary.accounts[table.accountType] = (summary.accounts[table.accountType] ?? 0) + 1;
    }

    return [records, summary];
  }
}
