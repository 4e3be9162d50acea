import { readFileSync } from 'fs';
import { readFile } from 'fs/promises';
import { fileURLToPath } from 'url';
import {
  KeywordMappingError,
  KeywordMappingInputSchema,
  type BankKeywords,
  type KeywordMappingInput,
} from '@bankstmt/types';

/** One bank and its keywords, as a mapping hands them out. */
export interface BankKeywordEntry {
  readonly bank: string;
  readonly keywords: readonly string[];
}

/**
 * Ordered bank → keywords table. Order is priority: when keyword sets
 * overlap, the bank listed first wins.
 *
 * Instances are validated on construction and frozen.
 */
export class KeywordMapping implements Iterable<BankKeywordEntry> {
  private readonly entries: readonly BankKeywordEntry[];

  private constructor(entries: BankKeywords[]) {
    this.entries = Object.freeze(
      entries.map((entry) => Object.freeze({ bank: entry.bank, keywords: Object.freeze([...entry.keywords]) }))
    );
    Object.freeze(this);
  }

  /**
   * Build a mapping from an entry list or a `{ bank: keywords[] }` object.
   *
   * @throws KeywordMappingError when a bank has no keywords or a keyword is blank
   */
  static from(input: unknown): KeywordMapping {
    const parsed = KeywordMappingInputSchema.safeParse(input);
    if (!parsed.success) {
      throw new KeywordMappingError(
        parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      );
    }
    return new KeywordMapping(toEntries(parsed.data));
  }

  get size(): number {
    return this.entries.length;
  }

  banks(): string[] {
    return this.entries.map((entry) => entry.bank);
  }

  keywordsFor(bank: string): readonly string[] | undefined {
    return this.entries.find((entry) => entry.bank === bank)?.keywords;
  }

  [Symbol.iterator](): Iterator<BankKeywordEntry> {
    return this.entries[Symbol.iterator]();
  }

  toJSON(): Record<string, string[]> {
    const out: Record<string, string[]> = {};
    for (const entry of this.entries) {
      out[entry.bank] = [...entry.keywords];
    }
    return out;
  }
}

function toEntries(input: KeywordMappingInput): BankKeywords[] {
  if (Array.isArray(input)) {
    return input;
  }
  return Object.entries(input).map(([bank, keywords]) => ({ bank, keywords }));
}

let defaultMapping: KeywordMapping | null = null;

/**
 * The built-in table, read once from default-bank-keywords.json.
 */
export function loadDefaultKeywordMapping(): KeywordMapping {
  if (defaultMapping === null) {
    const tablePath = fileURLToPath(new URL('./default-bank-keywords.json', import.meta.url));
    defaultMapping = KeywordMapping.from(JSON.parse(readFileSync(tablePath, 'utf-8')));
  }
  return defaultMapping;
}

/**
 * Read a caller keyword mapping from a JSON file.
 */
export async function loadKeywordMappingFile(filePath: string): Promise<KeywordMapping> {
  const content = await readFile(filePath, 'utf-8');
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new KeywordMappingError([`${filePath}: ${error instanceof Error ? error.message : String(error)}`]);
  }
  return KeywordMapping.from(parsed);
}
