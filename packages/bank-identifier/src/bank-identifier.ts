/**
 * Bank identification from weak textual signals.
 *
 * Order of evidence, first hit wins:
 *   1. caller keyword mapping, substring match on the first pages' text
 *   2. built-in table, substring match
 *   3. built-in table, best fuzzy partial score above `minFuzzyScore`
 *   4. built-in table against the file name
 * Anything else is the "unknown" bank.
 */
import { basename } from 'path';
import {
  createLogger,
  DEFAULT_DETECTION_PAGE_BUDGET,
  UNKNOWN_BANK,
  type ExtractionFailure,
  type Logger,
} from '@bankstmt/types';
import { loadPdfSource, tryExtractText, type DocumentLoader } from '@bankstmt/pdf-extract';
import { partialRatio } from './fuzzy.js';
import { KeywordMapping, loadDefaultKeywordMapping } from './keyword-mapping.js';

export type MatchSource = 'override' | 'keyword' | 'fuzzy' | 'filename';

export type BankIdentification =
  | {
      status: 'matched';
      bank: string;
      source: MatchSource;
      keyword: string;
      /** Fuzzy score (0–100) for fuzzy matches, null otherwise */
      score: number | null;
    }
  | { status: 'no-match'; bank: typeof UNKNOWN_BANK }
  | { status: 'extraction-failed'; bank: typeof UNKNOWN_BANK; failure: ExtractionFailure };

export interface BankIdentifierOptions {
  /** Built-in table (default: default-bank-keywords.json) */
  keywords?: KeywordMapping;
  /** Leading pages read for identification (default: 2) */
  pageBudget?: number;
  /**
   * A fuzzy match is accepted when its score is strictly greater than this.
   * Defaults to 0, so any positive score is accepted; pass
   * FUZZY_SCORE_THRESHOLD to require a close match.
   */
  minFuzzyScore?: number;
  loader?: DocumentLoader;
  logger?: Logger;
}

export class BankIdentifier {
  private readonly keywords: KeywordMapping;
  private readonly pageBudget: number;
  private readonly minFuzzyScore: number;
  private readonly loader: DocumentLoader;
  private readonly logger: Logger;

  constructor(options: BankIdentifierOptions = {}) {
    this.keywords = options.keywords ?? loadDefaultKeywordMapping();
    this.pageBudget = options.pageBudget ?? DEFAULT_DETECTION_PAGE_BUDGET;
    this.minFuzzyScore = options.minFuzzyScore ?? 0;
    this.loader = options.loader ?? loadPdfSource;
    this.logger = options.logger ?? createLogger('bank-identifier');
  }

  /**
   * Identify the issuing bank of a statement document. Never throws; an
   * unreadable document is reported as `extraction-failed`.
   */
  async identify(documentPath: string, bankMapping?: KeywordMapping): Promise<BankIdentification> {
    const extraction = await tryExtractText(documentPath, {
      maxPages: this.pageBudget,
      loader: this.loader,
      logger: this.logger,
    });

    if (!extraction.ok) {
      return { status: 'extraction-failed', bank: UNKNOWN_BANK, failure: extraction.failure };
    }

    const result = this.identifyText(extraction.text, documentPath, bankMapping);
    if (result.status === 'matched') {
      this.logger.debug('Bank identified', {
        path: documentPath,
        bank: result.bank,
        source: result.source,
        keyword: result.keyword,
        score: result.score,
      });
    } else {
      this.logger.debug('No bank matched', { path: documentPath });
    }
    return result;
  }

  async detect(documentPath: string, bankMapping?: KeywordMapping): Promise<string> {
    const result = await this.identify(documentPath, bankMapping);
    return result.bank;
  }

  /**
   * Identification on already-extracted text. `fileName` may be a full
   * path; only its base name is matched.
   */
  identifyText(text: string, fileName: string, bankMapping?: KeywordMapping): BankIdentification {
    const haystack = text.toLowerCase();

    if (bankMapping !== undefined) {
      for (const entry of bankMapping) {
        for (const keyword of entry.keywords) {
          if (haystack.includes(keyword.toLowerCase())) {
            return { status: 'matched', bank: entry.bank, source: 'override', keyword, score: null };
          }
        }
      }
    }

    let best: { bank: string; keyword: string; score: number } | undefined;

    for (const entry of this.keywords) {
      for (const keyword of entry.keywords) {
        const needle = keyword.toLowerCase();
        if (haystack.includes(needle)) {
          return { status: 'matched', bank: entry.bank, source: 'keyword', keyword, score: null };
        }

        const score = partialRatio(needle, haystack);
        if (score > (best?.score ?? 0)) {
          best = { bank: entry.bank, keyword, score };
        }
      }
    }

    if (best !== undefined && best.score > this.minFuzzyScore) {
      return { status: 'matched', bank: best.bank, source: 'fuzzy', keyword: best.keyword, score: best.score };
    }

    const name = basename(fileName).toLowerCase();
    for (const entry of this.keywords) {
      for (const keyword of entry.keywords) {
        if (name.includes(keyword.toLowerCase())) {
          return { status: 'matched', bank: entry.bank, source: 'filename', keyword, score: null };
        }
      }
    }

    return { status: 'no-match', bank: UNKNOWN_BANK };
  }
}

/**
 * Name of the bank that most likely issued the document, or "unknown".
 */
export async function detectBank(
  documentPath: string,
  bankMapping?: KeywordMapping,
  options: BankIdentifierOptions = {}
): Promise<string> {
  return new BankIdentifier(options).detect(documentPath, bankMapping);
}
