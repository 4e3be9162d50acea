export {
  BankIdentifier,
  detectBank,
  type BankIdentification,
  type BankIdentifierOptions,
  type MatchSource,
} from './bank-identifier.js';

export {
  KeywordMapping,
  loadDefaultKeywordMapping,
  loadKeywordMappingFile,
  type BankKeywordEntry,
} from './keyword-mapping.js';

export { partialRatio, similarityRatio, lcsLength } from './fuzzy.js';
