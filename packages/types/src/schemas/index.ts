export {
  RawFieldValueSchema,
  RawTransactionRecordSchema,
  RawTransactionRecordsSchema,
  BankKeywordsSchema,
  KeywordMappingInputSchema,
} from './records.js';

export type { BankKeywords, KeywordMappingInput } from './records.js';
