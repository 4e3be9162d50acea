import { z } from 'zod';

export const RawFieldValueSchema = z.union([z.string(), z.number(), z.null()]);

export const RawTransactionRecordSchema = z.record(z.string(), RawFieldValueSchema);

export const RawTransactionRecordsSchema = z.array(RawTransactionRecordSchema);

const KeywordSchema = z
  .string()
  .refine((keyword) => keyword.trim().length > 0, 'Keyword must not be empty');

export const BankKeywordsSchema = z.object({
  bank: z.string().trim().min(1, 'Bank name must not be empty'),
  keywords: z.array(KeywordSchema).min(1, 'Each bank needs at least one keyword'),
});
export type BankKeywords = z.infer<typeof BankKeywordsSchema>;

/**
 * A keyword mapping as callers and config files write it: either an
 * ordered list of entries or an object keyed by bank name (key order is
 * the priority order).
 */
export const KeywordMappingInputSchema = z.union([
  z.array(BankKeywordsSchema),
  z.record(z.string(), z.array(KeywordSchema).min(1, 'Each bank needs at least one keyword')),
]);
export type KeywordMappingInput = z.infer<typeof KeywordMappingInputSchema>;
