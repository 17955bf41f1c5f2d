import { z } from 'zod';

export const LedgerCategorySchema = z.enum(['audit', 'gemini']);
export const LedgerFileSchema = z.enum(['indexing', 'query', 'sync', 'init', 'api']);
export const BillingPeriodSchema = z.enum(['total', 'daily', 'monthly']);

const costField = z.number().default(0);

/** A line read back from any `gemini/*.jsonl` file. */
export const LedgerRecordSchema = z
  .object({
    timestamp: z.string().default(''),
    total_cost: costField,
    embedding_cost: costField,
    vision_cost: costField,
    indexing_cost: costField,
    image_cost: costField,
    cost: z.number().optional(),
  })
  .passthrough();

export type LedgerCategory = z.infer<typeof LedgerCategorySchema>;
export type LedgerFile = z.infer<typeof LedgerFileSchema>;
export type BillingPeriod = z.infer<typeof BillingPeriodSchema>;
export type LedgerRecord = z.infer<typeof LedgerRecordSchema>;
