import { z } from 'zod';
import { BillingPeriodSchema } from './ledger.js';

export const QueryRequestSchema = z.object({
  name: z.string().min(1).nullish(),
  query: z.string().min(1, 'query is required'),
  model: z.string().min(1).optional(),
});

export const SyncRequestSchema = z.object({
  name: z.string().min(1).nullish(),
  force: z.boolean().default(false),
});

export const InitRequestSchema = z.object({
  name: z.string().min(1).nullish(),
  db_url: z.string().min(1).nullish(),
});

export const BillingQuerySchema = z.object({
  period: BillingPeriodSchema.default('total'),
});

export type QueryRequest = z.infer<typeof QueryRequestSchema>;
export type SyncRequest = z.infer<typeof SyncRequestSchema>;
export type InitRequest = z.infer<typeof InitRequestSchema>;
export type BillingQuery = z.infer<typeof BillingQuerySchema>;
