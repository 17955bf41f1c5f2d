import { z } from 'zod';

export const LogLevelSchema = z.enum(['error', 'warn', 'info', 'debug']);

// USD per 1M tokens: [input, output]
export const DEFAULT_PRICING: Readonly<Record<string, readonly [number, number]>> = {
  'gemini-2.5-flash-lite': [0.1, 0.4],
  'gemini-2.5-flash': [0.15, 0.6],
  'gemini-2.5-pro': [1.25, 10.0],
  'gemini-3-flash-preview': [0.15, 0.6],
  'gemini-3-pro-preview': [2.0, 12.0],
  'gemini-embedding-001': [0.15, 0.0],
};

export const PriceSchema = z.tuple([z.number().min(0), z.number().min(0)]);

export const ModelSettingsSchema = z.object({
  query: z.string().default('gemini-2.5-flash-lite'),
  embedding: z.string().default('gemini-embedding-001'),
  imageVision: z.string().default('gemini-3-flash-preview'),
});

export const ServerSettingsSchema = z.object({
  host: z.string().default('127.0.0.1'),
  port: z.number().int().min(1).max(65535).default(8000),
});

export const SettingsSchema = z.object({
  databases: z.record(z.string().min(1)).default({}),
  models: ModelSettingsSchema.default({}),
  syncDays: z.number().positive().default(2),
  indexWaitSec: z.number().min(0).default(5),
  pollIntervalSec: z.number().min(0).default(2),
  pollMaxAttempts: z.number().int().positive().default(150),
  imageTimeoutSec: z.number().positive().default(30),
  maxBlockDepth: z.number().int().positive().default(32),
  server: ServerSettingsSchema.default({}),
  logLevel: LogLevelSchema.default('info'),
  logDir: z.string().default('logs'),
  pricing: z.record(PriceSchema).default({}),
});

export type LogLevel = z.infer<typeof LogLevelSchema>;
export type Price = z.infer<typeof PriceSchema>;
export type ModelSettings = z.infer<typeof ModelSettingsSchema>;
export type Settings = z.infer<typeof SettingsSchema>;
