// Config schemas
export {
  LogLevelSchema,
  PriceSchema,
  ModelSettingsSchema,
  ServerSettingsSchema,
  SettingsSchema,
  DEFAULT_PRICING,
  type LogLevel,
  type Price,
  type ModelSettings,
  type Settings,
} from './config.js';

// Notion API schemas
export {
  RawRichTextSchema,
  RawBlockSchema,
  RawTextPayloadSchema,
  RawCodePayloadSchema,
  RawTableRowPayloadSchema,
  RawImagePayloadSchema,
  RawLinkPayloadSchema,
  RawFilePayloadSchema,
  RawChildPayloadSchema,
  RawBlockListSchema,
  RawPropertySchema,
  RawPageSchema,
  RawSelectSchema,
  type RawRichText,
  type RawBlock,
  type RawPage,
} from './notion.js';

// Ledger schemas
export {
  LedgerCategorySchema,
  LedgerFileSchema,
  BillingPeriodSchema,
  LedgerRecordSchema,
  type LedgerCategory,
  type LedgerFile,
  type BillingPeriod,
  type LedgerRecord,
} from './ledger.js';

// API schemas
export {
  QueryRequestSchema,
  SyncRequestSchema,
  InitRequestSchema,
  BillingQuerySchema,
  type QueryRequest,
  type SyncRequest,
  type InitRequest,
  type BillingQuery,
} from './api.js';
