export * from './types/index.js';
export * from './schemas/index.js';
export * from './utils/index.js';
export * from './config/index.js';
export * from './notion/index.js';
export * from './extraction/index.js';
export * from './billing/index.js';
export * from './sync/index.js';
export * from './gemini/index.js';
export {
  NotionRagService,
  defaultBackends,
  type BackendFactory,
  type StoreBackend,
  type NotionRagServiceOptions,
  type RunControl,
  type QueryOptions,
  type QueryResult,
  type StoreSummary,
  type CleanupResult,
} from './service.js';
export { NotionRagApi, statusForError, type ApiOptions } from './api/server.js';
