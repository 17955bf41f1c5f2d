export { detectChange, storedFingerprint, type ChangeInput } from './change-detector.js';
export {
  PageIndexer,
  buildDocumentText,
  documentDisplayName,
  type PageIndexerOptions,
  type IndexPageRequest,
} from './page-indexer.js';
export { SyncOrchestrator, type SyncOrchestratorOptions, type RunOptions, type SyncOptions } from './orchestrator.js';
