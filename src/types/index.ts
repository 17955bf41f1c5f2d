export type {
  RichTextRun,
  PropertyValue,
  PageProperties,
  BlockPayloads,
  BlockKind,
  Block,
  BlockChildrenPage,
  PageSource,
} from './notion.js';

export {
  SUPPORTED_IMAGE_TYPES,
  type ImageClassification,
  type TokenUsage,
  type VisionRequest,
  type VisionReply,
  type VisionModel,
  type ImageAnalysisResult,
  type ImageAnalysisSuccess,
  type ImageAnalysisFailure,
  type ImageAnalysisRecord,
  type ImageAnalysisService,
} from './image.js';

export {
  PAGE_ID_KEY,
  LAST_EDITED_KEY,
  type StoreInfo,
  type StoredArtifact,
  type UploadRequest,
  type UploadHandle,
  type StoreGateway,
  type TokenCounter,
  type RetrievalAnswer,
  type RetrievalModel,
} from './store.js';

export type {
  ChangeStatus,
  ExtractedDocument,
  IndexPageResult,
  PageFailure,
  InitResult,
  SyncResult,
} from './sync.js';
