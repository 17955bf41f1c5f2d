export const PAGE_ID_KEY = 'page_id';
export const LAST_EDITED_KEY = 'last_edited';

export interface StoreInfo {
  /** Resource name, e.g. `fileSearchStores/abc`. */
  name: string;
  displayName: string;
  sizeBytes: number;
}

export interface StoredArtifact {
  /** Resource name of the document inside its store. */
  name: string;
  displayName: string;
  metadata: Record<string, string>;
}

export interface UploadRequest {
  text: string;
  displayName: string;
  metadata: Record<string, string>;
}

export interface UploadHandle {
  name: string;
  done: boolean;
}

export interface StoreGateway {
  getOrCreateStore(displayName: string): Promise<{ store: StoreInfo; created: boolean }>;
  findStore(displayName: string): Promise<StoreInfo | null>;
  listStores(): Promise<StoreInfo[]>;
  deleteStore(storeName: string): Promise<void>;
  findByMetadata(storeName: string, key: string, value: string): Promise<StoredArtifact | null>;
  listArtifacts(storeName: string): Promise<StoredArtifact[]>;
  upload(storeName: string, request: UploadRequest): Promise<UploadHandle>;
  pollUpload(handle: UploadHandle): Promise<UploadHandle>;
  deleteArtifact(artifactName: string): Promise<void>;
}

export interface TokenCounter {
  countTokens(model: string, text: string): Promise<number>;
}

export interface RetrievalAnswer {
  answer: string;
  grounding: string | null;
  inputTokens: number;
  outputTokens: number;
}

export interface RetrievalModel {
  ask(storeName: string, model: string, query: string): Promise<RetrievalAnswer>;
}
