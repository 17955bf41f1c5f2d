import type {
  StoreGateway,
  StoreInfo,
  StoredArtifact,
  UploadHandle,
  UploadRequest,
} from '../../src/types/index.js';

export interface StoredDocument extends StoredArtifact {
  text: string;
}

interface PendingUpload {
  storeName: string;
  document: StoredDocument;
  pollsLeft: number;
}

/**
 * Document store held in memory. An upload becomes visible once it has been
 * polled `pollsUntilDone` times; with `Infinity` it never completes.
 */
export class InMemoryStoreGateway implements StoreGateway {
  private readonly stores = new Map<string, { info: StoreInfo; documents: Map<string, StoredDocument> }>();
  private readonly pending = new Map<string, PendingUpload>();
  private nextId = 1;
  pollsUntilDone: number;
  readonly uploads: Array<{ storeName: string; request: UploadRequest }> = [];
  readonly deletions: string[] = [];
  readonly deletedStores: string[] = [];

  constructor(pollsUntilDone = 1) {
    this.pollsUntilDone = pollsUntilDone;
  }

  createStore(displayName: string): StoreInfo {
    const info: StoreInfo = { name: `fileSearchStores/store-${this.nextId++}`, displayName, sizeBytes: 0 };
    this.stores.set(info.name, { info, documents: new Map() });
    return info;
  }

  /** Place a document directly, bypassing the upload flow. */
  seed(storeName: string, document: Omit<StoredDocument, 'name'>): StoredDocument {
    const stored: StoredDocument = { ...document, name: `${storeName}/documents/doc-${this.nextId++}` };
    this.store(storeName).documents.set(stored.name, stored);
    return stored;
  }

  documents(storeName: string): StoredDocument[] {
    return Array.from(this.store(storeName).documents.values());
  }

  async getOrCreateStore(displayName: string): Promise<{ store: StoreInfo; created: boolean }> {
    const existing = await this.findStore(displayName);
    if (existing) return { store: existing, created: false };
    return { store: this.createStore(displayName), created: true };
  }

  async findStore(displayName: string): Promise<StoreInfo | null> {
    for (const { info } of this.stores.values()) {
      if (info.displayName === displayName) return info;
    }
    return null;
  }

  async listStores(): Promise<StoreInfo[]> {
    return Array.from(this.stores.values(), ({ info }) => info);
  }

  async deleteStore(storeName: string): Promise<void> {
    this.deletedStores.push(storeName);
    this.stores.delete(storeName);
  }

  async findByMetadata(storeName: string, key: string, value: string): Promise<StoredArtifact | null> {
    return this.documents(storeName).find((document) => document.metadata[key] === value) ?? null;
  }

  async listArtifacts(storeName: string): Promise<StoredArtifact[]> {
    return this.documents(storeName);
  }

  async upload(storeName: string, request: UploadRequest): Promise<UploadHandle> {
    this.store(storeName);
    this.uploads.push({ storeName, request });
    const document: StoredDocument = {
      name: `${storeName}/documents/doc-${this.nextId++}`,
      displayName: request.displayName,
      metadata: { ...request.metadata },
      text: request.text,
    };
    const handle = `operations/upload-${this.nextId++}`;

    if (this.pollsUntilDone <= 0) {
      this.store(storeName).documents.set(document.name, document);
      return { name: handle, done: true };
    }
    this.pending.set(handle, { storeName, document, pollsLeft: this.pollsUntilDone });
    return { name: handle, done: false };
  }

  async pollUpload(handle: UploadHandle): Promise<UploadHandle> {
    const pending = this.pending.get(handle.name);
    if (!pending) throw new Error(`Unknown operation ${handle.name}`);

    pending.pollsLeft--;
    if (pending.pollsLeft > 0) return { name: handle.name, done: false };

    this.pending.delete(handle.name);
    this.store(pending.storeName).documents.set(pending.document.name, pending.document);
    return { name: handle.name, done: true };
  }

  async deleteArtifact(artifactName: string): Promise<void> {
    this.deletions.push(artifactName);
    for (const { documents } of this.stores.values()) {
      documents.delete(artifactName);
    }
  }

  private store(storeName: string): { info: StoreInfo; documents: Map<string, StoredDocument> } {
    const store = this.stores.get(storeName);
    if (!store) throw new Error(`No store ${storeName}`);
    return store;
  }
}
