import type { Document as FileSearchDocument, FileSearchStore, GoogleGenAI } from '@google/genai';
import type { Logger } from 'winston';
import type { StoreGateway, StoreInfo, StoredArtifact, UploadHandle, UploadRequest } from '../types/index.js';
import { NotFoundError } from '../utils/errors.js';

type UploadOperation = Awaited<ReturnType<GoogleGenAI['fileSearchStores']['uploadToFileSearchStore']>>;

function toStoreInfo(store: FileSearchStore): StoreInfo | null {
  if (!store.name) return null;
  return {
    name: store.name,
    displayName: store.displayName ?? '',
    sizeBytes: Number(store.sizeBytes ?? 0),
  };
}

function toArtifact(document: FileSearchDocument): StoredArtifact | null {
  if (!document.name) return null;
  const metadata: Record<string, string> = {};
  for (const entry of document.customMetadata ?? []) {
    if (entry.key && entry.stringValue !== undefined) {
      metadata[entry.key] = entry.stringValue;
    }
  }
  return { name: document.name, displayName: document.displayName ?? '', metadata };
}

/**
 * Gemini File Search stores as the document store. A store's display name is
 * the database label; each page is one document tagged with its page id and
 * last edit time.
 */
export class GeminiFileSearchGateway implements StoreGateway {
  private readonly ai: GoogleGenAI;
  private readonly logger: Logger | undefined;
  private readonly pending = new Map<string, UploadOperation>();

  constructor(ai: GoogleGenAI, logger?: Logger) {
    this.ai = ai;
    this.logger = logger;
  }

  async getOrCreateStore(displayName: string): Promise<{ store: StoreInfo; created: boolean }> {
    const existing = await this.findStore(displayName);
    if (existing) {
      return { store: existing, created: false };
    }

    const created = toStoreInfo(await this.ai.fileSearchStores.create({ config: { displayName } }));
    if (!created) {
      throw new Error(`Store ${displayName} was created without a resource name`);
    }
    this.logger?.info(`Created store ${displayName} (${created.name})`);
    return { store: created, created: true };
  }

  async findStore(displayName: string): Promise<StoreInfo | null> {
    const stores = await this.listStores();
    return stores.find((store) => store.displayName === displayName) ?? null;
  }

  async listStores(): Promise<StoreInfo[]> {
    const stores: StoreInfo[] = [];
    for await (const store of await this.ai.fileSearchStores.list()) {
      const info = toStoreInfo(store);
      if (info) stores.push(info);
    }
    return stores;
  }

  async deleteStore(storeName: string): Promise<void> {
    await this.ai.fileSearchStores.delete({ name: storeName, config: { force: true } });
  }

  async findByMetadata(storeName: string, key: string, value: string): Promise<StoredArtifact | null> {
    const artifacts = await this.listArtifacts(storeName);
    return artifacts.find((artifact) => artifact.metadata[key] === value) ?? null;
  }

  async listArtifacts(storeName: string): Promise<StoredArtifact[]> {
    const artifacts: StoredArtifact[] = [];
    for await (const document of await this.ai.fileSearchStores.documents.list({ parent: storeName })) {
      const artifact = toArtifact(document);
      if (artifact) artifacts.push(artifact);
    }
    return artifacts;
  }

  async upload(storeName: string, request: UploadRequest): Promise<UploadHandle> {
    const operation = await this.ai.fileSearchStores.uploadToFileSearchStore({
      file: new Blob([request.text], { type: 'text/plain' }),
      fileSearchStoreName: storeName,
      config: {
        displayName: request.displayName,
        mimeType: 'text/plain',
        customMetadata: Object.entries(request.metadata).map(([key, stringValue]) => ({ key, stringValue })),
      },
    });

    const name = operation.name ?? request.displayName;
    const done = operation.done === true;
    if (!done) {
      this.pending.set(name, operation);
    }
    return { name, done };
  }

  async pollUpload(handle: UploadHandle): Promise<UploadHandle> {
    const operation = this.pending.get(handle.name);
    if (!operation) {
      throw new NotFoundError(`No pending upload named ${handle.name}`);
    }

    const latest = await this.ai.operations.get({ operation });
    const done = latest.done === true;
    if (done) {
      this.pending.delete(handle.name);
    }
    return { name: handle.name, done };
  }

  async deleteArtifact(artifactName: string): Promise<void> {
    await this.ai.fileSearchStores.documents.delete({ name: artifactName, config: { force: true } });
  }
}
