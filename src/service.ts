import { GoogleGenAI } from '@google/genai';
import type { AxiosInstance } from 'axios';
import path from 'path';
import type { Logger } from 'winston';
import { calcCost } from './billing/pricing.js';
import { getBilling, type BillingSummary } from './billing/billing.js';
import { JsonlLedger, type UsageLedger } from './billing/ledger.js';
import { logFilePath, requireCredential, resolveDatabase, saveDatabase, type AppConfig } from './config/settings.js';
import { BlockTreeExtractor } from './extraction/block-extractor.js';
import { ImageAnalyzer } from './extraction/image-analyzer.js';
import { GeminiFileSearchGateway, GeminiModels } from './gemini/index.js';
import { NotionPageSource } from './notion/client.js';
import { extractDatabaseId, extractPageId, sameNotionId } from './notion/ids.js';
import type { BillingPeriod } from './schemas/index.js';
import { PageIndexer } from './sync/page-indexer.js';
import { SyncOrchestrator } from './sync/orchestrator.js';
import {
  PAGE_ID_KEY,
  type InitResult,
  type PageSource,
  type RetrievalModel,
  type StoreGateway,
  type StoreInfo,
  type StoredArtifact,
  type SyncResult,
  type TokenCounter,
  type VisionModel,
} from './types/index.js';
import { InvalidInputError, NotFoundError } from './utils/errors.js';
import { createLogger, createSyncLogger } from './utils/logger.js';

export interface StoreBackend {
  gateway: StoreGateway;
  vision: VisionModel;
  tokens: TokenCounter;
  retrieval: RetrievalModel;
}

/** Builds the remote clients. Each factory checks its own credential before anything else runs. */
export interface BackendFactory {
  pages(config: AppConfig): PageSource;
  store(config: AppConfig, logger: Logger): StoreBackend;
}

export const defaultBackends: BackendFactory = {
  pages: (config) => new NotionPageSource({ auth: requireCredential(config, 'notionToken') }),
  store: (config, logger) => {
    const ai = new GoogleGenAI({ apiKey: requireCredential(config, 'geminiApiKey') });
    const models = new GeminiModels(ai);
    return { gateway: new GeminiFileSearchGateway(ai, logger), vision: models, tokens: models, retrieval: models };
  },
};

export interface NotionRagServiceOptions {
  config: AppConfig;
  backends?: BackendFactory;
  ledger?: UsageLedger;
  logger?: Logger;
  /** HTTP client for image downloads. */
  http?: AxiosInstance;
}

export interface RunControl {
  signal?: AbortSignal;
}

export interface QueryOptions {
  model?: string;
  source?: 'cli' | 'api';
}

export interface QueryResult {
  label: string;
  documents: number;
  answer: string;
  grounding: string | null;
  usage: {
    model: string;
    inputTokens: number;
    outputTokens: number;
    cost: number;
  };
  elapsedMs: number;
}

export interface StoreSummary extends StoreInfo {
  documents: number;
}

export interface CleanupResult {
  label: string;
  storeName: string;
  documents: number;
}

/**
 * Entry point shared by the CLI and the HTTP API. Resolves database labels
 * against the registry, builds per-run components and records costs.
 */
export class NotionRagService {
  private readonly config: AppConfig;
  private readonly backends: BackendFactory;
  private readonly ledger: UsageLedger;
  private readonly logger: Logger;
  private readonly http: AxiosInstance | undefined;
  private databases: Record<string, string>;
  private readonly syncLoggers = new Map<string, Logger>();

  constructor(options: NotionRagServiceOptions) {
    this.config = options.config;
    this.backends = options.backends ?? defaultBackends;
    this.ledger = options.ledger ?? new JsonlLedger(path.resolve(options.config.settings.logDir));
    this.logger =
      options.logger ??
      createLogger({ name: 'notion-rag', level: options.config.settings.logLevel, logFile: logFilePath(options.config) });
    this.http = options.http;
    this.databases = { ...options.config.settings.databases };
  }

  get registeredDatabases(): Readonly<Record<string, string>> {
    return this.databases;
  }

  /** Register `label → dbUrl` when a URL is given, then index every page of the database. */
  async init(label?: string | null, dbUrl?: string | null, control: RunControl = {}): Promise<InitResult> {
    let resolved: { label: string; url: string };
    if (dbUrl) {
      if (!label) {
        throw new InvalidInputError('Label is required when providing a database URL');
      }
      extractDatabaseId(dbUrl);
      this.databases = await saveDatabase(this.config.settingsPath, label, dbUrl);
      this.logger.info(`Registered database ${label}`);
      resolved = { label, url: dbUrl };
    } else {
      resolved = resolveDatabase(this.databases, label);
    }

    const databaseId = extractDatabaseId(resolved.url);
    const orchestrator = this.orchestrator(resolved.label);
    return orchestrator.fullIndex({ label: resolved.label, databaseId, signal: control.signal });
  }

  async sync(label?: string | null, force = false, control: RunControl = {}): Promise<SyncResult> {
    const resolved = resolveDatabase(this.databases, label);
    const databaseId = extractDatabaseId(resolved.url);
    const orchestrator = this.orchestrator(resolved.label);
    return orchestrator.incrementalSync({ label: resolved.label, databaseId, force, signal: control.signal });
  }

  async query(label: string | null | undefined, text: string, options: QueryOptions = {}): Promise<QueryResult> {
    const resolved = resolveDatabase(this.databases, label);
    const { gateway, retrieval } = this.backends.store(this.config, this.logger);
    const model = options.model ?? this.config.settings.models.query;

    const store = await gateway.findStore(resolved.label);
    const documents = store ? await gateway.listArtifacts(store.name) : [];
    if (!store || documents.length === 0) {
      throw new NotFoundError(`Store '${resolved.label}' is empty. Run init first to index documents.`);
    }

    const startTime = Date.now();
    const answer = await retrieval.ask(store.name, model, text);
    const cost = calcCost(this.config.pricing, model, answer.inputTokens, answer.outputTokens);
    const elapsedMs = Date.now() - startTime;

    await this.ledger.logQuery({
      label: resolved.label,
      query: text,
      model,
      inputTokens: answer.inputTokens,
      outputTokens: answer.outputTokens,
      cost,
      elapsedMs,
      source: options.source ?? 'cli',
    });

    return {
      label: resolved.label,
      documents: documents.length,
      answer: answer.answer,
      grounding: answer.grounding,
      usage: { model, inputTokens: answer.inputTokens, outputTokens: answer.outputTokens, cost },
      elapsedMs,
    };
  }

  /** Stores belonging to registered databases, with their document counts. */
  async listStores(): Promise<StoreSummary[]> {
    const { gateway } = this.backends.store(this.config, this.logger);
    const summaries: StoreSummary[] = [];

    for (const store of await gateway.listStores()) {
      if (!Object.prototype.hasOwnProperty.call(this.databases, store.displayName)) continue;
      const documents = await gateway.listArtifacts(store.name);
      summaries.push({ ...store, documents: documents.length });
    }
    return summaries;
  }

  async listDocuments(label: string): Promise<{ store: StoreInfo; documents: StoredArtifact[] }> {
    const { gateway } = this.backends.store(this.config, this.logger);
    const store = await this.requireStore(gateway, label);
    return { store, documents: await gateway.listArtifacts(store.name) };
  }

  /** Delete the stored document of one page. Accepts a bare id, a dashed id or a page URL. */
  async removePage(label: string | null | undefined, pageIdOrUrl: string): Promise<StoredArtifact> {
    const resolved = resolveDatabase(this.databases, label);
    const pageId = extractPageId(pageIdOrUrl);
    const { gateway } = this.backends.store(this.config, this.logger);
    const store = await this.requireStore(gateway, resolved.label);

    const artifacts = await gateway.listArtifacts(store.name);
    const artifact = artifacts.find((candidate) => {
      const stored = candidate.metadata[PAGE_ID_KEY];
      return stored !== undefined && sameNotionId(stored, pageId);
    });
    if (!artifact) {
      throw new NotFoundError(`Document not found for page ID: ${pageIdOrUrl}`);
    }

    await gateway.deleteArtifact(artifact.name);
    this.logger.info(`Deleted ${artifact.displayName}`);
    return artifact;
  }

  /** Delete a database's store together with every document in it. */
  async cleanup(label?: string | null): Promise<CleanupResult> {
    const resolved = resolveDatabase(this.databases, label);
    const { gateway } = this.backends.store(this.config, this.logger);
    const store = await this.requireStore(gateway, resolved.label);
    const documents = await gateway.listArtifacts(store.name);

    await gateway.deleteStore(store.name);
    this.logger.info(`Deleted store ${resolved.label} (${documents.length} documents)`);
    return { label: resolved.label, storeName: store.name, documents: documents.length };
  }

  async billing(period: BillingPeriod = 'total'): Promise<BillingSummary> {
    return getBilling(path.resolve(this.config.settings.logDir), period);
  }

  private async requireStore(gateway: StoreGateway, label: string): Promise<StoreInfo> {
    const store = await gateway.findStore(label);
    if (!store) {
      throw new NotFoundError(`Store '${label}' does not exist.`);
    }
    return store;
  }

  private syncLogger(label: string): Logger {
    let logger = this.syncLoggers.get(label);
    if (!logger) {
      logger = createSyncLogger(label, this.config.settings.logLevel, logFilePath(this.config));
      this.syncLoggers.set(label, logger);
    }
    return logger;
  }

  private orchestrator(label: string): SyncOrchestrator {
    const { settings, pricing } = this.config;
    const source = this.backends.pages(this.config);
    const logger = this.syncLogger(label);
    const { gateway, vision, tokens } = this.backends.store(this.config, logger);

    const images = new ImageAnalyzer({
      vision,
      model: settings.models.imageVision,
      pricing,
      timeoutMs: settings.imageTimeoutSec * 1000,
      http: this.http,
      logger,
    });
    const extractor = new BlockTreeExtractor({ source, images, maxDepth: settings.maxBlockDepth, logger });
    const indexer = new PageIndexer({
      extractor,
      gateway,
      tokens,
      ledger: this.ledger,
      pricing,
      embeddingModel: settings.models.embedding,
      visionModel: settings.models.imageVision,
      pollIntervalMs: settings.pollIntervalSec * 1000,
      pollMaxAttempts: settings.pollMaxAttempts,
      logger,
    });

    return new SyncOrchestrator({
      source,
      gateway,
      indexer,
      ledger: this.ledger,
      logger,
      embeddingModel: settings.models.embedding,
      settleDelayMs: settings.indexWaitSec * 1000,
      syncDays: settings.syncDays,
    });
  }
}
