import fs from 'fs/promises';
import path from 'path';
import type { LedgerCategory, LedgerFile } from '../schemas/index.js';

export interface IndexingEntry {
  label: string;
  pageId: string;
  title: string;
  embeddingModel: string;
  embeddingTokens?: number;
  embeddingCost?: number;
  visionModel?: string;
  visionCost?: number;
  status?: 'success' | 'error';
  error?: string;
}

export interface QueryEntry {
  label: string;
  query: string;
  model: string;
  inputTokens: number;
  outputTokens: number;
  cost: number;
  elapsedMs: number;
  source: 'cli' | 'api';
}

export interface SyncEntry {
  label: string;
  databaseId: string;
  pagesChecked: number;
  pagesUpdated: number;
  pagesSkipped: number;
  indexingCost: number;
  imageCost: number;
  force: boolean;
}

export interface InitEntry {
  label: string;
  databaseId: string;
  storeName: string;
  pagesTotal: number;
  pagesIndexed: number;
  indexingCost: number;
  imageCost: number;
}

export interface ApiEntry {
  method: string;
  path: string;
  statusCode: number;
  elapsedMs: number;
  clientIp?: string;
  detail?: string;
}

/** Where per-operation records go. Implemented by the JSONL ledger; tests use an in-memory one. */
export interface UsageLedger {
  logIndexing(entry: IndexingEntry): Promise<void>;
  logQuery(entry: QueryEntry): Promise<void>;
  logSync(entry: SyncEntry): Promise<void>;
  logInit(entry: InitEntry): Promise<void>;
  logApi(entry: ApiEntry): Promise<void>;
}

/**
 * Append-only JSON-lines ledger laid out as
 * `<baseDir>/YYYY-MM-DD/{audit,gemini}/<file>.jsonl`. Every gemini record
 * carries `total_cost` so periods can be summed without knowing the file.
 */
export class JsonlLedger implements UsageLedger {
  private readonly baseDir: string;
  private readonly now: () => Date;

  constructor(baseDir: string, now: () => Date = () => new Date()) {
    this.baseDir = baseDir;
    this.now = now;
  }

  async logIndexing(entry: IndexingEntry): Promise<void> {
    const embeddingCost = entry.embeddingCost ?? 0;
    const visionCost = entry.visionCost ?? 0;
    await this.append('gemini', 'indexing', {
      label: entry.label,
      page_id: entry.pageId,
      title: entry.title,
      embedding_model: entry.embeddingModel,
      embedding_tokens: entry.embeddingTokens ?? 0,
      embedding_cost: embeddingCost,
      vision_model: entry.visionModel ?? '',
      vision_cost: visionCost,
      total_cost: embeddingCost + visionCost,
      status: entry.status ?? 'success',
      ...(entry.error !== undefined ? { error: entry.error } : {}),
    });
  }

  async logQuery(entry: QueryEntry): Promise<void> {
    await this.append('gemini', 'query', {
      label: entry.label,
      query: entry.query,
      model: entry.model,
      input_tokens: entry.inputTokens,
      output_tokens: entry.outputTokens,
      cost: entry.cost,
      total_cost: entry.cost,
      elapsed: entry.elapsedMs / 1000,
      source: entry.source,
    });
  }

  async logSync(entry: SyncEntry): Promise<void> {
    await this.append('gemini', 'sync', {
      label: entry.label,
      db_id: entry.databaseId,
      pages_checked: entry.pagesChecked,
      pages_updated: entry.pagesUpdated,
      pages_skipped: entry.pagesSkipped,
      indexing_cost: entry.indexingCost,
      image_cost: entry.imageCost,
      total_cost: entry.indexingCost + entry.imageCost,
      force: entry.force,
    });
  }

  async logInit(entry: InitEntry): Promise<void> {
    await this.append('gemini', 'init', {
      label: entry.label,
      db_id: entry.databaseId,
      store_name: entry.storeName,
      pages_total: entry.pagesTotal,
      pages_indexed: entry.pagesIndexed,
      indexing_cost: entry.indexingCost,
      image_cost: entry.imageCost,
      total_cost: entry.indexingCost + entry.imageCost,
    });
  }

  async logApi(entry: ApiEntry): Promise<void> {
    await this.append('audit', 'api', {
      method: entry.method,
      path: entry.path,
      status_code: entry.statusCode,
      elapsed: entry.elapsedMs / 1000,
      ...(entry.clientIp !== undefined ? { client_ip: entry.clientIp } : {}),
      ...(entry.detail !== undefined ? { detail: entry.detail } : {}),
    });
  }

  private async append(category: LedgerCategory, file: LedgerFile, data: Record<string, unknown>): Promise<void> {
    const timestamp = this.now().toISOString();
    const dir = path.join(this.baseDir, timestamp.slice(0, 10), category);
    await fs.mkdir(dir, { recursive: true });
    await fs.appendFile(path.join(dir, `${file}.jsonl`), `${JSON.stringify({ ...data, timestamp })}\n`, 'utf8');
  }
}
