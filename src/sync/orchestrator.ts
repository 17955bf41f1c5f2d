import type { Logger } from 'winston';
import type { UsageLedger } from '../billing/ledger.js';
import {
  PAGE_ID_KEY,
  type InitResult,
  type PageFailure,
  type PageProperties,
  type PageSource,
  type StoreGateway,
  type StoredArtifact,
  type SyncResult,
} from '../types/index.js';
import { delay } from '../utils/delay.js';
import { errorMessage } from '../utils/errors.js';
import { detectChange, storedFingerprint } from './change-detector.js';
import type { PageIndexer } from './page-indexer.js';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface SyncOrchestratorOptions {
  source: PageSource;
  gateway: StoreGateway;
  indexer: PageIndexer;
  ledger: UsageLedger;
  logger: Logger;
  embeddingModel: string;
  /** Wait after a batch of uploads for the store's index to catch up. */
  settleDelayMs?: number;
  syncDays?: number;
  now?: () => Date;
  sleep?: (ms: number) => Promise<void>;
}

export interface RunOptions {
  label: string;
  databaseId: string;
  /** Checked between pages only; a page in progress always completes. */
  signal?: AbortSignal;
}

export interface SyncOptions extends RunOptions {
  force?: boolean;
}

interface PageCheck {
  page: PageProperties;
  existing: StoredArtifact | null;
  force: boolean;
}

interface Tally {
  indexingCost: number;
  imageCost: number;
  updated: number;
  skipped: number;
  failures: PageFailure[];
  cancelled: boolean;
}

function newTally(): Tally {
  return { indexingCost: 0, imageCost: 0, updated: 0, skipped: 0, failures: [], cancelled: false };
}

/** Drives full indexing and incremental sync of one database into its store, one page at a time. */
export class SyncOrchestrator {
  private readonly source: PageSource;
  private readonly gateway: StoreGateway;
  private readonly indexer: PageIndexer;
  private readonly ledger: UsageLedger;
  private readonly logger: Logger;
  private readonly embeddingModel: string;
  private readonly settleDelayMs: number;
  private readonly syncDays: number;
  private readonly now: () => Date;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: SyncOrchestratorOptions) {
    this.source = options.source;
    this.gateway = options.gateway;
    this.indexer = options.indexer;
    this.ledger = options.ledger;
    this.logger = options.logger;
    this.embeddingModel = options.embeddingModel;
    this.settleDelayMs = options.settleDelayMs ?? 5000;
    this.syncDays = options.syncDays ?? 2;
    this.now = options.now ?? (() => new Date());
    this.sleep = options.sleep ?? delay;
  }

  /** Index every page of the database. Pages already up to date in the store are skipped. */
  async fullIndex({ label, databaseId, signal }: RunOptions): Promise<InitResult> {
    const { store, created } = await this.gateway.getOrCreateStore(label);
    this.logger.info(`${created ? 'Created' : 'Using'} store ${store.displayName}`);

    const pageIds = await this.source.listPages(databaseId);
    this.logger.info(`Found ${pageIds.length} pages`);

    const tally = newTally();
    for (const [index, pageId] of pageIds.entries()) {
      if (signal?.aborted) {
        tally.cancelled = true;
        break;
      }
      this.logger.info(`[${index + 1}/${pageIds.length}] Checking page`, { pageId });

      await this.runPage(label, store.name, pageId, tally, async () => {
        const page = await this.source.getPageProperties(pageId);
        const existing = await this.gateway.findByMetadata(store.name, PAGE_ID_KEY, pageId);
        return { page, existing, force: false };
      });
    }

    this.logger.info(`Waiting ${this.settleDelayMs}ms for index to be ready...`);
    await this.sleep(this.settleDelayMs);

    const result: InitResult = {
      label,
      databaseId,
      storeName: store.displayName,
      pagesTotal: pageIds.length,
      pagesIndexed: tally.updated,
      pagesSkipped: tally.skipped,
      indexingCost: tally.indexingCost,
      imageCost: tally.imageCost,
      totalCost: tally.indexingCost + tally.imageCost,
      failures: tally.failures,
      cancelled: tally.cancelled,
    };

    await this.ledger.logInit({
      label,
      databaseId,
      storeName: result.storeName,
      pagesTotal: result.pagesTotal,
      pagesIndexed: result.pagesIndexed,
      indexingCost: result.indexingCost,
      imageCost: result.imageCost,
    });

    return result;
  }

  /**
   * Re-index pages edited within the last `syncDays` whose stored fingerprint
   * differs. Existing artifacts are listed once up front.
   */
  async incrementalSync({ label, databaseId, force = false, signal }: SyncOptions): Promise<SyncResult> {
    const { store } = await this.gateway.getOrCreateStore(label);

    const since = new Date(this.now().getTime() - this.syncDays * DAY_MS);
    const pageIds = await this.source.listPages(databaseId, since);
    this.logger.info(`Found ${pageIds.length} pages edited since ${since.toISOString()}`);

    const artifacts = new Map<string, StoredArtifact>();
    for (const artifact of await this.gateway.listArtifacts(store.name)) {
      const pageId = artifact.metadata[PAGE_ID_KEY];
      if (pageId) artifacts.set(pageId, artifact);
    }

    const tally = newTally();
    for (const [index, pageId] of pageIds.entries()) {
      if (signal?.aborted) {
        tally.cancelled = true;
        break;
      }
      this.logger.info(`[${index + 1}/${pageIds.length}] Checking page`, { pageId });

      await this.runPage(label, store.name, pageId, tally, async () => {
        const page = await this.source.getPageProperties(pageId);
        return { page, existing: artifacts.get(pageId) ?? null, force };
      });
    }

    if (tally.updated > 0) {
      this.logger.info(`Waiting ${this.settleDelayMs}ms for index to be ready...`);
      await this.sleep(this.settleDelayMs);
    }

    const result: SyncResult = {
      label,
      databaseId,
      pagesChecked: pageIds.length,
      pagesUpdated: tally.updated,
      pagesSkipped: tally.skipped,
      force,
      indexingCost: tally.indexingCost,
      imageCost: tally.imageCost,
      totalCost: tally.indexingCost + tally.imageCost,
      failures: tally.failures,
      cancelled: tally.cancelled,
    };

    await this.ledger.logSync({
      label,
      databaseId,
      pagesChecked: result.pagesChecked,
      pagesUpdated: result.pagesUpdated,
      pagesSkipped: result.pagesSkipped,
      indexingCost: result.indexingCost,
      imageCost: result.imageCost,
      force,
    });

    return result;
  }

  private async runPage(
    label: string,
    storeName: string,
    pageId: string,
    tally: Tally,
    load: () => Promise<PageCheck>
  ): Promise<void> {
    let title = '';
    try {
      const { page, existing, force } = await load();
      title = page.title;

      const status = detectChange({
        currentEdited: page.lastEdited,
        storedEdited: storedFingerprint(existing),
        force,
      });

      if (status === 'unchanged') {
        this.logger.info(`${title || 'Untitled'} - up to date`, { pageId });
        tally.skipped++;
        return;
      }

      if (force) {
        this.logger.info(`${title || 'Untitled'} - FORCE reindex`, { pageId });
      } else if (status === 'changed') {
        this.logger.info(`${title || 'Untitled'} - CHANGED (${storedFingerprint(existing)} -> ${page.lastEdited})`, { pageId });
      } else {
        this.logger.info(`${title || 'Untitled'} - NEW`, { pageId });
      }

      const indexed = await this.indexer.indexPage({
        label,
        storeName,
        page: { ...page, pageId },
        existing,
      });

      tally.indexingCost += indexed.indexingCost;
      tally.imageCost += indexed.imageCost;
      tally.updated++;
    } catch (error) {
      const message = errorMessage(error);
      this.logger.error('Page failed', { pageId, error: message });
      tally.failures.push({ pageId, error: message });

      await this.ledger
        .logIndexing({
          label,
          pageId,
          title,
          embeddingModel: this.embeddingModel,
          status: 'error',
          error: message,
        })
        .catch((ledgerError: unknown) => {
          this.logger.warn('Failed to record page failure', { pageId, error: errorMessage(ledgerError) });
        });
    }
  }
}
