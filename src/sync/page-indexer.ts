import type { Logger } from 'winston';
import type { UsageLedger } from '../billing/ledger.js';
import { calcCost, type PricingTable } from '../billing/pricing.js';
import type { BlockTreeExtractor } from '../extraction/block-extractor.js';
import {
  LAST_EDITED_KEY,
  PAGE_ID_KEY,
  type IndexPageResult,
  type PageProperties,
  type StoreGateway,
  type StoredArtifact,
  type TokenCounter,
} from '../types/index.js';
import { delay } from '../utils/delay.js';
import { UploadTimeoutError } from '../utils/errors.js';

export interface PageIndexerOptions {
  extractor: BlockTreeExtractor;
  gateway: StoreGateway;
  tokens: TokenCounter;
  ledger: UsageLedger;
  pricing: PricingTable;
  embeddingModel: string;
  visionModel: string;
  pollIntervalMs?: number;
  pollMaxAttempts?: number;
  logger?: Logger;
}

export interface IndexPageRequest {
  label: string;
  storeName: string;
  page: PageProperties;
  /** Artifact currently holding this page, replaced by the upload. */
  existing: StoredArtifact | null;
}

function stringList(value: string | string[] | undefined): string {
  if (value === undefined) return '';
  return Array.isArray(value) ? value.join(', ') : value;
}

/** `[Title: ...]` header lines followed by `---` and the extracted body. */
export function buildDocumentText(page: PageProperties, content: string): string {
  const header = [`[Title: ${page.title || 'Untitled'}]`];
  const type = stringList(page.properties['Type']);
  const tags = stringList(page.properties['Tags']);
  const reference = stringList(page.properties['URL']);

  if (type) header.push(`[Type: ${type}]`);
  if (tags) header.push(`[Tags: ${tags}]`);
  if (reference) header.push(`[Reference: ${reference}]`);

  return `${header.join('\n')}\n---\n${content}`;
}

/** Titles are cut at 50 code points so a surrogate pair is never split. */
export function documentDisplayName(pageId: string, title: string): string {
  return `[${pageId}] ${Array.from(title || 'Untitled').slice(0, 50).join('')}`;
}

/**
 * Re-index one page: extract, count embedding tokens, replace the stored
 * artifact and wait for the store to finish ingesting it.
 */
export class PageIndexer {
  private readonly extractor: BlockTreeExtractor;
  private readonly gateway: StoreGateway;
  private readonly tokens: TokenCounter;
  private readonly ledger: UsageLedger;
  private readonly pricing: PricingTable;
  private readonly embeddingModel: string;
  private readonly visionModel: string;
  private readonly pollIntervalMs: number;
  private readonly pollMaxAttempts: number;
  private readonly logger: Logger | undefined;

  constructor(options: PageIndexerOptions) {
    this.extractor = options.extractor;
    this.gateway = options.gateway;
    this.tokens = options.tokens;
    this.ledger = options.ledger;
    this.pricing = options.pricing;
    this.embeddingModel = options.embeddingModel;
    this.visionModel = options.visionModel;
    this.pollIntervalMs = options.pollIntervalMs ?? 2000;
    this.pollMaxAttempts = options.pollMaxAttempts ?? 150;
    this.logger = options.logger;
  }

  async indexPage({ label, storeName, page, existing }: IndexPageRequest): Promise<IndexPageResult> {
    const { pageId, title } = page;
    const extracted = await this.extractor.extract(pageId);
    this.logger?.debug(`Extracted ${extracted.text.length} chars, ${extracted.images.length} images`, { pageId });

    const text = buildDocumentText(page, extracted.text);
    const tokenCount = await this.tokens.countTokens(this.embeddingModel, text);
    const indexingCost = calcCost(this.pricing, this.embeddingModel, tokenCount);

    if (existing) {
      this.logger?.info(`Deleting old document ${existing.displayName}`, { pageId });
      await this.gateway.deleteArtifact(existing.name);
    }

    const displayName = documentDisplayName(pageId, title);
    let handle = await this.gateway.upload(storeName, {
      text,
      displayName,
      metadata: {
        [LAST_EDITED_KEY]: page.lastEdited,
        [PAGE_ID_KEY]: pageId,
      },
    });

    let pollCount = 0;
    while (!handle.done) {
      if (pollCount >= this.pollMaxAttempts) {
        throw new UploadTimeoutError(displayName, pollCount);
      }
      pollCount++;
      await delay(this.pollIntervalMs);
      handle = await this.gateway.pollUpload(handle);
    }

    this.logger?.info(`Indexed ${displayName} (${tokenCount} tokens, ${pollCount} polls)`, { pageId });

    await this.ledger.logIndexing({
      label,
      pageId,
      title,
      embeddingModel: this.embeddingModel,
      embeddingTokens: tokenCount,
      embeddingCost: indexingCost,
      visionModel: this.visionModel,
      visionCost: extracted.imageCost,
    });

    return {
      pageId,
      title,
      status: existing ? 'changed' : 'new',
      tokens: tokenCount,
      indexingCost,
      imageCost: extracted.imageCost,
      pollCount,
    };
  }
}
