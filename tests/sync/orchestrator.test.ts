import { describe, expect, it } from 'vitest';
import { BlockTreeExtractor } from '../../src/extraction/block-extractor.js';
import { SyncOrchestrator } from '../../src/sync/orchestrator.js';
import { PageIndexer } from '../../src/sync/page-indexer.js';
import type { TokenCounter } from '../../src/types/index.js';
import { image, paragraph } from '../helpers/blocks.js';
import { FakeImageService, InMemoryLedger, WordTokenCounter, silentLogger } from '../helpers/fakes.js';
import { InMemoryPageSource } from '../helpers/in-memory-page-source.js';
import { InMemoryStoreGateway } from '../helpers/in-memory-store-gateway.js';

const NOW = new Date('2024-05-10T12:00:00.000Z');
const RECENT = '2024-05-09T08:00:00.000Z';
const LATER = '2024-05-10T09:30:00.000Z';
const PRICING: Record<string, [number, number]> = { 'embed-test': [0.15, 0] };

interface SetupOptions {
  pollsUntilDone?: number;
  tokens?: TokenCounter;
  settleDelayMs?: number;
}

function setup({ pollsUntilDone = 1, tokens = new WordTokenCounter(), settleDelayMs = 0 }: SetupOptions = {}) {
  const waits: number[] = [];
  const source = new InMemoryPageSource()
    .addPage({ pageId: 'p1', title: 'First', lastEdited: RECENT, blocks: [paragraph('p1-b1', 'Hello')] })
    .addPage({ pageId: 'p2', title: 'Second', lastEdited: RECENT, blocks: [paragraph('p2-b1', 'World')] });
  const gateway = new InMemoryStoreGateway(pollsUntilDone);
  const ledger = new InMemoryLedger();
  const images = new FakeImageService();
  const logger = silentLogger();
  const indexer = new PageIndexer({
    extractor: new BlockTreeExtractor({ source, images, logger }),
    gateway,
    tokens,
    ledger,
    pricing: PRICING,
    embeddingModel: 'embed-test',
    visionModel: 'vision-test',
    pollIntervalMs: 0,
    pollMaxAttempts: 5,
    logger,
  });
  const orchestrator = new SyncOrchestrator({
    source,
    gateway,
    indexer,
    ledger,
    logger,
    embeddingModel: 'embed-test',
    settleDelayMs,
    syncDays: 2,
    now: () => NOW,
    sleep: async (ms) => {
      waits.push(ms);
    },
  });
  return { source, gateway, ledger, images, orchestrator, waits };
}

function artifactsFor(gateway: InMemoryStoreGateway, storeName: string, pageId: string) {
  return gateway.documents(storeName).filter((document) => document.metadata['page_id'] === pageId);
}

describe('SyncOrchestrator.fullIndex', () => {
  it('indexes every page into a new store', async () => {
    const { source, gateway, ledger, orchestrator } = setup();
    const result = await orchestrator.fullIndex({ label: 'docs', databaseId: 'db1' });

    expect(result).toMatchObject({
      label: 'docs',
      databaseId: 'db1',
      storeName: 'docs',
      pagesTotal: 2,
      pagesIndexed: 2,
      pagesSkipped: 0,
      failures: [],
      cancelled: false,
    });
    expect(source.listPagesCalls).toEqual([{ databaseId: 'db1', modifiedSince: undefined }]);

    const store = await gateway.findStore('docs');
    expect(store).not.toBeNull();
    expect(gateway.documents(store?.name ?? '').map((document) => document.displayName).sort()).toEqual([
      '[p1] First',
      '[p2] Second',
    ]);
    expect(ledger.inits).toHaveLength(1);
    expect(ledger.inits[0]).toMatchObject({ label: 'docs', databaseId: 'db1', pagesTotal: 2, pagesIndexed: 2 });
  });

  it('skips unchanged pages on a second run', async () => {
    const { source, gateway, orchestrator } = setup();
    await orchestrator.fullIndex({ label: 'docs', databaseId: 'db1' });
    const second = await orchestrator.fullIndex({ label: 'docs', databaseId: 'db1' });

    expect(second).toMatchObject({ pagesIndexed: 0, pagesSkipped: 2, indexingCost: 0, imageCost: 0, totalCost: 0 });
    expect(gateway.uploads).toHaveLength(2);
    expect(source.extractionCount('p1')).toBe(1);

    const store = await gateway.findStore('docs');
    expect(artifactsFor(gateway, store?.name ?? '', 'p1')).toHaveLength(1);
  });

  it('records a failing page and carries on with the rest', async () => {
    const { source, gateway, ledger, orchestrator } = setup();
    source.failBlock('p1', 'rate limited');

    const result = await orchestrator.fullIndex({ label: 'docs', databaseId: 'db1' });

    expect(result.failures).toEqual([{ pageId: 'p1', error: 'rate limited' }]);
    expect(result.pagesIndexed).toBe(1);
    expect(gateway.uploads.map((upload) => upload.request.metadata['page_id'])).toEqual(['p2']);
    expect(ledger.indexing.find((entry) => entry.pageId === 'p1')).toMatchObject({
      status: 'error',
      error: 'rate limited',
      title: 'First',
    });
  });

  it('reports a stuck upload as a page failure', async () => {
    const { orchestrator } = setup({ pollsUntilDone: Infinity });
    const result = await orchestrator.fullIndex({ label: 'docs', databaseId: 'db1' });

    expect(result.pagesIndexed).toBe(0);
    expect(result.failures).toEqual([
      { pageId: 'p1', error: 'Upload of [p1] First did not complete after 5 polls' },
      { pageId: 'p2', error: 'Upload of [p2] Second did not complete after 5 polls' },
    ]);
  });

  it('stops at the next page boundary once aborted', async () => {
    const controller = new AbortController();
    const words = new WordTokenCounter();
    const tokens: TokenCounter = {
      countTokens: async (model, text) => {
        controller.abort();
        return words.countTokens(model, text);
      },
    };
    const { gateway, orchestrator } = setup({ tokens });

    const result = await orchestrator.fullIndex({ label: 'docs', databaseId: 'db1', signal: controller.signal });

    expect(result).toMatchObject({ pagesTotal: 2, pagesIndexed: 1, cancelled: true });
    expect(gateway.uploads).toHaveLength(1);
  });

  it('totals exactly the costs of the pages it processed', async () => {
    const { source, images, ledger, orchestrator } = setup();
    source.setChildren('p2', [paragraph('p2-b1', 'World'), image('p2-img', 'https://img.example/chart.png')]);
    images.set('https://img.example/chart.png', {
      success: true,
      classification: 'diagram',
      description: 'A chart',
      code: '',
      cost: 0.25,
      elapsedMs: 1,
    });

    const result = await orchestrator.fullIndex({ label: 'docs', databaseId: 'db1' });
    const embedding = ledger.indexing.reduce((sum, entry) => sum + (entry.embeddingCost ?? 0), 0);

    expect(result.imageCost).toBe(0.25);
    expect(result.indexingCost).toBeCloseTo(embedding, 15);
    expect(result.totalCost).toBeCloseTo(embedding + 0.25, 15);
  });
});

describe('SyncOrchestrator.incrementalSync', () => {
  it('queries only the trailing window', async () => {
    const { source, orchestrator } = setup();
    source.addPage({ pageId: 'p-old', title: 'Old', lastEdited: '2024-05-01T00:00:00.000Z' });

    const result = await orchestrator.incrementalSync({ label: 'docs', databaseId: 'db1' });

    expect(source.listPagesCalls[0]?.modifiedSince?.toISOString()).toBe('2024-05-08T12:00:00.000Z');
    expect(result.pagesChecked).toBe(2);
    expect(result.pagesUpdated).toBe(2);
  });

  it('skips a page whose stored fingerprint matches without extracting it', async () => {
    const { source, gateway, ledger, orchestrator } = setup();
    const store = gateway.createStore('docs');
    gateway.seed(store.name, { displayName: '[p1] First', metadata: { page_id: 'p1', last_edited: RECENT }, text: 'x' });
    gateway.seed(store.name, { displayName: '[p2] Second', metadata: { page_id: 'p2', last_edited: RECENT }, text: 'y' });

    const result = await orchestrator.incrementalSync({ label: 'docs', databaseId: 'db1' });

    expect(result).toMatchObject({ pagesChecked: 2, pagesUpdated: 0, pagesSkipped: 2, totalCost: 0, force: false });
    expect(gateway.uploads).toEqual([]);
    expect(source.extractionCount('p1')).toBe(0);
    expect(ledger.syncs).toEqual([
      {
        label: 'docs',
        databaseId: 'db1',
        pagesChecked: 2,
        pagesUpdated: 0,
        pagesSkipped: 2,
        indexingCost: 0,
        imageCost: 0,
        force: false,
      },
    ]);
  });

  it('replaces the artifact of an edited page', async () => {
    const { source, gateway, orchestrator } = setup();
    const store = gateway.createStore('docs');
    const stale = gateway.seed(store.name, {
      displayName: '[p1] First',
      metadata: { page_id: 'p1', last_edited: RECENT },
      text: 'x',
    });
    gateway.seed(store.name, { displayName: '[p2] Second', metadata: { page_id: 'p2', last_edited: RECENT }, text: 'y' });
    source.edit('p1', LATER);

    const result = await orchestrator.incrementalSync({ label: 'docs', databaseId: 'db1' });

    expect(result).toMatchObject({ pagesUpdated: 1, pagesSkipped: 1 });
    expect(gateway.deletions).toEqual([stale.name]);
    const [current] = artifactsFor(gateway, store.name, 'p1');
    expect(current?.metadata['last_edited']).toBe(LATER);
    expect(current?.text).toBe('[Title: First]\n---\nHello');
  });

  it('keeps one artifact per page across repeated edits', async () => {
    const { source, gateway, orchestrator } = setup();
    await orchestrator.fullIndex({ label: 'docs', databaseId: 'db1' });
    const store = await gateway.findStore('docs');

    for (const minute of ['10', '20', '30']) {
      source.edit('p1', `2024-05-10T11:${minute}:00.000Z`);
      await orchestrator.incrementalSync({ label: 'docs', databaseId: 'db1' });
      expect(artifactsFor(gateway, store?.name ?? '', 'p1')).toHaveLength(1);
    }
    expect(artifactsFor(gateway, store?.name ?? '', 'p1')[0]?.metadata['last_edited']).toBe('2024-05-10T11:30:00.000Z');
  });

  it('re-indexes every page in the window when forced', async () => {
    const { gateway, ledger, orchestrator } = setup();
    const store = gateway.createStore('docs');
    gateway.seed(store.name, { displayName: '[p1] First', metadata: { page_id: 'p1', last_edited: RECENT }, text: 'x' });

    const result = await orchestrator.incrementalSync({ label: 'docs', databaseId: 'db1', force: true });

    expect(result).toMatchObject({ pagesUpdated: 2, pagesSkipped: 0, force: true });
    expect(ledger.syncs[0]?.force).toBe(true);
  });
});

describe('settle delay', () => {
  function seedUnchanged(gateway: InMemoryStoreGateway): void {
    const store = gateway.createStore('docs');
    for (const pageId of ['p1', 'p2']) {
      gateway.seed(store.name, {
        displayName: `[${pageId}]`,
        metadata: { page_id: pageId, last_edited: RECENT },
        text: '',
      });
    }
  }

  it('always waits after a full index, even with nothing uploaded', async () => {
    const { gateway, orchestrator, waits } = setup({ settleDelayMs: 5000 });
    seedUnchanged(gateway);
    const result = await orchestrator.fullIndex({ label: 'docs', databaseId: 'db1' });

    expect(result.pagesIndexed).toBe(0);
    expect(result.pagesSkipped).toBe(2);
    expect(waits).toEqual([5000]);
  });

  it('does not wait after an incremental sync that skipped every page', async () => {
    const { gateway, orchestrator, waits } = setup({ settleDelayMs: 5000 });
    seedUnchanged(gateway);
    const result = await orchestrator.incrementalSync({ label: 'docs', databaseId: 'db1' });

    expect(result.pagesUpdated).toBe(0);
    expect(waits).toEqual([]);
  });

  it('waits after an incremental sync that uploaded a page', async () => {
    const { gateway, source, orchestrator, waits } = setup({ settleDelayMs: 5000 });
    seedUnchanged(gateway);
    source.edit('p2', LATER);
    const result = await orchestrator.incrementalSync({ label: 'docs', databaseId: 'db1' });

    expect(result.pagesUpdated).toBe(1);
    expect(waits).toEqual([5000]);
  });
});
