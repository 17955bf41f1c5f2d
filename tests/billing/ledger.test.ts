import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { getBilling } from '../../src/billing/billing.js';
import { JsonlLedger } from '../../src/billing/ledger.js';

let baseDir: string;

beforeEach(async () => {
  baseDir = await fs.mkdtemp(path.join(os.tmpdir(), 'ledger-test-'));
});

afterEach(async () => {
  await fs.rm(baseDir, { recursive: true, force: true });
});

function ledgerAt(iso: string): JsonlLedger {
  return new JsonlLedger(baseDir, () => new Date(iso));
}

async function readLines(...segments: string[]): Promise<unknown[]> {
  const content = await fs.readFile(path.join(baseDir, ...segments), 'utf8');
  return content
    .split('\n')
    .filter(Boolean)
    .map((line) => JSON.parse(line));
}

describe('JsonlLedger', () => {
  it('writes indexing records under the UTC date with a total cost', async () => {
    await ledgerAt('2024-05-10T23:30:00.000Z').logIndexing({
      label: 'docs',
      pageId: 'p1',
      title: 'First',
      embeddingModel: 'embed-test',
      embeddingTokens: 100,
      embeddingCost: 0.25,
      visionModel: 'vision-test',
      visionCost: 0.5,
    });

    expect(await readLines('2024-05-10', 'gemini', 'indexing.jsonl')).toEqual([
      {
        label: 'docs',
        page_id: 'p1',
        title: 'First',
        embedding_model: 'embed-test',
        embedding_tokens: 100,
        embedding_cost: 0.25,
        vision_model: 'vision-test',
        vision_cost: 0.5,
        total_cost: 0.75,
        status: 'success',
        timestamp: '2024-05-10T23:30:00.000Z',
      },
    ]);
  });

  it('records failures with zero cost', async () => {
    await ledgerAt('2024-05-10T08:00:00.000Z').logIndexing({
      label: 'docs',
      pageId: 'p2',
      title: '',
      embeddingModel: 'embed-test',
      status: 'error',
      error: 'rate limited',
    });

    const [record] = await readLines('2024-05-10', 'gemini', 'indexing.jsonl');
    expect(record).toMatchObject({ status: 'error', error: 'rate limited', total_cost: 0, vision_model: '' });
  });

  it('keeps audit records apart from cost records', async () => {
    await ledgerAt('2024-05-10T08:00:00.000Z').logApi({
      method: 'GET',
      path: '/health',
      statusCode: 200,
      elapsedMs: 1500,
      clientIp: '127.0.0.1',
    });

    expect(await readLines('2024-05-10', 'audit', 'api.jsonl')).toEqual([
      {
        method: 'GET',
        path: '/health',
        status_code: 200,
        elapsed: 1.5,
        client_ip: '127.0.0.1',
        timestamp: '2024-05-10T08:00:00.000Z',
      },
    ]);
  });
});

describe('getBilling', () => {
  beforeEach(async () => {
    const april = ledgerAt('2024-04-30T10:00:00.000Z');
    await april.logIndexing({
      label: 'docs',
      pageId: 'p1',
      title: 'First',
      embeddingModel: 'embed-test',
      embeddingCost: 0.25,
      visionCost: 0.5,
    });
    await april.logQuery({
      label: 'docs',
      query: 'how do I deploy?',
      model: 'query-test',
      inputTokens: 10,
      outputTokens: 20,
      cost: 0.125,
      elapsedMs: 200,
      source: 'cli',
    });

    const may = ledgerAt('2024-05-01T10:00:00.000Z');
    await may.logSync({
      label: 'docs',
      databaseId: 'db1',
      pagesChecked: 3,
      pagesUpdated: 1,
      pagesSkipped: 2,
      indexingCost: 1,
      imageCost: 0.5,
      force: false,
    });
    await may.logInit({
      label: 'docs',
      databaseId: 'db1',
      storeName: 'docs',
      pagesTotal: 4,
      pagesIndexed: 4,
      indexingCost: 2,
      imageCost: 0,
    });
    await may.logApi({ method: 'POST', path: '/sync', statusCode: 200, elapsedMs: 10 });

    await fs.appendFile(
      path.join(baseDir, '2024-05-01', 'gemini', 'sync.jsonl'),
      'not json\n{"total_cost":"abc"}\n',
      'utf8'
    );
  });

  it('sums every cost record', async () => {
    expect(await getBilling(baseDir)).toEqual({
      total: { embedding_cost: 3.25, vision_cost: 1, query_cost: 0.125, total_cost: 4.375 },
      breakdown: [],
    });
  });

  it('breaks costs down per day', async () => {
    const { breakdown } = await getBilling(baseDir, 'daily');
    expect(breakdown).toEqual([
      { period: '2024-04-30', embedding_cost: 0.25, vision_cost: 0.5, query_cost: 0.125, total_cost: 0.875 },
      { period: '2024-05-01', embedding_cost: 3, vision_cost: 0.5, query_cost: 0, total_cost: 3.5 },
    ]);
  });

  it('breaks costs down per month', async () => {
    const { breakdown } = await getBilling(baseDir, 'monthly');
    expect(breakdown.map((entry) => [entry.period, entry.total_cost])).toEqual([
      ['2024-04', 0.875],
      ['2024-05', 3.5],
    ]);
  });

  it('reports zero when there is no ledger yet', async () => {
    expect(await getBilling(path.join(baseDir, 'missing'), 'daily')).toEqual({
      total: { embedding_cost: 0, vision_cost: 0, query_cost: 0, total_cost: 0 },
      breakdown: [],
    });
  });
});
