import fs from 'fs/promises';
import path from 'path';
import { LedgerRecordSchema, type BillingPeriod, type LedgerRecord } from '../schemas/index.js';

export interface CostTotals {
  embedding_cost: number;
  vision_cost: number;
  query_cost: number;
  total_cost: number;
}

export interface CostBreakdownEntry extends CostTotals {
  period: string;
}

export interface BillingSummary {
  total: CostTotals;
  breakdown: CostBreakdownEntry[];
}

interface ScannedRecord {
  kind: string;
  record: LedgerRecord;
}

const round8 = (value: number): number => Math.round(value * 1e8) / 1e8;

async function listDirectory(dir: string): Promise<string[]> {
  try {
    return (await fs.readdir(dir)).sort();
  } catch (error) {
    if (error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR')) {
      return [];
    }
    throw error;
  }
}

async function scanLedger(baseDir: string): Promise<ScannedRecord[]> {
  const scanned: ScannedRecord[] = [];

  for (const dateDir of await listDirectory(baseDir)) {
    const geminiDir = path.join(baseDir, dateDir, 'gemini');
    for (const file of await listDirectory(geminiDir)) {
      if (!file.endsWith('.jsonl')) continue;
      const kind = path.basename(file, '.jsonl');
      const content = await fs.readFile(path.join(geminiDir, file), 'utf8');

      for (const line of content.split('\n')) {
        if (!line.trim()) continue;
        let parsed: unknown;
        try {
          parsed = JSON.parse(line);
        } catch {
          continue;
        }
        const result = LedgerRecordSchema.safeParse(parsed);
        if (result.success) {
          scanned.push({ kind, record: result.data });
        }
      }
    }
  }

  return scanned;
}

function aggregate(records: ScannedRecord[]): CostTotals {
  let embedding = 0;
  let vision = 0;
  let query = 0;

  for (const { kind, record } of records) {
    if (kind === 'indexing') {
      embedding += record.embedding_cost;
      vision += record.vision_cost;
    } else if (kind === 'query') {
      query += record.cost ?? record.total_cost;
    } else if (kind === 'sync' || kind === 'init') {
      embedding += record.indexing_cost;
      vision += record.image_cost;
    }
  }

  return {
    embedding_cost: round8(embedding),
    vision_cost: round8(vision),
    query_cost: round8(query),
    total_cost: round8(embedding + vision + query),
  };
}

function aggregateBy(records: ScannedRecord[], keyLength: number): CostBreakdownEntry[] {
  const groups = new Map<string, ScannedRecord[]>();
  for (const scanned of records) {
    const timestamp = scanned.record.timestamp;
    if (!timestamp) continue;
    const key = timestamp.slice(0, keyLength);
    const group = groups.get(key) ?? [];
    group.push(scanned);
    groups.set(key, group);
  }

  return Array.from(groups.keys())
    .sort()
    .map((period) => ({ period, ...aggregate(groups.get(period) ?? []) }));
}

/** Sum the cost ledger for all time, optionally broken down per day (`YYYY-MM-DD`) or month (`YYYY-MM`). */
export async function getBilling(baseDir: string, period: BillingPeriod = 'total'): Promise<BillingSummary> {
  const records = await scanLedger(baseDir);
  const total = aggregate(records);

  switch (period) {
    case 'daily':
      return { total, breakdown: aggregateBy(records, 10) };
    case 'monthly':
      return { total, breakdown: aggregateBy(records, 7) };
    default:
      return { total, breakdown: [] };
  }
}
