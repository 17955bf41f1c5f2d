import type { BillingSummary, CostTotals } from '../billing/billing.js';
import type { Price } from '../schemas/index.js';
import type { QueryResult, StoreSummary } from '../service.js';
import type { InitResult, PageFailure, StoreInfo, StoredArtifact, SyncResult } from '../types/index.js';
import { LAST_EDITED_KEY } from '../types/index.js';

export function formatCost(value: number): string {
  return `$${value.toFixed(8)}`;
}

function formatCount(value: number): string {
  return value.toLocaleString('en-US');
}

function tailLines(failures: PageFailure[], cancelled: boolean): string[] {
  const lines: string[] = [];
  if (failures.length > 0) {
    lines.push(`  Failures:        ${failures.length}`);
    for (const failure of failures) {
      lines.push(`    ${failure.pageId}: ${failure.error}`);
    }
  }
  if (cancelled) {
    lines.push('  Cancelled:       yes');
  }
  return lines;
}

export function initSummaryLines(result: InitResult): string[] {
  return [
    '',
    '-- Init Summary --',
    `  Label:           ${result.label}`,
    `  Database ID:     ${result.databaseId}`,
    `  Store:           ${result.storeName}`,
    `  Pages indexed:   ${result.pagesIndexed} / ${result.pagesTotal}`,
    `  Pages skipped:   ${result.pagesSkipped}`,
    `  Indexing cost:   ${formatCost(result.indexingCost)}`,
    `  Image cost:      ${formatCost(result.imageCost)}`,
    `  Total cost:      ${formatCost(result.totalCost)}`,
    ...tailLines(result.failures, result.cancelled),
  ];
}

export function syncSummaryLines(result: SyncResult): string[] {
  return [
    '',
    '-- Sync Summary --',
    `  Database ID:     ${result.databaseId}`,
    `  Pages checked:   ${result.pagesChecked}`,
    `  Pages updated:   ${result.pagesUpdated}`,
    `  Pages skipped:   ${result.pagesSkipped}`,
    `  Indexing cost:   ${formatCost(result.indexingCost)}`,
    `  Image cost:      ${formatCost(result.imageCost)}`,
    `  Total cost:      ${formatCost(result.totalCost)}`,
    ...tailLines(result.failures, result.cancelled),
  ];
}

export function queryLines(query: string, result: QueryResult, rate: Price): string[] {
  const { model, inputTokens, outputTokens, cost } = result.usage;
  const lines = [
    '-- Querying --',
    `  Store: ${result.label} (${result.documents} documents)`,
    `  Model: ${model}`,
    `  Query: ${query}`,
    '',
    '-- Response --',
    result.answer,
  ];

  if (result.grounding) {
    lines.push('', '-- Grounding Metadata --', `  ${result.grounding}`);
  }

  lines.push(
    '',
    '-- Cost --',
    `  Model:           ${model}`,
    `  Rate:            $${rate[0]} input / $${rate[1]} output per 1M tokens`,
    `  Prompt tokens:   ${formatCount(inputTokens)}`,
    `  Response tokens: ${formatCount(outputTokens)}`,
    `  Total:           ${formatCount(inputTokens + outputTokens)} tokens, ${formatCost(cost)}`
  );
  return lines;
}

function costBlock(totals: CostTotals, indent: string): string[] {
  return [
    `${indent}Embedding: ${formatCost(totals.embedding_cost)}`,
    `${indent}Vision:    ${formatCost(totals.vision_cost)}`,
    `${indent}Query:     ${formatCost(totals.query_cost)}`,
    `${indent}Total:     ${formatCost(totals.total_cost)}`,
  ];
}

export function billingLines(summary: BillingSummary, period: string): string[] {
  const lines = ['-- Billing Summary --', ...costBlock(summary.total, '  ')];
  if (summary.breakdown.length > 0) {
    lines.push('', `-- Breakdown (${period}) --`);
    for (const entry of summary.breakdown) {
      lines.push('', `  ${entry.period}`, ...costBlock(entry, '    '));
    }
  }
  return lines;
}

export function storeListLines(stores: StoreSummary[]): string[] {
  const lines = [`-- Notion Stores (${stores.length}) --`];
  for (const store of stores) {
    lines.push(
      `  ${store.displayName}`,
      `    Resource:  ${store.name}`,
      `    Documents: ${store.documents}`,
      `    Size:      ${store.sizeBytes} bytes`,
      ''
    );
  }
  return lines;
}

export function documentListLines(store: StoreInfo, documents: StoredArtifact[]): string[] {
  const lines = [
    `-- Store: ${store.displayName} --`,
    `  Resource:  ${store.name}`,
    `  Documents: ${documents.length}`,
    `  Size:      ${store.sizeBytes} bytes`,
  ];
  if (documents.length > 0) {
    lines.push('', '-- Documents --');
    for (const document of documents) {
      lines.push(`  ${document.displayName}`);
      const lastEdited = document.metadata[LAST_EDITED_KEY];
      if (lastEdited) lines.push(`    last_edited: ${lastEdited}`);
      lines.push('');
    }
  }
  return lines;
}
