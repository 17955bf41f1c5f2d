export { calcCost, type PricingTable } from './pricing.js';
export {
  JsonlLedger,
  type UsageLedger,
  type IndexingEntry,
  type QueryEntry,
  type SyncEntry,
  type InitEntry,
  type ApiEntry,
} from './ledger.js';
export { getBilling, type BillingSummary, type CostTotals, type CostBreakdownEntry } from './billing.js';
