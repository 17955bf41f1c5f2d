import type { ImageAnalysisRecord } from './image.js';

export type ChangeStatus = 'new' | 'unchanged' | 'changed';

export interface ExtractedDocument {
  text: string;
  imageCost: number;
  images: ImageAnalysisRecord[];
}

export interface IndexPageResult {
  pageId: string;
  title: string;
  status: Exclude<ChangeStatus, 'unchanged'>;
  tokens: number;
  indexingCost: number;
  imageCost: number;
  pollCount: number;
}

export interface PageFailure {
  pageId: string;
  error: string;
}

interface RunTotals {
  label: string;
  databaseId: string;
  indexingCost: number;
  imageCost: number;
  totalCost: number;
  failures: PageFailure[];
  cancelled: boolean;
}

export interface InitResult extends RunTotals {
  storeName: string;
  pagesTotal: number;
  pagesIndexed: number;
  pagesSkipped: number;
}

export interface SyncResult extends RunTotals {
  pagesChecked: number;
  pagesUpdated: number;
  pagesSkipped: number;
  force: boolean;
}
