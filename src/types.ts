export interface Category {
  id: string;
  name: string;
  url: string;
  parentId: string | null;
  childIds: string[];
}

export interface Product {
  id: string;
  name: string;
  description: string;
  code: string;
  price: number;
  categoryId: string;
  categoryIds: string[];
  imageUrl: string | null;
  imagePath: string | null; // public path under /static, null until downloaded
  sourceUrl: string;
  lastSeenAt: string;
}

export type SyncTrigger = 'startup' | 'scheduled' | 'manual' | 'cli';

export type SyncOutcome = 'success' | 'partial' | 'failed';

export type SyncWarningKind = 'field-validation' | 'download' | 'duplicate-id' | 'integrity' | 'crawl';

export interface SyncWarning {
  kind: SyncWarningKind;
  message: string;
  recordId: string | null;
  url: string | null;
}

export interface SyncCounts {
  added: number;
  updated: number;
  removed: number;
  categoriesAdded: number;
  categoriesUpdated: number;
  categoriesRemoved: number;
}

export interface SyncRun extends SyncCounts {
  id: string;
  trigger: SyncTrigger;
  startedAt: string;
  finishedAt: string | null;
  outcome: SyncOutcome | null;
  pagesFetched: number;
  imagesDownloaded: number;
  imagesFailed: number;
  warnings: SyncWarning[];
  error: string | null;
}

export interface SyncRunSummary extends Omit<SyncRun, 'warnings'> {
  warnings: SyncWarning[];
  warningCount: number;
}

export interface CatalogMeta {
  lastSyncAt: string | null;
  lastSyncStatus: SyncOutcome | null;
  productCount: number;
  categoryCount: number;
  rootCategoryCount: number;
  lastRun: SyncRunSummary | null;
}

export interface Catalog {
  version: 1;
  meta: CatalogMeta;
  categories: Category[];
  products: Product[];
}
