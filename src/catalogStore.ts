import fs from 'fs/promises';
import path from 'path';
import { PersistenceError, describeError } from './errors.js';
import { silentLogger, type Logger } from './logger.js';
import type { Catalog, Category, Product, SyncRunSummary } from './types.js';

export function emptyCatalog(): Catalog {
  return {
    version: 1,
    meta: {
      lastSyncAt: null,
      lastSyncStatus: null,
      productCount: 0,
      categoryCount: 0,
      rootCategoryCount: 0,
      lastRun: null
    },
    categories: [],
    products: []
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(entry => typeof entry === 'string');
}

function isCategory(value: unknown): value is Category {
  return (
    isRecord(value) &&
    typeof value.id === 'string' &&
    typeof value.name === 'string' &&
    typeof value.url === 'string' &&
    (value.parentId === null || typeof value.parentId === 'string') &&
    isStringArray(value.childIds)
  );
}

function isProduct(value: unknown): value is Product {
  return (
    isRecord(value) &&
    typeof value.id === 'string' &&
    typeof value.name === 'string' &&
    typeof value.description === 'string' &&
    typeof value.code === 'string' &&
    typeof value.price === 'number' &&
    typeof value.categoryId === 'string' &&
    isStringArray(value.categoryIds) &&
    (value.imageUrl === null || typeof value.imageUrl === 'string') &&
    (value.imagePath === null || typeof value.imagePath === 'string') &&
    typeof value.sourceUrl === 'string' &&
    typeof value.lastSeenAt === 'string'
  );
}

function isRunSummary(value: unknown): value is SyncRunSummary {
  return (
    isRecord(value) &&
    typeof value.id === 'string' &&
    typeof value.trigger === 'string' &&
    typeof value.startedAt === 'string' &&
    typeof value.added === 'number' &&
    typeof value.updated === 'number' &&
    typeof value.removed === 'number' &&
    Array.isArray(value.warnings)
  );
}

/** Checks the persisted shape; returns null for anything that is not a version 1 catalog. */
export function parseCatalog(raw: string): Catalog | null {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch {
    return null;
  }
  if (!isRecord(data) || data.version !== 1) {
    return null;
  }
  const { meta, categories, products } = data;
  if (!isRecord(meta)) {
    return null;
  }
  if (!Array.isArray(categories) || !categories.every(isCategory)) {
    return null;
  }
  if (!Array.isArray(products) || !products.every(isProduct)) {
    return null;
  }
  return {
    version: 1,
    meta: {
      lastSyncAt: typeof meta.lastSyncAt === 'string' ? meta.lastSyncAt : null,
      lastSyncStatus:
        meta.lastSyncStatus === 'success' || meta.lastSyncStatus === 'partial' || meta.lastSyncStatus === 'failed'
          ? meta.lastSyncStatus
          : null,
      productCount: products.length,
      categoryCount: categories.length,
      rootCategoryCount: categories.filter(category => category.parentId === null).length,
      lastRun: isRunSummary(meta.lastRun) ? meta.lastRun : null
    },
    categories,
    products
  };
}

export interface CatalogStoreOptions {
  logger?: Logger;
}

/**
 * Owns the persisted catalog file. Writes go to a temp file that is renamed
 * over the target, so readers only ever see a complete catalog.
 */
export class CatalogStore {
  private snapshot: Catalog = emptyCatalog();
  private readonly logger: Logger;

  constructor(readonly filePath: string, options: CatalogStoreOptions = {}) {
    this.logger = options.logger ?? silentLogger;
  }

  current(): Catalog {
    return this.snapshot;
  }

  async load(): Promise<Catalog> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isRecord(error) && error.code === 'ENOENT') {
        this.logger.info(`No catalog at ${this.filePath}; starting empty`);
      } else {
        this.logger.warn(`Could not read ${this.filePath} (${describeError(error)}); starting empty`);
      }
      this.snapshot = emptyCatalog();
      return this.snapshot;
    }

    const catalog = parseCatalog(raw);
    if (!catalog) {
      this.logger.warn(`Catalog file ${this.filePath} is malformed; starting empty until the next successful sync`);
      this.snapshot = emptyCatalog();
      return this.snapshot;
    }
    this.snapshot = catalog;
    this.logger.info(`Loaded ${catalog.products.length} products in ${catalog.categories.length} categories`);
    return catalog;
  }

  async save(catalog: Catalog): Promise<void> {
    const tempPath = `${this.filePath}.${process.pid}.${Date.now()}.tmp`;
    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.writeFile(tempPath, `${JSON.stringify(catalog, null, 2)}\n`, 'utf-8');
      await fs.rename(tempPath, this.filePath);
    } catch (error) {
      await fs.rm(tempPath, { force: true }).catch(cleanupError => {
        this.logger.warn(`Could not remove ${tempPath}: ${describeError(cleanupError)}`);
      });
      throw new PersistenceError(this.filePath, error);
    }
    this.snapshot = catalog;
  }
}
