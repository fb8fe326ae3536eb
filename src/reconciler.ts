import type { CrawledProduct, FreshCrawl, ParsedCategory } from './scrapers/odoo/types.js';
import type { Catalog, CatalogMeta, Category, Product, SyncCounts, SyncWarning } from './types.js';

export interface ReconcileOptions {
  /** Only a fully crawled storefront may remove records that were not seen. */
  complete: boolean;
  now: string;
}

export interface ReconcileResult {
  catalog: Catalog;
  counts: SyncCounts;
  warnings: SyncWarning[];
  /** Products that have a source image but no local copy yet. */
  pendingImages: string[];
}

function integrityWarning(message: string, recordId: string, url: string | null = null): SyncWarning {
  return { kind: 'integrity', message, recordId, url };
}

function sameList(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((value, index) => value === b[index]);
}

function numericKey(id: string): string | null {
  return /^\d+$/.test(id) ? id.replace(/^0+(?=\d)/, '') : null;
}

/** Numeric ids newest first, then slug ids alphabetically. Digits compare as text so long ids keep their order. */
export function compareProductIds(a: string, b: string): number {
  const numA = numericKey(a);
  const numB = numericKey(b);
  if (numA !== null && numB !== null) {
    if (numA.length !== numB.length) {
      return numB.length - numA.length;
    }
    return numA === numB ? 0 : numA < numB ? 1 : -1;
  }
  if (numA !== null) return -1;
  if (numB !== null) return 1;
  return a.localeCompare(b);
}

function productChanged(previous: Product, next: Product): boolean {
  return (
    previous.name !== next.name ||
    previous.description !== next.description ||
    previous.code !== next.code ||
    previous.price !== next.price ||
    previous.categoryId !== next.categoryId ||
    !sameList(previous.categoryIds, next.categoryIds) ||
    previous.imageUrl !== next.imageUrl ||
    previous.sourceUrl !== next.sourceUrl
  );
}

function dedupeCategories(categories: ParsedCategory[], warnings: SyncWarning[]): ParsedCategory[] {
  const byId = new Map<string, ParsedCategory>();
  for (const category of categories) {
    const earlier = byId.get(category.id);
    if (earlier && (earlier.name !== category.name || earlier.url !== category.url || earlier.parentId !== category.parentId)) {
      warnings.push({
        kind: 'duplicate-id',
        message: `Category id ${category.id} seen twice ("${earlier.name}" and "${category.name}"); keeping the later one`,
        recordId: category.id,
        url: category.url
      });
    }
    byId.set(category.id, category);
  }
  return [...byId.values()];
}

/**
 * Collapses repeated sightings of a product id in fetch order. Categories are
 * unioned; when the fields disagree the later sighting wins and a warning is
 * recorded.
 */
export function mergeFreshProducts(sightings: CrawledProduct[], warnings: SyncWarning[]): CrawledProduct[] {
  const byId = new Map<string, CrawledProduct>();
  for (const sighting of sightings) {
    const earlier = byId.get(sighting.id);
    if (!earlier) {
      byId.set(sighting.id, { ...sighting, categoryIds: [...sighting.categoryIds] });
      continue;
    }
    const categoryIds = [...earlier.categoryIds, ...sighting.categoryIds.filter(id => !earlier.categoryIds.includes(id))];
    const conflicting =
      earlier.name !== sighting.name ||
      earlier.price !== sighting.price ||
      earlier.code !== sighting.code ||
      earlier.imageUrl !== sighting.imageUrl ||
      earlier.sourceUrl !== sighting.sourceUrl ||
      earlier.description !== sighting.description;
    if (conflicting) {
      warnings.push({
        kind: 'duplicate-id',
        message: `Product id ${sighting.id} seen with different data ("${earlier.name}" and "${sighting.name}"); keeping the later one`,
        recordId: sighting.id,
        url: sighting.sourceUrl
      });
      byId.set(sighting.id, { ...sighting, categoryIds });
    } else {
      earlier.categoryIds = categoryIds;
    }
  }
  return [...byId.values()];
}

/**
 * Rebuilds parent/child links from scratch. Unknown parents and links that
 * would close a cycle are cut.
 */
function buildCategoryForest(source: ParsedCategory[], warnings: SyncWarning[]): Category[] {
  const known = new Set(source.map(category => category.id));
  const parents = new Map<string, string | null>();

  for (const category of source) {
    let parentId = category.parentId;
    if (parentId === category.id) {
      parentId = null;
    }
    if (parentId && !known.has(parentId)) {
      warnings.push(integrityWarning(`Category ${category.id} refers to unknown parent ${parentId}; made it a root`, category.id, category.url));
      parentId = null;
    }
    if (parentId) {
      let cursor: string | null = parentId;
      const visited = new Set<string>();
      while (cursor && !visited.has(cursor)) {
        if (cursor === category.id) {
          warnings.push(integrityWarning(`Category ${category.id} would be its own ancestor via ${parentId}; made it a root`, category.id, category.url));
          parentId = null;
          break;
        }
        visited.add(cursor);
        const current: string = cursor;
        cursor = parents.has(current)
          ? parents.get(current) ?? null
          : source.find(entry => entry.id === current)?.parentId ?? null;
      }
    }
    parents.set(category.id, parentId);
  }

  const categories: Category[] = source.map(category => ({
    id: category.id,
    name: category.name,
    url: category.url,
    parentId: parents.get(category.id) ?? null,
    childIds: []
  }));
  const byId = new Map(categories.map(category => [category.id, category]));
  for (const category of categories) {
    if (category.parentId) {
      byId.get(category.parentId)?.childIds.push(category.id);
    }
  }
  return categories;
}

function depthOf(id: string, byId: Map<string, Category>): number {
  let depth = 0;
  let cursor = byId.get(id)?.parentId ?? null;
  while (cursor) {
    depth += 1;
    cursor = byId.get(cursor)?.parentId ?? null;
  }
  return depth;
}

/** Deepest category wins, the first listed on a tie. */
function primaryCategory(categoryIds: string[], byId: Map<string, Category>): string {
  let best = categoryIds[0];
  let bestDepth = depthOf(best, byId);
  for (const id of categoryIds.slice(1)) {
    const depth = depthOf(id, byId);
    if (depth > bestDepth) {
      best = id;
      bestDepth = depth;
    }
  }
  return best;
}

export function buildMeta(categories: Category[], products: Product[], base: CatalogMeta): CatalogMeta {
  return {
    ...base,
    productCount: products.length,
    categoryCount: categories.length,
    rootCategoryCount: categories.filter(category => category.parentId === null).length
  };
}

function toProduct(
  fresh: CrawledProduct,
  categoryIds: string[],
  categoryId: string,
  previous: Product | undefined,
  now: string
): Product {
  return {
    id: fresh.id,
    name: fresh.name,
    description: fresh.description,
    code: fresh.code,
    price: fresh.price,
    categoryId,
    categoryIds,
    imageUrl: fresh.imageUrl,
    imagePath: previous && previous.imageUrl === fresh.imageUrl ? previous.imagePath : null,
    sourceUrl: fresh.sourceUrl,
    lastSeenAt: now
  };
}

/**
 * Merges a fresh crawl into the stored catalog and counts what changed.
 */
export function reconcile(existing: Catalog, crawl: FreshCrawl, options: ReconcileOptions): ReconcileResult {
  const warnings: SyncWarning[] = [];
  const counts: SyncCounts = {
    added: 0,
    updated: 0,
    removed: 0,
    categoriesAdded: 0,
    categoriesUpdated: 0,
    categoriesRemoved: 0
  };

  const previousCategories = new Map(existing.categories.map(category => [category.id, category]));
  const previousProducts = new Map(existing.products.map(product => [product.id, product]));

  const freshCategories = dedupeCategories(crawl.categories, warnings);
  const freshCategoryIds = new Set(freshCategories.map(category => category.id));
  const carriedCategories: ParsedCategory[] = options.complete
    ? []
    : existing.categories.filter(category => !freshCategoryIds.has(category.id));

  const categories = buildCategoryForest([...freshCategories, ...carriedCategories], warnings);
  const categoriesById = new Map(categories.map(category => [category.id, category]));

  for (const category of categories) {
    if (!freshCategoryIds.has(category.id)) {
      continue;
    }
    const previous = previousCategories.get(category.id);
    if (!previous) {
      counts.categoriesAdded += 1;
    } else if (previous.name !== category.name || previous.url !== category.url || previous.parentId !== category.parentId) {
      counts.categoriesUpdated += 1;
    }
  }
  if (options.complete) {
    counts.categoriesRemoved = existing.categories.filter(category => !categoriesById.has(category.id)).length;
  }

  const products = new Map<string, Product>();
  for (const fresh of mergeFreshProducts(crawl.products, warnings)) {
    const categoryIds = fresh.categoryIds.filter(id => categoriesById.has(id));
    if (categoryIds.length === 0) {
      warnings.push(integrityWarning(`Product ${fresh.id} has no known category; skipped`, fresh.id, fresh.sourceUrl));
      continue;
    }
    const previous = previousProducts.get(fresh.id);
    const product = toProduct(fresh, categoryIds, primaryCategory(categoryIds, categoriesById), previous, options.now);
    if (!previous) {
      counts.added += 1;
    } else if (productChanged(previous, product)) {
      counts.updated += 1;
    }
    products.set(product.id, product);
  }

  for (const previous of existing.products) {
    if (products.has(previous.id)) {
      continue;
    }
    if (options.complete) {
      counts.removed += 1;
      continue;
    }
    const categoryIds = previous.categoryIds.filter(id => categoriesById.has(id));
    if (categoryIds.length === 0) {
      warnings.push(integrityWarning(`Product ${previous.id} lost all of its categories; dropped`, previous.id, previous.sourceUrl));
      continue;
    }
    products.set(previous.id, {
      ...previous,
      categoryIds,
      categoryId: categoryIds.includes(previous.categoryId) ? previous.categoryId : primaryCategory(categoryIds, categoriesById)
    });
  }

  const productList = [...products.values()].sort((a, b) => compareProductIds(a.id, b.id));
  const catalog: Catalog = {
    version: 1,
    meta: buildMeta(categories, productList, existing.meta),
    categories,
    products: productList
  };

  return {
    catalog,
    counts,
    warnings,
    pendingImages: productList.filter(product => product.imageUrl && !product.imagePath).map(product => product.id)
  };
}
