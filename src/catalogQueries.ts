import type { Catalog, Category, Product } from './types.js';

export interface CategoryNode {
  id: string;
  name: string;
  url: string;
  productCount: number;
  children: CategoryNode[];
}

export interface CatalogStats {
  totalProducts: number;
  totalCategories: number;
  rootCategories: number;
}

export function findProduct(catalog: Catalog, id: string): Product | null {
  return catalog.products.find(product => product.id === id) ?? null;
}

export function findCategory(catalog: Catalog, id: string): Category | null {
  return catalog.categories.find(category => category.id === id) ?? null;
}

/** The category and every category below it. */
export function descendantIds(catalog: Catalog, id: string): Set<string> {
  const byId = new Map(catalog.categories.map(category => [category.id, category]));
  const ids = new Set<string>();
  const queue = [id];
  while (queue.length > 0) {
    const current = queue.shift();
    if (current === undefined || ids.has(current)) {
      continue;
    }
    ids.add(current);
    queue.push(...(byId.get(current)?.childIds ?? []));
  }
  return ids;
}

/** Products listed in the category or any of its descendants, in catalog order. */
export function productsInCategory(catalog: Catalog, categoryId: string): Product[] {
  const ids = descendantIds(catalog, categoryId);
  return catalog.products.filter(product => product.categoryIds.some(id => ids.has(id)));
}

export function categoryTree(catalog: Catalog): CategoryNode[] {
  const byId = new Map(catalog.categories.map(category => [category.id, category]));
  const build = (category: Category): CategoryNode => ({
    id: category.id,
    name: category.name,
    url: category.url,
    productCount: catalog.products.filter(product => product.categoryIds.includes(category.id)).length,
    children: category.childIds.flatMap(childId => {
      const child = byId.get(childId);
      return child ? [build(child)] : [];
    })
  });
  return catalog.categories.filter(category => category.parentId === null).map(build);
}

export function searchProducts(catalog: Catalog, query: string): Product[] {
  const needle = query.trim().toLowerCase();
  if (!needle) {
    return [];
  }
  return catalog.products.filter(
    product =>
      product.name.toLowerCase().includes(needle) ||
      product.code.toLowerCase().includes(needle) ||
      product.description.toLowerCase().includes(needle)
  );
}

export function catalogStats(catalog: Catalog): CatalogStats {
  return {
    totalProducts: catalog.products.length,
    totalCategories: catalog.categories.length,
    rootCategories: catalog.categories.filter(category => category.parentId === null).length
  };
}
