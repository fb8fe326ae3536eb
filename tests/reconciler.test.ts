import { describe, expect, it } from 'vitest';
import { emptyCatalog } from '../src/catalogStore.js';
import { compareProductIds, mergeFreshProducts, reconcile } from '../src/reconciler.js';
import type { CrawledProduct, ParsedCategory } from '../src/scrapers/odoo/types.js';
import type { Catalog, SyncWarning } from '../src/types.js';
import { BASE_URL } from './helpers/storefront.js';

const FIRST_SYNC = '2026-01-01T00:00:00.000Z';
const SECOND_SYNC = '2026-01-02T00:00:00.000Z';

function category(id: string, parentId: string | null = null): ParsedCategory {
  return { id, name: `Category ${id}`, url: `${BASE_URL}/shop/category/c-${id}`, parentId };
}

function crawled(id: string, overrides: Partial<CrawledProduct> = {}): CrawledProduct {
  return {
    id,
    name: `Product ${id}`,
    code: '',
    price: 10,
    imageUrl: null,
    sourceUrl: `${BASE_URL}/shop/p-${id}`,
    description: '',
    categoryIds: ['1'],
    ...overrides
  };
}

function seed(categories: ParsedCategory[], products: CrawledProduct[]): Catalog {
  return reconcile(emptyCatalog(), { categories, products, warnings: [] }, { complete: true, now: FIRST_SYNC }).catalog;
}

describe('compareProductIds', () => {
  it('puts numeric ids first, newest first', () => {
    expect(['2', 'slug:b', '10', 'slug:a'].sort(compareProductIds)).toEqual(['10', '2', 'slug:a', 'slug:b']);
  });

  it('orders ids beyond safe integer precision', () => {
    const ids = ['90071992547409930', '90071992547409931', '9'];
    expect([...ids].sort(compareProductIds)).toEqual(['90071992547409931', '90071992547409930', '9']);
  });
});

describe('reconcile', () => {
  it('adds, updates and removes against the stored catalog', () => {
    const existing = seed([category('1')], [crawled('10'), crawled('11'), crawled('12')]);

    const result = reconcile(
      existing,
      { categories: [category('1')], products: [crawled('10', { name: 'Product 10 v2' }), crawled('12'), crawled('13')], warnings: [] },
      { complete: true, now: SECOND_SYNC }
    );

    expect(result.counts).toEqual({
      added: 1,
      updated: 1,
      removed: 1,
      categoriesAdded: 0,
      categoriesUpdated: 0,
      categoriesRemoved: 0
    });
    expect(result.catalog.products.map(product => product.id)).toEqual(['13', '12', '10']);
    expect(result.catalog.products[2]).toMatchObject({ name: 'Product 10 v2', lastSeenAt: SECOND_SYNC });
    expect(result.catalog.meta).toMatchObject({ productCount: 3, categoryCount: 1, rootCategoryCount: 1 });
    expect(result.warnings).toEqual([]);
  });

  it('counts nothing when the crawl matches the catalog', () => {
    const products = [crawled('10', { categoryIds: ['2'] }), crawled('11')];
    const categories = [category('1'), category('2', '1')];
    const existing = seed(categories, products);

    const result = reconcile(existing, { categories, products, warnings: [] }, { complete: true, now: SECOND_SYNC });

    expect(result.counts).toEqual({
      added: 0,
      updated: 0,
      removed: 0,
      categoriesAdded: 0,
      categoriesUpdated: 0,
      categoriesRemoved: 0
    });
    expect(result.catalog.categories).toEqual(existing.categories);
  });

  it('carries unseen records over when the crawl was incomplete', () => {
    const existing = seed([category('1'), category('2')], [crawled('10'), crawled('11', { categoryIds: ['2'] })]);

    const result = reconcile(existing, { categories: [category('1')], products: [crawled('10')], warnings: [] }, { complete: false, now: SECOND_SYNC });

    expect(result.counts.removed).toBe(0);
    expect(result.catalog.products.map(product => product.id)).toEqual(['11', '10']);
    expect(result.catalog.categories.map(entry => entry.id)).toEqual(['1', '2']);
  });

  it('keeps every product pointing at a known category', () => {
    const result = reconcile(
      emptyCatalog(),
      {
        categories: [category('1'), category('5', '77')],
        products: [crawled('20', { categoryIds: ['99'] }), crawled('21', { categoryIds: ['99', '5'] })],
        warnings: []
      },
      { complete: true, now: FIRST_SYNC }
    );

    expect(result.catalog.categories.map(entry => [entry.id, entry.parentId])).toEqual([
      ['1', null],
      ['5', null]
    ]);
    expect(result.catalog.products).toHaveLength(1);
    expect(result.catalog.products[0]).toMatchObject({ id: '21', categoryId: '5', categoryIds: ['5'] });
    expect(result.warnings.map(warning => warning.message)).toEqual([
      'Category 5 refers to unknown parent 77; made it a root',
      'Product 20 has no known category; skipped'
    ]);
  });

  it('cuts a parent link that would close a cycle', () => {
    const result = reconcile(
      emptyCatalog(),
      { categories: [category('1', '2'), category('2', '1')], products: [], warnings: [] },
      { complete: true, now: FIRST_SYNC }
    );

    expect(result.catalog.categories).toEqual([
      { ...category('1'), parentId: null, childIds: ['2'] },
      { ...category('2'), parentId: '1', childIds: [] }
    ]);
    expect(result.warnings).toEqual([
      {
        kind: 'integrity',
        message: 'Category 1 would be its own ancestor via 2; made it a root',
        recordId: '1',
        url: `${BASE_URL}/shop/category/c-1`
      }
    ]);
  });

  it('files a product under its deepest category', () => {
    const result = reconcile(
      emptyCatalog(),
      { categories: [category('1'), category('2', '1')], products: [crawled('10', { categoryIds: ['1', '2'] })], warnings: [] },
      { complete: true, now: FIRST_SYNC }
    );
    expect(result.catalog.products[0]).toMatchObject({ categoryId: '2', categoryIds: ['1', '2'] });
  });

  it('keeps a downloaded image until its source changes', () => {
    const imageUrl = `${BASE_URL}/web/image/product.template/10/image_512`;
    const seeded = seed([category('1')], [crawled('10', { imageUrl }), crawled('11', { imageUrl: `${imageUrl}?v=1` })]);
    const existing: Catalog = {
      ...seeded,
      products: seeded.products.map(product => ({ ...product, imagePath: `/static/images/products/${product.id}.png` }))
    };

    const result = reconcile(
      existing,
      { categories: [category('1')], products: [crawled('10', { imageUrl }), crawled('11', { imageUrl: `${imageUrl}?v=2` })], warnings: [] },
      { complete: true, now: SECOND_SYNC }
    );

    expect(result.catalog.products.map(product => [product.id, product.imagePath])).toEqual([
      ['11', null],
      ['10', '/static/images/products/10.png']
    ]);
    expect(result.pendingImages).toEqual(['11']);
    expect(result.counts.updated).toBe(1);
  });

  it('keeps the later of two conflicting categories', () => {
    const result = reconcile(
      emptyCatalog(),
      { categories: [category('1'), { ...category('1'), name: 'Renamed' }], products: [], warnings: [] },
      { complete: true, now: FIRST_SYNC }
    );
    expect(result.catalog.categories).toEqual([{ ...category('1'), name: 'Renamed', childIds: [] }]);
    expect(result.warnings[0]).toMatchObject({ kind: 'duplicate-id', recordId: '1' });
  });
});

describe('mergeFreshProducts', () => {
  it('unions categories of identical sightings', () => {
    const warnings: SyncWarning[] = [];
    const merged = mergeFreshProducts([crawled('10'), crawled('10', { categoryIds: ['2'] })], warnings);
    expect(merged).toEqual([crawled('10', { categoryIds: ['1', '2'] })]);
    expect(warnings).toEqual([]);
  });

  it('keeps the later sighting when the data differs', () => {
    const warnings: SyncWarning[] = [];
    const merged = mergeFreshProducts([crawled('10'), crawled('10', { price: 12, categoryIds: ['2'] })], warnings);
    expect(merged).toEqual([crawled('10', { price: 12, categoryIds: ['1', '2'] })]);
    expect(warnings).toEqual([
      {
        kind: 'duplicate-id',
        message: 'Product id 10 seen with different data ("Product 10" and "Product 10"); keeping the later one',
        recordId: '10',
        url: `${BASE_URL}/shop/p-10`
      }
    ]);
  });
});
