import type { SyncWarning } from '../../types.js';

export type PageKind = 'category-listing' | 'product-listing' | 'product-detail';

export interface ParsedCategory {
  id: string;
  name: string;
  url: string;
  parentId: string | null;
}

export interface ParsedProduct {
  id: string;
  name: string;
  code: string;
  price: number;
  imageUrl: string | null;
  sourceUrl: string;
}

export interface ParsedProductDetail {
  id: string | null;
  name: string | null;
  description: string;
  code: string;
  price: number | null;
  imageUrl: string | null;
  breadcrumbCategoryIds: string[];
}

export interface CategoryListingPage {
  kind: 'category-listing';
  categories: ParsedCategory[];
  warnings: SyncWarning[];
}

export interface ProductListingPage {
  kind: 'product-listing';
  products: ParsedProduct[];
  nextPageUrl: string | null;
  breadcrumbCategoryIds: string[];
  warnings: SyncWarning[];
}

export interface ProductDetailPage {
  kind: 'product-detail';
  detail: ParsedProductDetail;
  warnings: SyncWarning[];
}

export type ParsedPage = CategoryListingPage | ProductListingPage | ProductDetailPage;

/** Fresh record for one product after crawl-time merging across category listings. */
export interface CrawledProduct extends ParsedProduct {
  description: string;
  categoryIds: string[];
}

export interface FreshCrawl {
  categories: ParsedCategory[];
  products: CrawledProduct[];
  warnings: SyncWarning[];
}

export type DetailPagePolicy = 'always' | 'missing' | 'never';
