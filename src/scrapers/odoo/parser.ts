import * as cheerio from 'cheerio';
import { FieldValidationError, StructuralParseError } from '../../errors.js';
import type { SyncWarning } from '../../types.js';
import type {
  CategoryListingPage,
  PageKind,
  ParsedCategory,
  ParsedPage,
  ParsedProduct,
  ProductDetailPage,
  ProductListingPage
} from './types.js';

// Category links are tried from the most to the least specific region of the page.
const CATEGORY_LINK_SELECTORS = [
  'aside a[href*="/shop/category/"], .o_wsale_categories a[href*="/shop/category/"], #wsale_products_categories_collapse a[href*="/shop/category/"]',
  'nav a[href*="/shop/category/"], .navbar a[href*="/shop/category/"]',
  'a[href*="/shop/category/"]'
];
const LISTING_ANCHOR = '#products_grid, .o_wsale_products_grid_table_wrapper, .o_wsale_products_main_row';
const PRODUCT_CARD = '.oe_product, .o_wsale_product_grid_wrapper .card, .oe_product_cart, [itemtype*="Product"]';
const PRODUCT_NAME = '.oe_product_name, .o_wsale_products_item_title, h5, h6, .card-title, [itemprop="name"]';
const PRODUCT_PRICE = '.oe_currency_value, .product_price .oe_price, [itemprop="price"]';
const PRODUCT_CODE = '.oe_product_code, .product_code, [itemprop="sku"], small';
const NEXT_PAGE = 'a.page-link[rel="next"], a[rel="next"], .pagination .next a, a[aria-label="Next"], link[rel="next"]';
const BREADCRUMB_LINKS = '.breadcrumb a, nav[aria-label="breadcrumb"] a';
const DETAIL_ANCHOR = '#product_detail, #product_details, [itemtype*="Product"]';
const DETAIL_NAME = '#product_details h1, h1[itemprop="name"], h1';
const DETAIL_DESCRIPTION =
  '[itemprop="description"], #product_full_description, .o_wsale_product_information_text, #product_details .text-muted';
const DETAIL_IMAGE = '#o-carousel-product img, .product_detail_img, img[itemprop="image"], #product_detail img';

const CODE_RE = /^[A-Z0-9-]+$/i;
const NON_PRODUCT_SEGMENTS = new Set([
  'category',
  'cart',
  'checkout',
  'page',
  'wishlist',
  'payment',
  'confirmation',
  'address',
  'compare',
  'product'
]);

function collapse(text: string | undefined | null): string {
  return (text ?? '').replace(/\s+/g, ' ').trim();
}

function decodeSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    return segment;
  }
}

function idFromSegment(segment: string): string {
  const decoded = decodeSegment(segment);
  const numeric = decoded.match(/-(\d+)$/) ?? decoded.match(/^(\d+)$/);
  if (numeric?.[1]) {
    return numeric[1];
  }
  return `slug:${decoded.toLowerCase()}`;
}

function toUrl(value: string): URL | null {
  try {
    return new URL(value);
  } catch {
    return null;
  }
}

/** Category id from `/shop/category/<slug>-<id>` (any `/page/<n>` suffix ignored). */
export function categoryIdFromUrl(url: string): string | null {
  const parsed = toUrl(url);
  const match = parsed?.pathname.match(/\/shop\/category\/([^/]+)/i);
  return match?.[1] ? idFromSegment(match[1]) : null;
}

/** Product id from `/shop/<slug>-<id>` or `/shop/product/<slug>-<id>`. */
export function productIdFromUrl(url: string): string | null {
  const parsed = toUrl(url);
  const match = parsed?.pathname.match(/\/shop\/(?:product\/)?([^/]+)\/?$/i);
  if (!match?.[1] || NON_PRODUCT_SEGMENTS.has(match[1].toLowerCase())) {
    return null;
  }
  return idFromSegment(match[1]);
}

/** Absolute http(s) URL without query or fragment, or null. */
function canonicalUrl(value: string | undefined | null, base: string, keepQuery = false): string | null {
  const trimmed = collapse(value);
  if (!trimmed) {
    return null;
  }
  try {
    const url = new URL(trimmed, base);
    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
      return null;
    }
    url.hash = '';
    if (!keepQuery) {
      url.search = '';
    }
    return url.toString();
  } catch {
    return null;
  }
}

function categoryUrl(url: string): string {
  return url.replace(/\/page\/\d+\/?$/i, '');
}

/**
 * Parses a displayed price. The last of `.` / `,` is the decimal separator when
 * both appear; a single `,` followed by exactly two digits is a decimal comma.
 */
export function parsePrice(text: string): number | null {
  const cleaned = text.replace(/[^\d.,-]/g, '');
  if (!/\d/.test(cleaned)) {
    return null;
  }
  const negative = cleaned.trim().startsWith('-');
  const digits = cleaned.replace(/-/g, '');
  const lastDot = digits.lastIndexOf('.');
  const lastComma = digits.lastIndexOf(',');

  let normalized: string;
  if (lastDot >= 0 && lastComma >= 0) {
    const decimal = lastDot > lastComma ? '.' : ',';
    const thousands = decimal === '.' ? ',' : '.';
    normalized = digits.split(thousands).join('').replace(decimal, '.');
  } else if (lastComma >= 0) {
    const commas = digits.split(',').length - 1;
    normalized = commas === 1 && /,\d{2}$/.test(digits) ? digits.replace(',', '.') : digits.replace(/,/g, '');
  } else {
    const dots = digits.split('.').length - 1;
    normalized = dots > 1 ? digits.replace(/\./g, '') : digits;
  }

  const value = Number(normalized);
  if (!Number.isFinite(value)) {
    return null;
  }
  return negative ? -value : value;
}

function validPrice(text: string | null, recordId: string, pageUrl: string): number {
  if (text === null) {
    return 0;
  }
  const price = parsePrice(text);
  if (price === null) {
    throw new FieldValidationError('price', `Product ${recordId} has an unreadable price "${text}"`, recordId, pageUrl);
  }
  if (price < 0) {
    throw new FieldValidationError('price', `Product ${recordId} has a negative price ${price}`, recordId, pageUrl);
  }
  return price;
}

/** Image sources: blank and `data:` placeholders mean "no image", anything else must be http(s). */
function validImageUrl(src: string | null, recordId: string | null, pageUrl: string): string | null {
  const trimmed = collapse(src);
  if (!trimmed || trimmed.startsWith('data:')) {
    return null;
  }
  const url = canonicalUrl(trimmed, pageUrl, true);
  if (!url) {
    throw new FieldValidationError('imageUrl', `Image URL "${trimmed}" is not a valid http(s) URL`, recordId, pageUrl);
  }
  return url;
}

function validCode(candidates: string[]): string {
  return candidates.map(collapse).find(text => CODE_RE.test(text)) ?? '';
}

function breadcrumbIds($: cheerio.CheerioAPI, pageUrl: string): string[] {
  const ids: string[] = [];
  $(BREADCRUMB_LINKS).each((_idx, element) => {
    const url = canonicalUrl($(element).attr('href'), pageUrl);
    const id = url ? categoryIdFromUrl(url) : null;
    if (id && !ids.includes(id)) {
      ids.push(id);
    }
  });
  return ids;
}

export function parseCategoryListing(html: string, pageUrl: string): CategoryListingPage {
  const $ = cheerio.load(html);
  const selector = CATEGORY_LINK_SELECTORS.find(group => $(group).length > 0);
  if (!selector) {
    throw new StructuralParseError(pageUrl, 'category-listing', 'a[href*="/shop/category/"]');
  }

  const categories: ParsedCategory[] = [];
  const warnings: SyncWarning[] = [];
  const seen = new Set<string>();

  $(selector).each((_idx, element) => {
    const link = $(element);
    const url = canonicalUrl(link.attr('href'), pageUrl);
    const id = url ? categoryIdFromUrl(url) : null;
    if (!url || !id || seen.has(id)) {
      return;
    }
    const name = collapse(link.text()) || collapse(link.attr('title'));
    if (!name) {
      warnings.push(new FieldValidationError('name', `Category ${id} has an empty name`, id, pageUrl).toWarning());
      return;
    }
    seen.add(id);

    const parentHref = link.closest('li').parent().closest('li').find('a[href*="/shop/category/"]').first().attr('href');
    const parentUrl = canonicalUrl(parentHref, pageUrl);
    const parentId = parentUrl ? categoryIdFromUrl(parentUrl) : null;

    categories.push({
      id,
      name,
      url: categoryUrl(url),
      parentId: parentId && parentId !== id ? parentId : null
    });
  });

  return { kind: 'category-listing', categories, warnings };
}

export function parseProductListing(html: string, pageUrl: string): ProductListingPage {
  const $ = cheerio.load(html);
  if ($(LISTING_ANCHOR).length === 0) {
    throw new StructuralParseError(pageUrl, 'product-listing', LISTING_ANCHOR);
  }

  const products: ParsedProduct[] = [];
  const warnings: SyncWarning[] = [];
  const seen = new Set<string>();
  const origin = toUrl(pageUrl)?.origin;

  $(PRODUCT_CARD).each((_idx, element) => {
    const card = $(element);
    const hrefs = card
      .find('a[href]')
      .toArray()
      .map(anchor => $(anchor).attr('href'));
    hrefs.push(card.closest('a[href]').attr('href'));

    let sourceUrl: string | null = null;
    let id: string | null = null;
    for (const href of hrefs) {
      // Only links back into this storefront count.
      const url = canonicalUrl(href, pageUrl);
      const candidate = url && toUrl(url)?.origin === origin ? productIdFromUrl(url) : null;
      if (url && candidate) {
        sourceUrl = url;
        id = candidate;
        break;
      }
    }

    // Nested card selectors match the same product more than once.
    if (id && seen.has(id)) {
      return;
    }
    if (!id || !sourceUrl) {
      if (card.parents(PRODUCT_CARD).length === 0) {
        warnings.push(new FieldValidationError('sourceUrl', 'Product card has no product link', null, pageUrl).toWarning());
      }
      return;
    }

    try {
      const name = collapse(card.find(PRODUCT_NAME).first().text());
      if (!name) {
        throw new FieldValidationError('name', `Product ${id} has an empty name`, id, pageUrl);
      }

      const priceElement = card
        .find(PRODUCT_PRICE)
        .filter((_i, node) => $(node).closest('del').length === 0)
        .first();
      const priceText = priceElement.length > 0 ? priceElement.attr('content') ?? priceElement.text() : null;
      const price = validPrice(priceText, id, pageUrl);

      const image = card
        .find('img')
        .toArray()
        .map(img => {
          const node = $(img);
          const src = node.attr('src') ?? '';
          return src && !src.startsWith('data:') ? src : node.attr('data-src') ?? src;
        })
        .sort((a, b) => Number(b.includes('/web/image')) - Number(a.includes('/web/image')))[0];

      const code = validCode(
        card
          .find(PRODUCT_CODE)
          .toArray()
          .map(node => $(node).text())
      );

      seen.add(id);
      products.push({
        id,
        name,
        code,
        price,
        imageUrl: validImageUrl(image ?? null, id, pageUrl),
        sourceUrl
      });
    } catch (error) {
      if (error instanceof FieldValidationError) {
        seen.add(id);
        warnings.push(error.toWarning());
        return;
      }
      throw error;
    }
  });

  return {
    kind: 'product-listing',
    products,
    nextPageUrl: findNextPage($, pageUrl),
    breadcrumbCategoryIds: breadcrumbIds($, pageUrl),
    warnings
  };
}

function findNextPage($: cheerio.CheerioAPI, pageUrl: string): string | null {
  const current = canonicalUrl(pageUrl, pageUrl, true);
  for (const element of $(NEXT_PAGE).toArray()) {
    const node = $(element);
    if (node.closest('.disabled').length > 0) {
      continue;
    }
    const next = canonicalUrl(node.attr('href'), pageUrl, true);
    if (next && next !== current) {
      return next;
    }
  }
  return null;
}

export function parseProductDetail(html: string, pageUrl: string): ProductDetailPage {
  const $ = cheerio.load(html);
  const root = $(DETAIL_ANCHOR).first();
  if (root.length === 0) {
    throw new StructuralParseError(pageUrl, 'product-detail', DETAIL_ANCHOR);
  }

  const warnings: SyncWarning[] = [];
  const canonical = canonicalUrl($('link[rel="canonical"]').attr('href'), pageUrl);
  const id = (canonical ? productIdFromUrl(canonical) : null) ?? productIdFromUrl(pageUrl);

  const name = collapse($(DETAIL_NAME).first().text()) || null;
  const description =
    $(DETAIL_DESCRIPTION)
      .toArray()
      .map(node => collapse($(node).text()))
      .find(text => text.length > 0) ?? '';

  const priceElement = root
    .find(PRODUCT_PRICE)
    .filter((_i, node) => $(node).closest('del').length === 0)
    .first();
  const priceText = priceElement.length > 0 ? priceElement.attr('content') ?? priceElement.text() : null;
  const parsedPrice = priceText === null ? null : parsePrice(priceText);

  const imageNode = $(DETAIL_IMAGE).first();
  const imageSrc =
    imageNode.attr('data-zoom-image') ??
    imageNode.attr('src') ??
    $('meta[property="og:image"]').attr('content') ??
    null;
  let imageUrl: string | null = null;
  try {
    imageUrl = validImageUrl(imageSrc, id, pageUrl);
  } catch (error) {
    if (!(error instanceof FieldValidationError)) {
      throw error;
    }
    warnings.push(error.toWarning());
  }

  const code = validCode(
    root
      .find(PRODUCT_CODE)
      .toArray()
      .map(node => $(node).attr('content') ?? $(node).text())
  );

  return {
    kind: 'product-detail',
    detail: {
      id,
      name,
      description,
      code,
      price: parsedPrice !== null && parsedPrice >= 0 ? parsedPrice : null,
      imageUrl,
      breadcrumbCategoryIds: breadcrumbIds($, pageUrl)
    },
    warnings
  };
}

export function parsePage(html: string, kind: 'category-listing', pageUrl: string): CategoryListingPage;
export function parsePage(html: string, kind: 'product-listing', pageUrl: string): ProductListingPage;
export function parsePage(html: string, kind: 'product-detail', pageUrl: string): ProductDetailPage;
export function parsePage(html: string, kind: PageKind, pageUrl: string): ParsedPage;
export function parsePage(html: string, kind: PageKind, pageUrl: string): ParsedPage {
  switch (kind) {
    case 'category-listing':
      return parseCategoryListing(html, pageUrl);
    case 'product-listing':
      return parseProductListing(html, pageUrl);
    case 'product-detail':
      return parseProductDetail(html, pageUrl);
  }
}
