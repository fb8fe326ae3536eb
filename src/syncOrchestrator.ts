import crypto from 'crypto';
import { StructuralParseError, TransportError, describeError } from './errors.js';
import { silentLogger, type Logger } from './logger.js';
import { mergeFreshProducts, reconcile } from './reconciler.js';
import type { CatalogStore } from './catalogStore.js';
import type { ImageRequest, ImageStore } from './scrapers/odoo/downloader.js';
import type { HtmlFetcher } from './scrapers/odoo/fetcher.js';
import { parsePage } from './scrapers/odoo/parser.js';
import type { CrawledProduct, DetailPagePolicy, FreshCrawl, ParsedCategory, ProductListingPage } from './scrapers/odoo/types.js';
import type { Catalog, Product, SyncRun, SyncRunSummary, SyncTrigger, SyncWarning } from './types.js';

export const MAX_PERSISTED_WARNINGS = 50;

export type SyncState =
  | { status: 'idle' }
  | { status: 'running'; runId: string; trigger: SyncTrigger; startedAt: string };

export type TriggerRejection = { accepted: false; reason: 'already-running'; runningSince: string };

export type TriggerResult = { accepted: true; runId: string } | TriggerRejection;

export type RunNowResult = { accepted: true; run: SyncRun } | TriggerRejection;

export interface SyncOrchestratorOptions {
  baseUrl: string;
  maxPagesPerCategory: number;
  detailPages: DetailPagePolicy;
  imageConcurrency: number;
  fetcher: HtmlFetcher;
  images: ImageStore;
  store: CatalogStore;
  logger?: Logger;
  now?: () => Date;
  createRunId?: () => string;
}

export function summarizeRun(run: SyncRun): SyncRunSummary {
  return {
    ...run,
    warnings: run.warnings.slice(0, MAX_PERSISTED_WARNINGS),
    warningCount: run.warnings.length
  };
}

function crawlWarning(message: string, url: string | null, recordId: string | null = null): SyncWarning {
  return { kind: 'crawl', message, recordId, url };
}

/** The category's parent from a breadcrumb trail: the entry just before it, or the last entry when it is absent. */
function parentFromBreadcrumb(categoryId: string, trail: string[]): string | null {
  const position = trail.indexOf(categoryId);
  if (position > 0) {
    return trail[position - 1];
  }
  if (position === -1 && trail.length > 0) {
    return trail[trail.length - 1];
  }
  return null;
}

function listingChanged(previous: Product, fresh: CrawledProduct): boolean {
  return (
    previous.name !== fresh.name ||
    previous.price !== fresh.price ||
    previous.imageUrl !== fresh.imageUrl ||
    previous.sourceUrl !== fresh.sourceUrl
  );
}

/**
 * Runs one sync at a time: crawl, reconcile, download images, commit. A
 * second trigger while a run is active is rejected rather than queued.
 */
export class SyncOrchestrator {
  private syncState: SyncState = { status: 'idle' };
  private currentRun: Promise<SyncRun> | null = null;
  private previousRun: SyncRun | null = null;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly createRunId: () => string;

  constructor(private readonly options: SyncOrchestratorOptions) {
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? (() => new Date());
    this.createRunId = options.createRunId ?? (() => crypto.randomUUID());
  }

  get state(): SyncState {
    return this.syncState;
  }

  /** The most recently finished run, committed or not. */
  get lastRun(): SyncRun | null {
    return this.previousRun;
  }

  trigger(source: SyncTrigger): TriggerResult {
    const started = this.start(source);
    return 'done' in started ? { accepted: true, runId: started.runId } : started;
  }

  /** Triggers a run and waits for it to finish. */
  async runNow(source: SyncTrigger): Promise<RunNowResult> {
    const started = this.start(source);
    if (!('done' in started)) {
      return started;
    }
    return { accepted: true, run: await started.done };
  }

  async waitForIdle(): Promise<void> {
    while (this.currentRun) {
      await this.currentRun;
    }
  }

  private start(source: SyncTrigger): { runId: string; done: Promise<SyncRun> } | TriggerRejection {
    if (this.syncState.status === 'running') {
      this.logger.warn(`Sync requested by ${source} while run ${this.syncState.runId} is active; ignored`);
      return { accepted: false, reason: 'already-running', runningSince: this.syncState.startedAt };
    }

    const run: SyncRun = {
      id: this.createRunId(),
      trigger: source,
      startedAt: this.now().toISOString(),
      finishedAt: null,
      outcome: null,
      pagesFetched: 0,
      imagesDownloaded: 0,
      imagesFailed: 0,
      added: 0,
      updated: 0,
      removed: 0,
      categoriesAdded: 0,
      categoriesUpdated: 0,
      categoriesRemoved: 0,
      warnings: [],
      error: null
    };
    this.syncState = { status: 'running', runId: run.id, trigger: source, startedAt: run.startedAt };
    const done = this.execute(run).finally(() => {
      this.syncState = { status: 'idle' };
      this.currentRun = null;
    });
    this.currentRun = done;
    return { runId: run.id, done };
  }

  private async execute(run: SyncRun): Promise<SyncRun> {
    this.logger.info(`Sync ${run.id} started (${run.trigger})`);
    try {
      const existing = this.options.store.current();
      const { crawl, complete } = await this.crawl(existing, run);
      run.warnings.push(...crawl.warnings);

      const result = reconcile(existing, crawl, { complete, now: this.now().toISOString() });
      run.warnings.push(...result.warnings);
      Object.assign(run, result.counts);

      const products = await this.attachImages(result.catalog.products, result.pendingImages, run);
      run.outcome = run.imagesFailed > 0 ? 'partial' : 'success';
      run.finishedAt = this.now().toISOString();

      const catalog: Catalog = {
        ...result.catalog,
        products,
        meta: {
          ...result.catalog.meta,
          lastSyncAt: run.finishedAt,
          lastSyncStatus: run.outcome,
          lastRun: summarizeRun(run)
        }
      };
      await this.options.store.save(catalog);

      const summary = `Sync ${run.id} ${run.outcome}: +${run.added} ~${run.updated} -${run.removed} products, ${run.pagesFetched} pages, ${run.imagesDownloaded} images, ${run.warnings.length} warnings`;
      if (run.outcome === 'success') {
        this.logger.success(summary);
      } else {
        this.logger.warn(`${summary}, ${run.imagesFailed} images failed`);
      }
    } catch (error) {
      run.outcome = 'failed';
      run.error = describeError(error);
      run.finishedAt = this.now().toISOString();
      this.logger.error(`Sync ${run.id} failed; catalog left unchanged: ${run.error}`, error);
    }
    this.previousRun = run;
    return run;
  }

  private async fetchPage(url: string, run: SyncRun): Promise<string> {
    const html = await this.options.fetcher.fetchHtml(url);
    run.pagesFetched += 1;
    return html;
  }

  /** A crawl is complete only when no category stopped at the page cap. */
  private async crawl(existing: Catalog, run: SyncRun): Promise<{ crawl: FreshCrawl; complete: boolean }> {
    const warnings: SyncWarning[] = [];
    const rootUrl = `${this.options.baseUrl}/shop`;
    const root = parsePage(await this.fetchPage(rootUrl, run), 'category-listing', rootUrl);
    warnings.push(...root.warnings);
    this.logger.info(`Found ${root.categories.length} categories`);

    const categories: ParsedCategory[] = [];
    const sightings: CrawledProduct[] = [];
    let complete = true;
    for (const category of root.categories) {
      const crawled = await this.crawlCategory(category, run, warnings);
      categories.push(crawled.category);
      sightings.push(...crawled.products);
      complete = complete && !crawled.truncated;
    }

    const products = mergeFreshProducts(sightings, warnings);
    const previous = new Map(existing.products.map(product => [product.id, product]));
    for (const product of products) {
      await this.completeFromDetail(product, previous.get(product.id), run, warnings);
    }
    return { crawl: { categories, products, warnings }, complete };
  }

  private async crawlCategory(
    category: ParsedCategory,
    run: SyncRun,
    warnings: SyncWarning[]
  ): Promise<{ category: ParsedCategory; products: CrawledProduct[]; truncated: boolean }> {
    const products: CrawledProduct[] = [];
    const seen = new Set<string>();
    const visited = new Set<string>();
    let parentId = category.parentId;
    let pageUrl: string | null = category.url;
    let pages = 0;
    let truncated = false;

    while (pageUrl && !visited.has(pageUrl)) {
      if (pages >= this.options.maxPagesPerCategory) {
        warnings.push(crawlWarning(`Stopped crawling category ${category.id} after ${pages} pages`, pageUrl, category.id));
        truncated = true;
        break;
      }
      visited.add(pageUrl);
      pages += 1;
      const page: ProductListingPage = parsePage(await this.fetchPage(pageUrl, run), 'product-listing', pageUrl);
      warnings.push(...page.warnings);

      if (pages === 1 && parentId === null) {
        parentId = parentFromBreadcrumb(category.id, page.breadcrumbCategoryIds);
      }
      const fresh = page.products.filter(product => !seen.has(product.id));
      if (fresh.length === 0) {
        break;
      }
      for (const product of fresh) {
        seen.add(product.id);
        products.push({ ...product, description: '', categoryIds: [category.id] });
      }
      pageUrl = page.nextPageUrl;
    }

    this.logger.debug(`Category ${category.name}: ${products.length} products in ${pages} pages`);
    return { category: { ...category, parentId: parentId === category.id ? null : parentId }, products, truncated };
  }

  private needsDetail(product: CrawledProduct, previous: Product | undefined): boolean {
    switch (this.options.detailPages) {
      case 'always':
        return true;
      case 'never':
        return false;
      case 'missing':
        return !previous || previous.description === '' || listingChanged(previous, product);
    }
  }

  /** Fills description, code and image from the detail page, or carries them over from the stored product. */
  private async completeFromDetail(
    product: CrawledProduct,
    previous: Product | undefined,
    run: SyncRun,
    warnings: SyncWarning[]
  ): Promise<void> {
    if (!this.needsDetail(product, previous)) {
      if (previous) {
        product.description = previous.description;
        product.code = product.code || previous.code;
      }
      return;
    }

    try {
      const page = parsePage(await this.fetchPage(product.sourceUrl, run), 'product-detail', product.sourceUrl);
      warnings.push(...page.warnings);
      product.description = page.detail.description;
      product.code = product.code || page.detail.code;
      product.imageUrl = product.imageUrl ?? page.detail.imageUrl;
    } catch (error) {
      const skippable = error instanceof StructuralParseError || (error instanceof TransportError && !error.retryable);
      if (!skippable) {
        throw error;
      }
      warnings.push(crawlWarning(`Detail page for ${product.id} skipped: ${describeError(error)}`, product.sourceUrl, product.id));
      if (previous) {
        product.description = previous.description;
      }
    }
  }

  private async attachImages(products: Product[], pendingIds: string[], run: SyncRun): Promise<Product[]> {
    const pending = new Set(pendingIds);
    const requests: ImageRequest[] = products.flatMap(product =>
      product.imageUrl && pending.has(product.id) ? [{ productId: product.id, imageUrl: product.imageUrl }] : []
    );
    if (requests.length === 0) {
      return products;
    }

    const results = await this.options.images.ensureImages(requests, this.options.imageConcurrency);
    const paths = new Map<string, string>();
    for (const result of results) {
      if (result.ok) {
        paths.set(result.productId, result.asset.publicPath);
        if (result.asset.downloaded) {
          run.imagesDownloaded += 1;
        }
      } else {
        run.imagesFailed += 1;
        run.warnings.push(result.error.toWarning());
      }
    }
    return products.map(product => {
      const imagePath = paths.get(product.id);
      return imagePath ? { ...product, imagePath } : product;
    });
  }
}
