import { CatalogStore } from './catalogStore.js';
import { IMAGE_PUBLIC_PATH, type MirrorConfig } from './config.js';
import type { Logger } from './logger.js';
import { ImageDownloader } from './scrapers/odoo/downloader.js';
import { StorefrontFetcher } from './scrapers/odoo/fetcher.js';
import { SyncOrchestrator } from './syncOrchestrator.js';

export interface Mirror {
  store: CatalogStore;
  orchestrator: SyncOrchestrator;
}

/** Wires the store, fetcher, downloader and orchestrator for one configuration and loads the stored catalog. */
export async function createMirror(config: Readonly<MirrorConfig>, logger: Logger): Promise<Mirror> {
  const store = new CatalogStore(config.catalogPath, { logger: logger.child('store') });
  await store.load();

  const fetcher = new StorefrontFetcher({
    userAgent: config.userAgent,
    acceptLanguage: config.acceptLanguage,
    requestDelayMs: config.requestDelayMs,
    requestTimeoutMs: config.requestTimeoutMs,
    maxRetries: config.maxRetries,
    retryBaseDelayMs: config.retryBaseDelayMs,
    logger: logger.child('fetch')
  });
  const images = new ImageDownloader({
    imageDir: config.imageDir,
    publicPath: IMAGE_PUBLIC_PATH,
    userAgent: config.userAgent,
    timeoutMs: config.requestTimeoutMs,
    logger: logger.child('images')
  });
  const orchestrator = new SyncOrchestrator({
    baseUrl: config.baseUrl,
    maxPagesPerCategory: config.maxPagesPerCategory,
    detailPages: config.detailPages,
    imageConcurrency: config.imageConcurrency,
    fetcher,
    images,
    store,
    logger: logger.child('sync')
  });
  return { store, orchestrator };
}
