import express from 'express';
import type { Request, Response, NextFunction } from 'express';
import cors from 'cors';
import { IMAGE_PUBLIC_PATH } from './config.js';
import { describeError } from './errors.js';
import { silentLogger, type Logger } from './logger.js';
import {
  catalogStats,
  categoryTree,
  findCategory,
  findProduct,
  productsInCategory,
  searchProducts
} from './catalogQueries.js';
import type { CatalogStore } from './catalogStore.js';
import type { SyncOrchestrator } from './syncOrchestrator.js';

export interface WebServerOptions {
  store: CatalogStore;
  orchestrator: SyncOrchestrator;
  staticDir: string;
  imageDir: string;
  logger?: Logger;
}

function queryString(value: unknown): string {
  return typeof value === 'string' ? value.trim() : '';
}

export function createApp(options: WebServerOptions): express.Express {
  const { store, orchestrator } = options;
  const logger = options.logger ?? silentLogger;
  const app = express();

  app.use(cors());
  app.use(express.json({ limit: '1mb' }));
  app.use(IMAGE_PUBLIC_PATH, express.static(options.imageDir));
  app.use('/static', express.static(options.staticDir));

  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok' });
  });

  const api = express.Router();
  app.use('/api', api);

  api.get('/stats', (_req: Request, res: Response) => {
    const catalog = store.current();
    const state = orchestrator.state;
    res.json({
      lastSync: catalog.meta.lastSyncAt,
      lastSyncStatus: catalog.meta.lastSyncStatus,
      stats: catalogStats(catalog),
      sync: {
        status: state.status,
        runningSince: state.status === 'running' ? state.startedAt : null,
        lastRun: orchestrator.lastRun ?? catalog.meta.lastRun
      }
    });
  });

  api.post('/sync', (_req: Request, res: Response) => {
    const result = orchestrator.trigger('manual');
    if (!result.accepted) {
      res.status(409).json({ accepted: false, message: 'sync already in progress', runningSince: result.runningSince });
      return;
    }
    res.status(202).json({ accepted: true, runId: result.runId, message: 'sync started' });
  });

  api.get('/categories', (_req: Request, res: Response) => {
    res.json(categoryTree(store.current()));
  });

  api.get('/products', (req: Request, res: Response) => {
    const catalog = store.current();
    const categoryId = queryString(req.query.sub) || queryString(req.query.category);
    if (!categoryId) {
      res.json(catalog.products);
      return;
    }
    if (!findCategory(catalog, categoryId)) {
      res.status(404).json({ error: `Unknown category ${categoryId}` });
      return;
    }
    res.json(productsInCategory(catalog, categoryId));
  });

  api.get('/products/:id', (req: Request, res: Response) => {
    const product = findProduct(store.current(), req.params.id);
    if (!product) {
      res.status(404).json({ error: `Unknown product ${req.params.id}` });
      return;
    }
    res.json(product);
  });

  api.get('/search', (req: Request, res: Response) => {
    res.json(searchProducts(store.current(), queryString(req.query.q)));
  });

  api.use((_req: Request, res: Response) => {
    res.status(404).json({ error: 'Not found' });
  });

  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    logger.error(`Request failed: ${describeError(error)}`, error);
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}
