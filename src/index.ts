import chalk from 'chalk';
import { buildConfig } from './config.js';
import { loadDotEnv } from './env.js';
import { ConfigError, describeError } from './errors.js';
import { createLogger } from './logger.js';
import { createMirror } from './mirror.js';
import { SyncScheduler, hoursToMs } from './scheduler.js';
import { createApp } from './webServer.js';

async function main(): Promise<void> {
  await loadDotEnv();
  const config = buildConfig();
  const logger = createLogger({ verbose: config.verbose });

  const { store, orchestrator } = await createMirror(config, logger);
  const scheduler = new SyncScheduler(orchestrator, {
    intervalMs: hoursToMs(config.syncIntervalHours),
    logger: logger.child('scheduler')
  });
  const app = createApp({
    store,
    orchestrator,
    staticDir: config.staticDir,
    imageDir: config.imageDir,
    logger: logger.child('http')
  });

  const server = app.listen(config.port, () => {
    logger.success(`Catalog mirror for ${config.baseUrl} listening on port ${config.port}`);
  });
  scheduler.start();

  const shutdown = (signal: string) => {
    logger.info(`${signal} received, shutting down`);
    scheduler.stop();
    server.close(error => {
      if (error) {
        logger.error(`Server did not close cleanly: ${describeError(error)}`, error);
        process.exitCode = 1;
      }
    });
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch(error => {
  if (error instanceof ConfigError) {
    console.error(chalk.red(error.message));
  } else {
    console.error(chalk.red('Catalog mirror failed to start:'), error);
  }
  process.exitCode = 1;
});
