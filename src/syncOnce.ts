#!/usr/bin/env node
import chalk from 'chalk';
import { buildConfig } from './config.js';
import { loadDotEnv } from './env.js';
import { ConfigError } from './errors.js';
import { createLogger } from './logger.js';
import { createMirror } from './mirror.js';

async function run(): Promise<void> {
  await loadDotEnv();
  const config = buildConfig();
  const logger = createLogger({ verbose: config.verbose });
  const { orchestrator } = await createMirror(config, logger);

  const result = await orchestrator.runNow('cli');
  if (!result.accepted) {
    logger.error(`A sync has been running since ${result.runningSince}`);
    process.exitCode = 1;
    return;
  }

  const { run: sync } = result;
  console.log(
    chalk.bold(`\n${sync.outcome ?? 'unknown'}`),
    `added ${sync.added}, updated ${sync.updated}, removed ${sync.removed}, images ${sync.imagesDownloaded} downloaded / ${sync.imagesFailed} failed`
  );
  process.exitCode = sync.outcome === 'failed' ? 1 : 0;
}

run().catch(error => {
  if (error instanceof ConfigError) {
    console.error(chalk.red(error.message));
  } else {
    console.error(chalk.red('Sync failed:'), error);
  }
  process.exitCode = 1;
});
