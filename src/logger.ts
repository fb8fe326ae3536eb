import chalk from 'chalk';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string, error?: unknown): void;
  child(scope: string): Logger;
}

export interface LoggerOptions {
  scope?: string;
  verbose?: boolean;
  silent?: boolean;
}

function timestamp(): string {
  return new Date().toISOString();
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const { scope, verbose = false, silent = false } = options;
  const prefix = () => chalk.dim(`${timestamp()}${scope ? ` [${scope}]` : ''}`);

  return {
    debug(message) {
      if (silent || !verbose) return;
      console.log(`${prefix()} ${chalk.dim(message)}`);
    },
    info(message) {
      if (silent) return;
      console.log(`${prefix()} ${message}`);
    },
    success(message) {
      if (silent) return;
      console.log(`${prefix()} ${chalk.green(`✓ ${message}`)}`);
    },
    warn(message) {
      if (silent) return;
      console.warn(`${prefix()} ${chalk.yellow(`⚠ ${message}`)}`);
    },
    error(message, error) {
      if (silent) return;
      console.error(`${prefix()} ${chalk.red(`✗ ${message}`)}`);
      if (error instanceof Error && error.stack && verbose) {
        console.error(chalk.dim(error.stack));
      }
    },
    child(childScope) {
      return createLogger({ scope: scope ? `${scope}:${childScope}` : childScope, verbose, silent });
    }
  };
}

export const silentLogger: Logger = createLogger({ silent: true });
