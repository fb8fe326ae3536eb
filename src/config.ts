import path from 'path';
import { ConfigError } from './errors.js';
import type { DetailPagePolicy } from './scrapers/odoo/types.js';

export interface MirrorConfig {
  baseUrl: string;
  syncIntervalHours: number;
  port: number;
  requestDelayMs: number;
  requestTimeoutMs: number;
  maxRetries: number;
  retryBaseDelayMs: number;
  imageConcurrency: number;
  maxPagesPerCategory: number;
  detailPages: DetailPagePolicy;
  catalogPath: string;
  staticDir: string;
  imageDir: string;
  userAgent: string;
  acceptLanguage: string;
  verbose: boolean;
}

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

// Timer delays above 2^31-1 ms fire immediately.
export const MAX_SYNC_INTERVAL_HOURS = 596;

const DETAIL_POLICIES: readonly DetailPagePolicy[] = ['always', 'missing', 'never'];

type NumberRule = { min: number; max?: number; integer: boolean };

function readNumber(
  env: NodeJS.ProcessEnv,
  key: string,
  fallback: number,
  rule: NumberRule,
  problems: string[]
): number {
  const raw = env[key]?.trim();
  if (!raw) {
    return fallback;
  }
  const value = Number(raw);
  const fitsMax = rule.max === undefined || value <= rule.max;
  if (!Number.isFinite(value) || (rule.integer && !Number.isInteger(value)) || value < rule.min || !fitsMax) {
    const range = rule.max === undefined ? `>= ${rule.min}` : `${rule.min}-${rule.max}`;
    problems.push(`${key} must be ${rule.integer ? 'an integer' : 'a number'} ${range} (got "${raw}")`);
    return fallback;
  }
  return value;
}

function readBaseUrl(env: NodeJS.ProcessEnv, problems: string[]): string {
  const raw = env.SHOP_BASE_URL?.trim();
  if (!raw) {
    problems.push('SHOP_BASE_URL is required');
    return '';
  }
  try {
    const url = new URL(raw);
    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
      problems.push(`SHOP_BASE_URL must use http or https (got "${raw}")`);
      return '';
    }
    return url.toString().replace(/\/+$/, '');
  } catch {
    problems.push(`SHOP_BASE_URL is not a valid URL (got "${raw}")`);
    return '';
  }
}

function readDetailPolicy(env: NodeJS.ProcessEnv, problems: string[]): DetailPagePolicy {
  const raw = env.DETAIL_PAGES?.trim().toLowerCase();
  if (!raw) {
    return 'missing';
  }
  const match = DETAIL_POLICIES.find(policy => policy === raw);
  if (!match) {
    problems.push(`DETAIL_PAGES must be one of ${DETAIL_POLICIES.join(', ')} (got "${raw}")`);
    return 'missing';
  }
  return match;
}

function readFlag(env: NodeJS.ProcessEnv, key: string): boolean {
  const raw = (env[key] || '').trim().toLowerCase();
  return raw === 'true' || raw === '1';
}

export function buildConfig(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): Readonly<MirrorConfig> {
  const problems: string[] = [];
  const baseUrl = readBaseUrl(env, problems);
  const staticDir = path.resolve(cwd, env.STATIC_DIR?.trim() || 'static');
  const imageDir = env.IMAGE_DIR?.trim();

  const config: MirrorConfig = {
    baseUrl,
    syncIntervalHours: readNumber(
      env,
      'SYNC_INTERVAL_HOURS',
      6,
      { min: 0.001, max: MAX_SYNC_INTERVAL_HOURS, integer: false },
      problems
    ),
    port: readNumber(env, 'PORT', 8000, { min: 1, max: 65535, integer: true }, problems),
    requestDelayMs: readNumber(env, 'REQUEST_DELAY_MS', 1500, { min: 0, integer: true }, problems),
    requestTimeoutMs: readNumber(env, 'REQUEST_TIMEOUT_MS', 30000, { min: 1, integer: true }, problems),
    maxRetries: readNumber(env, 'REQUEST_RETRIES', 3, { min: 0, integer: true }, problems),
    retryBaseDelayMs: readNumber(env, 'RETRY_BASE_DELAY_MS', 1000, { min: 0, integer: true }, problems),
    imageConcurrency: readNumber(env, 'IMAGE_CONCURRENCY', 4, { min: 1, integer: true }, problems),
    maxPagesPerCategory: readNumber(env, 'MAX_PAGES_PER_CATEGORY', 100, { min: 1, integer: true }, problems),
    detailPages: readDetailPolicy(env, problems),
    catalogPath: path.resolve(cwd, env.CATALOG_PATH?.trim() || path.join('data', 'catalog.json')),
    staticDir,
    imageDir: imageDir ? path.resolve(cwd, imageDir) : path.join(staticDir, 'images', 'products'),
    userAgent: env.USER_AGENT?.trim() || DEFAULT_USER_AGENT,
    acceptLanguage: env.ACCEPT_LANGUAGE?.trim() || 'es-ES,es;q=0.9,en;q=0.8',
    verbose: readFlag(env, 'VERBOSE')
  };

  if (problems.length > 0) {
    throw new ConfigError(problems);
  }
  return Object.freeze(config);
}

/** URL path under which the downloaded images are served. */
export const IMAGE_PUBLIC_PATH = '/static/images/products';
