import path from 'path';
import { describe, expect, it } from 'vitest';
import { DEFAULT_USER_AGENT, buildConfig } from '../src/config.js';
import { ConfigError } from '../src/errors.js';

const cwd = path.resolve('/srv/mirror');

describe('buildConfig', () => {
  it('applies defaults around the required base URL', () => {
    const config = buildConfig({ SHOP_BASE_URL: 'https://shop.test/' }, cwd);
    expect(config).toEqual({
      baseUrl: 'https://shop.test',
      syncIntervalHours: 6,
      port: 8000,
      requestDelayMs: 1500,
      requestTimeoutMs: 30000,
      maxRetries: 3,
      retryBaseDelayMs: 1000,
      imageConcurrency: 4,
      maxPagesPerCategory: 100,
      detailPages: 'missing',
      catalogPath: path.join(cwd, 'data', 'catalog.json'),
      staticDir: path.join(cwd, 'static'),
      imageDir: path.join(cwd, 'static', 'images', 'products'),
      userAgent: DEFAULT_USER_AGENT,
      acceptLanguage: 'es-ES,es;q=0.9,en;q=0.8',
      verbose: false
    });
    expect(Object.isFrozen(config)).toBe(true);
  });

  it('reads overrides', () => {
    const config = buildConfig(
      {
        SHOP_BASE_URL: 'http://localhost:8069',
        SYNC_INTERVAL_HOURS: '0.5',
        PORT: '9000',
        DETAIL_PAGES: 'ALWAYS',
        CATALOG_PATH: 'state/catalog.json',
        IMAGE_DIR: '/var/images',
        VERBOSE: '1'
      },
      cwd
    );
    expect(config.baseUrl).toBe('http://localhost:8069');
    expect(config.syncIntervalHours).toBe(0.5);
    expect(config.port).toBe(9000);
    expect(config.detailPages).toBe('always');
    expect(config.catalogPath).toBe(path.join(cwd, 'state', 'catalog.json'));
    expect(config.imageDir).toBe(path.resolve('/var/images'));
    expect(config.verbose).toBe(true);
  });

  it('collects every problem into one ConfigError', () => {
    let caught: unknown;
    try {
      buildConfig({ PORT: '70000', IMAGE_CONCURRENCY: '0', DETAIL_PAGES: 'sometimes' }, cwd);
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(ConfigError);
    const problems = caught instanceof ConfigError ? caught.problems : [];
    expect(problems).toEqual([
      'SHOP_BASE_URL is required',
      'PORT must be an integer 1-65535 (got "70000")',
      'IMAGE_CONCURRENCY must be an integer >= 1 (got "0")',
      'DETAIL_PAGES must be one of always, missing, never (got "sometimes")'
    ]);
  });

  it('caps the sync interval at what a timer can hold', () => {
    expect(buildConfig({ SHOP_BASE_URL: 'https://shop.test', SYNC_INTERVAL_HOURS: '596' }, cwd).syncIntervalHours).toBe(596);
    expect(() => buildConfig({ SHOP_BASE_URL: 'https://shop.test', SYNC_INTERVAL_HOURS: '1000' }, cwd)).toThrow(
      'SYNC_INTERVAL_HOURS must be a number 0.001-596 (got "1000")'
    );
  });

  it('rejects non-http base URLs', () => {
    expect(() => buildConfig({ SHOP_BASE_URL: 'ftp://shop.test' }, cwd)).toThrow(
      'SHOP_BASE_URL must use http or https (got "ftp://shop.test")'
    );
    expect(() => buildConfig({ SHOP_BASE_URL: 'not a url' }, cwd)).toThrow(
      'SHOP_BASE_URL is not a valid URL (got "not a url")'
    );
  });
});
