import { describe, expect, it } from 'vitest';
import { TransportError } from '../src/errors.js';
import { StorefrontFetcher, createThrottle, isRetryableStatus, type Sleep } from '../src/scrapers/odoo/fetcher.js';
import { createFakeHttp, type FakeResponse } from './helpers/storefront.js';

const URL_A = 'https://shop.test/shop';

function createFetcher(routes: Record<string, FakeResponse | FakeResponse[]>, overrides: { requestDelayMs?: number; maxRetries?: number } = {}) {
  const fake = createFakeHttp(routes);
  const waits: number[] = [];
  const sleep: Sleep = async ms => {
    waits.push(ms);
  };
  const fetcher = new StorefrontFetcher({
    userAgent: 'test-agent',
    acceptLanguage: 'es-ES,es;q=0.9',
    requestDelayMs: overrides.requestDelayMs ?? 0,
    requestTimeoutMs: 1000,
    maxRetries: overrides.maxRetries ?? 3,
    retryBaseDelayMs: 100,
    http: fake.http,
    sleep
  });
  return { fetcher, requests: fake.requests, waits };
}

async function captureError(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error('expected the promise to reject');
}

describe('isRetryableStatus', () => {
  it('treats throttling and server errors as transient', () => {
    expect([408, 425, 429, 500, 503, 599].every(isRetryableStatus)).toBe(true);
    expect([400, 401, 403, 404, 410].some(isRetryableStatus)).toBe(false);
  });
});

describe('StorefrontFetcher', () => {
  it('returns the body and sends browser headers', async () => {
    const { fetcher, requests } = createFetcher({ [URL_A]: { body: '<html>ok</html>' } });

    await expect(fetcher.fetchHtml(URL_A)).resolves.toBe('<html>ok</html>');
    expect(requests).toEqual([
      { url: URL_A, userAgent: 'test-agent', acceptLanguage: 'es-ES,es;q=0.9', responseType: 'text' }
    ]);
  });

  it('retries transient failures with exponential backoff', async () => {
    const { fetcher, requests, waits } = createFetcher({
      [URL_A]: [{ status: 503 }, { status: 429 }, { status: 200, body: 'finally' }]
    });

    await expect(fetcher.fetchHtml(URL_A)).resolves.toBe('finally');
    expect(requests).toHaveLength(3);
    expect(waits).toEqual([100, 200]);
    expect(fetcher.requestCount).toBe(3);
  });

  it('gives up after the retry budget', async () => {
    const { fetcher, requests } = createFetcher({ [URL_A]: { status: 502 } }, { maxRetries: 2 });

    const error = await captureError(fetcher.fetchHtml(URL_A));
    expect(error).toBeInstanceOf(TransportError);
    expect(error).toMatchObject({ status: 502, retryable: true, message: `HTTP 502 for ${URL_A}` });
    expect(requests).toHaveLength(3);
  });

  it('does not retry a 404', async () => {
    const { fetcher, requests } = createFetcher({ [URL_A]: { status: 404 } });

    const error = await captureError(fetcher.fetchHtml(URL_A));
    expect(error).toMatchObject({ status: 404, retryable: false });
    expect(requests).toHaveLength(1);
  });

  it('rejects malformed URLs without a request', async () => {
    const { fetcher, requests } = createFetcher({});

    await expect(fetcher.fetchHtml('not a url')).rejects.toThrow('Malformed URL: not a url');
    await expect(fetcher.fetchHtml('ftp://shop.test/file')).rejects.toThrow('Unsupported protocol ftp:');
    expect(requests).toHaveLength(0);
  });

  it('spaces consecutive requests by the configured delay', async () => {
    const { fetcher, requests } = createFetcher({ [URL_A]: { body: 'page' } }, { requestDelayMs: 40 });

    const started = Date.now();
    await Promise.all([fetcher.fetchHtml(URL_A), fetcher.fetchHtml(URL_A), fetcher.fetchHtml(URL_A)]);
    expect(Date.now() - started).toBeGreaterThanOrEqual(80);
    expect(requests).toHaveLength(3);
  });
});

describe('createThrottle', () => {
  it('lets the first turn through immediately', async () => {
    const waits: number[] = [];
    const throttle = createThrottle(1000, async ms => {
      waits.push(ms);
    });
    await throttle();
    expect(waits).toEqual([]);
  });
});
