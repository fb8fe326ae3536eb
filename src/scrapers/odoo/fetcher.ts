import axios, { type AxiosInstance } from 'axios';
import { TransportError, describeError } from '../../errors.js';
import { silentLogger, type Logger } from '../../logger.js';

export interface HtmlFetcher {
  fetchHtml(url: string): Promise<string>;
}

export type Sleep = (ms: number) => Promise<void>;

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Serializes callers so that consecutive turns start at least `delayMs` apart.
 */
export function createThrottle(delayMs: number, wait: Sleep = sleep): () => Promise<void> {
  let last = 0;
  let chain: Promise<void> = Promise.resolve();
  return () => {
    const turn = chain.then(async () => {
      let remaining = last + delayMs - Date.now();
      while (remaining > 0) {
        await wait(remaining);
        remaining = last + delayMs - Date.now();
      }
      last = Date.now();
    });
    chain = turn;
    return turn;
  };
}

const RETRYABLE_STATUS = new Set([408, 425, 429]);

export function isRetryableStatus(status: number): boolean {
  return RETRYABLE_STATUS.has(status) || (status >= 500 && status < 600);
}

export function browserHeaders(userAgent: string, acceptLanguage: string): Record<string, string> {
  return {
    'User-Agent': userAgent,
    Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,image/avif,image/webp,*/*;q=0.8',
    'Accept-Language': acceptLanguage,
    'Upgrade-Insecure-Requests': '1',
    'Cache-Control': 'max-age=0'
  };
}

function assertHttpUrl(url: string): string {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw new TransportError(url, `Malformed URL: ${url}`, { retryable: false });
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new TransportError(url, `Unsupported protocol ${parsed.protocol} in ${url}`, { retryable: false });
  }
  return parsed.toString();
}

function toTransportError(url: string, error: unknown): TransportError {
  if (error instanceof TransportError) {
    return error;
  }
  if (axios.isAxiosError(error)) {
    const status = error.response?.status;
    if (status !== undefined) {
      return new TransportError(url, `HTTP ${status} for ${url}`, {
        status,
        retryable: isRetryableStatus(status),
        cause: error
      });
    }
    const retryable = error.code !== 'ERR_INVALID_URL' && error.code !== 'ERR_BAD_OPTION';
    return new TransportError(url, `Request to ${url} failed: ${error.code ?? error.message}`, {
      retryable,
      cause: error
    });
  }
  return new TransportError(url, `Request to ${url} failed: ${describeError(error)}`, {
    retryable: false,
    cause: error
  });
}

export interface StorefrontFetcherOptions {
  userAgent: string;
  acceptLanguage: string;
  requestDelayMs: number;
  requestTimeoutMs: number;
  maxRetries: number;
  retryBaseDelayMs: number;
  http?: AxiosInstance;
  sleep?: Sleep;
  logger?: Logger;
}

/**
 * Rate-limited HTML fetcher for storefront pages. Every attempt, retries
 * included, waits for its turn on the throttle.
 */
export class StorefrontFetcher implements HtmlFetcher {
  private readonly http: AxiosInstance;
  private readonly throttle: () => Promise<void>;
  private readonly sleep: Sleep;
  private readonly logger: Logger;
  private attempts = 0;

  constructor(private readonly options: StorefrontFetcherOptions) {
    this.http = options.http ?? axios.create();
    this.sleep = options.sleep ?? sleep;
    this.throttle = createThrottle(options.requestDelayMs);
    this.logger = options.logger ?? silentLogger;
  }

  /** Number of HTTP requests issued so far. */
  get requestCount(): number {
    return this.attempts;
  }

  async fetchHtml(url: string): Promise<string> {
    const target = assertHttpUrl(url);
    let attempt = 0;
    while (true) {
      await this.throttle();
      try {
        return await this.request(target);
      } catch (error) {
        const failure = toTransportError(target, error);
        if (!failure.retryable || attempt >= this.options.maxRetries) {
          throw failure;
        }
        const backoffMs = this.options.retryBaseDelayMs * 2 ** attempt;
        attempt += 1;
        this.logger.warn(`${failure.message}; retry ${attempt}/${this.options.maxRetries} in ${backoffMs}ms`);
        if (backoffMs > 0) {
          await this.sleep(backoffMs);
        }
      }
    }
  }

  private async request(url: string): Promise<string> {
    this.attempts += 1;
    this.logger.debug(`GET ${url}`);
    const response = await this.http.get<unknown>(url, {
      headers: browserHeaders(this.options.userAgent, this.options.acceptLanguage),
      timeout: this.options.requestTimeoutMs,
      responseType: 'text',
      maxRedirects: 5,
      validateStatus: () => true
    });

    if (response.status >= 400) {
      throw new TransportError(url, `HTTP ${response.status} for ${url}`, {
        status: response.status,
        retryable: isRetryableStatus(response.status)
      });
    }
    if (typeof response.data === 'string') {
      return response.data;
    }
    return response.data == null ? '' : String(response.data);
  }
}
