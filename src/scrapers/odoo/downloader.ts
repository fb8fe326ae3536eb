import fs from 'fs/promises';
import path from 'path';
import crypto from 'crypto';
import axios, { type AxiosInstance, type AxiosResponse } from 'axios';
import { DownloadError, describeError } from '../../errors.js';
import { silentLogger, type Logger } from '../../logger.js';

const CONTENT_TYPE_EXT: Record<string, string> = {
  'image/jpeg': '.jpg',
  'image/jpg': '.jpg',
  'image/png': '.png',
  'image/webp': '.webp',
  'image/gif': '.gif'
};

const KNOWN_EXTENSIONS = ['.jpg', '.jpeg', '.png', '.webp', '.gif'];

export interface ImageRequest {
  productId: string;
  imageUrl: string;
}

export interface ImageAsset {
  productId: string;
  fileName: string;
  filePath: string;
  /** URL path the web server serves the file under. */
  publicPath: string;
  /** False when the file was already on disk and no request was made. */
  downloaded: boolean;
}

export type ImageResult =
  | { productId: string; ok: true; asset: ImageAsset }
  | { productId: string; ok: false; error: DownloadError };

export interface ImageStore {
  /** Resolves one result per request, in request order. Never rejects for a single failed image. */
  ensureImages(requests: ImageRequest[], concurrency: number): Promise<ImageResult[]>;
}

function getExtensionFromUrl(url: string): string | null {
  try {
    const ext = path.extname(new URL(url).pathname).toLowerCase();
    return KNOWN_EXTENSIONS.includes(ext) ? ext : null;
  } catch {
    return null;
  }
}

function getExtension(contentType: string): string {
  return CONTENT_TYPE_EXT[contentType] ?? '.jpg';
}

/**
 * File name stem for a product image: the product id made filesystem safe plus
 * a hash of the source URL, so a changed image URL gets a new file.
 */
export function imageFileStem(productId: string, url: string): string {
  const safeId = productId.replace(/[^a-z0-9_-]+/gi, '_');
  const hash = crypto.createHash('sha1').update(url).digest('hex').slice(0, 10);
  return `${safeId}-${hash}`;
}

function toBuffer(data: unknown): Buffer | null {
  if (Buffer.isBuffer(data)) {
    return data;
  }
  if (data instanceof ArrayBuffer) {
    return Buffer.from(data);
  }
  if (data instanceof Uint8Array) {
    return Buffer.from(data);
  }
  return null;
}

function headerValue(value: unknown): string {
  return typeof value === 'string' ? value.split(';')[0].trim().toLowerCase() : '';
}

export interface ImageDownloaderOptions {
  imageDir: string;
  publicPath: string;
  userAgent: string;
  timeoutMs: number;
  http?: AxiosInstance;
  logger?: Logger;
}

/**
 * Content-addressed image cache. An image already on disk is never fetched
 * again; new files are written to a temp name and renamed into place.
 */
export class ImageDownloader implements ImageStore {
  private readonly http: AxiosInstance;
  private readonly logger: Logger;
  private requests = 0;

  constructor(private readonly options: ImageDownloaderOptions) {
    this.http = options.http ?? axios.create();
    this.logger = options.logger ?? silentLogger;
  }

  /** Number of HTTP requests issued so far. */
  get requestCount(): number {
    return this.requests;
  }

  async ensureImages(requests: ImageRequest[], concurrency: number): Promise<ImageResult[]> {
    const results: ImageResult[] = [];
    let index = 0;

    const workers = Array.from({ length: Math.max(1, Math.min(concurrency, requests.length)) }, async () => {
      while (index < requests.length) {
        const position = index;
        const current = requests[position];
        index += 1;
        results[position] = await this.settle(current);
      }
    });

    await Promise.all(workers);
    return results;
  }

  async ensureImage(request: ImageRequest): Promise<ImageAsset> {
    const stem = imageFileStem(request.productId, request.imageUrl);
    const existing = await this.findExisting(stem, request.imageUrl);
    if (existing) {
      return this.asset(request.productId, existing, false);
    }

    this.requests += 1;
    let response: AxiosResponse<unknown>;
    try {
      response = await this.http.get<unknown>(request.imageUrl, {
        responseType: 'arraybuffer',
        timeout: this.options.timeoutMs,
        headers: { 'User-Agent': this.options.userAgent, Accept: 'image/*' },
        validateStatus: () => true
      });
    } catch (error) {
      throw new DownloadError(request.productId, request.imageUrl, `request failed: ${describeError(error)}`, error);
    }

    if (response.status < 200 || response.status >= 300) {
      throw new DownloadError(request.productId, request.imageUrl, `HTTP ${response.status}`);
    }
    const contentType = headerValue(response.headers['content-type']);
    if (!contentType.startsWith('image/')) {
      throw new DownloadError(request.productId, request.imageUrl, `unexpected content type "${contentType || 'none'}"`);
    }
    const body = toBuffer(response.data);
    if (!body || body.byteLength === 0) {
      throw new DownloadError(request.productId, request.imageUrl, 'empty response body');
    }

    const fileName = `${stem}${getExtensionFromUrl(request.imageUrl) ?? getExtension(contentType)}`;
    const filePath = path.join(this.options.imageDir, fileName);
    const tempPath = `${filePath}.${process.pid}.tmp`;
    try {
      await fs.mkdir(this.options.imageDir, { recursive: true });
      await fs.writeFile(tempPath, body);
      await fs.rename(tempPath, filePath);
    } catch (error) {
      await fs.rm(tempPath, { force: true }).catch(cleanupError => {
        this.logger.warn(`Could not remove ${tempPath}: ${describeError(cleanupError)}`);
      });
      throw new DownloadError(request.productId, request.imageUrl, `could not write ${fileName}: ${describeError(error)}`, error);
    }

    this.logger.debug(`Saved ${fileName} (${body.byteLength} bytes)`);
    return this.asset(request.productId, fileName, true);
  }

  private async settle(request: ImageRequest): Promise<ImageResult> {
    try {
      return { productId: request.productId, ok: true, asset: await this.ensureImage(request) };
    } catch (error) {
      const failure =
        error instanceof DownloadError
          ? error
          : new DownloadError(request.productId, request.imageUrl, describeError(error), error);
      this.logger.warn(failure.toWarning().message);
      return { productId: request.productId, ok: false, error: failure };
    }
  }

  private async findExisting(stem: string, url: string): Promise<string | null> {
    const fromUrl = getExtensionFromUrl(url);
    const candidates = fromUrl ? [fromUrl, ...KNOWN_EXTENSIONS.filter(ext => ext !== fromUrl)] : KNOWN_EXTENSIONS;
    for (const ext of candidates) {
      const fileName = `${stem}${ext}`;
      try {
        await fs.access(path.join(this.options.imageDir, fileName));
        return fileName;
      } catch {
        // not cached under this extension
      }
    }
    return null;
  }

  private asset(productId: string, fileName: string, downloaded: boolean): ImageAsset {
    return {
      productId,
      fileName,
      filePath: path.join(this.options.imageDir, fileName),
      publicPath: `${this.options.publicPath.replace(/\/+$/, '')}/${fileName}`,
      downloaded
    };
  }
}
