import type { PageKind } from './scrapers/odoo/types.js';
import type { SyncWarning } from './types.js';

export type MirrorErrorCode =
  | 'TRANSPORT'
  | 'STRUCTURAL_PARSE'
  | 'FIELD_VALIDATION'
  | 'PERSISTENCE'
  | 'DOWNLOAD'
  | 'CONFIG';

export class MirrorError extends Error {
  readonly code: MirrorErrorCode;

  constructor(code: MirrorErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Network or HTTP failure. `retryable` marks timeouts, 429 and 5xx. */
export class TransportError extends MirrorError {
  readonly url: string;
  readonly status: number | null;
  readonly retryable: boolean;

  constructor(url: string, message: string, details: { status?: number | null; retryable: boolean; cause?: unknown }) {
    super('TRANSPORT', message, { cause: details.cause });
    this.url = url;
    this.status = details.status ?? null;
    this.retryable = details.retryable;
  }
}

/** A page lacks the element the parser anchors on, so nothing on it can be trusted. */
export class StructuralParseError extends MirrorError {
  readonly url: string;
  readonly pageKind: PageKind;
  readonly anchor: string;

  constructor(url: string, pageKind: PageKind, anchor: string) {
    super('STRUCTURAL_PARSE', `No ${pageKind} anchor (${anchor}) found on ${url}`);
    this.url = url;
    this.pageKind = pageKind;
    this.anchor = anchor;
  }
}

export class FieldValidationError extends MirrorError {
  readonly field: string;
  readonly recordId: string | null;
  readonly url: string;

  constructor(field: string, message: string, recordId: string | null, url: string) {
    super('FIELD_VALIDATION', message);
    this.field = field;
    this.recordId = recordId;
    this.url = url;
  }

  toWarning(): SyncWarning {
    return {
      kind: 'field-validation',
      message: `Dropped record: ${this.message}`,
      recordId: this.recordId,
      url: this.url
    };
  }
}

export class PersistenceError extends MirrorError {
  readonly path: string;

  constructor(filePath: string, cause: unknown) {
    super('PERSISTENCE', `Failed to write catalog to ${filePath}: ${describeError(cause)}`, { cause });
    this.path = filePath;
  }
}

export class DownloadError extends MirrorError {
  readonly url: string;
  readonly productId: string;

  constructor(productId: string, url: string, message: string, cause?: unknown) {
    super('DOWNLOAD', message, { cause });
    this.url = url;
    this.productId = productId;
  }

  toWarning(): SyncWarning {
    return {
      kind: 'download',
      message: `Image for ${this.productId} not downloaded: ${this.message}`,
      recordId: this.productId,
      url: this.url
    };
  }
}

export class ConfigError extends MirrorError {
  readonly problems: string[];

  constructor(problems: string[]) {
    super('CONFIG', `Invalid configuration:\n  - ${problems.join('\n  - ')}`);
    this.problems = problems;
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message || error.name;
  }
  if (typeof error === 'string') {
    return error;
  }
  try {
    return JSON.stringify(error) ?? String(error);
  } catch {
    return String(error);
  }
}
