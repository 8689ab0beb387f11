/**
 * Pipeline error taxonomy
 *
 * validation / read / storage errors are fatal and reach the caller of
 * ensureReady(). external_fetch errors are absorbed by the NASA fetchers.
 */

export type PipelineErrorKind = 'validation' | 'read' | 'storage' | 'external_fetch';

export interface PipelineErrorOptions {
  details?: Record<string, unknown>;
  cause?: unknown;
}

export class PipelineError extends Error {
  readonly kind: PipelineErrorKind;
  readonly details?: Record<string, unknown>;

  constructor(kind: PipelineErrorKind, message: string, options: PipelineErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.kind = kind;
    this.details = options.details;
  }
}

export class ValidationError extends PipelineError {
  constructor(message: string, options?: PipelineErrorOptions) {
    super('validation', message, options);
  }
}

/**
 * A CSV location that does not exist. Classified as a validation failure.
 */
export class NotFoundError extends ValidationError {}

export class ReadError extends PipelineError {
  constructor(message: string, options?: PipelineErrorOptions) {
    super('read', message, options);
  }
}

export class StorageError extends PipelineError {
  constructor(message: string, options?: PipelineErrorOptions) {
    super('storage', message, options);
  }
}

export class ExternalFetchError extends PipelineError {
  readonly status?: number;

  constructor(message: string, options: PipelineErrorOptions & { status?: number } = {}) {
    super('external_fetch', message, options);
    this.status = options.status;
  }
}

/**
 * Extract a printable message from an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
