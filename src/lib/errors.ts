/**
 * Typed error hierarchy for the mirror pipeline
 *
 * Every error raised by a pipeline stage carries a `kind` discriminator so
 * the retry policy and the run report can tell transient failures from
 * fatal ones without string matching.
 *
 * Usage:
 * ```ts
 * import { IntegrityError, isRetryable } from './lib/errors.js';
 *
 * throw new IntegrityError('size mismatch', { expected: 10, actual: 9 });
 *
 * if (isRetryable(error)) { ... }
 * ```
 */

/** Error kinds for type discrimination */
export type ErrorKind =
  | 'TRANSIENT'
  | 'INTEGRITY'
  | 'REMOTE'
  | 'MALFORMED_RECORD'
  | 'SERIALIZATION'
  | 'PUBLISH'
  | 'CONFIG';

/** Base interface for typed errors */
export interface TypedError extends Error {
  readonly kind: ErrorKind;
}

/**
 * Network timeout, connection reset, 5xx or throttling response.
 */
export class TransientError extends Error implements TypedError {
  readonly kind = 'TRANSIENT' as const;
  readonly status: number | undefined;

  constructor(message: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'TransientError';
    this.status = options.status;
    Object.setPrototypeOf(this, TransientError.prototype);
  }
}

/**
 * Downloaded bytes do not match what the remote advertised.
 * The partial file is discarded; the next attempt starts from zero.
 */
export class IntegrityError extends Error implements TypedError {
  readonly kind = 'INTEGRITY' as const;
  readonly expected: string | number;
  readonly actual: string | number;

  constructor(message: string, detail: { expected: string | number; actual: string | number }) {
    super(message);
    this.name = 'IntegrityError';
    this.expected = detail.expected;
    this.actual = detail.actual;
    Object.setPrototypeOf(this, IntegrityError.prototype);
  }
}

/**
 * Non-retryable remote failure (4xx, missing signature headers).
 */
export class RemoteError extends Error implements TypedError {
  readonly kind = 'REMOTE' as const;
  readonly status: number | undefined;

  constructor(message: string, status?: number) {
    super(message);
    this.name = 'RemoteError';
    this.status = status;
    Object.setPrototypeOf(this, RemoteError.prototype);
  }
}

/**
 * A dump line that cannot be parsed or mapped.
 *
 * Never escapes the parser or mapper; used to carry the reason into the
 * skip counters and debug logs.
 */
export class MalformedRecordError extends Error implements TypedError {
  readonly kind = 'MALFORMED_RECORD' as const;
  readonly line: number;

  constructor(message: string, line: number) {
    super(message);
    this.name = 'MalformedRecordError';
    this.line = line;
    Object.setPrototypeOf(this, MalformedRecordError.prototype);
  }
}

/**
 * A batch could not be encoded or written as a Parquet segment.
 */
export class SerializationError extends Error implements TypedError {
  readonly kind = 'SERIALIZATION' as const;

  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'SerializationError';
    Object.setPrototypeOf(this, SerializationError.prototype);
  }
}

/**
 * Uploading segments to the dataset store failed after all retries.
 */
export class PublishError extends Error implements TypedError {
  readonly kind = 'PUBLISH' as const;

  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'PublishError';
    Object.setPrototypeOf(this, PublishError.prototype);
  }
}

/**
 * Invalid configuration or manifest file.
 */
export class ConfigError extends Error implements TypedError {
  readonly kind = 'CONFIG' as const;

  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}

/**
 * Type guard to check if an error is a typed pipeline error
 */
export function isTypedError(error: unknown): error is TypedError {
  return (
    error instanceof Error &&
    'kind' in error &&
    typeof error.kind === 'string'
  );
}

/**
 * Default retryable-error predicate used by retry policies.
 *
 * Typed errors decide by kind; untyped errors are retried only when they
 * look like a network failure thrown by fetch.
 */
export function isRetryable(error: unknown): boolean {
  if (isAbortError(error)) {
    return false;
  }

  if (isTypedError(error)) {
    return error.kind === 'TRANSIENT' || error.kind === 'INTEGRITY';
  }

  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    return (
      message.includes('timeout') ||
      message.includes('network') ||
      message.includes('fetch failed') ||
      message.includes('econnreset') ||
      message.includes('socket')
    );
  }

  return false;
}

/**
 * True for the AbortError raised when a run is cancelled
 */
export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}

/**
 * Render any thrown value as a message string
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
