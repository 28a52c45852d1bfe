/**
 * ol-dump-mirror - Main Library Entry Point
 *
 * Mirrors the Open Library bulk exports into a Parquet dataset. This
 * module re-exports the pipeline and its building blocks.
 */

// ============================================================================
// INGEST - Change detection, download, parsing, pipeline
// ============================================================================
export * from './ingest/index.js';

// ============================================================================
// STORAGE - Manifest, schema mapping, Parquet segments
// ============================================================================
export * from './storage/index.js';

// ============================================================================
// EXPORT - Dataset stores and publisher
// ============================================================================
export * from './export/index.js';

// ============================================================================
// LIB - Errors, retry, configuration, logging
// ============================================================================
export {
  TransientError,
  IntegrityError,
  RemoteError,
  MalformedRecordError,
  SerializationError,
  PublishError,
  ConfigError,
  isTypedError,
  isRetryable,
  isAbortError,
  errorMessage,
} from './lib/errors.js';
export type { ErrorKind, TypedError } from './lib/errors.js';

export { createRetryPolicy, backoffDelay, withRetry, throwIfAborted } from './lib/retry.js';
export type { RetryPolicy, RetryEvent, RetryOptions } from './lib/retry.js';

export {
  MirrorConfigSchema,
  validateMirrorConfig,
  safeValidateMirrorConfig,
  formatValidationError,
} from './lib/config-schema.js';
export type { MirrorConfig } from './lib/config-schema.js';

export { Logger, createLogger, withRunContext, currentRunId, generateRunId } from './lib/logger.js';
export type { LogLevel, LogFormat, LogEntry, LoggerOptions, SourceScope } from './lib/logger.js';

export * from './lib/constants.js';
