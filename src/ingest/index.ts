/**
 * Open Library ingestion
 *
 * Change detection, resumable downloads, streaming dump parsing and the
 * pipeline that ties them to the storage and export layers.
 *
 * @example
 * ```typescript
 * import { openDump } from './ingest/index.js';
 *
 * const dump = openDump('ol_dump_works_latest.txt.gz');
 * for await (const record of dump) {
 *   console.log(record.key);
 * }
 * ```
 */

// Type exports
export type {
  Category,
  DumpSource,
  SourceDescriptor,
  FetchedArtifact,
  RawRecord,
  CompressionType,
  DownloadProgress,
  ParseStats,
  SourceState,
  FailedStage,
} from './types.js';

export { CATEGORIES } from './types.js';

// Sources
export { createDumpSources, dumpFileName, findSource, recordTypeFor } from './sources.js';

// Download
export { describeRemote, downloadToFile } from './download.js';
export type { RemoteOptions, DownloadOptions } from './download.js';

// Fetcher
export {
  RemoteFetcher,
  DESCRIPTOR_SUFFIX,
  writeDescriptor,
  loadFetchedArtifact,
  discardArtifact,
} from './fetcher.js';
export type { RemoteFetcherOptions, FetchOptions } from './fetcher.js';

// Decompression
export {
  createDecompressor,
  detectFormat,
  detectFileCompression,
} from './decompress.js';

// Parsing
export { openDump, parseDumpLine, createLineSplitter } from './parse-dump.js';
export type { DumpRecordProducer, DumpParserOptions } from './parse-dump.js';

// Pipeline
export {
  createPipelineContext,
  ensureLocalArtifact,
  processArtifact,
  syncSources,
  runSync,
  withWorkDir,
  failedStage,
} from './pipeline.js';
export type {
  PipelineContext,
  PipelineContextOptions,
  StateChange,
  EnsureResult,
  ProcessCounters,
  ProcessResult,
  SourceReport,
  SyncReport,
  RunSyncOptions,
} from './pipeline.js';
