/**
 * Storage Layer - Manifest and Parquet segments
 *
 * Provides:
 * - The persisted sync manifest
 * - Per-category column sets and record mapping
 * - Bounded Parquet segment writing and read-back
 */

// Manifest
export { ManifestStore, MANIFEST_VERSION, parseManifest, writeAtomic } from './manifest.js';
export type { ManifestEntry, ManifestFile, ManifestCommit, ManifestStoreOptions } from './manifest.js';

// Schema
export {
  AUTHOR_COLUMNS,
  EDITION_COLUMNS,
  WORK_COLUMNS,
  columnsFor,
  columnNames,
} from './schema.js';
export type { ColumnKind, ColumnSource, ColumnDef, ColumnValue, MappedRecord } from './schema.js';

// Mapper
export { mapRecord, parseTimestamp, toInt32, toText, toStringList, toKeyList } from './mapper.js';
export type { MapResult } from './mapper.js';

// Writer
export {
  SegmentWriter,
  segmentFileName,
  encodeSegment,
  estimateRecordSize,
} from './parquet-writer.js';
export type { SegmentInfo, SegmentWriterOptions, SegmentWriterStats } from './parquet-writer.js';

// Reader
export { readSegment, readSegmentMetadata } from './segment-reader.js';
