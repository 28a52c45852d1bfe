/**
 * Type definitions for the Open Library ingestion pipeline
 */

/** Record categories published by the bulk exports */
export const CATEGORIES = ['authors', 'editions', 'works'] as const;

export type Category = (typeof CATEGORIES)[number];

/** A known dump file */
export interface DumpSource {
  /** File name, also the manifest key (e.g. "ol_dump_authors_latest.txt.gz") */
  name: string;
  /** Record category */
  category: Category;
  /** Download URL */
  url: string;
  /** Type tag carried by records of this category (e.g. "/type/author") */
  recordType: string;
}

/** Remote identity of one dump file at the time it was inspected */
export interface SourceDescriptor {
  readonly name: string;
  readonly category: Category;
  readonly url: string;
  /** Advertised size in bytes, undefined if the remote did not send one */
  readonly size: number | undefined;
  /** Change-detection marker (Last-Modified, falling back to ETag) */
  readonly signature: string;
  readonly lastModified: string | undefined;
  readonly etag: string | undefined;
}

/** A downloaded dump on local disk */
export interface FetchedArtifact {
  descriptor: SourceDescriptor;
  /** Path to the compressed dump */
  path: string;
}

/** One decoded dump line */
export interface RawRecord {
  /** Type tag, first column (e.g. "/type/author") */
  type: string;
  /** Record key, second column (e.g. "/authors/OL1A") */
  key: string;
  /** Revision number, third column */
  revision: number | null;
  /** Last-modified timestamp text, fourth column */
  lastModified: string | null;
  /** JSON payload, fifth column */
  data: Record<string, unknown>;
  /** 1-based line number in the decompressed file */
  line: number;
}

/** Compression types supported by the decompressor */
export type CompressionType = 'gzip' | 'none' | 'auto';

/** Progress information for downloads */
export interface DownloadProgress {
  /** Bytes on disk so far (including resumed bytes) */
  bytesDownloaded: number;
  /** Total bytes if known */
  totalBytes?: number | undefined;
  /** Download speed in bytes per second */
  bytesPerSecond: number;
  /** Elapsed time in milliseconds */
  elapsedMs: number;
}

/** Parser counters */
export interface ParseStats {
  /** Lines seen, blank ones included */
  lines: number;
  /** Lines yielded as RawRecords */
  records: number;
  /** Lines skipped as malformed */
  malformed: number;
  /** Compressed bytes read from disk */
  bytesRead: number;
}

/** Per-source pipeline states */
export type SourceState =
  | 'unseen'
  | 'fetching'
  | 'fetched'
  | 'parsing'
  | 'writing'
  | 'publishing'
  | 'published'
  | 'failed';

/** Stages a source can fail in */
export type FailedStage = 'describe' | 'fetch' | 'parse' | 'write' | 'publish';
