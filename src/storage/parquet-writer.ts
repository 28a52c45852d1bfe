/**
 * Segment Writer
 *
 * Buffers MappedRecords for one category and writes them out as a
 * sequence of self-contained Parquet files:
 * - A batch is flushed when it reaches the row or estimated-byte threshold
 * - Each flush writes `<category>-NNNNN.parquet` under a temporary name and
 *   renames it into place
 * - Key/value metadata records the category, segment index and source signature
 *
 * List columns are stored as JSON-encoded strings.
 */

import { parquetWriteBuffer } from 'hyparquet-writer';
import { mkdir, rename, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { Category } from '../ingest/types.js';
import { columnsFor, type ColumnDef, type MappedRecord } from './schema.js';
import { SerializationError, errorMessage } from '../lib/errors.js';
import { DEFAULT_BATCH_BYTES, DEFAULT_BATCH_ROWS } from '../lib/constants.js';
import { createLogger, type Logger } from '../lib/logger.js';

const getLog = () => createLogger('storage:parquet-writer');

type WriteOptions = Parameters<typeof parquetWriteBuffer>[0];
type ColumnData = WriteOptions['columnData'];

/** Fixed per-row overhead added to the byte estimate */
const ROW_OVERHEAD_BYTES = 16;

/** Writer identification stored in segment metadata */
const WRITER_NAME = 'ol-mirror';

/** One written Parquet segment */
export interface SegmentInfo {
  /** Sequence number, starting at 0 */
  index: number;
  /** Absolute path of the file */
  path: string;
  /** File name (`<category>-NNNNN.parquet`) */
  fileName: string;
  rowCount: number;
  /** File size in bytes */
  size: number;
}

export interface SegmentWriterOptions {
  category: Category;
  /** Directory segments are written to */
  outputDir: string;
  /** Signature of the dump the rows come from */
  signature: string;
  /** Flush after this many rows */
  maxRows?: number | undefined;
  /** Flush after this many estimated bytes */
  maxBytes?: number | undefined;
  /** Optional logger for dependency injection (testing) */
  logger?: Logger | undefined;
}

export interface SegmentWriterStats {
  totalRows: number;
  totalSegments: number;
  totalBytes: number;
}

/**
 * File name of a segment
 *
 * @example
 * ```typescript
 * segmentFileName('works', 3); // 'works-00003.parquet'
 * ```
 */
export function segmentFileName(category: Category, index: number): string {
  return `${category}-${String(index).padStart(5, '0')}.parquet`;
}

export class SegmentWriter {
  private readonly category: Category;
  private readonly outputDir: string;
  private readonly signature: string;
  private readonly maxRows: number;
  private readonly maxBytes: number;
  private readonly log: Logger;

  private batch: MappedRecord[] = [];
  private batchBytes = 0;
  private readonly segments: SegmentInfo[] = [];
  private totalRows = 0;
  private finalized = false;

  constructor(options: SegmentWriterOptions) {
    this.category = options.category;
    this.outputDir = options.outputDir;
    this.signature = options.signature;
    this.maxRows = options.maxRows ?? DEFAULT_BATCH_ROWS;
    this.maxBytes = options.maxBytes ?? DEFAULT_BATCH_BYTES;
    this.log = options.logger ?? getLog();

    if (this.maxRows < 1 || this.maxBytes < 1) {
      throw new RangeError('Batch thresholds must be positive');
    }
  }

  /** Rows buffered and not yet written */
  get pendingRows(): number {
    return this.batch.length;
  }

  /**
   * Add a record; writes a segment when the batch is full.
   * Returns the segment written, if any.
   */
  async write(record: MappedRecord): Promise<SegmentInfo | null> {
    if (this.finalized) {
      throw new SerializationError(`Writer for ${this.category} is already finalized`);
    }

    this.batch.push(record);
    this.batchBytes += estimateRecordSize(record);

    if (this.batch.length >= this.maxRows || this.batchBytes >= this.maxBytes) {
      return this.flush();
    }
    return null;
  }

  /**
   * Write the buffered rows as one segment
   */
  async flush(): Promise<SegmentInfo | null> {
    if (this.batch.length === 0) {
      return null;
    }

    const rows = this.batch;
    this.batch = [];
    this.batchBytes = 0;

    const index = this.segments.length;
    const segment = await this.writeSegment(index, rows);

    this.segments.push(segment);
    this.totalRows += segment.rowCount;

    this.log.debug('Segment written', {
      category: this.category,
      segment: segment.fileName,
      rows: segment.rowCount,
      bytes: segment.size,
    });

    return segment;
  }

  /**
   * Flush the remainder and return all segments in order
   */
  async finalize(): Promise<SegmentInfo[]> {
    await this.flush();
    this.finalized = true;
    return [...this.segments];
  }

  getStats(): SegmentWriterStats {
    return {
      totalRows: this.totalRows,
      totalSegments: this.segments.length,
      totalBytes: this.segments.reduce((sum, segment) => sum + segment.size, 0),
    };
  }

  private async writeSegment(index: number, rows: MappedRecord[]): Promise<SegmentInfo> {
    const fileName = segmentFileName(this.category, index);
    const path = join(this.outputDir, fileName);
    const tmpPath = join(this.outputDir, `.${fileName}.tmp`);

    let buffer: ArrayBuffer;
    try {
      buffer = encodeSegment(this.category, rows, [
        { key: 'writer', value: WRITER_NAME },
        { key: 'category', value: this.category },
        { key: 'segment', value: String(index) },
        { key: 'signature', value: this.signature },
      ]);
    } catch (error) {
      throw new SerializationError(
        `Failed to encode ${fileName}: ${errorMessage(error)}`,
        error
      );
    }

    try {
      await mkdir(this.outputDir, { recursive: true });
      await writeFile(tmpPath, new Uint8Array(buffer));
      await rename(tmpPath, path);
    } catch (error) {
      await rm(tmpPath, { force: true });
      throw new SerializationError(`Failed to write ${fileName}: ${errorMessage(error)}`, error);
    }

    return {
      index,
      path,
      fileName,
      rowCount: rows.length,
      size: buffer.byteLength,
    };
  }
}

/**
 * Encode rows of a category into a Parquet file buffer
 */
export function encodeSegment(
  category: Category,
  rows: readonly MappedRecord[],
  kvMetadata: { key: string; value: string }[] = []
): ArrayBuffer {
  const columnData: ColumnData = columnsFor(category).map((column) => buildColumn(column, rows));

  return parquetWriteBuffer({
    columnData,
    statistics: true,
    rowGroupSize: Math.max(rows.length, 1),
    kvMetadata,
  });
}

function buildColumn(column: ColumnDef, rows: readonly MappedRecord[]): ColumnData[number] {
  const name = column.name;

  switch (column.kind) {
    case 'string':
      return {
        name,
        type: 'STRING',
        data: rows.map((row) => {
          const value = row[name];
          return typeof value === 'string' ? value : null;
        }),
      };
    case 'int':
      return {
        name,
        type: 'INT32',
        data: rows.map((row) => {
          const value = row[name];
          return typeof value === 'number' ? value : null;
        }),
      };
    case 'timestamp':
      return {
        name,
        type: 'TIMESTAMP',
        data: rows.map((row) => {
          const value = row[name];
          return value instanceof Date ? value : null;
        }),
      };
    case 'string_list':
      return {
        name,
        type: 'STRING',
        data: rows.map((row) => {
          const value = row[name];
          return Array.isArray(value) ? JSON.stringify(value) : null;
        }),
      };
  }
}

/**
 * Rough in-memory size of a row, used for the byte threshold
 */
export function estimateRecordSize(record: MappedRecord): number {
  let size = ROW_OVERHEAD_BYTES;

  for (const value of Object.values(record)) {
    if (typeof value === 'string') {
      size += value.length;
    } else if (Array.isArray(value)) {
      for (const item of value) {
        size += item.length + 4;
      }
    } else if (value instanceof Date) {
      size += 8;
    } else if (typeof value === 'number') {
      size += 4;
    } else {
      size += 1;
    }
  }

  return size;
}
