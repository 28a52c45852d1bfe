/**
 * Streaming parser for Open Library dump files
 *
 * A dump is a gzip-compressed text file with one record per line and five
 * tab-separated columns:
 *
 *   type \t key \t revision \t last_modified \t json
 *
 * The parser reads the file in fixed-size chunks, decompresses and splits
 * it incrementally, and hands out RawRecords through a single-pass
 * producer. Malformed lines are counted and skipped.
 */

import { open, type FileHandle } from 'node:fs/promises';
import {
  ReadableStream,
  TransformStream,
  type ReadableStreamDefaultReader,
} from 'node:stream/web';
import type { CompressionType, ParseStats, RawRecord } from './types.js';
import { createDecompressor, detectFileCompression } from './decompress.js';
import { MalformedRecordError } from '../lib/errors.js';
import { throwIfAborted } from '../lib/retry.js';
import { READ_CHUNK_SIZE } from '../lib/constants.js';
import { createLogger, type Logger } from '../lib/logger.js';

const getLog = () => createLogger('ingest:parse-dump');

/** Number of columns in a dump line */
const DUMP_COLUMNS = 5;

/**
 * Finite, forward-only producer of RawRecords.
 *
 * Iterating it a second time throws; to restart, open the file again.
 */
export interface DumpRecordProducer extends AsyncIterable<RawRecord> {
  /** Counters so far */
  readonly stats: Readonly<ParseStats>;
  /** Release the file before the end of input */
  close(): Promise<void>;
}

/** Options for openDump */
export interface DumpParserOptions {
  /** Compression type (default: auto, from magic bytes) */
  compression?: CompressionType | undefined;
  /** AbortSignal for cancellation */
  signal?: AbortSignal | undefined;
  /** Size of chunks read from disk */
  chunkSize?: number | undefined;
  /** Optional logger for dependency injection (testing) */
  logger?: Logger | undefined;
}

/**
 * Open a dump file for parsing.
 *
 * @example
 * ```typescript
 * const dump = openDump('ol_dump_authors_latest.txt.gz');
 * for await (const record of dump) {
 *   console.log(record.key);
 * }
 * console.log(dump.stats.malformed);
 * ```
 */
export function openDump(path: string, options: DumpParserOptions = {}): DumpRecordProducer {
  return new DumpReader(path, options);
}

class DumpReader implements DumpRecordProducer {
  private readonly counters: ParseStats = {
    lines: 0,
    records: 0,
    malformed: 0,
    bytesRead: 0,
  };
  private readonly log: Logger;
  private started = false;
  private reader: ReadableStreamDefaultReader<string> | null = null;

  constructor(
    private readonly path: string,
    private readonly options: DumpParserOptions
  ) {
    this.log = options.logger ?? getLog();
  }

  get stats(): Readonly<ParseStats> {
    return { ...this.counters };
  }

  async close(): Promise<void> {
    const reader = this.reader;
    this.reader = null;
    if (reader) {
      await reader.cancel();
    }
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<RawRecord, void, undefined> {
    if (this.started) {
      throw new Error(`Dump ${this.path} was already consumed; open it again to restart`);
    }
    this.started = true;

    const compression = this.options.compression === undefined || this.options.compression === 'auto'
      ? await detectFileCompression(this.path)
      : this.options.compression;

    const lines = createFileStream(this.path, this.options.chunkSize ?? READ_CHUNK_SIZE, (bytes) => {
      this.counters.bytesRead += bytes;
    })
      .pipeThrough(createDecompressor(compression))
      .pipeThrough(createLineSplitter());

    const reader = lines.getReader();
    this.reader = reader;
    let exhausted = false;

    try {
      while (true) {
        throwIfAborted(this.options.signal);

        // close() may have cancelled the reader between pulls
        if (this.reader !== reader) {
          return;
        }

        const { done, value } = await reader.read();
        if (done) {
          exhausted = true;
          break;
        }

        this.counters.lines++;
        const lineNumber = this.counters.lines;

        let record: RawRecord;
        try {
          record = parseDumpLine(value, lineNumber);
        } catch (error) {
          if (!(error instanceof MalformedRecordError)) {
            throw error;
          }
          this.counters.malformed++;
          this.log.debug('Skipping malformed line', { line: lineNumber, reason: error.message });
          continue;
        }

        this.counters.records++;
        yield record;
      }
    } finally {
      if (this.reader === reader) {
        this.reader = null;
        if (exhausted) {
          reader.releaseLock();
        } else {
          await reader.cancel();
        }
      }
    }
  }
}

/**
 * Parse one dump line.
 *
 * @throws {MalformedRecordError} If the line does not have five columns,
 *   has an empty type or key, or its payload is not a JSON object
 */
export function parseDumpLine(line: string, lineNumber: number): RawRecord {
  const columns = line.split('\t');
  if (columns.length < DUMP_COLUMNS) {
    throw new MalformedRecordError(
      `Expected ${DUMP_COLUMNS} tab-separated columns, found ${columns.length}`,
      lineNumber
    );
  }

  const type = (columns[0] ?? '').trim();
  const key = (columns[1] ?? '').trim();
  if (type === '' || key === '') {
    throw new MalformedRecordError('Empty type or key column', lineNumber);
  }

  let payload: unknown;
  try {
    payload = JSON.parse(columns.slice(DUMP_COLUMNS - 1).join('\t'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new MalformedRecordError(`Invalid JSON payload: ${reason}`, lineNumber);
  }

  if (!isPlainObject(payload)) {
    throw new MalformedRecordError('JSON payload is not an object', lineNumber);
  }

  const revisionText = (columns[2] ?? '').trim();
  const revision = /^\d+$/.test(revisionText) ? parseInt(revisionText, 10) : null;
  const lastModified = (columns[3] ?? '').trim();

  return {
    type,
    key,
    revision,
    lastModified: lastModified === '' ? null : lastModified,
    data: payload,
    line: lineNumber,
  };
}

/**
 * Split a byte stream into lines (without the trailing newline).
 * A final newline does not produce an empty line.
 */
export function createLineSplitter(): TransformStream<Uint8Array, string> {
  const decoder = new TextDecoder('utf-8');
  let buffer = '';

  return new TransformStream<Uint8Array, string>({
    transform(chunk, controller) {
      buffer += decoder.decode(chunk, { stream: true });

      let start = 0;
      let newline = buffer.indexOf('\n', start);
      while (newline !== -1) {
        controller.enqueue(stripCarriageReturn(buffer.slice(start, newline)));
        start = newline + 1;
        newline = buffer.indexOf('\n', start);
      }
      buffer = buffer.slice(start);
    },

    flush(controller) {
      buffer += decoder.decode();
      if (buffer.length > 0) {
        controller.enqueue(stripCarriageReturn(buffer));
      }
      buffer = '';
    },
  });
}

/**
 * Read a local file as a byte stream in fixed-size chunks
 */
function createFileStream(
  path: string,
  chunkSize: number,
  onBytes: (bytes: number) => void
): ReadableStream<Uint8Array> {
  let handle: FileHandle | null = null;

  const closeHandle = async (): Promise<void> => {
    const current = handle;
    handle = null;
    if (current) {
      await current.close();
    }
  };

  return new ReadableStream<Uint8Array>({
    async start() {
      handle = await open(path, 'r');
    },

    async pull(controller) {
      if (!handle) {
        controller.close();
        return;
      }

      const chunk = new Uint8Array(chunkSize);
      let bytesRead: number;
      try {
        ({ bytesRead } = await handle.read(chunk, 0, chunkSize, null));
      } catch (error) {
        await closeHandle();
        throw error;
      }
      if (bytesRead === 0) {
        await closeHandle();
        controller.close();
        return;
      }

      onBytes(bytesRead);
      controller.enqueue(chunk.subarray(0, bytesRead));
    },

    async cancel() {
      await closeHandle();
    },
  });
}

function stripCarriageReturn(line: string): string {
  return line.endsWith('\r') ? line.slice(0, -1) : line;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
