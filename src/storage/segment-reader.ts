/**
 * Read Parquet segments back into MappedRecords
 */

import { parquetMetadata, parquetReadObjects } from 'hyparquet';
import { readFile } from 'node:fs/promises';
import type { Category } from '../ingest/types.js';
import { columnsFor, type ColumnDef, type ColumnValue, type MappedRecord } from './schema.js';
import { SerializationError, errorMessage } from '../lib/errors.js';

/**
 * Read every row of a segment.
 *
 * @param input - Path of a segment file, or its contents
 * @throws {SerializationError} If the file is not a segment of the category
 */
export async function readSegment(input: string | ArrayBuffer, category: Category): Promise<MappedRecord[]> {
  const file = typeof input === 'string' ? await loadFile(input) : input;
  const columns = columnsFor(category);

  let rows: Record<string, unknown>[];
  try {
    rows = await parquetReadObjects({ file, columns: columns.map((column) => column.name) });
  } catch (error) {
    throw new SerializationError(`Failed to read segment: ${errorMessage(error)}`, error);
  }

  return rows.map((row) => {
    const key = row['key'];
    if (typeof key !== 'string') {
      throw new SerializationError('Segment row without a key');
    }

    const record: MappedRecord = { key };
    for (const column of columns) {
      record[column.name] = column.name === 'key' ? key : decodeValue(column, row[column.name]);
    }
    return record;
  });
}

/**
 * Key/value metadata of a segment
 */
export async function readSegmentMetadata(input: string | ArrayBuffer): Promise<Record<string, string>> {
  const file = typeof input === 'string' ? await loadFile(input) : input;
  const metadata = parquetMetadata(file);

  const result: Record<string, string> = {};
  for (const entry of metadata.key_value_metadata ?? []) {
    if (entry.value !== undefined) {
      result[entry.key] = entry.value;
    }
  }
  return result;
}

function decodeValue(column: ColumnDef, value: unknown): ColumnValue {
  if (value === null || value === undefined) {
    return null;
  }

  switch (column.kind) {
    case 'string':
      return typeof value === 'string' ? value : null;
    case 'int':
      if (typeof value === 'bigint') return Number(value);
      return typeof value === 'number' ? value : null;
    case 'timestamp':
      if (value instanceof Date) return value;
      if (typeof value === 'bigint' || typeof value === 'number') return new Date(Number(value));
      return null;
    case 'string_list':
      return typeof value === 'string' ? decodeList(value) : null;
  }
}

function decodeList(text: string): string[] | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new SerializationError(`List column is not JSON: ${errorMessage(error)}`, error);
  }

  if (!Array.isArray(parsed)) {
    return null;
  }
  return parsed.filter((item): item is string => typeof item === 'string');
}

async function loadFile(path: string): Promise<ArrayBuffer> {
  const contents = await readFile(path);
  const buffer = new ArrayBuffer(contents.byteLength);
  new Uint8Array(buffer).set(contents);
  return buffer;
}
