/**
 * Tests for the segment writer
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { readdir, rm, stat } from 'node:fs/promises';
import { join } from 'node:path';
import {
  SegmentWriter,
  encodeSegment,
  estimateRecordSize,
  segmentFileName,
} from '../../src/storage/parquet-writer.js';
import { readSegment, readSegmentMetadata } from '../../src/storage/segment-reader.js';
import type { MappedRecord } from '../../src/storage/schema.js';
import { SerializationError } from '../../src/lib/errors.js';
import { createTempDir } from '../helpers.js';

function authorRecord(n: number, overrides: Partial<MappedRecord> = {}): MappedRecord {
  return {
    key: `/authors/OL${n}A`,
    name: `Author ${n}`,
    personal_name: null,
    alternate_names: [`A. ${n}`],
    birth_date: null,
    death_date: null,
    bio: null,
    revision: n,
    created: null,
    last_modified: new Date('2024-01-15T10:20:30.123Z'),
    ...overrides,
  };
}

describe('segmentFileName', () => {
  it('should zero-pad the index', () => {
    expect(segmentFileName('works', 3)).toBe('works-00003.parquet');
    expect(segmentFileName('authors', 12345)).toBe('authors-12345.parquet');
  });
});

describe('SegmentWriter', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await createTempDir('segments');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should split records into bounded segments', async () => {
    const writer = new SegmentWriter({ category: 'authors', outputDir: dir, signature: 'S1', maxRows: 2 });

    for (let n = 1; n <= 5; n++) {
      await writer.write(authorRecord(n));
    }
    const segments = await writer.finalize();

    expect(segments.map((segment) => segment.rowCount)).toEqual([2, 2, 1]);
    expect(segments.map((segment) => segment.fileName)).toEqual([
      'authors-00000.parquet',
      'authors-00001.parquet',
      'authors-00002.parquet',
    ]);
    expect(await readdir(dir)).toEqual(segments.map((segment) => segment.fileName));
    expect(writer.getStats()).toMatchObject({ totalRows: 5, totalSegments: 3 });
  });

  it('should report a flush from write', async () => {
    const writer = new SegmentWriter({ category: 'authors', outputDir: dir, signature: 'S1', maxRows: 2 });

    expect(await writer.write(authorRecord(1))).toBeNull();
    expect(writer.pendingRows).toBe(1);

    const segment = await writer.write(authorRecord(2));
    expect(segment?.index).toBe(0);
    expect(segment?.rowCount).toBe(2);
    expect(writer.pendingRows).toBe(0);
  });

  it('should flush on the byte threshold', async () => {
    const record = authorRecord(1);
    const writer = new SegmentWriter({
      category: 'authors',
      outputDir: dir,
      signature: 'S1',
      maxBytes: estimateRecordSize(record),
    });

    const segment = await writer.write(record);
    expect(segment?.rowCount).toBe(1);
  });

  it('should write nothing for an empty input', async () => {
    const writer = new SegmentWriter({ category: 'works', outputDir: dir, signature: 'S1' });
    expect(await writer.finalize()).toEqual([]);
    expect(await readdir(dir)).toEqual([]);
  });

  it('should record the file size', async () => {
    const writer = new SegmentWriter({ category: 'authors', outputDir: dir, signature: 'S1' });
    await writer.write(authorRecord(1));
    const [segment] = await writer.finalize();

    expect(segment).toBeDefined();
    expect(segment?.size).toBe((await stat(join(dir, 'authors-00000.parquet'))).size);
    expect(writer.getStats().totalBytes).toBe(segment?.size);
  });

  it('should round-trip rows through the reader', async () => {
    const writer = new SegmentWriter({ category: 'authors', outputDir: dir, signature: 'S1' });
    await writer.write(authorRecord(1));
    await writer.write(authorRecord(2, { alternate_names: null, bio: 'Wrote things.' }));
    const [segment] = await writer.finalize();
    if (!segment) {
      throw new Error('expected a segment');
    }

    const rows = await readSegment(segment.path, 'authors');

    expect(rows).toHaveLength(2);
    expect(rows[0]?.['key']).toBe('/authors/OL1A');
    expect(rows[0]?.['alternate_names']).toEqual(['A. 1']);
    expect(rows[0]?.['revision']).toBe(1);
    expect(rows[0]?.['personal_name']).toBeNull();
    expect(rows[1]?.['alternate_names']).toBeNull();
    expect(rows[1]?.['bio']).toBe('Wrote things.');

    const modified = rows[0]?.['last_modified'];
    expect(modified).toBeInstanceOf(Date);
    expect(modified instanceof Date && modified.toISOString()).toBe('2024-01-15T10:20:30.123Z');
  });

  it('should store segment metadata', async () => {
    const writer = new SegmentWriter({ category: 'authors', outputDir: dir, signature: 'S1', maxRows: 1 });
    await writer.write(authorRecord(1));
    const segments = await writer.write(authorRecord(2));
    if (!segments) {
      throw new Error('expected a segment');
    }

    expect(await readSegmentMetadata(segments.path)).toMatchObject({
      writer: 'ol-mirror',
      category: 'authors',
      segment: '1',
      signature: 'S1',
    });
  });

  it('should refuse writes after finalize', async () => {
    const writer = new SegmentWriter({ category: 'authors', outputDir: dir, signature: 'S1' });
    await writer.finalize();
    await expect(writer.write(authorRecord(1))).rejects.toBeInstanceOf(SerializationError);
  });

  it('should reject non-positive thresholds', () => {
    expect(() => new SegmentWriter({ category: 'authors', outputDir: dir, signature: 'S1', maxRows: 0 })).toThrow(
      RangeError
    );
  });
});

describe('encodeSegment', () => {
  it('should produce a readable buffer', async () => {
    const buffer = encodeSegment('authors', [authorRecord(7)]);
    const rows = await readSegment(buffer, 'authors');
    expect(rows.map((row) => row['name'])).toEqual(['Author 7']);
  });
});

describe('estimateRecordSize', () => {
  it('should add up the value sizes', () => {
    const record: MappedRecord = { key: 'abcd', list: ['xy', 'z'], when: new Date(0), count: 3, none: null };
    // 16 + 4 + (2 + 4) + (1 + 4) + 8 + 4 + 1
    expect(estimateRecordSize(record)).toBe(44);
  });
});
