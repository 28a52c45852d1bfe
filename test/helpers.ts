/**
 * Test helpers and utilities
 */

import { mkdtemp, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { gzipSync } from 'node:zlib';
import type { Category, RawRecord, SourceDescriptor } from '../src/ingest/types.js';
import { dumpFileName } from '../src/ingest/sources.js';

/**
 * Create a temporary directory for a test
 */
export function createTempDir(prefix: string): Promise<string> {
  return mkdtemp(join(tmpdir(), `ol-mirror-${prefix}-`));
}

/**
 * One dump line in the five-column layout
 */
export function dumpLine(
  type: string,
  key: string,
  data: Record<string, unknown>,
  revision = 1,
  lastModified = '2024-01-15T10:20:30.123456'
): string {
  return [type, key, String(revision), lastModified, JSON.stringify(data)].join('\t');
}

/**
 * Author dump line with a predictable key and name
 */
export function authorLine(n: number): string {
  return dumpLine('/type/author', `/authors/OL${n}A`, {
    key: `/authors/OL${n}A`,
    name: `Author ${n}`,
    type: { key: '/type/author' },
  });
}

/**
 * Write lines as a gzip-compressed dump, each followed by a newline
 */
export async function writeGzipDump(path: string, lines: readonly string[]): Promise<Buffer> {
  const contents = gzipSync(Buffer.from(lines.map((line) => `${line}\n`).join(''), 'utf-8'));
  await writeFile(path, contents);
  return contents;
}

/**
 * Descriptor of a dump as returned by describe
 */
export function createDescriptor(
  category: Category = 'authors',
  overrides: Partial<SourceDescriptor> = {}
): SourceDescriptor {
  const name = dumpFileName(category);
  return {
    name,
    category,
    url: `https://dumps.example.test/data/${name}`,
    size: undefined,
    signature: 'Mon, 01 Jan 2024 00:00:00 GMT',
    lastModified: 'Mon, 01 Jan 2024 00:00:00 GMT',
    etag: undefined,
    ...overrides,
  };
}

/**
 * RawRecord as produced by the parser
 */
export function createRawRecord(overrides: Partial<RawRecord> = {}): RawRecord {
  return {
    type: '/type/author',
    key: '/authors/OL1A',
    revision: 3,
    lastModified: '2024-01-15T10:20:30.123456',
    data: { key: '/authors/OL1A', name: 'Test Author' },
    line: 1,
    ...overrides,
  };
}

/**
 * Stream that yields the given chunks, then optionally fails
 */
export function chunkedBody(chunks: readonly Uint8Array[], failWith?: Error): ReadableStream<Uint8Array> {
  let index = 0;
  return new ReadableStream<Uint8Array>({
    pull(controller) {
      const chunk = chunks[index++];
      if (chunk) {
        controller.enqueue(chunk);
      } else if (failWith) {
        controller.error(failWith);
      } else {
        controller.close();
      }
    },
  });
}

/**
 * Minimal stand-in for a fetch Response
 */
export function fakeResponse(
  status: number,
  headers: Record<string, string> = {},
  body: ReadableStream<Uint8Array> | null = null
) {
  return {
    ok: status >= 200 && status < 300,
    status,
    statusText: status === 404 ? 'Not Found' : status >= 500 ? 'Service Unavailable' : 'OK',
    headers: new Headers(headers),
    body,
  };
}
