/**
 * Tests for the mirror pipeline
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdir, readdir, readFile, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { gzipSync } from 'node:zlib';
import {
  createPipelineContext,
  ensureLocalArtifact,
  failedStage,
  processArtifact,
  runSync,
  syncSources,
  type StateChange,
} from '../../src/ingest/pipeline.js';
import { createDumpSources } from '../../src/ingest/sources.js';
import type { DumpSource } from '../../src/ingest/types.js';
import { ManifestStore } from '../../src/storage/manifest.js';
import { readSegment } from '../../src/storage/segment-reader.js';
import { SegmentWriter } from '../../src/storage/parquet-writer.js';
import { LOCAL_REVISIONS_DIR, LocalDatasetStore, type DatasetStore } from '../../src/export/store.js';
import { createRetryPolicy } from '../../src/lib/retry.js';
import { RemoteError, SerializationError, TransientError } from '../../src/lib/errors.js';
import { authorLine, chunkedBody, createTempDir, dumpLine, fakeResponse } from '../helpers.js';

const mockFetch = vi.fn();
vi.stubGlobal('fetch', mockFetch);

const S1 = 'Mon, 01 Jan 2024 00:00:00 GMT';
const S2 = 'Thu, 01 Feb 2024 00:00:00 GMT';

interface RemoteFile {
  lastModified: string;
  body: Uint8Array;
}

/** Serve HEAD and GET requests from an in-memory map of URLs */
function serve(files: Map<string, RemoteFile>): void {
  mockFetch.mockImplementation((url: string, init?: { method?: string }) => {
    const file = files.get(url);
    if (!file) {
      return Promise.resolve(fakeResponse(404));
    }
    const headers = { 'Last-Modified': file.lastModified, 'Content-Length': String(file.body.byteLength) };
    if (init?.method === 'HEAD') {
      return Promise.resolve(fakeResponse(200, headers));
    }
    return Promise.resolve(fakeResponse(200, headers, chunkedBody([file.body])));
  });
}

function gzipLines(lines: readonly string[]): Uint8Array {
  return new Uint8Array(gzipSync(Buffer.from(lines.map((line) => `${line}\n`).join(''), 'utf-8')));
}

function getRequests(): number {
  return mockFetch.mock.calls.filter((call: unknown[]) => {
    const init = call[1];
    return !(typeof init === 'object' && init !== null && 'method' in init && init.method === 'HEAD');
  }).length;
}

/** Ten lines: seven authors, two malformed lines and one redirect */
const FIRST_DUMP = Array.from({ length: 10 }, (_, i) => authorLine(i + 1));
FIRST_DUMP[2] = 'broken';
FIRST_DUMP[5] = '';
FIRST_DUMP[8] = dumpLine('/type/redirect', '/authors/OL9A', { location: '/authors/OL1A' });

const SOURCES = createDumpSources('https://dumps.example.test/data');

function source(name: string): DumpSource {
  const found = SOURCES.find((candidate) => candidate.name === name);
  if (!found) {
    throw new Error(`no source ${name}`);
  }
  return found;
}

const AUTHORS = source('ol_dump_authors_latest.txt.gz');
const WORKS = source('ol_dump_works_latest.txt.gz');

describe('pipeline', () => {
  let dir: string;
  let dataDir: string;
  let manifest: ManifestStore;
  let store: LocalDatasetStore;
  let remote: Map<string, RemoteFile>;

  const retry = createRetryPolicy({ maxAttempts: 1 });
  const sleep = () => Promise.resolve();

  const run = (
    sources: readonly DumpSource[],
    extra: {
      keep?: boolean;
      dryRun?: boolean;
      store?: DatasetStore;
      backupRaw?: boolean;
      signal?: AbortSignal;
      onStateChange?: (change: StateChange) => void;
    } = {}
  ) =>
    runSync({
      dataDir,
      sources,
      manifest,
      store: extra.store ?? store,
      datasetId: 'someone/ol_dump',
      batchRows: 3,
      retry,
      sleep,
      keep: extra.keep,
      dryRun: extra.dryRun,
      backupRaw: extra.backupRaw,
      signal: extra.signal,
      onStateChange: extra.onStateChange,
    });

  beforeEach(async () => {
    mockFetch.mockReset();
    dir = await createTempDir('pipeline');
    dataDir = join(dir, 'data');
    manifest = await ManifestStore.load(join(dir, 'manifest.json'));
    store = new LocalDatasetStore(join(dir, 'dataset'));
    remote = new Map([[AUTHORS.url, { lastModified: S1, body: gzipLines(FIRST_DUMP) }]]);
    serve(remote);
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should publish a new source and commit the manifest', async () => {
    const report = await run([AUTHORS]);

    expect(report.failed).toBe(0);
    expect(report.aborted).toBe(false);
    expect(report.sources).toEqual([
      {
        source: 'ol_dump_authors_latest.txt.gz',
        status: 'published',
        signature: S1,
        artifact: `someone/ol_dump/data/authors@${S1}`,
        rows: 7,
        skipped: 3,
        segments: 3,
      },
    ]);

    const entry = manifest.lookup('ol_dump_authors_latest.txt.gz');
    expect(entry).toMatchObject({ signature: S1, rows: 7, skipped: 3, segments: 3 });

    const published = join(dir, 'dataset', 'data', 'authors');
    expect((await readdir(published)).sort()).toEqual([
      'authors-00000.parquet',
      'authors-00001.parquet',
      'authors-00002.parquet',
    ]);
    const rows = await readSegment(join(published, 'authors-00000.parquet'), 'authors');
    expect(rows.map((row) => row.key)).toEqual(['/authors/OL1A', '/authors/OL2A', '/authors/OL4A']);

    // The manifest is mirrored beside the data
    expect(await readdir(join(dir, 'dataset', 'metadata'))).toEqual(['ol_sync_manifest.json']);
    // The run's work directory is gone
    expect(await readdir(dataDir)).toEqual([]);
  });

  it('should not download or upload an unchanged source', async () => {
    await run([AUTHORS]);
    mockFetch.mockClear();
    const uploadFolder = vi.spyOn(store, 'uploadFolder');

    const report = await run([AUTHORS]);

    expect(report.sources).toEqual([
      { source: 'ol_dump_authors_latest.txt.gz', status: 'unchanged', signature: S1 },
    ]);
    expect(mockFetch).toHaveBeenCalledTimes(1);
    expect(getRequests()).toBe(0);
    expect(uploadFolder).not.toHaveBeenCalled();
  });

  it('should replace the published segments when the source changes', async () => {
    await run([AUTHORS]);
    remote.set(AUTHORS.url, { lastModified: S2, body: gzipLines([authorLine(20), authorLine(21)]) });

    const report = await run([AUTHORS]);

    expect(report.sources[0]).toMatchObject({ status: 'published', signature: S2, rows: 2, segments: 1 });
    expect(manifest.lookup('ol_dump_authors_latest.txt.gz')?.signature).toBe(S2);

    const published = join(dir, 'dataset', 'data', 'authors');
    expect(await readdir(published)).toEqual(['authors-00000.parquet']);
    const rows = await readSegment(join(published, 'authors-00000.parquet'), 'authors');
    expect(rows.map((row) => row.key)).toEqual(['/authors/OL20A', '/authors/OL21A']);
  });

  it('should report a failed upload and keep the previous manifest entry', async () => {
    const failing: DatasetStore = {
      description: 'failing',
      uploadFolder: () => Promise.reject(new Error('permission denied')),
      uploadFile: () => Promise.resolve(),
      downloadFile: () => Promise.reject(new RemoteError('not found', 404)),
    };

    const report = await run([AUTHORS], { store: failing });

    expect(report.failed).toBe(1);
    expect(report.sources).toEqual([
      {
        source: 'ol_dump_authors_latest.txt.gz',
        status: 'failed',
        stage: 'publish',
        error: 'Upload of ol_dump_authors_latest.txt.gz failed: permission denied',
        skipped: 3,
      },
    ]);
    expect(manifest.lookup('ol_dump_authors_latest.txt.gz')).toBeUndefined();
    expect(await readdir(dataDir)).toEqual([]);
  });

  it('should isolate a failing source from the others', async () => {
    const report = await run([WORKS, AUTHORS]);

    expect(report.failed).toBe(1);
    expect(report.sources.map((entry) => [entry.source, entry.status])).toEqual([
      ['ol_dump_works_latest.txt.gz', 'failed'],
      ['ol_dump_authors_latest.txt.gz', 'published'],
    ]);
    expect(report.sources[0]).toMatchObject({ stage: 'describe', skipped: 0 });
    expect(manifest.names()).toEqual(['ol_dump_authors_latest.txt.gz']);
  });

  it('should attribute download failures to the fetch stage', async () => {
    mockFetch.mockImplementation((_url: string, init?: { method?: string }) =>
      Promise.resolve(
        init?.method === 'HEAD'
          ? fakeResponse(200, { 'Last-Modified': S1 })
          : fakeResponse(503)
      )
    );

    const report = await run([AUTHORS]);

    expect(report.sources[0]).toMatchObject({ status: 'failed', stage: 'fetch' });
  });

  it('should back up a fetched dump to the raw revision', async () => {
    await run([AUTHORS]);

    const backupDir = join(dir, 'dataset', LOCAL_REVISIONS_DIR, 'backup', 'raw');
    expect((await readdir(backupDir)).sort()).toEqual([
      'ol_dump_authors_latest.txt.gz',
      'ol_dump_authors_latest.txt.gz.source.json',
    ]);
    const sidecar: unknown = JSON.parse(await readFile(join(backupDir, 'ol_dump_authors_latest.txt.gz.source.json'), 'utf-8'));
    expect(sidecar).toMatchObject({ name: 'ol_dump_authors_latest.txt.gz', signature: S1 });
  });

  it('should not back up when disabled', async () => {
    await run([AUTHORS], { backupRaw: false });

    expect(await readdir(join(dir, 'dataset'))).not.toContain(LOCAL_REVISIONS_DIR);
  });

  it('should convert the backup when the origin fails to serve the dump', async () => {
    // Back up the dump, then forget it was published
    await run([AUTHORS]);
    manifest = await ManifestStore.load(join(dir, 'manifest-2.json'));
    mockFetch.mockImplementation((_url: string, init?: { method?: string }) =>
      Promise.resolve(
        init?.method === 'HEAD'
          ? fakeResponse(200, { 'Last-Modified': S1, 'Content-Length': String(gzipLines(FIRST_DUMP).byteLength) })
          : fakeResponse(503)
      )
    );

    const report = await run([AUTHORS]);

    expect(report.sources).toEqual([
      {
        source: 'ol_dump_authors_latest.txt.gz',
        status: 'published',
        signature: S1,
        artifact: `someone/ol_dump/data/authors@${S1}`,
        rows: 7,
        skipped: 3,
        segments: 3,
      },
    ]);
    expect(getRequests()).toBe(1);
    expect(manifest.lookup('ol_dump_authors_latest.txt.gz')?.signature).toBe(S1);
  });

  it('should not use a backup of an older dump', async () => {
    await run([AUTHORS]);
    mockFetch.mockImplementation((_url: string, init?: { method?: string }) =>
      Promise.resolve(init?.method === 'HEAD' ? fakeResponse(200, { 'Last-Modified': S2 }) : fakeResponse(503))
    );

    const report = await run([AUTHORS]);

    expect(report.sources[0]).toMatchObject({
      status: 'failed',
      stage: 'fetch',
      error: `Server error: 503 Service Unavailable (${AUTHORS.url})`,
    });
    expect(manifest.lookup('ol_dump_authors_latest.txt.gz')?.signature).toBe(S1);
  });

  it('should stop a source cancelled while parsing', async () => {
    const controller = new AbortController();
    const changes: string[] = [];

    const report = await run([AUTHORS], {
      signal: controller.signal,
      onStateChange: (change) => {
        changes.push(change.to);
        if (change.to === 'parsing') {
          controller.abort();
        }
      },
    });

    expect(report.aborted).toBe(true);
    expect(report.failed).toBe(1);
    expect(report.sources[0]).toMatchObject({ status: 'failed', stage: 'parse', skipped: 0 });
    expect(changes).toEqual(['fetching', 'fetched', 'parsing', 'failed']);
    expect(manifest.names()).toEqual([]);
    expect(await readdir(join(dir, 'dataset'))).not.toContain('data');
    expect(await readdir(dataDir)).toEqual([]);
  });

  it('should attribute a segment that cannot be written to the write stage', async () => {
    const flush = SegmentWriter.prototype.flush;
    let flushes = 0;
    // After the first segment, occupy the second segment's path with a directory
    const spy = vi.spyOn(SegmentWriter.prototype, 'flush').mockImplementation(async function (this: SegmentWriter) {
      const segment = await flush.call(this);
      if (segment && flushes++ === 0) {
        await mkdir(join(segment.path, '..', 'authors-00001.parquet'));
      }
      return segment;
    });

    try {
      const report = await run([AUTHORS]);

      expect(report.failed).toBe(1);
      expect(report.sources[0]).toMatchObject({ status: 'failed', stage: 'write' });
      const failure = report.sources[0];
      if (failure?.status !== 'failed') {
        throw new Error('expected a failure');
      }
      expect(failure.error).toMatch(/^Failed to write authors-00001\.parquet: /);
      expect(manifest.names()).toEqual([]);
      expect(await readdir(join(dir, 'dataset'))).not.toContain('data');
      expect(await readdir(dataDir)).toEqual([]);
    } finally {
      spy.mockRestore();
    }
  });

  it('should only describe sources on a dry run', async () => {
    const report = await run([AUTHORS], { dryRun: true });

    expect(report.sources).toEqual([
      { source: 'ol_dump_authors_latest.txt.gz', status: 'stale', signature: S1, previous: undefined },
    ]);
    expect(getRequests()).toBe(0);
    expect(manifest.names()).toEqual([]);
  });

  it('should keep the work directory when asked', async () => {
    await run([AUTHORS], { keep: true });

    const [workDir] = await readdir(dataDir);
    expect(workDir).toMatch(/^run-/);
    if (!workDir) {
      return;
    }
    expect((await readdir(join(dataDir, workDir, 'downloads'))).sort()).toEqual([
      'ol_dump_authors_latest.txt.gz',
      'ol_dump_authors_latest.txt.gz.source.json',
    ]);
    expect(await readdir(join(dataDir, workDir, 'segments', 'authors'))).toHaveLength(3);
  });

  it('should stop before the next source once aborted', async () => {
    const controller = new AbortController();
    controller.abort();

    const report = await runSync({
      dataDir,
      sources: [AUTHORS],
      manifest,
      store,
      datasetId: 'someone/ol_dump',
      signal: controller.signal,
    });

    expect(report).toMatchObject({ sources: [], failed: 0, aborted: true });
    expect(mockFetch).not.toHaveBeenCalled();
  });

  it('should emit state changes in order', async () => {
    const changes: StateChange[] = [];
    const workDir = join(dir, 'work');
    const context = createPipelineContext({
      manifest,
      store,
      datasetId: 'someone/ol_dump',
      workDir,
      retry,
      sleep,
      onStateChange: (change) => changes.push(change),
    });

    const report = await syncSources(context, [AUTHORS]);

    expect(report.failed).toBe(0);
    expect(changes.map((change) => `${change.from}->${change.to}`)).toEqual([
      'unseen->fetching',
      'fetching->fetched',
      'fetched->parsing',
      'parsing->writing',
      'writing->publishing',
      'publishing->published',
    ]);
  });

  it('should run the two operations separately', async () => {
    const context = createPipelineContext({
      manifest,
      store,
      datasetId: 'someone/ol_dump',
      workDir: join(dir, 'work'),
      retry,
      sleep,
    });

    const ensured = await ensureLocalArtifact(context, AUTHORS);
    if (ensured.status !== 'fetched') {
      throw new Error(`unexpected status ${ensured.status}`);
    }
    expect(ensured.artifact.path).toBe(join(dir, 'work', 'downloads', 'ol_dump_authors_latest.txt.gz'));
    expect(ensured.origin).toBe('remote');

    const counters = { lines: 0, rows: 0, malformed: 0, unmapped: 0 };
    const result = await processArtifact(context, ensured.artifact, counters);

    expect(counters).toEqual({ lines: 10, rows: 7, malformed: 2, unmapped: 1 });
    expect(counters.lines).toBe(counters.rows + counters.malformed + counters.unmapped);
    expect(result).toMatchObject({ rows: 7, skipped: 3, segments: 3 });
    expect(result.entry.artifact).toBe(`someone/ol_dump/data/authors@${S1}`);

    const again = await ensureLocalArtifact(context, AUTHORS);
    expect(again.status).toBe('unchanged');
  });
});

describe('failedStage', () => {
  it('should map states to stages', () => {
    expect(failedStage('unseen', new TransientError('x'))).toBe('describe');
    expect(failedStage('fetching', new TransientError('x'))).toBe('fetch');
    expect(failedStage('fetched', new Error('x'))).toBe('parse');
    expect(failedStage('parsing', new Error('x'))).toBe('parse');
    expect(failedStage('parsing', new SerializationError('x'))).toBe('write');
    expect(failedStage('writing', new Error('x'))).toBe('write');
    expect(failedStage('publishing', new Error('x'))).toBe('publish');
  });
});
