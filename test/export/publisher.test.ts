/**
 * Tests for the dataset publisher and stores
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdir, readdir, readFile, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { DatasetPublisher, artifactId, categoryPath, type PublishRequest } from '../../src/export/publisher.js';
import {
  HuggingFaceCliStore,
  LOCAL_REVISIONS_DIR,
  LocalDatasetStore,
  commandFailure,
  globToRegExp,
  type DatasetStore,
  type UploadOptions,
} from '../../src/export/store.js';
import { ManifestStore } from '../../src/storage/manifest.js';
import { createRetryPolicy } from '../../src/lib/retry.js';
import { PublishError, RemoteError, TransientError } from '../../src/lib/errors.js';
import { createDescriptor, createTempDir } from '../helpers.js';

/** In-memory store recording every upload */
class RecordingStore implements DatasetStore {
  readonly description = 'recording';
  readonly folders: { localDir: string; pathInRepo: string; options: UploadOptions }[] = [];
  readonly files: { localPath: string; pathInRepo: string }[] = [];
  failures = 0;

  async uploadFolder(localDir: string, pathInRepo: string, options: UploadOptions): Promise<void> {
    if (this.failures > 0) {
      this.failures--;
      throw new TransientError('upload rejected');
    }
    this.folders.push({ localDir, pathInRepo, options });
  }

  async uploadFile(localPath: string, pathInRepo: string): Promise<void> {
    this.files.push({ localPath, pathInRepo });
  }

  async downloadFile(pathInRepo: string): Promise<void> {
    throw new RemoteError(`${pathInRepo} not recorded`, 404);
  }
}

const missing = () => Promise.reject(new RemoteError('not found', 404));

describe('DatasetPublisher', () => {
  let dir: string;
  let manifest: ManifestStore;
  let store: RecordingStore;

  const request = (): PublishRequest => ({
    descriptor: createDescriptor('works', { signature: 'S2', size: 100 }),
    segmentDir: join(dir, 'segments'),
    segments: [],
    rows: 7,
    skipped: 1,
  });

  beforeEach(async () => {
    dir = await createTempDir('publish');
    manifest = ManifestStore.empty(join(dir, 'manifest.json'), {
      now: () => new Date('2024-03-01T00:00:00.000Z'),
    });
    store = new RecordingStore();
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should upload, commit and mirror the manifest', async () => {
    const publisher = new DatasetPublisher({ store, manifest, datasetId: 'someone/ol_dump' });

    const result = await publisher.publish(request());

    expect(result).toEqual({
      ok: true,
      entry: {
        signature: 'S2',
        size: 100,
        processedAt: '2024-03-01T00:00:00.000Z',
        artifact: 'someone/ol_dump/data/works@S2',
        rows: 7,
        skipped: 1,
        segments: 0,
      },
    });
    expect(store.folders).toEqual([
      {
        localDir: join(dir, 'segments'),
        pathInRepo: 'data/works',
        options: {
          commitMessage: 'Update works from ol_dump_works_latest.txt.gz (S2)',
          deletePattern: '*.parquet',
          signal: undefined,
        },
      },
    ]);
    expect(store.files).toEqual([{ localPath: manifest.path, pathInRepo: 'metadata/ol_sync_manifest.json' }]);
    expect(manifest.lookup('ol_dump_works_latest.txt.gz')?.signature).toBe('S2');
  });

  it('should retry transient upload failures', async () => {
    store.failures = 1;
    const publisher = new DatasetPublisher({
      store,
      manifest,
      datasetId: 'someone/ol_dump',
      retry: createRetryPolicy({ maxAttempts: 2 }),
      sleep: () => Promise.resolve(),
    });

    const result = await publisher.publish(request());

    expect(result.ok).toBe(true);
    expect(store.folders).toHaveLength(1);
  });

  it('should leave the manifest unchanged when the upload fails', async () => {
    store.failures = 5;
    const publisher = new DatasetPublisher({
      store,
      manifest,
      datasetId: 'someone/ol_dump',
      retry: createRetryPolicy({ maxAttempts: 2 }),
      sleep: () => Promise.resolve(),
    });

    const result = await publisher.publish(request());

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toMatchObject({ kind: 'PUBLISH' });
      expect(result.error.message).toBe('Upload of ol_dump_works_latest.txt.gz failed: upload rejected');
    }
    expect(store.failures).toBe(3);
    expect(manifest.lookup('ol_dump_works_latest.txt.gz')).toBeUndefined();
    expect(store.files).toEqual([]);
  });

  it('should only warn when mirroring fails', async () => {
    const failingMirror: DatasetStore = {
      description: 'failing-mirror',
      uploadFolder: () => Promise.resolve(),
      uploadFile: () => Promise.reject(new Error('mirror down')),
      downloadFile: missing,
    };
    const publisher = new DatasetPublisher({ store: failingMirror, manifest, datasetId: 'someone/ol_dump' });

    const result = await publisher.publish(request());

    expect(result.ok).toBe(true);
    expect(manifest.lookup('ol_dump_works_latest.txt.gz')?.signature).toBe('S2');
  });

  it('should skip mirroring when disabled', async () => {
    const publisher = new DatasetPublisher({
      store,
      manifest,
      datasetId: 'someone/ol_dump',
      mirrorManifest: false,
    });

    await publisher.publish(request());

    expect(store.files).toEqual([]);
  });

  it('should rethrow cancellation', async () => {
    const uploadFolder = vi.fn(() => Promise.reject(new DOMException('Operation aborted', 'AbortError')));
    const publisher = new DatasetPublisher({
      store: { description: 'aborting', uploadFolder, uploadFile: () => Promise.resolve(), downloadFile: missing },
      manifest,
      datasetId: 'someone/ol_dump',
    });

    await expect(publisher.publish(request())).rejects.toMatchObject({ name: 'AbortError' });
    expect(uploadFolder).toHaveBeenCalledTimes(1);
    expect(manifest.lookup('ol_dump_works_latest.txt.gz')).toBeUndefined();
  });
});

describe('artifact naming', () => {
  it('should place categories under data/', () => {
    expect(categoryPath('editions')).toBe('data/editions');
  });

  it('should identify an artifact by dataset, path and signature', () => {
    expect(artifactId('someone/ol_dump', createDescriptor('authors', { signature: 'S1' }))).toBe(
      'someone/ol_dump/data/authors@S1'
    );
  });
});

describe('HuggingFaceCliStore', () => {
  it('should build upload arguments', () => {
    const store = new HuggingFaceCliStore({ datasetId: 'someone/ol_dump', token: 'test-token' });

    expect(store.description).toBe('huggingface:someone/ol_dump');
    expect(
      store.uploadArgs('/tmp/segments', 'data/works', {
        commitMessage: 'Update works',
        deletePattern: '*.parquet',
      })
    ).toEqual([
      'upload',
      'someone/ol_dump',
      '/tmp/segments',
      'data/works',
      '--repo-type', 'dataset',
      '--commit-message', 'Update works',
      '--delete', '*.parquet',
    ]);
  });

  it('should omit --delete without a pattern', () => {
    const store = new HuggingFaceCliStore({ datasetId: 'someone/ol_dump' });
    expect(store.uploadArgs('m.json', 'metadata/m.json', { commitMessage: 'm' })).not.toContain('--delete');
  });

  it('should commit to another revision when asked', () => {
    const store = new HuggingFaceCliStore({ datasetId: 'someone/ol_dump' });

    expect(
      store.uploadArgs('/tmp/dump.gz', 'dump.gz', { commitMessage: 'Back up', revision: 'backup/raw' })
    ).toEqual([
      'upload',
      'someone/ol_dump',
      '/tmp/dump.gz',
      'dump.gz',
      '--repo-type', 'dataset',
      '--commit-message', 'Back up',
      '--revision', 'backup/raw',
    ]);
  });

  it('should build download arguments', () => {
    const store = new HuggingFaceCliStore({ datasetId: 'someone/ol_dump' });

    expect(store.downloadArgs('dump.gz', '/tmp/scratch', { revision: 'backup/raw' })).toEqual([
      'download',
      'someone/ol_dump',
      'dump.gz',
      '--repo-type', 'dataset',
      '--local-dir', '/tmp/scratch',
      '--revision', 'backup/raw',
    ]);
    expect(store.downloadArgs('dump.gz', '/tmp/scratch', {})).not.toContain('--revision');
  });
});

describe('commandFailure', () => {
  it('should not retry rejected credentials', () => {
    const error = commandFailure('upload', 1, 'HTTPError: 401 Client Error: Unauthorized for url\n');

    expect(error).toBeInstanceOf(PublishError);
    expect(error.message).toBe(
      'Hub rejected the credentials: upload failed with code 1: HTTPError: 401 Client Error: Unauthorized for url'
    );
  });

  it('should treat a 403 as rejected credentials', () => {
    expect(commandFailure('download', 1, '403 Forbidden')).toBeInstanceOf(PublishError);
  });

  it('should not retry an upload to a missing repository', () => {
    const error = commandFailure('upload', 1, 'Repository Not Found for url');

    expect(error).toBeInstanceOf(PublishError);
    expect(error.message).toBe('upload failed with code 1: Repository Not Found for url');
  });

  it('should report a missing download as a remote error', () => {
    const error = commandFailure('download', 1, 'EntryNotFoundError: 404 Client Error. Entry Not Found for url');

    expect(error).toBeInstanceOf(RemoteError);
    expect(error).toMatchObject({ kind: 'REMOTE', status: 404 });
  });

  it('should retry anything else', () => {
    const error = commandFailure('upload', 2, '  Connection reset by peer  ');

    expect(error).toBeInstanceOf(TransientError);
    expect(error.message).toBe('upload failed with code 2: Connection reset by peer');
  });
});

describe('LocalDatasetStore', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await createTempDir('local-store');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should replace matching files and keep the rest', async () => {
    const root = join(dir, 'dataset');
    const target = join(root, 'data', 'works');
    await mkdir(target, { recursive: true });
    await writeFile(join(target, 'works-00000.parquet'), 'old-0');
    await writeFile(join(target, 'works-00001.parquet'), 'old-1');
    await writeFile(join(target, 'README.md'), 'keep');

    const source = join(dir, 'segments');
    await mkdir(source);
    await writeFile(join(source, 'works-00000.parquet'), 'new-0');

    const store = new LocalDatasetStore(root);
    await store.uploadFolder(source, 'data/works', { commitMessage: 'm', deletePattern: '*.parquet' });

    expect((await readdir(target)).sort()).toEqual(['README.md', 'works-00000.parquet']);
    expect(await readFile(join(target, 'works-00000.parquet'), 'utf-8')).toBe('new-0');
    expect(await readdir(join(root, 'data'))).toEqual(['works']);
  });

  it('should create the target on first upload', async () => {
    const root = join(dir, 'dataset');
    const source = join(dir, 'segments');
    await mkdir(source);
    await writeFile(join(source, 'authors-00000.parquet'), 'seg');

    await new LocalDatasetStore(root).uploadFolder(source, 'data/authors', { commitMessage: 'm' });

    expect(await readdir(join(root, 'data', 'authors'))).toEqual(['authors-00000.parquet']);
  });

  it('should copy single files into place', async () => {
    const root = join(dir, 'dataset');
    const source = join(dir, 'manifest.json');
    await writeFile(source, '{}');

    await new LocalDatasetStore(root).uploadFile(source, 'metadata/manifest.json', { commitMessage: 'm' });

    expect(await readFile(join(root, 'metadata', 'manifest.json'), 'utf-8')).toBe('{}');
    expect(await readdir(join(root, 'metadata'))).toEqual(['manifest.json']);
  });

  it('should keep other revisions apart from main', async () => {
    const root = join(dir, 'dataset');
    const source = join(dir, 'dump.gz');
    await writeFile(source, 'raw');
    const store = new LocalDatasetStore(root);

    await store.uploadFile(source, 'dump.gz', { commitMessage: 'm', revision: 'backup/raw' });

    expect(store.resolve('dump.gz', 'backup/raw')).toBe(join(root, LOCAL_REVISIONS_DIR, 'backup', 'raw', 'dump.gz'));
    expect(store.resolve('dump.gz', 'main')).toBe(join(root, 'dump.gz'));
    expect(await readdir(root)).toEqual([LOCAL_REVISIONS_DIR]);
    expect(await readFile(store.resolve('dump.gz', 'backup/raw'), 'utf-8')).toBe('raw');
  });

  it('should download a file from a revision', async () => {
    const root = join(dir, 'dataset');
    const source = join(dir, 'dump.gz');
    await writeFile(source, 'raw');
    const store = new LocalDatasetStore(root);
    await store.uploadFile(source, 'dump.gz', { commitMessage: 'm', revision: 'backup/raw' });

    const dest = join(dir, 'restored', 'dump.gz');
    await store.downloadFile('dump.gz', dest, { revision: 'backup/raw' });

    expect(await readFile(dest, 'utf-8')).toBe('raw');
    expect(await readdir(join(dir, 'restored'))).toEqual(['dump.gz']);
  });

  it('should report a missing file as a remote error', async () => {
    const root = join(dir, 'dataset');
    const store = new LocalDatasetStore(root);

    await expect(store.downloadFile('dump.gz', join(dir, 'dump.gz'), { revision: 'backup/raw' })).rejects.toThrow(
      new RemoteError(`dump.gz not found in local:${root} (backup/raw)`, 404)
    );
    await expect(store.downloadFile('dump.gz', join(dir, 'dump.gz'), {})).rejects.toMatchObject({
      kind: 'REMOTE',
      status: 404,
    });
  });
});

describe('globToRegExp', () => {
  it('should match simple globs', () => {
    const pattern = globToRegExp('*.parquet');
    expect(pattern.test('works-00000.parquet')).toBe(true);
    expect(pattern.test('works-00000.parquet.tmp')).toBe(false);
    expect(globToRegExp('a?c').test('abc')).toBe(true);
    expect(globToRegExp('a.c').test('abc')).toBe(false);
  });
});
