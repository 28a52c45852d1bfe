/**
 * Mirror pipeline
 *
 * Composes: describe -> fetch -> parse -> map -> write segments -> publish
 *
 * Two invocation operations are exposed so they can run as separate
 * steps: `ensureLocalArtifact` (change detection and download) and
 * `processArtifact` (conversion and publication). `syncSources` runs both
 * for every source, one source at a time, and isolates failures so one
 * bad source does not stop the others.
 *
 * Fetched dumps are also backed up to the dataset's raw branch; when the
 * origin fails to serve a dump, a backup with the same signature is used.
 */

import { mkdir, mkdtemp, rm } from 'node:fs/promises';
import { join } from 'node:path';
import type {
  DownloadProgress,
  DumpSource,
  FailedStage,
  FetchedArtifact,
  SourceDescriptor,
  SourceState,
} from './types.js';
import { RemoteFetcher, discardArtifact } from './fetcher.js';
import { openDump } from './parse-dump.js';
import { mapRecord } from '../storage/mapper.js';
import { SegmentWriter } from '../storage/parquet-writer.js';
import type { ManifestEntry, ManifestStore } from '../storage/manifest.js';
import { DatasetPublisher } from '../export/publisher.js';
import { RawBackup } from '../export/backup.js';
import type { DatasetStore } from '../export/store.js';
import type { RetryPolicy } from '../lib/retry.js';
import { throwIfAborted } from '../lib/retry.js';
import { errorMessage, isAbortError, isTypedError } from '../lib/errors.js';
import { DEFAULT_BATCH_BYTES, DEFAULT_BATCH_ROWS } from '../lib/constants.js';
import { createLogger, generateRunId, withRunContext, type Logger } from '../lib/logger.js';

const getLog = () => createLogger('pipeline');

/** A source moved from one state to another */
export interface StateChange {
  source: string;
  from: SourceState;
  to: SourceState;
  error?: Error | undefined;
}

export interface PipelineContextOptions {
  manifest: ManifestStore;
  store: DatasetStore;
  /** Dataset repository, used in artifact identities */
  datasetId: string;
  /** Directory for downloads and segments */
  workDir: string;
  batchRows?: number | undefined;
  batchBytes?: number | undefined;
  /** Retry policy for fetch and publish */
  retry?: RetryPolicy | undefined;
  sleep?: ((ms: number) => Promise<void>) | undefined;
  signal?: AbortSignal | undefined;
  /** Keep downloads and segments after each source */
  keep?: boolean | undefined;
  /** Only report which sources changed, without downloading */
  dryRun?: boolean | undefined;
  /** Back up fetched dumps to the store and restore them when the origin fails (default: true) */
  backupRaw?: boolean | undefined;
  onStateChange?: ((change: StateChange) => void) | undefined;
  onDownloadProgress?: ((source: string, progress: DownloadProgress) => void) | undefined;
  logger?: Logger | undefined;
}

/** Everything a run needs, passed explicitly into each operation */
export interface PipelineContext {
  readonly manifest: ManifestStore;
  readonly fetcher: RemoteFetcher;
  readonly publisher: DatasetPublisher;
  /** Null when raw backups are disabled */
  readonly backup: RawBackup | null;
  readonly workDir: string;
  readonly batchRows: number;
  readonly batchBytes: number;
  readonly signal: AbortSignal | undefined;
  readonly keep: boolean;
  readonly dryRun: boolean;
  readonly states: Map<string, SourceState>;
  readonly onStateChange: ((change: StateChange) => void) | undefined;
  readonly onDownloadProgress: ((source: string, progress: DownloadProgress) => void) | undefined;
  readonly log: Logger;
}

/**
 * Build the context of a run
 */
export function createPipelineContext(options: PipelineContextOptions): PipelineContext {
  const log = options.logger ?? getLog();

  return {
    manifest: options.manifest,
    fetcher: new RemoteFetcher({
      manifest: options.manifest,
      workDir: join(options.workDir, 'downloads'),
      retry: options.retry,
      sleep: options.sleep,
    }),
    publisher: new DatasetPublisher({
      store: options.store,
      manifest: options.manifest,
      datasetId: options.datasetId,
      retry: options.retry,
      sleep: options.sleep,
    }),
    backup:
      options.backupRaw ?? true
        ? new RawBackup({ store: options.store, retry: options.retry, sleep: options.sleep })
        : null,
    workDir: options.workDir,
    batchRows: options.batchRows ?? DEFAULT_BATCH_ROWS,
    batchBytes: options.batchBytes ?? DEFAULT_BATCH_BYTES,
    signal: options.signal,
    keep: options.keep ?? false,
    dryRun: options.dryRun ?? false,
    states: new Map(),
    onStateChange: options.onStateChange,
    onDownloadProgress: options.onDownloadProgress,
    log,
  };
}

// ============================================================================
// Invocation operations
// ============================================================================

export type EnsureResult =
  /** The manifest already holds this signature */
  | { status: 'unchanged'; descriptor: SourceDescriptor }
  /** Changed, but the run is a dry run */
  | { status: 'stale'; descriptor: SourceDescriptor }
  | { status: 'fetched'; artifact: FetchedArtifact; origin: 'remote' | 'backup' };

/**
 * Look up the remote identity of a source and download it if it changed
 * since the last published run.
 */
export async function ensureLocalArtifact(
  context: PipelineContext,
  source: DumpSource
): Promise<EnsureResult> {
  throwIfAborted(context.signal);
  const log = context.log.forSource(source);

  const descriptor = await context.fetcher.describe(source, context.signal);
  if (!context.fetcher.needsFetch(descriptor)) {
    log.info('Source unchanged', { signature: descriptor.signature });
    return { status: 'unchanged', descriptor };
  }

  if (context.dryRun) {
    log.info('Source changed (dry run)', {
      signature: descriptor.signature,
      previous: context.manifest.lookup(source.name)?.signature,
    });
    return { status: 'stale', descriptor };
  }

  transition(context, source.name, 'fetching');
  let artifact: FetchedArtifact;
  try {
    artifact = await context.fetcher.fetch(descriptor, {
      signal: context.signal,
      onProgress: context.onDownloadProgress
        ? (progress) => context.onDownloadProgress?.(source.name, progress)
        : undefined,
    });
  } catch (error) {
    const restored = await restoreBackup(context, descriptor, error);
    if (!restored) {
      throw error;
    }
    transition(context, source.name, 'fetched');
    return { status: 'fetched', artifact: restored, origin: 'backup' };
  }
  transition(context, source.name, 'fetched');

  await context.backup?.save(artifact, context.signal);

  return { status: 'fetched', artifact, origin: 'remote' };
}

/**
 * Fall back to the raw backup after the origin failed to serve a dump
 */
async function restoreBackup(
  context: PipelineContext,
  descriptor: SourceDescriptor,
  error: unknown
): Promise<FetchedArtifact | null> {
  if (!context.backup || isAbortError(error)) {
    return null;
  }

  context.log.forSource(descriptor).warn('Download failed, trying the raw backup', { error: errorMessage(error) });
  return context.backup.restore(descriptor, context.fetcher.artifactPath(descriptor), context.signal);
}

/** Counters of one conversion */
export interface ProcessCounters {
  /** Lines read from the dump */
  lines: number;
  /** Rows written to segments */
  rows: number;
  /** Lines skipped by the parser */
  malformed: number;
  /** Records rejected by the mapper */
  unmapped: number;
}

export interface ProcessResult {
  descriptor: SourceDescriptor;
  entry: ManifestEntry;
  rows: number;
  skipped: number;
  segments: number;
}

/**
 * Convert a fetched dump into segments and publish them.
 *
 * `counters` is updated while the dump is read so a caller can report
 * partial counts when this throws.
 */
export async function processArtifact(
  context: PipelineContext,
  artifact: FetchedArtifact,
  counters: ProcessCounters = createCounters()
): Promise<ProcessResult> {
  const { descriptor } = artifact;
  const segmentDir = segmentDirFor(context, descriptor);
  const log = context.log.forSource(descriptor);

  await rm(segmentDir, { recursive: true, force: true });
  await mkdir(segmentDir, { recursive: true });

  transition(context, descriptor.name, 'parsing');

  const writer = new SegmentWriter({
    category: descriptor.category,
    outputDir: segmentDir,
    signature: descriptor.signature,
    maxRows: context.batchRows,
    maxBytes: context.batchBytes,
  });

  const dump = openDump(artifact.path, { signal: context.signal });
  try {
    for await (const raw of dump) {
      const mapped = mapRecord(descriptor.category, raw);
      if (!mapped.ok) {
        counters.unmapped++;
        log.debug('Skipping record', { line: raw.line, reason: mapped.reason });
        continue;
      }

      await writer.write(mapped.record);
      counters.rows++;
    }
  } finally {
    const stats = dump.stats;
    counters.lines = stats.lines;
    counters.malformed = stats.malformed;
  }

  transition(context, descriptor.name, 'writing');
  const segments = await writer.finalize();
  const skipped = counters.malformed + counters.unmapped;

  log.info('Dump converted', {
    lines: counters.lines,
    rows: counters.rows,
    skipped,
    segments: segments.length,
  });

  throwIfAborted(context.signal);
  transition(context, descriptor.name, 'publishing');

  const result = await context.publisher.publish(
    { descriptor, segmentDir, segments, rows: counters.rows, skipped },
    context.signal
  );
  if (!result.ok) {
    throw result.error;
  }

  transition(context, descriptor.name, 'published');

  return {
    descriptor,
    entry: result.entry,
    rows: counters.rows,
    skipped,
    segments: segments.length,
  };
}

// ============================================================================
// Full run
// ============================================================================

export type SourceReport =
  | { source: string; status: 'unchanged'; signature: string }
  | { source: string; status: 'stale'; signature: string; previous: string | undefined }
  | {
      source: string;
      status: 'published';
      signature: string;
      artifact: string;
      rows: number;
      skipped: number;
      segments: number;
    }
  | { source: string; status: 'failed'; stage: FailedStage; error: string; skipped: number };

export interface SyncReport {
  sources: SourceReport[];
  /** Number of failed sources */
  failed: number;
  /** The run was cancelled before every source was handled */
  aborted: boolean;
}

/**
 * Run every source through the pipeline, one at a time
 */
export async function syncSources(context: PipelineContext, sources: readonly DumpSource[]): Promise<SyncReport> {
  const reports: SourceReport[] = [];
  let aborted = false;

  for (const source of sources) {
    if (context.signal?.aborted) {
      aborted = true;
      break;
    }

    const report = await syncSource(context, source);
    reports.push(report);

    if (report.status === 'failed' && context.signal?.aborted) {
      aborted = true;
      break;
    }
  }

  const failed = reports.filter((report) => report.status === 'failed').length;
  context.log.info('Sync finished', {
    sources: reports.length,
    published: reports.filter((report) => report.status === 'published').length,
    failed,
    aborted,
  });

  return { sources: reports, failed, aborted };
}

async function syncSource(context: PipelineContext, source: DumpSource): Promise<SourceReport> {
  const counters = createCounters();
  let artifact: FetchedArtifact | null = null;

  try {
    const ensured = await ensureLocalArtifact(context, source);
    if (ensured.status === 'unchanged') {
      return { source: source.name, status: 'unchanged', signature: ensured.descriptor.signature };
    }
    if (ensured.status === 'stale') {
      return {
        source: source.name,
        status: 'stale',
        signature: ensured.descriptor.signature,
        previous: context.manifest.lookup(source.name)?.signature,
      };
    }

    artifact = ensured.artifact;
    const result = await processArtifact(context, artifact, counters);

    return {
      source: source.name,
      status: 'published',
      signature: result.descriptor.signature,
      artifact: result.entry.artifact,
      rows: result.rows,
      skipped: result.skipped,
      segments: result.segments,
    };
  } catch (error) {
    const stage = failedStage(context.states.get(source.name) ?? 'unseen', error);
    const failure = error instanceof Error ? error : new Error(String(error));
    transition(context, source.name, 'failed', failure);

    const log = context.log.forSource(source);
    const details = { stage, error: errorMessage(error) };
    if (isAbortError(error)) {
      log.warn('Source cancelled', details);
    } else {
      log.error('Source failed', details);
    }

    return {
      source: source.name,
      status: 'failed',
      stage,
      error: errorMessage(error),
      skipped: counters.malformed + counters.unmapped,
    };
  } finally {
    if (artifact && !context.keep) {
      await discardArtifact(artifact.path);
      await rm(segmentDirFor(context, artifact.descriptor), { recursive: true, force: true });
    }
  }
}

export interface RunSyncOptions extends Omit<PipelineContextOptions, 'workDir'> {
  /** Parent of the run's temporary work directory */
  dataDir: string;
  sources: readonly DumpSource[];
}

/**
 * Full run: a fresh work directory and run id around `syncSources`
 */
export async function runSync(options: RunSyncOptions): Promise<SyncReport & { runId: string }> {
  const runId = generateRunId();

  return withRunContext(runId, () =>
    withWorkDir(options.dataDir, options.keep ?? false, async (workDir) => {
      const context = createPipelineContext({ ...options, workDir });
      const report = await syncSources(context, options.sources);
      return { ...report, runId };
    })
  );
}

/**
 * Run `fn` with a new temporary directory under `parentDir`,
 * removed afterwards unless `keep` is set
 */
export async function withWorkDir<T>(
  parentDir: string,
  keep: boolean,
  fn: (workDir: string) => Promise<T>
): Promise<T> {
  await mkdir(parentDir, { recursive: true });
  const workDir = await mkdtemp(join(parentDir, 'run-'));

  try {
    return await fn(workDir);
  } finally {
    if (keep) {
      getLog().info('Keeping work directory', { path: workDir });
    } else {
      await rm(workDir, { recursive: true, force: true });
    }
  }
}

// ============================================================================
// Helpers
// ============================================================================

function createCounters(): ProcessCounters {
  return { lines: 0, rows: 0, malformed: 0, unmapped: 0 };
}

function segmentDirFor(context: PipelineContext, descriptor: SourceDescriptor): string {
  return join(context.workDir, 'segments', descriptor.category);
}

function transition(context: PipelineContext, source: string, to: SourceState, error?: Error): void {
  const from = context.states.get(source) ?? 'unseen';
  context.states.set(source, to);
  context.onStateChange?.({ source, from, to, error });
}

/**
 * Stage a failure belongs to, from the state the source was in
 */
export function failedStage(state: SourceState, error: unknown): FailedStage {
  switch (state) {
    case 'unseen':
    case 'published':
    case 'failed':
      return 'describe';
    case 'fetching':
      return 'fetch';
    case 'fetched':
    case 'parsing':
      return isTypedError(error) && error.kind === 'SERIALIZATION' ? 'write' : 'parse';
    case 'writing':
      return 'write';
    case 'publishing':
      return 'publish';
  }
}
