/**
 * Dataset Publisher
 *
 * Uploads the segments of one source as a single commit and, only once
 * the upload succeeded, commits the manifest entry. A failed upload
 * leaves the manifest untouched so the next run retries the source.
 */

import type { SourceDescriptor, Category } from '../ingest/types.js';
import type { SegmentInfo } from '../storage/parquet-writer.js';
import type { ManifestEntry, ManifestStore } from '../storage/manifest.js';
import type { DatasetStore } from './store.js';
import { createRetryPolicy, withRetry, type RetryPolicy } from '../lib/retry.js';
import { PublishError, errorMessage, isAbortError } from '../lib/errors.js';
import { MANIFEST_REPO_PATH } from '../lib/constants.js';
import { createLogger, type Logger } from '../lib/logger.js';

const getLog = () => createLogger('export:publisher');

/** Glob of files replaced by each publish */
const SEGMENT_PATTERN = '*.parquet';

export interface DatasetPublisherOptions {
  store: DatasetStore;
  manifest: ManifestStore;
  /** Dataset repository, used in artifact identities */
  datasetId: string;
  /** Retry policy for uploads */
  retry?: RetryPolicy | undefined;
  sleep?: ((ms: number) => Promise<void>) | undefined;
  /** Mirror the manifest into the store after each commit (default: true) */
  mirrorManifest?: boolean | undefined;
  logger?: Logger | undefined;
}

/** What was produced for one source */
export interface PublishRequest {
  descriptor: SourceDescriptor;
  /** Directory holding the segments */
  segmentDir: string;
  segments: readonly SegmentInfo[];
  /** Rows written */
  rows: number;
  /** Lines skipped by the parser or mapper */
  skipped: number;
}

export type PublishResult =
  | { ok: true; entry: ManifestEntry }
  | { ok: false; error: Error };

/**
 * Path of a category's segments inside the dataset
 */
export function categoryPath(category: Category): string {
  return `data/${category}`;
}

/**
 * Identity of a published artifact: `<datasetId>/data/<category>@<signature>`
 */
export function artifactId(datasetId: string, descriptor: SourceDescriptor): string {
  return `${datasetId}/${categoryPath(descriptor.category)}@${descriptor.signature}`;
}

export class DatasetPublisher {
  private readonly store: DatasetStore;
  private readonly manifest: ManifestStore;
  private readonly datasetId: string;
  private readonly retry: RetryPolicy;
  private readonly sleep: ((ms: number) => Promise<void>) | undefined;
  private readonly mirrorManifest: boolean;
  private readonly log: Logger;

  constructor(options: DatasetPublisherOptions) {
    this.store = options.store;
    this.manifest = options.manifest;
    this.datasetId = options.datasetId;
    this.retry = options.retry ?? createRetryPolicy();
    this.sleep = options.sleep;
    this.mirrorManifest = options.mirrorManifest ?? true;
    this.log = options.logger ?? getLog();
  }

  /**
   * Upload the segments, then commit the manifest entry.
   *
   * Cancellation is rethrown; every other failure is returned as
   * `{ ok: false }` with the manifest unchanged.
   */
  async publish(request: PublishRequest, signal?: AbortSignal): Promise<PublishResult> {
    const { descriptor } = request;
    const pathInRepo = categoryPath(descriptor.category);
    const artifact = artifactId(this.datasetId, descriptor);
    const log = this.log.forSource(descriptor);

    log.info('Publishing segments', {
      store: this.store.description,
      path: pathInRepo,
      segments: request.segments.length,
      rows: request.rows,
    });

    try {
      await withRetry(
        this.retry,
        () =>
          this.store.uploadFolder(request.segmentDir, pathInRepo, {
            commitMessage: `Update ${descriptor.category} from ${descriptor.name} (${descriptor.signature})`,
            deletePattern: SEGMENT_PATTERN,
            signal,
          }),
        {
          signal,
          sleep: this.sleep,
          onRetry: ({ attempt, delayMs, error }) => {
            log.warn('Upload failed, retrying', {
              attempt,
              delayMs,
              error: errorMessage(error),
            });
          },
        }
      );
    } catch (error) {
      if (isAbortError(error)) {
        throw error;
      }
      const publishError = new PublishError(
        `Upload of ${descriptor.name} failed: ${errorMessage(error)}`,
        error
      );
      log.error('Publish failed', { error: publishError.message });
      return { ok: false, error: publishError };
    }

    let entry: ManifestEntry;
    try {
      entry = await this.manifest.commit(descriptor.name, {
        signature: descriptor.signature,
        size: descriptor.size ?? null,
        artifact,
        rows: request.rows,
        skipped: request.skipped,
        segments: request.segments.length,
      });
    } catch (error) {
      const commitError = error instanceof Error ? error : new Error(String(error));
      log.error('Manifest commit failed after upload', { error: commitError.message });
      return { ok: false, error: commitError };
    }

    if (this.mirrorManifest) {
      await this.mirror(signal);
    }

    return { ok: true, entry };
  }

  /**
   * Copy the manifest file into the store. Failures only warn.
   */
  private async mirror(signal: AbortSignal | undefined): Promise<void> {
    try {
      await this.store.uploadFile(this.manifest.path, MANIFEST_REPO_PATH, {
        commitMessage: 'Update sync manifest',
        signal,
      });
    } catch (error) {
      this.log.warn('Manifest mirror failed', {
        path: MANIFEST_REPO_PATH,
        error: errorMessage(error),
      });
    }
  }
}
