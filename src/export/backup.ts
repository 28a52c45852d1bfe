/**
 * Raw dump backups
 *
 * Every dump fetched from Open Library is copied, together with its
 * descriptor, to the `backup/raw` branch of the dataset. When the origin
 * later fails to serve a dump, the copy is used instead, provided the
 * recorded signature equals the one the origin currently advertises.
 */

import { mkdir, stat } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { FetchedArtifact, SourceDescriptor } from '../ingest/types.js';
import {
  DESCRIPTOR_SUFFIX,
  discardArtifact,
  loadFetchedArtifact,
  writeDescriptor,
} from '../ingest/fetcher.js';
import type { DatasetStore } from './store.js';
import { createRetryPolicy, withRetry, type RetryPolicy } from '../lib/retry.js';
import { errorMessage, isAbortError, isTypedError } from '../lib/errors.js';
import { RAW_BACKUP_REVISION } from '../lib/constants.js';
import { createLogger, type Logger } from '../lib/logger.js';

const getLog = () => createLogger('export:backup');

export interface RawBackupOptions {
  store: DatasetStore;
  /** Branch the dumps are kept on */
  revision?: string | undefined;
  retry?: RetryPolicy | undefined;
  sleep?: ((ms: number) => Promise<void>) | undefined;
  logger?: Logger | undefined;
}

export class RawBackup {
  readonly revision: string;
  private readonly store: DatasetStore;
  private readonly retry: RetryPolicy;
  private readonly sleep: ((ms: number) => Promise<void>) | undefined;
  private readonly log: Logger;

  constructor(options: RawBackupOptions) {
    this.store = options.store;
    this.revision = options.revision ?? RAW_BACKUP_REVISION;
    this.retry = options.retry ?? createRetryPolicy();
    this.sleep = options.sleep;
    this.log = options.logger ?? getLog();
  }

  /**
   * Upload the dump, then its descriptor. A descriptor on the branch
   * therefore always describes a complete dump.
   *
   * Failures are logged and reported as `false`; cancellation is rethrown.
   */
  async save(artifact: FetchedArtifact, signal?: AbortSignal): Promise<boolean> {
    const { descriptor } = artifact;
    const log = this.log.forSource(descriptor);
    const commitMessage = `Back up ${descriptor.name} (${descriptor.signature})`;

    try {
      await this.withRetry(
        () => this.store.uploadFile(artifact.path, descriptor.name, { commitMessage, revision: this.revision, signal }),
        signal
      );
      await this.withRetry(
        () =>
          this.store.uploadFile(artifact.path + DESCRIPTOR_SUFFIX, descriptor.name + DESCRIPTOR_SUFFIX, {
            commitMessage,
            revision: this.revision,
            signal,
          }),
        signal
      );
    } catch (error) {
      if (isAbortError(error)) {
        throw error;
      }
      log.warn('Raw backup failed', { revision: this.revision, error: errorMessage(error) });
      return false;
    }

    log.info('Raw dump backed up', { revision: this.revision, signature: descriptor.signature });
    return true;
  }

  /**
   * Download the backup of `descriptor` to `destPath` when its recorded
   * signature matches. Returns null when there is no usable backup.
   */
  async restore(descriptor: SourceDescriptor, destPath: string, signal?: AbortSignal): Promise<FetchedArtifact | null> {
    const log = this.log.forSource(descriptor);
    const options = { revision: this.revision, signal };

    await mkdir(dirname(destPath), { recursive: true });

    try {
      await this.withRetry(
        () => this.store.downloadFile(descriptor.name + DESCRIPTOR_SUFFIX, destPath + DESCRIPTOR_SUFFIX, options),
        signal
      );
      const recorded = await loadFetchedArtifact(destPath);
      if (recorded.descriptor.signature !== descriptor.signature) {
        log.info('Backup is outdated', {
          backup: recorded.descriptor.signature,
          origin: descriptor.signature,
        });
        await discardArtifact(destPath);
        return null;
      }

      await this.withRetry(() => this.store.downloadFile(descriptor.name, destPath, options), signal);

      const { size } = await stat(destPath);
      if (descriptor.size !== undefined && size !== descriptor.size) {
        log.warn('Backup size does not match the origin', { expected: descriptor.size, actual: size });
        await discardArtifact(destPath);
        return null;
      }

      await writeDescriptor(destPath, descriptor);
    } catch (error) {
      await discardArtifact(destPath);
      if (isAbortError(error)) {
        throw error;
      }
      if (isTypedError(error) && error.kind === 'REMOTE') {
        log.info('No backup available', { revision: this.revision });
      } else {
        log.warn('Restoring the backup failed', { revision: this.revision, error: errorMessage(error) });
      }
      return null;
    }

    log.info('Dump restored from backup', { revision: this.revision, signature: descriptor.signature });
    return { descriptor, path: destPath };
  }

  private withRetry(operation: () => Promise<void>, signal: AbortSignal | undefined): Promise<void> {
    return withRetry(this.retry, operation, { signal, sleep: this.sleep });
  }
}
