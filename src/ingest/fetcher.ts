/**
 * Remote Fetcher
 *
 * Decides whether a dump changed since the last published run and, if so,
 * downloads it into the run's work directory. The manifest is only read
 * here; committing it is the publisher's job.
 */

import { mkdir, readFile, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import { describeRemote, downloadToFile } from './download.js';
import type {
  DownloadProgress,
  DumpSource,
  FetchedArtifact,
  SourceDescriptor,
} from './types.js';
import { CATEGORIES } from './types.js';
import type { ManifestStore } from '../storage/manifest.js';
import { createRetryPolicy, type RetryPolicy } from '../lib/retry.js';
import { ConfigError, errorMessage } from '../lib/errors.js';
import { createLogger, type Logger } from '../lib/logger.js';

const getLog = () => createLogger('ingest:fetcher');

/** Suffix of the descriptor file written next to a fetched dump */
export const DESCRIPTOR_SUFFIX = '.source.json';

const DescriptorSchema = z.object({
  name: z.string().min(1),
  category: z.enum(CATEGORIES),
  url: z.string().url(),
  size: z.number().int().nonnegative().optional(),
  signature: z.string().min(1),
  lastModified: z.string().optional(),
  etag: z.string().optional(),
});

/** Options for RemoteFetcher */
export interface RemoteFetcherOptions {
  /** Manifest consulted for change detection */
  manifest: ManifestStore;
  /** Directory downloads are written to */
  workDir: string;
  /** Retry policy for HEAD and GET requests */
  retry?: RetryPolicy | undefined;
  /** Replaceable sleep for retries */
  sleep?: ((ms: number) => Promise<void>) | undefined;
  /** Optional logger for dependency injection (testing) */
  logger?: Logger | undefined;
}

/** Options for a single fetch */
export interface FetchOptions {
  signal?: AbortSignal | undefined;
  onProgress?: ((progress: DownloadProgress) => void) | undefined;
}

export class RemoteFetcher {
  private readonly manifest: ManifestStore;
  private readonly workDir: string;
  private readonly retry: RetryPolicy;
  private readonly sleep: ((ms: number) => Promise<void>) | undefined;
  private readonly log: Logger;

  constructor(options: RemoteFetcherOptions) {
    this.manifest = options.manifest;
    this.workDir = options.workDir;
    this.retry = options.retry ?? createRetryPolicy();
    this.sleep = options.sleep;
    this.log = options.logger ?? getLog();
  }

  /**
   * Read the remote identity of a dump
   */
  async describe(source: DumpSource, signal?: AbortSignal): Promise<SourceDescriptor> {
    const log = this.log.forSource(source);
    return describeRemote(source, {
      retry: this.retry,
      signal,
      sleep: this.sleep,
      onRetry: ({ attempt, delayMs, error }) => {
        log.warn('HEAD request failed, retrying', {
          attempt,
          delayMs,
          error: errorMessage(error),
        });
      },
    });
  }

  /**
   * True when the manifest has no entry for the source or its signature differs
   */
  needsFetch(descriptor: SourceDescriptor): boolean {
    const entry = this.manifest.lookup(descriptor.name);
    return entry === undefined || entry.signature !== descriptor.signature;
  }

  /** Where `fetch` puts the dump */
  artifactPath(descriptor: SourceDescriptor): string {
    return join(this.workDir, descriptor.name);
  }

  /**
   * Download the dump and write its descriptor beside it.
   * On failure nothing is left in the work directory.
   */
  async fetch(descriptor: SourceDescriptor, options: FetchOptions = {}): Promise<FetchedArtifact> {
    await mkdir(this.workDir, { recursive: true });
    const path = this.artifactPath(descriptor);
    const log = this.log.forSource(descriptor);

    log.info('Downloading dump', {
      signature: descriptor.signature,
      size: descriptor.size,
    });

    try {
      const bytes = await downloadToFile(descriptor, path, {
        retry: this.retry,
        signal: options.signal,
        sleep: this.sleep,
        onProgress: options.onProgress,
        onRetry: ({ attempt, delayMs, error }) => {
          log.warn('Download attempt failed, retrying', {
            attempt,
            delayMs,
            error: errorMessage(error),
          });
        },
      });
      await writeDescriptor(path, descriptor);
      log.info('Download complete', { bytes });
    } catch (error) {
      await discardArtifact(path);
      throw error;
    }

    return { descriptor, path };
  }
}

/**
 * Write the descriptor file for a fetched dump
 */
export async function writeDescriptor(artifactPath: string, descriptor: SourceDescriptor): Promise<void> {
  await writeFile(artifactPath + DESCRIPTOR_SUFFIX, JSON.stringify(descriptor, null, 2));
}

/**
 * Load the artifact previously written by `RemoteFetcher.fetch`
 *
 * @throws {ConfigError} If the descriptor file is missing or invalid
 */
export async function loadFetchedArtifact(artifactPath: string): Promise<FetchedArtifact> {
  let raw: string;
  try {
    raw = await readFile(artifactPath + DESCRIPTOR_SUFFIX, 'utf-8');
  } catch (error) {
    throw new ConfigError(
      `No descriptor for ${artifactPath}; run fetch first (${errorMessage(error)})`
    );
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(`Descriptor for ${artifactPath} is not JSON: ${errorMessage(error)}`);
  }

  const result = DescriptorSchema.safeParse(json);
  if (!result.success) {
    throw new ConfigError(`Invalid descriptor for ${artifactPath}`);
  }

  const data = result.data;
  return {
    path: artifactPath,
    descriptor: {
      name: data.name,
      category: data.category,
      url: data.url,
      size: data.size,
      signature: data.signature,
      lastModified: data.lastModified,
      etag: data.etag,
    },
  };
}

/**
 * Remove a dump and its descriptor
 */
export async function discardArtifact(artifactPath: string): Promise<void> {
  await rm(artifactPath, { force: true });
  await rm(artifactPath + DESCRIPTOR_SUFFIX, { force: true });
}
