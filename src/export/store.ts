/**
 * Dataset stores
 *
 * A dataset store receives a folder of segments as one commit, single
 * files such as the manifest, and raw dump backups on a separate revision
 * that can be downloaded again. Two stores are provided:
 * - HuggingFaceCliStore runs the `huggingface-cli upload` and `download` commands
 * - LocalDatasetStore mirrors the dataset into a local directory tree
 */

import { spawn } from 'node:child_process';
import { copyFile, mkdir, readdir, rename, rm, stat } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { PublishError, RemoteError, TransientError } from '../lib/errors.js';
import { throwIfAborted } from '../lib/retry.js';
import { createLogger, type Logger } from '../lib/logger.js';

const getLog = () => createLogger('export:store');

export interface UploadOptions {
  commitMessage: string;
  /** Glob of existing files under the target path to delete in the same commit */
  deletePattern?: string | undefined;
  /** Branch to commit to (default: the main branch); created when missing */
  revision?: string | undefined;
  signal?: AbortSignal | undefined;
}

export interface StoreDownloadOptions {
  revision?: string | undefined;
  signal?: AbortSignal | undefined;
}

/**
 * Destination of published segments
 */
export interface DatasetStore {
  /** Human-readable store description for logs */
  readonly description: string;
  /** Upload every file of `localDir` to `pathInRepo` as one commit */
  uploadFolder(localDir: string, pathInRepo: string, options: UploadOptions): Promise<void>;
  /** Upload a single file to `pathInRepo` */
  uploadFile(localPath: string, pathInRepo: string, options: UploadOptions): Promise<void>;
  /**
   * Download `pathInRepo` to `destPath`
   *
   * @throws {RemoteError} If the file or revision does not exist
   */
  downloadFile(pathInRepo: string, destPath: string, options: StoreDownloadOptions): Promise<void>;
}

// ============================================================================
// Hugging Face
// ============================================================================

export interface HuggingFaceCliStoreOptions {
  /** Dataset repository (e.g. "openlibrary/ol_dump") */
  datasetId: string;
  /** Access token, passed to the command as HF_TOKEN */
  token?: string | undefined;
  /** Command to run (default: huggingface-cli) */
  command?: string | undefined;
  logger?: Logger | undefined;
}

export class HuggingFaceCliStore implements DatasetStore {
  readonly description: string;
  private readonly datasetId: string;
  private readonly token: string | undefined;
  private readonly command: string;
  private readonly log: Logger;

  constructor(options: HuggingFaceCliStoreOptions) {
    this.datasetId = options.datasetId;
    this.token = options.token;
    this.command = options.command ?? 'huggingface-cli';
    this.log = options.logger ?? getLog();
    this.description = `huggingface:${options.datasetId}`;
  }

  async uploadFolder(localDir: string, pathInRepo: string, options: UploadOptions): Promise<void> {
    await this.run('upload', this.uploadArgs(localDir, pathInRepo, options), options.signal);
  }

  async uploadFile(localPath: string, pathInRepo: string, options: UploadOptions): Promise<void> {
    await this.run('upload', this.uploadArgs(localPath, pathInRepo, options), options.signal);
  }

  /**
   * Download into a scratch directory beside `destPath`, then move the
   * file into place
   */
  async downloadFile(pathInRepo: string, destPath: string, options: StoreDownloadOptions): Promise<void> {
    const scratch = `${destPath}.hf-${process.pid}`;
    await mkdir(scratch, { recursive: true });
    try {
      await this.run('download', this.downloadArgs(pathInRepo, scratch, options), options.signal);
      await rename(join(scratch, pathInRepo), destPath);
    } finally {
      await rm(scratch, { recursive: true, force: true });
    }
  }

  /**
   * Arguments of one `huggingface-cli upload` invocation
   */
  uploadArgs(localPath: string, pathInRepo: string, options: UploadOptions): string[] {
    const args = [
      'upload',
      this.datasetId,
      localPath,
      pathInRepo,
      '--repo-type', 'dataset',
      '--commit-message', options.commitMessage,
    ];
    if (options.revision) {
      args.push('--revision', options.revision);
    }
    if (options.deletePattern) {
      args.push('--delete', options.deletePattern);
    }
    return args;
  }

  /**
   * Arguments of one `huggingface-cli download` invocation
   */
  downloadArgs(pathInRepo: string, localDir: string, options: StoreDownloadOptions): string[] {
    const args = ['download', this.datasetId, pathInRepo, '--repo-type', 'dataset', '--local-dir', localDir];
    if (options.revision) {
      args.push('--revision', options.revision);
    }
    return args;
  }

  private run(action: CommandAction, args: string[], signal: AbortSignal | undefined): Promise<void> {
    const env: NodeJS.ProcessEnv = { ...process.env };
    if (this.token) {
      env['HF_TOKEN'] = this.token;
    }

    this.log.debug('Running hub command', { action, command: this.command, args: args.slice(0, 4) });

    return new Promise((resolve, reject) => {
      const proc = spawn(this.command, args, {
        stdio: ['ignore', 'pipe', 'pipe'],
        env,
        signal,
      });

      let output = '';
      proc.stdout?.on('data', (data: Buffer) => {
        output += data.toString();
      });
      proc.stderr?.on('data', (data: Buffer) => {
        output += data.toString();
      });

      proc.on('error', (error: Error) => {
        if (error.name === 'AbortError') {
          reject(error);
          return;
        }
        reject(new PublishError(`Failed to spawn ${this.command}: ${error.message}`, error));
      });

      proc.on('close', (code: number | null) => {
        if (code === 0) {
          resolve();
        } else {
          reject(commandFailure(action, code, output));
        }
      });
    });
  }
}

type CommandAction = 'upload' | 'download';

/** Output of a hub request rejected for missing or insufficient credentials */
const AUTH_FAILURE = /\b(401|403)\b|unauthorized|forbidden|invalid (user )?token/i;

/** Output of a request for a repository, revision or file that does not exist */
const NOT_FOUND = /repository not found|revision not found|entry not found|\b404\b/i;

/**
 * Error for a failed `huggingface-cli` run.
 *
 * Rejected credentials and missing repositories cannot succeed on retry.
 * A missing file or revision on download is a RemoteError. Anything else
 * is treated as transient.
 */
export function commandFailure(action: CommandAction, code: number | null, output: string): Error {
  const detail = `${action} failed with code ${code}: ${output.trim().slice(-500)}`;

  if (AUTH_FAILURE.test(output)) {
    return new PublishError(`Hub rejected the credentials: ${detail}`);
  }
  if (NOT_FOUND.test(output)) {
    return action === 'download' ? new RemoteError(detail, 404) : new PublishError(detail);
  }
  return new TransientError(detail);
}

// ============================================================================
// Local directory
// ============================================================================

/** Directory of a LocalDatasetStore holding branches other than main */
export const LOCAL_REVISIONS_DIR = '.revisions';

export class LocalDatasetStore implements DatasetStore {
  readonly description: string;

  constructor(private readonly rootDir: string) {
    this.description = `local:${rootDir}`;
  }

  /**
   * Location of `pathInRepo` on a revision; main is the root itself
   */
  resolve(pathInRepo: string, revision?: string): string {
    if (!revision || revision === 'main') {
      return join(this.rootDir, pathInRepo);
    }
    return join(this.rootDir, LOCAL_REVISIONS_DIR, revision, pathInRepo);
  }

  /**
   * Copy the folder into a staging directory, then swap it into place.
   * Existing files not matched by the delete pattern are carried over.
   */
  async uploadFolder(localDir: string, pathInRepo: string, options: UploadOptions): Promise<void> {
    const target = this.resolve(pathInRepo, options.revision);
    const suffix = `${process.pid}-${Date.now()}`;
    const staging = `${target}.staging-${suffix}`;
    const previous = `${target}.previous-${suffix}`;
    const deletes = options.deletePattern ? globToRegExp(options.deletePattern) : null;

    await mkdir(staging, { recursive: true });
    try {
      for (const name of await listFiles(target)) {
        if (!deletes || !deletes.test(name)) {
          await copyFile(join(target, name), join(staging, name));
        }
      }
      for (const name of await listFiles(localDir)) {
        throwIfAborted(options.signal);
        await copyFile(join(localDir, name), join(staging, name));
      }
    } catch (error) {
      await rm(staging, { recursive: true, force: true });
      throw error;
    }

    const hadTarget = await exists(target);
    if (hadTarget) {
      await rename(target, previous);
    }
    await rename(staging, target);
    if (hadTarget) {
      await rm(previous, { recursive: true, force: true });
    }
  }

  async uploadFile(localPath: string, pathInRepo: string, options: UploadOptions): Promise<void> {
    throwIfAborted(options.signal);
    await copyInto(localPath, this.resolve(pathInRepo, options.revision));
  }

  async downloadFile(pathInRepo: string, destPath: string, options: StoreDownloadOptions): Promise<void> {
    throwIfAborted(options.signal);
    const source = this.resolve(pathInRepo, options.revision);
    if (!(await exists(source))) {
      throw new RemoteError(`${pathInRepo} not found in ${this.description} (${options.revision ?? 'main'})`, 404);
    }
    await copyInto(source, destPath);
  }
}

/**
 * Copy a file through a temporary sibling so `target` is never partial
 */
async function copyInto(source: string, target: string): Promise<void> {
  const tmpPath = `${target}.${process.pid}.tmp`;

  await mkdir(dirname(target), { recursive: true });
  try {
    await copyFile(source, tmpPath);
    await rename(tmpPath, target);
  } catch (error) {
    await rm(tmpPath, { force: true });
    throw error;
  }
}

/**
 * Convert a simple glob (`*` and `?` only) to an anchored RegExp
 */
export function globToRegExp(pattern: string): RegExp {
  const source = pattern
    .split('')
    .map((char) => {
      if (char === '*') return '.*';
      if (char === '?') return '.';
      return char.replace(/[.+^${}()|[\]\\]/g, '\\$&');
    })
    .join('');
  return new RegExp(`^${source}$`);
}

async function listFiles(dir: string): Promise<string[]> {
  try {
    const entries = await readdir(dir, { withFileTypes: true });
    return entries.filter((entry) => entry.isFile()).map((entry) => entry.name).sort();
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return [];
    }
    throw error;
  }
}

async function exists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return false;
    }
    throw error;
  }
}
