/**
 * HTTP access to the dump host: signature lookup and resumable downloads
 */

import { open, rm, stat } from 'node:fs/promises';
import type {
  DownloadProgress,
  DumpSource,
  SourceDescriptor,
} from './types.js';
import {
  IntegrityError,
  RemoteError,
  TransientError,
  errorMessage,
  isAbortError,
  isTypedError,
} from '../lib/errors.js';
import {
  createRetryPolicy,
  throwIfAborted,
  withRetry,
  type RetryEvent,
  type RetryPolicy,
} from '../lib/retry.js';
import { CONNECT_TIMEOUT_MS, HEAD_TIMEOUT_MS, READ_IDLE_TIMEOUT_MS } from '../lib/constants.js';
import { createLogger } from '../lib/logger.js';

const getLog = () => createLogger('ingest:download');

/** Progress reporting interval in milliseconds */
const PROGRESS_INTERVAL_MS = 1000;

/** Options shared by remote operations */
export interface RemoteOptions {
  /** Retry policy (defaults to createRetryPolicy()) */
  retry?: RetryPolicy | undefined;
  /** AbortSignal for cancellation */
  signal?: AbortSignal | undefined;
  /** Called before each retry */
  onRetry?: ((event: RetryEvent) => void) | undefined;
  /** Replaceable sleep for retries */
  sleep?: ((ms: number) => Promise<void>) | undefined;
}

/** Options for downloadToFile */
export interface DownloadOptions extends RemoteOptions {
  /** Progress callback */
  onProgress?: ((progress: DownloadProgress) => void) | undefined;
  /** Time allowed for the server to answer a GET with headers */
  connectTimeoutMs?: number | undefined;
  /** Longest wait for the next body chunk */
  idleTimeoutMs?: number | undefined;
}

/**
 * Inspect a dump with a HEAD request and return its remote identity.
 *
 * @example
 * ```typescript
 * const descriptor = await describeRemote(source);
 * console.log(descriptor.signature); // "Tue, 01 Oct 2024 08:15:02 GMT"
 * ```
 */
export async function describeRemote(
  source: DumpSource,
  options: RemoteOptions = {}
): Promise<SourceDescriptor> {
  const policy = options.retry ?? createRetryPolicy();

  const headers = await withRetry(
    policy,
    async () => {
      const response = await request(source.url, {
        method: 'HEAD',
        redirect: 'follow',
        signal: withTimeout(options.signal, HEAD_TIMEOUT_MS),
      }, options.signal);
      await checkStatus(response, source.url);
      return response.headers;
    },
    { signal: options.signal, onRetry: options.onRetry, sleep: options.sleep }
  );

  const lastModified = headers.get('Last-Modified') ?? undefined;
  const etag = headers.get('ETag') ?? undefined;
  const signature = lastModified ?? etag;

  if (!signature) {
    throw new RemoteError(`No Last-Modified or ETag header for ${source.url}`);
  }

  return {
    name: source.name,
    category: source.category,
    url: source.url,
    size: parseLength(headers.get('Content-Length')),
    signature,
    lastModified,
    etag,
  };
}

/**
 * Download a dump to `destPath`, verifying size and signature.
 *
 * Transient failures are retried under the policy; a retry after a broken
 * body resumes with a Range request when the server honours it. Integrity
 * failures delete the partial file so the next attempt starts from zero.
 *
 * @returns Number of bytes on disk
 */
export async function downloadToFile(
  descriptor: SourceDescriptor,
  destPath: string,
  options: DownloadOptions = {}
): Promise<number> {
  const policy = options.retry ?? createRetryPolicy();
  let resumable = false;

  return withRetry(
    policy,
    async () => {
      const offset = resumable ? await fileSize(destPath) : 0;
      resumable = false;

      try {
        return await attemptDownload(descriptor, destPath, offset, options);
      } catch (error) {
        if (error instanceof TransientError) {
          resumable = true;
        } else {
          await rm(destPath, { force: true });
        }
        throw error;
      }
    },
    { signal: options.signal, onRetry: options.onRetry, sleep: options.sleep }
  );
}

/**
 * Single download attempt starting at `offset`
 */
async function attemptDownload(
  descriptor: SourceDescriptor,
  destPath: string,
  offset: number,
  options: DownloadOptions
): Promise<number> {
  const headers: Record<string, string> = {};
  if (offset > 0) {
    headers['Range'] = `bytes=${offset}-`;
  }

  const response = await connect(descriptor.url, headers, options);
  await checkStatus(response, descriptor.url);

  // A server that ignores Range sends the whole file again
  const append = offset > 0 && response.status === 206;
  let bytesDownloaded = append ? offset : 0;

  const remoteSignature = response.headers.get('Last-Modified') ?? response.headers.get('ETag');
  if (remoteSignature && remoteSignature !== descriptor.signature) {
    await discardBody(response.body);
    throw new IntegrityError(`Remote changed during download of ${descriptor.name}`, {
      expected: descriptor.signature,
      actual: remoteSignature,
    });
  }

  const body = response.body;
  if (!body) {
    throw new TransientError('Response body is null');
  }

  const startTime = Date.now();
  let lastProgressTime = startTime;
  const report = (): void => {
    const elapsedMs = Date.now() - startTime;
    options.onProgress?.({
      bytesDownloaded,
      totalBytes: descriptor.size,
      bytesPerSecond: elapsedMs > 0 ? (bytesDownloaded - offset) / (elapsedMs / 1000) : 0,
      elapsedMs,
    });
  };

  const idleTimeoutMs = options.idleTimeoutMs ?? READ_IDLE_TIMEOUT_MS;
  const handle = await open(destPath, append ? 'a' : 'w');
  const reader = body.getReader();

  try {
    while (true) {
      const { done, value } = await nextChunk(() => reader.read(), idleTimeoutMs, options.signal);
      if (done) {
        break;
      }

      await handle.write(value);
      bytesDownloaded += value.byteLength;

      const now = Date.now();
      if (now - lastProgressTime >= PROGRESS_INTERVAL_MS) {
        lastProgressTime = now;
        report();
      }
    }
  } catch (error) {
    await reader.cancel().catch((cancelError: unknown) => {
      getLog().debug('Cancelling response body failed', { url: descriptor.url, error: errorMessage(cancelError) });
    });
    if (isAbortError(error) || isTypedError(error)) {
      throw error;
    }
    throw new TransientError(
      `Download of ${descriptor.name} interrupted at ${bytesDownloaded} bytes: ${errorMessage(error)}`,
      { cause: error }
    );
  } finally {
    reader.releaseLock();
    await handle.close();
  }

  report();

  if (descriptor.size !== undefined && bytesDownloaded !== descriptor.size) {
    throw new IntegrityError(`Size mismatch for ${descriptor.name}`, {
      expected: descriptor.size,
      actual: bytesDownloaded,
    });
  }

  return bytesDownloaded;
}

/**
 * GET `url`, giving up with a TransientError when no response headers
 * arrive within the connect timeout
 */
async function connect(
  url: string,
  headers: Record<string, string>,
  options: DownloadOptions
): Promise<Response> {
  const timeoutMs = options.connectTimeoutMs ?? CONNECT_TIMEOUT_MS;
  const timeout = new AbortController();
  const timer = setTimeout(() => {
    timeout.abort(new TransientError(`No response from ${url} within ${timeoutMs} ms`));
  }, timeoutMs);

  // The timer is cleared once headers arrive, so the body is not cut off
  const signal = options.signal ? AbortSignal.any([options.signal, timeout.signal]) : timeout.signal;
  try {
    return await request(url, { headers, signal }, options.signal);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Read the next body chunk, failing with a TransientError when nothing
 * arrives for `idleTimeoutMs`
 */
function nextChunk<T>(read: () => Promise<T>, idleTimeoutMs: number, signal: AbortSignal | undefined): Promise<T> {
  throwIfAborted(signal);

  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => {
      cleanup();
      reject(new DOMException('Download aborted', 'AbortError'));
    };
    const timer = setTimeout(() => {
      cleanup();
      reject(new TransientError(`No data received for ${idleTimeoutMs} ms`));
    }, idleTimeoutMs);
    const cleanup = (): void => {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    };

    signal?.addEventListener('abort', onAbort, { once: true });
    read().then(
      (result) => {
        cleanup();
        resolve(result);
      },
      (error: unknown) => {
        cleanup();
        reject(error);
      }
    );
  });
}

/**
 * fetch() with network failures mapped to TransientError
 */
async function request(
  url: string,
  init: RequestInit,
  signal: AbortSignal | undefined
): Promise<Response> {
  try {
    return await fetch(url, init);
  } catch (error) {
    if (signal?.aborted) {
      throw new DOMException('Download aborted', 'AbortError');
    }
    if (isTypedError(error)) {
      throw error;
    }
    throw new TransientError(`Request to ${url} failed: ${errorMessage(error)}`, { cause: error });
  }
}

/**
 * Classify HTTP status codes; the body of a failed response is released
 */
async function checkStatus(response: Response, url: string): Promise<void> {
  if (response.ok) {
    return;
  }

  await discardBody(response.body);

  const { status, statusText } = response;
  if (status === 408 || status === 429 || status >= 500) {
    throw new TransientError(`Server error: ${status} ${statusText} (${url})`, { status });
  }
  throw new RemoteError(`Client error: ${status} ${statusText} (${url})`, status);
}

async function discardBody(body: Response['body']): Promise<void> {
  if (!body) {
    return;
  }
  await body.cancel().catch((error: unknown) => {
    getLog().debug('Cancelling response body failed', { error: errorMessage(error) });
  });
}

function parseLength(value: string | null): number | undefined {
  if (!value) {
    return undefined;
  }
  const length = parseInt(value, 10);
  return Number.isFinite(length) && length >= 0 ? length : undefined;
}

function withTimeout(signal: AbortSignal | undefined, ms: number): AbortSignal {
  const timeout = AbortSignal.timeout(ms);
  return signal ? AbortSignal.any([signal, timeout]) : timeout;
}

async function fileSize(path: string): Promise<number> {
  try {
    return (await stat(path)).size;
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return 0;
    }
    throw error;
  }
}
