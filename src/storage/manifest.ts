/**
 * Manifest Store
 *
 * The only state carried from one run to the next: for every dump file,
 * the signature that was last published and what was published for it.
 *
 * The file is read fully when the store is loaded and rewritten fully on
 * every commit, through a temporary file renamed over the original, so an
 * interrupted commit leaves the previous manifest intact.
 */

import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { z } from 'zod';
import { ConfigError } from '../lib/errors.js';
import { createLogger, type Logger } from '../lib/logger.js';

const getLog = () => createLogger('storage:manifest');

/** Current manifest file version */
export const MANIFEST_VERSION = 1;

const ManifestEntrySchema = z.object({
  /** Signature of the dump that was published */
  signature: z.string().min(1),
  /** Size of that dump in bytes */
  size: z.number().int().nonnegative().nullable(),
  /** ISO timestamp of the commit */
  processedAt: z.string(),
  /** Identity of the published artifact */
  artifact: z.string(),
  /** Rows written */
  rows: z.number().int().nonnegative(),
  /** Lines skipped as malformed or unmappable */
  skipped: z.number().int().nonnegative(),
  /** Number of Parquet segments */
  segments: z.number().int().nonnegative(),
});

const ManifestFileSchema = z.object({
  version: z.literal(MANIFEST_VERSION),
  sources: z.record(ManifestEntrySchema),
});

/**
 * Layout written by the earlier sync script: file name mapped to
 * { last_synced, source_last_modified, converted_chunks }.
 */
const LegacyManifestSchema = z.record(
  z
    .object({
      last_synced: z.string().optional(),
      source_last_modified: z.string().nullable().optional(),
      converted_chunks: z
        .record(z.object({ converted: z.boolean().optional() }).passthrough())
        .optional(),
    })
    .passthrough()
);

export type ManifestEntry = z.infer<typeof ManifestEntrySchema>;

export type ManifestFile = z.infer<typeof ManifestFileSchema>;

/** Fields supplied by the caller of commit */
export type ManifestCommit = Omit<ManifestEntry, 'processedAt'> & { processedAt?: string };

/** Options for ManifestStore.load */
export interface ManifestStoreOptions {
  /** Clock used for processedAt (testing) */
  now?: (() => Date) | undefined;
  /** Optional logger for dependency injection (testing) */
  logger?: Logger | undefined;
}

export class ManifestStore {
  private entries: ReadonlyMap<string, ManifestEntry>;
  private readonly now: () => Date;
  private readonly log: Logger;

  private constructor(
    readonly path: string,
    entries: Map<string, ManifestEntry>,
    options: ManifestStoreOptions
  ) {
    this.entries = entries;
    this.now = options.now ?? (() => new Date());
    this.log = options.logger ?? getLog();
  }

  /**
   * Load the manifest at `path`. A missing file yields an empty store.
   *
   * @throws {ConfigError} If the file exists but is not a valid manifest
   */
  static async load(path: string, options: ManifestStoreOptions = {}): Promise<ManifestStore> {
    let raw: string;
    try {
      raw = await readFile(path, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return new ManifestStore(path, new Map(), options);
      }
      throw error;
    }

    return new ManifestStore(path, parseManifest(raw, path), options);
  }

  /**
   * Create an empty store that has not been written yet
   */
  static empty(path: string, options: ManifestStoreOptions = {}): ManifestStore {
    return new ManifestStore(path, new Map(), options);
  }

  /**
   * Entry for a source, undefined if it was never published
   */
  lookup(sourceName: string): ManifestEntry | undefined {
    return this.entries.get(sourceName);
  }

  /**
   * Names of all sources with an entry
   */
  names(): string[] {
    return [...this.entries.keys()].sort();
  }

  /**
   * Replace the entry for a source and persist the manifest.
   *
   * Call only after the artifact has been durably published. If writing
   * the file fails, neither the file nor this store changes.
   */
  async commit(sourceName: string, commit: ManifestCommit): Promise<ManifestEntry> {
    const entry: ManifestEntry = {
      signature: commit.signature,
      size: commit.size,
      processedAt: commit.processedAt ?? this.now().toISOString(),
      artifact: commit.artifact,
      rows: commit.rows,
      skipped: commit.skipped,
      segments: commit.segments,
    };

    const next = new Map(this.entries);
    next.set(sourceName, entry);

    await writeAtomic(this.path, serialize(next));
    this.entries = next;

    this.log.info('Manifest committed', {
      source: sourceName,
      signature: entry.signature,
      artifact: entry.artifact,
    });

    return entry;
  }

  /**
   * Manifest in its file layout
   */
  toJSON(): ManifestFile {
    return {
      version: MANIFEST_VERSION,
      sources: Object.fromEntries(this.entries),
    };
  }
}

/**
 * Parse manifest text, migrating the legacy layout
 */
export function parseManifest(raw: string, path: string): Map<string, ManifestEntry> {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Manifest ${path} is not valid JSON: ${reason}`);
  }

  const current = ManifestFileSchema.safeParse(json);
  if (current.success) {
    return new Map(Object.entries(current.data.sources));
  }

  const legacy = LegacyManifestSchema.safeParse(json);
  if (legacy.success) {
    return migrateLegacy(legacy.data);
  }

  throw new ConfigError(`Manifest ${path} has an unknown layout`);
}

function migrateLegacy(legacy: z.infer<typeof LegacyManifestSchema>): Map<string, ManifestEntry> {
  const entries = new Map<string, ManifestEntry>();

  for (const [name, value] of Object.entries(legacy)) {
    const signature = value.source_last_modified;
    const converted = Object.values(value.converted_chunks ?? {}).some((chunk) => chunk.converted === true);

    // Entries never marked converted are reprocessed
    if (!signature || !converted) {
      continue;
    }

    entries.set(name, {
      signature,
      size: null,
      processedAt: value.last_synced ?? new Date(0).toISOString(),
      artifact: '',
      rows: 0,
      skipped: 0,
      segments: 0,
    });
  }

  return entries;
}

function serialize(entries: ReadonlyMap<string, ManifestEntry>): string {
  const file: ManifestFile = {
    version: MANIFEST_VERSION,
    sources: Object.fromEntries(entries),
  };
  return JSON.stringify(file, null, 2) + '\n';
}

/**
 * Write a file by renaming a fully written sibling over it
 */
export async function writeAtomic(path: string, contents: string): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  const tmpPath = `${path}.${process.pid}.${Date.now()}.tmp`;

  try {
    await writeFile(tmpPath, contents, 'utf-8');
    await rename(tmpPath, path);
  } catch (error) {
    await rm(tmpPath, { force: true });
    throw error;
  }
}
