/**
 * CLI Utilities
 *
 * Shared utilities for the ol-mirror CLI commands.
 */

import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { homedir } from 'node:os';
import { createLogger } from '../lib/logger.js';
import {
  type MirrorConfig,
  safeValidateMirrorConfig,
  formatValidationError,
} from '../lib/config-schema.js';
import { ConfigError, errorMessage } from '../lib/errors.js';
import { createRetryPolicy, type RetryPolicy } from '../lib/retry.js';
import {
  DEFAULT_BASE_URL,
  DEFAULT_BATCH_BYTES,
  DEFAULT_BATCH_ROWS,
  DEFAULT_DATASET_ID,
  DEFAULT_MAX_ATTEMPTS,
  DEFAULT_RETRY_DELAY_MS,
  MANIFEST_FILE,
} from '../lib/constants.js';
import { HuggingFaceCliStore, LocalDatasetStore, type DatasetStore } from '../export/store.js';
import { createDumpSources, findSource } from '../ingest/sources.js';
import type { DownloadProgress, DumpSource } from '../ingest/types.js';

const getLog = () => createLogger('cli');

/** ANSI color codes */
const colors = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  magenta: '\x1b[35m',
  cyan: '\x1b[36m',
  white: '\x1b[37m',
  gray: '\x1b[90m',
} as const;

/** Color output helpers */
export const color = {
  reset: (s: string) => `${colors.reset}${s}${colors.reset}`,
  bold: (s: string) => `${colors.bold}${s}${colors.reset}`,
  dim: (s: string) => `${colors.dim}${s}${colors.reset}`,
  red: (s: string) => `${colors.red}${s}${colors.reset}`,
  green: (s: string) => `${colors.green}${s}${colors.reset}`,
  yellow: (s: string) => `${colors.yellow}${s}${colors.reset}`,
  blue: (s: string) => `${colors.blue}${s}${colors.reset}`,
  magenta: (s: string) => `${colors.magenta}${s}${colors.reset}`,
  cyan: (s: string) => `${colors.cyan}${s}${colors.reset}`,
  white: (s: string) => `${colors.white}${s}${colors.reset}`,
  gray: (s: string) => `${colors.gray}${s}${colors.reset}`,
  success: (s: string) => `${colors.green}${colors.bold}${s}${colors.reset}`,
  error: (s: string) => `${colors.red}${colors.bold}${s}${colors.reset}`,
  warning: (s: string) => `${colors.yellow}${colors.bold}${s}${colors.reset}`,
  info: (s: string) => `${colors.cyan}${s}${colors.reset}`,
};

/** Check if color output is supported */
export function supportsColor(): boolean {
  if (process.env['NO_COLOR'] || process.env['FORCE_COLOR'] === '0') {
    return false;
  }
  if (process.env['FORCE_COLOR']) {
    return true;
  }
  return process.stdout.isTTY ?? false;
}

/** Strip ANSI codes from string */
export function stripAnsi(s: string): string {
  return s.replace(/\x1b\[[0-9;]*m/g, '');
}

/** Progress bar configuration */
export interface ProgressBarConfig {
  /** Total items to process */
  total: number;
  /** Bar width in characters */
  width?: number;
  /** Format string: :bar :current/:total :percent :eta */
  format?: string;
  /** Stream to write to */
  stream?: NodeJS.WriteStream;
  /** Clear on complete */
  clearOnComplete?: boolean;
  /** Show ETA */
  showEta?: boolean;
}

/**
 * Create a progress bar
 */
export function createProgressBar(config: ProgressBarConfig): {
  update: (current: number, tokens?: Record<string, string | number>) => void;
  complete: () => void;
  interrupt: (message: string) => void;
} {
  const {
    total,
    width = 40,
    format = '  :bar :percent | :current/:total | :rate/s | ETA :eta',
    stream = process.stderr,
    clearOnComplete = true,
    showEta = true,
  } = config;

  let startTime = 0;
  let lastCurrent = 0;
  let lastTime = 0;
  let smoothRate = 0;

  function render(current: number, tokens: Record<string, string | number> = {}): void {
    if (startTime === 0) {
      startTime = Date.now();
      lastTime = startTime;
    }

    const now = Date.now();
    const elapsed = (now - startTime) / 1000;

    // Calculate smoothed rate
    if (now - lastTime > 100) {
      const instantRate = (current - lastCurrent) / ((now - lastTime) / 1000);
      smoothRate = smoothRate === 0 ? instantRate : smoothRate * 0.8 + instantRate * 0.2;
      lastCurrent = current;
      lastTime = now;
    }

    const rate = smoothRate || (elapsed > 0 ? current / elapsed : 0);
    const percent = total > 0 ? current / total : 0;
    const remaining = total > 0 ? total - current : 0;
    const eta = rate > 0 ? remaining / rate : 0;

    // Build progress bar
    const filled = Math.round(width * percent);
    const empty = width - filled;
    const bar = color.green('█'.repeat(filled)) + color.gray('░'.repeat(empty));

    // Replace tokens in format
    let output = format
      .replace(':bar', bar)
      .replace(':current', formatNumber(current))
      .replace(':total', formatNumber(total))
      .replace(':percent', `${(percent * 100).toFixed(1)}%`.padStart(6))
      .replace(':rate', formatNumber(Math.round(rate)))
      .replace(':eta', showEta ? formatDuration(eta) : '')
      .replace(':elapsed', formatDuration(elapsed));

    // Apply custom tokens
    for (const [key, value] of Object.entries(tokens)) {
      output = output.replace(`:${key}`, String(value));
    }

    // Clear line and write
    stream.write(`\r${output}\x1b[K`);
  }

  function complete(): void {
    render(total);
    if (clearOnComplete) {
      stream.write('\r\x1b[K');
    } else {
      stream.write('\n');
    }
  }

  function interrupt(message: string): void {
    stream.write(`\r\x1b[K${message}\n`);
    if (lastCurrent > 0) {
      render(lastCurrent);
    }
  }

  return {
    update: render,
    complete,
    interrupt,
  };
}

/**
 * Spinner for indeterminate progress
 */
export function createSpinner(message: string, stream: NodeJS.WriteStream = process.stderr): {
  update: (msg: string) => void;
  success: (msg: string) => void;
  fail: (msg: string) => void;
  stop: () => void;
} {
  const frames = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'];
  let frameIndex = 0;
  let currentMessage = message;
  let interval: ReturnType<typeof setInterval> | null = null;

  function render(): void {
    const frame = color.cyan(frames[frameIndex] ?? '⠋');
    stream.write(`\r${frame} ${currentMessage}\x1b[K`);
    frameIndex = (frameIndex + 1) % frames.length;
  }

  // Start spinner
  interval = setInterval(render, 80);
  render();

  return {
    update(msg: string) {
      currentMessage = msg;
    },
    success(msg: string) {
      if (interval) clearInterval(interval);
      stream.write(`\r${color.green('✓')} ${msg}\x1b[K\n`);
    },
    fail(msg: string) {
      if (interval) clearInterval(interval);
      stream.write(`\r${color.red('✗')} ${msg}\x1b[K\n`);
    },
    stop() {
      if (interval) clearInterval(interval);
      stream.write('\r\x1b[K');
    },
  };
}

/**
 * Format bytes as human-readable string
 */
export function formatBytes(bytes: number): string {
  if (bytes === 0) return '0 B';
  const units = ['B', 'KB', 'MB', 'GB', 'TB'];
  const i = Math.floor(Math.log(bytes) / Math.log(1024));
  const value = bytes / Math.pow(1024, i);
  return `${value.toFixed(i === 0 ? 0 : 1)} ${units[i] ?? 'B'}`;
}

/**
 * Format duration as human-readable string
 */
export function formatDuration(seconds: number): string {
  if (!isFinite(seconds) || seconds < 0) return '--:--';
  if (seconds < 60) return `${Math.round(seconds)}s`;
  if (seconds < 3600) {
    const m = Math.floor(seconds / 60);
    const s = Math.round(seconds % 60);
    return `${m}m ${s}s`;
  }
  const h = Math.floor(seconds / 3600);
  const m = Math.floor((seconds % 3600) / 60);
  return `${h}h ${m}m`;
}

/**
 * Format number with commas
 */
export function formatNumber(n: number): string {
  return n.toLocaleString('en-US');
}

/**
 * Format table data
 */
export function formatTable(
  rows: Record<string, unknown>[],
  columns?: string[],
  options: { padding?: number; header?: boolean } = {}
): string {
  if (rows.length === 0) return '';

  const { padding = 2, header = true } = options;
  const firstRow = rows[0];
  const cols = columns || (firstRow ? Object.keys(firstRow) : []);

  // Calculate column widths
  const widths: Record<string, number> = {};
  for (const col of cols) {
    widths[col] = col.length;
    for (const row of rows) {
      const value = String(row[col] ?? '');
      const stripped = stripAnsi(value);
      const currentWidth = widths[col] ?? 0;
      widths[col] = Math.max(currentWidth, stripped.length);
    }
  }

  const lines: string[] = [];
  const pad = ' '.repeat(padding);

  // Header
  if (header) {
    const headerLine = cols.map((col) => color.bold(col.padEnd(widths[col] ?? 0))).join(pad);
    lines.push(`    ${headerLine}`);
    const separator = cols.map((col) => color.dim('─'.repeat(widths[col] ?? 0))).join(pad);
    lines.push(`    ${separator}`);
  }

  // Rows
  for (const row of rows) {
    const rowLine = cols
      .map((col) => {
        const value = String(row[col] ?? '');
        const stripped = stripAnsi(value);
        const padLength = (widths[col] ?? 0) - stripped.length;
        return value + ' '.repeat(Math.max(0, padLength));
      })
      .join(pad);
    lines.push(`    ${rowLine}`);
  }

  return lines.join('\n');
}

export type { MirrorConfig } from '../lib/config-schema.js';

/** Name of the configuration file */
export const CONFIG_FILE = '.olmirrorrc';

/** Environment variables mapped onto configuration fields */
const ENV_FIELDS: ReadonlyArray<{ env: string; field: keyof MirrorConfig; type?: 'number' | 'boolean' }> = [
  { env: 'OL_MIRROR_DATA_DIR', field: 'dataDir' },
  { env: 'OL_MIRROR_MANIFEST', field: 'manifestPath' },
  { env: 'OL_MIRROR_DATASET_ID', field: 'datasetId' },
  { env: 'OL_MIRROR_BASE_URL', field: 'baseUrl' },
  { env: 'OL_MIRROR_BATCH_ROWS', field: 'batchRows', type: 'number' },
  { env: 'OL_MIRROR_BATCH_BYTES', field: 'batchBytes', type: 'number' },
  { env: 'OL_MIRROR_MAX_RETRIES', field: 'maxRetries', type: 'number' },
  { env: 'OL_MIRROR_RETRY_DELAY_MS', field: 'retryDelayMs', type: 'number' },
  { env: 'OL_MIRROR_STORE', field: 'store' },
  { env: 'OL_MIRROR_LOCAL_STORE_DIR', field: 'localStoreDir' },
  { env: 'OL_MIRROR_BACKUP_RAW', field: 'backupRaw', type: 'boolean' },
];

/**
 * Convert an environment value to the field's type; values that do not
 * convert are kept as strings for validation to reject
 */
function parseEnvValue(value: string, type: 'number' | 'boolean' | undefined): unknown {
  if (type === 'number') {
    return Number(value);
  }
  if (type === 'boolean') {
    const normalized = value.trim().toLowerCase();
    if (normalized === 'true' || normalized === '1') return true;
    if (normalized === 'false' || normalized === '0') return false;
  }
  return value;
}

/** Where loadConfig looks */
export interface LoadConfigOptions {
  cwd?: string | undefined;
  home?: string | undefined;
  env?: NodeJS.ProcessEnv | undefined;
}

/**
 * Load configuration from .olmirrorrc or environment
 *
 * Configuration is loaded from (in order of precedence):
 * 1. OL_MIRROR_* environment variables (highest priority)
 * 2. .olmirrorrc in current directory
 * 3. .olmirrorrc in home directory (lowest priority)
 *
 * @returns Validated mirror configuration
 * @throws {ConfigError} If a file is not JSON or validation fails
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<MirrorConfig> {
  const env = options.env ?? process.env;
  const config: Record<string, unknown> = {};

  // Check for config file in order: current dir, home dir
  const configPaths = [
    join(options.cwd ?? process.cwd(), CONFIG_FILE),
    join(options.home ?? homedir(), CONFIG_FILE),
  ];

  for (const configPath of configPaths) {
    const data = await readOptionalFile(configPath);
    if (data === null) {
      continue;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(data);
    } catch (error) {
      throw new ConfigError(`${configPath} is not valid JSON: ${errorMessage(error)}`);
    }
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      throw new ConfigError(`${configPath} must contain a JSON object`);
    }
    Object.assign(config, parsed);
    break;
  }

  // Override with environment variables
  for (const { env: name, field, type } of ENV_FIELDS) {
    const value = env[name];
    if (value) {
      config[field] = parseEnvValue(value, type);
    }
  }

  // Validate configuration with Zod
  const result = safeValidateMirrorConfig(config);
  if (!result.success) {
    throw new ConfigError(`Invalid configuration:\n${formatValidationError(result.error)}`);
  }

  return result.data;
}

/** Configuration with every default filled in */
export interface MirrorSettings {
  dataDir: string;
  manifestPath: string;
  datasetId: string;
  baseUrl: string;
  batchRows: number;
  batchBytes: number;
  maxRetries: number;
  retryDelayMs: number;
  store: 'huggingface' | 'local';
  localStoreDir: string;
  /** Back up fetched dumps and restore them when the origin fails */
  backupRaw: boolean;
  /** Hugging Face access token from HF_TOKEN */
  hfToken: string | undefined;
}

/**
 * Apply defaults to a loaded configuration
 */
export function resolveSettings(config: MirrorConfig, env: NodeJS.ProcessEnv = process.env): MirrorSettings {
  const dataDir = resolvePath(config.dataDir ?? './data');

  return {
    dataDir,
    manifestPath: config.manifestPath ? resolvePath(config.manifestPath) : join(dataDir, MANIFEST_FILE),
    datasetId: config.datasetId ?? DEFAULT_DATASET_ID,
    baseUrl: config.baseUrl ?? DEFAULT_BASE_URL,
    batchRows: config.batchRows ?? DEFAULT_BATCH_ROWS,
    batchBytes: config.batchBytes ?? DEFAULT_BATCH_BYTES,
    maxRetries: config.maxRetries ?? DEFAULT_MAX_ATTEMPTS,
    retryDelayMs: config.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS,
    store: config.store ?? 'huggingface',
    localStoreDir: config.localStoreDir ? resolvePath(config.localStoreDir) : join(dataDir, 'dataset'),
    backupRaw: config.backupRaw ?? true,
    hfToken: env['HF_TOKEN'] || undefined,
  };
}

/**
 * Dataset store selected by the settings
 */
export function createStore(settings: MirrorSettings): DatasetStore {
  if (settings.store === 'local') {
    return new LocalDatasetStore(settings.localStoreDir);
  }
  return new HuggingFaceCliStore({ datasetId: settings.datasetId, token: settings.hfToken });
}

/**
 * Retry policy selected by the settings
 */
export function createRetry(settings: MirrorSettings): RetryPolicy {
  return createRetryPolicy({
    maxAttempts: settings.maxRetries,
    baseDelayMs: settings.retryDelayMs,
  });
}

/**
 * AbortController fired by SIGINT or SIGTERM. Call `dispose` when done.
 */
export function createShutdownSignal(): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();
  const onSignal = (name: NodeJS.Signals) => {
    warn(`Received ${name}, stopping after the current step...`);
    controller.abort();
  };

  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);

  return {
    signal: controller.signal,
    dispose: () => {
      process.off('SIGINT', onSignal);
      process.off('SIGTERM', onSignal);
    },
  };
}

async function readOptionalFile(path: string): Promise<string | null> {
  try {
    return await readFile(path, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return null;
    }
    throw error;
  }
}

/**
 * Print error message and exit
 */
export function fatal(message: string): never {
  getLog().error(message);
  console.error(`\n${color.error('Error:')} ${message}\n`);
  process.exit(1);
}

/**
 * Print warning message
 */
export function warn(message: string): void {
  getLog().warn(message);
  console.error(`${color.warning('Warning:')} ${message}`);
}

/**
 * Print info message
 */
export function info(message: string): void {
  getLog().info(message);
  console.log(`${color.info('Info:')} ${message}`);
}

/**
 * Parse comma-separated list
 */
export function parseList(value: string): string[] {
  return value
    .split(',')
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

/**
 * Resolve path relative to cwd or absolute
 */
export function resolvePath(p: string): string {
  if (p.startsWith('/') || p.startsWith('~')) {
    return p.replace('~', homedir());
  }
  return join(process.cwd(), p);
}

/**
 * Dump sources to handle, optionally restricted to a comma-separated list of file names
 */
export function selectSources(settings: MirrorSettings, only?: string): DumpSource[] {
  const sources = createDumpSources(settings.baseUrl);
  if (!only) {
    return sources;
  }

  return parseList(only).map((name) => {
    const source = findSource(sources, name);
    if (!source) {
      throw new ConfigError(
        `Unknown source: ${name}. Known sources: ${sources.map((s) => s.name).join(', ')}`
      );
    }
    return source;
  });
}

/**
 * Load the configuration and apply defaults
 */
export async function loadSettings(): Promise<MirrorSettings> {
  return resolveSettings(await loadConfig());
}

/**
 * Progress bars for downloads, one per source.
 * Nothing is drawn when stderr is not a terminal.
 */
export function createDownloadReporter(stream: NodeJS.WriteStream = process.stderr): {
  update: (source: string, progress: DownloadProgress) => void;
  finish: () => void;
} {
  const bars = new Map<string, ReturnType<typeof createProgressBar>>();

  return {
    update(source, progress) {
      if (!stream.isTTY || progress.totalBytes === undefined) {
        return;
      }
      let bar = bars.get(source);
      if (!bar) {
        bar = createProgressBar({
          total: progress.totalBytes,
          stream,
          format: `  ${source} :bar :percent | :size | ETA :eta`,
        });
        bars.set(source, bar);
      }
      bar.update(progress.bytesDownloaded, { size: formatBytes(progress.bytesDownloaded) });
    },
    finish() {
      for (const bar of bars.values()) {
        bar.complete();
      }
      bars.clear();
    },
  };
}
