/**
 * Structured logger
 *
 * Lines carry the module context and, inside a sync run, the run id.
 * A logger scoped with `forSource` adds the dump name and category as
 * top-level fields, so one source can be followed through a whole run.
 *
 * LOG_LEVEL selects the minimum level (debug, info, warn, error) and
 * LOG_FORMAT=json switches to one JSON object per line.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { randomUUID } from 'node:crypto';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogFormat = 'text' | 'json';

const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.prototype.hasOwnProperty.call(LOG_LEVEL_VALUES, value);
}

// ============================================================================
// Run context
// ============================================================================

const runIds = new AsyncLocalStorage<string>();

export function generateRunId(): string {
  return randomUUID();
}

/**
 * Run `fn` with every log line inside it tagged with `runId`
 */
export function withRunContext<T>(runId: string, fn: () => Promise<T>): Promise<T> {
  return runIds.run(runId, fn);
}

/** Id of the sync run the caller is part of, if any */
export function currentRunId(): string | undefined {
  return runIds.getStore();
}

// ============================================================================
// Entries
// ============================================================================

/** The dump a log line is about */
export interface SourceScope {
  source: string;
  category: string;
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  /** Module that wrote the line, e.g. "ingest:fetcher" */
  context: string;
  message: string;
  runId?: string;
  source?: string;
  category?: string;
  data?: Record<string, unknown>;
  /** Stack of an `error` field, when it held an Error */
  stack?: string;
}

const COLORS = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  magenta: '\x1b[35m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
} as const;

const LEVEL_STYLES: Record<LogLevel, { color: string; label: string }> = {
  debug: { color: COLORS.gray, label: 'DEBUG' },
  info: { color: COLORS.blue, label: 'INFO ' },
  warn: { color: COLORS.yellow, label: 'WARN ' },
  error: { color: COLORS.red, label: 'ERROR' },
};

function formatText(entry: LogEntry, timestamps: boolean): string {
  const parts: string[] = [];

  if (timestamps) {
    const time = new Date(entry.timestamp).toLocaleTimeString('en-US', {
      hour12: false,
      hour: '2-digit',
      minute: '2-digit',
      second: '2-digit',
    });
    parts.push(`${COLORS.dim}${time}${COLORS.reset}`);
  }

  const style = LEVEL_STYLES[entry.level];
  parts.push(`${style.color}${style.label}${COLORS.reset}`);

  if (entry.runId) {
    parts.push(`${COLORS.dim}[${entry.runId.slice(0, 8)}]${COLORS.reset}`);
  }
  parts.push(`${COLORS.cyan}[${entry.context}]${COLORS.reset}`);
  if (entry.source) {
    parts.push(`${COLORS.magenta}${entry.source}${COLORS.reset}`);
  }

  parts.push(entry.message);

  if (entry.data && Object.keys(entry.data).length > 0) {
    const fields = Object.entries(entry.data)
      .map(([key, value]) => `${key}=${JSON.stringify(value)}`)
      .join(' ');
    parts.push(`${COLORS.dim}${fields}${COLORS.reset}`);
  }

  const line = parts.join(' ');
  return entry.stack ? `${line}\n${COLORS.dim}${entry.stack}${COLORS.reset}` : line;
}

// ============================================================================
// Logger
// ============================================================================

export interface LoggerOptions {
  context: string;
  /** Minimum level (default: LOG_LEVEL, else debug in development and info otherwise) */
  level?: LogLevel | undefined;
  /** Output format (default: LOG_FORMAT, else json in production and text otherwise) */
  format?: LogFormat | undefined;
  timestamps?: boolean | undefined;
  scope?: SourceScope | undefined;
}

export class Logger {
  readonly context: string;
  readonly level: LogLevel;
  readonly format: LogFormat;
  readonly scope: SourceScope | undefined;
  private readonly timestamps: boolean;

  constructor(options: LoggerOptions) {
    this.context = options.context;
    this.level = options.level ?? levelFromEnv();
    this.format = options.format ?? formatFromEnv();
    this.timestamps = options.timestamps ?? true;
    this.scope = options.scope;
  }

  /**
   * Logger for one dump; every line names the dump and its category
   */
  forSource(source: { name: string; category: string }): Logger {
    return new Logger({
      context: this.context,
      level: this.level,
      format: this.format,
      timestamps: this.timestamps,
      scope: { source: source.name, category: source.category },
    });
  }

  isEnabled(level: LogLevel): boolean {
    return LOG_LEVEL_VALUES[level] >= LOG_LEVEL_VALUES[this.level];
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log('debug', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log('info', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log('warn', message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.log('error', message, data);
  }

  private log(level: LogLevel, message: string, data: Record<string, unknown> | undefined): void {
    if (!this.isEnabled(level)) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      context: this.context,
      message,
    };

    const runId = currentRunId();
    if (runId) {
      entry.runId = runId;
    }
    if (this.scope) {
      entry.source = this.scope.source;
      entry.category = this.scope.category;
    }

    if (data) {
      const error = data['error'];
      if (error instanceof Error) {
        if (error.stack) {
          entry.stack = error.stack;
        }
        entry.data = { ...data, error: error.message };
      } else {
        entry.data = data;
      }
    }

    const output = this.format === 'json' ? JSON.stringify(entry) : formatText(entry, this.timestamps);

    // Keep stdout for progress and results
    if (level === 'error' || level === 'warn') {
      console.error(output);
    } else {
      console.log(output);
    }
  }
}

function levelFromEnv(): LogLevel {
  const level = process.env['LOG_LEVEL']?.toLowerCase();
  if (isLogLevel(level)) {
    return level;
  }
  return process.env['NODE_ENV'] === 'development' ? 'debug' : 'info';
}

function formatFromEnv(): LogFormat {
  const format = process.env['LOG_FORMAT']?.toLowerCase();
  if (format === 'json' || format === 'text') {
    return format;
  }
  return process.env['NODE_ENV'] === 'production' ? 'json' : 'text';
}

const cache = new Map<string, Logger>();

/**
 * Shared logger for a module context
 */
export function createLogger(context: string): Logger {
  let logger = cache.get(context);
  if (!logger) {
    logger = new Logger({ context });
    cache.set(context, logger);
  }
  return logger;
}
