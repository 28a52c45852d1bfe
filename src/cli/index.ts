/**
 * CLI Module Exports
 *
 * Re-exports all CLI commands and utilities.
 */

// Commands
export { fetchCommand } from './fetch.js';
export { convertCommand } from './convert.js';
export { syncCommand, printSourceReports } from './sync.js';
export { statusCommand } from './status.js';

// Utilities
export {
  color,
  supportsColor,
  stripAnsi,
  createProgressBar,
  createSpinner,
  createDownloadReporter,
  createShutdownSignal,
  formatBytes,
  formatDuration,
  formatNumber,
  formatTable,
  loadConfig,
  loadSettings,
  resolveSettings,
  createStore,
  createRetry,
  selectSources,
  fatal,
  warn,
  info,
  parseList,
  resolvePath,
  CONFIG_FILE,
} from './utils.js';

export type {
  ProgressBarConfig,
  MirrorConfig,
  MirrorSettings,
  LoadConfigOptions,
} from './utils.js';
