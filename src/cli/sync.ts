/**
 * Sync Command
 *
 * Fetch, convert and publish every dump that changed since the last run.
 */

import { Command } from 'commander';
import {
  color,
  createDownloadReporter,
  createShutdownSignal,
  createRetry,
  createStore,
  fatal,
  formatNumber,
  formatTable,
  loadSettings,
  selectSources,
} from './utils.js';
import { runSync, type SourceReport } from '../ingest/pipeline.js';
import { ManifestStore } from '../storage/manifest.js';
import { errorMessage } from '../lib/errors.js';

/** Sync command options */
interface SyncOptions {
  only?: string;
  keep: boolean;
  dryRun: boolean;
  /** False with --no-backup */
  backup: boolean;
}

export const syncCommand = new Command('sync')
  .description('Fetch, convert and publish every dump that changed')
  .option('--only <files>', 'Restrict to these dump files (comma-separated)')
  .option('--keep', 'Keep the work directory after the run', false)
  .option('--dry-run', 'Only report which dumps changed', false)
  .option('--no-backup', 'Do not back up downloaded dumps or restore them from the backup')
  .action(async (options: SyncOptions) => {
    const shutdown = createShutdownSignal();

    try {
      const settings = await loadSettings();
      const sources = selectSources(settings, options.only);
      const manifest = await ManifestStore.load(settings.manifestPath);
      const progress = createDownloadReporter();

      console.log('\n  Open Library Sync\n');
      console.log(`  Dataset:   ${color.cyan(settings.datasetId)}`);
      console.log(`  Store:     ${color.cyan(settings.store)}`);
      console.log(`  Manifest:  ${color.cyan(settings.manifestPath)}`);
      console.log(`  Sources:   ${color.cyan(sources.map((s) => s.name).join(', '))}`);
      if (options.dryRun) {
        console.log(color.yellow('\n  Dry run mode - nothing will be downloaded or published.'));
      }
      console.log('');

      const report = await runSync({
        dataDir: settings.dataDir,
        sources,
        manifest,
        store: createStore(settings),
        datasetId: settings.datasetId,
        batchRows: settings.batchRows,
        batchBytes: settings.batchBytes,
        retry: createRetry(settings),
        signal: shutdown.signal,
        keep: options.keep,
        dryRun: options.dryRun,
        backupRaw: options.backup && settings.backupRaw,
        onDownloadProgress: progress.update,
      });
      progress.finish();

      printSourceReports(report.sources);

      if (report.aborted) {
        console.log(color.warning('\n  Run cancelled; remaining sources were not processed.\n'));
      }
      if (report.failed > 0 || report.aborted) {
        process.exitCode = 1;
      }
    } catch (error) {
      fatal(errorMessage(error));
    } finally {
      shutdown.dispose();
    }
  });

/**
 * Print one line per source
 */
export function printSourceReports(reports: readonly SourceReport[]): void {
  if (reports.length === 0) {
    console.log(color.dim('  No sources handled.\n'));
    return;
  }

  const rows = reports.map((report) => {
    switch (report.status) {
      case 'unchanged':
        return { source: report.source, status: color.gray('unchanged'), detail: report.signature };
      case 'stale':
        return {
          source: report.source,
          status: color.yellow('changed'),
          detail: `${report.previous ?? 'never published'} -> ${report.signature}`,
        };
      case 'published':
        return {
          source: report.source,
          status: color.green('published'),
          detail: `${formatNumber(report.rows)} rows, ${formatNumber(report.skipped)} skipped, ${report.segments} segments`,
        };
      case 'failed':
        return {
          source: report.source,
          status: color.red(`failed (${report.stage})`),
          detail: `${report.error}${report.skipped > 0 ? ` after ${formatNumber(report.skipped)} skipped` : ''}`,
        };
    }
  });

  console.log(formatTable(rows, ['source', 'status', 'detail']));
  console.log('');
}
