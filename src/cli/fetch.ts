/**
 * Fetch Command
 *
 * Download changed dumps into the data directory without converting them.
 * The downloads can be converted later with `ol-mirror convert`.
 */

import { Command } from 'commander';
import { join } from 'node:path';
import {
  color,
  createDownloadReporter,
  createShutdownSignal,
  createRetry,
  createStore,
  fatal,
  formatBytes,
  formatTable,
  loadSettings,
  selectSources,
} from './utils.js';
import { createPipelineContext, ensureLocalArtifact } from '../ingest/pipeline.js';
import { ManifestStore } from '../storage/manifest.js';
import { errorMessage } from '../lib/errors.js';
import { generateRunId, withRunContext } from '../lib/logger.js';

/** Fetch command options */
interface FetchOptions {
  only?: string;
  dryRun: boolean;
  /** False with --no-backup */
  backup: boolean;
}

export const fetchCommand = new Command('fetch')
  .description('Download dumps that changed since the last published run')
  .option('--only <files>', 'Restrict to these dump files (comma-separated)')
  .option('--dry-run', 'Only report which dumps changed', false)
  .option('--no-backup', 'Do not back up downloaded dumps or restore them from the backup')
  .action(async (options: FetchOptions) => {
    const shutdown = createShutdownSignal();

    try {
      const settings = await loadSettings();
      const sources = selectSources(settings, options.only);
      const manifest = await ManifestStore.load(settings.manifestPath);
      const progress = createDownloadReporter();

      const context = createPipelineContext({
        manifest,
        store: createStore(settings),
        datasetId: settings.datasetId,
        workDir: settings.dataDir,
        retry: createRetry(settings),
        signal: shutdown.signal,
        keep: true,
        dryRun: options.dryRun,
        backupRaw: options.backup && settings.backupRaw,
        onDownloadProgress: progress.update,
      });

      const rows: Record<string, string>[] = [];
      let failed = 0;

      await withRunContext(generateRunId(), async () => {
        for (const source of sources) {
          if (shutdown.signal.aborted) {
            break;
          }
          try {
            const result = await ensureLocalArtifact(context, source);
            if (result.status === 'fetched') {
              const size = result.artifact.descriptor.size;
              rows.push({
                source: source.name,
                status: result.origin === 'backup' ? color.yellow('restored') : color.green('fetched'),
                detail: `${result.artifact.path}${size !== undefined ? ` (${formatBytes(size)})` : ''}`,
              });
            } else {
              rows.push({
                source: source.name,
                status: result.status === 'unchanged' ? color.gray('unchanged') : color.yellow('changed'),
                detail: result.descriptor.signature,
              });
            }
          } catch (error) {
            failed++;
            rows.push({ source: source.name, status: color.red('failed'), detail: errorMessage(error) });
          }
        }
      });
      progress.finish();

      console.log('');
      console.log(formatTable(rows, ['source', 'status', 'detail']));
      console.log('');
      if (!options.dryRun) {
        console.log(`  Downloads are in ${color.cyan(join(settings.dataDir, 'downloads'))}\n`);
      }

      if (failed > 0 || shutdown.signal.aborted) {
        process.exitCode = 1;
      }
    } catch (error) {
      fatal(errorMessage(error));
    } finally {
      shutdown.dispose();
    }
  });
