/**
 * Convert Command
 *
 * Convert a dump downloaded by `ol-mirror fetch` into Parquet segments and
 * publish them.
 */

import { Command } from 'commander';
import {
  color,
  createShutdownSignal,
  createSpinner,
  createRetry,
  createStore,
  fatal,
  formatDuration,
  formatNumber,
  loadSettings,
  resolvePath,
} from './utils.js';
import { createPipelineContext, processArtifact, withWorkDir } from '../ingest/pipeline.js';
import { discardArtifact, loadFetchedArtifact } from '../ingest/fetcher.js';
import { ManifestStore } from '../storage/manifest.js';
import { errorMessage } from '../lib/errors.js';
import { generateRunId, withRunContext } from '../lib/logger.js';

/** Convert command options */
interface ConvertOptions {
  keep: boolean;
}

export const convertCommand = new Command('convert')
  .description('Convert a fetched dump to Parquet and publish it')
  .argument('<file>', 'Dump file written by the fetch command')
  .option('--keep', 'Keep the dump and the work directory afterwards', false)
  .action(async (file: string, options: ConvertOptions) => {
    const shutdown = createShutdownSignal();
    const startTime = Date.now();
    let spinner: ReturnType<typeof createSpinner> | null = null;

    try {
      const settings = await loadSettings();
      const artifact = await loadFetchedArtifact(resolvePath(file));
      const manifest = await ManifestStore.load(settings.manifestPath);

      console.log('\n  Open Library Convert\n');
      console.log(`  Dump:       ${color.cyan(artifact.path)}`);
      console.log(`  Signature:  ${color.cyan(artifact.descriptor.signature)}`);
      console.log(`  Store:      ${color.cyan(settings.store)}\n`);

      const activeSpinner = createSpinner('Converting...');
      spinner = activeSpinner;

      const result = await withRunContext(generateRunId(), () =>
        withWorkDir(settings.dataDir, options.keep, (workDir) => {
          const context = createPipelineContext({
            manifest,
            store: createStore(settings),
            datasetId: settings.datasetId,
            workDir,
            batchRows: settings.batchRows,
            batchBytes: settings.batchBytes,
            retry: createRetry(settings),
            signal: shutdown.signal,
            keep: options.keep,
            onStateChange: ({ to }) => activeSpinner.update(`${to}...`),
          });
          return processArtifact(context, artifact);
        })
      );

      if (!options.keep) {
        await discardArtifact(artifact.path);
      }

      const elapsed = (Date.now() - startTime) / 1000;
      activeSpinner.success('Published');
      console.log(`  Rows:       ${formatNumber(result.rows)}`);
      console.log(`  Skipped:    ${formatNumber(result.skipped)}`);
      console.log(`  Segments:   ${result.segments}`);
      console.log(`  Artifact:   ${color.cyan(result.entry.artifact)}`);
      console.log(`  Time:       ${formatDuration(elapsed)}\n`);
    } catch (error) {
      spinner?.fail('Conversion failed');
      fatal(errorMessage(error));
    } finally {
      shutdown.dispose();
    }
  });
