/**
 * Status Command
 *
 * Show what the manifest says was last published for each dump.
 */

import { Command } from 'commander';
import { color, fatal, formatNumber, formatTable, loadSettings } from './utils.js';
import { createDumpSources } from '../ingest/sources.js';
import { ManifestStore } from '../storage/manifest.js';
import { errorMessage } from '../lib/errors.js';

/** Status command options */
interface StatusOptions {
  json: boolean;
}

export const statusCommand = new Command('status')
  .description('Show the last published state of each dump')
  .option('--json', 'Output the manifest as JSON', false)
  .action(async (options: StatusOptions) => {
    try {
      const settings = await loadSettings();
      const manifest = await ManifestStore.load(settings.manifestPath);

      if (options.json) {
        console.log(JSON.stringify(manifest.toJSON(), null, 2));
        return;
      }

      const known = createDumpSources(settings.baseUrl).map((source) => source.name);
      const names = [...new Set([...known, ...manifest.names()])];

      const rows = names.map((name) => {
        const entry = manifest.lookup(name);
        if (!entry) {
          return { source: name, signature: color.gray('never published'), processed: '', rows: '', skipped: '', segments: '' };
        }
        return {
          source: name,
          signature: entry.signature,
          processed: entry.processedAt,
          rows: formatNumber(entry.rows),
          skipped: formatNumber(entry.skipped),
          segments: String(entry.segments),
        };
      });

      console.log(`\n  Manifest: ${color.cyan(settings.manifestPath)}\n`);
      console.log(formatTable(rows, ['source', 'signature', 'processed', 'rows', 'skipped', 'segments']));
      console.log('');
    } catch (error) {
      fatal(errorMessage(error));
    }
  });
