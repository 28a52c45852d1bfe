#!/usr/bin/env node
/**
 * ol-mirror CLI
 *
 * Mirror the Open Library bulk exports into a Parquet dataset.
 */

import { Command } from 'commander';
import { fetchCommand } from './cli/fetch.js';
import { convertCommand } from './cli/convert.js';
import { syncCommand } from './cli/sync.js';
import { statusCommand } from './cli/status.js';
import { fatal } from './cli/utils.js';
import { errorMessage } from './lib/errors.js';

const program = new Command()
  .name('ol-mirror')
  .description('Mirror the Open Library bulk exports into a Parquet dataset')
  .version('0.1.0');

// Register commands
program.addCommand(fetchCommand);
program.addCommand(convertCommand);
program.addCommand(syncCommand);
program.addCommand(statusCommand);

program.parseAsync(process.argv).catch((error: unknown) => {
  fatal(errorMessage(error));
});
