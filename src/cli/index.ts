#!/usr/bin/env node

import { Command, CommanderError } from 'commander';
import { OutputFormat, output } from './utils/output.js';
import { setConsoleLevel } from './utils/service.js';
import { createCatalogCommand } from './commands/catalog.js';
import { createDownloadCommand, createDownloadMonthCommand } from './commands/download.js';
import { createEstimateCommand } from './commands/estimate.js';
import { createCacheCommand } from './commands/cache.js';
import { createSubjectsCommand } from './commands/subjects.js';
import { createEmbedCommand } from './commands/embed.js';
import { createTopicsCommand } from './commands/topics.js';
import { createSearchCommand } from './commands/search.js';
import { createStatsCommand } from './commands/stats.js';

interface GlobalOptions {
  json?: boolean;
  verbose?: boolean;
  quiet?: boolean;
}

const program = new Command();

program
  .name('arxiv-cache')
  .description('Partitioned local cache and size estimator for the arXiv papers-by-subject dataset')
  .version('0.1.0')
  .option('--json', 'Output results in JSON format')
  .option('-v, --verbose', 'Enable verbose logging')
  .option('-q, --quiet', 'Suppress non-error output')
  .hook('preAction', (thisCommand) => {
    const opts = thisCommand.opts<GlobalOptions>();
    if (opts.json) {
      output.setFormat(OutputFormat.JSON);
    }

    if (opts.verbose) {
      setConsoleLevel('debug');
    }
    if (opts.quiet) {
      setConsoleLevel('error');
    }
  });

// Error handling
program.exitOverride();

process.on('SIGINT', () => {
  console.log('\nOperation cancelled.');
  process.exit(130);
});

process.on('SIGTERM', () => {
  process.exit(143);
});

program.addCommand(createCatalogCommand());
program.addCommand(createDownloadCommand());
program.addCommand(createDownloadMonthCommand());
program.addCommand(createEstimateCommand());
program.addCommand(createCacheCommand());
program.addCommand(createSubjectsCommand());
program.addCommand(createEmbedCommand());
program.addCommand(createTopicsCommand());
program.addCommand(createSearchCommand());
program.addCommand(createStatsCommand());

try {
  await program.parseAsync(process.argv);
} catch (error) {
  if (error instanceof CommanderError) {
    // Help and version exit through here with code 0
    process.exitCode = error.exitCode;
  } else {
    output.error('Command failed', error);
    process.exitCode = 1;
  }
}
