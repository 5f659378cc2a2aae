#!/usr/bin/env node

import { Command, CommanderError } from 'commander';
import { output, OutputFormat } from './utils/output.js';
import { errorMessage } from '../lib/result-types.js';
import { createInitCommand } from './commands/init.js';
import { createIngestCommand } from './commands/ingest.js';
import { createChangesCommand } from './commands/changes.js';
import { createSearchCommand } from './commands/search.js';
import { createFeedbackCommand } from './commands/feedback.js';
import { createStatsCommand } from './commands/stats.js';

const program = new Command();

program
  .name('taste-store')
  .description('Personalized ingredient-quantity preferences backed by a vector index')
  .version('1.0.0')
  .option('--json', 'Output results in JSON format')
  .option('-v, --verbose', 'Enable verbose logging')
  .option('-q, --quiet', 'Suppress non-error output')
  .hook('preAction', (thisCommand) => {
    // Set output format based on global --json flag
    const opts = thisCommand.opts();
    if (opts['json']) {
      output.setFormat(OutputFormat.JSON);
    }

    // Verbose and quiet adjust the console log threshold read by the config
    if (opts['verbose']) {
      process.env['TASTE_LOG_LEVEL'] = 'debug';
    }
    if (opts['quiet']) {
      process.env['TASTE_LOG_LEVEL'] = 'error';
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

// Register commands
program.addCommand(createInitCommand());
program.addCommand(createIngestCommand());
program.addCommand(createChangesCommand());
program.addCommand(createSearchCommand());
program.addCommand(createFeedbackCommand());
program.addCommand(createStatsCommand());

program.parseAsync(process.argv).catch((error: unknown) => {
  if (error instanceof CommanderError) {
    // --help and --version arrive here with exit code 0
    process.exit(error.exitCode);
  }
  output.error(errorMessage(error));
  process.exit(1);
});
