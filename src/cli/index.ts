#!/usr/bin/env node

import { Command, CommanderError } from 'commander';
import { OutputFormatter, OutputFormat } from './utils/output.js';
import { ENV_LOG_LEVEL } from '../constants/hitlist-constants.js';
import { createRankCommand } from './commands/rank.js';
import { createBenchCommand } from './commands/bench.js';

const program = new Command();
const output = new OutputFormatter();

program
  .name('ranked-hits')
  .description('Merge, rank and threshold scored hit lists from search workers')
  .version('1.0.0')
  .option('--json', 'Output results in JSON format')
  .option('-v, --verbose', 'Enable verbose logging')
  .option('-q, --quiet', 'Suppress non-error output')
  .hook('preAction', (thisCommand) => {
    const opts = thisCommand.opts<{ json?: boolean; verbose?: boolean; quiet?: boolean }>();
    if (opts.json) {
      output.setFormat(OutputFormat.JSON);
    }

    if (opts.verbose) {
      process.env[ENV_LOG_LEVEL] = 'debug';
    }
    if (opts.quiet) {
      process.env[ENV_LOG_LEVEL] = 'error';
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

program.addCommand(createRankCommand());
program.addCommand(createBenchCommand());

try {
  program.parse(process.argv);
} catch (error) {
  // --help and --version surface as CommanderError with exit code 0
  if (error instanceof CommanderError) {
    process.exit(error.exitCode);
  }
  output.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
}

export { program, output };
