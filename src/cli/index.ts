#!/usr/bin/env node

import { Command, CommanderError } from 'commander';
import { OutputFormatter, OutputFormat } from './utils/output.js';
import { createBuildCommand } from './commands/build.js';
import { createStatusCommand } from './commands/status.js';
import { createClearCommand } from './commands/clear.js';
import { createSearchCommand } from './commands/search.js';

const program = new Command();
const output = new OutputFormatter();

program
  .name('qctx')
  .description('Semantic retrieval of example queries and field metadata')
  .version('0.1.0')
  .option('--queries <file>', 'Example queries JSON (defaults to the bundled set)')
  .option('--fields <file>', 'Field metadata JSON cache')
  .option('--cache-dir <dir>', 'Snapshot directory (overrides QCTX_CACHE_DIR)')
  .option('--env-file <file>', 'Load environment variables from this file')
  .option('--json', 'Output results in JSON format')
  .option('-v, --verbose', 'Enable verbose logging')
  .option('-q, --quiet', 'Suppress non-error output')
  .hook('preAction', (thisCommand) => {
    if (thisCommand.opts().json) {
      output.setFormat(OutputFormat.JSON);
    }
  });

program.exitOverride();

process.on('SIGINT', () => {
  console.log('\nOperation cancelled.');
  process.exit(130);
});

process.on('SIGTERM', () => {
  process.exit(143);
});

program.addCommand(createBuildCommand());
program.addCommand(createStatusCommand());
program.addCommand(createClearCommand());
program.addCommand(createSearchCommand());

try {
  await program.parseAsync(process.argv);
} catch (error) {
  if (error instanceof CommanderError) {
    // Help and version exit through here as well
    process.exitCode = error.exitCode;
  } else {
    output.error('Command failed', error);
    process.exitCode = 1;
  }
}
