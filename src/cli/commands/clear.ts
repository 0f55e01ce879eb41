/**
 * Clear Command
 *
 * Deletes snapshots and metadata so the next build starts from scratch.
 * Works by collection name; no corpus or model is loaded.
 */

import { Command } from 'commander';
import { OutputFormatter, OutputFormat } from '../utils/output.js';
import { globalOptions, openSnapshots } from '../utils/context.js';
import { clearCollection, knownCollections } from '../../services/cache/snapshot-admin.js';

export function createClearCommand(): Command {
  return new Command('clear')
    .description('Delete cached snapshots')
    .argument('[collections...]', 'Collections to clear (all when omitted)')
    .action(async (names: string[], _options: Record<string, never>, command: Command) => {
      const globals = globalOptions(command);
      const formatter = new OutputFormatter(globals.json ? OutputFormat.JSON : OutputFormat.HUMAN);

      const opened = openSnapshots(globals);
      if (opened.isErr()) {
        formatter.error('Clear failed', opened.error);
        process.exitCode = 1;
        return;
      }

      const { vectorIndex, logger } = opened.value;
      let targets = names;
      if (targets.length === 0) {
        const known = knownCollections(vectorIndex.metadataStore);
        if (known.isErr()) {
          formatter.error('Clear failed', known.error);
          process.exitCode = 1;
          return;
        }
        targets = known.value;
      }

      const cleared: string[] = [];
      for (const name of targets) {
        const result = clearCollection(vectorIndex, name, logger);
        if (result.isErr()) {
          formatter.error(`Could not clear ${name}`, result.error);
          process.exitCode = 1;
        } else if (result.value) {
          cleared.push(name);
        }
      }

      formatter.success(
        cleared.length > 0 ? `Cleared ${cleared.join(', ')}` : 'Nothing to clear',
        { collections: cleared.length }
      );
    });
}
