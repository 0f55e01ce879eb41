/**
 * Status Command
 *
 * Reports snapshot validity per collection without embedding anything or
 * loading a model. Collections whose corpus is at hand are compared with
 * it; the rest are reported from their stored record.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { OutputFormatter, OutputFormat } from '../utils/output.js';
import { globalOptions, openEngine } from '../utils/context.js';
import type { CacheStatus } from '../../services/cache/CacheManager.js';
import { knownCollections, recordedStatus } from '../../services/cache/snapshot-admin.js';

const stateColors: Record<CacheStatus['state'], (text: string) => string> = {
  valid: chalk.green,
  unverified: chalk.cyan,
  stale: chalk.yellow,
  missing: chalk.dim,
  corrupt: chalk.red,
};

export function createStatusCommand(): Command {
  return new Command('status')
    .description('Show whether each collection snapshot is current')
    .action(async (_options: Record<string, never>, command: Command) => {
      const globals = globalOptions(command);
      const formatter = new OutputFormatter(globals.json ? OutputFormat.JSON : OutputFormat.HUMAN);

      const engine = await openEngine(globals, { initializeAdapter: false });
      if (engine.isErr()) {
        formatter.error('Status failed', engine.error);
        process.exitCode = 1;
        return;
      }

      const { service, vectorIndex } = engine.value;
      const names = knownCollections(vectorIndex.metadataStore);
      if (names.isErr()) {
        formatter.error('Status failed', names.error);
        process.exitCode = 1;
        await engine.value.close();
        return;
      }

      const statuses: CacheStatus[] = [];
      for (const name of names.value) {
        const manager = service.manager(name);
        if (!manager) {
          statuses.push(recordedStatus(vectorIndex.metadataStore, name));
          continue;
        }
        const status = await manager.status();
        if (status.isErr()) {
          formatter.warning(`Could not load corpus for ${name}`, { error: status.error.message });
          statuses.push(recordedStatus(vectorIndex.metadataStore, name));
          process.exitCode = 1;
          continue;
        }
        statuses.push(status.value);
      }

      if (formatter.getFormat() === OutputFormat.JSON) {
        formatter.json({ model: engine.value.adapter.modelIdentifier, collections: statuses });
      } else {
        console.log(chalk.dim(`Model: ${engine.value.adapter.modelIdentifier}`));
        formatter.table(
          ['Collection', 'State', 'Reason', 'Documents', 'Corpus', 'Built'],
          statuses.map(status => [
            status.collection,
            stateColors[status.state](status.state),
            status.reason,
            status.documentCount,
            status.corpusSize,
            status.createdAt,
          ])
        );
      }

      await engine.value.close();
    });
}
