/**
 * Build Command
 *
 * Validates every collection and rebuilds the ones whose snapshot is stale,
 * missing or corrupt. Collections build concurrently.
 */

import { Command } from 'commander';
import ora from 'ora';
import chalk from 'chalk';
import { OutputFormatter, OutputFormat } from '../utils/output.js';
import { globalOptions, openEngine } from '../utils/context.js';

interface BuildCommandOptions {
  force?: boolean;
}

type BuildOutcome =
  | { name: string; ok: false; detail: string }
  | {
      name: string;
      ok: true;
      documents: number;
      rebuilt: boolean;
      reason: string;
      providerCalls: number;
    };

export function createBuildCommand(): Command {
  return new Command('build')
    .description('Build or refresh collection snapshots')
    .argument('[collections...]', 'Collections to build (all when omitted)')
    .option('-f, --force', 'Rebuild even when snapshots are current')
    .action(async (names: string[], options: BuildCommandOptions, command: Command) => {
      const globals = globalOptions(command);
      const formatter = new OutputFormatter(globals.json ? OutputFormat.JSON : OutputFormat.HUMAN);
      const interactive = !globals.json && !globals.quiet;

      const spinner = interactive ? ora({ text: 'Loading embedding model...', color: 'cyan' }).start() : null;
      const engine = await openEngine(globals, {
        onProgress: (collection, embedded, total) => {
          if (spinner) spinner.text = `Embedding ${collection}... ${embedded}/${total}`;
        },
      });
      if (engine.isErr()) {
        spinner?.fail('Could not start the engine');
        formatter.error('Build failed', engine.error);
        process.exitCode = 1;
        return;
      }

      const { service } = engine.value;
      const targets = names.length > 0 ? names : service.collections;
      const unknown = targets.filter(name => !service.manager(name));
      if (unknown.length > 0) {
        spinner?.stop();
        formatter.error(`Unknown collection: ${unknown.join(', ')}`);
        await engine.value.close();
        process.exitCode = 1;
        return;
      }

      if (spinner) spinner.text = `Validating ${targets.join(', ')}...`;
      const startTime = Date.now();

      const outcomes = await Promise.all(
        targets.map(async (name): Promise<BuildOutcome> => {
          const manager = service.manager(name);
          if (!manager) {
            return { name, ok: false, detail: 'unknown collection' };
          }
          const ready = await manager.ensureReady({ force: options.force });
          if (ready.isErr()) {
            return { name, ok: false, detail: ready.error.message };
          }
          const rebuild = manager.lastRebuild;
          return {
            name,
            ok: true,
            documents: ready.value.documentCount,
            rebuilt: rebuild !== null,
            reason: rebuild?.reason ?? 'none',
            providerCalls: rebuild?.providerCalls ?? 0,
          };
        })
      );

      const duration = (Date.now() - startTime) / 1000;
      const failed = outcomes.filter(outcome => !outcome.ok);
      if (failed.length > 0) {
        spinner?.fail(`${failed.length} of ${outcomes.length} collection(s) failed`);
        process.exitCode = 1;
      } else {
        spinner?.succeed(`Collections ready (${duration.toFixed(1)}s)`);
      }

      if (formatter.getFormat() === OutputFormat.JSON) {
        formatter.json({ success: failed.length === 0, duration, collections: outcomes });
      } else if (!globals.quiet) {
        for (const outcome of outcomes) {
          if (!outcome.ok) {
            console.log(`  ${chalk.red('✗')} ${outcome.name}: ${chalk.dim(outcome.detail)}`);
          } else if (outcome.rebuilt) {
            console.log(
              `  ${chalk.green('✓')} ${outcome.name}: rebuilt ${outcome.documents} documents ` +
                chalk.dim(`(${outcome.reason}, ${outcome.providerCalls} provider calls)`)
            );
          } else {
            console.log(`  ${chalk.green('✓')} ${outcome.name}: up to date (${outcome.documents} documents)`);
          }
        }
      }

      await engine.value.close();
    });
}
