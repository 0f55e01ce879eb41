/**
 * Search Command
 *
 * Runs a retrieval against one collection, rebuilding it first if needed.
 */

import { Command } from 'commander';
import ora from 'ora';
import { OutputFormatter, OutputFormat } from '../utils/output.js';
import { globalOptions, openEngine } from '../utils/context.js';
import { RETRIEVAL_CONFIG } from '../../constants/retrieval-constants.js';
import { FIELD_METADATA_COLLECTION } from '../../services/corpus/CorpusSupplier.js';

interface SearchCommandOptions {
  limit?: string;
  minScore?: string;
}

export function createSearchCommand(): Command {
  return new Command('search')
    .description('Retrieve the documents closest to a query')
    .argument('<collection>', 'Collection to search')
    .argument('<query...>', 'Free-text query')
    .option('-k, --limit <n>', 'Maximum number of results')
    .option('--min-score <x>', 'Drop results scoring below this (-1 to 1)')
    .action(async (collection: string, words: string[], options: SearchCommandOptions, command: Command) => {
      const globals = globalOptions(command);
      const formatter = new OutputFormatter(globals.json ? OutputFormat.JSON : OutputFormat.HUMAN);

      const fallback =
        collection === FIELD_METADATA_COLLECTION
          ? RETRIEVAL_CONFIG.FIELD_METADATA_LIMIT
          : RETRIEVAL_CONFIG.EXAMPLE_QUERY_LIMIT;
      const limit = options.limit === undefined ? fallback : parseInt(options.limit, 10);
      if (!Number.isInteger(limit) || limit < 0) {
        formatter.error(`Invalid limit: ${options.limit}`);
        process.exitCode = 1;
        return;
      }

      const minScore = options.minScore === undefined ? undefined : Number(options.minScore);
      if (minScore !== undefined && !(minScore >= -1 && minScore <= 1)) {
        formatter.error(`Invalid minimum score: ${options.minScore}`);
        process.exitCode = 1;
        return;
      }

      const spinner =
        globals.json || globals.quiet ? null : ora({ text: `Searching ${collection}...`, color: 'cyan' }).start();
      const engine = await openEngine(globals, { minScore });
      if (engine.isErr()) {
        spinner?.fail('Could not start the engine');
        formatter.error('Search failed', engine.error);
        process.exitCode = 1;
        return;
      }

      const result = await engine.value.service.retrieve(collection, words.join(' '), limit);
      spinner?.stop();

      if (result.isErr()) {
        formatter.error('Search failed', result.error);
        process.exitCode = 1;
      } else {
        formatter.retrievalResults(collection, result.value);
      }

      await engine.value.close();
    });
}
