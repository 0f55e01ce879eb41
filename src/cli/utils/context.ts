/**
 * Shared setup for commands: runtime config, logger and engine from the
 * global CLI options.
 */

import { fileURLToPath } from 'url';
import type { Command } from 'commander';
import { Result, ok, err } from '../../lib/result-types.js';
import { Logger, type LogLevel } from '../../lib/logger.js';
import { loadRuntimeConfig, type RuntimeConfig } from '../../lib/env-config.js';
import { MetadataStore } from '../../services/cache/MetadataStore.js';
import { VectorIndex } from '../../services/vector-index/VectorIndex.js';
import { createRetrievalEngine, type EngineOptions, type RetrievalEngine } from '../../engine.js';

export interface GlobalOptions {
  queries?: string;
  fields?: string;
  cacheDir?: string;
  envFile?: string;
  json?: boolean;
  verbose?: boolean;
  quiet?: boolean;
}

export const BUNDLED_EXAMPLE_QUERIES = fileURLToPath(
  new URL('../../../resources/example-queries.json', import.meta.url)
);

export function globalOptions(command: Command): GlobalOptions {
  const opts = command.optsWithGlobals();
  const read = (key: string): string | undefined => {
    const value: unknown = opts[key];
    return typeof value === 'string' ? value : undefined;
  };
  return {
    queries: read('queries'),
    fields: read('fields'),
    cacheDir: read('cacheDir'),
    envFile: read('envFile'),
    json: opts['json'] === true,
    verbose: opts['verbose'] === true,
    quiet: opts['quiet'] === true,
  };
}

export function resolveConfig(options: GlobalOptions): Result<RuntimeConfig, Error> {
  const loaded = loadRuntimeConfig(process.env, options.envFile);
  if (loaded.isErr()) {
    return err(loaded.error);
  }
  return ok(options.cacheDir ? { ...loaded.value, cacheDir: options.cacheDir } : loaded.value);
}

function consoleLevel(options: GlobalOptions, config: RuntimeConfig): LogLevel {
  if (options.verbose) return 'debug';
  if (options.quiet) return 'error';
  return config.logLevel;
}

export function createLogger(options: GlobalOptions, config: RuntimeConfig): Logger {
  return new Logger({ logDir: config.logDir, consoleLevel: consoleLevel(options, config) });
}

/**
 * Snapshot storage alone, for commands that need no corpus or model
 */
export function openSnapshots(options: GlobalOptions): Result<{ vectorIndex: VectorIndex; logger: Logger }, Error> {
  return resolveConfig(options).map((config) => {
    const logger = createLogger(options, config);
    return { vectorIndex: new VectorIndex(new MetadataStore(config.cacheDir), { logger }), logger };
  });
}

export async function openEngine(
  options: GlobalOptions,
  engineOptions: Omit<EngineOptions, 'logger'> = {}
): Promise<Result<RetrievalEngine, Error>> {
  const config = resolveConfig(options);
  if (config.isErr()) {
    return err(config.error);
  }

  const logger = createLogger(options, config.value);

  const engine = await createRetrievalEngine(
    config.value,
    { exampleQueries: options.queries ?? BUNDLED_EXAMPLE_QUERIES, fieldMetadata: options.fields },
    { ...engineOptions, logger }
  );
  if (engine.isErr()) {
    return err(engine.error);
  }
  return ok(engine.value);
}
