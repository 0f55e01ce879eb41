/**
 * Engine test helper
 * Temp directories, quiet loggers and adapters that count or fail their calls
 */

import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { Result, ok, err } from '../../src/lib/result-types.js';
import { Logger } from '../../src/lib/logger.js';
import { createRetryConfig } from '../../src/lib/retry-utils.js';
import { HashingEmbeddingAdapter } from '../../src/services/embedding/hashing-adapter.js';
import {
  AdapterError,
  AdapterNetworkError,
  type AdapterCapabilities,
  type EmbeddingBatch,
  type IEmbeddingAdapter,
} from '../../src/services/embedding/adapter-interface.js';
import type { Document } from '../../src/models/Document.js';
import type { FieldMetadata } from '../../src/models/FieldMetadata.js';

export function createTempDir(prefix = 'qctx-test-'): { path: string; cleanup: () => void } {
  const path = mkdtempSync(join(tmpdir(), prefix));
  return {
    path,
    cleanup: () => rmSync(path, { recursive: true, force: true }),
  };
}

/**
 * Logger that writes nowhere
 */
export function createSilentLogger(): Logger {
  return new Logger({ logDir: null, console: false });
}

/** No retries, so failing adapters fail fast */
export const NO_RETRY = createRetryConfig({ maxRetries: 0 });

/**
 * Hashing adapter that records every embed call
 */
export class CountingAdapter implements IEmbeddingAdapter {
  readonly id = 'counting';
  readonly name = 'Counting hashing adapter';
  readonly modelIdentifier: string;
  readonly capabilities: AdapterCapabilities;

  calls = 0;
  textsEmbedded = 0;
  readonly batches: string[][] = [];

  private readonly inner: HashingEmbeddingAdapter;

  constructor(dimensions = 64, options: { modelTag?: string; concurrent?: boolean; maxBatchSize?: number | null } = {}) {
    this.inner = new HashingEmbeddingAdapter(dimensions);
    this.modelIdentifier = `${this.inner.modelIdentifier}${options.modelTag ? `:${options.modelTag}` : ''}`;
    this.capabilities = {
      requiresNetwork: false,
      concurrent: options.concurrent ?? true,
      maxBatchSize: options.maxBatchSize ?? null,
    };
  }

  async initialize(): Promise<Result<void, AdapterError>> {
    return ok(undefined);
  }

  async embed(texts: string[]): Promise<Result<EmbeddingBatch, AdapterError>> {
    this.calls++;
    this.textsEmbedded += texts.length;
    this.batches.push([...texts]);
    return this.inner.embed(texts);
  }

  vectorize(text: string): number[] {
    return this.inner.vectorize(text);
  }

  dimension(): number {
    return this.inner.dimension();
  }

  reset(): void {
    this.calls = 0;
    this.textsEmbedded = 0;
    this.batches.length = 0;
  }

  async dispose(): Promise<void> {}
}

/**
 * Adapter whose every call fails with a network error
 */
export class FailingAdapter implements IEmbeddingAdapter {
  readonly id = 'failing';
  readonly name = 'Failing adapter';
  readonly capabilities: AdapterCapabilities = { requiresNetwork: true, concurrent: true, maxBatchSize: null };
  calls = 0;

  constructor(readonly modelIdentifier = 'failing:model', private readonly width: number | undefined = undefined) {}

  async initialize(): Promise<Result<void, AdapterError>> {
    return ok(undefined);
  }

  async embed(): Promise<Result<EmbeddingBatch, AdapterError>> {
    this.calls++;
    return err(new AdapterNetworkError('connection refused'));
  }

  dimension(): number | undefined {
    return this.width;
  }

  async dispose(): Promise<void> {}
}

export function doc(id: string, text: string, attributes: Document['attributes'] = {}): Document {
  return { id, text, attributes };
}

export function field(name: string, overrides: Partial<FieldMetadata> = {}): FieldMetadata {
  return {
    name,
    category: 'ATTRIBUTE',
    data_type: 'STRING',
    selectable: true,
    filterable: true,
    sortable: false,
    metrics_compatible: false,
    resource_name: null,
    ...overrides,
  };
}

/**
 * Adapter returning fixed vectors, for exact score assertions.
 * Unknown texts map to the zero-padded unit vector on the first axis.
 */
export class TableAdapter implements IEmbeddingAdapter {
  readonly id = 'table';
  readonly name = 'Fixed vector table';
  readonly capabilities: AdapterCapabilities = { requiresNetwork: false, concurrent: true, maxBatchSize: null };
  calls = 0;

  constructor(
    public vectors: Map<string, number[]>,
    readonly modelIdentifier = 'table:test'
  ) {}

  async initialize(): Promise<Result<void, AdapterError>> {
    return ok(undefined);
  }

  async embed(texts: string[]): Promise<Result<EmbeddingBatch, AdapterError>> {
    this.calls++;
    const [first] = [...this.vectors.values()];
    const width = first?.length ?? 1;
    const fallback = Array.from({ length: width }, (_, i) => (i === 0 ? 1 : 0));
    return ok({
      vectors: texts.map((text) => this.vectors.get(text) ?? fallback),
      stats: { totalTexts: texts.length, durationMs: 0 },
    });
  }

  dimension(): number | undefined {
    return undefined;
  }

  async dispose(): Promise<void> {}
}
