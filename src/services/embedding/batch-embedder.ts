/**
 * Batch Embedder
 *
 * Embeds a corpus in bounded-size batches with a bounded number of provider
 * calls in flight. Every call gets a deadline and retry with backoff. The
 * vector width is taken from the first vector produced and enforced on all
 * others.
 */

import { Result, ok, err } from '../../lib/result-types.js';
import { logger as defaultLogger, type Logger } from '../../lib/logger.js';
import { DEFAULT_RETRY_CONFIG, withRetry, withTimeout, type RetryConfig } from '../../lib/retry-utils.js';
import { DimensionMismatchError, ProviderFailureError } from '../../lib/errors/EngineErrors.js';
import type { BatchingConfig } from '../../lib/env-config.js';
import { AdapterValidationError, type IEmbeddingAdapter } from './adapter-interface.js';

export interface BatchEmbedOptions extends BatchingConfig {
	retry?: RetryConfig;
	logger?: Logger;
	/** Called after each completed batch */
	onProgress?: (embedded: number, total: number) => void;
}

export interface EmbeddedCorpus {
	vectors: number[][];
	/** 0 only when there were no texts */
	dimension: number;
	calls: number;
}

/**
 * Split a list into consecutive chunks of at most `size` items
 */
export function chunk<T>(items: readonly T[], size: number): T[][] {
	const chunks: T[][] = [];
	for (let i = 0; i < items.length; i += size) {
		chunks.push(items.slice(i, i + size));
	}
	return chunks;
}

/**
 * Check vector count and width across a whole build
 */
export function validateVectors(
	vectors: readonly number[][],
	expectedCount: number
): Result<number, DimensionMismatchError | ProviderFailureError> {
	if (vectors.length !== expectedCount) {
		return err(
			new ProviderFailureError(
				new AdapterValidationError(`Expected ${expectedCount} vectors, received ${vectors.length}`)
			)
		);
	}

	const first = vectors[0];
	if (first === undefined) {
		return ok(0);
	}
	if (first.length === 0) {
		return err(new ProviderFailureError(new AdapterValidationError('Provider returned an empty vector')));
	}

	for (let i = 0; i < vectors.length; i++) {
		const vector = vectors[i] ?? [];
		if (vector.length !== first.length) {
			return err(new DimensionMismatchError(first.length, vector.length, `vector ${i}`));
		}
		if (!vector.every(Number.isFinite)) {
			return err(
				new ProviderFailureError(new AdapterValidationError(`Vector ${i} contains non-finite values`))
			);
		}
	}

	return ok(first.length);
}

export async function embedInBatches(
	adapter: IEmbeddingAdapter,
	texts: readonly string[],
	options: BatchEmbedOptions
): Promise<Result<EmbeddedCorpus, DimensionMismatchError | ProviderFailureError>> {
	if (texts.length === 0) {
		return ok({ vectors: [], dimension: 0, calls: 0 });
	}

	const log = options.logger ?? defaultLogger;
	const batchSize = Math.max(1, Math.min(options.batchSize, adapter.capabilities.maxBatchSize ?? Infinity));
	const concurrency = adapter.capabilities.concurrent ? Math.max(1, options.concurrency) : 1;
	const batches = chunk(texts, batchSize);
	const results: number[][][] = new Array(batches.length);

	let next = 0;
	let embedded = 0;
	let calls = 0;
	// Shared by all workers; the first failure stops the rest
	const state: { failure: ProviderFailureError | null } = { failure: null };

	const worker = async (): Promise<void> => {
		while (state.failure === null && next < batches.length) {
			const index = next++;
			const batch = batches[index] ?? [];

			const result = await withRetry(
				() => {
					calls++;
					return withTimeout(
						(signal) => adapter.embed(batch, { timeout: options.timeoutMs, signal }),
						options.timeoutMs,
						`Embedding batch ${index + 1}/${batches.length}`
					);
				},
				options.retry ?? DEFAULT_RETRY_CONFIG,
				log
			);

			if (result.isErr()) {
				state.failure = new ProviderFailureError(result.error);
				return;
			}
			if (result.value.vectors.length !== batch.length) {
				state.failure = new ProviderFailureError(
					new AdapterValidationError(
						`Batch ${index + 1} returned ${result.value.vectors.length} vectors for ${batch.length} texts`
					)
				);
				return;
			}

			results[index] = result.value.vectors;
			embedded += batch.length;
			options.onProgress?.(embedded, texts.length);
		}
	};

	log.debug('Embedding corpus', {
		adapter: adapter.modelIdentifier,
		texts: texts.length,
		batches: batches.length,
		concurrency,
	});

	await Promise.all(Array.from({ length: Math.min(concurrency, batches.length) }, () => worker()));

	if (state.failure !== null) {
		return err(state.failure);
	}

	const vectors = results.flat();
	return validateVectors(vectors, texts.length).map((dimension) => ({ vectors, dimension, calls }));
}
