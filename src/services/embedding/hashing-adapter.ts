/**
 * Hashing Embedding Adapter
 *
 * Offline, deterministic bag-of-words vectors: each lower-cased token is
 * bucketed with xxh64 and the counts are L2-normalized. Needs no model
 * download, which makes it the adapter of choice for tests and air-gapped
 * installs. Components are non-negative, so cosine similarity is in [0, 1].
 */

import { xxh64 } from '@node-rs/xxhash';
import { Result, ok, err } from '../../lib/result-types.js';
import { normalizeInPlace } from '../../models/embedding-vector.js';
import {
	AdapterError,
	AdapterValidationError,
	type AdapterCapabilities,
	type EmbeddingBatch,
	type IEmbeddingAdapter,
} from './adapter-interface.js';

const TOKEN_PATTERN = /[\p{L}\p{N}]+/gu;

export function tokenize(text: string): string[] {
	return text.toLowerCase().match(TOKEN_PATTERN) ?? [];
}

export class HashingEmbeddingAdapter implements IEmbeddingAdapter {
	readonly id = 'hashing';
	readonly name: string;
	readonly modelIdentifier: string;
	readonly capabilities: AdapterCapabilities = {
		requiresNetwork: false,
		concurrent: true,
		maxBatchSize: null,
	};

	private readonly width: bigint;

	constructor(private readonly dimensions: number) {
		if (!Number.isInteger(dimensions) || dimensions <= 0) {
			throw new AdapterValidationError(`Hashing adapter needs a positive integer width, got ${dimensions}`);
		}
		this.width = BigInt(dimensions);
		this.name = `Hashing: bag-of-words (${dimensions})`;
		this.modelIdentifier = `hashing:xxh64-bow:${dimensions}`;
	}

	async initialize(): Promise<Result<void, AdapterError>> {
		return ok(undefined);
	}

	async embed(texts: string[]): Promise<Result<EmbeddingBatch, AdapterError>> {
		const start = Date.now();

		if (texts.some((t) => typeof t !== 'string')) {
			return err(new AdapterValidationError('All inputs must be strings'));
		}

		return ok({
			vectors: texts.map((text) => this.vectorize(text)),
			stats: {
				totalTexts: texts.length,
				durationMs: Date.now() - start,
			},
		});
	}

	/**
	 * Vector for a single text; all zeros when the text has no tokens
	 */
	vectorize(text: string): number[] {
		const vector = new Array<number>(this.dimensions).fill(0);
		for (const token of tokenize(text)) {
			const bucket = Number(xxh64(Buffer.from(token, 'utf-8')) % this.width);
			vector[bucket] = (vector[bucket] ?? 0) + 1;
		}
		normalizeInPlace(vector);
		return vector;
	}

	dimension(): number {
		return this.dimensions;
	}

	async dispose(): Promise<void> {
		// Nothing held
	}
}
