/**
 * Transformers Embedding Adapter
 *
 * Local sentence embeddings through a @huggingface/transformers
 * feature-extraction pipeline (ONNX weights, mean pooling, L2 normalization).
 */

import { pipeline, env } from '@huggingface/transformers';
import { Result, ok, err, toError } from '../../lib/result-types.js';
import type { TransformersAdapterConfig } from '../../lib/env-config.js';
import {
	AdapterError,
	AdapterInitializationError,
	AdapterTimeoutError,
	AdapterValidationError,
	type AdapterCapabilities,
	type EmbedOptions,
	type EmbeddingBatch,
	type IEmbeddingAdapter,
} from './adapter-interface.js';

type Extractor = (
	texts: string[],
	options: { pooling: 'mean'; normalize: boolean }
) => Promise<unknown>;

interface TensorLike {
	data: ArrayLike<number>;
	dims: number[];
}

function isTensorLike(value: unknown): value is TensorLike {
	if (typeof value !== 'object' || value === null) {
		return false;
	}
	const data: unknown = Reflect.get(value, 'data');
	const dims: unknown = Reflect.get(value, 'dims');
	return (
		ArrayBuffer.isView(data) &&
		Array.isArray(dims) &&
		dims.every((d) => typeof d === 'number')
	);
}

/**
 * Split a [batch, dim] tensor into rows
 */
export function tensorToRows(output: unknown, expectedRows: number): Result<number[][], AdapterValidationError> {
	if (!isTensorLike(output)) {
		return err(new AdapterValidationError('Pipeline returned an unexpected output shape'));
	}

	const [rows, width] = output.dims;
	if (rows !== expectedRows || width === undefined || width <= 0) {
		return err(
			new AdapterValidationError(
				`Pipeline returned dims [${output.dims.join(', ')}] for ${expectedRows} inputs`
			)
		);
	}

	if (output.data.length < rows * width) {
		return err(
			new AdapterValidationError(`Pipeline returned ${output.data.length} values for dims [${rows}, ${width}]`)
		);
	}

	const vectors: number[][] = [];
	for (let r = 0; r < rows; r++) {
		const offset = r * width;
		const row = new Array<number>(width);
		for (let i = 0; i < width; i++) {
			row[i] = output.data[offset + i] ?? 0;
		}
		vectors.push(row);
	}
	return ok(vectors);
}

export class TransformersEmbeddingAdapter implements IEmbeddingAdapter {
	readonly id = 'transformers';
	readonly name: string;
	readonly modelIdentifier: string;
	readonly capabilities: AdapterCapabilities = {
		requiresNetwork: false,
		// ONNX runtime already uses every core for one batch
		concurrent: false,
		maxBatchSize: 32,
	};

	private extractor: Extractor | null = null;
	private loadPromise: Promise<Result<void, AdapterError>> | null = null;
	private observedDimension: number | undefined;

	constructor(private readonly config: TransformersAdapterConfig) {
		this.name = `Local: ${config.model}`;
		this.modelIdentifier = `transformers:${config.model}:${config.quantized ? 'q8' : 'fp32'}:mean:normalized`;
	}

	async initialize(): Promise<Result<void, AdapterError>> {
		if (this.extractor) {
			return ok(undefined);
		}
		if (!this.loadPromise) {
			this.loadPromise = this.load();
		}
		const result = await this.loadPromise;
		if (result.isErr()) {
			// Allow a later call to try again
			this.loadPromise = null;
		}
		return result;
	}

	private async load(): Promise<Result<void, AdapterError>> {
		try {
			if (this.config.modelCacheDir) {
				env.cacheDir = this.config.modelCacheDir;
			}
			env.allowLocalModels = true;

			const extractor = await pipeline('feature-extraction', this.config.model, {
				dtype: this.config.quantized ? 'q8' : 'fp32',
			});
			this.extractor = (texts, options) => extractor(texts, options);
			return ok(undefined);
		} catch (error) {
			return err(
				new AdapterInitializationError(
					`Failed to load model ${this.config.model}: ${toError(error).message}`,
					toError(error)
				)
			);
		}
	}

	async embed(
		texts: string[],
		options?: EmbedOptions
	): Promise<Result<EmbeddingBatch, AdapterError>> {
		const start = Date.now();

		const init = await this.initialize();
		if (init.isErr()) {
			return err(init.error);
		}
		if (!this.extractor) {
			return err(new AdapterInitializationError('Model not loaded'));
		}
		if (texts.length === 0) {
			return ok({ vectors: [], stats: { totalTexts: 0, durationMs: 0 } });
		}
		if (options?.signal?.aborted) {
			return err(new AdapterTimeoutError('Embedding call cancelled before it started'));
		}

		try {
			const output = await this.extractor(texts, { pooling: 'mean', normalize: true });
			const rows = tensorToRows(output, texts.length);
			if (rows.isErr()) {
				return err(rows.error);
			}

			this.observedDimension = rows.value[0]?.length ?? this.observedDimension;

			return ok({
				vectors: rows.value,
				stats: {
					totalTexts: texts.length,
					durationMs: Date.now() - start,
				},
			});
		} catch (error) {
			return err(
				new AdapterValidationError(`Inference failed: ${toError(error).message}`, toError(error))
			);
		}
	}

	dimension(): number | undefined {
		return this.observedDimension;
	}

	async dispose(): Promise<void> {
		this.extractor = null;
		this.loadPromise = null;
	}
}
