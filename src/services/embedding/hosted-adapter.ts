/**
 * Hosted Embedding Adapter
 *
 * Embeddings from an OpenAI-compatible HTTP API (POST {endpoint}/embeddings).
 */

import { z } from 'zod';
import { Result, ok, err, toError } from '../../lib/result-types.js';
import type { HostedAdapterConfig } from '../../lib/env-config.js';
import {
	AdapterError,
	AdapterNetworkError,
	AdapterRateLimitError,
	AdapterTimeoutError,
	AdapterValidationError,
	type AdapterCapabilities,
	type EmbedOptions,
	type EmbeddingBatch,
	type IEmbeddingAdapter,
} from './adapter-interface.js';

const embeddingResponseSchema = z.object({
	data: z.array(
		z.object({
			index: z.number().int().nonnegative(),
			embedding: z.array(z.number()),
		})
	),
});

/**
 * Parse a Retry-After header (seconds) into milliseconds
 */
export function parseRetryAfter(header: string | null): number | undefined {
	if (header === null) {
		return undefined;
	}
	const seconds = Number(header);
	return Number.isFinite(seconds) && seconds >= 0 ? seconds * 1000 : undefined;
}

export class HostedEmbeddingAdapter implements IEmbeddingAdapter {
	readonly id = 'hosted';
	readonly name: string;
	readonly modelIdentifier: string;
	readonly capabilities: AdapterCapabilities = {
		requiresNetwork: true,
		concurrent: true,
		maxBatchSize: 256,
	};

	private observedDimension: number | undefined;

	constructor(
		private readonly config: HostedAdapterConfig,
		private readonly fetchImpl: typeof fetch = fetch
	) {
		this.name = `Hosted: ${config.model}`;
		this.modelIdentifier = `hosted:${new URL(config.endpoint).host}:${config.model}`;
	}

	async initialize(): Promise<Result<void, AdapterError>> {
		return ok(undefined);
	}

	async embed(
		texts: string[],
		options?: EmbedOptions
	): Promise<Result<EmbeddingBatch, AdapterError>> {
		const start = Date.now();
		if (texts.length === 0) {
			return ok({ vectors: [], stats: { totalTexts: 0, durationMs: 0 } });
		}

		const url = `${this.config.endpoint.replace(/\/+$/, '')}/embeddings`;
		const signal = options?.signal ?? AbortSignal.timeout(options?.timeout ?? this.config.timeoutMs);

		let response: Response;
		try {
			response = await this.fetchImpl(url, {
				method: 'POST',
				headers: {
					'Content-Type': 'application/json',
					Authorization: `Bearer ${this.config.apiKey}`,
				},
				body: JSON.stringify({ model: this.config.model, input: texts }),
				signal,
			});
		} catch (error) {
			const cause = toError(error);
			if (cause.name === 'AbortError' || cause.name === 'TimeoutError') {
				return err(new AdapterTimeoutError(`Request to ${url} timed out`, cause));
			}
			return err(new AdapterNetworkError(`Request to ${url} failed: ${cause.message}`, cause));
		}

		if (response.status === 429) {
			return err(
				new AdapterRateLimitError(
					`Rate limited by ${url}`,
					parseRetryAfter(response.headers.get('retry-after'))
				)
			);
		}
		if (response.status >= 500) {
			return err(new AdapterNetworkError(`Embedding endpoint returned HTTP ${response.status}`));
		}
		if (!response.ok) {
			return err(new AdapterValidationError(`Embedding endpoint returned HTTP ${response.status}`));
		}

		let body: unknown;
		try {
			body = await response.json();
		} catch (error) {
			return err(new AdapterValidationError('Embedding endpoint returned invalid JSON', toError(error)));
		}

		const parsed = embeddingResponseSchema.safeParse(body);
		if (!parsed.success) {
			return err(new AdapterValidationError(`Unexpected embedding response: ${parsed.error.message}`));
		}
		if (parsed.data.data.length !== texts.length) {
			return err(
				new AdapterValidationError(
					`Expected ${texts.length} embeddings, received ${parsed.data.data.length}`
				)
			);
		}

		const vectors = [...parsed.data.data]
			.sort((a, b) => a.index - b.index)
			.map((item) => item.embedding);
		this.observedDimension = vectors[0]?.length ?? this.observedDimension;

		return ok({
			vectors,
			stats: {
				totalTexts: texts.length,
				durationMs: Date.now() - start,
			},
		});
	}

	dimension(): number | undefined {
		return this.observedDimension;
	}

	async dispose(): Promise<void> {
		// Stateless
	}
}
