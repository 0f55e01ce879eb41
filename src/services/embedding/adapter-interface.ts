/**
 * Embedding Adapter Interface
 *
 * Capability interface for embedding generation. Local and hosted models
 * are interchangeable variants selected through the adapter registry.
 */

import type { Result } from '../../lib/result-types.js';

// ============================================================================
// Error Hierarchy
// ============================================================================

/**
 * Failure reported by an embedding provider. `retryable` drives withRetry.
 */
export abstract class AdapterError extends Error {
	abstract readonly code: string;
	abstract readonly retryable: boolean;
	readonly timestamp: Date = new Date();

	constructor(message: string, public override cause?: Error) {
		super(message);
		this.name = this.constructor.name;
		Object.setPrototypeOf(this, new.target.prototype);
	}
}

/** Model could not be loaded or the adapter is misconfigured */
export class AdapterInitializationError extends AdapterError {
	readonly code = 'ADAPTER_INIT_FAILED';
	readonly retryable = false;
}

/** Provider unreachable, or it answered with a server error */
export class AdapterNetworkError extends AdapterError {
	readonly code = 'ADAPTER_NETWORK_ERROR';
	readonly retryable = true;
}

/** Call exceeded its deadline */
export class AdapterTimeoutError extends AdapterError {
	readonly code = 'ADAPTER_TIMEOUT';
	readonly retryable = true;
}

/** Request rejected, or the response held no usable vectors */
export class AdapterValidationError extends AdapterError {
	readonly code = 'ADAPTER_VALIDATION_ERROR';
	readonly retryable = false;
}

/**
 * Provider asked for fewer requests. `retryAfterMs` comes from Retry-After
 * when the provider sent one and replaces the computed backoff.
 */
export class AdapterRateLimitError extends AdapterError {
	readonly code = 'ADAPTER_RATE_LIMIT';
	readonly retryable = true;

	constructor(message: string, public readonly retryAfterMs?: number, cause?: Error) {
		super(message, cause);
	}
}

// ============================================================================
// Adapter Interface Types
// ============================================================================

/**
 * Adapter capability flags
 */
export interface AdapterCapabilities {
	/** Requires network connectivity */
	requiresNetwork: boolean;

	/** Safe to call with several batches in flight */
	concurrent: boolean;

	/** Maximum batch size (null = no limit) */
	maxBatchSize: number | null;
}

/**
 * Embedding options for a single call
 */
export interface EmbedOptions {
	/** Timeout in milliseconds */
	timeout?: number;

	/** Aborted when the caller gives up on the call */
	signal?: AbortSignal;
}

/**
 * Result of embedding a batch of texts
 */
export interface EmbeddingBatch {
	/** One vector per input text, in input order */
	vectors: number[][];

	stats: {
		totalTexts: number;
		durationMs: number;
	};
}

// ============================================================================
// Core Adapter Interface
// ============================================================================

export interface IEmbeddingAdapter {
	/** Registry key of the variant (e.g., "hashing", "transformers") */
	readonly id: string;

	/** Display name for CLI output */
	readonly name: string;

	/**
	 * Stable identity of everything that affects the produced vectors
	 * (provider, model, parameters). Feeds the content fingerprint.
	 */
	readonly modelIdentifier: string;

	readonly capabilities: AdapterCapabilities;

	/**
	 * Load models or validate credentials. Safe to call more than once.
	 */
	initialize(): Promise<Result<void, AdapterError>>;

	/**
	 * Generate embeddings for a batch of text inputs
	 */
	embed(
		texts: string[],
		options?: EmbedOptions
	): Promise<Result<EmbeddingBatch, AdapterError>>;

	/**
	 * Vector width when already known, otherwise undefined until the first
	 * vector has been produced. Never a configured guess.
	 */
	dimension(): number | undefined;

	dispose(): Promise<void>;
}
