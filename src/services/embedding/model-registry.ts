/**
 * Adapter Registry and Factory
 *
 * Maps configured adapter types to factories so call sites never branch on
 * which embedding provider is in use.
 */

import { Result, ok, err, toError } from '../../lib/result-types.js';
import type { EmbeddingAdapterConfig } from '../../lib/env-config.js';
import {
	AdapterError,
	AdapterInitializationError,
	AdapterValidationError,
	type IEmbeddingAdapter,
} from './adapter-interface.js';
import { HashingEmbeddingAdapter } from './hashing-adapter.js';
import { TransformersEmbeddingAdapter } from './transformers-adapter.js';
import { HostedEmbeddingAdapter } from './hosted-adapter.js';

export type AdapterType = EmbeddingAdapterConfig['type'];

// ============================================================================
// Adapter Factory Interface
// ============================================================================

export interface IAdapterFactory {
	/** Configuration type this factory builds */
	readonly type: AdapterType;

	/** Human-readable name */
	readonly name: string;

	create(config: EmbeddingAdapterConfig): Result<IEmbeddingAdapter, AdapterError>;
}

function wrongType(factory: AdapterType, config: EmbeddingAdapterConfig): AdapterValidationError {
	return new AdapterValidationError(
		`Factory "${factory}" cannot build an adapter for type "${config.type}"`
	);
}

export const hashingFactory: IAdapterFactory = {
	type: 'hashing',
	name: 'Feature-hashing bag of words',
	create(config) {
		if (config.type !== 'hashing') return err(wrongType('hashing', config));
		try {
			return ok(new HashingEmbeddingAdapter(config.dimensions));
		} catch (error) {
			return err(new AdapterValidationError(toError(error).message, toError(error)));
		}
	},
};

export const transformersFactory: IAdapterFactory = {
	type: 'transformers',
	name: 'Local transformers.js model',
	create(config) {
		if (config.type !== 'transformers') return err(wrongType('transformers', config));
		return ok(new TransformersEmbeddingAdapter(config));
	},
};

export const hostedFactory: IAdapterFactory = {
	type: 'hosted',
	name: 'OpenAI-compatible embeddings API',
	create(config) {
		if (config.type !== 'hosted') return err(wrongType('hosted', config));
		try {
			return ok(new HostedEmbeddingAdapter(config));
		} catch (error) {
			// new URL() rejects a malformed endpoint
			return err(new AdapterValidationError(toError(error).message, toError(error)));
		}
	},
};

// ============================================================================
// Registry Error
// ============================================================================

export class RegistryError extends Error {
	constructor(message: string) {
		super(message);
		this.name = 'RegistryError';
		Object.setPrototypeOf(this, RegistryError.prototype);
	}
}

// ============================================================================
// Adapter Registry
// ============================================================================

export class AdapterRegistry {
	private factories = new Map<AdapterType, IAdapterFactory>();

	register(factory: IAdapterFactory): Result<void, RegistryError> {
		if (this.factories.has(factory.type)) {
			return err(
				new RegistryError(`Adapter factory "${factory.type}" is already registered`)
			);
		}

		this.factories.set(factory.type, factory);
		return ok(undefined);
	}

	has(type: AdapterType): boolean {
		return this.factories.has(type);
	}

	listFactories(): Array<{ type: AdapterType; name: string }> {
		return [...this.factories.values()].map((f) => ({ type: f.type, name: f.name }));
	}

	/**
	 * Build an adapter without loading its model
	 */
	create(config: EmbeddingAdapterConfig): Result<IEmbeddingAdapter, AdapterError> {
		const factory = this.factories.get(config.type);
		if (!factory) {
			return err(
				new AdapterInitializationError(`No adapter factory registered for type "${config.type}"`)
			);
		}
		return factory.create(config);
	}

	/**
	 * Build and initialize an adapter for the given configuration
	 */
	async createAdapter(
		config: EmbeddingAdapterConfig
	): Promise<Result<IEmbeddingAdapter, AdapterError>> {
		const created = this.create(config);
		if (created.isErr()) {
			return err(created.error);
		}

		const init = await created.value.initialize();
		if (init.isErr()) {
			return err(init.error);
		}
		return ok(created.value);
	}
}

/**
 * Registry with every built-in adapter type
 */
export function createDefaultRegistry(): AdapterRegistry {
	const registry = new AdapterRegistry();
	for (const factory of [hashingFactory, transformersFactory, hostedFactory]) {
		registry.register(factory);
	}
	return registry;
}
