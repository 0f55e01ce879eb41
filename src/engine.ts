/**
 * Engine wiring
 *
 * Builds a RetrievalService with one CacheManager per collection from a
 * RuntimeConfig. Callers that need different collections or adapters can
 * assemble the pieces themselves; nothing here is a singleton.
 */

import { join } from 'path';
import { Result, ok, err } from './lib/result-types.js';
import { Logger } from './lib/logger.js';
import { describeEmbeddingConfig, type RuntimeConfig } from './lib/env-config.js';
import type { AdapterError, IEmbeddingAdapter } from './services/embedding/adapter-interface.js';
import { createDefaultRegistry } from './services/embedding/model-registry.js';
import { DescriptionEnricher } from './services/enrichment/DescriptionEnricher.js';
import { MetadataStore } from './services/cache/MetadataStore.js';
import { QueryEmbeddingCache } from './services/cache/QueryEmbeddingCache.js';
import { CacheManager, type CacheManagerOptions } from './services/cache/CacheManager.js';
import { VectorIndex } from './services/vector-index/VectorIndex.js';
import { RetrievalService } from './services/retrieval-service.js';
import {
	exampleQueryCollection,
	fieldMetadataCollection,
	type DocumentCollection,
} from './services/corpus/CorpusSupplier.js';
import { ExampleQueryFileSupplier, FieldMetadataFileSupplier } from './services/corpus/file-suppliers.js';
import { STORAGE_CONFIG } from './constants/retrieval-constants.js';

export interface EngineSources {
	/** JSON file of example queries; collection skipped when absent */
	exampleQueries?: string;
	/** JSON field metadata cache; collection skipped when absent */
	fieldMetadata?: string;
}

export interface RetrievalEngine {
	service: RetrievalService;
	adapter: IEmbeddingAdapter;
	vectorIndex: VectorIndex;
	logger: Logger;
	close(): Promise<void>;
}

export interface EngineOptions {
	logger?: Logger;
	onProgress?: CacheManagerOptions['onProgress'];
	/** Pre-built adapter; skips the registry */
	adapter?: IEmbeddingAdapter;
	/** Overrides the configured minimum score */
	minScore?: number;
	/**
	 * When false the adapter is built but its model is not loaded; enough
	 * for status checks, which only need the model identifier
	 */
	initializeAdapter?: boolean;
}

export async function createRetrievalEngine(
	config: RuntimeConfig,
	sources: EngineSources,
	options: EngineOptions = {}
): Promise<Result<RetrievalEngine, AdapterError>> {
	const logger = options.logger ?? new Logger({ logDir: config.logDir, consoleLevel: config.logLevel });

	let adapter: IEmbeddingAdapter;
	if (options.adapter) {
		adapter = options.adapter;
	} else {
		const registry = createDefaultRegistry();
		const created =
			options.initializeAdapter === false
				? registry.create(config.embedding)
				: await registry.createAdapter(config.embedding);
		if (created.isErr()) {
			return err(created.error);
		}
		adapter = created.value;
		logger.info('Embedding adapter ready', {
			...describeEmbeddingConfig(config.embedding),
			modelId: adapter.modelIdentifier,
			initialized: options.initializeAdapter !== false,
		});
	}

	const vectorIndex = new VectorIndex(new MetadataStore(config.cacheDir), {
		annMinCardinality: config.ann.minCardinality,
		nprobe: config.ann.nprobe,
		logger,
	});

	const service = new RetrievalService({
		minScore: options.minScore ?? config.retrieval.minScore,
		timeoutMs: config.batching.timeoutMs,
		logger,
		queryCache: new QueryEmbeddingCache(join(config.cacheDir, STORAGE_CONFIG.QUERY_CACHE_FILE)),
	});

	const collections: DocumentCollection[] = [];
	if (sources.exampleQueries) {
		collections.push(exampleQueryCollection(new ExampleQueryFileSupplier(sources.exampleQueries)));
	}
	if (sources.fieldMetadata) {
		collections.push(
			fieldMetadataCollection(
				new FieldMetadataFileSupplier(sources.fieldMetadata, {
					maxAgeDays: config.corpus.fieldMetadataMaxAgeDays,
					logger,
				}),
				new DescriptionEnricher()
			)
		);
	}

	for (const collection of collections) {
		service.register(
			new CacheManager(collection, adapter, vectorIndex, {
				batching: config.batching,
				logger,
				onProgress: options.onProgress,
			})
		);
	}

	return ok({
		service,
		adapter,
		vectorIndex,
		logger,
		async close() {
			service.close();
			await adapter.dispose();
		},
	});
}
