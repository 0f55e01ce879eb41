/**
 * Query context engine: semantic retrieval of example queries and field
 * metadata for grounding query generation.
 */

export { createRetrievalEngine } from './engine.js';
export type { EngineOptions, EngineSources, RetrievalEngine } from './engine.js';

export { RetrievalService } from './services/retrieval-service.js';
export type { RetrievalServiceOptions } from './services/retrieval-service.js';

export { CacheManager } from './services/cache/CacheManager.js';
export type {
	Assessment,
	CacheManagerOptions,
	CacheState,
	CacheStatus,
	EnsureReadyOptions,
	RebuildSummary,
} from './services/cache/CacheManager.js';
export { MetadataStore } from './services/cache/MetadataStore.js';
export { QueryEmbeddingCache } from './services/cache/QueryEmbeddingCache.js';
export { clearCollection, knownCollections, recordedStatus } from './services/cache/snapshot-admin.js';

export { VectorIndex, SnapshotHandle } from './services/vector-index/VectorIndex.js';
export type { BuildRequest, VectorIndexOptions } from './services/vector-index/VectorIndex.js';

export {
	computeContentHash,
	computeFingerprint,
	parseFingerprint,
	serializeFingerprint,
	fingerprintsEqual,
} from './services/fingerprint/ContentFingerprint.js';
export type { Fingerprint, FingerprintInput } from './services/fingerprint/ContentFingerprint.js';

export { DescriptionEnricher, loadEnrichmentPatterns } from './services/enrichment/DescriptionEnricher.js';

export {
	StaticCorpusSupplier,
	defineCollection,
	exampleQueryCollection,
	fieldMetadataCollection,
	EXAMPLE_QUERIES_COLLECTION,
	FIELD_METADATA_COLLECTION,
} from './services/corpus/CorpusSupplier.js';
export type {
	CollectionDefinition,
	CorpusSnapshot,
	CorpusSupplier,
	DocumentCollection,
} from './services/corpus/CorpusSupplier.js';
export { ExampleQueryFileSupplier, FieldMetadataFileSupplier } from './services/corpus/file-suppliers.js';

export { HashingEmbeddingAdapter } from './services/embedding/hashing-adapter.js';
export { TransformersEmbeddingAdapter } from './services/embedding/transformers-adapter.js';
export { HostedEmbeddingAdapter } from './services/embedding/hosted-adapter.js';
export { AdapterRegistry, createDefaultRegistry } from './services/embedding/model-registry.js';
export type { IEmbeddingAdapter, EmbeddingBatch, EmbedOptions } from './services/embedding/adapter-interface.js';

export * from './lib/errors/EngineErrors.js';
export { ConfigurationManager, ConfigError, loadRuntimeConfig } from './lib/env-config.js';
export type { RuntimeConfig, EmbeddingAdapterConfig } from './lib/env-config.js';
export { Logger } from './lib/logger.js';

export type { Document, DocumentAttributes, RetrievedDocument, ScoredDocument } from './models/Document.js';
export type { DistanceMetric } from './models/embedding-vector.js';
export type { ExampleQuery } from './models/ExampleQuery.js';
export type { FieldMetadata } from './models/FieldMetadata.js';
export type { CacheMetadata } from './models/CacheMetadata.js';
