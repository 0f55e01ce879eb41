/**
 * Snapshot housekeeping by collection name
 *
 * Works from the cache directory alone: clearing or inspecting a collection
 * needs neither its corpus nor an embedding model.
 */

import { Result, ok, err } from '../../lib/result-types.js';
import type { Logger } from '../../lib/logger.js';
import { EngineError, UnknownCollectionError } from '../../lib/errors/EngineErrors.js';
import { EXAMPLE_QUERIES_COLLECTION, FIELD_METADATA_COLLECTION } from '../corpus/CorpusSupplier.js';
import { isValidCollectionName, type MetadataStore } from './MetadataStore.js';
import type { CacheStatus } from './CacheManager.js';
import type { VectorIndex } from '../vector-index/VectorIndex.js';

export const BUILT_IN_COLLECTIONS: readonly string[] = [EXAMPLE_QUERIES_COLLECTION, FIELD_METADATA_COLLECTION];

/**
 * Built-in collections plus any other the cache directory holds
 */
export function knownCollections(store: MetadataStore): Result<string[], EngineError> {
	return store.list().map((stored) => [...new Set([...BUILT_IN_COLLECTIONS, ...stored])].sort());
}

/**
 * Status from the persisted record alone
 *
 * A readable record is reported as `unverified`: nothing compared it with
 * a live corpus.
 */
export function recordedStatus(store: MetadataStore, collection: string): CacheStatus {
	const read = store.read(collection);
	if (read.isErr()) {
		const missing = read.error.code === 'SNAPSHOT_NOT_FOUND';
		return {
			collection,
			state: missing ? 'missing' : 'corrupt',
			reason: missing ? 'missing' : 'corrupt',
			documentCount: null,
			createdAt: null,
			modelId: null,
			corpusSize: null,
		};
	}

	return {
		collection,
		state: 'unverified',
		reason: 'none',
		documentCount: read.value.documentCount,
		createdAt: read.value.createdAt,
		modelId: read.value.modelId,
		corpusSize: null,
	};
}

/**
 * Delete a collection's record and snapshots; true if a record existed
 */
export function clearCollection(
	index: VectorIndex,
	collection: string,
	logger: Logger
): Result<boolean, EngineError> {
	if (!isValidCollectionName(collection)) {
		return err(new UnknownCollectionError(collection));
	}

	const cleared = index.clear(collection);
	if (cleared.isErr()) {
		return err(cleared.error);
	}

	logger.logCacheEvent(collection, 'cleared', 'forced', { existed: cleared.value });
	return ok(cleared.value);
}
