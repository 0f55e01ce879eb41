/**
 * Retrieval Service
 *
 * Public query API. Resolves a named collection to a ready snapshot through
 * its CacheManager, embeds the query with the same adapter that built the
 * snapshot, and returns a ranked, filtered and bounded document list.
 */

import { Result, ok, err, toError } from '../lib/result-types.js';
import { logger as defaultLogger, type Logger } from '../lib/logger.js';
import { DEFAULT_RETRY_CONFIG, withRetry, withTimeout, type RetryConfig } from '../lib/retry-utils.js';
import {
	DimensionMismatchError,
	EngineError,
	ProviderFailureError,
	UnknownCollectionError,
} from '../lib/errors/EngineErrors.js';
import type { RetrievedDocument, ScoredDocument } from '../models/Document.js';
import { EMBEDDING_CONFIG, RETRIEVAL_CONFIG } from '../constants/retrieval-constants.js';
import { EXAMPLE_QUERIES_COLLECTION, FIELD_METADATA_COLLECTION } from './corpus/CorpusSupplier.js';
import { validateVectors } from './embedding/batch-embedder.js';
import { QueryEmbeddingCache } from './cache/QueryEmbeddingCache.js';
import type { CacheManager } from './cache/CacheManager.js';

export interface RetrievalServiceOptions {
	/** Results scoring below this are dropped */
	minScore?: number;
	/** Deadline for a single query embedding call */
	timeoutMs?: number;
	retry?: RetryConfig;
	logger?: Logger;
	/** Defaults to a process-local in-memory cache */
	queryCache?: QueryEmbeddingCache;
}

/**
 * A query vector whose width differs from the snapshot is reported apart
 * from errors, since only that case is recovered by rebuilding.
 */
type SearchOutcome =
	| { kind: 'results'; results: ScoredDocument[] }
	| { kind: 'dimension_mismatch'; expected: number; actual: number };

export class RetrievalService {
	private readonly managers = new Map<string, CacheManager>();
	private readonly minScore: number;
	private readonly timeoutMs: number;
	private readonly retry: RetryConfig;
	private readonly logger: Logger;
	private readonly queryCache: QueryEmbeddingCache;

	constructor(options: RetrievalServiceOptions = {}) {
		this.minScore = options.minScore ?? RETRIEVAL_CONFIG.DEFAULT_MIN_SCORE;
		this.timeoutMs = options.timeoutMs ?? EMBEDDING_CONFIG.DEFAULT_TIMEOUT_MS;
		this.retry = options.retry ?? DEFAULT_RETRY_CONFIG;
		this.logger = options.logger ?? defaultLogger;
		this.queryCache = options.queryCache ?? new QueryEmbeddingCache(':memory:');
	}

	register(manager: CacheManager): this {
		this.managers.set(manager.name, manager);
		return this;
	}

	get collections(): string[] {
		return [...this.managers.keys()];
	}

	manager(collection: string): CacheManager | undefined {
		return this.managers.get(collection);
	}

	/**
	 * Top `maxResults` documents of a collection for free text
	 */
	async retrieve(
		collection: string,
		queryText: string,
		maxResults: number
	): Promise<Result<RetrievedDocument[], EngineError>> {
		const manager = this.managers.get(collection);
		if (!manager) {
			return err(new UnknownCollectionError(collection));
		}

		const text = queryText.trim();
		if (text.length === 0 || maxResults <= 0) {
			return ok([]);
		}

		const found = await this.search(manager, text, maxResults);
		if (found.isErr()) {
			return err(found.error);
		}
		if (found.value.kind === 'results') {
			return ok(this.finalize(found.value.results, maxResults));
		}

		// The adapter disagrees with the snapshot; rebuild once and retry
		this.logger.warn('Query vector does not match snapshot dimension, rebuilding', {
			collection,
			expected: found.value.expected,
			actual: found.value.actual,
		});
		const forgotten = this.queryCache.delete(text, manager.adapter.modelIdentifier);
		if (forgotten.isErr()) {
			this.logger.warn('Query cache delete failed', { collection, error: forgotten.error.message });
		}
		const rebuilt = await manager.ensureReady({ force: true });
		if (rebuilt.isErr()) {
			return err(rebuilt.error);
		}

		const retried = await this.search(manager, text, maxResults);
		if (retried.isErr()) {
			return err(retried.error);
		}
		if (retried.value.kind === 'dimension_mismatch') {
			return err(
				new DimensionMismatchError(retried.value.expected, retried.value.actual, 'query vector after rebuild')
			);
		}
		return ok(this.finalize(retried.value.results, maxResults));
	}

	/**
	 * Variant for downstream generation: failures degrade to no context
	 */
	async retrieveContext(collection: string, queryText: string, maxResults: number): Promise<RetrievedDocument[]> {
		try {
			const result = await this.retrieve(collection, queryText, maxResults);
			if (result.isErr()) {
				this.logger.warn('Retrieval failed, continuing without context', {
					collection,
					code: result.error.code,
					error: result.error.message,
				});
				return [];
			}
			return result.value;
		} catch (error) {
			this.logger.warn('Retrieval failed, continuing without context', {
				collection,
				error: toError(error).message,
			});
			return [];
		}
	}

	exampleQueries(queryText: string, limit: number = RETRIEVAL_CONFIG.EXAMPLE_QUERY_LIMIT): Promise<RetrievedDocument[]> {
		return this.retrieveContext(EXAMPLE_QUERIES_COLLECTION, queryText, limit);
	}

	fieldMetadata(queryText: string, limit: number = RETRIEVAL_CONFIG.FIELD_METADATA_LIMIT): Promise<RetrievedDocument[]> {
		return this.retrieveContext(FIELD_METADATA_COLLECTION, queryText, limit);
	}

	private async search(
		manager: CacheManager,
		text: string,
		maxResults: number
	): Promise<Result<SearchOutcome, EngineError>> {
		const ready = await manager.ensureReady();
		if (ready.isErr()) {
			return err(ready.error);
		}

		const handle = ready.value;
		if (handle.documentCount === 0) {
			return ok({ kind: 'results', results: [] });
		}

		const vector = await this.embedQuery(manager, text, handle.dimension);
		if (vector.isErr()) {
			return err(vector.error);
		}
		if (vector.value.length !== handle.dimension) {
			return ok({ kind: 'dimension_mismatch', expected: handle.dimension, actual: vector.value.length });
		}

		const results = manager.search(handle, vector.value, maxResults);
		if (results.isErr()) {
			return err(results.error);
		}
		return ok({ kind: 'results', results: results.value });
	}

	/**
	 * Query vector from the cache or the adapter. Cache failures never fail
	 * the query: a failed read is a miss, a failed write is only logged.
	 */
	private async embedQuery(
		manager: CacheManager,
		text: string,
		dimension: number
	): Promise<Result<number[], EngineError>> {
		const adapter = manager.adapter;
		const cache = this.queryCache
			.initialize()
			.andThen(() => this.queryCache.get(text, adapter.modelIdentifier, dimension));
		if (cache.isErr()) {
			this.logger.warn('Query cache unavailable, embedding directly', { error: cache.error.message });
		} else if (cache.value) {
			return ok(cache.value);
		}

		const result = await withRetry(
			() => withTimeout((signal) => adapter.embed([text], { signal }), this.timeoutMs, 'Query embedding'),
			this.retry,
			this.logger
		);
		if (result.isErr()) {
			return err(new ProviderFailureError(result.error));
		}

		const checked = validateVectors(result.value.vectors, 1);
		if (checked.isErr()) {
			return err(checked.error);
		}

		const [vector] = result.value.vectors;
		if (!vector) {
			return ok([]);
		}
		if (cache.isOk()) {
			const stored = this.queryCache.set(text, adapter.modelIdentifier, vector);
			if (stored.isErr()) {
				this.logger.warn('Query cache write failed', { error: stored.error.message });
			}
		}
		return ok(vector);
	}

	private finalize(results: ScoredDocument[], maxResults: number): RetrievedDocument[] {
		const seen = new Set<string>();
		const retrieved: RetrievedDocument[] = [];

		for (const { document, score } of results) {
			if (score < this.minScore || seen.has(document.id)) continue;
			seen.add(document.id);
			retrieved.push({ ...document, score });
			if (retrieved.length >= maxResults) break;
		}

		return retrieved;
	}

	close(): void {
		for (const manager of this.managers.values()) {
			manager.close();
		}
		this.queryCache.close();
	}
}
