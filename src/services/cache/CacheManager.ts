/**
 * Cache Manager
 *
 * Load-or-rebuild state machine for one collection:
 *
 *   unknown -> validating -> { valid | stale | missing | corrupt } -> ready
 *
 * Validation fingerprints the live corpus and compares it with the persisted
 * metadata record. Anything but a match rebuilds the whole snapshot; a failed
 * rebuild leaves the previous snapshot current.
 */

import { Result, ok, err } from '../../lib/result-types.js';
import { logger as defaultLogger, type CacheEventReason, type Logger } from '../../lib/logger.js';
import type { RetryConfig } from '../../lib/retry-utils.js';
import type { BatchingConfig } from '../../lib/env-config.js';
import { EngineError } from '../../lib/errors/EngineErrors.js';
import type { CacheMetadata } from '../../models/CacheMetadata.js';
import type { Document, ScoredDocument } from '../../models/Document.js';
import { STORAGE_CONFIG, EMBEDDING_CONFIG } from '../../constants/retrieval-constants.js';
import {
	computeFingerprint,
	fingerprintsEqual,
	parseFingerprint,
	serializeFingerprint,
	type Fingerprint,
} from '../fingerprint/ContentFingerprint.js';
import { embedInBatches } from '../embedding/batch-embedder.js';
import type { IEmbeddingAdapter } from '../embedding/adapter-interface.js';
import type { DocumentCollection } from '../corpus/CorpusSupplier.js';
import type { SnapshotHandle, VectorIndex } from '../vector-index/VectorIndex.js';
import { clearCollection } from './snapshot-admin.js';

export type CacheState =
	| 'unknown'
	| 'validating'
	| 'valid'
	| 'stale'
	| 'missing'
	| 'corrupt'
	| 'ready';

export type Assessment = 'valid' | 'stale' | 'missing' | 'corrupt';

export interface CacheStatus {
	collection: string;
	/** `unverified` when no live corpus was compared */
	state: Assessment | 'unverified';
	reason: CacheEventReason;
	/** From the persisted record; null when there is none */
	documentCount: number | null;
	createdAt: string | null;
	modelId: string | null;
	/** Documents the live corpus holds right now; null when not loaded */
	corpusSize: number | null;
}

export interface RebuildSummary {
	reason: CacheEventReason;
	embeddedTexts: number;
	providerCalls: number;
	durationMs: number;
}

export interface CacheManagerOptions {
	batching?: Partial<BatchingConfig>;
	retry?: RetryConfig;
	logger?: Logger;
	/** Overridable for tests of layout migrations */
	schemaVersion?: number;
	onProgress?: (collection: string, embedded: number, total: number) => void;
}

export interface EnsureReadyOptions {
	/** Rebuild even when the snapshot is valid */
	force?: boolean;
}

interface CorpusState {
	documents: Document[];
	contentHash: bigint;
	fingerprint: Fingerprint;
	serialized: string;
}

interface AssessmentResult {
	state: Assessment;
	reason: CacheEventReason;
	metadata: CacheMetadata | null;
}

export class CacheManager {
	private currentState: CacheState = 'unknown';
	private handle: SnapshotHandle | null = null;
	private inFlight: Promise<Result<SnapshotHandle, EngineError>> | null = null;
	private inFlightForced = false;
	private lastRebuildSummary: RebuildSummary | null = null;

	private readonly logger: Logger;
	private readonly schemaVersion: number;
	private readonly batching: BatchingConfig;

	constructor(
		private readonly collection: DocumentCollection,
		private readonly embeddingAdapter: IEmbeddingAdapter,
		private readonly vectorIndex: VectorIndex,
		private readonly options: CacheManagerOptions = {}
	) {
		this.logger = options.logger ?? defaultLogger;
		this.schemaVersion = options.schemaVersion ?? STORAGE_CONFIG.SCHEMA_VERSION;
		this.batching = {
			batchSize: options.batching?.batchSize ?? EMBEDDING_CONFIG.DEFAULT_BATCH_SIZE,
			concurrency: options.batching?.concurrency ?? EMBEDDING_CONFIG.DEFAULT_CONCURRENCY,
			timeoutMs: options.batching?.timeoutMs ?? EMBEDDING_CONFIG.DEFAULT_TIMEOUT_MS,
		};
	}

	get name(): string {
		return this.collection.name;
	}

	get state(): CacheState {
		return this.currentState;
	}

	get adapter(): IEmbeddingAdapter {
		return this.embeddingAdapter;
	}

	/** Summary of the most recent successful rebuild by this instance */
	get lastRebuild(): RebuildSummary | null {
		return this.lastRebuildSummary;
	}

	/**
	 * Bring the collection to Ready and return its open snapshot
	 *
	 * Concurrent callers share one validation or rebuild. A forced request
	 * waits for an unforced run and then starts one forced rebuild, which
	 * later forced requests join.
	 */
	async ensureReady(options: EnsureReadyOptions = {}): Promise<Result<SnapshotHandle, EngineError>> {
		const force = options.force ?? false;

		while (this.inFlight) {
			if (!force || this.inFlightForced) {
				return this.inFlight;
			}
			await this.inFlight;
		}

		const run: Promise<Result<SnapshotHandle, EngineError>> = this.prepare(force).finally(() => {
			if (this.inFlight === run) {
				this.inFlight = null;
				this.inFlightForced = false;
			}
		});
		this.inFlight = run;
		this.inFlightForced = force;
		return run;
	}

	private async prepare(force: boolean): Promise<Result<SnapshotHandle, EngineError>> {
		this.currentState = 'validating';

		const corpus = await this.loadCorpus();
		if (corpus.isErr()) {
			this.currentState = this.handle ? 'ready' : 'unknown';
			return err(corpus.error);
		}

		// Fast path: the open snapshot already matches the live corpus
		if (!force && this.handle?.isOpen && this.handle.metadata.fingerprint === corpus.value.serialized) {
			this.currentState = 'ready';
			return ok(this.handle);
		}

		const assessment = this.assess(corpus.value);
		this.currentState = assessment.state;

		if (!force && assessment.state === 'valid') {
			const opened = this.vectorIndex.open(this.collection.name);
			if (opened.isOk()) {
				this.swapHandle(opened.value);
				this.currentState = 'ready';
				this.logger.logCacheEvent(this.collection.name, 'validated', 'none', {
					documents: opened.value.documentCount,
					createdAt: opened.value.metadata.createdAt,
				});
				return ok(opened.value);
			}

			this.currentState = 'corrupt';
			return this.rebuild(corpus.value, 'corrupt', { error: opened.error.message });
		}

		return this.rebuild(corpus.value, force ? 'forced' : assessment.reason);
	}

	private async loadCorpus(): Promise<Result<CorpusState, EngineError>> {
		const loaded = await this.collection.loadDocuments();
		if (loaded.isErr()) {
			return err(loaded.error);
		}

		const { contentHash, fingerprint } = computeFingerprint({
			documents: loaded.value.documents,
			contentVersion: loaded.value.contentVersion,
			schemaVersion: this.schemaVersion,
			modelId: this.embeddingAdapter.modelIdentifier,
		});

		return ok({
			documents: loaded.value.documents,
			contentHash,
			fingerprint,
			serialized: serializeFingerprint(fingerprint),
		});
	}

	/**
	 * Compare the live corpus with the persisted record
	 */
	private assess(corpus: CorpusState): AssessmentResult {
		const read = this.vectorIndex.metadataStore.read(this.collection.name);
		if (read.isErr()) {
			return read.error.code === 'SNAPSHOT_NOT_FOUND'
				? { state: 'missing', reason: 'missing', metadata: null }
				: { state: 'corrupt', reason: 'corrupt', metadata: null };
		}

		const metadata = read.value;
		const stored = parseFingerprint(metadata.fingerprint);
		if (!stored) {
			return { state: 'corrupt', reason: 'corrupt', metadata: null };
		}
		if (metadata.schemaVersion !== this.schemaVersion) {
			return { state: 'stale', reason: 'schema_version_changed', metadata };
		}
		if (metadata.modelId !== this.embeddingAdapter.modelIdentifier) {
			return { state: 'stale', reason: 'model_changed', metadata };
		}
		if (!fingerprintsEqual(stored, corpus.fingerprint)) {
			return { state: 'stale', reason: 'fingerprint_mismatch', metadata };
		}

		const liveDimension = this.embeddingAdapter.dimension();
		if (liveDimension !== undefined && metadata.documentCount > 0 && metadata.dimension !== liveDimension) {
			return { state: 'stale', reason: 'dimension_mismatch', metadata };
		}

		return { state: 'valid', reason: 'none', metadata };
	}

	private async rebuild(
		corpus: CorpusState,
		reason: CacheEventReason,
		context: Record<string, unknown> = {}
	): Promise<Result<SnapshotHandle, EngineError>> {
		const started = Date.now();
		const failedState = this.currentState;
		const name = this.collection.name;

		this.logger.logCacheEvent(name, 'rebuild_started', reason, {
			...context,
			documents: corpus.documents.length,
			modelId: this.embeddingAdapter.modelIdentifier,
		});

		const documents = [...corpus.documents].sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));

		const embedded = await embedInBatches(
			this.embeddingAdapter,
			documents.map((doc) => doc.text),
			{
				...this.batching,
				retry: this.options.retry,
				logger: this.logger,
				onProgress: (done, total) => this.options.onProgress?.(name, done, total),
			}
		);
		if (embedded.isErr()) {
			return this.fail(failedState, reason, embedded.error);
		}

		const built = this.vectorIndex.build({
			collection: name,
			documents,
			embeddings: embedded.value.vectors,
			metric: this.collection.metric,
			modelId: this.embeddingAdapter.modelIdentifier,
			schemaVersion: this.schemaVersion,
			contentHash: corpus.contentHash,
			fingerprint: corpus.serialized,
		});
		if (built.isErr()) {
			return this.fail(failedState, reason, built.error);
		}

		this.swapHandle(built.value);
		this.currentState = 'ready';
		this.lastRebuildSummary = {
			reason,
			embeddedTexts: documents.length,
			providerCalls: embedded.value.calls,
			durationMs: Date.now() - started,
		};

		this.logger.logCacheEvent(name, 'rebuild_completed', reason, {
			documents: documents.length,
			dimension: embedded.value.dimension,
			partitioned: built.value.isPartitioned,
			durationMs: this.lastRebuildSummary.durationMs,
		});

		return ok(built.value);
	}

	private fail(
		state: CacheState,
		reason: CacheEventReason,
		error: EngineError
	): Result<SnapshotHandle, EngineError> {
		this.currentState = state;
		this.logger.logCacheEvent(this.collection.name, 'rebuild_failed', reason, {
			code: error.code,
			error: error.message,
		});
		return err(error);
	}

	private swapHandle(next: SnapshotHandle): void {
		if (this.handle && this.handle !== next) {
			this.handle.close();
		}
		this.handle = next;
	}

	/**
	 * Similarity search against a handle this manager handed out
	 */
	search(
		handle: SnapshotHandle,
		queryVector: readonly number[],
		k: number
	): Result<ScoredDocument[], EngineError> {
		return this.vectorIndex.search(handle, queryVector, k);
	}

	/**
	 * Report validity without embedding or rebuilding anything
	 */
	async status(): Promise<Result<CacheStatus, EngineError>> {
		const corpus = await this.loadCorpus();
		if (corpus.isErr()) {
			return err(corpus.error);
		}

		const assessment = this.assess(corpus.value);
		return ok({
			collection: this.collection.name,
			state: assessment.state,
			reason: assessment.reason,
			documentCount: assessment.metadata?.documentCount ?? null,
			createdAt: assessment.metadata?.createdAt ?? null,
			modelId: assessment.metadata?.modelId ?? null,
			corpusSize: corpus.value.documents.length,
		});
	}

	/**
	 * Delete the persisted snapshot; the next ensureReady rebuilds
	 */
	async clear(): Promise<Result<boolean, EngineError>> {
		if (this.inFlight) {
			await this.inFlight;
		}

		this.handle?.close();
		this.handle = null;
		this.currentState = 'unknown';

		return clearCollection(this.vectorIndex, this.collection.name, this.logger);
	}

	close(): void {
		this.handle?.close();
		this.handle = null;
		this.currentState = 'unknown';
	}
}
