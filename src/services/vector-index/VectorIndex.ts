/**
 * Vector Index
 *
 * Durable storage and similarity search for one collection's documents and
 * embeddings. Every build writes a fresh SQLite snapshot file; the snapshot
 * becomes current only when the metadata record naming it is atomically
 * replaced. Distances are computed in SQLite by sqlite-vec.
 */

import Database from 'better-sqlite3';
import * as sqliteVec from 'sqlite-vec';
import * as fs from 'fs';
import * as path from 'path';
import { randomBytes } from 'crypto';
import { Result, ok, err, toError } from '../../lib/result-types.js';
import { logger as defaultLogger, type Logger } from '../../lib/logger.js';
import { fsyncFile, publishFile, stagingPath } from '../../lib/file-utils.js';
import {
	DimensionMismatchError,
	PersistenceFailureError,
	SnapshotCorruptError,
	SnapshotNotFoundError,
	requiresRebuild,
} from '../../lib/errors/EngineErrors.js';
import {
	decodeEmbedding,
	distanceToScore,
	encodeEmbedding,
	type DistanceMetric,
} from '../../models/embedding-vector.js';
import { isDocumentAttributes, type Document, type ScoredDocument } from '../../models/Document.js';
import type { CacheMetadata } from '../../models/CacheMetadata.js';
import { ANN_CONFIG, STORAGE_CONFIG } from '../../constants/retrieval-constants.js';
import { MetadataStore } from '../cache/MetadataStore.js';
import { centroidAt, rankPartitions, trainPartitions } from './ivf-partitioner.js';

/** Layout version of the snapshot file itself */
const SNAPSHOT_FORMAT = '1';

export interface VectorIndexOptions {
	/** Collections at least this large get an inverted-file index */
	annMinCardinality?: number;
	/** Partitions probed per approximate search */
	nprobe?: number;
	logger?: Logger;
}

/**
 * Everything the metadata record needs besides what the build derives
 */
export interface BuildRequest {
	collection: string;
	documents: readonly Document[];
	embeddings: readonly number[][];
	metric: DistanceMetric;
	modelId: string;
	schemaVersion: number;
	contentHash: bigint;
	fingerprint: string;
}

interface SearchRow {
	id: string;
	text: string;
	attributes: string;
	distance: number | null;
}

interface DocumentRow {
	id: string;
	text: string;
	attributes: string;
	embedding: Buffer;
}

interface PartitionRow {
	partition_id: number;
	centroid: Buffer;
	size: number;
}

interface PartitionTable {
	centroids: Float32Array;
	count: number;
	sizes: number[];
}

/**
 * An open, read-only snapshot
 */
export class SnapshotHandle {
	private db: Database.Database | null;

	constructor(
		readonly collection: string,
		readonly metadata: CacheMetadata,
		readonly snapshotPath: string,
		db: Database.Database,
		private readonly partitions: PartitionTable | null
	) {
		this.db = db;
	}

	get documentCount(): number {
		return this.metadata.documentCount;
	}

	get dimension(): number {
		return this.metadata.dimension;
	}

	get metric(): DistanceMetric {
		return this.metadata.distanceMetric;
	}

	/** True when searches go through the inverted-file index */
	get isPartitioned(): boolean {
		return this.partitions !== null;
	}

	get isOpen(): boolean {
		return this.db !== null;
	}

	private requireDb(): Database.Database {
		if (!this.db) {
			throw new Error(`Snapshot for '${this.collection}' is closed`);
		}
		return this.db;
	}

	/**
	 * Every stored document with its embedding, ordered by id
	 */
	readAll(): Result<Array<{ document: Document; embedding: Float32Array }>, SnapshotCorruptError> {
		try {
			const rows = this.requireDb()
				.prepare<[], DocumentRow>('SELECT id, text, attributes, embedding FROM documents ORDER BY id')
				.all();

			const entries: Array<{ document: Document; embedding: Float32Array }> = [];
			for (const row of rows) {
				const document = toDocument(this.collection, row);
				if (document.isErr()) return err(document.error);
				entries.push({ document: document.value, embedding: decodeEmbedding(row.embedding) });
			}
			return ok(entries);
		} catch (error) {
			return err(new SnapshotCorruptError(this.collection, 'documents unreadable', toError(error)));
		}
	}

	/**
	 * Top-k documents for a query vector, most relevant first
	 */
	search(
		queryVector: readonly number[],
		k: number,
		nprobe: number
	): Result<ScoredDocument[], DimensionMismatchError | SnapshotCorruptError> {
		if (k <= 0 || this.documentCount === 0) {
			return ok([]);
		}
		if (queryVector.length !== this.dimension) {
			return err(new DimensionMismatchError(this.dimension, queryVector.length, 'query vector'));
		}

		const distanceFn = this.metric === 'cosine' ? 'vec_distance_cosine' : 'vec_distance_l2';
		const params: Array<Buffer | number> = [encodeEmbedding([...queryVector])];
		let where = '';

		if (this.partitions) {
			const selected = this.selectPartitions(queryVector, k, nprobe);
			where = `WHERE partition_id IN (${selected.map(() => '?').join(', ')})`;
			params.push(...selected);
		}
		params.push(k);

		let rows: SearchRow[];
		try {
			rows = this.requireDb()
				.prepare<Array<Buffer | number>, SearchRow>(
					`SELECT id, text, attributes, ${distanceFn}(embedding, ?) AS distance
					FROM documents
					${where}
					ORDER BY distance IS NULL, distance ASC, id ASC
					LIMIT ?`
				)
				.all(...params);
		} catch (error) {
			return err(new SnapshotCorruptError(this.collection, 'search query failed', toError(error)));
		}

		const results: ScoredDocument[] = [];
		for (const row of rows) {
			const score = distanceToScore(row.distance ?? Number.NaN, this.metric);
			if (!Number.isFinite(score)) continue;
			const document = toDocument(this.collection, row);
			if (document.isErr()) return err(document.error);
			results.push({ document: document.value, score });
		}

		return ok(sortByRelevance(results).slice(0, k));
	}

	/**
	 * Closest `nprobe` partitions, widened until they hold at least k documents
	 */
	private selectPartitions(queryVector: readonly number[], k: number, nprobe: number): number[] {
		const table = this.partitions;
		if (!table) return [];

		const ranked = rankPartitions(table.centroids, this.dimension, table.count, queryVector, this.metric);
		const selected: number[] = [];
		let covered = 0;
		for (const partition of ranked) {
			if (selected.length >= nprobe && covered >= k) break;
			selected.push(partition);
			covered += table.sizes[partition] ?? 0;
		}
		return selected;
	}

	close(): void {
		if (this.db) {
			this.db.close();
			this.db = null;
		}
	}
}

function toDocument(
	collection: string,
	row: { id: string; text: string; attributes: string }
): Result<Document, SnapshotCorruptError> {
	let attributes: unknown;
	try {
		attributes = JSON.parse(row.attributes);
	} catch (error) {
		return err(new SnapshotCorruptError(collection, `attributes of '${row.id}' are not JSON`, toError(error)));
	}
	if (!isDocumentAttributes(attributes)) {
		return err(new SnapshotCorruptError(collection, `attributes of '${row.id}' are malformed`));
	}
	return ok({ id: row.id, text: row.text, attributes });
}

/**
 * Score descending, id ascending on ties
 */
export function sortByRelevance(results: ScoredDocument[]): ScoredDocument[] {
	return results.sort(
		(a, b) =>
			b.score - a.score ||
			(a.document.id < b.document.id ? -1 : a.document.id > b.document.id ? 1 : 0)
	);
}

export class VectorIndex {
	private readonly annMinCardinality: number;
	private readonly nprobe: number;
	private readonly logger: Logger;

	constructor(
		private readonly store: MetadataStore,
		options: VectorIndexOptions = {}
	) {
		this.annMinCardinality = options.annMinCardinality ?? ANN_CONFIG.DEFAULT_MIN_CARDINALITY;
		this.nprobe = options.nprobe ?? ANN_CONFIG.DEFAULT_NPROBE;
		this.logger = options.logger ?? defaultLogger;
	}

	get metadataStore(): MetadataStore {
		return this.store;
	}

	/**
	 * Write a complete snapshot, then make it current by replacing the
	 * metadata record. On any failure the previous snapshot stays current.
	 */
	build(
		request: BuildRequest
	): Result<SnapshotHandle, DimensionMismatchError | PersistenceFailureError | SnapshotCorruptError> {
		const { collection, documents, embeddings, metric } = request;

		if (documents.length !== embeddings.length) {
			return err(
				new DimensionMismatchError(documents.length, embeddings.length, 'one embedding per document')
			);
		}

		const dimension = embeddings[0]?.length ?? 0;
		for (let i = 0; i < embeddings.length; i++) {
			const width = embeddings[i]?.length ?? 0;
			if (width !== dimension || width === 0) {
				return err(new DimensionMismatchError(dimension, width, `embedding of '${documents[i]?.id}'`));
			}
		}

		const dir = this.store.collectionDir(collection);
		const snapshotFile = `${STORAGE_CONFIG.SNAPSHOT_PREFIX}${Date.now()}-${randomBytes(4).toString('hex')}.db`;
		const finalPath = path.join(dir, snapshotFile);
		const tmpPath = stagingPath(finalPath);

		try {
			fs.mkdirSync(dir, { recursive: true });
			this.writeSnapshot(tmpPath, request, dimension);
			fsyncFile(tmpPath);
			publishFile(tmpPath, finalPath);
		} catch (error) {
			fs.rmSync(tmpPath, { force: true });
			return err(new PersistenceFailureError('write snapshot', finalPath, toError(error)));
		}

		const metadata: CacheMetadata = {
			schemaVersion: request.schemaVersion,
			modelId: request.modelId,
			contentHash: request.contentHash.toString(),
			fingerprint: request.fingerprint,
			createdAt: new Date().toISOString(),
			distanceMetric: metric,
			dimension,
			documentCount: documents.length,
			snapshotFile,
		};

		const written = this.store.write(collection, metadata);
		if (written.isErr()) {
			// Never became current; discard it
			fs.rmSync(finalPath, { force: true });
			return err(written.error);
		}

		this.collectGarbage(collection, snapshotFile);
		return this.openWith(collection, metadata);
	}

	private writeSnapshot(file: string, request: BuildRequest, dimension: number): void {
		const db = new Database(file);
		try {
			db.pragma('synchronous = FULL');
			db.exec(`
				CREATE TABLE snapshot_info (
					key TEXT PRIMARY KEY,
					value TEXT NOT NULL
				);
				CREATE TABLE documents (
					id TEXT PRIMARY KEY,
					text TEXT NOT NULL,
					attributes TEXT NOT NULL,
					embedding BLOB NOT NULL,
					partition_id INTEGER
				);
				CREATE TABLE partitions (
					partition_id INTEGER PRIMARY KEY,
					centroid BLOB NOT NULL,
					size INTEGER NOT NULL
				);
			`);

			const partitioning =
				request.documents.length >= this.annMinCardinality
					? trainPartitions(request.embeddings, request.metric)
					: null;

			const insertInfo = db.prepare<[string, string]>('INSERT INTO snapshot_info (key, value) VALUES (?, ?)');
			const insertDocument = db.prepare<[string, string, string, Buffer, number | null]>(
				'INSERT INTO documents (id, text, attributes, embedding, partition_id) VALUES (?, ?, ?, ?, ?)'
			);
			const insertPartition = db.prepare<[number, Buffer, number]>(
				'INSERT INTO partitions (partition_id, centroid, size) VALUES (?, ?, ?)'
			);

			db.transaction(() => {
				insertInfo.run('format', SNAPSHOT_FORMAT);
				insertInfo.run('dimension', String(dimension));
				insertInfo.run('metric', request.metric);
				insertInfo.run('document_count', String(request.documents.length));

				request.documents.forEach((doc, i) => {
					insertDocument.run(
						doc.id,
						doc.text,
						JSON.stringify(doc.attributes),
						encodeEmbedding(request.embeddings[i] ?? []),
						partitioning ? (partitioning.assignments[i] ?? null) : null
					);
				});

				if (partitioning) {
					for (let p = 0; p < partitioning.partitionCount; p++) {
						insertPartition.run(
							p,
							encodeEmbedding(centroidAt(partitioning.centroids, dimension, p)),
							partitioning.sizes[p] ?? 0
						);
					}
					db.exec('CREATE INDEX idx_documents_partition ON documents (partition_id)');
				}
			})();
		} finally {
			db.close();
		}
	}

	/**
	 * Open the current snapshot of a collection
	 */
	open(collection: string): Result<SnapshotHandle, SnapshotNotFoundError | SnapshotCorruptError> {
		return this.store.read(collection).andThen((metadata) => this.openWith(collection, metadata));
	}

	private openWith(
		collection: string,
		metadata: CacheMetadata
	): Result<SnapshotHandle, SnapshotCorruptError> {
		const file = path.join(this.store.collectionDir(collection), metadata.snapshotFile);
		if (!fs.existsSync(file)) {
			return err(new SnapshotCorruptError(collection, `snapshot file ${metadata.snapshotFile} is missing`));
		}

		let db: Database.Database | null = null;
		try {
			db = new Database(file, { readonly: true, fileMustExist: true });
			sqliteVec.load(db);

			const info = new Map(
				db.prepare<[], { key: string; value: string }>('SELECT key, value FROM snapshot_info')
					.all()
					.map((row) => [row.key, row.value])
			);
			const count = db.prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM documents').get();

			const mismatch =
				info.get('format') !== SNAPSHOT_FORMAT
					? `unsupported format ${info.get('format') ?? '<none>'}`
					: info.get('dimension') !== String(metadata.dimension)
						? `dimension ${info.get('dimension') ?? '<none>'} does not match metadata ${metadata.dimension}`
						: info.get('metric') !== metadata.distanceMetric
							? `metric ${info.get('metric') ?? '<none>'} does not match metadata ${metadata.distanceMetric}`
							: count?.count !== metadata.documentCount
								? `holds ${count?.count ?? 0} documents, metadata says ${metadata.documentCount}`
								: null;
			if (mismatch) {
				db.close();
				return err(new SnapshotCorruptError(collection, mismatch));
			}

			const partitionRows = db
				.prepare<[], PartitionRow>('SELECT partition_id, centroid, size FROM partitions ORDER BY partition_id')
				.all();
			let partitions: PartitionTable | null = null;
			if (partitionRows.length > 0) {
				const centroids = new Float32Array(partitionRows.length * metadata.dimension);
				const sizes: number[] = [];
				for (const row of partitionRows) {
					const centroid = decodeEmbedding(row.centroid);
					if (row.partition_id !== sizes.length || centroid.length !== metadata.dimension) {
						db.close();
						return err(new SnapshotCorruptError(collection, `partition ${row.partition_id} is malformed`));
					}
					centroids.set(centroid, row.partition_id * metadata.dimension);
					sizes.push(row.size);
				}
				partitions = { centroids, count: partitionRows.length, sizes };
			}

			return ok(new SnapshotHandle(collection, metadata, file, db, partitions));
		} catch (error) {
			db?.close();
			return err(new SnapshotCorruptError(collection, 'snapshot unreadable', toError(error)));
		}
	}

	/**
	 * Similarity search against an open snapshot
	 */
	search(
		handle: SnapshotHandle,
		queryVector: readonly number[],
		k: number
	): Result<ScoredDocument[], DimensionMismatchError | SnapshotCorruptError> {
		return handle.search(queryVector, k, this.nprobe);
	}

	/**
	 * Open-and-search for callers without a handle. A missing or unreadable
	 * snapshot yields no results and a warning.
	 */
	searchCollection(
		collection: string,
		queryVector: readonly number[],
		k: number
	): Result<ScoredDocument[], DimensionMismatchError | SnapshotCorruptError> {
		const opened = this.open(collection);
		if (opened.isErr()) {
			if (requiresRebuild(opened.error)) {
				this.logger.warn('Search against a collection without a usable snapshot', {
					collection,
					reason: opened.error.code,
				});
				return ok([]);
			}
			return err(opened.error);
		}

		try {
			return this.search(opened.value, queryVector, k);
		} finally {
			opened.value.close();
		}
	}

	/**
	 * Remove a collection's metadata and every snapshot file
	 */
	clear(collection: string): Result<boolean, PersistenceFailureError> {
		return this.store.remove(collection).andThen((existed) => {
			const dir = this.store.collectionDir(collection);
			try {
				fs.rmSync(dir, { recursive: true, force: true });
				return ok(existed);
			} catch (error) {
				return err(new PersistenceFailureError('delete snapshots', dir, toError(error)));
			}
		});
	}

	/**
	 * Delete snapshot and staging files other than the current one
	 */
	collectGarbage(collection: string, currentFile: string): number {
		const dir = this.store.collectionDir(collection);
		let removed = 0;
		try {
			for (const entry of fs.readdirSync(dir)) {
				if (entry === currentFile || !entry.startsWith(STORAGE_CONFIG.SNAPSHOT_PREFIX)) continue;
				fs.rmSync(path.join(dir, entry), { force: true });
				removed++;
			}
		} catch (error) {
			this.logger.warn('Could not remove stale snapshots', {
				collection,
				error: toError(error).message,
			});
		}
		return removed;
	}
}
