/**
 * Cache Metadata Store
 *
 * Reads and atomically replaces the per-collection metadata record. The
 * record is stored apart from the snapshot so validity can be checked
 * without opening the vector table.
 */

import * as fs from 'fs';
import * as path from 'path';
import { Result, ok, err, trySync, toError } from '../../lib/result-types.js';
import { writeFileAtomic } from '../../lib/file-utils.js';
import { cacheMetadataSchema, type CacheMetadata } from '../../models/CacheMetadata.js';
import {
	PersistenceFailureError,
	SnapshotCorruptError,
	SnapshotNotFoundError,
} from '../../lib/errors/EngineErrors.js';
import { STORAGE_CONFIG } from '../../constants/retrieval-constants.js';

const COLLECTION_NAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9_-]*$/;

export function isValidCollectionName(name: string): boolean {
	return COLLECTION_NAME_PATTERN.test(name);
}

export class MetadataStore {
	constructor(readonly cacheDir: string) {}

	/**
	 * Directory holding a collection's snapshot files
	 */
	collectionDir(collection: string): string {
		return path.join(this.cacheDir, collection);
	}

	metadataPath(collection: string): string {
		return path.join(this.cacheDir, `${collection}${STORAGE_CONFIG.METADATA_SUFFIX}`);
	}

	read(collection: string): Result<CacheMetadata, SnapshotNotFoundError | SnapshotCorruptError> {
		const file = this.metadataPath(collection);

		let text: string;
		try {
			text = fs.readFileSync(file, 'utf-8');
		} catch (error) {
			const cause = toError(error);
			if ('code' in cause && cause.code === 'ENOENT') {
				return err(new SnapshotNotFoundError(collection));
			}
			return err(new SnapshotCorruptError(collection, `metadata unreadable: ${cause.message}`, cause));
		}

		let raw: unknown;
		try {
			raw = JSON.parse(text);
		} catch (error) {
			return err(new SnapshotCorruptError(collection, 'metadata is not valid JSON', toError(error)));
		}

		const parsed = cacheMetadataSchema.safeParse(raw);
		if (!parsed.success) {
			const issue = parsed.error.issues[0];
			return err(
				new SnapshotCorruptError(
					collection,
					`metadata failed validation at ${issue?.path.join('.') || '<root>'}: ${issue?.message ?? 'invalid'}`
				)
			);
		}

		return ok(parsed.data);
	}

	/**
	 * Atomically replace the record. This is the step that makes a snapshot
	 * current, so it must only run once the snapshot file is durable.
	 */
	write(collection: string, metadata: CacheMetadata): Result<void, PersistenceFailureError> {
		const file = this.metadataPath(collection);
		return trySync(
			() => writeFileAtomic(file, JSON.stringify(metadata, null, 2) + '\n'),
			(error) => new PersistenceFailureError('write metadata', file, toError(error))
		);
	}

	/**
	 * Collections with a record or a snapshot directory, sorted by name
	 */
	list(): Result<string[], PersistenceFailureError> {
		return trySync(
			() => {
				if (!fs.existsSync(this.cacheDir)) {
					return [];
				}
				const names = new Set<string>();
				for (const entry of fs.readdirSync(this.cacheDir, { withFileTypes: true })) {
					const name = entry.isDirectory()
						? entry.name
						: entry.name.endsWith(STORAGE_CONFIG.METADATA_SUFFIX)
							? entry.name.slice(0, -STORAGE_CONFIG.METADATA_SUFFIX.length)
							: null;
					if (name !== null && isValidCollectionName(name)) {
						names.add(name);
					}
				}
				return [...names].sort();
			},
			(error) => new PersistenceFailureError('list collections in', this.cacheDir, toError(error))
		);
	}

	/**
	 * Delete the record; true if one existed
	 */
	remove(collection: string): Result<boolean, PersistenceFailureError> {
		const file = this.metadataPath(collection);
		return trySync(
			() => {
				const existed = fs.existsSync(file);
				fs.rmSync(file, { force: true });
				return existed;
			},
			(error) => new PersistenceFailureError('delete metadata', file, toError(error))
		);
	}
}
