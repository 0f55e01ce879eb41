/**
 * File-backed corpus suppliers
 */

import { promises as fs } from 'fs';
import { Result, ok, err, toError } from '../../lib/result-types.js';
import { logger as defaultLogger, type Logger } from '../../lib/logger.js';
import { CorpusLoadError } from '../../lib/errors/EngineErrors.js';
import { exampleQueryFileSchema, type ExampleQuery } from '../../models/ExampleQuery.js';
import { fieldMetadataFileSchema, type FieldMetadata } from '../../models/FieldMetadata.js';
import { CORPUS_CONFIG } from '../../constants/retrieval-constants.js';
import type { CorpusSnapshot, CorpusSupplier } from './CorpusSupplier.js';

const DAY_MS = 24 * 60 * 60 * 1000;

async function readJson(path: string): Promise<Result<unknown, CorpusLoadError>> {
	let text: string;
	try {
		text = await fs.readFile(path, 'utf-8');
	} catch (error) {
		return err(new CorpusLoadError(path, 'file unreadable', toError(error)));
	}
	try {
		const value: unknown = JSON.parse(text);
		return ok(value);
	} catch (error) {
		return err(new CorpusLoadError(path, 'file is not valid JSON', toError(error)));
	}
}

/**
 * Example queries from a JSON object of `{ key: { description, query } }`
 */
export class ExampleQueryFileSupplier implements CorpusSupplier<ExampleQuery> {
	constructor(readonly source: string) {}

	async load(): Promise<Result<CorpusSnapshot<ExampleQuery>, CorpusLoadError>> {
		const raw = await readJson(this.source);
		if (raw.isErr()) {
			return err(raw.error);
		}

		const parsed = exampleQueryFileSchema.safeParse(raw.value);
		if (!parsed.success) {
			const issue = parsed.error.issues[0];
			return err(
				new CorpusLoadError(
					this.source,
					`invalid entry at ${issue?.path.join('.') || '<root>'}: ${issue?.message ?? 'invalid'}`
				)
			);
		}

		return ok({ entries: new Map(Object.entries(parsed.data)), contentVersion: 'file' });
	}
}

export interface FieldMetadataFileOptions {
	maxAgeDays?: number;
	logger?: Logger;
	/** Injected clock for freshness checks */
	now?: () => Date;
}

/**
 * Field metadata from the JSON cache written by the schema fetcher.
 * Refreshing that file is the fetcher's job; stale data is only reported.
 */
export class FieldMetadataFileSupplier implements CorpusSupplier<FieldMetadata> {
	private readonly maxAgeDays: number;
	private readonly logger: Logger;
	private readonly now: () => Date;

	constructor(readonly source: string, options: FieldMetadataFileOptions = {}) {
		this.maxAgeDays = options.maxAgeDays ?? CORPUS_CONFIG.DEFAULT_FIELD_METADATA_MAX_AGE_DAYS;
		this.logger = options.logger ?? defaultLogger;
		this.now = options.now ?? (() => new Date());
	}

	async load(): Promise<Result<CorpusSnapshot<FieldMetadata>, CorpusLoadError>> {
		const raw = await readJson(this.source);
		if (raw.isErr()) {
			return err(raw.error);
		}

		const parsed = fieldMetadataFileSchema.safeParse(raw.value);
		if (!parsed.success) {
			const issue = parsed.error.issues[0];
			return err(
				new CorpusLoadError(
					this.source,
					`invalid field metadata at ${issue?.path.join('.') || '<root>'}: ${issue?.message ?? 'invalid'}`
				)
			);
		}

		const ageDays = (this.now().getTime() - new Date(parsed.data.last_updated).getTime()) / DAY_MS;
		if (ageDays > this.maxAgeDays) {
			this.logger.warn('Field metadata is older than its refresh interval', {
				source: this.source,
				lastUpdated: parsed.data.last_updated,
				ageDays: Math.floor(ageDays),
				maxAgeDays: this.maxAgeDays,
			});
		}

		const entries = new Map<string, FieldMetadata>();
		for (const [key, field] of Object.entries(parsed.data.fields)) {
			entries.set(key, field);
		}

		return ok({ entries, contentVersion: `api-${parsed.data.api_version}` });
	}
}
