/**
 * Corpus Suppliers and Collection Definitions
 *
 * A supplier hands over "the current corpus" of one collection as a keyed
 * map of raw entities. A collection definition turns those entities into
 * Documents. Neither knows about embeddings or persistence.
 */

import { Result, ok, err, toError } from '../../lib/result-types.js';
import { CorpusLoadError } from '../../lib/errors/EngineErrors.js';
import type { Document } from '../../models/Document.js';
import type { DistanceMetric } from '../../models/embedding-vector.js';
import type { ExampleQuery } from '../../models/ExampleQuery.js';
import type { FieldMetadata } from '../../models/FieldMetadata.js';
import type { DescriptionEnricher } from '../enrichment/DescriptionEnricher.js';
import { isValidCollectionName } from '../cache/MetadataStore.js';

export interface CorpusSnapshot<T> {
	entries: ReadonlyMap<string, T>;
	/** Upstream schema/API version of the entries; part of the fingerprint */
	contentVersion: string;
}

export interface CorpusSupplier<T> {
	/** Where the corpus comes from, for logs */
	readonly source: string;
	load(): Promise<Result<CorpusSnapshot<T>, CorpusLoadError>>;
}

type EntrySource<T> = ReadonlyMap<string, T> | Record<string, T>;

function isEntryMap<T>(entries: EntrySource<T>): entries is ReadonlyMap<string, T> {
	return entries instanceof Map;
}

function toEntryMap<T>(entries: EntrySource<T>): Map<string, T> {
	return isEntryMap(entries) ? new Map(entries) : new Map(Object.entries(entries));
}

/**
 * Supplier over entries already in memory
 */
export class StaticCorpusSupplier<T> implements CorpusSupplier<T> {
	readonly source = 'memory';
	private entries: Map<string, T>;

	constructor(
		entries: EntrySource<T>,
		private contentVersion: string = 'static'
	) {
		this.entries = toEntryMap(entries);
	}

	/**
	 * Replace the corpus (later loads see the new entries)
	 */
	replace(entries: EntrySource<T>, contentVersion?: string): void {
		this.entries = toEntryMap(entries);
		if (contentVersion !== undefined) {
			this.contentVersion = contentVersion;
		}
	}

	async load(): Promise<Result<CorpusSnapshot<T>, CorpusLoadError>> {
		return ok({ entries: new Map(this.entries), contentVersion: this.contentVersion });
	}
}

export interface CollectionDefinition<T> {
	name: string;
	supplier: CorpusSupplier<T>;
	toDocument(key: string, entity: T): Document;
	/** Version of toDocument's output format */
	documentVersion: string;
	metric?: DistanceMetric;
}

export interface LoadedDocuments {
	documents: Document[];
	/** Combined document and upstream version tag */
	contentVersion: string;
}

/**
 * A collection with its entity type erased, as the cache manager sees it
 */
export interface DocumentCollection {
	readonly name: string;
	readonly metric: DistanceMetric;
	readonly source: string;
	loadDocuments(): Promise<Result<LoadedDocuments, CorpusLoadError>>;
}

export function defineCollection<T>(definition: CollectionDefinition<T>): DocumentCollection {
	if (!isValidCollectionName(definition.name)) {
		throw new Error(`Invalid collection name '${definition.name}'`);
	}

	return {
		name: definition.name,
		metric: definition.metric ?? 'cosine',
		source: definition.supplier.source,
		async loadDocuments() {
			const loaded = await definition.supplier.load();
			if (loaded.isErr()) {
				return err(loaded.error);
			}

			try {
				const documents = [...loaded.value.entries].map(([key, entity]) =>
					definition.toDocument(key, entity)
				);
				const seen = new Set<string>();
				for (const doc of documents) {
					if (seen.has(doc.id)) {
						return err(new CorpusLoadError(definition.supplier.source, `duplicate document id '${doc.id}'`));
					}
					seen.add(doc.id);
				}
				return ok({
					documents,
					contentVersion: `${definition.documentVersion}|${loaded.value.contentVersion}`,
				});
			} catch (error) {
				return err(
					new CorpusLoadError(definition.supplier.source, 'could not build documents', toError(error))
				);
			}
		},
	};
}

export const EXAMPLE_QUERIES_COLLECTION = 'example_queries';
export const FIELD_METADATA_COLLECTION = 'field_metadata';

/**
 * Example queries: embedded text is the description, the query rides along
 */
export function exampleQueryCollection(supplier: CorpusSupplier<ExampleQuery>): DocumentCollection {
	return defineCollection({
		name: EXAMPLE_QUERIES_COLLECTION,
		supplier,
		documentVersion: 'example-query-v1',
		toDocument: (key, entry) => ({
			id: key,
			text: entry.description,
			attributes: { query: entry.query },
		}),
	});
}

/**
 * Field metadata: embedded text is synthesized by the enricher
 */
export function fieldMetadataCollection(
	supplier: CorpusSupplier<FieldMetadata>,
	enricher: DescriptionEnricher
): DocumentCollection {
	return defineCollection({
		name: FIELD_METADATA_COLLECTION,
		supplier,
		documentVersion: enricher.version,
		toDocument: (_key, field) => ({
			id: field.name,
			text: enricher.enrich(field),
			attributes: {
				category: field.category,
				data_type: field.data_type,
				selectable: field.selectable,
				filterable: field.filterable,
				sortable: field.sortable,
				metrics_compatible: field.metrics_compatible,
				resource_name: field.resource_name ?? null,
			},
		}),
	});
}
