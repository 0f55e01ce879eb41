/**
 * Document Model
 *
 * The unit of storage and retrieval. `text` is what gets embedded and may be
 * synthesized from structured attributes rather than copied from a raw name.
 */

export type AttributeValue = string | number | boolean | null;

export type DocumentAttributes = Record<string, AttributeValue>;

export interface Document {
  /** Unique within a collection */
  id: string;

  /** Embedded text */
  text: string;

  attributes: DocumentAttributes;
}

/**
 * A document returned by similarity search
 */
export interface ScoredDocument {
  document: Document;

  /** Higher is more relevant, whatever the distance metric */
  score: number;
}

/**
 * Flattened shape handed to downstream consumers of retrieval
 */
export interface RetrievedDocument extends Document {
  score: number;
}

/**
 * Check whether a parsed JSON value is a valid attribute map
 */
export function isDocumentAttributes(value: unknown): value is DocumentAttributes {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  return Object.values(value).every(
    (v) => v === null || typeof v === 'string' || typeof v === 'number' || typeof v === 'boolean'
  );
}
