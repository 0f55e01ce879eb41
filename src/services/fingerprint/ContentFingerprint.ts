/**
 * Content Fingerprinting
 *
 * A single comparable value that changes exactly when something that affects
 * the persisted vectors changes: document content, the persisted layout
 * (schema version) or the embedding model.
 */

import { xxh64 } from '@node-rs/xxhash';
import type { Document } from '../../models/Document.js';

export interface Fingerprint {
  schemaVersion: number;
  /** Unsigned 64-bit xxh64 */
  hash: bigint;
}

export interface FingerprintInput {
  documents: Iterable<Document>;
  /**
   * Version tag of whatever produced the documents (enrichment version,
   * upstream schema version). Changing it invalidates the collection even
   * when the texts happen to be identical.
   */
  contentVersion: string;
  schemaVersion: number;
  modelId: string;
}

export interface FingerprintResult {
  contentHash: bigint;
  fingerprint: Fingerprint;
}

function compareCodeUnits(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function hashString(value: string): bigint {
  return xxh64(Buffer.from(value, 'utf-8'));
}

/**
 * Hash of the collection contents, independent of iteration order
 *
 * Documents are sorted by id (then text) and attribute keys are sorted, so
 * two maps holding the same entries hash the same regardless of how they
 * were populated. The JSON array encoding keeps field boundaries unambiguous.
 */
export function computeContentHash(documents: Iterable<Document>, contentVersion: string): bigint {
  const sorted = [...documents].sort(
    (a, b) => compareCodeUnits(a.id, b.id) || compareCodeUnits(a.text, b.text)
  );

  const canonical = sorted.map((doc) => [
    doc.id,
    doc.text,
    Object.keys(doc.attributes)
      .sort(compareCodeUnits)
      .map((key) => [key, doc.attributes[key] ?? null]),
  ]);

  return hashString(JSON.stringify([contentVersion, canonical]));
}

/**
 * Fingerprint over content, schema version and model identity
 */
export function computeFingerprint(input: FingerprintInput): FingerprintResult {
  const contentHash = computeContentHash(input.documents, input.contentVersion);
  const hash = hashString(
    JSON.stringify([input.schemaVersion, input.modelId, contentHash.toString()])
  );

  return {
    contentHash,
    fingerprint: { schemaVersion: input.schemaVersion, hash },
  };
}

/**
 * Serialize as "v{schemaVersion}\n{hash}"
 */
export function serializeFingerprint(fingerprint: Fingerprint): string {
  return `v${fingerprint.schemaVersion}\n${fingerprint.hash.toString()}`;
}

/**
 * Parse a serialized fingerprint; null when the text is not one
 */
export function parseFingerprint(serialized: string): Fingerprint | null {
  const match = /^v(\d+)\n(\d+)$/.exec(serialized);
  if (!match || match[1] === undefined || match[2] === undefined) {
    return null;
  }

  const hash = BigInt(match[2]);
  if (hash > 0xffffffffffffffffn) {
    return null;
  }

  return { schemaVersion: Number(match[1]), hash };
}

export function fingerprintsEqual(a: Fingerprint | null, b: Fingerprint | null): boolean {
  if (a === null || b === null) {
    return false;
  }
  return a.schemaVersion === b.schemaVersion && a.hash === b.hash;
}
