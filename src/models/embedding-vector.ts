/**
 * Embedding Vector Helpers
 *
 * Float32 encoding used for snapshot rows and cached query embeddings.
 */

/**
 * Supported distance metrics
 */
export const DISTANCE_METRICS = ['cosine', 'l2'] as const;

export type DistanceMetric = (typeof DISTANCE_METRICS)[number];

/**
 * Encodes a vector to a little-endian float32 Buffer for storage
 */
export function encodeEmbedding(embedding: Float32Array | number[]): Buffer {
	const floats = embedding instanceof Float32Array ? embedding : Float32Array.from(embedding);
	return Buffer.from(floats.buffer, floats.byteOffset, floats.byteLength);
}

/**
 * Decodes a stored float32 Buffer
 */
export function decodeEmbedding(buffer: Buffer): Float32Array {
	// Copy: the Buffer may sit at an offset that is not 4-byte aligned
	const bytes = new Uint8Array(buffer.byteLength);
	bytes.set(buffer);
	return new Float32Array(bytes.buffer, 0, Math.floor(buffer.byteLength / 4));
}

/**
 * Distance between two vectors under the given metric
 *
 * Matches sqlite-vec: cosine distance is 1 - cos(a, b), l2 is Euclidean.
 */
export function vectorDistance(a: ArrayLike<number>, b: ArrayLike<number>, metric: DistanceMetric): number {
	if (metric === 'l2') {
		let sum = 0;
		for (let i = 0; i < a.length; i++) {
			const d = (a[i] ?? 0) - (b[i] ?? 0);
			sum += d * d;
		}
		return Math.sqrt(sum);
	}

	let dot = 0;
	let normA = 0;
	let normB = 0;
	for (let i = 0; i < a.length; i++) {
		const x = a[i] ?? 0;
		const y = b[i] ?? 0;
		dot += x * y;
		normA += x * x;
		normB += y * y;
	}
	if (normA === 0 || normB === 0) {
		return 1;
	}
	return 1 - dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/**
 * Convert a raw distance into a caller-facing score (higher = more relevant)
 *
 * cosine: similarity clamped to [-1, 1]; l2: 1 / (1 + d) in (0, 1].
 * Returns NaN for non-finite or negative distances so callers can drop them.
 */
export function distanceToScore(distance: number, metric: DistanceMetric): number {
	if (!Number.isFinite(distance)) {
		return Number.NaN;
	}
	if (metric === 'l2') {
		return distance < 0 ? Number.NaN : 1 / (1 + distance);
	}
	return Math.min(1, Math.max(-1, 1 - distance));
}

/**
 * L2-normalize in place; zero vectors are left as-is
 */
export function normalizeInPlace(vector: number[] | Float32Array): void {
	let norm = 0;
	for (const v of vector) {
		norm += v * v;
	}
	if (norm === 0) {
		return;
	}
	const scale = 1 / Math.sqrt(norm);
	for (let i = 0; i < vector.length; i++) {
		vector[i] = (vector[i] ?? 0) * scale;
	}
}
