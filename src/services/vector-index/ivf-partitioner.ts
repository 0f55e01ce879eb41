/**
 * Inverted-File Partitioner
 *
 * Deterministic k-means over a collection's vectors. Centroids live in one
 * flat arena addressed by integer partition id; documents refer to their
 * partition by that id.
 */

import { vectorDistance, type DistanceMetric } from '../../models/embedding-vector.js';
import { ANN_CONFIG } from '../../constants/retrieval-constants.js';

export interface Partitioning {
	/** Row-major [partitionCount x dimension] */
	centroids: Float32Array;
	dimension: number;
	partitionCount: number;
	/** Partition id of each input vector, in input order */
	assignments: Int32Array;
	/** Member count per partition id */
	sizes: number[];
}

export interface PartitionOptions {
	/** Defaults to round(sqrt(n)) */
	partitionCount?: number;
	maxIterations?: number;
}

export function centroidAt(centroids: Float32Array, dimension: number, partition: number): Float32Array {
	return centroids.subarray(partition * dimension, (partition + 1) * dimension);
}

function normalizedCopy(vector: readonly number[]): Float32Array {
	const copy = Float32Array.from(vector);
	let norm = 0;
	for (const v of copy) norm += v * v;
	if (norm > 0) {
		const scale = 1 / Math.sqrt(norm);
		for (let i = 0; i < copy.length; i++) copy[i] = (copy[i] ?? 0) * scale;
	}
	return copy;
}

/**
 * Nearest partition ids to a vector, closest first (ties by id)
 */
export function rankPartitions(
	centroids: Float32Array,
	dimension: number,
	partitionCount: number,
	vector: ArrayLike<number>,
	metric: DistanceMetric
): number[] {
	const distances: Array<{ id: number; distance: number }> = [];
	for (let p = 0; p < partitionCount; p++) {
		const d = vectorDistance(vector, centroidAt(centroids, dimension, p), metric);
		distances.push({ id: p, distance: Number.isFinite(d) ? d : Number.POSITIVE_INFINITY });
	}
	distances.sort((a, b) => a.distance - b.distance || a.id - b.id);
	return distances.map((entry) => entry.id);
}

/**
 * Train partitions for the given vectors
 *
 * Seeds are evenly spaced input vectors, so equal input yields equal
 * partitions. For cosine the vectors are normalized first (spherical
 * k-means) and centroids are re-normalized after each update.
 */
export function trainPartitions(
	vectors: readonly number[][],
	metric: DistanceMetric,
	options: PartitionOptions = {}
): Partitioning {
	const n = vectors.length;
	const dimension = vectors[0]?.length ?? 0;
	const partitionCount = Math.max(
		1,
		Math.min(n, options.partitionCount ?? Math.round(Math.sqrt(n)))
	);
	const maxIterations = options.maxIterations ?? ANN_CONFIG.MAX_KMEANS_ITERATIONS;

	const points: Float32Array[] = vectors.map((v) =>
		metric === 'cosine' ? normalizedCopy(v) : Float32Array.from(v)
	);

	const centroids = new Float32Array(partitionCount * dimension);
	for (let p = 0; p < partitionCount; p++) {
		const seed = points[Math.floor((p * n) / partitionCount)];
		if (seed) centroids.set(seed, p * dimension);
	}

	const assignments = new Int32Array(n).fill(-1);
	const sizes = new Array<number>(partitionCount).fill(0);

	for (let iteration = 0; iteration < maxIterations; iteration++) {
		let changed = 0;

		for (let i = 0; i < n; i++) {
			const point = points[i];
			if (!point) continue;
			let best = 0;
			let bestDistance = Number.POSITIVE_INFINITY;
			for (let p = 0; p < partitionCount; p++) {
				const d = vectorDistance(point, centroidAt(centroids, dimension, p), metric);
				if (d < bestDistance) {
					bestDistance = d;
					best = p;
				}
			}
			if (assignments[i] !== best) {
				assignments[i] = best;
				changed++;
			}
		}

		if (changed === 0) break;

		const sums = new Float64Array(partitionCount * dimension);
		sizes.fill(0);
		for (let i = 0; i < n; i++) {
			const p = assignments[i] ?? 0;
			const point = points[i];
			if (!point) continue;
			sizes[p] = (sizes[p] ?? 0) + 1;
			for (let d = 0; d < dimension; d++) {
				sums[p * dimension + d] = (sums[p * dimension + d] ?? 0) + (point[d] ?? 0);
			}
		}

		for (let p = 0; p < partitionCount; p++) {
			const size = sizes[p] ?? 0;
			// Empty partitions keep their previous centroid
			if (size === 0) continue;
			let norm = 0;
			for (let d = 0; d < dimension; d++) {
				const mean = (sums[p * dimension + d] ?? 0) / size;
				centroids[p * dimension + d] = mean;
				norm += mean * mean;
			}
			if (metric === 'cosine' && norm > 0) {
				const scale = 1 / Math.sqrt(norm);
				for (let d = 0; d < dimension; d++) {
					centroids[p * dimension + d] = (centroids[p * dimension + d] ?? 0) * scale;
				}
			}
		}
	}

	// Sizes as of the final assignment
	sizes.fill(0);
	for (let i = 0; i < n; i++) {
		const p = assignments[i] ?? 0;
		sizes[p] = (sizes[p] ?? 0) + 1;
	}

	return { centroids, dimension, partitionCount, assignments, sizes };
}
