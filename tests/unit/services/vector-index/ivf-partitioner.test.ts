/**
 * Unit tests for the inverted-file partitioner
 */

import { describe, it, expect } from 'vitest';
import { centroidAt, rankPartitions, trainPartitions } from '../../../../src/services/vector-index/ivf-partitioner.js';

const clusters = [
  [0, 0],
  [0, 1],
  [1, 0],
  [10, 10],
  [10, 11],
  [11, 10],
];

describe('ivf-partitioner', () => {
  describe('trainPartitions', () => {
    it('should default to round(sqrt(n)) partitions', () => {
      expect(trainPartitions(clusters, 'l2').partitionCount).toBe(2);
      expect(trainPartitions([[1, 2]], 'l2').partitionCount).toBe(1);
    });

    it('should never create more partitions than vectors', () => {
      expect(trainPartitions(clusters.slice(0, 3), 'l2', { partitionCount: 10 }).partitionCount).toBe(3);
    });

    it('should separate well-separated clusters', () => {
      const result = trainPartitions(clusters, 'l2', { partitionCount: 2 });

      expect(Array.from(result.assignments)).toEqual([0, 0, 0, 1, 1, 1]);
      expect(result.sizes).toEqual([3, 3]);
      expect(Array.from(centroidAt(result.centroids, 2, 0))).toEqual([
        Math.fround(1 / 3),
        Math.fround(1 / 3),
      ]);
      expect(Array.from(centroidAt(result.centroids, 2, 1))).toEqual([
        Math.fround(31 / 3),
        Math.fround(31 / 3),
      ]);
    });

    it('should be deterministic', () => {
      const a = trainPartitions(clusters, 'l2');
      const b = trainPartitions(clusters, 'l2');

      expect(Array.from(a.assignments)).toEqual(Array.from(b.assignments));
      expect(Array.from(a.centroids)).toEqual(Array.from(b.centroids));
    });

    it('should cluster by direction for cosine', () => {
      const vectors = [
        [1, 0],
        [2, 0.1],
        [0, 1],
        [0.1, 3],
      ];
      const result = trainPartitions(vectors, 'cosine', { partitionCount: 2 });

      expect(Array.from(result.assignments)).toEqual([0, 0, 1, 1]);
      for (let p = 0; p < 2; p++) {
        const [x = 0, y = 0] = centroidAt(result.centroids, 2, p);
        expect(Math.hypot(x, y)).toBeCloseTo(1, 5);
      }
    });
  });

  describe('rankPartitions', () => {
    it('should order partitions by distance to the vector', () => {
      const result = trainPartitions(clusters, 'l2', { partitionCount: 2 });

      expect(rankPartitions(result.centroids, 2, 2, [9, 9], 'l2')).toEqual([1, 0]);
      expect(rankPartitions(result.centroids, 2, 2, [0.2, 0.1], 'l2')).toEqual([0, 1]);
    });

    it('should break ties by partition id', () => {
      const centroids = Float32Array.from([1, 0, 1, 0]);
      expect(rankPartitions(centroids, 2, 2, [0, 1], 'l2')).toEqual([0, 1]);
    });
  });
});
