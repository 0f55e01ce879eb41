/**
 * Cache Metadata Model
 *
 * One record per collection; the sole authority on which snapshot is current
 * and whether it is still valid.
 */

import { z } from 'zod';
import { DISTANCE_METRICS } from './embedding-vector.js';

export const cacheMetadataSchema = z.object({
  schemaVersion: z.number().int().nonnegative(),
  modelId: z.string().min(1),
  /** Unsigned 64-bit corpus hash as a decimal string */
  contentHash: z.string().regex(/^\d+$/),
  /** Serialized fingerprint, "v{schemaVersion}\n{hash}" */
  fingerprint: z.string().min(1),
  createdAt: z.string().datetime(),
  distanceMetric: z.enum(DISTANCE_METRICS),
  /** 0 only for an empty collection */
  dimension: z.number().int().nonnegative(),
  documentCount: z.number().int().nonnegative(),
  /** File name of the snapshot, relative to the collection directory */
  snapshotFile: z.string().min(1)
});

export type CacheMetadata = z.infer<typeof cacheMetadataSchema>;
