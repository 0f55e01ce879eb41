/**
 * Field Metadata Model
 *
 * Describes one field of the structured query schema: what kind of field it
 * is, its value type, and which clauses it may appear in.
 */

import { z } from 'zod';

export const FIELD_CATEGORIES = ['RESOURCE', 'ATTRIBUTE', 'SEGMENT', 'METRIC', 'UNSPECIFIED'] as const;

export const FIELD_DATA_TYPES = [
  'BOOLEAN',
  'DATE',
  'DOUBLE',
  'ENUM',
  'FLOAT',
  'INT32',
  'INT64',
  'MESSAGE',
  'RESOURCE_NAME',
  'STRING',
  'UINT64',
  'UNSPECIFIED'
] as const;

export type FieldCategory = (typeof FIELD_CATEGORIES)[number];
export type FieldDataType = (typeof FIELD_DATA_TYPES)[number];

export const fieldMetadataSchema = z.object({
  name: z.string().min(1),
  category: z.enum(FIELD_CATEGORIES).catch('UNSPECIFIED'),
  data_type: z.enum(FIELD_DATA_TYPES).catch('UNSPECIFIED'),
  selectable: z.boolean(),
  filterable: z.boolean(),
  sortable: z.boolean(),
  metrics_compatible: z.boolean().default(false),
  resource_name: z.string().nullish()
});

export type FieldMetadata = z.infer<typeof fieldMetadataSchema>;

/**
 * On-disk field metadata cache written by the schema fetcher
 */
export const fieldMetadataFileSchema = z.object({
  last_updated: z.string().datetime({ offset: true }),
  api_version: z.string().min(1),
  fields: z.record(fieldMetadataSchema)
});

export type FieldMetadataFile = z.infer<typeof fieldMetadataFileSchema>;

export function isMetric(field: FieldMetadata): boolean {
  return field.category === 'METRIC';
}

export function isSegment(field: FieldMetadata): boolean {
  return field.category === 'SEGMENT';
}

export function isAttribute(field: FieldMetadata): boolean {
  return field.category === 'ATTRIBUTE';
}

/**
 * Owning resource of a dotted field name ("campaign.name" -> "campaign").
 * Undefined for names without a dot.
 */
export function getResource(field: FieldMetadata): string | undefined {
  const dot = field.name.indexOf('.');
  return dot > 0 ? field.name.slice(0, dot) : undefined;
}

/**
 * Fields grouped by owning resource, each group sorted by name
 */
export function getFieldsByResource(fields: Iterable<FieldMetadata>): Map<string, FieldMetadata[]> {
  const grouped = new Map<string, FieldMetadata[]>();
  for (const field of fields) {
    const resource = getResource(field);
    if (resource === undefined) continue;
    const group = grouped.get(resource);
    if (group) {
      group.push(field);
    } else {
      grouped.set(resource, [field]);
    }
  }
  for (const group of grouped.values()) {
    group.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  }
  return grouped;
}
