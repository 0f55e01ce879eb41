/**
 * Description Enrichment
 *
 * Synthesizes the embedded text of a field metadata document from its
 * structured attributes, so that capability, category and purpose queries
 * match and not only literal names.
 *
 * Output sections, joined with ". ":
 *   1-2. normalized name (twice)
 *   3.   category description
 *   4.   data type description
 *   5.   true capability flags, space-joined
 *   6.   "purpose: ..." tags (omitted when nothing matches)
 *   7.   "domain: ..." tags (omitted when nothing matches)
 *
 * The result feeds both the fingerprint and the embedding call, so it must be
 * a pure function of the field.
 */

import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import {
  FIELD_CATEGORIES,
  FIELD_DATA_TYPES,
  type FieldMetadata
} from '../../models/FieldMetadata.js';

const tagRuleSchema = z.object({
  tag: z.string().min(1),
  patterns: z.array(z.string().min(1)).min(1)
});

export const enrichmentPatternsSchema = z.object({
  version: z.number().int().positive(),
  categories: z.record(z.enum(FIELD_CATEGORIES), z.string().min(1)),
  dataTypes: z.record(z.enum(FIELD_DATA_TYPES), z.string().min(1)),
  purposes: z.array(tagRuleSchema),
  domains: z.array(tagRuleSchema)
});

export type EnrichmentPatterns = z.infer<typeof enrichmentPatternsSchema>;
export type TagRule = z.infer<typeof tagRuleSchema>;

const DEFAULT_PATTERNS_PATH = fileURLToPath(
  new URL('../../../resources/enrichment-patterns.json', import.meta.url)
);

/**
 * Load and validate a pattern table (throws on an invalid file)
 */
export function loadEnrichmentPatterns(path: string = DEFAULT_PATTERNS_PATH): EnrichmentPatterns {
  const raw: unknown = JSON.parse(readFileSync(path, 'utf-8'));
  return enrichmentPatternsSchema.parse(raw);
}

/**
 * Lower-case, turn '.' and '_' into spaces, collapse whitespace
 */
export function normalizeFieldName(name: string): string {
  return name
    .toLowerCase()
    .replace(/[._]/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Tags of every rule with a pattern occurring in the text, in rule order.
 * The text is padded with spaces so patterns like " id " match whole words.
 */
export function matchTags(normalizedName: string, rules: readonly TagRule[]): string[] {
  const haystack = ` ${normalizedName} `;
  const tags: string[] = [];
  for (const rule of rules) {
    if (rule.patterns.some((pattern) => haystack.includes(pattern)) && !tags.includes(rule.tag)) {
      tags.push(rule.tag);
    }
  }
  return tags;
}

export class DescriptionEnricher {
  private readonly patterns: EnrichmentPatterns;

  constructor(patterns?: EnrichmentPatterns) {
    this.patterns = patterns ?? loadEnrichmentPatterns();
  }

  /**
   * Version tag mixed into the collection fingerprint
   */
  get version(): string {
    return `enrichment-v${this.patterns.version}`;
  }

  enrich(field: FieldMetadata): string {
    const name = normalizeFieldName(field.name);
    const sections: string[] = [name, name];

    sections.push(this.patterns.categories[field.category] ?? this.patterns.categories.UNSPECIFIED ?? field.category.toLowerCase());
    sections.push(this.patterns.dataTypes[field.data_type] ?? this.patterns.dataTypes.UNSPECIFIED ?? field.data_type.toLowerCase());

    const capabilities = [
      field.selectable ? 'selectable' : null,
      field.filterable ? 'filterable' : null,
      field.sortable ? 'sortable' : null,
      field.metrics_compatible ? 'metrics compatible' : null
    ].filter((c): c is string => c !== null);
    if (capabilities.length > 0) {
      sections.push(capabilities.join(' '));
    }

    const purposes = matchTags(name, this.patterns.purposes);
    if (purposes.length > 0) {
      sections.push(`purpose: ${purposes.join(', ')}`);
    }

    const domains = matchTags(name, this.patterns.domains);
    if (domains.length > 0) {
      sections.push(`domain: ${domains.join(', ')}`);
    }

    return sections.join('. ');
  }
}
