// ═══════════════════════════════════════════════════════════════════════════════
// TAG TAXONOMY — Dimensions, Sub-dimensions and Exclusivity
// ═══════════════════════════════════════════════════════════════════════════════
//
// The taxonomy is data (config/taxonomy.json), validated once at startup.
// It constrains top-level categories only: observations may name
// sub-dimensions the taxonomy does not list and they get a bucket of their own.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

import { andThen, err, mapErr, ok, tryCatch, type Result } from '../../types/result.js';
import { TaxonomyError } from './errors.js';
import type { TagDimensions, TagInstance } from './types.js';

// ─────────────────────────────────────────────────────────────────────────────────
// SCHEMA
// ─────────────────────────────────────────────────────────────────────────────────

const RESERVED_KEYS: ReadonlySet<string> = new Set(['__proto__', 'constructor', 'prototype']);

export function isReservedKey(key: string): boolean {
  return RESERVED_KEYS.has(key);
}

/**
 * Any non-empty string that is safe as a plain-object property.
 */
export const SafeKeySchema = z
  .string()
  .min(1, 'Name must not be empty')
  .refine((key) => !isReservedKey(key), { message: 'Name is reserved' });

/**
 * A dimension or sub-dimension key usable as a plain-object property.
 */
export const TaxonomyKeySchema = z
  .string()
  .trim()
  .min(1, 'Name must not be empty')
  .max(64, 'Name must be at most 64 characters')
  .refine((key) => !isReservedKey(key), { message: 'Name is reserved' });

const SubdimensionSchema = z.object({
  name: TaxonomyKeySchema,
  description: z.string().optional(),
  exclusive: z.boolean().default(false),
  values: z.array(z.string()).optional(),
});

const DimensionSchema = z
  .object({
    name: TaxonomyKeySchema,
    description: z.string().default(''),
    subdimensions: z.array(SubdimensionSchema),
  })
  .refine((dimension) => unique(dimension.subdimensions.map((sub) => sub.name)), {
    message: 'Sub-dimension names must be unique within a dimension',
    path: ['subdimensions'],
  });

export const TaxonomyDefinitionSchema = z
  .object({
    version: z.string().default('1'),
    dimensions: z.array(DimensionSchema).min(1, 'At least one dimension is required'),
  })
  .refine((taxonomy) => unique(taxonomy.dimensions.map((dimension) => dimension.name)), {
    message: 'Dimension names must be unique',
    path: ['dimensions'],
  });

export type TaxonomyDefinition = z.infer<typeof TaxonomyDefinitionSchema>;
export type DimensionDefinition = TaxonomyDefinition['dimensions'][number];
export type SubdimensionDefinition = DimensionDefinition['subdimensions'][number];

function unique(names: string[]): boolean {
  return new Set(names).size === names.length;
}

// ─────────────────────────────────────────────────────────────────────────────────
// TAXONOMY
// ─────────────────────────────────────────────────────────────────────────────────

export class Taxonomy {
  private readonly dimensions: ReadonlyMap<string, DimensionDefinition>;
  private readonly exclusive: ReadonlySet<string>;

  constructor(readonly definition: TaxonomyDefinition) {
    this.dimensions = new Map(definition.dimensions.map((dimension) => [dimension.name, dimension]));

    const exclusive = new Set<string>();
    for (const dimension of definition.dimensions) {
      for (const sub of dimension.subdimensions) {
        if (sub.exclusive) exclusive.add(bucketKey(dimension.name, sub.name));
      }
    }
    this.exclusive = exclusive;
  }

  get version(): string {
    return this.definition.version;
  }

  hasDimension(category: string): boolean {
    return this.dimensions.has(category);
  }

  dimensionNames(): string[] {
    return [...this.dimensions.keys()];
  }

  isExclusive(category: string, subcategory: string): boolean {
    return this.exclusive.has(bucketKey(category, subcategory));
  }

  /**
   * Every declared dimension and sub-dimension with an empty instance list.
   */
  createEmptyDimensions(): TagDimensions {
    const result: TagDimensions = {};
    for (const dimension of this.dimensions.values()) {
      const buckets: Record<string, TagInstance[]> = {};
      for (const sub of dimension.subdimensions) {
        buckets[sub.name] = [];
      }
      result[dimension.name] = buckets;
    }
    return result;
  }
}

function bucketKey(category: string, subcategory: string): string {
  return `${category}\u0000${subcategory}`;
}

// ─────────────────────────────────────────────────────────────────────────────────
// LOADING
// ─────────────────────────────────────────────────────────────────────────────────

export const DEFAULT_TAXONOMY_PATH = fileURLToPath(
  new URL('../../../config/taxonomy.json', import.meta.url)
);

/**
 * Validate an already-parsed taxonomy document.
 */
export function parseTaxonomy(input: unknown): Result<Taxonomy, TaxonomyError> {
  const parsed = TaxonomyDefinitionSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    return err(new TaxonomyError(`Invalid taxonomy: ${issues.join('; ')}`));
  }
  return ok(new Taxonomy(parsed.data));
}

/**
 * Read, parse and validate a taxonomy file.
 *
 * @throws TaxonomyError when the file cannot be read or is invalid
 */
export function loadTaxonomy(path: string = DEFAULT_TAXONOMY_PATH): Taxonomy {
  const raw = mapErr(
    tryCatch((): unknown => JSON.parse(readFileSync(path, 'utf-8'))),
    (cause) => new TaxonomyError(`Cannot read taxonomy at ${path}: ${cause.message}`, { cause })
  );
  const taxonomy = andThen(raw, parseTaxonomy);
  if (!taxonomy.ok) {
    throw taxonomy.error;
  }
  return taxonomy.value;
}
