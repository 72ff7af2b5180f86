// ═══════════════════════════════════════════════════════════════════════════════
// OBSERVATIONS — Batch Validation and Extractor Payload Normalisation
// ═══════════════════════════════════════════════════════════════════════════════

import { z } from 'zod';

import { err, ok, type Result } from '../../types/result.js';
import { ValidationError } from './errors.js';
import { SafeKeySchema } from './taxonomy.js';
import type { ObservationBatch, TagObservation } from './types.js';

// ─────────────────────────────────────────────────────────────────────────────────
// SCHEMAS
// ─────────────────────────────────────────────────────────────────────────────────

export const UserIdSchema = z
  .string()
  .min(1, 'User id is required')
  .max(128, 'User id must be at most 128 characters')
  .regex(/^[A-Za-z0-9_.@-]+$/, 'User id contains invalid characters');

const IsoTimestampSchema = z
  .string()
  .refine((value) => !Number.isNaN(Date.parse(value)), { message: 'Invalid timestamp' });

export const ObservationInputSchema = z.object({
  name: z.string().min(1, 'Tag name is required'),
  confidence: z.number().finite().min(0).max(1),
  evidence: z.string().default(''),
  category: z.string().optional(),
  subcategory: SafeKeySchema,
  timestamp: IsoTimestampSchema.optional(),
});

export type ObservationInput = z.input<typeof ObservationInputSchema>;

export const ObservationBatchSchema = z.record(SafeKeySchema, z.array(ObservationInputSchema));

export type ObservationBatchInput = z.input<typeof ObservationBatchSchema>;

type ParsedObservation = z.output<typeof ObservationInputSchema>;

const BatchShapeSchema = z.record(SafeKeySchema, z.unknown());

const ObservationListSchema = z.array(ObservationInputSchema);

export type CategoryFilter = (category: string) => boolean;

const everyCategory: CategoryFilter = () => true;

// ─────────────────────────────────────────────────────────────────────────────────
// VALIDATION
// ─────────────────────────────────────────────────────────────────────────────────

function formatIssues(error: z.ZodError, prefix: Array<string | number> = []): string[] {
  return error.issues.map((issue) => {
    const path = [...prefix, ...issue.path].join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

/**
 * Entries under a category the taxonomy does not declare. These only reach the
 * timeline, so unreadable entries are dropped instead of failing the batch.
 */
function readableObservations(value: unknown): ParsedObservation[] {
  if (!Array.isArray(value)) return [];
  return value.flatMap((entry: unknown) => {
    const parsed = ObservationInputSchema.safeParse(entry);
    return parsed.success ? [parsed.data] : [];
  });
}

/**
 * Validate a raw batch and fill the fields callers may omit.
 *
 * A missing `timestamp` becomes `now`; a missing `category` becomes the batch
 * key the observation was filed under. Only categories accepted by
 * `isKnownCategory` are validated strictly; the others are kept, minus any
 * unreadable entries, so they reach the timeline.
 */
export function parseObservationBatch(
  input: unknown,
  now: Date,
  isKnownCategory: CategoryFilter = everyCategory
): Result<ObservationBatch, ValidationError> {
  const shape = BatchShapeSchema.safeParse(input);
  if (!shape.success) {
    return invalidBatch(formatIssues(shape.error));
  }

  const issues: string[] = [];
  const parsed: Record<string, ParsedObservation[]> = {};

  for (const [category, value] of Object.entries(shape.data)) {
    if (!isKnownCategory(category)) {
      parsed[category] = readableObservations(value);
      continue;
    }
    const list = ObservationListSchema.safeParse(value);
    if (list.success) {
      parsed[category] = list.data;
    } else {
      issues.push(...formatIssues(list.error, [category]));
    }
  }

  if (issues.length > 0) {
    return invalidBatch(issues);
  }

  const fallbackTimestamp = now.toISOString();
  const batch: ObservationBatch = {};

  for (const [category, observations] of Object.entries(parsed)) {
    batch[category] = observations.map(
      (observation): TagObservation => ({
        name: observation.name,
        confidence: observation.confidence,
        evidence: observation.evidence,
        category: observation.category ?? category,
        subcategory: observation.subcategory,
        timestamp: observation.timestamp ?? fallbackTimestamp,
      })
    );
  }

  return ok(batch);
}

function invalidBatch(issues: string[]): Result<ObservationBatch, ValidationError> {
  return err(new ValidationError(`Invalid observation batch: ${issues[0] ?? 'unknown issue'}`, issues));
}

export function parseUserId(input: unknown): Result<string, ValidationError> {
  const parsed = UserIdSchema.safeParse(input);
  if (!parsed.success) {
    const issues = formatIssues(parsed.error);
    return err(new ValidationError(`Invalid user id: ${issues[0] ?? 'unknown issue'}`, issues));
  }
  return ok(parsed.data);
}

export function countObservations(batch: ObservationBatch): number {
  return Object.values(batch).reduce((sum, observations) => sum + observations.length, 0);
}

// ─────────────────────────────────────────────────────────────────────────────────
// EXTRACTOR PAYLOAD
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Tag as emitted by the extraction model: snake_case, loosely typed.
 */
const ExtractedTagSchema = z
  .object({
    tag_name: z.string().optional(),
    confidence: z.coerce.number().optional(),
    evidence: z.string().optional(),
  })
  .passthrough();

/**
 * category → subcategory → extracted tags
 */
export const ExtractionPayloadSchema = z.record(SafeKeySchema, z.record(SafeKeySchema, z.array(ExtractedTagSchema)));

export type ExtractionPayload = z.input<typeof ExtractionPayloadSchema>;

export const DEFAULT_EXTRACTED_CONFIDENCE = 0.5;

/**
 * Flatten the extractor's nested payload into an observation batch.
 *
 * Tags with a missing or blank name are dropped; names are kept as given.
 * Confidence defaults to 0.5, evidence to the empty string and subcategory to
 * the key the tag was nested under. Every observation is stamped with `now`.
 */
export function normalizeExtraction(payload: unknown, now: Date): Result<ObservationBatchInput, ValidationError> {
  const parsed = ExtractionPayloadSchema.safeParse(payload);
  if (!parsed.success) {
    const issues = formatIssues(parsed.error);
    return err(new ValidationError(`Invalid extraction payload: ${issues[0] ?? 'unknown issue'}`, issues));
  }

  const timestamp = now.toISOString();
  const batch: ObservationBatchInput = {};

  for (const [category, subcategories] of Object.entries(parsed.data)) {
    const observations: ObservationInput[] = [];

    for (const [subcategory, tags] of Object.entries(subcategories)) {
      for (const tag of tags) {
        const name = tag.tag_name;
        if (name === undefined || name.trim() === '') continue;

        observations.push({
          name,
          confidence: tag.confidence ?? DEFAULT_EXTRACTED_CONFIDENCE,
          evidence: tag.evidence ?? '',
          category,
          subcategory,
          timestamp,
        });
      }
    }

    batch[category] = observations;
  }

  return ok(batch);
}
