// ═══════════════════════════════════════════════════════════════════════════════
// PROFILE CODEC — JSON Serialization with Validation on Read
// ═══════════════════════════════════════════════════════════════════════════════

import { z } from 'zod';

import { andThen, err, mapErr, ok, tryCatch, type Result } from '../../types/result.js';
import { SafeKeySchema } from './taxonomy.js';
import type { TimelineEvent, UserProfile } from './types.js';

// ─────────────────────────────────────────────────────────────────────────────────
// SCHEMAS
// ─────────────────────────────────────────────────────────────────────────────────

const finite = z.number().finite();

/** Decay rate assumed for stored instances written without one */
export const STORED_DEFAULT_DECAY_RATE = 0.1;

export const TagInstanceSchema = z.object({
  tagName: z.string(),
  confidence: finite.min(0).max(1),
  reinforcementCount: z.number().int().min(1),
  firstSeen: z.string(),
  // Unparseable timestamps are tolerated here; decay skips them.
  lastReinforced: z.string(),
  evidenceList: z.array(z.string()).default([]),
  decayRate: finite.nonnegative().default(STORED_DEFAULT_DECAY_RATE),
});

export const DimensionSummarySchema = z.object({
  dimensionName: z.string(),
  subdimensionName: z.string(),
  dominantTag: z.string(),
  confidence: finite,
  tagCount: z.number().int().nonnegative(),
  lastUpdated: z.string(),
});

/**
 * Stored profile record. Only `userId` and the identity fields of each
 * instance are required; the rest fall back to the values of a new profile.
 */
export const UserProfileSchema = z.object({
  userId: z.string().min(1),
  createdAt: z.string().optional(),
  lastUpdated: z.string().optional(),
  tagDimensions: z.record(SafeKeySchema, z.record(SafeKeySchema, z.array(TagInstanceSchema))).default({}),
  profileMaturity: finite.min(0).max(1).default(0),
  totalInteractions: z.number().int().nonnegative().default(0),
  dimensionSummaries: z.array(DimensionSummarySchema).default([]),
});

const StoredObservationSchema = z.object({
  name: z.string(),
  confidence: finite,
  evidence: z.string(),
  category: z.string(),
  subcategory: z.string(),
  timestamp: z.string(),
});

export const TimelineEventSchema = z.object({
  timestamp: z.string(),
  eventType: z.literal('tag_extraction'),
  extractedTags: z.record(SafeKeySchema, z.array(StoredObservationSchema)),
});

// ─────────────────────────────────────────────────────────────────────────────────
// ERRORS
// ─────────────────────────────────────────────────────────────────────────────────

export type CodecErrorCode = 'INVALID_JSON' | 'INVALID_SHAPE';

export interface CodecError {
  readonly code: CodecErrorCode;
  readonly message: string;
}

// ─────────────────────────────────────────────────────────────────────────────────
// ENCODE / DECODE
// ─────────────────────────────────────────────────────────────────────────────────

export function encodeProfile(profile: UserProfile): string {
  return JSON.stringify(profile);
}

export function encodeTimelineEvent(event: TimelineEvent): string {
  return JSON.stringify(event);
}

function parseJson(raw: string): Result<unknown, CodecError> {
  return mapErr(
    tryCatch((): unknown => JSON.parse(raw)),
    (error): CodecError => ({ code: 'INVALID_JSON', message: error.message })
  );
}

function validate<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown): Result<T, CodecError> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    const where = first && first.path.length > 0 ? `${first.path.join('.')}: ` : '';
    return err({ code: 'INVALID_SHAPE', message: `${where}${first?.message ?? 'invalid value'}` });
  }
  return ok(parsed.data);
}

/**
 * Parse and validate a stored profile record. Missing timestamps become `now`.
 */
export function decodeProfile(raw: string, now: Date): Result<UserProfile, CodecError> {
  return andThen(parseJson(raw), (value): Result<UserProfile, CodecError> => {
    const decoded = validate(UserProfileSchema, value);
    if (!decoded.ok) return decoded;

    const { createdAt, lastUpdated, ...rest } = decoded.value;
    const fallback = now.toISOString();
    return ok({ ...rest, createdAt: createdAt ?? fallback, lastUpdated: lastUpdated ?? fallback });
  });
}

export function decodeTimelineEvent(raw: string): Result<TimelineEvent, CodecError> {
  return andThen(parseJson(raw), (value) => validate(TimelineEventSchema, value));
}
