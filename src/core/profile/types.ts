// ═══════════════════════════════════════════════════════════════════════════════
// PROFILE TYPES — Tag Instances, Profiles, Observations and Timeline Events
// ═══════════════════════════════════════════════════════════════════════════════

// ─────────────────────────────────────────────────────────────────────────────────
// OBSERVATIONS (input)
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * One candidate attribute produced by an external extractor.
 * Transient: folded into a TagInstance and never stored as-is.
 */
export interface TagObservation {
  name: string;
  /** In [0, 1] */
  confidence: number;
  evidence: string;
  category: string;
  subcategory: string;
  /** ISO-8601 */
  timestamp: string;
}

/**
 * Observations grouped by top-level category (dimension name).
 */
export type ObservationBatch = Record<string, TagObservation[]>;

// ─────────────────────────────────────────────────────────────────────────────────
// PERSISTED STATE
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Durable record of one tag inside a user's profile.
 * Identified by tagName within its (category, subcategory) bucket.
 */
export interface TagInstance {
  tagName: string;
  /** Kept within [minConfidence, maxConfidence] */
  confidence: number;
  reinforcementCount: number;
  firstSeen: string;
  lastReinforced: string;
  /** Most recent last, capped at the evidence limit */
  evidenceList: string[];
  decayRate: number;
}

/**
 * category → subcategory → instances, in insertion order.
 */
export type TagDimensions = Record<string, Record<string, TagInstance[]>>;

/**
 * Derived view of one populated sub-dimension. Rebuilt every cycle.
 */
export interface DimensionSummary {
  dimensionName: string;
  subdimensionName: string;
  dominantTag: string;
  confidence: number;
  tagCount: number;
  lastUpdated: string;
}

export interface UserProfile {
  userId: string;
  createdAt: string;
  lastUpdated: string;
  tagDimensions: TagDimensions;
  /** In [0, 1] */
  profileMaturity: number;
  totalInteractions: number;
  dimensionSummaries: DimensionSummary[];
}

// ─────────────────────────────────────────────────────────────────────────────────
// TIMELINE
// ─────────────────────────────────────────────────────────────────────────────────

export type TimelineEventType = 'tag_extraction';

export interface TimelineEvent {
  timestamp: string;
  eventType: TimelineEventType;
  /** The batch exactly as submitted, unknown categories included */
  extractedTags: ObservationBatch;
}

// ─────────────────────────────────────────────────────────────────────────────────
// STATS
// ─────────────────────────────────────────────────────────────────────────────────

export interface ProfileStats {
  userId: string;
  totalInteractions: number;
  /** Number of populated sub-dimensions */
  totalDimensions: number;
  totalTags: number;
  confidentTags: number;
  profileMaturity: number;
  timelineEvents: number;
  createdAt: string;
  lastUpdated: string;
}
