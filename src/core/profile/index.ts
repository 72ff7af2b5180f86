// ═══════════════════════════════════════════════════════════════════════════════
// PROFILE MODULE — Tag Profile Lifecycle
// ═══════════════════════════════════════════════════════════════════════════════

export type {
  TagObservation,
  ObservationBatch,
  TagInstance,
  TagDimensions,
  DimensionSummary,
  UserProfile,
  TimelineEventType,
  TimelineEvent,
  ProfileStats,
} from './types.js';

export {
  ProfileError,
  ValidationError,
  StorageError,
  LockTimeoutError,
  TaxonomyError,
} from './errors.js';
export type { ProfileErrorCode } from './errors.js';

export {
  Taxonomy,
  TaxonomyDefinitionSchema,
  SafeKeySchema,
  DEFAULT_TAXONOMY_PATH,
  isReservedKey,
  parseTaxonomy,
  loadTaxonomy,
} from './taxonomy.js';
export type { TaxonomyDefinition, DimensionDefinition, SubdimensionDefinition } from './taxonomy.js';

export {
  UserIdSchema,
  ObservationBatchSchema,
  ExtractionPayloadSchema,
  DEFAULT_EXTRACTED_CONFIDENCE,
  parseUserId,
  parseObservationBatch,
  normalizeExtraction,
  countObservations,
} from './observations.js';
export type { ObservationInput, ObservationBatchInput, ExtractionPayload, CategoryFilter } from './observations.js';

export { clampConfidence, createTagInstance, reinforceInstance, applyObservation } from './reinforcement.js';
export type { ReinforcementOutcome } from './reinforcement.js';

export { strongestInstance, resolveExclusiveConflict, pruneExclusiveBuckets } from './exclusivity.js';
export type { PrunedInstance } from './exclusivity.js';

export { MS_PER_DAY, MIN_DECAY_FACTOR, parseTimestamp, daysSince, decayFactor, decayedConfidence, applyDecay } from './decay.js';
export type { DecayReport } from './decay.js';

export { computeMaturity, computeMetrics } from './metrics.js';
export type { ProfileMetrics } from './metrics.js';

export { applyBatch } from './engine.js';
export type { EngineContext, CycleReport, CycleResult } from './engine.js';

export { encodeProfile, decodeProfile, encodeTimelineEvent, decodeTimelineEvent } from './codec.js';
export type { CodecError, CodecErrorCode } from './codec.js';

export { createProfileKeys } from './keys.js';
export type { ProfileKeys } from './keys.js';

export { TimelineRecorder, createTimelineEvent } from './timeline.js';
export { ProfileRepository, createEmptyProfile } from './store.js';
export type { LoadedProfile } from './store.js';

export { LocalProfileLock, StoreProfileLock } from './lock.js';
export type { ProfileLock, LockError, LockErrorCode, Sleep } from './lock.js';

export { ProfileService } from './service.js';
export type { ProfileServiceDeps } from './service.js';
