// ═══════════════════════════════════════════════════════════════════════════════
// REINFORCEMENT ENGINE — Merge an Observation into a Profile
// ═══════════════════════════════════════════════════════════════════════════════

import type { EngineConfig } from '../../config/schema.js';
import { resolveExclusiveConflict } from './exclusivity.js';
import type { Taxonomy } from './taxonomy.js';
import type { TagDimensions, TagInstance, TagObservation } from './types.js';

export type ConfidenceBounds = Pick<EngineConfig, 'minConfidence' | 'maxConfidence'>;

export function clampConfidence(value: number, bounds: ConfidenceBounds): number {
  return Math.min(bounds.maxConfidence, Math.max(bounds.minConfidence, value));
}

export function createTagInstance(observation: TagObservation, engine: EngineConfig): TagInstance {
  return {
    tagName: observation.name,
    confidence: clampConfidence(observation.confidence, engine),
    reinforcementCount: 1,
    firstSeen: observation.timestamp,
    lastReinforced: observation.timestamp,
    evidenceList: [observation.evidence],
    decayRate: engine.defaultDecayRate,
  };
}

/**
 * Fold a repeat observation into an existing instance (mutates it).
 *
 * The new confidence is always pulled `reinforcementWeight` of the way toward
 * the observed value, whatever the instance's reinforcement count.
 */
export function reinforceInstance(
  instance: TagInstance,
  observation: TagObservation,
  engine: EngineConfig
): void {
  const weight = engine.reinforcementWeight;

  instance.reinforcementCount += 1;
  instance.lastReinforced = observation.timestamp;
  instance.confidence = clampConfidence(
    instance.confidence * (1 - weight) + observation.confidence * weight,
    engine
  );

  instance.evidenceList.push(observation.evidence);
  if (instance.evidenceList.length > engine.evidenceLimit) {
    instance.evidenceList = instance.evidenceList.slice(-engine.evidenceLimit);
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// APPLY
// ─────────────────────────────────────────────────────────────────────────────────

// Own properties only, so keys like "toString" never resolve to Object.prototype.
function ownEntry<T>(record: Record<string, T>, key: string, create: () => T): T {
  if (Object.hasOwn(record, key)) {
    return record[key];
  }
  const value = create();
  record[key] = value;
  return value;
}

export type ReinforcementOutcome =
  | { action: 'reinforced'; instance: TagInstance }
  | { action: 'created'; instance: TagInstance; replaced?: TagInstance };

/**
 * Route one observation into `dimensions[category][observation.subcategory]`.
 *
 * The caller has already checked that `category` is a taxonomy dimension.
 * Unknown sub-dimensions get a new bucket.
 */
export function applyObservation(
  dimensions: TagDimensions,
  category: string,
  observation: TagObservation,
  taxonomy: Taxonomy,
  engine: EngineConfig
): ReinforcementOutcome {
  const buckets = ownEntry(dimensions, category, () => ({}));
  const list = ownEntry(buckets, observation.subcategory, (): TagInstance[] => []);

  const existing = list.find((instance) => instance.tagName === observation.name);
  if (existing) {
    reinforceInstance(existing, observation, engine);
    return { action: 'reinforced', instance: existing };
  }

  const replaced = taxonomy.isExclusive(category, observation.subcategory)
    ? resolveExclusiveConflict(list, observation.confidence)
    : undefined;

  const instance = createTagInstance(observation, engine);
  list.push(instance);

  return replaced ? { action: 'created', instance, replaced } : { action: 'created', instance };
}
