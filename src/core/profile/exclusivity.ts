// ═══════════════════════════════════════════════════════════════════════════════
// EXCLUSIVITY RESOLVER — One Dominant Value per Exclusive Sub-dimension
// ═══════════════════════════════════════════════════════════════════════════════
//
// Enforcement happens when a new tag is written: a stronger newcomer replaces
// the current strongest instance; a weaker or equal one is stored alongside
// it. Strict mode additionally prunes each exclusive bucket to a single
// instance once the batch's observations have been applied.
//
// ═══════════════════════════════════════════════════════════════════════════════

import type { Taxonomy } from './taxonomy.js';
import type { TagDimensions, TagInstance } from './types.js';

/**
 * Highest-confidence instance. Earlier entries win ties.
 */
export function strongestInstance(list: readonly TagInstance[]): TagInstance | undefined {
  let strongest: TagInstance | undefined;
  for (const instance of list) {
    if (strongest === undefined || instance.confidence > strongest.confidence) {
      strongest = instance;
    }
  }
  return strongest;
}

/**
 * Remove the strongest instance from `list` when the candidate is strictly
 * more confident. Returns the removed instance, if any.
 */
export function resolveExclusiveConflict(
  list: TagInstance[],
  candidateConfidence: number
): TagInstance | undefined {
  const strongest = strongestInstance(list);
  if (strongest === undefined || candidateConfidence <= strongest.confidence) {
    return undefined;
  }
  list.splice(list.indexOf(strongest), 1);
  return strongest;
}

export interface PrunedInstance {
  category: string;
  subcategory: string;
  tagName: string;
}

/**
 * Reduce every exclusive bucket to its strongest instance.
 */
export function pruneExclusiveBuckets(dimensions: TagDimensions, taxonomy: Taxonomy): PrunedInstance[] {
  const pruned: PrunedInstance[] = [];

  for (const [category, buckets] of Object.entries(dimensions)) {
    for (const [subcategory, list] of Object.entries(buckets)) {
      if (list.length < 2 || !taxonomy.isExclusive(category, subcategory)) continue;

      const keep = strongestInstance(list);
      for (const instance of list) {
        if (instance !== keep) {
          pruned.push({ category, subcategory, tagName: instance.tagName });
        }
      }
      buckets[subcategory] = keep ? [keep] : [];
    }
  }

  return pruned;
}
