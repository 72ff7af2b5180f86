// ═══════════════════════════════════════════════════════════════════════════════
// UPDATE CYCLE — Reinforce, Prune, Decay, Recompute
// ═══════════════════════════════════════════════════════════════════════════════
//
// One observation batch = one interaction. Order is fixed:
//   1. totalInteractions += 1 (also for an empty batch)
//   2. each observation of a known category → reinforcement (+ exclusivity)
//   3. strict mode only: prune exclusive buckets to one instance
//   4. decay over the whole profile, touched or not
//   5. summaries and maturity rebuilt from scratch
//   6. lastUpdated = now
//
// Pure with respect to I/O: persistence and the timeline are the caller's.
//
// ═══════════════════════════════════════════════════════════════════════════════

import type { EngineConfig } from '../../config/schema.js';
import { applyDecay, parseTimestamp } from './decay.js';
import { pruneExclusiveBuckets } from './exclusivity.js';
import { computeMetrics } from './metrics.js';
import { applyObservation } from './reinforcement.js';
import type { Taxonomy } from './taxonomy.js';
import type { ObservationBatch, UserProfile } from './types.js';

export interface EngineContext {
  taxonomy: Taxonomy;
  engine: EngineConfig;
}

export interface CycleReport {
  reinforced: number;
  created: number;
  /** Instances displaced by a stronger newcomer in an exclusive bucket */
  replaced: number;
  /** Instances removed by strict exclusivity */
  pruned: number;
  /** Categories in the batch that the taxonomy does not declare */
  ignoredCategories: string[];
  /** Instances whose lastReinforced could not be parsed */
  decaySkipped: number;
}

export interface CycleResult {
  profile: UserProfile;
  report: CycleReport;
}

/**
 * Apply one batch to a copy of `profile`. The input profile is not modified.
 */
export function applyBatch(
  profile: UserProfile,
  batch: ObservationBatch,
  now: Date,
  context: EngineContext
): CycleResult {
  const { taxonomy, engine } = context;
  const next = structuredClone(profile);
  const report: CycleReport = {
    reinforced: 0,
    created: 0,
    replaced: 0,
    pruned: 0,
    ignoredCategories: [],
    decaySkipped: 0,
  };

  next.totalInteractions += 1;

  for (const [category, observations] of Object.entries(batch)) {
    if (!taxonomy.hasDimension(category)) {
      report.ignoredCategories.push(category);
      continue;
    }

    for (const observation of observations) {
      const outcome = applyObservation(next.tagDimensions, category, observation, taxonomy, engine);
      if (outcome.action === 'reinforced') {
        report.reinforced += 1;
      } else {
        report.created += 1;
        if (outcome.replaced) report.replaced += 1;
      }
    }
  }

  if (engine.strictExclusivity) {
    report.pruned = pruneExclusiveBuckets(next.tagDimensions, taxonomy).length;
  }

  report.decaySkipped = applyDecay(next.tagDimensions, now, engine).skipped.length;

  const metrics = computeMetrics(next.tagDimensions, engine);
  next.dimensionSummaries = metrics.summaries;
  next.profileMaturity = metrics.profileMaturity;

  // A createdAt ahead of the local clock keeps lastUpdated >= createdAt.
  const createdAt = parseTimestamp(next.createdAt);
  next.lastUpdated = !Number.isNaN(createdAt) && createdAt > now.getTime() ? next.createdAt : now.toISOString();

  return { profile: next, report };
}
