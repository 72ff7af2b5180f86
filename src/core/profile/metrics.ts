// ═══════════════════════════════════════════════════════════════════════════════
// METRICS CALCULATOR — Dimension Summaries and Profile Maturity
// ═══════════════════════════════════════════════════════════════════════════════

import type { EngineConfig } from '../../config/schema.js';
import { strongestInstance } from './exclusivity.js';
import type { DimensionSummary, TagDimensions } from './types.js';

export interface ProfileMetrics {
  summaries: DimensionSummary[];
  totalTags: number;
  confidentTags: number;
  profileMaturity: number;
}

/**
 * Maturity rewards the confident fraction of tags and, up to
 * `maturityTagTarget` tags, their number.
 */
export function computeMaturity(totalTags: number, confidentTags: number, engine: EngineConfig): number {
  if (totalTags === 0) return 0;
  return Math.min(1, (confidentTags / totalTags) * (totalTags / engine.maturityTagTarget));
}

/**
 * Rebuild summaries and maturity from scratch. Buckets and instances are
 * visited in insertion order.
 */
export function computeMetrics(dimensions: TagDimensions, engine: EngineConfig): ProfileMetrics {
  const summaries: DimensionSummary[] = [];
  let totalTags = 0;
  let confidentTags = 0;

  for (const [dimensionName, buckets] of Object.entries(dimensions)) {
    for (const [subdimensionName, list] of Object.entries(buckets)) {
      const dominant = strongestInstance(list);
      if (!dominant) continue;

      summaries.push({
        dimensionName,
        subdimensionName,
        dominantTag: dominant.tagName,
        confidence: dominant.confidence,
        tagCount: list.length,
        lastUpdated: dominant.lastReinforced,
      });

      totalTags += list.length;
      confidentTags += list.filter((instance) => instance.confidence >= engine.confidentThreshold).length;
    }
  }

  return {
    summaries,
    totalTags,
    confidentTags,
    profileMaturity: computeMaturity(totalTags, confidentTags, engine),
  };
}
