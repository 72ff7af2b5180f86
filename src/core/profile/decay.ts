// ═══════════════════════════════════════════════════════════════════════════════
// DECAY ENGINE — Time-Based Confidence Reduction
// ═══════════════════════════════════════════════════════════════════════════════
//
//   daysSince      = floor((now - lastReinforced) / 1 day)
//   decayFactor    = max(0.1, 1 - daysSince * decayRate / decayWindowDays)
//   baseConfidence = confidence / (1 + reinforcementCount * reinforcementDampening)
//   confidence'    = clamp(minConfidence, maxConfidence, baseConfidence * decayFactor)
//
// Runs over every instance on every cycle, including instances reinforced in
// the same cycle. The division by the reinforcement term compounds across
// cycles.
//
// ═══════════════════════════════════════════════════════════════════════════════

import type { EngineConfig } from '../../config/schema.js';
import type { TagDimensions, TagInstance } from './types.js';

export const MS_PER_DAY = 24 * 60 * 60 * 1000;

/** Lower bound of the time factor, independent of the confidence floor */
export const MIN_DECAY_FACTOR = 0.1;

const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Epoch milliseconds of an ISO timestamp, NaN when it does not parse.
 * A date without a time is local midnight, the same as a datetime without an
 * offset (Date.parse alone would read it as UTC).
 */
export function parseTimestamp(timestamp: string): number {
  return Date.parse(DATE_ONLY.test(timestamp) ? `${timestamp}T00:00:00` : timestamp);
}

/**
 * Whole days elapsed since `timestamp`, or null when it does not parse.
 * Timestamps in the future count as zero days.
 */
export function daysSince(timestamp: string, now: Date): number | null {
  const then = parseTimestamp(timestamp);
  if (Number.isNaN(then)) return null;
  return Math.max(0, Math.floor((now.getTime() - then) / MS_PER_DAY));
}

export function decayFactor(days: number, decayRate: number, engine: EngineConfig): number {
  return Math.max(MIN_DECAY_FACTOR, 1 - (days * decayRate) / engine.decayWindowDays);
}

/**
 * Confidence of `instance` after `days` idle days.
 */
export function decayedConfidence(instance: TagInstance, days: number, engine: EngineConfig): number {
  const base = instance.confidence / (1 + instance.reinforcementCount * engine.reinforcementDampening);
  const decayed = base * decayFactor(days, instance.decayRate, engine);
  return Math.min(engine.maxConfidence, Math.max(engine.minConfidence, decayed));
}

export interface DecayReport {
  decayed: number;
  /** Instances left untouched because lastReinforced did not parse */
  skipped: Array<{ category: string; subcategory: string; tagName: string }>;
}

/**
 * Decay every instance in place.
 */
export function applyDecay(dimensions: TagDimensions, now: Date, engine: EngineConfig): DecayReport {
  const report: DecayReport = { decayed: 0, skipped: [] };

  for (const [category, buckets] of Object.entries(dimensions)) {
    for (const [subcategory, list] of Object.entries(buckets)) {
      for (const instance of list) {
        const days = daysSince(instance.lastReinforced, now);
        if (days === null) {
          report.skipped.push({ category, subcategory, tagName: instance.tagName });
          continue;
        }
        instance.confidence = decayedConfidence(instance, days, engine);
        report.decayed += 1;
      }
    }
  }

  return report;
}
