// ═══════════════════════════════════════════════════════════════════════════════
// SCORING TESTS — Reinforcement, Exclusivity, Decay, Metrics
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect } from 'vitest';
import { EngineConfigSchema } from '../config/schema.js';
import {
  applyDecay,
  applyObservation,
  clampConfidence,
  computeMaturity,
  computeMetrics,
  createTagInstance,
  daysSince,
  decayedConfidence,
  decayFactor,
  parseTaxonomy,
  parseTimestamp,
  pruneExclusiveBuckets,
  reinforceInstance,
  resolveExclusiveConflict,
  strongestInstance,
  type TagDimensions,
  type TagInstance,
  type TagObservation,
  type Taxonomy,
} from '../core/profile/index.js';

// ─────────────────────────────────────────────────────────────────────────────────
// FIXTURES
// ─────────────────────────────────────────────────────────────────────────────────

const engine = EngineConfigSchema.parse({});

function buildTaxonomy(): Taxonomy {
  const result = parseTaxonomy({
    version: 'test',
    dimensions: [
      {
        name: 'core_profile',
        subdimensions: [
          { name: 'age_range', exclusive: true },
          { name: 'region' },
        ],
      },
      {
        name: 'intent_conversion',
        subdimensions: [{ name: 'intent_category' }],
      },
    ],
  });
  if (!result.ok) throw result.error;
  return result.value;
}

const taxonomy = buildTaxonomy();

function observation(overrides: Partial<TagObservation> = {}): TagObservation {
  return {
    name: 'urban',
    confidence: 0.5,
    evidence: 'mentions the city',
    category: 'core_profile',
    subcategory: 'region',
    timestamp: '2024-03-01T00:00:00.000Z',
    ...overrides,
  };
}

function instance(tagName: string, confidence: number, overrides: Partial<TagInstance> = {}): TagInstance {
  return {
    tagName,
    confidence,
    reinforcementCount: 1,
    firstSeen: '2024-03-01T00:00:00.000Z',
    lastReinforced: '2024-03-01T00:00:00.000Z',
    evidenceList: [],
    decayRate: 0.1,
    ...overrides,
  };
}

// ─────────────────────────────────────────────────────────────────────────────────
// REINFORCEMENT
// ─────────────────────────────────────────────────────────────────────────────────

describe('Reinforcement', () => {
  describe('clampConfidence', () => {
    it('should keep values inside the bounds', () => {
      expect(clampConfidence(0.05, engine)).toBe(0.1);
      expect(clampConfidence(1.4, engine)).toBe(1);
      expect(clampConfidence(0.42, engine)).toBe(0.42);
    });
  });

  describe('createTagInstance', () => {
    it('should start a new instance from an observation', () => {
      const created = createTagInstance(observation({ confidence: 0.7 }), engine);

      expect(created).toEqual({
        tagName: 'urban',
        confidence: 0.7,
        reinforcementCount: 1,
        firstSeen: '2024-03-01T00:00:00.000Z',
        lastReinforced: '2024-03-01T00:00:00.000Z',
        evidenceList: ['mentions the city'],
        decayRate: 0.1,
      });
    });

    it('should clamp a confidence below the floor', () => {
      expect(createTagInstance(observation({ confidence: 0.02 }), engine).confidence).toBe(0.1);
    });
  });

  describe('reinforceInstance', () => {
    it('should pull confidence 30% toward the new observation', () => {
      const existing = instance('urban', 0.5, { evidenceList: ['first'] });

      reinforceInstance(existing, observation({ confidence: 0.9, evidence: 'second', timestamp: '2024-03-05T00:00:00.000Z' }), engine);

      expect(existing.confidence).toBeCloseTo(0.62, 10);
      expect(existing.reinforcementCount).toBe(2);
      expect(existing.lastReinforced).toBe('2024-03-05T00:00:00.000Z');
      expect(existing.firstSeen).toBe('2024-03-01T00:00:00.000Z');
      expect(existing.evidenceList).toEqual(['first', 'second']);
    });

    it('should never exceed the confidence ceiling', () => {
      const existing = instance('urban', 1);
      reinforceInstance(existing, observation({ confidence: 1 }), engine);
      expect(existing.confidence).toBe(1);
    });

    it('should keep only the ten most recent evidence entries', () => {
      const existing = createTagInstance(observation({ evidence: 'e0' }), engine);

      for (let i = 1; i <= 14; i++) {
        reinforceInstance(existing, observation({ evidence: `e${i}` }), engine);
      }

      expect(existing.reinforcementCount).toBe(15);
      expect(existing.evidenceList).toEqual(['e5', 'e6', 'e7', 'e8', 'e9', 'e10', 'e11', 'e12', 'e13', 'e14']);
    });
  });

  describe('applyObservation', () => {
    it('should create a bucket for a sub-dimension the taxonomy does not list', () => {
      const dimensions: TagDimensions = { core_profile: {} };

      const outcome = applyObservation(
        dimensions,
        'core_profile',
        observation({ subcategory: 'hobby', name: 'chess' }),
        taxonomy,
        engine
      );

      expect(outcome.action).toBe('created');
      expect(dimensions.core_profile.hobby.map((entry) => entry.tagName)).toEqual(['chess']);
    });

    it('should reinforce an existing tag of the same name', () => {
      const dimensions: TagDimensions = { core_profile: { region: [instance('urban', 0.5)] } };

      const outcome = applyObservation(dimensions, 'core_profile', observation({ confidence: 0.9 }), taxonomy, engine);

      expect(outcome.action).toBe('reinforced');
      expect(dimensions.core_profile.region).toHaveLength(1);
      expect(dimensions.core_profile.region[0].confidence).toBeCloseTo(0.62, 10);
    });

    it('should treat names of Object.prototype members as ordinary keys', () => {
      const dimensions: TagDimensions = {};

      applyObservation(dimensions, 'core_profile', observation({ subcategory: 'toString' }), taxonomy, engine);

      expect(Object.keys(dimensions.core_profile)).toEqual(['toString']);
      expect(dimensions.core_profile.toString).toHaveLength(1);
    });
  });
});

// ─────────────────────────────────────────────────────────────────────────────────
// EXCLUSIVITY
// ─────────────────────────────────────────────────────────────────────────────────

describe('Exclusivity', () => {
  it('should pick the first instance on a confidence tie', () => {
    const first = instance('25-34', 0.7);
    const second = instance('35-44', 0.7);
    expect(strongestInstance([first, second])).toBe(first);
    expect(strongestInstance([])).toBeUndefined();
  });

  it('should remove the strongest instance only for a strictly stronger candidate', () => {
    const weak = instance('18-24', 0.6);
    const strong = instance('25-34', 0.8);
    const list = [weak, strong];

    expect(resolveExclusiveConflict(list, 0.8)).toBeUndefined();
    expect(list).toHaveLength(2);

    expect(resolveExclusiveConflict(list, 0.9)).toBe(strong);
    expect(list).toEqual([weak]);
  });

  it('should replace the incumbent when a stronger distinct tag arrives', () => {
    const dimensions: TagDimensions = { core_profile: { age_range: [instance('25-34', 0.4)] } };

    const outcome = applyObservation(
      dimensions,
      'core_profile',
      observation({ subcategory: 'age_range', name: '35-44', confidence: 0.7 }),
      taxonomy,
      engine
    );

    expect(outcome.action === 'created' ? outcome.replaced?.tagName : undefined).toBe('25-34');
    expect(dimensions.core_profile.age_range.map((entry) => entry.tagName)).toEqual(['35-44']);
  });

  it('should keep both instances when the new tag is weaker', () => {
    const dimensions: TagDimensions = { core_profile: { age_range: [instance('25-34', 0.4)] } };

    applyObservation(
      dimensions,
      'core_profile',
      observation({ subcategory: 'age_range', name: '35-44', confidence: 0.3 }),
      taxonomy,
      engine
    );

    expect(dimensions.core_profile.age_range.map((entry) => entry.tagName)).toEqual(['25-34', '35-44']);
  });

  it('should not apply exclusivity to non-exclusive sub-dimensions', () => {
    const dimensions: TagDimensions = { core_profile: { region: [instance('urban', 0.4)] } };

    applyObservation(dimensions, 'core_profile', observation({ name: 'overseas', confidence: 0.9 }), taxonomy, engine);

    expect(dimensions.core_profile.region.map((entry) => entry.tagName)).toEqual(['urban', 'overseas']);
  });

  it('should prune exclusive buckets down to their strongest instance', () => {
    const dimensions: TagDimensions = {
      core_profile: {
        age_range: [instance('18-24', 0.5), instance('25-34', 0.7), instance('35-44', 0.7)],
        region: [instance('urban', 0.5), instance('rural', 0.6)],
      },
    };

    const pruned = pruneExclusiveBuckets(dimensions, taxonomy);

    expect(pruned).toEqual([
      { category: 'core_profile', subcategory: 'age_range', tagName: '18-24' },
      { category: 'core_profile', subcategory: 'age_range', tagName: '35-44' },
    ]);
    expect(dimensions.core_profile.age_range.map((entry) => entry.tagName)).toEqual(['25-34']);
    expect(dimensions.core_profile.region).toHaveLength(2);
  });
});

// ─────────────────────────────────────────────────────────────────────────────────
// DECAY
// ─────────────────────────────────────────────────────────────────────────────────

describe('Decay', () => {
  const now = new Date('2024-03-11T12:00:00.000Z');

  it('should count whole elapsed days', () => {
    expect(daysSince('2024-03-01T00:00:00.000Z', now)).toBe(10);
    expect(daysSince('2024-03-11T00:00:00.000Z', now)).toBe(0);
  });

  it('should count future timestamps as zero days', () => {
    expect(daysSince('2024-04-01T00:00:00.000Z', now)).toBe(0);
  });

  it('should return null for an unparseable timestamp', () => {
    expect(daysSince('not a date', now)).toBeNull();
  });

  it('should read a date without a time as local midnight', () => {
    const localNow = new Date(2024, 0, 11, 0, 30);

    expect(parseTimestamp('2024-01-10')).toBe(new Date(2024, 0, 10).getTime());
    expect(parseTimestamp('2024-01-10')).toBe(parseTimestamp('2024-01-10T00:00:00'));
    expect(daysSince('2024-01-10', localNow)).toBe(1);
  });

  it('should compute the time factor with a floor of 0.1', () => {
    expect(decayFactor(0, 0.1, engine)).toBe(1);
    expect(decayFactor(10, 0.1, engine)).toBeCloseTo(1 - 1 / 30, 10);
    expect(decayFactor(400, 0.1, engine)).toBe(0.1);
  });

  it('should divide by the reinforcement term even without elapsed time', () => {
    expect(decayedConfidence(instance('urban', 0.8), 0, engine)).toBeCloseTo(0.8 / 1.1, 10);
    expect(decayedConfidence(instance('urban', 0.8, { reinforcementCount: 4 }), 15, engine)).toBeCloseTo(
      (0.8 / 1.4) * 0.95,
      10
    );
  });

  it('should not drop below the confidence floor', () => {
    expect(decayedConfidence(instance('urban', 0.1, { reinforcementCount: 5 }), 0, engine)).toBe(0.1);
  });

  it('should be non-increasing as idle days grow', () => {
    const subject = instance('urban', 0.9, { reinforcementCount: 2 });
    let previous = Infinity;
    for (let days = 0; days <= 400; days += 20) {
      const value = decayedConfidence(subject, days, engine);
      expect(value).toBeLessThanOrEqual(previous);
      expect(value).toBeGreaterThanOrEqual(0.1);
      previous = value;
    }
  });

  it('should skip instances whose timestamp does not parse', () => {
    const dimensions: TagDimensions = {
      core_profile: {
        region: [instance('urban', 0.8, { lastReinforced: 'yesterday' }), instance('rural', 0.8)],
      },
    };

    const report = applyDecay(dimensions, now, engine);

    expect(report.decayed).toBe(1);
    expect(report.skipped).toEqual([{ category: 'core_profile', subcategory: 'region', tagName: 'urban' }]);
    expect(dimensions.core_profile.region[0].confidence).toBe(0.8);
    expect(dimensions.core_profile.region[1].confidence).toBeCloseTo((0.8 / 1.1) * (1 - 1 / 30), 10);
  });
});

// ─────────────────────────────────────────────────────────────────────────────────
// METRICS
// ─────────────────────────────────────────────────────────────────────────────────

describe('Metrics', () => {
  it('should compute maturity at its boundaries', () => {
    expect(computeMaturity(0, 0, engine)).toBe(0);
    expect(computeMaturity(10, 10, engine)).toBe(1);
    expect(computeMaturity(20, 20, engine)).toBe(1);
    expect(computeMaturity(5, 3, engine)).toBeCloseTo(0.3, 10);
  });

  it('should summarise every non-empty bucket', () => {
    const dimensions: TagDimensions = {
      core_profile: {
        age_range: [instance('25-34', 0.7, { lastReinforced: '2024-03-02T00:00:00.000Z' })],
        region: [],
      },
      intent_conversion: {
        intent_category: [instance('research', 0.5), instance('purchase', 0.65)],
      },
    };

    const metrics = computeMetrics(dimensions, engine);

    expect(metrics.summaries).toEqual([
      {
        dimensionName: 'core_profile',
        subdimensionName: 'age_range',
        dominantTag: '25-34',
        confidence: 0.7,
        tagCount: 1,
        lastUpdated: '2024-03-02T00:00:00.000Z',
      },
      {
        dimensionName: 'intent_conversion',
        subdimensionName: 'intent_category',
        dominantTag: 'purchase',
        confidence: 0.65,
        tagCount: 2,
        lastUpdated: '2024-03-01T00:00:00.000Z',
      },
    ]);
    expect(metrics.totalTags).toBe(3);
    expect(metrics.confidentTags).toBe(2);
    expect(metrics.profileMaturity).toBeCloseTo((2 / 3) * (3 / 10), 10);
  });

  it('should report zero maturity for an empty profile', () => {
    const metrics = computeMetrics(taxonomy.createEmptyDimensions(), engine);
    expect(metrics.summaries).toEqual([]);
    expect(metrics.profileMaturity).toBe(0);
  });
});
