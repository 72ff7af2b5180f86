// ═══════════════════════════════════════════════════════════════════════════════
// PROFILE SERVICE — Public Operations over the Profile Engine
// ═══════════════════════════════════════════════════════════════════════════════

import type { AppConfig } from '../../config/schema.js';
import { getLogger } from '../../logging/index.js';
import type { Result } from '../../types/result.js';
import { applyBatch } from './engine.js';
import { LockTimeoutError, ValidationError, type ProfileError } from './errors.js';
import type { LockError, ProfileLock } from './lock.js';
import { countObservations, normalizeExtraction, parseObservationBatch, parseUserId } from './observations.js';
import { createEmptyProfile, type ProfileRepository } from './store.js';
import type { Taxonomy } from './taxonomy.js';
import { createTimelineEvent, type TimelineRecorder } from './timeline.js';
import type { ProfileStats, TimelineEvent, UserProfile } from './types.js';

const logger = getLogger({ component: 'profile-service' });

export interface ProfileServiceDeps {
  repository: ProfileRepository;
  timeline: TimelineRecorder;
  lock: ProfileLock;
  taxonomy: Taxonomy;
  config: Pick<AppConfig, 'engine'>;
  /** Clock; defaults to the system clock */
  now?: () => Date;
}

function unwrapOrThrow<T, E extends ProfileError>(result: Result<T, E>): T {
  if (!result.ok) {
    throw result.error;
  }
  return result.value;
}

export class ProfileService {
  private readonly now: () => Date;

  constructor(private readonly deps: ProfileServiceDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  get taxonomy(): Taxonomy {
    return this.deps.taxonomy;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Writes
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * Apply one observation batch: the only write path for tag data.
   *
   * The batch is validated before anything is loaded. Load, update, persist
   * and the timeline append run under the user's lock, and the persist and
   * append commit together.
   *
   * @throws ValidationError for a malformed user id or batch
   * @throws LockTimeoutError when the user's lock cannot be acquired
   * @throws StorageError when the store fails; nothing is persisted
   */
  async applyObservations(userId: string, observationsByCategory: unknown): Promise<UserProfile> {
    const id = unwrapOrThrow(parseUserId(userId));
    const isKnownCategory = (category: string) => this.deps.taxonomy.hasDimension(category);
    const batch = unwrapOrThrow(parseObservationBatch(observationsByCategory, this.now(), isKnownCategory));

    return this.locked(id, async () => {
      const startTime = Date.now();
      const now = this.now();
      const { profile } = await this.deps.repository.load(id, now);

      const { profile: updated, report } = applyBatch(profile, batch, now, {
        taxonomy: this.deps.taxonomy,
        engine: this.deps.config.engine,
      });

      await this.deps.repository.commit(updated, createTimelineEvent(batch, now));

      if (report.ignoredCategories.length > 0) {
        logger.debug('Ignored categories outside the taxonomy', {
          userId: id,
          categories: report.ignoredCategories,
        });
      }
      if (report.decaySkipped > 0) {
        logger.warn('Skipped decay for instances with unreadable timestamps', {
          userId: id,
          count: report.decaySkipped,
        });
      }
      logger.info('Profile updated', {
        userId: id,
        observations: countObservations(batch),
        reinforced: report.reinforced,
        created: report.created,
        replaced: report.replaced,
        pruned: report.pruned,
        totalInteractions: updated.totalInteractions,
        profileMaturity: updated.profileMaturity,
        durationMs: Date.now() - startTime,
      });

      return updated;
    });
  }

  /**
   * Normalise an extractor payload (category → subcategory → tags) and apply it.
   */
  async applyExtraction(userId: string, payload: unknown): Promise<UserProfile> {
    const batch = unwrapOrThrow(normalizeExtraction(payload, this.now()));
    return this.applyObservations(userId, batch);
  }

  /**
   * Replace the user's profile with a fresh empty one. The timeline is kept.
   */
  async resetProfile(userId: string): Promise<UserProfile> {
    const id = unwrapOrThrow(parseUserId(userId));

    return this.locked(id, async () => {
      const profile = createEmptyProfile(id, this.deps.taxonomy, this.now());
      await this.deps.repository.commit(profile);
      logger.info('Profile reset', { userId: id });
      return profile;
    });
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Reads
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * Fetch the profile, creating and storing an empty one on first access.
   */
  async getProfile(userId: string): Promise<UserProfile> {
    const id = unwrapOrThrow(parseUserId(userId));

    const loaded = await this.deps.repository.load(id, this.now());
    if (loaded.persisted) {
      return loaded.profile;
    }

    return this.locked(id, async () => {
      // Another caller may have written it while we waited.
      const current = await this.deps.repository.load(id, this.now());
      if (!current.persisted) {
        await this.deps.repository.commit(current.profile);
        logger.debug('Created empty profile', { userId: id });
      }
      return current.profile;
    });
  }

  /**
   * Timeline events, oldest first; `limit` keeps only the most recent ones.
   */
  async getTimeline(userId: string, limit?: number): Promise<TimelineEvent[]> {
    const id = unwrapOrThrow(parseUserId(userId));
    if (limit !== undefined && (!Number.isInteger(limit) || limit < 1)) {
      throw new ValidationError(`Invalid timeline limit: ${limit}`);
    }
    return this.deps.timeline.read(id, limit);
  }

  async getStats(userId: string): Promise<ProfileStats> {
    const id = unwrapOrThrow(parseUserId(userId));
    const { profile } = await this.deps.repository.load(id, this.now());
    const threshold = this.deps.config.engine.confidentThreshold;

    let totalTags = 0;
    let confidentTags = 0;
    for (const buckets of Object.values(profile.tagDimensions)) {
      for (const list of Object.values(buckets)) {
        totalTags += list.length;
        confidentTags += list.filter((instance) => instance.confidence >= threshold).length;
      }
    }

    return {
      userId: id,
      totalInteractions: profile.totalInteractions,
      totalDimensions: profile.dimensionSummaries.length,
      totalTags,
      confidentTags,
      profileMaturity: profile.profileMaturity,
      timelineEvents: await this.deps.timeline.count(id),
      createdAt: profile.createdAt,
      lastUpdated: profile.lastUpdated,
    };
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Internals
  // ─────────────────────────────────────────────────────────────────────────────

  private async locked<T>(userId: string, fn: () => Promise<T>): Promise<T> {
    const result: Result<T, LockError> = await this.deps.lock.withLock(userId, fn);
    if (!result.ok) {
      throw new LockTimeoutError(userId, `Could not lock profile ${userId}: ${result.error.message}`, {
        cause: result.error.cause,
      });
    }
    return result.value;
  }
}
