// ═══════════════════════════════════════════════════════════════════════════════
// PROFILE STORE — Load and Atomic Commit of a User Profile
// ═══════════════════════════════════════════════════════════════════════════════
//
// The repository owns no scoring logic. It decodes what is stored, falls
// back to an empty profile when the record is unreadable, and writes the
// profile together with its timeline event in one store transaction.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { getLogger } from '../../logging/index.js';
import type { KeyValueStore } from '../../storage/types.js';
import { decodeProfile, encodeProfile } from './codec.js';
import { StorageError } from './errors.js';
import type { ProfileKeys } from './keys.js';
import type { Taxonomy } from './taxonomy.js';
import type { TimelineRecorder } from './timeline.js';
import type { TimelineEvent, UserProfile } from './types.js';

const logger = getLogger({ component: 'profile-store' });

/**
 * A fresh profile: every taxonomy dimension present with empty lists.
 */
export function createEmptyProfile(userId: string, taxonomy: Taxonomy, now: Date): UserProfile {
  const timestamp = now.toISOString();
  return {
    userId,
    createdAt: timestamp,
    lastUpdated: timestamp,
    tagDimensions: taxonomy.createEmptyDimensions(),
    profileMaturity: 0,
    totalInteractions: 0,
    dimensionSummaries: [],
  };
}

export interface LoadedProfile {
  profile: UserProfile;
  /** False when nothing usable was stored and `profile` is fresh */
  persisted: boolean;
}

export class ProfileRepository {
  constructor(
    private readonly store: KeyValueStore,
    private readonly keys: ProfileKeys,
    private readonly taxonomy: Taxonomy,
    private readonly timeline: TimelineRecorder
  ) {}

  /**
   * Load a user's profile. A missing record, or one that fails to decode,
   * yields a fresh empty profile.
   */
  async load(userId: string, now: Date): Promise<LoadedProfile> {
    let raw: string | null;
    try {
      raw = await this.store.get(this.keys.record(userId));
    } catch (error) {
      throw new StorageError('load', error);
    }

    if (raw === null) {
      return { profile: createEmptyProfile(userId, this.taxonomy, now), persisted: false };
    }

    const decoded = decodeProfile(raw, now);
    if (!decoded.ok) {
      logger.warn('Stored profile is unreadable, starting from an empty profile', {
        userId,
        code: decoded.error.code,
        reason: decoded.error.message,
      });
      return { profile: createEmptyProfile(userId, this.taxonomy, now), persisted: false };
    }

    if (decoded.value.userId !== userId) {
      logger.warn('Stored profile belongs to another user, starting from an empty profile', {
        userId,
        storedUserId: decoded.value.userId,
      });
      return { profile: createEmptyProfile(userId, this.taxonomy, now), persisted: false };
    }

    return { profile: decoded.value, persisted: true };
  }

  /**
   * Write the profile and, when given, append its timeline event. Both land
   * or neither does.
   */
  async commit(profile: UserProfile, event?: TimelineEvent): Promise<void> {
    const tx = this.store.multi();
    tx.set(this.keys.record(profile.userId), encodeProfile(profile));
    if (event) {
      this.timeline.stage(tx, profile.userId, event);
    }

    try {
      await tx.exec();
    } catch (error) {
      throw new StorageError('commit', error);
    }
  }
}
