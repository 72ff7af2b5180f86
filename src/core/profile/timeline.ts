// ═══════════════════════════════════════════════════════════════════════════════
// TIMELINE RECORDER — Capped Append-Only Audit Log per User
// ═══════════════════════════════════════════════════════════════════════════════

import { getLogger } from '../../logging/index.js';
import type { KeyValueStore, StoreTransaction } from '../../storage/types.js';
import { decodeTimelineEvent, encodeTimelineEvent } from './codec.js';
import type { ProfileKeys } from './keys.js';
import type { ObservationBatch, TimelineEvent } from './types.js';

const logger = getLogger({ component: 'profile-timeline' });

export function createTimelineEvent(batch: ObservationBatch, now: Date): TimelineEvent {
  return {
    timestamp: now.toISOString(),
    eventType: 'tag_extraction',
    extractedTags: structuredClone(batch),
  };
}

export class TimelineRecorder {
  constructor(
    private readonly store: KeyValueStore,
    private readonly keys: ProfileKeys,
    private readonly maxEvents: number
  ) {}

  /**
   * Queue the append on `tx`. The oldest events beyond `maxEvents` are
   * trimmed in the same transaction.
   */
  stage(tx: StoreTransaction, userId: string, event: TimelineEvent): void {
    const key = this.keys.timeline(userId);
    tx.rpush(key, encodeTimelineEvent(event)).ltrim(key, -this.maxEvents, -1);
  }

  async append(userId: string, event: TimelineEvent): Promise<void> {
    const tx = this.store.multi();
    this.stage(tx, userId, event);
    await tx.exec();
  }

  /**
   * Events oldest first. With `limit`, only the most recent `limit` events.
   * Entries that fail to decode are skipped.
   */
  async read(userId: string, limit?: number): Promise<TimelineEvent[]> {
    const start = limit === undefined ? 0 : -limit;
    const raw = await this.store.lrange(this.keys.timeline(userId), start, -1);

    const events: TimelineEvent[] = [];
    for (const entry of raw) {
      const decoded = decodeTimelineEvent(entry);
      if (decoded.ok) {
        events.push(decoded.value);
      } else {
        logger.warn('Skipping unreadable timeline entry', { userId, reason: decoded.error.message });
      }
    }
    return events;
  }

  async count(userId: string): Promise<number> {
    return this.store.llen(this.keys.timeline(userId));
  }
}
