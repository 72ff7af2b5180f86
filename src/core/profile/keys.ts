// ═══════════════════════════════════════════════════════════════════════════════
// KEY GENERATION — Storage Keys for Profiles, Timelines and Locks
// ═══════════════════════════════════════════════════════════════════════════════
//
// Layout (user ids never contain ':'):
//   {prefix}profile:user:{userId}:record
//   {prefix}profile:user:{userId}:timeline
//   {prefix}profile:user:{userId}:lock
//
// ═══════════════════════════════════════════════════════════════════════════════

export interface ProfileKeys {
  record(userId: string): string;
  timeline(userId: string): string;
  lock(userId: string): string;
}

export function createProfileKeys(prefix = ''): ProfileKeys {
  const base = `${prefix}profile:user:`;

  return {
    record: (userId) => `${base}${userId}:record`,
    timeline: (userId) => `${base}${userId}:timeline`,
    lock: (userId) => `${base}${userId}:lock`,
  };
}
