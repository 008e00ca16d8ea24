/**
 * RetentionManager
 *
 * Time-to-live visibility rules for stored memories.
 *
 * A record is invisible once `now >= createdAt + ttl`. Every read path of
 * the memory store filters through this manager, so expiry holds at the
 * read boundary whether or not the background sweep has run.
 */

import type { Expirable, MemoryKind } from '@/types/index.js';

export interface RetentionPolicy {
  interventionTtlMs: number;
  reflectionTtlMs: number;
}

export const DAY_MS = 24 * 60 * 60 * 1000;

export const DEFAULT_RETENTION_POLICY: RetentionPolicy = {
  interventionTtlMs: 30 * DAY_MS,
  reflectionTtlMs: 90 * DAY_MS,
};

export interface RetentionManager {
  /** Default TTL for a record kind */
  ttlFor(kind: MemoryKind): number;
  expiresAt(record: Expirable): Date;
  isExpired(record: Expirable, now: Date): boolean;
  /** Records still visible at `now`, order preserved */
  filterLive<T extends Expirable>(records: readonly T[], now: Date): T[];
}

export function recordExpiresAt(record: Expirable): Date {
  return new Date(record.createdAt.getTime() + record.ttlMs);
}

/**
 * Create RetentionManager instance
 */
export function createRetentionManager(
  policy: RetentionPolicy = DEFAULT_RETENTION_POLICY
): RetentionManager {
  if (policy.interventionTtlMs <= 0 || policy.reflectionTtlMs <= 0) {
    throw new Error('Retention TTLs must be positive');
  }

  function isExpired(record: Expirable, now: Date): boolean {
    return now.getTime() >= recordExpiresAt(record).getTime();
  }

  return {
    ttlFor(kind: MemoryKind): number {
      return kind === 'intervention'
        ? policy.interventionTtlMs
        : policy.reflectionTtlMs;
    },

    expiresAt: recordExpiresAt,

    isExpired,

    filterLive<T extends Expirable>(records: readonly T[], now: Date): T[] {
      return records.filter((record) => !isExpired(record, now));
    },
  };
}
