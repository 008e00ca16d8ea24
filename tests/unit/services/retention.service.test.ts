/**
 * RetentionManager Unit Tests
 */

import { describe, it, expect } from 'vitest';

import {
  DAY_MS,
  createRetentionManager,
  recordExpiresAt,
} from '@/services/retention.service.js';

const CREATED = new Date('2024-01-01T00:00:00Z');

function at(ms: number): Date {
  return new Date(CREATED.getTime() + ms);
}

describe('RetentionManager', () => {
  it('should default to 30 and 90 day TTLs', () => {
    const retention = createRetentionManager();

    expect(retention.ttlFor('intervention')).toBe(30 * DAY_MS);
    expect(retention.ttlFor('reflection')).toBe(90 * DAY_MS);
  });

  it('should use the configured policy', () => {
    const retention = createRetentionManager({
      interventionTtlMs: 1000,
      reflectionTtlMs: 2000,
    });

    expect(retention.ttlFor('intervention')).toBe(1000);
    expect(retention.ttlFor('reflection')).toBe(2000);
  });

  it('should reject non-positive TTLs', () => {
    expect(() =>
      createRetentionManager({ interventionTtlMs: 0, reflectionTtlMs: 1 })
    ).toThrow('Retention TTLs must be positive');
  });

  it('should compute expiry from createdAt plus ttl', () => {
    expect(recordExpiresAt({ createdAt: CREATED, ttlMs: 5000 })).toEqual(
      at(5000)
    );
  });

  it('should treat a record as expired from its expiry instant on', () => {
    const retention = createRetentionManager();
    const record = { createdAt: CREATED, ttlMs: 1000 };

    expect(retention.isExpired(record, at(999))).toBe(false);
    expect(retention.isExpired(record, at(1000))).toBe(true);
    expect(retention.isExpired(record, at(2000))).toBe(true);
  });

  it('should filter live records and keep their order', () => {
    const retention = createRetentionManager();
    const records = [
      { id: 'a', createdAt: CREATED, ttlMs: 5000 },
      { id: 'b', createdAt: CREATED, ttlMs: 1000 },
      { id: 'c', createdAt: at(500), ttlMs: 1000 },
    ];

    expect(retention.filterLive(records, at(1200)).map((r) => r.id)).toEqual([
      'a',
      'c',
    ]);
  });
});
