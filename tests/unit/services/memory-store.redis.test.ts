/**
 * Redis MemoryStoreDb Unit Tests
 * Runs against the in-process Redis stand-in
 */

import { describe, it, expect, beforeEach } from 'vitest';

import {
  USERS_KEY,
  createRedisMemoryStoreDb,
  indexKey,
  recordKey,
} from '@/services/memory-store.redis.js';
import type { MemoryStoreDb } from '@/services/memory-store.service.js';
import type { Intervention, Reflection } from '@/types/index.js';
import { createTestClock, type TestClock } from '../../helpers/test-utils.js';
import {
  createFakeRedisClient,
  createMockLogger,
  type FakeRedis,
  type MockLogger,
} from '../../mocks/index.js';

function intervention(id: string, createdAt: Date, ttlMs: number): Intervention {
  return {
    id,
    userId: 'alice',
    interventionText: 'Try a timer',
    contextText: 'Stalled on the report',
    taskLabel: 'report',
    outcome: 're_engaged',
    embedding: [0.5, 0.5],
    createdAt,
    ttlMs,
  };
}

function reflection(id: string, createdAt: Date, ttlMs: number): Reflection {
  return {
    id,
    userId: 'alice',
    insightText: 'Timers help',
    sessionSummary: 'USER: hi',
    createdAt,
    ttlMs,
  };
}

describe('RedisMemoryStoreDb', () => {
  let clock: TestClock;
  let redis: FakeRedis;
  let logger: MockLogger;
  let db: MemoryStoreDb;

  beforeEach(() => {
    clock = createTestClock();
    redis = createFakeRedisClient(clock.nowMs);
    logger = createMockLogger();
    db = createRedisMemoryStoreDb(redis, logger);
  });

  it('should lay out keys per user and kind', () => {
    expect(recordKey('alice', 'intervention', 'x1')).toBe(
      'mem:alice:intervention:x1'
    );
    expect(indexKey('alice', 'reflection')).toBe('mem:alice:reflections');
  });

  it('should round-trip an intervention with its date restored', async () => {
    const record = intervention('x1', clock.now(), 60_000);
    await db.insertIntervention(record);

    const listed = await db.listInterventions('alice', clock.now());

    expect(listed).toEqual([record]);
    expect(listed[0]?.createdAt).toBeInstanceOf(Date);
    expect(redis.keys()).toEqual(['mem:alice:intervention:x1']);
    expect(await redis.smembers(USERS_KEY)).toEqual(['alice']);
  });

  it('should round-trip reflections', async () => {
    const record = reflection('r1', clock.now(), 60_000);
    await db.insertReflection(record);

    expect(await db.listReflections('alice', clock.now())).toEqual([record]);
  });

  it('should index records by expiry and skip expired ones', async () => {
    await db.insertIntervention(intervention('short', clock.now(), 1000));
    await db.insertIntervention(intervention('long', clock.now(), 60_000));
    clock.advance(1000);

    const listed = await db.listInterventions('alice', clock.now());

    expect(listed.map((i) => i.id)).toEqual(['long']);
  });

  it('should skip malformed values with a warning', async () => {
    await db.insertIntervention(intervention('good', clock.now(), 60_000));
    await redis.set(recordKey('alice', 'intervention', 'bad'), { id: 'bad' }, 60);
    await redis.zadd(indexKey('alice', 'intervention'), clock.nowMs() + 60_000, 'bad');

    const listed = await db.listInterventions('alice', clock.now());

    expect(listed.map((i) => i.id)).toEqual(['good']);
    expect(logger.warn).toHaveBeenCalledWith('Skipping malformed memory record', {
      kind: 'intervention',
      userId: 'alice',
      id: 'bad',
    });
  });

  it('should trim expired index entries and forget empty users', async () => {
    await db.insertIntervention(intervention('i1', clock.now(), 1000));
    await db.insertReflection(reflection('r1', clock.now(), 1000));
    clock.advance(5000);

    const purged = await db.purgeExpired(clock.now());

    expect(purged).toEqual({ interventions: 1, reflections: 1 });
    expect(await redis.zcard(indexKey('alice', 'intervention'))).toBe(0);
    expect(await redis.smembers(USERS_KEY)).toEqual([]);
  });

  it('should keep users that still have live records', async () => {
    await db.insertIntervention(intervention('i1', clock.now(), 1000));
    await db.insertIntervention(intervention('i2', clock.now(), 60_000));
    clock.advance(5000);

    const purged = await db.purgeExpired(clock.now());

    expect(purged).toEqual({ interventions: 1, reflections: 0 });
    expect(await redis.smembers(USERS_KEY)).toEqual(['alice']);
  });

  it('should keep a user whose write lands while the sweep drops them', async () => {
    await db.insertIntervention(intervention('i1', clock.now(), 1000));
    clock.advance(5000);
    let written = false;
    const racing: FakeRedis = {
      ...redis,
      async srem(key, member) {
        if (!written) {
          written = true;
          await db.insertIntervention(intervention('i2', clock.now(), 60_000));
        }
        await redis.srem(key, member);
      },
    };

    const purged = await createRedisMemoryStoreDb(racing, logger).purgeExpired(
      clock.now()
    );

    expect(purged).toEqual({ interventions: 1, reflections: 0 });
    expect(await redis.smembers(USERS_KEY)).toEqual(['alice']);
    const live = await db.listInterventions('alice', clock.now());
    expect(live.map((i) => i.id)).toEqual(['i2']);
  });

  it('should propagate client errors', async () => {
    redis.fail(new Error('ECONNRESET'));

    await expect(db.listInterventions('alice', clock.now())).rejects.toThrow(
      'ECONNRESET'
    );
  });
});
