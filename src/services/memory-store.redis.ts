/**
 * MemoryStore Redis Adapter
 * Implements MemoryStoreDb on Upstash Redis
 *
 * Key layout (per user):
 * - mem:{userId}:intervention:{id}  JSON record, EX = ttl
 * - mem:{userId}:interventions      sorted set of ids scored by expiry (ms)
 * - mem:{userId}:reflection:{id}    JSON record, EX = ttl
 * - mem:{userId}:reflections        sorted set of ids scored by expiry (ms)
 * - mem:users                       set of user ids, walked by the sweep
 *
 * Values expire on their own; the sweep trims the sorted-set indexes.
 */

import type { Redis } from '@upstash/redis';
import { z } from 'zod';

import type { Logger } from '@/lib/logger.js';
import { silentLogger } from '@/lib/logger.js';
import type {
  Intervention,
  MemoryKind,
  PurgeCounts,
  Reflection,
} from '@/types/index.js';
import { OUTCOMES } from '@/types/index.js';

import type { MemoryStoreDb } from './memory-store.service.js';
import { recordExpiresAt } from './retention.service.js';

/**
 * The subset of Redis commands the adapter needs
 */
export interface MemoryRedisClient {
  set(key: string, value: unknown, ttlSeconds: number): Promise<void>;
  mget(keys: string[]): Promise<unknown[]>;
  zadd(key: string, score: number, member: string): Promise<void>;
  /** Members scored strictly above `score` */
  zrangeAbove(key: string, score: number): Promise<string[]>;
  /** Remove members scored at or below `score` */
  zremUpTo(key: string, score: number): Promise<number>;
  zcard(key: string): Promise<number>;
  sadd(key: string, member: string): Promise<void>;
  srem(key: string, member: string): Promise<void>;
  smembers(key: string): Promise<string[]>;
}

/**
 * Adapt an Upstash client to MemoryRedisClient
 */
export function fromUpstash(redis: Redis): MemoryRedisClient {
  return {
    async set(key, value, ttlSeconds) {
      await redis.set(key, value, { ex: ttlSeconds });
    },
    async mget(keys) {
      if (keys.length === 0) {
        return [];
      }
      return redis.mget<unknown[]>(...keys);
    },
    async zadd(key, score, member) {
      await redis.zadd(key, { score, member });
    },
    async zrangeAbove(key, score) {
      const min: `(${number}` = `(${score}`;
      const members = await redis.zrange<unknown[]>(key, min, '+inf', {
        byScore: true,
      });
      return members.map(String);
    },
    async zremUpTo(key, score) {
      return redis.zremrangebyscore(key, '-inf', score);
    },
    async zcard(key) {
      return redis.zcard(key);
    },
    async sadd(key, member) {
      await redis.sadd(key, member);
    },
    async srem(key, member) {
      await redis.srem(key, member);
    },
    async smembers(key) {
      const members = await redis.smembers<unknown[]>(key);
      return members.map(String);
    },
  };
}

// ─────────────────────────────────────────────────────────────
// KEYS AND ROWS
// ─────────────────────────────────────────────────────────────

export const USERS_KEY = 'mem:users';

export function recordKey(userId: string, kind: MemoryKind, id: string): string {
  return `mem:${userId}:${kind}:${id}`;
}

export function indexKey(userId: string, kind: MemoryKind): string {
  return `mem:${userId}:${kind}s`;
}

const interventionRowSchema = z.object({
  id: z.string(),
  userId: z.string(),
  interventionText: z.string(),
  contextText: z.string(),
  taskLabel: z.string(),
  outcome: z.enum(OUTCOMES),
  embedding: z.array(z.number()),
  createdAt: z.coerce.date(),
  ttlMs: z.number(),
});

const reflectionRowSchema = z.object({
  id: z.string(),
  userId: z.string(),
  insightText: z.string(),
  sessionSummary: z.string(),
  createdAt: z.coerce.date(),
  ttlMs: z.number(),
});

function ttlSeconds(ttlMs: number): number {
  return Math.max(1, Math.ceil(ttlMs / 1000));
}

// ─────────────────────────────────────────────────────────────
// ADAPTER
// ─────────────────────────────────────────────────────────────

/**
 * Create MemoryStoreDb implementation using Redis
 */
export function createRedisMemoryStoreDb(
  client: MemoryRedisClient,
  logger: Logger = silentLogger
): MemoryStoreDb {
  async function insert(
    kind: MemoryKind,
    record: Intervention | Reflection
  ): Promise<void> {
    await client.set(
      recordKey(record.userId, kind, record.id),
      { ...record, createdAt: record.createdAt.toISOString() },
      ttlSeconds(record.ttlMs)
    );
    await client.zadd(
      indexKey(record.userId, kind),
      recordExpiresAt(record).getTime(),
      record.id
    );
    await client.sadd(USERS_KEY, record.userId);
  }

  async function load<T>(
    kind: MemoryKind,
    userId: string,
    now: Date,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ): Promise<T[]> {
    const ids = await client.zrangeAbove(indexKey(userId, kind), now.getTime());
    if (ids.length === 0) {
      return [];
    }
    const values = await client.mget(
      ids.map((id) => recordKey(userId, kind, id))
    );

    const records: T[] = [];
    values.forEach((value, index) => {
      // Value TTL can fire before the index is trimmed
      if (value === null || value === undefined) {
        return;
      }
      const parsed = schema.safeParse(value);
      if (parsed.success) {
        records.push(parsed.data);
      } else {
        logger.warn('Skipping malformed memory record', {
          kind,
          userId,
          id: ids[index],
        });
      }
    });
    return records;
  }

  async function indexedCount(userId: string): Promise<number> {
    return (
      (await client.zcard(indexKey(userId, 'intervention'))) +
      (await client.zcard(indexKey(userId, 'reflection')))
    );
  }

  return {
    async insertIntervention(intervention: Intervention): Promise<void> {
      await insert('intervention', intervention);
    },

    async listInterventions(
      userId: string,
      now: Date
    ): Promise<Intervention[]> {
      return load('intervention', userId, now, interventionRowSchema);
    },

    async insertReflection(reflection: Reflection): Promise<void> {
      await insert('reflection', reflection);
    },

    async listReflections(userId: string, now: Date): Promise<Reflection[]> {
      return load('reflection', userId, now, reflectionRowSchema);
    },

    async purgeExpired(now: Date): Promise<PurgeCounts> {
      const counts: PurgeCounts = { interventions: 0, reflections: 0 };
      const cutoff = now.getTime();

      for (const userId of await client.smembers(USERS_KEY)) {
        counts.interventions += await client.zremUpTo(
          indexKey(userId, 'intervention'),
          cutoff
        );
        counts.reflections += await client.zremUpTo(
          indexKey(userId, 'reflection'),
          cutoff
        );

        if ((await indexedCount(userId)) === 0) {
          await client.srem(USERS_KEY, userId);
          // A write between the check and the removal indexed the user again
          if ((await indexedCount(userId)) > 0) {
            await client.sadd(USERS_KEY, userId);
          }
        }
      }

      return counts;
    },
  };
}
