/**
 * MemoryStore Implementation
 *
 * SCOPE: Per-user append-only storage of interventions and reflections,
 * plus exact cosine-similarity search over one user's interventions.
 * NOT IN SCOPE: Embedding generation, physical cleanup (see RetentionSweep)
 *
 * GUARDRAILS:
 * - Every write is validated; nothing is partially written
 * - Reads never cross user namespaces
 * - Expired records are filtered on every read, before ranking or counting
 * - Backend failures surface as STORE_UNAVAILABLE
 */

import { nanoid } from 'nanoid';

import { cosineSimilarity } from '@/lib/similarity.js';
import type { Logger } from '@/lib/logger.js';
import { silentLogger } from '@/lib/logger.js';
import type {
  Failure,
  Intervention,
  MemoryStats,
  NewIntervention,
  NewMemoryRecord,
  NewReflection,
  Outcome,
  PurgeCounts,
  Reflection,
  Result,
  ScoredIntervention,
} from '@/types/index.js';
import { errorMessage, failure, success } from '@/types/index.js';

import type { MemoryValidators } from './memory.validators.js';
import { createMemoryValidators } from './memory.validators.js';
import type { RetentionManager } from './retention.service.js';

/**
 * Storage backend abstraction for MemoryStore.
 *
 * List methods may drop records already expired at `now`, but the store
 * filters again regardless.
 */
export interface MemoryStoreDb {
  insertIntervention: (intervention: Intervention) => Promise<void>;
  listInterventions: (userId: string, now: Date) => Promise<Intervention[]>;
  insertReflection: (reflection: Reflection) => Promise<void>;
  listReflections: (userId: string, now: Date) => Promise<Reflection[]>;
  /** Physically remove every record expired at `now` */
  purgeExpired: (now: Date) => Promise<PurgeCounts>;
}

/**
 * MemoryStore interface
 */
export interface MemoryStore {
  /** Validate and write a record. Returns the new id. */
  put(record: NewMemoryRecord): Promise<Result<string>>;
  putIntervention(
    record: Omit<NewIntervention, 'kind'>
  ): Promise<Result<Intervention>>;
  putReflection(
    record: Omit<NewReflection, 'kind'>
  ): Promise<Result<Reflection>>;
  /**
   * Top `k` live interventions by cosine similarity, ties broken by
   * recency. `outcomeFilter` restricts the candidate set.
   */
  query(
    userId: string,
    queryEmbedding: readonly number[],
    k: number,
    outcomeFilter?: readonly Outcome[]
  ): Promise<Result<ScoredIntervention[]>>;
  /** Live interventions for a user */
  count(userId: string): Promise<Result<number>>;
  /** Live reflections, most recent first */
  listReflections(userId: string, limit: number): Promise<Result<Reflection[]>>;
  stats(userId: string): Promise<Result<MemoryStats>>;
}

export interface MemoryStoreDeps {
  db: MemoryStoreDb;
  retention: RetentionManager;
  dimensions: number;
  maxSummaryChars: number;
  now?: () => Date;
  generateId?: () => string;
  logger?: Logger;
}

// ─────────────────────────────────────────────────────────────
// HELPER FUNCTIONS
// ─────────────────────────────────────────────────────────────

function byRecency<T extends { createdAt: Date }>(a: T, b: T): number {
  return b.createdAt.getTime() - a.createdAt.getTime();
}

function compareScored(a: ScoredIntervention, b: ScoredIntervention): number {
  if (b.similarity !== a.similarity) {
    return b.similarity - a.similarity;
  }
  return byRecency(a.intervention, b.intervention);
}

/**
 * Most recent first. Equal timestamps keep the later-listed record first.
 */
function newestFirst<T extends { createdAt: Date }>(records: readonly T[]): T[] {
  return [...records].reverse().sort(byRecency);
}

// ─────────────────────────────────────────────────────────────
// SERVICE IMPLEMENTATION
// ─────────────────────────────────────────────────────────────

/**
 * Create MemoryStore instance
 */
export function createMemoryStore(deps: MemoryStoreDeps): MemoryStore {
  const { db, retention } = deps;
  const now = deps.now ?? (() => new Date());
  const generateId = deps.generateId ?? (() => nanoid());
  const logger = deps.logger ?? silentLogger;
  const validators: MemoryValidators = createMemoryValidators({
    dimensions: deps.dimensions,
    maxSummaryChars: deps.maxSummaryChars,
  });

  function unavailable(operation: string, error: unknown): Failure {
    const message = errorMessage(error);
    logger.warn('Memory store operation failed', { operation, error: message });
    return failure('STORE_UNAVAILABLE', `Failed to ${operation}: ${message}`);
  }

  async function liveInterventions(
    userId: string
  ): Promise<Intervention[]> {
    const at = now();
    return retention.filterLive(await db.listInterventions(userId, at), at);
  }

  async function liveReflections(userId: string): Promise<Reflection[]> {
    const at = now();
    return retention.filterLive(await db.listReflections(userId, at), at);
  }

  async function putIntervention(
    record: Omit<NewIntervention, 'kind'>
  ): Promise<Result<Intervention>> {
    const validated = validators.record({ ...record, kind: 'intervention' });
    if (!validated.success) {
      return validated;
    }
    const valid = validated.data;
    if (valid.kind !== 'intervention') {
      return failure('INTERNAL_ERROR', 'Unexpected record kind');
    }

    const intervention: Intervention = {
      id: generateId(),
      userId: valid.userId,
      interventionText: valid.interventionText,
      contextText: valid.contextText,
      taskLabel: valid.taskLabel,
      outcome: valid.outcome,
      embedding: valid.embedding,
      createdAt: now(),
      ttlMs: valid.ttlMs ?? retention.ttlFor('intervention'),
    };

    try {
      await db.insertIntervention(intervention);
    } catch (error) {
      return unavailable('store intervention', error);
    }
    return success(intervention);
  }

  async function putReflection(
    record: Omit<NewReflection, 'kind'>
  ): Promise<Result<Reflection>> {
    const validated = validators.record({ ...record, kind: 'reflection' });
    if (!validated.success) {
      return validated;
    }
    const valid = validated.data;
    if (valid.kind !== 'reflection') {
      return failure('INTERNAL_ERROR', 'Unexpected record kind');
    }

    const reflection: Reflection = {
      id: generateId(),
      userId: valid.userId,
      insightText: valid.insightText,
      sessionSummary: valid.sessionSummary,
      createdAt: now(),
      ttlMs: valid.ttlMs ?? retention.ttlFor('reflection'),
    };

    try {
      await db.insertReflection(reflection);
    } catch (error) {
      return unavailable('store reflection', error);
    }
    return success(reflection);
  }

  return {
    putIntervention,
    putReflection,

    async put(record: NewMemoryRecord): Promise<Result<string>> {
      const { kind, ...fields } = record;
      const result =
        record.kind === 'intervention'
          ? await putIntervention(record)
          : await putReflection(record);
      if (!result.success) {
        logger.debug('Rejected memory write', {
          kind,
          userId: fields.userId,
          code: result.error.code,
        });
        return result;
      }
      return success(result.data.id);
    },

    async query(
      userId: string,
      queryEmbedding: readonly number[],
      k: number,
      outcomeFilter?: readonly Outcome[]
    ): Promise<Result<ScoredIntervention[]>> {
      const user = validators.userId(userId);
      if (!user.success) {
        return user;
      }
      const embedding = validators.embedding(queryEmbedding);
      if (!embedding.success) {
        return embedding;
      }
      if (!Number.isInteger(k) || k < 1) {
        return failure('VALIDATION_ERROR', 'k must be a positive integer', {
          field: 'k',
        });
      }

      let candidates: Intervention[];
      try {
        candidates = await liveInterventions(userId);
      } catch (error) {
        return unavailable('query interventions', error);
      }

      const allowed =
        outcomeFilter !== undefined ? new Set<Outcome>(outcomeFilter) : null;

      const scored: ScoredIntervention[] = [];
      for (const intervention of candidates) {
        if (allowed !== null && !allowed.has(intervention.outcome)) {
          continue;
        }
        scored.push({
          intervention,
          similarity: cosineSimilarity(embedding.data, intervention.embedding),
        });
      }

      return success(scored.sort(compareScored).slice(0, k));
    },

    async count(userId: string): Promise<Result<number>> {
      const user = validators.userId(userId);
      if (!user.success) {
        return user;
      }
      try {
        const live = await liveInterventions(userId);
        return success(live.length);
      } catch (error) {
        return unavailable('count interventions', error);
      }
    },

    async listReflections(
      userId: string,
      limit: number
    ): Promise<Result<Reflection[]>> {
      const user = validators.userId(userId);
      if (!user.success) {
        return user;
      }
      if (!Number.isInteger(limit) || limit < 0) {
        return failure(
          'VALIDATION_ERROR',
          'limit must be a non-negative integer',
          { field: 'limit' }
        );
      }
      try {
        const live = await liveReflections(userId);
        return success(newestFirst(live).slice(0, limit));
      } catch (error) {
        return unavailable('list reflections', error);
      }
    },

    async stats(userId: string): Promise<Result<MemoryStats>> {
      const user = validators.userId(userId);
      if (!user.success) {
        return user;
      }
      try {
        const [interventions, reflections] = await Promise.all([
          liveInterventions(userId),
          liveReflections(userId),
        ]);
        return success({
          userId,
          interventionCount: interventions.length,
          reflectionCount: reflections.length,
        });
      } catch (error) {
        return unavailable('read stats', error);
      }
    },
  };
}
