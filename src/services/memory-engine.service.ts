/**
 * MemoryEngine
 * The surface consumed by the session manager and tool-dispatch layer
 *
 * GUARDRAILS:
 * - Personalization is best-effort: nothing here throws or rejects
 * - Store outages read as "no history"; writes are dropped with a warning
 * - Context loading is bounded by a deadline and falls back to an empty bundle
 * - Detached intervention writes are tracked per user so session close can
 *   wait for them, up to a grace period, without cancelling them
 */

import { withDeadline } from '@/lib/deadline.js';
import { withTiming } from '@/lib/instrument.js';
import type { Logger } from '@/lib/logger.js';
import { silentLogger } from '@/lib/logger.js';
import type {
  InterventionInput,
  MemoryStats,
  PersonalizationBundle,
  Reflection,
  Result,
  ScoredIntervention,
  TextGenerator,
  TranscriptTurn,
} from '@/types/index.js';
import {
  DeadlineExceededError,
  SUCCESSFUL_OUTCOMES,
  emptyBundle,
  errorMessage,
  success,
} from '@/types/index.js';

import type { ContextService } from './context.service.js';
import type { EmbeddingService } from './embedding.service.js';
import type { MemoryStore } from './memory-store.service.js';
import type { ReflectionService } from './reflection.service.js';

export const DEFAULT_CONTEXT_TIMEOUT_MS = 2000;
export const DEFAULT_CLOSE_GRACE_MS = 5000;

export interface RecordInterventionInput extends InterventionInput {
  embedding: number[];
}

/**
 * MemoryEngine interface
 */
export interface MemoryEngine {
  /** Store an intervention whose embedding the caller already has */
  recordIntervention(
    userId: string,
    input: RecordInterventionInput
  ): Promise<Result<string>>;

  /**
   * Embed `input.context` and record the intervention in the background.
   * Returns immediately.
   */
  dispatchIntervention(userId: string, input: InterventionInput): void;

  findSimilar(
    userId: string,
    embedding: readonly number[],
    k: number,
    successfulOnly: boolean
  ): Promise<Result<ScoredIntervention[]>>;

  getContext(
    userId: string,
    currentMessage?: string
  ): Promise<PersonalizationBundle>;

  /**
   * Wait for the user's pending writes (bounded), then synthesize a
   * reflection. Null when skipped or failed.
   */
  closeSession(
    userId: string,
    transcript: readonly TranscriptTurn[],
    textGenerator?: TextGenerator
  ): Promise<Reflection | null>;

  getStats(userId: string): Promise<MemoryStats>;

  /** Detached writes still running for a user */
  pendingWrites(userId: string): number;

  /** Wait up to `timeoutMs` for every detached write. True if all settled. */
  drain(timeoutMs: number): Promise<boolean>;
}

export interface MemoryEngineDeps {
  store: MemoryStore;
  embeddingService: EmbeddingService;
  contextService: ContextService;
  reflectionService: ReflectionService;
  contextTimeoutMs?: number;
  closeGraceMs?: number;
  logger?: Logger;
}

/**
 * Create MemoryEngine instance
 */
export function createMemoryEngine(deps: MemoryEngineDeps): MemoryEngine {
  const { store, embeddingService, contextService, reflectionService } = deps;
  const contextTimeoutMs = deps.contextTimeoutMs ?? DEFAULT_CONTEXT_TIMEOUT_MS;
  const closeGraceMs = deps.closeGraceMs ?? DEFAULT_CLOSE_GRACE_MS;
  const logger = deps.logger ?? silentLogger;

  const pending = new Map<string, Set<Promise<void>>>();

  function track(userId: string, work: () => Promise<void>): void {
    const writes = pending.get(userId) ?? new Set<Promise<void>>();
    pending.set(userId, writes);

    const task: Promise<void> = work()
      .catch((error: unknown) => {
        logger.error('Background intervention write crashed', {
          userId,
          error: errorMessage(error),
        });
      })
      .finally(() => {
        writes.delete(task);
        if (writes.size === 0 && pending.get(userId) === writes) {
          pending.delete(userId);
        }
      });
    writes.add(task);
  }

  /**
   * Resolves true if every write settled before the deadline
   */
  async function settle(
    writes: Promise<void>[],
    timeoutMs: number,
    operation: string
  ): Promise<boolean> {
    if (writes.length === 0) {
      return true;
    }
    try {
      await withDeadline(operation, timeoutMs, () =>
        Promise.allSettled(writes)
      );
      return true;
    } catch (error) {
      if (error instanceof DeadlineExceededError) {
        return false;
      }
      throw error;
    }
  }

  async function recordIntervention(
    userId: string,
    input: RecordInterventionInput
  ): Promise<Result<string>> {
    const result = await store.put({
      kind: 'intervention',
      userId,
      interventionText: input.text,
      contextText: input.context,
      taskLabel: input.task,
      outcome: input.outcome,
      embedding: input.embedding,
      ...(input.ttlMs !== undefined ? { ttlMs: input.ttlMs } : {}),
    });
    if (!result.success) {
      logger.warn('Intervention not recorded', {
        userId,
        code: result.error.code,
        reason: result.error.message,
      });
    }
    return result;
  }

  return {
    recordIntervention,

    dispatchIntervention(userId: string, input: InterventionInput): void {
      track(userId, async () => {
        const embedding = await embeddingService.generateEmbedding(
          input.context
        );
        if (!embedding.success) {
          logger.warn('Intervention dropped: embedding failed', {
            userId,
            code: embedding.error.code,
            reason: embedding.error.message,
          });
          return;
        }
        await recordIntervention(userId, {
          ...input,
          embedding: embedding.data,
        });
      });
    },

    async findSimilar(
      userId: string,
      embedding: readonly number[],
      k: number,
      successfulOnly: boolean
    ): Promise<Result<ScoredIntervention[]>> {
      const result = await store.query(
        userId,
        embedding,
        k,
        successfulOnly ? SUCCESSFUL_OUTCOMES : undefined
      );
      if (!result.success && result.error.code === 'STORE_UNAVAILABLE') {
        return success([]);
      }
      return result;
    },

    async getContext(
      userId: string,
      currentMessage?: string
    ): Promise<PersonalizationBundle> {
      try {
        const result = await withDeadline('getContext', contextTimeoutMs, () =>
          contextService.getContext(userId, currentMessage)
        );
        if (result.success) {
          return result.data;
        }
        logger.warn('Context unavailable, using empty bundle', {
          userId,
          code: result.error.code,
          reason: result.error.message,
        });
      } catch (error) {
        logger.warn('Context load failed, using empty bundle', {
          userId,
          error: errorMessage(error),
        });
      }
      return emptyBundle();
    },

    async closeSession(
      userId: string,
      transcript: readonly TranscriptTurn[],
      textGenerator?: TextGenerator
    ): Promise<Reflection | null> {
      try {
        const writes = [...(pending.get(userId) ?? [])];
        const settled = await settle(writes, closeGraceMs, 'closeSession');
        if (!settled) {
          logger.info('Grace period elapsed with writes pending', {
            userId,
            pending: pending.get(userId)?.size ?? 0,
          });
        }

        const result = await reflectionService.synthesize(
          userId,
          transcript,
          textGenerator
        );
        if (!result.success) {
          logger.warn('Reflection skipped', {
            userId,
            code: result.error.code,
            reason: result.error.message,
          });
          return null;
        }
        return result.data;
      } catch (error) {
        logger.error('Session close failed', {
          userId,
          error: errorMessage(error),
        });
        return null;
      }
    },

    async getStats(userId: string): Promise<MemoryStats> {
      const result = await store.stats(userId);
      if (result.success) {
        return result.data;
      }
      logger.warn('Stats unavailable', { userId, code: result.error.code });
      return { userId, interventionCount: 0, reflectionCount: 0 };
    },

    pendingWrites(userId: string): number {
      return pending.get(userId)?.size ?? 0;
    },

    async drain(timeoutMs: number): Promise<boolean> {
      const writes = [...pending.values()].flatMap((set) => [...set]);
      return settle(writes, timeoutMs, 'drain');
    },
  };
}

/**
 * Wrap every engine operation with timing logs. Behaviour is unchanged.
 */
export function instrumentMemoryEngine(
  engine: MemoryEngine,
  logger: Logger
): MemoryEngine {
  return {
    recordIntervention: (userId, input) =>
      withTiming(logger, 'recordIntervention', () =>
        engine.recordIntervention(userId, input)
      ),
    dispatchIntervention: (userId, input) => {
      logger.debug('dispatchIntervention', { userId, outcome: input.outcome });
      engine.dispatchIntervention(userId, input);
    },
    findSimilar: (userId, embedding, k, successfulOnly) =>
      withTiming(logger, 'findSimilar', () =>
        engine.findSimilar(userId, embedding, k, successfulOnly)
      ),
    getContext: (userId, currentMessage) =>
      withTiming(logger, 'getContext', () =>
        engine.getContext(userId, currentMessage)
      ),
    closeSession: (userId, transcript, textGenerator) =>
      withTiming(logger, 'closeSession', () =>
        engine.closeSession(userId, transcript, textGenerator)
      ),
    getStats: (userId) =>
      withTiming(logger, 'getStats', () => engine.getStats(userId)),
    pendingWrites: (userId) => engine.pendingWrites(userId),
    drain: (timeoutMs) =>
      withTiming(logger, 'drain', () => engine.drain(timeoutMs)),
  };
}
