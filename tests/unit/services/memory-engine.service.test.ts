/**
 * MemoryEngine Unit Tests
 */

import { describe, it, expect, vi, beforeEach, type Mock } from 'vitest';

import type { ContextService } from '@/services/context.service.js';
import { createContextService } from '@/services/context.service.js';
import type { EmbeddingService } from '@/services/embedding.service.js';
import type { MemoryEngine } from '@/services/memory-engine.service.js';
import {
  createMemoryEngine,
  instrumentMemoryEngine,
} from '@/services/memory-engine.service.js';
import { createInMemoryMemoryStoreDb } from '@/services/memory-store.memory.js';
import type { MemoryStore, MemoryStoreDb } from '@/services/memory-store.service.js';
import { createMemoryStore } from '@/services/memory-store.service.js';
import type { ReflectionService } from '@/services/reflection.service.js';
import { createReflectionService } from '@/services/reflection.service.js';
import { createRetentionManager } from '@/services/retention.service.js';
import type { InterventionInput, Result, TranscriptTurn } from '@/types/index.js';
import { emptyBundle, failure, success } from '@/types/index.js';
import { deferred } from '../../helpers/test-utils.js';
import {
  createMockLogger,
  createMockTextGenerator,
  type MockLogger,
  type MockTextGenerator,
} from '../../mocks/index.js';

const INPUT: InterventionInput = {
  text: 'Set a timer for five minutes',
  context: 'User stalled on the quarterly report',
  task: 'quarterly report',
  outcome: 'task_completed',
};

const TRANSCRIPT: TranscriptTurn[] = [
  { role: 'user', content: 'I cannot get started' },
  { role: 'assistant', content: 'Try one five minute sprint' },
];

interface Harness {
  engine: MemoryEngine;
  store: MemoryStore;
  embeddingService: EmbeddingService & {
    generateEmbedding: Mock<EmbeddingService['generateEmbedding']>;
  };
  generator: MockTextGenerator;
  logger: MockLogger;
}

function createHarness(
  options: {
    db?: MemoryStoreDb;
    contextService?: ContextService;
    reflectionService?: ReflectionService;
    contextTimeoutMs?: number;
    closeGraceMs?: number;
  } = {}
): Harness {
  const logger = createMockLogger();
  const store = createMemoryStore({
    db: options.db ?? createInMemoryMemoryStoreDb(),
    retention: createRetentionManager(),
    dimensions: 3,
    maxSummaryChars: 500,
  });
  const embeddingService = {
    dimensions: 3,
    generateEmbedding: vi
      .fn<EmbeddingService['generateEmbedding']>()
      .mockResolvedValue(success([1, 0, 0])),
  };
  const generator = createMockTextGenerator('Short sprints help this user start.');
  const contextService =
    options.contextService ?? createContextService({ store, embeddingService });
  const reflectionService =
    options.reflectionService ??
    createReflectionService({
      store,
      contextService,
      textGenerator: generator,
      timeoutMs: 1000,
    });

  const engine = createMemoryEngine({
    store,
    embeddingService,
    contextService,
    reflectionService,
    ...(options.contextTimeoutMs !== undefined
      ? { contextTimeoutMs: options.contextTimeoutMs }
      : {}),
    ...(options.closeGraceMs !== undefined ? { closeGraceMs: options.closeGraceMs } : {}),
    logger,
  });

  return { engine, store, embeddingService, generator, logger };
}

describe('MemoryEngine', () => {
  let h: Harness;

  beforeEach(() => {
    h = createHarness();
  });

  describe('recordIntervention()', () => {
    it('should store the intervention and return its id', async () => {
      const result = await h.engine.recordIntervention('alice', {
        ...INPUT,
        embedding: [1, 0, 0],
      });

      expect(result.success).toBe(true);
      const similar = await h.engine.findSimilar('alice', [1, 0, 0], 1, false);
      expect(similar.success && similar.data[0]?.intervention.id).toBe(
        result.success ? result.data : undefined
      );
    });

    it('should reject an unknown outcome and log it', async () => {
      const result = await h.engine.recordIntervention('alice', {
        ...INPUT,
        outcome: 'victory',
        embedding: [1, 0, 0],
      });

      expect(result.success).toBe(false);
      expect(h.logger.warn).toHaveBeenCalledWith('Intervention not recorded', {
        userId: 'alice',
        code: 'VALIDATION_ERROR',
        reason:
          'Unknown outcome (expected one of task_started, task_progress, task_completed, re_engaged, distracted, abandoned, unknown)',
      });
    });
  });

  describe('dispatchIntervention()', () => {
    it('should embed the context and write in the background', async () => {
      h.engine.dispatchIntervention('alice', INPUT);

      expect(h.engine.pendingWrites('alice')).toBe(1);
      expect(await h.engine.drain(1000)).toBe(true);
      expect(h.engine.pendingWrites('alice')).toBe(0);
      expect(h.embeddingService.generateEmbedding).toHaveBeenCalledWith(INPUT.context);
      expect(await h.store.count('alice')).toEqual({ success: true, data: 1 });
    });

    it('should drop the write when embedding fails', async () => {
      h.embeddingService.generateEmbedding.mockResolvedValue(
        failure('EMBEDDING_ERROR', 'Failed to generate embedding: down')
      );

      h.engine.dispatchIntervention('alice', INPUT);
      await h.engine.drain(1000);

      expect(await h.store.count('alice')).toEqual({ success: true, data: 0 });
      expect(h.logger.warn).toHaveBeenCalledWith(
        'Intervention dropped: embedding failed',
        {
          userId: 'alice',
          code: 'EMBEDDING_ERROR',
          reason: 'Failed to generate embedding: down',
        }
      );
    });

    it('should track writes per user', () => {
      const gate = deferred<Result<number[]>>();
      h.embeddingService.generateEmbedding.mockReturnValue(gate.promise);

      h.engine.dispatchIntervention('alice', INPUT);
      h.engine.dispatchIntervention('alice', INPUT);
      h.engine.dispatchIntervention('bob', INPUT);

      expect(h.engine.pendingWrites('alice')).toBe(2);
      expect(h.engine.pendingWrites('bob')).toBe(1);
      expect(h.engine.pendingWrites('carol')).toBe(0);
      gate.resolve(success([1, 0, 0]));
    });
  });

  describe('findSimilar()', () => {
    it('should restrict to successful outcomes on request', async () => {
      await h.engine.recordIntervention('alice', {
        ...INPUT,
        outcome: 'abandoned',
        embedding: [1, 0, 0],
      });
      await h.engine.recordIntervention('alice', {
        ...INPUT,
        outcome: 're_engaged',
        embedding: [0, 1, 0],
      });

      const all = await h.engine.findSimilar('alice', [1, 0, 0], 5, false);
      const wins = await h.engine.findSimilar('alice', [1, 0, 0], 5, true);

      expect(all.success && all.data.map((m) => m.intervention.outcome)).toEqual([
        'abandoned',
        're_engaged',
      ]);
      expect(wins.success && wins.data.map((m) => m.intervention.outcome)).toEqual([
        're_engaged',
      ]);
    });

    it('should read an unavailable store as no history', async () => {
      const down = new Error('timeout');
      const harness = createHarness({
        db: {
          insertIntervention: vi.fn().mockRejectedValue(down),
          listInterventions: vi.fn().mockRejectedValue(down),
          insertReflection: vi.fn().mockRejectedValue(down),
          listReflections: vi.fn().mockRejectedValue(down),
          purgeExpired: vi.fn().mockRejectedValue(down),
        },
      });

      expect(await harness.engine.findSimilar('alice', [1, 0, 0], 3, true)).toEqual({
        success: true,
        data: [],
      });
    });

    it('should still surface validation failures', async () => {
      const result = await h.engine.findSimilar('alice', [1, 0], 3, true);

      expect(result).toMatchObject({
        success: false,
        error: { code: 'VALIDATION_ERROR' },
      });
    });
  });

  describe('getContext()', () => {
    it('should return the assembled bundle', async () => {
      await h.store.putReflection({
        userId: 'alice',
        insightText: 'Likes short sprints',
        sessionSummary: '',
      });

      expect(await h.engine.getContext('alice')).toEqual({
        recentReflections: ['Likes short sprints'],
        interventionCount: 0,
        similarSuccesses: [],
      });
    });

    it('should fall back to an empty bundle on failure', async () => {
      expect(await h.engine.getContext('not valid')).toEqual(emptyBundle());
      expect(h.logger.warn).toHaveBeenCalledWith(
        'Context unavailable, using empty bundle',
        expect.objectContaining({ code: 'VALIDATION_ERROR' })
      );
    });

    it('should fall back to an empty bundle when assembly is too slow', async () => {
      vi.useFakeTimers();
      const slow: ContextService = {
        getContext: () => new Promise(() => undefined),
        getRecentReflections: async () => success([]),
      };
      const harness = createHarness({ contextService: slow, contextTimeoutMs: 50 });

      const pending = harness.engine.getContext('alice', 'a long enough message');
      await vi.advanceTimersByTimeAsync(50);

      expect(await pending).toEqual(emptyBundle());
      expect(harness.logger.warn).toHaveBeenCalledWith(
        'Context load failed, using empty bundle',
        { userId: 'alice', error: 'getContext exceeded 50ms deadline' }
      );
    });
  });

  describe('closeSession()', () => {
    it('should wait for pending writes before reflecting', async () => {
      const gate = deferred<Result<number[]>>();
      h.embeddingService.generateEmbedding.mockReturnValueOnce(gate.promise);
      h.engine.dispatchIntervention('alice', INPUT);

      const closing = h.engine.closeSession('alice', TRANSCRIPT);
      gate.resolve(success([1, 0, 0]));
      const reflection = await closing;

      expect(reflection?.insightText).toBe('Short sprints help this user start.');
      expect(h.engine.pendingWrites('alice')).toBe(0);
      expect(await h.store.count('alice')).toEqual({ success: true, data: 1 });
    });

    it('should reflect anyway once the grace period runs out', async () => {
      vi.useFakeTimers();
      const harness = createHarness({ closeGraceMs: 50 });
      harness.embeddingService.generateEmbedding.mockReturnValue(
        new Promise(() => undefined)
      );
      harness.engine.dispatchIntervention('alice', INPUT);

      const closing = harness.engine.closeSession('alice', TRANSCRIPT);
      await vi.advanceTimersByTimeAsync(50);
      const reflection = await closing;

      expect(reflection).not.toBeNull();
      expect(harness.engine.pendingWrites('alice')).toBe(1);
      expect(harness.logger.info).toHaveBeenCalledWith(
        'Grace period elapsed with writes pending',
        { userId: 'alice', pending: 1 }
      );
    });

    it('should return null for a short transcript', async () => {
      expect(await h.engine.closeSession('alice', TRANSCRIPT.slice(0, 1))).toBeNull();
      expect(h.generator.generate).not.toHaveBeenCalled();
    });

    it('should return null when synthesis fails', async () => {
      h.generator.generate.mockRejectedValue(new Error('model overloaded'));

      expect(await h.engine.closeSession('alice', TRANSCRIPT)).toBeNull();
      expect(h.logger.warn).toHaveBeenCalledWith('Reflection skipped', {
        userId: 'alice',
        code: 'GENERATION_ERROR',
        reason: 'Failed to generate reflection: model overloaded',
      });
    });

    it('should return null when the reflection service throws', async () => {
      const broken: ReflectionService = {
        synthesize: () => Promise.reject(new Error('unexpected')),
      };
      const harness = createHarness({ reflectionService: broken });

      expect(await harness.engine.closeSession('alice', TRANSCRIPT)).toBeNull();
      expect(harness.logger.error).toHaveBeenCalledWith('Session close failed', {
        userId: 'alice',
        error: 'unexpected',
      });
    });

    it('should pass a per-call generator through', async () => {
      const override = createMockTextGenerator('Prefers evening check-ins.');

      const reflection = await h.engine.closeSession('alice', TRANSCRIPT, override);

      expect(reflection?.insightText).toBe('Prefers evening check-ins.');
      expect(h.generator.generate).not.toHaveBeenCalled();
    });
  });

  describe('getStats()', () => {
    it('should count live records', async () => {
      await h.engine.recordIntervention('alice', { ...INPUT, embedding: [1, 0, 0] });

      expect(await h.engine.getStats('alice')).toEqual({
        userId: 'alice',
        interventionCount: 1,
        reflectionCount: 0,
      });
    });

    it('should report zeros when stats are unavailable', async () => {
      expect(await h.engine.getStats('not valid')).toEqual({
        userId: 'not valid',
        interventionCount: 0,
        reflectionCount: 0,
      });
    });
  });

  describe('drain()', () => {
    it('should report writes still running past the timeout', async () => {
      vi.useFakeTimers();
      h.embeddingService.generateEmbedding.mockReturnValue(new Promise(() => undefined));
      h.engine.dispatchIntervention('alice', INPUT);

      const draining = h.engine.drain(100);
      await vi.advanceTimersByTimeAsync(100);

      expect(await draining).toBe(false);
    });

    it('should resolve true with nothing pending', async () => {
      expect(await h.engine.drain(100)).toBe(true);
    });
  });
});

describe('instrumentMemoryEngine', () => {
  it('should time each operation at debug level', async () => {
    const { engine } = createHarness();
    const timing = createMockLogger();
    const instrumented = instrumentMemoryEngine(engine, timing);

    const stats = await instrumented.getStats('alice');

    expect(stats.interventionCount).toBe(0);
    expect(timing.debug).toHaveBeenCalledWith('getStats completed', {
      operation: 'getStats',
      durationMs: expect.any(Number),
    });
  });

  it('should log and rethrow failures', async () => {
    const { engine } = createHarness();
    const timing = createMockLogger();
    const broken: MemoryEngine = {
      ...engine,
      getStats: () => Promise.reject(new Error('boom')),
    };

    await expect(instrumentMemoryEngine(broken, timing).getStats('alice')).rejects.toThrow(
      'boom'
    );
    expect(timing.error).toHaveBeenCalledWith(
      'getStats failed',
      expect.objectContaining({ operation: 'getStats' })
    );
  });

  it('should forward synchronous calls', () => {
    const { engine } = createHarness();
    const timing = createMockLogger();

    instrumentMemoryEngine(engine, timing).dispatchIntervention('alice', INPUT);

    expect(engine.pendingWrites('alice')).toBe(1);
    expect(timing.debug).toHaveBeenCalledWith('dispatchIntervention', {
      userId: 'alice',
      outcome: 'task_completed',
    });
  });
});
