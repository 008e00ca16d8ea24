/**
 * ContextService
 * Assembles the personalization bundle handed to a session
 *
 * SCOPE: Read-only view over a user's memories
 *
 * Owns: Nothing (reads through MemoryStore)
 *
 * Dependencies:
 * - MemoryStore (reflections, counts, similarity queries)
 * - EmbeddingService (only when a current message is supplied)
 *
 * ORDERING:
 * - recentReflections: most recent first, at most 3
 * - similarSuccesses: highest similarity first, at most 3, successful
 *   outcomes only, below-threshold matches dropped entirely
 */

import type { Logger } from '@/lib/logger.js';
import { silentLogger } from '@/lib/logger.js';
import type {
  PersonalizationBundle,
  Result,
  SimilarSuccess,
} from '@/types/index.js';
import { SUCCESSFUL_OUTCOMES, failure, success } from '@/types/index.js';

import type { EmbeddingService } from './embedding.service.js';
import type { MemoryStore } from './memory-store.service.js';

export const DEFAULT_SIMILARITY_THRESHOLD = 0.7;
export const MAX_BUNDLE_REFLECTIONS = 3;
export const MAX_BUNDLE_SUCCESSES = 3;

/**
 * ContextService interface
 */
export interface ContextService {
  getContext(
    userId: string,
    currentMessage?: string
  ): Promise<Result<PersonalizationBundle>>;

  /** Insight texts, most recent first */
  getRecentReflections(userId: string, limit: number): Promise<Result<string[]>>;
}

export interface ContextServiceDeps {
  store: MemoryStore;
  embeddingService: EmbeddingService;
  similarityThreshold?: number;
  /** Messages shorter than this (after trimming) skip the similarity lookup */
  minQueryLength?: number;
  logger?: Logger;
}

/**
 * Create ContextService instance
 */
export function createContextService(deps: ContextServiceDeps): ContextService {
  const { store, embeddingService } = deps;
  const threshold = deps.similarityThreshold ?? DEFAULT_SIMILARITY_THRESHOLD;
  const minQueryLength = deps.minQueryLength ?? 10;
  const logger = deps.logger ?? silentLogger;

  async function getRecentReflections(
    userId: string,
    limit: number
  ): Promise<Result<string[]>> {
    const reflections = await store.listReflections(userId, limit);
    if (!reflections.success) {
      return reflections;
    }
    return success(reflections.data.map((r) => r.insightText));
  }

  async function findSimilarSuccesses(
    userId: string,
    message: string
  ): Promise<Result<SimilarSuccess[]>> {
    const embedding = await embeddingService.generateEmbedding(message);
    if (!embedding.success) {
      return failure(embedding.error.code, embedding.error.message, {
        ...embedding.error.details,
        stage: 'embed current message',
      });
    }

    const matches = await store.query(
      userId,
      embedding.data,
      MAX_BUNDLE_SUCCESSES,
      SUCCESSFUL_OUTCOMES
    );
    if (!matches.success) {
      return matches;
    }

    const kept = matches.data.filter((m) => m.similarity >= threshold);
    if (kept.length < matches.data.length) {
      logger.debug('Dropped below-threshold matches', {
        userId,
        dropped: matches.data.length - kept.length,
        threshold,
      });
    }

    return success(
      kept.map((m) => ({
        interventionText: m.intervention.interventionText,
        contextText: m.intervention.contextText,
        similarity: m.similarity,
      }))
    );
  }

  return {
    getRecentReflections,

    async getContext(
      userId: string,
      currentMessage?: string
    ): Promise<Result<PersonalizationBundle>> {
      const reflections = await getRecentReflections(
        userId,
        MAX_BUNDLE_REFLECTIONS
      );
      if (!reflections.success) {
        return reflections;
      }

      const count = await store.count(userId);
      if (!count.success) {
        return count;
      }

      const bundle: PersonalizationBundle = {
        recentReflections: reflections.data,
        interventionCount: count.data,
        similarSuccesses: [],
      };

      const message = currentMessage?.trim() ?? '';
      if (message.length === 0 || message.length < minQueryLength) {
        return success(bundle);
      }

      const similar = await findSimilarSuccesses(userId, message);
      if (!similar.success) {
        return similar;
      }
      bundle.similarSuccesses = similar.data;

      return success(bundle);
    },
  };
}
