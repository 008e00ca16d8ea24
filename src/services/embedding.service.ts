/**
 * EmbeddingService Implementation
 *
 * SCOPE: Turn text into fixed-dimension vectors through an EmbeddingProvider
 * Uses OpenAI-compatible embeddings (text-embedding-3-small via OpenRouter)
 *
 * GUARDRAILS:
 * - Validates input text is not empty
 * - Every provider call carries a deadline
 * - Transient failures retry with jittered exponential backoff (bounded)
 * - Vectors of the wrong dimension are rejected, never padded or cut
 */

import { APIError } from 'openai';
import type {
  CreateEmbeddingResponse,
  EmbeddingCreateParams,
} from 'openai/resources/embeddings';

import { withDeadline } from '@/lib/deadline.js';
import type { Logger } from '@/lib/logger.js';
import { silentLogger } from '@/lib/logger.js';
import type { RetryOptions } from '@/lib/retry.js';
import { DEFAULT_RETRY_OPTIONS, withRetry } from '@/lib/retry.js';
import type {
  CallOptions,
  EmbeddingConfig,
  EmbeddingProvider,
  Result,
} from '@/types/index.js';
import {
  DEFAULT_EMBEDDING_CONFIG,
  DeadlineExceededError,
  EmbeddingError,
  errorMessage,
  failure,
  success,
} from '@/types/index.js';

/**
 * EmbeddingService interface
 */
export interface EmbeddingService {
  /** Embed a single text */
  generateEmbedding(text: string): Promise<Result<number[]>>;
  readonly dimensions: number;
}

export interface EmbeddingServiceDeps {
  provider: EmbeddingProvider;
  dimensions: number;
  /** Deadline for each provider call */
  timeoutMs: number;
  retry?: Partial<RetryOptions>;
  logger?: Logger;
}

function isRetryable(error: unknown): boolean {
  if (error instanceof EmbeddingError) {
    return error.retryable;
  }
  return true;
}

/**
 * Create EmbeddingService instance
 */
export function createEmbeddingService(
  deps: EmbeddingServiceDeps
): EmbeddingService {
  const { provider, dimensions, timeoutMs } = deps;
  const logger = deps.logger ?? silentLogger;
  const retry: RetryOptions = {
    ...DEFAULT_RETRY_OPTIONS,
    ...deps.retry,
    shouldRetry: isRetryable,
    onRetry: (error, attempt, delayMs) => {
      logger.warn('Embedding attempt failed, retrying', {
        attempt,
        delayMs,
        error: errorMessage(error),
      });
    },
  };

  async function embedOnce(text: string): Promise<number[]> {
    const embedding = await withDeadline('embed', timeoutMs, (signal) =>
      provider.embed(text, { signal })
    );
    if (embedding.length !== dimensions) {
      throw new EmbeddingError(
        `Embedding dimension mismatch: expected ${dimensions}, got ${embedding.length}`,
        { retryable: false }
      );
    }
    return embedding;
  }

  return {
    dimensions,

    async generateEmbedding(text: string): Promise<Result<number[]>> {
      const trimmed = text.trim();
      if (!trimmed) {
        return failure('VALIDATION_ERROR', 'Text cannot be empty', {
          field: 'text',
        });
      }

      try {
        const embedding = await withRetry(() => embedOnce(trimmed), retry);
        return success(embedding);
      } catch (error) {
        if (error instanceof DeadlineExceededError) {
          return failure('DEADLINE_EXCEEDED', error.message, {
            operation: error.operation,
            timeoutMs: error.timeoutMs,
          });
        }
        return failure(
          'EMBEDDING_ERROR',
          `Failed to generate embedding: ${errorMessage(error)}`
        );
      }
    },
  };
}

// ─────────────────────────────────────────────────────────────
// OPENAI PROVIDER
// ─────────────────────────────────────────────────────────────

/**
 * The part of the OpenAI client used for embeddings
 */
export interface EmbeddingsClient {
  embeddings: {
    create(
      body: EmbeddingCreateParams,
      options?: { signal?: AbortSignal; maxRetries?: number }
    ): Promise<CreateEmbeddingResponse>;
  };
}

/**
 * Rate limits, server errors and connection failures are worth retrying
 */
export function isTransientApiError(error: unknown): boolean {
  if (error instanceof APIError) {
    const status = error.status;
    return (
      status === undefined || status === 408 || status === 429 || status >= 500
    );
  }
  return true;
}

/**
 * Create an EmbeddingProvider backed by an OpenAI-compatible API
 */
export function createOpenAIEmbeddingProvider(
  client: EmbeddingsClient,
  config: EmbeddingConfig = DEFAULT_EMBEDDING_CONFIG
): EmbeddingProvider {
  return {
    async embed(text: string, options?: CallOptions): Promise<number[]> {
      let response: CreateEmbeddingResponse;
      try {
        response = await client.embeddings.create(
          {
            model: config.model,
            input: text,
            dimensions: config.dimensions,
          },
          { signal: options?.signal, maxRetries: 0 }
        );
      } catch (error) {
        throw new EmbeddingError(`Embedding API error: ${errorMessage(error)}`, {
          retryable: isTransientApiError(error),
          cause: error,
        });
      }

      const first = response.data[0];
      if (!first) {
        throw new EmbeddingError('No embedding returned from API', {
          retryable: false,
        });
      }
      return first.embedding;
    },
  };
}
