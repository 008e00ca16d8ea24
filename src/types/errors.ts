/**
 * Memory Engine Errors
 *
 * Thrown by adapters and clients. Services translate them into Result
 * failures carrying the same code.
 */

import type { ErrorCode } from './result.js';

export class MemoryEngineError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'MemoryEngineError';
  }
}

export class EmbeddingError extends MemoryEngineError {
  public readonly retryable: boolean;

  constructor(
    message: string,
    options: { retryable?: boolean; cause?: unknown } = {}
  ) {
    super('EMBEDDING_ERROR', message, { cause: options.cause });
    this.name = 'EmbeddingError';
    this.retryable = options.retryable ?? true;
  }
}

export class GenerationError extends MemoryEngineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('GENERATION_ERROR', message, options);
    this.name = 'GenerationError';
  }
}

export class StoreUnavailableError extends MemoryEngineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('STORE_UNAVAILABLE', message, options);
    this.name = 'StoreUnavailableError';
  }
}

/**
 * An external call ran past its deadline
 */
export class DeadlineExceededError extends MemoryEngineError {
  constructor(
    public readonly operation: string,
    public readonly timeoutMs: number
  ) {
    super('DEADLINE_EXCEEDED', `${operation} exceeded ${timeoutMs}ms deadline`);
    this.name = 'DeadlineExceededError';
  }
}

/**
 * Extract a message from an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
