/**
 * Timing wrapper used to layer observability onto plain operations
 */

import type { Logger } from './logger.js';

export async function withTiming<T>(
  logger: Logger,
  operation: string,
  fn: () => Promise<T>,
  clock: () => number = Date.now
): Promise<T> {
  const startedAt = clock();
  try {
    const result = await fn();
    logger.debug(`${operation} completed`, {
      operation,
      durationMs: clock() - startedAt,
    });
    return result;
  } catch (error) {
    logger.error(`${operation} failed`, {
      operation,
      durationMs: clock() - startedAt,
      error,
    });
    throw error;
  }
}
