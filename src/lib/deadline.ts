/**
 * Deadlines for external calls
 */

import { DeadlineExceededError } from '@/types/index.js';

/**
 * Run `run` with a deadline. On expiry the signal handed to `run` is aborted
 * and the returned promise rejects with DeadlineExceededError, whether or
 * not `run` honours the signal.
 */
export async function withDeadline<T>(
  operation: string,
  timeoutMs: number,
  run: (signal: AbortSignal) => Promise<T>
): Promise<T> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;

  const expired = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new DeadlineExceededError(operation, timeoutMs);
      controller.abort(error);
      reject(error);
    }, timeoutMs);
  });

  try {
    return await Promise.race([run(controller.signal), expired]);
  } finally {
    clearTimeout(timer);
  }
}
