/**
 * Retention Sweep Worker
 *
 * Periodically deletes expired memories from the backend. Purely storage
 * reclamation: reads already hide expired records, so sweep timing never
 * changes what queries return.
 */

import type { Logger } from '@/lib/logger.js';
import { silentLogger } from '@/lib/logger.js';
import type { MemoryStoreDb } from '@/services/memory-store.service.js';
import type { PurgeCounts, Result } from '@/types/index.js';
import { errorMessage, failure, success } from '@/types/index.js';

export const DEFAULT_SWEEP_INTERVAL_MS = 5 * 60 * 1000;

export interface RetentionSweep {
  start(): void;
  stop(): void;
  /** One pass. Concurrent calls share the pass already in flight. */
  runOnce(): Promise<Result<PurgeCounts>>;
  readonly running: boolean;
}

export interface RetentionSweepDeps {
  db: Pick<MemoryStoreDb, 'purgeExpired'>;
  intervalMs?: number;
  now?: () => Date;
  logger?: Logger;
}

/**
 * Create RetentionSweep instance
 */
export function createRetentionSweep(deps: RetentionSweepDeps): RetentionSweep {
  const { db } = deps;
  const intervalMs = deps.intervalMs ?? DEFAULT_SWEEP_INTERVAL_MS;
  const now = deps.now ?? (() => new Date());
  const logger = deps.logger ?? silentLogger;

  let timer: ReturnType<typeof setInterval> | null = null;
  let inFlight: Promise<Result<PurgeCounts>> | null = null;

  async function sweep(): Promise<Result<PurgeCounts>> {
    try {
      const counts = await db.purgeExpired(now());
      if (counts.interventions > 0 || counts.reflections > 0) {
        logger.info('Purged expired memories', { ...counts });
      }
      return success(counts);
    } catch (error) {
      const message = errorMessage(error);
      logger.error('Retention sweep failed', { error: message });
      return failure('STORE_UNAVAILABLE', `Retention sweep failed: ${message}`);
    }
  }

  function runOnce(): Promise<Result<PurgeCounts>> {
    if (inFlight === null) {
      inFlight = sweep().finally(() => {
        inFlight = null;
      });
    }
    return inFlight;
  }

  return {
    runOnce,

    start(): void {
      if (timer !== null) {
        return;
      }
      timer = setInterval(() => {
        void runOnce();
      }, intervalMs);
      timer.unref();
      logger.debug('Retention sweep started', { intervalMs });
    },

    stop(): void {
      if (timer !== null) {
        clearInterval(timer);
        timer = null;
        logger.debug('Retention sweep stopped');
      }
    },

    get running(): boolean {
      return timer !== null;
    },
  };
}
