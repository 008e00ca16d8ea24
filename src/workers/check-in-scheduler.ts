/**
 * Check-in Scheduler
 *
 * Timed check-ins for live sessions. Deadlines sit in a min-heap and a
 * single timer is armed for the earliest one, so every scheduled callback
 * fires once its deadline passes unless it is cancelled first.
 *
 * Cancellation is lazy: cancelled entries stay in the heap and are skipped
 * when they reach the top.
 */

import { nanoid } from 'nanoid';

import type { Logger } from '@/lib/logger.js';
import { silentLogger } from '@/lib/logger.js';
import { MinHeap } from '@/lib/min-heap.js';
import { errorMessage } from '@/types/index.js';

/** Longest delay setTimeout honours; longer waits re-arm on wake-up */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

export type CheckInCallback = () => void | Promise<void>;

interface ScheduledCheckIn {
  id: string;
  sessionId: string;
  dueAt: number;
  /** Insertion order, breaks ties between equal deadlines */
  seq: number;
  callback: CheckInCallback;
}

export interface CheckInScheduler {
  /** Returns the check-in id */
  schedule(sessionId: string, delayMs: number, callback: CheckInCallback): string;
  cancel(id: string): boolean;
  /** Cancel every check-in of a session. Returns how many were pending. */
  cancelSession(sessionId: string): number;
  pending(sessionId?: string): number;
  /** Cancel everything and disarm the timer */
  stop(): void;
}

export interface CheckInSchedulerDeps {
  now?: () => number;
  logger?: Logger;
}

/**
 * Create CheckInScheduler instance
 */
export function createCheckInScheduler(
  deps: CheckInSchedulerDeps = {}
): CheckInScheduler {
  const now = deps.now ?? (() => Date.now());
  const logger = deps.logger ?? silentLogger;

  const heap = new MinHeap<ScheduledCheckIn>(
    (a, b) => a.dueAt - b.dueAt || a.seq - b.seq
  );
  const live = new Map<string, ScheduledCheckIn>();
  let seq = 0;
  let timer: ReturnType<typeof setTimeout> | null = null;
  let armedFor: number | null = null;

  function disarm(): void {
    if (timer !== null) {
      clearTimeout(timer);
      timer = null;
      armedFor = null;
    }
  }

  function nextLive(): ScheduledCheckIn | undefined {
    let top = heap.peek();
    while (top !== undefined && !live.has(top.id)) {
      heap.pop();
      top = heap.peek();
    }
    return top;
  }

  function arm(): void {
    const next = nextLive();
    if (next === undefined) {
      disarm();
      return;
    }
    if (timer !== null && armedFor === next.dueAt) {
      return;
    }
    disarm();
    armedFor = next.dueAt;
    const delay = Math.min(Math.max(0, next.dueAt - now()), MAX_TIMER_DELAY_MS);
    timer = setTimeout(fire, delay);
    timer.unref();
  }

  function run(entry: ScheduledCheckIn): void {
    void Promise.resolve()
      .then(entry.callback)
      .catch((error: unknown) => {
        logger.error('Check-in callback failed', {
          sessionId: entry.sessionId,
          checkInId: entry.id,
          error: errorMessage(error),
        });
      });
  }

  function fire(): void {
    timer = null;
    armedFor = null;
    const at = now();

    let next = nextLive();
    while (next !== undefined && next.dueAt <= at) {
      heap.pop();
      live.delete(next.id);
      run(next);
      next = nextLive();
    }

    arm();
  }

  return {
    schedule(
      sessionId: string,
      delayMs: number,
      callback: CheckInCallback
    ): string {
      if (!Number.isFinite(delayMs) || delayMs < 0) {
        throw new RangeError('delayMs must be a non-negative finite number');
      }
      const entry: ScheduledCheckIn = {
        id: nanoid(),
        sessionId,
        dueAt: now() + delayMs,
        seq: seq++,
        callback,
      };
      live.set(entry.id, entry);
      heap.push(entry);
      arm();
      return entry.id;
    },

    cancel(id: string): boolean {
      const removed = live.delete(id);
      if (removed) {
        arm();
      }
      return removed;
    },

    cancelSession(sessionId: string): number {
      let removed = 0;
      for (const [id, entry] of live) {
        if (entry.sessionId === sessionId) {
          live.delete(id);
          removed++;
        }
      }
      if (removed > 0) {
        heap.removeWhere((entry) => entry.sessionId === sessionId);
        arm();
      }
      return removed;
    },

    pending(sessionId?: string): number {
      if (sessionId === undefined) {
        return live.size;
      }
      let count = 0;
      for (const entry of live.values()) {
        if (entry.sessionId === sessionId) {
          count++;
        }
      }
      return count;
    },

    stop(): void {
      disarm();
      live.clear();
      heap.clear();
    },
  };
}
