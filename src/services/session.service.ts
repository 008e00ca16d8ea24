/**
 * SessionService
 * Owns the lifecycle of one live conversation
 *
 * A session holds its own transcript and its own check-in timers. Timers
 * go through the shared CheckInScheduler but are always keyed by session,
 * and closing the session cancels them.
 */

import { nanoid } from 'nanoid';

import type { Logger } from '@/lib/logger.js';
import { silentLogger } from '@/lib/logger.js';
import type {
  InterventionInput,
  PersonalizationBundle,
  Reflection,
  TranscriptRole,
  TranscriptTurn,
} from '@/types/index.js';
import { emptyBundle } from '@/types/index.js';
import type { CheckInCallback, CheckInScheduler } from '@/workers/check-in-scheduler.js';

import type { MemoryEngine } from './memory-engine.service.js';

export interface SessionSummary {
  sessionId: string;
  userId: string;
  durationMs: number;
  turnCount: number;
  interventionCount: number;
  pendingCheckIns: number;
  closed: boolean;
}

export interface Session {
  readonly id: string;
  readonly userId: string;
  readonly startedAt: Date;
  /** Bundle loaded at open, replaced by refreshContext */
  readonly context: PersonalizationBundle;
  readonly closed: boolean;

  addTurn(role: TranscriptRole, content: string): void;
  transcript(): readonly TranscriptTurn[];
  /** Reload the bundle with similar successes for `message` */
  refreshContext(message: string): Promise<PersonalizationBundle>;
  /** Detached: embeds and stores in the background */
  recordIntervention(input: InterventionInput): void;
  /** Null once the session is closed */
  scheduleCheckIn(delayMs: number, onDue: CheckInCallback): string | null;
  cancelCheckIn(id: string): boolean;
  /** Since the last fired check-in, or since the session started */
  msSinceLastCheckIn(): number;
  summary(): SessionSummary;
  /** Idempotent. Cancels timers, then synthesizes the reflection. */
  close(): Promise<Reflection | null>;
}

export interface SessionService {
  openSession(userId: string): Promise<Session>;
  activeSessions(): number;
}

export interface SessionServiceDeps {
  engine: MemoryEngine;
  scheduler: CheckInScheduler;
  now?: () => number;
  logger?: Logger;
}

/**
 * Create SessionService instance
 */
export function createSessionService(deps: SessionServiceDeps): SessionService {
  const { engine, scheduler } = deps;
  const now = deps.now ?? (() => Date.now());
  const logger = deps.logger ?? silentLogger;
  const active = new Set<string>();

  return {
    activeSessions(): number {
      return active.size;
    },

    async openSession(userId: string): Promise<Session> {
      const id = nanoid();
      const startedAtMs = now();
      const turns: TranscriptTurn[] = [];
      let context = await engine.getContext(userId);
      let interventionCount = 0;
      let lastCheckInAt = startedAtMs;
      let closing: Promise<Reflection | null> | null = null;

      active.add(id);
      logger.info('Session opened', {
        sessionId: id,
        userId,
        reflections: context.recentReflections.length,
        interventions: context.interventionCount,
      });

      const session: Session = {
        id,
        userId,
        startedAt: new Date(startedAtMs),

        get context(): PersonalizationBundle {
          return context;
        },

        get closed(): boolean {
          return closing !== null;
        },

        addTurn(role: TranscriptRole, content: string): void {
          if (closing !== null) {
            logger.warn('Turn ignored on closed session', { sessionId: id });
            return;
          }
          turns.push({ role, content });
        },

        transcript(): readonly TranscriptTurn[] {
          return [...turns];
        },

        async refreshContext(message: string): Promise<PersonalizationBundle> {
          if (closing !== null) {
            return emptyBundle();
          }
          context = await engine.getContext(userId, message);
          return context;
        },

        recordIntervention(input: InterventionInput): void {
          if (closing !== null) {
            logger.warn('Intervention ignored on closed session', {
              sessionId: id,
            });
            return;
          }
          interventionCount++;
          engine.dispatchIntervention(userId, input);
        },

        scheduleCheckIn(delayMs: number, onDue: CheckInCallback): string | null {
          if (closing !== null) {
            return null;
          }
          return scheduler.schedule(id, delayMs, async () => {
            lastCheckInAt = now();
            await onDue();
          });
        },

        cancelCheckIn(checkInId: string): boolean {
          return scheduler.cancel(checkInId);
        },

        msSinceLastCheckIn(): number {
          return now() - lastCheckInAt;
        },

        summary(): SessionSummary {
          return {
            sessionId: id,
            userId,
            durationMs: now() - startedAtMs,
            turnCount: turns.length,
            interventionCount,
            pendingCheckIns: scheduler.pending(id),
            closed: closing !== null,
          };
        },

        close(): Promise<Reflection | null> {
          if (closing === null) {
            const cancelled = scheduler.cancelSession(id);
            active.delete(id);
            logger.info('Session closing', {
              sessionId: id,
              userId,
              turns: turns.length,
              cancelledCheckIns: cancelled,
            });
            closing = engine.closeSession(userId, [...turns]);
          }
          return closing;
        },
      };

      return session;
    },
  };
}
