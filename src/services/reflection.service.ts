/**
 * ReflectionService
 * End-of-session synthesis of one actionable insight
 *
 * Flow:
 * 1. Skip sessions below the minimum turn count (no generator call)
 * 2. Format the last N turns as `ROLE: content` lines
 * 3. Fetch up to 3 prior insights for continuity
 * 4. Call the text generator exactly once, under a deadline
 * 5. Store the insight with a capped session summary
 *
 * A failed generation skips the reflection for this session. It is never
 * retried.
 */

import { withDeadline } from '@/lib/deadline.js';
import type { Logger } from '@/lib/logger.js';
import { silentLogger } from '@/lib/logger.js';
import { formatTranscript, truncateText } from '@/lib/text.js';
import type {
  Reflection,
  Result,
  TextGenerator,
  TranscriptTurn,
} from '@/types/index.js';
import {
  DeadlineExceededError,
  errorMessage,
  failure,
  success,
} from '@/types/index.js';

import type { ContextService } from './context.service.js';
import { MAX_BUNDLE_REFLECTIONS } from './context.service.js';
import type { MemoryStore } from './memory-store.service.js';
import { createUserIdSchema } from './memory.validators.js';

export const DEFAULT_MAX_TURNS = 20;
export const DEFAULT_MIN_TURNS = 2;
export const DEFAULT_MAX_SUMMARY_CHARS = 500;

const NO_PRIOR_INSIGHTS = 'None yet';

const userIdSchema = createUserIdSchema();

/**
 * ReflectionService interface
 */
export interface ReflectionService {
  /**
   * Returns null when the transcript is too short to reflect on.
   * `textGenerator` overrides the configured generator for this call.
   */
  synthesize(
    userId: string,
    transcript: readonly TranscriptTurn[],
    textGenerator?: TextGenerator
  ): Promise<Result<Reflection | null>>;
}

export interface ReflectionServiceDeps {
  store: MemoryStore;
  contextService: ContextService;
  textGenerator: TextGenerator;
  /** Deadline for the generate call */
  timeoutMs: number;
  maxTurns?: number;
  minTurns?: number;
  maxSummaryChars?: number;
  logger?: Logger;
}

/**
 * Build the single generation request for a session
 */
export function buildReflectionPrompt(
  transcriptText: string,
  priorInsights: readonly string[]
): string {
  const prior =
    priorInsights.length > 0
      ? priorInsights.map((insight) => `- ${insight}`).join('\n')
      : NO_PRIOR_INSIGHTS;

  return `Review this support session with the user.

SESSION TRANSCRIPT:
${transcriptText}

PREVIOUS INSIGHTS ABOUT THIS USER:
${prior}

Write ONE brief insight (1-2 sentences) about what this session taught us.
Consider:
- Which intervention styles worked or did not work
- Preferences or patterns the user showed
- What to do differently next time

Keep it specific and actionable. Reply with the insight only.`;
}

/**
 * Create ReflectionService instance
 */
export function createReflectionService(
  deps: ReflectionServiceDeps
): ReflectionService {
  const { store, contextService, timeoutMs } = deps;
  const maxTurns = deps.maxTurns ?? DEFAULT_MAX_TURNS;
  const minTurns = deps.minTurns ?? DEFAULT_MIN_TURNS;
  const maxSummaryChars = deps.maxSummaryChars ?? DEFAULT_MAX_SUMMARY_CHARS;
  const logger = deps.logger ?? silentLogger;

  async function priorInsights(userId: string): Promise<string[]> {
    const recent = await contextService.getRecentReflections(
      userId,
      MAX_BUNDLE_REFLECTIONS
    );
    if (!recent.success) {
      logger.warn('Prior insights unavailable', {
        userId,
        code: recent.error.code,
      });
      return [];
    }
    return recent.data;
  }

  return {
    async synthesize(
      userId: string,
      transcript: readonly TranscriptTurn[],
      textGenerator?: TextGenerator
    ): Promise<Result<Reflection | null>> {
      // Checked before the generator is called: the call is never retried
      const user = userIdSchema.safeParse(userId);
      if (!user.success) {
        return failure(
          'VALIDATION_ERROR',
          user.error.issues[0]?.message ?? 'Invalid userId',
          { field: 'userId' }
        );
      }

      const turns = transcript.filter((turn) => turn.content.trim() !== '');
      if (turns.length < minTurns) {
        logger.debug('Transcript too short for reflection', {
          userId,
          turns: turns.length,
          minTurns,
        });
        return success(null);
      }

      const transcriptText = formatTranscript(turns.slice(-maxTurns));
      const prompt = buildReflectionPrompt(
        transcriptText,
        await priorInsights(userId)
      );
      const generator = textGenerator ?? deps.textGenerator;

      let insight: string;
      try {
        insight = (
          await withDeadline('generate', timeoutMs, (signal) =>
            generator.generate(prompt, { signal })
          )
        ).trim();
      } catch (error) {
        if (error instanceof DeadlineExceededError) {
          return failure('DEADLINE_EXCEEDED', error.message, {
            operation: error.operation,
            timeoutMs: error.timeoutMs,
          });
        }
        return failure(
          'GENERATION_ERROR',
          `Failed to generate reflection: ${errorMessage(error)}`
        );
      }

      if (insight === '') {
        return failure('GENERATION_ERROR', 'Generated insight was empty');
      }

      return store.putReflection({
        userId,
        insightText: insight,
        sessionSummary: truncateText(transcriptText, maxSummaryChars),
      });
    },
  };
}
