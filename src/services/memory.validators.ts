/**
 * Memory record validation
 *
 * Schemas are built per deployment because the embedding dimension is a
 * runtime setting.
 */

import { z } from 'zod';

import type { NewMemoryRecord, Result } from '@/types/index.js';
import { OUTCOMES, failure, success } from '@/types/index.js';

export const MAX_USER_ID_LENGTH = 100;
export const MAX_INTERVENTION_TEXT_LENGTH = 1000;
export const MAX_CONTEXT_TEXT_LENGTH = 2000;
export const MAX_TASK_LABEL_LENGTH = 200;

/** Characters that would break storage keys */
const INVALID_USER_ID_CHARS = /[*?[\]:\s]/;

function notBlank(value: string): boolean {
  return value.trim().length > 0;
}

export interface ValidatorLimits {
  dimensions: number;
  maxSummaryChars: number;
}

export function createUserIdSchema() {
  return z
    .string()
    .min(1, 'userId cannot be empty')
    .max(
      MAX_USER_ID_LENGTH,
      `userId too long (max ${MAX_USER_ID_LENGTH} chars)`
    )
    .refine(
      (value) => !INVALID_USER_ID_CHARS.test(value),
      'userId contains an invalid character'
    );
}

export function createEmbeddingSchema(dimensions: number) {
  return z
    .array(
      z
        .number({ invalid_type_error: 'Embedding values must be numbers' })
        .finite('Embedding values must be finite')
    )
    .superRefine((embedding, ctx) => {
      if (embedding.length !== dimensions) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Embedding dimension mismatch: expected ${dimensions}, got ${embedding.length}`,
        });
      }
    });
}

const ttlSchema = z.number().int().positive('ttlMs must be positive').optional();

export function createMemoryRecordSchema(limits: ValidatorLimits) {
  const userId = createUserIdSchema();

  return z.discriminatedUnion('kind', [
    z.object({
      kind: z.literal('intervention'),
      userId,
      interventionText: z
        .string()
        .max(MAX_INTERVENTION_TEXT_LENGTH, `interventionText too long (max ${MAX_INTERVENTION_TEXT_LENGTH} chars)`)
        .refine(notBlank, 'interventionText cannot be empty'),
      contextText: z
        .string()
        .max(MAX_CONTEXT_TEXT_LENGTH, `contextText too long (max ${MAX_CONTEXT_TEXT_LENGTH} chars)`)
        .refine(notBlank, 'contextText cannot be empty'),
      taskLabel: z
        .string()
        .max(MAX_TASK_LABEL_LENGTH, `taskLabel too long (max ${MAX_TASK_LABEL_LENGTH} chars)`)
        .refine(notBlank, 'taskLabel cannot be empty'),
      outcome: z.enum(OUTCOMES, {
        errorMap: () => ({
          message: `Unknown outcome (expected one of ${OUTCOMES.join(', ')})`,
        }),
      }),
      embedding: createEmbeddingSchema(limits.dimensions),
      ttlMs: ttlSchema,
    }),
    z.object({
      kind: z.literal('reflection'),
      userId,
      insightText: z.string().refine(notBlank, 'insightText cannot be empty'),
      sessionSummary: z
        .string()
        .max(
          limits.maxSummaryChars,
          `sessionSummary too long (max ${limits.maxSummaryChars} chars)`
        ),
      ttlMs: ttlSchema,
    }),
  ]);
}

export type ValidMemoryRecord = z.infer<
  ReturnType<typeof createMemoryRecordSchema>
>;

function toFailure(error: z.ZodError) {
  const issue = error.issues[0];
  const field = issue?.path[0];
  return failure('VALIDATION_ERROR', issue?.message ?? 'Invalid input', {
    field: field !== undefined ? String(field) : undefined,
  });
}

export interface MemoryValidators {
  record(record: NewMemoryRecord): Result<ValidMemoryRecord>;
  userId(userId: string): Result<string>;
  embedding(embedding: readonly number[]): Result<number[]>;
}

/**
 * Create validators bound to a deployment's limits
 */
export function createMemoryValidators(
  limits: ValidatorLimits
): MemoryValidators {
  const recordSchema = createMemoryRecordSchema(limits);
  const userIdSchema = createUserIdSchema();
  const embeddingSchema = createEmbeddingSchema(limits.dimensions);

  return {
    record(record: NewMemoryRecord): Result<ValidMemoryRecord> {
      const parsed = recordSchema.safeParse(record);
      return parsed.success ? success(parsed.data) : toFailure(parsed.error);
    },

    userId(userId: string): Result<string> {
      const parsed = userIdSchema.safeParse(userId);
      if (parsed.success) {
        return success(parsed.data);
      }
      return failure(
        'VALIDATION_ERROR',
        parsed.error.issues[0]?.message ?? 'Invalid userId',
        { field: 'userId' }
      );
    },

    embedding(embedding: readonly number[]): Result<number[]> {
      const parsed = embeddingSchema.safeParse(embedding);
      if (parsed.success) {
        return success(parsed.data);
      }
      return failure(
        'VALIDATION_ERROR',
        parsed.error.issues[0]?.message ?? 'Invalid embedding',
        { field: 'embedding' }
      );
    },
  };
}
