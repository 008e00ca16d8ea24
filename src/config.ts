/**
 * Engine Configuration
 *
 * Environment variables are parsed once into a typed EngineConfig.
 * Empty values count as unset so `.env` templates can leave keys blank.
 */

import { z } from 'zod';

import type { LogLevelName } from '@/lib/logger.js';

const DAY_MS = 24 * 60 * 60 * 1000;

const positiveInt = z.coerce.number().int().positive();

const envSchema = z
  .object({
    MEMORY_BACKEND: z.enum(['memory', 'redis', 'supabase']).default('memory'),

    UPSTASH_REDIS_URL: z.string().url().optional(),
    UPSTASH_REDIS_TOKEN: z.string().optional(),
    SUPABASE_URL: z.string().url().optional(),
    SUPABASE_SERVICE_KEY: z.string().optional(),

    LLM_API_KEY: z.string().optional(),
    LLM_BASE_URL: z.string().url().optional(),
    LLM_SITE_URL: z.string().optional(),
    LLM_SITE_NAME: z.string().optional(),

    EMBEDDING_MODEL: z.string().default('text-embedding-3-small'),
    EMBEDDING_DIMENSIONS: positiveInt.default(1536),
    EMBED_TIMEOUT_MS: positiveInt.default(10000),
    EMBED_MAX_ATTEMPTS: positiveInt.default(3),
    EMBED_RETRY_INITIAL_DELAY_MS: positiveInt.default(100),
    EMBED_RETRY_MAX_DELAY_MS: positiveInt.default(2000),

    GENERATION_MODEL: z.string().default('openai/gpt-4o-mini'),
    GENERATION_MAX_TOKENS: positiveInt.default(200),
    GENERATION_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.3),
    GENERATE_TIMEOUT_MS: positiveInt.default(15000),

    INTERVENTION_TTL_DAYS: z.coerce.number().positive().default(30),
    REFLECTION_TTL_DAYS: z.coerce.number().positive().default(90),
    SWEEP_INTERVAL_MS: positiveInt.default(300000),

    SIMILARITY_THRESHOLD: z.coerce.number().min(-1).max(1).default(0.7),
    MIN_QUERY_LENGTH: z.coerce.number().int().nonnegative().default(10),
    CONTEXT_TIMEOUT_MS: positiveInt.default(2000),

    REFLECTION_MAX_TURNS: positiveInt.default(20),
    REFLECTION_MIN_TURNS: z.coerce.number().int().nonnegative().default(2),
    SUMMARY_MAX_CHARS: positiveInt.default(500),

    CLOSE_GRACE_MS: z.coerce.number().int().nonnegative().default(5000),

    LOG_LEVEL: z
      .string()
      .toLowerCase()
      .pipe(z.enum(['debug', 'info', 'warn', 'error']))
      .default('info'),
  })
  .superRefine((env, ctx) => {
    if (
      env.MEMORY_BACKEND === 'redis' &&
      (env.UPSTASH_REDIS_URL === undefined ||
        env.UPSTASH_REDIS_TOKEN === undefined)
    ) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['UPSTASH_REDIS_URL'],
        message:
          'UPSTASH_REDIS_URL and UPSTASH_REDIS_TOKEN are required for the redis backend',
      });
    }
    if (
      env.MEMORY_BACKEND === 'supabase' &&
      (env.SUPABASE_URL === undefined ||
        env.SUPABASE_SERVICE_KEY === undefined)
    ) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['SUPABASE_URL'],
        message:
          'SUPABASE_URL and SUPABASE_SERVICE_KEY are required for the supabase backend',
      });
    }
  });

export type MemoryBackend = 'memory' | 'redis' | 'supabase';

export interface EngineConfig {
  backend: MemoryBackend;
  redis?: { url: string; token: string };
  supabase?: { url: string; serviceKey: string };
  llm: {
    apiKey?: string;
    baseURL?: string;
    siteUrl?: string;
    siteName?: string;
  };
  embedding: {
    model: string;
    dimensions: number;
    timeoutMs: number;
    maxAttempts: number;
    initialDelayMs: number;
    maxDelayMs: number;
  };
  generation: {
    model: string;
    maxTokens: number;
    temperature: number;
    timeoutMs: number;
  };
  retention: {
    interventionTtlMs: number;
    reflectionTtlMs: number;
    sweepIntervalMs: number;
  };
  context: {
    similarityThreshold: number;
    minQueryLength: number;
    timeoutMs: number;
  };
  reflection: {
    maxTurns: number;
    minTurns: number;
    maxSummaryChars: number;
  };
  session: {
    closeGraceMs: number;
  };
  logLevel: LogLevelName;
}

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

function withoutBlanks(
  env: Record<string, string | undefined>
): Record<string, string> {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      cleaned[key] = value.trim();
    }
  }
  return cleaned;
}

/**
 * Parse configuration from environment variables.
 * Throws ConfigError listing every invalid key.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): EngineConfig {
  const parsed = envSchema.safeParse(withoutBlanks(env));
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(
        (issue) => `${issue.path.join('.')}: ${issue.message}`
      )
    );
  }
  const e = parsed.data;

  const config: EngineConfig = {
    backend: e.MEMORY_BACKEND,
    llm: {},
    embedding: {
      model: e.EMBEDDING_MODEL,
      dimensions: e.EMBEDDING_DIMENSIONS,
      timeoutMs: e.EMBED_TIMEOUT_MS,
      maxAttempts: e.EMBED_MAX_ATTEMPTS,
      initialDelayMs: e.EMBED_RETRY_INITIAL_DELAY_MS,
      maxDelayMs: e.EMBED_RETRY_MAX_DELAY_MS,
    },
    generation: {
      model: e.GENERATION_MODEL,
      maxTokens: e.GENERATION_MAX_TOKENS,
      temperature: e.GENERATION_TEMPERATURE,
      timeoutMs: e.GENERATE_TIMEOUT_MS,
    },
    retention: {
      interventionTtlMs: e.INTERVENTION_TTL_DAYS * DAY_MS,
      reflectionTtlMs: e.REFLECTION_TTL_DAYS * DAY_MS,
      sweepIntervalMs: e.SWEEP_INTERVAL_MS,
    },
    context: {
      similarityThreshold: e.SIMILARITY_THRESHOLD,
      minQueryLength: e.MIN_QUERY_LENGTH,
      timeoutMs: e.CONTEXT_TIMEOUT_MS,
    },
    reflection: {
      maxTurns: e.REFLECTION_MAX_TURNS,
      minTurns: e.REFLECTION_MIN_TURNS,
      maxSummaryChars: e.SUMMARY_MAX_CHARS,
    },
    session: {
      closeGraceMs: e.CLOSE_GRACE_MS,
    },
    logLevel: e.LOG_LEVEL,
  };

  if (e.UPSTASH_REDIS_URL !== undefined && e.UPSTASH_REDIS_TOKEN !== undefined) {
    config.redis = { url: e.UPSTASH_REDIS_URL, token: e.UPSTASH_REDIS_TOKEN };
  }
  if (e.SUPABASE_URL !== undefined && e.SUPABASE_SERVICE_KEY !== undefined) {
    config.supabase = {
      url: e.SUPABASE_URL,
      serviceKey: e.SUPABASE_SERVICE_KEY,
    };
  }
  if (e.LLM_API_KEY !== undefined) {
    config.llm.apiKey = e.LLM_API_KEY;
  }
  if (e.LLM_BASE_URL !== undefined) {
    config.llm.baseURL = e.LLM_BASE_URL;
  }
  if (e.LLM_SITE_URL !== undefined) {
    config.llm.siteUrl = e.LLM_SITE_URL;
  }
  if (e.LLM_SITE_NAME !== undefined) {
    config.llm.siteName = e.LLM_SITE_NAME;
  }

  return config;
}
