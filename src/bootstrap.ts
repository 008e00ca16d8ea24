/**
 * Engine Bootstrap
 *
 * Wires configuration, backend, model clients and services into a running
 * memory runtime.
 */

import 'dotenv/config';

import type { EngineConfig } from './config.js';
import { loadConfig } from './config.js';
import type { Logger } from './lib/logger.js';
import { createConsoleLogger } from './lib/logger.js';
import { createOpenAIClient } from './lib/openai.js';
import { createRedisClient } from './lib/redis.js';
import { createSupabaseAdmin } from './lib/supabase.js';
import type { MemoryEngine, MemoryStoreDb, SessionService } from './services/index.js';
import {
  createContextService,
  createEmbeddingService,
  createInMemoryMemoryStoreDb,
  createMemoryEngine,
  createMemoryStore,
  createOpenAIEmbeddingProvider,
  createOpenAITextGenerator,
  createRedisMemoryStoreDb,
  createReflectionService,
  createRetentionManager,
  createSessionService,
  createSupabaseMemoryStoreDb,
  fromUpstash,
  instrumentMemoryEngine,
} from './services/index.js';
import type { EmbeddingProvider, TextGenerator } from './types/index.js';
import type { CheckInScheduler, RetentionSweep } from './workers/index.js';
import { createCheckInScheduler, createRetentionSweep } from './workers/index.js';

export interface MemoryRuntime {
  config: EngineConfig;
  engine: MemoryEngine;
  sessions: SessionService;
  scheduler: CheckInScheduler;
  sweep: RetentionSweep;
  /** Stop background work and wait for detached writes */
  shutdown(): Promise<void>;
}

/**
 * Replace any externally backed piece, e.g. in tests or local runs
 */
export interface RuntimeOverrides {
  db?: MemoryStoreDb;
  embeddingProvider?: EmbeddingProvider;
  textGenerator?: TextGenerator;
  logger?: Logger;
  now?: () => Date;
}

function createDb(config: EngineConfig, logger: Logger): MemoryStoreDb {
  switch (config.backend) {
    case 'redis': {
      if (config.redis === undefined) {
        throw new Error('Redis backend selected without Redis settings');
      }
      return createRedisMemoryStoreDb(
        fromUpstash(createRedisClient(config.redis)),
        logger
      );
    }
    case 'supabase': {
      if (config.supabase === undefined) {
        throw new Error('Supabase backend selected without Supabase settings');
      }
      return createSupabaseMemoryStoreDb(
        createSupabaseAdmin(config.supabase),
        logger
      );
    }
    case 'memory':
      return createInMemoryMemoryStoreDb();
  }
}

function modelClients(
  config: EngineConfig,
  overrides: RuntimeOverrides
): { embeddingProvider: EmbeddingProvider; textGenerator: TextGenerator } {
  if (
    overrides.embeddingProvider !== undefined &&
    overrides.textGenerator !== undefined
  ) {
    return {
      embeddingProvider: overrides.embeddingProvider,
      textGenerator: overrides.textGenerator,
    };
  }
  if (config.llm.apiKey === undefined) {
    throw new Error('LLM_API_KEY is required');
  }
  const client = createOpenAIClient({
    apiKey: config.llm.apiKey,
    ...(config.llm.baseURL !== undefined ? { baseURL: config.llm.baseURL } : {}),
    ...(config.llm.siteUrl !== undefined ? { siteUrl: config.llm.siteUrl } : {}),
    ...(config.llm.siteName !== undefined
      ? { siteName: config.llm.siteName }
      : {}),
  });
  return {
    embeddingProvider:
      overrides.embeddingProvider ??
      createOpenAIEmbeddingProvider(client, {
        model: config.embedding.model,
        dimensions: config.embedding.dimensions,
      }),
    textGenerator:
      overrides.textGenerator ??
      createOpenAITextGenerator(client, {
        model: config.generation.model,
        maxTokens: config.generation.maxTokens,
        temperature: config.generation.temperature,
      }),
  };
}

/**
 * Build a runtime from parsed configuration and start the retention sweep
 */
export function createMemoryRuntime(
  config: EngineConfig,
  overrides: RuntimeOverrides = {}
): MemoryRuntime {
  const logger =
    overrides.logger ??
    createConsoleLogger({ level: config.logLevel, scope: 'memory' });
  const now = overrides.now ?? (() => new Date());
  const db = overrides.db ?? createDb(config, logger.child('db'));
  const { embeddingProvider, textGenerator } = modelClients(config, overrides);

  const retention = createRetentionManager({
    interventionTtlMs: config.retention.interventionTtlMs,
    reflectionTtlMs: config.retention.reflectionTtlMs,
  });
  const store = createMemoryStore({
    db,
    retention,
    dimensions: config.embedding.dimensions,
    maxSummaryChars: config.reflection.maxSummaryChars,
    now,
    logger: logger.child('store'),
  });
  const embeddingService = createEmbeddingService({
    provider: embeddingProvider,
    dimensions: config.embedding.dimensions,
    timeoutMs: config.embedding.timeoutMs,
    retry: {
      maxAttempts: config.embedding.maxAttempts,
      initialDelayMs: config.embedding.initialDelayMs,
      maxDelayMs: config.embedding.maxDelayMs,
    },
    logger: logger.child('embedding'),
  });
  const contextService = createContextService({
    store,
    embeddingService,
    similarityThreshold: config.context.similarityThreshold,
    minQueryLength: config.context.minQueryLength,
    logger: logger.child('context'),
  });
  const reflectionService = createReflectionService({
    store,
    contextService,
    textGenerator,
    timeoutMs: config.generation.timeoutMs,
    maxTurns: config.reflection.maxTurns,
    minTurns: config.reflection.minTurns,
    maxSummaryChars: config.reflection.maxSummaryChars,
    logger: logger.child('reflection'),
  });
  const engine = instrumentMemoryEngine(
    createMemoryEngine({
      store,
      embeddingService,
      contextService,
      reflectionService,
      contextTimeoutMs: config.context.timeoutMs,
      closeGraceMs: config.session.closeGraceMs,
      logger: logger.child('engine'),
    }),
    logger.child('timing')
  );

  const scheduler = createCheckInScheduler({ logger: logger.child('check-in') });
  const sessions = createSessionService({
    engine,
    scheduler,
    logger: logger.child('session'),
  });
  const sweep = createRetentionSweep({
    db,
    intervalMs: config.retention.sweepIntervalMs,
    now,
    logger: logger.child('sweep'),
  });
  sweep.start();

  logger.info('Memory runtime ready', {
    backend: overrides.db !== undefined ? 'custom' : config.backend,
    dimensions: config.embedding.dimensions,
  });

  return {
    config,
    engine,
    sessions,
    scheduler,
    sweep,
    async shutdown(): Promise<void> {
      sweep.stop();
      scheduler.stop();
      const drained = await engine.drain(config.session.closeGraceMs);
      if (!drained) {
        logger.warn('Shutdown with intervention writes still pending');
      }
    },
  };
}

/**
 * Build a runtime from process.env (after `.env` is loaded)
 */
export function createMemoryRuntimeFromEnv(
  overrides: RuntimeOverrides = {}
): MemoryRuntime {
  return createMemoryRuntime(loadConfig(process.env), overrides);
}
