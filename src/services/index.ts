/**
 * Service Layer Exports
 */

export {
  createMemoryStore,
  type MemoryStore,
  type MemoryStoreDb,
  type MemoryStoreDeps,
} from './memory-store.service.js';
export {
  createMemoryValidators,
  type MemoryValidators,
  type ValidMemoryRecord,
} from './memory.validators.js';
export {
  createInMemoryMemoryStoreDb,
  type InMemoryMemoryStoreDb,
} from './memory-store.memory.js';
export {
  createRedisMemoryStoreDb,
  fromUpstash,
  type MemoryRedisClient,
} from './memory-store.redis.js';
export { createSupabaseMemoryStoreDb } from './memory-store.db.js';

export {
  createRetentionManager,
  DEFAULT_RETENTION_POLICY,
  type RetentionManager,
  type RetentionPolicy,
} from './retention.service.js';

export {
  createEmbeddingService,
  createOpenAIEmbeddingProvider,
  type EmbeddingService,
  type EmbeddingsClient,
} from './embedding.service.js';
export {
  createOpenAITextGenerator,
  type ChatCompletionsClient,
} from './generation.service.js';

export {
  createContextService,
  type ContextService,
} from './context.service.js';
export {
  createReflectionService,
  buildReflectionPrompt,
  type ReflectionService,
} from './reflection.service.js';

export {
  createMemoryEngine,
  instrumentMemoryEngine,
  type MemoryEngine,
  type MemoryEngineDeps,
  type RecordInterventionInput,
} from './memory-engine.service.js';
export {
  createSessionService,
  type Session,
  type SessionService,
  type SessionSummary,
} from './session.service.js';
