/**
 * Adaptive Memory Engine
 *
 * Library entry point. `createMemoryRuntimeFromEnv` is the usual way in;
 * the factories below allow wiring pieces by hand.
 */

export * from './types/index.js';
export * from './services/index.js';
export * from './workers/index.js';
export { loadConfig, ConfigError } from './config.js';
export type { EngineConfig, MemoryBackend } from './config.js';
export {
  createMemoryRuntime,
  createMemoryRuntimeFromEnv,
} from './bootstrap.js';
export type { MemoryRuntime, RuntimeOverrides } from './bootstrap.js';
export {
  createConsoleLogger,
  silentLogger,
  LogLevel,
} from './lib/logger.js';
export type { Logger, LogLevelName } from './lib/logger.js';
export { cosineSimilarity } from './lib/similarity.js';
export { createOpenAIClient, OPENROUTER_BASE_URL } from './lib/openai.js';
