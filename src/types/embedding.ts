/**
 * Embedding and Generation Types
 *
 * Both capabilities are consumed, not implemented, by the engine.
 */

/**
 * Embedding configuration
 */
export interface EmbeddingConfig {
  /** Embedding model to use */
  model: string;
  /** Vector dimensions, fixed per deployment */
  dimensions: number;
}

/**
 * Default embedding configuration
 */
export const DEFAULT_EMBEDDING_CONFIG: EmbeddingConfig = {
  model: 'text-embedding-3-small',
  dimensions: 1536,
};

export interface CallOptions {
  signal?: AbortSignal;
}

/**
 * Turns text into a fixed-dimension vector.
 * Implementations throw EmbeddingError.
 */
export interface EmbeddingProvider {
  embed(text: string, options?: CallOptions): Promise<number[]>;
}

/**
 * Produces free text for a prompt.
 * Implementations throw GenerationError.
 */
export interface TextGenerator {
  generate(prompt: string, options?: CallOptions): Promise<string>;
}

export interface GenerationConfig {
  model: string;
  maxTokens: number;
  temperature: number;
}

export const DEFAULT_GENERATION_CONFIG: GenerationConfig = {
  model: 'openai/gpt-4o-mini',
  maxTokens: 200,
  temperature: 0.3,
};
