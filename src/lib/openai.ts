/**
 * OpenAI SDK client pointed at an OpenAI-compatible endpoint
 * (OpenRouter unless overridden)
 */

import OpenAI from 'openai';

export const OPENROUTER_BASE_URL = 'https://openrouter.ai/api/v1';

export interface LLMClientConfig {
  /** API key (required) */
  apiKey: string;

  /** Base URL override (default: OpenRouter) */
  baseURL?: string;

  /** Site URL for OpenRouter attribution */
  siteUrl?: string;

  /** Site name for OpenRouter attribution */
  siteName?: string;

  /** Request timeout in milliseconds */
  timeout?: number;
}

export function createOpenAIClient(config: LLMClientConfig): OpenAI {
  if (!config.apiKey || config.apiKey.trim() === '') {
    throw new Error('API key is required');
  }

  const defaultHeaders: Record<string, string> = {};
  if (config.siteUrl) {
    defaultHeaders['HTTP-Referer'] = config.siteUrl;
  }
  if (config.siteName) {
    defaultHeaders['X-Title'] = config.siteName;
  }

  // Retries are owned by the engine, not the SDK
  return new OpenAI({
    apiKey: config.apiKey,
    baseURL: config.baseURL ?? OPENROUTER_BASE_URL,
    defaultHeaders,
    timeout: config.timeout ?? 30000,
    maxRetries: 0,
  });
}
