/**
 * Text generation through an OpenAI-compatible chat completions API
 */

import type {
  ChatCompletion,
  ChatCompletionCreateParamsNonStreaming,
} from 'openai/resources/chat/completions';

import type {
  CallOptions,
  GenerationConfig,
  TextGenerator,
} from '@/types/index.js';
import {
  DEFAULT_GENERATION_CONFIG,
  GenerationError,
  errorMessage,
} from '@/types/index.js';

/**
 * The part of the OpenAI client used for completions
 */
export interface ChatCompletionsClient {
  chat: {
    completions: {
      create(
        body: ChatCompletionCreateParamsNonStreaming,
        options?: { signal?: AbortSignal; maxRetries?: number }
      ): Promise<ChatCompletion>;
    };
  };
}

/**
 * Create a TextGenerator backed by chat completions.
 * One request per call; the SDK's own retries are disabled.
 */
export function createOpenAITextGenerator(
  client: ChatCompletionsClient,
  config: GenerationConfig = DEFAULT_GENERATION_CONFIG
): TextGenerator {
  return {
    async generate(prompt: string, options?: CallOptions): Promise<string> {
      let completion: ChatCompletion;
      try {
        completion = await client.chat.completions.create(
          {
            model: config.model,
            messages: [{ role: 'user', content: prompt }],
            max_tokens: config.maxTokens,
            temperature: config.temperature,
          },
          { signal: options?.signal, maxRetries: 0 }
        );
      } catch (error) {
        throw new GenerationError(
          `Text generation failed: ${errorMessage(error)}`,
          { cause: error }
        );
      }

      const content = completion.choices[0]?.message.content?.trim();
      if (!content) {
        throw new GenerationError('Text generation returned no content');
      }
      return content;
    },
  };
}
