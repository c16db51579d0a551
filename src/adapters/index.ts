/**
 * Model Adapters
 *
 * Unified chat-completion interface for multiple LLM providers.
 */

export * from './types.js';
export * from './ollama.js';
export * from './openai.js';
export * from './anthropic.js';

import type { ModelAdapter, AdapterConfig } from './types.js';
import type { RequestPolicy } from '../utils/http.js';
import { ConfigError } from '../errors.js';
import { OllamaAdapter } from './ollama.js';
import { OpenAIAdapter } from './openai.js';
import { AnthropicAdapter } from './anthropic.js';

/**
 * Parse a model string like "ollama:llama3.2" or "openai:gpt-4o"
 */
export function parseModelString(modelString: string): {
  provider: string;
  model: string;
} {
  const colonIndex = modelString.indexOf(':');

  if (colonIndex === -1) {
    // No provider prefix, default to openai
    return { provider: 'openai', model: modelString };
  }

  return {
    provider: modelString.slice(0, colonIndex),
    model: modelString.slice(colonIndex + 1),
  };
}

/**
 * Create a model adapter from configuration
 */
export function createAdapter(config: AdapterConfig): ModelAdapter {
  switch (config.provider) {
    case 'ollama':
      return new OllamaAdapter(config.config);

    case 'openai':
      return new OpenAIAdapter(config.config);

    case 'anthropic':
      return new AnthropicAdapter(config.config);
  }
}

/**
 * Create a model adapter from a model string and an explicit environment
 */
export function createAdapterFromString(
  modelString: string,
  env: {
    OPENAI_API_KEY?: string;
    ANTHROPIC_API_KEY?: string;
    OLLAMA_HOST?: string;
  },
  policy?: RequestPolicy
): ModelAdapter {
  const { provider, model } = parseModelString(modelString);

  switch (provider) {
    case 'ollama':
      return new OllamaAdapter({
        baseUrl: env.OLLAMA_HOST ?? 'http://127.0.0.1:11434',
        model,
        policy,
      });

    case 'openai':
      if (!env.OPENAI_API_KEY) {
        throw new ConfigError('OPENAI_API_KEY environment variable required for OpenAI models');
      }
      return new OpenAIAdapter({
        apiKey: env.OPENAI_API_KEY,
        model,
        policy,
      });

    case 'anthropic':
      if (!env.ANTHROPIC_API_KEY) {
        throw new ConfigError('ANTHROPIC_API_KEY environment variable required for Anthropic models');
      }
      return new AnthropicAdapter({
        apiKey: env.ANTHROPIC_API_KEY,
        model,
        policy,
      });

    default:
      throw new ConfigError(`Unknown provider: ${provider}. Use ollama:, openai:, or anthropic:`);
  }
}

/**
 * Get default model string based on available credentials
 */
export function getDefaultModel(env: Record<string, string | undefined>): string {
  if (env.OPENAI_API_KEY) {
    return 'openai:gpt-4o';
  }

  if (env.ANTHROPIC_API_KEY) {
    return 'anthropic:claude-sonnet-4-20250514';
  }

  // Local fallback
  return 'ollama:llama3.2';
}
