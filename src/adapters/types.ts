/**
 * Type definitions for model adapters
 */

import type { RequestPolicy } from '../utils/http.js';

export type MessageRole = 'system' | 'user' | 'assistant';

export interface Message {
  role: MessageRole;
  content: string;
}

export interface CompletionRequest {
  messages: readonly Message[];
  model?: string;          // Overrides the adapter's default model for this call
  temperature?: number;
  maxTokens?: number;
  stopSequences?: string[];
}

export interface CompletionResponse {
  content: string;
  usage: TokenUsage;
  finishReason: 'stop' | 'length' | 'content_filter' | 'error';
}

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

/**
 * Chat completion over one provider's HTTP API
 */
export interface ModelAdapter {
  readonly name: string;
  readonly provider: string;

  /**
   * Complete a chat request. Failures surface as CompletionFault.
   */
  complete(request: CompletionRequest): Promise<CompletionResponse>;

  /**
   * Check if the adapter is properly configured and reachable
   */
  healthCheck(): Promise<boolean>;
}

/**
 * Configuration for different providers
 */
export interface OllamaConfig {
  baseUrl: string;
  model: string;
  policy?: RequestPolicy;
}

export interface OpenAIConfig {
  apiKey: string;
  model: string;
  baseUrl?: string;
  policy?: RequestPolicy;
}

export interface AnthropicConfig {
  apiKey: string;
  model: string;
  policy?: RequestPolicy;
}

export type AdapterConfig =
  | { provider: 'ollama'; config: OllamaConfig }
  | { provider: 'openai'; config: OpenAIConfig }
  | { provider: 'anthropic'; config: AnthropicConfig };
