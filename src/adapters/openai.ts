/**
 * OpenAI Model Adapter
 *
 * Supports GPT-4 class models and compatible APIs (Azure, local proxies).
 */

import { z } from 'zod';
import { CompletionFault, errorMessage } from '../errors.js';
import { DEFAULT_REQUEST_POLICY, HttpStatusError, fetchJson } from '../utils/http.js';
import type { RequestPolicy } from '../utils/http.js';
import type {
  ModelAdapter,
  CompletionRequest,
  CompletionResponse,
  OpenAIConfig,
  Message,
} from './types.js';

const OpenAIChatResponseSchema = z.object({
  choices: z.array(z.object({
    message: z.object({ content: z.string().nullable() }),
    finish_reason: z.string().nullable(),
  })).min(1),
  usage: z.object({
    prompt_tokens: z.number(),
    completion_tokens: z.number(),
    total_tokens: z.number(),
  }).optional(),
});

export class OpenAIAdapter implements ModelAdapter {
  readonly name: string;
  readonly provider = 'openai';

  private apiKey: string;
  private model: string;
  private baseUrl: string;
  private policy: RequestPolicy;

  constructor(config: OpenAIConfig) {
    this.apiKey = config.apiKey;
    this.model = config.model;
    this.baseUrl = (config.baseUrl ?? 'https://api.openai.com/v1').replace(/\/$/, '');
    this.policy = config.policy ?? DEFAULT_REQUEST_POLICY;
    this.name = `openai:${config.model}`;
  }

  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    let raw: unknown;
    try {
      raw = await fetchJson(`${this.baseUrl}/chat/completions`, {
        headers: { 'Authorization': `Bearer ${this.apiKey}` },
        body: {
          model: request.model ?? this.model,
          messages: this.formatMessages(request.messages),
          temperature: request.temperature ?? 0.7,
          max_tokens: request.maxTokens ?? 1000,
          stop: request.stopSequences,
          stream: false,
        },
      }, this.policy);
    } catch (error) {
      throw new CompletionFault(`OpenAI error: ${errorMessage(error)}`, {
        cause: error,
        status: error instanceof HttpStatusError ? error.status : undefined,
      });
    }

    const parsed = OpenAIChatResponseSchema.safeParse(raw);
    if (!parsed.success) {
      throw new CompletionFault('OpenAI error: unexpected response shape', { cause: parsed.error });
    }

    const data = parsed.data;
    const choice = data.choices[0];

    return {
      content: choice.message.content ?? '',
      usage: {
        promptTokens: data.usage?.prompt_tokens ?? 0,
        completionTokens: data.usage?.completion_tokens ?? 0,
        totalTokens: data.usage?.total_tokens ?? 0,
      },
      finishReason: this.mapFinishReason(choice.finish_reason),
    };
  }

  async healthCheck(): Promise<boolean> {
    try {
      const response = await fetch(`${this.baseUrl}/models`, {
        headers: {
          'Authorization': `Bearer ${this.apiKey}`,
        },
        signal: AbortSignal.timeout(5000),
      });
      return response.ok;
    } catch {
      return false;
    }
  }

  private formatMessages(messages: readonly Message[]): Message[] {
    return messages.map((msg) => ({
      role: msg.role,
      content: msg.content,
    }));
  }

  private mapFinishReason(reason: string | null): CompletionResponse['finishReason'] {
    switch (reason) {
      case 'length':
        return 'length';
      case 'content_filter':
        return 'content_filter';
      default:
        return 'stop';
    }
  }
}
