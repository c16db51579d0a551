/**
 * Ollama Model Adapter
 *
 * Connects to a local Ollama server for completely offline use.
 */

import { z } from 'zod';
import { CompletionFault, errorMessage } from '../errors.js';
import { DEFAULT_REQUEST_POLICY, HttpStatusError, fetchJson } from '../utils/http.js';
import type { RequestPolicy } from '../utils/http.js';
import type {
  ModelAdapter,
  CompletionRequest,
  CompletionResponse,
  OllamaConfig,
  Message,
} from './types.js';

const OllamaChatResponseSchema = z.object({
  message: z.object({ role: z.string(), content: z.string() }),
  done: z.boolean(),
  prompt_eval_count: z.number().optional(),
  eval_count: z.number().optional(),
});

export class OllamaAdapter implements ModelAdapter {
  readonly name: string;
  readonly provider = 'ollama';

  private baseUrl: string;
  private model: string;
  private policy: RequestPolicy;

  constructor(config: OllamaConfig) {
    this.baseUrl = config.baseUrl.replace(/\/$/, ''); // Remove trailing slash
    this.model = config.model;
    this.policy = config.policy ?? DEFAULT_REQUEST_POLICY;
    this.name = `ollama:${config.model}`;
  }

  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    let raw: unknown;
    try {
      raw = await fetchJson(`${this.baseUrl}/api/chat`, {
        body: {
          model: request.model ?? this.model,
          messages: this.formatMessages(request.messages),
          stream: false,
          options: {
            temperature: request.temperature ?? 0.7,
            num_predict: request.maxTokens ?? 1000,
            stop: request.stopSequences,
          },
        },
      }, this.policy);
    } catch (error) {
      throw new CompletionFault(`Ollama error: ${errorMessage(error)}`, {
        cause: error,
        status: error instanceof HttpStatusError ? error.status : undefined,
      });
    }

    const parsed = OllamaChatResponseSchema.safeParse(raw);
    if (!parsed.success) {
      throw new CompletionFault('Ollama error: unexpected response shape', { cause: parsed.error });
    }

    const data = parsed.data;
    const promptTokens = data.prompt_eval_count ?? 0;
    const completionTokens = data.eval_count ?? 0;

    return {
      content: data.message.content,
      usage: {
        promptTokens,
        completionTokens,
        totalTokens: promptTokens + completionTokens,
      },
      finishReason: data.done ? 'stop' : 'length',
    };
  }

  async healthCheck(): Promise<boolean> {
    try {
      const response = await fetch(`${this.baseUrl}/api/tags`, {
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
}
