/**
 * Anthropic Model Adapter
 *
 * System messages are lifted into the separate `system` parameter.
 */

import { z } from 'zod';
import { CompletionFault, errorMessage } from '../errors.js';
import { DEFAULT_REQUEST_POLICY, HttpStatusError, fetchJson } from '../utils/http.js';
import type { RequestPolicy } from '../utils/http.js';
import type {
  ModelAdapter,
  CompletionRequest,
  CompletionResponse,
  AnthropicConfig,
  Message,
} from './types.js';

const ANTHROPIC_API_URL = 'https://api.anthropic.com/v1/messages';
const ANTHROPIC_API_VERSION = '2023-06-01';

const AnthropicResponseSchema = z.object({
  content: z.array(z.object({ type: z.string(), text: z.string().optional() })),
  stop_reason: z.string().nullable(),
  usage: z.object({
    input_tokens: z.number(),
    output_tokens: z.number(),
  }),
});

interface AnthropicMessage {
  role: 'user' | 'assistant';
  content: string;
}

export class AnthropicAdapter implements ModelAdapter {
  readonly name: string;
  readonly provider = 'anthropic';

  private apiKey: string;
  private model: string;
  private policy: RequestPolicy;

  constructor(config: AnthropicConfig) {
    this.apiKey = config.apiKey;
    this.model = config.model;
    this.policy = config.policy ?? DEFAULT_REQUEST_POLICY;
    this.name = `anthropic:${config.model}`;
  }

  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    const { systemPrompt, messages } = splitSystemPrompt(request.messages);

    let raw: unknown;
    try {
      raw = await fetchJson(ANTHROPIC_API_URL, {
        headers: this.headers(),
        body: {
          model: request.model ?? this.model,
          max_tokens: request.maxTokens ?? 1000,
          system: systemPrompt,
          messages,
          temperature: request.temperature ?? 0.7,
          stop_sequences: request.stopSequences,
        },
      }, this.policy);
    } catch (error) {
      throw new CompletionFault(`Anthropic error: ${errorMessage(error)}`, {
        cause: error,
        status: error instanceof HttpStatusError ? error.status : undefined,
      });
    }

    const parsed = AnthropicResponseSchema.safeParse(raw);
    if (!parsed.success) {
      throw new CompletionFault('Anthropic error: unexpected response shape', { cause: parsed.error });
    }

    const data = parsed.data;
    const textContent = data.content
      .filter((c) => c.type === 'text')
      .map((c) => c.text ?? '')
      .join('');

    return {
      content: textContent,
      usage: {
        promptTokens: data.usage.input_tokens,
        completionTokens: data.usage.output_tokens,
        totalTokens: data.usage.input_tokens + data.usage.output_tokens,
      },
      finishReason: data.stop_reason === 'max_tokens' ? 'length' : 'stop',
    };
  }

  async healthCheck(): Promise<boolean> {
    try {
      // Minimal request to check API key validity
      const response = await fetch(ANTHROPIC_API_URL, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          ...this.headers(),
        },
        body: JSON.stringify({
          model: this.model,
          max_tokens: 1,
          messages: [{ role: 'user', content: 'Hi' }],
        }),
        signal: AbortSignal.timeout(10000),
      });

      return response.ok;
    } catch {
      return false;
    }
  }

  private headers(): Record<string, string> {
    return {
      'x-api-key': this.apiKey,
      'anthropic-version': ANTHROPIC_API_VERSION,
    };
  }
}

export function splitSystemPrompt(messages: readonly Message[]): {
  systemPrompt: string | undefined;
  messages: AnthropicMessage[];
} {
  const systemMessages: string[] = [];
  const conversation: AnthropicMessage[] = [];

  for (const message of messages) {
    if (message.role === 'system') {
      systemMessages.push(message.content);
    } else {
      conversation.push({ role: message.role, content: message.content });
    }
  }

  return {
    systemPrompt: systemMessages.length > 0 ? systemMessages.join('\n\n') : undefined,
    messages: conversation,
  };
}
