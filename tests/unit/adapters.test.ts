import { describe, it, expect, vi, afterEach } from 'vitest';
import { parseModelString, createAdapterFromString, getDefaultModel } from '../../src/adapters/index.js';
import { OllamaAdapter } from '../../src/adapters/ollama.js';
import { OpenAIAdapter } from '../../src/adapters/openai.js';
import { AnthropicAdapter, splitSystemPrompt } from '../../src/adapters/anthropic.js';
import { CompletionFault, ConfigError } from '../../src/errors.js';
import type { RequestPolicy } from '../../src/utils/http.js';

const FAST_POLICY: RequestPolicy = { timeoutMs: 1000, maxRetries: 1, retryDelayMs: 0 };

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

function requestBody(fetchMock: ReturnType<typeof vi.fn>, call = 0): unknown {
  const init: unknown = fetchMock.mock.calls[call]?.[1];
  if (typeof init !== 'object' || init === null || !('body' in init) || typeof init.body !== 'string') {
    throw new Error('fetch was not called with a JSON body');
  }
  return JSON.parse(init.body);
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('parseModelString', () => {
  it('parses provider:model format', () => {
    expect(parseModelString('ollama:llama3.2')).toEqual({ provider: 'ollama', model: 'llama3.2' });
    expect(parseModelString('openai:gpt-4o')).toEqual({ provider: 'openai', model: 'gpt-4o' });
    expect(parseModelString('anthropic:claude-3-opus-20240229')).toEqual({
      provider: 'anthropic', model: 'claude-3-opus-20240229',
    });
  });

  it('defaults to openai when no provider prefix', () => {
    expect(parseModelString('gpt-4o-mini')).toEqual({ provider: 'openai', model: 'gpt-4o-mini' });
  });

  it('handles colons in model name', () => {
    expect(parseModelString('ollama:llama3.2:latest')).toEqual({
      provider: 'ollama', model: 'llama3.2:latest',
    });
  });
});

describe('createAdapterFromString', () => {
  it('creates OllamaAdapter', () => {
    const adapter = createAdapterFromString('ollama:llama3.2', {});
    expect(adapter).toBeInstanceOf(OllamaAdapter);
    expect(adapter.provider).toBe('ollama');
    expect(adapter.name).toBe('ollama:llama3.2');
  });

  it('creates OpenAIAdapter with API key', () => {
    const adapter = createAdapterFromString('openai:gpt-4o', { OPENAI_API_KEY: 'test-secret' });
    expect(adapter).toBeInstanceOf(OpenAIAdapter);
    expect(adapter.name).toBe('openai:gpt-4o');
  });

  it('creates AnthropicAdapter with API key', () => {
    const adapter = createAdapterFromString('anthropic:claude-3-opus-20240229', {
      ANTHROPIC_API_KEY: 'test-secret',
    });
    expect(adapter).toBeInstanceOf(AnthropicAdapter);
    expect(adapter.provider).toBe('anthropic');
  });

  it('throws ConfigError without OpenAI API key', () => {
    expect(() => createAdapterFromString('openai:gpt-4o', {})).toThrow(ConfigError);
    expect(() => createAdapterFromString('openai:gpt-4o', {})).toThrow('OPENAI_API_KEY');
  });

  it('throws without Anthropic API key', () => {
    expect(() => createAdapterFromString('anthropic:claude-3-opus-20240229', {}))
      .toThrow('ANTHROPIC_API_KEY');
  });

  it('throws for unknown provider', () => {
    expect(() => createAdapterFromString('fake:model', {})).toThrow('Unknown provider');
  });
});

describe('getDefaultModel', () => {
  it('prefers OpenAI when its key is available', () => {
    expect(getDefaultModel({ OPENAI_API_KEY: 'test-secret', ANTHROPIC_API_KEY: 'test-secret' }))
      .toBe('openai:gpt-4o');
  });

  it('falls back to Anthropic', () => {
    expect(getDefaultModel({ ANTHROPIC_API_KEY: 'test-secret' })).toMatch(/^anthropic:/);
  });

  it('defaults to Ollama when no keys', () => {
    expect(getDefaultModel({})).toBe('ollama:llama3.2');
  });
});

describe('OpenAIAdapter', () => {
  it('posts the chat request and maps the response', async () => {
    const fetchMock = vi.fn().mockResolvedValue(jsonResponse({
      choices: [{ message: { content: 'Hello!' }, finish_reason: 'stop' }],
      usage: { prompt_tokens: 5, completion_tokens: 2, total_tokens: 7 },
    }));
    vi.stubGlobal('fetch', fetchMock);

    const adapter = new OpenAIAdapter({ apiKey: 'test-secret', model: 'gpt-4o', policy: FAST_POLICY });
    const response = await adapter.complete({
      messages: [{ role: 'user', content: 'Hi' }],
      temperature: 0.3,
    });

    expect(response).toEqual({
      content: 'Hello!',
      usage: { promptTokens: 5, completionTokens: 2, totalTokens: 7 },
      finishReason: 'stop',
    });
    expect(fetchMock.mock.calls[0]?.[0]).toBe('https://api.openai.com/v1/chat/completions');
    expect(requestBody(fetchMock)).toMatchObject({
      model: 'gpt-4o',
      messages: [{ role: 'user', content: 'Hi' }],
      temperature: 0.3,
      max_tokens: 1000,
      stream: false,
    });
  });

  it('lets the request override the model', async () => {
    const fetchMock = vi.fn().mockResolvedValue(jsonResponse({
      choices: [{ message: { content: null }, finish_reason: 'length' }],
    }));
    vi.stubGlobal('fetch', fetchMock);

    const adapter = new OpenAIAdapter({ apiKey: 'test-secret', model: 'gpt-4o', policy: FAST_POLICY });
    const response = await adapter.complete({ messages: [], model: 'gpt-4o-mini' });

    expect(requestBody(fetchMock)).toMatchObject({ model: 'gpt-4o-mini' });
    expect(response.content).toBe('');
    expect(response.finishReason).toBe('length');
  });

  it('retries a 5xx once, then succeeds', async () => {
    const fetchMock = vi.fn()
      .mockResolvedValueOnce(jsonResponse({ error: { message: 'overloaded' } }, 503))
      .mockResolvedValueOnce(jsonResponse({
        choices: [{ message: { content: 'Recovered' }, finish_reason: 'stop' }],
      }));
    vi.stubGlobal('fetch', fetchMock);

    const adapter = new OpenAIAdapter({ apiKey: 'test-secret', model: 'gpt-4o', policy: FAST_POLICY });
    const response = await adapter.complete({ messages: [{ role: 'user', content: 'Hi' }] });

    expect(response.content).toBe('Recovered');
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('wraps a 401 in CompletionFault without retrying', async () => {
    const fetchMock = vi.fn().mockResolvedValue(
      jsonResponse({ error: { message: 'Incorrect API key provided' } }, 401)
    );
    vi.stubGlobal('fetch', fetchMock);

    const adapter = new OpenAIAdapter({ apiKey: 'test-secret', model: 'gpt-4o', policy: FAST_POLICY });
    const failure = adapter.complete({ messages: [{ role: 'user', content: 'Hi' }] });

    await expect(failure).rejects.toBeInstanceOf(CompletionFault);
    await expect(failure).rejects.toMatchObject({
      message: 'OpenAI error: Incorrect API key provided',
      status: 401,
    });
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('rejects an unexpected response shape', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(jsonResponse({ choices: [] })));

    const adapter = new OpenAIAdapter({ apiKey: 'test-secret', model: 'gpt-4o', policy: FAST_POLICY });
    await expect(adapter.complete({ messages: [] })).rejects.toThrow('OpenAI error: unexpected response shape');
  });
});

describe('OllamaAdapter', () => {
  it('calls /api/chat without streaming', async () => {
    const fetchMock = vi.fn().mockResolvedValue(jsonResponse({
      message: { role: 'assistant', content: 'Local answer' },
      done: true,
      prompt_eval_count: 10,
      eval_count: 4,
    }));
    vi.stubGlobal('fetch', fetchMock);

    const adapter = new OllamaAdapter({ baseUrl: 'http://localhost:11434/', model: 'llama3.2', policy: FAST_POLICY });
    const response = await adapter.complete({ messages: [{ role: 'user', content: 'Hi' }], maxTokens: 50 });

    expect(fetchMock.mock.calls[0]?.[0]).toBe('http://localhost:11434/api/chat');
    expect(requestBody(fetchMock)).toMatchObject({
      model: 'llama3.2',
      stream: false,
      options: { temperature: 0.7, num_predict: 50 },
    });
    expect(response.content).toBe('Local answer');
    expect(response.usage.totalTokens).toBe(14);
  });

  it('reports an unreachable server as CompletionFault', async () => {
    vi.stubGlobal('fetch', vi.fn().mockRejectedValue(new TypeError('fetch failed')));

    const adapter = new OllamaAdapter({ baseUrl: 'http://localhost:11434', model: 'llama3.2', policy: FAST_POLICY });
    await expect(adapter.complete({ messages: [] })).rejects.toThrow('Ollama error: fetch failed');
  });

  it('health check is false when the server is down', async () => {
    vi.stubGlobal('fetch', vi.fn().mockRejectedValue(new TypeError('fetch failed')));

    const adapter = new OllamaAdapter({ baseUrl: 'http://localhost:11434', model: 'llama3.2' });
    expect(await adapter.healthCheck()).toBe(false);
  });
});

describe('AnthropicAdapter', () => {
  it('lifts system messages into the system parameter', async () => {
    const fetchMock = vi.fn().mockResolvedValue(jsonResponse({
      content: [{ type: 'text', text: 'Hi ' }, { type: 'text', text: 'there' }],
      stop_reason: 'end_turn',
      usage: { input_tokens: 8, output_tokens: 2 },
    }));
    vi.stubGlobal('fetch', fetchMock);

    const adapter = new AnthropicAdapter({ apiKey: 'test-secret', model: 'claude-3-opus-20240229', policy: FAST_POLICY });
    const response = await adapter.complete({
      messages: [
        { role: 'system', content: 'Be brief.' },
        { role: 'user', content: 'Hello' },
      ],
    });

    expect(requestBody(fetchMock)).toMatchObject({
      model: 'claude-3-opus-20240229',
      system: 'Be brief.',
      messages: [{ role: 'user', content: 'Hello' }],
    });
    expect(response.content).toBe('Hi there');
    expect(response.usage.totalTokens).toBe(10);
  });

  it('maps max_tokens to a length finish', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(jsonResponse({
      content: [{ type: 'text', text: 'Cut' }],
      stop_reason: 'max_tokens',
      usage: { input_tokens: 1, output_tokens: 1 },
    })));

    const adapter = new AnthropicAdapter({ apiKey: 'test-secret', model: 'claude-3-opus-20240229', policy: FAST_POLICY });
    expect((await adapter.complete({ messages: [] })).finishReason).toBe('length');
  });
});

describe('splitSystemPrompt', () => {
  it('joins multiple system messages and keeps the rest in order', () => {
    const { systemPrompt, messages } = splitSystemPrompt([
      { role: 'system', content: 'One' },
      { role: 'user', content: 'Q' },
      { role: 'system', content: 'Two' },
      { role: 'assistant', content: 'A' },
    ]);

    expect(systemPrompt).toBe('One\n\nTwo');
    expect(messages).toEqual([
      { role: 'user', content: 'Q' },
      { role: 'assistant', content: 'A' },
    ]);
  });

  it('omits the system prompt when there is none', () => {
    expect(splitSystemPrompt([{ role: 'user', content: 'Q' }]).systemPrompt).toBeUndefined();
  });
});
