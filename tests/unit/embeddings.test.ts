import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  OllamaEmbedder,
  OpenAIEmbedder,
  SimpleEmbedder,
  createEmbedder,
} from '../../src/memory/embeddings.js';
import { cosineSimilarity } from '../../src/memory/ranker.js';
import { ConfigError, EmbeddingFault } from '../../src/errors.js';
import type { RequestPolicy } from '../../src/utils/http.js';

const FAST_POLICY: RequestPolicy = { timeoutMs: 1000, maxRetries: 1, retryDelayMs: 0 };

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status });
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('SimpleEmbedder', () => {
  const embedder = new SimpleEmbedder();

  it('has correct dimension', () => {
    expect(embedder.dimensions).toBe(384);
    expect(embedder.name).toBe('simple');
  });

  it('produces normalized 384-dimensional vectors', async () => {
    const emb = await embedder.embed('test input');
    expect(emb).toBeInstanceOf(Float32Array);
    expect(emb.length).toBe(384);

    let norm = 0;
    for (let i = 0; i < emb.length; i++) {
      norm += emb[i] * emb[i];
    }
    expect(Math.sqrt(norm)).toBeCloseTo(1.0, 4);
  });

  it('is deterministic', async () => {
    const a = await embedder.embed('same input');
    const b = await embedder.embed('same input');
    expect(Array.from(a)).toEqual(Array.from(b));
    expect(cosineSimilarity(a, b)).toBeCloseTo(1, 5);
  });

  it('produces different embeddings for different text', async () => {
    const a = await embedder.embed('apples and oranges');
    const b = await embedder.embed('quantum physics theory');
    expect(cosineSimilarity(a, b)).toBeLessThan(0.999);
  });

  it('handles empty and very long strings', async () => {
    expect((await embedder.embed('')).length).toBe(384);
    expect((await embedder.embed('x'.repeat(10000))).length).toBe(384);
  });

  it('batch embeds in order', async () => {
    const results = await embedder.embedBatch(['hello', 'world']);
    expect(results).toHaveLength(2);
    expect(Array.from(results[1])).toEqual(Array.from(await embedder.embed('world')));
  });

  it('honours a custom dimension', async () => {
    const small = new SimpleEmbedder(16);
    expect((await small.embed('hello')).length).toBe(16);
  });
});

describe('OpenAIEmbedder', () => {
  it('restores input order from the response indices', async () => {
    const fetchMock = vi.fn().mockResolvedValue(jsonResponse({
      data: [
        { embedding: [0, 1], index: 1 },
        { embedding: [1, 0], index: 0 },
      ],
    }));
    vi.stubGlobal('fetch', fetchMock);

    const embedder = new OpenAIEmbedder('test-secret', 'text-embedding-3-small', FAST_POLICY);
    const [first, second] = await embedder.embedBatch(['first', 'second']);

    expect(Array.from(first)).toEqual([1, 0]);
    expect(Array.from(second)).toEqual([0, 1]);
    expect(fetchMock.mock.calls[0]?.[0]).toBe('https://api.openai.com/v1/embeddings');
  });

  it('does not call the API for an empty batch', async () => {
    const fetchMock = vi.fn();
    vi.stubGlobal('fetch', fetchMock);

    expect(await new OpenAIEmbedder('test-secret').embedBatch([])).toEqual([]);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('raises EmbeddingFault with the HTTP status', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(
      jsonResponse({ error: { message: 'You exceeded your current quota' } }, 400)
    ));

    const embedder = new OpenAIEmbedder('test-secret', 'text-embedding-3-small', FAST_POLICY);
    const failure = embedder.embed('hello');

    await expect(failure).rejects.toBeInstanceOf(EmbeddingFault);
    await expect(failure).rejects.toMatchObject({
      message: 'OpenAI embedding failed: You exceeded your current quota',
      status: 400,
    });
  });

  it('rejects a response with the wrong number of vectors', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(jsonResponse({ data: [] })));

    const embedder = new OpenAIEmbedder('test-secret', 'text-embedding-3-small', FAST_POLICY);
    await expect(embedder.embed('hello')).rejects.toThrow('OpenAI embedding failed: unexpected response shape');
  });
});

describe('OllamaEmbedder', () => {
  it('embeds a batch through /api/embed', async () => {
    const fetchMock = vi.fn().mockResolvedValue(jsonResponse({ embeddings: [[0.5, 0.5], [1, 0]] }));
    vi.stubGlobal('fetch', fetchMock);

    const embedder = new OllamaEmbedder('http://localhost:11434/', 'nomic-embed-text', FAST_POLICY);
    const vectors = await embedder.embedBatch(['a', 'b']);

    expect(vectors.map((v) => Array.from(v))).toEqual([[0.5, 0.5], [1, 0]]);
    expect(fetchMock.mock.calls[0]?.[0]).toBe('http://localhost:11434/api/embed');
  });

  it('fails to initialize when the model is not pulled', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(jsonResponse({ models: [{ name: 'llama3.2:latest' }] })));

    const embedder = new OllamaEmbedder('http://localhost:11434', 'nomic-embed-text', FAST_POLICY);
    await expect(embedder.initialize()).rejects.toThrow('Ollama model nomic-embed-text not found');
  });

  it('initializes when the model is listed', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(
      jsonResponse({ models: [{ name: 'nomic-embed-text:latest' }] })
    ));

    const embedder = new OllamaEmbedder('http://localhost:11434', 'nomic-embed-text', FAST_POLICY);
    await expect(embedder.initialize()).resolves.toBeUndefined();
  });

  it('fails to initialize when the server is unreachable', async () => {
    vi.stubGlobal('fetch', vi.fn().mockRejectedValue(new TypeError('fetch failed')));

    const embedder = new OllamaEmbedder('http://localhost:11434', 'nomic-embed-text', FAST_POLICY);
    await expect(embedder.initialize()).rejects.toBeInstanceOf(EmbeddingFault);
  });
});

describe('createEmbedder', () => {
  it('creates simple embedder', async () => {
    const embedder = await createEmbedder({ provider: 'simple' });
    expect(embedder.name).toBe('simple');
  });

  it('creates an OpenAI embedder for the configured model', async () => {
    const embedder = await createEmbedder({
      provider: 'openai',
      model: 'text-embedding-3-large',
      openaiApiKey: 'test-secret',
      policy: FAST_POLICY,
    });
    const fetchMock = vi.fn().mockResolvedValue(jsonResponse({
      data: [{ embedding: [0.25, 0.5, 0.75], index: 0 }],
    }));
    vi.stubGlobal('fetch', fetchMock);

    const vector = await embedder.embed('hello');

    expect(embedder.name).toBe('openai');
    expect(vector.length).toBe(3);
    const init: RequestInit = fetchMock.mock.calls[0]?.[1];
    expect(JSON.parse(String(init.body))).toEqual({ model: 'text-embedding-3-large', input: ['hello'] });
  });

  it('rejects openai without API key', async () => {
    const failure = createEmbedder({ provider: 'openai' });
    await expect(failure).rejects.toBeInstanceOf(ConfigError);
    await expect(failure).rejects.toThrow('API key');
  });
});
