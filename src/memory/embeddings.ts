import { z } from 'zod';
import { ConfigError, EmbeddingFault, errorMessage } from '../errors.js';
import { DEFAULT_REQUEST_POLICY, HttpStatusError, fetchJson } from '../utils/http.js';
import type { RequestPolicy } from '../utils/http.js';

// Dimension of the hashing embedder
export const SIMPLE_EMBEDDING_DIM = 384;

// The store pins the dimension from the first vector it is given
export interface Embedder {
  readonly name: string;
  initialize(): Promise<void>;
  embed(text: string): Promise<Float32Array>;
  embedBatch(texts: readonly string[]): Promise<Float32Array[]>;
}

// Character-level hashing fallback for tests and offline use. Not semantic.
export class SimpleEmbedder implements Embedder {
  readonly name = 'simple';

  constructor(readonly dimensions: number = SIMPLE_EMBEDDING_DIM) {}

  async initialize(): Promise<void> {
    // No initialization needed
  }

  async embed(text: string): Promise<Float32Array> {
    return this.hashToEmbedding(text);
  }

  async embedBatch(texts: readonly string[]): Promise<Float32Array[]> {
    return texts.map((text) => this.hashToEmbedding(text));
  }

  /**
   * Deterministic embedding from character codes, positions and word hashes,
   * normalized to a unit vector.
   */
  private hashToEmbedding(text: string): Float32Array {
    const embedding = new Float32Array(this.dimensions);
    const normalized = text.toLowerCase().trim();

    for (let i = 0; i < this.dimensions; i++) {
      embedding[i] = Math.sin(i * 0.1 + normalized.length * 0.01) * 0.01;
    }

    for (let i = 0; i < normalized.length; i++) {
      const charCode = normalized.charCodeAt(i);
      const position = i % this.dimensions;

      embedding[position] += Math.sin(charCode * 0.1) * 0.1;
      embedding[(position + 1) % this.dimensions] += Math.cos(charCode * 0.1) * 0.1;
      embedding[charCode % this.dimensions] += 0.05;
    }

    for (const word of normalized.split(/\s+/)) {
      embedding[simpleHash(word) % this.dimensions] += 0.1;
    }

    let norm = 0;
    for (let i = 0; i < this.dimensions; i++) {
      norm += embedding[i] * embedding[i];
    }
    norm = Math.sqrt(norm);

    if (norm > 0) {
      for (let i = 0; i < this.dimensions; i++) {
        embedding[i] /= norm;
      }
    }

    return embedding;
  }
}

function simpleHash(str: string): number {
  let hash = 0;
  for (let i = 0; i < str.length; i++) {
    hash = ((hash << 5) - hash) + str.charCodeAt(i);
    hash = hash & hash; // Convert to 32bit integer
  }
  return Math.abs(hash);
}

const OllamaTagsSchema = z.object({
  models: z.array(z.object({ name: z.string() })).default([]),
});

const OllamaEmbedResponseSchema = z.object({
  embeddings: z.array(z.array(z.number())),
});

export class OllamaEmbedder implements Embedder {
  readonly name = 'ollama';

  constructor(
    private baseUrl: string = 'http://127.0.0.1:11434',
    private model: string = 'nomic-embed-text',
    private policy: RequestPolicy = DEFAULT_REQUEST_POLICY
  ) {
    this.baseUrl = baseUrl.replace(/\/$/, '');
  }

  // Confirms the server is up and the model is pulled
  async initialize(): Promise<void> {
    let raw: unknown;
    try {
      raw = await fetchJson(`${this.baseUrl}/api/tags`, { method: 'GET' }, this.policy);
    } catch (error) {
      throw new EmbeddingFault(`Failed to connect to Ollama at ${this.baseUrl}: ${errorMessage(error)}`, { cause: error });
    }

    const tags = OllamaTagsSchema.safeParse(raw);
    const hasModel = tags.success && tags.data.models.some((m) => m.name.includes(this.model));
    if (!hasModel) {
      throw new EmbeddingFault(`Ollama model ${this.model} not found. Run \`ollama pull ${this.model}\`.`);
    }
  }

  async embed(text: string): Promise<Float32Array> {
    const [embedding] = await this.embedBatch([text]);
    return embedding;
  }

  async embedBatch(texts: readonly string[]): Promise<Float32Array[]> {
    if (texts.length === 0) return [];

    let raw: unknown;
    try {
      raw = await fetchJson(`${this.baseUrl}/api/embed`, {
        body: { model: this.model, input: texts },
      }, this.policy);
    } catch (error) {
      throw new EmbeddingFault(`Ollama embedding failed: ${errorMessage(error)}`, {
        cause: error,
        status: error instanceof HttpStatusError ? error.status : undefined,
      });
    }

    const parsed = OllamaEmbedResponseSchema.safeParse(raw);
    if (!parsed.success || parsed.data.embeddings.length !== texts.length) {
      throw new EmbeddingFault('Ollama embedding failed: unexpected response shape');
    }

    return parsed.data.embeddings.map((e) => new Float32Array(e));
  }
}

const OpenAIEmbeddingResponseSchema = z.object({
  data: z.array(z.object({
    embedding: z.array(z.number()),
    index: z.number(),
  })),
});

export class OpenAIEmbedder implements Embedder {
  readonly name = 'openai';

  private baseUrl: string;

  constructor(
    private apiKey: string,
    private model: string = 'text-embedding-3-small',
    private policy: RequestPolicy = DEFAULT_REQUEST_POLICY,
    baseUrl: string = 'https://api.openai.com/v1'
  ) {
    this.baseUrl = baseUrl.replace(/\/$/, '');
  }

  async initialize(): Promise<void> {
    // Key presence is checked at construction time; no warm-up call
  }

  async embed(text: string): Promise<Float32Array> {
    const [embedding] = await this.embedBatch([text]);
    return embedding;
  }

  async embedBatch(texts: readonly string[]): Promise<Float32Array[]> {
    if (texts.length === 0) return [];

    let raw: unknown;
    try {
      raw = await fetchJson(`${this.baseUrl}/embeddings`, {
        headers: { 'Authorization': `Bearer ${this.apiKey}` },
        body: { model: this.model, input: texts },
      }, this.policy);
    } catch (error) {
      throw new EmbeddingFault(`OpenAI embedding failed: ${errorMessage(error)}`, {
        cause: error,
        status: error instanceof HttpStatusError ? error.status : undefined,
      });
    }

    const parsed = OpenAIEmbeddingResponseSchema.safeParse(raw);
    if (!parsed.success || parsed.data.data.length !== texts.length) {
      throw new EmbeddingFault('OpenAI embedding failed: unexpected response shape');
    }

    // Sort by index to maintain order
    return [...parsed.data.data]
      .sort((a, b) => a.index - b.index)
      .map((d) => new Float32Array(d.embedding));
  }
}

export interface EmbedderConfig {
  provider: 'simple' | 'ollama' | 'openai';
  model?: string;
  ollamaUrl?: string;
  openaiApiKey?: string;
  policy?: RequestPolicy;
}

export async function createEmbedder(config: EmbedderConfig): Promise<Embedder> {
  let embedder: Embedder;

  switch (config.provider) {
    case 'simple':
      embedder = new SimpleEmbedder();
      break;

    case 'ollama':
      embedder = new OllamaEmbedder(
        config.ollamaUrl ?? 'http://127.0.0.1:11434',
        config.model ?? 'nomic-embed-text',
        config.policy
      );
      break;

    case 'openai':
      if (!config.openaiApiKey) {
        throw new ConfigError('OpenAI API key required for OpenAI embeddings');
      }
      embedder = new OpenAIEmbedder(
        config.openaiApiKey,
        config.model ?? 'text-embedding-3-small',
        config.policy
      );
      break;

    default:
      throw new ConfigError(`Unknown embedder provider: ${String(config.provider)}`);
  }

  await embedder.initialize();
  return embedder;
}
