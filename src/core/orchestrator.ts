import type { Message } from '../adapters/types.js';
import { StorageFault, ValidationError } from '../errors.js';
import { CurationPipeline } from '../memory/curation.js';
import type { CompletionService } from '../memory/completion.js';
import type { Embedder } from '../memory/embeddings.js';
import { DEFAULT_IMPORTANCE_THRESHOLD, ExtractionPipeline } from '../memory/extraction.js';
import { DEFAULT_RANK_LIMIT, LinearRanker } from '../memory/ranker.js';
import type { Ranker } from '../memory/ranker.js';
import type { MemoryStore } from '../memory/store.js';
import type {
  CandidateMemory,
  MemoryMetadata,
  MemoryRecord,
  MemoryUpdate,
  ProcessOptions,
  ProcessResult,
  RankedMemory,
  RespondOptions,
  RespondResult,
} from '../memory/types.js';
import { createLogger } from '../utils/logger.js';
import type { Logger } from '../utils/logger.js';
import { SerialQueue } from '../utils/serial-queue.js';
import {
  DEFAULT_MAX_CONTEXT_CHARS,
  DEFAULT_SYSTEM_PREAMBLE,
  buildAugmentedMessages,
  findLastUserMessage,
  formatMemoriesForContext,
} from './context-builder.js';

export interface OrchestratorOptions {
  importanceThreshold?: number;
  relevantLimit?: number;
  maxContextChars?: number;
  systemPreamble?: string;
}

export interface MemoryOrchestratorDeps {
  store: MemoryStore;
  embedder: Embedder;
  completion: CompletionService;
  ranker?: Ranker;
  logger?: Logger;
  options?: OrchestratorOptions;
}

export interface MemoryEdit {
  content?: string;
  metadata?: MemoryMetadata;
}

/**
 * Drives memory-augmented turns over one store.
 *
 * Store work for a turn (extract, curate, rank) goes through a single-writer
 * queue, so deletions made by one turn are never half-visible to another.
 * Only the final chat call of respond() runs outside it.
 */
export class MemoryOrchestrator {
  private store: MemoryStore;
  private embedder: Embedder;
  private completion: CompletionService;
  private ranker: Ranker;
  private logger: Logger;
  private extraction: ExtractionPipeline;
  private curation: CurationPipeline;
  private queue = new SerialQueue();

  private importanceThreshold: number;
  private relevantLimit: number;
  private maxContextChars: number;
  private systemPreamble: string;

  constructor(deps: MemoryOrchestratorDeps) {
    this.store = deps.store;
    this.embedder = deps.embedder;
    this.completion = deps.completion;
    this.ranker = deps.ranker ?? new LinearRanker();
    this.logger = deps.logger ?? createLogger({ scope: 'memory' });
    this.extraction = new ExtractionPipeline(this.completion);
    this.curation = new CurationPipeline(this.completion, this.logger);

    const options = deps.options ?? {};
    this.importanceThreshold = options.importanceThreshold ?? DEFAULT_IMPORTANCE_THRESHOLD;
    this.relevantLimit = options.relevantLimit ?? DEFAULT_RANK_LIMIT;
    this.maxContextChars = options.maxContextChars ?? DEFAULT_MAX_CONTEXT_CHARS;
    this.systemPreamble = options.systemPreamble ?? DEFAULT_SYSTEM_PREAMBLE;
  }

  /**
   * One turn of memory upkeep: extract, then curate, then rank against the
   * post-deletion state.
   */
  async process(conversation: readonly Message[], options: ProcessOptions = {}): Promise<ProcessResult> {
    const { extract = true, curate = true, limit = this.relevantLimit } = options;

    return this.queue.enqueue(async () => {
      const newMemories = extract ? await this.extractAndStore(conversation) : [];
      const deletedMemories = curate ? await this.curate(conversation) : [];
      const relevantMemories = await this.rankRelevant(findLastUserMessage(conversation), limit);

      this.logger.debug(
        `Turn processed: ${newMemories.length} added, ${deletedMemories.length} deleted, ` +
        `${relevantMemories.length} relevant`
      );

      return { newMemories, deletedMemories, relevantMemories };
    });
  }

  async respond(conversation: readonly Message[], options: RespondOptions = {}): Promise<RespondResult> {
    const { model, temperature = 0.7, maxTokens = 1000, extract, curate } = options;

    const result = await this.process(conversation, { extract, curate });
    const block = formatMemoriesForContext(result.relevantMemories, this.maxContextChars);
    const messages = buildAugmentedMessages(conversation, block, this.systemPreamble);

    const response = await this.completion.chat(messages, { model, temperature, maxTokens });

    return { response, ...result };
  }

  async addMemory(content: string, metadata: MemoryMetadata = {}): Promise<MemoryRecord> {
    const text = requireContent(content);

    return this.queue.enqueue(async () => {
      const embedding = await this.embedder.embed(text);
      const id = this.store.add(text, embedding, metadata);
      return this.requireRecord(id);
    });
  }

  /**
   * Partial edit. A content change is re-embedded before it is written.
   * Returns null when the memory does not exist.
   */
  async updateMemory(id: number, edit: MemoryEdit): Promise<MemoryRecord | null> {
    const content = edit.content === undefined ? undefined : requireContent(edit.content);

    return this.queue.enqueue(async () => {
      if (!this.store.get(id)) return null;

      const changes: MemoryUpdate = {};
      if (content !== undefined) {
        changes.content = content;
        changes.embedding = await this.embedder.embed(content);
      }
      if (edit.metadata !== undefined) {
        changes.metadata = edit.metadata;
      }

      return this.store.update(id, changes) ? this.store.get(id) : null;
    });
  }

  async reembedMemory(id: number): Promise<MemoryRecord | null> {
    return this.queue.enqueue(async () => {
      const memory = this.store.get(id);
      if (!memory) return null;

      const embedding = await this.embedder.embed(memory.content);
      this.store.update(id, { embedding });
      return this.store.get(id);
    });
  }

  async deleteMemory(id: number): Promise<boolean> {
    return this.queue.enqueue(() => this.store.delete(id));
  }

  async getMemory(id: number): Promise<MemoryRecord | null> {
    return this.queue.enqueue(() => this.store.get(id));
  }

  async listMemories(): Promise<MemoryRecord[]> {
    return this.queue.enqueue(() => this.store.listAll());
  }

  async countMemories(): Promise<number> {
    return this.queue.enqueue(() => this.store.count());
  }

  async searchByContent(query: string, limit: number = DEFAULT_RANK_LIMIT): Promise<MemoryRecord[]> {
    return this.queue.enqueue(() => this.store.searchByContent(query, limit));
  }

  async getRelevantMemories(query: string, limit: number = DEFAULT_RANK_LIMIT): Promise<RankedMemory[]> {
    return this.queue.enqueue(() => this.rankRelevant(query, limit));
  }

  private async extractAndStore(conversation: readonly Message[]): Promise<MemoryRecord[]> {
    const candidates = await this.extraction.extract(conversation, this.importanceThreshold);
    if (candidates.length === 0) return [];

    // Embed everything first so an embedding fault leaves the store untouched
    const embeddings = await this.embedder.embedBatch(candidates.map((c) => c.content));

    const ids = this.store.transaction(() =>
      candidates.map((candidate, i) =>
        this.store.add(candidate.content, embeddings[i], extractedMetadata(candidate))
      )
    );

    this.logger.info(`Stored ${ids.length} new memor${ids.length === 1 ? 'y' : 'ies'}`);
    return ids.map((id) => this.requireRecord(id));
  }

  private async curate(conversation: readonly Message[]): Promise<number[]> {
    const existing = this.store.listAll();
    const ids = await this.curation.identifyDeletions(conversation, existing);

    const deleted = ids.filter((id) => this.store.delete(id));
    if (deleted.length > 0) {
      this.logger.info(`Deleted memories: ${deleted.join(', ')}`);
    }
    return deleted;
  }

  private async rankRelevant(query: string | null, limit: number): Promise<RankedMemory[]> {
    if (query === null || query.trim() === '' || limit <= 0) {
      return [];
    }

    const embedding = await this.embedder.embed(query);
    return this.ranker.rank(embedding, this.store.listAll(), limit);
  }

  private requireRecord(id: number): MemoryRecord {
    const record = this.store.get(id);
    if (!record) {
      throw new StorageFault(`Memory ${id} missing after write`);
    }
    return record;
  }
}

function requireContent(content: string): string {
  const text = content.trim();
  if (!text) {
    throw new ValidationError('Memory content must not be empty');
  }
  return text;
}

function extractedMetadata(candidate: CandidateMemory): MemoryMetadata {
  const metadata: MemoryMetadata = {
    category: candidate.category ?? 'general',
    entities: candidate.entities ?? [],
  };
  if (candidate.importance !== undefined) {
    metadata.importance = candidate.importance;
  }
  return metadata;
}
