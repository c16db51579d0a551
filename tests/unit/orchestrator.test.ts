import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { MemoryOrchestrator } from '../../src/core/orchestrator.js';
import { DEFAULT_SYSTEM_PREAMBLE } from '../../src/core/context-builder.js';
import { MemoryStore } from '../../src/memory/store.js';
import { CompletionFault, EmbeddingFault, ValidationError } from '../../src/errors.js';
import type { Message } from '../../src/adapters/types.js';
import {
  FailingEmbedder,
  FakeCompletionService,
  TableEmbedder,
  recordingLogger,
  removeDb,
  steppingClock,
  tmpDb,
} from '../helpers/fakes.js';

const vectors: Record<string, number[]> = {
  'I like apples': [1, 0, 0],
  'I like bananas': [0, 1, 0],
  'I drive a car': [0, 0, 1],
  'Which fruit should I buy?': [0.8, 0.6, 0],
  'Likes coffee': [0, 1, 0],
};

describe('MemoryOrchestrator', () => {
  let dbPath: string;
  let store: MemoryStore;
  let embedder: TableEmbedder;
  let completion: FakeCompletionService;
  let orchestrator: MemoryOrchestrator;

  beforeEach(() => {
    dbPath = tmpDb();
    store = new MemoryStore(dbPath, { now: steppingClock() });
    embedder = new TableEmbedder(vectors, [0.1, 0.1, 0.1]);
    completion = new FakeCompletionService();
    orchestrator = new MemoryOrchestrator({
      store,
      embedder,
      completion,
      logger: recordingLogger().logger,
    });
  });

  afterEach(() => {
    store.close();
    removeDb(dbPath);
  });

  describe('process', () => {
    it('stores a memory and later deletes it when the user retracts it', async () => {
      completion.candidates = [{
        content: 'I use Shram and Magnet as productivity tools',
        importance: 8,
        category: 'preference',
        entities: ['Shram', 'Magnet'],
      }];

      const first = await orchestrator.process([
        { role: 'user', content: 'I use Shram and Magnet as productivity tools' },
      ]);

      expect(first.newMemories).toHaveLength(1);
      const stored = first.newMemories[0];
      expect(stored.content).toBe('I use Shram and Magnet as productivity tools');
      expect(stored.metadata).toEqual({
        category: 'preference',
        entities: ['Shram', 'Magnet'],
        importance: 8,
      });
      expect(first.deletedMemories).toEqual([]);
      expect(first.relevantMemories.map((r) => r.memory.id)).toEqual([stored.id]);

      completion.candidates = [];
      completion.deletions = [stored.id];

      const second = await orchestrator.process([
        { role: 'user', content: "I don't use Magnet anymore" },
      ]);

      expect(second.newMemories).toEqual([]);
      expect(second.deletedMemories).toEqual([stored.id]);
      expect(second.relevantMemories).toEqual([]);
      expect(store.listAll()).toEqual([]);
    });

    it('ranks stored memories against the last user message', async () => {
      await orchestrator.addMemory('I like apples');
      await orchestrator.addMemory('I like bananas');
      await orchestrator.addMemory('I drive a car');

      const result = await orchestrator.process(
        [
          { role: 'user', content: 'Which fruit should I buy?' },
          { role: 'assistant', content: 'Let me think.' },
        ],
        { extract: false, curate: false, limit: 2 }
      );

      expect(result.relevantMemories.map((r) => r.memory.content)).toEqual([
        'I like apples',
        'I like bananas',
      ]);
      expect(result.relevantMemories[0].similarity).toBeCloseTo(0.8, 5);
      expect(result.relevantMemories[1].similarity).toBeCloseTo(0.6, 5);
    });

    it('fills in default metadata for extracted memories', async () => {
      completion.candidates = [{ content: 'Has a dog named Rex', importance: 6 }];

      const result = await orchestrator.process([{ role: 'user', content: 'My dog Rex is great' }]);

      expect(result.newMemories[0].metadata).toEqual({
        category: 'general',
        entities: [],
        importance: 6,
      });
    });

    it('applies the importance threshold option', async () => {
      const strict = new MemoryOrchestrator({
        store,
        embedder,
        completion,
        logger: recordingLogger().logger,
        options: { importanceThreshold: 8 },
      });
      completion.candidates = [
        { content: 'Minor detail', importance: 6 },
        { content: 'Major detail', importance: 9 },
      ];

      const result = await strict.process([{ role: 'user', content: 'hello' }]);

      expect(result.newMemories.map((m) => m.content)).toEqual(['Major detail']);
    });

    it('skips extraction and curation when disabled', async () => {
      await orchestrator.addMemory('I like apples');
      completion.candidates = [{ content: 'Ignored', importance: 10 }];
      completion.deletions = [1];

      const result = await orchestrator.process(
        [{ role: 'user', content: 'Which fruit should I buy?' }],
        { extract: false, curate: false }
      );

      expect(completion.extractCalls).toEqual([]);
      expect(completion.deletionCalls).toEqual([]);
      expect(result.newMemories).toEqual([]);
      expect(result.deletedMemories).toEqual([]);
      expect(store.count()).toBe(1);
    });

    it('returns no relevant memories without a user message', async () => {
      await orchestrator.addMemory('I like apples');
      embedder.calls.length = 0;

      const result = await orchestrator.process(
        [{ role: 'assistant', content: 'How can I help?' }],
        { extract: false, curate: false }
      );

      expect(result.relevantMemories).toEqual([]);
      expect(embedder.calls).toEqual([]);
    });

    it('leaves the store untouched when embedding fails', async () => {
      const failing = new MemoryOrchestrator({
        store,
        embedder: new FailingEmbedder(new EmbeddingFault('OpenAI embedding failed: down')),
        completion,
        logger: recordingLogger().logger,
      });
      completion.candidates = [
        { content: 'First', importance: 9 },
        { content: 'Second', importance: 9 },
      ];

      await expect(failing.process([{ role: 'user', content: 'hi' }]))
        .rejects.toThrow('OpenAI embedding failed: down');
      expect(store.count()).toBe(0);
    });
  });

  describe('respond', () => {
    it('puts the relevant memories in a leading system message', async () => {
      await orchestrator.addMemory('I like apples');
      completion.reply = 'Buy apples.';
      const conversation: Message[] = [{ role: 'user', content: 'Which fruit should I buy?' }];

      const result = await orchestrator.respond(conversation, { extract: false, curate: false });

      expect(result.response).toBe('Buy apples.');
      expect(completion.chatCalls).toHaveLength(1);
      expect(completion.chatCalls[0].messages).toEqual([
        {
          role: 'system',
          content: `${DEFAULT_SYSTEM_PREAMBLE}\n\nRelevant memories:\n- I like apples`,
        },
        { role: 'user', content: 'Which fruit should I buy?' },
      ]);
      expect(completion.chatCalls[0].params).toEqual({
        model: undefined,
        temperature: 0.7,
        maxTokens: 1000,
      });
      expect(conversation).toHaveLength(1);
    });

    it('says so when there is nothing relevant', async () => {
      await orchestrator.respond([{ role: 'user', content: 'hi' }], { extract: false, curate: false });

      expect(completion.chatCalls[0].messages[0].content)
        .toBe(`${DEFAULT_SYSTEM_PREAMBLE}\n\nNo relevant memories found.`);
    });

    it('forwards generation parameters', async () => {
      await orchestrator.respond([{ role: 'user', content: 'hi' }], {
        model: 'gpt-4o-mini',
        temperature: 0.2,
        maxTokens: 50,
      });

      expect(completion.chatCalls[0].params).toEqual({
        model: 'gpt-4o-mini',
        temperature: 0.2,
        maxTokens: 50,
      });
    });

    it('propagates chat faults', async () => {
      completion.chatError = new CompletionFault('Anthropic error: overloaded', { status: 529 });

      await expect(orchestrator.respond([{ role: 'user', content: 'hi' }]))
        .rejects.toBeInstanceOf(CompletionFault);
    });
  });

  describe('memory operations', () => {
    it('trims and embeds added memories', async () => {
      const memory = await orchestrator.addMemory('  I like apples  ', { category: 'explicit' });

      expect(memory.content).toBe('I like apples');
      expect(memory.metadata).toEqual({ category: 'explicit' });
      expect(Array.from(memory.embedding ?? [])).toEqual([1, 0, 0]);
    });

    it('rejects empty content', async () => {
      await expect(orchestrator.addMemory('   ')).rejects.toBeInstanceOf(ValidationError);
      expect(store.count()).toBe(0);
    });

    it('re-embeds edited content', async () => {
      const memory = await orchestrator.addMemory('I like apples');

      const updated = await orchestrator.updateMemory(memory.id, { content: 'Likes coffee' });

      expect(updated?.content).toBe('Likes coffee');
      expect(Array.from(updated?.embedding ?? [])).toEqual([0, 1, 0]);
    });

    it('edits metadata without re-embedding', async () => {
      const memory = await orchestrator.addMemory('I like apples');
      embedder.calls.length = 0;

      const updated = await orchestrator.updateMemory(memory.id, { metadata: { importance: 3 } });

      expect(updated?.metadata).toEqual({ importance: 3 });
      expect(embedder.calls).toEqual([]);
    });

    it('returns null when updating a missing memory', async () => {
      expect(await orchestrator.updateMemory(999, { content: 'Likes coffee' })).toBeNull();
      expect(await orchestrator.reembedMemory(999)).toBeNull();
    });

    it('searches by content and by meaning', async () => {
      await orchestrator.addMemory('I like apples');
      await orchestrator.addMemory('I drive a car');

      const byText = await orchestrator.searchByContent('APPLES');
      expect(byText.map((m) => m.content)).toEqual(['I like apples']);

      const byMeaning = await orchestrator.getRelevantMemories('Which fruit should I buy?', 1);
      expect(byMeaning.map((r) => r.memory.content)).toEqual(['I like apples']);
    });

    it('runs operations one at a time in submission order', async () => {
      const first = orchestrator.addMemory('I like apples');
      const second = orchestrator.addMemory('I like bananas');
      const removed = orchestrator.deleteMemory(1);
      const listed = orchestrator.listMemories();
      const counted = orchestrator.countMemories();

      const [a, b, wasRemoved, memories, count] = await Promise.all([first, second, removed, listed, counted]);

      expect(a.id).toBe(1);
      expect(b.id).toBe(2);
      expect(wasRemoved).toBe(true);
      expect(memories.map((m) => m.content)).toEqual(['I like bananas']);
      expect(count).toBe(1);
    });

    it('keeps serving after a failed operation', async () => {
      const failed = orchestrator.addMemory('');
      const next = orchestrator.addMemory('I like apples');

      await expect(failed).rejects.toBeInstanceOf(ValidationError);
      expect((await next).content).toBe('I like apples');
      expect(await orchestrator.getMemory(1)).not.toBeNull();
    });
  });
});
