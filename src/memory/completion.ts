import { z } from 'zod';
import { errorMessage } from '../errors.js';
import { createLogger } from '../utils/logger.js';
import type { Logger } from '../utils/logger.js';
import type { Message, ModelAdapter } from '../adapters/types.js';
import { buildDeletionMessages, buildExtractionMessages } from '../templates/prompts.js';
import { decodeJsonArray } from './decode.js';
import type { CandidateMemory, GenerationParams, MemoryListing } from './types.js';

/**
 * The language-model side of the memory system.
 *
 * extractCandidates and selectDeletions are fail-soft: unparsable output or a
 * failed call resolves to an empty list. chat propagates faults.
 */
export interface CompletionService {
  extractCandidates(conversation: readonly Message[]): Promise<CandidateMemory[]>;
  selectDeletions(conversation: readonly Message[], listing: readonly MemoryListing[]): Promise<number[]>;
  chat(messages: readonly Message[], params?: GenerationParams): Promise<string>;
}

function toOptionalNumber(value: unknown): number | undefined {
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

export const CandidateSchema = z.object({
  content: z.string().trim().min(1),
  importance: z.unknown().transform(toOptionalNumber),
  category: z.unknown().transform((value) => (typeof value === 'string' && value ? value : undefined)),
  entities: z.unknown().transform((value) =>
    Array.isArray(value)
      ? value.filter((entity): entity is string => typeof entity === 'string')
      : undefined
  ),
});

export function parseCandidates(items: readonly unknown[]): CandidateMemory[] {
  const candidates: CandidateMemory[] = [];

  for (const item of items) {
    const parsed = CandidateSchema.safeParse(item);
    if (!parsed.success) continue;

    const candidate: CandidateMemory = { content: parsed.data.content };
    if (parsed.data.importance !== undefined) candidate.importance = parsed.data.importance;
    if (parsed.data.category !== undefined) candidate.category = parsed.data.category;
    if (parsed.data.entities !== undefined) candidate.entities = parsed.data.entities;
    candidates.push(candidate);
  }

  return candidates;
}

// Integer ids, given either as numbers or integer strings
export function parseMemoryIds(items: readonly unknown[]): number[] {
  const ids: number[] = [];

  for (const item of items) {
    const id = toOptionalNumber(item);
    if (id !== undefined && Number.isInteger(id)) {
      ids.push(id);
    }
  }

  return ids;
}

export interface LlmCompletionOptions {
  // Temperature for extraction and deletion prompts
  analysisTemperature?: number;
  logger?: Logger;
}

export class LlmCompletionService implements CompletionService {
  private analysisTemperature: number;
  private logger: Logger;

  constructor(
    private adapter: ModelAdapter,
    options: LlmCompletionOptions = {}
  ) {
    this.analysisTemperature = options.analysisTemperature ?? 0.3;
    this.logger = options.logger ?? createLogger({ scope: 'completion' });
  }

  async extractCandidates(conversation: readonly Message[]): Promise<CandidateMemory[]> {
    const text = await this.analyse('extraction', buildExtractionMessages(conversation));
    if (text === null) return [];

    const items = decodeJsonArray(text);
    if (items === null) {
      this.logger.warn('Extraction response was not a JSON array; treating as no memories');
      this.logger.debug('Raw extraction response:', text);
      return [];
    }

    const candidates = parseCandidates(items);
    if (candidates.length < items.length) {
      this.logger.debug(`Dropped ${items.length - candidates.length} malformed extraction item(s)`);
    }
    return candidates;
  }

  async selectDeletions(
    conversation: readonly Message[],
    listing: readonly MemoryListing[]
  ): Promise<number[]> {
    const text = await this.analyse('deletion', buildDeletionMessages(conversation, listing));
    if (text === null) return [];

    const items = decodeJsonArray(text);
    if (items === null) {
      this.logger.warn('Deletion response was not a JSON array; deleting nothing');
      this.logger.debug('Raw deletion response:', text);
      return [];
    }

    return parseMemoryIds(items);
  }

  async chat(messages: readonly Message[], params: GenerationParams = {}): Promise<string> {
    const response = await this.adapter.complete({
      messages,
      model: params.model,
      temperature: params.temperature,
      maxTokens: params.maxTokens,
    });
    return response.content;
  }

  // A failed or timed-out analysis call degrades to "no result"
  private async analyse(kind: string, messages: Message[]): Promise<string | null> {
    try {
      const response = await this.adapter.complete({
        messages,
        temperature: this.analysisTemperature,
      });
      return response.content;
    } catch (error) {
      this.logger.warn(`Memory ${kind} call failed: ${errorMessage(error)}`);
      return null;
    }
  }
}
