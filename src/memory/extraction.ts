import type { Message } from '../adapters/types.js';
import type { CompletionService } from './completion.js';
import type { CandidateMemory } from './types.js';

export const DEFAULT_IMPORTANCE_THRESHOLD = 5;

// Missing importance counts as 0. The boundary is inclusive.
export function shouldStoreMemory(
  candidate: CandidateMemory,
  threshold: number = DEFAULT_IMPORTANCE_THRESHOLD
): boolean {
  return (candidate.importance ?? 0) >= threshold;
}

export class ExtractionPipeline {
  constructor(private completion: CompletionService) {}

  async extract(
    conversation: readonly Message[],
    importanceThreshold: number = DEFAULT_IMPORTANCE_THRESHOLD
  ): Promise<CandidateMemory[]> {
    if (conversation.length === 0) {
      return [];
    }

    const candidates = await this.completion.extractCandidates(conversation);
    return candidates.filter((candidate) => shouldStoreMemory(candidate, importanceThreshold));
  }
}
