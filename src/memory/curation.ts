import type { Message } from '../adapters/types.js';
import { createLogger } from '../utils/logger.js';
import type { Logger } from '../utils/logger.js';
import type { CompletionService } from './completion.js';
import type { MemoryRecord } from './types.js';

/**
 * Decides which stored memories a conversation invalidates.
 *
 * The completion service is untrusted: ids it returns that are not among
 * the existing memories are dropped with a warning, and repeats collapse
 * to their first occurrence.
 */
export class CurationPipeline {
  private logger: Logger;

  constructor(
    private completion: CompletionService,
    logger?: Logger
  ) {
    this.logger = logger ?? createLogger({ scope: 'curation' });
  }

  async identifyDeletions(
    conversation: readonly Message[],
    existingMemories: readonly MemoryRecord[]
  ): Promise<number[]> {
    if (existingMemories.length === 0 || conversation.length === 0) {
      return [];
    }

    const listing = existingMemories.map((memory) => ({ id: memory.id, content: memory.content }));
    const proposed = await this.completion.selectDeletions(conversation, listing);

    const known = new Set(existingMemories.map((memory) => memory.id));
    const selected = new Set<number>();

    for (const id of proposed) {
      if (!known.has(id)) {
        this.logger.warn(`Ignoring deletion of unknown memory id ${id}`);
        continue;
      }
      selected.add(id);
    }

    return [...selected];
  }
}
