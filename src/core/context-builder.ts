import type { Message } from '../adapters/types.js';
import type { RankedMemory } from '../memory/types.js';

export const DEFAULT_MAX_CONTEXT_CHARS = 4000;

export const NO_MEMORIES_TEXT = 'No relevant memories found.';
export const MEMORIES_HEADER = 'Relevant memories:';

export const DEFAULT_SYSTEM_PREAMBLE =
  "You are a helpful assistant with access to the user's long-term memories. " +
  'Use the following memories to inform your responses:';

/**
 * Content of the most recent user message, scanning from the end.
 */
export function findLastUserMessage(conversation: readonly Message[]): string | null {
  for (let i = conversation.length - 1; i >= 0; i--) {
    const msg = conversation[i];
    if (msg.role === 'user') {
      return msg.content;
    }
  }
  return null;
}

/**
 * Render ranked memories as a bulleted block no longer than maxChars.
 * Lines that would overflow are dropped; a first line that alone overflows
 * is cut short and ends in "...".
 */
export function formatMemoriesForContext(
  ranked: readonly RankedMemory[],
  maxChars: number = DEFAULT_MAX_CONTEXT_CHARS
): string {
  if (ranked.length === 0) {
    return NO_MEMORIES_TEXT;
  }

  const lines = [MEMORIES_HEADER];
  let length = MEMORIES_HEADER.length;

  for (const { memory } of ranked) {
    const line = `- ${memory.content}`;

    if (length + 1 + line.length <= maxChars) {
      lines.push(line);
      length += 1 + line.length;
      continue;
    }

    if (lines.length === 1) {
      const available = maxChars - length - 1;
      if (available > 3) {
        lines.push(`${line.slice(0, available - 3)}...`);
      }
    }
    break;
  }

  return lines.join('\n');
}

export function buildMemorySystemMessage(
  memoryBlock: string,
  preamble: string = DEFAULT_SYSTEM_PREAMBLE
): Message {
  return {
    role: 'system',
    content: `${preamble}\n\n${memoryBlock}`,
  };
}

/**
 * A new message list with the memory system message in front. The caller's
 * conversation is left untouched.
 */
export function buildAugmentedMessages(
  conversation: readonly Message[],
  memoryBlock: string,
  preamble?: string
): Message[] {
  return [buildMemorySystemMessage(memoryBlock, preamble), ...conversation];
}

/**
 * Keep the most recent messages whose combined content fits in maxChars.
 */
export function truncateHistory(history: readonly Message[], maxChars: number): Message[] {
  const result: Message[] = [];
  let total = 0;

  for (let i = history.length - 1; i >= 0; i--) {
    const msg = history[i];
    if (total + msg.content.length > maxChars) {
      break;
    }
    result.unshift(msg);
    total += msg.content.length;
  }

  return result;
}
