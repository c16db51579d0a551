/**
 * Prompt templates for the memory completions.
 */

import type { Message } from '../adapters/types.js';
import type { MemoryListing } from '../memory/types.js';

export const EXTRACTION_SYSTEM_PROMPT = `You extract important information from conversations to be stored as long-term memories.
Identify statements that contain personal preferences, facts, or important information the user might want remembered in the future.

For each such statement, create a memory object with this structure:
{
  "content": "The exact statement or a concise summary of the information",
  "importance": a score from 1 to 10 indicating how important this memory is,
  "category": a string categorizing the memory (e.g., "preference", "fact", "personal_info"),
  "entities": a list of entities mentioned in the memory (e.g., ["Shram", "Magnet"])
}

Only extract information that is personally relevant to the user and useful in future conversations.
Ignore general knowledge, transient information, and casual conversation.

Return your response as a JSON array of memory objects. Return [] if there is nothing worth remembering.`;

export const DELETION_SYSTEM_PROMPT = `You identify stored memories that should be deleted based on the user's latest input.

The user might explicitly ask to forget something, or state that information is no longer true (e.g., "I don't use Magnet anymore").

For each memory, decide whether the conversation invalidates it.
Return your response as a JSON array of the memory IDs to delete.
If no memories should be deleted, return an empty array.`;

export function formatConversation(conversation: readonly Message[]): string {
  return conversation.map((msg) => `${msg.role}: ${msg.content}`).join('\n');
}

export function formatMemoryListing(listing: readonly MemoryListing[]): string {
  return listing.map((memory) => `ID: ${memory.id}, Content: ${memory.content}`).join('\n');
}

export function buildExtractionMessages(conversation: readonly Message[]): Message[] {
  return [
    { role: 'system', content: EXTRACTION_SYSTEM_PROMPT },
    { role: 'user', content: formatConversation(conversation) },
  ];
}

export function buildDeletionMessages(
  conversation: readonly Message[],
  listing: readonly MemoryListing[]
): Message[] {
  return [
    { role: 'system', content: DELETION_SYSTEM_PROMPT },
    {
      role: 'user',
      content: `Conversation:\n${formatConversation(conversation)}\n\nMemories:\n${formatMemoryListing(listing)}`,
    },
  ];
}
