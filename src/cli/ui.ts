/**
 * Terminal formatting helpers
 */

import chalk from 'chalk';
import type { MemoryRecord, RankedMemory } from '../memory/types.js';

export const icons = {
  checkmark: '\u{2705}',
  cross: '\u{274C}',
  brain: '\u{1F9E0}',
  search: '\u{1F50D}',
  memo: '\u{1F4DD}',
  dot: '\u{2022}',
};

/**
 * Category color map
 */
const categoryColors: Record<string, typeof chalk> = {
  preference: chalk.yellow,
  fact: chalk.blue,
  personal_info: chalk.magenta,
};

function categoryColor(category: string): typeof chalk {
  return categoryColors[category] ?? chalk.white;
}

export function formatTimestamp(date: Date): string {
  return date.toISOString().replace('T', ' ').slice(0, 19);
}

/**
 * Format a memory record for display
 */
export function formatMemory(memory: MemoryRecord, options: { verbose?: boolean } = {}): string {
  const { importance, category, entities } = memory.metadata;
  const tag = category ? categoryColor(category)(`[${category}]`) + ' ' : '';

  let output = `${chalk.cyan(`#${memory.id}`)} ${tag}${chalk.white(memory.content)}`;

  const details: string[] = [];
  if (importance !== undefined) details.push(`importance ${importance}`);
  if (entities && entities.length > 0) details.push(`entities: ${entities.join(', ')}`);
  if (details.length > 0) {
    output += `\n   ${chalk.gray(details.join(' | '))}`;
  }

  if (options.verbose) {
    output += `\n   ${chalk.dim(`created ${formatTimestamp(memory.createdAt)} | updated ${formatTimestamp(memory.updatedAt)}`)}`;
    output += `\n   ${chalk.dim(memory.embedding ? `embedding: ${memory.embedding.length} dims` : 'embedding: none')}`;
    if (memory.metadata.extra) {
      output += `\n   ${chalk.dim(`extra: ${JSON.stringify(memory.metadata.extra)}`)}`;
    }
  }

  return output;
}

/**
 * Format a ranked memory with its similarity
 */
export function formatRankedMemory(ranked: RankedMemory): string {
  const percentage = Math.round(ranked.similarity * 100);

  // Color the percentage based on relevance
  let percentColor = chalk.red;
  if (percentage >= 80) percentColor = chalk.green;
  else if (percentage >= 60) percentColor = chalk.yellow;
  else if (percentage >= 40) percentColor = chalk.cyan;

  return `${formatMemory(ranked.memory)}\n   ${percentColor(`${percentage}% match`)}`;
}

/**
 * Print an empty state message
 */
export function emptyState(message: string, hint?: string): void {
  console.log();
  console.log(chalk.gray(`   ${message}`));
  if (hint) {
    console.log(chalk.gray.dim(`   ${hint}`));
  }
  console.log();
}

/**
 * Success message with green checkmark
 */
export function success(message: string): string {
  return chalk.green('✓') + ' ' + message;
}

/**
 * Error message with red X
 */
export function error(message: string): string {
  return chalk.red('✗') + ' ' + message;
}

export function warning(message: string): string {
  return chalk.yellow('⚠') + ' ' + message;
}

/**
 * Styled header with decorative elements
 */
export function header(text: string, emoji?: string): string {
  const decoration = chalk.gray('─'.repeat(40));
  const prefix = emoji ? emoji + ' ' : '';
  return `\n${decoration}\n${prefix}${chalk.bold.cyan(text)}\n${decoration}\n`;
}

/**
 * Key-value pair display
 */
export function keyValue(key: string, value: string, keyWidth?: number): string {
  const width = keyWidth ?? 15;
  const paddedKey = key.padEnd(width);
  return `${chalk.cyan(paddedKey)} ${value}`;
}

/**
 * One-line summary of what a turn did to memory
 */
export function turnSummary(added: number, deleted: number, used: number): string {
  return chalk.gray(`[memory: +${added} added, -${deleted} deleted, ${used} used]`);
}
