import chalk from 'chalk';
import { findProjectRoot, getMemoryDbPath, loadConfig } from '../config/index.js';
import type { Config } from '../config/index.js';
import { createMemorySystem } from '../core/system.js';
import type { MemorySystem } from '../core/system.js';
import { errorMessage } from '../errors.js';
import { MemoryStore } from '../memory/store.js';
import { error } from './ui.js';

/**
 * Resolve the project root or exit with a hint
 */
export function requireProjectRoot(): string {
  const root = findProjectRoot();
  if (!root) {
    console.error(chalk.red('Not in a Memoria project. Run `mem init` first.'));
    process.exit(1);
  }
  return root;
}

export async function openMemorySystem(
  root: string,
  options: { model?: string } = {}
): Promise<{ system: MemorySystem; config: Config }> {
  const config = loadConfig(root);
  const system = await createMemorySystem(config, {
    dbPath: getMemoryDbPath(root),
    env: process.env,
    model: options.model,
  });
  return { system, config };
}

// Store-only access for commands that need no embedding or model
export function openStore(root: string): MemoryStore {
  return new MemoryStore(getMemoryDbPath(root));
}

export function exitWithError(err: unknown): never {
  console.error(error(chalk.red(`Error: ${errorMessage(err)}`)));
  process.exit(1);
}

export function parseId(value: string): number {
  const id = Number(value);
  if (!Number.isInteger(id) || id <= 0) {
    console.error(chalk.red(`Invalid memory id: ${value}`));
    process.exit(1);
  }
  return id;
}

export function parseLimit(value: string | undefined, fallback: number): number {
  const limit = parseInt(value ?? String(fallback), 10);
  return Number.isNaN(limit) ? fallback : limit;
}
