import { Command } from '@commander-js/extra-typings';
import chalk from 'chalk';
import type { MemoryMetadata } from '../../memory/types.js';
import {
  exitWithError,
  openMemorySystem,
  openStore,
  parseId,
  parseLimit,
  requireProjectRoot,
} from '../session.js';
import { emptyState, formatMemory, formatRankedMemory, success } from '../ui.js';

export const memoryCommand = new Command('memory')
  .description('Manage stored memories');

interface MetadataOptions {
  importance?: string;
  category?: string;
  entities?: string;
}

function metadataFromOptions(options: MetadataOptions): MemoryMetadata | undefined {
  const metadata: MemoryMetadata = {};
  let touched = false;

  if (options.importance !== undefined) {
    const importance = Number(options.importance);
    if (!Number.isInteger(importance) || importance < 1 || importance > 10) {
      console.error(chalk.red(`Importance must be an integer from 1 to 10, got: ${options.importance}`));
      process.exit(1);
    }
    metadata.importance = importance;
    touched = true;
  }
  if (options.category !== undefined) {
    metadata.category = options.category;
    touched = true;
  }
  if (options.entities !== undefined) {
    metadata.entities = options.entities.split(',').map((e) => e.trim()).filter(Boolean);
    touched = true;
  }

  return touched ? metadata : undefined;
}

// mem memory add <content...>
memoryCommand
  .command('add')
  .argument('<content...>', 'Memory content')
  .option('-i, --importance <n>', 'Importance from 1 to 10')
  .option('-c, --category <category>', 'Category, e.g. preference or fact')
  .option('-e, --entities <list>', 'Comma-separated entities')
  .description('Store a new memory')
  .action(async (content: string[], options: MetadataOptions) => {
    const root = requireProjectRoot();
    const metadata = metadataFromOptions(options) ?? {};

    try {
      const { system } = await openMemorySystem(root);
      try {
        const memory = await system.orchestrator.addMemory(content.join(' '), metadata);
        console.log(success('Added memory:'));
        console.log(formatMemory(memory));
      } finally {
        system.close();
      }
    } catch (error) {
      exitWithError(error);
    }
  });

// mem memory list
memoryCommand
  .command('list')
  .option('-n, --limit <n>', 'Limit number of results', '20')
  .description('List memories, newest first')
  .action((options: { limit?: string }) => {
    const root = requireProjectRoot();

    try {
      const store = openStore(root);
      try {
        const all = store.listAll();
        const memories = all.slice(0, parseLimit(options.limit, 20));

        if (memories.length === 0) {
          emptyState('No memories found.', 'Add one with: mem memory add "I prefer tea over coffee"');
          return;
        }

        console.log(chalk.bold(`\nMemories (${memories.length} of ${all.length}):\n`));
        for (const memory of memories) {
          console.log(formatMemory(memory));
          console.log();
        }
      } finally {
        store.close();
      }
    } catch (error) {
      exitWithError(error);
    }
  });

// mem memory get <id>
memoryCommand
  .command('get')
  .argument('<id>', 'Memory ID')
  .description('Show one memory in full')
  .action((id: string) => {
    const root = requireProjectRoot();
    const memoryId = parseId(id);

    try {
      const store = openStore(root);
      try {
        const memory = store.get(memoryId);
        if (!memory) {
          console.error(chalk.red(`Memory not found: ${memoryId}`));
          process.exitCode = 1;
          return;
        }
        console.log(formatMemory(memory, { verbose: true }));
      } finally {
        store.close();
      }
    } catch (error) {
      exitWithError(error);
    }
  });

// mem memory search <query...>
memoryCommand
  .command('search')
  .argument('<query...>', 'Text to look for')
  .option('-n, --limit <n>', 'Limit results', '10')
  .description('Find memories containing the text (case-insensitive)')
  .action((query: string[], options: { limit?: string }) => {
    const root = requireProjectRoot();
    const fullQuery = query.join(' ');

    try {
      const store = openStore(root);
      try {
        const results = store.searchByContent(fullQuery, parseLimit(options.limit, 10));
        if (results.length === 0) {
          console.log(chalk.gray(`No memories containing "${fullQuery}"`));
          return;
        }

        console.log(chalk.bold(`\nMemories containing "${fullQuery}":\n`));
        for (const memory of results) {
          console.log(formatMemory(memory));
          console.log();
        }
      } finally {
        store.close();
      }
    } catch (error) {
      exitWithError(error);
    }
  });

// mem memory find <query...>
memoryCommand
  .command('find')
  .argument('<query...>', 'Natural-language query')
  .option('-n, --limit <n>', 'Limit results', '5')
  .description('Rank memories by semantic relevance')
  .action(async (query: string[], options: { limit?: string }) => {
    const root = requireProjectRoot();
    const fullQuery = query.join(' ');

    try {
      const { system } = await openMemorySystem(root);
      try {
        const results = await system.orchestrator.getRelevantMemories(fullQuery, parseLimit(options.limit, 5));
        if (results.length === 0) {
          console.log(chalk.gray('No memories stored yet.'));
          return;
        }

        console.log(chalk.bold(`\nMost relevant to "${fullQuery}":\n`));
        for (const result of results) {
          console.log(formatRankedMemory(result));
          console.log();
        }
      } finally {
        system.close();
      }
    } catch (error) {
      exitWithError(error);
    }
  });

// mem memory update <id>
memoryCommand
  .command('update')
  .argument('<id>', 'Memory ID')
  .option('--content <text>', 'Replace the content (re-embeds)')
  .option('-i, --importance <n>', 'Importance from 1 to 10')
  .option('-c, --category <category>', 'Category')
  .option('-e, --entities <list>', 'Comma-separated entities')
  .option('--reembed', 'Recompute the embedding from the current content')
  .description('Edit a memory; metadata options replace the stored metadata')
  .action(async (id: string, options: MetadataOptions & { content?: string; reembed?: boolean }) => {
    const root = requireProjectRoot();
    const memoryId = parseId(id);
    const metadata = metadataFromOptions(options);

    try {
      const { system } = await openMemorySystem(root);
      try {
        const { orchestrator } = system;
        let memory = await orchestrator.updateMemory(memoryId, { content: options.content, metadata });
        if (memory && options.reembed && options.content === undefined) {
          memory = await orchestrator.reembedMemory(memoryId);
        }

        if (!memory) {
          console.error(chalk.red(`Memory not found: ${memoryId}`));
          process.exitCode = 1;
          return;
        }

        console.log(success('Updated memory:'));
        console.log(formatMemory(memory, { verbose: true }));
      } finally {
        system.close();
      }
    } catch (error) {
      exitWithError(error);
    }
  });

// mem memory delete <id>
memoryCommand
  .command('delete')
  .argument('<id>', 'Memory ID to delete')
  .option('-y, --yes', 'Skip confirmation')
  .description('Delete a memory permanently')
  .action((id: string, options: { yes?: boolean }) => {
    const root = requireProjectRoot();
    const memoryId = parseId(id);

    try {
      const store = openStore(root);
      try {
        const memory = store.get(memoryId);
        if (!memory) {
          console.error(chalk.red(`Memory not found: ${memoryId}`));
          process.exitCode = 1;
          return;
        }

        if (!options.yes) {
          console.log(chalk.yellow('About to delete:'));
          console.log(formatMemory(memory));
          console.log(chalk.gray('\nUse --yes to confirm deletion.'));
          return;
        }

        store.delete(memoryId);
        console.log(success(`Deleted memory: ${memoryId}`));
      } finally {
        store.close();
      }
    } catch (error) {
      exitWithError(error);
    }
  });
