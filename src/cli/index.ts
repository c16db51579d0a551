import { Command } from '@commander-js/extra-typings';
import { chatCommand } from './commands/chat.js';
import { askCommand } from './commands/ask.js';
import { memoryCommand } from './commands/memory.js';
import { configCommand } from './commands/config.js';
import { initCommand } from './commands/init.js';
import { mcpCommand } from './commands/mcp.js';

export const program = new Command()
  .name('mem')
  .description('Memoria - long-term memory for chat assistants')
  .version('0.1.0');

// Initialize a new project
program
  .command('init')
  .description('Initialize Memoria in the current directory')
  .option('-f, --force', 'Overwrite existing configuration')
  .action(initCommand);

// Interactive chat mode
program
  .command('chat')
  .description('Start an interactive memory-augmented chat')
  .option('-m, --model <model>', 'Model to use (e.g., ollama:llama3.2, openai:gpt-4o)')
  .option('--no-extract', 'Do not extract new memories from the conversation')
  .option('--no-curate', 'Do not delete memories the conversation invalidates')
  .option('-d, --debug', 'Show per-turn memory details')
  .action(chatCommand);

// One-shot ask
program
  .command('ask <prompt...>')
  .description('Ask a single question with memory context')
  .option('-m, --model <model>', 'Model to use')
  .option('--no-extract', 'Do not extract new memories')
  .option('--no-curate', 'Do not delete invalidated memories')
  .action(askCommand);

// Memory management
program.addCommand(memoryCommand);

// Configuration management
program.addCommand(configCommand);

// MCP server over stdio
program
  .command('mcp')
  .description('Run the MCP server on stdio')
  .action(mcpCommand);

// Default to help if no command specified
program.action(() => {
  program.help();
});
