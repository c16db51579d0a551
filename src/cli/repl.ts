/**
 * Interactive chat loop
 *
 * Each prompt runs one memory-augmented turn: new facts are extracted,
 * invalidated ones are curated away, and the relevant ones are injected
 * into the system message before the model answers.
 */

import * as readline from 'readline';
import chalk from 'chalk';
import type { Message, ModelAdapter } from '../adapters/types.js';
import { truncateHistory } from '../core/context-builder.js';
import type { MemoryOrchestrator } from '../core/orchestrator.js';
import { errorMessage } from '../errors.js';
import { emptyState, formatMemory, formatRankedMemory, success, turnSummary } from './ui.js';

export interface ReplConfig {
  extract: boolean;
  curate: boolean;
  showDebug: boolean;
  temperature: number;
  maxTokens: number;
  historyChars: number;      // Conversation sent with each turn, most recent first
}

export const DEFAULT_REPL_CONFIG: ReplConfig = {
  extract: true,
  curate: true,
  showDebug: false,
  temperature: 0.7,
  maxTokens: 1000,
  historyChars: 8000,
};

export class Repl {
  private rl: readline.Interface | null = null;
  private conversation: Message[] = [];
  private config: ReplConfig;

  constructor(
    private adapter: ModelAdapter,
    private orchestrator: MemoryOrchestrator,
    private onExit: () => void,
    config: Partial<ReplConfig> = {}
  ) {
    this.config = { ...DEFAULT_REPL_CONFIG, ...config };
  }

  /**
   * Start the REPL
   */
  async start(): Promise<void> {
    this.rl = readline.createInterface({
      input: process.stdin,
      output: process.stdout,
      prompt: chalk.cyan('you> '),
      terminal: true,
    });

    await this.printWelcome();

    this.rl.on('line', (line) => {
      this.rl?.pause();
      void this.handleLine(line)
        .catch((err: unknown) => {
          console.error(chalk.red(`\nError: ${errorMessage(err)}\n`));
        })
        .finally(() => {
          this.rl?.resume();
          this.rl?.prompt();
        });
    });

    this.rl.on('close', () => {
      this.cleanup();
      process.exit(0);
    });

    this.rl.prompt();
  }

  private async printWelcome(): Promise<void> {
    const count = await this.orchestrator.countMemories();

    console.log();
    console.log(chalk.bold.cyan('Memoria') + chalk.gray(' chat'));
    console.log(chalk.gray(`Model: ${this.adapter.name}`));
    console.log(chalk.gray(`Memories: ${count}`));
    console.log();
    console.log(chalk.gray('Type /help for commands, /quit to exit'));
    console.log();
  }

  async handleLine(line: string): Promise<void> {
    const trimmed = line.trim();
    if (!trimmed) return;

    if (trimmed.startsWith('/')) {
      await this.handleCommand(trimmed);
    } else {
      await this.handlePrompt(trimmed);
    }
  }

  private async handlePrompt(prompt: string): Promise<void> {
    const turn: Message[] = [
      ...truncateHistory(this.conversation, this.config.historyChars),
      { role: 'user', content: prompt },
    ];

    const result = await this.orchestrator.respond(turn, {
      extract: this.config.extract,
      curate: this.config.curate,
      temperature: this.config.temperature,
      maxTokens: this.config.maxTokens,
    });

    console.log();
    console.log(chalk.green('assistant> ') + result.response);
    console.log();
    console.log(turnSummary(
      result.newMemories.length,
      result.deletedMemories.length,
      result.relevantMemories.length
    ));

    if (this.config.showDebug) {
      for (const memory of result.newMemories) {
        console.log(chalk.gray(`  + #${memory.id} ${memory.content}`));
      }
      for (const id of result.deletedMemories) {
        console.log(chalk.gray(`  - #${id}`));
      }
      for (const ranked of result.relevantMemories) {
        console.log(chalk.gray(`  ~ #${ranked.memory.id} (${ranked.similarity.toFixed(3)}) ${ranked.memory.content}`));
      }
    }
    console.log();

    this.conversation.push(
      { role: 'user', content: prompt },
      { role: 'assistant', content: result.response }
    );
  }

  private async handleCommand(input: string): Promise<void> {
    const parts = input.slice(1).split(/\s+/);
    const command = parts[0].toLowerCase();
    const rest = parts.slice(1).join(' ');

    switch (command) {
      case 'help':
      case 'h':
        this.printHelp();
        break;

      case 'quit':
      case 'exit':
      case 'q':
        this.rl?.close();
        break;

      case 'clear':
        this.conversation = [];
        console.log(chalk.gray('Conversation cleared.\n'));
        break;

      case 'history':
        this.showHistory();
        break;

      case 'memories':
      case 'm':
        await this.listMemories();
        break;

      case 'remember':
        if (!rest) {
          console.log(chalk.yellow('Usage: /remember <fact>'));
        } else {
          const memory = await this.orchestrator.addMemory(rest, { category: 'explicit' });
          console.log(success(`Remembered #${memory.id}`) + '\n');
        }
        break;

      case 'forget': {
        const id = Number(rest);
        if (!rest || !Number.isInteger(id)) {
          console.log(chalk.yellow('Usage: /forget <id>'));
        } else if (await this.orchestrator.deleteMemory(id)) {
          console.log(success(`Forgot #${id}`) + '\n');
        } else {
          console.log(chalk.yellow(`No memory with id ${id}\n`));
        }
        break;
      }

      case 'search':
      case 's':
        if (!rest) {
          console.log(chalk.yellow('Usage: /search <query>'));
        } else {
          await this.searchMemories(rest);
        }
        break;

      case 'debug':
        this.config.showDebug = !this.config.showDebug;
        console.log(chalk.gray(`Debug mode: ${this.config.showDebug ? 'on' : 'off'}\n`));
        break;

      case 'model':
        console.log(chalk.gray(`Current model: ${this.adapter.name}\n`));
        break;

      default:
        console.log(chalk.yellow(`Unknown command: /${command}`));
        console.log(chalk.gray('Type /help for available commands.\n'));
    }
  }

  private printHelp(): void {
    console.log();
    console.log(chalk.bold('Commands:'));
    console.log();
    console.log(chalk.cyan('  /help, /h') + chalk.gray('          Show this help'));
    console.log(chalk.cyan('  /quit, /exit, /q') + chalk.gray('   Exit the chat'));
    console.log(chalk.cyan('  /clear') + chalk.gray('             Clear conversation history'));
    console.log(chalk.cyan('  /history') + chalk.gray('           Show conversation history'));
    console.log();
    console.log(chalk.bold('Memory:'));
    console.log();
    console.log(chalk.cyan('  /memories, /m') + chalk.gray('      List stored memories'));
    console.log(chalk.cyan('  /remember <fact>') + chalk.gray('   Store a memory'));
    console.log(chalk.cyan('  /forget <id>') + chalk.gray('       Delete a memory'));
    console.log(chalk.cyan('  /search <query>') + chalk.gray('    Find relevant memories'));
    console.log();
    console.log(chalk.bold('Settings:'));
    console.log();
    console.log(chalk.cyan('  /debug') + chalk.gray('             Toggle per-turn memory details'));
    console.log(chalk.cyan('  /model') + chalk.gray('             Show current model'));
    console.log();
  }

  private async listMemories(): Promise<void> {
    const memories = await this.orchestrator.listMemories();
    if (memories.length === 0) {
      emptyState('No memories yet.', 'Share something about yourself, or use /remember <fact>.');
      return;
    }

    console.log();
    for (const memory of memories) {
      console.log(formatMemory(memory));
    }
    console.log();
  }

  private async searchMemories(query: string): Promise<void> {
    const results = await this.orchestrator.getRelevantMemories(query);

    if (results.length === 0) {
      console.log(chalk.gray(`No memories found for "${query}"\n`));
      return;
    }

    console.log();
    console.log(chalk.bold(`Results for "${query}":`));
    console.log();
    for (const result of results) {
      console.log(formatRankedMemory(result));
    }
    console.log();
  }

  private showHistory(): void {
    if (this.conversation.length === 0) {
      console.log(chalk.gray('No conversation history.\n'));
      return;
    }

    console.log();
    console.log(chalk.bold('Conversation History:'));
    console.log();

    for (const msg of this.conversation) {
      const prefix = msg.role === 'user' ? chalk.cyan('You: ') : chalk.green('AI:  ');
      const content = msg.content.length > 100
        ? msg.content.slice(0, 100) + '...'
        : msg.content;
      console.log(prefix + content);
    }

    console.log();
  }

  private cleanup(): void {
    this.onExit();
    console.log(chalk.gray('\nGoodbye!\n'));
  }
}
