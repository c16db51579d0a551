import chalk from 'chalk';
import { Repl } from '../repl.js';
import { exitWithError, openMemorySystem, requireProjectRoot } from '../session.js';

interface ChatOptions {
  model?: string;
  extract?: boolean;
  curate?: boolean;
  debug?: boolean;
}

export async function chatCommand(options: ChatOptions): Promise<void> {
  const root = requireProjectRoot();

  try {
    const { system, config } = await openMemorySystem(root, { model: options.model });
    const { adapter } = system;

    console.log(chalk.gray(`Connecting to ${adapter.name}...`));
    const healthy = await adapter.healthCheck();
    if (!healthy) {
      console.error(chalk.red(`\nFailed to connect to ${adapter.name}`));

      if (adapter.provider === 'ollama') {
        console.log(chalk.gray('\nMake sure Ollama is running:'));
        console.log(chalk.cyan('  ollama serve'));
      } else {
        console.log(chalk.gray('\nCheck your API key and network connection.'));
      }

      system.close();
      process.exit(1);
    }

    const repl = new Repl(adapter, system.orchestrator, () => system.close(), {
      extract: options.extract !== false && config.memory.autoExtract,
      curate: options.curate !== false && config.memory.autoCurate,
      showDebug: options.debug === true,
      temperature: config.model.temperature,
      maxTokens: config.model.maxTokens,
    });

    await repl.start();
  } catch (error) {
    exitWithError(error);
  }
}
