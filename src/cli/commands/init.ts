import chalk from 'chalk';
import * as path from 'path';
import { initProject, findProjectRoot, MEMORIA_DIR, CONFIG_FILE } from '../../config/index.js';
import { exitWithError } from '../session.js';
import { success } from '../ui.js';

interface InitOptions {
  force?: boolean;
}

export function initCommand(options: InitOptions): void {
  const cwd = process.cwd();

  const existingRoot = findProjectRoot();
  if (existingRoot && !options.force) {
    console.log(chalk.yellow(`Memoria already initialized at: ${existingRoot}`));
    console.log(chalk.gray('Use --force to reinitialize'));
    return;
  }

  try {
    initProject(cwd, options.force);
  } catch (error) {
    exitWithError(error);
  }

  console.log();
  console.log(success('Memoria initialized'));
  console.log();
  console.log('Created:');
  console.log(chalk.gray(`  ${path.join(MEMORIA_DIR, CONFIG_FILE)}  - Configuration`));
  console.log(chalk.gray(`  ${path.join(MEMORIA_DIR, '.gitignore')}   - Git ignore rules`));
  console.log();
  console.log('Next steps:');
  console.log(chalk.cyan('  export OPENAI_API_KEY=...'));
  console.log(chalk.gray('  or run locally:'));
  console.log(chalk.cyan('  mem config set model.provider ollama'));
  console.log(chalk.cyan('  mem config set model.name llama3.2'));
  console.log(chalk.cyan('  mem config set embeddings.provider ollama'));
  console.log();
  console.log(chalk.cyan('  mem chat'));
  console.log();
  console.log(chalk.gray('The memory database is created on first use.'));
}
