import { Command } from '@commander-js/extra-typings';
import chalk from 'chalk';
import {
  loadConfig,
  setConfigValue,
  getConfigValue,
  initProject,
} from '../../config/index.js';
import { exitWithError, requireProjectRoot } from '../session.js';
import { success } from '../ui.js';

export const configCommand = new Command('config')
  .description('Manage Memoria configuration');

// mem config get [key]
configCommand
  .command('get')
  .argument('[key]', 'Config key (e.g., model.provider)')
  .description('Get configuration value(s)')
  .action((key?: string) => {
    const root = requireProjectRoot();

    try {
      if (key) {
        const value = getConfigValue(key, root);
        if (value === undefined) {
          console.error(chalk.red(`Unknown or unset config key: ${key}`));
          process.exit(1);
        }
        console.log(formatValue(value));
      } else {
        console.log(JSON.stringify(loadConfig(root), null, 2));
      }
    } catch (error) {
      exitWithError(error);
    }
  });

// mem config set <key> <value>
configCommand
  .command('set')
  .argument('<key>', 'Config key (e.g., memory.importanceThreshold)')
  .argument('<value>', 'New value')
  .description('Set a configuration value')
  .action((key: string, value: string) => {
    const root = requireProjectRoot();

    try {
      setConfigValue(key, value, root);
      console.log(success(`Set ${key} = ${value}`));
    } catch (error) {
      exitWithError(error);
    }
  });

// mem config list
configCommand
  .command('list')
  .description('List all configuration values')
  .action(() => {
    const root = requireProjectRoot();

    try {
      printConfigTree(loadConfig(root), '');
    } catch (error) {
      exitWithError(error);
    }
  });

// mem config reset
configCommand
  .command('reset')
  .description('Reset configuration to defaults')
  .option('-y, --yes', 'Skip confirmation')
  .action((options: { yes?: boolean }) => {
    const root = requireProjectRoot();

    if (!options.yes) {
      console.log(chalk.yellow('This will reset all configuration to defaults.'));
      console.log(chalk.gray('Use --yes to skip this confirmation.'));
      return;
    }

    try {
      initProject(root, true);
      console.log(success('Configuration reset to defaults'));
    } catch (error) {
      exitWithError(error);
    }
  });

function formatValue(value: unknown): string {
  if (typeof value === 'object' && value !== null) {
    return JSON.stringify(value, null, 2);
  }
  return String(value);
}

function printConfigTree(obj: object, prefix: string): void {
  for (const [key, value] of Object.entries(obj)) {
    const fullKey = prefix ? `${prefix}.${key}` : key;

    if (typeof value === 'object' && value !== null && !Array.isArray(value)) {
      console.log(chalk.bold(`${fullKey}:`));
      printConfigTree(value, fullKey);
    } else {
      console.log(`  ${chalk.cyan(fullKey)} = ${chalk.white(formatValue(value))}`);
    }
  }
}
