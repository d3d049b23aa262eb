/**
 * Config command - Manage Modelsync configuration
 */

import { Command } from 'commander';
import chalk from 'chalk';
import inquirer from 'inquirer';
import { errorMessage } from '@modelsync/shared';
import {
  configPath,
  defaultConfig,
  getConfigValue,
  loadConfig,
  saveConfig,
  setConfigValue,
} from '../config.js';

export const configCommand = new Command('config')
  .description('Manage Modelsync configuration');

configCommand
  .command('show')
  .description('Show current configuration')
  .action(async () => {
    try {
      const config = await loadConfig();
      console.log(chalk.cyan(`\nModelsync Configuration (${configPath()}):\n`));
      console.log(JSON.stringify(config, null, 2));
    } catch (error) {
      console.error(chalk.red(`Error: ${errorMessage(error)}`));
      process.exit(1);
    }
  });

configCommand
  .command('set <key> <value>')
  .description('Set a configuration value; an empty value restores the default')
  .action(async (key: string, value: string) => {
    try {
      const config = setConfigValue(await loadConfig(), key, value);
      await saveConfig(config);
      console.log(chalk.green(`✓ Set ${key} = ${getConfigValue(config, key) ?? '(unset)'}`));
    } catch (error) {
      console.error(chalk.red(`Error: ${errorMessage(error)}`));
      process.exit(1);
    }
  });

configCommand
  .command('get <key>')
  .description('Get a configuration value')
  .action(async (key: string) => {
    try {
      const value = getConfigValue(await loadConfig(), key);
      if (value === undefined) {
        console.log(chalk.yellow('Not set'));
        return;
      }
      console.log(value);
    } catch (error) {
      console.error(chalk.red(`Error: ${errorMessage(error)}`));
      process.exit(1);
    }
  });

configCommand
  .command('reset')
  .description('Reset configuration to defaults')
  .action(async () => {
    const { confirm } = await inquirer.prompt<{ confirm: boolean }>([
      {
        type: 'confirm',
        name: 'confirm',
        message: 'Reset all configuration to defaults?',
        default: false,
      },
    ]);

    if (!confirm) {
      console.log(chalk.yellow('Cancelled'));
      return;
    }

    try {
      await saveConfig(defaultConfig());
      console.log(chalk.green('✓ Configuration reset to defaults'));
    } catch (error) {
      console.error(chalk.red(`Error: ${errorMessage(error)}`));
      process.exit(1);
    }
  });
