/**
 * Remove command - Delete every model matching a pattern
 */

import { Command } from 'commander';
import chalk from 'chalk';
import inquirer from 'inquirer';
import ora from 'ora';
import { errorMessage } from '@modelsync/shared';
import { matchesModelPattern } from '../models.js';
import { createServices, globalOptions } from '../services.js';

interface RemoveOptions {
  yes?: boolean;
}

export const removeCommand = new Command('remove')
  .alias('rm')
  .description('Remove models matching a name or wildcard pattern')
  .argument('<pattern>', 'Model name or wildcard pattern')
  .option('-y, --yes', 'Do not ask for confirmation')
  .action(async (pattern: string, options: RemoveOptions, command: Command) => {
    try {
      const { server } = await createServices(globalOptions(command));
      const matching = (await server.listModels()).filter(model => matchesModelPattern(model.name, pattern));

      if (matching.length === 0) {
        console.error(chalk.red(`No models match ${pattern}`));
        process.exit(1);
      }

      if (!options.yes) {
        console.log(chalk.cyan('\nModels to remove:\n'));
        for (const model of matching) console.log(`  ${model.name}`);
        const { confirm } = await inquirer.prompt<{ confirm: boolean }>([
          {
            type: 'confirm',
            name: 'confirm',
            message: `Remove ${matching.length} model${matching.length === 1 ? '' : 's'} from ${server.baseUrl}?`,
            default: false,
          },
        ]);
        if (!confirm) {
          console.log(chalk.yellow('Cancelled'));
          return;
        }
      }

      const spinner = ora().start();
      let failures = 0;
      for (const model of matching) {
        spinner.text = `Removing ${model.name}...`;
        try {
          await server.delete(model.name);
          spinner.succeed(`Removed ${model.name}`);
        } catch (error) {
          failures++;
          spinner.fail(`Could not remove ${model.name}: ${errorMessage(error)}`);
        }
        spinner.start();
      }
      spinner.stop();

      if (failures > 0) process.exit(1);
    } catch (error) {
      console.error(chalk.red(`Error: ${errorMessage(error)}`));
      process.exit(1);
    }
  });
