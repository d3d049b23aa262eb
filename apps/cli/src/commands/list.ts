/**
 * List command - Models installed on a server
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { errorMessage } from '@modelsync/shared';
import { LIST_ORDERS, isListOrder, matchesModelPattern, renderModelTable, sortModels } from '../models.js';
import { createServices, globalOptions } from '../services.js';

interface ListOptions {
  sort: string;
}

export const listCommand = new Command('list')
  .alias('ls')
  .description('List models, optionally filtered by a pattern such as llama* or *:7b')
  .argument('[pattern]', 'Model name or wildcard pattern')
  .option('--sort <order>', `Sort order: ${LIST_ORDERS.join(', ')}`, 'name')
  .action(async (pattern: string | undefined, options: ListOptions, command: Command) => {
    if (!isListOrder(options.sort)) {
      console.error(chalk.red(`Unknown sort order "${options.sort}". Use one of: ${LIST_ORDERS.join(', ')}`));
      process.exit(1);
    }

    try {
      const { server } = await createServices(globalOptions(command));
      const models = await server.listModels();
      const matching = pattern ? models.filter(model => matchesModelPattern(model.name, pattern)) : models;

      if (matching.length === 0) {
        console.log(chalk.yellow(pattern ? `No models match ${pattern}` : 'No models installed'));
        return;
      }
      console.log(renderModelTable(sortModels(matching, options.sort)));
    } catch (error) {
      console.error(chalk.red(`Error: ${errorMessage(error)}`));
      process.exit(1);
    }
  });
