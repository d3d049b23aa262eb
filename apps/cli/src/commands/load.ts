/**
 * Load and unload commands - Keep a model in memory or release it
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { errorMessage } from '@modelsync/shared';
import { createServices, globalOptions } from '../services.js';

interface LoadOptions {
  keepAlive?: string;
}

function parseKeepAlive(value: string): string | number {
  return /^-?\d+$/.test(value) ? Number(value) : value;
}

export const loadCommand = new Command('load')
  .description('Load a model into memory')
  .argument('<model>', 'Model to load')
  .option('-k, --keep-alive <duration>', 'How long the model stays loaded, e.g. 10m or -1 for ever')
  .action(async (model: string, options: LoadOptions, command: Command) => {
    const spinner = ora(`Loading ${model}...`).start();
    try {
      const { server } = await createServices(globalOptions(command));
      await server.load(model, options.keepAlive === undefined ? undefined : parseKeepAlive(options.keepAlive));
      spinner.succeed(`Loaded ${model}`);
    } catch (error) {
      spinner.fail(`Could not load ${model}: ${errorMessage(error)}`);
      process.exit(1);
    }
  });

export const unloadCommand = new Command('unload')
  .description('Unload a model from memory, or every loaded model')
  .argument('[model]', 'Model to unload')
  .action(async (model: string | undefined, _options: unknown, command: Command) => {
    try {
      const { server } = await createServices(globalOptions(command));
      const targets = model ? [model] : (await server.listRunning()).map(running => running.name);

      if (targets.length === 0) {
        console.log(chalk.yellow('No models loaded'));
        return;
      }

      for (const target of targets) {
        await server.unload(target);
        console.log(chalk.green(`✓ Unloaded ${target}`));
      }
    } catch (error) {
      console.error(chalk.red(`Error: ${errorMessage(error)}`));
      process.exit(1);
    }
  });
