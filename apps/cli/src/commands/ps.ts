/**
 * Ps command - Models loaded in memory
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { errorMessage } from '@modelsync/shared';
import { renderRunningTable } from '../models.js';
import { createServices, globalOptions } from '../services.js';

export const psCommand = new Command('ps')
  .description('Show models loaded in memory and their VRAM share')
  .action(async (_options: unknown, command: Command) => {
    try {
      const { server } = await createServices(globalOptions(command));
      const running = await server.listRunning();

      if (running.length === 0) {
        console.log(chalk.yellow(`No models loaded on ${server.baseUrl}`));
        return;
      }
      console.log(renderRunningTable(running));
    } catch (error) {
      console.error(chalk.red(`Error: ${errorMessage(error)}`));
      process.exit(1);
    }
  });
