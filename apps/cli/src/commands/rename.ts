/**
 * Rename command - Copy, verify, then remove the original
 */

import { Command } from 'commander';
import ora from 'ora';
import { errorMessage } from '@modelsync/shared';
import { InterruptHandler } from '../interrupt.js';
import { describeTransferEvent } from '../output.js';
import { createServices, globalOptions } from '../services.js';

export const renameCommand = new Command('rename')
  .alias('mv')
  .description('Rename a model; the original is kept unless the copy verifies')
  .argument('<source>', 'Model to rename')
  .argument('<destination>', 'New model name')
  .action(async (source: string, destination: string, _options: unknown, command: Command) => {
    const controller = new AbortController();
    const interrupts = new InterruptHandler({ onCancel: () => controller.abort() }).attach();
    const spinner = ora(`Renaming ${source} to ${destination}...`).start();

    try {
      const services = await createServices(globalOptions(command));
      const result = await services.createTransferEngine().rename(source, destination, {
        bufferSize: services.bufferSize,
        signal: controller.signal,
        onEvent: event => {
          const text = describeTransferEvent(event);
          if (text) spinner.text = text;
        },
      });
      spinner.succeed(`Renamed ${result.source} to ${result.destination}`);
    } catch (error) {
      spinner.fail(`Rename failed: ${errorMessage(error)}`);
      process.exit(interrupts.isCancelled ? 2 : 1);
    } finally {
      interrupts.detach();
    }
  });
