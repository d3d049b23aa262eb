/**
 * Copy command - Copy a model between the local store and remote servers
 */

import { Command } from 'commander';
import ora from 'ora';
import chalk from 'chalk';
import { errorMessage, formatBytes, parseSize } from '@modelsync/shared';
import type { TransferResult } from '@modelsync/transfer';
import { InterruptHandler } from '../interrupt.js';
import { describeTransferEvent } from '../output.js';
import { createServices, globalOptions } from '../services.js';

interface CopyOptions {
  throttle?: string;
  bufferSize?: string;
  force?: boolean;
}

export function summarizeTransfer(result: TransferResult): string {
  const parts = [`${result.layersTransferred} layers sent (${formatBytes(result.bytesTransferred)})`];
  if (result.layersSkipped > 0) parts.push(`${result.layersSkipped} already present`);
  return parts.join(', ');
}

export const copyCommand = new Command('copy')
  .alias('cp')
  .description('Copy a model; either side may be http://host:port/model[:tag]')
  .argument('<source>', 'Source model, local or remote')
  .argument('<destination>', 'Destination model, local or remote')
  .option('-t, --throttle <rate>', 'Limit upload bandwidth, e.g. 10MB/s')
  .option('-b, --buffer-size <size>', 'Relay buffer for server-to-server copies, e.g. 512MB')
  .option('-f, --force', 'Replace the destination model if it exists')
  .action(async (source: string, destination: string, options: CopyOptions, command: Command) => {
    const controller = new AbortController();
    const interrupts = new InterruptHandler({ onCancel: () => controller.abort() }).attach();
    const spinner = ora(`Copying ${source} to ${destination}...`).start();

    try {
      const services = await createServices(globalOptions(command));
      const engine = services.createTransferEngine();

      const result = await engine.copy(source, destination, {
        throttle: options.throttle ? parseSize(options.throttle) : null,
        bufferSize: options.bufferSize ? parseSize(options.bufferSize) : services.bufferSize,
        force: options.force,
        signal: controller.signal,
        onEvent: event => {
          const text = describeTransferEvent(event);
          if (text) spinner.text = text;
        },
      });

      spinner.succeed(`Copied ${result.source} to ${result.destination}`);
      console.log(chalk.gray(`  ${summarizeTransfer(result)}`));
    } catch (error) {
      if (interrupts.isCancelled) {
        spinner.warn('Copy cancelled');
        process.exit(2);
      }
      spinner.fail(`Copy failed: ${errorMessage(error)}`);
      process.exit(1);
    } finally {
      interrupts.detach();
    }
  });
