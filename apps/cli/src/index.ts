#!/usr/bin/env node
/**
 * Modelsync CLI
 */

import { Command } from 'commander';
import { copyCommand } from './commands/copy.js';
import { renameCommand } from './commands/rename.js';
import { listCommand } from './commands/list.js';
import { removeCommand } from './commands/remove.js';
import { psCommand } from './commands/ps.js';
import { loadCommand, unloadCommand } from './commands/load.js';
import { qcCommand } from './commands/qc.js';
import { configCommand } from './commands/config.js';
import { attachConsoleLogger } from './output.js';

const program = new Command();

program
  .name('modelsync')
  .description('Modelsync - Move models between inference servers and check quantization quality')
  .version('0.1.0')
  .option('-s, --server <url>', 'Inference server (default: configured server)')
  .option('-v, --verbose', 'Print debug logging')
  .hook('preAction', thisCommand => {
    attachConsoleLogger(thisCommand.opts().verbose === true);
  });

// Register commands
program.addCommand(copyCommand);
program.addCommand(renameCommand);
program.addCommand(listCommand);
program.addCommand(removeCommand);
program.addCommand(psCommand);
program.addCommand(loadCommand);
program.addCommand(unloadCommand);
program.addCommand(qcCommand);
program.addCommand(configCommand);

// Parse arguments
await program.parseAsync();
