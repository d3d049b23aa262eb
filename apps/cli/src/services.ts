/**
 * Modelsync CLI - Service Wiring
 * Builds the clients a command needs from the configuration and global flags
 */

import type { Command } from 'commander';
import { OllamaAdapter } from '@modelsync/ai-gateway';
import { parseSize } from '@modelsync/shared';
import { LocalModelStore, RegistryClient, TransferEngine, defaultModelsDir } from '@modelsync/transfer';
import { loadConfig, type CliConfig } from './config.js';

export interface GlobalOptions {
  server?: string;
  verbose?: boolean;
}

export interface Services {
  config: CliConfig;
  server: OllamaAdapter;
  timeoutMs: number;
  bufferSize: number;
  connect: (serverUrl: string) => OllamaAdapter;
  createTransferEngine: () => TransferEngine;
}

export function globalOptions(command: Command): GlobalOptions {
  const values = command.optsWithGlobals();
  return {
    server: typeof values.server === 'string' ? values.server : undefined,
    verbose: values.verbose === true,
  };
}

export async function createServices(
  options: GlobalOptions,
  env: Record<string, string | undefined> = process.env
): Promise<Services> {
  const config = await loadConfig(env);
  const timeoutMs = config.timeoutSeconds * 1000;
  const connect = (serverUrl: string) => new OllamaAdapter({ baseUrl: serverUrl, timeout: timeoutMs });
  const server = connect(options.server ?? config.server);

  return {
    config,
    server,
    timeoutMs,
    bufferSize: parseSize(config.bufferSize),
    connect,
    createTransferEngine: () =>
      new TransferEngine({
        localServer: server,
        store: new LocalModelStore(config.modelsDir ?? defaultModelsDir(env)),
        registry: new RegistryClient({ baseUrl: config.registry }),
        connect,
      }),
  };
}
