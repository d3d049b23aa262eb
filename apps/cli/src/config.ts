/**
 * Modelsync CLI - Configuration
 * ~/.modelsync/config.json, or $MODELSYNC_HOME/config.json
 */

import * as fs from 'fs/promises';
import { homedir } from 'os';
import * as path from 'path';
import { z } from 'zod';
import { DEFAULT_SERVER_URL } from '@modelsync/ai-gateway';
import { describeIssue } from '@modelsync/qc';
import { parseSize } from '@modelsync/shared';

type Env = Record<string, string | undefined>;

function isSize(value: string): boolean {
  try {
    parseSize(value);
    return true;
  } catch {
    return false;
  }
}

export const CliConfigSchema = z.object({
  server: z.string().url().default(DEFAULT_SERVER_URL),
  /** Unset means $OLLAMA_MODELS or ~/.ollama/models */
  modelsDir: z.string().min(1).optional(),
  registry: z.string().url().default('https://registry.ollama.ai'),
  bufferSize: z.string().refine(isSize, 'expected a size such as 512MB').default('512MB'),
  timeoutSeconds: z.number().int().positive().default(600),
  judge: z.string().min(1).optional(),
});

export type CliConfig = z.infer<typeof CliConfigSchema>;
export type ConfigKey = keyof CliConfig;

export const CONFIG_KEYS = [
  'server',
  'modelsDir',
  'registry',
  'bufferSize',
  'timeoutSeconds',
  'judge',
] as const satisfies readonly ConfigKey[];

const NUMERIC_KEYS: ReadonlySet<string> = new Set<ConfigKey>(['timeoutSeconds']);

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function isConfigKey(key: string): key is ConfigKey {
  const known: readonly string[] = CONFIG_KEYS;
  return known.includes(key);
}

export function configHome(env: Env = process.env): string {
  return env.MODELSYNC_HOME ?? path.join(homedir(), '.modelsync');
}

export function configPath(env: Env = process.env): string {
  return path.join(configHome(env), 'config.json');
}

export function defaultConfig(): CliConfig {
  return CliConfigSchema.parse({});
}

/**
 * Missing file means defaults; a file that does not validate is an error
 */
export async function loadConfig(env: Env = process.env): Promise<CliConfig> {
  const file = configPath(env);

  let content: string;
  try {
    content = await fs.readFile(file, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return defaultConfig();
    }
    throw error;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch {
    throw new ConfigError(`Configuration ${file} is not valid JSON`);
  }

  const parsed = CliConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Configuration ${file} is invalid: ${describeIssue(parsed.error)}`);
  }
  return parsed.data;
}

export async function saveConfig(config: CliConfig, env: Env = process.env): Promise<void> {
  const file = configPath(env);
  await fs.mkdir(path.dirname(file), { recursive: true });
  await fs.writeFile(file, JSON.stringify(config, null, 2) + '\n');
}

/**
 * Returns the updated configuration; an empty value unsets the key
 */
export function setConfigValue(config: CliConfig, key: string, value: string): CliConfig {
  if (!isConfigKey(key)) {
    throw new ConfigError(`Unknown configuration key "${key}". Known keys: ${CONFIG_KEYS.join(', ')}`);
  }

  const next: Record<string, unknown> = { ...config };
  if (value === '') {
    delete next[key];
  } else if (NUMERIC_KEYS.has(key)) {
    next[key] = value.trim() !== '' && !isNaN(Number(value)) ? Number(value) : value;
  } else {
    next[key] = value;
  }

  const parsed = CliConfigSchema.safeParse(next);
  if (!parsed.success) {
    throw new ConfigError(`Invalid value for ${key}: ${describeIssue(parsed.error)}`);
  }
  return parsed.data;
}

export function getConfigValue(config: CliConfig, key: string): string | number | undefined {
  if (!isConfigKey(key)) {
    throw new ConfigError(`Unknown configuration key "${key}". Known keys: ${CONFIG_KEYS.join(', ')}`);
  }
  return config[key];
}
