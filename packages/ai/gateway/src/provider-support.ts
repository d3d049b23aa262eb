/**
 * Modelsync AI Gateway - Cloud Provider Support
 * Aliases, credentials and HTTP plumbing shared by judge providers
 */

import ky, { HTTPError, type KyInstance } from 'ky';
import { ProviderConfigError } from './errors.js';
import type { CloudProvider, CloudProviderConfig } from './types.js';

export interface ProviderOptions {
  fetch?: typeof fetch;
}

export const PROVIDER_ALIASES: Record<string, CloudProvider> = {
  anthropic: 'anthropic',
  claude: 'anthropic',
  openai: 'openai',
  chatgpt: 'openai',
  gemini: 'gemini',
  google: 'gemini',
  huggingface: 'huggingface',
  hf: 'huggingface',
  azure: 'azure',
  azureopenai: 'azure',
  cohere: 'cohere',
  mistral: 'mistral',
  together: 'together',
  replicate: 'replicate',
};

export const PROVIDER_ENV_VARS: Record<CloudProvider, string[]> = {
  anthropic: ['ANTHROPIC_API_KEY'],
  openai: ['OPENAI_API_KEY'],
  gemini: ['GEMINI_API_KEY', 'GOOGLE_API_KEY'],
  huggingface: ['HF_TOKEN'],
  azure: ['AZURE_OPENAI_API_KEY'],
  cohere: ['CO_API_KEY'],
  mistral: ['MISTRAL_API_KEY'],
  together: ['TOGETHER_API_KEY'],
  replicate: ['REPLICATE_API_TOKEN'],
};

export const DEFAULT_PROVIDER_TIMEOUT = 120000;

export function createHttpClient(options: ProviderOptions): KyInstance {
  return options.fetch ? ky.create({ retry: 0, fetch: options.fetch }) : ky.create({ retry: 0 });
}

/**
 * Where the key came from, for error messages; never the key itself
 */
export function describeKeySource(config: CloudProviderConfig): string {
  if (config.apiKeyFromEnv) {
    return `environment variable (${PROVIDER_ENV_VARS[config.provider].join(' or ')})`;
  }
  return 'command line';
}

/**
 * Turn 401/403 into a configuration error; everything else propagates unchanged
 */
export function rethrowAuthError(error: unknown, config: CloudProviderConfig): never {
  if (error instanceof HTTPError && (error.response.status === 401 || error.response.status === 403)) {
    throw new ProviderConfigError(
      `${config.provider} rejected the API key from ${describeKeySource(config)} (HTTP ${error.response.status})`
    );
  }
  throw error;
}
