/**
 * Modelsync AI Gateway - Judge Provider Factory
 * Resolves "@provider[:token]/model" references into provider instances
 */

import { AnthropicJudge } from './anthropic-judge.js';
import { CohereJudge } from './cohere-judge.js';
import { OpenAICompatibleJudge } from './openai-judge.js';
import { ReplicateJudge } from './replicate-judge.js';
import { ProviderConfigError } from './errors.js';
import { PROVIDER_ALIASES, PROVIDER_ENV_VARS, type ProviderOptions } from './provider-support.js';
import type { CloudProvider, CloudProviderConfig, JudgeProvider } from './types.js';

export function isCloudReference(reference: string): boolean {
  return reference.startsWith('@');
}

export function getSupportedProviders(): CloudProvider[] {
  return Array.from(new Set(Object.values(PROVIDER_ALIASES)));
}

/**
 * Parse "@provider[:token]/model". Azure also accepts "@azure:key@endpoint/deployment".
 * Keys missing from the reference are read from the provider's environment variables.
 */
export function parseJudgeReference(
  reference: string,
  env: Record<string, string | undefined> = process.env
): CloudProviderConfig {
  if (!isCloudReference(reference)) {
    throw new ProviderConfigError(`Not a cloud judge reference: ${reference}`);
  }

  const value = reference.slice(1);
  const slashIndex = value.indexOf('/');
  if (slashIndex === -1 || slashIndex === value.length - 1) {
    throw new ProviderConfigError(`Judge reference "${reference}" must look like @provider[:token]/model`);
  }

  const head = value.slice(0, slashIndex);
  const model = value.slice(slashIndex + 1);
  const colonIndex = head.indexOf(':');
  const providerName = colonIndex === -1 ? head : head.slice(0, colonIndex);
  const token = colonIndex === -1 ? undefined : head.slice(colonIndex + 1);

  const provider = PROVIDER_ALIASES[providerName.toLowerCase()];
  if (!provider) {
    throw new ProviderConfigError(
      `Unknown judge provider "${providerName}". Supported: ${getSupportedProviders().join(', ')}`
    );
  }

  let apiKey = token;
  let endpoint: string | undefined;

  if (provider === 'azure' && token?.includes('@')) {
    const atIndex = token.indexOf('@');
    apiKey = token.slice(0, atIndex);
    endpoint = token.slice(atIndex + 1);
    if (!/^https?:\/\//.test(endpoint)) endpoint = `https://${endpoint}`;
  }

  let apiKeyFromEnv = false;
  if (!apiKey) {
    for (const name of PROVIDER_ENV_VARS[provider]) {
      const envValue = env[name];
      if (envValue) {
        apiKey = envValue;
        apiKeyFromEnv = true;
        break;
      }
    }
  }

  if (provider === 'azure' && !endpoint) {
    endpoint = env.AZURE_OPENAI_ENDPOINT;
  }

  if (!apiKey) {
    throw new ProviderConfigError(
      `No API key for ${provider}: pass @${providerName}:<key>/${model} or set ${PROVIDER_ENV_VARS[provider].join(' or ')}`
    );
  }

  return { provider, model, apiKey, apiKeyFromEnv, endpoint };
}

export function createJudgeProvider(
  config: CloudProviderConfig,
  options: ProviderOptions = {}
): JudgeProvider {
  switch (config.provider) {
    case 'anthropic':
      return new AnthropicJudge(config, options);
    case 'cohere':
      return new CohereJudge(config, options);
    case 'replicate':
      return new ReplicateJudge(config, options);
    case 'openai':
    case 'azure':
    case 'gemini':
    case 'huggingface':
    case 'mistral':
    case 'together':
      return new OpenAICompatibleJudge(config.provider, config, options);
  }
}
