/**
 * Modelsync AI Gateway - OpenAI-Compatible Judge
 * OpenAI, Azure OpenAI, and providers that expose the chat completions API
 */

import type { KyInstance } from 'ky';
import { ProviderConfigError } from './errors.js';
import { parseJudgeResponse } from './judge-response.js';
import {
  createHttpClient,
  DEFAULT_PROVIDER_TIMEOUT,
  rethrowAuthError,
  type ProviderOptions,
} from './provider-support.js';
import type { CloudProvider, CloudProviderConfig, JudgeCompletion, JudgeProvider } from './types.js';

export type OpenAICompatibleProvider = Extract<
  CloudProvider,
  'openai' | 'azure' | 'gemini' | 'huggingface' | 'mistral' | 'together'
>;

const BASE_URLS: Record<Exclude<OpenAICompatibleProvider, 'azure'>, string> = {
  openai: 'https://api.openai.com/v1',
  gemini: 'https://generativelanguage.googleapis.com/v1beta/openai',
  huggingface: 'https://router.huggingface.co/v1',
  mistral: 'https://api.mistral.ai/v1',
  together: 'https://api.together.xyz/v1',
};

const AZURE_API_VERSION = '2024-06-01';

export class OpenAICompatibleJudge implements JudgeProvider {
  readonly provider: OpenAICompatibleProvider;
  readonly model: string;
  private config: CloudProviderConfig;
  private http: KyInstance;

  constructor(
    provider: OpenAICompatibleProvider,
    config: CloudProviderConfig,
    options: ProviderOptions = {}
  ) {
    if (provider === 'azure' && !config.endpoint) {
      throw new ProviderConfigError(
        'Azure OpenAI needs an endpoint: use @azure:key@endpoint/deployment or set AZURE_OPENAI_ENDPOINT'
      );
    }

    this.provider = provider;
    this.config = config;
    this.model = config.model;
    this.http = createHttpClient(options);
  }

  async validateConnection(signal?: AbortSignal): Promise<void> {
    try {
      if (this.provider === 'azure') {
        // Azure has no cheap listing per deployment; a 1-token completion proves the key and deployment
        await this.complete('ping', 'ping', 1, signal);
        return;
      }
      await this.http.get(`${this.baseUrl()}/models`, {
        headers: this.headers(),
        timeout: this.timeout(),
        signal,
      });
    } catch (error) {
      rethrowAuthError(error, this.config);
    }
  }

  async listModels(signal?: AbortSignal): Promise<string[]> {
    if (this.provider === 'azure') return [];

    const response = await this.http
      .get(`${this.baseUrl()}/models`, {
        headers: this.headers(),
        timeout: this.timeout(),
        signal,
      })
      .json<{ data?: Array<{ id: string }> }>();

    return (response.data ?? []).map(m => m.id);
  }

  async judge(
    systemPrompt: string,
    userPrompt: string,
    maxTokens: number,
    signal?: AbortSignal
  ): Promise<JudgeCompletion> {
    const text = await this.complete(systemPrompt, userPrompt, maxTokens, signal).catch(
      (error: unknown) => rethrowAuthError(error, this.config)
    );
    return parseJudgeResponse(text);
  }

  private async complete(
    systemPrompt: string,
    userPrompt: string,
    maxTokens: number,
    signal?: AbortSignal
  ): Promise<string> {
    const body: Record<string, unknown> = {
      messages: [
        { role: 'system', content: systemPrompt },
        { role: 'user', content: userPrompt },
      ],
      temperature: 0,
    };

    if (this.provider === 'openai') {
      body.model = this.model;
      body.max_completion_tokens = maxTokens;
    } else if (this.provider === 'azure') {
      body.max_tokens = maxTokens;
    } else {
      body.model = this.model;
      body.max_tokens = maxTokens;
    }

    const response = await this.http
      .post(this.completionsUrl(), {
        headers: this.headers(),
        json: body,
        timeout: this.timeout(),
        signal,
      })
      .json<{
        choices?: Array<{ message?: { content?: string | null } }>;
      }>();

    return response.choices?.[0]?.message?.content ?? '';
  }

  private baseUrl(): string {
    if (this.provider === 'azure') {
      return `${(this.config.endpoint ?? '').replace(/\/+$/, '')}/openai`;
    }
    return BASE_URLS[this.provider];
  }

  private completionsUrl(): string {
    if (this.provider === 'azure') {
      return `${this.baseUrl()}/deployments/${encodeURIComponent(this.model)}/chat/completions?api-version=${AZURE_API_VERSION}`;
    }
    return `${this.baseUrl()}/chat/completions`;
  }

  private headers(): Record<string, string> {
    if (this.provider === 'azure') {
      return { 'api-key': this.config.apiKey };
    }
    return { Authorization: `Bearer ${this.config.apiKey}` };
  }

  private timeout(): number {
    return this.config.timeout ?? DEFAULT_PROVIDER_TIMEOUT;
  }
}
