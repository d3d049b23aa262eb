/**
 * Modelsync AI Gateway - Anthropic Judge
 */

import type { KyInstance } from 'ky';
import { parseJudgeResponse } from './judge-response.js';
import {
  createHttpClient,
  DEFAULT_PROVIDER_TIMEOUT,
  rethrowAuthError,
  type ProviderOptions,
} from './provider-support.js';
import type { CloudProviderConfig, JudgeCompletion, JudgeProvider } from './types.js';

const BASE_URL = 'https://api.anthropic.com/v1';
const API_VERSION = '2023-06-01';

export class AnthropicJudge implements JudgeProvider {
  readonly provider = 'anthropic' as const;
  readonly model: string;
  private config: CloudProviderConfig;
  private http: KyInstance;

  constructor(config: CloudProviderConfig, options: ProviderOptions = {}) {
    this.config = config;
    this.model = config.model;
    this.http = createHttpClient(options);
  }

  async validateConnection(signal?: AbortSignal): Promise<void> {
    try {
      await this.http.get(`${BASE_URL}/models?limit=1`, {
        headers: this.headers(),
        timeout: this.timeout(),
        signal,
      });
    } catch (error) {
      rethrowAuthError(error, this.config);
    }
  }

  async listModels(signal?: AbortSignal): Promise<string[]> {
    const response = await this.http
      .get(`${BASE_URL}/models?limit=100`, {
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
    const response = await this.http
      .post(`${BASE_URL}/messages`, {
        headers: this.headers(),
        json: {
          model: this.model,
          max_tokens: maxTokens,
          system: systemPrompt,
          messages: [{ role: 'user', content: userPrompt }],
          temperature: 0,
        },
        timeout: this.timeout(),
        signal,
      })
      .json<{
        content?: Array<{ type: string; text?: string }>;
      }>()
      .catch((error: unknown) => rethrowAuthError(error, this.config));

    const text = (response.content ?? [])
      .filter(c => c.type === 'text')
      .map(c => c.text ?? '')
      .join('');

    return parseJudgeResponse(text);
  }

  private headers(): Record<string, string> {
    return {
      'x-api-key': this.config.apiKey,
      'anthropic-version': API_VERSION,
    };
  }

  private timeout(): number {
    return this.config.timeout ?? DEFAULT_PROVIDER_TIMEOUT;
  }
}
