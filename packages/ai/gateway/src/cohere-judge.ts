/**
 * Modelsync AI Gateway - Cohere Judge
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

const BASE_URL = 'https://api.cohere.com';

export class CohereJudge implements JudgeProvider {
  readonly provider = 'cohere' as const;
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
      await this.http.get(`${BASE_URL}/v1/models?page_size=1`, {
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
      .get(`${BASE_URL}/v1/models?endpoint=chat`, {
        headers: this.headers(),
        timeout: this.timeout(),
        signal,
      })
      .json<{ models?: Array<{ name: string }> }>();

    return (response.models ?? []).map(m => m.name);
  }

  async judge(
    systemPrompt: string,
    userPrompt: string,
    maxTokens: number,
    signal?: AbortSignal
  ): Promise<JudgeCompletion> {
    const response = await this.http
      .post(`${BASE_URL}/v2/chat`, {
        headers: this.headers(),
        json: {
          model: this.model,
          messages: [
            { role: 'system', content: systemPrompt },
            { role: 'user', content: userPrompt },
          ],
          max_tokens: maxTokens,
          temperature: 0,
        },
        timeout: this.timeout(),
        signal,
      })
      .json<{
        message?: { content?: Array<{ type: string; text?: string }> };
      }>()
      .catch((error: unknown) => rethrowAuthError(error, this.config));

    const text = (response.message?.content ?? [])
      .filter(c => c.type === 'text')
      .map(c => c.text ?? '')
      .join('');

    return parseJudgeResponse(text);
  }

  private headers(): Record<string, string> {
    return { Authorization: `Bearer ${this.config.apiKey}` };
  }

  private timeout(): number {
    return this.config.timeout ?? DEFAULT_PROVIDER_TIMEOUT;
  }
}
