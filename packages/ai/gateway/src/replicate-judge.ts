/**
 * Modelsync AI Gateway - Replicate Judge
 * Predictions API with synchronous wait and polling fallback
 */

import type { KyInstance } from 'ky';
import { sleep } from '@modelsync/shared';
import { ServerResponseError } from './errors.js';
import { parseJudgeResponse } from './judge-response.js';
import {
  createHttpClient,
  DEFAULT_PROVIDER_TIMEOUT,
  rethrowAuthError,
  type ProviderOptions,
} from './provider-support.js';
import type { CloudProviderConfig, JudgeCompletion, JudgeProvider } from './types.js';

const BASE_URL = 'https://api.replicate.com/v1';
const POLL_INTERVAL_MS = 1000;

interface Prediction {
  id: string;
  status: 'starting' | 'processing' | 'succeeded' | 'failed' | 'canceled';
  output?: string[] | string | null;
  error?: string | null;
  urls?: { get?: string };
}

export class ReplicateJudge implements JudgeProvider {
  readonly provider = 'replicate' as const;
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
      await this.http.get(`${BASE_URL}/account`, {
        headers: this.headers(),
        timeout: this.timeout(),
        signal,
      });
    } catch (error) {
      rethrowAuthError(error, this.config);
    }
  }

  async listModels(): Promise<string[]> {
    // Replicate has no listing scoped to usable chat models
    return [];
  }

  async judge(
    systemPrompt: string,
    userPrompt: string,
    maxTokens: number,
    signal?: AbortSignal
  ): Promise<JudgeCompletion> {
    let prediction = await this.http
      .post(`${BASE_URL}/models/${this.model}/predictions`, {
        headers: { ...this.headers(), Prefer: 'wait' },
        json: {
          input: {
            prompt: userPrompt,
            system_prompt: systemPrompt,
            max_tokens: maxTokens,
            max_new_tokens: maxTokens,
            temperature: 0.01,
          },
        },
        timeout: this.timeout(),
        signal,
      })
      .json<Prediction>()
      .catch((error: unknown) => rethrowAuthError(error, this.config));

    const deadline = Date.now() + this.timeout();
    while (prediction.status === 'starting' || prediction.status === 'processing') {
      if (Date.now() > deadline) {
        throw new ServerResponseError(`Replicate prediction ${prediction.id} did not finish in time`);
      }
      await sleep(POLL_INTERVAL_MS, signal);
      const url = prediction.urls?.get ?? `${BASE_URL}/predictions/${prediction.id}`;
      prediction = await this.http
        .get(url, { headers: this.headers(), timeout: this.timeout(), signal })
        .json<Prediction>();
    }

    if (prediction.status !== 'succeeded') {
      throw new ServerResponseError(
        `Replicate prediction ${prediction.id} ${prediction.status}: ${prediction.error ?? 'no detail'}`
      );
    }

    const output = prediction.output;
    const text = Array.isArray(output) ? output.join('') : output ?? '';
    return parseJudgeResponse(text);
  }

  private headers(): Record<string, string> {
    return { Authorization: `Bearer ${this.config.apiKey}` };
  }

  private timeout(): number {
    return this.config.timeout ?? DEFAULT_PROVIDER_TIMEOUT;
  }
}
