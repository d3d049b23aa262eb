/**
 * Modelsync QC - Judges
 * Local (inference server) and cloud judges behind one interface, with reply-level retries
 */

import {
  createJudgeProvider,
  isCloudReference,
  isRetryableError,
  parseJudgeReference,
  parseJudgeResponse,
  type BestAnswer,
  type InferenceServer,
  type JudgeCompletion,
  type JudgeProvider,
  type ProviderOptions,
} from '@modelsync/ai-gateway';
import { createLogger, errorMessage, withRetry, type Logger } from '@modelsync/shared';
import { JudgeResponseError } from './errors.js';
import {
  JUDGE_MAX_TOKENS,
  JUDGE_RESPONSE_FORMAT,
  JUDGE_SYSTEM_PROMPT,
  buildJudgePrompt,
  type JudgeRequest,
} from './prompts.js';
import { DEFAULT_TEST_OPTIONS } from './types.js';

export interface JudgeVerdict {
  score: number;
  /** Empty when the judge never produced one */
  reason: string;
  bestAnswer?: BestAnswer;
}

export interface Judge {
  /** Stored with every judgment; a different label triggers re-judging */
  readonly model: string;
  validate(signal?: AbortSignal): Promise<void>;
  judge(request: JudgeRequest, signal?: AbortSignal): Promise<JudgeVerdict>;
}

export interface JudgeRetryPolicy {
  attempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export const LOCAL_JUDGE_RETRY: JudgeRetryPolicy = { attempts: 25, baseDelayMs: 5000, maxDelayMs: 30000 };
export const CLOUD_JUDGE_RETRY: JudgeRetryPolicy = { attempts: 5, baseDelayMs: 2000, maxDelayMs: 20000 };

/**
 * Ask until a reply carries both score and reason. A score without a reason after the last
 * attempt is kept with an empty reason; no score at all raises JudgeResponseError.
 */
export async function judgeWithRetries(
  label: string,
  complete: () => Promise<JudgeCompletion>,
  policy: JudgeRetryPolicy,
  logger: Logger,
  signal?: AbortSignal
): Promise<JudgeVerdict> {
  let partial: JudgeVerdict | undefined;

  try {
    return await withRetry(
      async () => {
        const completion = await complete();
        if (completion.score !== null) {
          const verdict = { score: completion.score, reason: completion.reason, bestAnswer: completion.bestAnswer };
          if (completion.reason) return verdict;
          partial = verdict;
          throw new JudgeResponseError(`${label} replied without a reason`, completion.rawResponse);
        }
        throw new JudgeResponseError(`${label} replied without a score`, completion.rawResponse);
      },
      {
        ...policy,
        signal,
        shouldRetry: error => error instanceof JudgeResponseError || isRetryableError(error),
        onRetry: (error, attempt, delayMs) =>
          logger.debug(`${label} attempt ${attempt} failed: ${errorMessage(error)}; retrying in ${delayMs}ms`),
      }
    );
  } catch (error) {
    if (partial && !signal?.aborted) {
      logger.warn(`${label} gave a score but no reason after ${policy.attempts} attempts`);
      return partial;
    }
    throw error;
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// LOCAL JUDGE
// ═══════════════════════════════════════════════════════════════════════════

export interface LocalJudgeOptions {
  /** Stored label; defaults to the model name */
  label?: string;
  contextLength?: number;
  timeoutMs?: number;
  retry?: JudgeRetryPolicy;
  logger?: Logger;
}

/**
 * Judge running on an inference server, asked for JSON through a response schema
 */
export class LocalJudge implements Judge {
  readonly model: string;
  private server: Pick<InferenceServer, 'chat' | 'listModels' | 'baseUrl'>;
  private modelName: string;
  private contextLength: number;
  private timeoutMs: number | false;
  private retry: JudgeRetryPolicy;
  private logger: Logger;

  constructor(
    server: Pick<InferenceServer, 'chat' | 'listModels' | 'baseUrl'>,
    modelName: string,
    options: LocalJudgeOptions = {}
  ) {
    this.server = server;
    this.modelName = modelName;
    this.model = options.label ?? modelName;
    this.contextLength = options.contextLength ?? DEFAULT_TEST_OPTIONS.judgeContextLength;
    this.timeoutMs = options.timeoutMs ?? false;
    this.retry = options.retry ?? LOCAL_JUDGE_RETRY;
    this.logger = options.logger ?? createLogger('judge');
  }

  async validate(signal?: AbortSignal): Promise<void> {
    const models = await this.server.listModels({ signal });
    const wanted = withDefaultTag(this.modelName).toLowerCase();
    if (!models.some(m => withDefaultTag(m.name).toLowerCase() === wanted)) {
      throw new Error(`Judge model ${this.modelName} is not installed on ${this.server.baseUrl}`);
    }
  }

  async judge(request: JudgeRequest, signal?: AbortSignal): Promise<JudgeVerdict> {
    return judgeWithRetries(
      this.model,
      async () => {
        const result = await this.server.chat(
          {
            model: this.modelName,
            messages: [
              { role: 'system', content: JUDGE_SYSTEM_PROMPT },
              { role: 'user', content: buildJudgePrompt(request) },
            ],
            format: JUDGE_RESPONSE_FORMAT,
            options: { temperature: 0, seed: 42, numPredict: JUDGE_MAX_TOKENS, numCtx: this.contextLength },
          },
          { signal, timeout: this.timeoutMs }
        );
        return parseJudgeResponse(result.content);
      },
      this.retry,
      this.logger,
      signal
    );
  }
}

function withDefaultTag(name: string): string {
  const slash = name.lastIndexOf('/');
  return name.lastIndexOf(':') > slash ? name : `${name}:latest`;
}

// ═══════════════════════════════════════════════════════════════════════════
// CLOUD JUDGE
// ═══════════════════════════════════════════════════════════════════════════

export class CloudJudge implements Judge {
  readonly model: string;
  private provider: JudgeProvider;
  private retry: JudgeRetryPolicy;
  private logger: Logger;

  constructor(provider: JudgeProvider, options: { retry?: JudgeRetryPolicy; logger?: Logger } = {}) {
    this.provider = provider;
    this.model = `@${provider.provider}/${provider.model}`;
    this.retry = options.retry ?? CLOUD_JUDGE_RETRY;
    this.logger = options.logger ?? createLogger('judge');
  }

  async validate(signal?: AbortSignal): Promise<void> {
    await this.provider.validateConnection(signal);
  }

  async judge(request: JudgeRequest, signal?: AbortSignal): Promise<JudgeVerdict> {
    return judgeWithRetries(
      this.model,
      () => this.provider.judge(JUDGE_SYSTEM_PROMPT, buildJudgePrompt(request), JUDGE_MAX_TOKENS, signal),
      this.retry,
      this.logger,
      signal
    );
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// FACTORY
// ═══════════════════════════════════════════════════════════════════════════

export interface JudgeFactoryOptions extends ProviderOptions {
  /** Server used for testing; plain model references judge there */
  testServer: Pick<InferenceServer, 'chat' | 'listModels' | 'baseUrl'>;
  connect: (serverUrl: string) => Pick<InferenceServer, 'chat' | 'listModels' | 'baseUrl'>;
  env?: Record<string, string | undefined>;
  contextLength?: number;
  timeoutMs?: number;
  logger?: Logger;
}

/**
 * "@provider[:token]/model" (cloud), "http://host:port/model" (another server) or "model"
 */
export function createJudge(reference: string, options: JudgeFactoryOptions): Judge {
  const logger = options.logger ?? createLogger('judge');

  if (isCloudReference(reference)) {
    const config = parseJudgeReference(reference, options.env);
    return new CloudJudge(createJudgeProvider(config, { fetch: options.fetch }), { logger });
  }

  const remote = /^(https?:\/\/[^/]+)\/(.+)$/i.exec(reference);
  if (remote?.[1] && remote[2]) {
    return new LocalJudge(options.connect(remote[1]), remote[2], {
      label: reference,
      contextLength: options.contextLength,
      timeoutMs: options.timeoutMs,
      logger,
    });
  }

  return new LocalJudge(options.testServer, reference, {
    contextLength: options.contextLength,
    timeoutMs: options.timeoutMs,
    logger,
  });
}
