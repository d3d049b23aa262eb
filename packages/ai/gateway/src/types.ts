/**
 * Modelsync AI Gateway - Type Definitions
 */

import { z } from 'zod';

// ═══════════════════════════════════════════════════════════════════════════
// INFERENCE SERVER
// ═══════════════════════════════════════════════════════════════════════════

export interface ModelDetails {
  format?: string;
  family?: string;
  families?: string[] | null;
  parameterSize?: string;
  quantizationLevel?: string;
}

export interface ModelSummary {
  name: string;
  size: number;
  digest: string;
  modifiedAt: string;
  details: ModelDetails;
}

export interface ShowResponse {
  modelfile: string;
  parameters: string;
  template: string;
  system?: string;
  license?: string;
  details: ModelDetails;
  modelInfo?: Record<string, unknown>;
  capabilities?: string[];
}

export interface RunningModel {
  name: string;
  size: number;
  sizeVram: number;
  digest: string;
  expiresAt: string;
  details: ModelDetails;
}

/** One line of a streamed pull/push/create response */
export interface ProgressEvent {
  status: string;
  digest?: string;
  total?: number;
  completed?: number;
}

export interface SamplingOptions {
  temperature?: number;
  seed?: number;
  topP?: number;
  topK?: number;
  repeatPenalty?: number;
  frequencyPenalty?: number;
  numPredict?: number;
  numCtx?: number;
}

export interface GenerateRequest {
  model: string;
  prompt: string;
  system?: string;
  options?: SamplingOptions;
  logprobs?: boolean;
  keepAlive?: string | number;
}

export interface TokenLogprob {
  token: string;
  logprob: number;
}

export interface GenerateChunk {
  response: string;
  logprobs: TokenLogprob[];
  done: boolean;
  evalCount?: number;
  evalDuration?: number;
  promptEvalCount?: number;
  promptEvalDuration?: number;
  totalDuration?: number;
}

export interface GenerateResult {
  answer: string;
  tokens: TokenLogprob[];
  evalCount: number;
  promptEvalCount: number;
  /** Tokens per second over the eval phase */
  evalTokensPerSecond: number;
  promptTokensPerSecond: number;
  totalDurationMs: number;
}

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface ChatRequest {
  model: string;
  messages: ChatMessage[];
  options?: SamplingOptions;
  /** "json" or a JSON schema constraining the reply */
  format?: 'json' | Record<string, unknown>;
  keepAlive?: string | number;
}

export interface ChatResult {
  content: string;
  evalCount: number;
  promptEvalCount: number;
}

export interface CreateRequest {
  model: string;
  /** Filename to blob digest, e.g. { "model.gguf": "sha256:..." } */
  files?: Record<string, string>;
  adapters?: Record<string, string>;
  template?: string;
  system?: string;
  parameters?: Record<string, unknown>;
  license?: string | string[];
}

export interface RequestOptions {
  signal?: AbortSignal;
  /** Overrides the adapter timeout; false disables it */
  timeout?: number | false;
}

/**
 * Operations exposed by an inference server
 */
export interface InferenceServer {
  readonly baseUrl: string;
  listModels(options?: RequestOptions): Promise<ModelSummary[]>;
  show(model: string, options?: RequestOptions & { verbose?: boolean }): Promise<ShowResponse>;
  pull(model: string, options?: RequestOptions): AsyncGenerator<ProgressEvent>;
  push(model: string, options?: RequestOptions): AsyncGenerator<ProgressEvent>;
  copy(source: string, destination: string, options?: RequestOptions): Promise<void>;
  delete(model: string, options?: RequestOptions): Promise<void>;
  generate(request: GenerateRequest, options?: RequestOptions): Promise<GenerateResult>;
  chat(request: ChatRequest, options?: RequestOptions): Promise<ChatResult>;
  listRunning(options?: RequestOptions): Promise<RunningModel[]>;
  version(options?: RequestOptions): Promise<string>;
  load(model: string, keepAlive?: string | number, options?: RequestOptions): Promise<void>;
  unload(model: string, options?: RequestOptions): Promise<void>;
  hasBlob(digest: string, options?: RequestOptions): Promise<boolean>;
  uploadBlob(digest: string, body: ReadableStream<Uint8Array>, options?: RequestOptions): Promise<void>;
  create(request: CreateRequest, options?: RequestOptions): AsyncGenerator<ProgressEvent>;
}

// ═══════════════════════════════════════════════════════════════════════════
// JUDGE PROVIDERS
// ═══════════════════════════════════════════════════════════════════════════

export type CloudProvider =
  | 'anthropic'
  | 'openai'
  | 'gemini'
  | 'huggingface'
  | 'azure'
  | 'cohere'
  | 'mistral'
  | 'together'
  | 'replicate';

/** A = base answer better, B = candidate better, AB = tie */
export type BestAnswer = 'A' | 'B' | 'AB';

export interface JudgeCompletion {
  /** 1-100, or null when the reply carried no usable score */
  score: number | null;
  reason: string;
  bestAnswer?: BestAnswer;
  rawResponse: string;
}

export interface CloudProviderConfig {
  provider: CloudProvider;
  model: string;
  apiKey: string;
  apiKeyFromEnv: boolean;
  /** Azure resource endpoint */
  endpoint?: string;
  timeout?: number;
}

/**
 * Uniform capability surface of a cloud judge
 */
export interface JudgeProvider {
  readonly provider: CloudProvider;
  readonly model: string;
  validateConnection(signal?: AbortSignal): Promise<void>;
  /** Best effort; empty when the provider has no listing endpoint */
  listModels(signal?: AbortSignal): Promise<string[]>;
  judge(
    systemPrompt: string,
    userPrompt: string,
    maxTokens: number,
    signal?: AbortSignal
  ): Promise<JudgeCompletion>;
}

// ═══════════════════════════════════════════════════════════════════════════
// WIRE SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════

export const ProgressLineSchema = z.object({
  status: z.string().optional(),
  digest: z.string().optional(),
  total: z.number().optional(),
  completed: z.number().optional(),
  error: z.string().optional(),
});

export const GenerateLineSchema = z.object({
  response: z.string().optional(),
  done: z.boolean().optional(),
  error: z.string().optional(),
  logprobs: z
    .array(z.object({ token: z.string(), logprob: z.number() }).passthrough())
    .nullish(),
  eval_count: z.number().optional(),
  eval_duration: z.number().optional(),
  prompt_eval_count: z.number().optional(),
  prompt_eval_duration: z.number().optional(),
  total_duration: z.number().optional(),
});

export type ProgressLine = z.infer<typeof ProgressLineSchema>;
export type GenerateLine = z.infer<typeof GenerateLineSchema>;
