/**
 * Modelsync AI Gateway - Ollama Adapter
 * Client for the inference server HTTP API
 */

import ky, { type KyInstance } from 'ky';
import { parseNDJSONWith } from './streaming.js';
import { ServerResponseError } from './errors.js';
import {
  GenerateLineSchema,
  ProgressLineSchema,
  type ChatRequest,
  type ChatResult,
  type CreateRequest,
  type GenerateChunk,
  type GenerateRequest,
  type GenerateResult,
  type InferenceServer,
  type ModelDetails,
  type ModelSummary,
  type ProgressEvent,
  type RequestOptions,
  type RunningModel,
  type SamplingOptions,
  type ShowResponse,
  type TokenLogprob,
} from './types.js';

export interface OllamaConfig {
  baseUrl?: string;
  timeout?: number;
  /** Custom fetch, used by tests to serve canned responses */
  fetch?: typeof fetch;
}

interface RawDetails {
  format?: string;
  family?: string;
  families?: string[] | null;
  parameter_size?: string;
  quantization_level?: string;
}

export const DEFAULT_SERVER_URL = 'http://localhost:11434';

export class OllamaAdapter implements InferenceServer {
  readonly baseUrl: string;
  private timeout: number;
  private http: KyInstance;

  constructor(config: OllamaConfig = {}) {
    this.baseUrl = (config.baseUrl ?? DEFAULT_SERVER_URL).replace(/\/+$/, '');
    this.timeout = config.timeout ?? 120000; // Local inference can be slow
    this.http = config.fetch
      ? ky.create({ retry: 0, fetch: config.fetch })
      : ky.create({ retry: 0 });
  }

  /**
   * List models stored on the server
   */
  async listModels(options: RequestOptions = {}): Promise<ModelSummary[]> {
    const response = await this.http
      .get(`${this.baseUrl}/api/tags`, this.requestInit(options))
      .json<{
        models: Array<{
          name: string;
          size: number;
          digest: string;
          modified_at: string;
          details?: RawDetails;
        }> | null;
      }>();

    return (response.models ?? []).map(m => ({
      name: m.name,
      size: m.size,
      digest: m.digest,
      modifiedAt: m.modified_at,
      details: mapDetails(m.details),
    }));
  }

  /**
   * Get model metadata; verbose includes tensor info
   */
  async show(
    model: string,
    options: RequestOptions & { verbose?: boolean } = {}
  ): Promise<ShowResponse> {
    const response = await this.http
      .post(`${this.baseUrl}/api/show`, {
        ...this.requestInit(options),
        json: { model, verbose: options.verbose ?? false },
      })
      .json<{
        modelfile?: string;
        parameters?: string;
        template?: string;
        system?: string;
        license?: string;
        details?: RawDetails;
        model_info?: Record<string, unknown>;
        capabilities?: string[];
      }>();

    return {
      modelfile: response.modelfile ?? '',
      parameters: response.parameters ?? '',
      template: response.template ?? '',
      system: response.system,
      license: response.license,
      details: mapDetails(response.details),
      modelInfo: response.model_info,
      capabilities: response.capabilities,
    };
  }

  /**
   * Pull a model from its registry, yielding progress lines
   */
  async *pull(model: string, options: RequestOptions = {}): AsyncGenerator<ProgressEvent> {
    const response = await this.http.post(`${this.baseUrl}/api/pull`, {
      json: { model, stream: true },
      signal: options.signal,
      timeout: options.timeout ?? false,
    });
    yield* this.progress(response);
  }

  /**
   * Push a model to its registry, yielding progress lines
   */
  async *push(model: string, options: RequestOptions = {}): AsyncGenerator<ProgressEvent> {
    const response = await this.http.post(`${this.baseUrl}/api/push`, {
      json: { model, stream: true },
      signal: options.signal,
      timeout: options.timeout ?? false,
    });
    yield* this.progress(response);
  }

  async copy(source: string, destination: string, options: RequestOptions = {}): Promise<void> {
    await this.http.post(`${this.baseUrl}/api/copy`, {
      ...this.requestInit(options),
      json: { source, destination },
    });
  }

  async delete(model: string, options: RequestOptions = {}): Promise<void> {
    await this.http.delete(`${this.baseUrl}/api/delete`, {
      ...this.requestInit(options),
      json: { model },
    });
  }

  /**
   * Stream a completion token by token, with logprobs when requested
   */
  async *generateStream(
    request: GenerateRequest,
    options: RequestOptions = {}
  ): AsyncGenerator<GenerateChunk> {
    const response = await this.http.post(`${this.baseUrl}/api/generate`, {
      json: {
        model: request.model,
        prompt: request.prompt,
        system: request.system,
        stream: true,
        logprobs: request.logprobs ?? false,
        keep_alive: request.keepAlive,
        options: toServerOptions(request.options),
      },
      signal: options.signal,
      timeout: options.timeout ?? false,
    });

    for await (const line of parseNDJSONWith(response, GenerateLineSchema)) {
      yield {
        response: line.response ?? '',
        logprobs: (line.logprobs ?? []).map(lp => ({ token: lp.token, logprob: lp.logprob })),
        done: line.done ?? false,
        evalCount: line.eval_count,
        evalDuration: line.eval_duration,
        promptEvalCount: line.prompt_eval_count,
        promptEvalDuration: line.prompt_eval_duration,
        totalDuration: line.total_duration,
      };
    }
  }

  /**
   * Run a completion to the end and collect answer, tokens and timings
   */
  async generate(request: GenerateRequest, options: RequestOptions = {}): Promise<GenerateResult> {
    let answer = '';
    const tokens: TokenLogprob[] = [];
    let final: GenerateChunk | undefined;

    for await (const chunk of this.generateStream(request, options)) {
      answer += chunk.response;
      tokens.push(...chunk.logprobs);
      if (chunk.done) final = chunk;
    }

    if (!final) {
      throw new ServerResponseError(`Generation for ${request.model} ended without a final chunk`);
    }

    return {
      answer,
      tokens,
      evalCount: final.evalCount ?? tokens.length,
      promptEvalCount: final.promptEvalCount ?? 0,
      evalTokensPerSecond: perSecond(final.evalCount, final.evalDuration),
      promptTokensPerSecond: perSecond(final.promptEvalCount, final.promptEvalDuration),
      totalDurationMs: (final.totalDuration ?? 0) / 1e6,
    };
  }

  /**
   * Non-streamed chat completion
   */
  async chat(request: ChatRequest, options: RequestOptions = {}): Promise<ChatResult> {
    const response = await this.http
      .post(`${this.baseUrl}/api/chat`, {
        ...this.requestInit(options),
        json: {
          model: request.model,
          messages: request.messages,
          stream: false,
          format: request.format,
          keep_alive: request.keepAlive,
          options: toServerOptions(request.options),
        },
      })
      .json<{
        message?: { role: string; content: string };
        eval_count?: number;
        prompt_eval_count?: number;
      }>();

    return {
      content: response.message?.content ?? '',
      evalCount: response.eval_count ?? 0,
      promptEvalCount: response.prompt_eval_count ?? 0,
    };
  }

  /**
   * Models currently loaded in memory
   */
  async listRunning(options: RequestOptions = {}): Promise<RunningModel[]> {
    const response = await this.http
      .get(`${this.baseUrl}/api/ps`, this.requestInit(options))
      .json<{
        models: Array<{
          name: string;
          size: number;
          size_vram?: number;
          digest: string;
          expires_at?: string;
          details?: RawDetails;
        }> | null;
      }>();

    return (response.models ?? []).map(m => ({
      name: m.name,
      size: m.size,
      sizeVram: m.size_vram ?? 0,
      digest: m.digest,
      expiresAt: m.expires_at ?? '',
      details: mapDetails(m.details),
    }));
  }

  async version(options: RequestOptions = {}): Promise<string> {
    const response = await this.http
      .get(`${this.baseUrl}/api/version`, this.requestInit(options))
      .json<{ version: string }>();
    return response.version;
  }

  /**
   * Load a model into memory; keepAlive omitted keeps the server default TTL
   */
  async load(model: string, keepAlive?: string | number, options: RequestOptions = {}): Promise<void> {
    await this.http.post(`${this.baseUrl}/api/generate`, {
      ...this.requestInit(options),
      json: { model, stream: false, keep_alive: keepAlive },
    });
  }

  /**
   * Evict a model from memory immediately
   */
  async unload(model: string, options: RequestOptions = {}): Promise<void> {
    await this.http.post(`${this.baseUrl}/api/generate`, {
      ...this.requestInit(options),
      json: { model, stream: false, keep_alive: 0 },
    });
  }

  async hasBlob(digest: string, options: RequestOptions = {}): Promise<boolean> {
    const response = await this.http.head(`${this.baseUrl}/api/blobs/${digest}`, {
      ...this.requestInit(options),
      throwHttpErrors: false,
    });

    if (response.status === 200) return true;
    if (response.status === 404) return false;
    throw new ServerResponseError(`Blob check for ${digest} returned HTTP ${response.status}`);
  }

  /**
   * Stream a blob body to the server under its digest
   */
  async uploadBlob(
    digest: string,
    body: ReadableStream<Uint8Array>,
    options: RequestOptions = {}
  ): Promise<void> {
    await this.http.post(`${this.baseUrl}/api/blobs/${digest}`, {
      body,
      headers: { 'Content-Type': 'application/octet-stream' },
      signal: options.signal,
      timeout: options.timeout ?? false,
    });
  }

  /**
   * Create a model from uploaded blobs
   */
  async *create(request: CreateRequest, options: RequestOptions = {}): AsyncGenerator<ProgressEvent> {
    const response = await this.http.post(`${this.baseUrl}/api/create`, {
      json: { ...request, stream: true },
      signal: options.signal,
      timeout: options.timeout ?? false,
    });
    yield* this.progress(response);
  }

  /**
   * Check if the server is reachable
   */
  async isRunning(): Promise<boolean> {
    try {
      await this.version({ timeout: 5000 });
      return true;
    } catch {
      return false;
    }
  }

  private async *progress(response: Response): AsyncGenerator<ProgressEvent> {
    for await (const line of parseNDJSONWith(response, ProgressLineSchema)) {
      yield {
        status: line.status ?? '',
        digest: line.digest,
        total: line.total,
        completed: line.completed,
      };
    }
  }

  private requestInit(options: RequestOptions): { signal?: AbortSignal; timeout: number | false } {
    return {
      signal: options.signal,
      timeout: options.timeout ?? this.timeout,
    };
  }
}

function mapDetails(details: RawDetails | undefined): ModelDetails {
  return {
    format: details?.format,
    family: details?.family,
    families: details?.families,
    parameterSize: details?.parameter_size,
    quantizationLevel: details?.quantization_level,
  };
}

/**
 * Convert sampling options to the server's snake_case shape, dropping unset values
 */
export function toServerOptions(options: SamplingOptions | undefined): Record<string, number> | undefined {
  if (!options) return undefined;

  const mapped: Record<string, number | undefined> = {
    temperature: options.temperature,
    seed: options.seed,
    top_p: options.topP,
    top_k: options.topK,
    repeat_penalty: options.repeatPenalty,
    frequency_penalty: options.frequencyPenalty,
    num_predict: options.numPredict,
    num_ctx: options.numCtx,
  };

  const result: Record<string, number> = {};
  for (const [key, value] of Object.entries(mapped)) {
    if (value !== undefined) result[key] = value;
  }
  return result;
}

function perSecond(count: number | undefined, durationNs: number | undefined): number {
  if (!count || !durationNs) return 0;
  return count / (durationNs / 1e9);
}
