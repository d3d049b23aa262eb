/**
 * Modelsync QC - Tag Resolver
 * Expands wildcard quantization patterns against tag listings
 */

import ky, { type KyInstance } from 'ky';
import { z } from 'zod';
import type { InferenceServer } from '@modelsync/ai-gateway';
import { createLogger, errorMessage, type Logger } from '@modelsync/shared';
import { PatternMatchedNothingError } from './errors.js';

const QUANT_PATTERN = /(?:IQ[1-4]_(?:XXS|XS|S|M|NL)|Q[2-8]_(?:K_[SML]|K|[01])|[FB]F?(?:16|32))$/i;

const HF_PREFIX = 'hf.co/';

const HfModelInfoSchema = z.object({
  siblings: z.array(z.object({ rfilename: z.string() })).optional(),
});

/**
 * Where the tags of a model are listed
 */
export interface TagSource {
  readonly name: string;
  listTags(model: string, signal?: AbortSignal): Promise<string[]>;
}

export interface TagResolverConfig {
  /** Server whose installed tags are listed */
  server?: Pick<InferenceServer, 'listModels'>;
  libraryUrl?: string;
  huggingFaceUrl?: string;
  fetch?: typeof fetch;
  timeout?: number;
  logger?: Logger;
}

/**
 * Quantization suffix of a GGUF filename, e.g. "Model-7B-Q4_K_M.gguf" -> "Q4_K_M"
 */
export function extractQuantTag(filename: string): string | null {
  if (!filename.toLowerCase().endsWith('.gguf')) return null;
  const match = QUANT_PATTERN.exec(filename.slice(0, -'.gguf'.length));
  return match ? match[0] : null;
}

/**
 * Case-insensitive glob: "*" matches any run of characters, "?" a single one
 */
export function globToRegExp(pattern: string): RegExp {
  const escaped = pattern.replace(/[.+^${}()|[\]\\]/g, '\\$&').replace(/\*/g, '.*').replace(/\?/g, '.');
  return new RegExp(`^${escaped}$`, 'i');
}

export function isWildcard(pattern: string): boolean {
  return pattern.includes('*') || pattern.includes('?');
}

/**
 * Tags matching `pattern`, in listing order, without case-insensitive duplicates
 */
export function matchTags(pattern: string, tags: string[]): string[] {
  const regex = globToRegExp(pattern);
  return dedupe(tags.filter(tag => regex.test(tag)));
}

function dedupe(tags: string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const tag of tags) {
    const key = tag.toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);
    result.push(tag);
  }
  return result;
}

/**
 * Split "q4_K_M, q8_0,Q5*" into trimmed entries
 */
export function splitTagList(value: string | string[]): string[] {
  const entries = Array.isArray(value) ? value : [value];
  return entries.flatMap(entry => entry.split(',')).map(tag => tag.trim()).filter(tag => tag.length > 0);
}

function baseModelName(name: string): string {
  const slash = name.lastIndexOf('/');
  const colon = name.lastIndexOf(':');
  return colon > slash ? name.slice(0, colon) : name;
}

function tagOf(name: string): string {
  const slash = name.lastIndexOf('/');
  const colon = name.lastIndexOf(':');
  return colon > slash ? name.slice(colon + 1) : 'latest';
}

// ═══════════════════════════════════════════════════════════════════════════
// SOURCES
// ═══════════════════════════════════════════════════════════════════════════

export class ServerTagSource implements TagSource {
  readonly name = 'server';

  constructor(private server: Pick<InferenceServer, 'listModels'>) {}

  async listTags(model: string, signal?: AbortSignal): Promise<string[]> {
    const wanted = baseModelName(model).toLowerCase();
    const models = await this.server.listModels({ signal });
    return models.filter(m => baseModelName(m.name).toLowerCase() === wanted).map(m => tagOf(m.name));
  }
}

/**
 * The library has no tag-list API, so tags are read from links on the model's tags page
 */
export class LibraryTagSource implements TagSource {
  readonly name = 'library';

  constructor(
    private http: KyInstance,
    private baseUrl: string,
    private timeout: number
  ) {}

  async listTags(model: string, signal?: AbortSignal): Promise<string[]> {
    const path = model.includes('/') ? model : `library/${model}`;
    const html = await this.http
      .get(`${this.baseUrl}/${path}/tags`, { timeout: this.timeout, signal })
      .text();
    return parseLibraryTags(html, path);
  }
}

export function parseLibraryTags(html: string, path: string): string[] {
  const escaped = path.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
  const link = new RegExp(`/${escaped}:([^"'\\s\\])<>]+)`, 'gi');
  return dedupe(Array.from(html.matchAll(link), match => match[1] ?? '').filter(tag => tag.length > 0));
}

export class HuggingFaceTagSource implements TagSource {
  readonly name = 'huggingface';

  constructor(
    private http: KyInstance,
    private baseUrl: string,
    private timeout: number
  ) {}

  async listTags(model: string, signal?: AbortSignal): Promise<string[]> {
    const repo = model.slice(HF_PREFIX.length);
    const body = await this.http
      .get(`${this.baseUrl}/api/models/${repo}`, { timeout: this.timeout, signal })
      .json<unknown>();
    const info = HfModelInfoSchema.parse(body);

    const tags: string[] = [];
    for (const sibling of info.siblings ?? []) {
      const tag = extractQuantTag(sibling.rfilename);
      if (tag) tags.push(tag);
    }
    return dedupe(tags);
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// RESOLVER
// ═══════════════════════════════════════════════════════════════════════════

export class TagResolver {
  private sources: TagSource[];
  private huggingFace: TagSource;
  private logger: Logger;

  constructor(config: TagResolverConfig = {}) {
    const http = config.fetch ? ky.create({ retry: 0, fetch: config.fetch }) : ky.create({ retry: 0 });
    const timeout = config.timeout ?? 30000;
    this.logger = config.logger ?? createLogger('tag-resolver');

    this.sources = [];
    if (config.server) this.sources.push(new ServerTagSource(config.server));
    this.sources.push(new LibraryTagSource(http, (config.libraryUrl ?? 'https://ollama.com').replace(/\/+$/, ''), timeout));
    this.huggingFace = new HuggingFaceTagSource(
      http,
      (config.huggingFaceUrl ?? 'https://huggingface.co').replace(/\/+$/, ''),
      timeout
    );
  }

  /**
   * Literal tags pass through unchanged; wildcards expand against every source
   */
  async resolve(model: string, pattern: string, signal?: AbortSignal): Promise<string[]> {
    if (!isWildcard(pattern)) return [pattern];

    const listing = await this.listTags(model, signal);
    const matches = matchTags(pattern, listing);
    if (matches.length === 0) {
      throw new PatternMatchedNothingError(pattern, model);
    }

    this.logger.debug(`Pattern ${pattern} resolved to ${matches.join(', ')}`, { model });
    return matches;
  }

  async resolveAll(model: string, patterns: string | string[], signal?: AbortSignal): Promise<string[]> {
    const tags: string[] = [];
    for (const pattern of splitTagList(patterns)) {
      tags.push(...(await this.resolve(model, pattern, signal)));
    }
    return dedupe(tags);
  }

  /**
   * A source that fails is logged and skipped; the others still count
   */
  async listTags(model: string, signal?: AbortSignal): Promise<string[]> {
    const sources = model.toLowerCase().startsWith(HF_PREFIX) ? [this.huggingFace] : this.sources;
    const tags: string[] = [];

    for (const source of sources) {
      try {
        tags.push(...(await source.listTags(model, signal)));
      } catch (error) {
        if (signal?.aborted) throw error;
        this.logger.warn(`Could not list ${model} tags from ${source.name}: ${errorMessage(error)}`);
      }
    }
    return dedupe(tags);
  }
}
