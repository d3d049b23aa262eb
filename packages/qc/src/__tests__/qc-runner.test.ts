// ── Modelsync QC: Run State Machine ──
// The inference server is an in-memory fake; result documents go to a temp directory.

import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import type {
  GenerateRequest,
  GenerateResult,
  ModelSummary,
  ProgressEvent,
  RequestOptions,
  ShowResponse,
} from '@modelsync/ai-gateway';
import { LogStreamer } from '@modelsync/shared';
import { QcRunner, type QcServer } from '../qc-runner.js';
import { ResultStore } from '../result-store.js';
import { splitTagList } from '../tag-resolver.js';
import { AbortRunError } from '../errors.js';
import type { Judge, JudgeVerdict } from '../judge.js';
import type { JudgeRequest } from '../prompts.js';
import type { Prompter, QcEvent, QcRunOptions, TestSuite } from '../types.js';

// ── Helpers ──
const SUITE: TestSuite = {
  name: 'mini',
  categories: [
    {
      id: 'reasoning',
      name: 'Reasoning',
      questions: [
        { id: '1', text: 'What is 6 times 7?' },
        { id: '2', text: 'Name the largest planet.' },
      ],
    },
    { id: 'coding', name: 'Coding', contextLength: 8192, questions: [{ id: '1', text: 'Reverse a string in one line.' }] },
  ],
};

const FAST_RETRY = { questionDelayMs: 1, timeoutDelayMs: 1, timeoutMaxDelayMs: 1 };

function summary(name: string, family = 'llama', parameterSize = '3B'): ModelSummary {
  const tag = name.slice(name.lastIndexOf(':') + 1);
  return {
    name,
    size: 1000,
    digest: `digest-${tag}`,
    modifiedAt: '',
    details: { family, parameterSize, quantizationLevel: tag.toUpperCase() },
  };
}

class FakeQcServer implements QcServer {
  readonly baseUrl = 'http://gpu-box:11434';
  installed: Map<string, ModelSummary> = new Map();
  /** Models pull() can fetch */
  registry: Map<string, ModelSummary> = new Map();
  generated: GenerateRequest[] = [];
  loaded: string[] = [];
  unloaded: string[] = [];
  deleted: string[] = [];
  pulled: string[] = [];
  /** Upcoming generate calls that never answer */
  hangs = 0;
  /** Upcoming generate calls that fail to connect */
  connectionFailures = 0;

  install(...models: ModelSummary[]): this {
    for (const model of models) this.installed.set(model.name, model);
    return this;
  }

  async listModels(): Promise<ModelSummary[]> {
    return Array.from(this.installed.values());
  }

  async show(model: string): Promise<ShowResponse> {
    const entry = this.installed.get(model);
    if (!entry) throw new Error(`model "${model}" not found`);
    return { modelfile: '', parameters: '', template: '', details: entry.details };
  }

  async *pull(model: string): AsyncGenerator<ProgressEvent> {
    const entry = this.registry.get(model);
    if (!entry) throw new Error(`pull model manifest: file does not exist`);
    yield { status: 'pulling manifest' };
    this.installed.set(model, entry);
    this.pulled.push(model);
    yield { status: 'success' };
  }

  async delete(model: string): Promise<void> {
    this.installed.delete(model);
    this.deleted.push(model);
  }

  async load(model: string): Promise<void> {
    this.loaded.push(model);
  }

  async unload(model: string): Promise<void> {
    this.unloaded.push(model);
  }

  async generate(request: GenerateRequest, options?: RequestOptions): Promise<GenerateResult> {
    this.generated.push(request);

    if (this.hangs > 0) {
      this.hangs--;
      const signal = options?.signal;
      return new Promise<GenerateResult>((_, reject) => {
        signal?.addEventListener('abort', () => reject(new Error('request aborted')), { once: true });
      });
    }
    if (this.connectionFailures > 0) {
      this.connectionFailures--;
      throw new TypeError('fetch failed');
    }

    const tag = request.model.slice(request.model.lastIndexOf(':') + 1);
    const answer = `${request.prompt} answered by ${tag}`;
    return {
      answer,
      tokens: answer.split(' ').map(token => ({ token, logprob: -0.2 })),
      evalCount: answer.split(' ').length,
      promptEvalCount: 5,
      evalTokensPerSecond: 30,
      promptTokensPerSecond: 120,
      totalDurationMs: 250,
    };
  }
}

class FixedJudge implements Judge {
  readonly model = 'qwen2.5:7b';
  requests: JudgeRequest[] = [];

  async validate(): Promise<void> {}

  async judge(request: JudgeRequest): Promise<JudgeVerdict> {
    this.requests.push(request);
    return { score: 80, reason: 'A and B match: same facts', bestAnswer: 'AB' };
  }
}

/** Notes how many answers the server had produced when each judgment started */
class SlowJudge extends FixedJudge {
  startedAfter: number[] = [];

  constructor(private server: FakeQcServer) {
    super();
  }

  override async judge(request: JudgeRequest): Promise<JudgeVerdict> {
    this.startedAfter.push(this.server.generated.length);
    await new Promise(resolve => setTimeout(resolve, 5));
    return super.judge(request);
  }
}

// ─────────────────────────────────────────
describe('QcRunner', () => {
  let dir: string;
  let outputPath: string;
  let server: FakeQcServer;
  const store = new ResultStore(() => new Date('2026-04-01T00:00:00.000Z'));
  const logger = new LogStreamer(100, 'error').child('qc');

  function runner(deps: { judge?: Judge; prompter?: Prompter } = {}) {
    const events: QcEvent[] = [];
    const qc = new QcRunner({
      server,
      tagResolver: { resolveAll: async (_model, patterns) => splitTagList(patterns) },
      store,
      prompter: deps.prompter ?? { onTimeout: async () => 'cancel' },
      judge: deps.judge,
      logger,
      retry: FAST_RETRY,
    });
    qc.on(event => events.push(event));
    return { qc, events };
  }

  function options(overrides: Partial<QcRunOptions> = {}): QcRunOptions {
    return { model: 'llama3.2', tags: ['q4_K_M', 'q8_0'], outputPath, suite: SUITE, ...overrides };
  }

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'modelsync-qc-'));
    outputPath = path.join(dir, 'llama3.2.qc.json');
    server = new FakeQcServer().install(
      summary('llama3.2:fp16'),
      summary('llama3.2:q4_K_M'),
      summary('llama3.2:q8_0')
    );
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('tests the base first, then each candidate, and judges candidate answers', async () => {
    const judge = new FixedJudge();
    const { qc, events } = runner({ judge });

    const result = await qc.run(options({ judgeMode: 'serial' }));

    expect(result.exitCode).toBe(0);
    expect(result.tested).toEqual(['fp16', 'q4_K_M', 'q8_0']);
    expect(result.document.results.map(r => [r.tag, r.isBase, r.questionResults.length])).toEqual([
      ['fp16', true, 3],
      ['q4_K_M', false, 3],
      ['q8_0', false, 3],
    ]);
    expect(result.document.results[1]?.quantizationType).toBe('Q4_K_M');

    expect(server.generated.map(g => [g.model, g.options?.numCtx])).toEqual([
      ['llama3.2:fp16', 4096],
      ['llama3.2:fp16', 4096],
      ['llama3.2:fp16', 8192],
      ['llama3.2:q4_K_M', 4096],
      ['llama3.2:q4_K_M', 4096],
      ['llama3.2:q4_K_M', 8192],
      ['llama3.2:q8_0', 4096],
      ['llama3.2:q8_0', 4096],
      ['llama3.2:q8_0', 8192],
    ]);
    expect(server.generated[0]?.options).toMatchObject({ temperature: 0, seed: 365, topP: 0.001, topK: -1, numPredict: 4096 });
    expect(server.loaded).toEqual(['llama3.2:fp16', 'llama3.2:q4_K_M', 'llama3.2:q8_0']);
    expect(server.unloaded).toEqual(server.loaded);

    expect(judge.requests).toHaveLength(6);
    expect(judge.requests[0]).toEqual({
      question: 'What is 6 times 7?',
      baseAnswer: 'What is 6 times 7? answered by fp16',
      candidateAnswer: 'What is 6 times 7? answered by q4_K_M',
    });
    expect(result.document.results[0]?.questionResults.every(q => q.judgment === undefined)).toBe(true);
    expect(result.document.results[2]?.questionResults.map(q => q.judgment?.score)).toEqual([80, 80, 80]);

    const doneScores = events.flatMap(e => (e.type === 'question-done' ? [[e.tag, typeof e.score]] : []));
    expect(doneScores[0]).toEqual(['fp16', 'undefined']);
    expect(doneScores[3]).toEqual(['q4_K_M', 'number']);

    expect(await store.load(outputPath)).toEqual(result.document);
  });

  it('resumes with only the missing questions and keeps stored sampling options', async () => {
    await runner().qc.run(options({ tags: ['q4_K_M'] }));
    const saved = await store.load(outputPath);
    saved?.results[1]?.questionResults.splice(1, 2);
    if (!saved) throw new Error('no document');
    await store.save(outputPath, saved);
    server.generated = [];

    const { qc, events } = runner();
    const result = await qc.run(options({ tags: ['q4_K_M'], sampling: { seed: 7 } }));

    expect(server.generated.map(g => g.prompt)).toEqual(['Name the largest planet.', 'Reverse a string in one line.']);
    expect(server.generated[0]?.options?.seed).toBe(365);
    expect(result.skipped).toEqual(['fp16']);
    expect(result.document.results[1]?.questionResults.map(q => q.questionId)).toEqual([
      'reasoning-1',
      'reasoning-2',
      'coding-1',
    ]);
    expect(events).toContainEqual({ type: 'quant-skipped', tag: 'fp16', reason: 'already complete' });
    expect(events.some(e => e.type === 'warning' && e.message.startsWith('Keeping the sampling options'))).toBe(true);
  });

  it('records the judge context in new documents without warning on resume', async () => {
    const first = await runner().qc.run(options({ tags: [], judgeContextLength: 16384 }));
    expect(first.document.options.judgeContextLength).toBe(16384);

    const { qc, events } = runner();
    const resumed = await qc.run(options({ tags: ['q4_K_M'], judgeContextLength: 8192 }));

    expect(resumed.document.options.judgeContextLength).toBe(16384);
    expect(events.filter(e => e.type === 'warning')).toEqual([]);
  });

  it('judges complete results without testing them again', async () => {
    await runner().qc.run(options({ tags: ['q4_K_M'] }));
    server.generated = [];
    const judge = new FixedJudge();

    const result = await runner({ judge }).qc.run(options({ tags: ['q4_K_M'], judgeMode: 'parallel' }));

    expect(server.generated).toEqual([]);
    expect(judge.requests).toHaveLength(3);
    expect(result.document.results[1]?.questionResults.map(q => q.judgment?.judgeModel)).toEqual([
      'qwen2.5:7b',
      'qwen2.5:7b',
      'qwen2.5:7b',
    ]);
    expect((await store.load(outputPath))?.results[1]?.questionResults[0]?.judgment?.score).toBe(80);
  });

  it('re-judges stored answers as well as new ones when resuming with rejudge', async () => {
    await runner({ judge: new FixedJudge() }).qc.run(options({ tags: ['q4_K_M'] }));
    const saved = await store.load(outputPath);
    if (!saved) throw new Error('no document');
    saved.results[1]?.questionResults.splice(2, 1);
    await store.save(outputPath, saved);
    server.generated = [];
    const judge = new FixedJudge();

    const result = await runner({ judge }).qc.run(options({ tags: ['q4_K_M'], rejudge: true }));

    expect(server.generated.map(g => g.prompt)).toEqual(['Reverse a string in one line.']);
    expect(judge.requests.map(r => r.question)).toEqual([
      'Reverse a string in one line.',
      'What is 6 times 7?',
      'Name the largest planet.',
    ]);
    expect(result.document.results[1]?.questionResults.map(q => q.judgment?.score)).toEqual([80, 80, 80]);
  });

  it('judges a candidate in parallel while it is still being tested', async () => {
    const judge = new SlowJudge(server);

    const result = await runner({ judge }).qc.run(options({ tags: ['q4_K_M'], judgeMode: 'parallel' }));

    expect(judge.startedAfter).toEqual([4, 5, 6]);
    expect(judge.requests).toHaveLength(3);
    expect(result.document.results[1]?.questionResults.map(q => q.judgment?.score)).toEqual([80, 80, 80]);
    expect((await store.load(outputPath))?.results[1]?.questionResults.map(q => q.judgment?.score)).toEqual([
      80, 80, 80,
    ]);
  });

  // ─────────────────────────────────────────
  it('pulls missing quantizations on demand and removes them once complete', async () => {
    server.installed.delete('llama3.2:q4_K_M');
    server.registry.set('llama3.2:q4_K_M', summary('llama3.2:q4_K_M'));
    const { qc, events } = runner();

    const result = await qc.run(options({ tags: ['q4_K_M'], onDemand: true }));

    expect(server.pulled).toEqual(['llama3.2:q4_K_M']);
    expect(server.deleted).toEqual(['llama3.2:q4_K_M']);
    expect(result.document.results[1]?.pulledOnDemand).toBe(false);
    expect(events).toContainEqual({ type: 'cleanup', model: 'llama3.2:q4_K_M', removed: true });
  });

  it('keeps a partially tested on-demand model and removes it after a resumed run', async () => {
    server.installed.delete('llama3.2:q4_K_M');
    server.registry.set('llama3.2:q4_K_M', summary('llama3.2:q4_K_M'));
    const first = runner();
    first.qc.on(event => {
      if (event.type === 'question-done' && event.tag === 'q4_K_M') first.qc.runContext.cancel();
    });

    const cancelled = await first.qc.run(options({ tags: ['q4_K_M'], onDemand: true }));

    expect(cancelled.cancelled).toBe(true);
    expect(cancelled.exitCode).toBe(2);
    expect(server.deleted).toEqual([]);
    expect(first.events).toContainEqual({ type: 'cleanup', model: 'llama3.2:q4_K_M', removed: false });
    const partial = (await store.load(outputPath))?.results[1];
    expect(partial?.questionResults).toHaveLength(1);
    expect(partial?.pulledOnDemand).toBe(true);

    const resumed = await runner().qc.run(options({ tags: ['q4_K_M'], onDemand: true }));

    expect(server.pulled).toEqual(['llama3.2:q4_K_M']);
    expect(server.deleted).toEqual(['llama3.2:q4_K_M']);
    expect(resumed.document.results[1]?.questionResults).toHaveLength(3);
    expect(resumed.document.results[1]?.pulledOnDemand).toBe(false);
  });

  it('records a missing quantization as failed without on-demand', async () => {
    server.installed.delete('llama3.2:q8_0');
    const { qc, events } = runner();

    const result = await qc.run(options());

    expect(result.exitCode).toBe(0);
    expect(result.tested).toEqual(['fp16', 'q4_K_M']);
    expect(result.failed).toEqual([
      { tag: 'q8_0', error: 'llama3.2:q8_0 is not installed on http://gpu-box:11434; pass --on-demand to pull it' },
    ]);
    expect(events.filter(e => e.type === 'quant-failed')).toHaveLength(1);
  });

  it('stops when the base cannot be tested', async () => {
    server.installed.delete('llama3.2:fp16');

    const result = await runner().qc.run(options());

    expect(result.exitCode).toBe(1);
    expect(result.failed.map(f => f.tag)).toEqual(['fp16']);
    expect(server.generated).toEqual([]);
  });

  // ─────────────────────────────────────────
  it('aborts before writing anything when a quantization belongs to another model', async () => {
    server.install(summary('llama3.2:q4_K_M', 'qwen2', '7B'));

    await expect(runner().qc.run(options({ tags: ['q4_K_M'] }))).rejects.toBeInstanceOf(AbortRunError);
    expect(await store.load(outputPath)).toBeNull();
    expect(server.generated).toEqual([]);
  });

  it('leaves an existing document untouched when the fingerprint differs', async () => {
    await runner().qc.run(options({ tags: [] }));
    const before = await readFile(outputPath, 'utf-8');
    server.install(summary('llama3.2:q4_K_M', 'qwen2', '7B'));

    await expect(runner().qc.run(options({ tags: ['q4_K_M'] }))).rejects.toThrow(
      'q4_K_M is qwen2/7b but fp16 is llama/3b'
    );
    expect(await readFile(outputPath, 'utf-8')).toBe(before);
  });

  // ─────────────────────────────────────────
  it('asks the prompter after repeated timeouts and doubles the timeout', async () => {
    server.hangs = 3;
    const onTimeout = vi.fn<Prompter['onTimeout']>(async () => 'extend');

    const result = await runner({ prompter: { onTimeout } }).qc.run(options({ tags: [], timeoutMs: 20 }));

    expect(onTimeout).toHaveBeenCalledTimes(1);
    expect(onTimeout).toHaveBeenCalledWith({ model: 'llama3.2:fp16', questionId: 'reasoning-1', timeoutMs: 20 });
    expect(server.generated).toHaveLength(6);
    expect(result.exitCode).toBe(0);
    expect(result.document.results[0]?.questionResults).toHaveLength(3);
  });

  it('cancels the run when the prompter declines to wait', async () => {
    server.hangs = 3;

    const result = await runner().qc.run(options({ tags: ['q4_K_M'], timeoutMs: 20 }));

    expect(result.cancelled).toBe(true);
    expect(result.exitCode).toBe(2);
    expect(server.generated).toHaveLength(3);
  });

  it('retries questions after connection failures', async () => {
    server.connectionFailures = 2;
    const { qc, events } = runner();

    const result = await qc.run(options({ tags: [] }));

    expect(result.document.results[0]?.questionResults).toHaveLength(3);
    expect(server.generated).toHaveLength(5);
    expect(events.filter(e => e.type === 'warning' && e.message.includes('fetch failed'))).toHaveLength(2);
  });
});
