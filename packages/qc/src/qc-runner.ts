/**
 * Modelsync QC - Run State Machine
 * Tests every requested quantization against the base, judges the answers and
 * checkpoints the result document after each quantization.
 */

import {
  isRetryableError,
  type GenerateRequest,
  type GenerateResult,
  type InferenceServer,
  type ModelSummary,
} from '@modelsync/ai-gateway';
import { createLogger, errorMessage, scopedSignal, withRetry, type Logger } from '@modelsync/shared';
import { AbortRunError, ModelMissingError, QcError, RequestTimeoutError, RunCancelledError } from './errors.js';
import { JudgeOrchestrator, type JudgeOutcome } from './judge-orchestrator.js';
import type { Judge } from './judge.js';
import {
  ResultStore,
  assertDocumentMatches,
  defaultResultPath,
  findQuant,
  fingerprintOf,
  isComplete,
  missingQuestions,
  repairBaseFlags,
  storedBaseTag,
  unjudgedQuestions,
} from './result-store.js';
import { RunContext } from './run-context.js';
import { DEFAULT_WEIGHTS, scoreAnswer } from './scoring.js';
import type { TagResolver } from './tag-resolver.js';
import { flattenSuite } from './test-suites.js';
import {
  DEFAULT_TEST_OPTIONS,
  type BaseTagMatcher,
  type Prompter,
  type QcDocument,
  type QcEvent,
  type QcRunOptions,
  type QcRunSummary,
  type QcState,
  type QuantResult,
  type QuestionResult,
  type ScoreWeights,
  type SuiteQuestion,
  type TestOptions,
} from './types.js';

export type QcServer = Pick<
  InferenceServer,
  'baseUrl' | 'listModels' | 'show' | 'pull' | 'delete' | 'generate' | 'load' | 'unload'
>;

export interface QcRunnerDependencies {
  server: QcServer;
  tagResolver: Pick<TagResolver, 'resolveAll'>;
  store?: ResultStore;
  prompter: Prompter;
  judge?: Judge;
  context?: RunContext;
  logger?: Logger;
  now?: () => Date;
  retry?: Partial<QcRetryPolicy>;
}

export interface QcRetryPolicy {
  /** Network failures of one question, linear backoff */
  questionAttempts: number;
  questionDelayMs: number;
  /** Timeouts of one question before the prompter is asked, exponential backoff */
  timeoutAttempts: number;
  timeoutDelayMs: number;
  timeoutMaxDelayMs: number;
}

export const DEFAULT_QC_RETRY: QcRetryPolicy = {
  questionAttempts: 5,
  questionDelayMs: 1000,
  timeoutAttempts: 3,
  timeoutDelayMs: 2000,
  timeoutMaxDelayMs: 30000,
};

export const DEFAULT_BASE_TAG = 'fp16';
export const DEFAULT_TIMEOUT_MS = 600_000;

type EventCallback = (event: QcEvent) => void;

interface ModelInfo {
  name: string;
  digest: string;
  size: number;
  family: string;
  parameterSize: string;
  quantizationType: string;
}

/**
 * Mutable state of one run
 */
interface RunState {
  options: QcRunOptions;
  model: string;
  outputPath: string;
  document: QcDocument;
  testOptions: TestOptions;
  questions: SuiteQuestion[];
  baseTag: string;
  weights: ScoreWeights;
  timeoutMs: number;
  fingerprint?: { tag: string; value: string };
  orchestrator?: JudgeOrchestrator;
  /** "<tag>/<questionId>" already sent to the judge by this run */
  rejudged: Set<string>;
  /** "<tag>/<questionId>" submitted to the judge and not yet applied */
  submitted: Set<string>;
  tested: string[];
  skipped: string[];
  failed: Array<{ tag: string; error: string }>;
  saved: boolean;
}

/**
 * Tags compare equal ignoring case and "-" / "_" separators
 */
export const defaultBaseTagMatcher: BaseTagMatcher = (tag, requestedBase) =>
  normalizeTag(tag) === normalizeTag(requestedBase);

function normalizeTag(tag: string): string {
  return tag.toLowerCase().replace(/[-_]/g, '');
}

/**
 * "model:tag" base references keep the part after the last colon
 */
export function baseTagFromReference(reference: string): string {
  const colon = reference.lastIndexOf(':');
  return colon === -1 ? reference : reference.slice(colon + 1);
}

export function modelTagName(model: string, tag: string): string {
  return `${model}:${tag}`;
}

function sameName(a: string, b: string): boolean {
  return withLatest(a).toLowerCase() === withLatest(b).toLowerCase();
}

function withLatest(name: string): string {
  return name.lastIndexOf(':') > name.lastIndexOf('/') ? name : `${name}:latest`;
}

export class QcRunner {
  private deps: QcRunnerDependencies;
  private store: ResultStore;
  private context: RunContext;
  private logger: Logger;
  private now: () => Date;
  private retry: QcRetryPolicy;
  private state: QcState = 'idle';
  private eventListeners: Set<EventCallback> = new Set();

  constructor(deps: QcRunnerDependencies) {
    this.deps = deps;
    this.store = deps.store ?? new ResultStore();
    this.logger = deps.logger ?? createLogger('qc');
    this.context = deps.context ?? new RunContext(deps.server, this.logger);
    this.now = deps.now ?? (() => new Date());
    this.retry = { ...DEFAULT_QC_RETRY, ...deps.retry };
  }

  get currentState(): QcState {
    return this.state;
  }

  get runContext(): RunContext {
    return this.context;
  }

  on(callback: EventCallback): () => void {
    this.eventListeners.add(callback);
    return () => this.eventListeners.delete(callback);
  }

  async run(options: QcRunOptions): Promise<QcRunSummary> {
    const signal = this.context.signal;
    this.setState('initializing');

    let run: RunState;
    try {
      run = await this.initialize(options);
    } catch (error) {
      this.setState('done');
      throw error;
    }

    let aborted: unknown;
    try {
      for (const tag of [run.baseTag, ...(await this.resolveCandidates(run))]) {
        if (signal.aborted) break;
        const isBase = tag === run.baseTag;

        try {
          await this.processQuant(run, tag, isBase);
        } catch (error) {
          if (signal.aborted || error instanceof RunCancelledError) break;
          if (error instanceof AbortRunError) throw error;

          const message = errorMessage(error);
          this.logger.error(`Quantization ${tag} failed: ${message}`);
          run.failed.push({ tag, error: message });
          this.emit({ type: 'quant-failed', tag, error: message });
          await this.checkpoint(run);

          if (isBase) {
            this.emit({ type: 'warning', message: `Base ${tag} failed; candidates cannot be compared` });
            break;
          }
        }
      }
    } catch (error) {
      aborted = error;
    }

    await this.finalize(run, aborted !== undefined);
    if (aborted !== undefined) throw aborted;

    const cancelled = signal.aborted;
    const hasResults = run.saved && run.document.results.some(r => r.questionResults.length > 0);
    this.setState('done');

    return {
      document: run.document,
      outputPath: run.outputPath,
      tested: run.tested,
      skipped: run.skipped,
      failed: run.failed,
      cancelled,
      exitCode: cancelled ? 2 : hasResults ? 0 : 1,
    };
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // INITIALIZING
  // ═══════════════════════════════════════════════════════════════════════════

  private async initialize(options: QcRunOptions): Promise<RunState> {
    const outputPath = options.outputPath ?? defaultResultPath(options.model);
    const loaded = await this.store.load(outputPath);
    if (loaded) {
      assertDocumentMatches(loaded, options.model, options.suite.name);
    }

    const testOptions: TestOptions = loaded?.options ?? {
      ...DEFAULT_TEST_OPTIONS,
      ...options.sampling,
      ...(options.judgeContextLength === undefined ? {} : { judgeContextLength: options.judgeContextLength }),
    };
    if (loaded && options.sampling && Object.keys(options.sampling).length > 0) {
      this.emit({
        type: 'warning',
        message: `Keeping the sampling options stored in ${outputPath} so results stay comparable`,
      });
    }

    const document = loaded ?? this.store.createDocument(options.model, options.suite.name, testOptions);
    const baseTag = this.chooseBaseTag(document, options);
    repairBaseFlags(document, baseTag);

    const run: RunState = {
      options,
      model: options.model,
      outputPath,
      document,
      testOptions,
      questions: flattenSuite(options.suite, testOptions.contextLength),
      baseTag,
      weights: options.weights ?? DEFAULT_WEIGHTS,
      timeoutMs: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      rejudged: new Set(),
      submitted: new Set(),
      tested: [],
      skipped: [],
      failed: [],
      saved: false,
    };

    const reference = document.results.find(r => r.isBase) ?? document.results[0];
    if (reference) {
      run.fingerprint = { tag: reference.tag, value: fingerprintOf(reference) };
    }

    if (this.deps.judge) {
      run.orchestrator = new JudgeOrchestrator(this.deps.judge, options.judgeMode ?? 'serial', {
        logger: this.logger,
        now: this.now,
      });
    }

    this.logger.info(`Testing ${options.model} against base ${baseTag}`, {
      suite: options.suite.name,
      questions: run.questions.length,
      output: outputPath,
    });
    return run;
  }

  /**
   * Requested base, else the stored base, else fp16. A stored result the matcher
   * accepts for the requested base is reused under its own tag.
   */
  private chooseBaseTag(document: QcDocument, options: QcRunOptions): string {
    const stored = storedBaseTag(document);
    const requested = options.baseTag ? baseTagFromReference(options.baseTag) : stored ?? DEFAULT_BASE_TAG;

    const exact = findQuant(document, requested);
    if (exact) return exact.tag;

    const matcher = options.isBaseTag ?? defaultBaseTagMatcher;
    return document.results.find(r => matcher(r.tag, requested))?.tag ?? requested;
  }

  private async resolveCandidates(run: RunState): Promise<string[]> {
    const matcher = run.options.isBaseTag ?? defaultBaseTagMatcher;
    const tags = await this.deps.tagResolver.resolveAll(run.model, run.options.tags, this.context.signal);
    const candidates = tags.filter(tag => !matcher(tag, run.baseTag));

    // Installed models can be checked before anything is tested or written
    const installed = await this.deps.server.listModels({ signal: this.context.signal });
    for (const tag of [run.baseTag, ...candidates]) {
      const entry = installed.find(m => sameName(m.name, modelTagName(run.model, tag)));
      if (entry && !findQuant(run.document, tag)) {
        this.checkFingerprint(run, tag, await this.inspect(entry));
      }
    }

    return candidates;
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // PER QUANTIZATION
  // ═══════════════════════════════════════════════════════════════════════════

  private async processQuant(run: RunState, tag: string, isBase: boolean): Promise<void> {
    const signal = this.context.signal;
    const name = modelTagName(run.model, tag);
    let quant = findQuant(run.document, tag);

    if (quant && run.options.force && !run.tested.includes(quant.tag)) {
      quant.questionResults = [];
    }

    const pending = missingQuestions(quant, run.questions);
    if (quant && pending.length === 0) {
      const toJudge = this.questionsToJudge(run, quant);
      if (toJudge.length === 0) {
        run.skipped.push(tag);
        this.emit({ type: 'quant-skipped', tag, reason: 'already complete' });
        return;
      }
      this.logger.info(`${tag} is complete; judging ${toJudge.length} question(s)`);
      this.submitJudgments(run, quant, toJudge);
      await this.finishQuant(run, quant);
      return;
    }

    this.setState('ensure-present', tag);
    const { info, pulled } = await this.ensurePresent(run, tag, name);

    if (!quant) {
      quant = {
        tag,
        modelName: name,
        digest: info.digest,
        diskSizeBytes: info.size,
        family: info.family,
        parameterSize: info.parameterSize,
        quantizationType: info.quantizationType,
        isBase,
        pulledOnDemand: false,
        questionResults: [],
      };
      if (isBase) run.document.results.unshift(quant);
      else run.document.results.push(quant);
    }

    if (pulled) {
      quant.pulledOnDemand = true;
      await this.checkpoint(run);
    }
    // Left installed by an earlier cancelled run; removed once complete
    if (quant.pulledOnDemand) this.context.trackPulled(quant.modelName);

    this.setState('preload', tag);
    await this.deps.server.load(name, undefined, { signal });

    this.setState('testing', tag);
    this.emit({
      type: 'quant-start',
      tag,
      model: name,
      isBase,
      pending: pending.length,
      total: run.questions.length,
    });

    const base = isBase ? undefined : findQuant(run.document, run.baseTag);
    for (const question of pending) {
      signal.throwIfAborted();
      const result = await this.testQuestion(run, name, question);
      quant.questionResults.push(result);

      const baseAnswer = base?.questionResults.find(q => q.questionId === question.id);
      this.emit({
        type: 'question-done',
        tag,
        questionId: question.id,
        index: quant.questionResults.length,
        total: run.questions.length,
        score: baseAnswer ? scoreAnswer(baseAnswer.tokens, result.tokens, run.weights).composite : undefined,
      });

      if (!isBase) this.submitJudgments(run, quant, [question.id]);
      this.applyOutcomes(run, run.orchestrator?.harvest() ?? []);
    }

    quant.testedAt = this.now().toISOString();
    run.tested.push(quant.tag);

    try {
      await this.deps.server.unload(name, { signal });
    } catch (error) {
      if (signal.aborted) throw error;
      this.logger.debug(`Could not unload ${name}: ${errorMessage(error)}`);
    }

    // Earlier partial runs may have left answers without a judgment
    if (!isBase) this.submitJudgments(run, quant, this.questionsToJudge(run, quant));
    await this.finishQuant(run, quant);
  }

  private async ensurePresent(
    run: RunState,
    tag: string,
    name: string
  ): Promise<{ info: ModelInfo; pulled: boolean }> {
    const signal = this.context.signal;
    const server = this.deps.server;
    let entry = (await server.listModels({ signal })).find(m => sameName(m.name, name));
    let pulled = false;

    if (!entry) {
      if (!run.options.onDemand) {
        throw new ModelMissingError(name, `${name} is not installed on ${server.baseUrl}; pass --on-demand to pull it`);
      }

      this.logger.info(`Pulling ${name} for this run`);
      for await (const event of server.pull(name, { signal })) {
        this.logger.debug(`${name}: ${event.status}`, { completed: event.completed, total: event.total });
      }
      this.context.trackPulled(name);
      pulled = true;

      entry = (await server.listModels({ signal })).find(m => sameName(m.name, name));
      if (!entry) {
        throw new ModelMissingError(name, `${name} is still missing on ${server.baseUrl} after pulling`);
      }
    }

    const info = await this.inspect(entry);
    this.checkFingerprint(run, tag, info);
    return { info, pulled };
  }

  private async inspect(entry: ModelSummary): Promise<ModelInfo> {
    const shown = await this.deps.server.show(entry.name, { signal: this.context.signal });
    const details = { ...entry.details, ...shown.details };
    return {
      name: entry.name,
      digest: entry.digest,
      size: entry.size,
      family: details.family ?? 'unknown',
      parameterSize: details.parameterSize ?? 'unknown',
      quantizationType: details.quantizationLevel ?? 'unknown',
    };
  }

  /**
   * Every quantization in one document must share family and parameter size
   */
  private checkFingerprint(run: RunState, tag: string, info: ModelInfo): void {
    const value = fingerprintOf(info);
    if (!run.fingerprint) {
      run.fingerprint = { tag, value };
      return;
    }
    if (run.fingerprint.value !== value) {
      throw new AbortRunError(
        `${tag} is ${value} but ${run.fingerprint.tag} is ${run.fingerprint.value}; ` +
          'quantizations of different models cannot be compared in one result file'
      );
    }
  }

  /**
   * Judge, checkpoint, then remove on-demand models that are done
   */
  private async finishQuant(run: RunState, quant: QuantResult): Promise<void> {
    const orchestrator = run.orchestrator;
    if (orchestrator?.mode === 'serial' && orchestrator.pending > 0) {
      this.setState('judging', quant.tag);
      this.applyOutcomes(run, await orchestrator.settle(this.context.signal));
    } else if (orchestrator) {
      this.applyOutcomes(run, orchestrator.harvest());
    }

    this.setState('checkpoint', quant.tag);
    await this.checkpoint(run);
    await this.releaseFinished(run);
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // PER QUESTION
  // ═══════════════════════════════════════════════════════════════════════════

  private async testQuestion(run: RunState, model: string, question: SuiteQuestion): Promise<QuestionResult> {
    const options = run.testOptions;
    const request: GenerateRequest = {
      model,
      prompt: question.text,
      logprobs: true,
      options: {
        temperature: options.temperature,
        seed: options.seed,
        topP: options.topP,
        topK: options.topK,
        repeatPenalty: options.repeatPenalty,
        frequencyPenalty: options.frequencyPenalty,
        numPredict: options.numPredict,
        numCtx: question.contextLength,
      },
    };

    const result = await this.generateWithTimeouts(run, request, question);
    return {
      questionId: question.id,
      category: question.category,
      question: question.text,
      answer: result.answer,
      tokens: result.tokens,
      evalTokensPerSecond: result.evalTokensPerSecond,
      promptTokensPerSecond: result.promptTokensPerSecond,
      totalTokens: result.evalCount,
      durationMs: result.totalDurationMs,
    };
  }

  /**
   * Timeouts retry with exponential backoff; once those are spent the prompter decides
   * between doubling the timeout and cancelling the run.
   */
  private async generateWithTimeouts(
    run: RunState,
    request: GenerateRequest,
    question: SuiteQuestion
  ): Promise<GenerateResult> {
    const signal = this.context.signal;

    while (true) {
      try {
        return await withRetry(() => this.generateOnce(run, request, question), {
          attempts: this.retry.timeoutAttempts,
          baseDelayMs: this.retry.timeoutDelayMs,
          maxDelayMs: this.retry.timeoutMaxDelayMs,
          signal,
          shouldRetry: error => error instanceof RequestTimeoutError,
          onRetry: (error, attempt, delayMs) =>
            this.emit({
              type: 'warning',
              message: `${errorMessage(error)} (attempt ${attempt}/${this.retry.timeoutAttempts}); retrying in ${delayMs / 1000}s`,
            }),
        });
      } catch (error) {
        if (!(error instanceof RequestTimeoutError) || signal.aborted) throw error;

        const decision = await this.deps.prompter.onTimeout({
          model: request.model,
          questionId: question.id,
          timeoutMs: run.timeoutMs,
        });
        if (decision === 'cancel') {
          const reason = new RunCancelledError(`Cancelled after repeated timeouts on ${question.id}`);
          this.context.cancel(reason);
          throw reason;
        }

        run.timeoutMs *= 2;
        this.emit({ type: 'warning', message: `Timeout raised to ${Math.round(run.timeoutMs / 1000)}s` });
      }
    }
  }

  /**
   * One timed request, retried on transient network failures with a linear delay
   */
  private async generateOnce(
    run: RunState,
    request: GenerateRequest,
    question: SuiteQuestion
  ): Promise<GenerateResult> {
    const signal = this.context.signal;

    return withRetry(
      async () => {
        const timeoutMs = run.timeoutMs;
        const scoped = scopedSignal(
          signal,
          timeoutMs,
          () => new RequestTimeoutError(`Question ${question.id} on ${request.model}`, timeoutMs)
        );
        try {
          return await this.deps.server.generate(request, { signal: scoped.signal, timeout: false });
        } catch (error) {
          if (scoped.signal.aborted) throw scoped.signal.reason;
          throw error;
        } finally {
          scoped.dispose();
        }
      },
      {
        attempts: this.retry.questionAttempts,
        baseDelayMs: this.retry.questionDelayMs,
        linear: true,
        signal,
        shouldRetry: error => !(error instanceof QcError) && isRetryableError(error),
        onRetry: (error, attempt, delayMs) =>
          this.emit({
            type: 'warning',
            message: `Question ${question.id} failed: ${errorMessage(error)} (attempt ${attempt}/${this.retry.questionAttempts}); retrying in ${delayMs / 1000}s`,
          }),
      }
    );
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // JUDGING
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * Answered questions still lacking a judgment from the current judge
   */
  private questionsToJudge(run: RunState, quant: QuantResult): string[] {
    const orchestrator = run.orchestrator;
    if (!orchestrator || quant.isBase) return [];

    const unjudged = unjudgedQuestions(quant, orchestrator.judgeModel);
    if (!run.options.rejudge) return unjudged;
    return quant.questionResults
      .map(q => q.questionId)
      .filter(id => !run.rejudged.has(`${quant.tag}/${id}`) || unjudged.includes(id));
  }

  private submitJudgments(run: RunState, quant: QuantResult, questionIds: string[]): void {
    const orchestrator = run.orchestrator;
    const base = findQuant(run.document, run.baseTag);
    if (!orchestrator || !base || quant.isBase) return;

    for (const questionId of questionIds) {
      const baseAnswer = base.questionResults.find(q => q.questionId === questionId);
      const candidate = quant.questionResults.find(q => q.questionId === questionId);
      const key = `${quant.tag}/${questionId}`;
      if (!baseAnswer || !candidate || run.submitted.has(key)) continue;
      run.submitted.add(key);

      run.rejudged.add(key);
      orchestrator.submit(
        {
          tag: quant.tag,
          questionId,
          request: { question: candidate.question, baseAnswer: baseAnswer.answer, candidateAnswer: candidate.answer },
        },
        this.context.signal
      );
    }
  }

  /**
   * Single writer: outcomes from any judge activity land in the document here
   */
  private applyOutcomes(run: RunState, outcomes: JudgeOutcome[]): void {
    for (const outcome of outcomes) {
      run.submitted.delete(`${outcome.tag}/${outcome.questionId}`);
      const result = findQuant(run.document, outcome.tag)?.questionResults.find(
        q => q.questionId === outcome.questionId
      );
      if (!result) continue;

      if (outcome.judgment) {
        result.judgment = outcome.judgment;
        this.emit({
          type: 'judge-done',
          tag: outcome.tag,
          questionId: outcome.questionId,
          score: outcome.judgment.score,
        });
      } else if (outcome.error !== 'cancelled') {
        this.emit({ type: 'judge-done', tag: outcome.tag, questionId: outcome.questionId, score: null });
        const raw = outcome.rawResponse ? `; reply: ${outcome.rawResponse.slice(0, 200)}` : '';
        this.emit({
          type: 'warning',
          message: `No judgment for ${outcome.tag} ${outcome.questionId}: ${outcome.error ?? 'unknown error'}${raw}`,
        });
      }
    }
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // CHECKPOINTS AND CLEANUP
  // ═══════════════════════════════════════════════════════════════════════════

  private async checkpoint(run: RunState): Promise<void> {
    await this.store.save(run.outputPath, run.document);
    run.saved = true;
    this.emit({ type: 'checkpoint', path: run.outputPath });
  }

  /**
   * On-demand models go once complete with no judgment outstanding; partial ones stay
   */
  private async releaseFinished(run: RunState): Promise<void> {
    let changed = false;

    for (const quant of run.document.results) {
      if (!quant.pulledOnDemand || !this.context.isPulled(quant.modelName)) continue;
      if (!isComplete(quant, run.questions)) continue;
      if ((run.orchestrator?.pendingFor(quant.tag) ?? 0) > 0) continue;

      this.setState('cleanup', quant.tag);
      try {
        await this.context.release(quant.modelName);
        quant.pulledOnDemand = false;
        changed = true;
        this.emit({ type: 'cleanup', model: quant.modelName, removed: true });
      } catch (error) {
        this.emit({ type: 'warning', message: `Could not remove ${quant.modelName}: ${errorMessage(error)}` });
      }
    }

    if (changed) await this.checkpoint(run);
  }

  private async finalize(run: RunState, failed: boolean): Promise<void> {
    const signal = this.context.signal;
    this.setState(signal.aborted ? 'cancelling' : 'finalizing');

    try {
      if (run.orchestrator && run.orchestrator.pending > 0) {
        this.applyOutcomes(run, await run.orchestrator.settle(signal));
      }
      if (!failed && (run.saved || run.document.results.length > 0)) {
        await this.checkpoint(run);
        await this.releaseFinished(run);
      }
    } finally {
      const report = await this.context.cleanup(model => {
        const quant = run.document.results.find(r => sameName(r.modelName, model));
        return !quant || isComplete(quant, run.questions);
      });
      for (const model of report.removed) {
        const quant = run.document.results.find(r => sameName(r.modelName, model));
        if (quant) quant.pulledOnDemand = false;
        this.emit({ type: 'cleanup', model, removed: true });
      }
      for (const model of report.kept) {
        this.emit({ type: 'cleanup', model, removed: false });
      }
      if (report.removed.length > 0 && run.saved) {
        await this.checkpoint(run);
      }
    }
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // EVENTS
  // ═══════════════════════════════════════════════════════════════════════════

  private setState(state: QcState, tag?: string): void {
    this.state = state;
    this.emit({ type: 'state', state, tag });
  }

  private emit(event: QcEvent): void {
    if (event.type === 'warning') this.logger.warn(event.message);
    for (const listener of this.eventListeners) {
      listener(event);
    }
  }
}
