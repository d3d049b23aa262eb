/**
 * Modelsync QC - Judge Orchestrator
 * Serial mode queues judgments until settle(); parallel mode starts each one immediately.
 * Outcomes are handed back to the runner, which alone mutates the result document.
 */

import { createLogger, errorMessage, type Logger } from '@modelsync/shared';
import { JudgeResponseError } from './errors.js';
import type { Judge } from './judge.js';
import type { JudgeRequest } from './prompts.js';
import type { JudgeMode, Judgment } from './types.js';

export interface JudgeTask {
  tag: string;
  questionId: string;
  request: JudgeRequest;
}

export interface JudgeOutcome {
  tag: string;
  questionId: string;
  judgment?: Judgment;
  error?: string;
  /** Judge reply that could not be used */
  rawResponse?: string;
}

export class JudgeOrchestrator {
  readonly mode: JudgeMode;
  private judge: Judge;
  private logger: Logger;
  private now: () => Date;
  private queue: JudgeTask[] = [];
  private running: Set<Promise<void>> = new Set();
  private outstanding: Map<string, number> = new Map();
  private finished: JudgeOutcome[] = [];

  constructor(judge: Judge, mode: JudgeMode, options: { logger?: Logger; now?: () => Date } = {}) {
    this.judge = judge;
    this.mode = mode;
    this.logger = options.logger ?? createLogger('judge');
    this.now = options.now ?? (() => new Date());
  }

  get judgeModel(): string {
    return this.judge.model;
  }

  submit(task: JudgeTask, signal?: AbortSignal): void {
    this.outstanding.set(task.tag, this.pendingFor(task.tag) + 1);

    if (this.mode === 'serial') {
      this.queue.push(task);
      return;
    }

    const run: Promise<void> = this.execute(task, signal).then(outcome => {
      this.complete(outcome);
      this.running.delete(run);
    });
    this.running.add(run);
  }

  /**
   * Judgments submitted for `tag` that have not been harvested yet
   */
  pendingFor(tag: string): number {
    return this.outstanding.get(tag) ?? 0;
  }

  get pending(): number {
    return Array.from(this.outstanding.values()).reduce((sum, n) => sum + n, 0);
  }

  /**
   * Outcomes finished so far, without waiting
   */
  harvest(): JudgeOutcome[] {
    const outcomes = this.finished;
    this.finished = [];
    for (const outcome of outcomes) {
      const left = this.pendingFor(outcome.tag) - 1;
      if (left > 0) this.outstanding.set(outcome.tag, left);
      else this.outstanding.delete(outcome.tag);
    }
    return outcomes;
  }

  /**
   * Run queued judgments (serial) or wait for every running one (parallel), then harvest
   */
  async settle(signal?: AbortSignal): Promise<JudgeOutcome[]> {
    while (this.queue.length > 0) {
      const task = this.queue.shift();
      if (!task) break;
      if (signal?.aborted) {
        this.complete({ tag: task.tag, questionId: task.questionId, error: 'cancelled' });
        continue;
      }
      this.complete(await this.execute(task, signal));
    }

    while (this.running.size > 0) {
      await Promise.all(Array.from(this.running));
    }

    return this.harvest();
  }

  private complete(outcome: JudgeOutcome): void {
    this.finished.push(outcome);
  }

  /**
   * Never rejects; failures become outcomes with an error
   */
  private async execute(task: JudgeTask, signal?: AbortSignal): Promise<JudgeOutcome> {
    try {
      const verdict = await this.judge.judge(task.request, signal);
      return {
        tag: task.tag,
        questionId: task.questionId,
        judgment: {
          score: verdict.score,
          reason: verdict.reason,
          bestAnswer: verdict.bestAnswer,
          judgeModel: this.judge.model,
          judgedAt: this.now().toISOString(),
        },
      };
    } catch (error) {
      if (signal?.aborted) {
        return { tag: task.tag, questionId: task.questionId, error: 'cancelled' };
      }
      const rawResponse = error instanceof JudgeResponseError ? error.rawResponse : undefined;
      this.logger.warn(`Judging ${task.tag} ${task.questionId} failed: ${errorMessage(error)}`, {
        rawResponse,
      });
      return { tag: task.tag, questionId: task.questionId, error: errorMessage(error), rawResponse };
    }
  }
}
