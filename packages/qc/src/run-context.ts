/**
 * Modelsync QC - Run Context
 * Owns the run's cancellation and the models pulled for it; cleanup() runs on every exit path
 */

import type { InferenceServer } from '@modelsync/ai-gateway';
import { createLogger, errorMessage, type Logger } from '@modelsync/shared';
import { RunCancelledError } from './errors.js';

export interface CleanupReport {
  removed: string[];
  /** Pulled models left in place so a later run can resume them */
  kept: string[];
  failed: Array<{ model: string; error: string }>;
}

export class RunContext {
  private controller = new AbortController();
  private pulled: Set<string> = new Set();
  private server: Pick<InferenceServer, 'delete'>;
  private logger: Logger;

  constructor(server: Pick<InferenceServer, 'delete'>, logger?: Logger) {
    this.server = server;
    this.logger = logger ?? createLogger('qc');
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get cancelled(): boolean {
    return this.controller.signal.aborted;
  }

  cancel(reason: Error = new RunCancelledError()): void {
    if (this.cancelled) return;
    this.logger.warn(`Cancelling run: ${reason.message}`);
    this.controller.abort(reason);
  }

  trackPulled(model: string): void {
    this.pulled.add(model);
  }

  isPulled(model: string): boolean {
    return this.pulled.has(model);
  }

  get pulledModels(): string[] {
    return Array.from(this.pulled);
  }

  /**
   * Remove a pulled model. Runs without the run's signal so it works after cancellation.
   */
  async release(model: string): Promise<void> {
    await this.server.delete(model);
    this.pulled.delete(model);
    this.logger.info(`Removed on-demand model ${model}`);
  }

  /**
   * Remove every pulled model `isRemovable` accepts; the rest stay for resume
   */
  async cleanup(isRemovable: (model: string) => boolean): Promise<CleanupReport> {
    const report: CleanupReport = { removed: [], kept: [], failed: [] };

    for (const model of Array.from(this.pulled)) {
      if (!isRemovable(model)) {
        report.kept.push(model);
        this.logger.info(`Keeping partially tested model ${model} for resume`);
        continue;
      }
      try {
        await this.release(model);
        report.removed.push(model);
      } catch (error) {
        report.failed.push({ model, error: errorMessage(error) });
        this.logger.error(`Could not remove on-demand model ${model}: ${errorMessage(error)}`);
      }
    }

    return report;
  }
}
