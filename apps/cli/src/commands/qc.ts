/**
 * QC command - Compare quantizations of a model against its base
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import {
  DEFAULT_SUITE,
  DEFAULT_WEIGHTS,
  QcRunner,
  ResultStore,
  RunContext,
  TagResolver,
  baseTagFromReference,
  createJudge,
  resolveTestSuite,
  scoreDocument,
  type JudgeMode,
  type QcEvent,
  type QcRunSummary,
  type ScoreWeights,
  type TestOptions,
} from '@modelsync/qc';
import { errorMessage } from '@modelsync/shared';
import { InterruptHandler } from '../interrupt.js';
import { FixedPrompter, InquirerPrompter, confirmCancel, type PrompterHooks } from '../prompter.js';
import { renderReport } from '../report.js';
import { createServices, globalOptions } from '../services.js';

export interface QcOptions {
  quants?: string;
  base?: string;
  output?: string;
  suite: string;
  temperature?: string;
  seed?: string;
  topP?: string;
  topK?: string;
  repeatPenalty?: string;
  frequencyPenalty?: string;
  numPredict?: string;
  judge?: string;
  judgeMode: string;
  judgeCtx?: string;
  timeout?: string;
  weights?: string;
  force?: boolean;
  rejudge?: boolean;
  onDemand?: boolean;
  view?: string;
}

// ═══════════════════════════════════════════════════════════════════════════
// OPTION PARSING
// ═══════════════════════════════════════════════════════════════════════════

export function parseNumber(flag: string, value: string, integer = false): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed) || (integer && !Number.isInteger(parsed))) {
    throw new Error(`${flag} expects ${integer ? 'an integer' : 'a number'}, got "${value}"`);
  }
  return parsed;
}

/**
 * Only the flags given on the command line; the rest keep their defaults
 */
export function samplingFromOptions(options: QcOptions): Partial<TestOptions> {
  const sampling: Partial<TestOptions> = {};
  if (options.temperature !== undefined) sampling.temperature = parseNumber('--temperature', options.temperature);
  if (options.seed !== undefined) sampling.seed = parseNumber('--seed', options.seed, true);
  if (options.topP !== undefined) sampling.topP = parseNumber('--top-p', options.topP);
  if (options.topK !== undefined) sampling.topK = parseNumber('--top-k', options.topK, true);
  if (options.repeatPenalty !== undefined) {
    sampling.repeatPenalty = parseNumber('--repeat-penalty', options.repeatPenalty);
  }
  if (options.frequencyPenalty !== undefined) {
    sampling.frequencyPenalty = parseNumber('--frequency-penalty', options.frequencyPenalty);
  }
  if (options.numPredict !== undefined) sampling.numPredict = parseNumber('--num-predict', options.numPredict, true);
  return sampling;
}

/**
 * The judge's context window is not a sampling option and never conflicts with stored results
 */
export function judgeContextFromOptions(options: QcOptions): number | undefined {
  return options.judgeCtx === undefined ? undefined : parseNumber('--judge-ctx', options.judgeCtx, true);
}

/**
 * "token,logprobs,length,perplexity", e.g. "5,70,5,20"
 */
export function parseWeights(value: string): ScoreWeights {
  const parts = value.split(',').map(part => part.trim());
  if (parts.length !== 4) {
    throw new Error(`--weights expects four comma-separated numbers, got "${value}"`);
  }
  const [tokenSimilarity, logprobsDivergence, lengthConsistency, perplexity] = parts.map(part =>
    parseNumber('--weights', part)
  );
  if (
    tokenSimilarity === undefined ||
    logprobsDivergence === undefined ||
    lengthConsistency === undefined ||
    perplexity === undefined
  ) {
    throw new Error(`--weights expects four comma-separated numbers, got "${value}"`);
  }
  if ([tokenSimilarity, logprobsDivergence, lengthConsistency, perplexity].some(weight => weight < 0)) {
    throw new Error('--weights must not be negative');
  }
  if (tokenSimilarity + logprobsDivergence + lengthConsistency + perplexity === 0) {
    throw new Error('--weights must not all be zero');
  }
  return { tokenSimilarity, logprobsDivergence, lengthConsistency, perplexity };
}

export function parseJudgeMode(value: string): JudgeMode {
  if (value === 'serial' || value === 'parallel') return value;
  throw new Error(`--judge-mode expects serial or parallel, got "${value}"`);
}

// ═══════════════════════════════════════════════════════════════════════════
// PROGRESS
// ═══════════════════════════════════════════════════════════════════════════

export interface ProgressLine {
  /** 'text' replaces the spinner text; the others print a line and keep spinning */
  kind: 'text' | 'info' | 'warn' | 'fail';
  text: string;
}

/**
 * How the spinner reflects a runner event; undefined leaves it as is
 */
export function describeQcEvent(event: QcEvent): ProgressLine | undefined {
  switch (event.type) {
    case 'quant-start':
      return {
        kind: 'text',
        text: `Testing ${event.model}${event.isBase ? ' (base)' : ''}: ${event.pending} of ${event.total} questions to run`,
      };
    case 'question-done': {
      const score = event.score === undefined ? '' : `, score ${event.score.toFixed(1)}`;
      return { kind: 'text', text: `Testing ${event.tag}: ${event.index}/${event.total} ${event.questionId}${score}` };
    }
    case 'judge-done':
      return {
        kind: 'text',
        text: `Judged ${event.tag} ${event.questionId}: ${event.score === null ? 'no score' : event.score}`,
      };
    case 'quant-skipped':
      return { kind: 'info', text: `Skipped ${event.tag}: ${event.reason}` };
    case 'quant-failed':
      return { kind: 'fail', text: `${event.tag} failed: ${event.error}` };
    case 'cleanup':
      return event.removed
        ? { kind: 'info', text: `Removed on-demand model ${event.model}` }
        : { kind: 'info', text: `Kept partially tested ${event.model} for resume` };
    case 'warning':
      return { kind: 'warn', text: event.message };
    case 'state':
      if (event.state === 'judging' && event.tag) return { kind: 'text', text: `Judging ${event.tag}...` };
      if (event.state === 'cleanup') return { kind: 'text', text: 'Cleaning up...' };
      return undefined;
    case 'checkpoint':
      return undefined;
  }
}

function showProgress(spinner: Ora, line: ProgressLine): void {
  switch (line.kind) {
    case 'text':
      spinner.text = line.text;
      return;
    case 'info':
      spinner.info(line.text);
      break;
    case 'warn':
      spinner.warn(line.text);
      break;
    case 'fail':
      spinner.fail(line.text);
      break;
  }
  spinner.start();
}

function printSummary(summary: QcRunSummary, weights: ScoreWeights | undefined): void {
  if (summary.tested.length > 0) console.log(chalk.green(`✓ Tested ${summary.tested.join(', ')}`));
  if (summary.skipped.length > 0) console.log(chalk.gray(`  Already complete: ${summary.skipped.join(', ')}`));
  for (const failure of summary.failed) {
    console.log(chalk.red(`✗ ${failure.tag}: ${failure.error}`));
  }
  console.log(chalk.gray(`  Results: ${summary.outputPath}`));

  if (summary.document.results.some(result => result.isBase && result.questionResults.length > 0)) {
    console.log('\n' + renderReport(scoreDocument(summary.document, weights)));
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// COMMAND
// ═══════════════════════════════════════════════════════════════════════════

async function viewResults(file: string, weights: ScoreWeights | undefined): Promise<void> {
  const document = await new ResultStore().load(file);
  if (!document) {
    throw new Error(`Result document ${file} not found`);
  }
  console.log(renderReport(scoreDocument(document, weights)));
}

export const qcCommand = new Command('qc')
  .description('Test quantizations of a model against its base and score how far they drift')
  .argument('[model]', 'Model name without tag, e.g. llama3.2 or hf.co/user/repo')
  .option('-q, --quants <patterns>', 'Comma-separated tags to compare; wildcards allowed, e.g. Q4*,q8_0')
  .option('-b, --base <tag>', 'Base tag (default: the stored base, else fp16)')
  .option('-o, --output <file>', 'Result document (default: <model>.qc.json)')
  .option('-t, --suite <name>', 'Built-in suite name or path to a suite JSON file', DEFAULT_SUITE)
  .option('--temperature <n>', 'Sampling temperature (default 0)')
  .option('--seed <n>', 'Sampling seed (default 365)')
  .option('--top-p <n>', 'Sampling top_p (default 0.001)')
  .option('--top-k <n>', 'Sampling top_k (default -1)')
  .option('--repeat-penalty <n>', 'Sampling repeat_penalty')
  .option('--frequency-penalty <n>', 'Sampling frequency_penalty')
  .option('--num-predict <n>', 'Maximum answer tokens (default 4096)')
  .option('--judge <model>', 'Judge: model, http://host:port/model or @provider[:key]/model')
  .option('--judge-mode <mode>', 'Judge scheduling: serial or parallel', 'serial')
  .option('--judge-ctx <n>', 'Judge context length (default 12288)')
  .option('--timeout <seconds>', 'Timeout of each test and judge call')
  .option('--weights <list>', 'Score weights: token,logprobs,length,perplexity (default 5,70,5,20)')
  .option('--force', 'Re-test quantizations that are already complete')
  .option('--rejudge', 'Judge every answer again')
  .option('--on-demand', 'Pull missing quantizations and remove them once tested')
  .option('--view <file>', 'Print the scores stored in a result document and exit')
  .action(async (model: string | undefined, options: QcOptions, command: Command) => {
    let weights: ScoreWeights | undefined;
    try {
      weights = options.weights ? parseWeights(options.weights) : undefined;
    } catch (error) {
      console.error(chalk.red(errorMessage(error)));
      process.exit(1);
    }

    if (options.view) {
      try {
        await viewResults(options.view, weights);
        return;
      } catch (error) {
        console.error(chalk.red(`Error: ${errorMessage(error)}`));
        process.exit(1);
      }
    }

    if (!model || !options.quants) {
      console.error(chalk.red('A model and --quants are required, e.g. modelsync qc llama3.2 -q Q4*,q8_0'));
      process.exit(1);
    }

    const interactive = process.stdin.isTTY === true;
    const spinner = ora('Preparing QC run...').start();
    const hooks: PrompterHooks = {
      pause: () => spinner.stop(),
      resume: () => {
        spinner.start();
      },
    };

    let context: RunContext | undefined;
    let interrupts: InterruptHandler | undefined;
    let unsubscribe: (() => void) | undefined;

    try {
      const services = await createServices(globalOptions(command));
      const timeoutMs = options.timeout ? parseNumber('--timeout', options.timeout, true) * 1000 : services.timeoutMs;
      const sampling = samplingFromOptions(options);
      const judgeContextLength = judgeContextFromOptions(options);
      const judgeMode = parseJudgeMode(options.judgeMode);

      const runContext = new RunContext(services.server);
      context = runContext;
      interrupts = new InterruptHandler({
        confirm: interactive ? () => confirmCancel(hooks) : undefined,
        onCancel: () => runContext.cancel(),
      }).attach();

      spinner.text = `Loading suite ${options.suite}...`;
      const suite = await resolveTestSuite(options.suite);

      const judgeReference = options.judge ?? services.config.judge;
      const judge = judgeReference
        ? createJudge(judgeReference, {
            testServer: services.server,
            connect: services.connect,
            contextLength: judgeContextLength,
            timeoutMs,
          })
        : undefined;
      if (judge) {
        spinner.text = `Checking judge ${judge.model}...`;
        await judge.validate(runContext.signal);
      }

      const runner = new QcRunner({
        server: services.server,
        tagResolver: new TagResolver({ server: services.server }),
        prompter: interactive ? new InquirerPrompter(hooks) : new FixedPrompter('cancel'),
        judge,
        context: runContext,
      });
      unsubscribe = runner.on(event => {
        const line = describeQcEvent(event);
        if (line) showProgress(spinner, line);
      });

      const summary = await runner.run({
        model,
        tags: [options.quants],
        baseTag: options.base ? baseTagFromReference(options.base) : undefined,
        outputPath: options.output,
        suite,
        sampling,
        judgeContextLength,
        judgeMode,
        timeoutMs,
        force: options.force,
        rejudge: options.rejudge,
        onDemand: options.onDemand,
        weights: weights ?? DEFAULT_WEIGHTS,
      });

      if (summary.cancelled) {
        spinner.warn('Run cancelled; finished quantizations were saved');
      } else if (summary.exitCode === 0) {
        spinner.succeed('QC run finished');
      } else {
        spinner.fail('No quantization produced results');
      }
      printSummary(summary, weights);
      process.exit(summary.exitCode);
    } catch (error) {
      if (context?.cancelled) {
        spinner.warn('Run cancelled');
        process.exit(2);
      }
      spinner.fail(`QC run failed: ${errorMessage(error)}`);
      process.exit(1);
    } finally {
      unsubscribe?.();
      interrupts?.detach();
    }
  });
