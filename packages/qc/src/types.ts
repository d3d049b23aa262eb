/**
 * Modelsync QC - Type Definitions
 */

import { z } from 'zod';

// ═══════════════════════════════════════════════════════════════════════════
// TEST SUITES
// ═══════════════════════════════════════════════════════════════════════════

export const DEFAULT_CONTEXT_LENGTH = 4096;

export const SuiteQuestionSchema = z.object({
  id: z.string().min(1),
  text: z.string().min(1),
  contextLength: z.number().int().positive().optional(),
});

export const SuiteCategorySchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  contextLength: z.number().int().positive().optional(),
  questions: z.array(SuiteQuestionSchema).min(1),
});

export const TestSuiteSchema = z.object({
  name: z.string().min(1),
  description: z.string().optional(),
  contextLength: z.number().int().positive().optional(),
  categories: z.array(SuiteCategorySchema).min(1),
});

export type TestSuite = z.infer<typeof TestSuiteSchema>;
export type SuiteCategory = z.infer<typeof SuiteCategorySchema>;

/** A question with its category and effective context length resolved */
export interface SuiteQuestion {
  /** "<categoryId>-<questionId>" */
  id: string;
  categoryId: string;
  category: string;
  text: string;
  contextLength: number;
}

// ═══════════════════════════════════════════════════════════════════════════
// RESULT DOCUMENT
// ═══════════════════════════════════════════════════════════════════════════

export const RESULT_DOCUMENT_VERSION = 1;

export const TokenSchema = z.object({
  token: z.string(),
  logprob: z.number(),
});

export const JudgmentSchema = z.object({
  score: z.number().min(1).max(100),
  reason: z.string(),
  bestAnswer: z.enum(['A', 'B', 'AB']).optional(),
  judgeModel: z.string(),
  judgedAt: z.string(),
});

export const QuestionResultSchema = z.object({
  questionId: z.string(),
  category: z.string(),
  question: z.string(),
  answer: z.string(),
  tokens: z.array(TokenSchema),
  evalTokensPerSecond: z.number(),
  promptTokensPerSecond: z.number(),
  totalTokens: z.number().int().nonnegative(),
  durationMs: z.number().nonnegative().optional(),
  judgment: JudgmentSchema.optional(),
});

export const QuantResultSchema = z.object({
  tag: z.string(),
  modelName: z.string(),
  digest: z.string(),
  diskSizeBytes: z.number().nonnegative(),
  family: z.string(),
  parameterSize: z.string(),
  quantizationType: z.string(),
  isBase: z.boolean(),
  pulledOnDemand: z.boolean().default(false),
  testedAt: z.string().optional(),
  questionResults: z.array(QuestionResultSchema),
});

export const TestOptionsSchema = z.object({
  temperature: z.number(),
  seed: z.number().int(),
  topP: z.number(),
  topK: z.number().int(),
  repeatPenalty: z.number().optional(),
  frequencyPenalty: z.number().optional(),
  numPredict: z.number().int(),
  contextLength: z.number().int().positive(),
  judgeContextLength: z.number().int().positive(),
});

export const QcDocumentSchema = z.object({
  version: z.number().int().default(RESULT_DOCUMENT_VERSION),
  testSuiteName: z.string(),
  modelName: z.string(),
  createdAt: z.string().optional(),
  updatedAt: z.string().optional(),
  options: TestOptionsSchema,
  results: z.array(QuantResultSchema),
});

export type Token = z.infer<typeof TokenSchema>;
export type Judgment = z.infer<typeof JudgmentSchema>;
export type QuestionResult = z.infer<typeof QuestionResultSchema>;
export type QuantResult = z.infer<typeof QuantResultSchema>;
export type TestOptions = z.infer<typeof TestOptionsSchema>;
export type QcDocument = z.infer<typeof QcDocumentSchema>;

export const DEFAULT_TEST_OPTIONS: TestOptions = {
  temperature: 0,
  seed: 365,
  topP: 0.001,
  topK: -1,
  numPredict: 4096,
  contextLength: DEFAULT_CONTEXT_LENGTH,
  judgeContextLength: 12288,
};

// ═══════════════════════════════════════════════════════════════════════════
// SCORING
// ═══════════════════════════════════════════════════════════════════════════

export interface ScoreWeights {
  tokenSimilarity: number;
  logprobsDivergence: number;
  lengthConsistency: number;
  perplexity: number;
}

export interface ScoreComponents extends ScoreWeights {
  composite: number;
}

// ═══════════════════════════════════════════════════════════════════════════
// RUN
// ═══════════════════════════════════════════════════════════════════════════

export type JudgeMode = 'serial' | 'parallel';

export type QcState =
  | 'idle'
  | 'initializing'
  | 'ensure-present'
  | 'preload'
  | 'testing'
  | 'judging'
  | 'checkpoint'
  | 'cleanup'
  | 'finalizing'
  | 'cancelling'
  | 'done';

export type QcEvent =
  | { type: 'state'; state: QcState; tag?: string }
  | { type: 'quant-start'; tag: string; model: string; isBase: boolean; pending: number; total: number }
  | { type: 'question-done'; tag: string; questionId: string; index: number; total: number; score?: number }
  | { type: 'judge-done'; tag: string; questionId: string; score: number | null }
  | { type: 'checkpoint'; path: string }
  | { type: 'quant-skipped'; tag: string; reason: string }
  | { type: 'quant-failed'; tag: string; error: string }
  | { type: 'cleanup'; model: string; removed: boolean }
  | { type: 'warning'; message: string };

export type TimeoutDecision = 'extend' | 'cancel';

export interface TimeoutContext {
  model: string;
  questionId: string;
  timeoutMs: number;
}

/**
 * Decisions the runner cannot make on its own
 */
export interface Prompter {
  /** Asked after the timeout retries are spent; 'extend' doubles the timeout */
  onTimeout(context: TimeoutContext): Promise<TimeoutDecision>;
}

/** Decides whether a stored result can stand in for the requested base */
export type BaseTagMatcher = (tag: string, requestedBase: string) => boolean;

export interface QcRunOptions {
  /** Model name without tag, e.g. "llama3.1" or "hf.co/user/repo" */
  model: string;
  /** Comma-separated entries are allowed; "*" expands against the tag listing */
  tags: string[];
  baseTag?: string;
  outputPath?: string;
  suite: TestSuite;
  sampling?: Partial<TestOptions>;
  /** Recorded in a new result document; stored documents keep theirs */
  judgeContextLength?: number;
  judgeMode?: JudgeMode;
  timeoutMs?: number;
  /** Re-test quantizations that are already complete */
  force?: boolean;
  rejudge?: boolean;
  /** Pull missing quantizations and remove them once done */
  onDemand?: boolean;
  weights?: ScoreWeights;
  isBaseTag?: BaseTagMatcher;
}

export interface QcRunSummary {
  document: QcDocument;
  outputPath: string;
  tested: string[];
  skipped: string[];
  failed: Array<{ tag: string; error: string }>;
  cancelled: boolean;
  exitCode: 0 | 1 | 2;
}
