/**
 * Modelsync QC - Scoring Engine
 * Compares a candidate answer with the base answer using only tokens and logprobs
 */

import { ResultDocumentError } from './errors.js';
import type {
  QcDocument,
  QuantResult,
  QuestionResult,
  ScoreComponents,
  ScoreWeights,
  Token,
} from './types.js';

export const DEFAULT_WEIGHTS: ScoreWeights = {
  tokenSimilarity: 5,
  logprobsDivergence: 70,
  lengthConsistency: 5,
  perplexity: 20,
};

/** Share of the final score taken by the judge when every question is judged */
export const JUDGE_WEIGHT = 0.5;

const WEIGHT_KEYS = ['tokenSimilarity', 'logprobsDivergence', 'lengthConsistency', 'perplexity'] as const;

function clampScore(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.min(100, Math.max(0, value));
}

function average(values: number[]): number {
  return values.length === 0 ? 0 : values.reduce((sum, v) => sum + v, 0) / values.length;
}

// ═══════════════════════════════════════════════════════════════════════════
// COMPONENTS
// ═══════════════════════════════════════════════════════════════════════════

export function lcsLength(a: string[], b: string[]): number {
  if (a.length === 0 || b.length === 0) return 0;

  let previous = new Array<number>(b.length + 1).fill(0);
  let current = new Array<number>(b.length + 1).fill(0);

  for (let i = 1; i <= a.length; i++) {
    for (let j = 1; j <= b.length; j++) {
      current[j] =
        a[i - 1] === b[j - 1] ? (previous[j - 1] ?? 0) + 1 : Math.max(previous[j] ?? 0, current[j - 1] ?? 0);
    }
    [previous, current] = [current, previous];
  }

  return previous[b.length] ?? 0;
}

/**
 * LCS length over the longer sequence's length
 */
export function tokenSimilarity(base: Token[], candidate: Token[]): number {
  if (base.length === 0 || candidate.length === 0) return 0;
  const lcs = lcsLength(
    base.map(t => t.token),
    candidate.map(t => t.token)
  );
  return clampScore((lcs / Math.max(base.length, candidate.length)) * 100);
}

export function meanLogprob(tokens: Token[]): number {
  return average(tokens.map(t => t.logprob));
}

/**
 * Confidence is exp(mean logprob); the score decays with the confidence gap
 */
export function logprobsDivergence(base: Token[], candidate: Token[]): number {
  if (base.length === 0 || candidate.length === 0) return 0;
  const gap = Math.abs(Math.exp(meanLogprob(base)) - Math.exp(meanLogprob(candidate)));
  return clampScore(100 * Math.exp(-2 * gap));
}

export function lengthConsistency(base: Token[], candidate: Token[]): number {
  if (base.length === 0 || candidate.length === 0) return 0;
  const ratio = candidate.length / base.length;
  return clampScore(100 * Math.exp(-2 * Math.abs(1 - ratio)));
}

export function perplexity(tokens: Token[]): number {
  return Math.exp(-meanLogprob(tokens));
}

export function perplexityPreservation(base: Token[], candidate: Token[]): number {
  if (base.length === 0 || candidate.length === 0) return 0;
  const ratio = perplexity(candidate) / perplexity(base);
  return clampScore(100 * Math.exp(-0.5 * Math.abs(1 - ratio)));
}

/**
 * Weighted mean of the components; weights need not sum to 100
 */
export function compositeScore(components: ScoreWeights, weights: ScoreWeights = DEFAULT_WEIGHTS): number {
  let total = 0;
  let weightSum = 0;
  for (const key of WEIGHT_KEYS) {
    total += components[key] * weights[key];
    weightSum += weights[key];
  }
  return weightSum > 0 ? total / weightSum : 0;
}

export function scoreAnswer(
  base: Token[],
  candidate: Token[],
  weights: ScoreWeights = DEFAULT_WEIGHTS
): ScoreComponents {
  const components: ScoreWeights = {
    tokenSimilarity: tokenSimilarity(base, candidate),
    logprobsDivergence: logprobsDivergence(base, candidate),
    lengthConsistency: lengthConsistency(base, candidate),
    perplexity: perplexityPreservation(base, candidate),
  };
  return { ...components, composite: compositeScore(components, weights) };
}

export function blendWithJudge(composite: number, judgeScore: number | undefined): number {
  if (judgeScore === undefined) return composite;
  return composite * (1 - JUDGE_WEIGHT) + judgeScore * JUDGE_WEIGHT;
}

// ═══════════════════════════════════════════════════════════════════════════
// AGGREGATES
// ═══════════════════════════════════════════════════════════════════════════

export interface QuestionScore extends ScoreComponents {
  questionId: string;
  category: string;
  judgmentScore?: number;
}

export interface BestAnswerCounts {
  base: number;
  candidate: number;
  tie: number;
}

export interface QuantScore {
  tag: string;
  quantizationType: string;
  diskSizeBytes: number;
  questionScores: QuestionScore[];
  categoryScores: Record<string, number>;
  categoryJudgmentScores: Record<string, number>;
  /** Mean composite over answered questions */
  totalScore: number;
  averageJudgmentScore?: number;
  /** Judge-blended when every compared question is judged, else the total score */
  finalScore: number;
  hasJudgment: boolean;
  bestAnswers: BestAnswerCounts;
  evalTokensPerSecond: number;
  promptTokensPerSecond: number;
  /** Throughput relative to the base, as a percentage */
  evalPercentOfBase: number;
  promptPercentOfBase: number;
}

export interface QcScoreReport {
  modelName: string;
  testSuiteName: string;
  baseTag: string;
  baseQuantizationType: string;
  baseDiskSizeBytes: number;
  baseEvalTokensPerSecond: number;
  basePromptTokensPerSecond: number;
  totalQuestions: number;
  judgeModel?: string;
  quants: QuantScore[];
}

function meanThroughput(results: QuestionResult[], pick: (q: QuestionResult) => number): number {
  return average(results.map(pick).filter(v => v > 0));
}

function percentOf(value: number, base: number): number {
  return base > 0 ? (value / base) * 100 : 0;
}

export function scoreQuant(base: QuantResult, quant: QuantResult, weights: ScoreWeights = DEFAULT_WEIGHTS): QuantScore {
  const byCategory = new Map<string, number[]>();
  const judgeByCategory = new Map<string, number[]>();
  const questionScores: QuestionScore[] = [];
  const bestAnswers: BestAnswerCounts = { base: 0, candidate: 0, tie: 0 };

  for (const baseQuestion of base.questionResults) {
    const candidate = quant.questionResults.find(q => q.questionId === baseQuestion.questionId);
    if (!candidate) continue;

    const components = scoreAnswer(baseQuestion.tokens, candidate.tokens, weights);
    const judgment = candidate.judgment;
    questionScores.push({
      questionId: baseQuestion.questionId,
      category: baseQuestion.category,
      ...components,
      judgmentScore: judgment?.score,
    });

    byCategory.set(baseQuestion.category, [...(byCategory.get(baseQuestion.category) ?? []), components.composite]);
    if (judgment) {
      judgeByCategory.set(baseQuestion.category, [...(judgeByCategory.get(baseQuestion.category) ?? []), judgment.score]);
      if (judgment.bestAnswer === 'A') bestAnswers.base++;
      else if (judgment.bestAnswer === 'B') bestAnswers.candidate++;
      else if (judgment.bestAnswer === 'AB') bestAnswers.tie++;
    }
  }

  const totalScore = average(questionScores.map(q => q.composite));
  const judged = questionScores.flatMap(q => (q.judgmentScore === undefined ? [] : [q.judgmentScore]));
  const hasJudgment = questionScores.length > 0 && judged.length === questionScores.length;
  const averageJudgmentScore = judged.length > 0 ? average(judged) : undefined;

  const evalTps = meanThroughput(quant.questionResults, q => q.evalTokensPerSecond);
  const promptTps = meanThroughput(quant.questionResults, q => q.promptTokensPerSecond);

  return {
    tag: quant.tag,
    quantizationType: quant.quantizationType,
    diskSizeBytes: quant.diskSizeBytes,
    questionScores,
    categoryScores: Object.fromEntries(Array.from(byCategory, ([name, values]) => [name, average(values)])),
    categoryJudgmentScores: Object.fromEntries(Array.from(judgeByCategory, ([name, values]) => [name, average(values)])),
    totalScore,
    averageJudgmentScore,
    finalScore: hasJudgment ? blendWithJudge(totalScore, averageJudgmentScore) : totalScore,
    hasJudgment,
    bestAnswers,
    evalTokensPerSecond: evalTps,
    promptTokensPerSecond: promptTps,
    evalPercentOfBase: percentOf(evalTps, meanThroughput(base.questionResults, q => q.evalTokensPerSecond)),
    promptPercentOfBase: percentOf(promptTps, meanThroughput(base.questionResults, q => q.promptTokensPerSecond)),
  };
}

export function scoreDocument(document: QcDocument, weights: ScoreWeights = DEFAULT_WEIGHTS): QcScoreReport {
  const base = document.results.find(r => r.isBase);
  if (!base) {
    throw new ResultDocumentError(`Result document for ${document.modelName} has no base quantization`);
  }

  const judgeModel = document.results
    .flatMap(r => r.questionResults)
    .find(q => q.judgment !== undefined)?.judgment?.judgeModel;

  return {
    modelName: document.modelName,
    testSuiteName: document.testSuiteName,
    baseTag: base.tag,
    baseQuantizationType: base.quantizationType,
    baseDiskSizeBytes: base.diskSizeBytes,
    baseEvalTokensPerSecond: meanThroughput(base.questionResults, q => q.evalTokensPerSecond),
    basePromptTokensPerSecond: meanThroughput(base.questionResults, q => q.promptTokensPerSecond),
    totalQuestions: base.questionResults.length,
    judgeModel,
    quants: document.results.filter(r => !r.isBase).map(r => scoreQuant(base, r, weights)),
  };
}
