// ── Modelsync QC: Scoring Engine ──

import { describe, it, expect } from 'vitest';
import {
  blendWithJudge,
  compositeScore,
  lcsLength,
  lengthConsistency,
  logprobsDivergence,
  perplexityPreservation,
  scoreAnswer,
  scoreDocument,
  scoreQuant,
  tokenSimilarity,
} from '../scoring.js';
import { ResultDocumentError } from '../errors.js';
import { DEFAULT_TEST_OPTIONS, type QcDocument, type QuantResult, type QuestionResult, type Token } from '../types.js';

// ── Helpers ──
function tokens(text: string, logprob = -0.1): Token[] {
  return text.split(' ').map(token => ({ token, logprob }));
}

function question(questionId: string, category: string, answer: string, evalTps = 10): QuestionResult {
  return {
    questionId,
    category,
    question: `Question ${questionId}`,
    answer,
    tokens: tokens(answer),
    evalTokensPerSecond: evalTps,
    promptTokensPerSecond: evalTps * 4,
    totalTokens: answer.split(' ').length,
  };
}

function quant(tag: string, isBase: boolean, questionResults: QuestionResult[]): QuantResult {
  return {
    tag,
    modelName: `llama3.2:${tag}`,
    digest: `digest-${tag}`,
    diskSizeBytes: isBase ? 6_000 : 2_000,
    family: 'llama',
    parameterSize: '3B',
    quantizationType: tag.toUpperCase(),
    isBase,
    pulledOnDemand: false,
    questionResults,
  };
}

function judgment(score: number, bestAnswer?: 'A' | 'B' | 'AB') {
  return { score, reason: 'A and B match: same steps', bestAnswer, judgeModel: 'qwen2.5:7b', judgedAt: '2026-01-01T00:00:00.000Z' };
}

// ─────────────────────────────────────────
describe('score components', () => {
  it('gives identical answers 100 on every component', () => {
    const answer = tokens('the train arrives at 17:05');
    const score = scoreAnswer(answer, answer);

    expect(score).toEqual({
      tokenSimilarity: 100,
      logprobsDivergence: 100,
      lengthConsistency: 100,
      perplexity: 100,
      composite: 100,
    });
  });

  it('scores 0 when either answer is empty', () => {
    const answer = tokens('something');
    expect(scoreAnswer([], answer)).toEqual({
      tokenSimilarity: 0,
      logprobsDivergence: 0,
      lengthConsistency: 0,
      perplexity: 0,
      composite: 0,
    });
    expect(scoreAnswer(answer, []).composite).toBe(0);
  });

  it('measures the longest common subsequence over the longer answer', () => {
    expect(lcsLength(['a', 'b', 'c', 'd'], ['a', 'c', 'd'])).toBe(3);
    expect(lcsLength([], ['a'])).toBe(0);
    expect(tokenSimilarity(tokens('a b c d'), tokens('a c d'))).toBe(75);
  });

  it('penalizes length drift exponentially', () => {
    expect(lengthConsistency(tokens('a b c d'), tokens('a b'))).toBeCloseTo(100 * Math.exp(-1), 10);
  });

  it('compares confidence and perplexity from logprobs', () => {
    const base = tokens('a b', 0);
    const candidate = tokens('a b', Math.log(0.5));

    expect(logprobsDivergence(base, candidate)).toBeCloseTo(100 * Math.exp(-1), 10);
    // perplexity 1 vs 2
    expect(perplexityPreservation(base, candidate)).toBeCloseTo(100 * Math.exp(-0.5), 10);
  });

  it('takes a weighted mean of the components', () => {
    const components = { tokenSimilarity: 100, logprobsDivergence: 50, lengthConsistency: 0, perplexity: 100 };
    expect(compositeScore(components)).toBe(60);
    expect(
      compositeScore(
        { tokenSimilarity: 80, logprobsDivergence: 10, lengthConsistency: 10, perplexity: 40 },
        { tokenSimilarity: 1, logprobsDivergence: 0, lengthConsistency: 0, perplexity: 1 }
      )
    ).toBe(60);
  });

  it('blends in the judge score at half weight', () => {
    expect(blendWithJudge(60, 80)).toBe(70);
    expect(blendWithJudge(60, undefined)).toBe(60);
  });
});

// ─────────────────────────────────────────
describe('scoreQuant', () => {
  const base = quant('fp16', true, [
    question('reasoning-1', 'Reasoning', 'it arrives at 17:05'),
    question('coding-1', 'Coding', 'use a set to dedupe'),
  ]);

  it('keeps the composite as final score until every question is judged', () => {
    const candidate = quant('q4_K_M', false, [
      { ...question('reasoning-1', 'Reasoning', 'it arrives at 17:05', 20), judgment: judgment(80, 'B') },
      question('coding-1', 'Coding', 'use a set to dedupe', 20),
    ]);

    const score = scoreQuant(base, candidate);

    expect(score.totalScore).toBe(100);
    expect(score.hasJudgment).toBe(false);
    expect(score.averageJudgmentScore).toBe(80);
    expect(score.finalScore).toBe(100);
    expect(score.bestAnswers).toEqual({ base: 0, candidate: 1, tie: 0 });
    expect(score.categoryScores).toEqual({ Reasoning: 100, Coding: 100 });
    expect(score.categoryJudgmentScores).toEqual({ Reasoning: 80 });
    expect(score.evalPercentOfBase).toBe(200);
  });

  it('blends the average judgment once all questions are judged', () => {
    const candidate = quant('q4_K_M', false, [
      { ...question('reasoning-1', 'Reasoning', 'it arrives at 17:05'), judgment: judgment(80, 'AB') },
      { ...question('coding-1', 'Coding', 'use a set to dedupe'), judgment: judgment(60, 'A') },
    ]);

    const score = scoreQuant(base, candidate);

    expect(score.hasJudgment).toBe(true);
    expect(score.averageJudgmentScore).toBe(70);
    expect(score.finalScore).toBe(85);
    expect(score.bestAnswers).toEqual({ base: 1, candidate: 0, tie: 1 });
  });

  it('ignores questions the candidate has not answered', () => {
    const candidate = quant('q8_0', false, [question('coding-1', 'Coding', 'use a set to dedupe')]);
    const score = scoreQuant(base, candidate);

    expect(score.questionScores.map(q => q.questionId)).toEqual(['coding-1']);
    expect(score.categoryScores).toEqual({ Coding: 100 });
  });
});

describe('scoreDocument', () => {
  function document(results: QuantResult[]): QcDocument {
    return { version: 1, testSuiteName: 'v1quick', modelName: 'llama3.2', options: DEFAULT_TEST_OPTIONS, results };
  }

  it('scores every candidate against the base', () => {
    const report = scoreDocument(
      document([
        quant('fp16', true, [question('reasoning-1', 'Reasoning', 'it arrives at 17:05')]),
        quant('q4_K_M', false, [
          { ...question('reasoning-1', 'Reasoning', 'it arrives at 17:05'), judgment: judgment(90) },
        ]),
      ])
    );

    expect(report.baseTag).toBe('fp16');
    expect(report.totalQuestions).toBe(1);
    expect(report.judgeModel).toBe('qwen2.5:7b');
    expect(report.quants.map(q => [q.tag, q.finalScore])).toEqual([['q4_K_M', 95]]);
  });

  it('requires a base quantization', () => {
    expect(() => scoreDocument(document([quant('q4_K_M', false, [])]))).toThrow(ResultDocumentError);
  });
});
