// ── Modelsync QC: Result Store ──

import { mkdtemp, readdir, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import {
  ResultStore,
  assertDocumentMatches,
  defaultResultPath,
  isComplete,
  missingQuestions,
  repairBaseFlags,
  storedBaseTag,
  unjudgedQuestions,
} from '../result-store.js';
import { ResultDocumentError } from '../errors.js';
import { DEFAULT_TEST_OPTIONS, type QuantResult, type SuiteQuestion } from '../types.js';

// ── Helpers ──
const FIXED = new Date('2026-03-01T12:00:00.000Z');

function quant(tag: string, isBase: boolean, answered: string[]): QuantResult {
  return {
    tag,
    modelName: `llama3.2:${tag}`,
    digest: 'abc',
    diskSizeBytes: 100,
    family: 'llama',
    parameterSize: '3B',
    quantizationType: tag.toUpperCase(),
    isBase,
    pulledOnDemand: false,
    questionResults: answered.map(questionId => ({
      questionId,
      category: 'Reasoning',
      question: 'q',
      answer: 'a',
      tokens: [{ token: 'a', logprob: -0.5 }],
      evalTokensPerSecond: 10,
      promptTokensPerSecond: 40,
      totalTokens: 1,
    })),
  };
}

function questions(...ids: string[]): SuiteQuestion[] {
  return ids.map(id => ({ id, categoryId: 'reasoning', category: 'Reasoning', text: id, contextLength: 4096 }));
}

// ─────────────────────────────────────────
describe('ResultStore', () => {
  let dir: string;
  const store = new ResultStore(() => FIXED);

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'modelsync-results-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('returns null when no document exists', async () => {
    expect(await store.load(path.join(dir, 'none.qc.json'))).toBeNull();
  });

  it('saves atomically and loads the same document', async () => {
    const file = path.join(dir, 'nested', 'llama3.2.qc.json');
    const document = store.createDocument('llama3.2', 'v1quick', DEFAULT_TEST_OPTIONS);
    document.results.push(quant('fp16', true, ['reasoning-1']));

    await store.save(file, document);

    expect(await readdir(path.dirname(file))).toEqual(['llama3.2.qc.json']);
    const loaded = await store.load(file);
    expect(loaded).toEqual(document);
    expect(loaded?.updatedAt).toBe('2026-03-01T12:00:00.000Z');
    expect(JSON.parse(await readFile(file, 'utf-8')).results[0].tag).toBe('fp16');
  });

  it('defaults pulledOnDemand for documents written without it', async () => {
    const file = path.join(dir, 'old.qc.json');
    const legacy: Record<string, unknown> = { ...quant('q8_0', false, []) };
    delete legacy.pulledOnDemand;
    await writeFile(
      file,
      JSON.stringify({ version: 1, testSuiteName: 'v1quick', modelName: 'llama3.2', options: DEFAULT_TEST_OPTIONS, results: [legacy] })
    );

    expect((await store.load(file))?.results[0]?.pulledOnDemand).toBe(false);
  });

  it('rejects unreadable and invalid documents', async () => {
    const broken = path.join(dir, 'broken.qc.json');
    await writeFile(broken, '{ "version": 1,');
    await expect(store.load(broken)).rejects.toThrow(`Result document ${broken} is not valid JSON`);

    const invalid = path.join(dir, 'invalid.qc.json');
    await writeFile(invalid, JSON.stringify({ version: 1, testSuiteName: 'v1quick', options: DEFAULT_TEST_OPTIONS, results: [] }));
    await expect(store.load(invalid)).rejects.toThrow(`Result document ${invalid} is invalid: modelName: Required`);
  });
});

// ─────────────────────────────────────────
describe('document queries', () => {
  it('derives a file name from the model reference', () => {
    expect(defaultResultPath('llama3.2')).toBe('llama3.2.qc.json');
    expect(defaultResultPath('hf.co/user/repo')).toBe('hf.co-user-repo.qc.json');
  });

  it('refuses documents of another model or suite', () => {
    const document = new ResultStore().createDocument('llama3.2', 'v1quick', DEFAULT_TEST_OPTIONS);
    expect(() => assertDocumentMatches(document, 'LLAMA3.2', 'v1quick')).not.toThrow();
    expect(() => assertDocumentMatches(document, 'qwen2', 'v1quick')).toThrow(ResultDocumentError);
    expect(() => assertDocumentMatches(document, 'llama3.2', 'v1base')).toThrow('produced with suite v1quick');
  });

  it('keeps exactly one base flag', () => {
    const document = new ResultStore().createDocument('llama3.2', 'v1quick', DEFAULT_TEST_OPTIONS);
    document.results.push(quant('fp16', true, []), quant('Q8_0', true, []));

    repairBaseFlags(document, 'q8_0');

    expect(document.results.map(r => r.isBase)).toEqual([false, true]);
    expect(storedBaseTag(document)).toBe('Q8_0');
  });

  it('lists missing questions in run order', () => {
    const suite = questions('a-1', 'a-2', 'b-1');
    const partial = quant('q4_0', false, ['a-2']);

    expect(missingQuestions(partial, suite).map(q => q.id)).toEqual(['a-1', 'b-1']);
    expect(missingQuestions(undefined, suite)).toHaveLength(3);
    expect(isComplete(partial, suite)).toBe(false);
    expect(isComplete(quant('q4_0', false, ['b-1', 'a-1', 'a-2']), suite)).toBe(true);
  });

  it('treats judgments from another judge model as missing', () => {
    const result = quant('q4_0', false, ['a-1', 'a-2', 'a-3']);
    const [first, second] = result.questionResults;
    if (!first || !second) throw new Error('fixture');
    first.judgment = { score: 90, reason: 'r', judgeModel: 'qwen2.5:7b', judgedAt: '2026-01-01T00:00:00.000Z' };
    second.judgment = { score: 70, reason: 'r', judgeModel: '@openai/gpt-4o-mini', judgedAt: '2026-01-01T00:00:00.000Z' };

    expect(unjudgedQuestions(result, 'qwen2.5:7b')).toEqual(['a-2', 'a-3']);
  });
});
