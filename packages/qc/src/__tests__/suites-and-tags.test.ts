// ── Modelsync QC: Test Suites and Tag Resolution ──

import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import type { ModelSummary } from '@modelsync/ai-gateway';
import { LogStreamer } from '@modelsync/shared';
import { flattenSuite, loadBuiltInSuite, parseTestSuite, resolveTestSuite } from '../test-suites.js';
import {
  TagResolver,
  extractQuantTag,
  globToRegExp,
  matchTags,
  parseLibraryTags,
  splitTagList,
} from '../tag-resolver.js';
import { PatternMatchedNothingError, TestSuiteError } from '../errors.js';

// ── Helpers ──
function summary(name: string): ModelSummary {
  return { name, size: 1, digest: `digest-${name}`, modifiedAt: '', details: {} };
}

function fakeFetch(routes: Record<string, () => Response>) {
  const urls: string[] = [];
  const impl = async (input: unknown, init?: RequestInit): Promise<Response> => {
    const request = input instanceof Request ? input : new Request(String(input), init);
    urls.push(request.url);
    const route = routes[request.url];
    return route ? route() : new Response('not found', { status: 404 });
  };
  return { impl, urls };
}

// ─────────────────────────────────────────
describe('test suites', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'modelsync-suite-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('loads the built-in quick suite in category order', async () => {
    const suite = await loadBuiltInSuite('v1quick');
    const questions = flattenSuite(suite);

    expect(suite.name).toBe('v1quick');
    expect(questions).toHaveLength(10);
    expect(questions[0]).toMatchObject({ id: 'reasoning-1', categoryId: 'reasoning', category: 'Reasoning', contextLength: 4096 });
    expect(questions[2]?.id).toBe('coding-1');
  });

  it('gives coding questions of the base suite a larger context', async () => {
    const questions = flattenSuite(await resolveTestSuite('v1base'));
    expect(questions).toHaveLength(32);
    expect(questions.find(q => q.id === 'coding-1')?.contextLength).toBe(8192);
    expect(questions.find(q => q.id === 'math-1')?.contextLength).toBe(4096);
  });

  it('resolves context length from question, category, suite, then the default', () => {
    const suite = parseTestSuite(
      {
        name: 'custom',
        categories: [
          { id: 'a', name: 'A', contextLength: 8192, questions: [{ id: '1', text: 'q', contextLength: 2048 }, { id: '2', text: 'q' }] },
          { id: 'b', name: 'B', questions: [{ id: '1', text: 'q' }] },
        ],
      },
      'inline'
    );

    expect(flattenSuite(suite, 1024).map(q => [q.id, q.contextLength])).toEqual([
      ['a-1', 2048],
      ['a-2', 8192],
      ['b-1', 1024],
    ]);
  });

  it('rejects duplicate question ids within a category', () => {
    expect(() =>
      parseTestSuite(
        { name: 'dup', categories: [{ id: 'a', name: 'A', questions: [{ id: '1', text: 'x' }, { id: '1', text: 'y' }] }] },
        'dup.json'
      )
    ).toThrow('Invalid test suite dup.json: duplicate question id "1" in category "a"');
  });

  it('reads suite files by path and reports invalid ones', async () => {
    const good = path.join(dir, 'mine.json');
    await writeFile(good, JSON.stringify({ name: 'mine', categories: [{ id: 'x', name: 'X', questions: [{ id: '1', text: 'hi' }] }] }));
    const bad = path.join(dir, 'bad.json');
    await writeFile(bad, JSON.stringify({ name: 'bad', categories: [] }));

    expect((await resolveTestSuite(good)).name).toBe('mine');
    await expect(resolveTestSuite(bad)).rejects.toBeInstanceOf(TestSuiteError);
    await expect(resolveTestSuite(path.join(dir, 'missing.json'))).rejects.toThrow('Cannot read test suite');
  });
});

// ─────────────────────────────────────────
describe('tag patterns', () => {
  it('anchors wildcards so Q4* never matches IQ4 tags', () => {
    const regex = globToRegExp('Q4*');
    expect(regex.test('q4_K_M')).toBe(true);
    expect(regex.test('IQ4_XS')).toBe(false);
    expect(globToRegExp('q?_0').test('Q8_0')).toBe(true);
  });

  it('matches case-insensitively and drops case duplicates', () => {
    expect(matchTags('q4*', ['Q4_K_M', 'q4_k_m', 'Q4_0', 'IQ4_XS', 'Q5_K_M'])).toEqual(['Q4_K_M', 'Q4_0']);
  });

  it('splits comma-separated lists', () => {
    expect(splitTagList(['q4_K_M, q8_0', ' Q5*', ''])).toEqual(['q4_K_M', 'q8_0', 'Q5*']);
  });

  it('extracts quantization suffixes from GGUF file names', () => {
    expect(extractQuantTag('Llama-3.2-3B-Instruct-Q4_K_M.gguf')).toBe('Q4_K_M');
    expect(extractQuantTag('model-IQ4_XS.gguf')).toBe('IQ4_XS');
    expect(extractQuantTag('model-f16.gguf')).toBe('f16');
    expect(extractQuantTag('README.md')).toBeNull();
  });

  it('reads tags from library page links', () => {
    const html = '<a href="/library/llama3.2:3b-instruct-q4_K_M">x</a><a href="/library/llama3.2:latest">y</a>' +
      '<a href="/library/llama3.2:latest">again</a><a href="/library/other:q8_0">z</a>';
    expect(parseLibraryTags(html, 'library/llama3.2')).toEqual(['3b-instruct-q4_K_M', 'latest']);
  });
});

describe('TagResolver', () => {
  const server = {
    listModels: async () => [summary('llama3.2:q4_K_M'), summary('llama3.2:fp16'), summary('other:q4_0')],
  };
  const libraryPage = () =>
    new Response('<a href="/library/llama3.2:q4_0">a</a><a href="/library/llama3.2:Q4_K_M">b</a><a href="/library/llama3.2:q8_0">c</a>');

  it('expands wildcards over the server and library listings', async () => {
    const { impl } = fakeFetch({ 'https://ollama.com/library/llama3.2/tags': libraryPage });
    const resolver = new TagResolver({ server, fetch: impl, logger: new LogStreamer(10, 'error').child('test') });

    expect(await resolver.resolve('llama3.2', 'q4*')).toEqual(['q4_K_M', 'q4_0']);
  });

  it('passes literal tags through without listing', async () => {
    const { impl, urls } = fakeFetch({});
    const resolver = new TagResolver({ server, fetch: impl });

    expect(await resolver.resolveAll('llama3.2', ['Q8_0, fp16', 'q8_0'])).toEqual(['Q8_0', 'fp16']);
    expect(urls).toEqual([]);
  });

  it('skips a failing source and reports empty matches', async () => {
    const { impl } = fakeFetch({ 'https://ollama.com/library/llama3.2/tags': () => new Response('down', { status: 503 }) });
    const logger = new LogStreamer(10, 'debug');
    const resolver = new TagResolver({ server, fetch: impl, logger: logger.child('tags') });

    expect(await resolver.resolve('llama3.2', 'f*')).toEqual(['fp16']);
    expect(logger.getLevelCounts().warn).toBe(1);
    await expect(resolver.resolve('llama3.2', 'q2*')).rejects.toBeInstanceOf(PatternMatchedNothingError);
  });

  it('lists Hugging Face repositories from their GGUF files only', async () => {
    const { impl, urls } = fakeFetch({
      'https://huggingface.co/api/models/user/repo': () =>
        new Response(
          JSON.stringify({
            siblings: [{ rfilename: 'repo-Q4_K_M.gguf' }, { rfilename: 'repo-Q8_0.gguf' }, { rfilename: 'README.md' }],
          }),
          { headers: { 'Content-Type': 'application/json' } }
        ),
    });
    const listModels = async () => {
      throw new Error('server must not be asked');
    };
    const resolver = new TagResolver({ server: { listModels }, fetch: impl });

    expect(await resolver.resolve('hf.co/user/repo', '*')).toEqual(['Q4_K_M', 'Q8_0']);
    expect(urls).toEqual(['https://huggingface.co/api/models/user/repo']);
  });
});
