/**
 * Modelsync AI Gateway - Judge Response Parsing
 * Tolerant extraction of {score, reason, bestanswer} from free-form model output
 */

import type { BestAnswer, JudgeCompletion } from './types.js';

const SCORE_FIELDS = ['score', 'similarity', 'similarity_score'];
const REASON_FIELDS = ['reason', 'response', 'explanation', 'rationale'];
const BEST_ANSWER_FIELDS = ['bestanswer', 'best_answer', 'best'];

const TIE_WORDS = new Set(['AB', 'BA', 'TIE', 'EQUAL', 'IDENTICAL', 'BOTH', 'DRAW', 'SAME']);

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Locate the outermost {...} span; an unterminated object runs to the end of the text
 */
export function extractJsonObject(text: string): string | null {
  const start = text.indexOf('{');
  if (start === -1) return null;

  const end = text.lastIndexOf('}');
  return end > start ? text.slice(start, end + 1) : text.slice(start);
}

/**
 * Close whatever a truncated reply left open: strings, arrays, objects
 */
export function repairTruncatedJson(text: string): string {
  const stack: string[] = [];
  let inString = false;
  let escaped = false;

  for (const char of text) {
    if (inString) {
      if (escaped) escaped = false;
      else if (char === '\\') escaped = true;
      else if (char === '"') inString = false;
      continue;
    }

    if (char === '"') inString = true;
    else if (char === '{') stack.push('}');
    else if (char === '[') stack.push(']');
    else if ((char === '}' || char === ']') && stack[stack.length - 1] === char) stack.pop();
  }

  let repaired = text;
  if (escaped) repaired = repaired.slice(0, -1);
  if (inString) repaired += '"';

  repaired = repaired.trimEnd();
  if (repaired.endsWith(',')) repaired = repaired.slice(0, -1);
  if (repaired.endsWith(':')) repaired += ' null';

  return repaired + stack.reverse().join('');
}

export function getFieldCaseInsensitive(obj: Record<string, unknown>, names: string[]): unknown {
  const wanted = new Set(names.map(n => n.toLowerCase()));
  for (const [key, value] of Object.entries(obj)) {
    if (wanted.has(key.toLowerCase())) return value;
  }
  return undefined;
}

/**
 * Map a judge score onto 1-100. Values in (0, 1] are treated as 0.0-1.0 scale;
 * zero becomes the minimum valid score.
 */
export function normalizeScore(value: number): number {
  const scaled = value > 0 && value <= 1 ? value * 100 : value;
  return Math.min(100, Math.max(1, Math.round(scaled)));
}

export function normalizeBestAnswer(value: string): BestAnswer | undefined {
  const upper = value.trim().toUpperCase().replace(/^(RESPONSE|ANSWER)\s+/, '');
  if (upper === 'A') return 'A';
  if (upper === 'B') return 'B';
  if (TIE_WORDS.has(upper)) return 'AB';
  return undefined;
}

/**
 * Parse a judge reply. Missing fields come back as null score / empty reason.
 */
export function parseJudgeResponse(text: string): JudgeCompletion {
  let score: number | null = null;
  let reason = '';
  let bestAnswer: BestAnswer | undefined;

  const candidate = extractJsonObject(text);
  const obj = candidate ? parseObject(candidate) ?? parseObject(repairTruncatedJson(candidate)) : null;

  if (obj) {
    score = toScore(getFieldCaseInsensitive(obj, SCORE_FIELDS));

    const reasonValue = getFieldCaseInsensitive(obj, REASON_FIELDS);
    if (typeof reasonValue === 'string') reason = reasonValue.trim();

    const bestValue = getFieldCaseInsensitive(obj, BEST_ANSWER_FIELDS);
    if (typeof bestValue === 'string') bestAnswer = normalizeBestAnswer(bestValue);
  }

  if (score === null) {
    const match = /["']?(?:score|similarity)["']?\s*[:=]?\s*(\d+(?:\.\d+)?)/i.exec(text);
    if (match?.[1]) score = normalizeScore(Number(match[1]));
  }

  if (!reason) {
    const match = /["']?reason["']?\s*:\s*"((?:[^"\\]|\\.)*)/i.exec(text);
    if (match?.[1]) reason = unescapeJsonString(match[1]).trim();
  }

  if (!bestAnswer) {
    const match = /["']?best[\s_]*answer["']?\s*[:=]?\s*["']?(AB|BA|A|B|tie|equal|both|draw|identical|same)\b/i.exec(text);
    if (match?.[1]) bestAnswer = normalizeBestAnswer(match[1]);
  }

  return { score, reason, bestAnswer, rawResponse: text };
}

function parseObject(text: string): Record<string, unknown> | null {
  try {
    const value: unknown = JSON.parse(text);
    return isRecord(value) ? value : null;
  } catch {
    return null;
  }
}

function toScore(value: unknown): number | null {
  if (typeof value === 'number' && Number.isFinite(value)) return normalizeScore(value);
  if (typeof value === 'string' && value.trim() !== '' && Number.isFinite(Number(value))) {
    return normalizeScore(Number(value));
  }
  return null;
}

function unescapeJsonString(value: string): string {
  const parsed = parseObject(`{"v":"${value}"}`);
  return typeof parsed?.v === 'string' ? parsed.v : value;
}
