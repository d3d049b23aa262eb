/**
 * Modelsync QC - Judge Prompts
 */

export const JUDGE_MAX_TOKENS = 800;

export const JUDGE_SYSTEM_PROMPT = `You compare two answers to the same question.
RESPONSE A comes from the reference model and RESPONSE B from a quantized variant of it.
Rate how closely B matches A in meaning, correctness, completeness and style on a scale from 1 to 100,
where 100 means equivalent and 1 means unrelated or wrong.
Start the reason with "A and B match:" when they are essentially the same, otherwise with "A and B differ:",
followed by one or two sentences naming the important differences.
Set bestanswer to "A" when A is the better answer, "B" when B is better, or "AB" when they are equally good.
Reply with JSON only, exactly in this shape:
{"score": <1-100>, "reason": "<text>", "bestanswer": "A" | "B" | "AB"}`;

/** Structured-output schema for servers that constrain replies */
export const JUDGE_RESPONSE_FORMAT: Record<string, unknown> = {
  type: 'object',
  properties: {
    score: { type: 'integer', minimum: 1, maximum: 100 },
    reason: { type: 'string' },
    bestanswer: { type: 'string', enum: ['A', 'B', 'AB'] },
  },
  required: ['score', 'reason', 'bestanswer'],
};

export interface JudgeRequest {
  question: string;
  baseAnswer: string;
  candidateAnswer: string;
}

export function buildJudgePrompt(request: JudgeRequest): string {
  return [
    'QUESTION:',
    request.question.trim(),
    '',
    'RESPONSE A:',
    request.baseAnswer.trim(),
    '',
    'RESPONSE B:',
    request.candidateAnswer.trim(),
  ].join('\n');
}
