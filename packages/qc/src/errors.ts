/**
 * Modelsync QC - Errors
 */

import type { ZodError } from 'zod';

export type QcErrorCode =
  | 'ABORT_RUN'
  | 'PATTERN_MATCHED_NOTHING'
  | 'RUN_CANCELLED'
  | 'REQUEST_TIMEOUT'
  | 'JUDGE_RESPONSE'
  | 'RESULT_DOCUMENT'
  | 'SUITE'
  | 'MODEL_MISSING';

export class QcError extends Error {
  readonly code: QcErrorCode;

  constructor(code: QcErrorCode, message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'QcError';
    this.code = code;
  }
}

/**
 * Comparing these models would make every score meaningless
 */
export class AbortRunError extends QcError {
  constructor(message: string) {
    super('ABORT_RUN', message);
    this.name = 'AbortRunError';
  }
}

export class PatternMatchedNothingError extends QcError {
  readonly pattern: string;

  constructor(pattern: string, model: string) {
    super('PATTERN_MATCHED_NOTHING', `Pattern "${pattern}" matched no tags of ${model}`);
    this.name = 'PatternMatchedNothingError';
    this.pattern = pattern;
  }
}

export class RunCancelledError extends QcError {
  constructor(message = 'Run cancelled') {
    super('RUN_CANCELLED', message);
    this.name = 'RunCancelledError';
  }
}

export class RequestTimeoutError extends QcError {
  readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number) {
    super('REQUEST_TIMEOUT', `${operation} timed out after ${Math.round(timeoutMs / 1000)}s`);
    this.name = 'RequestTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export class JudgeResponseError extends QcError {
  readonly rawResponse: string;

  constructor(message: string, rawResponse: string) {
    super('JUDGE_RESPONSE', message);
    this.name = 'JudgeResponseError';
    this.rawResponse = rawResponse;
  }
}

export class ResultDocumentError extends QcError {
  constructor(message: string, cause?: unknown) {
    super('RESULT_DOCUMENT', message, cause);
    this.name = 'ResultDocumentError';
  }
}

export class TestSuiteError extends QcError {
  constructor(message: string, cause?: unknown) {
    super('SUITE', message, cause);
    this.name = 'TestSuiteError';
  }
}

export class ModelMissingError extends QcError {
  readonly model: string;

  constructor(model: string, message: string) {
    super('MODEL_MISSING', message);
    this.name = 'ModelMissingError';
    this.model = model;
  }
}

export function isCancellation(error: unknown): boolean {
  return error instanceof RunCancelledError;
}

/**
 * First failing path of a zod error, e.g. "results.0.tag: Required"
 */
export function describeIssue(error: ZodError): string {
  const issue = error.issues[0];
  if (!issue) return 'unknown issue';
  const path = issue.path.join('.');
  return path ? `${path}: ${issue.message}` : issue.message;
}
