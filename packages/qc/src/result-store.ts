/**
 * Modelsync QC - Result Store
 * Loads, validates and atomically rewrites the persisted result document
 */

import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { ResultDocumentError, describeIssue } from './errors.js';
import {
  QcDocumentSchema,
  RESULT_DOCUMENT_VERSION,
  type QcDocument,
  type QuantResult,
  type SuiteQuestion,
  type TestOptions,
} from './types.js';

export function defaultResultPath(model: string): string {
  return `${model.replace(/[/\\:]/g, '-')}.qc.json`;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class ResultStore {
  private now: () => Date;

  constructor(now: () => Date = () => new Date()) {
    this.now = now;
  }

  createDocument(modelName: string, testSuiteName: string, options: TestOptions): QcDocument {
    const timestamp = this.now().toISOString();
    return {
      version: RESULT_DOCUMENT_VERSION,
      testSuiteName,
      modelName,
      createdAt: timestamp,
      updatedAt: timestamp,
      options,
      results: [],
    };
  }

  /**
   * null when no document exists yet at `filePath`
   */
  async load(filePath: string): Promise<QcDocument | null> {
    let content: string;
    try {
      content = await readFile(filePath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) return null;
      throw new ResultDocumentError(`Cannot read result document ${filePath}`, error);
    }

    let value: unknown;
    try {
      value = JSON.parse(content);
    } catch (error) {
      throw new ResultDocumentError(`Result document ${filePath} is not valid JSON`, error);
    }

    const parsed = QcDocumentSchema.safeParse(value);
    if (!parsed.success) {
      throw new ResultDocumentError(`Result document ${filePath} is invalid: ${describeIssue(parsed.error)}`);
    }
    return parsed.data;
  }

  /**
   * Write to a sibling temp file, then rename over the target
   */
  async save(filePath: string, document: QcDocument): Promise<void> {
    document.updatedAt = this.now().toISOString();
    const directory = path.dirname(path.resolve(filePath));
    const tempPath = path.join(directory, `.${path.basename(filePath)}.${process.pid}.tmp`);

    await mkdir(directory, { recursive: true });
    try {
      await writeFile(tempPath, JSON.stringify(document, null, 2) + '\n', 'utf-8');
      await rename(tempPath, filePath);
    } catch (error) {
      await rm(tempPath, { force: true });
      throw new ResultDocumentError(`Cannot write result document ${filePath}`, error);
    }
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// DOCUMENT QUERIES
// ═══════════════════════════════════════════════════════════════════════════

export function assertDocumentMatches(document: QcDocument, modelName: string, testSuiteName: string): void {
  if (document.modelName.toLowerCase() !== modelName.toLowerCase()) {
    throw new ResultDocumentError(
      `Result document belongs to ${document.modelName}, not ${modelName}; choose another output file`
    );
  }
  if (document.testSuiteName !== testSuiteName) {
    throw new ResultDocumentError(
      `Result document was produced with suite ${document.testSuiteName}, not ${testSuiteName}`
    );
  }
}

export function findQuant(document: QcDocument, tag: string): QuantResult | undefined {
  const wanted = tag.toLowerCase();
  return document.results.find(r => r.tag.toLowerCase() === wanted);
}

export function storedBaseTag(document: QcDocument | null): string | undefined {
  return document?.results.find(r => r.isBase)?.tag;
}

/**
 * Exactly the base tag ends up marked as base
 */
export function repairBaseFlags(document: QcDocument, baseTag: string): void {
  const wanted = baseTag.toLowerCase();
  for (const result of document.results) {
    result.isBase = result.tag.toLowerCase() === wanted;
  }
}

/**
 * Suite questions without a result, in run order
 */
export function missingQuestions(quant: QuantResult | undefined, questions: SuiteQuestion[]): SuiteQuestion[] {
  if (!quant) return questions;
  const answered = new Set(quant.questionResults.map(q => q.questionId));
  return questions.filter(q => !answered.has(q.id));
}

export function isComplete(quant: QuantResult | undefined, questions: SuiteQuestion[]): boolean {
  return quant !== undefined && missingQuestions(quant, questions).length === 0;
}

/**
 * Question ids whose judgment is absent or came from another judge model
 */
export function unjudgedQuestions(quant: QuantResult, judgeModel: string): string[] {
  return quant.questionResults
    .filter(q => q.judgment === undefined || q.judgment.judgeModel !== judgeModel)
    .map(q => q.questionId);
}

export function fingerprintOf(quant: Pick<QuantResult, 'family' | 'parameterSize'>): string {
  return `${quant.family}/${quant.parameterSize}`.toLowerCase();
}
