/**
 * Modelsync QC - Test Suites
 * Built-in suites ship as JSON beside this module; external suites are validated the same way
 */

import { readFile } from 'node:fs/promises';
import { TestSuiteError, describeIssue } from './errors.js';
import { DEFAULT_CONTEXT_LENGTH, TestSuiteSchema, type SuiteQuestion, type TestSuite } from './types.js';

export const BUILT_IN_SUITES = ['v1quick', 'v1base'] as const;
export type BuiltInSuite = (typeof BUILT_IN_SUITES)[number];

export const DEFAULT_SUITE: BuiltInSuite = 'v1quick';

export function isBuiltInSuite(name: string): name is BuiltInSuite {
  return BUILT_IN_SUITES.some(suite => suite === name);
}

export function parseTestSuite(value: unknown, origin: string): TestSuite {
  const parsed = TestSuiteSchema.safeParse(value);
  if (!parsed.success) {
    throw new TestSuiteError(`Invalid test suite ${origin}: ${describeIssue(parsed.error)}`);
  }

  const suite = parsed.data;
  const categoryIds = new Set<string>();
  for (const category of suite.categories) {
    if (categoryIds.has(category.id)) {
      throw new TestSuiteError(`Invalid test suite ${origin}: duplicate category id "${category.id}"`);
    }
    categoryIds.add(category.id);

    const questionIds = new Set<string>();
    for (const question of category.questions) {
      if (questionIds.has(question.id)) {
        throw new TestSuiteError(
          `Invalid test suite ${origin}: duplicate question id "${question.id}" in category "${category.id}"`
        );
      }
      questionIds.add(question.id);
    }
  }

  return suite;
}

export async function loadBuiltInSuite(name: BuiltInSuite): Promise<TestSuite> {
  const content = await readFile(new URL(`./suites/${name}.json`, import.meta.url), 'utf-8');
  return parseTestSuite(JSON.parse(content), name);
}

export async function loadSuiteFile(filePath: string): Promise<TestSuite> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (error) {
    throw new TestSuiteError(`Cannot read test suite ${filePath}`, error);
  }

  let value: unknown;
  try {
    value = JSON.parse(content);
  } catch (error) {
    throw new TestSuiteError(`Test suite ${filePath} is not valid JSON`, error);
  }
  return parseTestSuite(value, filePath);
}

/**
 * A built-in suite name, or a path to a suite file
 */
export async function resolveTestSuite(nameOrPath: string = DEFAULT_SUITE): Promise<TestSuite> {
  return isBuiltInSuite(nameOrPath) ? loadBuiltInSuite(nameOrPath) : loadSuiteFile(nameOrPath);
}

/**
 * Questions in run order: category order, then question order within the category.
 * Context length resolves question > category > suite > `defaultContextLength`.
 */
export function flattenSuite(
  suite: TestSuite,
  defaultContextLength: number = DEFAULT_CONTEXT_LENGTH
): SuiteQuestion[] {
  const questions: SuiteQuestion[] = [];
  for (const category of suite.categories) {
    for (const question of category.questions) {
      questions.push({
        id: `${category.id}-${question.id}`,
        categoryId: category.id,
        category: category.name,
        text: question.text,
        contextLength:
          question.contextLength ?? category.contextLength ?? suite.contextLength ?? defaultContextLength,
      });
    }
  }
  return questions;
}
