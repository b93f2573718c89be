/**
 * Test Result Classifier
 *
 * Maps the output of `sf apex run test --json` to a TestRunResult.
 */

import { readFile } from 'fs/promises';
import { testRunEnvelopeSchema, testSummarySchema } from './testResult.schema.js';
import type { TestMethodResult } from './testResult.schema.js';
import type { TestFailure, TestRunResult } from './testing.types.js';
import { TEST_FAILURES_EXIT_CODE, TEST_FAILURE_OUTCOMES } from '../../utils/constants.js';

function methodName(test: TestMethodResult): string {
  if (test.FullName) return test.FullName;
  if (test.ApexClass && test.MethodName) return `${test.ApexClass.Name}.${test.MethodName}`;
  return test.MethodName ?? 'Unknown';
}

function toFailure(test: TestMethodResult): TestFailure {
  return { name: methodName(test), message: test.Message, stackTrace: test.StackTrace };
}

/**
 * Classify a saved or freshly printed payload, ignoring how the CLI exited
 */
export function classifyTestPayload(raw: string): TestRunResult {
  let payload: unknown;
  try {
    payload = JSON.parse(raw);
  } catch {
    return { kind: 'parse_failure' };
  }

  const envelope = testRunEnvelopeSchema.safeParse(payload);
  if (!envelope.success) {
    return { kind: 'parse_failure' };
  }

  const summary = testSummarySchema.safeParse(envelope.data.result.summary);
  if (!summary.success) {
    return { kind: 'no_summary' };
  }

  if (summary.data.failing === 0) {
    return { kind: 'passed', summary: summary.data };
  }

  const failures = envelope.data.result.tests
    .filter((test) => test.Outcome !== undefined && TEST_FAILURE_OUTCOMES.includes(test.Outcome))
    .map(toFailure);
  return { kind: 'failed', summary: summary.data, failures };
}

/**
 * Exit 0 means every test passed and 100 that some failed; anything else
 * means the tests never ran
 */
export function classifyTestRun(stdout: string, exitCode: number): TestRunResult {
  const ran = exitCode === 0 || exitCode === TEST_FAILURES_EXIT_CODE;
  if (!ran || stdout.trim() === '') {
    return { kind: 'process_failure', exitCode };
  }
  return classifyTestPayload(stdout);
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Re-read the results saved by the last run. Null when there are none.
 */
export async function loadTestResults(filePath: string): Promise<TestRunResult | null> {
  let raw: string;
  try {
    raw = await readFile(filePath, 'utf-8');
  } catch (error) {
    if (isMissingFile(error)) return null;
    throw error;
  }
  return raw.trim() === '' ? null : classifyTestPayload(raw);
}
