/**
 * Apex Test Run Types
 */

import type { ProgressHandle } from '../progress/index.js';

/**
 * A whole test class, or one method of it
 */
export interface TestTarget {
  className: string;
  methodName?: string;
}

export interface TestRunOptions {
  /** Pass --code-coverage and save to the coverage results file */
  coverage?: boolean;
}

export interface TestRunSettings {
  /** Executable name or path of the sf CLI */
  sfCliPath: string;
  /** Directory for failure logs */
  cachePath: string;
  /** Where the raw output of the last test run is written */
  testResultsFilePath: string;
  /** Same, for runs with coverage */
  coverageResultsFilePath: string;
}

export interface TestSummary {
  outcome?: string;
  testsRan: number;
  passing: number;
  failing: number;
  skipped: number;
  passRate?: string;
  failRate?: string;
  testExecutionTime?: string;
}

export interface TestFailure {
  /** `Class.method` */
  name: string;
  message?: string;
  stackTrace?: string;
}

export type TestRunResult =
  | { kind: 'passed'; summary: TestSummary }
  | { kind: 'failed'; summary: TestSummary; failures: TestFailure[] }
  /** The CLI ran but printed no `result.summary` */
  | { kind: 'no_summary' }
  | { kind: 'parse_failure' }
  /** The CLI itself failed: any exit other than 0 or 100, or no output */
  | { kind: 'process_failure'; exitCode: number };

export type TestRunResultKind = TestRunResult['kind'];

export interface TestRunContext {
  target: TestTarget;
  coverage: boolean;
  cliPath: string;
  progress: ProgressHandle;
}

export interface TestRunOutcome {
  target: TestTarget;
  coverage: boolean;
  result: TestRunResult;
  /** File the raw CLI output was saved to */
  resultsFilePath: string;
}
