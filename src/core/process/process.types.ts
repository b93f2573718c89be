/**
 * Process Domain Types
 */

export type JobState = 'not_started' | 'running' | 'exited';

/**
 * One external process invocation
 */
export interface JobSpec {
  /** Label used in logs, e.g. "deploy" or "manifest" */
  name: string;
  command: string;
  args: readonly string[];
  cwd?: string;
}

export interface JobResult {
  stdout: string[];
  stderr: string[];
  exitCode: number;
}

/**
 * Starts a job and resolves once it exits. The orchestrator only talks to
 * processes through this, so tests can substitute an in-process runner.
 */
export type JobRunner = (spec: JobSpec) => Promise<JobResult>;
