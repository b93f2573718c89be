/**
 * Process Module
 * External command execution
 */

export { Job, runJob, splitLines, spawnInvocation } from './job.js';
export type { SpawnInvocation } from './job.js';
export { resolveCli } from './resolveCli.js';
export type { CliResolver } from './resolveCli.js';
export type { JobSpec, JobResult, JobRunner, JobState } from './process.types.js';
