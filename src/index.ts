/**
 * metadeploy
 * Deploy Salesforce metadata through the sf CLI and turn compile errors into
 * editor diagnostics
 */

export {
  DeploymentOrchestrator,
  isDeploymentSuccessful,
  SingleFlight,
  buildSingleFileDeployArgs,
  buildManifestDeployArgs,
  buildDeltaArgs,
  buildApexTestArgs,
} from './core/orchestration/index.js';
export type {
  OrchestratorDependencies,
  DeploymentVariant,
  DeploymentStageName,
  DeploymentSettings,
  DeployCallOptions,
  DeploymentSubject,
  DeploymentContext,
  DeploymentOutcome,
  OrchestratorCallbacks,
} from './core/orchestration/index.js';

export { classifyDeployResult, classifyJobOutput } from './core/classification/index.js';
export type { ClassifiedResult, ClassifiedResultKind } from './core/classification/index.js';

export {
  extractFailureRecords,
  mergeFailureRecord,
  toDiagnostics,
  DiagnosticsStore,
  diagnosticsStore,
  JsonFileDiagnosticSink,
} from './core/diagnostics/index.js';
export type {
  FailureRecord,
  DiagnosticRecord,
  DiagnosticMap,
  DiagnosticSink,
} from './core/diagnostics/index.js';

export {
  ApexTestRunner,
  isTestRunSuccessful,
  classifyTestRun,
  loadTestResults,
} from './core/testing/index.js';
export type {
  TestRunnerDependencies,
  TestTarget,
  TestRunOptions,
  TestRunSettings,
  TestSummary,
  TestFailure,
  TestRunResult,
  TestRunOutcome,
} from './core/testing/index.js';

export { Job, runJob, resolveCli, spawnInvocation } from './core/process/index.js';
export type { JobSpec, JobResult, JobRunner, CliResolver } from './core/process/index.js';

export { createProgressHandle } from './core/progress/index.js';
export type { ProgressHandle, ProgressBackend, ProgressSink } from './core/progress/index.js';

export { FileIndex, buildFileIndex, markFilesDirty } from './core/selection/index.js';

export { config, resolveOptions } from './config.js';
export type { MetadeployConfig, ResolvedOptions } from './config.js';

export {
  DeploymentError,
  DeploymentValidationError,
  CliNotFoundError,
} from './utils/errors.js';
export { consoleNotifier, silentNotifier } from './utils/notifier.js';
export type { Notifier, NotificationLevel } from './utils/notifier.js';
