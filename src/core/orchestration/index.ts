/**
 * Orchestration Module
 * Single-flight deployment pipelines
 */

export { DeploymentOrchestrator, isDeploymentSuccessful } from './orchestrator.js';
export { SingleFlight } from './singleFlight.js';
export {
  buildSingleFileDeployArgs,
  buildManifestDeployArgs,
  buildDeltaArgs,
  buildApexTestArgs,
} from './commands.js';

export type { OrchestratorDependencies } from './orchestrator.js';
export type {
  DeploymentVariant,
  DeploymentStageName,
  DeploymentSettings,
  DeployCallOptions,
  DeploymentSubject,
  DeploymentContext,
  DeploymentOutcome,
  StageResult,
  DeploymentStage,
  OrchestratorCallbacks,
} from './orchestration.types.js';
