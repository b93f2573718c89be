/**
 * Orchestration Domain Types
 */

import type { ClassifiedResult } from '../classification/index.js';
import type { DiagnosticMap } from '../diagnostics/index.js';
import type { JobResult, JobSpec } from '../process/index.js';
import type { ProgressHandle } from '../progress/index.js';

export type DeploymentVariant = 'single_file' | 'changed_set' | 'selected_set';

export type DeploymentStageName = 'mark_dirty' | 'manifest' | 'deploy';

/**
 * Settings shared by every deployment an orchestrator runs
 */
export interface DeploymentSettings {
  /** Executable name or path of the sf CLI */
  sfCliPath: string;
  apiVersion: string;
  /** Directory for cached responses and failure logs */
  cachePath: string;
  /** Where the last raw deploy response is written */
  deployFilePath: string;
  /** Output directory of the delta tool */
  deltaPath: string;
  /** package.xml the delta tool generates inside `deltaPath` */
  deltaManifestPath: string;
  /** Revision the delta tool compares the working tree against */
  deltaFrom: string;
}

/**
 * Per-call options
 */
export interface DeployCallOptions {
  /** Pass --ignore-conflicts to the deploy */
  ignoreConflicts?: boolean;
}

export type DeploymentSubject =
  | { kind: 'file'; path: string }
  | { kind: 'files'; paths: string[] }
  | { kind: 'none' };

/**
 * State of one deployment invocation. Never shared between invocations.
 */
export interface DeploymentContext {
  variant: DeploymentVariant;
  subject: DeploymentSubject;
  progress: ProgressHandle;
  /** Resolved path of the sf CLI */
  cliPath: string;
  options: DeploymentSettings & Required<DeployCallOptions>;
}

export type DeploymentOutcome =
  | {
      kind: 'completed';
      variant: DeploymentVariant;
      result: ClassifiedResult;
      /** Diagnostics produced by this deployment (empty unless component failures) */
      diagnostics: DiagnosticMap;
    }
  | {
      kind: 'manifest_failed';
      variant: DeploymentVariant;
      /** Exit code of the delta tool; null when it never ran */
      exitCode: number | null;
      reason: string;
    };

/**
 * Either hand over to the next stage or end the deployment
 */
export type StageResult = { next: 'continue' } | { next: 'stop'; outcome: DeploymentOutcome };

export type DeploymentStage = (context: DeploymentContext) => Promise<StageResult>;

/**
 * Callbacks for orchestrator progress updates
 */
export interface OrchestratorCallbacks {
  onStageStart?: (stage: DeploymentStageName, context: DeploymentContext) => void;
  onJobExit?: (spec: JobSpec, result: JobResult, context: DeploymentContext) => void;
  onOutcome?: (outcome: DeploymentOutcome, context: DeploymentContext) => void;
}
