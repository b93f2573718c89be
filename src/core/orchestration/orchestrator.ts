/**
 * Deployment Orchestrator
 *
 * Runs single-file, changed-set and selected-set deployments through the sf
 * CLI. Each deployment is a short pipeline of stages (mark dirty → manifest →
 * deploy) driven by `runPipeline`; only one deployment may be in flight.
 */

import { mkdir, writeFile } from 'fs/promises';
import { basename, dirname } from 'path';
import { classifyDeployResult } from '../classification/index.js';
import type { ClassifiedResult } from '../classification/index.js';
import {
  countDiagnostics,
  diagnosticsStore as sharedDiagnosticsStore,
  toDiagnostics,
} from '../diagnostics/index.js';
import type { DiagnosticMap, DiagnosticSink, DiagnosticsStore } from '../diagnostics/index.js';
import { resolveCli as whichCli, runJob as spawnJob } from '../process/index.js';
import type { CliResolver, JobResult, JobRunner, JobSpec } from '../process/index.js';
import { createProgressHandle } from '../progress/index.js';
import type { ProgressBackend } from '../progress/index.js';
import { markFilesDirty } from '../selection/index.js';
import type { FileIndex } from '../selection/index.js';
import {
  buildDeltaArgs,
  buildManifestDeployArgs,
  buildSingleFileDeployArgs,
} from './commands.js';
import { SingleFlight } from './singleFlight.js';
import type {
  DeployCallOptions,
  DeploymentContext,
  DeploymentOutcome,
  DeploymentSettings,
  DeploymentStage,
  DeploymentSubject,
  DeploymentVariant,
  OrchestratorCallbacks,
  StageResult,
} from './orchestration.types.js';
import { CliNotFoundError, DeploymentValidationError, formatError } from '../../utils/errors.js';
import { logFailure } from '../../utils/errorLogger.js';
import type { FailureLogContext } from '../../utils/errorLogger.js';
import { createLogger } from '../../utils/logger.js';
import { silentNotifier } from '../../utils/notifier.js';
import type { Notifier } from '../../utils/notifier.js';
import { MESSAGES } from '../../utils/constants.js';

const log = createLogger('deploy');

// ============================================================================
// Helper Functions
// ============================================================================

const CONTINUE: StageResult = { next: 'continue' };

function stop(outcome: DeploymentOutcome): StageResult {
  return { next: 'stop', outcome };
}

const PROGRESS_TITLES: Record<DeploymentVariant, string> = {
  single_file: 'Metadata deployment',
  changed_set: 'Changed metadata',
  selected_set: 'Selected metadata',
};

function progressTitle(variant: DeploymentVariant, subject: DeploymentSubject): string {
  return subject.kind === 'file' ? basename(subject.path) : PROGRESS_TITLES[variant];
}

function deployingProgress(variant: DeploymentVariant): [string, number] {
  switch (variant) {
    case 'selected_set':
      return [MESSAGES.DEPLOYING_SELECTED, 50];
    case 'changed_set':
      return [MESSAGES.DEPLOYING, 30];
    case 'single_file':
      return [MESSAGES.DEPLOYING, 50];
  }
}

export function isDeploymentSuccessful(outcome: DeploymentOutcome): boolean {
  return outcome.kind === 'completed' && outcome.result.kind === 'success';
}

// ============================================================================
// Orchestrator
// ============================================================================

export interface OrchestratorDependencies {
  settings: DeploymentSettings;
  /** Defaults to spawning real child processes */
  runJob?: JobRunner;
  /** Defaults to a PATH lookup */
  resolveCli?: CliResolver;
  notifier?: Notifier;
  /** Without one, progress reporting is a no-op */
  progressBackend?: ProgressBackend;
  /** Defaults to the process-wide store */
  diagnostics?: DiagnosticsStore;
  diagnosticSink?: DiagnosticSink;
  /** Needed for selected-set deployments */
  fileIndex?: FileIndex;
  /** Write stdout/stderr of failed jobs under `<cachePath>/logs` (default true) */
  writeFailureLogs?: boolean;
  callbacks?: OrchestratorCallbacks;
  /** Share with an ApexTestRunner so deployments and test runs never overlap */
  guard?: SingleFlight<object>;
}

export class DeploymentOrchestrator {
  private readonly guard: SingleFlight<object>;
  private readonly settings: DeploymentSettings;
  private readonly runJob: JobRunner;
  private readonly resolveCli: CliResolver;
  private readonly notifier: Notifier;
  private readonly progressBackend?: ProgressBackend;
  private readonly diagnostics: DiagnosticsStore;
  private readonly diagnosticSink?: DiagnosticSink;
  private readonly fileIndex?: FileIndex;
  private readonly writeFailureLogs: boolean;
  private readonly callbacks: OrchestratorCallbacks;

  constructor(deps: OrchestratorDependencies) {
    this.guard = deps.guard ?? new SingleFlight<object>();
    this.settings = deps.settings;
    this.runJob = deps.runJob ?? spawnJob;
    this.resolveCli = deps.resolveCli ?? whichCli;
    this.notifier = deps.notifier ?? silentNotifier;
    this.progressBackend = deps.progressBackend;
    this.diagnostics = deps.diagnostics ?? sharedDiagnosticsStore;
    this.diagnosticSink = deps.diagnosticSink;
    this.fileIndex = deps.fileIndex;
    this.writeFailureLogs = deps.writeFailureLogs ?? true;
    this.callbacks = deps.callbacks ?? {};
  }

  /** True while a deployment is in flight */
  get isDeploying(): boolean {
    return this.guard.isHeld;
  }

  /**
   * Deploy one source file
   */
  async deployFile(filePath: string, options: DeployCallOptions = {}): Promise<DeploymentOutcome> {
    const cliPath = this.checkPreconditions();
    const context = this.begin('single_file', { kind: 'file', path: filePath }, cliPath, options);
    const { apiVersion, ignoreConflicts } = context.options;

    return this.runPipeline(context, [
      this.deployStage(buildSingleFileDeployArgs(filePath, apiVersion, ignoreConflicts)),
    ]);
  }

  /**
   * Deploy everything the delta tool finds changed since `deltaFrom`
   */
  async deployChanged(options: DeployCallOptions = {}): Promise<DeploymentOutcome> {
    const cliPath = this.checkPreconditions();
    const context = this.begin('changed_set', { kind: 'none' }, cliPath, options);

    return this.runPipeline(context, [this.manifestStage(), this.manifestDeployStage(context)]);
  }

  /**
   * Deploy the files named in an externally supplied selection list
   */
  async deploySelected(
    selection: readonly string[],
    options: DeployCallOptions = {}
  ): Promise<DeploymentOutcome> {
    const cliPath = this.checkPreconditions();
    const files = this.resolveSelection(selection);
    const context = this.begin('selected_set', { kind: 'files', paths: files }, cliPath, options);

    return this.runPipeline(context, [
      this.markDirtyStage(files),
      this.manifestStage(),
      this.manifestDeployStage(context),
    ]);
  }

  // ==========================================================================
  // Preconditions
  // ==========================================================================

  /**
   * Runs synchronously, before any side effect. Returns the resolved CLI path.
   */
  private checkPreconditions(): string {
    if (this.guard.isHeld) {
      throw this.reject(new DeploymentValidationError(MESSAGES.ALREADY_RUNNING));
    }

    const cliPath = this.resolveCli(this.settings.sfCliPath);
    if (!cliPath) {
      throw this.reject(new CliNotFoundError(this.settings.sfCliPath, MESSAGES.CLI_NOT_FOUND));
    }
    return cliPath;
  }

  private resolveSelection(selection: readonly string[]): string[] {
    if (!this.fileIndex) {
      throw this.reject(
        new DeploymentValidationError('No file index available to resolve the selection list.')
      );
    }

    const { found, missing } = this.fileIndex.resolveSelection(selection);
    const missingList = missing.join(', ');

    if (found.length === 0) {
      const message =
        missing.length > 0
          ? `${MESSAGES.NO_SELECTED_FILES} Missing indexed files: ${missingList}`
          : MESSAGES.NO_SELECTED_FILES;
      throw this.reject(new DeploymentValidationError(message));
    }

    if (missing.length > 0) {
      this.notifier.notify(`${MESSAGES.MISSING_INDEX_ENTRIES}${missingList}`, 'warn');
    }
    return found;
  }

  private reject(error: DeploymentValidationError): DeploymentValidationError {
    log.debug('deployment rejected:', error.message);
    this.notifier.notify(error.message, 'warn');
    return error;
  }

  // ==========================================================================
  // Pipeline
  // ==========================================================================

  private begin(
    variant: DeploymentVariant,
    subject: DeploymentSubject,
    cliPath: string,
    options: DeployCallOptions
  ): DeploymentContext {
    this.diagnostics.clear();

    const context: DeploymentContext = {
      variant,
      subject,
      cliPath,
      progress: createProgressHandle(progressTitle(variant, subject), this.progressBackend),
      options: { ...this.settings, ignoreConflicts: options.ignoreConflicts ?? false },
    };

    if (!this.guard.tryAcquire(context)) {
      // checkPreconditions ran in this same frame, so the token is free
      context.progress.finish();
      throw new DeploymentValidationError(MESSAGES.ALREADY_RUNNING);
    }

    context.progress.report(MESSAGES.STARTING, 0);
    log.debug(`starting ${variant} deployment`, subject);
    return context;
  }

  /**
   * Run stages in order until one stops. Whatever happens, the guard is
   * released and the progress handle finished exactly once.
   */
  private async runPipeline(
    context: DeploymentContext,
    stages: readonly DeploymentStage[]
  ): Promise<DeploymentOutcome> {
    try {
      await this.clearSink();

      for (const stage of stages) {
        const result = await stage(context);
        if (result.next === 'stop') {
          this.callbacks.onOutcome?.(result.outcome, context);
          return result.outcome;
        }
      }
      throw new Error(`The ${context.variant} pipeline ended without an outcome`);
    } finally {
      this.guard.release(context);
      context.progress.finish();
    }
  }

  private async execute(spec: JobSpec, context: DeploymentContext): Promise<JobResult> {
    const result = await this.runJob(spec);
    this.callbacks.onJobExit?.(spec, result, context);
    return result;
  }

  // ==========================================================================
  // Stages
  // ==========================================================================

  private markDirtyStage(files: readonly string[]): DeploymentStage {
    return async (context) => {
      this.callbacks.onStageStart?.('mark_dirty', context);
      try {
        await markFilesDirty(files);
      } catch (error) {
        const reason = formatError(error);
        this.notifier.notify(reason, 'error');
        return stop({ kind: 'manifest_failed', variant: context.variant, exitCode: null, reason });
      }
      return CONTINUE;
    };
  }

  private manifestStage(): DeploymentStage {
    return async (context) => {
      const { progress, options } = context;
      this.callbacks.onStageStart?.('manifest', context);
      progress.report(MESSAGES.PREPARING_MANIFEST, 10);

      try {
        await mkdir(options.deltaPath, { recursive: true });
      } catch (error) {
        const reason = formatError(error);
        progress.report(MESSAGES.MANIFEST_FAILURE, 100);
        this.notifier.notify(reason, 'error');
        return stop({ kind: 'manifest_failed', variant: context.variant, exitCode: null, reason });
      }

      const spec: JobSpec = {
        name: 'manifest',
        command: context.cliPath,
        args: buildDeltaArgs(options.deltaFrom, options.deltaPath),
      };
      const job = await this.execute(spec, context);

      if (job.exitCode !== 0) {
        progress.report(MESSAGES.MANIFEST_FAILURE, 100);
        this.notifier.notify(MESSAGES.MANIFEST_FAILURE, 'error');
        await this.recordFailure(context, spec, job, MESSAGES.MANIFEST_FAILURE);
        return stop({
          kind: 'manifest_failed',
          variant: context.variant,
          exitCode: job.exitCode,
          reason: MESSAGES.MANIFEST_FAILURE,
        });
      }

      this.notifier.notify(MESSAGES.MANIFEST_SUCCESS, 'info');
      progress.report(MESSAGES.MANIFEST_PREPARED, 20);
      return CONTINUE;
    };
  }

  private manifestDeployStage(context: DeploymentContext): DeploymentStage {
    const { deltaManifestPath, apiVersion, ignoreConflicts } = context.options;
    return this.deployStage(buildManifestDeployArgs(deltaManifestPath, apiVersion, ignoreConflicts));
  }

  private deployStage(args: string[]): DeploymentStage {
    return async (context) => {
      const { progress } = context;
      this.callbacks.onStageStart?.('deploy', context);
      const [message, percentage] = deployingProgress(context.variant);
      progress.report(message, percentage);

      const spec: JobSpec = { name: 'deploy', command: context.cliPath, args };
      const job = await this.execute(spec, context);
      progress.report(MESSAGES.CHECKING_RESULT, 90);

      const raw = job.stdout.join('\n');
      await this.persistResponse(context, raw);

      const result = classifyDeployResult(raw, job.exitCode);
      const diagnostics = await this.report(context, result);

      if (result.kind === 'process_failure' || result.kind === 'parse_failure') {
        await this.recordFailure(context, spec, job, `Deploy ended with ${result.kind}`);
      }

      return stop({ kind: 'completed', variant: context.variant, result, diagnostics });
    };
  }

  // ==========================================================================
  // Results
  // ==========================================================================

  /**
   * Notify the user of a classified result and store its diagnostics
   */
  private async report(context: DeploymentContext, result: ClassifiedResult): Promise<DiagnosticMap> {
    const { progress } = context;

    switch (result.kind) {
      case 'success':
        progress.report(MESSAGES.DEPLOY_SUCCESS, 100);
        this.notifier.notify(MESSAGES.DEPLOY_SUCCESS, 'info');
        return new Map();

      case 'source_conflict':
        progress.report(MESSAGES.SOURCE_CONFLICT, 100);
        this.notifier.notify(`${MESSAGES.SOURCE_CONFLICT}: ${result.message}`, 'error');
        return new Map();

      case 'component_failures': {
        const diagnostics = toDiagnostics(result.records);
        this.diagnostics.add(diagnostics);

        progress.report(MESSAGES.DEPLOY_FAILURE, 100);
        this.notifier.notify(MESSAGES.DEPLOY_FAILURE, 'error');
        const total = countDiagnostics(diagnostics);
        if (total > 0) {
          this.notifier.notify(
            `${total} deployment error(s) in ${diagnostics.size} file(s)`,
            'warn'
          );
        }

        await this.publishDiagnostics();
        return diagnostics;
      }

      case 'process_failure':
        progress.report(MESSAGES.DEPLOY_FAILURE, 100);
        this.notifier.notify(
          `${MESSAGES.DEPLOY_FAILURE} (status code ${result.exitCode})`,
          'error'
        );
        return new Map();

      case 'parse_failure':
        progress.report(MESSAGES.PARSE_FAILURE, 100);
        this.notifier.notify(MESSAGES.PARSE_FAILURE, 'error');
        return new Map();
    }
  }

  // Sink failures are logged and never change the outcome.

  private async clearSink(): Promise<void> {
    if (!this.diagnosticSink) return;
    try {
      await this.diagnosticSink.clear();
    } catch (error) {
      log.warn(`Could not clear published diagnostics: ${formatError(error)}`);
    }
  }

  private async publishDiagnostics(): Promise<void> {
    if (!this.diagnosticSink) return;
    try {
      await this.diagnosticSink.publish(this.diagnostics.snapshot());
    } catch (error) {
      log.warn(`Could not publish diagnostics: ${formatError(error)}`);
    }
  }

  /**
   * Overwrite the cached copy of the last raw deploy response
   */
  private async persistResponse(context: DeploymentContext, raw: string): Promise<void> {
    if (raw.trim() === '') return;
    const target = context.options.deployFilePath;
    try {
      await mkdir(dirname(target), { recursive: true });
      await writeFile(target, raw, 'utf-8');
    } catch (error) {
      log.warn(`Could not save deploy response to ${target}: ${formatError(error)}`);
    }
  }

  private async recordFailure(
    context: DeploymentContext,
    spec: JobSpec,
    job: JobResult,
    summary: string
  ): Promise<void> {
    if (!this.writeFailureLogs) return;

    const entry: FailureLogContext = {
      operation: spec.name,
      summary,
      command: spec.command,
      args: spec.args,
      exitCode: job.exitCode,
      stdout: job.stdout,
      stderr: job.stderr,
    };
    try {
      const logFile = await logFailure(context.options.cachePath, entry);
      log.debug(`failure log written to ${logFile}`);
    } catch (error) {
      log.warn(`Could not write failure log: ${formatError(error)}`);
    }
  }
}
