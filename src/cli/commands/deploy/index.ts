/**
 * Deploy Command
 * Deploys Salesforce metadata through the sf CLI
 */

import { resolve } from 'path';
import chalk from 'chalk';
import type { Command } from 'commander';
import {
  DeploymentOrchestrator,
  isDeploymentSuccessful,
} from '../../../core/orchestration/index.js';
import type { DeploymentOutcome, DeploymentVariant } from '../../../core/orchestration/index.js';
import { JsonFileDiagnosticSink, diagnosticsStore } from '../../../core/diagnostics/index.js';
import { buildFileIndex } from '../../../core/selection/index.js';
import type { FileIndex } from '../../../core/selection/index.js';
import { config as envConfig, resolveOptions } from '../../../config.js';
import type { ResolvedOptions } from '../../../config.js';
import { formatError, isValidationError, wrapError } from '../../../utils/errors.js';
import { createLogger, setDebugMode } from '../../../utils/logger.js';
import { consoleNotifier } from '../../../utils/notifier.js';
import { readSelectionList } from '../../utils.js';
import { displayDeploymentHeader, displayDiagnostics, displayDiagnosticsSaved } from './display.js';
import { createProgressBackend } from './progress.js';

const log = createLogger('cli');

/**
 * Options shared by every deploy subcommand (as parsed by commander)
 */
export interface DeployCommandOptions {
  ignoreConflicts?: boolean;
  apiVersion?: string;
  cliPath?: string;
  cachePath?: string;
  sourceDir?: string;
  from?: string;
  progress?: boolean;
  debug?: boolean;
}

interface SelectedCommandOptions extends DeployCommandOptions {
  list?: string;
}

function withDeployOptions(command: Command): Command {
  return command
    .option('--ignore-conflicts', 'Deploy even if the org has conflicting changes', false)
    .option('--api-version <version>', 'Metadata API version', envConfig.apiVersion)
    .option('--cli-path <path>', 'sf CLI executable', envConfig.sfCliPath)
    .option('--cache-path <dir>', 'Directory for deploy results and logs', envConfig.cachePath)
    .option('--source-dir <dir>', 'Project source directory to index', envConfig.sourceDir)
    .option('--from <ref>', 'Revision the change set is computed against', envConfig.deltaFrom)
    .option('--no-progress', 'Disable the progress spinner')
    .option('--debug', 'Enable debug logging for verbose output', envConfig.debug);
}

export function toResolvedOptions(options: DeployCommandOptions): ResolvedOptions {
  return resolveOptions({
    apiVersion: options.apiVersion,
    sfCliPath: options.cliPath,
    cachePath: options.cachePath,
    sourceDir: options.sourceDir,
    deltaFrom: options.from,
    debug: options.debug,
  });
}

/**
 * Build an orchestrator for one CLI run, execute `deploy`, then show and
 * save the diagnostics it produced
 */
async function runDeployment(
  variant: DeploymentVariant,
  options: DeployCommandOptions,
  deploy: (orchestrator: DeploymentOrchestrator) => Promise<DeploymentOutcome>,
  extras: { target?: string; fileIndex?: FileIndex } = {}
): Promise<void> {
  const resolved = toResolvedOptions(options);
  setDebugMode(resolved.debug);
  log.debug('resolved options', resolved);

  displayDeploymentHeader(variant, resolved, extras.target);

  const orchestrator = new DeploymentOrchestrator({
    settings: resolved,
    notifier: consoleNotifier,
    progressBackend: createProgressBackend(options.progress ?? true),
    diagnostics: diagnosticsStore,
    diagnosticSink: new JsonFileDiagnosticSink(resolved.diagnosticsFilePath),
    fileIndex: extras.fileIndex,
    callbacks: {
      onStageStart: (stage) => log.debug(`stage ${stage} started`),
      onJobExit: (spec, result) =>
        log.debug(`${spec.name} exited with ${result.exitCode}`, result.stderr.join('\n')),
    },
  });

  const outcome = await deploy(orchestrator);

  if (outcome.kind === 'completed' && outcome.diagnostics.size > 0) {
    displayDiagnostics(outcome.diagnostics);
    displayDiagnosticsSaved(resolved.diagnosticsFilePath);
  }

  if (!isDeploymentSuccessful(outcome)) {
    process.exitCode = 1;
  }
}

function handleCommandError(error: unknown): void {
  // Validation errors were already reported by the orchestrator
  if (!isValidationError(error)) {
    console.error(chalk.red('\n❌ Deployment failed:\n'));
    console.error(chalk.red(formatError(error)));
  }
  process.exitCode = 1;
}

/**
 * Register the deploy command group with the CLI program
 */
export function registerDeployCommand(program: Command): void {
  const deploy = program
    .command('deploy')
    .description('Deploy Salesforce metadata to the default org');

  withDeployOptions(
    deploy
      .command('file')
      .description('Deploy a single source file')
      .argument('<path>', 'Source file to deploy')
  ).action(async (filePath: string, options: DeployCommandOptions) => {
    try {
      const target = resolve(filePath);
      await runDeployment(
        'single_file',
        options,
        (orchestrator) =>
          orchestrator.deployFile(target, { ignoreConflicts: options.ignoreConflicts }),
        { target }
      );
    } catch (error) {
      handleCommandError(error);
    }
  });

  withDeployOptions(
    deploy.command('changed').description('Deploy metadata changed since a git revision')
  ).action(async (options: DeployCommandOptions) => {
    try {
      await runDeployment('changed_set', options, (orchestrator) =>
        orchestrator.deployChanged({ ignoreConflicts: options.ignoreConflicts })
      );
    } catch (error) {
      handleCommandError(error);
    }
  });

  withDeployOptions(
    deploy
      .command('selected')
      .description('Deploy the files named in a selection list')
      .argument('[files...]', 'File names or paths to deploy')
      .option('-l, --list <file>', 'File with one file name per line')
  ).action(async (files: string[], options: SelectedCommandOptions) => {
    try {
      const selection = [...files, ...(options.list ? await readSelectionList(options.list) : [])];
      const sourceDir = toResolvedOptions(options).sourceDir;

      let fileIndex: FileIndex;
      try {
        fileIndex = await buildFileIndex(sourceDir);
      } catch (error) {
        throw wrapError(`Failed to index source directory ${sourceDir}`, error);
      }

      await runDeployment(
        'selected_set',
        options,
        (orchestrator) =>
          orchestrator.deploySelected(selection, { ignoreConflicts: options.ignoreConflicts }),
        { fileIndex }
      );
    } catch (error) {
      handleCommandError(error);
    }
  });
}
