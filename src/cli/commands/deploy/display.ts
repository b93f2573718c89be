/**
 * Display Functions
 * Handles all UI output for the deploy commands
 */

import chalk from 'chalk';
import { CLI_CONSTANTS, fitToWidth } from '../../utils.js';
import type { DiagnosticMap, DiagnosticRecord } from '../../../core/diagnostics/index.js';
import type { DeploymentVariant } from '../../../core/orchestration/index.js';
import type { ResolvedOptions } from '../../../config.js';

const VARIANT_LABELS: Record<DeploymentVariant, string> = {
  single_file: 'Current file',
  changed_set: 'Changed metadata',
  selected_set: 'Selected metadata',
};

/**
 * Display what is about to be deployed and where
 */
export function displayDeploymentHeader(
  variant: DeploymentVariant,
  options: ResolvedOptions,
  target?: string
): void {
  console.log(chalk.bold.white(`🚀 ${VARIANT_LABELS[variant]}`));
  console.log(chalk.gray('─'.repeat(CLI_CONSTANTS.DIVIDER_LENGTH)));
  if (target) {
    console.log(chalk.gray('  Target:      ') + chalk.cyan(target));
  }
  console.log(chalk.gray('  API version: ') + chalk.magenta(options.apiVersion));
  if (variant !== 'single_file') {
    console.log(chalk.gray('  Compared to: ') + chalk.cyan(options.deltaFrom));
  }
  console.log(chalk.gray('─'.repeat(CLI_CONSTANTS.DIVIDER_LENGTH)));
}

/**
 * `Account.cls:10:3` with 1-based positions, the way compilers print them
 */
export function formatLocation(diagnostic: DiagnosticRecord): string {
  return `${diagnostic.fileName}:${diagnostic.line + 1}:${diagnostic.column + 1}`;
}

/**
 * Display diagnostics grouped by file
 */
export function displayDiagnostics(diagnostics: DiagnosticMap): void {
  if (diagnostics.size === 0) return;

  console.log();
  console.log(chalk.bold.red('Deployment errors'));
  console.log(chalk.gray('─'.repeat(CLI_CONSTANTS.DIVIDER_LENGTH)));
  for (const records of diagnostics.values()) {
    for (const diagnostic of records) {
      console.log(
        chalk.white(fitToWidth(formatLocation(diagnostic), CLI_CONSTANTS.LOCATION_MAX_LENGTH)) +
          chalk.gray(' → ') +
          chalk.red(diagnostic.message)
      );
    }
  }
  console.log(chalk.gray('─'.repeat(CLI_CONSTANTS.DIVIDER_LENGTH)));
}

export function displayDiagnosticsSaved(filePath: string): void {
  console.log(chalk.gray(`Diagnostics written to ${filePath}`));
}
