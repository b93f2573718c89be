/**
 * Progress Tracking
 * Spinner-backed progress for the deploy and test commands
 */

import chalk from 'chalk';
import ora from 'ora';
import type { ProgressBackend, ProgressSink } from '../../../core/progress/index.js';

/**
 * Renders each progress handle as an ora spinner
 */
export class SpinnerProgressBackend implements ProgressBackend {
  start(title: string): ProgressSink {
    const spinner = ora({ text: chalk.white(title), color: 'cyan' }).start();

    return {
      update(message, percentage) {
        spinner.text =
          chalk.white(title) + chalk.gray(` ${message} `) + chalk.yellow(`${percentage}%`);
      },
      stop() {
        spinner.stop();
      },
    };
  }
}

/**
 * Spinners only make sense on an interactive terminal
 */
export function createProgressBackend(enabled: boolean): ProgressBackend | undefined {
  return enabled && process.stdout.isTTY ? new SpinnerProgressBackend() : undefined;
}
