/**
 * User-facing notifications emitted at every terminal state of a deployment
 */

import chalk from 'chalk';

export type NotificationLevel = 'info' | 'warn' | 'error';

export interface Notifier {
  notify(message: string, level: NotificationLevel): void;
}

const SYMBOLS: Record<NotificationLevel, string> = {
  info: chalk.green('✓'),
  warn: chalk.yellow('⚠'),
  error: chalk.red('✗'),
};

/**
 * Prints notifications to the terminal
 */
export const consoleNotifier: Notifier = {
  notify(message, level) {
    switch (level) {
      case 'info':
        console.log(`${SYMBOLS.info} ${chalk.green(message)}`);
        break;
      case 'warn':
        console.warn(`${SYMBOLS.warn} ${chalk.yellow(message)}`);
        break;
      case 'error':
        console.error(`${SYMBOLS.error} ${chalk.red(message)}`);
        break;
    }
  },
};

/**
 * Notifier that drops everything
 */
export const silentNotifier: Notifier = {
  notify() {},
};
