/**
 * Logger Utility
 * Level-prefixed console logging with a global debug flag.
 * Debug output goes to stderr so JSON or piped stdout stays clean.
 */

import chalk from 'chalk';

let debugMode = false;

/**
 * Set the global debug mode
 */
export function setDebugMode(enabled: boolean): void {
  debugMode = enabled;
}

/**
 * Log a debug message (only shown when debug mode is enabled)
 */
export function debug(...args: unknown[]): void {
  if (debugMode) {
    console.error(chalk.gray('[debug]'), ...args);
  }
}

export function info(...args: unknown[]): void {
  console.log(...args);
}

export function warn(...args: unknown[]): void {
  console.warn(chalk.yellow('[warn]'), ...args);
}

export function error(...args: unknown[]): void {
  console.error(chalk.red('[error]'), ...args);
}

export interface Logger {
  debug: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
}

/**
 * Create a scoped logger with a prefix
 */
export function createLogger(prefix: string): Logger {
  const tag = chalk.cyan(`[${prefix}]`);
  return {
    debug: (...args: unknown[]) => debug(tag, ...args),
    info: (...args: unknown[]) => info(tag, ...args),
    warn: (...args: unknown[]) => warn(tag, ...args),
    error: (...args: unknown[]) => error(tag, ...args),
  };
}
