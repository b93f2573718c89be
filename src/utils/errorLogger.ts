/**
 * Error Logger - Write failed job output to files for debugging
 */

import { writeFile, mkdir } from 'fs/promises';
import { join } from 'path';
import { LOGS_DIR_NAME } from './constants.js';

/**
 * Generate timestamp for log filename
 */
function getTimestamp(date: Date): string {
  return date.toISOString().replace(/[:.]/g, '-').slice(0, -5); // 2025-11-02T19-30-45
}

export interface FailureLogContext {
  /** Which stage failed, e.g. "deploy" or "manifest" */
  operation: string;
  summary: string;
  command?: string;
  args?: readonly string[];
  exitCode?: number;
  stdout?: readonly string[];
  stderr?: readonly string[];
}

/**
 * Write a failure log under `<cachePath>/logs`
 *
 * @returns Path to the log file
 */
export async function logFailure(
  cachePath: string,
  context: FailureLogContext,
  now: Date = new Date()
): Promise<string> {
  const logsDir = join(cachePath, LOGS_DIR_NAME);
  await mkdir(logsDir, { recursive: true });
  const logFile = join(logsDir, `${context.operation}-error-${getTimestamp(now)}.log`);

  const logContent = [
    '='.repeat(70),
    `${context.operation.toUpperCase()} ERROR LOG`,
    `Timestamp: ${now.toISOString()}`,
    '='.repeat(70),
    '',
    '## Summary',
    '-'.repeat(70),
    context.summary,
    '',
  ];

  if (context.command) {
    logContent.push(
      '## Command',
      '-'.repeat(70),
      [context.command, ...(context.args ?? [])].join(' '),
      ''
    );
  }

  if (context.exitCode !== undefined) {
    logContent.push('## Exit Code', '-'.repeat(70), String(context.exitCode), '');
  }

  if (context.stdout && context.stdout.length > 0) {
    logContent.push('## Stdout', '-'.repeat(70), ...context.stdout, '');
  }

  if (context.stderr && context.stderr.length > 0) {
    logContent.push('## Stderr', '-'.repeat(70), ...context.stderr, '');
  }

  logContent.push('='.repeat(70), 'End of error log', '='.repeat(70));

  await writeFile(logFile, logContent.join('\n'), 'utf-8');

  return logFile;
}
