/**
 * Process Invocation Wrapper
 *
 * Spawns one external command and collects its output as line arrays.
 * Only Windows batch wrappers (sf.cmd) go through a shell. There is no
 * timeout: a process that never exits keeps its job pending.
 */

import { spawn } from 'child_process';
import type { ChildProcessByStdio } from 'child_process';
import type { Readable } from 'stream';
import { createLogger } from '../../utils/logger.js';
import { formatError } from '../../utils/errors.js';
import { SPAWN_FAILURE_EXIT_CODE } from '../../utils/constants.js';
import type { JobResult, JobSpec, JobState } from './process.types.js';

const log = createLogger('job');

/**
 * Split captured output into lines, dropping the trailing newline
 */
export function splitLines(text: string): string[] {
  if (text === '') {
    return [];
  }
  const lines = text.split(/\r?\n/);
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

export interface SpawnInvocation {
  command: string;
  args: string[];
  shell: boolean;
}

const BATCH_FILE = /\.(cmd|bat)$/i;

function quoteForCmd(value: string): string {
  return `"${value.replace(/"/g, '""')}"`;
}

/**
 * Windows refuses to spawn .cmd/.bat files directly (EINVAL), so those run
 * through cmd.exe with every token quoted
 */
export function spawnInvocation(
  command: string,
  args: readonly string[],
  platform: NodeJS.Platform = process.platform
): SpawnInvocation {
  if (platform === 'win32' && BATCH_FILE.test(command)) {
    return { command: quoteForCmd(command), args: args.map(quoteForCmd), shell: true };
  }
  return { command, args: [...args], shell: false };
}

export class Job {
  private state: JobState = 'not_started';
  private stdoutText = '';
  private stderrText = '';
  private exitCode: number | null = null;

  constructor(readonly spec: JobSpec) {}

  getState(): JobState {
    return this.state;
  }

  getExitCode(): number | null {
    return this.exitCode;
  }

  stdout(): string[] {
    return splitLines(this.stdoutText);
  }

  stderr(): string[] {
    return splitLines(this.stderrText);
  }

  /**
   * Spawn the process. The returned promise settles exactly once.
   */
  start(): Promise<JobResult> {
    if (this.state !== 'not_started') {
      throw new Error(`Job "${this.spec.name}" has already been started`);
    }
    this.state = 'running';

    const { command, args, cwd, name } = this.spec;
    log.debug(`starting ${name}:`, command, args.join(' '));

    return new Promise<JobResult>((resolve) => {
      let settled = false;
      const settle = (exitCode: number) => {
        if (settled) return;
        settled = true;
        this.state = 'exited';
        this.exitCode = exitCode;
        log.debug(`${name} exited with code ${exitCode}`);
        resolve({ stdout: this.stdout(), stderr: this.stderr(), exitCode });
      };

      const invocation = spawnInvocation(command, args);
      let child: ChildProcessByStdio<null, Readable, Readable>;
      try {
        child = spawn(invocation.command, invocation.args, {
          cwd,
          shell: invocation.shell,
          stdio: ['ignore', 'pipe', 'pipe'],
        });
      } catch (error) {
        // argument validation throws before any process exists
        this.stderrText += formatError(error);
        settle(SPAWN_FAILURE_EXIT_CODE);
        return;
      }

      child.stdout.setEncoding('utf-8');
      child.stderr.setEncoding('utf-8');
      child.stdout.on('data', (chunk: string) => {
        this.stdoutText += chunk;
      });
      child.stderr.on('data', (chunk: string) => {
        this.stderrText += chunk;
      });

      child.on('error', (error) => {
        // spawn failures (ENOENT, EACCES) surface as a failed exit
        this.stderrText += formatError(error);
        settle(SPAWN_FAILURE_EXIT_CODE);
      });

      child.on('close', (code, signal) => {
        if (code === null) {
          log.debug(`${name} terminated by signal ${signal ?? 'unknown'}`);
        }
        settle(code ?? SPAWN_FAILURE_EXIT_CODE);
      });
    });
  }
}

/**
 * Default job runner backed by real child processes
 */
export function runJob(spec: JobSpec): Promise<JobResult> {
  return new Job(spec).start();
}
