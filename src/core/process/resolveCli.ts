import which from 'which';

/**
 * Resolves an executable to its absolute path, or null when it is not on PATH.
 * Synchronous so the orchestrator can check it in the same call frame as the
 * single-flight guard.
 */
export type CliResolver = (command: string) => string | null;

export const resolveCli: CliResolver = (command) => which.sync(command, { nothrow: true });
