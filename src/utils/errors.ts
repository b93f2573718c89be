/**
 * Shared error handling utilities
 */

/**
 * Formats error message from unknown error type
 */
export function formatError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Wraps error with additional context
 */
export function wrapError(context: string, error: unknown): Error {
  const message = formatError(error);
  return new Error(`${context}: ${message}`);
}

/**
 * Base class for every error raised by the deployment layer
 */
export class DeploymentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * A deployment was rejected before anything ran: no process spawned,
 * no diagnostics cleared.
 */
export class DeploymentValidationError extends DeploymentError {}

/**
 * The external CLI could not be resolved on PATH
 */
export class CliNotFoundError extends DeploymentValidationError {
  constructor(
    public readonly cliPath: string,
    message: string
  ) {
    super(message);
  }
}

export function isValidationError(error: unknown): error is DeploymentValidationError {
  return error instanceof DeploymentValidationError;
}
