import { TerminalUI } from '../types';

/**
 * Base class for every failure the CLI knows how to report.
 */
export class GitputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

// git is not installed or cannot be spawned
export class EnvironmentError extends GitputError {}

export class ConfigReadError extends GitputError {
  constructor(public readonly path: string, public readonly reason?: unknown) {
    super(`Credential file is unreadable or corrupt: ${path}`);
  }
}

export class CredentialError extends GitputError {}

/**
 * A GitHub API call that did not succeed.
 * `status` is undefined when no response was received.
 */
export class ApiError extends GitputError {
  constructor(message: string, public readonly status?: number) {
    super(message);
  }
}

export class AuthError extends ApiError {}

export class RepoCreateError extends ApiError {}

export class TimeoutError extends GitputError {
  constructor(public readonly timeoutMs: number) {
    super(`No response from GitHub within ${timeoutMs / 1000}s`);
  }
}

export class GitCommandError extends GitputError {
  constructor(public readonly args: string[], public readonly exitCode: number, public readonly stderr: string) {
    super(`git ${args.join(' ')} failed (exit ${exitCode})${stderr.trim() ? `: ${stderr.trim()}` : ''}`);
  }
}

/**
 * Errors that abort a single menu action without ending the session.
 */
export function isRecoverable(error: unknown): error is ApiError | TimeoutError | GitCommandError {
  return error instanceof ApiError || error instanceof TimeoutError || error instanceof GitCommandError;
}

/**
 * Render any thrown value as a single line for the terminal.
 * @param error the caught value
 */
export function describeError(error: unknown): string {
  if (error instanceof ApiError) {
    return error.status === undefined ? error.message : `${error.message} (HTTP ${error.status})`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Report an unrecoverable error and end the process with exit code 1
 */
export function exitWithError(ui: TerminalUI, error: unknown): never {
  ui.display(`❌ ${describeError(error)}`, 'error');
  process.exit(1);
}
