/**
 * Console error types
 *
 * Every failure a command handler can hit is raised as a ShellCommandError;
 * the dispatcher prints it behind the "% " prefix and keeps the session going.
 */

export const ERROR_PREFIX = '% ';

export class ShellCommandError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ShellCommandError';
  }
}

/** Raised when a configuration tree is built against its structural rules. */
export class ConfigTreeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigTreeError';
  }
}

/** Raised when the pager process cannot be spawned or fed. */
export class PagerError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PagerError';
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

export function formatUserError(message: string): string {
  return `${ERROR_PREFIX}${message}`;
}
