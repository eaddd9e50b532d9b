import type { ErrorKind, ReviewFailure } from './types.js';

/**
 * Error carrying an engine failure classification.
 * Reviewer invocations turn these into `ReviewFailure` values instead of rethrowing.
 */
export class ReviewError extends Error {
  constructor(
    readonly kind: ErrorKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'ReviewError';
  }

  toFailure(): ReviewFailure {
    return { kind: this.kind, message: this.message };
  }
}

/** Invalid configuration; fatal at bootstrap */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** Invalid review input; fatal at bootstrap */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

/** A project index operation refused or failed; reported to the model as a tool result */
export class ProjectIndexError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ProjectIndexError';
  }
}

/** Message of any thrown value, falling back to its class name when empty */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) {
    const msg = err.message.trim();
    return msg === '' ? err.name : msg;
  }
  return String(err);
}
