/**
 * Custom Error Classes for Autodidact
 */

/**
 * Base class so callers can tell our failures from arbitrary throws
 */
export class AutodidactError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'AutodidactError';

    // Maintains proper stack trace for where error was thrown (only in V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/**
 * A collaborator call exceeded its per-call timeout
 */
export class CollaboratorTimeoutError extends AutodidactError {
  public readonly collaborator: string;
  public readonly timeoutMs: number;

  constructor(collaborator: string, timeoutMs: number) {
    super(`${collaborator} did not respond within ${timeoutMs}ms`);
    this.name = 'CollaboratorTimeoutError';
    this.collaborator = collaborator;
    this.timeoutMs = timeoutMs;
  }
}

/**
 * A collaborator could not serve the request (network, HTTP status, quota)
 */
export class CollaboratorUnavailableError extends AutodidactError {
  public readonly collaborator: string;
  public readonly cause?: unknown;

  constructor(collaborator: string, reason: string, cause?: unknown) {
    super(`${collaborator} unavailable: ${reason}`);
    this.name = 'CollaboratorUnavailableError';
    this.collaborator = collaborator;
    this.cause = cause;
  }
}

/**
 * Video/vision output could not be decoded into the expected shape
 */
export class DecodeError extends AutodidactError {
  public readonly mediaRef: string;

  constructor(mediaRef: string, reason: string) {
    super(`Could not decode ${mediaRef}: ${reason}`);
    this.name = 'DecodeError';
    this.mediaRef = mediaRef;
  }
}

/**
 * A store write failed; the surrounding transaction was rolled back
 */
export class PersistenceError extends AutodidactError {
  public readonly operation: string;
  public readonly cause?: unknown;

  constructor(operation: string, cause?: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Persistence failure during ${operation}: ${detail}`);
    this.name = 'PersistenceError';
    this.operation = operation;
    this.cause = cause;
  }
}

/**
 * Internal logic defect: a data model guarantee was about to be broken
 */
export class InvariantViolationError extends AutodidactError {
  public readonly invariant: string;

  constructor(invariant: string, detail: string) {
    super(`Invariant "${invariant}" violated: ${detail}`);
    this.name = 'InvariantViolationError';
    this.invariant = invariant;
  }
}

export class ConfigurationError extends AutodidactError {
  public readonly problems: string[];

  constructor(problems: string[]) {
    super(`Invalid configuration:\n  - ${problems.join('\n  - ')}`);
    this.name = 'ConfigurationError';
    this.problems = problems;
  }
}

/**
 * Collaborator failures are recoverable at a phase boundary; everything else is not
 */
export function isCollaboratorError(
  error: unknown
): error is CollaboratorTimeoutError | CollaboratorUnavailableError | DecodeError {
  return (
    error instanceof CollaboratorTimeoutError ||
    error instanceof CollaboratorUnavailableError ||
    error instanceof DecodeError
  );
}
