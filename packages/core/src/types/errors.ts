/**
 * Error taxonomy for orchestration operations.
 *
 * Adapters never retry and never aggregate partial failures: the first
 * backend failure is raised to the caller as one of these classes. Callers
 * can branch on `code` without importing every subclass.
 */

export type OrchestrationErrorCode =
  | 'BACKEND_INVOCATION'
  | 'TIMEOUT'
  | 'PARSE'
  | 'VALIDATION';

/**
 * Base class for every error raised by this package.
 */
export class OrchestrationError extends Error {
  constructor(
    message: string,
    public readonly code: OrchestrationErrorCode,
  ) {
    super(message);
    this.name = 'OrchestrationError';
  }
}

/**
 * Where a backend failure was observed: a process exit code for the CLI
 * backend, an HTTP status for the API backend.
 */
export interface InvocationDetails {
  exitCode?: number;
  statusCode?: number;
}

/**
 * The backend answered with a non-zero exit code or an unexpected HTTP status.
 * `diagnostic` is the backend's raw stderr / response body.
 */
export class BackendInvocationError extends OrchestrationError {
  readonly operation: string;
  readonly diagnostic: string;
  readonly exitCode?: number;
  readonly statusCode?: number;

  constructor(operation: string, diagnostic: string, details: InvocationDetails = {}) {
    const text = diagnostic.trim();
    super(`Docker error (${operation}): ${text || 'no diagnostic output'}`, 'BACKEND_INVOCATION');
    this.name = 'BackendInvocationError';
    this.operation = operation;
    this.diagnostic = text;
    this.exitCode = details.exitCode;
    this.statusCode = details.statusCode;
  }
}

/**
 * A command did not finish within its timeout.
 */
export class TimeoutError extends OrchestrationError {
  constructor(
    readonly operation: string,
    readonly timeoutSeconds: number,
  ) {
    super(`Command timed out after ${timeoutSeconds}s (${operation})`, 'TIMEOUT');
    this.name = 'TimeoutError';
  }
}

/**
 * Backend output could not be decoded into the expected shape.
 */
export class ParseError extends OrchestrationError {
  constructor(
    message: string,
    readonly input: string,
  ) {
    super(message, 'PARSE');
    this.name = 'ParseError';
  }
}

/**
 * A configuration value or run specification was rejected before any
 * backend call was made.
 */
export class ValidationError extends OrchestrationError {
  constructor(
    message: string,
    readonly field: string,
  ) {
    super(message, 'VALIDATION');
    this.name = 'ValidationError';
  }
}

/**
 * Render an unknown thrown value as a message.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
