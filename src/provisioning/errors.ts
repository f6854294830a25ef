import { OperationStatus } from '../types/index.js';

export type StackSetErrorKind =
  | 'transient-read'
  | 'write-conflict'
  | 'resource-not-found'
  | 'operation-not-found'
  | 'operation-failed'
  | 'wait-timeout'
  | 'rejected-request';

/**
 * Base class for every failure that crosses the StackSet gateway boundary.
 * Callers branch on `kind`, never on the message text.
 */
export abstract class StackSetError extends Error {
  abstract readonly kind: StackSetErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class TransientReadError extends StackSetError {
  readonly kind = 'transient-read';
}

export class WriteConflictError extends StackSetError {
  readonly kind = 'write-conflict';
}

export class ResourceNotFoundError extends StackSetError {
  readonly kind = 'resource-not-found';
}

export class OperationNotFoundError extends StackSetError {
  readonly kind = 'operation-not-found';
}

export class RejectedRequestError extends StackSetError {
  readonly kind = 'rejected-request';
}

export class OperationFailedError extends StackSetError {
  readonly kind = 'operation-failed';

  constructor(
    readonly operationId: string,
    readonly status: OperationStatus,
    reason?: string,
  ) {
    super(`Operation ${operationId} ended with status ${status}${reason ? `: ${reason}` : ''}`);
  }
}

export class WaitTimeoutError extends StackSetError {
  readonly kind = 'wait-timeout';

  constructor(
    readonly operationId: string,
    readonly lastStatus: OperationStatus,
    attempts: number,
  ) {
    super(`Operation ${operationId} still ${lastStatus} after ${attempts} status checks`);
  }
}

/** Raised for an invalid catalog, settings block or CLI input */
export class ConfigError extends Error {
  constructor(message: string, readonly details: string[] = []) {
    super(details.length > 0 ? `${message}:\n${details.join('\n')}` : message);
    this.name = 'ConfigError';
  }
}

const WRITE_CONFLICT_CODES = new Set([
  'OperationInProgressException',
  'ConcurrentModificationException',
  'StaleRequestException',
]);

const NOT_FOUND_CODES = new Set(['StackSetNotFoundException']);

/**
 * Extract the SDK exception name from an error object
 */
export function extractErrorName(err: unknown): string | undefined {
  if (!err || typeof err !== 'object' || !('name' in err)) return undefined;
  return typeof err.name === 'string' ? err.name : undefined;
}

export function formatErrorMessage(err: unknown): string {
  if (err instanceof Error) {
    return err.message || err.name || 'Error';
  }
  if (typeof err === 'string') return err;
  try {
    return JSON.stringify(err);
  } catch {
    return Object.prototype.toString.call(err);
  }
}

/**
 * Classify a failed read call. Anything that is not a missing StackSet or a
 * missing operation is assumed to clear up on a later read.
 */
export function classifyReadError(err: unknown, context: string): StackSetError {
  if (err instanceof StackSetError) return err;
  const name = extractErrorName(err);
  const message = `${context}: ${formatErrorMessage(err)}`;

  if (name && NOT_FOUND_CODES.has(name)) {
    return new ResourceNotFoundError(message, { cause: err });
  }
  if (name === 'OperationNotFoundException') {
    return new OperationNotFoundError(message, { cause: err });
  }
  return new TransientReadError(message, { cause: err });
}

/**
 * Classify a failed mutating call.
 */
export function classifyWriteError(err: unknown, context: string): StackSetError {
  if (err instanceof StackSetError) return err;
  const name = extractErrorName(err);
  const message = `${context}: ${formatErrorMessage(err)}`;

  if (name && WRITE_CONFLICT_CODES.has(name)) {
    return new WriteConflictError(message, { cause: err });
  }
  if (name && NOT_FOUND_CODES.has(name)) {
    return new ResourceNotFoundError(message, { cause: err });
  }
  return new RejectedRequestError(message, { cause: err });
}
