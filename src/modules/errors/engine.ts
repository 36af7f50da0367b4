/**
 * Run engine error taxonomy
 */

import type { RunFailureKind } from '../models/run';

/**
 * A collaborator (model, retriever, sandbox, action endpoint) failed in a way
 * that may succeed on retry.
 */
export class TransientCollaboratorError extends Error {
  readonly collaborator: string;
  readonly rateLimited: boolean;

  constructor(collaborator: string, message: string, options: { rateLimited?: boolean; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'TransientCollaboratorError';
    this.collaborator = collaborator;
    this.rateLimited = options.rateLimited ?? false;
  }
}

/**
 * Caller input that does not match the current run state
 */
export class RunValidationError extends Error {
  readonly details?: unknown;

  constructor(message: string, details?: unknown) {
    super(message);
    this.name = 'RunValidationError';
    this.details = details;
  }
}

/**
 * Sandboxed code exited non-zero or timed out. Fed back to the model.
 */
export class SandboxExecutionError extends Error {
  readonly stdout: string;
  readonly stderr: string;
  readonly files: Array<{ name: string; bytes: number }>;
  readonly exitCode: number | null;
  readonly timedOut: boolean;

  constructor(
    message: string,
    options: {
      stdout?: string;
      stderr?: string;
      files?: Array<{ name: string; bytes: number }>;
      exitCode?: number | null;
      timedOut?: boolean;
    } = {}
  ) {
    super(message);
    this.name = 'SandboxExecutionError';
    this.stdout = options.stdout ?? '';
    this.stderr = options.stderr ?? '';
    this.files = options.files ?? [];
    this.exitCode = options.exitCode ?? null;
    this.timedOut = options.timedOut ?? false;
  }
}

export class DeadlineExceededError extends Error {
  readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = 'DeadlineExceededError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * A run status change outside the allowed transition table
 */
export class InvalidTransitionError extends Error {
  readonly from: string;
  readonly to: string;

  constructor(from: string, to: string, reason: string) {
    super(reason);
    this.name = 'InvalidTransitionError';
    this.from = from;
    this.to = to;
  }
}

/**
 * The entity store could not complete a read or write
 */
export class PersistenceError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'PersistenceError';
  }
}

/**
 * A run row changed between read and write
 */
export class VersionConflictError extends PersistenceError {
  readonly runId: string;
  readonly expectedVersion: number;

  constructor(runId: string, expectedVersion: number) {
    super(`Run ${runId} was modified concurrently (expected version ${expectedVersion})`);
    this.name = 'VersionConflictError';
    this.runId = runId;
    this.expectedVersion = expectedVersion;
  }
}

/**
 * The queue lease on a run was lost to another worker or expired
 */
export class LeaseLostError extends Error {
  readonly runId: string;

  constructor(runId: string) {
    super(`Lease on run ${runId} was lost`);
    this.name = 'LeaseLostError';
    this.runId = runId;
  }
}

/**
 * Terminates a run as failed with the given last_error code
 */
export class RunFailure extends Error {
  readonly kind: RunFailureKind;

  constructor(kind: RunFailureKind, message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'RunFailure';
    this.kind = kind;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
