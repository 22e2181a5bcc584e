import type { Scope } from "./types.js";

export class ScopeLockedError extends Error {
  readonly scope: Scope;

  constructor(scope: Scope) {
    super(`Configuration scope "${scope}" is being edited by another transaction`);
    this.name = "ScopeLockedError";
    this.scope = scope;
  }
}

export class StagingError extends Error {
  readonly scope: Scope;
  readonly destination: string;

  constructor(
    message: string,
    options: { scope: Scope; destination: string; cause?: unknown }
  ) {
    super(message, { cause: options.cause });
    this.name = "StagingError";
    this.scope = options.scope;
    this.destination = options.destination;
  }
}

export class PersistenceError extends Error {
  readonly scope: Scope;

  constructor(message: string, options: { scope: Scope; cause?: unknown }) {
    super(message, { cause: options.cause });
    this.name = "PersistenceError";
    this.scope = options.scope;
  }
}

export class InvalidSeverityError extends Error {
  readonly value: string;

  constructor(value: string) {
    super(`Unknown severity "${value}"`);
    this.name = "InvalidSeverityError";
    this.value = value;
  }
}

export class TaskNotFoundError extends Error {
  readonly taskId: string;

  constructor(taskId: string) {
    super(`No task with id "${taskId}"`);
    this.name = "TaskNotFoundError";
    this.taskId = taskId;
  }
}

export type TransactionStep =
  | "stage"
  | "apply"
  | "validate"
  | "revert"
  | "persist"
  | "clean";

export type RevertStatus = "not-needed" | "reverted" | "failed";

/**
 * The primary failure of a transaction, with the outcome of the revert that
 * followed it. A failed revert is attached as `revertError`.
 */
export class TransactionFailedError extends Error {
  readonly step: TransactionStep;
  readonly revert: RevertStatus;
  readonly revertError?: unknown;

  constructor(options: {
    step: TransactionStep;
    cause: unknown;
    revert: RevertStatus;
    revertError?: unknown;
  }) {
    super(describeFailure(options.step, options.cause, options.revert), {
      cause: options.cause
    });
    this.name = "TransactionFailedError";
    this.step = options.step;
    this.revert = options.revert;
    this.revertError = options.revertError;
  }
}

function describeFailure(
  step: TransactionStep,
  cause: unknown,
  revert: RevertStatus
): string {
  const reason = describeError(cause);
  if (revert === "failed" && step !== "revert") {
    return `${step} failed: ${reason} (revert also failed)`;
  }
  if (revert === "reverted") {
    return `${step} failed: ${reason} (changes reverted)`;
  }
  return `${step} failed: ${reason}`;
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
