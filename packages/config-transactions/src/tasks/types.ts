import type { TransactionOutcome, TransactionState } from "../transaction/types.js";
import type { Scope, WarningLogger } from "../types.js";

export type TaskStatus = "PENDING" | "RUNNING" | "SUCCEEDED" | "FAILED" | "CANCELLED";

/**
 * What a finished task produced. `crashed` covers errors thrown by the runner
 * machinery itself rather than by a transaction step.
 */
export type TaskResult<T = unknown> =
  | TransactionOutcome<T>
  | { status: "crashed"; error: unknown };

export interface TaskSnapshot<T = unknown> {
  readonly id: string;
  readonly description: string;
  readonly scope: Scope;
  readonly status: TaskStatus;
  readonly transactionState: TransactionState;
  readonly result?: TaskResult<T>;
  readonly createdAt: Date;
  readonly startedAt?: Date;
  readonly completedAt?: Date;
}

export interface TaskTimeout<T = unknown> {
  readonly status: "TIMEOUT";
  /** The task as it stood when the wait gave up; it keeps running. */
  readonly task: TaskSnapshot<T>;
}

export interface TaskHandle<T = unknown> {
  readonly id: string;
  readonly description: string;
  readonly scope: Scope;
  poll(): TaskSnapshot<T>;
  await(timeoutMs: number): Promise<TaskSnapshot<T> | TaskTimeout<T>>;
  cancel(): boolean;
}

export interface TaskRunnerObservers {
  onTaskStart?(task: TaskSnapshot): void;
  onTaskComplete?(task: TaskSnapshot): void;
}

export interface TaskRunnerOptions {
  /** Transactions running at once across all scopes (default 4) */
  concurrency?: number;
  /** How long finished tasks stay retrievable, in ms (default 10 minutes) */
  retentionMs?: number;
  /** Upper bound on retained finished tasks (default 1000) */
  maxRetained?: number;
  observers?: TaskRunnerObservers;
  /** Receives failures of the observers themselves; defaults to process warnings */
  logger?: WarningLogger;
  createId?: () => string;
  now?: () => Date;
}

export function isTerminalStatus(status: TaskStatus): boolean {
  return status === "SUCCEEDED" || status === "FAILED" || status === "CANCELLED";
}
