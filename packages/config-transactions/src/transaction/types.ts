import type { TransactionFailedError, TransactionStep } from "../errors.js";
import type { ProblemReport } from "../problems/problem-report.js";
import type { Severity, ThresholdMode } from "../problems/severity.js";
import type { WarningLogger } from "../types.js";

export type TransactionState =
  | "CREATED"
  | "STAGED"
  | "APPLIED"
  | "VALIDATED"
  | "PERSISTED"
  | "REVERTED"
  | "FAILED"
  | "CANCELLED"
  | "CLEANED";

export type Step<R = void> = () => R | Promise<R>;

/**
 * The lifecycle operations of one edit. `stage` and `clean` default to no-ops,
 * `validate` to an empty report. `revert` must undo whatever `apply` changed.
 */
export interface MutationSteps<T = void> {
  stage?: Step;
  apply: Step<T>;
  validate?: Step<ProblemReport>;
  revert: Step;
  persist: Step;
  clean?: Step;
}

export interface TransactionOptions {
  /** Human-readable label for logging */
  label?: string;
  /** Reports worse than this block persistence */
  severity: Severity;
  /** When false, validation is skipped and the report is treated as empty */
  validate?: boolean;
  thresholdMode?: ThresholdMode;
  observers?: TransactionObservers;
  /** Receives failures of the observers themselves; defaults to process warnings */
  logger?: WarningLogger;
}

export interface TransitionEvent {
  label: string;
  from: TransactionState;
  to: TransactionState;
}

export interface StepErrorEvent {
  label: string;
  step: TransactionStep;
  error: unknown;
}

export interface TransactionObservers {
  onTransition?(event: TransitionEvent): void;
  onStepError?(event: StepErrorEvent): void;
}

export type TransactionOutcome<T = void> =
  | { status: "persisted"; value: T; problems: ProblemReport }
  | { status: "rejected"; problems: ProblemReport }
  | { status: "failed"; error: TransactionFailedError; problems: ProblemReport }
  | { status: "cancelled"; reverted: boolean };
