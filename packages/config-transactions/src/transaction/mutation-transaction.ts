import {
  TransactionFailedError,
  describeError,
  type RevertStatus,
  type TransactionStep
} from "../errors.js";
import { notifyObserver, processWarnings } from "../observers.js";
import { ProblemReport } from "../problems/problem-report.js";
import type { Severity, ThresholdMode } from "../problems/severity.js";
import type {
  MutationSteps,
  TransactionObservers,
  TransactionOptions,
  TransactionOutcome,
  TransactionState
} from "./types.js";
import type { WarningLogger } from "../types.js";

type RevertResult = { status: "reverted" } | { status: "failed"; error: unknown };

/**
 * Drives one edit through stage -> apply -> validate -> persist | revert -> clean.
 *
 * Cancellation is cooperative: a request is honoured at the next step boundary
 * until the persist/revert decision has been made, and ignored afterwards.
 * `clean` runs exactly once, whatever happened before it.
 */
export class MutationTransaction<T = void> {
  readonly label: string;
  readonly severity: Severity;
  readonly thresholdMode: ThresholdMode;
  readonly validationEnabled: boolean;

  private readonly steps: MutationSteps<T>;
  private readonly observers?: TransactionObservers;
  private readonly logger: WarningLogger;
  private readonly transitions: TransactionState[] = ["CREATED"];
  private currentState: TransactionState = "CREATED";
  private started = false;
  private decided = false;
  private cancelRequested = false;

  constructor(steps: MutationSteps<T>, options: TransactionOptions) {
    this.steps = steps;
    this.label = options.label ?? "transaction";
    this.severity = options.severity;
    this.thresholdMode = options.thresholdMode ?? "exceeds";
    this.validationEnabled = options.validate ?? true;
    this.observers = options.observers;
    this.logger = options.logger ?? processWarnings;
  }

  get state(): TransactionState {
    return this.currentState;
  }

  /** Every state entered so far, starting with CREATED. */
  get history(): readonly TransactionState[] {
    return this.transitions;
  }

  get isCancellable(): boolean {
    return !this.decided && this.currentState !== "CLEANED";
  }

  /**
   * Asks the transaction to stop before its next step. Returns false once the
   * decision point has been passed.
   */
  requestCancel(): boolean {
    if (!this.isCancellable) {
      return false;
    }
    this.cancelRequested = true;
    return true;
  }

  async run(): Promise<TransactionOutcome<T>> {
    if (this.started) {
      throw new Error(`Transaction "${this.label}" has already been run`);
    }
    this.started = true;

    try {
      return await this.execute();
    } finally {
      this.decided = true;
      await this.runClean();
      this.transition("CLEANED");
    }
  }

  private async execute(): Promise<TransactionOutcome<T>> {
    if (this.cancelRequested) {
      return this.cancel(false);
    }

    try {
      await this.steps.stage?.();
    } catch (error) {
      this.reportStepError("stage", error);
      return this.fail("stage", error, { status: "not-needed" }, ProblemReport.EMPTY);
    }
    this.transition("STAGED");

    if (this.cancelRequested) {
      return this.cancel(false);
    }

    let value: T;
    try {
      value = await this.steps.apply();
    } catch (error) {
      this.reportStepError("apply", error);
      const revert = await this.runRevert();
      return this.fail("apply", error, revert, ProblemReport.EMPTY);
    }
    this.transition("APPLIED");

    if (this.cancelRequested) {
      return this.cancelAfterApply();
    }

    let problems = ProblemReport.EMPTY;
    if (this.validationEnabled) {
      problems = await this.runValidation();
      this.transition("VALIDATED");
      if (this.cancelRequested) {
        return this.cancelAfterApply();
      }
    }

    this.decided = true;

    if (problems.exceeds(this.severity, this.thresholdMode)) {
      const revert = await this.runRevert();
      if (revert.status === "failed") {
        return this.fail("revert", revert.error, revert, problems);
      }
      this.transition("REVERTED");
      return { status: "rejected", problems };
    }

    try {
      await this.steps.persist();
    } catch (error) {
      this.reportStepError("persist", error);
      const revert = await this.runRevert();
      return this.fail("persist", error, revert, problems);
    }
    this.transition("PERSISTED");
    return { status: "persisted", value, problems };
  }

  private async runValidation(): Promise<ProblemReport> {
    if (!this.steps.validate) {
      return ProblemReport.EMPTY;
    }
    try {
      return await this.steps.validate();
    } catch (error) {
      this.reportStepError("validate", error);
      return new ProblemReport([
        {
          severity: "FATAL",
          message: `Validation could not complete: ${describeError(error)}`,
          location: this.label
        }
      ]);
    }
  }

  private async runRevert(): Promise<RevertResult> {
    try {
      await this.steps.revert();
      return { status: "reverted" };
    } catch (error) {
      this.reportStepError("revert", error);
      return { status: "failed", error };
    }
  }

  private async runClean(): Promise<void> {
    try {
      await this.steps.clean?.();
    } catch (error) {
      this.reportStepError("clean", error);
    }
  }

  private async cancelAfterApply(): Promise<TransactionOutcome<T>> {
    this.decided = true;
    const revert = await this.runRevert();
    if (revert.status === "failed") {
      return this.fail("revert", revert.error, revert, ProblemReport.EMPTY);
    }
    return this.cancel(true);
  }

  private cancel(reverted: boolean): TransactionOutcome<T> {
    this.decided = true;
    this.transition("CANCELLED");
    return { status: "cancelled", reverted };
  }

  private fail(
    step: TransactionStep,
    cause: unknown,
    revert: RevertResult | { status: "not-needed" },
    problems: ProblemReport
  ): TransactionOutcome<T> {
    this.decided = true;
    this.transition("FAILED");
    const status: RevertStatus = revert.status;
    const error = new TransactionFailedError({
      step,
      cause,
      revert: status,
      revertError: revert.status === "failed" ? revert.error : undefined
    });
    return { status: "failed", error, problems };
  }

  private transition(to: TransactionState): void {
    const from = this.currentState;
    this.currentState = to;
    this.transitions.push(to);
    notifyObserver(this.logger, "onTransition", () =>
      this.observers?.onTransition?.({ label: this.label, from, to })
    );
  }

  private reportStepError(step: TransactionStep, error: unknown): void {
    notifyObserver(this.logger, "onStepError", () =>
      this.observers?.onStepError?.({ label: this.label, step, error })
    );
  }
}
