import {
  describeError,
  type TaskRunnerObservers,
  type TransactionObservers
} from "@configd/config-transactions";
import type { ScopedLogger } from "../cli/logger.js";

/**
 * Transitions are verbose-only. Step failures are always shown and go to the
 * error log with the failing error as their cause.
 */
export function createTransactionReporter(logger: ScopedLogger): TransactionObservers {
  return {
    onTransition({ label, from, to }) {
      logger.verbose(`${label}: ${from} -> ${to}`);
    },
    onStepError({ label, step, error }) {
      logger.errorWithStack(
        new Error(`${label}: ${step} failed: ${describeError(error)}`, { cause: error }),
        { operation: label, step }
      );
    }
  };
}

export function createTaskReporter(logger: ScopedLogger): TaskRunnerObservers {
  return {
    onTaskStart(task) {
      logger.verbose(`Started ${task.id}: ${task.description}`);
    },
    onTaskComplete(task) {
      logger.verbose(`Finished ${task.id} (${task.status}): ${task.description}`);
    }
  };
}
