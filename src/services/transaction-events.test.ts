import { describe, it, expect, vi } from "vitest";
import { MutationTransaction } from "@configd/config-transactions";
import { ErrorLogger } from "../cli/error-logger.js";
import { createLoggerFactory } from "../cli/logger.js";
import { createTaskReporter, createTransactionReporter } from "./transaction-events.js";

function createLogs(verbose: boolean) {
  const logs: string[] = [];
  const logger = createLoggerFactory((message) => logs.push(message)).create({ verbose });
  return { logs, logger };
}

describe("createTransactionReporter", () => {
  it("logs each transition when verbose", async () => {
    const { logs, logger } = createLogs(true);
    const transaction = new MutationTransaction(
      { apply: () => undefined, revert: () => undefined, persist: () => undefined },
      { label: "Edit canary settings", severity: "WARNING", observers: createTransactionReporter(logger) }
    );

    await transaction.run();

    expect(logs).toEqual([
      "Edit canary settings: CREATED -> STAGED",
      "Edit canary settings: STAGED -> APPLIED",
      "Edit canary settings: APPLIED -> VALIDATED",
      "Edit canary settings: VALIDATED -> PERSISTED",
      "Edit canary settings: PERSISTED -> CLEANED"
    ]);
  });

  it("reports step errors even when not verbose", () => {
    const { logs, logger } = createLogs(false);
    const reporter = createTransactionReporter(logger);

    reporter.onTransition?.({ label: "Edit", from: "CREATED", to: "STAGED" });
    reporter.onStepError?.({ label: "Edit", step: "clean", error: new Error("EBUSY") });

    expect(logs).toEqual(["Edit: clean failed: EBUSY"]);
  });

  it("writes step failures to the error log with the original error as cause", () => {
    const logs: string[] = [];
    const factory = createLoggerFactory((message) => logs.push(message));
    const errorLogger = new ErrorLogger({
      fs: { mkdirSync: () => undefined, appendFileSync: () => undefined },
      logDir: "/logs"
    });
    const logError = vi.spyOn(errorLogger, "logError");
    factory.setErrorLogger(errorLogger);
    const reporter = createTransactionReporter(factory.create({ scope: "canary" }));
    const cause = new Error("ENOSPC: no space left on device");

    reporter.onStepError?.({ label: "Edit canary settings", step: "persist", error: cause });

    expect(logs).toEqual(["Edit canary settings: persist failed: ENOSPC: no space left on device"]);
    expect(logError).toHaveBeenCalledTimes(1);
    const [logged, context] = logError.mock.calls[0];
    expect(logged.message).toBe("Edit canary settings: persist failed: ENOSPC: no space left on device");
    expect(logged.cause).toBe(cause);
    expect(context).toEqual({
      operation: "Edit canary settings",
      step: "persist",
      scope: "canary",
      component: "canary"
    });
  });
});

describe("createTaskReporter", () => {
  it("logs task start and completion when verbose", () => {
    const { logs, logger } = createLogs(true);
    const reporter = createTaskReporter(logger);
    const task = {
      id: "task-1",
      description: "Edit canary settings",
      scope: "prod",
      status: "SUCCEEDED" as const,
      transactionState: "CLEANED" as const,
      createdAt: new Date(0)
    };

    reporter.onTaskStart?.({ ...task, status: "RUNNING", transactionState: "CREATED" });
    reporter.onTaskComplete?.(task);

    expect(logs).toEqual([
      "Started task-1: Edit canary settings",
      "Finished task-1 (SUCCEEDED): Edit canary settings"
    ]);
  });
});
