import type { Command } from "commander";
import YAML from "yaml";
import {
  ScopeLockedError,
  StagingError,
  describeError,
  isNotFound,
  type ProblemReport,
  type TaskHandle,
  type TaskResult
} from "@configd/config-transactions";
import type { SettingsFlags } from "../../config/settings.js";
import { ConfigNotFoundError, InvalidCanaryConfigError } from "../../services/canary/errors.js";
import type { CliContainer, CliRuntime } from "../container.js";
import { CliError, EditRejectedError } from "../errors.js";
import type { ScopedLogger } from "../logger.js";
import { resolveOutputFormat } from "../output-format.js";

export const DEFAULT_DEPLOYMENT = "default";

export interface CommandFlags {
  deployment: string;
  verbose: boolean;
  settings: SettingsFlags;
}

export interface ExecutionResources {
  logger: ScopedLogger;
  runtime: CliRuntime;
}

export function resolveCommandFlags(command: Command): CommandFlags {
  const opts = command.optsWithGlobals<{
    deployment?: string;
    severity?: string;
    validate?: boolean;
    verbose?: boolean;
  }>();
  const settings: SettingsFlags = {};
  if (opts.severity) settings.severity = opts.severity;
  // `--no-validate` defaults `validate` to true; only an explicit opt-out overrides settings.
  if (opts.validate === false) settings.validate = false;
  return {
    deployment: opts.deployment?.trim() || DEFAULT_DEPLOYMENT,
    verbose: Boolean(opts.verbose),
    settings
  };
}

export async function createExecutionResources(
  container: CliContainer,
  flags: CommandFlags,
  scope: string
): Promise<ExecutionResources> {
  const logger = container.loggerFactory.create({ verbose: flags.verbose, scope });
  const runtime = await container.openRuntime({ flags: flags.settings, logger });
  logger.verbose(
    `Validation: ${runtime.validation.validate ? "on" : "off"}, threshold ${runtime.validation.severity} (${runtime.settings.thresholdMode})`
  );
  return { logger, runtime };
}

/**
 * Waits for a submitted task and turns its outcome into a value or a CliError.
 * Problems found along the way are printed either way. A task still running
 * at the timeout is cancelled and waited for, so its clean step always runs.
 */
export async function awaitTask<T>(
  resources: ExecutionResources,
  handle: TaskHandle<T>
): Promise<T> {
  const { logger, runtime } = resources;
  logger.verbose(`Submitted ${handle.id}: ${handle.description}`);

  const finished = await handle.await(runtime.settings.awaitTimeoutMs);
  if (finished.status !== "TIMEOUT") {
    return unwrapResult(logger, handle.description, finished.result);
  }

  const cancelled = runtime.runner.cancel(handle.id);
  logger.verbose(`Timed out; ${cancelled ? "cancelling" : "waiting for"} ${handle.id}`);
  await runtime.runner.drain();
  const settled = handle.poll();
  if (settled.status === "CANCELLED") {
    throw new CliError(
      `Timed out after ${runtime.settings.awaitTimeoutMs}ms waiting for "${handle.description}" (${handle.id}); it was cancelled.`
    );
  }
  return unwrapResult(logger, handle.description, settled.result);
}

function unwrapResult<T>(
  logger: ScopedLogger,
  description: string,
  result: TaskResult<T> | undefined
): T {
  if (!result) {
    throw new CliError(`${description} finished without a result.`);
  }
  switch (result.status) {
    case "persisted":
      reportProblems(logger, result.problems);
      return result.value;
    case "rejected":
      reportProblems(logger, result.problems);
      throw new EditRejectedError(
        `${description} was rejected: problems reached ${result.problems.worstSeverity()}.`
      );
    case "failed": {
      reportProblems(logger, result.problems);
      const cause = result.error.cause;
      throw new CliError(result.error.message, {
        isUserError: isUserFacing(cause),
        cause: result.error
      });
    }
    case "cancelled":
      throw new CliError(`${description} was cancelled.`, { isUserError: true });
    case "crashed":
      throw new CliError(`${description} crashed: ${describeError(result.error)}`, {
        cause: result.error
      });
  }
}

function isUserFacing(error: unknown): boolean {
  return (
    error instanceof ConfigNotFoundError ||
    error instanceof InvalidCanaryConfigError ||
    error instanceof ScopeLockedError ||
    (error instanceof StagingError && isNotFound(error.cause))
  );
}

export function reportProblems(logger: ScopedLogger, report: ProblemReport): void {
  for (const problem of report.problems) {
    const line = `${problem.severity} ${problem.location}: ${problem.message}`;
    const message = problem.remediation ? `${line}\n  ${problem.remediation}` : line;
    switch (problem.severity) {
      case "INFO":
        logger.info(message);
        break;
      case "WARNING":
        logger.warn(message);
        break;
      default:
        logger.error(message);
    }
  }
}

/** YAML, or JSON when OUTPUT_FORMAT=json. */
export function renderValue(container: CliContainer, value: unknown): string {
  if (resolveOutputFormat(container.env.variables) === "json") {
    return JSON.stringify(value, null, 2);
  }
  return YAML.stringify(value, { lineWidth: 0 }).trimEnd();
}
