import path from "node:path";
import {
  ConfigStore,
  StagingArea,
  TaskRunner,
  createFileDocumentBackend,
  type FileSystem,
  type LockFn,
  type ValidationSettings
} from "@configd/config-transactions";
import { loadSettings } from "../config/loader.js";
import {
  resolveRuntimeSettings,
  toValidationSettings,
  type RuntimeSettings,
  type SettingsFlags
} from "../config/settings.js";
import { createCanaryTasks, type CanaryTasks } from "../services/canary/canary-tasks.js";
import { createTaskReporter, createTransactionReporter } from "../services/transaction-events.js";
import { createCliEnvironment, type CliEnvironment, type CliEnvironmentInit } from "./environment.js";
import type { ErrorLogger } from "./error-logger.js";
import { ValidationError } from "./errors.js";
import { createLoggerFactory, type LoggerFactory, type LoggerFn, type ScopedLogger } from "./logger.js";

export interface CliDependencies {
  fs: FileSystem;
  env: CliEnvironmentInit;
  /** Receives every message as plain text instead of rendering it */
  logger?: LoggerFn;
  /** Lock used around document writes; defaults to proper-lockfile */
  lock?: LockFn;
  /** Receives step failures with their stacks */
  errorLogger?: ErrorLogger;
  exitOverride?: boolean;
  suppressCommanderOutput?: boolean;
}

export interface CliContainer {
  env: CliEnvironment;
  fs: FileSystem;
  loggerFactory: LoggerFactory;
  openRuntime(input: { flags: SettingsFlags; logger: ScopedLogger }): Promise<CliRuntime>;
}

/** What one command invocation works with once settings are resolved. */
export interface CliRuntime {
  settings: RuntimeSettings;
  validation: ValidationSettings;
  runner: TaskRunner;
  canary: CanaryTasks;
}

export function createCliContainer(dependencies: CliDependencies): CliContainer {
  const env = createCliEnvironment(dependencies.env);
  const fs = dependencies.fs;
  const loggerFactory = createLoggerFactory(dependencies.logger);
  if (dependencies.errorLogger) {
    loggerFactory.setErrorLogger(dependencies.errorLogger);
  }

  const readSettings = async (flags: SettingsFlags): Promise<RuntimeSettings> => {
    try {
      const file = await loadSettings(env.configHome, { fs });
      return resolveRuntimeSettings({
        configHome: env.configHome,
        file,
        variables: env.variables,
        flags
      });
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      throw new ValidationError(detail, { cause: error });
    }
  };

  return {
    env,
    fs,
    loggerFactory,
    async openRuntime({ flags, logger }) {
      const settings = await readSettings(flags);
      const store = new ConfigStore(
        createFileDocumentBackend({ rootDir: settings.configDir, fs, lock: dependencies.lock })
      );
      const staging = new StagingArea({ fs, rootDir: settings.stagingDir, logger });
      const runner = new TaskRunner({
        concurrency: settings.concurrency,
        retentionMs: settings.retentionMs,
        observers: createTaskReporter(logger),
        logger
      });
      const canary = createCanaryTasks({
        store,
        staging,
        runner,
        fs,
        publishDir: (deployment) => path.join(settings.configDir, deployment),
        observers: createTransactionReporter(logger),
        logger
      });
      return {
        settings,
        validation: toValidationSettings(settings),
        runner,
        canary
      };
    }
  };
}
