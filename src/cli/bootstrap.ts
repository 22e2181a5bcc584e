import * as nodeFs from "node:fs/promises";
import * as nodeFsSync from "node:fs";
import { realpathSync } from "node:fs";
import { homedir } from "node:os";
import { pathToFileURL } from "node:url";
import { log } from "@clack/prompts";
import chalk from "chalk";
import { CommanderError, type Command } from "commander";
import type { FileSystem } from "@configd/config-transactions";
import { resolveConfigHome, resolveLogDir } from "./environment.js";
import { ErrorLogger } from "./error-logger.js";
import { CliError, SilentError } from "./errors.js";
import type { CliDependencies } from "./program.js";

const fsAdapter = nodeFs as unknown as FileSystem;

export function createCliMain(
  programFactory: (dependencies: CliDependencies) => Command
): () => Promise<void> {
  return async function runCli(): Promise<void> {
    const homeDir = homedir();
    const logDir = resolveLogDir(resolveConfigHome(homeDir, process.env));

    const shouldLogToStderr =
      process.env.CONFIGD_STDERR_LOGS === "1" || process.env.CONFIGD_STDERR_LOGS === "true";

    const errorLogger = new ErrorLogger({
      fs: nodeFsSync,
      logDir,
      logToStderr: shouldLogToStderr
    });

    const program = programFactory({
      fs: fsAdapter,
      env: {
        cwd: process.cwd(),
        homeDir,
        variables: process.env
      },
      errorLogger,
      exitOverride: true
    });

    try {
      await program.parseAsync(process.argv);
    } catch (error) {
      if (error instanceof SilentError) {
        process.exitCode = 1;
        return;
      }
      if (error instanceof CommanderError && error.exitCode === 0) {
        return;
      }
      if (error instanceof Error) {
        errorLogger.logErrorWithStackTrace(error, "CLI execution", {
          component: "main",
          argv: process.argv
        });

        if (error instanceof CliError && error.isUserError) {
          log.error(error.message);
        } else {
          log.error(`Error: ${error.message}`);
          log.message(`See logs at ${errorLogger.logFile} for more details.`, {
            symbol: chalk.magenta("●")
          });
        }

        process.exit(1);
      }
      throw error;
    }
  };
}

export function isCliInvocation(
  argv: string[],
  moduleUrl: string,
  realpath: (path: string) => string = realpathSync
): boolean {
  const entry = argv.at(1);
  if (typeof entry !== "string") {
    return false;
  }

  const candidates = [pathToFileURL(entry).href];

  try {
    candidates.push(pathToFileURL(realpath(entry)).href);
  } catch {
    // Unresolvable entries are compared as given.
  }

  return candidates.includes(moduleUrl);
}
