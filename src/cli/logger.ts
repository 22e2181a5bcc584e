import { intro as clackIntro, log } from "@clack/prompts";
import chalk from "chalk";
import type { ErrorContext, ErrorLogger } from "./error-logger.js";
import { resolveOutputFormat } from "./output-format.js";

export type LoggerFn = (message: string) => void;

export interface LoggerContext {
  verbose?: boolean;
  scope?: string;
}

export interface ScopedLogger {
  readonly context: Required<Pick<LoggerContext, "verbose">> & Pick<LoggerContext, "scope">;
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  errorWithStack(error: Error, context?: ErrorContext): void;
  verbose(message: string): void;
  intro(title: string): void;
}

export interface LoggerFactory {
  create(context?: LoggerContext): ScopedLogger;
  setErrorLogger(errorLogger: ErrorLogger): void;
}

/**
 * With an `emitter`, every message is passed to it as plain text. Otherwise
 * messages are rendered with clack, or written as plain lines when
 * OUTPUT_FORMAT is not `terminal`.
 */
export function createLoggerFactory(emitter?: LoggerFn): LoggerFactory {
  let errorLogger: ErrorLogger | undefined;

  const infoSymbol = chalk.magenta("●");
  const successSymbol = chalk.magenta("◆");

  const emit = (
    level: "info" | "success" | "warn" | "error" | "verbose",
    message: string
  ): void => {
    if (emitter) {
      emitter(message);
      return;
    }
    if (resolveOutputFormat() !== "terminal") {
      process.stdout.write(message + "\n");
      return;
    }
    switch (level) {
      case "success":
        log.message(message, { symbol: successSymbol });
        return;
      case "warn":
        log.warn(message);
        return;
      case "error":
        log.error(message);
        return;
      case "verbose":
        log.message(message, { symbol: chalk.gray("│") });
        return;
      case "info":
        log.message(message, { symbol: infoSymbol });
    }
  };

  const create = (context: LoggerContext = {}): ScopedLogger => {
    const verbose = context.verbose ?? false;
    const scope = context.scope;
    const formatMessage = (message: string): string =>
      scope && verbose ? `[${scope}] ${message}` : message;

    return {
      context: { verbose, scope },
      info(message) {
        emit("info", formatMessage(message));
      },
      success(message) {
        emit("success", message);
      },
      warn(message) {
        emit("warn", formatMessage(message));
      },
      error(message) {
        emit("error", formatMessage(message));
      },
      errorWithStack(error, errorContext) {
        emit("error", formatMessage(error.message));
        errorLogger?.logError(error, { ...errorContext, scope, component: scope });
      },
      verbose(message) {
        if (verbose) {
          emit("verbose", formatMessage(message));
        }
      },
      intro(title) {
        if (emitter) {
          emitter(title);
          return;
        }
        if (resolveOutputFormat() !== "terminal") {
          return;
        }
        clackIntro(chalk.bgMagenta.white(` ${title} `));
      }
    };
  };

  return {
    create,
    setErrorLogger(logger) {
      errorLogger = logger;
    }
  };
}
