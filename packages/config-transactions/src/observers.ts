import { describeError } from "./errors.js";
import type { WarningLogger } from "./types.js";

/** Forwards to `process.emitWarning` when no logger is given. */
export const processWarnings: WarningLogger = {
  warn(message) {
    process.emitWarning(message);
  }
};

/**
 * Calls an observer hook. A hook that throws is reported to `logger` and
 * never affects the caller.
 */
export function notifyObserver(logger: WarningLogger, hook: string, notify: () => void): void {
  try {
    notify();
  } catch (error) {
    logger.warn(`Observer ${hook} failed: ${describeError(error)}`);
  }
}
