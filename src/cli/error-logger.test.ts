import { describe, it, expect, vi } from "vitest";
import { Volume, createFsFromVolume } from "memfs";
import { ErrorLogger } from "./error-logger.js";

const now = () => new Date("2024-05-01T10:00:00.000Z");

function errorWithoutStack(message: string, options?: { cause?: unknown }): Error {
  const error = new Error(message, options);
  error.stack = undefined;
  return error;
}

describe("ErrorLogger", () => {
  it("appends entries with context to errors.log", () => {
    const volume = new Volume();
    const logger = new ErrorLogger({
      fs: createFsFromVolume(volume),
      logDir: "/home/test/.configd/logs",
      now
    });

    logger.logErrorWithStackTrace(errorWithoutStack("boom"), "CLI execution", {
      component: "main",
      scope: undefined
    });
    logger.logError(errorWithoutStack("again"));

    expect(volume.readFileSync("/home/test/.configd/logs/errors.log", "utf8")).toBe(
      [
        "[2024-05-01T10:00:00.000Z] Error: boom",
        'Context: {"component":"main","operation":"CLI execution"}',
        "",
        "[2024-05-01T10:00:00.000Z] Error: again",
        "",
        ""
      ].join("\n")
    );
  });

  it("follows the cause chain", () => {
    const volume = new Volume();
    const logger = new ErrorLogger({ fs: createFsFromVolume(volume), logDir: "/logs", now });
    const cause = errorWithoutStack("ENOSPC");
    cause.name = "PersistenceError";

    logger.logError(errorWithoutStack("persist failed", { cause }));

    expect(volume.readFileSync("/logs/errors.log", "utf8")).toBe(
      [
        "[2024-05-01T10:00:00.000Z] Error: persist failed",
        "Caused by: PersistenceError: ENOSPC",
        "",
        ""
      ].join("\n")
    );
  });

  it("mirrors entries to stderr when asked", () => {
    const stderr = vi.fn();
    const logger = new ErrorLogger({
      fs: createFsFromVolume(new Volume()),
      logDir: "/logs",
      logToStderr: true,
      now,
      stderr
    });

    logger.logError(errorWithoutStack("boom"));

    expect(stderr).toHaveBeenCalledWith("[2024-05-01T10:00:00.000Z] Error: boom\n\n");
  });

  it("falls back to stderr when the log cannot be written", () => {
    const stderr = vi.fn();
    const logger = new ErrorLogger({
      fs: {
        mkdirSync: () => {
          throw new Error("EACCES: permission denied");
        },
        appendFileSync: () => undefined
      },
      logDir: "/logs",
      now,
      stderr
    });

    logger.logError(errorWithoutStack("boom"));

    expect(stderr).toHaveBeenCalledWith(
      "Failed to write /logs/errors.log: EACCES: permission denied\n[2024-05-01T10:00:00.000Z] Error: boom\n\n"
    );
  });
});
