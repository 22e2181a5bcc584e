export interface CliErrorOptions {
  isUserError?: boolean;
  cause?: unknown;
}

/**
 * Errors raised by command handlers. User errors are printed as-is; others
 * also point at the error log.
 */
export class CliError extends Error {
  readonly isUserError: boolean;

  constructor(message: string, options: CliErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = "CliError";
    this.isUserError = options.isUserError ?? false;
  }
}

/** Bad input: flags, arguments or settings files. */
export class ValidationError extends CliError {
  constructor(message: string, options: Omit<CliErrorOptions, "isUserError"> = {}) {
    super(message, { ...options, isUserError: true });
    this.name = "ValidationError";
  }
}

/** Validation problems blocked an edit. The problems have already been printed. */
export class EditRejectedError extends CliError {
  constructor(message: string) {
    super(message, { isUserError: true });
    this.name = "EditRejectedError";
  }
}

/** Exits non-zero without printing anything further. */
export class SilentError extends CliError {
  constructor(message = "") {
    super(message, { isUserError: true });
    this.name = "SilentError";
  }
}
