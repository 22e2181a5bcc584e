import path from "node:path";

export interface ErrorContext {
  operation?: string;
  component?: string;
  scope?: string;
  argv?: string[];
  [key: string]: unknown;
}

export interface ErrorLogFileSystem {
  mkdirSync(path: string, options: { recursive: true }): unknown;
  appendFileSync(path: string, data: string): void;
}

export interface ErrorLoggerOptions {
  fs: ErrorLogFileSystem;
  logDir: string;
  logToStderr?: boolean;
  now?: () => Date;
  stderr?: (text: string) => void;
}

/**
 * Appends errors with their stack and context to `<logDir>/errors.log`.
 * When the log cannot be written the entry goes to stderr instead.
 */
export class ErrorLogger {
  readonly logFile: string;
  private readonly fs: ErrorLogFileSystem;
  private readonly logDir: string;
  private readonly logToStderr: boolean;
  private readonly now: () => Date;
  private readonly stderr: (text: string) => void;

  constructor(options: ErrorLoggerOptions) {
    this.fs = options.fs;
    this.logDir = options.logDir;
    this.logFile = path.join(options.logDir, "errors.log");
    this.logToStderr = options.logToStderr ?? false;
    this.now = options.now ?? (() => new Date());
    this.stderr = options.stderr ?? ((text) => process.stderr.write(text));
  }

  logError(error: Error, context: ErrorContext = {}): void {
    this.write(this.format(error, context));
  }

  logErrorWithStackTrace(error: Error, operation: string, context: ErrorContext = {}): void {
    this.write(this.format(error, { ...context, operation }));
  }

  private format(error: Error, context: ErrorContext): string {
    const lines = [`[${this.now().toISOString()}] ${error.name}: ${error.message}`];
    const details = Object.entries(context).filter(([, value]) => value !== undefined);
    if (details.length > 0) {
      lines.push(`Context: ${JSON.stringify(Object.fromEntries(details))}`);
    }
    if (error.stack) {
      lines.push(error.stack);
    }
    let cause = error.cause;
    while (cause instanceof Error) {
      lines.push(`Caused by: ${cause.stack ?? `${cause.name}: ${cause.message}`}`);
      cause = cause.cause;
    }
    return `${lines.join("\n")}\n\n`;
  }

  private write(entry: string): void {
    if (this.logToStderr) {
      this.stderr(entry);
    }
    try {
      this.fs.mkdirSync(this.logDir, { recursive: true });
      this.fs.appendFileSync(this.logFile, entry);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.stderr(`Failed to write ${this.logFile}: ${reason}\n${entry}`);
    }
  }
}
