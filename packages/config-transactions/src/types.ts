// ============================================================================
// Document Types
// ============================================================================

export type ConfigPrimitive = string | number | boolean | null;
export type ConfigValue = ConfigPrimitive | ConfigObject | ConfigArray;
export interface ConfigObject {
  [key: string]: ConfigValue;
}
export type ConfigArray = ConfigValue[];

/** Identifies the unit of configuration one transaction locks, e.g. a deployment name. */
export type Scope = string;

export function isConfigObject(value: unknown): value is ConfigObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function cloneDocument<T extends ConfigValue>(value: T): T {
  return structuredClone(value);
}

// ============================================================================
// FileSystem Interface
// ============================================================================

export interface FileSystem {
  readFile(path: string, encoding: "utf8"): Promise<string>;
  writeFile(
    path: string,
    content: string | Uint8Array,
    options?: { encoding: "utf8" }
  ): Promise<void>;
  mkdir(path: string, options?: { recursive: boolean }): Promise<unknown>;
  rename(from: string, to: string): Promise<void>;
  unlink(path: string): Promise<void>;
  rm(path: string, options?: { recursive?: boolean; force?: boolean }): Promise<void>;
  stat(path: string): Promise<unknown>;
}

/** Where best-effort failures (cleanup, observers) are reported. */
export interface WarningLogger {
  warn(message: string): void;
}
