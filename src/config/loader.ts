import path from "node:path";
import YAML from "yaml";
import {
  isSeverity,
  isThresholdMode,
  readFileIfExists,
  type FileSystem,
  type Severity,
  type ThresholdMode
} from "@configd/config-transactions";

export type ConfigdSettings = {
  /** Where deployment documents live; defaults to `<configHome>/deployments` */
  configDir?: string;
  severity?: Severity;
  validate?: boolean;
  thresholdMode?: ThresholdMode;
  concurrency?: number;
  retentionMs?: number;
  awaitTimeoutMs?: number;
};

type SettingsFileSystem = Pick<FileSystem, "readFile">;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function pickOptionalString(config: Record<string, unknown>, key: keyof ConfigdSettings): string | undefined {
  const value = config[key];
  if (value == null) return undefined;
  if (typeof value !== "string") {
    throw new Error(`Invalid "${key}": expected a string.`);
  }
  const trimmed = value.trim();
  return trimmed.length === 0 ? undefined : trimmed;
}

function pickOptionalBoolean(config: Record<string, unknown>, key: keyof ConfigdSettings): boolean | undefined {
  const value = config[key];
  if (value == null) return undefined;
  if (typeof value !== "boolean") {
    throw new Error(`Invalid "${key}": expected a boolean.`);
  }
  return value;
}

function pickOptionalPositiveInt(
  config: Record<string, unknown>,
  key: keyof ConfigdSettings,
  options: { min: number }
): number | undefined {
  const value = config[key];
  if (value == null) return undefined;
  if (typeof value !== "number" || !Number.isFinite(value) || !Number.isInteger(value)) {
    throw new Error(`Invalid "${key}": expected an integer.`);
  }
  if (value < options.min) {
    throw new Error(`Invalid "${key}": expected >= ${options.min}.`);
  }
  return value;
}

/**
 * Reads `config.yaml`, falling back to `config.json`, from `configHome`.
 * Missing files yield `{}`; unknown keys are ignored.
 */
export async function loadSettings(
  configHome: string,
  deps: { fs: SettingsFileSystem }
): Promise<ConfigdSettings> {
  const yamlPath = path.join(configHome, "config.yaml");
  const jsonPath = path.join(configHome, "config.json");

  let source: { raw: string; format: "yaml" | "json"; path: string } | null = null;
  const yaml = await readFileIfExists(deps.fs, yamlPath);
  if (yaml != null) {
    source = { raw: yaml, format: "yaml", path: yamlPath };
  } else {
    const json = await readFileIfExists(deps.fs, jsonPath);
    if (json != null) {
      source = { raw: json, format: "json", path: jsonPath };
    }
  }
  if (!source) {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = source.format === "yaml" ? YAML.parse(source.raw) : JSON.parse(source.raw);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new Error(`Invalid settings ${source.format.toUpperCase()} at ${source.path}: ${detail}`);
  }
  if (parsed == null) {
    return {};
  }
  if (!isPlainObject(parsed)) {
    throw new Error(`Invalid settings at ${source.path}: expected an object.`);
  }

  const result: ConfigdSettings = {};

  const configDir = pickOptionalString(parsed, "configDir");
  if (configDir) result.configDir = path.resolve(configHome, configDir);

  const severity = pickOptionalString(parsed, "severity")?.toUpperCase();
  if (severity != null) {
    if (!isSeverity(severity)) {
      throw new Error(`Invalid "severity": expected one of NONE, INFO, WARNING, ERROR, FATAL.`);
    }
    result.severity = severity;
  }

  const thresholdMode = pickOptionalString(parsed, "thresholdMode");
  if (thresholdMode != null) {
    if (!isThresholdMode(thresholdMode)) {
      throw new Error(`Invalid "thresholdMode": expected "exceeds" or "atOrAbove".`);
    }
    result.thresholdMode = thresholdMode;
  }

  const validate = pickOptionalBoolean(parsed, "validate");
  if (validate != null) result.validate = validate;

  const concurrency = pickOptionalPositiveInt(parsed, "concurrency", { min: 1 });
  if (concurrency != null) result.concurrency = concurrency;
  const retentionMs = pickOptionalPositiveInt(parsed, "retentionMs", { min: 0 });
  if (retentionMs != null) result.retentionMs = retentionMs;
  const awaitTimeoutMs = pickOptionalPositiveInt(parsed, "awaitTimeoutMs", { min: 1 });
  if (awaitTimeoutMs != null) result.awaitTimeoutMs = awaitTimeoutMs;

  return result;
}
