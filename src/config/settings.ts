import path from "node:path";
import {
  isThresholdMode,
  parseSeverity,
  type Severity,
  type ThresholdMode,
  type ValidationSettings
} from "@configd/config-transactions";
import type { ConfigdSettings } from "./loader.js";

export interface RuntimeSettings {
  configDir: string;
  stagingDir: string;
  severity: Severity;
  validate: boolean;
  thresholdMode: ThresholdMode;
  concurrency: number;
  retentionMs: number;
  awaitTimeoutMs: number;
}

export interface SettingsFlags {
  severity?: string;
  validate?: boolean;
}

export const DEFAULT_SETTINGS = {
  severity: "WARNING",
  validate: true,
  thresholdMode: "exceeds",
  concurrency: 4,
  retentionMs: 10 * 60 * 1000,
  awaitTimeoutMs: 30_000
} satisfies Omit<RuntimeSettings, "configDir" | "stagingDir">;

/** Flags win over environment variables, which win over the settings file. */
export function resolveRuntimeSettings(input: {
  configHome: string;
  file: ConfigdSettings;
  variables: Record<string, string | undefined>;
  flags?: SettingsFlags;
}): RuntimeSettings {
  const { configHome, file, variables, flags = {} } = input;

  const severityInput = flags.severity ?? nonEmpty(variables.CONFIGD_SEVERITY);
  const thresholdInput = nonEmpty(variables.CONFIGD_THRESHOLD_MODE);
  if (thresholdInput != null && !isThresholdMode(thresholdInput)) {
    throw new Error(
      `Invalid CONFIGD_THRESHOLD_MODE "${thresholdInput}": expected "exceeds" or "atOrAbove".`
    );
  }

  return {
    configDir: file.configDir ?? path.join(configHome, "deployments"),
    stagingDir: path.join(configHome, "staging"),
    severity:
      severityInput != null ? parseSeverity(severityInput) : file.severity ?? DEFAULT_SETTINGS.severity,
    validate: flags.validate ?? file.validate ?? DEFAULT_SETTINGS.validate,
    thresholdMode: thresholdInput ?? file.thresholdMode ?? DEFAULT_SETTINGS.thresholdMode,
    concurrency: file.concurrency ?? DEFAULT_SETTINGS.concurrency,
    retentionMs: file.retentionMs ?? DEFAULT_SETTINGS.retentionMs,
    awaitTimeoutMs: file.awaitTimeoutMs ?? DEFAULT_SETTINGS.awaitTimeoutMs
  };
}

export function toValidationSettings(settings: RuntimeSettings): ValidationSettings {
  return {
    severity: settings.severity,
    validate: settings.validate,
    thresholdMode: settings.thresholdMode
  };
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}
