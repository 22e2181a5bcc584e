import { InvalidSeverityError } from "../errors.js";

export const SEVERITIES = ["NONE", "INFO", "WARNING", "ERROR", "FATAL"] as const;

export type Severity = (typeof SEVERITIES)[number];

/**
 * How a report's worst severity is compared with a caller's threshold.
 *
 * - `exceeds`: the report blocks when worst > threshold
 * - `atOrAbove`: the report blocks when worst >= threshold (an empty report never blocks)
 */
export type ThresholdMode = "exceeds" | "atOrAbove";

const RANK: Record<Severity, number> = {
  NONE: 0,
  INFO: 1,
  WARNING: 2,
  ERROR: 3,
  FATAL: 4
};

export function compareSeverity(a: Severity, b: Severity): number {
  return RANK[a] - RANK[b];
}

export function maxSeverity(a: Severity, b: Severity): Severity {
  return compareSeverity(a, b) >= 0 ? a : b;
}

export function isSeverity(value: unknown): value is Severity {
  return typeof value === "string" && Object.hasOwn(RANK, value);
}

export function parseSeverity(value: string): Severity {
  const normalized = value.trim().toUpperCase();
  if (!isSeverity(normalized)) {
    throw new InvalidSeverityError(value);
  }
  return normalized;
}

export function isThresholdMode(value: unknown): value is ThresholdMode {
  return value === "exceeds" || value === "atOrAbove";
}
