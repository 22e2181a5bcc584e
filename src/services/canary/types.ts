import type { ConfigValue } from "@configd/config-transactions";

export const CANARY_INTEGRATIONS = [
  "google",
  "prometheus",
  "datadog",
  "signalfx",
  "newrelic",
  "aws"
] as const;

export type CanaryIntegrationName = (typeof CANARY_INTEGRATIONS)[number];

/** Integration-specific fields are kept as-is next to the name. */
export interface CanaryAccount {
  name: string;
  [field: string]: ConfigValue;
}

export interface CanaryServiceIntegration {
  name: CanaryIntegrationName;
  enabled: boolean;
  accounts: CanaryAccount[];
}

export interface Canary {
  enabled: boolean;
  serviceIntegrations: CanaryServiceIntegration[];
  reduxLoggerEnabled: boolean;
  defaultMetricsAccount?: string;
  defaultStorageAccount?: string;
  defaultJudge?: string;
  defaultMetricsStore?: string;
  stagesEnabled: boolean;
  templatesEnabled: boolean;
  showAllConfigsEnabled: boolean;
}

/** Top-level canary settings a single edit may change. */
export type CanaryEdits = Partial<
  Pick<
    Canary,
    | "defaultMetricsAccount"
    | "defaultStorageAccount"
    | "defaultJudge"
    | "defaultMetricsStore"
    | "reduxLoggerEnabled"
    | "stagesEnabled"
    | "templatesEnabled"
    | "showAllConfigsEnabled"
  >
>;

export function isCanaryIntegrationName(value: string): value is CanaryIntegrationName {
  return CANARY_INTEGRATIONS.some((name) => name === value);
}

export function createDefaultCanary(): Canary {
  return {
    enabled: false,
    serviceIntegrations: CANARY_INTEGRATIONS.map((name) => ({
      name,
      enabled: false,
      accounts: []
    })),
    reduxLoggerEnabled: true,
    defaultJudge: "NetflixACAJudge-v1.0",
    stagesEnabled: true,
    templatesEnabled: true,
    showAllConfigsEnabled: true
  };
}
