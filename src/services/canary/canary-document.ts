import {
  isConfigObject,
  type ConfigObject,
  type ConfigValue
} from "@configd/config-transactions";
import { InvalidCanaryConfigError } from "./errors.js";
import {
  createDefaultCanary,
  isCanaryIntegrationName,
  type Canary,
  type CanaryAccount,
  type CanaryServiceIntegration
} from "./types.js";

const SECTION = "canary";

type OptionalStringField =
  | "defaultMetricsAccount"
  | "defaultStorageAccount"
  | "defaultJudge"
  | "defaultMetricsStore";

type BooleanField =
  | "enabled"
  | "reduxLoggerEnabled"
  | "stagesEnabled"
  | "templatesEnabled"
  | "showAllConfigsEnabled";

const OPTIONAL_STRING_FIELDS: OptionalStringField[] = [
  "defaultMetricsAccount",
  "defaultStorageAccount",
  "defaultJudge",
  "defaultMetricsStore"
];

const BOOLEAN_FIELDS: BooleanField[] = [
  "enabled",
  "reduxLoggerEnabled",
  "stagesEnabled",
  "templatesEnabled",
  "showAllConfigsEnabled"
];

/**
 * Reads the canary section of a deployment document. A missing section, or a
 * missing integration, reads as the defaults.
 */
export function readCanary(document: ConfigObject): Canary {
  const canary = createDefaultCanary();
  const section = document[SECTION];
  if (section == null) {
    return canary;
  }
  if (!isConfigObject(section)) {
    throw new InvalidCanaryConfigError(SECTION, "expected a mapping.");
  }

  for (const field of BOOLEAN_FIELDS) {
    const value = section[field];
    if (value == null) continue;
    if (typeof value !== "boolean") {
      throw new InvalidCanaryConfigError(`${SECTION}.${field}`, "expected a boolean.");
    }
    canary[field] = value;
  }

  for (const field of OPTIONAL_STRING_FIELDS) {
    const value = section[field];
    if (value == null) {
      delete canary[field];
      continue;
    }
    if (typeof value !== "string") {
      throw new InvalidCanaryConfigError(`${SECTION}.${field}`, "expected a string.");
    }
    canary[field] = value;
  }

  const integrations = section.serviceIntegrations;
  if (integrations == null) {
    return canary;
  }
  if (!Array.isArray(integrations)) {
    throw new InvalidCanaryConfigError(`${SECTION}.serviceIntegrations`, "expected a list.");
  }
  for (const [index, raw] of integrations.entries()) {
    const integration = readIntegration(raw, `${SECTION}.serviceIntegrations.${index}`);
    const slot = canary.serviceIntegrations.findIndex((entry) => entry.name === integration.name);
    canary.serviceIntegrations[slot] = integration;
  }
  return canary;
}

function readIntegration(raw: ConfigValue, location: string): CanaryServiceIntegration {
  if (!isConfigObject(raw)) {
    throw new InvalidCanaryConfigError(location, "expected a mapping.");
  }
  const { name, enabled, accounts } = raw;
  if (typeof name !== "string" || !isCanaryIntegrationName(name)) {
    throw new InvalidCanaryConfigError(`${location}.name`, `unknown service integration "${String(name)}".`);
  }
  if (enabled != null && typeof enabled !== "boolean") {
    throw new InvalidCanaryConfigError(`${location}.enabled`, "expected a boolean.");
  }
  if (accounts != null && !Array.isArray(accounts)) {
    throw new InvalidCanaryConfigError(`${location}.accounts`, "expected a list.");
  }
  return {
    name,
    enabled: enabled ?? false,
    accounts: (accounts ?? []).map((account, index) =>
      readAccount(account, `${location}.accounts.${index}`)
    )
  };
}

export function readAccount(raw: ConfigValue, location: string): CanaryAccount {
  if (!isConfigObject(raw)) {
    throw new InvalidCanaryConfigError(location, "expected a mapping.");
  }
  const { name, ...fields } = raw;
  if (name != null && typeof name !== "string") {
    throw new InvalidCanaryConfigError(`${location}.name`, "expected a string.");
  }
  // A nameless account is kept so validation can report it.
  return { ...fields, name: name ?? "" };
}

/** Replaces the canary section of `document`. */
export function writeCanary(document: ConfigObject, canary: Canary): void {
  const section: ConfigObject = {};
  for (const field of BOOLEAN_FIELDS) {
    section[field] = canary[field];
  }
  for (const field of OPTIONAL_STRING_FIELDS) {
    const value = canary[field];
    if (value !== undefined) {
      section[field] = value;
    }
  }
  section.serviceIntegrations = canary.serviceIntegrations.map((integration) => ({
    name: integration.name,
    enabled: integration.enabled,
    accounts: integration.accounts.map((account) => ({ ...account }))
  }));
  document[SECTION] = section;
}
