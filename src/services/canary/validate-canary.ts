import { ProblemReportBuilder, type ProblemReport } from "@configd/config-transactions";
import type { Canary } from "./types.js";

/**
 * Checks a deployment's canary settings. Locations are relative to the
 * deployment, e.g. `prod.canary.google.accounts.0`.
 */
export function validateCanary(canary: Canary, deployment: string): ProblemReport {
  const problems = new ProblemReportBuilder(deployment);
  const accountNames = new Set<string>();

  for (const integration of canary.serviceIntegrations) {
    const location = `canary.${integration.name}`;
    const seen = new Set<string>();

    integration.accounts.forEach((account, index) => {
      if (account.name.trim() === "") {
        problems.add("FATAL", "Canary account has no name.", {
          location: `${location}.accounts.${index}`,
          remediation: "Give every canary account a name."
        });
        return;
      }
      if (seen.has(account.name)) {
        problems.add(
          "ERROR",
          `Canary account "${account.name}" is defined more than once in the ${integration.name} service integration.`,
          { location: `${location}.accounts.${index}` }
        );
      }
      seen.add(account.name);
      accountNames.add(account.name);
    });

    if (canary.enabled && integration.enabled && integration.accounts.length === 0) {
      problems.add(
        "WARNING",
        `The ${integration.name} service integration is enabled but has no accounts.`,
        { location }
      );
    }
  }

  if (!canary.enabled) {
    problems.add("INFO", "Canary analysis is disabled.", { location: "canary" });
    return problems.build();
  }

  if (accountNames.size === 0) {
    problems.add("ERROR", "Canary analysis is enabled, but no canary accounts are configured.", {
      location: "canary",
      remediation: "Add one with: configd canary account add <integration> <name>"
    });
  }

  const defaults = [
    ["defaultMetricsAccount", "metrics"],
    ["defaultStorageAccount", "storage"]
  ] as const;
  for (const [field, kind] of defaults) {
    const name = canary[field];
    if (name !== undefined && !accountNames.has(name)) {
      problems.add("WARNING", `Default ${kind} account "${name}" does not exist.`, {
        location: `canary.${field}`
      });
    }
  }

  return problems.build();
}
