import type { ConfigService, ConfigValue, ProblemReport } from "@configd/config-transactions";
import { readCanary, writeCanary } from "./canary-document.js";
import { ConfigNotFoundError } from "./errors.js";
import {
  CANARY_INTEGRATIONS,
  isCanaryIntegrationName,
  type Canary,
  type CanaryAccount,
  type CanaryEdits,
  type CanaryServiceIntegration
} from "./types.js";
import { validateCanary } from "./validate-canary.js";

export interface CanaryService {
  getCanary(deployment: string): Promise<Canary>;
  setCanary(deployment: string, canary: Canary): Promise<void>;
  setCanaryEnabled(deployment: string, enabled: boolean): Promise<void>;
  /** Changes only the fields present in `edits`. */
  editCanary(deployment: string, edits: CanaryEdits): Promise<void>;
  setIntegrationEnabled(deployment: string, integration: string, enabled: boolean): Promise<void>;
  validateCanary(deployment: string): Promise<ProblemReport>;
}

export interface CanaryAccountService {
  getCanaryAccount(deployment: string, integration: string, accountName: string): Promise<CanaryAccount>;
  setAccount(
    deployment: string,
    integration: string,
    accountName: string,
    account: CanaryAccount
  ): Promise<void>;
  /** Merges `fields` into the stored account; the name never changes. */
  editAccount(
    deployment: string,
    integration: string,
    accountName: string,
    fields: Record<string, ConfigValue>
  ): Promise<void>;
  addAccount(deployment: string, integration: string, account: CanaryAccount): Promise<void>;
  deleteAccount(deployment: string, integration: string, accountName: string): Promise<void>;
}

export function createCanaryService(documents: ConfigService): CanaryService {
  const update = async (deployment: string, change: (canary: Canary) => void) => {
    const document = await documents.get(deployment);
    const canary = readCanary(document);
    change(canary);
    writeCanary(document, canary);
    await documents.set(deployment, document);
  };

  return {
    async getCanary(deployment) {
      return readCanary(await documents.get(deployment));
    },

    async setCanary(deployment, canary) {
      const document = await documents.get(deployment);
      writeCanary(document, canary);
      await documents.set(deployment, document);
    },

    async setCanaryEnabled(deployment, enabled) {
      await update(deployment, (canary) => {
        canary.enabled = enabled;
      });
    },

    async editCanary(deployment, edits) {
      const changed = Object.entries(edits).filter(([, value]) => value !== undefined);
      await update(deployment, (canary) => {
        Object.assign(canary, Object.fromEntries(changed));
      });
    },

    async setIntegrationEnabled(deployment, integration, enabled) {
      await update(deployment, (canary) => {
        findIntegration(canary, integration).enabled = enabled;
      });
    },

    async validateCanary(deployment) {
      return validateCanary(readCanary(await documents.get(deployment)), deployment);
    }
  };
}

export function createCanaryAccountService(documents: ConfigService): CanaryAccountService {
  const update = async (
    deployment: string,
    integrationName: string,
    change: (integration: CanaryServiceIntegration) => void
  ) => {
    const document = await documents.get(deployment);
    const canary = readCanary(document);
    change(findIntegration(canary, integrationName));
    writeCanary(document, canary);
    await documents.set(deployment, document);
  };

  return {
    async getCanaryAccount(deployment, integration, accountName) {
      const canary = readCanary(await documents.get(deployment));
      const accounts = findIntegration(canary, integration).accounts;
      return accounts[findAccountIndex(accounts, integration, accountName)];
    },

    async setAccount(deployment, integration, accountName, account) {
      await update(deployment, integration, (target) => {
        target.accounts[findAccountIndex(target.accounts, integration, accountName)] = account;
      });
    },

    async editAccount(deployment, integration, accountName, fields) {
      await update(deployment, integration, (target) => {
        const index = findAccountIndex(target.accounts, integration, accountName);
        target.accounts[index] = { ...target.accounts[index], ...fields, name: accountName };
      });
    },

    async addAccount(deployment, integration, account) {
      await update(deployment, integration, (target) => {
        target.accounts.push(account);
      });
    },

    async deleteAccount(deployment, integration, accountName) {
      await update(deployment, integration, (target) => {
        target.accounts.splice(findAccountIndex(target.accounts, integration, accountName), 1);
      });
    }
  };
}

function findIntegration(canary: Canary, name: string): CanaryServiceIntegration {
  const integration = isCanaryIntegrationName(name)
    ? canary.serviceIntegrations.find((entry) => entry.name === name)
    : undefined;
  if (!integration) {
    throw new ConfigNotFoundError(
      `No canary service integration named "${name}" (expected one of: ${CANARY_INTEGRATIONS.join(", ")})`
    );
  }
  return integration;
}

function findAccountIndex(accounts: CanaryAccount[], integration: string, accountName: string): number {
  const index = accounts.findIndex((account) => account.name === accountName);
  if (index === -1) {
    throw new ConfigNotFoundError(
      `No canary account with name "${accountName}" in the ${integration} service integration`
    );
  }
  return index;
}
