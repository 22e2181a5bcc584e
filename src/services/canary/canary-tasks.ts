import {
  createConfigEdit,
  createConfigRead,
  createDocumentService,
  type ConfigStore,
  type FileSystem,
  type StagesLocalFiles,
  type StagingArea,
  type TaskHandle,
  type TaskRunner,
  type ConfigValue,
  type TransactionObservers,
  type ValidationSettings,
  type WarningLogger
} from "@configd/config-transactions";
import { accountFiles, canaryFiles } from "./account-files.js";
import { createCanaryAccountService, createCanaryService } from "./canary-service.js";
import type { Canary, CanaryAccount, CanaryEdits } from "./types.js";

export interface CanaryTasksOptions {
  store: ConfigStore;
  staging: StagingArea;
  runner: TaskRunner;
  fs: Pick<FileSystem, "readFile">;
  /** Where a deployment's published files live */
  publishDir: (deployment: string) => string;
  observers?: TransactionObservers;
  logger?: WarningLogger;
}

/**
 * Every canary read and edit, submitted to the task runner under the
 * deployment's scope.
 */
export interface CanaryTasks {
  getCanary(deployment: string, settings: ValidationSettings): TaskHandle<Canary>;
  setCanary(deployment: string, settings: ValidationSettings, canary: Canary): TaskHandle<void>;
  setEnabled(deployment: string, settings: ValidationSettings, enabled: boolean): TaskHandle<void>;
  editCanary(deployment: string, settings: ValidationSettings, edits: CanaryEdits): TaskHandle<void>;
  setIntegrationEnabled(
    deployment: string,
    integration: string,
    settings: ValidationSettings,
    enabled: boolean
  ): TaskHandle<void>;
  getAccount(
    deployment: string,
    integration: string,
    accountName: string,
    settings: ValidationSettings
  ): TaskHandle<CanaryAccount>;
  setAccount(
    deployment: string,
    integration: string,
    accountName: string,
    settings: ValidationSettings,
    account: CanaryAccount
  ): TaskHandle<void>;
  /** Merges `fields` into the account; a `jsonPath` among them is staged and published. */
  editAccount(
    deployment: string,
    integration: string,
    accountName: string,
    settings: ValidationSettings,
    fields: Record<string, ConfigValue>
  ): TaskHandle<void>;
  addAccount(
    deployment: string,
    integration: string,
    settings: ValidationSettings,
    account: CanaryAccount
  ): TaskHandle<void>;
  deleteAccount(
    deployment: string,
    integration: string,
    accountName: string,
    settings: ValidationSettings
  ): TaskHandle<void>;
}

export function createCanaryTasks(options: CanaryTasksOptions): CanaryTasks {
  const { store, staging, runner, observers, logger } = options;
  const documents = createDocumentService(store);
  const canaryService = createCanaryService(documents);
  const accountService = createCanaryAccountService(documents);

  const read = <T>(
    deployment: string,
    settings: ValidationSettings,
    description: string,
    getter: () => Promise<T>
  ): TaskHandle<T> =>
    runner.submit(
      createConfigRead({
        store,
        scope: deployment,
        label: description,
        settings,
        read: getter,
        validate: () => canaryService.validateCanary(deployment),
        observers,
        logger
      }),
      description,
      { scope: deployment }
    );

  const edit = (
    deployment: string,
    settings: ValidationSettings,
    description: string,
    update: () => Promise<void>,
    artifacts: StagesLocalFiles[] = []
  ): TaskHandle<void> =>
    runner.submit(
      createConfigEdit({
        store,
        staging,
        scope: deployment,
        label: description,
        settings,
        update,
        validate: () => canaryService.validateCanary(deployment),
        artifacts,
        publishDir: options.publishDir(deployment),
        observers,
        logger
      }),
      description,
      { scope: deployment }
    );

  return {
    getCanary(deployment, settings) {
      return read(deployment, settings, "Get all canary settings", () =>
        canaryService.getCanary(deployment)
      );
    },

    setCanary(deployment, settings, canary) {
      return edit(
        deployment,
        settings,
        "Edit canary analysis settings",
        () => canaryService.setCanary(deployment, canary),
        canaryFiles(canary, options.fs)
      );
    },

    setEnabled(deployment, settings, enabled) {
      return edit(deployment, settings, "Edit canary settings", () =>
        canaryService.setCanaryEnabled(deployment, enabled)
      );
    },

    editCanary(deployment, settings, edits) {
      return edit(deployment, settings, "Edit canary analysis settings", () =>
        canaryService.editCanary(deployment, edits)
      );
    },

    setIntegrationEnabled(deployment, integration, settings, enabled) {
      return edit(deployment, settings, `Edit the ${integration} canary service integration`, () =>
        canaryService.setIntegrationEnabled(deployment, integration, enabled)
      );
    },

    getAccount(deployment, integration, accountName, settings) {
      return read(deployment, settings, `Get ${accountName} canary account`, () =>
        accountService.getCanaryAccount(deployment, integration, accountName)
      );
    },

    setAccount(deployment, integration, accountName, settings, account) {
      return edit(
        deployment,
        settings,
        `Edit the ${accountName} canary account`,
        () => accountService.setAccount(deployment, integration, accountName, account),
        [accountFiles(account, integration, options.fs)]
      );
    },

    editAccount(deployment, integration, accountName, settings, fields) {
      const changes: CanaryAccount = { ...fields, name: accountName };
      return edit(
        deployment,
        settings,
        `Edit the ${accountName} canary account`,
        () => accountService.editAccount(deployment, integration, accountName, changes),
        [accountFiles(changes, integration, options.fs)]
      );
    },

    addAccount(deployment, integration, settings, account) {
      return edit(
        deployment,
        settings,
        `Add the ${account.name} canary account to ${integration} service integration`,
        () => accountService.addAccount(deployment, integration, account),
        [accountFiles(account, integration, options.fs)]
      );
    },

    deleteAccount(deployment, integration, accountName, settings) {
      return edit(deployment, settings, `Delete the ${accountName} canary account`, () =>
        accountService.deleteAccount(deployment, integration, accountName)
      );
    }
  };
}
