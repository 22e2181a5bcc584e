import path from "node:path";
import type { Command } from "commander";
import type { ConfigValue } from "@configd/config-transactions";
import type { CanaryAccount, CanaryEdits } from "../../services/canary/types.js";
import type { CliContainer } from "../container.js";
import { ValidationError } from "../errors.js";
import {
  awaitTask,
  createExecutionResources,
  renderValue,
  resolveCommandFlags,
  type ExecutionResources
} from "./shared.js";

type AccountOptions = {
  jsonPath?: string;
  field: string[];
};

function parseBoolean(value: string): boolean {
  const normalized = value.trim().toLowerCase();
  if (normalized === "true") return true;
  if (normalized === "false") return false;
  throw new ValidationError(`Expected "true" or "false", got "${value}".`);
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/** `key=value` pairs; "true" and "false" become booleans. */
export function parseFields(entries: string[]): Record<string, ConfigValue> {
  const fields: Record<string, ConfigValue> = {};
  for (const entry of entries) {
    const separator = entry.indexOf("=");
    const key = separator === -1 ? "" : entry.slice(0, separator).trim();
    if (key.length === 0) {
      throw new ValidationError(`Invalid --field "${entry}": expected key=value.`);
    }
    if (key === "name") {
      throw new ValidationError("An account is renamed by deleting and re-adding it.");
    }
    const raw = entry.slice(separator + 1);
    fields[key] = raw === "true" ? true : raw === "false" ? false : raw;
  }
  return fields;
}

export function registerCanaryCommand(program: Command, container: CliContainer): void {
  const run = async (
    command: Command,
    title: string,
    body: (resources: ExecutionResources, deployment: string) => Promise<void>
  ): Promise<void> => {
    const flags = resolveCommandFlags(command);
    const resources = await createExecutionResources(container, flags, "canary");
    resources.logger.intro(title);
    await body(resources, flags.deployment);
  };

  const resolveLocalPath = (value: string): string => path.resolve(container.env.cwd, value);

  const canary = program
    .command("canary")
    .description("Show and edit a deployment's canary analysis settings.");

  canary
    .command("get")
    .description("Print the canary settings.")
    .action(async function (this: Command) {
      await run(this, "canary get", async (resources, deployment) => {
        const { runtime, logger } = resources;
        const settings = await awaitTask(
          resources,
          runtime.canary.getCanary(deployment, runtime.validation)
        );
        logger.info(renderValue(container, settings));
      });
    });

  for (const enabled of [true, false]) {
    const verb = enabled ? "enable" : "disable";
    canary
      .command(verb)
      .description(`${enabled ? "Enable" : "Disable"} canary analysis.`)
      .action(async function (this: Command) {
        await run(this, `canary ${verb}`, async (resources, deployment) => {
          const { runtime, logger } = resources;
          await awaitTask(resources, runtime.canary.setEnabled(deployment, runtime.validation, enabled));
          logger.success(`Canary analysis ${verb}d for "${deployment}".`);
        });
      });
  }

  canary
    .command("edit")
    .description("Edit canary analysis defaults.")
    .option("--default-metrics-account <name>", "Account used for metrics by default")
    .option("--default-storage-account <name>", "Account used for storage by default")
    .option("--default-judge <name>", "Judge used by default")
    .option("--default-metrics-store <store>", "Metrics store used by default")
    .option("--redux-logger-enabled <bool>", "Enable the redux logger in the UI", parseBoolean)
    .option("--stages-enabled <bool>", "Enable canary stages in pipelines", parseBoolean)
    .option("--templates-enabled <bool>", "Enable canary config templates", parseBoolean)
    .option("--show-all-configs-enabled <bool>", "Show configs of every application", parseBoolean)
    .action(async function (this: Command) {
      const edits = this.opts<CanaryEdits>();
      if (Object.values(edits).every((value) => value === undefined)) {
        throw new ValidationError("Nothing to edit: pass at least one option.");
      }
      await run(this, "canary edit", async (resources, deployment) => {
        const { runtime, logger } = resources;
        await awaitTask(resources, runtime.canary.editCanary(deployment, runtime.validation, edits));
        logger.success(`Canary settings updated for "${deployment}".`);
      });
    });

  const integration = canary
    .command("integration")
    .description("Turn a canary service integration on or off.");

  for (const enabled of [true, false]) {
    const verb = enabled ? "enable" : "disable";
    integration
      .command(`${verb} <integration>`)
      .description(`${enabled ? "Enable" : "Disable"} a service integration.`)
      .action(async function (this: Command, name: string) {
        await run(this, `canary integration ${verb}`, async (resources, deployment) => {
          const { runtime, logger } = resources;
          await awaitTask(
            resources,
            runtime.canary.setIntegrationEnabled(deployment, name, runtime.validation, enabled)
          );
          logger.success(`The ${name} service integration is ${verb}d for "${deployment}".`);
        });
      });
  }

  const account = canary.command("account").description("Manage canary accounts.");

  account
    .command("get <integration> <name>")
    .description("Print one canary account.")
    .action(async function (this: Command, integrationName: string, name: string) {
      await run(this, "canary account get", async (resources, deployment) => {
        const { runtime, logger } = resources;
        const found = await awaitTask(
          resources,
          runtime.canary.getAccount(deployment, integrationName, name, runtime.validation)
        );
        logger.info(renderValue(container, found));
      });
    });

  account
    .command("add <integration> <name>")
    .description("Add a canary account to a service integration.")
    .option("--json-path <path>", "Credentials file to publish with the account")
    .option("--field <key=value>", "Integration-specific setting (repeatable)", collect, [])
    .action(async function (this: Command, integrationName: string, name: string) {
      const options = this.opts<AccountOptions>();
      const added: CanaryAccount = { ...parseFields(options.field), name };
      if (options.jsonPath) {
        added.jsonPath = resolveLocalPath(options.jsonPath);
      }
      await run(this, "canary account add", async (resources, deployment) => {
        const { runtime, logger } = resources;
        await awaitTask(
          resources,
          runtime.canary.addAccount(deployment, integrationName, runtime.validation, added)
        );
        logger.success(`Added the ${name} canary account to ${integrationName}.`);
      });
    });

  account
    .command("edit <integration> <name>")
    .description("Change fields of a canary account.")
    .option("--json-path <path>", "Credentials file to publish with the account")
    .option("--field <key=value>", "Integration-specific setting (repeatable)", collect, [])
    .action(async function (this: Command, integrationName: string, name: string) {
      const options = this.opts<AccountOptions>();
      const fields = parseFields(options.field);
      if (Object.keys(fields).length === 0 && !options.jsonPath) {
        throw new ValidationError("Nothing to edit: pass --json-path or --field.");
      }
      if (options.jsonPath) {
        fields.jsonPath = resolveLocalPath(options.jsonPath);
      }
      await run(this, "canary account edit", async (resources, deployment) => {
        const { runtime, logger } = resources;
        await awaitTask(
          resources,
          runtime.canary.editAccount(deployment, integrationName, name, runtime.validation, fields)
        );
        logger.success(`Updated the ${name} canary account.`);
      });
    });

  account
    .command("delete <integration> <name>")
    .description("Remove a canary account.")
    .action(async function (this: Command, integrationName: string, name: string) {
      await run(this, "canary account delete", async (resources, deployment) => {
        const { runtime, logger } = resources;
        await awaitTask(
          resources,
          runtime.canary.deleteAccount(deployment, integrationName, name, runtime.validation)
        );
        logger.success(`Deleted the ${name} canary account.`);
      });
    });
}
