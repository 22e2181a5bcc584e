import path from "node:path";
import {
  StagingError,
  describeError,
  type FileSystem,
  type StagesLocalFiles
} from "@configd/config-transactions";
import type { Canary, CanaryAccount } from "./types.js";

const LOCAL_FILE_FIELDS = ["jsonPath"] as const;

/**
 * Stages the local files an account references and points the account at
 * their published location.
 */
export function accountFiles(
  account: CanaryAccount,
  integration: string,
  fs: Pick<FileSystem, "readFile">
): StagesLocalFiles {
  return {
    async stageLocalFiles(stager) {
      for (const field of LOCAL_FILE_FIELDS) {
        const source = account[field];
        if (typeof source !== "string" || source.length === 0) {
          continue;
        }
        const destination = path.join("canary", integration, account.name, path.basename(source));
        let content: string;
        try {
          content = await fs.readFile(source, "utf8");
        } catch (error) {
          throw new StagingError(`Failed to read ${source}: ${describeError(error)}`, {
            scope: stager.scope,
            destination,
            cause: error
          });
        }
        account[field] = await stager.stage({ name: source, content }, destination);
      }
    }
  };
}

export function canaryFiles(canary: Canary, fs: Pick<FileSystem, "readFile">): StagesLocalFiles[] {
  return canary.serviceIntegrations.flatMap((integration) =>
    integration.accounts.map((account) => accountFiles(account, integration.name, fs))
  );
}
