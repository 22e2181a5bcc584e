import { describe, it, expect, beforeEach } from "vitest";
import YAML from "yaml";
import type { FileSystem } from "@configd/config-transactions";
import { createMemoryFs, noopLock, type MemoryFileSystem } from "@configd/config-transactions/testing";
import { createProgram } from "../program.js";
import { resetOutputFormatCache } from "../output-format.js";
import { parseFields } from "./canary.js";

const cwd = "/repo";
const homeDir = "/home/test";
const deployments = `${homeDir}/.configd/deployments`;
const documentPath = (deployment: string) => `${deployments}/${deployment}/config.yaml`;

const enabledWithAccount = [
  "canary:",
  "  enabled: true",
  "  serviceIntegrations:",
  "    - name: google",
  "      enabled: true",
  "      accounts:",
  "        - name: gcs",
  "          project: my-project",
  ""
].join("\n");

function setup(files: Record<string, string> = {}, variables: Record<string, string> = {}) {
  const memory = createMemoryFs(files);
  const logs: string[] = [];
  const program = createProgram({
    fs: memory.fs,
    env: { cwd, homeDir, variables },
    logger: (message) => logs.push(message),
    lock: noopLock,
    suppressCommanderOutput: true
  });
  const run = (...args: string[]) => program.parseAsync(["node", "cli", ...args]);
  return { memory, logs, run };
}

/** Delays reads under `prefix` so that tasks outlast a short timeout. */
function slowReads(base: FileSystem, prefix: string, delayMs: number): FileSystem {
  return {
    readFile: async (target, encoding) => {
      if (target.startsWith(prefix)) {
        await new Promise((resolve) => setTimeout(resolve, delayMs));
      }
      return base.readFile(target, encoding);
    },
    writeFile: (target, content, options) => base.writeFile(target, content, options),
    mkdir: (target, options) => base.mkdir(target, options),
    rename: (from, to) => base.rename(from, to),
    unlink: (target) => base.unlink(target),
    rm: (target, options) => base.rm(target, options),
    stat: (target) => base.stat(target)
  };
}

async function readDocument(memory: MemoryFileSystem, deployment = "default"): Promise<unknown> {
  return YAML.parse(await memory.fs.readFile(documentPath(deployment), "utf8"));
}

describe("canary command", () => {
  beforeEach(() => {
    resetOutputFormatCache();
  });

  it("prints the defaults when nothing is configured", async () => {
    const { logs, run } = setup();

    await run("canary", "get");

    expect(logs.slice(0, 2)).toEqual(["canary get", "INFO default.canary: Canary analysis is disabled."]);
    expect(YAML.parse(logs[2] ?? "")).toMatchObject({
      enabled: false,
      reduxLoggerEnabled: true,
      defaultJudge: "NetflixACAJudge-v1.0"
    });
    expect(logs).toHaveLength(3);
  });

  it("prints json when OUTPUT_FORMAT=json", async () => {
    const { logs, run } = setup({ [documentPath("default")]: enabledWithAccount }, { OUTPUT_FORMAT: "json" });

    await run("canary", "account", "get", "google", "gcs");

    expect(logs).toEqual([
      "canary account get",
      '{\n  "project": "my-project",\n  "name": "gcs"\n}'
    ]);
  });

  it("rejects enabling canary analysis without accounts and leaves nothing on disk", async () => {
    const { memory, logs, run } = setup();

    await expect(run("canary", "enable")).rejects.toMatchObject({
      name: "EditRejectedError",
      message: "Edit canary settings was rejected: problems reached ERROR."
    });

    expect(logs).toEqual([
      "canary enable",
      "ERROR default.canary: Canary analysis is enabled, but no canary accounts are configured.\n" +
        "  Add one with: configd canary account add <integration> <name>"
    ]);
    expect(memory.volume.existsSync(documentPath("default"))).toBe(false);
  });

  it("lets --severity raise the threshold", async () => {
    const { memory, logs, run } = setup();

    await run("canary", "enable", "--severity", "error");

    expect(logs.at(-1)).toBe('Canary analysis enabled for "default".');
    expect(await readDocument(memory)).toMatchObject({ canary: { enabled: true } });
  });

  it("skips validation with --no-validate", async () => {
    const { memory, logs, run } = setup();

    await run("--no-validate", "--deployment", "prod", "canary", "enable");

    expect(logs).toEqual(["canary enable", 'Canary analysis enabled for "prod".']);
    expect(await readDocument(memory, "prod")).toMatchObject({ canary: { enabled: true } });
  });

  it("adds an account and publishes its credentials file", async () => {
    const { memory, logs, run } = setup({ "/repo/key.json": '{"private_key":"placeholder"}' });

    await run(
      "canary",
      "account",
      "add",
      "google",
      "gcs",
      "--json-path",
      "key.json",
      "--field",
      "project=my-project",
      "--field",
      "bucket=canary-bucket"
    );

    const published = `${deployments}/default/canary/google/gcs/key.json`;
    expect(logs).toEqual([
      "canary account add",
      "INFO default.canary: Canary analysis is disabled.",
      "Added the gcs canary account to google."
    ]);
    expect(await readDocument(memory)).toMatchObject({
      canary: {
        serviceIntegrations: expect.arrayContaining([
          {
            name: "google",
            enabled: false,
            accounts: [
              { project: "my-project", bucket: "canary-bucket", name: "gcs", jsonPath: published }
            ]
          }
        ])
      }
    });
    expect(await memory.fs.readFile(published, "utf8")).toBe('{"private_key":"placeholder"}');
    expect(memory.volume.existsSync(`${homeDir}/.configd/staging/default/canary/google/gcs/key.json`)).toBe(
      false
    );
  });

  it("edits an account by merging fields", async () => {
    const { memory, logs, run } = setup({ [documentPath("default")]: enabledWithAccount });

    await run("canary", "account", "edit", "google", "gcs", "--field", "project=other-project");

    expect(logs).toEqual(["canary account edit", "Updated the gcs canary account."]);
    expect(await readDocument(memory)).toMatchObject({
      canary: {
        serviceIntegrations: expect.arrayContaining([
          { name: "google", enabled: true, accounts: [{ name: "gcs", project: "other-project" }] }
        ])
      }
    });
  });

  it("reports a missing account as a user error", async () => {
    const { logs, run } = setup({ [documentPath("default")]: enabledWithAccount });

    await expect(run("canary", "account", "delete", "google", "missing")).rejects.toMatchObject({
      name: "CliError",
      isUserError: true,
      message:
        'apply failed: No canary account with name "missing" in the google service integration (changes reverted)'
    });
    expect(logs).toEqual([
      "canary account delete",
      'Delete the missing canary account: apply failed: No canary account with name "missing" in the google service integration'
    ]);
  });

  it("edits canary defaults", async () => {
    const { memory, logs, run } = setup();

    await run("canary", "edit", "--default-judge", "CustomJudge", "--stages-enabled", "false");

    expect(logs).toEqual([
      "canary edit",
      "INFO default.canary: Canary analysis is disabled.",
      'Canary settings updated for "default".'
    ]);
    expect(await readDocument(memory)).toMatchObject({
      canary: { defaultJudge: "CustomJudge", stagesEnabled: false }
    });
  });

  it("refuses an edit with nothing to change", async () => {
    const { run } = setup();

    await expect(run("canary", "edit")).rejects.toMatchObject({
      name: "ValidationError",
      message: "Nothing to edit: pass at least one option."
    });
  });

  it("enables a service integration", async () => {
    const { memory, run } = setup();

    await run("canary", "integration", "enable", "prometheus");

    expect(await readDocument(memory)).toMatchObject({
      canary: {
        serviceIntegrations: expect.arrayContaining([
          { name: "prometheus", enabled: true, accounts: [] }
        ])
      }
    });
  });

  it("reports an unknown service integration as a user error", async () => {
    const { run } = setup();

    await expect(run("canary", "integration", "enable", "splunk")).rejects.toMatchObject({
      name: "CliError",
      isUserError: true,
      message:
        'apply failed: No canary service integration named "splunk" (expected one of: google, prometheus, datadog, signalfx, newrelic, aws) (changes reverted)'
    });
  });

  it("reports a missing --json-path file as a user error and leaves nothing staged", async () => {
    const { memory, run } = setup();

    await expect(
      run("canary", "account", "add", "google", "gcs", "--json-path", "missing.json")
    ).rejects.toMatchObject({
      name: "CliError",
      isUserError: true,
      message: expect.stringMatching(/^stage failed: Failed to read \/repo\/missing\.json: ENOENT/)
    });
    expect(memory.volume.existsSync(`${homeDir}/.configd/staging/default`)).toBe(false);
    expect(memory.volume.existsSync(documentPath("default"))).toBe(false);
  });

  it("cancels a task that outlives the timeout and waits for it to clean up", async () => {
    const memory = createMemoryFs({
      [`${homeDir}/.configd/config.yaml`]: "awaitTimeoutMs: 1\n",
      "/repo/key.json": '{"private_key":"placeholder"}'
    });
    const logs: string[] = [];
    const program = createProgram({
      fs: slowReads(memory.fs, deployments, 50),
      env: { cwd, homeDir, variables: {} },
      logger: (message) => logs.push(message),
      lock: noopLock,
      suppressCommanderOutput: true
    });

    await expect(
      program.parseAsync(["node", "cli", "canary", "account", "add", "google", "gcs", "--json-path", "key.json"])
    ).rejects.toMatchObject({
      name: "CliError",
      message:
        'Timed out after 1ms waiting for "Add the gcs canary account to google service integration" (task-1); it was cancelled.'
    });
    expect(memory.volume.existsSync(`${homeDir}/.configd/staging/default`)).toBe(false);
    expect(memory.volume.existsSync(documentPath("default"))).toBe(false);
    expect(memory.volume.existsSync(`${deployments}/default/canary`)).toBe(false);
  });

  it("reports unreadable settings files as user errors", async () => {
    const { run } = setup({ [`${homeDir}/.configd/config.yaml`]: "concurrency: two\n" });

    await expect(run("canary", "get")).rejects.toMatchObject({
      name: "ValidationError",
      isUserError: true,
      message: 'Invalid "concurrency": expected an integer.'
    });
  });
});

describe("parseFields", () => {
  it("parses key=value pairs and booleans", () => {
    expect(parseFields(["project=my-project", "enabled=true", "url=http://host/?a=b"])).toEqual({
      project: "my-project",
      enabled: true,
      url: "http://host/?a=b"
    });
  });

  it("rejects entries without a key or that rename the account", () => {
    expect(() => parseFields(["=value"])).toThrow('Invalid --field "=value": expected key=value.');
    expect(() => parseFields(["novalue"])).toThrow('Invalid --field "novalue": expected key=value.');
    expect(() => parseFields(["name=other"])).toThrow(
      "An account is renamed by deleting and re-adding it."
    );
  });
});
