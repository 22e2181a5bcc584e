import { Command, CommanderError } from "commander";
import { createRequire } from "node:module";
import { createCliContainer, type CliContainer, type CliDependencies } from "./container.js";
import { registerCanaryCommand } from "./commands/canary.js";
import { DEFAULT_DEPLOYMENT } from "./commands/shared.js";
import { SilentError } from "./errors.js";

const require = createRequire(import.meta.url);
const packageJson = require("../../package.json") as { version: string };

export function createProgram(dependencies: CliDependencies): Command {
  const container = createCliContainer(dependencies);
  const program = bootstrapProgram(container);

  if (dependencies.exitOverride ?? true) {
    applyExitOverride(program);
  }

  if (dependencies.suppressCommanderOutput) {
    suppressCommanderOutput(program);
  }

  return program;
}

function bootstrapProgram(container: CliContainer): Command {
  const program = new Command();
  program
    .name("configd")
    .description("Edit deployment configuration through validated transactions.")
    .version(packageJson.version, "-V, --version", "Output the version number")
    .option("-d, --deployment <name>", `Deployment to work on (default: "${DEFAULT_DEPLOYMENT}")`)
    .option("--severity <level>", "Block edits whose problems exceed this severity")
    .option("--no-validate", "Skip validation before saving")
    .option("--verbose", "Show verbose logs")
    .helpOption("-h, --help", "Display help for command");

  registerCanaryCommand(program, container);

  program.action(() => {
    program.outputHelp();
  });

  return program;
}

export type { CliDependencies };

/** Help and version exits pass through; usage errors have been printed already. */
function applyExitOverride(command: Command): void {
  command.exitOverride((error: CommanderError) => {
    if (error.exitCode === 0) {
      throw error;
    }
    throw new SilentError(error.message);
  });
  for (const child of command.commands) {
    applyExitOverride(child);
  }
}

function suppressCommanderOutput(command: Command): void {
  command.configureOutput({
    writeOut: () => {},
    writeErr: () => {}
  });
  for (const child of command.commands) {
    suppressCommanderOutput(child);
  }
}
