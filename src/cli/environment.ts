import path from "node:path";

export interface CliEnvironmentInit {
  cwd: string;
  homeDir: string;
  variables?: Record<string, string | undefined>;
}

export interface CliEnvironment {
  readonly cwd: string;
  readonly homeDir: string;
  /** `CONFIGD_HOME`, or `~/.configd` */
  readonly configHome: string;
  readonly logDir: string;
  readonly variables: Record<string, string | undefined>;
}

export function createCliEnvironment(init: CliEnvironmentInit): CliEnvironment {
  const variables = init.variables ?? process.env;
  const configHome = resolveConfigHome(init.homeDir, variables);

  return {
    cwd: init.cwd,
    homeDir: init.homeDir,
    configHome,
    logDir: resolveLogDir(configHome),
    variables
  };
}

export function resolveConfigHome(
  homeDir: string,
  variables: Record<string, string | undefined>
): string {
  const override = variables.CONFIGD_HOME?.trim();
  if (override) {
    return path.resolve(homeDir, override);
  }
  return path.join(homeDir, ".configd");
}

export function resolveLogDir(configHome: string): string {
  return path.join(configHome, "logs");
}
