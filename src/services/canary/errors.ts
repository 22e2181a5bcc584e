export class ConfigNotFoundError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigNotFoundError";
  }
}

export class InvalidCanaryConfigError extends Error {
  readonly location: string;

  constructor(location: string, detail: string) {
    super(`Invalid canary settings at ${location}: ${detail}`);
    this.name = "InvalidCanaryConfigError";
    this.location = location;
  }
}
