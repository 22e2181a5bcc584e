export type OutputFormat = "terminal" | "markdown" | "json";

const FORMATS: readonly OutputFormat[] = ["terminal", "markdown", "json"];

let cached: OutputFormat | undefined;

export function resolveOutputFormat(
  env: Record<string, string | undefined> = process.env
): OutputFormat {
  if (cached) {
    return cached;
  }
  const raw = env.OUTPUT_FORMAT?.toLowerCase();
  cached = FORMATS.find((format) => format === raw) ?? "terminal";
  return cached;
}

export function resetOutputFormatCache(): void {
  cached = undefined;
}
