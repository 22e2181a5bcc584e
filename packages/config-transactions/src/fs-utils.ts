import type { FileSystem } from "./types.js";

/**
 * Check if an error is a "file not found" (ENOENT) error.
 */
export function isNotFound(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    error.code === "ENOENT"
  );
}

/**
 * Read a file if it exists, returning null if not found.
 */
export async function readFileIfExists(
  fs: Pick<FileSystem, "readFile">,
  target: string
): Promise<string | null> {
  try {
    return await fs.readFile(target, "utf8");
  } catch (error) {
    if (isNotFound(error)) {
      return null;
    }
    throw error;
  }
}

/**
 * Create an ISO timestamp safe for use in filenames.
 * Replaces colons and dots with dashes.
 */
export function createTimestamp(): string {
  return new Date().toISOString().replaceAll(":", "-").replaceAll(".", "-");
}
