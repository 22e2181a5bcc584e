import path from "node:path";
import * as fsPromises from "node:fs/promises";
import lockfile from "proper-lockfile";
import YAML from "yaml";
import { createTimestamp, readFileIfExists } from "../fs-utils.js";
import {
  cloneDocument,
  isConfigObject,
  type ConfigObject,
  type FileSystem,
  type Scope
} from "../types.js";

/**
 * Durable storage behind a ConfigStore. One document per scope.
 */
export interface DocumentBackend {
  /** Returns the stored document, or `{}` when nothing has been stored yet. */
  read(scope: Scope): Promise<ConfigObject>;
  write(scope: Scope, document: ConfigObject): Promise<void>;
}

export type LockRelease = () => Promise<void>;
export type LockFn = (path: string) => Promise<LockRelease>;

export interface FileDocumentBackendOptions {
  rootDir: string;
  fs?: FileSystem;
  /** Cross-process lock around each write; defaults to proper-lockfile. */
  lock?: LockFn;
  fileName?: string;
}

const DEFAULT_FILE_NAME = "config.yaml";

async function lockDocumentFile(target: string): Promise<LockRelease> {
  const release = await lockfile.lock(target, {
    realpath: false,
    retries: {
      retries: 20,
      minTimeout: 25,
      maxTimeout: 250
    }
  });
  return async () => {
    await release();
  };
}

function serializeDocument(document: ConfigObject): string {
  const yaml = YAML.stringify(document, { lineWidth: 0 });
  return yaml.endsWith("\n") ? yaml : `${yaml}\n`;
}

function parseDocument(raw: string, source: string): ConfigObject {
  if (raw.trim() === "") {
    return {};
  }
  const parsed: unknown = YAML.parse(raw);
  if (parsed == null) {
    return {};
  }
  if (!isConfigObject(parsed)) {
    throw new Error(`Invalid configuration document at ${source}: expected a mapping.`);
  }
  return parsed;
}

/**
 * Stores each scope as YAML at `<rootDir>/<scope>/config.yaml`. Writes go to a
 * temp file first and are renamed over the target.
 */
export function createFileDocumentBackend(
  options: FileDocumentBackendOptions
): DocumentBackend {
  const fs = options.fs ?? (fsPromises as unknown as FileSystem);
  const lock = options.lock ?? lockDocumentFile;
  const fileName = options.fileName ?? DEFAULT_FILE_NAME;

  const documentPath = (scope: Scope): string =>
    path.join(options.rootDir, scope, fileName);

  return {
    async read(scope) {
      const target = documentPath(scope);
      const raw = await readFileIfExists(fs, target);
      return raw === null ? {} : parseDocument(raw, target);
    },

    async write(scope, document) {
      const target = documentPath(scope);
      await fs.mkdir(path.dirname(target), { recursive: true });

      const release = await lock(target);
      try {
        const temp = `${target}.tmp-${createTimestamp()}`;
        await fs.writeFile(temp, serializeDocument(document), { encoding: "utf8" });
        await fs.rename(temp, target);
      } finally {
        await release();
      }
    }
  };
}

export interface MemoryDocumentBackend extends DocumentBackend {
  /** Last written document per scope */
  readonly documents: Map<Scope, ConfigObject>;
}

export function createMemoryDocumentBackend(
  initial: Record<Scope, ConfigObject> = {}
): MemoryDocumentBackend {
  const documents = new Map<Scope, ConfigObject>(
    Object.entries(initial).map(([scope, document]) => [scope, cloneDocument(document)])
  );

  return {
    documents,
    async read(scope) {
      const document = documents.get(scope);
      return document ? cloneDocument(document) : {};
    },
    async write(scope, document) {
      documents.set(scope, cloneDocument(document));
    }
  };
}
