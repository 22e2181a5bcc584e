import { ProblemReport } from "../problems/problem-report.js";
import type { ConfigStore } from "../store/config-store.js";
import {
  cloneDocument,
  isConfigObject,
  type ConfigObject,
  type ConfigValue,
  type Scope
} from "../types.js";

/** A dotted path such as "canary.enabled", or its segments. */
export type FieldPath = string | readonly string[];

export type Validator = (
  document: ConfigObject,
  scope: Scope
) => ProblemReport | Promise<ProblemReport>;

/**
 * Reads and writes a scope's document. Writes require the scope's working
 * copy to be held, which is what `stage` of a config edit acquires.
 */
export interface ConfigService {
  get(scope: Scope): Promise<ConfigObject>;
  validate(scope: Scope): Promise<ProblemReport>;
  set(scope: Scope, document: ConfigObject): Promise<void>;
  setField(scope: Scope, path: FieldPath, value: ConfigValue): Promise<void>;
  /** Returns false when nothing was at `path`. */
  delete(scope: Scope, path: FieldPath): Promise<boolean>;
}

export function toSegments(path: FieldPath): string[] {
  const segments = typeof path === "string" ? path.split(".") : [...path];
  if (segments.length === 0 || segments.some((segment) => segment.length === 0)) {
    throw new Error(`Invalid field path "${typeof path === "string" ? path : path.join(".")}"`);
  }
  return segments;
}

export function getField(document: ConfigObject, path: FieldPath): ConfigValue | undefined {
  let current: ConfigValue | undefined = document;
  for (const segment of toSegments(path)) {
    if (!isConfigObject(current)) {
      return undefined;
    }
    current = current[segment];
  }
  return current;
}

export function createDocumentService(
  store: ConfigStore,
  validator?: Validator
): ConfigService {
  const read = async (scope: Scope): Promise<ConfigObject> =>
    store.isLocked(scope) ? store.workingCopy(scope) : store.load(scope);

  return {
    async get(scope) {
      return cloneDocument(await read(scope));
    },

    async validate(scope) {
      if (!validator) {
        return ProblemReport.EMPTY;
      }
      return validator(await read(scope), scope);
    },

    async set(scope, document) {
      store.replaceWorkingCopy(scope, cloneDocument(document));
    },

    async setField(scope, path, value) {
      const segments = toSegments(path);
      const key = segments[segments.length - 1];
      let parent = store.workingCopy(scope);
      for (const segment of segments.slice(0, -1)) {
        const next = parent[segment];
        if (next === undefined || next === null) {
          const created: ConfigObject = {};
          parent[segment] = created;
          parent = created;
          continue;
        }
        if (!isConfigObject(next)) {
          throw new Error(`Cannot set "${segments.join(".")}": "${segment}" is not a mapping`);
        }
        parent = next;
      }
      parent[key] = cloneDocument(value);
    },

    async delete(scope, path) {
      const segments = toSegments(path);
      const key = segments[segments.length - 1];
      const document = store.workingCopy(scope);
      const parent = segments.length === 1 ? document : getField(document, segments.slice(0, -1));
      if (!isConfigObject(parent) || !(key in parent)) {
        return false;
      }
      delete parent[key];
      return true;
    }
  };
}
