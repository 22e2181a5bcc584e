import { PersistenceError, ScopeLockedError, describeError } from "../errors.js";
import { cloneDocument, type ConfigObject, type Scope } from "../types.js";
import type { DocumentBackend } from "./document-backend.js";

export interface WorkingCopy {
  readonly scope: Scope;
  readonly document: ConfigObject;
}

/**
 * Committed documents per scope plus at most one uncommitted working copy per
 * scope. Holding a working copy is the scope lock.
 */
export class ConfigStore {
  private readonly backend: DocumentBackend;
  private readonly committed = new Map<Scope, ConfigObject>();
  private readonly working = new Map<Scope, WorkingCopy>();
  // Scopes whose working copy is being loaded; they count as locked.
  private readonly loading = new Set<Scope>();

  constructor(backend: DocumentBackend) {
    this.backend = backend;
  }

  /** A detached copy of the committed document. */
  async load(scope: Scope): Promise<ConfigObject> {
    return cloneDocument(await this.committedDocument(scope));
  }

  async loadWorkingCopy(scope: Scope): Promise<ConfigObject> {
    if (this.isLocked(scope)) {
      throw new ScopeLockedError(scope);
    }
    this.loading.add(scope);
    try {
      const document = cloneDocument(await this.committedDocument(scope));
      this.working.set(scope, { scope, document });
      return document;
    } finally {
      this.loading.delete(scope);
    }
  }

  /** The working copy currently held for `scope`. */
  workingCopy(scope: Scope): ConfigObject {
    const copy = this.working.get(scope);
    if (!copy) {
      throw new Error(`No working copy is held for scope "${scope}"`);
    }
    return copy.document;
  }

  /** Replaces the working copy's document wholesale. */
  replaceWorkingCopy(scope: Scope, document: ConfigObject): void {
    if (!this.working.has(scope)) {
      throw new Error(`No working copy is held for scope "${scope}"`);
    }
    this.working.set(scope, { scope, document });
  }

  isLocked(scope: Scope): boolean {
    return this.working.has(scope) || this.loading.has(scope);
  }

  async commit(scope: Scope): Promise<void> {
    const copy = this.working.get(scope);
    if (!copy) {
      throw new Error(`No working copy is held for scope "${scope}"`);
    }

    const snapshot = cloneDocument(copy.document);
    try {
      await this.backend.write(scope, snapshot);
    } catch (error) {
      throw new PersistenceError(
        `Failed to save configuration for "${scope}": ${describeError(error)}`,
        { scope, cause: error }
      );
    }

    this.committed.set(scope, snapshot);
    this.working.delete(scope);
  }

  /** Drops the working copy and releases the scope. Safe to call repeatedly. */
  discard(scope: Scope): void {
    this.working.delete(scope);
  }

  private async committedDocument(scope: Scope): Promise<ConfigObject> {
    const cached = this.committed.get(scope);
    if (cached) {
      return cached;
    }
    const document = await this.backend.read(scope);
    this.committed.set(scope, document);
    return document;
  }
}
