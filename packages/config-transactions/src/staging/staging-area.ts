import path from "node:path";
import { StagingError, describeError } from "../errors.js";
import { createTimestamp, isNotFound } from "../fs-utils.js";
import type { FileSystem, Scope, WarningLogger } from "../types.js";

export interface Artifact {
  /** Human-readable name used in messages, e.g. the original file path */
  name: string;
  content: string | Uint8Array;
}

export type StagingLogger = WarningLogger;

/**
 * Handed to entities that own ancillary files so they can stage them.
 * Returns the staged path, which the entity records in its configuration entry.
 */
export interface ArtifactStager {
  readonly scope: Scope;
  stage(artifact: Artifact, destination: string): Promise<string>;
}

/** Implemented by any configuration entity that references local files. */
export interface StagesLocalFiles {
  stageLocalFiles(stager: ArtifactStager): Promise<void>;
}

/** Published artifacts of one promote, undoable until finalized. */
export interface Promotion {
  readonly published: string[];
  /** Removes the published files and puts back the files they replaced. */
  rollback(): Promise<void>;
  /** Drops the replaced files. Never throws. */
  finalize(): Promise<void>;
}

interface PublishedEntry {
  target: string;
  /** Where the file previously at `target` was moved aside */
  backup?: string;
  published: boolean;
}

export interface StagingAreaOptions {
  fs: FileSystem;
  rootDir: string;
  logger?: StagingLogger;
}

export class StagingArea {
  private readonly fs: FileSystem;
  private readonly rootDir: string;
  private readonly logger?: StagingLogger;
  private readonly staged = new Map<Scope, string[]>();

  constructor(options: StagingAreaOptions) {
    this.fs = options.fs;
    this.rootDir = path.resolve(options.rootDir);
    this.logger = options.logger;
  }

  scopeDirectory(scope: Scope): string {
    return path.join(this.rootDir, scope);
  }

  async stage(scope: Scope, artifact: Artifact, destination: string): Promise<string> {
    const target = this.resolveDestination(scope, destination);
    try {
      await this.fs.mkdir(path.dirname(target), { recursive: true });
      await this.fs.writeFile(target, artifact.content);
    } catch (error) {
      throw new StagingError(
        `Failed to stage ${artifact.name}: ${describeError(error)}`,
        { scope, destination, cause: error }
      );
    }

    const entries = this.staged.get(scope) ?? [];
    if (!entries.includes(target)) {
      entries.push(target);
    }
    this.staged.set(scope, entries);
    return target;
  }

  /**
   * With `publishDir`, the stager returns where the artifact will live once
   * promoted instead of its staged path.
   */
  stagerFor(scope: Scope, options: { publishDir?: string } = {}): ArtifactStager {
    const { publishDir } = options;
    return {
      scope,
      stage: async (artifact, destination) => {
        const staged = await this.stage(scope, artifact, destination);
        if (!publishDir) {
          return staged;
        }
        return path.join(publishDir, path.relative(this.scopeDirectory(scope), staged));
      }
    };
  }

  /**
   * Moves every artifact staged for `scope` under `targetDir`, keeping paths
   * relative to the scope's staging directory. A file already at a target is
   * moved aside until the promotion is finalized or rolled back. If any move
   * fails, the earlier ones are undone before the error is thrown.
   */
  async promote(scope: Scope, targetDir: string): Promise<Promotion> {
    const base = this.scopeDirectory(scope);
    const entries: PublishedEntry[] = [];
    for (const staged of this.staged.get(scope) ?? []) {
      const entry: PublishedEntry = {
        target: path.join(targetDir, path.relative(base, staged)),
        published: false
      };
      entries.push(entry);
      try {
        await this.fs.mkdir(path.dirname(entry.target), { recursive: true });
        if (await this.exists(entry.target)) {
          const backup = `${entry.target}.backup-${createTimestamp()}`;
          await this.fs.rename(entry.target, backup);
          entry.backup = backup;
        }
        await this.fs.rename(staged, entry.target);
        entry.published = true;
      } catch (error) {
        await this.unpublish(scope, entries).catch((rollbackError: unknown) => {
          this.logger?.warn(
            `Failed to roll back promotion for "${scope}": ${describeError(rollbackError)}`
          );
        });
        throw new StagingError(
          `Failed to promote ${staged}: ${describeError(error)}`,
          { scope, destination: entry.target, cause: error }
        );
      }
    }
    this.staged.delete(scope);

    return {
      published: entries.map((entry) => entry.target),
      rollback: () => this.unpublish(scope, entries),
      finalize: () => this.dropBackups(entries)
    };
  }

  stagedArtifacts(scope: Scope): string[] {
    return [...(this.staged.get(scope) ?? [])];
  }

  /** Removes everything staged for `scope`. Never throws. */
  async clean(scope: Scope): Promise<void> {
    const entries = this.staged.get(scope) ?? [];
    this.staged.delete(scope);

    for (const entry of entries) {
      try {
        await this.fs.rm(entry, { force: true });
      } catch (error) {
        this.logger?.warn(`Failed to remove staged file ${entry}: ${describeError(error)}`);
      }
    }

    try {
      await this.fs.rm(this.scopeDirectory(scope), { recursive: true, force: true });
    } catch (error) {
      this.logger?.warn(
        `Failed to remove staging directory for "${scope}": ${describeError(error)}`
      );
    }
  }

  private async exists(target: string): Promise<boolean> {
    try {
      await this.fs.stat(target);
      return true;
    } catch (error) {
      if (isNotFound(error)) {
        return false;
      }
      throw error;
    }
  }

  // Newest first. Throws the first failure after trying every entry.
  private async unpublish(scope: Scope, entries: PublishedEntry[]): Promise<void> {
    let failure: { target: string; error: unknown } | undefined;
    for (const entry of [...entries].reverse()) {
      try {
        if (entry.published) {
          await this.fs.rm(entry.target, { force: true });
          entry.published = false;
        }
        if (entry.backup) {
          await this.fs.rename(entry.backup, entry.target);
          entry.backup = undefined;
        }
      } catch (error) {
        failure ??= { target: entry.target, error };
      }
    }
    if (failure) {
      throw new StagingError(
        `Failed to restore ${failure.target}: ${describeError(failure.error)}`,
        { scope, destination: failure.target, cause: failure.error }
      );
    }
  }

  private async dropBackups(entries: PublishedEntry[]): Promise<void> {
    for (const entry of entries) {
      if (!entry.backup) continue;
      try {
        await this.fs.rm(entry.backup, { force: true });
        entry.backup = undefined;
      } catch (error) {
        this.logger?.warn(`Failed to remove replaced file ${entry.backup}: ${describeError(error)}`);
      }
    }
  }

  private resolveDestination(scope: Scope, destination: string): string {
    const base = this.scopeDirectory(scope);
    const target = path.resolve(base, destination);
    if (target !== base && !target.startsWith(`${base}${path.sep}`)) {
      throw new StagingError(`Staging destination escapes the staging area: ${destination}`, {
        scope,
        destination
      });
    }
    return target;
  }
}
