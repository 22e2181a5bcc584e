import type { ProblemReport } from "../problems/problem-report.js";
import type { Severity, ThresholdMode } from "../problems/severity.js";
import type { Promotion, StagingArea, StagesLocalFiles } from "../staging/staging-area.js";
import type { ConfigStore } from "../store/config-store.js";
import { MutationTransaction } from "../transaction/mutation-transaction.js";
import type { TransactionObservers, TransactionOptions } from "../transaction/types.js";
import type { Scope, WarningLogger } from "../types.js";

/** Threshold settings a caller attaches to each edit or read. */
export interface ValidationSettings {
  severity: Severity;
  validate: boolean;
  thresholdMode?: ThresholdMode;
}

interface ScopedTransactionOptions {
  store: ConfigStore;
  scope: Scope;
  label: string;
  settings: ValidationSettings;
  validate?: () => ProblemReport | Promise<ProblemReport>;
  observers?: TransactionObservers;
  logger?: WarningLogger;
}

export interface ConfigEditOptions<T> extends ScopedTransactionOptions {
  staging: StagingArea;
  /** Changes the working copy; its return value becomes the outcome's value */
  update: () => T | Promise<T>;
  /** Entities whose local files are staged before `update` runs */
  artifacts?: readonly StagesLocalFiles[];
  /** Where staged artifacts are moved when the edit persists */
  publishDir?: string;
}

export type ConfigReadOptions<T> = ScopedTransactionOptions & {
  read: () => T | Promise<T>;
};

/**
 * Builds the transaction every configuration edit shares: lock and stage,
 * apply `update`, validate the working copy, then commit or roll back.
 */
export function createConfigEdit<T>(options: ConfigEditOptions<T>): MutationTransaction<T> {
  const { store, staging, scope, publishDir } = options;
  const lease = createLease(store, scope);
  let promotion: Promotion | undefined;

  return new MutationTransaction<T>(
    {
      stage: async () => {
        await lease.acquire();
        const stager = staging.stagerFor(scope, { publishDir });
        for (const entity of options.artifacts ?? []) {
          await entity.stageLocalFiles(stager);
        }
      },
      apply: options.update,
      validate: options.validate,
      revert: async () => {
        const published = promotion;
        promotion = undefined;
        try {
          await published?.rollback();
        } finally {
          await lease.reset();
        }
      },
      persist: async () => {
        if (publishDir) {
          promotion = await staging.promote(scope, publishDir);
        }
        await lease.commit();
        await promotion?.finalize();
      },
      clean: async () => {
        if (!lease.acquired) {
          return;
        }
        await staging.clean(scope);
        lease.release();
      }
    },
    transactionOptions(options)
  );
}

/**
 * A read that takes the scope lock like an edit so that it observes a
 * consistent document. Nothing is ever written.
 */
export function createConfigRead<T>(options: ConfigReadOptions<T>): MutationTransaction<T> {
  const lease = createLease(options.store, options.scope);

  return new MutationTransaction<T>(
    {
      stage: () => lease.acquire(),
      apply: options.read,
      validate: options.validate,
      revert: () => undefined,
      persist: () => undefined,
      clean: () => lease.release()
    },
    transactionOptions(options)
  );
}

interface Lease {
  /** True once this transaction has taken the working copy, even after committing it */
  readonly acquired: boolean;
  acquire(): Promise<void>;
  reset(): Promise<void>;
  commit(): Promise<void>;
  release(): void;
}

function createLease(store: ConfigStore, scope: Scope): Lease {
  let acquired = false;
  let held = false;
  return {
    get acquired() {
      return acquired;
    },
    async acquire() {
      await store.loadWorkingCopy(scope);
      acquired = true;
      held = true;
    },
    // Keeps the lock; clean releases it.
    async reset() {
      if (held) {
        store.replaceWorkingCopy(scope, await store.load(scope));
      }
    },
    async commit() {
      await store.commit(scope);
      held = false;
    },
    release() {
      if (held) {
        store.discard(scope);
        held = false;
      }
    }
  };
}

function transactionOptions(options: ScopedTransactionOptions): TransactionOptions {
  return {
    label: options.label,
    severity: options.settings.severity,
    validate: options.settings.validate,
    thresholdMode: options.settings.thresholdMode,
    observers: options.observers,
    logger: options.logger
  };
}
