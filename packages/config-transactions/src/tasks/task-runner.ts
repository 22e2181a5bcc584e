import { LRUCache } from "lru-cache";
import { TaskNotFoundError } from "../errors.js";
import { notifyObserver, processWarnings } from "../observers.js";
import type { MutationTransaction } from "../transaction/mutation-transaction.js";
import type { Scope, WarningLogger } from "../types.js";
import {
  isTerminalStatus,
  type TaskHandle,
  type TaskResult,
  type TaskRunnerObservers,
  type TaskRunnerOptions,
  type TaskSnapshot,
  type TaskStatus,
  type TaskTimeout
} from "./types.js";

interface TaskRecord<T> {
  readonly id: string;
  readonly description: string;
  readonly scope: Scope;
  readonly transaction: MutationTransaction<T>;
  readonly createdAt: Date;
  readonly done: Promise<void>;
  readonly markDone: () => void;
  status: TaskStatus;
  result?: TaskResult<T>;
  startedAt?: Date;
  completedAt?: Date;
}

const DEFAULT_CONCURRENCY = 4;
const DEFAULT_RETENTION_MS = 10 * 60 * 1000;
const DEFAULT_MAX_RETAINED = 1000;

/**
 * Runs transactions on a bounded pool. Tasks on the same scope start in
 * submission order and never overlap; tasks on different scopes run side by side.
 */
export class TaskRunner {
  private readonly concurrency: number;
  private readonly observers?: TaskRunnerObservers;
  private readonly logger: WarningLogger;
  private readonly createId: () => string;
  private readonly now: () => Date;
  private readonly pending: TaskRecord<unknown>[] = [];
  private readonly active = new Map<string, TaskRecord<unknown>>();
  private readonly finished: LRUCache<string, TaskRecord<unknown>>;
  private readonly busyScopes = new Set<Scope>();
  private running = 0;
  private sequence = 0;

  constructor(options: TaskRunnerOptions = {}) {
    this.concurrency = Math.max(1, options.concurrency ?? DEFAULT_CONCURRENCY);
    this.observers = options.observers;
    this.logger = options.logger ?? processWarnings;
    this.createId = options.createId ?? (() => `task-${++this.sequence}`);
    this.now = options.now ?? (() => new Date());
    this.finished = new LRUCache<string, TaskRecord<unknown>>({
      max: options.maxRetained ?? DEFAULT_MAX_RETAINED,
      ttl: options.retentionMs ?? DEFAULT_RETENTION_MS
    });
  }

  submit<T>(
    transaction: MutationTransaction<T>,
    description: string,
    options: { scope: Scope }
  ): TaskHandle<T> {
    let markDone: () => void = () => undefined;
    const done = new Promise<void>((resolve) => {
      markDone = resolve;
    });
    const record: TaskRecord<T> = {
      id: this.createId(),
      description,
      scope: options.scope,
      transaction,
      createdAt: this.now(),
      done,
      markDone,
      status: "PENDING"
    };

    this.active.set(record.id, record);
    this.pending.push(record);
    // Start on a later tick so the caller always gets the task back in PENDING.
    queueMicrotask(() => this.schedule());

    return this.handleFor(record);
  }

  poll(taskId: string): TaskSnapshot {
    return snapshot(this.lookup(taskId));
  }

  async await(taskId: string, timeoutMs: number): Promise<TaskSnapshot | TaskTimeout> {
    return this.waitFor(this.lookup(taskId), timeoutMs);
  }

  /**
   * Requests cancellation. Returns true if the request can still take effect:
   * the task has not reached the persist/revert decision. A pending task keeps
   * its place in the queue and, when its turn comes, only runs `clean`.
   */
  cancel(taskId: string): boolean {
    const record = this.lookup(taskId);
    if (isTerminalStatus(record.status)) {
      return false;
    }
    return record.transaction.requestCancel();
  }

  /** Forgets a finished task. Returns false if it is still pending or running. */
  release(taskId: string): boolean {
    if (this.active.has(taskId)) {
      return false;
    }
    return this.finished.delete(taskId);
  }

  /** Resolves once nothing is pending or running. */
  async drain(): Promise<void> {
    while (this.active.size > 0) {
      await Promise.all([...this.active.values()].map((record) => record.done));
    }
  }

  get size(): { pending: number; running: number; retained: number } {
    return { pending: this.pending.length, running: this.running, retained: this.finished.size };
  }

  private handleFor<T>(record: TaskRecord<T>): TaskHandle<T> {
    return {
      id: record.id,
      description: record.description,
      scope: record.scope,
      poll: () => {
        this.lookup(record.id);
        return snapshot(record);
      },
      await: (timeoutMs) => {
        this.lookup(record.id);
        return this.waitFor(record, timeoutMs);
      },
      cancel: () => this.cancel(record.id)
    };
  }

  private lookup(taskId: string): TaskRecord<unknown> {
    const record = this.active.get(taskId) ?? this.finished.get(taskId);
    if (!record) {
      throw new TaskNotFoundError(taskId);
    }
    return record;
  }

  private async waitFor<T>(
    record: TaskRecord<T>,
    timeoutMs: number
  ): Promise<TaskSnapshot<T> | TaskTimeout<T>> {
    if (isTerminalStatus(record.status)) {
      return snapshot(record);
    }

    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<true>((resolve) => {
      timer = setTimeout(() => resolve(true), Math.max(0, timeoutMs));
    });
    try {
      const expired = await Promise.race([record.done.then(() => false), timedOut]);
      if (expired) {
        return { status: "TIMEOUT", task: snapshot(record) };
      }
      return snapshot(record);
    } finally {
      clearTimeout(timer);
    }
  }

  private schedule(): void {
    const blocked = new Set<Scope>();
    let index = 0;
    while (index < this.pending.length && this.running < this.concurrency) {
      const record = this.pending[index];
      if (this.busyScopes.has(record.scope) || blocked.has(record.scope)) {
        // Later tasks on this scope must wait behind this one.
        blocked.add(record.scope);
        index++;
        continue;
      }
      this.pending.splice(index, 1);
      this.start(record);
    }
  }

  private start(record: TaskRecord<unknown>): void {
    this.running++;
    this.busyScopes.add(record.scope);
    record.status = "RUNNING";
    record.startedAt = this.now();
    notifyObserver(this.logger, "onTaskStart", () => this.observers?.onTaskStart?.(snapshot(record)));

    void this.execute(record);
  }

  private async execute(record: TaskRecord<unknown>): Promise<void> {
    let result: TaskResult;
    try {
      result = await record.transaction.run();
    } catch (error) {
      result = { status: "crashed", error };
    }

    this.running--;
    this.busyScopes.delete(record.scope);
    try {
      this.complete(record, result);
    } finally {
      this.schedule();
    }
  }

  private complete(record: TaskRecord<unknown>, result: TaskResult): void {
    record.result = result;
    record.status = statusFor(result);
    record.completedAt = this.now();
    this.active.delete(record.id);
    this.finished.set(record.id, record);
    record.markDone();
    notifyObserver(this.logger, "onTaskComplete", () =>
      this.observers?.onTaskComplete?.(snapshot(record))
    );
  }
}

function statusFor(result: TaskResult): TaskStatus {
  switch (result.status) {
    case "persisted":
    case "rejected":
      return "SUCCEEDED";
    case "cancelled":
      return "CANCELLED";
    case "failed":
    case "crashed":
      return "FAILED";
  }
}

function snapshot<T>(record: TaskRecord<T>): TaskSnapshot<T> {
  return {
    id: record.id,
    description: record.description,
    scope: record.scope,
    status: record.status,
    transactionState: record.transaction.state,
    result: record.result,
    createdAt: record.createdAt,
    startedAt: record.startedAt,
    completedAt: record.completedAt
  };
}
