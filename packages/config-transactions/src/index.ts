// Types
export type {
  ConfigPrimitive,
  ConfigValue,
  ConfigObject,
  ConfigArray,
  Scope,
  FileSystem,
  WarningLogger
} from "./types.js";
export { notifyObserver, processWarnings } from "./observers.js";
export { isConfigObject, cloneDocument } from "./types.js";

// Errors
export {
  ScopeLockedError,
  StagingError,
  PersistenceError,
  InvalidSeverityError,
  TaskNotFoundError,
  TransactionFailedError,
  describeError
} from "./errors.js";
export type { TransactionStep, RevertStatus } from "./errors.js";

// Problems
export {
  SEVERITIES,
  compareSeverity,
  maxSeverity,
  isSeverity,
  parseSeverity,
  isThresholdMode
} from "./problems/severity.js";
export type { Severity, ThresholdMode } from "./problems/severity.js";
export { ProblemReport, ProblemReportBuilder } from "./problems/problem-report.js";
export type { Problem } from "./problems/problem-report.js";

// Store
export { ConfigStore } from "./store/config-store.js";
export type { WorkingCopy } from "./store/config-store.js";
export {
  createFileDocumentBackend,
  createMemoryDocumentBackend
} from "./store/document-backend.js";
export type {
  DocumentBackend,
  FileDocumentBackendOptions,
  LockFn,
  LockRelease,
  MemoryDocumentBackend
} from "./store/document-backend.js";
export { isNotFound, readFileIfExists } from "./fs-utils.js";

// Staging
export { StagingArea } from "./staging/staging-area.js";
export type {
  Artifact,
  ArtifactStager,
  Promotion,
  StagesLocalFiles,
  StagingAreaOptions,
  StagingLogger
} from "./staging/staging-area.js";

// Transactions
export { MutationTransaction } from "./transaction/mutation-transaction.js";
export type {
  MutationSteps,
  Step,
  StepErrorEvent,
  TransactionObservers,
  TransactionOptions,
  TransactionOutcome,
  TransactionState,
  TransitionEvent
} from "./transaction/types.js";

// Tasks
export { TaskRunner } from "./tasks/task-runner.js";
export { isTerminalStatus } from "./tasks/types.js";
export type {
  TaskHandle,
  TaskResult,
  TaskRunnerObservers,
  TaskRunnerOptions,
  TaskSnapshot,
  TaskStatus,
  TaskTimeout
} from "./tasks/types.js";

// Edits
export {
  createDocumentService,
  getField,
  toSegments
} from "./edits/document-service.js";
export type { ConfigService, FieldPath, Validator } from "./edits/document-service.js";
export { createConfigEdit, createConfigRead } from "./edits/config-edit.js";
export type {
  ConfigEditOptions,
  ConfigReadOptions,
  ValidationSettings
} from "./edits/config-edit.js";
