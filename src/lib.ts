// Public library surface for schedulers embedding snapshot isolation.

export { locateRepository, createRepositoryLocator, findRepoRoot } from "./git/repo-locator.js";
export { withRepoLock } from "./git/repo-lock.js";
export { listBranches, type BranchSummary } from "./git/git.js";

export {
  createRevision,
  publishRevision,
  type CreateRevisionOptions,
  type RevisionRecord,
} from "./core/snapshot.js";
export {
  provision,
  validateRedirectPath,
  type CheckoutStrategy,
  type IsolatedView,
  type ProvisionOptions,
  type Redirect,
} from "./core/isolation.js";
export {
  ExecutionContextGuard,
  type ContextMode,
  type ExecutionContext,
  type ProcessDirectory,
  type Task,
  type TaskContext,
} from "./core/execution-context.js";
export {
  buildStaleViewPlan,
  executeStaleViewPlan,
  release,
  type ReleasableView,
  type StaleViewPlan,
} from "./core/cleanup.js";

export {
  launchBatch,
  type BatchResult,
  type JobIsolation,
  type JobResult,
  type JobStatus,
  type LaunchBatchOptions,
} from "./app/launcher/batch-launcher.js";
export {
  createExecutionBackend,
  InProcessBackend,
  LocalProcessBackend,
  SlurmBackend,
  type CommandJob,
  type ExecutionBackend,
  type FunctionJob,
  type JobHandle,
  type JobOutcome,
  type JobSpec,
} from "./app/launcher/backends/index.js";

export {
  defaultConfig,
  type LauncherConfig,
  type SnapjobsConfig,
  type SnapshotConfig,
} from "./core/config.js";
export { loadConfigFile, parseConfigDocument } from "./core/config-loader.js";
export { resolveConfig, initRepoConfig } from "./core/config-discovery.js";
export { createPathsContext, type PathsContext } from "./core/paths.js";
export { JsonlLogger, MemoryLogger, type EventLogger, type LogEvent } from "./core/logger.js";

export {
  CleanupError,
  ConfigError,
  ContextSwitchError,
  GitError,
  IsolationError,
  isIsolationError,
  JobCancelledError,
  NotAVersionedTreeError,
  PushError,
  SnapjobsError,
  SnapshotCreationError,
  SymlinkConflictError,
  UserFacingError,
  WorktreeCreationError,
  type IsolationErrorKind,
} from "./core/errors.js";
