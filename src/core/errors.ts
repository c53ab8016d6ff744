export class SnapjobsError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = "SnapjobsError";
  }
}

export class ConfigError extends SnapjobsError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ConfigError";
  }
}

export class GitError extends SnapjobsError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "GitError";
  }
}

// =============================================================================
// ISOLATION
// =============================================================================

export type IsolationErrorKind =
  | "not-a-versioned-tree"
  | "snapshot-creation"
  | "worktree-creation"
  | "symlink-conflict"
  | "push"
  | "cleanup";

export class IsolationError extends SnapjobsError {
  constructor(
    message: string,
    public readonly kind: IsolationErrorKind,
    cause?: unknown,
  ) {
    super(message, cause);
    this.name = "IsolationError";
  }
}

export class NotAVersionedTreeError extends IsolationError {
  constructor(public readonly startDir: string, cause?: unknown) {
    super(
      `No git repository found in ${startDir} or its parent directories.`,
      "not-a-versioned-tree",
      cause,
    );
    this.name = "NotAVersionedTreeError";
  }
}

export class SnapshotCreationError extends IsolationError {
  constructor(message: string, cause?: unknown) {
    super(message, "snapshot-creation", cause);
    this.name = "SnapshotCreationError";
  }
}

export class WorktreeCreationError extends IsolationError {
  constructor(message: string, cause?: unknown) {
    super(message, "worktree-creation", cause);
    this.name = "WorktreeCreationError";
  }
}

export class SymlinkConflictError extends IsolationError {
  constructor(
    message: string,
    public readonly relativePath: string,
    cause?: unknown,
  ) {
    super(message, "symlink-conflict", cause);
    this.name = "SymlinkConflictError";
  }
}

export class PushError extends IsolationError {
  constructor(message: string, cause?: unknown) {
    super(message, "push", cause);
    this.name = "PushError";
  }
}

export class CleanupError extends IsolationError {
  constructor(message: string, cause?: unknown) {
    super(message, "cleanup", cause);
    this.name = "CleanupError";
  }
}

export function isIsolationError(error: unknown): error is IsolationError {
  return error instanceof IsolationError;
}

// =============================================================================
// EXECUTION
// =============================================================================

export class ContextSwitchError extends SnapjobsError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ContextSwitchError";
  }
}

export class JobCancelledError extends SnapjobsError {
  constructor(public readonly jobId: string, cause?: unknown) {
    super(`Job ${jobId} was cancelled.`, cause);
    this.name = "JobCancelledError";
  }
}

// =============================================================================
// USER-FACING ERRORS
// =============================================================================

export const USER_FACING_ERROR_CODES = {
  config: "CONFIG_ERROR",
  git: "GIT_ERROR",
  isolation: "ISOLATION_ERROR",
  task: "TASK_ERROR",
  unknown: "UNKNOWN_ERROR",
} as const;

export type UserFacingErrorCode =
  (typeof USER_FACING_ERROR_CODES)[keyof typeof USER_FACING_ERROR_CODES];

export type UserFacingErrorInput = {
  code: UserFacingErrorCode;
  title: string;
  message: string;
  hint?: string;
  next?: string;
  cause?: unknown;
};

export class UserFacingError extends SnapjobsError {
  readonly code: UserFacingErrorCode;
  readonly title: string;
  readonly hint?: string;
  readonly next?: string;

  constructor(input: UserFacingErrorInput) {
    super(input.message, input.cause);
    this.name = "UserFacingError";
    this.code = input.code;
    this.title = input.title;
    this.hint = input.hint;
    this.next = input.next;
  }
}

export function resolveUserFacingErrorCode(error: unknown): UserFacingErrorCode {
  if (error instanceof UserFacingError) return error.code;
  if (error instanceof ConfigError) return USER_FACING_ERROR_CODES.config;
  if (error instanceof IsolationError) return USER_FACING_ERROR_CODES.isolation;
  if (error instanceof GitError) return USER_FACING_ERROR_CODES.git;
  return USER_FACING_ERROR_CODES.unknown;
}
