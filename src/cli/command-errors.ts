import { formatErrorMessage } from "../core/error-format.js";
import {
  isIsolationError,
  resolveUserFacingErrorCode,
  UserFacingError,
} from "../core/errors.js";

// Wraps any command failure in a UserFacingError carrying the command's title.
export function normalizeCommandError(
  error: unknown,
  title: string,
  fallbackHint?: string,
): UserFacingError {
  if (error instanceof UserFacingError) {
    return new UserFacingError({
      code: error.code,
      title,
      message: error.message,
      hint: error.hint ?? fallbackHint,
      next: error.next,
      cause: error.cause ?? error,
    });
  }

  return new UserFacingError({
    code: resolveUserFacingErrorCode(error),
    title,
    message: formatErrorMessage(error),
    hint: resolveHint(error) ?? fallbackHint,
    cause: error,
  });
}

function resolveHint(error: unknown): string | undefined {
  if (!isIsolationError(error)) return undefined;

  switch (error.kind) {
    case "not-a-versioned-tree":
      return "Run this command inside a git repo (or run `git init` first).";
    case "snapshot-creation":
      return "Check that the repository has at least one commit and that git can write to it.";
    case "worktree-creation":
      return "Check free space and permissions of snapshot.worktree_dir.";
    case "symlink-conflict":
      return "Check snapshot.symlink_paths: entries must be relative paths inside the repo.";
    default:
      return undefined;
  }
}
