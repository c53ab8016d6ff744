/**
 * SnapshotManager: captures the full state of a working tree into a named revision branch.
 *
 * The capture happens in a throwaway worktree, so the user's HEAD, index and files are
 * only read. Tracked, staged, unstaged and untracked (non-ignored) files all end up in
 * the revision. The branch survives; the throwaway worktree never does.
 */

import type { Stats } from "node:fs";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import fse from "fs-extra";

import {
  branchExists,
  commitAll,
  currentBranch,
  deleteLocalBranch,
  git,
  gitErrorOutput,
  hasStagedChanges,
  headSha,
  listTrackedFiles,
  listWorkingTreeFiles,
  pushBranch,
} from "../git/git.js";
import { locateRepository } from "../git/repo-locator.js";
import { withRepoLock } from "../git/repo-lock.js";
import { removeWorktree } from "../git/worktrees.js";

import { formatErrorMessage } from "./error-format.js";
import {
  NotAVersionedTreeError,
  PushError,
  SnapshotCreationError,
} from "./errors.js";
import { logBatchEvent, logIsolationEvent, NOOP_LOGGER, type EventLogger } from "./logger.js";
import { compactTimestamp } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type RevisionRecord = {
  /** Branch name; unique within the originating repository. */
  id: string;
  /** HEAD of the originating tree when the capture started. */
  baseCommit: string;
  /** Head of the revision branch; equals baseCommit when the tree had no changes. */
  commit: string;
  sourceBranch: string;
  treeRoot: string;
  createdAt: string;
  published: boolean;
};

export type CreateRevisionOptions = {
  push?: boolean;
  remote?: string;
  logger?: EventLogger;
  now?: () => Date;
  /** Parent directory for the throwaway worktree (defaults to the OS temp dir). */
  tempDir?: string;
};

const MAX_NAME_ATTEMPTS = 20;
const COPY_CHUNK_SIZE = 64;

// =============================================================================
// PUBLIC API
// =============================================================================

export async function createRevision(
  treeRoot: string,
  namePrefix: string,
  options: CreateRevisionOptions = {},
): Promise<RevisionRecord> {
  const logger = options.logger ?? NOOP_LOGGER;
  const root = locateRepository(treeRoot);
  const createdAt = (options.now ?? (() => new Date()))();
  const timestamp = compactTimestamp(createdAt);

  let baseCommit: string;
  let sourceBranch: string;
  try {
    [baseCommit, sourceBranch] = await Promise.all([headSha(root), currentBranch(root)]);
  } catch (err) {
    throw new SnapshotCreationError(
      `Cannot read HEAD of ${root}; the repository needs at least one commit.`,
      err,
    );
  }

  let scratchDir: string;
  try {
    scratchDir = await fs.mkdtemp(path.join(options.tempDir ?? os.tmpdir(), "snapjobs-snapshot-"));
  } catch (err) {
    throw new SnapshotCreationError(`Cannot create a scratch directory for the snapshot.`, err);
  }
  const worktreePath = path.join(scratchDir, `snapshot-${timestamp}`);

  let branch: string | null = null;
  let commit: string;
  try {
    branch = await addSnapshotWorktree(root, worktreePath, namePrefix, createdAt);
    logBatchEvent(logger, "snapshot.worktree_added", { branch, worktree: worktreePath });

    const copied = await mirrorWorkingTree(root, worktreePath);
    await git(worktreePath, ["add", "-A"]);

    const changed = await hasStagedChanges(worktreePath);
    if (changed) {
      await commitAll(worktreePath, `Snapshot ${timestamp}`);
    }

    commit = await headSha(worktreePath);
    logBatchEvent(logger, "snapshot.captured", {
      branch,
      commit,
      files: copied,
      changed,
    });
  } catch (err) {
    if (branch) {
      await discardBranch(root, worktreePath, branch, logger);
    }
    await fse.remove(scratchDir);
    if (err instanceof SnapshotCreationError || err instanceof NotAVersionedTreeError) {
      throw err;
    }
    throw new SnapshotCreationError(
      `Failed to capture the working tree of ${root}: ${formatErrorMessage(err)}`,
      err,
    );
  }

  await disposeScratchWorktree(root, worktreePath, scratchDir, logger);

  const revision: RevisionRecord = {
    id: branch,
    baseCommit,
    commit,
    sourceBranch,
    treeRoot: root,
    createdAt: createdAt.toISOString(),
    published: false,
  };

  logBatchEvent(logger, "snapshot.created", {
    revision: revision.id,
    commit: revision.commit,
    base_commit: revision.baseCommit,
    source_branch: revision.sourceBranch,
  });

  if (options.push ?? false) {
    revision.published = await publishRevision(revision, options.remote ?? "origin", logger);
  }

  return revision;
}

/**
 * Pushes the revision branch. Failure is reported, never thrown: the local branch stays usable.
 */
export async function publishRevision(
  revision: RevisionRecord,
  remote: string,
  logger: EventLogger = NOOP_LOGGER,
): Promise<boolean> {
  try {
    await pushBranch(revision.treeRoot, remote, revision.id);
    logBatchEvent(logger, "snapshot.pushed", { revision: revision.id, remote });
    return true;
  } catch (err) {
    const { stderr } = gitErrorOutput(err);
    const detail = stderr.trim() || formatErrorMessage(err);
    const pushError = new PushError(
      `Could not push snapshot branch '${revision.id}' to ${remote}. The branch was created locally but won't be accessible to other machines. ${detail}`,
      err,
    );
    logIsolationEvent(logger, "push_failed", pushError, { revision: revision.id, remote });
    console.warn(`Warning: ${pushError.message}`);
    return false;
  }
}

// =============================================================================
// BRANCH NAMING
// =============================================================================

export function revisionNameCandidates(prefix: string, createdAt: Date): string[] {
  const base = `${prefix}-${compactTimestamp(createdAt)}`;
  const millis = String(createdAt.getUTCMilliseconds()).padStart(3, "0");
  const fine = `${base}-${millis}`;

  const candidates = [base, fine];
  for (let n = 1; candidates.length < MAX_NAME_ATTEMPTS; n += 1) {
    candidates.push(`${fine}-${n}`);
  }
  return candidates;
}

async function addSnapshotWorktree(
  root: string,
  worktreePath: string,
  prefix: string,
  createdAt: Date,
): Promise<string> {
  return withRepoLock(root, async () => {
    for (const candidate of revisionNameCandidates(prefix, createdAt)) {
      if (await branchExists(root, candidate)) continue;

      try {
        await git(root, ["worktree", "add", "-b", candidate, worktreePath, "HEAD"]);
        return candidate;
      } catch (err) {
        // Another process may have taken the name between the check and the add.
        if (gitErrorOutput(err).stderr.includes("already exists")) continue;
        throw err;
      }
    }

    throw new SnapshotCreationError(
      `Could not find a free revision name for prefix '${prefix}' after ${MAX_NAME_ATTEMPTS} attempts.`,
    );
  });
}

// =============================================================================
// TREE MIRRORING
// =============================================================================

type SourceEntry = {
  relativePath: string;
  stat: Stats;
};

async function mirrorWorkingTree(sourceRoot: string, worktreePath: string): Promise<number> {
  const listed = await listWorkingTreeFiles(sourceRoot);
  const present: SourceEntry[] = [];

  for (const chunk of chunked(listed, COPY_CHUNK_SIZE)) {
    const entries = await Promise.all(
      chunk.map((relativePath) => readSourceEntry(sourceRoot, relativePath)),
    );
    for (const entry of entries) {
      if (entry) present.push(entry);
    }
  }

  // Tracked paths that are gone from the source tree, or now a directory there. They are
  // removed before copying so new content can take their place.
  const presentSet = new Set(present.map((entry) => entry.relativePath));
  const stale = (await listTrackedFiles(worktreePath)).filter((file) => !presentSet.has(file));
  for (const relativePath of stale) {
    await fse.remove(path.join(worktreePath, relativePath));
  }

  for (const chunk of chunked(present, COPY_CHUNK_SIZE)) {
    await Promise.all(chunk.map((entry) => copyEntry(sourceRoot, worktreePath, entry)));
  }

  return present.length;
}

async function readSourceEntry(
  sourceRoot: string,
  relativePath: string,
): Promise<SourceEntry | null> {
  // Untracked nested repositories are listed with a trailing slash.
  if (relativePath.endsWith("/")) return null;

  const stat = await lstatOrNull(path.join(sourceRoot, relativePath));
  if (!stat || stat.isDirectory()) return null;
  return { relativePath, stat };
}

async function copyEntry(
  sourceRoot: string,
  worktreePath: string,
  { relativePath, stat }: SourceEntry,
): Promise<void> {
  const source = path.join(sourceRoot, relativePath);
  const destination = path.join(worktreePath, relativePath);

  const destinationStat = await lstatOrNull(destination);
  if (
    destinationStat &&
    (destinationStat.isDirectory() || destinationStat.isSymbolicLink() !== stat.isSymbolicLink())
  ) {
    await fse.remove(destination);
  }

  await fse.ensureDir(path.dirname(destination));
  if (stat.isSymbolicLink()) {
    await fse.remove(destination);
    await fs.symlink(await fs.readlink(source), destination);
  } else {
    await fse.copy(source, destination, { overwrite: true, dereference: false });
  }
}

// =============================================================================
// CLEANUP
// =============================================================================

async function disposeScratchWorktree(
  root: string,
  worktreePath: string,
  scratchDir: string,
  logger: EventLogger,
): Promise<void> {
  try {
    await removeWorktree(root, worktreePath);
    await fse.remove(scratchDir);
  } catch (err) {
    logBatchEvent(logger, "snapshot.scratch_cleanup_failed", {
      worktree: worktreePath,
      message: formatErrorMessage(err),
    });
  }
}

async function discardBranch(
  root: string,
  worktreePath: string,
  branch: string,
  logger: EventLogger,
): Promise<void> {
  try {
    await removeWorktree(root, worktreePath);
    await deleteLocalBranch(root, branch);
    logBatchEvent(logger, "snapshot.discarded", { branch });
  } catch (err) {
    logBatchEvent(logger, "snapshot.discard_failed", {
      branch,
      message: formatErrorMessage(err),
    });
  }
}

async function lstatOrNull(target: string): Promise<Stats | null> {
  try {
    return await fs.lstat(target);
  } catch {
    return null;
  }
}

function chunked<T>(items: T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}
