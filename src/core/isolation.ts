/**
 * IsolationProvisioner: one private checkout of a revision per job.
 *
 * Layout of a view:
 *   <baseDir>/<repo>-job-<slug>-XXXXXX/          rootDir (unique, mkdtemp)
 *   <baseDir>/<repo>-job-<slug>-XXXXXX/code/     checkout of the revision
 *   <baseDir>/<repo>-job-<slug>-XXXXXX/snapjobs-view.json
 *
 * Redirect paths inside the checkout are symlinks into the originating tree, so job
 * outputs land where the user expects them.
 */

import fs from "node:fs/promises";
import path from "node:path";

import { execa } from "execa";
import fse from "fs-extra";

import { buildGitError } from "../git/git.js";
import { addDetachedWorktree } from "../git/worktrees.js";

import { release } from "./cleanup.js";
import { formatErrorMessage } from "./error-format.js";
import {
  IsolationError,
  SymlinkConflictError,
  WorktreeCreationError,
} from "./errors.js";
import { logBatchEvent, logIsolationEvent, NOOP_LOGGER, type EventLogger } from "./logger.js";
import { defaultViewBaseDir, viewCheckoutPath } from "./paths.js";
import type { RevisionRecord } from "./snapshot.js";
import { isPathInside, slugify } from "./utils.js";
import { writeViewMarker, type CheckoutStrategy } from "./view-marker.js";

export type { CheckoutStrategy } from "./view-marker.js";

// =============================================================================
// TYPES
// =============================================================================

export type Redirect = {
  /** Normalized path relative to both the checkout and the originating tree. */
  relativePath: string;
  /** Symlink inside the checkout. */
  linkPath: string;
  /** Path in the originating tree the link points at. */
  targetPath: string;
};

export type IsolatedView = {
  path: string;
  rootDir: string;
  jobId: string;
  revision: RevisionRecord;
  redirects: Redirect[];
  strategy: CheckoutStrategy;
};

export type ProvisionOptions = {
  baseDir?: string;
  redirectPaths?: string[];
  strategy?: CheckoutStrategy;
  logger?: EventLogger;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export async function provision(
  revision: RevisionRecord,
  jobId: string,
  opts: ProvisionOptions = {},
): Promise<IsolatedView> {
  const logger = opts.logger ?? NOOP_LOGGER;
  const strategy = opts.strategy ?? "worktree";
  const baseDir = path.resolve(opts.baseDir ?? defaultViewBaseDir(revision.treeRoot));
  const redirectPaths = normalizeRedirectPaths(opts.redirectPaths ?? []);

  let rootDir: string;
  try {
    await fse.ensureDir(baseDir);
    rootDir = await fs.mkdtemp(path.join(baseDir, viewDirPrefix(revision.treeRoot, jobId)));
  } catch (err) {
    throw new WorktreeCreationError(
      `Cannot create a view directory for job ${jobId} under ${baseDir}: ${formatErrorMessage(err)}`,
      err,
    );
  }

  const view: IsolatedView = {
    path: viewCheckoutPath(rootDir),
    rootDir,
    jobId,
    revision,
    redirects: [],
    strategy,
  };

  try {
    // The marker goes first so an interrupted provision is still found by stale-view cleanup.
    await writeViewMarker(rootDir, {
      jobId,
      revision: revision.id,
      treeRoot: revision.treeRoot,
      createdAt: new Date().toISOString(),
      strategy,
    });

    await materializeCheckout(view);

    for (const relativePath of redirectPaths) {
      view.redirects.push(await installRedirect(view, relativePath));
    }
  } catch (err) {
    await teardownPartialView(view, logger);
    if (err instanceof IsolationError) throw err;
    throw new WorktreeCreationError(
      `Failed to provision view for job ${jobId}: ${formatErrorMessage(err)}`,
      err,
    );
  }

  logBatchEvent(logger, "view.provisioned", {
    jobId,
    revision: revision.id,
    path: view.path,
    strategy,
    redirects: view.redirects.map((redirect) => redirect.relativePath),
  });

  return view;
}

/**
 * Checks a redirect entry and returns its normalized relative form.
 * Rejects absolute paths, paths that leave the tree and anything under `.git`.
 */
export function validateRedirectPath(entry: string): string {
  const trimmed = entry.trim();
  if (trimmed.length === 0) {
    throw new SymlinkConflictError("Redirect path must not be empty.", entry);
  }
  if (path.isAbsolute(trimmed) || path.posix.isAbsolute(trimmed) || path.win32.isAbsolute(trimmed)) {
    throw new SymlinkConflictError(`Redirect path must be relative: ${entry}`, entry);
  }

  const normalized = path.normalize(trimmed).replace(/[\\/]+$/, "");
  const segments = normalized.split(/[\\/]+/);

  if (normalized === "." || normalized.length === 0) {
    throw new SymlinkConflictError(`Redirect path must name a sub-path: ${entry}`, entry);
  }
  if (segments[0] === "..") {
    throw new SymlinkConflictError(`Redirect path escapes the tree: ${entry}`, entry);
  }
  if (segments.includes(".git")) {
    throw new SymlinkConflictError(`Redirect path must not touch .git: ${entry}`, entry);
  }

  return normalized;
}

// =============================================================================
// INTERNALS
// =============================================================================

function viewDirPrefix(treeRoot: string, jobId: string): string {
  const repoName = slugify(path.basename(treeRoot)) || "repo";
  const jobSlug = slugify(jobId) || "job";
  return `${repoName}-job-${jobSlug}-`;
}

// Validates every entry up front so a bad list fails before any checkout work.
function normalizeRedirectPaths(entries: string[]): string[] {
  const result: string[] = [];

  for (const entry of entries) {
    const normalized = validateRedirectPath(entry);
    if (result.includes(normalized)) continue;

    const overlapping = result.find(
      (existing) => isPathInside(existing, normalized) || isPathInside(normalized, existing),
    );
    if (overlapping) {
      throw new SymlinkConflictError(
        `Redirect paths overlap: ${overlapping} and ${normalized}`,
        entry,
      );
    }
    result.push(normalized);
  }

  return result;
}

async function materializeCheckout(view: IsolatedView): Promise<void> {
  const { revision } = view;

  try {
    if (view.strategy === "worktree") {
      await addDetachedWorktree(revision.treeRoot, view.path, revision.id);
      return;
    }

    const args = ["clone", "--no-hardlinks", "--branch", revision.id, revision.treeRoot, view.path];
    try {
      await execa("git", args, { stdio: "pipe" });
    } catch (err) {
      throw buildGitError(args, undefined, err);
    }
  } catch (err) {
    throw new WorktreeCreationError(
      `Could not check out revision ${revision.id} for job ${view.jobId}: ${formatErrorMessage(err)}`,
      err,
    );
  }
}

async function installRedirect(view: IsolatedView, relativePath: string): Promise<Redirect> {
  const targetPath = path.join(view.revision.treeRoot, relativePath);
  const linkPath = path.join(view.path, relativePath);

  await assertParentInsideCheckout(view, relativePath, linkPath);

  try {
    const targetStat = await statOrNull(targetPath);
    if (!targetStat) {
      await fse.ensureDir(targetPath);
    }
    const targetIsDir = targetStat ? targetStat.isDirectory() : true;

    // The revision may carry its own copy of the path; the link replaces it.
    if (await lstatOrNull(linkPath)) {
      if (!isPathInside(view.path, linkPath)) {
        throw new Error(`Refusing to remove ${linkPath} outside ${view.path}`);
      }
      await fse.remove(linkPath);
    }

    await fse.ensureDir(path.dirname(linkPath));
    const linkType = process.platform === "win32" && targetIsDir ? "junction" : undefined;
    await fs.symlink(targetPath, linkPath, linkType);
  } catch (err) {
    throw new SymlinkConflictError(
      `Cannot redirect ${relativePath} for job ${view.jobId}: ${formatErrorMessage(err)}`,
      relativePath,
      err,
    );
  }

  return { relativePath, linkPath, targetPath };
}

// A tracked symlink in the revision can route a parent of the link into the originating
// tree. Nothing may be removed or created through such a parent.
async function assertParentInsideCheckout(
  view: IsolatedView,
  relativePath: string,
  linkPath: string,
): Promise<void> {
  const checkoutRoot = await fs.realpath(view.path);
  const parent = await realpathOfNearestExisting(path.dirname(linkPath));
  if (parent === checkoutRoot || isPathInside(checkoutRoot, parent)) return;

  throw new SymlinkConflictError(
    `Cannot redirect ${relativePath} for job ${view.jobId}: ${path.dirname(relativePath)} resolves outside the checkout (${parent}).`,
    relativePath,
  );
}

async function realpathOfNearestExisting(target: string): Promise<string> {
  let current = target;
  for (;;) {
    const resolved = await realpathOrNull(current);
    if (resolved) return path.join(resolved, path.relative(current, target));

    const parent = path.dirname(current);
    if (parent === current) return target;
    current = parent;
  }
}

async function teardownPartialView(view: IsolatedView, logger: EventLogger): Promise<void> {
  try {
    await release(view, { logger });
  } catch (err) {
    logIsolationEvent(logger, "teardown_failed", err, {
      jobId: view.jobId,
      path: view.rootDir,
    });
  }
}

async function statOrNull(target: string): Promise<import("node:fs").Stats | null> {
  try {
    return await fs.stat(target);
  } catch {
    return null;
  }
}

async function lstatOrNull(target: string): Promise<import("node:fs").Stats | null> {
  try {
    return await fs.lstat(target);
  } catch {
    return null;
  }
}

async function realpathOrNull(target: string): Promise<string | null> {
  try {
    return await fs.realpath(target);
  } catch {
    return null;
  }
}
