import fs from "node:fs/promises";
import path from "node:path";

import fse from "fs-extra";

import { removeWorktree } from "../git/worktrees.js";

import { formatErrorMessage } from "./error-format.js";
import { CleanupError } from "./errors.js";
import type { IsolatedView } from "./isolation.js";
import { logBatchEvent, NOOP_LOGGER, type EventLogger } from "./logger.js";
import { viewCheckoutPath } from "./paths.js";
import type { RevisionRecord } from "./snapshot.js";
import { isPathInside } from "./utils.js";
import { readViewMarker, type ViewMarker } from "./view-marker.js";

// =============================================================================
// TYPES
// =============================================================================

export type ReleasableView = Pick<IsolatedView, "path" | "rootDir" | "jobId" | "strategy"> & {
  revision: Pick<RevisionRecord, "id" | "treeRoot">;
};

export type ReleaseOptions = {
  logger?: EventLogger;
};

export type StaleView = {
  rootDir: string;
  marker: ViewMarker;
};

export type StaleViewPlan = {
  baseDir: string;
  views: StaleView[];
};

export type BuildStaleViewPlanOptions = {
  /** Only include views provisioned from this originating tree. */
  treeRoot?: string;
};

export type ExecuteStaleViewPlanOptions = {
  dryRun?: boolean;
  log?: (message: string) => void;
  logger?: EventLogger;
};

// =============================================================================
// RELEASE
// =============================================================================

/**
 * Removes one job's view: deregisters the checkout (worktree strategy) and deletes the
 * view root. Redirect links are unlinked, never followed. Safe to call twice.
 */
export async function release(view: ReleasableView, opts: ReleaseOptions = {}): Promise<void> {
  const logger = opts.logger ?? NOOP_LOGGER;
  const treeRoot = path.resolve(view.revision.treeRoot);
  const rootDir = path.resolve(view.rootDir);

  assertSafeViewRoot(rootDir, path.resolve(view.path), treeRoot);

  const rootExists = await fse.pathExists(rootDir);

  try {
    if (view.strategy === "worktree" && (await fse.pathExists(treeRoot))) {
      await removeWorktree(treeRoot, view.path);
    }
    if (rootExists) {
      await fse.remove(rootDir);
    }
  } catch (err) {
    throw new CleanupError(
      `Failed to release view of job ${view.jobId} at ${rootDir}: ${formatErrorMessage(err)}`,
      err,
    );
  }

  if (rootExists) {
    logBatchEvent(logger, "view.released", { jobId: view.jobId, path: rootDir });
  }
}

function assertSafeViewRoot(rootDir: string, checkoutPath: string, treeRoot: string): void {
  if (rootDir === treeRoot || isPathInside(rootDir, treeRoot)) {
    throw new CleanupError(`Refusing to remove ${rootDir}: it contains the originating tree ${treeRoot}.`);
  }
  if (rootDir === path.parse(rootDir).root) {
    throw new CleanupError(`Refusing to remove filesystem root ${rootDir}.`);
  }
  if (!isPathInside(rootDir, checkoutPath)) {
    throw new CleanupError(`Refusing to release ${checkoutPath}: it is not inside ${rootDir}.`);
  }
}

// =============================================================================
// STALE VIEWS
// =============================================================================

export async function buildStaleViewPlan(
  baseDir: string,
  opts: BuildStaleViewPlanOptions = {},
): Promise<StaleViewPlan> {
  const resolvedBase = path.resolve(baseDir);
  const plan: StaleViewPlan = { baseDir: resolvedBase, views: [] };
  if (!(await fse.pathExists(resolvedBase))) return plan;

  const treeRoot = opts.treeRoot ? await fs.realpath(opts.treeRoot) : undefined;
  const entries = await fs.readdir(resolvedBase, { withFileTypes: true });

  for (const entry of entries) {
    if (!entry.isDirectory()) continue;

    const rootDir = path.join(resolvedBase, entry.name);
    const marker = await readViewMarker(rootDir);
    if (!marker) continue;
    if (treeRoot && path.resolve(marker.treeRoot) !== treeRoot) continue;

    assertInsideBase(rootDir, resolvedBase, "view");
    plan.views.push({ rootDir, marker });
  }

  plan.views.sort((a, b) => a.rootDir.localeCompare(b.rootDir));
  return plan;
}

export async function executeStaleViewPlan(
  plan: StaleViewPlan,
  opts: ExecuteStaleViewPlanOptions = {},
): Promise<void> {
  const log = opts.log ?? (() => undefined);
  const failures: unknown[] = [];

  for (const { rootDir, marker } of plan.views) {
    assertInsideBase(rootDir, plan.baseDir, "view");

    if (opts.dryRun) {
      log(`[dry-run] Would remove view of ${marker.jobId}: ${rootDir}`);
      continue;
    }

    try {
      await release(
        {
          path: viewCheckoutPath(rootDir),
          rootDir,
          jobId: marker.jobId,
          strategy: marker.strategy,
          revision: { id: marker.revision, treeRoot: marker.treeRoot },
        },
        { logger: opts.logger },
      );
    } catch (err) {
      failures.push(err);
      log(`Failed to remove view of ${marker.jobId}: ${formatErrorMessage(err)}`);
      continue;
    }
    log(`Removed view of ${marker.jobId}: ${rootDir}`);
  }

  if (failures.length > 0) {
    throw new CleanupError(
      `Failed to remove ${failures.length} of ${plan.views.length} view(s) under ${plan.baseDir}.`,
      failures.length === 1 ? failures[0] : new AggregateError(failures),
    );
  }
}

export function assertInsideBase(targetPath: string, baseDir: string, label: string): void {
  const normalizedBase = path.resolve(baseDir);
  const normalizedTarget = path.resolve(targetPath);
  const relative = path.relative(normalizedBase, normalizedTarget);

  if (relative === "" || relative.startsWith("..") || path.isAbsolute(relative)) {
    throw new Error(`Refusing to remove ${label} outside ${normalizedBase}: ${normalizedTarget}`);
  }
}
