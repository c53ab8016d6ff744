import path from "node:path";

import type { SnapjobsConfig } from "../core/config.js";
import { JsonlLogger } from "../core/logger.js";
import { launcherLogPath } from "../core/paths.js";
import { createRevision, type RevisionRecord } from "../core/snapshot.js";
import { defaultBatchId } from "../core/utils.js";
import { locateRepository } from "../git/repo-locator.js";

import { normalizeCommandError } from "./command-errors.js";

export async function snapshotCommand(
  config: SnapjobsConfig,
  opts: { prefix?: string; push?: boolean; cwd?: string },
): Promise<RevisionRecord> {
  let logger: JsonlLogger | null = null;

  try {
    const root = locateRepository(opts.cwd ?? process.cwd());
    const batchId = defaultBatchId();
    logger = new JsonlLogger(launcherLogPath(path.basename(root), batchId), { batchId });

    const revision = await createRevision(root, opts.prefix ?? config.snapshot.branch_prefix, {
      push: opts.push ?? config.snapshot.push_to_remote,
      remote: config.snapshot.remote,
      logger,
    });

    console.log(`Created revision ${revision.id}`);
    console.log(`Commit: ${revision.commit}`);
    console.log(`Base: ${revision.baseCommit} (${revision.sourceBranch})`);
    if (opts.push ?? config.snapshot.push_to_remote) {
      console.log(
        revision.published
          ? `Pushed to ${config.snapshot.remote}.`
          : `Push to ${config.snapshot.remote} failed; the branch exists locally only.`,
      );
    }
    return revision;
  } catch (error) {
    throw normalizeCommandError(error, "Snapshot failed.");
  } finally {
    logger?.close();
  }
}

