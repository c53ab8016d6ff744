/**
 * Git worktree registry operations.
 * Every call that mutates `.git/worktrees` holds the repository lock.
 */

import path from "node:path";

import fse from "fs-extra";

import { git, gitUnchecked } from "./git.js";
import { withRepoLock } from "./repo-lock.js";

export type WorktreeEntry = {
  path: string;
  head?: string;
  branch?: string;
  detached: boolean;
};

export async function addDetachedWorktree(
  repoPath: string,
  worktreePath: string,
  commitish: string,
): Promise<void> {
  await fse.ensureDir(path.dirname(worktreePath));
  await withRepoLock(repoPath, async () => {
    await git(repoPath, ["worktree", "add", "--detach", worktreePath, commitish]);
  });
}

/**
 * Deregisters a worktree and deletes its directory. Symlinks inside the
 * worktree are unlinked, never followed.
 */
export async function removeWorktree(repoPath: string, worktreePath: string): Promise<void> {
  await withRepoLock(repoPath, async () => {
    const res = await gitUnchecked(repoPath, ["worktree", "remove", "--force", worktreePath]);
    await fse.remove(worktreePath);
    await git(repoPath, ["worktree", "prune"]);

    if (res.exitCode !== 0 && (await isRegisteredWorktree(repoPath, worktreePath))) {
      throw new Error(`git worktree remove failed for ${worktreePath}: ${res.stderr.trim()}`);
    }
  });
}

export async function listWorktrees(repoPath: string): Promise<WorktreeEntry[]> {
  const res = await git(repoPath, ["worktree", "list", "--porcelain"]);
  return parseWorktreeList(res.stdout);
}

export function parseWorktreeList(output: string): WorktreeEntry[] {
  const entries: WorktreeEntry[] = [];
  let current: WorktreeEntry | null = null;

  for (const rawLine of output.split("\n")) {
    const line = rawLine.trim();
    if (line.startsWith("worktree ")) {
      if (current) entries.push(current);
      current = { path: line.slice("worktree ".length), detached: false };
      continue;
    }
    if (!current) continue;

    if (line.startsWith("HEAD ")) {
      current.head = line.slice("HEAD ".length);
    } else if (line.startsWith("branch ")) {
      current.branch = line.slice("branch ".length).replace(/^refs\/heads\//, "");
    } else if (line === "detached") {
      current.detached = true;
    }
  }

  if (current) entries.push(current);
  return entries;
}

async function isRegisteredWorktree(repoPath: string, worktreePath: string): Promise<boolean> {
  const target = path.resolve(worktreePath);
  const entries = await listWorktrees(repoPath);
  return entries.some((entry) => path.resolve(entry.path) === target);
}
