/**
 * Per-repository mutex for mutations of git's shared worktree registry.
 * Concurrent `git worktree add/remove/prune` against one repository race on
 * `.git/worktrees/<id>`, so every such call runs inside `withRepoLock`.
 * Only the registry mutation is serialized; file copying happens outside the lock.
 */

import path from "node:path";

const repoQueues = new Map<string, Promise<void>>();

function lockKey(repoPath: string): string {
  const resolved = path.resolve(repoPath);
  return process.platform === "win32" ? resolved.toLowerCase() : resolved;
}

export async function acquireRepoLock(repoPath: string): Promise<() => void> {
  const key = lockKey(repoPath);
  const previous = repoQueues.get(key) ?? Promise.resolve();

  let release: () => void = () => undefined;
  const current = new Promise<void>((resolve) => {
    release = resolve;
  });
  const tail = previous.then(() => current);
  repoQueues.set(key, tail);

  await previous;

  let released = false;
  return () => {
    if (released) return;
    released = true;
    release();
    if (repoQueues.get(key) === tail) {
      repoQueues.delete(key);
    }
  };
}

export async function withRepoLock<T>(repoPath: string, fn: () => Promise<T>): Promise<T> {
  const release = await acquireRepoLock(repoPath);
  try {
    return await fn();
  } finally {
    release();
  }
}

export function isRepoLocked(repoPath: string): boolean {
  return repoQueues.has(lockKey(repoPath));
}
