/**
 * Locates the root of the git working tree enclosing a directory.
 * A `.git` directory (regular checkout) or `.git` file (worktree, submodule) marks the root.
 */

import fs from "node:fs";
import path from "node:path";

import { NotAVersionedTreeError } from "../core/errors.js";

export const REPOSITORY_MARKER = ".git";

export function findRepoRoot(startDir: string): string | null {
  let current = path.resolve(startDir);
  while (true) {
    if (fs.existsSync(path.join(current, REPOSITORY_MARKER))) {
      return current;
    }

    const parent = path.dirname(current);
    if (parent === current) return null;
    current = parent;
  }
}

export function locateRepository(startDir: string = process.cwd()): string {
  const root = findRepoRoot(startDir);
  if (!root) {
    throw new NotAVersionedTreeError(path.resolve(startDir));
  }
  return fs.realpathSync(root);
}

export type RepositoryLocator = {
  locate(startDir?: string): string;
  clear(): void;
};

// Answers are cached per resolved start directory, never across directories.
export function createRepositoryLocator(opts: { cache?: boolean } = {}): RepositoryLocator {
  const cache = new Map<string, string>();
  const useCache = opts.cache ?? true;

  return {
    locate(startDir = process.cwd()) {
      const key = path.resolve(startDir);
      const cached = useCache ? cache.get(key) : undefined;
      if (cached) return cached;

      const root = locateRepository(key);
      if (useCache) cache.set(key, root);
      return root;
    },
    clear() {
      cache.clear();
    },
  };
}
