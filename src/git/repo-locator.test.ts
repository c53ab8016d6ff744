import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import { NotAVersionedTreeError } from "../core/errors.js";

import { createRepositoryLocator, findRepoRoot, locateRepository } from "./repo-locator.js";

const tempDirs: string[] = [];

function makeDir(): string {
  const dir = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), "repo-locator-")));
  tempDirs.push(dir);
  return dir;
}

afterEach(() => {
  for (const dir of tempDirs) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
  tempDirs.length = 0;
});

describe("locateRepository", () => {
  it("walks up from a nested directory to the repository root", () => {
    const root = makeDir();
    fs.mkdirSync(path.join(root, ".git"));
    const nested = path.join(root, "a", "b", "c");
    fs.mkdirSync(nested, { recursive: true });

    expect(locateRepository(nested)).toBe(root);
    expect(findRepoRoot(nested)).toBe(root);
  });

  it("treats a .git file (linked worktree) as a root marker", () => {
    const root = makeDir();
    fs.writeFileSync(path.join(root, ".git"), "gitdir: /elsewhere/.git/worktrees/x\n");

    expect(locateRepository(root)).toBe(root);
  });

  it("throws NotAVersionedTreeError outside any repository", () => {
    const dir = makeDir();

    let error: unknown;
    try {
      locateRepository(dir);
    } catch (err) {
      error = err;
    }

    expect(error).toBeInstanceOf(NotAVersionedTreeError);
    if (!(error instanceof NotAVersionedTreeError)) return;
    expect(error.kind).toBe("not-a-versioned-tree");
    expect(error.startDir).toBe(dir);
    expect(error.message).toBe(`No git repository found in ${dir} or its parent directories.`);
  });

  it("returns the nearest root for nested repositories", () => {
    const outer = makeDir();
    fs.mkdirSync(path.join(outer, ".git"));
    const inner = path.join(outer, "vendor", "lib");
    fs.mkdirSync(path.join(inner, ".git"), { recursive: true });

    expect(locateRepository(path.join(inner))).toBe(inner);
    expect(locateRepository(path.join(outer, "vendor"))).toBe(outer);
  });
});

describe("createRepositoryLocator", () => {
  it("caches per start directory without leaking answers across directories", () => {
    const first = makeDir();
    const second = makeDir();
    fs.mkdirSync(path.join(first, ".git"));
    fs.mkdirSync(path.join(second, ".git"));

    const locator = createRepositoryLocator({ cache: true });

    expect(locator.locate(first)).toBe(first);
    expect(locator.locate(second)).toBe(second);

    fs.rmSync(path.join(first, ".git"), { recursive: true });
    expect(locator.locate(first)).toBe(first);

    locator.clear();
    expect(() => locator.locate(first)).toThrow(NotAVersionedTreeError);
  });
});
