import fs from "node:fs/promises";
import path from "node:path";

import { execa } from "execa";
import fse from "fs-extra";
import { afterEach, describe, expect, it } from "vitest";

import { createTempGitRepo, type TempGitRepo } from "../../test/helpers/temp-git-repo.js";
import { listWorktrees } from "../git/worktrees.js";

import { SymlinkConflictError, WorktreeCreationError } from "./errors.js";
import { provision, validateRedirectPath } from "./isolation.js";
import { MemoryLogger } from "./logger.js";
import { createRevision, type RevisionRecord } from "./snapshot.js";
import { readViewMarker } from "./view-marker.js";

const now = (): Date => new Date("2024-03-01T12:00:00.000Z");
const repos: TempGitRepo[] = [];

async function setup(
  files: Record<string, string> = { "app.py": "print('v1')\n" },
): Promise<{ repo: TempGitRepo; revision: RevisionRecord; baseDir: string }> {
  const repo = await createTempGitRepo({ files });
  repos.push(repo);
  const revision = await createRevision(repo.repoDir, "slurm-job", { now });
  return { repo, revision, baseDir: path.join(repo.tempRoot, "views") };
}

afterEach(async () => {
  await Promise.all(repos.map((repo) => repo.cleanup()));
  repos.length = 0;
});

describe("validateRedirectPath", () => {
  it("normalizes relative entries", () => {
    expect(validateRedirectPath("outputs/")).toBe("outputs");
    expect(validateRedirectPath("./multirun")).toBe("multirun");
    expect(validateRedirectPath("results/plots")).toBe("results/plots");
  });

  it.each([
    ["", "Redirect path must not be empty."],
    ["/scratch/outputs", "Redirect path must be relative: /scratch/outputs"],
    ["../outputs", "Redirect path escapes the tree: ../outputs"],
    ["a/../../outputs", "Redirect path escapes the tree: a/../../outputs"],
    [".git/hooks", "Redirect path must not touch .git: .git/hooks"],
    [".", "Redirect path must name a sub-path: ."],
  ])("rejects %j", (entry, message) => {
    expect(() => validateRedirectPath(entry)).toThrow(new SymlinkConflictError(message, entry));
  });
});

describe("provision", () => {
  it("checks out the revision as a worktree and links outputs back to the tree", async () => {
    const { repo, revision, baseDir } = await setup();
    const logger = new MemoryLogger();

    const view = await provision(revision, "job-0", {
      baseDir,
      redirectPaths: ["outputs"],
      logger,
    });

    expect(path.dirname(view.rootDir)).toBe(baseDir);
    expect(path.basename(view.rootDir).startsWith("repo-job-job-0-")).toBe(true);
    expect(view.path).toBe(path.join(view.rootDir, "code"));
    expect(view.strategy).toBe("worktree");
    expect(await fs.readFile(path.join(view.path, "app.py"), "utf8")).toBe("print('v1')\n");

    const linkPath = path.join(view.path, "outputs");
    expect((await fs.lstat(linkPath)).isSymbolicLink()).toBe(true);
    expect(await fs.readlink(linkPath)).toBe(path.join(repo.repoDir, "outputs"));
    expect(view.redirects).toEqual([
      {
        relativePath: "outputs",
        linkPath,
        targetPath: path.join(repo.repoDir, "outputs"),
      },
    ]);

    await fs.writeFile(path.join(linkPath, "metrics.json"), "{}\n", "utf8");
    expect(await repo.readFile("outputs/metrics.json")).toBe("{}\n");

    const worktree = (await listWorktrees(repo.repoDir)).find((entry) => entry.path === view.path);
    expect(worktree?.detached).toBe(true);
    expect(worktree?.head).toBe(revision.commit);

    expect(await readViewMarker(view.rootDir)).toMatchObject({
      jobId: "job-0",
      revision: revision.id,
      treeRoot: repo.repoDir,
      strategy: "worktree",
    });
    expect(logger.ofType("view.provisioned")[0]).toMatchObject({
      job_id: "job-0",
      revision: revision.id,
      path: view.path,
      strategy: "worktree",
      redirects: ["outputs"],
    });
  });

  it("replaces a tracked copy of a redirected directory with the link", async () => {
    const { repo, revision, baseDir } = await setup({
      "app.py": "print('v1')\n",
      "outputs/old.txt": "from history\n",
    });

    const view = await provision(revision, "job-0", { baseDir, redirectPaths: ["outputs"] });

    expect(await fs.readlink(path.join(view.path, "outputs"))).toBe(
      path.join(repo.repoDir, "outputs"),
    );
    expect(await fs.readFile(path.join(view.path, "outputs", "old.txt"), "utf8")).toBe(
      "from history\n",
    );
  });

  it("clones the revision when asked to", async () => {
    const { repo, revision, baseDir } = await setup();

    const view = await provision(revision, "job-0", { baseDir, strategy: "clone" });

    expect((await fs.stat(path.join(view.path, ".git"))).isDirectory()).toBe(true);
    const head = await execa("git", ["-C", view.path, "rev-parse", "HEAD"]);
    expect(head.stdout.trim()).toBe(revision.commit);
    expect((await listWorktrees(repo.repoDir)).map((entry) => entry.path)).toEqual([
      repo.repoDir,
    ]);
  });

  it("gives concurrent jobs distinct views", async () => {
    const { revision, baseDir } = await setup();

    const views = await Promise.all(
      ["job-0", "job-1", "job-2"].map((jobId) =>
        provision(revision, jobId, { baseDir, redirectPaths: ["outputs"] }),
      ),
    );

    expect(new Set(views.map((view) => view.path)).size).toBe(3);
    for (const view of views) {
      expect(await fse.pathExists(path.join(view.path, "app.py"))).toBe(true);
    }
  });

  it("rejects overlapping redirects before creating anything", async () => {
    const { revision, baseDir } = await setup();

    await expect(
      provision(revision, "job-0", { baseDir, redirectPaths: ["outputs", "outputs/plots"] }),
    ).rejects.toThrow("Redirect paths overlap: outputs and outputs/plots");
    expect(await fse.pathExists(baseDir)).toBe(false);
  });

  it("tears down the partial view when the checkout fails", async () => {
    const { repo, revision, baseDir } = await setup();
    const missing: RevisionRecord = { ...revision, id: "slurm-job-missing" };

    const error = await provision(missing, "job-0", { baseDir }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(WorktreeCreationError);
    expect(await fs.readdir(baseDir)).toEqual([]);
    expect((await listWorktrees(repo.repoDir)).map((entry) => entry.path)).toEqual([
      repo.repoDir,
    ]);
  });

  it("refuses a redirect whose parent is a tracked symlink into the originating tree", async () => {
    const repo = await createTempGitRepo({ files: { "realdata/outputs/keep.txt": "keep\n" } });
    repos.push(repo);
    await fs.symlink(path.join(repo.repoDir, "realdata"), path.join(repo.repoDir, "data"));
    await repo.commit("link data");
    const revision = await createRevision(repo.repoDir, "slurm-job", { now });
    const baseDir = path.join(repo.tempRoot, "views");

    const error = await provision(revision, "job-0", {
      baseDir,
      redirectPaths: ["data/outputs"],
    }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(SymlinkConflictError);
    expect(error).toMatchObject({
      relativePath: "data/outputs",
      message: `Cannot redirect data/outputs for job job-0: data resolves outside the checkout (${path.join(repo.repoDir, "realdata")}).`,
    });
    expect(await repo.readFile("realdata/outputs/keep.txt")).toBe("keep\n");
    expect(await fs.readdir(baseDir)).toEqual([]);
  });

  it("tears down the checkout when a redirect cannot be linked", async () => {
    const { repo, revision, baseDir } = await setup({
      "app.py": "print('v1')\n",
      notes: "plain file\n",
    });
    await repo.rm("notes");
    const logger = new MemoryLogger();

    const error = await provision(revision, "job-0", {
      baseDir,
      redirectPaths: ["notes/out"],
      logger,
    }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(SymlinkConflictError);
    expect(error).toMatchObject({ relativePath: "notes/out" });
    expect(await fs.readdir(baseDir)).toEqual([]);
    expect((await listWorktrees(repo.repoDir)).map((entry) => entry.path)).toEqual([
      repo.repoDir,
    ]);
    expect(logger.ofType("view.released")).toHaveLength(1);
    expect(logger.ofType("view.provisioned")).toEqual([]);
  });

  it("reports an unusable base directory as a checkout failure", async () => {
    const { repo, revision } = await setup();
    await repo.writeFile("../blocker", "not a directory\n");
    const baseDir = path.join(repo.tempRoot, "blocker", "views");

    const error = await provision(revision, "job-0", { baseDir }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(WorktreeCreationError);
    expect(error instanceof Error ? error.message : "").toMatch(
      /^Cannot create a view directory for job job-0 under .*blocker\/views: /,
    );
    expect(await fs.readFile(path.join(repo.tempRoot, "blocker"), "utf8")).toBe(
      "not a directory\n",
    );
  });
});
