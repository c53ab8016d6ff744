import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { execa } from "execa";

// =============================================================================
// TYPES
// =============================================================================

export type TempGitRepo = {
  /** Real path of the temp directory holding the repo (and anything else a test creates). */
  tempRoot: string;
  repoDir: string;
  writeFile: (relPath: string, contents: string) => Promise<void>;
  readFile: (relPath: string) => Promise<string>;
  rm: (relPath: string) => Promise<void>;
  commit: (message: string) => Promise<string>;
  git: (args: string[]) => Promise<string>;
  cleanup: () => Promise<void>;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export async function createTempGitRepo(
  opts: { files?: Record<string, string>; name?: string } = {},
): Promise<TempGitRepo> {
  const tempRoot = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), "snapjobs-git-")));
  const repoDir = path.join(tempRoot, opts.name ?? "repo");

  await fs.mkdir(repoDir, { recursive: true });
  await initGitRepo(repoDir);

  const git = async (args: string[]): Promise<string> => {
    const result = await execa("git", ["-C", repoDir, ...args]);
    return result.stdout;
  };

  const writeFile = async (relPath: string, contents: string): Promise<void> => {
    const absolutePath = path.join(repoDir, relPath);
    await fs.mkdir(path.dirname(absolutePath), { recursive: true });
    await fs.writeFile(absolutePath, contents, "utf8");
  };

  const readFile = async (relPath: string): Promise<string> =>
    fs.readFile(path.join(repoDir, relPath), "utf8");

  const rm = async (relPath: string): Promise<void> => {
    await fs.rm(path.join(repoDir, relPath), { recursive: true, force: true });
  };

  const commit = async (message: string): Promise<string> => {
    await git(["add", "-A"]);
    await git(["commit", "-m", message]);
    const sha = await git(["rev-parse", "HEAD"]);
    return sha.trim();
  };

  const cleanup = async (): Promise<void> => {
    await fs.rm(tempRoot, { recursive: true, force: true });
  };

  const repo = { tempRoot, repoDir, writeFile, readFile, rm, commit, git, cleanup };

  if (opts.files) {
    for (const [relPath, contents] of Object.entries(opts.files)) {
      await writeFile(relPath, contents);
    }
    await commit("initial");
  }

  return repo;
}

// A bare repository next to the test repo, registered as its `origin`.
export async function addBareRemote(repo: TempGitRepo, name = "origin"): Promise<string> {
  const remoteDir = path.join(repo.tempRoot, `${name}.git`);
  await execa("git", ["init", "--bare", remoteDir]);
  await repo.git(["remote", "add", name, remoteDir]);
  return remoteDir;
}

// =============================================================================
// INTERNALS
// =============================================================================

async function initGitRepo(repoDir: string): Promise<void> {
  await execa("git", ["init"], { cwd: repoDir });
  await execa("git", ["symbolic-ref", "HEAD", "refs/heads/main"], { cwd: repoDir });
  await execa("git", ["config", "user.name", "snapjobs-test"], { cwd: repoDir });
  await execa("git", ["config", "user.email", "snapjobs-test@example.com"], { cwd: repoDir });
  await execa("git", ["config", "commit.gpgsign", "false"], { cwd: repoDir });
}
